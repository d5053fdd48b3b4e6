#!/usr/bin/env node
import 'dotenv/config';
import chalk from 'chalk';
import { loadConfig } from './config.js';
import { parseCliArgs, resolveRunOptions } from './cliArgs.js';
import { DATA_SOURCES, runTransforms } from './transforms.js';
import { TransformException } from './types/errors.js';

const VERSION = '0.1.0';
const HELP = `
hpoa-kgx v${VERSION}

Usage:
  hpoa-kgx transform [options]   Transform annotation sources into node/edge TSVs

Options:
  -i, --input-dir <dir>     Directory holding downloaded sources (default: data/raw)
  -o, --output-dir <dir>    Directory for transformed output (default: data/transformed)
  -s, --source <name>       Source to transform, repeatable (${Object.keys(DATA_SOURCES).join(', ')})
  -f, --file <path>         Read this file instead of the source's default input
  --compression <tag>       none, gzip or gz (default: none)
  --[no-]add-excluded       Keep annotations qualified with NOT
  --[no-]sort               Sort rows for byte-stable output
  --[no-]full-edges         Write every edge field
  --help, -h                Show this help
  --version, -v             Show version

Environment (.env is read): HPOA_INPUT_DIR, HPOA_OUTPUT_DIR, HPOA_COMPRESSION,
HPOA_ADD_EXCLUDED, HPOA_SORT_OUTPUT, HPOA_FULL_EDGES. Flags override them.
`;

function main(): number {
    const args = parseCliArgs(process.argv.slice(2));

    if (args.version) {
        console.log(VERSION);
        return 0;
    }

    if (args.help || !args.command) {
        console.log(HELP);
        return 0;
    }

    if (args.command !== 'transform') {
        console.error(chalk.red(`Error: unknown command '${args.command}'`));
        return 1;
    }

    const options = resolveRunOptions(args, loadConfig());
    console.log(`Using input from \`${options.inputDir}\``);
    console.log(`Storing output to \`${options.outputDir}\``);

    const start = Date.now();
    const summaries = runTransforms({
        ...options,
        onProgress: message => console.error(chalk.dim(message)),
    });

    for (const summary of summaries) {
        console.log(chalk.green(`✓ ${summary.source}`) +
            `: ${summary.nodeCount} nodes, ${summary.edgeCount} edges from ${summary.rowsRead} rows`);
        console.log(chalk.dim(`  ${summary.nodesPath}\n  ${summary.edgesPath}`));
    }
    console.log(`Time: ${Date.now() - start}ms`);
    return 0;
}

try {
    process.exitCode = main();
} catch (error) {
    if (error instanceof TransformException) {
        console.error(chalk.red(`Error [${error.code}]: ${error.message}`));
        if (error.error.suggestion) console.error(chalk.yellow(error.error.suggestion));
    } else {
        console.error(chalk.red('Error:'), error instanceof Error ? error.message : error);
    }
    process.exitCode = 1;
}

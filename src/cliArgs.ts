import type { AppConfig } from './config.js';
import type { RunTransformsOptions } from './transforms.js';
import { isCompressionTag } from './tsv/reader.js';
import { UnsupportedCompressionError } from './types/errors.js';

export interface CliArgs {
    command?: string;
    help: boolean;
    version: boolean;
    inputDir?: string;
    outputDir?: string;
    sources: string[];
    dataFile?: string;
    compression?: string;
    /** Unset when neither the flag nor its --no- form is given */
    addExcluded?: boolean;
    sort?: boolean;
    fullEdges?: boolean;
}

const VALUE_FLAGS = new Map<string, keyof CliArgs>([
    ['-i', 'inputDir'],
    ['--input-dir', 'inputDir'],
    ['-o', 'outputDir'],
    ['--output-dir', 'outputDir'],
    ['-s', 'sources'],
    ['--source', 'sources'],
    ['-f', 'dataFile'],
    ['--file', 'dataFile'],
    ['--compression', 'compression'],
]);

export function parseCliArgs(argv: string[]): CliArgs {
    const args: CliArgs = {
        help: false,
        version: false,
        sources: [],
    };

    for (let i = 0; i < argv.length; i++) {
        let arg = argv[i];
        let value: string | undefined;

        if (arg.startsWith('--') && arg.includes('=')) {
            value = arg.slice(arg.indexOf('=') + 1);
            arg = arg.slice(0, arg.indexOf('='));
        }

        const target = VALUE_FLAGS.get(arg);
        if (target) {
            if (value === undefined) {
                if (i + 1 >= argv.length) throw new Error(`Option ${arg} requires a value`);
                value = argv[++i];
            }
            if (target === 'sources') {
                args.sources.push(value);
            } else if (target === 'inputDir' || target === 'outputDir' || target === 'dataFile' || target === 'compression') {
                args[target] = value;
            }
            continue;
        }

        switch (arg) {
            case '--help': case '-h': args.help = true; break;
            case '--version': case '-v': args.version = true; break;
            case '--add-excluded': args.addExcluded = true; break;
            case '--no-add-excluded': args.addExcluded = false; break;
            case '--sort': args.sort = true; break;
            case '--no-sort': args.sort = false; break;
            case '--full-edges': args.fullEdges = true; break;
            case '--no-full-edges': args.fullEdges = false; break;
            default:
                if (arg.startsWith('-')) throw new Error(`Unknown option '${arg}'`);
                if (args.command === undefined) args.command = arg;
                else throw new Error(`Unexpected argument '${arg}'`);
        }
    }

    return args;
}

/**
 * Flags win over the environment
 */
export function resolveRunOptions(args: CliArgs, config: AppConfig): RunTransformsOptions {
    const compression = args.compression ?? config.compression;
    if (!isCompressionTag(compression)) {
        throw new UnsupportedCompressionError(compression);
    }
    return {
        inputDir: args.inputDir ?? config.inputDir,
        outputDir: args.outputDir ?? config.outputDir,
        sources: args.sources,
        dataFile: args.dataFile,
        compression,
        addExcludedPhenotypes: args.addExcluded ?? config.addExcludedPhenotypes,
        sortOutput: args.sort ?? config.sortOutput,
        fullEdgeSchema: args.fullEdges ?? config.fullEdgeSchema,
    };
}

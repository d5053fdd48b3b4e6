import path from 'path';
import { DEFAULTS } from './types/options.js';
import type { TransformSummary } from './types/options.js';

/**
 * Base class for a single-source transform. Output for a source lands in
 * `<outputBaseDir>/<sourceName>/`.
 */
export abstract class Transform {
    readonly sourceName: string;
    readonly inputBaseDir: string;
    readonly outputBaseDir: string;
    readonly outputDir: string;
    readonly outputNodeFile: string;
    readonly outputEdgeFile: string;

    constructor(sourceName: string, inputDir?: string, outputDir?: string) {
        this.sourceName = sourceName;
        this.inputBaseDir = inputDir || DEFAULTS.inputDir;
        this.outputBaseDir = outputDir || DEFAULTS.outputDir;
        this.outputDir = path.join(this.outputBaseDir, sourceName);
        this.outputNodeFile = path.join(this.outputDir, `${sourceName}_nodes.tsv`);
        this.outputEdgeFile = path.join(this.outputDir, `${sourceName}_edges.tsv`);
    }

    abstract run(dataFile?: string): TransformSummary;
}

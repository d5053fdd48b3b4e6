import { Transform } from './transform.js';
import { DiseaseAnnotationsTransform } from './hpoa/transform.js';
import { createUnknownSourceError } from './types/errors.js';
import type { TransformOptions, TransformSummary } from './types/options.js';

export type TransformFactory = (
    inputDir: string | undefined,
    outputDir: string | undefined,
    options: TransformOptions
) => Transform;

export const DATA_SOURCES: Readonly<Record<string, TransformFactory>> = Object.freeze({
    DiseaseAnnotationsTransform: (inputDir, outputDir, options) =>
        new DiseaseAnnotationsTransform(inputDir, outputDir, options),
});

export interface RunTransformsOptions extends TransformOptions {
    inputDir?: string;
    outputDir?: string;
    /** Registry keys to run; all of them when empty */
    sources?: string[];
    /** Explicit input file, passed to every selected transform */
    dataFile?: string;
}

/**
 * Run the selected transforms one after another. Unknown keys are rejected
 * before anything runs.
 */
export function runTransforms(options: RunTransformsOptions = {}): TransformSummary[] {
    const { inputDir, outputDir, sources, dataFile, ...transformOptions } = options;
    const known = Object.keys(DATA_SOURCES);
    const selected = sources && sources.length > 0 ? sources : known;

    const factories = selected.map(source => {
        const factory = DATA_SOURCES[source];
        if (!factory) throw createUnknownSourceError(source, known);
        return factory;
    });

    return factories.map(factory => factory(inputDir, outputDir, transformOptions).run(dataFile));
}

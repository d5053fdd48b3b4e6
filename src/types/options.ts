export const SUPPORTED_COMPRESSIONS = ['none', 'gzip', 'gz'] as const;

export type CompressionTag = typeof SUPPORTED_COMPRESSIONS[number];

export interface TransformOptions {
    /** Keep rows whose qualifier is NOT */
    addExcludedPhenotypes?: boolean;
    compression?: CompressionTag;
    sortOutput?: boolean;
    /** Write every edge field instead of the six-column layout */
    fullEdgeSchema?: boolean;
    /**
     * Callback for progress updates.
     * @param message A descriptive message about the current step.
     */
    onProgress?: (message: string) => void;
}

export interface TransformSummary {
    source: string;
    rowsRead: number;
    rowsKept: number;
    rowsNegated: number;
    nodeCount: number;
    edgeCount: number;
    nodesPath: string;
    edgesPath: string;
}

export const DEFAULTS = {
    inputDir: 'data/raw',
    outputDir: 'data/transformed',
    preambleLines: 5,
    dataFile: 'phenotype.hpoa',
    compression: 'none',
    addExcludedPhenotypes: false,
    sortOutput: false,
    fullEdgeSchema: false,
} as const;

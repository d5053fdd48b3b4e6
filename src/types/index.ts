/**
 * Shared type definitions for hpoa-kgx
 */

// Re-export error types
export {
    TransformException,
    UnsupportedCompressionError,
    MalformedQualifierError,
    createTruncatedInputError,
    createUnknownSourceError,
    createConfigError,
    serializeTransformError,
} from './errors.js';

export type {
    TransformErrorCode,
    TransformError,
} from './errors.js';

// Re-export graph types
export {
    HPOA_HEADER,
    HPOA_CONSTANTS,
} from './graph.js';

export type {
    HpoaField,
    SourceRow,
    GraphNode,
    GraphEdge,
    GraphConstants,
} from './graph.js';

// Re-export options
export {
    DEFAULTS,
    SUPPORTED_COMPRESSIONS,
} from './options.js';

export type {
    CompressionTag,
    TransformOptions,
    TransformSummary,
} from './options.js';

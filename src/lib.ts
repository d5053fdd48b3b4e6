/**
 * hpoa-kgx - Library Entry Point
 *
 * Exports the transform and its building blocks for use in other projects.
 * This file should NOT import the CLI or anything that reads process state.
 */

// Transforms
export { Transform } from './transform.js';
export { DiseaseAnnotationsTransform, NODE_COLUMNS, EDGE_COLUMNS, FULL_EDGE_COLUMNS } from './hpoa/transform.js';
export { DATA_SOURCES, runTransforms } from './transforms.js';
export type { TransformFactory, RunTransformsOptions } from './transforms.js';

// Pipeline stages
export { openSource, readRows, parseRecords, skipLines } from './tsv/reader.js';
export { writeTsv, formatRecord, escapeValue } from './tsv/writer.js';
export { TSV_DIALECT } from './tsv/dialect.js';
export type { TsvDialect } from './tsv/dialect.js';
export { classifyRow, phenotypeIsPresent } from './hpoa/classifier.js';
export type { RowDecision } from './hpoa/classifier.js';
export { GraphBuilder, buildNode, buildEdge, deriveEdgeId } from './hpoa/builder.js';
export { TupleSet } from './hpoa/tupleSet.js';

// Configuration
export { loadConfig, ConfigSchema } from './config.js';
export type { AppConfig } from './config.js';

// Types and Interfaces
export * from './types/index.js';

import fs from 'fs';
import path from 'path';
import { Transform } from '../transform.js';
import { openSource, readRows } from '../tsv/reader.js';
import { writeTsv } from '../tsv/writer.js';
import { classifyRow } from './classifier.js';
import { GraphBuilder } from './builder.js';
import { HPOA_CONSTANTS, HPOA_HEADER } from '../types/graph.js';
import type { GraphConstants, GraphEdge, GraphNode } from '../types/graph.js';
import { DEFAULTS } from '../types/options.js';
import type { TransformOptions, TransformSummary } from '../types/options.js';

export const NODE_COLUMNS = ['id', 'category', 'name', 'provided_by'] as const;

// The trailing unnamed column and the missing id/category/publications are
// what the merge step has always been fed; see fullEdgeSchema.
export const EDGE_COLUMNS = ['subject', 'predicate', 'object', 'relation', 'provided_by', ''] as const;

export const FULL_EDGE_COLUMNS = [
    'id', 'subject', 'predicate', 'object', 'relation',
    'primary_knowledge_source', 'category', 'publications',
] as const;

function compare(a: string, b: string): number {
    return a < b ? -1 : a > b ? 1 : 0;
}

export function sortNodes(nodes: Iterable<GraphNode>): GraphNode[] {
    return [...nodes].sort((a, b) => compare(a.id, b.id) || compare(a.name, b.name));
}

export function sortEdges(edges: Iterable<GraphEdge>): GraphEdge[] {
    return [...edges].sort((a, b) =>
        compare(a.subject, b.subject) || compare(a.object, b.object) || compare(a.id, b.id));
}

/**
 * Parses the HPO annotation file (HPOA) into disease nodes and
 * disease-has-phenotype edges.
 */
export class DiseaseAnnotationsTransform extends Transform {
    static readonly SOURCE_NAME = 'HPOA';

    private readonly options: TransformOptions;
    private readonly constants: GraphConstants;

    constructor(
        inputDir?: string,
        outputDir?: string,
        options: TransformOptions = {},
        constants: GraphConstants = HPOA_CONSTANTS
    ) {
        super(DiseaseAnnotationsTransform.SOURCE_NAME, inputDir, outputDir);
        this.options = options;
        this.constants = constants;
    }

    run(dataFile?: string): TransformSummary {
        const file = dataFile || path.join(this.inputBaseDir, DEFAULTS.dataFile);
        return this.parse(file, this.options.compression);
    }

    parse(dataFile: string, compression?: string): TransformSummary {
        const progress = this.options.onProgress;
        const addExcluded = this.options.addExcludedPhenotypes ?? DEFAULTS.addExcludedPhenotypes;

        progress?.(`Reading ${dataFile}`);
        const text = openSource(dataFile, compression);

        const builder = new GraphBuilder(this.constants);
        let rowsRead = 0;
        let rowsKept = 0;
        let rowsNegated = 0;

        for (const { line, row } of readRows(text, HPOA_HEADER, DEFAULTS.preambleLines)) {
            rowsRead++;
            const decision = classifyRow(row, addExcluded, line);
            if (!decision.present) rowsNegated++;
            if (!decision.keep) continue;
            builder.add(row, decision.present);
            rowsKept++;
        }
        progress?.(`Parsed ${rowsRead} rows, kept ${rowsKept} (${rowsNegated} negated)`);

        fs.mkdirSync(this.outputDir, { recursive: true });
        const sort = this.options.sortOutput ?? DEFAULTS.sortOutput;
        const nodes = sort ? sortNodes(builder.nodes) : [...builder.nodes];
        const edges = sort ? sortEdges(builder.edges) : [...builder.edges];

        progress?.(`Writing ${nodes.length} nodes to ${this.outputNodeFile}`);
        writeTsv(this.outputNodeFile, NODE_COLUMNS, nodes);

        progress?.(`Writing ${edges.length} edges to ${this.outputEdgeFile}`);
        if (this.options.fullEdgeSchema ?? DEFAULTS.fullEdgeSchema) {
            writeTsv(this.outputEdgeFile, FULL_EDGE_COLUMNS, edges);
        } else {
            writeTsv(this.outputEdgeFile, EDGE_COLUMNS, edges.map(edge => ({
                subject: edge.subject,
                predicate: edge.predicate,
                object: edge.object,
                relation: edge.relation,
                provided_by: edge.primary_knowledge_source,
            })));
        }

        return {
            source: this.sourceName,
            rowsRead,
            rowsKept,
            rowsNegated,
            nodeCount: nodes.length,
            edgeCount: edges.length,
            nodesPath: this.outputNodeFile,
            edgesPath: this.outputEdgeFile,
        };
    }
}

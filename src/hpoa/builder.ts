import { v3 as uuidv3 } from 'uuid';
import { TupleSet } from './tupleSet.js';
import { HPOA_CONSTANTS } from '../types/graph.js';
import type { GraphConstants, GraphEdge, GraphNode, SourceRow } from '../types/graph.js';

/**
 * Content-derived edge id. The same disease, phenotype and presence always
 * give the same id, so re-runs and merges see one edge per fact.
 */
export function deriveEdgeId(diseaseId: string, phenotypeId: string, present: boolean): string {
    const name = [diseaseId, phenotypeId, present ? 'True' : 'False'].join('-');
    return 'urn:uuid:' + uuidv3(name, uuidv3.DNS);
}

export function buildNode(row: SourceRow, constants: GraphConstants = HPOA_CONSTANTS): GraphNode {
    return {
        id: row.DatabaseID ?? '',
        category: constants.nodeCategory,
        name: row.DiseaseName ?? '',
        provided_by: constants.providedBy,
    };
}

// Negated rows keep the asserted edge shape; only the id tells them apart.
export function buildEdge(
    row: SourceRow,
    present: boolean,
    constants: GraphConstants = HPOA_CONSTANTS
): GraphEdge {
    const diseaseId = row.DatabaseID ?? '';
    const hpoId = row.HPO_ID ?? '';
    return {
        id: deriveEdgeId(diseaseId, hpoId, present),
        subject: diseaseId,
        predicate: constants.predicate,
        object: hpoId,
        relation: constants.relation,
        primary_knowledge_source: constants.providedBy,
        category: constants.edgeCategory,
        publications: row.Reference ?? '',
    };
}

/**
 * Accumulates deduplicated nodes and edges. A node and its edge are always
 * added together, so every edge subject has a node.
 */
export class GraphBuilder {
    readonly nodes = new TupleSet<GraphNode>();
    readonly edges = new TupleSet<GraphEdge>();

    constructor(private readonly constants: GraphConstants = HPOA_CONSTANTS) {}

    add(row: SourceRow, present: boolean): { node: GraphNode; edge: GraphEdge } {
        const node = buildNode(row, this.constants);
        const edge = buildEdge(row, present, this.constants);
        this.nodes.add(node);
        this.edges.add(edge);
        return { node, edge };
    }
}

/**
 * Graph entities emitted by the transform, in the node/edge layout the
 * merge step reads.
 */

export const HPOA_HEADER = [
    'DatabaseID', 'DiseaseName', 'Qualifier', 'HPO_ID',
    'Reference', 'Evidence', 'Onset', 'Frequency', 'Sex',
    'Modifier', 'Aspect', 'Biocuration',
] as const;

export type HpoaField = typeof HPOA_HEADER[number];

/**
 * One annotation record mapped by position onto the header.
 * Fields past the end of a short record are absent.
 */
export type SourceRow = Readonly<Partial<Record<HpoaField, string>>>;

export interface GraphNode {
    readonly id: string;
    readonly category: string;
    readonly name: string;
    readonly provided_by: string;
}

export interface GraphEdge {
    readonly id: string;
    readonly subject: string;
    readonly predicate: string;
    readonly object: string;
    readonly relation: string;
    readonly primary_knowledge_source: string;
    readonly category: string;
    readonly publications: string;
}

/**
 * Fixed vocabulary stamped onto every node and edge
 */
export interface GraphConstants {
    readonly nodeCategory: string;
    readonly providedBy: string;
    readonly predicate: string;
    readonly relation: string;
    readonly edgeCategory: string;
}

export const HPOA_CONSTANTS: GraphConstants = Object.freeze({
    nodeCategory: 'biolink:Disease',
    providedBy: 'HPO:hpoa',
    predicate: 'biolink:has_phenotype',
    relation: 'RO:0002200',
    edgeCategory: 'biolink:PhenotypeToDiseaseAssociation',
});

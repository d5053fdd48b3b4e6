import { MalformedQualifierError } from '../types/errors.js';
import type { SourceRow } from '../types/graph.js';

export type RowDecision =
    | { keep: true; present: boolean }
    | { keep: false; present: false };

/**
 * Read the qualifier of an annotation: empty means the phenotype is
 * present, NOT means it is excluded. Anything else is malformed.
 */
export function phenotypeIsPresent(row: SourceRow, lineNumber?: number): boolean {
    const qualifier = row.Qualifier;
    if (qualifier === '') return true;
    if (qualifier === 'NOT') return false;
    throw new MalformedQualifierError(qualifier, row, lineNumber);
}

export function classifyRow(
    row: SourceRow,
    addExcludedPhenotypes: boolean,
    lineNumber?: number
): RowDecision {
    const present = phenotypeIsPresent(row, lineNumber);
    if (!present && !addExcludedPhenotypes) {
        return { keep: false, present: false };
    }
    return { keep: true, present };
}

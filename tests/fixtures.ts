/**
 * Shared test fixtures: annotation files built in temporary directories.
 */
import fs from 'fs';
import os from 'os';
import path from 'path';
import { gzipSync } from 'zlib';
import { HPOA_HEADER } from '../src/types/graph.js';
import type { HpoaField } from '../src/types/graph.js';

export const PREAMBLE = [
    '#description: "test annotations"',
    '#version: 2000-01-01',
    '#tracker: none',
    '#hpo-version: test',
    'database_id\tdisease_name\tqualifier\thpo_id\treference\tevidence\tonset\tfrequency\tsex\tmodifier\taspect\tbiocuration',
];

/** One annotation line; unspecified fields are empty */
export function hpoaLine(fields: Partial<Record<HpoaField, string>>): string {
    return HPOA_HEADER.map(name => fields[name] ?? '').join('\t');
}

export const ROWS = {
    asserted: hpoaLine({
        DatabaseID: 'OMIM:101600', DiseaseName: 'DiseaseX', HPO_ID: 'HP:0001',
        Reference: 'PMID:1', Evidence: 'PCS', Aspect: 'P', Biocuration: 'HPO:test[2000-01-01]',
    }),
    negated: hpoaLine({
        DatabaseID: 'OMIM:101600', DiseaseName: 'DiseaseX', Qualifier: 'NOT', HPO_ID: 'HP:0001',
        Reference: 'PMID:1', Evidence: 'PCS', Aspect: 'P',
    }),
    secondPhenotype: hpoaLine({
        DatabaseID: 'OMIM:101600', DiseaseName: 'DiseaseX', HPO_ID: 'HP:0002',
        Reference: 'PMID:2', Evidence: 'TAS', Aspect: 'P',
    }),
    otherDisease: hpoaLine({
        DatabaseID: 'ORPHA:10', DiseaseName: 'DiseaseY', HPO_ID: 'HP:0003',
        Reference: 'ORPHA:10', Evidence: 'TAS', Aspect: 'P',
    }),
};

export function makeTmpDir(): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), 'hpoa-kgx-'));
}

export function removeDir(dir: string): void {
    fs.rmSync(dir, { recursive: true, force: true });
}

/**
 * Write the preamble plus `lines` to `<dir>/<name>`, gzipped when asked.
 */
export function writeHpoa(dir: string, lines: string[], options: { name?: string; gzip?: boolean } = {}): string {
    const file = path.join(dir, options.name ?? 'phenotype.hpoa');
    const text = [...PREAMBLE, ...lines].join('\n') + '\n';
    fs.writeFileSync(file, options.gzip ? gzipSync(text) : text);
    return file;
}

export function readLines(file: string): string[] {
    return fs.readFileSync(file, 'utf-8').split(os.EOL).slice(0, -1);
}

/** Run `fn` and return what it threw, or undefined */
export function captureError(fn: () => unknown): unknown {
    try {
        fn();
    } catch (e) {
        return e;
    }
    return undefined;
}

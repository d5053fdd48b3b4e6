import fs from 'fs';
import { TSV_DIALECT, TsvDialect } from './dialect.js';

export function escapeValue(value: string, dialect: TsvDialect = TSV_DIALECT): string {
    let out = '';
    for (const c of value) {
        if (c === dialect.delimiter || c === dialect.escapeChar || dialect.specialChars.includes(c)) {
            out += dialect.escapeChar;
        }
        out += c;
    }
    return out;
}

export function formatRecord(values: readonly string[], dialect: TsvDialect = TSV_DIALECT): string {
    return values.map(v => escapeValue(v, dialect)).join(dialect.delimiter) + dialect.lineTerminator;
}

/**
 * Write a header and one record per row. Columns a row does not carry
 * are written empty.
 */
export function writeTsv<R extends object>(
    path: string,
    columns: readonly string[],
    rows: Iterable<R>,
    dialect: TsvDialect = TSV_DIALECT
): number {
    const fd = fs.openSync(path, 'w');
    let written = 0;
    try {
        fs.writeSync(fd, formatRecord(columns, dialect));
        for (const row of rows) {
            const fields = new Map<string, unknown>(Object.entries(row));
            const values = columns.map(col => {
                const value = fields.get(col);
                return value === undefined || value === null ? '' : String(value);
            });
            fs.writeSync(fd, formatRecord(values, dialect));
            written++;
        }
    } finally {
        fs.closeSync(fd);
    }
    return written;
}

import fs from 'fs';
import { gunzipSync } from 'zlib';
import { TSV_DIALECT, TsvDialect } from './dialect.js';
import { UnsupportedCompressionError, createTruncatedInputError } from '../types/errors.js';
import { SUPPORTED_COMPRESSIONS } from '../types/options.js';
import type { CompressionTag } from '../types/options.js';

export interface ParsedRecord<F extends string> {
    /** 1-based physical line the record starts on */
    line: number;
    row: Readonly<Partial<Record<F, string>>>;
}

export function isCompressionTag(value: string): value is CompressionTag {
    return SUPPORTED_COMPRESSIONS.some(tag => tag === value);
}

/**
 * Read a source file, decompressing it when asked to.
 * The tag is checked before the file is opened.
 */
export function openSource(path: string, compression?: string): string {
    const tag = compression ?? 'none';
    if (!isCompressionTag(tag)) {
        throw new UnsupportedCompressionError(tag);
    }

    const fd = fs.openSync(path, 'r');
    let raw: Buffer;
    try {
        raw = fs.readFileSync(fd);
    } finally {
        fs.closeSync(fd);
    }

    const data = tag === 'none' ? raw : gunzipSync(raw);
    // Invalid UTF-8 throws rather than turning into U+FFFD
    return new TextDecoder('utf-8', { fatal: true }).decode(data);
}

/**
 * Drop the first `count` physical lines. Returns the remaining text.
 */
export function skipLines(text: string, count: number): string {
    let pos = 0;
    for (let seen = 0; seen < count; seen++) {
        if (pos >= text.length) {
            throw createTruncatedInputError(count, seen);
        }
        const lf = text.indexOf('\n', pos);
        const cr = text.indexOf('\r', pos);
        const end = cr !== -1 && (lf === -1 || cr < lf) ? cr : lf;
        if (end === -1) {
            pos = text.length;
        } else if (text[end] === '\r' && text[end + 1] === '\n') {
            pos = end + 2;
        } else {
            pos = end + 1;
        }
    }
    return text.slice(pos);
}

/**
 * Split delimited text into records of raw values.
 * Escaped characters, escaped line breaks included, are kept literally.
 * Empty lines produce no record.
 */
export function* parseRecords(
    text: string,
    dialect: TsvDialect = TSV_DIALECT,
    firstLine: number = 1
): Generator<{ line: number; values: string[] }> {
    let values: string[] = [];
    let field = '';
    let fieldStart = true;
    let started = false;
    let escaped = false;
    let line = firstLine;
    let recordLine = firstLine;

    for (let i = 0; i < text.length; i++) {
        const c = text[i];

        if (!started) {
            started = c !== '\n' && c !== '\r';
            recordLine = line;
        }

        if (escaped) {
            field += c;
            escaped = false;
            fieldStart = false;
            if (c === '\n' || (c === '\r' && text[i + 1] !== '\n')) line++;
            continue;
        }

        if (c === dialect.escapeChar) {
            escaped = true;
            fieldStart = false;
            continue;
        }

        if (c === '\n' || c === '\r') {
            if (c === '\r' && text[i + 1] === '\n') i++;
            line++;
            if (started) {
                values.push(field);
                yield { line: recordLine, values };
            }
            values = [];
            field = '';
            fieldStart = true;
            started = false;
            continue;
        }

        if (c === dialect.delimiter) {
            values.push(field);
            field = '';
            fieldStart = true;
            continue;
        }

        if (c === ' ' && fieldStart && dialect.skipInitialSpace) {
            continue;
        }

        field += c;
        fieldStart = false;
    }

    // A dangling escape at end of input stands for the missing line break
    if (escaped) field += '\n';

    if (started) {
        values.push(field);
        yield { line: recordLine, values };
    }
}

/**
 * Parse an annotation source: skip the preamble, then map each record
 * onto `header` by position. Values past the header are ignored.
 */
export function* readRows<F extends string>(
    text: string,
    header: readonly F[],
    preambleLines: number,
    dialect: TsvDialect = TSV_DIALECT
): Generator<ParsedRecord<F>> {
    const body = skipLines(text, preambleLines);
    for (const { line, values } of parseRecords(body, dialect, preambleLines + 1)) {
        const row: Partial<Record<F, string>> = {};
        header.forEach((name, i) => {
            if (i < values.length) row[name] = values[i];
        });
        yield { line, row };
    }
}

import { EOL } from 'os';

/**
 * Delimited-text dialect shared by the reader and the writer
 */
export interface TsvDialect {
    delimiter: string;
    escapeChar: string;
    /** Characters escaped on output besides the delimiter and escape char */
    specialChars: readonly string[];
    skipInitialSpace: boolean;
    lineTerminator: string;
}

/** Tab separated, no quoting, backslash escapes */
export const TSV_DIALECT: TsvDialect = Object.freeze({
    delimiter: '\t',
    escapeChar: '\\',
    specialChars: ['\r', '\n'],
    skipInitialSpace: true,
    lineTerminator: EOL,
});

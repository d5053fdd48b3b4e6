/**
 * Structured Error System for hpoa-kgx
 *
 * Provides machine-readable errors with codes, suggestions and the offending
 * input where there is one.
 */

import { SUPPORTED_COMPRESSIONS } from './options.js';

/**
 * Error codes for transform operations
 */
export type TransformErrorCode =
  | 'UNSUPPORTED_COMPRESSION' // Compression tag not recognized
  | 'MALFORMED_QUALIFIER'     // Qualifier neither empty nor NOT
  | 'TRUNCATED_INPUT'         // Source shorter than its preamble
  | 'UNKNOWN_SOURCE'          // No transform registered under that key
  | 'INVALID_CONFIG';         // Environment failed validation

/**
 * Structured error with code, message and suggestions
 */
export interface TransformError {
  code: TransformErrorCode;
  message: string;
  suggestion?: string;
  context?: string;          // The offending line, tag or path
  details?: Record<string, unknown>;
}

/**
 * Exception class wrapping TransformError for throw/catch patterns
 */
export class TransformException extends Error {
  public readonly error: TransformError;

  constructor(error: TransformError) {
    super(error.message);
    this.name = 'TransformException';
    this.error = error;

    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  get code(): TransformErrorCode {
    return this.error.code;
  }

  toJSON(): TransformError {
    return this.error;
  }
}

export class UnsupportedCompressionError extends TransformException {
  constructor(compression: string) {
    super({
      code: 'UNSUPPORTED_COMPRESSION',
      message: `Cannot open file with \`${compression}\` compression`,
      suggestion: `Use one of: ${SUPPORTED_COMPRESSIONS.join(', ')}`,
      context: compression,
      details: { compression },
    });
    this.name = 'UnsupportedCompressionError';
  }
}

export class MalformedQualifierError extends TransformException {
  /** The record that carried the qualifier */
  public readonly row: Readonly<Record<string, string | undefined>>;

  constructor(
    qualifier: string | undefined,
    row: Readonly<Record<string, string | undefined>>,
    lineNumber?: number
  ) {
    const where = lineNumber !== undefined ? ` on line ${lineNumber}` : '';
    super({
      code: 'MALFORMED_QUALIFIER',
      message: `Unexpected qualifier \`${qualifier ?? ''}\`${where}`,
      suggestion: "Qualifier must be empty or 'NOT'",
      context: Object.values(row).map(v => v ?? '').join('\t'),
      details: { qualifier, lineNumber, row },
    });
    this.name = 'MalformedQualifierError';
    this.row = row;
  }
}

/**
 * Create an error for a source that ends inside its preamble
 */
export function createTruncatedInputError(
  expectedLines: number,
  actualLines: number
): TransformException {
  return new TransformException({
    code: 'TRUNCATED_INPUT',
    message: `Expected a ${expectedLines}-line preamble but the source has ${actualLines} line(s)`,
    suggestion: 'Check that the download completed and the file is an HPOA annotation file',
    details: { expectedLines, actualLines },
  });
}

export function createUnknownSourceError(
  source: string,
  known: readonly string[]
): TransformException {
  return new TransformException({
    code: 'UNKNOWN_SOURCE',
    message: `Unknown source '${source}'`,
    suggestion: `Known sources: ${known.join(', ')}`,
    context: source,
    details: { known: [...known] },
  });
}

export function createConfigError(
  issues: string[]
): TransformException {
  return new TransformException({
    code: 'INVALID_CONFIG',
    message: `Invalid configuration: ${issues.join('; ')}`,
    suggestion: 'Check the HPOA_* environment variables or your .env file',
    details: { issues },
  });
}

/**
 * Serialize a TransformError for JSON output
 */
export function serializeTransformError(error: TransformError): object {
  return {
    code: error.code,
    message: error.message,
    ...(error.suggestion && { suggestion: error.suggestion }),
    ...(error.context && { context: error.context }),
    ...(error.details && { details: error.details }),
  };
}

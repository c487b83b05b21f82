/** Machine-readable reason a NEM12 input was rejected. */
export type FormatErrorCode =
  | 'MALFORMED_CONTEXT_RECORD'
  | 'INVALID_INTERVAL_LENGTH'
  | 'MISSING_CONTEXT'
  | 'MALFORMED_INTERVAL_RECORD'
  | 'INVALID_DATE'
  | 'INVALID_READING';

/**
 * Fatal structural problem in a NEM12 input. Aborts the whole parse.
 *
 * The message is prefixed with the 1-based line number of the offending record.
 */
export class Nem12FormatError extends Error {
  readonly lineNumber: number;
  readonly code: FormatErrorCode;
  /** The message without the line prefix. */
  readonly reason: string;

  constructor(lineNumber: number, code: FormatErrorCode, reason: string, options?: { cause?: unknown }) {
    super(`Line ${String(lineNumber)}: ${reason}`, options);
    this.name = 'Nem12FormatError';
    this.lineNumber = lineNumber;
    this.code = code;
    this.reason = reason;
  }
}

/** Type guard for errors raised on malformed NEM12 input. */
export function isNem12FormatError(error: unknown): error is Nem12FormatError {
  return error instanceof Nem12FormatError;
}

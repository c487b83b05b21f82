/** Warning codes for values skipped without aborting the parse. */
export type ParseWarningCode = 'INVALID_CONSUMPTION';

/** A single consumption value that was skipped. */
export interface ParseWarning {
  readonly code: ParseWarningCode;
  /** 1-based line number of the interval record. */
  readonly lineNumber: number;
  /** 1-based interval position within the record. */
  readonly interval: number;
  /** The offending text, trimmed. */
  readonly value: string;
  readonly message: string;
}

export function invalidConsumptionWarning(lineNumber: number, interval: number, value: string): ParseWarning {
  return {
    code: 'INVALID_CONSUMPTION',
    lineNumber,
    interval,
    value,
    message: `Line ${String(lineNumber)}: Skipping invalid consumption value '${value}' at interval ${String(interval)}`,
  };
}

import { createMeterContext, Nem12FormatError } from '@nem12sql/core';
import type { MeterContext } from '@nem12sql/core';

/** A `200` record must reach at least the IntervalLength field. */
const MIN_CONTEXT_FIELDS = 9;
const NMI_FIELD = 1;
const INTERVAL_LENGTH_FIELD = 8;

const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Read the meter context from a `200` (NMI data details) record.
 *
 * Layout: `200,NMI,NMIConfiguration,RegisterID,NMISuffix,MDMDataStreamIdentifier,
 * MeterSerialNumber,UOM,IntervalLength,NextScheduledReadDate`. Only the NMI and
 * the interval length are used.
 *
 * @throws Nem12FormatError when fields are missing, the NMI is blank, or the
 * interval length is not a positive integer.
 */
export function parseContextRecord(fields: readonly string[], lineNumber: number): MeterContext {
  if (fields.length < MIN_CONTEXT_FIELDS) {
    throw new Nem12FormatError(
      lineNumber,
      'MALFORMED_CONTEXT_RECORD',
      `Invalid 200 record: insufficient fields (got ${String(fields.length)}, need at least ${String(MIN_CONTEXT_FIELDS)})`,
    );
  }

  const nmi = (fields[NMI_FIELD] ?? '').trim();
  if (!nmi) {
    throw new Nem12FormatError(lineNumber, 'MALFORMED_CONTEXT_RECORD', 'Invalid 200 record: empty NMI');
  }

  const rawInterval = fields[INTERVAL_LENGTH_FIELD] ?? '';
  const trimmedInterval = rawInterval.trim();
  if (!INTEGER_PATTERN.test(trimmedInterval)) {
    throw new Nem12FormatError(
      lineNumber,
      'INVALID_INTERVAL_LENGTH',
      `Invalid interval length in 200 record: '${rawInterval}'`,
    );
  }

  const intervalMinutes = Number.parseInt(trimmedInterval, 10);
  if (intervalMinutes <= 0) {
    throw new Nem12FormatError(
      lineNumber,
      'INVALID_INTERVAL_LENGTH',
      `Invalid interval length: ${String(intervalMinutes)} (must be positive)`,
    );
  }

  return createMeterContext(nmi, intervalMinutes);
}

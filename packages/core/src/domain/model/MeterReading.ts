import type { Decimal } from 'decimal.js';
import type { DateTime } from 'luxon';
import { InvalidReadingError } from '../errors/InvalidReadingError.js';

/** Longest NMI accepted by the `meter_readings` table. */
export const MAX_NMI_LENGTH = 10;

/**
 * A single interval reading.
 *
 * `timestamp` marks the END of the interval. It is held in the UTC zone and
 * treated as a wall-clock value: NEM12 carries no time zone.
 */
export interface MeterReading {
  readonly nmi: string;
  readonly timestamp: DateTime;
  readonly consumption: Decimal;
  /** Digits after the decimal point as written in the source, trailing zeros included. */
  readonly scale: number;
}

/**
 * Build a frozen reading, enforcing its invariants.
 *
 * `scale` defaults to the digits `consumption` needs and is never taken below that.
 *
 * @throws InvalidReadingError when the NMI is empty or longer than {@link MAX_NMI_LENGTH},
 * or when consumption is negative.
 */
export function createMeterReading(
  nmi: string,
  timestamp: DateTime,
  consumption: Decimal,
  scale?: number,
): MeterReading {
  if (nmi.length === 0 || nmi.length > MAX_NMI_LENGTH) {
    throw new InvalidReadingError(`Invalid NMI: '${nmi}' (must be 1-${String(MAX_NMI_LENGTH)} characters)`);
  }
  if (consumption.isNaN() || consumption.lt(0)) {
    throw new InvalidReadingError(`Invalid consumption: ${consumption.toString()} (must be non-negative)`);
  }
  const minimumScale = consumption.decimalPlaces();
  return Object.freeze({ nmi, timestamp, consumption, scale: Math.max(scale ?? minimumScale, minimumScale) });
}

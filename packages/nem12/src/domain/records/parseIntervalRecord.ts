import { Decimal } from 'decimal.js';
import { DateTime } from 'luxon';
import {
  createMeterReading,
  intervalsPerDay,
  invalidConsumptionWarning,
  InvalidReadingError,
  Nem12FormatError,
} from '@nem12sql/core';
import type { MeterContext, MeterReading, ParseWarning } from '@nem12sql/core';

const MIN_INTERVAL_FIELDS = 3;
const DATE_FIELD = 1;
const FIRST_VALUE_FIELD = 2;

const DATE_PATTERN = /^\d{8}$/;
const DECIMAL_PATTERN = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Parse an 8-digit `YYYYMMDD` interval date as midnight (UTC zone, wall-clock).
 * Returns `null` for anything that is not a real calendar date.
 */
export function parseIntervalDate(text: string): DateTime | null {
  if (!DATE_PATTERN.test(text)) return null;
  const date = DateTime.fromFormat(text, 'yyyyMMdd', { zone: 'utc', locale: 'en-US' });
  return date.isValid ? date : null;
}

/** Parse a consumption value as an exact decimal. Returns `null` when the text is not a plain decimal literal. */
export function parseConsumption(text: string): Decimal | null {
  if (!DECIMAL_PATTERN.test(text)) return null;
  return new Decimal(text);
}

/**
 * Digits after the decimal point a consumption literal asks for, trailing zeros
 * included: `1.50` gives 2, `1.5e-3` gives 4, `1.5e3` gives 0.
 * Assumes `text` already passed {@link parseConsumption}.
 */
export function consumptionScale(text: string): number {
  const [mantissa = '', exponent = '0'] = text.toLowerCase().split('e');
  const point = mantissa.indexOf('.');
  const fractionDigits = point === -1 ? 0 : mantissa.length - point - 1;
  return Math.max(0, fractionDigits - Number.parseInt(exponent, 10));
}

/**
 * Expand a `300` (interval data) record into readings.
 *
 * Layout: `300,IntervalDate,IntervalValue1..N,QualityMethod,ReasonCode,...`.
 * Only the first `intervalsPerDay` value fields are read; anything after them
 * is quality/metadata. Interval `i` ends at `date + i * intervalMinutes`.
 *
 * Blank values are skipped silently. Unparsable values are reported through
 * `onSkipped` and skipped. Everything else that is wrong is fatal.
 */
export function* expandIntervalRecord(
  fields: readonly string[],
  context: MeterContext,
  lineNumber: number,
  onSkipped: (warning: ParseWarning) => void,
): Generator<MeterReading, void, undefined> {
  if (fields.length < MIN_INTERVAL_FIELDS) {
    throw new Nem12FormatError(lineNumber, 'MALFORMED_INTERVAL_RECORD', 'Invalid 300 record: insufficient fields');
  }

  const dateText = (fields[DATE_FIELD] ?? '').trim();
  const intervalDate = parseIntervalDate(dateText);
  if (!intervalDate) {
    throw new Nem12FormatError(lineNumber, 'INVALID_DATE', `Invalid date format '${dateText}'`);
  }

  const lastValueField = Math.min(FIRST_VALUE_FIELD + intervalsPerDay(context), fields.length);

  for (let field = FIRST_VALUE_FIELD; field < lastValueField; field++) {
    const interval = field - FIRST_VALUE_FIELD + 1;
    const text = (fields[field] ?? '').trim();
    if (!text) continue;

    const consumption = parseConsumption(text);
    if (!consumption) {
      onSkipped(invalidConsumptionWarning(lineNumber, interval, text));
      continue;
    }

    const timestamp = intervalDate.plus({ minutes: interval * context.intervalMinutes });
    yield buildReading(context.nmi, timestamp, consumption, consumptionScale(text), lineNumber);
  }
}

function buildReading(
  nmi: string,
  timestamp: DateTime,
  consumption: Decimal,
  scale: number,
  lineNumber: number,
): MeterReading {
  try {
    return createMeterReading(nmi, timestamp, consumption, scale);
  } catch (error) {
    if (error instanceof InvalidReadingError) {
      throw new Nem12FormatError(lineNumber, 'INVALID_READING', error.message, { cause: error });
    }
    throw error;
  }
}

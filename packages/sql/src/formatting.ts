import type { Decimal } from 'decimal.js';
import type { DateTime } from 'luxon';
import type { MeterReading } from '@nem12sql/core';

export const TABLE_NAME = 'meter_readings';
export const COLUMNS = ['nmi', 'timestamp', 'consumption'] as const;

const TIMESTAMP_FORMAT = 'yyyy-MM-dd HH:mm:ss';

/** Double every single quote so the text can sit inside a SQL string literal. */
export function escapeSqlString(value: string): string {
  return value.replaceAll("'", "''");
}

/** `YYYY-MM-DD HH:MM:SS`, 24-hour, no zone, no fraction. */
export function formatTimestamp(timestamp: DateTime): string {
  return timestamp.toFormat(TIMESTAMP_FORMAT, { locale: 'en-US' });
}

/**
 * Exact decimal text with `scale` fraction digits, never exponent notation.
 * Trailing zeros the source carried are kept when `scale` says so.
 */
export function formatConsumption(consumption: Decimal, scale = consumption.decimalPlaces()): string {
  return consumption.toFixed(Math.max(scale, consumption.decimalPlaces()));
}

/** `('<nmi>', '<timestamp>', <consumption>)` */
export function formatValueTuple(reading: MeterReading): string {
  return `('${escapeSqlString(reading.nmi)}', '${formatTimestamp(reading.timestamp)}', ${formatConsumption(reading.consumption, reading.scale)})`;
}

/** Build one multi-row `INSERT` from already formatted value tuples. */
export function buildInsertStatement(tuples: readonly string[]): string {
  const columns = COLUMNS.map((column) => `"${column}"`).join(', ');
  return `INSERT INTO ${TABLE_NAME} (${columns}) VALUES\n${tuples.join(',\n')};`;
}

import type { MeterReading } from '@nem12sql/core';

export const FILE_HEADER = '100,NEM12,200506081149,UNITEDDP,NEMMCO';
export const END_OF_DATA = '900';

/** A `200` record with the usual ten fields. */
export function contextRecord(nmi: string, intervalMinutes: number | string = 30): string {
  return `200,${nmi},E1E2,1,E1,N1,01009,kWh,${String(intervalMinutes)},20050610`;
}

/**
 * A `300` record padded with blank values up to `slots`, followed by the
 * quality and update-time fields a real file carries.
 */
export function intervalRecord(date: string, values: readonly string[], slots = 48): string {
  const padded = [...values, ...Array.from({ length: Math.max(0, slots - values.length) }, () => '')];
  return `300,${date},${padded.join(',')},A,,,20050310121004,20050310182204`;
}

export function nem12(...lines: string[]): string {
  return `${lines.join('\n')}\n`;
}

export function stamp(reading: MeterReading): string {
  return reading.timestamp.toFormat('yyyy-MM-dd HH:mm:ss');
}

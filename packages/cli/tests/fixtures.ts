import { Writable } from 'node:stream';
import { DateTime } from 'luxon';
import type { Logger } from '../src/Logger.js';

export const NMI = 'NEM1201009';
export const GENERATED_AT = DateTime.utc(2026, 1, 2, 3, 4, 5);
export const fixedClock = (): DateTime => GENERATED_AT;

const COLUMNS = 'INSERT INTO meter_readings ("nmi", "timestamp", "consumption") VALUES';

/** Header, `200` record, one padded `300` record and the terminator. */
export function sampleFile(values: readonly string[] = ['0.5', '0.6', '0.7']): string {
  const padded = [...values, ...Array.from({ length: 48 - values.length }, () => '')];
  return [
    '100,NEM12,200506081149,UNITEDDP,NEMMCO',
    `200,${NMI},E1E2,1,E1,N1,01009,kWh,30,20050610`,
    `300,20050301,${padded.join(',')},A,,,20050310121004,20050310182204`,
    '900',
    '',
  ].join('\n');
}

/** Expected script for `sampleFile()` converted with batch size 2. */
export function expectedSampleScript(fileName: string): string {
  return [
    `-- Generated from: ${fileName}`,
    '-- Generated at: 2026-01-02T03:04:05.000Z',
    '-- Batch size: 2',
    '',
    COLUMNS,
    `('${NMI}', '2005-03-01 00:30:00', 0.5),`,
    `('${NMI}', '2005-03-01 01:00:00', 0.6);`,
    '',
    COLUMNS,
    `('${NMI}', '2005-03-01 01:30:00', 0.7);`,
    '',
    '-- Total readings: 3',
    '',
  ].join('\n');
}

export function captureStream(): { stream: Writable; text: () => string } {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      chunks.push(chunk.toString());
      callback();
    },
  });
  return { stream, text: () => chunks.join('') };
}

export function recordingLogger(): Logger & { lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    info: (message) => lines.push(`info: ${message}`),
    warn: (message) => lines.push(`warn: ${message}`),
    error: (message) => lines.push(`error: ${message}`),
  };
}

import { Writable } from 'node:stream';
import { describe, it, expect } from 'vitest';
import { BufferSource, Nem12FormatError } from '@nem12sql/core';
import { SqlStatementGenerator } from '@nem12sql/sql';
import { processFile } from '../../src/processFile.js';
import { captureStream, expectedSampleScript, fixedClock, recordingLogger, sampleFile } from '../fixtures.js';

describe('processFile', () => {
  it('should frame the statements with a header and a footer', async () => {
    const output = captureStream();

    const result = await processFile({
      source: new BufferSource(sampleFile(), { fileName: 'sample.csv' }),
      output: output.stream,
      generator: new SqlStatementGenerator({ batchSize: 2 }),
      clock: fixedClock,
    });

    expect(output.text()).toBe(expectedSampleScript('sample.csv'));
    expect(result).toEqual({ totalReadings: 3, totalStatements: 2, warnings: [] });
  });

  it('should write only the frame when there are no readings', async () => {
    const output = captureStream();

    const result = await processFile({
      source: new BufferSource('100,NEM12,200506081149,UNITEDDP,NEMMCO\n900\n', { fileName: 'empty.csv' }),
      output: output.stream,
      clock: fixedClock,
    });

    expect(output.text()).toBe(
      '-- Generated from: empty.csv\n-- Generated at: 2026-01-02T03:04:05.000Z\n-- Batch size: 1000\n\n-- Total readings: 0\n',
    );
    expect(result.totalStatements).toBe(0);
  });

  it('should report skipped values to the logger and in the result', async () => {
    const logger = recordingLogger();

    const result = await processFile({
      source: new BufferSource(sampleFile(['0.5', 'bad', '0.7'])),
      output: captureStream().stream,
      logger,
      clock: fixedClock,
    });

    expect(result.totalReadings).toBe(2);
    expect(result.warnings).toHaveLength(1);
    expect(result.warnings[0]).toMatchObject({ lineNumber: 3, interval: 2, value: 'bad' });
    expect(logger.lines).toEqual(["warn: Warning: Line 3: Skipping invalid consumption value 'bad' at interval 2"]);
  });

  it('should keep statements written before a format error and omit the footer', async () => {
    const output = captureStream();
    const text = sampleFile().replace('900\n', '300,2005XX01,1.0\n');

    await expect(
      processFile({
        source: new BufferSource(text, { fileName: 'broken.csv' }),
        output: output.stream,
        generator: new SqlStatementGenerator({ batchSize: 1 }),
        clock: fixedClock,
      }),
    ).rejects.toMatchObject({ lineNumber: 4, code: 'INVALID_DATE' });

    const insert = 'INSERT INTO meter_readings ("nmi", "timestamp", "consumption") VALUES';
    expect(output.text()).toBe(
      [
        '-- Generated from: broken.csv',
        '-- Generated at: 2026-01-02T03:04:05.000Z',
        '-- Batch size: 1',
        '',
        insert,
        "('NEM1201009', '2005-03-01 00:30:00', 0.5);",
        '',
        insert,
        "('NEM1201009', '2005-03-01 01:00:00', 0.6);",
        '',
        insert,
        "('NEM1201009', '2005-03-01 01:30:00', 0.7);",
        '',
        '',
      ].join('\n'),
    );
  });

  it('should fail with a format error when an interval record has no context', async () => {
    const text = sampleFile().replace(/^200,.*\n/m, '');

    await expect(
      processFile({ source: new BufferSource(text), output: captureStream().stream }),
    ).rejects.toThrow(new Nem12FormatError(2, 'MISSING_CONTEXT', '300 record found without preceding 200 record'));
  });

  it('should keep the trailing zeros written in the file', async () => {
    const output = captureStream();

    await processFile({ source: new BufferSource(sampleFile(['1.50', '0.500', '2.0'])), output: output.stream });

    expect(output.text().match(/, [\d.]+\)/g)).toEqual([', 1.50)', ', 0.500)', ', 2.0)']);
  });

  it('should stop with the output error once the output has failed', async () => {
    const failure = new Error('disk full');
    const output = new Writable({
      write(_chunk, _encoding, callback) {
        callback(failure);
      },
    });
    output.on('error', () => undefined);

    await expect(processFile({ source: new BufferSource(sampleFile()), output })).rejects.toBe(failure);
  });
});

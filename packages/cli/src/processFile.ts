import { once } from 'node:events';
import type { Writable } from 'node:stream';
import { DateTime } from 'luxon';
import type { DataSource, ParseWarning } from '@nem12sql/core';
import { Nem12Parser } from '@nem12sql/nem12';
import { SqlStatementGenerator } from '@nem12sql/sql';
import { silentLogger } from './Logger.js';
import type { Logger } from './Logger.js';

export interface ProcessFileOptions {
  /** NEM12 input. */
  readonly source: DataSource;
  /** Destination for the SQL script. Not closed by `processFile`. */
  readonly output: Writable;
  /** Builds the statements. Default: a generator with the default batch size. */
  readonly generator?: SqlStatementGenerator;
  /** Receives parse warnings. Default: discards them. */
  readonly logger?: Logger;
  /** Time stamped into the header. Default: `DateTime.now`. */
  readonly clock?: () => DateTime;
}

export interface ProcessFileResult {
  readonly totalReadings: number;
  readonly totalStatements: number;
  readonly warnings: readonly ParseWarning[];
}

/**
 * Convert one NEM12 source into a SQL script.
 *
 * The script is framed by a comment header (source name, generation time, batch
 * size) and a `-- Total readings` footer. Statements are written as they are
 * generated; on a fatal parse error the statements already written stay in
 * `output` and the error propagates without a footer.
 */
export async function processFile(options: ProcessFileOptions): Promise<ProcessFileResult> {
  const logger = options.logger ?? silentLogger;
  const clock = options.clock ?? (() => DateTime.now());
  const generator = options.generator ?? new SqlStatementGenerator();
  const parser = new Nem12Parser();
  const warnings: ParseWarning[] = [];

  parser.on('value:skipped', (event) => {
    warnings.push(event.warning);
    logger.warn(`Warning: ${event.warning.message}`);
  });

  await write(
    options.output,
    [
      `-- Generated from: ${options.source.metadata().fileName}`,
      `-- Generated at: ${clock().toISO() ?? ''}`,
      `-- Batch size: ${String(generator.batchSize)}`,
      '',
      '',
    ].join('\n'),
  );

  let totalReadings = 0;
  let totalStatements = 0;
  for await (const statement of generator.generateBatchesAsync(parser.parse(options.source))) {
    await write(options.output, `${statement.sql}\n\n`);
    totalReadings += statement.readingCount;
    totalStatements++;
  }

  await write(options.output, `-- Total readings: ${String(totalReadings)}\n`);

  return { totalReadings, totalStatements, warnings };
}

async function write(output: Writable, text: string): Promise<void> {
  if (output.errored) throw output.errored;
  if (!output.write(text)) {
    await once(output, 'drain');
  }
}

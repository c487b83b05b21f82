import { BatchSplitter, EventBus } from '@nem12sql/core';
import type { EventPayload, ItemBatch, MeterReading } from '@nem12sql/core';
import { buildInsertStatement, formatValueTuple } from './formatting.js';

/** Configuration for the statement generator. */
export interface SqlStatementGeneratorConfig {
  /** Maximum readings per `INSERT` statement. Default: `1000`. */
  readonly batchSize?: number;
}

/** One generated statement with the number of rows it inserts. */
export interface GeneratedStatement {
  readonly sql: string;
  readonly readingCount: number;
  /** Zero-based position of the statement in the output. */
  readonly index: number;
}

export const DEFAULT_BATCH_SIZE = 1000;

/**
 * Turns a stream of readings into multi-row `INSERT INTO meter_readings` statements.
 *
 * Readings are pulled lazily and only one batch of formatted tuples is held at a
 * time. Order is preserved within and across statements; empty input produces
 * no statement at all.
 *
 * @example
 * ```typescript
 * const generator = new SqlStatementGenerator({ batchSize: 500 });
 * for await (const sql of generator.generateAsync(parser.parse(source))) {
 *   output.write(`${sql}\n\n`);
 * }
 * ```
 */
export class SqlStatementGenerator {
  readonly batchSize: number;
  private readonly splitter: BatchSplitter<MeterReading>;
  private readonly eventBus = new EventBus();

  /** @throws ConfigurationError when `batchSize` is not a positive integer. */
  constructor(config: SqlStatementGeneratorConfig = {}) {
    this.batchSize = config.batchSize ?? DEFAULT_BATCH_SIZE;
    this.splitter = new BatchSplitter<MeterReading>(this.batchSize);
  }

  /** Subscribe to `statement:generated`. Returns `this` for chaining. */
  onStatement(handler: (event: EventPayload<'statement:generated'>) => void): this {
    this.eventBus.on('statement:generated', handler);
    return this;
  }

  *generate(readings: Iterable<MeterReading>): Generator<string, void, undefined> {
    for (const statement of this.generateBatches(readings)) {
      yield statement.sql;
    }
  }

  async *generateAsync(
    readings: AsyncIterable<MeterReading> | Iterable<MeterReading>,
  ): AsyncGenerator<string, void, undefined> {
    for await (const statement of this.generateBatchesAsync(readings)) {
      yield statement.sql;
    }
  }

  *generateBatches(readings: Iterable<MeterReading>): Generator<GeneratedStatement, void, undefined> {
    for (const batch of this.splitter.split(readings)) {
      yield this.toStatement(batch);
    }
  }

  async *generateBatchesAsync(
    readings: AsyncIterable<MeterReading> | Iterable<MeterReading>,
  ): AsyncGenerator<GeneratedStatement, void, undefined> {
    for await (const batch of this.splitter.splitAsync(readings)) {
      yield this.toStatement(batch);
    }
  }

  private toStatement(batch: ItemBatch<MeterReading>): GeneratedStatement {
    const statement: GeneratedStatement = {
      sql: buildInsertStatement(batch.items.map(formatValueTuple)),
      readingCount: batch.items.length,
      index: batch.batchIndex,
    };
    this.eventBus.emit({
      type: 'statement:generated',
      index: statement.index,
      readingCount: statement.readingCount,
      timestamp: Date.now(),
    });
    return statement;
  }
}

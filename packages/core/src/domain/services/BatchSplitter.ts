import { ConfigurationError } from '../errors/ConfigurationError.js';

/** A group of consecutive items with its position in the output. */
export interface ItemBatch<T> {
  readonly items: readonly T[];
  readonly batchIndex: number;
}

/**
 * Domain service that groups a stream of items into fixed-size batches.
 *
 * Pure logic, no I/O. Yields each batch as soon as it fills up; the final
 * batch may be smaller, and empty input yields nothing.
 */
export class BatchSplitter<T> {
  constructor(private readonly batchSize: number) {
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new ConfigurationError(`Batch size must be a positive integer (got ${String(batchSize)})`);
    }
  }

  *split(items: Iterable<T>): Generator<ItemBatch<T>, void, undefined> {
    let buffer: T[] = [];
    let batchIndex = 0;

    for (const item of items) {
      buffer.push(item);

      if (buffer.length >= this.batchSize) {
        yield { items: buffer, batchIndex };
        buffer = [];
        batchIndex++;
      }
    }

    if (buffer.length > 0) {
      yield { items: buffer, batchIndex };
    }
  }

  /** Async counterpart of {@link split}; accepts sync iterables as well. */
  async *splitAsync(items: AsyncIterable<T> | Iterable<T>): AsyncGenerator<ItemBatch<T>, void, undefined> {
    let buffer: T[] = [];
    let batchIndex = 0;

    for await (const item of items) {
      buffer.push(item);

      if (buffer.length >= this.batchSize) {
        yield { items: buffer, batchIndex };
        buffer = [];
        batchIndex++;
      }
    }

    if (buffer.length > 0) {
      yield { items: buffer, batchIndex };
    }
  }
}

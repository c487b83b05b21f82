import { EventBus, isNem12FormatError, numberLines, readLines, splitLines } from '@nem12sql/core';
import type {
  DataSource,
  DomainEvent,
  EventPayload,
  EventType,
  MeterReading,
  NumberedLine,
  ParseSummary,
} from '@nem12sql/core';
import { ParseSession } from './application/ParseSession.js';

/**
 * Facade over the NEM12 record parser: lines in, meter readings out.
 *
 * Every `parse*()` call runs its own session, so one instance can be reused
 * across files. Readings are produced lazily; a `900` record stops the parse
 * without reading further input.
 *
 * @example
 * ```typescript
 * const parser = new Nem12Parser();
 * parser.on('value:skipped', (e) => console.warn(e.warning.message));
 * for await (const reading of parser.parse(new FilePathSource('meter_data.csv'))) {
 *   console.log(reading.nmi, reading.timestamp.toISO(), reading.consumption.toFixed());
 * }
 * ```
 */
export class Nem12Parser {
  private readonly eventBus = new EventBus();
  private lastSummary: ParseSummary | null = null;

  /** Subscribe to a parse event. Returns `this` for chaining. */
  on<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.eventBus.on(type, handler);
    return this;
  }

  /** Unsubscribe a handler previously registered with `on()`. */
  off<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.eventBus.off(type, handler);
    return this;
  }

  /** Subscribe to all events regardless of type. Returns `this` for chaining. */
  onAny(handler: (event: DomainEvent) => void): this {
    this.eventBus.onAny(handler);
    return this;
  }

  /** Unsubscribe a wildcard handler previously registered with `onAny()`. */
  offAny(handler: (event: DomainEvent) => void): this {
    this.eventBus.offAny(handler);
    return this;
  }

  /**
   * Stream readings from a data source.
   *
   * @throws Nem12FormatError on the first fatal record, after any readings from earlier lines.
   */
  async *parse(source: DataSource): AsyncGenerator<MeterReading, void, undefined> {
    const session = this.start(source.metadata().fileName);

    try {
      for await (const line of readLines(source.read())) {
        yield* session.accept(line);
        if (session.done) break;
      }
    } catch (error) {
      this.fail(error);
      throw error;
    }

    this.complete(session);
  }

  /** Parse lines that are already split. Synchronous and lazy. */
  *parseLines(lines: Iterable<string>): Generator<MeterReading, void, undefined> {
    yield* this.run(numberLines(lines));
  }

  /** Parse a whole NEM12 document held in memory. */
  parseText(text: string): Generator<MeterReading, void, undefined> {
    return this.parseLines(splitLines(text));
  }

  /** Counters from the most recent parse that ran to completion, or `null`. */
  getLastSummary(): ParseSummary | null {
    return this.lastSummary;
  }

  private *run(lines: Iterable<NumberedLine>): Generator<MeterReading, void, undefined> {
    const session = this.start();

    try {
      for (const line of lines) {
        yield* session.accept(line);
        if (session.done) break;
      }
    } catch (error) {
      this.fail(error);
      throw error;
    }

    this.complete(session);
  }

  private start(sourceName?: string): ParseSession {
    this.eventBus.emit({ type: 'parse:started', sourceName, timestamp: Date.now() });
    return new ParseSession(this.eventBus);
  }

  private complete(session: ParseSession): void {
    const summary = session.summary();
    this.lastSummary = summary;
    this.eventBus.emit({ type: 'parse:completed', summary, timestamp: Date.now() });
  }

  private fail(error: unknown): void {
    this.eventBus.emit({
      type: 'parse:failed',
      error: error instanceof Error ? error.message : String(error),
      lineNumber: isNem12FormatError(error) ? error.lineNumber : undefined,
      timestamp: Date.now(),
    });
  }
}

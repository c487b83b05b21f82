import type { ParseSummary } from '../model/ParseSummary.js';
import type { ParseWarning } from '../model/ParseWarning.js';

/** Emitted when a parse invocation begins pulling input. */
export interface ParseStartedEvent {
  readonly type: 'parse:started';
  /** Source file name, when the input came from a `DataSource`. */
  readonly sourceName?: string;
  readonly timestamp: number;
}

/** Emitted when a `200` record replaces the active meter context. */
export interface ContextOpenedEvent {
  readonly type: 'context:opened';
  readonly lineNumber: number;
  readonly nmi: string;
  readonly intervalMinutes: number;
  readonly timestamp: number;
}

/** Emitted for each consumption value skipped because it could not be parsed. */
export interface ValueSkippedEvent {
  readonly type: 'value:skipped';
  readonly warning: ParseWarning;
  readonly timestamp: number;
}

/** Emitted when a `900` record stops the parse. */
export interface ParseTerminatedEvent {
  readonly type: 'parse:terminated';
  readonly lineNumber: number;
  readonly timestamp: number;
}

/** Emitted once the input is exhausted or terminated without a fatal error. */
export interface ParseCompletedEvent {
  readonly type: 'parse:completed';
  readonly summary: ParseSummary;
  readonly timestamp: number;
}

/** Emitted when a fatal error aborts the parse. */
export interface ParseFailedEvent {
  readonly type: 'parse:failed';
  readonly error: string;
  /** Line that caused the failure, when known. */
  readonly lineNumber?: number;
  readonly timestamp: number;
}

/** Emitted after each `INSERT` statement is built. */
export interface StatementGeneratedEvent {
  readonly type: 'statement:generated';
  /** Zero-based position of the statement in the output. */
  readonly index: number;
  readonly readingCount: number;
  readonly timestamp: number;
}

/** Discriminated union of all domain events. */
export type DomainEvent =
  | ParseStartedEvent
  | ContextOpenedEvent
  | ValueSkippedEvent
  | ParseTerminatedEvent
  | ParseCompletedEvent
  | ParseFailedEvent
  | StatementGeneratedEvent;

/** String literal union of all event type names. */
export type EventType = DomainEvent['type'];

/** Extract the payload type for a specific event type. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;

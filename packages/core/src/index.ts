// Domain model
export type { MeterReading } from './domain/model/MeterReading.js';
export { createMeterReading, MAX_NMI_LENGTH } from './domain/model/MeterReading.js';
export type { MeterContext } from './domain/model/MeterContext.js';
export { createMeterContext, intervalsPerDay } from './domain/model/MeterContext.js';
export type { ParseWarning, ParseWarningCode } from './domain/model/ParseWarning.js';
export { invalidConsumptionWarning } from './domain/model/ParseWarning.js';
export type { ParseSummary } from './domain/model/ParseSummary.js';

// Errors
export { Nem12FormatError, isNem12FormatError } from './domain/errors/Nem12FormatError.js';
export type { FormatErrorCode } from './domain/errors/Nem12FormatError.js';
export { InvalidReadingError } from './domain/errors/InvalidReadingError.js';
export { InvalidContextError } from './domain/errors/InvalidContextError.js';
export { ConfigurationError } from './domain/errors/ConfigurationError.js';

// Domain services
export { BatchSplitter } from './domain/services/BatchSplitter.js';
export type { ItemBatch } from './domain/services/BatchSplitter.js';

// Application internals (for the parser and generator packages)
export { EventBus } from './application/EventBus.js';

// Ports
export type { DataSource, SourceMetadata } from './domain/ports/DataSource.js';

// Domain events
export type {
  DomainEvent,
  EventType,
  EventPayload,
  ParseStartedEvent,
  ContextOpenedEvent,
  ValueSkippedEvent,
  ParseTerminatedEvent,
  ParseCompletedEvent,
  ParseFailedEvent,
  StatementGeneratedEvent,
} from './domain/events/DomainEvents.js';

// Infrastructure adapters
export { BufferSource } from './infrastructure/sources/BufferSource.js';
export { FilePathSource } from './infrastructure/sources/FilePathSource.js';
export type { FilePathSourceOptions } from './infrastructure/sources/FilePathSource.js';
export { StreamSource } from './infrastructure/sources/StreamSource.js';
export type { StreamSourceOptions } from './infrastructure/sources/StreamSource.js';
export { readLines, numberLines, splitLines } from './infrastructure/lines/readLines.js';
export type { NumberedLine } from './infrastructure/lines/readLines.js';

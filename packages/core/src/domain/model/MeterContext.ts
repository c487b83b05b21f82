import { InvalidContextError } from '../errors/InvalidContextError.js';

const MINUTES_PER_DAY = 24 * 60;

/**
 * Meter settings declared by a `200` record. Applies to every following `300`
 * record until the next `200` record replaces it.
 */
export interface MeterContext {
  readonly nmi: string;
  readonly intervalMinutes: number;
}

/** @throws InvalidContextError on an empty NMI or a non-positive interval length. */
export function createMeterContext(nmi: string, intervalMinutes: number): MeterContext {
  if (nmi.length === 0) {
    throw new InvalidContextError('Meter context requires a non-empty NMI');
  }
  if (!Number.isInteger(intervalMinutes) || intervalMinutes <= 0) {
    throw new InvalidContextError(`Invalid interval length: ${String(intervalMinutes)} (must be positive)`);
  }
  return Object.freeze({ nmi, intervalMinutes });
}

/** Number of interval slots in one day for the context's interval length. */
export function intervalsPerDay(context: MeterContext): number {
  return Math.floor(MINUTES_PER_DAY / context.intervalMinutes);
}

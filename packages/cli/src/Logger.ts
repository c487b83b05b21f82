import type { Writable } from 'node:stream';

/** Minimal sink for human-readable progress and diagnostics. */
export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/** Logger writing one line per message to a stream (stderr by default in the CLI). */
export function createStreamLogger(stream: Writable): Logger {
  const writeLine = (message: string): void => {
    stream.write(`${message}\n`);
  };
  return { info: writeLine, warn: writeLine, error: writeLine };
}

/** Logger that discards everything. */
export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

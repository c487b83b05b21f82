/**
 * Process exit codes.
 *
 * `USAGE` and `DATA_ERROR` follow the BSD `sysexits.h` values so scripts can tell
 * a bad invocation from a malformed NEM12 file.
 */
export const ExitCode = {
  OK: 0,
  FAILURE: 1,
  USAGE: 64,
  DATA_ERROR: 65,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

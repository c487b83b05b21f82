/** Counters describing a finished parse. */
export interface ParseSummary {
  /** Physical lines consumed, including blank lines and the terminator. */
  readonly linesRead: number;
  readonly readingsEmitted: number;
  /** Number of `200` records seen. */
  readonly contextsOpened: number;
  readonly skippedValues: number;
  /** `true` when a `900` record ended the parse. */
  readonly terminated: boolean;
}

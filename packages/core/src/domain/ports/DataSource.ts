/** Metadata about the data source (optional, for logging and output framing). */
export interface SourceMetadata {
  readonly fileName?: string;
  readonly fileSize?: number;
  readonly mimeType?: string;
}

/**
 * Port for reading NEM12 text from any origin (file, buffer, stream).
 *
 * `read()` yields raw chunks; record boundaries are unknown at this level and
 * chunks may split a line anywhere. The line reader reassembles them.
 */
export interface DataSource {
  /** Yield data chunks for lazy/streaming consumption. Stopping iteration early releases the source. */
  read(): AsyncIterable<string | Buffer>;
  /** Return metadata about the source (file name, size, MIME type). */
  metadata(): SourceMetadata;
}

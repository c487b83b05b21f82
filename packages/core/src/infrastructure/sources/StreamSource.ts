import { StringDecoder } from 'node:string_decoder';
import type { DataSource, SourceMetadata } from '../../domain/ports/DataSource.js';

type ChunkStream = AsyncIterable<string | Buffer> | ReadableStream<string | Uint8Array>;

export interface StreamSourceOptions {
  /** Name reported in metadata and output headers. Default: 'stream-input'. */
  readonly fileName?: string;
  /** MIME type for metadata. Default: 'text/csv'. */
  readonly mimeType?: string;
  /** Size in bytes, when the producer knows it. */
  readonly fileSize?: number;
  /** Encoding of binary chunks. Default: 'utf-8'. */
  readonly encoding?: BufferEncoding;
}

/**
 * Data source over a producer that can only be read once: `process.stdin`, a
 * Node `Readable`, or a web `ReadableStream`.
 *
 * Binary chunks are decoded here, with characters split across chunk
 * boundaries held back until the next chunk arrives.
 */
export class StreamSource implements DataSource {
  private readonly stream: ChunkStream;
  private readonly meta: SourceMetadata;
  private readonly encoding: BufferEncoding;
  private consumed = false;

  constructor(stream: ChunkStream, options?: StreamSourceOptions) {
    this.stream = stream;
    this.encoding = options?.encoding ?? 'utf-8';
    this.meta = {
      fileName: options?.fileName ?? 'stream-input',
      fileSize: options?.fileSize,
      mimeType: options?.mimeType ?? 'text/csv',
    };
  }

  async *read(): AsyncIterable<string> {
    if (this.consumed) {
      throw new Error('StreamSource: stream has already been consumed. Streams can only be read once.');
    }
    this.consumed = true;

    const decoder = new StringDecoder(this.encoding);
    const chunks = 'getReader' in this.stream ? fromReadableStream(this.stream) : this.stream;

    for await (const chunk of chunks) {
      const text = typeof chunk === 'string' ? chunk : decoder.write(chunk);
      if (text) yield text;
    }

    const rest = decoder.end();
    if (rest) yield rest;
  }

  metadata(): SourceMetadata {
    return this.meta;
  }
}

async function* fromReadableStream(stream: ReadableStream<string | Uint8Array>): AsyncIterable<string | Buffer> {
  const reader = stream.getReader();
  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) return;
      yield typeof value === 'string' ? value : Buffer.from(value);
    }
  } finally {
    reader.releaseLock();
  }
}

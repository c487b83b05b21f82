import type { DataSource, SourceMetadata } from '../../domain/ports/DataSource.js';

/**
 * Data source over NEM12 content already in memory. The content is yielded as
 * one chunk, untouched; Buffers are decoded by the line reader.
 */
export class BufferSource implements DataSource {
  private readonly data: string | Buffer;
  private readonly meta: SourceMetadata;

  constructor(data: string | Buffer, metadata?: Pick<SourceMetadata, 'fileName' | 'mimeType'>) {
    this.data = data;
    this.meta = {
      fileName: metadata?.fileName ?? 'buffer-input',
      fileSize: typeof data === 'string' ? Buffer.byteLength(data, 'utf-8') : data.length,
      mimeType: metadata?.mimeType ?? 'text/csv',
    };
  }

  async *read(): AsyncIterable<string | Buffer> {
    yield await Promise.resolve(this.data);
  }

  metadata(): SourceMetadata {
    return this.meta;
  }
}

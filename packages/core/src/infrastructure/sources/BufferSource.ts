import type { DataSource, SourceMetadata } from '../../domain/ports/DataSource.js';

/** In-memory source for content already loaded, such as an uploaded file or a test fixture. */
export class BufferSource implements DataSource {
  private readonly content: string;
  private readonly meta: SourceMetadata;

  constructor(data: string | Buffer, metadata?: Partial<SourceMetadata>) {
    this.content = typeof data === 'string' ? data : data.toString('utf-8');
    this.meta = {
      fileName: metadata?.fileName ?? 'buffer-input',
      fileSize: typeof data === 'string' ? Buffer.byteLength(data, 'utf-8') : data.length,
      mimeType: metadata?.mimeType ?? 'text/csv',
    };
  }

  async *read(): AsyncIterable<string> {
    yield await Promise.resolve(this.content);
  }

  metadata(): SourceMetadata {
    return this.meta;
  }
}

import { createReadStream } from 'node:fs';
import { stat } from 'node:fs/promises';
import { basename, extname } from 'node:path';
import type { DataSource, SourceMetadata } from '../../domain/ports/DataSource.js';
import { SourceNotFoundError } from '../../domain/errors/ImportErrors.js';

export interface FilePathSourceOptions {
  /** Encoding for reading the file. Default: 'utf-8'. */
  readonly encoding?: BufferEncoding;
  /** Chunk size in bytes for streaming reads. Default: 65536 (64KB). */
  readonly highWaterMark?: number;
}

const MIME_TYPES: Readonly<Record<string, string>> = {
  '.csv': 'text/csv',
  '.tsv': 'text/tab-separated-values',
  '.txt': 'text/plain',
};

/** Data source that streams from a local file path using `createReadStream`. Node.js only. */
export class FilePathSource implements DataSource {
  private readonly filePath: string;
  private readonly encoding: BufferEncoding;
  private readonly highWaterMark: number;
  private fileSize: number | undefined;

  constructor(filePath: string, options?: FilePathSourceOptions) {
    this.filePath = filePath;
    this.encoding = options?.encoding ?? 'utf-8';
    this.highWaterMark = options?.highWaterMark ?? 65536;
  }

  /** @throws SourceNotFoundError when the path does not exist or is not a regular file. */
  async *read(): AsyncIterable<string> {
    try {
      const stats = await stat(this.filePath);
      if (!stats.isFile()) throw new SourceNotFoundError(this.filePath);
      this.fileSize = stats.size;
    } catch (error) {
      if (error instanceof SourceNotFoundError) throw error;
      throw new SourceNotFoundError(this.filePath, error);
    }

    const stream = createReadStream(this.filePath, {
      encoding: this.encoding,
      highWaterMark: this.highWaterMark,
    });

    for await (const chunk of stream) {
      yield typeof chunk === 'string' ? chunk : String(chunk);
    }
  }

  /** `fileSize` is known once `read()` has started. */
  metadata(): SourceMetadata {
    return {
      fileName: basename(this.filePath),
      ...(this.fileSize !== undefined ? { fileSize: this.fileSize } : {}),
      mimeType: MIME_TYPES[extname(this.filePath).toLowerCase()] ?? 'text/plain',
    };
  }
}

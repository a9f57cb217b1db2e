/** Metadata about the data source, used in events and error messages. */
export interface SourceMetadata {
  readonly fileName?: string;
  readonly fileSize?: number;
  readonly mimeType?: string;
}

/**
 * Port for reading the import file from any origin (local path, buffer).
 *
 * `read()` yields decoded UTF-8 text chunks. Implementations raise
 * `SourceNotFoundError` from `read()` when the origin does not exist.
 */
export interface DataSource {
  /** Yield data chunks as strings or Buffers for lazy consumption. */
  read(): AsyncIterable<string | Buffer>;
  /** Return metadata about the source (file name, size, MIME type). */
  metadata(): SourceMetadata;
}

/** What a byte source knows about itself. */
export interface SourceMetadata {
  readonly fileName: string;
  readonly fileSize?: number;
  readonly mimeType: string;
}

/**
 * Port for the raw bytes behind a tabular file.
 *
 * `sample()` works in bytes, not rows: the source does not know where records
 * end, so header detection is left to the parser reading the sample.
 */
export interface DataSource {
  /** Stream the content as text chunks. */
  read(): AsyncIterable<string>;
  /** First `maxBytes` of the content, or all of it when omitted. */
  sample(maxBytes?: number): Promise<string>;
  metadata(): SourceMetadata;
}

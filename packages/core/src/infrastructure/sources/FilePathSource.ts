import { createReadStream } from 'node:fs';
import { stat } from 'node:fs/promises';
import { basename } from 'node:path';
import type { DataSource, SourceMetadata } from '../../domain/ports/DataSource.js';
import { detectMimeType } from '../detectMimeType.js';

export interface FilePathSourceOptions {
  /** Default: `'utf-8'`. */
  readonly encoding?: BufferEncoding;
  /** Bytes per chunk. Default: 65536. */
  readonly highWaterMark?: number;
}

/** Streams a local file. Every `read()` opens the file again, so the source can be read more than once. */
export class FilePathSource implements DataSource {
  private readonly encoding: BufferEncoding;
  private readonly highWaterMark: number;

  constructor(
    readonly filePath: string,
    options: FilePathSourceOptions = {},
  ) {
    this.encoding = options.encoding ?? 'utf-8';
    this.highWaterMark = options.highWaterMark ?? 65536;
  }

  async *read(): AsyncIterable<string> {
    const stream = createReadStream(this.filePath, { encoding: this.encoding, highWaterMark: this.highWaterMark });
    for await (const chunk of stream) {
      yield String(chunk);
    }
  }

  async sample(maxBytes?: number): Promise<string> {
    const stream = createReadStream(this.filePath, maxBytes ? { start: 0, end: maxBytes - 1 } : {});
    const chunks: Buffer[] = [];
    for await (const chunk of stream) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk), this.encoding));
    }
    return Buffer.concat(chunks).toString(this.encoding);
  }

  metadata(): SourceMetadata {
    return { fileName: basename(this.filePath), mimeType: detectMimeType(this.filePath) };
  }

  /** Metadata including the file size, which needs a `stat` call. */
  async describe(): Promise<SourceMetadata> {
    const stats = await stat(this.filePath);
    return { ...this.metadata(), fileSize: stats.size };
  }
}

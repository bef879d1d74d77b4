import type { DataSource, SourceMetadata } from '../../domain/ports/DataSource.js';
import { detectMimeType } from '../detectMimeType.js';

/** In-memory content, for uploads already buffered and for tests. */
export class BufferSource implements DataSource {
  private readonly content: string;
  private readonly meta: SourceMetadata;

  constructor(data: string | Buffer, metadata: Partial<SourceMetadata> = {}) {
    this.content = typeof data === 'string' ? data : data.toString('utf-8');
    const fileName = metadata.fileName ?? 'buffer-input';
    this.meta = {
      fileName,
      fileSize: Buffer.byteLength(this.content, 'utf-8'),
      mimeType: metadata.mimeType ?? detectMimeType(fileName),
    };
  }

  async *read(): AsyncIterable<string> {
    yield await Promise.resolve(this.content);
  }

  sample(maxBytes?: number): Promise<string> {
    if (maxBytes === undefined) return Promise.resolve(this.content);
    return Promise.resolve(Buffer.from(this.content, 'utf-8').subarray(0, maxBytes).toString('utf-8'));
  }

  metadata(): SourceMetadata {
    return this.meta;
  }
}

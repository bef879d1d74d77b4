import type { DataSource, SourceMetadata } from '../../domain/ports/DataSource.js';

export interface StreamSourceOptions {
  /** Default: `'stream-input'`. */
  readonly fileName?: string;
  /** Default: `'text/plain'`. */
  readonly mimeType?: string;
  readonly fileSize?: number;
  /** For decoding Buffer chunks. Default: `'utf-8'`. */
  readonly encoding?: BufferEncoding;
}

/**
 * Wraps a one-shot stream such as an HTTP upload.
 *
 * The first `sample()` or `read()` buffers what it consumes, so a sample taken
 * for header detection is replayed by the following `read()`. A second full
 * `read()` is an error.
 */
export class StreamSource implements DataSource {
  private readonly iterator: AsyncIterator<string | Buffer>;
  private readonly meta: SourceMetadata;
  private readonly encoding: BufferEncoding;
  private readonly buffered: string[] = [];
  private exhausted = false;
  private consumed = false;

  constructor(stream: AsyncIterable<string | Buffer>, options: StreamSourceOptions = {}) {
    this.iterator = stream[Symbol.asyncIterator]();
    this.encoding = options.encoding ?? 'utf-8';
    this.meta = {
      fileName: options.fileName ?? 'stream-input',
      fileSize: options.fileSize,
      mimeType: options.mimeType ?? 'text/plain',
    };
  }

  async *read(): AsyncIterable<string> {
    if (this.consumed) {
      throw new Error('StreamSource: the stream has already been read. Streams can only be read once.');
    }
    this.consumed = true;

    yield* this.buffered.splice(0);
    for (let chunk = await this.pull(); chunk !== null; chunk = await this.pull()) {
      yield chunk;
    }
  }

  async sample(maxBytes?: number): Promise<string> {
    if (this.consumed) {
      throw new Error('StreamSource: cannot sample a stream that is being read.');
    }
    let size = this.buffered.reduce((total, chunk) => total + Buffer.byteLength(chunk, this.encoding), 0);
    while (maxBytes === undefined || size < maxBytes) {
      const chunk = await this.pull();
      if (chunk === null) break;
      this.buffered.push(chunk);
      size += Buffer.byteLength(chunk, this.encoding);
    }

    const joined = Buffer.from(this.buffered.join(''), this.encoding);
    return (maxBytes === undefined ? joined : joined.subarray(0, maxBytes)).toString(this.encoding);
  }

  metadata(): SourceMetadata {
    return this.meta;
  }

  private async pull(): Promise<string | null> {
    if (this.exhausted) return null;
    const next = await this.iterator.next();
    if (next.done) {
      this.exhausted = true;
      return null;
    }
    const value: string | Buffer = next.value;
    return typeof value === 'string' ? value : Buffer.from(value).toString(this.encoding);
  }
}

import { createHash } from 'node:crypto';
import type { DataSource } from '../../domain/ports/DataSource.js';

/** SHA-256 of the whole content, hex encoded. Reads the source once. */
export async function hashSource(source: DataSource): Promise<string> {
  const hash = createHash('sha256');
  for await (const chunk of source.read()) {
    hash.update(chunk);
  }
  return hash.digest('hex');
}

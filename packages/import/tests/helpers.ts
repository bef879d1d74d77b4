import type { DataSource } from '@tabingest/core';
import type { ParsedRecord, SourceParser } from '../src/domain/ports/SourceParser.js';

/** Stream of the given text parts, standing in for an upload arriving in pieces. */
export async function* chunksOf(...parts: string[]): AsyncIterable<string> {
  for (const part of parts) {
    yield await Promise.resolve(part);
  }
}

export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) items.push(item);
  return items;
}

export function recordsOf(parser: SourceParser, source: DataSource, columns: readonly string[]): Promise<(ParsedRecord | null)[]> {
  return collect(parser.records(source, columns));
}

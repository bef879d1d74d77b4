import type { DataSource } from '@tabingest/core';
import { IngestionError } from '@tabingest/core';
import type { ParsedRecord, SourceParser } from '../../domain/ports/SourceParser.js';

export interface JsonParserOptions {
  /** Parse format: 'array' for JSON array of objects, 'ndjson' for newline-delimited JSON. Default: 'auto'. */
  readonly format?: 'array' | 'ndjson' | 'auto';
}

type JsonFormat = 'array' | 'ndjson';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function parseFailed(message: string, rowNumber?: number): IngestionError {
  return new IngestionError('PARSE_FAILED', message, rowNumber === undefined ? {} : { rowNumber });
}

/**
 * JSON parser adapter for arrays of objects and NDJSON.
 *
 * There is no header line: labels are the keys of all records in order of first
 * appearance, and record `i` counts as sheet row `i + 2`. Nested values are
 * kept as JSON text.
 */
export class JsonParser implements SourceParser {
  private readonly format: 'array' | 'ndjson' | 'auto';

  constructor(options?: JsonParserOptions) {
    this.format = options?.format ?? 'auto';
  }

  async columns(source: DataSource): Promise<readonly string[]> {
    const labels = new Set<string>();
    for (const record of this.parseText(await source.sample())) {
      if (record === null) continue;
      for (const key of Object.keys(record)) labels.add(key);
    }
    return [...labels];
  }

  async *records(source: DataSource): AsyncIterable<ParsedRecord | null> {
    const sample = (await source.sample(1024)).trimStart();
    if (this.resolveFormat(sample) === 'array') {
      yield* this.parseText(await readText(source));
      return;
    }

    let pending = '';
    let line = 0;
    for await (const chunk of source.read()) {
      pending += chunk;
      const lines = pending.split('\n');
      pending = lines.pop() ?? '';
      for (const text of lines) {
        yield this.parseLine(text, ++line);
      }
    }
    if (pending.trim() !== '') yield this.parseLine(pending, ++line);
  }

  /** Parse a whole document. */
  parseText(content: string): (ParsedRecord | null)[] {
    const trimmed = content.trim();
    if (trimmed === '') return [];

    if (this.resolveFormat(trimmed) === 'ndjson') {
      const lines = trimmed.split('\n');
      return lines.map((text, i) => this.parseLine(text, i + 1));
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(trimmed);
    } catch {
      throw parseFailed('The file is not valid JSON');
    }
    if (!Array.isArray(parsed)) {
      throw parseFailed('Expected a JSON array of objects');
    }
    return parsed.map((item: unknown, i) => {
      if (!isPlainObject(item)) throw parseFailed(`Item ${String(i + 1)} of the array is not an object`, i + 2);
      return flattenValues(item);
    });
  }

  private parseLine(text: string, line: number): ParsedRecord | null {
    const trimmed = text.trim();
    if (trimmed === '') return null;

    let parsed: unknown;
    try {
      parsed = JSON.parse(trimmed);
    } catch {
      throw parseFailed(`Line ${String(line)} is not valid JSON`, line + 1);
    }
    if (!isPlainObject(parsed)) {
      throw parseFailed(`Line ${String(line)} is not a JSON object`, line + 1);
    }
    return flattenValues(parsed);
  }

  private resolveFormat(content: string): JsonFormat {
    if (this.format !== 'auto') return this.format;
    return content.startsWith('[') ? 'array' : 'ndjson';
  }
}

async function readText(source: DataSource): Promise<string> {
  let content = '';
  for await (const chunk of source.read()) {
    content += chunk;
  }
  return content;
}

function flattenValues(obj: Record<string, unknown>): ParsedRecord {
  const flat: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    flat[key] = typeof value === 'object' && value !== null ? JSON.stringify(value) : value;
  }
  return flat;
}

import { Readable } from 'node:stream';
import Papa from 'papaparse';
import type { DataSource } from '@tabingest/core';
import { IngestionError } from '@tabingest/core';
import type { ParsedRecord, ParserOptions, SourceParser } from '../../domain/ports/SourceParser.js';

const DELIMITERS = [',', ';', '\t', '|'];

/** Bytes read to find the header line and guess the delimiter. */
const HEADER_SAMPLE_BYTES = 64 * 1024;

function toCells(row: unknown): string[] {
  if (!Array.isArray(row)) return [];
  return row.map((cell: unknown) => (typeof cell === 'string' ? cell : String(cell)));
}

/**
 * CSV parser adapter using PapaParse in streaming mode.
 *
 * The first line is the header. Cells stay strings: typing happens later,
 * against the schema.
 */
export class CsvParser implements SourceParser {
  private readonly options: ParserOptions;

  constructor(options: ParserOptions = {}) {
    this.options = { delimiter: options.delimiter, quoteChar: options.quoteChar ?? '"' };
  }

  async columns(source: DataSource): Promise<readonly string[]> {
    const sample = await source.sample(HEADER_SAMPLE_BYTES);
    const result = Papa.parse<string[]>(sample, {
      delimiter: this.options.delimiter ?? this.detect(sample).delimiter,
      quoteChar: this.options.quoteChar,
      preview: 1,
      header: false,
    });

    const header = toCells(result.data[0]);
    if (header.every((label) => label.trim() === '')) {
      throw new IngestionError('EMPTY_FILE', `No header row found in ${source.metadata().fileName}`);
    }
    return header;
  }

  async *records(source: DataSource, columns: readonly string[]): AsyncIterable<ParsedRecord | null> {
    const delimiter = this.options.delimiter ?? this.detect(await source.sample(HEADER_SAMPLE_BYTES)).delimiter;
    const parser = Papa.parse(Papa.NODE_STREAM_INPUT, {
      delimiter,
      quoteChar: this.options.quoteChar,
      header: false,
      skipEmptyLines: false,
      dynamicTyping: false,
    });
    const input = Readable.from(source.read());
    input.once('error', (error) => parser.destroy(error));
    input.pipe(parser);

    let headerSeen = false;
    for await (const row of parser) {
      if (!headerSeen) {
        headerSeen = true;
        continue;
      }
      const cells = toCells(row);
      if (cells.every((cell) => cell.trim() === '')) {
        yield null;
        continue;
      }
      const record: Record<string, string> = {};
      columns.forEach((column, i) => {
        record[column] = cells[i] ?? '';
      });
      yield record;
    }
  }

  /** Pick the delimiter that splits the first lines into the most columns. */
  detect(sample: string): ParserOptions {
    const firstLines = sample.split('\n').slice(0, 5).join('\n');

    let bestDelimiter = ',';
    let maxColumns = 0;
    for (const delimiter of DELIMITERS) {
      const result = Papa.parse<string[]>(firstLines, { delimiter, header: false, preview: 1 });
      const columns = result.data[0]?.length ?? 0;
      if (columns > maxColumns) {
        maxColumns = columns;
        bestDelimiter = delimiter;
      }
    }

    return { delimiter: bestDelimiter, quoteChar: this.options.quoteChar };
  }
}

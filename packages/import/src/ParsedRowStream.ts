import type { CellValue, DataSource, RawRow, RowStream } from '@tabingest/core';
import { DEFAULT_DATA_START_ROW, toCellValue } from '@tabingest/core';
import type { SourceParser } from './domain/ports/SourceParser.js';
import { CsvParser } from './infrastructure/parsers/CsvParser.js';
import { JsonParser } from './infrastructure/parsers/JsonParser.js';

export interface ParsedRowStreamOptions {
  /** Parser to read the source with. Default: chosen from the source's MIME type. */
  readonly parser?: SourceParser;
  /** Known column labels. Skips header detection. */
  readonly columns?: readonly string[];
}

/** Parser for a MIME type. Anything that is not JSON or TSV is read as CSV. */
export function parserFor(mimeType: string): SourceParser {
  switch (mimeType) {
    case 'application/json':
      return new JsonParser({ format: 'array' });
    case 'application/x-ndjson':
      return new JsonParser({ format: 'ndjson' });
    case 'text/tab-separated-values':
      return new CsvParser({ delimiter: '\t' });
    default:
      return new CsvParser();
  }
}

/**
 * `RowStream` over a byte source and a parser.
 *
 * Row numbers count file lines: the header is row 1 and blank lines still take
 * a number, so a row number in an error points at the line in the file.
 * Every call to `rows()` reads the source again from the start.
 *
 * @example
 * ```typescript
 * const rows = new ParsedRowStream(new FilePathSource('./customers.csv'));
 * const batch = await engine.importRows({ schemaId, rows, source: { path: './customers.csv' } });
 * ```
 */
export class ParsedRowStream implements RowStream {
  private readonly parser: SourceParser;
  private header: Promise<readonly string[]> | null;

  constructor(
    private readonly source: DataSource,
    options: ParsedRowStreamOptions = {},
  ) {
    this.parser = options.parser ?? parserFor(source.metadata().mimeType);
    this.header = options.columns ? Promise.resolve(options.columns) : null;
  }

  columns(): Promise<readonly string[]> {
    this.header ??= this.parser.columns(this.source);
    return this.header;
  }

  async *rows(fromRow: number = DEFAULT_DATA_START_ROW): AsyncIterable<RawRow> {
    const columns = await this.columns();
    let rowNumber = 1;

    for await (const record of this.parser.records(this.source, columns)) {
      rowNumber++;
      if (record === null || rowNumber < fromRow) continue;

      const cells: Record<string, CellValue> = {};
      for (const column of columns) {
        cells[column] = toCellValue(record[column]);
      }
      yield { rowNumber, cells };
    }
  }
}

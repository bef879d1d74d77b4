import type { CellValue } from '../model/CellValue.js';

/** One data row, keyed by original column label. */
export interface RawRow {
  /** 1-based sheet row; the header line is row 1. */
  readonly rowNumber: number;
  readonly cells: Readonly<Record<string, CellValue>>;
}

/**
 * Lazy, finite sequence of raw rows from one tabular file.
 *
 * `rows(fromRow)` restarts the sequence at the given sheet row, so a stream
 * can be read more than once (preview, then import).
 */
export interface RowStream {
  /** Column labels in file order. */
  columns(): Promise<readonly string[]>;
  rows(fromRow?: number): AsyncIterable<RawRow>;
}

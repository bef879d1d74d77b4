import type { DataSource } from '@tabingest/core';

/** One record as a parser produced it, keyed by column label. Values are not yet typed. */
export interface ParsedRecord {
  readonly [column: string]: unknown;
}

/** Detected or configured options of a delimited text format. */
export interface ParserOptions {
  /** Column delimiter character (e.g. `','`, `';'`, `'\t'`). Detected from the header when absent. */
  readonly delimiter?: string;
  /** Default: `'"'`. */
  readonly quoteChar?: string;
}

/**
 * Port for reading a tabular file format from a byte source.
 *
 * Implement this interface to support new data formats. `records()` yields one
 * entry per data line after the header; a blank line yields `null` so callers
 * can keep line-accurate row numbers.
 */
export interface SourceParser {
  /** Column labels in file order. */
  columns(source: DataSource): Promise<readonly string[]>;
  records(source: DataSource, columns: readonly string[]): AsyncIterable<ParsedRecord | null>;
}

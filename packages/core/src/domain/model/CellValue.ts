/**
 * A raw spreadsheet cell, tagged with the shape the reader produced.
 *
 * Values are never inferred: a numeric-looking string stays `text` until a
 * coercion function converts it for a declared field type.
 */
export type CellValue =
  | { readonly kind: 'text'; readonly value: string }
  | { readonly kind: 'number'; readonly value: number }
  | { readonly kind: 'date'; readonly value: Date }
  | { readonly kind: 'boolean'; readonly value: boolean }
  | { readonly kind: 'empty' };

export type CellKind = CellValue['kind'];

export const EMPTY_CELL: CellValue = { kind: 'empty' };

export function textCell(value: string): CellValue {
  return { kind: 'text', value };
}

export function numberCell(value: number): CellValue {
  return { kind: 'number', value };
}

export function dateCell(value: Date): CellValue {
  return { kind: 'date', value };
}

export function booleanCell(value: boolean): CellValue {
  return { kind: 'boolean', value };
}

/**
 * Wrap a value as produced by a parser into a tagged cell.
 *
 * `null`, `undefined`, blank strings and invalid dates become `empty`.
 * Anything that is not a primitive is serialised to text.
 */
export function toCellValue(value: unknown): CellValue {
  if (value === null || value === undefined) return EMPTY_CELL;
  if (typeof value === 'string') return value.trim() === '' ? EMPTY_CELL : textCell(value);
  if (typeof value === 'number') return Number.isFinite(value) ? numberCell(value) : EMPTY_CELL;
  if (typeof value === 'boolean') return booleanCell(value);
  if (typeof value === 'bigint') return numberCell(Number(value));
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? EMPTY_CELL : dateCell(value);
  return textCell(JSON.stringify(value));
}

export function isEmptyCell(cell: CellValue | undefined): boolean {
  return cell === undefined || cell.kind === 'empty';
}

/** Render a cell for messages and quality issues. */
export function describeCell(cell: CellValue | undefined): string | null {
  if (cell === undefined || cell.kind === 'empty') return null;
  if (cell.kind === 'date') return cell.value.toISOString();
  return String(cell.value);
}

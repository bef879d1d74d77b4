import { isValid, parse, parseISO } from 'date-fns';
import type { CellValue } from '../model/CellValue.js';
import type { FieldValue } from '../model/Document.js';
import type { AttributeType } from '../model/Schema.js';

export type CoercionResult = { readonly ok: true; readonly value: FieldValue } | { readonly ok: false };

const FAILED: CoercionResult = { ok: false };

const NUMBER_PATTERN = /^[+-]?(\d+|\d{1,3}(,\d{3})+)(\.\d+)?([eE][+-]?\d+)?$/;

/** Tried in order after ISO-8601; the first valid parse wins. */
export const DATE_FORMATS: readonly string[] = ['yyyy-MM-dd', 'yyyy/MM/dd', 'MM/dd/yyyy', 'dd.MM.yyyy', 'd MMM yyyy', 'MMM d, yyyy'];

/** A full calendar date, optionally followed by a time. */
const ISO_DATE = /^\d{4}-\d{2}-\d{2}(?:$|[T\s])/;

const TRUE_WORDS = new Set(['true', 'yes', '1']);
const FALSE_WORDS = new Set(['false', 'no', '0']);

function ok(value: FieldValue): CoercionResult {
  return { ok: true, value };
}

function toNumber(cell: CellValue): CoercionResult {
  if (cell.kind === 'number') return ok(cell.value);
  if (cell.kind !== 'text') return FAILED;

  const text = cell.value.trim();
  if (!NUMBER_PATTERN.test(text)) return FAILED;
  const value = Number(text.replace(/,/g, ''));
  return Number.isFinite(value) ? ok(value) : FAILED;
}

/** Parse a date string against ISO-8601 and then each of `DATE_FORMATS`. */
export function parseDateText(text: string, referenceDate: Date = new Date(0)): Date | null {
  const trimmed = text.trim();
  if (trimmed === '') return null;

  // parseISO alone reads '12' as the year 1200
  if (ISO_DATE.test(trimmed)) {
    const iso = parseISO(trimmed);
    if (isValid(iso)) return iso;
  }

  for (const format of DATE_FORMATS) {
    const parsed = parse(trimmed, format, referenceDate);
    if (isValid(parsed)) return parsed;
  }
  return null;
}

function toDate(cell: CellValue): CoercionResult {
  if (cell.kind === 'date') return ok(cell.value);
  if (cell.kind !== 'text') return FAILED;
  const parsed = parseDateText(cell.value);
  return parsed ? ok(parsed) : FAILED;
}

function toBoolean(cell: CellValue): CoercionResult {
  if (cell.kind === 'boolean') return ok(cell.value);
  if (cell.kind !== 'text' && cell.kind !== 'number') return FAILED;

  const word = String(cell.value).trim().toLowerCase();
  if (TRUE_WORDS.has(word)) return ok(true);
  if (FALSE_WORDS.has(word)) return ok(false);
  return FAILED;
}

function toText(cell: CellValue): CoercionResult {
  switch (cell.kind) {
    case 'text': {
      const text = cell.value.trim();
      return text === '' ? FAILED : ok(text);
    }
    case 'number':
    case 'boolean':
      return ok(String(cell.value));
    case 'date':
      return ok(cell.value.toISOString());
    case 'empty':
      return FAILED;
  }
}

/**
 * Convert a raw cell to the declared attribute type.
 *
 * Total: every cell kind has an explicit outcome per type. Empty cells always
 * fail; the mapper checks for them before calling this.
 */
export function coerceCell(cell: CellValue, type: AttributeType): CoercionResult {
  switch (type) {
    case 'Number':
      return toNumber(cell);
    case 'Date':
      return toDate(cell);
    case 'Boolean':
      return toBoolean(cell);
    case 'String':
      return toText(cell);
  }
}

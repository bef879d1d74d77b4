import { z } from 'zod';
import type { DocumentSnapshot, SnapshotValue } from '@tabingest/core';

const snapshotValue: z.ZodType<SnapshotValue, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z
      .object({ $date: z.string() })
      .strict()
      .transform((value) => new Date(value.$date)),
    z.array(snapshotValue),
    z.record(snapshotValue),
  ]),
);

/** Column schema of a stored document snapshot. Nested values and nulls are kept. */
export const documentJson = z.record(snapshotValue).nullable();

function encodeValue(value: SnapshotValue): unknown {
  if (value instanceof Date) return { $date: value.toISOString() };
  if (value === null || typeof value !== 'object') return value;
  if (isSnapshotArray(value)) return value.map(encodeValue);
  return encodeFields(value);
}

function isSnapshotArray(value: SnapshotValue): value is readonly SnapshotValue[] {
  return Array.isArray(value);
}

function encodeFields(fields: { readonly [field: string]: SnapshotValue }): Record<string, unknown> {
  const encoded: Record<string, unknown> = {};
  for (const [field, value] of Object.entries(fields)) encoded[field] = encodeValue(value);
  return encoded;
}

/** JSON form of a document snapshot. Dates, at any depth, become `{ $date: <ISO string> }`. */
export function encodeDocument(document: DocumentSnapshot | null): Record<string, unknown> | null {
  return document === null ? null : encodeFields(document);
}

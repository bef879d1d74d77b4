/** A value stored in a target document after coercion. */
export type FieldValue = string | number | boolean | Date;

/** A normalized document keyed by schema field names. Absent fields are missing keys. */
export interface Document {
  readonly [field: string]: FieldValue;
}

/**
 * Any value a stored document may hold, including nested values and nulls
 * written by other applications.
 */
export type SnapshotValue = FieldValue | null | readonly SnapshotValue[] | { readonly [field: string]: SnapshotValue };

/** Full state of a stored document, identity excluded. Every `Document` is one. */
export interface DocumentSnapshot {
  readonly [field: string]: SnapshotValue;
}

/** A document together with the identity the store assigned to it. */
export interface StoredDocument {
  readonly id: string;
  readonly fields: DocumentSnapshot;
}

/** Compare two values; dates compare by instant, nested values by reference. */
export function sameFieldValue(a: SnapshotValue | undefined, b: SnapshotValue | undefined): boolean {
  if (a instanceof Date && b instanceof Date) return a.getTime() === b.getTime();
  return a === b;
}

/**
 * Pick exactly the given fields from a document.
 *
 * Returns `null` when any of them is absent: a partial key never matches.
 */
export function pickKey(document: Document, fields: readonly string[]): Document | null {
  if (fields.length === 0) return null;
  const key: Record<string, FieldValue> = {};
  for (const field of fields) {
    const value = document[field];
    if (value === undefined) return null;
    key[field] = value;
  }
  return key;
}

/** Check whether a document carries the given values at every key field. */
export function matchesKey(document: DocumentSnapshot, key: Document): boolean {
  return Object.entries(key).every(([field, value]) => sameFieldValue(document[field], value));
}

import mongoose, { Types } from 'mongoose';
import type { DocumentSnapshot, SnapshotValue } from '@tabingest/core';
import type { MongoRecord } from './DocumentCollection.js';

const { EJSON } = mongoose.mongo.BSON;

/** Prefix of document ids whose `_id` is not an ObjectId. */
const TAGGED_ID_PREFIX = 'ejson:';
const OBJECT_ID_HEX = /^[0-9a-f]{24}$/i;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) return false;
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

function isSnapshotArray(value: SnapshotValue): value is readonly SnapshotValue[] {
  return Array.isArray(value);
}

/** `{ $oid: ... }`, `{ $numberDecimal: ... }` and the other single-key Extended JSON wrappers. */
function isExtendedJsonWrapper(value: { readonly [field: string]: SnapshotValue }): boolean {
  const keys = Object.keys(value);
  return keys.length === 1 && keys[0]?.startsWith('$') === true;
}

/**
 * Snapshot form of a raw BSON value.
 *
 * Plain values, dates, arrays and sub-documents keep their shape; any other
 * BSON type (ObjectId, Decimal128, Binary, ...) becomes its canonical Extended
 * JSON wrapper so that `fromSnapshotValue` can restore it exactly.
 */
export function toSnapshotValue(value: unknown): SnapshotValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
  if (value instanceof Date) return value;
  if (Array.isArray(value)) return value.map((item: unknown) => toSnapshotValue(item));
  if (isPlainObject(value)) {
    const fields: Record<string, SnapshotValue> = {};
    for (const [field, item] of Object.entries(value)) {
      if (item !== undefined) fields[field] = toSnapshotValue(item);
    }
    return fields;
  }
  const wrapper: unknown = EJSON.serialize(value, { relaxed: false });
  return toSnapshotValue(wrapper);
}

export function fromSnapshotValue(value: SnapshotValue): unknown {
  if (value === null || typeof value !== 'object' || value instanceof Date) return value;
  if (isSnapshotArray(value)) return value.map((item) => fromSnapshotValue(item));
  if (isExtendedJsonWrapper(value)) {
    const restored: unknown = EJSON.deserialize(value, { relaxed: false });
    return restored;
  }
  const fields: Record<string, unknown> = {};
  for (const [field, item] of Object.entries(value)) fields[field] = fromSnapshotValue(item);
  return fields;
}

/** Every field of a raw record but `_id`, in snapshot form. */
export function toSnapshot(record: MongoRecord): DocumentSnapshot {
  const fields: Record<string, SnapshotValue> = {};
  for (const [field, value] of Object.entries(record)) {
    if (field === '_id' || value === undefined) continue;
    fields[field] = toSnapshotValue(value);
  }
  return fields;
}

export function fromSnapshot(snapshot: DocumentSnapshot): MongoRecord {
  const record: MongoRecord = {};
  for (const [field, value] of Object.entries(snapshot)) record[field] = fromSnapshotValue(value);
  return record;
}

/**
 * Document id for an `_id` value: the hex string of an ObjectId, otherwise
 * `ejson:` followed by the value in relaxed Extended JSON (`ejson:"cust-1"`).
 */
export function encodeId(id: unknown): string {
  if (id instanceof Types.ObjectId) return id.toHexString();
  return `${TAGGED_ID_PREFIX}${EJSON.stringify(id, { relaxed: true })}`;
}

/** Filter selecting the document with this id, or `null` when the id is malformed. */
export function idFilter(id: string): MongoRecord | null {
  if (id.startsWith(TAGGED_ID_PREFIX)) {
    try {
      const _id: unknown = EJSON.parse(id.slice(TAGGED_ID_PREFIX.length), { relaxed: true });
      return { _id };
    } catch (error) {
      if (error instanceof SyntaxError || error instanceof mongoose.mongo.BSON.BSONError) return null;
      throw error;
    }
  }
  return OBJECT_ID_HEX.test(id) ? { _id: new Types.ObjectId(id) } : null;
}

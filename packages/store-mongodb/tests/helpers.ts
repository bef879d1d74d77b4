import mongoose, { Types } from 'mongoose';
import type { CollectionProvider, DocumentCollection, IndexDirection, MongoRecord } from '../src/DocumentCollection.js';

function sameValue(a: unknown, b: unknown): boolean {
  if (a instanceof Date && b instanceof Date) return a.getTime() === b.getTime();
  if (a instanceof Types.ObjectId && b instanceof Types.ObjectId) return a.equals(b);
  return a === b;
}

function matches(record: MongoRecord, filter: MongoRecord): boolean {
  return Object.entries(filter).every(([field, value]) => sameValue(record[field], value));
}

export function serverError(code: number, message: string): Error {
  return new mongoose.mongo.MongoServerError({ message, code });
}

/** In-process stand-in for one MongoDB collection: equality filters and single-field unique indexes. */
export class FakeCollection implements DocumentCollection {
  readonly records: MongoRecord[] = [];
  readonly indexes = new Map<string, { spec: Record<string, IndexDirection>; unique: boolean }>();
  /** Every operation rejects with this error while it is set. */
  failWith: Error | null = null;

  async findOne(filter: MongoRecord): Promise<MongoRecord | null> {
    this.check();
    return Promise.resolve(this.records.find((record) => matches(record, filter)) ?? null);
  }

  async insertOne(document: MongoRecord): Promise<void> {
    this.check();
    this.assertUnique(document, null);
    this.records.push({ ...document });
    return Promise.resolve();
  }

  async replaceOne(filter: MongoRecord, replacement: MongoRecord): Promise<number> {
    this.check();
    const position = this.records.findIndex((record) => matches(record, filter));
    const existing = this.records[position];
    if (!existing) return Promise.resolve(0);
    this.assertUnique(replacement, existing);
    this.records[position] = { ...replacement, _id: existing['_id'] };
    return Promise.resolve(1);
  }

  async deleteOne(filter: MongoRecord): Promise<number> {
    this.check();
    const position = this.records.findIndex((record) => matches(record, filter));
    if (position < 0) return Promise.resolve(0);
    this.records.splice(position, 1);
    return Promise.resolve(1);
  }

  async createIndex(spec: Record<string, IndexDirection>, options: { name: string; unique: boolean }): Promise<void> {
    this.check();
    if (options.unique) {
      const [field] = Object.keys(spec);
      const values = this.records.map((record) => (field === undefined ? undefined : record[field]));
      if (values.some((value, i) => values.findIndex((other) => sameValue(other, value)) !== i)) {
        throw serverError(11000, 'E11000 duplicate key error collection');
      }
    }
    this.indexes.set(options.name, { spec, unique: options.unique });
    return Promise.resolve();
  }

  async countDocuments(): Promise<number> {
    this.check();
    return Promise.resolve(this.records.length);
  }

  private check(): void {
    if (this.failWith) throw this.failWith;
  }

  private assertUnique(document: MongoRecord, self: MongoRecord | null): void {
    for (const { spec, unique } of this.indexes.values()) {
      if (!unique) continue;
      for (const field of Object.keys(spec)) {
        const value = document[field];
        if (value === undefined) continue;
        if (this.records.some((record) => record !== self && sameValue(record[field], value))) {
          throw serverError(11000, `E11000 duplicate key error dup key: { ${field} }`);
        }
      }
    }
  }
}

export class FakeDatabase {
  private readonly collections = new Map<string, FakeCollection>();

  readonly provider: CollectionProvider = (name) => this.collection(name);

  collection(name: string): FakeCollection {
    let collection = this.collections.get(name);
    if (!collection) {
      collection = new FakeCollection();
      this.collections.set(name, collection);
    }
    return collection;
  }
}

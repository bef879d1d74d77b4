import mongoose, { Types } from 'mongoose';
import type { Connection } from 'mongoose';
import type { Document, DocumentSnapshot, DocumentStore, IndexDefinition, IndexKind, StoredDocument } from '@tabingest/core';
import { StoreUnavailableError, UniqueConstraintViolation } from '@tabingest/core';
import type { CollectionProvider, IndexDirection, MongoRecord } from './DocumentCollection.js';
import { connectionCollections } from './DocumentCollection.js';
import { isDuplicateKeyError, isIndexConflict, isUnavailableError } from './mongoErrors.js';
import { encodeId, fromSnapshot, idFilter, toSnapshot } from './snapshots.js';
import type { MongoSettings } from './settings.js';

const INDEX_SPECS: Record<IndexKind, { direction: IndexDirection; suffix: string }> = {
  unique: { direction: 1, suffix: 'unique' },
  ascending: { direction: 1, suffix: 'asc' },
  descending: { direction: -1, suffix: 'desc' },
  text: { direction: 'text', suffix: 'text' },
};

/** Name given to the index created for a definition, e.g. `idx_email_unique`. */
export function indexName(index: IndexDefinition): string {
  return `idx_${index.field}_${INDEX_SPECS[index.kind].suffix}`;
}

/** Stored form of a raw record: its encoded `_id` and every other field in full. */
export function toStoredDocument(record: MongoRecord): StoredDocument {
  return { id: encodeId(record['_id']), fields: toSnapshot(record) };
}

/**
 * DocumentStore adapter for MongoDB on a mongoose connection.
 *
 * Inserted documents get an ObjectId `_id`; its hex string is the document id
 * the engine sees. Documents written by others may carry any `_id`, see
 * `encodeId`. Reads return every field, with BSON types the engine does not
 * know kept as Extended JSON, and `replace` writes them back as they were.
 * Duplicate-key errors become `UniqueConstraintViolation`, lost connections
 * become `StoreUnavailableError`.
 *
 * @example
 * ```typescript
 * const store = await MongoDocumentStore.connect(loadMongoSettings());
 * const engine = new IngestionEngine({ documents: store });
 * ```
 */
export class MongoDocumentStore implements DocumentStore {
  private readonly collections: CollectionProvider;
  private readonly connection: Connection | null;

  constructor(collections: CollectionProvider, connection: Connection | null = null) {
    this.collections = collections;
    this.connection = connection;
  }

  static fromConnection(connection: Connection): MongoDocumentStore {
    return new MongoDocumentStore(connectionCollections(connection), connection);
  }

  /** Open a dedicated connection. `close()` closes it again. */
  static async connect(settings: MongoSettings): Promise<MongoDocumentStore> {
    try {
      const connection = await mongoose.createConnection(settings.url, { dbName: settings.database }).asPromise();
      return MongoDocumentStore.fromConnection(connection);
    } catch (error) {
      throw new StoreUnavailableError('The document database cannot be reached', { cause: error });
    }
  }

  async close(): Promise<void> {
    await this.connection?.close();
  }

  findOne(collection: string, key: Document): Promise<StoredDocument | null> {
    return this.guard(collection, async () => {
      const record = await this.collections(collection).findOne({ ...key });
      return record ? toStoredDocument(record) : null;
    });
  }

  insert(collection: string, document: Document): Promise<string> {
    return this.guard(collection, async () => {
      const _id = new Types.ObjectId();
      await this.collections(collection).insertOne({ ...document, _id });
      return _id.toHexString();
    });
  }

  replace(collection: string, id: string, document: DocumentSnapshot): Promise<boolean> {
    const filter = idFilter(id);
    if (!filter) return Promise.resolve(false);
    return this.guard(
      collection,
      async () => (await this.collections(collection).replaceOne(filter, fromSnapshot(document))) > 0,
    );
  }

  delete(collection: string, id: string): Promise<boolean> {
    const filter = idFilter(id);
    if (!filter) return Promise.resolve(false);
    return this.guard(collection, async () => (await this.collections(collection).deleteOne(filter)) > 0);
  }

  get(collection: string, id: string): Promise<StoredDocument | null> {
    const filter = idFilter(id);
    if (!filter) return Promise.resolve(null);
    return this.guard(collection, async () => {
      const record = await this.collections(collection).findOne(filter);
      return record ? toStoredDocument(record) : null;
    });
  }

  async ensureIndex(collection: string, index: IndexDefinition): Promise<void> {
    const { direction } = INDEX_SPECS[index.kind];
    try {
      await this.guard(collection, () =>
        this.collections(collection).createIndex(
          { [index.field]: direction },
          { name: indexName(index), unique: index.kind === 'unique' },
        ),
      );
    } catch (error) {
      if (isIndexConflict(error)) return;
      throw error;
    }
  }

  count(collection: string): Promise<number> {
    return this.guard(collection, () => this.collections(collection).countDocuments());
  }

  private async guard<T>(collection: string, operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      if (isDuplicateKeyError(error)) {
        throw new UniqueConstraintViolation(collection, `Duplicate key in '${collection}'`, { cause: error });
      }
      if (isUnavailableError(error)) {
        throw new StoreUnavailableError('The document database cannot be reached', { cause: error });
      }
      throw error;
    }
  }
}

import type { Connection } from 'mongoose';

/** A raw MongoDB document, `_id` included. */
export type MongoRecord = Record<string, unknown>;

export type IndexDirection = 1 | -1 | 'text';

/**
 * The part of a MongoDB collection the document store uses.
 *
 * Narrow on purpose so that tests can stand in an in-process fake.
 */
export interface DocumentCollection {
  findOne(filter: MongoRecord): Promise<MongoRecord | null>;
  insertOne(document: MongoRecord): Promise<void>;
  /** Returns the number of documents matched. */
  replaceOne(filter: MongoRecord, replacement: MongoRecord): Promise<number>;
  /** Returns the number of documents deleted. */
  deleteOne(filter: MongoRecord): Promise<number>;
  createIndex(spec: Record<string, IndexDirection>, options: { name: string; unique: boolean }): Promise<void>;
  countDocuments(): Promise<number>;
}

export type CollectionProvider = (name: string) => DocumentCollection;

/** Collections of a mongoose connection. Operations queue until the connection is open. */
export function connectionCollections(connection: Connection): CollectionProvider {
  return (name) => {
    const collection = connection.collection(name);
    return {
      findOne: (filter) => collection.findOne(filter),
      insertOne: async (document) => {
        await collection.insertOne(document);
      },
      replaceOne: async (filter, replacement) => (await collection.replaceOne(filter, replacement)).matchedCount,
      deleteOne: async (filter) => (await collection.deleteOne(filter)).deletedCount,
      createIndex: async (spec, options) => {
        await collection.createIndex(spec, options);
      },
      countDocuments: () => collection.countDocuments(),
    };
  };
}

import type { Document, DocumentSnapshot, StoredDocument } from '../model/Document.js';
import type { IndexDefinition } from '../model/Schema.js';

/**
 * Port for the target document store.
 *
 * Adapters signal a unique index collision on `insert` with
 * `UniqueConstraintViolation` and an unreachable backend with
 * `StoreUnavailableError`. Any other thrown error is treated as row-scoped.
 */
export interface DocumentStore {
  /** First document whose fields equal every entry of `key`, or `null`. Fields come back in full. */
  findOne(collection: string, key: Document): Promise<StoredDocument | null>;
  /** Insert and return the identity assigned by the store. */
  insert(collection: string, document: Document): Promise<string>;
  /**
   * Replace every field of the document. Returns `false` when no document has that id.
   * Rollback passes back the snapshot `findOne` returned, so it must be written as read.
   */
  replace(collection: string, id: string, document: DocumentSnapshot): Promise<boolean>;
  /** Returns `false` when no document has that id. */
  delete(collection: string, id: string): Promise<boolean>;
  get(collection: string, id: string): Promise<StoredDocument | null>;
  /** Create the index unless an equivalent one exists. */
  ensureIndex(collection: string, index: IndexDefinition): Promise<void>;
  count(collection: string): Promise<number>;
}

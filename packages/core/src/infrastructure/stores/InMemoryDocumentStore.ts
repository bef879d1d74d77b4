import { randomUUID } from 'node:crypto';
import type { Document, DocumentSnapshot, SnapshotValue, StoredDocument } from '../../domain/model/Document.js';
import type { IndexDefinition } from '../../domain/model/Schema.js';
import type { DocumentStore } from '../../domain/ports/DocumentStore.js';
import { matchesKey, sameFieldValue } from '../../domain/model/Document.js';
import { UniqueConstraintViolation } from '../../domain/errors.js';

/**
 * Non-persistent document store. Used as the default when no document store is provided.
 *
 * Unique indexes are enforced on insert and replace; other index kinds are only recorded.
 */
export class InMemoryDocumentStore implements DocumentStore {
  private readonly collections = new Map<string, Map<string, DocumentSnapshot>>();
  private readonly indexDefinitions = new Map<string, IndexDefinition[]>();

  findOne(collection: string, key: Document): Promise<StoredDocument | null> {
    for (const [id, fields] of this.documents(collection)) {
      if (matchesKey(fields, key)) return Promise.resolve({ id, fields });
    }
    return Promise.resolve(null);
  }

  insert(collection: string, document: Document): Promise<string> {
    const violation = this.findViolation(collection, document, null);
    if (violation) return Promise.reject(violation);
    const id = randomUUID();
    this.documents(collection).set(id, { ...document });
    return Promise.resolve(id);
  }

  replace(collection: string, id: string, document: DocumentSnapshot): Promise<boolean> {
    const documents = this.documents(collection);
    if (!documents.has(id)) return Promise.resolve(false);
    const violation = this.findViolation(collection, document, id);
    if (violation) return Promise.reject(violation);
    documents.set(id, { ...document });
    return Promise.resolve(true);
  }

  delete(collection: string, id: string): Promise<boolean> {
    return Promise.resolve(this.documents(collection).delete(id));
  }

  get(collection: string, id: string): Promise<StoredDocument | null> {
    const fields = this.documents(collection).get(id);
    return Promise.resolve(fields ? { id, fields } : null);
  }

  ensureIndex(collection: string, index: IndexDefinition): Promise<void> {
    const existing = this.indexDefinitions.get(collection) ?? [];
    if (existing.some((i) => i.field === index.field && i.kind === index.kind)) return Promise.resolve();

    if (index.kind === 'unique') {
      const seen: SnapshotValue[] = [];
      for (const fields of this.documents(collection).values()) {
        const value = fields[index.field];
        if (value === undefined) continue;
        if (seen.some((other) => sameFieldValue(other, value))) {
          return Promise.reject(new UniqueConstraintViolation(collection, `Existing documents repeat '${index.field}'`));
        }
        seen.push(value);
      }
    }

    this.indexDefinitions.set(collection, [...existing, index]);
    return Promise.resolve();
  }

  count(collection: string): Promise<number> {
    return Promise.resolve(this.documents(collection).size);
  }

  /** Indexes created on a collection, in creation order. */
  indexes(collection: string): readonly IndexDefinition[] {
    return this.indexDefinitions.get(collection) ?? [];
  }

  /** Every document of a collection, in insertion order. */
  all(collection: string): StoredDocument[] {
    return [...this.documents(collection)].map(([id, fields]) => ({ id, fields }));
  }

  private documents(collection: string): Map<string, DocumentSnapshot> {
    let documents = this.collections.get(collection);
    if (!documents) {
      documents = new Map();
      this.collections.set(collection, documents);
    }
    return documents;
  }

  private findViolation(collection: string, document: DocumentSnapshot, ownId: string | null): UniqueConstraintViolation | null {
    const uniqueFields = this.indexes(collection).filter((i) => i.kind === 'unique').map((i) => i.field);
    for (const field of uniqueFields) {
      const value = document[field];
      if (value === undefined) continue;
      for (const [id, other] of this.documents(collection)) {
        if (id !== ownId && sameFieldValue(other[field], value)) {
          return new UniqueConstraintViolation(collection, `Duplicate value for unique field '${field}' in '${collection}'`);
        }
      }
    }
    return null;
  }
}

import type { Document, DocumentSnapshot, StoredDocument } from '../model/Document.js';
import type { DuplicateStrategy, SchemaDefinition } from '../model/Schema.js';
import type { DocumentStore } from '../ports/DocumentStore.js';
import { pickKey } from '../model/Document.js';
import {
  DuplicateResolutionError,
  StoreUnavailableError,
  UniqueConstraintViolation,
} from '../errors.js';

/** The part of a schema the resolver needs. */
export type ResolutionTarget = Pick<SchemaDefinition, 'collection' | 'duplicateKey' | 'duplicateStrategy'>;

/** What `commit` should do with a row. */
export type ResolutionPlan =
  | { readonly action: 'insert' }
  | { readonly action: 'replace'; readonly existing: StoredDocument }
  | { readonly action: 'skip'; readonly existing: StoredDocument };

/** What actually happened, with the states the ledger needs to undo it. */
export type Resolution =
  | { readonly outcome: 'inserted'; readonly documentId: string; readonly before: null; readonly after: Document }
  | { readonly outcome: 'updated'; readonly documentId: string; readonly before: DocumentSnapshot; readonly after: Document }
  | { readonly outcome: 'skipped'; readonly documentId: string; readonly before: null; readonly after: null };

/**
 * Domain service applying a schema's duplicate strategy to normalized rows.
 *
 * Row-scoped failures surface as `DuplicateResolutionError`;
 * `StoreUnavailableError` passes through untouched so the batch can fail.
 */
export class DuplicateResolver {
  constructor(private readonly store: DocumentStore) {}

  /** Look the row's key up and decide what to do with it. */
  async resolve(target: ResolutionTarget, document: Document, rowNumber?: number): Promise<ResolutionPlan> {
    const existing = await this.findExisting(target, document, rowNumber);
    if (!existing) {
      if (target.duplicateStrategy === 'update') {
        throw new DuplicateResolutionError(
          'NO_MATCH_FOR_UPDATE',
          `No existing document matches the key (${target.duplicateKey.join(', ')}) for update`,
          { rowNumber },
        );
      }
      return { action: 'insert' };
    }
    return duplicatePath(target.duplicateStrategy, existing);
  }

  /** Carry out a plan against the store. */
  async commit(target: ResolutionTarget, plan: ResolutionPlan, document: Document, rowNumber?: number): Promise<Resolution> {
    switch (plan.action) {
      case 'skip':
        return { outcome: 'skipped', documentId: plan.existing.id, before: null, after: null };
      case 'replace':
        return this.replace(target, plan.existing, document, rowNumber);
      case 'insert':
        return this.insert(target, document, rowNumber);
    }
  }

  private async insert(target: ResolutionTarget, document: Document, rowNumber?: number): Promise<Resolution> {
    try {
      const documentId = await this.store.insert(target.collection, document);
      return { outcome: 'inserted', documentId, before: null, after: document };
    } catch (error) {
      if (!(error instanceof UniqueConstraintViolation)) {
        throw translateStoreError(error, rowNumber);
      }
    }

    // Someone else holds the key: treat the row as a duplicate after all.
    const existing = await this.findExisting(target, document, rowNumber);
    if (!existing) {
      throw new DuplicateResolutionError(
        'UNRESOLVED_DUPLICATE',
        'Insert hit a unique index but no document with the duplicate key could be found',
        { rowNumber },
      );
    }
    return this.commit(target, duplicatePath(target.duplicateStrategy, existing), document, rowNumber);
  }

  private async replace(
    target: ResolutionTarget,
    existing: StoredDocument,
    document: Document,
    rowNumber?: number,
  ): Promise<Resolution> {
    let replaced: boolean;
    try {
      replaced = await this.store.replace(target.collection, existing.id, document);
    } catch (error) {
      throw translateStoreError(error, rowNumber);
    }
    if (!replaced) {
      throw new DuplicateResolutionError(
        'DOCUMENT_VANISHED',
        `Matched document ${existing.id} no longer exists`,
        { rowNumber },
      );
    }
    return { outcome: 'updated', documentId: existing.id, before: existing.fields, after: document };
  }

  private async findExisting(
    target: ResolutionTarget,
    document: Document,
    rowNumber?: number,
  ): Promise<StoredDocument | null> {
    const key = pickKey(document, target.duplicateKey);
    if (!key) return null;
    try {
      return await this.store.findOne(target.collection, key);
    } catch (error) {
      throw translateStoreError(error, rowNumber);
    }
  }
}

function duplicatePath(strategy: DuplicateStrategy, existing: StoredDocument): ResolutionPlan {
  return strategy === 'skip' ? { action: 'skip', existing } : { action: 'replace', existing };
}

function translateStoreError(error: unknown, rowNumber?: number): Error {
  if (error instanceof StoreUnavailableError || error instanceof DuplicateResolutionError) return error;
  return new DuplicateResolutionError('STORE_WRITE_FAILED', 'The document store rejected the row', { rowNumber }, {
    cause: error,
  });
}

import type { AuditEntryDraft, AuditLogEntry } from '../model/AuditLogEntry.js';
import type { ErrorSummary, ImportBatch } from '../model/ImportBatch.js';
import type { DocumentStore } from '../ports/DocumentStore.js';
import type { MetadataStore } from '../ports/MetadataStore.js';
import { isForwardOperation } from '../model/AuditLogEntry.js';
import { committedCount } from '../model/ImportBatch.js';
import { BatchStatus, canTransition } from '../model/BatchStatus.js';
import { NotFoundError, RollbackError, errorMessage } from '../errors.js';

/** Outcome of one rollback run. */
export interface RollbackReport {
  readonly batchId: string;
  readonly restored: number;
  readonly failed: number;
  readonly errors: readonly ErrorSummary[];
  /** Batch as persisted after the run. */
  readonly batch: ImportBatch;
}

export type RollbackEligibility =
  | { readonly eligible: true; readonly entries: readonly AuditLogEntry[] }
  | { readonly eligible: false; readonly reason: string };

/**
 * Append-only log of the mutations each batch made, and the replay that undoes them.
 *
 * Sequences are assigned here and nowhere else. A batch is rollback-eligible
 * only while its log is complete: contiguous sequences, one forward entry per
 * committed row, and the states each compensation needs.
 */
export class AuditLedger {
  private readonly lastSequence = new Map<string, number>();
  private readonly rollingBack = new Set<string>();

  constructor(
    private readonly metadata: MetadataStore,
    private readonly documents: DocumentStore,
  ) {}

  /** Record an entry under the batch's next sequence number. */
  async append(draft: AuditEntryDraft): Promise<AuditLogEntry> {
    const previous = this.lastSequence.get(draft.batchId) ?? (await this.loadLastSequence(draft.batchId));
    const entry: AuditLogEntry = { ...draft, sequence: previous + 1, recordedAt: Date.now() };
    await this.metadata.appendAuditEntry(entry);
    this.lastSequence.set(draft.batchId, entry.sequence);
    return entry;
  }

  entries(batchId: string): Promise<readonly AuditLogEntry[]> {
    return this.metadata.listAuditEntries(batchId);
  }

  /** Drop cached state for a batch that no longer exists. */
  forget(batchId: string): void {
    this.lastSequence.delete(batchId);
  }

  async checkEligibility(batch: ImportBatch): Promise<RollbackEligibility> {
    if (batch.status !== BatchStatus.COMPLETED) {
      return { eligible: false, reason: `batch is ${batch.status}, only COMPLETED batches can be rolled back` };
    }

    const entries = await this.metadata.listAuditEntries(batch.id);
    let forward = 0;
    for (const [i, entry] of entries.entries()) {
      if (entry.batchId !== batch.id || entry.sequence !== i + 1) {
        return { eligible: false, reason: `audit log has a gap at sequence ${String(i + 1)}` };
      }
      if (!isForwardOperation(entry.operation)) continue;
      forward++;
      if (entry.operation === 'insert' && (entry.documentId === null || entry.after === null)) {
        return { eligible: false, reason: `insert entry ${String(entry.sequence)} is incomplete` };
      }
      if (entry.operation === 'update' && (entry.documentId === null || entry.before === null)) {
        return { eligible: false, reason: `update entry ${String(entry.sequence)} is incomplete` };
      }
    }

    const expected = committedCount(batch.counts);
    if (forward !== expected) {
      return { eligible: false, reason: `audit log has ${String(forward)} entries for ${String(expected)} committed rows` };
    }
    return { eligible: true, entries };
  }

  async canRollback(batchId: string): Promise<boolean> {
    const batch = await this.metadata.getBatch(batchId);
    if (!batch) return false;
    return (await this.checkEligibility(batch)).eligible;
  }

  /**
   * Undo a batch by replaying its forward entries in reverse.
   *
   * Best-effort: a failed compensation is reported and the replay goes on.
   * The batch becomes `ROLLED_BACK` only when nothing failed; otherwise it stays
   * `COMPLETED` with the attempt recorded, so the rollback can be run again.
   */
  async rollback(batchId: string): Promise<RollbackReport> {
    const batch = await this.metadata.getBatch(batchId);
    if (!batch) throw new NotFoundError('batch', batchId);
    if (this.rollingBack.has(batchId)) {
      throw new RollbackError('ROLLBACK_IN_PROGRESS', `Rollback of batch ${batchId} is already running`);
    }

    const eligibility = await this.checkEligibility(batch);
    if (!eligibility.eligible) {
      throw new RollbackError('NOT_ELIGIBLE', `Batch ${batchId} cannot be rolled back: ${eligibility.reason}`);
    }

    this.rollingBack.add(batchId);
    try {
      return await this.replay(batch, eligibility.entries);
    } finally {
      this.rollingBack.delete(batchId);
    }
  }

  private async replay(batch: ImportBatch, entries: readonly AuditLogEntry[]): Promise<RollbackReport> {
    const forward = entries.filter((entry) => isForwardOperation(entry.operation));
    const createdInBatch = new Set(
      forward.flatMap((entry) => (entry.operation === 'insert' && entry.documentId !== null ? [entry.documentId] : [])),
    );

    let restored = 0;
    const errors: ErrorSummary[] = [];

    for (const entry of [...forward].reverse()) {
      if (entry.operation === 'skip') continue;
      try {
        if (await this.compensate(entry, createdInBatch)) restored++;
      } catch (error) {
        errors.push({
          code: error instanceof RollbackError ? error.code : 'COMPENSATION_FAILED',
          message: `Could not undo ${entry.operation} of document ${entry.documentId ?? '?'}: ${errorMessage(error)}`,
          ...(entry.rowNumber !== null ? { rowNumber: entry.rowNumber } : {}),
        });
      }
    }

    const failed = errors.length;
    const next: ImportBatch =
      failed === 0 && canTransition(batch.status, BatchStatus.ROLLED_BACK)
        ? { ...batch, status: BatchStatus.ROLLED_BACK }
        : { ...batch, rollbackAttempts: [...batch.rollbackAttempts, { attemptedAt: Date.now(), restored, failed, errors }] };
    await this.metadata.saveBatch(next);

    return { batchId: batch.id, restored, failed, errors, batch: next };
  }

  /** Undo one forward entry. Resolves `false` when there was nothing left to undo. */
  private async compensate(entry: AuditLogEntry, createdInBatch: ReadonlySet<string>): Promise<boolean> {
    const documentId = entry.documentId;
    if (documentId === null) {
      throw new RollbackError('INCOMPLETE_ENTRY', `entry ${String(entry.sequence)} has no document id`);
    }

    if (entry.operation === 'insert') {
      // A document that is already gone counts as deleted, so a retried rollback converges.
      await this.documents.delete(entry.collection, documentId);
      await this.append({
        batchId: entry.batchId,
        operation: 'rollback_delete',
        collection: entry.collection,
        documentId,
        before: entry.after,
        after: null,
        rowNumber: entry.rowNumber,
      });
      return true;
    }

    if (entry.before === null) {
      throw new RollbackError('INCOMPLETE_ENTRY', `entry ${String(entry.sequence)} has no prior state`);
    }
    const replaced = await this.documents.replace(entry.collection, documentId, entry.before);
    if (!replaced) {
      // Created earlier in the same batch: its insert compensation removes it.
      if (createdInBatch.has(documentId)) return false;
      throw new RollbackError('DOCUMENT_MISSING', 'the document no longer exists');
    }
    await this.append({
      batchId: entry.batchId,
      operation: 'rollback_restore',
      collection: entry.collection,
      documentId,
      before: entry.after,
      after: entry.before,
      rowNumber: entry.rowNumber,
    });
    return true;
  }

  private async loadLastSequence(batchId: string): Promise<number> {
    const entries = await this.metadata.listAuditEntries(batchId);
    return entries.at(-1)?.sequence ?? 0;
  }
}

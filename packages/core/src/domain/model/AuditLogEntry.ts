import type { DocumentSnapshot } from './Document.js';

export type ForwardOperation = 'insert' | 'update' | 'skip';
export type CompensatingOperation = 'rollback_delete' | 'rollback_restore';
export type AuditOperation = ForwardOperation | CompensatingOperation;

/** One mutation (or deliberate non-mutation) recorded for a batch. Append-only. */
export interface AuditLogEntry {
  readonly batchId: string;
  /** 1-based, contiguous within the batch. */
  readonly sequence: number;
  readonly operation: AuditOperation;
  readonly collection: string;
  readonly documentId: string | null;
  /** Prior state in full, as read from the store. `null` for inserts. */
  readonly before: DocumentSnapshot | null;
  /** New state. `null` for skips and deletions. */
  readonly after: DocumentSnapshot | null;
  readonly rowNumber: number | null;
  readonly recordedAt: number;
}

/** Entry as handed to the ledger, before it assigns sequence and timestamp. */
export type AuditEntryDraft = Omit<AuditLogEntry, 'sequence' | 'recordedAt'>;

export function isForwardOperation(operation: AuditOperation): operation is ForwardOperation {
  return operation === 'insert' || operation === 'update' || operation === 'skip';
}

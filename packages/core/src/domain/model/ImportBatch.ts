import type { BatchStatus } from './BatchStatus.js';

/** User-facing description of a failure. Never carries a stack or raw driver message. */
export interface ErrorSummary {
  readonly code: string;
  readonly message: string;
  readonly rowNumber?: number;
  readonly column?: string;
  readonly field?: string;
}

export interface BatchCounts {
  readonly total: number;
  readonly inserted: number;
  readonly updated: number;
  readonly skipped: number;
  readonly errored: number;
}

/** Outcome of one rollback run that did not restore everything. */
export interface RollbackAttempt {
  readonly attemptedAt: number;
  readonly restored: number;
  readonly failed: number;
  readonly errors: readonly ErrorSummary[];
}

export interface BatchSource {
  /** File path or any label identifying the input. */
  readonly path: string;
  /** Content hash, when the caller computed one. */
  readonly hash?: string;
}

/** One execution of an import against one schema. */
export interface ImportBatch {
  readonly id: string;
  readonly schemaId: string;
  readonly source: BatchSource;
  readonly dataStartRow: number;
  readonly status: BatchStatus;
  readonly counts: BatchCounts;
  readonly startedAt: number;
  readonly endedAt: number | null;
  readonly errors: readonly ErrorSummary[];
  readonly rollbackAttempts: readonly RollbackAttempt[];
}

export const EMPTY_COUNTS: BatchCounts = { total: 0, inserted: 0, updated: 0, skipped: 0, errored: 0 };

/** Row outcomes that end up in `counts`. */
export type RowOutcome = 'inserted' | 'updated' | 'skipped' | 'errored';

export function incrementCount(counts: BatchCounts, outcome: RowOutcome): BatchCounts {
  return { ...counts, total: counts.total + 1, [outcome]: counts[outcome] + 1 };
}

/** Number of rows that produced a forward ledger entry. */
export function committedCount(counts: BatchCounts): number {
  return counts.inserted + counts.updated + counts.skipped;
}

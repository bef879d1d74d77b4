import type { Logger } from 'winston';
import type { ErrorSummary, ImportBatch, RowOutcome } from '../domain/model/ImportBatch.js';
import type { DataQualityIssue, RowIssue } from '../domain/model/DataQualityIssue.js';
import type { MetadataStore } from '../domain/ports/MetadataStore.js';
import { BatchStatus, canTransition, isFinished } from '../domain/model/BatchStatus.js';
import { incrementCount } from '../domain/model/ImportBatch.js';

/**
 * Mutable state of one running batch.
 *
 * Only the use case driving the batch mutates it. `batch` is the current
 * snapshot; `persist()` writes it to the metadata store. Quality issues are
 * buffered and written in chunks by `flushIssues()`.
 */
export class BatchContext {
  readonly abortController = new AbortController();
  private pendingIssues: DataQualityIssue[] = [];
  private current: ImportBatch;

  constructor(
    batch: ImportBatch,
    private readonly metadata: MetadataStore,
    private readonly logger: Logger,
  ) {
    this.current = batch;
  }

  get id(): string {
    return this.current.id;
  }

  get batch(): ImportBatch {
    return this.current;
  }

  get status(): BatchStatus {
    return this.current.status;
  }

  get cancelled(): boolean {
    return this.abortController.signal.aborted;
  }

  transitionTo(status: BatchStatus): void {
    if (!canTransition(this.current.status, status)) {
      throw new Error(`Invalid batch transition: ${this.current.status} → ${status}`);
    }
    this.logger.info('Batch status changed', { batchId: this.id, from: this.current.status, to: status });
    this.current = {
      ...this.current,
      status,
      endedAt: isFinished(status) ? Date.now() : this.current.endedAt,
    };
  }

  /** Move to `RUNNING` unless already past `CREATED`. Returns `true` when it moved. */
  start(): boolean {
    if (this.current.status !== BatchStatus.CREATED) return false;
    this.transitionTo(BatchStatus.RUNNING);
    return true;
  }

  record(outcome: RowOutcome): void {
    this.current = { ...this.current, counts: incrementCount(this.current.counts, outcome) };
  }

  addError(summary: ErrorSummary): void {
    this.current = { ...this.current, errors: [...this.current.errors, summary] };
  }

  addIssues(issues: readonly RowIssue[]): void {
    for (const issue of issues) {
      this.pendingIssues.push({ batchId: this.id, ...issue });
    }
  }

  async flushIssues(): Promise<void> {
    if (this.pendingIssues.length === 0) return;
    const issues = this.pendingIssues;
    this.pendingIssues = [];
    await this.metadata.saveQualityIssues(issues);
  }

  async persist(): Promise<void> {
    await this.metadata.saveBatch(this.current);
  }
}

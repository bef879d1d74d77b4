import { randomUUID } from 'node:crypto';
import type { BatchSource, ErrorSummary, ImportBatch } from '../../domain/model/ImportBatch.js';
import type { SchemaDefinition } from '../../domain/model/Schema.js';
import type { RawRow, RowStream } from '../../domain/ports/RowStream.js';
import type { Resolution } from '../../domain/services/DuplicateResolver.js';
import type { EngineContext } from '../EngineContext.js';
import { BatchContext } from '../BatchContext.js';
import { BatchStatus } from '../../domain/model/BatchStatus.js';
import { EMPTY_COUNTS } from '../../domain/model/ImportBatch.js';
import { ColumnMapper } from '../../domain/services/ColumnMapper.js';
import { IngestionError, StoreUnavailableError, errorMessage } from '../../domain/errors.js';

/** Input of `IngestionEngine.importRows()`. */
export interface ImportRequest {
  readonly schemaId: string;
  readonly rows: RowStream;
  readonly source: BatchSource;
  /** Overrides the schema's data start row for this import. */
  readonly dataStartRow?: number;
  /** Aborting it cancels the batch like `cancel()` does. */
  readonly signal?: AbortSignal;
}

const CANCELLED: ErrorSummary = { code: 'CANCELLED', message: 'Import was cancelled' };
const UNEXPECTED: ErrorSummary = { code: 'BATCH_FAILED', message: 'The import stopped on an unexpected error' };

/**
 * Use case: import every row of a stream under one schema as a new batch.
 *
 * Rows are handled one at a time in file order. Row-scoped failures are
 * recorded and skipped past. A missing required column fails the batch before
 * the first row; an unreachable store fails it wherever it happens. In both
 * cases the promise rejects with the typed error after the batch is persisted
 * as `FAILED`. A cancelled batch also ends `FAILED`, but the promise resolves.
 */
export class RunBatch {
  constructor(private readonly ctx: EngineContext) {}

  async execute(request: ImportRequest): Promise<ImportBatch> {
    const schema = await this.ctx.catalog.get(request.schemaId);
    const dataStartRow = request.dataStartRow ?? schema.dataStartRow;
    if (!Number.isInteger(dataStartRow) || dataStartRow < 1 || dataStartRow > 100) {
      throw new IngestionError('INVALID_REQUEST', `Data start row must be an integer between 1 and 100, got ${String(dataStartRow)}`);
    }

    const batchCtx = new BatchContext(
      {
        id: randomUUID(),
        schemaId: schema.id,
        source: request.source,
        dataStartRow,
        status: BatchStatus.CREATED,
        counts: EMPTY_COUNTS,
        startedAt: Date.now(),
        endedAt: null,
        errors: [],
        rollbackAttempts: [],
      },
      this.ctx.metadata,
      this.ctx.logger,
    );
    await batchCtx.persist();
    this.ctx.activeBatches.set(batchCtx.id, batchCtx);

    const onAbort = (): void => {
      batchCtx.abortController.abort();
    };
    if (request.signal?.aborted) onAbort();
    request.signal?.addEventListener('abort', onAbort, { once: true });

    this.ctx.logger.info('Batch created', { batchId: batchCtx.id, schemaId: schema.id, source: request.source.path });
    this.ctx.eventBus.emit({
      type: 'batch:created',
      batchId: batchCtx.id,
      schemaId: schema.id,
      source: request.source.path,
      timestamp: Date.now(),
    });

    try {
      return await this.ctx.pool.run(() => this.process(batchCtx, schema, request.rows));
    } finally {
      request.signal?.removeEventListener('abort', onAbort);
      this.ctx.activeBatches.delete(batchCtx.id);
      this.ctx.ledger.forget(batchCtx.id);
    }
  }

  private async process(batchCtx: BatchContext, schema: SchemaDefinition, rows: RowStream): Promise<ImportBatch> {
    try {
      if (batchCtx.cancelled) return await this.finishCancelled(batchCtx);

      const mapper = ColumnMapper.forLabels(await rows.columns(), schema, this.ctx.settings.fuzzyThreshold);
      this.ctx.logger.debug('Columns mapped', {
        batchId: batchCtx.id,
        mapped: mapper.mapping.mapped.length,
        unmapped: mapper.mapping.unmappedLabels,
        missing: mapper.mapping.missingFields,
      });

      let inChunk = 0;
      for await (const row of rows.rows(batchCtx.batch.dataStartRow)) {
        if (batchCtx.cancelled) break;
        if (batchCtx.start()) {
          await batchCtx.persist();
          this.ctx.eventBus.emit({ type: 'batch:started', batchId: batchCtx.id, timestamp: Date.now() });
        }

        await this.processRow(batchCtx, schema, mapper, row);

        if (++inChunk >= this.ctx.settings.chunkSize) {
          inChunk = 0;
          await this.checkpoint(batchCtx);
        }
      }

      if (batchCtx.cancelled) return await this.finishCancelled(batchCtx);
      return await this.finishCompleted(batchCtx, schema);
    } catch (error) {
      await this.finishFailed(batchCtx, error);
      throw error instanceof IngestionError ? error : new IngestionError(UNEXPECTED.code, UNEXPECTED.message, {}, { cause: error });
    }
  }

  private async processRow(
    batchCtx: BatchContext,
    schema: SchemaDefinition,
    mapper: ColumnMapper,
    row: RawRow,
  ): Promise<void> {
    const normalized = mapper.normalize(row);
    batchCtx.addIssues(normalized.issues);
    if (normalized.failure) {
      this.rowErrored(batchCtx, row.rowNumber, normalized.failure);
      return;
    }

    let resolution: Resolution;
    try {
      const plan = await this.ctx.resolver.resolve(schema, normalized.document, row.rowNumber);
      resolution = await this.ctx.resolver.commit(schema, plan, normalized.document, row.rowNumber);
    } catch (error) {
      if (error instanceof StoreUnavailableError) throw error;
      this.rowErrored(
        batchCtx,
        row.rowNumber,
        error instanceof IngestionError
          ? error
          : new IngestionError('ROW_FAILED', 'The row could not be stored', { rowNumber: row.rowNumber }, { cause: error }),
      );
      return;
    }

    try {
      await this.ctx.ledger.append({
        batchId: batchCtx.id,
        operation: resolution.outcome === 'inserted' ? 'insert' : resolution.outcome === 'updated' ? 'update' : 'skip',
        collection: schema.collection,
        documentId: resolution.documentId,
        before: resolution.before,
        after: resolution.after,
        rowNumber: row.rowNumber,
      });
    } catch (error) {
      // A committed row without its ledger entry would make the batch impossible to undo.
      throw error instanceof StoreUnavailableError
        ? error
        : new StoreUnavailableError(`Audit entry for row ${String(row.rowNumber)} could not be written`, { cause: error });
    }

    batchCtx.record(resolution.outcome);
    this.ctx.eventBus.emit({
      type: 'row:committed',
      batchId: batchCtx.id,
      rowNumber: row.rowNumber,
      outcome: resolution.outcome,
      documentId: resolution.documentId,
      timestamp: Date.now(),
    });
  }

  private rowErrored(batchCtx: BatchContext, rowNumber: number, error: IngestionError): void {
    const summary = { ...error.toSummary(), rowNumber };
    batchCtx.record('errored');
    batchCtx.addError(summary);
    this.ctx.logger.debug('Row errored', {
      batchId: batchCtx.id,
      rowNumber,
      code: summary.code,
      error: error.message,
      cause: error.cause === undefined ? undefined : errorMessage(error.cause),
    });
    this.ctx.eventBus.emit({ type: 'row:errored', batchId: batchCtx.id, rowNumber, error: summary, timestamp: Date.now() });
  }

  private async checkpoint(batchCtx: BatchContext): Promise<void> {
    await batchCtx.flushIssues();
    await batchCtx.persist();
    this.ctx.eventBus.emit({
      type: 'batch:progress',
      batchId: batchCtx.id,
      counts: batchCtx.batch.counts,
      timestamp: Date.now(),
    });
  }

  private async finishCompleted(batchCtx: BatchContext, schema: SchemaDefinition): Promise<ImportBatch> {
    // An empty file still passes through RUNNING.
    if (batchCtx.start()) {
      this.ctx.eventBus.emit({ type: 'batch:started', batchId: batchCtx.id, timestamp: Date.now() });
    }
    await batchCtx.flushIssues();
    batchCtx.transitionTo(BatchStatus.COMPLETED);
    await batchCtx.persist();

    try {
      await this.ctx.catalog.recordUsage(schema.id);
    } catch (error) {
      this.ctx.logger.warn('Schema usage could not be recorded', { schemaId: schema.id, error: errorMessage(error) });
    }

    const batch = batchCtx.batch;
    this.ctx.logger.info('Batch completed', { batchId: batch.id, counts: batch.counts });
    this.ctx.eventBus.emit({
      type: 'batch:completed',
      batchId: batch.id,
      counts: batch.counts,
      elapsedMs: (batch.endedAt ?? Date.now()) - batch.startedAt,
      timestamp: Date.now(),
    });
    return batch;
  }

  private async finishCancelled(batchCtx: BatchContext): Promise<ImportBatch> {
    await batchCtx.flushIssues();
    batchCtx.addError(CANCELLED);
    batchCtx.transitionTo(BatchStatus.FAILED);
    await batchCtx.persist();

    const batch = batchCtx.batch;
    this.ctx.logger.info('Batch cancelled', { batchId: batch.id, counts: batch.counts });
    this.ctx.eventBus.emit({ type: 'batch:failed', batchId: batch.id, error: CANCELLED, counts: batch.counts, timestamp: Date.now() });
    return batch;
  }

  private async finishFailed(batchCtx: BatchContext, error: unknown): Promise<void> {
    const summary = error instanceof IngestionError ? error.toSummary() : UNEXPECTED;
    this.ctx.logger.error('Batch failed', {
      batchId: batchCtx.id,
      code: summary.code,
      error: errorMessage(error),
      stack: error instanceof Error ? error.stack : undefined,
    });

    batchCtx.addError(summary);
    if (batchCtx.status === BatchStatus.CREATED || batchCtx.status === BatchStatus.RUNNING) {
      batchCtx.transitionTo(BatchStatus.FAILED);
    }
    try {
      await batchCtx.flushIssues();
      await batchCtx.persist();
    } catch (persistError) {
      this.ctx.logger.error('Failed batch could not be persisted', { batchId: batchCtx.id, error: errorMessage(persistError) });
    }

    this.ctx.eventBus.emit({
      type: 'batch:failed',
      batchId: batchCtx.id,
      error: summary,
      counts: batchCtx.batch.counts,
      timestamp: Date.now(),
    });
  }
}

import type { RollbackReport } from '../../domain/services/AuditLedger.js';
import type { EngineContext } from '../EngineContext.js';

/** Use case: undo a completed batch and report what could not be restored. */
export class RollbackBatch {
  constructor(private readonly ctx: EngineContext) {}

  async execute(batchId: string): Promise<RollbackReport> {
    this.ctx.logger.info('Rollback started', { batchId });
    const report = await this.ctx.ledger.rollback(batchId);
    this.ctx.ledger.forget(batchId);

    if (report.failed === 0) {
      this.ctx.logger.info('Batch rolled back', { batchId, restored: report.restored });
      this.ctx.eventBus.emit({ type: 'batch:rolled-back', batchId, restored: report.restored, timestamp: Date.now() });
    } else {
      this.ctx.logger.warn('Rollback incomplete', { batchId, restored: report.restored, failed: report.failed });
      this.ctx.eventBus.emit({
        type: 'rollback:partial',
        batchId,
        restored: report.restored,
        failed: report.failed,
        errors: report.errors,
        timestamp: Date.now(),
      });
    }
    return report;
  }
}

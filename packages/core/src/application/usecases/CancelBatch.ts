import type { EngineContext } from '../EngineContext.js';
import { NotFoundError } from '../../domain/errors.js';

/**
 * Use case: stop a batch that has not finished.
 *
 * The batch stops before its next row and ends `FAILED` with a `CANCELLED`
 * error; rows already committed stay. Returns `false` when the batch had
 * already finished.
 */
export class CancelBatch {
  constructor(private readonly ctx: EngineContext) {}

  async execute(batchId: string): Promise<boolean> {
    const active = this.ctx.activeBatches.get(batchId);
    if (active) {
      this.ctx.logger.info('Batch cancellation requested', { batchId });
      active.abortController.abort();
      return true;
    }
    if (!(await this.ctx.metadata.getBatch(batchId))) {
      throw new NotFoundError('batch', batchId);
    }
    return false;
  }
}

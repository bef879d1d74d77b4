import type { EngineContext } from '../EngineContext.js';

const DAY_MS = 24 * 60 * 60 * 1000;

/** Use case: delete finished batches older than the retention window, with their audit trail and issues. */
export class PurgeBatches {
  constructor(private readonly ctx: EngineContext) {}

  /** `olderThanMs` defaults to the configured retention. Returns the number of batches deleted. */
  async execute(olderThanMs?: number): Promise<number> {
    const cutoff = Date.now() - (olderThanMs ?? this.ctx.settings.retentionDays * DAY_MS);
    const deleted = await this.ctx.metadata.deleteBatchesBefore(cutoff);
    this.ctx.logger.info('Old batches purged', { deleted, cutoff: new Date(cutoff).toISOString() });
    return deleted;
  }
}

import type { SchemaDefinition, SchemaPatch } from '../../domain/model/Schema.js';
import type { SchemaProposal } from '../../domain/ports/SchemaNormalizer.js';
import type { EngineContext } from '../EngineContext.js';
import { validateColumnLabels } from '../../domain/model/Schema.js';
import { AIProcessingError, IngestionError } from '../../domain/errors.js';

/** User choices that override or complete the AI proposal. */
export type ProposeSchemaOptions = Omit<SchemaPatch, 'name' | 'fields'>;

/**
 * Use case: ask the AI normalizer for a schema covering a file's labels, then save it.
 *
 * Only `AIProcessingError` is retried, with exponential backoff:
 * `aiRetryDelayMs * 2^(attempt - 1)` between attempts.
 */
export class ProposeSchema {
  constructor(private readonly ctx: EngineContext) {}

  async execute(name: string, labels: readonly string[], options: ProposeSchemaOptions = {}): Promise<SchemaDefinition> {
    validateColumnLabels(labels);
    const proposal = await this.proposeWithRetry(labels.map((label) => label.trim()));

    return this.ctx.catalog.create({
      name,
      fields: proposal.fields,
      indexes: options.indexes ?? proposal.indexes,
      duplicateKey: options.duplicateKey ?? proposal.duplicateKey,
      duplicateStrategy: options.duplicateStrategy,
      dataStartRow: options.dataStartRow,
      collection: options.collection ?? proposal.collection,
    });
  }

  private async proposeWithRetry(labels: readonly string[]): Promise<SchemaProposal> {
    const normalizer = this.ctx.normalizer;
    if (!normalizer) {
      throw new IngestionError('AI_NOT_CONFIGURED', 'No schema normalizer is configured');
    }

    const maxAttempts = this.ctx.settings.aiMaxRetries;
    for (let attempt = 1; ; attempt++) {
      try {
        return await normalizer.propose(labels);
      } catch (error) {
        if (!(error instanceof AIProcessingError) || attempt >= maxAttempts) {
          this.ctx.logger.error('Schema proposal failed', { attempt, error: error instanceof Error ? error.message : String(error) });
          throw error;
        }
        const delay = this.ctx.settings.aiRetryDelayMs * Math.pow(2, attempt - 1);
        this.ctx.logger.warn('Schema proposal failed, retrying', { attempt, maxAttempts, delayMs: delay, error: error.message });
        await this.sleep(delay);
      }
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      setTimeout(resolve, ms);
    });
  }
}

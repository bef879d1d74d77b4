import type { Logger } from 'winston';
import type { IngestionSettings } from '../config.js';
import type { DocumentStore } from '../domain/ports/DocumentStore.js';
import type { MetadataStore } from '../domain/ports/MetadataStore.js';
import type { SchemaNormalizer } from '../domain/ports/SchemaNormalizer.js';
import type { BatchContext } from './BatchContext.js';
import { AuditLedger } from '../domain/services/AuditLedger.js';
import { DuplicateResolver } from '../domain/services/DuplicateResolver.js';
import { EventBus } from './EventBus.js';
import { SchemaCatalog } from './SchemaCatalog.js';
import { WorkerPool } from './WorkerPool.js';

/**
 * Collaborators and engine-wide state shared by every use case.
 *
 * Internal: not exported from the package. Per-batch state lives in
 * `BatchContext`; the only state shared between batches is the stores.
 */
export class EngineContext {
  readonly eventBus: EventBus;
  readonly catalog: SchemaCatalog;
  readonly ledger: AuditLedger;
  readonly resolver: DuplicateResolver;
  readonly pool: WorkerPool;
  /** Batches created and not yet finished, by id. */
  readonly activeBatches = new Map<string, BatchContext>();

  constructor(
    readonly settings: IngestionSettings,
    readonly logger: Logger,
    readonly metadata: MetadataStore,
    readonly documents: DocumentStore,
    readonly normalizer: SchemaNormalizer | null,
  ) {
    this.eventBus = new EventBus(logger);
    this.catalog = new SchemaCatalog(metadata, documents, this.eventBus, logger);
    this.ledger = new AuditLedger(metadata, documents);
    this.resolver = new DuplicateResolver(documents);
    this.pool = new WorkerPool(settings.maxConcurrentBatches);
  }
}

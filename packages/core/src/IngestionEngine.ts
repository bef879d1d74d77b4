import type { Logger } from 'winston';
import type { AuditLogEntry } from './domain/model/AuditLogEntry.js';
import type { DataQualityIssue } from './domain/model/DataQualityIssue.js';
import type { ImportBatch } from './domain/model/ImportBatch.js';
import type { SchemaDefinition, SchemaInput, SchemaPatch } from './domain/model/Schema.js';
import type { DocumentStore } from './domain/ports/DocumentStore.js';
import type { MetadataStore } from './domain/ports/MetadataStore.js';
import type { SchemaNormalizer } from './domain/ports/SchemaNormalizer.js';
import type { RollbackReport } from './domain/services/AuditLedger.js';
import type { EventType, EventPayload, DomainEvent } from './domain/events/DomainEvents.js';
import type { Env, IngestionSettings } from './config.js';
import type { ImportRequest } from './application/usecases/RunBatch.js';
import type { ProposeSchemaOptions } from './application/usecases/ProposeSchema.js';
import type { MappingPreview } from './application/usecases/PreviewMapping.js';
import type { SchemaMatch } from './application/SchemaCatalog.js';
import { DEFAULT_SETTINGS, loadSettings } from './config.js';
import { EngineContext } from './application/EngineContext.js';
import { RunBatch } from './application/usecases/RunBatch.js';
import { ProposeSchema } from './application/usecases/ProposeSchema.js';
import { RollbackBatch } from './application/usecases/RollbackBatch.js';
import { CancelBatch } from './application/usecases/CancelBatch.js';
import { PreviewMapping } from './application/usecases/PreviewMapping.js';
import { PurgeBatches } from './application/usecases/PurgeBatches.js';
import { NotFoundError } from './domain/errors.js';
import { InMemoryDocumentStore } from './infrastructure/stores/InMemoryDocumentStore.js';
import { InMemoryMetadataStore } from './infrastructure/stores/InMemoryMetadataStore.js';
import { createLogger } from './infrastructure/logging/createLogger.js';

/** Collaborators and tunables of an engine. Everything is optional. */
export interface IngestionEngineConfig {
  /** Target store for imported documents. Default: `InMemoryDocumentStore`. */
  readonly documents?: DocumentStore;
  /** Store for schemas, batches, audit entries and issues. Default: `InMemoryMetadataStore`. */
  readonly metadata?: MetadataStore;
  /** Needed only by `proposeSchema()`. */
  readonly normalizer?: SchemaNormalizer;
  readonly settings?: Partial<IngestionSettings>;
  /** Default: a winston console logger at `settings.logLevel`. */
  readonly logger?: Logger;
}

/** Default page size of `getHistory()`. */
export const DEFAULT_HISTORY_LIMIT = 50;

/**
 * Facade over schema templates, imports, audit trails and rollback.
 *
 * Delegates each operation to a use case in `application/usecases/`, all of
 * which share one `EngineContext`. Imports run through a fixed-size worker
 * pool; each batch reads its rows sequentially.
 *
 * @example
 * ```typescript
 * const engine = new IngestionEngine({ documents: new MongoDocumentStore(db) });
 * const schema = await engine.createSchema({
 *   name: 'Customers',
 *   collection: 'customers',
 *   fields: [{ column: 'Email', attribute: { field: 'email', type: 'String', required: true } }],
 *   duplicateKey: ['email'],
 *   duplicateStrategy: 'upsert',
 * });
 * const batch = await engine.importRows({ schemaId: schema.id, rows, source: { path: 'customers.csv' } });
 * ```
 */
export class IngestionEngine {
  private readonly ctx: EngineContext;

  constructor(config: IngestionEngineConfig = {}) {
    const settings: IngestionSettings = { ...DEFAULT_SETTINGS, ...config.settings };
    const logger = config.logger ?? createLogger({ level: settings.logLevel, silent: settings.logSilent });
    this.ctx = new EngineContext(
      settings,
      logger,
      config.metadata ?? new InMemoryMetadataStore(),
      config.documents ?? new InMemoryDocumentStore(),
      config.normalizer ?? null,
    );
  }

  /** Build an engine whose settings come from environment variables (see `loadSettings`). */
  static fromEnv(config: Omit<IngestionEngineConfig, 'settings'> = {}, env?: Env): IngestionEngine {
    return new IngestionEngine({ ...config, settings: loadSettings(env) });
  }

  get settings(): IngestionSettings {
    return this.ctx.settings;
  }

  // --- Schema templates ---

  /** Validate and save a template, then create its indexes. Throws `InvalidSchemaError`. */
  createSchema(input: SchemaInput): Promise<SchemaDefinition> {
    return this.ctx.catalog.create(input);
  }

  /** Let the AI normalizer draft a template for these labels, apply `options` over it, and save it. */
  proposeSchema(name: string, labels: readonly string[], options?: ProposeSchemaOptions): Promise<SchemaDefinition> {
    return new ProposeSchema(this.ctx).execute(name, labels, options);
  }

  updateSchema(id: string, patch: SchemaPatch): Promise<SchemaDefinition> {
    return this.ctx.catalog.update(id, patch);
  }

  /** Remove the template. Imported documents are not touched. */
  deleteSchema(id: string): Promise<void> {
    return this.ctx.catalog.delete(id);
  }

  getSchema(id: string): Promise<SchemaDefinition> {
    return this.ctx.catalog.get(id);
  }

  listSchemas(): Promise<readonly SchemaDefinition[]> {
    return this.ctx.catalog.list();
  }

  /** Saved templates able to import a file with these labels, best fit first. */
  resolveSchema(labels: readonly string[]): Promise<SchemaMatch[]> {
    return this.ctx.catalog.resolve(labels, this.ctx.settings.fuzzyThreshold);
  }

  previewMapping(schemaId: string, labels: readonly string[]): Promise<MappingPreview> {
    return new PreviewMapping(this.ctx).execute(schemaId, labels);
  }

  // --- Imports ---

  /**
   * Import a row stream as a new batch.
   *
   * Resolves with the finished batch (`COMPLETED`, or `FAILED` when cancelled).
   * Rejects with `SchemaMismatchError` or `StoreUnavailableError` after the
   * batch has been persisted as `FAILED`.
   */
  importRows(request: ImportRequest): Promise<ImportBatch> {
    return new RunBatch(this.ctx).execute(request);
  }

  /** Request cancellation of a running or queued batch. Returns `false` when it had already finished. */
  cancel(batchId: string): Promise<boolean> {
    return new CancelBatch(this.ctx).execute(batchId);
  }

  async getBatch(id: string): Promise<ImportBatch> {
    const active = this.ctx.activeBatches.get(id);
    if (active) return active.batch;
    const batch = await this.ctx.metadata.getBatch(id);
    if (!batch) throw new NotFoundError('batch', id);
    return batch;
  }

  /** Recent batches, most recent first. */
  getHistory(limit: number = DEFAULT_HISTORY_LIMIT): Promise<readonly ImportBatch[]> {
    return this.ctx.metadata.listBatches(limit);
  }

  async getAuditTrail(batchId: string): Promise<readonly AuditLogEntry[]> {
    await this.getBatch(batchId);
    return this.ctx.ledger.entries(batchId);
  }

  async getQualityIssues(batchId: string): Promise<readonly DataQualityIssue[]> {
    await this.getBatch(batchId);
    return this.ctx.metadata.listQualityIssues(batchId);
  }

  // --- Rollback and retention ---

  async canRollback(batchId: string): Promise<boolean> {
    if (this.ctx.activeBatches.has(batchId)) return false;
    return this.ctx.ledger.canRollback(batchId);
  }

  /** Undo a `COMPLETED` batch. Throws `RollbackError` when it is not eligible. */
  rollback(batchId: string): Promise<RollbackReport> {
    return new RollbackBatch(this.ctx).execute(batchId);
  }

  /** Delete finished batches older than `olderThanMs` (default: the retention window). */
  purgeBatches(olderThanMs?: number): Promise<number> {
    return new PurgeBatches(this.ctx).execute(olderThanMs);
  }

  // --- Events ---

  /** Subscribe to an event. Returns `this` for chaining. */
  on<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.ctx.eventBus.on(type, handler);
    return this;
  }

  off<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.ctx.eventBus.off(type, handler);
    return this;
  }

  /** Subscribe to all events regardless of type. Returns `this` for chaining. */
  onAny(handler: (event: DomainEvent) => void): this {
    this.ctx.eventBus.onAny(handler);
    return this;
  }

  offAny(handler: (event: DomainEvent) => void): this {
    this.ctx.eventBus.offAny(handler);
    return this;
  }
}

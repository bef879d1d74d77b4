import type { SchemaDefinition } from '../model/Schema.js';
import type { ImportBatch } from '../model/ImportBatch.js';
import type { AuditLogEntry } from '../model/AuditLogEntry.js';
import type { DataQualityIssue } from '../model/DataQualityIssue.js';

/**
 * Port for persisting schemas, batches, audit entries and quality issues.
 *
 * The default `InMemoryMetadataStore` is non-persistent. Backends that cannot
 * be reached raise `StoreUnavailableError`.
 */
export interface MetadataStore {
  /** Insert or replace a schema by id. */
  saveSchema(schema: SchemaDefinition): Promise<void>;
  getSchema(id: string): Promise<SchemaDefinition | null>;
  /** All schemas, most recently used first, never-used ones last by creation time. */
  listSchemas(): Promise<readonly SchemaDefinition[]>;
  /** Returns `false` when the schema did not exist. */
  deleteSchema(id: string): Promise<boolean>;

  /** Insert or replace a batch by id. */
  saveBatch(batch: ImportBatch): Promise<void>;
  getBatch(id: string): Promise<ImportBatch | null>;
  /** Most recently started first. */
  listBatches(limit?: number): Promise<readonly ImportBatch[]>;
  /**
   * Delete batches in a final state started before `cutoff` (epoch ms), together
   * with their audit entries and quality issues. Returns the number of batches deleted.
   */
  deleteBatchesBefore(cutoff: number): Promise<number>;

  appendAuditEntry(entry: AuditLogEntry): Promise<void>;
  /** Entries of one batch in sequence order. */
  listAuditEntries(batchId: string): Promise<readonly AuditLogEntry[]>;

  saveQualityIssues(issues: readonly DataQualityIssue[]): Promise<void>;
  /** Issues of one batch ordered by row number, then insertion. */
  listQualityIssues(batchId: string): Promise<readonly DataQualityIssue[]>;
}

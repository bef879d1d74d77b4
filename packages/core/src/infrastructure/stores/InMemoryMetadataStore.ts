import type { SchemaDefinition } from '../../domain/model/Schema.js';
import type { ImportBatch } from '../../domain/model/ImportBatch.js';
import type { AuditLogEntry } from '../../domain/model/AuditLogEntry.js';
import type { DataQualityIssue } from '../../domain/model/DataQualityIssue.js';
import type { MetadataStore } from '../../domain/ports/MetadataStore.js';
import { isFinished } from '../../domain/model/BatchStatus.js';

/** Non-persistent metadata store. Used as the default when no metadata store is provided. */
export class InMemoryMetadataStore implements MetadataStore {
  private readonly schemas = new Map<string, SchemaDefinition>();
  private readonly batches = new Map<string, { batch: ImportBatch; order: number }>();
  private readonly auditEntries = new Map<string, AuditLogEntry[]>();
  private readonly issues = new Map<string, DataQualityIssue[]>();
  private nextOrder = 0;

  saveSchema(schema: SchemaDefinition): Promise<void> {
    this.schemas.set(schema.id, schema);
    return Promise.resolve();
  }

  getSchema(id: string): Promise<SchemaDefinition | null> {
    return Promise.resolve(this.schemas.get(id) ?? null);
  }

  listSchemas(): Promise<readonly SchemaDefinition[]> {
    const schemas = [...this.schemas.values()].sort(
      (a, b) => (b.lastUsedAt ?? -1) - (a.lastUsedAt ?? -1) || b.createdAt - a.createdAt,
    );
    return Promise.resolve(schemas);
  }

  deleteSchema(id: string): Promise<boolean> {
    return Promise.resolve(this.schemas.delete(id));
  }

  saveBatch(batch: ImportBatch): Promise<void> {
    const order = this.batches.get(batch.id)?.order ?? this.nextOrder++;
    this.batches.set(batch.id, { batch, order });
    return Promise.resolve();
  }

  getBatch(id: string): Promise<ImportBatch | null> {
    return Promise.resolve(this.batches.get(id)?.batch ?? null);
  }

  listBatches(limit?: number): Promise<readonly ImportBatch[]> {
    const sorted = [...this.batches.values()]
      .sort((a, b) => b.batch.startedAt - a.batch.startedAt || b.order - a.order)
      .map((entry) => entry.batch);
    return Promise.resolve(limit === undefined ? sorted : sorted.slice(0, limit));
  }

  deleteBatchesBefore(cutoff: number): Promise<number> {
    let deleted = 0;
    for (const [id, { batch }] of this.batches) {
      if (!isFinished(batch.status) || batch.startedAt >= cutoff) continue;
      this.batches.delete(id);
      this.auditEntries.delete(id);
      this.issues.delete(id);
      deleted++;
    }
    return Promise.resolve(deleted);
  }

  appendAuditEntry(entry: AuditLogEntry): Promise<void> {
    const entries = this.auditEntries.get(entry.batchId) ?? [];
    entries.push(entry);
    this.auditEntries.set(entry.batchId, entries);
    return Promise.resolve();
  }

  listAuditEntries(batchId: string): Promise<readonly AuditLogEntry[]> {
    const entries = [...(this.auditEntries.get(batchId) ?? [])];
    return Promise.resolve(entries.sort((a, b) => a.sequence - b.sequence));
  }

  saveQualityIssues(issues: readonly DataQualityIssue[]): Promise<void> {
    for (const issue of issues) {
      const existing = this.issues.get(issue.batchId) ?? [];
      existing.push(issue);
      this.issues.set(issue.batchId, existing);
    }
    return Promise.resolve();
  }

  listQualityIssues(batchId: string): Promise<readonly DataQualityIssue[]> {
    const issues = [...(this.issues.get(batchId) ?? [])];
    // sort is stable: issues of the same row keep their insertion order
    return Promise.resolve(issues.sort((a, b) => a.rowNumber - b.rowNumber));
  }
}

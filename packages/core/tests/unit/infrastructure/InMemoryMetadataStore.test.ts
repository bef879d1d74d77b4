import { describe, it, expect } from 'vitest';
import type { ImportBatch } from '../../../src/domain/model/ImportBatch.js';
import type { DataQualityIssue } from '../../../src/domain/model/DataQualityIssue.js';
import { InMemoryMetadataStore } from '../../../src/infrastructure/stores/InMemoryMetadataStore.js';
import { BatchStatus } from '../../../src/domain/model/BatchStatus.js';
import { EMPTY_COUNTS } from '../../../src/domain/model/ImportBatch.js';
import { createSchemaDefinition } from '../../../src/domain/model/Schema.js';
import { customerSchema } from '../../helpers.js';

function makeBatch(id: string, startedAt: number, status: BatchStatus = BatchStatus.COMPLETED): ImportBatch {
  return {
    id,
    schemaId: 'schema-1',
    source: { path: `${id}.csv` },
    dataStartRow: 2,
    status,
    counts: EMPTY_COUNTS,
    startedAt,
    endedAt: null,
    errors: [],
    rollbackAttempts: [],
  };
}

function issue(batchId: string, rowNumber: number, column: string): DataQualityIssue {
  return { batchId, rowNumber, column, field: null, kind: 'missing_column', severity: 'warning', rawValue: null, suggestedFix: null };
}

describe('InMemoryMetadataStore', () => {
  it('should list schemas most recently used first, unused ones last', async () => {
    const store = new InMemoryMetadataStore();
    const unused = createSchemaDefinition(customerSchema, 'unused', 300);
    const old = { ...createSchemaDefinition(customerSchema, 'old', 100), lastUsedAt: 1000 };
    const recent = { ...createSchemaDefinition(customerSchema, 'recent', 200), lastUsedAt: 2000 };
    await store.saveSchema(unused);
    await store.saveSchema(old);
    await store.saveSchema(recent);

    expect((await store.listSchemas()).map((s) => s.id)).toEqual(['recent', 'old', 'unused']);
  });

  it('should list batches most recent first and honour the limit', async () => {
    const store = new InMemoryMetadataStore();
    await store.saveBatch(makeBatch('a', 100));
    await store.saveBatch(makeBatch('b', 300));
    await store.saveBatch(makeBatch('c', 200));

    expect((await store.listBatches()).map((b) => b.id)).toEqual(['b', 'c', 'a']);
    expect((await store.listBatches(2)).map((b) => b.id)).toEqual(['b', 'c']);
  });

  it('should replace a batch saved twice', async () => {
    const store = new InMemoryMetadataStore();
    await store.saveBatch(makeBatch('a', 100, BatchStatus.RUNNING));
    await store.saveBatch(makeBatch('a', 100, BatchStatus.COMPLETED));

    expect(await store.listBatches()).toHaveLength(1);
    expect((await store.getBatch('a'))?.status).toBe(BatchStatus.COMPLETED);
  });

  it('should delete only finished batches older than the cutoff, with their records', async () => {
    const store = new InMemoryMetadataStore();
    await store.saveBatch(makeBatch('old', 100));
    await store.saveBatch(makeBatch('running', 100, BatchStatus.RUNNING));
    await store.saveBatch(makeBatch('new', 500));
    await store.saveQualityIssues([issue('old', 2, 'A')]);

    expect(await store.deleteBatchesBefore(200)).toBe(1);
    expect(await store.getBatch('old')).toBeNull();
    expect(await store.listQualityIssues('old')).toEqual([]);
    expect((await store.listBatches()).map((b) => b.id)).toEqual(['new', 'running']);
  });

  it('should return issues in row order, keeping the order within a row', async () => {
    const store = new InMemoryMetadataStore();
    await store.saveQualityIssues([issue('a', 3, 'X'), issue('a', 2, 'Y')]);
    await store.saveQualityIssues([issue('a', 2, 'Z')]);

    expect((await store.listQualityIssues('a')).map((i) => `${String(i.rowNumber)}${i.column}`)).toEqual(['2Y', '2Z', '3X']);
  });
});

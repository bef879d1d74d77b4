import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { Sequelize } from 'sequelize';
import type { AuditLogEntry, DataQualityIssue, ImportBatch, SchemaDefinition } from '@tabingest/core';
import { SQLite3Wrapper } from './better-sqlite3-adapter.js';

export function createSqliteSequelize(dbPath: string): Sequelize {
  return new Sequelize({
    dialect: 'sqlite',
    storage: dbPath,
    logging: false,
    dialectModule: { Database: SQLite3Wrapper },
    pool: {
      max: 1,
      min: 1,
      idle: 30000,
      acquire: 60000,
      evict: 30000,
    },
  });
}

export function tempDbPath(): string {
  return path.join(os.tmpdir(), `test-seq-${String(Date.now())}-${String(Math.random())}.sqlite`);
}

export function removeFile(file: string): void {
  if (fs.existsSync(file)) fs.unlinkSync(file);
}

export function createSchema(overrides?: Partial<SchemaDefinition>): SchemaDefinition {
  return {
    id: 'schema-001',
    name: 'Customers',
    fields: [
      { column: 'Email', attribute: { field: 'email', type: 'String', description: 'Contact email', required: true } },
      { column: 'Joined', attribute: { field: 'joined', type: 'Date', description: '', required: false } },
    ],
    indexes: [{ field: 'email', kind: 'unique', reason: 'duplicate key' }],
    duplicateKey: ['email'],
    duplicateStrategy: 'upsert',
    dataStartRow: 2,
    collection: 'customers',
    usageCount: 0,
    lastUsedAt: null,
    createdAt: 1700000000000,
    updatedAt: 1700000000000,
    ...overrides,
  };
}

export function createBatch(overrides?: Partial<ImportBatch>): ImportBatch {
  return {
    id: 'batch-001',
    schemaId: 'schema-001',
    source: { path: 'customers.csv' },
    dataStartRow: 2,
    status: 'COMPLETED',
    counts: { total: 3, inserted: 2, updated: 0, skipped: 0, errored: 1 },
    startedAt: 1700000000000,
    endedAt: 1700000005000,
    errors: [{ code: 'MISSING_REQUIRED_VALUE', message: "Row 4: required column 'Email' is empty", rowNumber: 4, column: 'Email', field: 'email' }],
    rollbackAttempts: [],
    ...overrides,
  };
}

export function createEntry(sequence: number, overrides?: Partial<AuditLogEntry>): AuditLogEntry {
  return {
    batchId: 'batch-001',
    sequence,
    operation: 'insert',
    collection: 'customers',
    documentId: `doc-${String(sequence)}`,
    before: null,
    after: { email: `user${String(sequence)}@example.com` },
    rowNumber: sequence + 1,
    recordedAt: 1700000001000 + sequence,
    ...overrides,
  };
}

export function createIssue(rowNumber: number, overrides?: Partial<DataQualityIssue>): DataQualityIssue {
  return {
    batchId: 'batch-001',
    rowNumber,
    column: 'Joined',
    field: 'joined',
    kind: 'conversion_failed',
    severity: 'error',
    rawValue: 'not a date',
    suggestedFix: 'Enter a valid Date value',
    ...overrides,
  };
}

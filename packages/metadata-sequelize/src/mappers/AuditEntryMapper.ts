import { z } from 'zod';
import type { AuditLogEntry } from '@tabingest/core';
import type { AuditEntryCreationRow, AuditEntryRow } from '../models/AuditEntryModel.js';
import { documentJson, encodeDocument } from '../utils/documentJson.js';
import { jsonColumn } from '../utils/parseJson.js';

const operation = z.enum(['insert', 'update', 'skip', 'rollback_delete', 'rollback_restore']);

export function toRow(entry: AuditLogEntry): AuditEntryCreationRow {
  return {
    batchId: entry.batchId,
    sequence: entry.sequence,
    operation: entry.operation,
    collection: entry.collection,
    documentId: entry.documentId,
    before: encodeDocument(entry.before),
    after: encodeDocument(entry.after),
    rowNumber: entry.rowNumber,
    recordedAt: entry.recordedAt,
  };
}

export function toDomain(row: AuditEntryRow): AuditLogEntry {
  return {
    batchId: row.batchId,
    sequence: row.sequence,
    operation: operation.parse(row.operation),
    collection: row.collection,
    documentId: row.documentId,
    before: jsonColumn(documentJson, row.before),
    after: jsonColumn(documentJson, row.after),
    rowNumber: row.rowNumber,
    recordedAt: Number(row.recordedAt),
  };
}

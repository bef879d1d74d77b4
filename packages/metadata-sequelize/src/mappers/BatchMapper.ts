import { z } from 'zod';
import { BatchStatus } from '@tabingest/core';
import type { ImportBatch } from '@tabingest/core';
import type { BatchCreationRow, BatchRow } from '../models/BatchModel.js';
import { jsonColumn } from '../utils/parseJson.js';

const errorSummary = z.object({
  code: z.string(),
  message: z.string(),
  rowNumber: z.number().optional(),
  column: z.string().optional(),
  field: z.string().optional(),
});

const countsJson = z.object({
  total: z.number(),
  inserted: z.number(),
  updated: z.number(),
  skipped: z.number(),
  errored: z.number(),
});

const rollbackAttemptsJson = z.array(
  z.object({
    attemptedAt: z.number(),
    restored: z.number(),
    failed: z.number(),
    errors: z.array(errorSummary),
  }),
);

export function toRow(batch: ImportBatch): BatchCreationRow {
  return {
    id: batch.id,
    schemaId: batch.schemaId,
    sourcePath: batch.source.path,
    sourceHash: batch.source.hash ?? null,
    dataStartRow: batch.dataStartRow,
    status: batch.status,
    counts: batch.counts,
    startedAt: batch.startedAt,
    endedAt: batch.endedAt,
    errors: batch.errors,
    rollbackAttempts: batch.rollbackAttempts,
  };
}

export function toDomain(row: BatchRow): ImportBatch {
  return {
    id: row.id,
    schemaId: row.schemaId,
    source: row.sourceHash === null ? { path: row.sourcePath } : { path: row.sourcePath, hash: row.sourceHash },
    dataStartRow: row.dataStartRow,
    status: z.nativeEnum(BatchStatus).parse(row.status),
    counts: jsonColumn(countsJson, row.counts),
    startedAt: Number(row.startedAt),
    endedAt: row.endedAt === null ? null : Number(row.endedAt),
    errors: jsonColumn(z.array(errorSummary), row.errors),
    rollbackAttempts: jsonColumn(rollbackAttemptsJson, row.rollbackAttempts),
  };
}

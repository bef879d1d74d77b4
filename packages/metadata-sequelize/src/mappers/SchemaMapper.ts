import { z } from 'zod';
import type { SchemaDefinition } from '@tabingest/core';
import type { SchemaRow } from '../models/SchemaModel.js';
import { jsonColumn } from '../utils/parseJson.js';

const fieldsJson = z.array(
  z.object({
    column: z.string(),
    attribute: z.object({
      field: z.string(),
      type: z.enum(['String', 'Number', 'Date', 'Boolean']),
      description: z.string(),
      required: z.boolean(),
    }),
  }),
);

const indexesJson = z.array(
  z.object({
    field: z.string(),
    kind: z.enum(['unique', 'ascending', 'descending', 'text']),
    reason: z.string(),
  }),
);

const duplicateStrategy = z.enum(['skip', 'update', 'upsert']);

export function toRow(schema: SchemaDefinition): SchemaRow {
  return {
    id: schema.id,
    name: schema.name,
    collection: schema.collection,
    fields: schema.fields,
    indexes: schema.indexes,
    duplicateKey: schema.duplicateKey,
    duplicateStrategy: schema.duplicateStrategy,
    dataStartRow: schema.dataStartRow,
    usageCount: schema.usageCount,
    lastUsedAt: schema.lastUsedAt,
    createdAt: schema.createdAt,
    updatedAt: schema.updatedAt,
  };
}

export function toDomain(row: SchemaRow): SchemaDefinition {
  return {
    id: row.id,
    name: row.name,
    collection: row.collection,
    fields: jsonColumn(fieldsJson, row.fields),
    indexes: jsonColumn(indexesJson, row.indexes),
    duplicateKey: jsonColumn(z.array(z.string()), row.duplicateKey),
    duplicateStrategy: duplicateStrategy.parse(row.duplicateStrategy),
    dataStartRow: row.dataStartRow,
    usageCount: row.usageCount,
    // BIGINT columns come back as strings on some dialects
    lastUsedAt: row.lastUsedAt === null ? null : Number(row.lastUsedAt),
    createdAt: Number(row.createdAt),
    updatedAt: Number(row.updatedAt),
  };
}

import { z } from 'zod';
import { InvalidSchemaError } from '../errors.js';

/** Supported target types for a normalized field. */
export type AttributeType = 'String' | 'Number' | 'Date' | 'Boolean';

export const ATTRIBUTE_TYPES: readonly AttributeType[] = ['String', 'Number', 'Date', 'Boolean'];

/** Describes one normalized field of the target document. */
export interface AttributeDefinition {
  /** Normalized field name used as the document key. */
  readonly field: string;
  readonly type: AttributeType;
  readonly description: string;
  /** When `true`, a missing column aborts the batch and an empty cell errors the row. */
  readonly required: boolean;
}

/** Maps one original column label to the attribute it feeds. */
export interface FieldMapping {
  readonly column: string;
  readonly attribute: AttributeDefinition;
}

export type IndexKind = 'unique' | 'ascending' | 'descending' | 'text';

/** Declarative index on the target collection. */
export interface IndexDefinition {
  readonly field: string;
  readonly kind: IndexKind;
  readonly reason: string;
}

/**
 * What happens to a row whose duplicate key matches an existing document.
 *
 * - `skip`: leave the existing document untouched.
 * - `update`: replace a matching document; rows without a match are errored.
 * - `upsert`: replace a matching document, insert otherwise.
 */
export type DuplicateStrategy = 'skip' | 'update' | 'upsert';

/** A reusable schema template. */
export interface SchemaDefinition {
  readonly id: string;
  readonly name: string;
  /** Mappings in authored column order. */
  readonly fields: readonly FieldMapping[];
  readonly indexes: readonly IndexDefinition[];
  /** Field names that identify "the same" document across imports. */
  readonly duplicateKey: readonly string[];
  readonly duplicateStrategy: DuplicateStrategy;
  /** 1-based sheet row of the first data row. */
  readonly dataStartRow: number;
  readonly collection: string;
  readonly usageCount: number;
  readonly lastUsedAt: number | null;
  readonly createdAt: number;
  readonly updatedAt: number;
}

export const DEFAULT_DATA_START_ROW = 2;
export const MAX_COLUMNS = 1000;
const RESERVED_SCHEMA_NAMES = new Set(['admin', 'root', 'system', 'default', 'null', 'undefined']);

const attributeSchema = z.object({
  field: z
    .string()
    .regex(/^[A-Za-z_][A-Za-z0-9_]{0,254}$/, 'must start with a letter or underscore and contain only letters, digits and underscores'),
  type: z.enum(['String', 'Number', 'Date', 'Boolean']),
  description: z.string().default(''),
  required: z.boolean().default(false),
});

const fieldMappingSchema = z.object({
  column: z.string().trim().min(1, 'must not be empty').max(255, 'must be at most 255 characters'),
  attribute: attributeSchema,
});

const indexSchema = z.object({
  field: z.string().min(1),
  kind: z.enum(['unique', 'ascending', 'descending', 'text']),
  reason: z.string().default(''),
});

const schemaNameSchema = z
  .string()
  .trim()
  .regex(/^[A-Za-z0-9_\s-]{1,100}$/, 'must be 1-100 letters, digits, spaces, hyphens or underscores')
  .refine((name) => !RESERVED_SCHEMA_NAMES.has(name.toLowerCase()), { message: 'is a reserved name' });

const collectionSchema = z
  .string()
  .trim()
  .regex(/^[A-Za-z0-9_-]{1,64}$/, 'must be 1-64 letters, digits, hyphens or underscores');

/** Validates user or AI supplied input for a new schema template. */
export const schemaInputSchema = z.object({
  name: schemaNameSchema,
  fields: z.array(fieldMappingSchema).min(1, 'must contain at least one column').max(MAX_COLUMNS),
  indexes: z.array(indexSchema).default([]),
  duplicateKey: z.array(z.string().min(1)).default([]),
  duplicateStrategy: z.enum(['skip', 'update', 'upsert']).default('skip'),
  dataStartRow: z.number().int().min(1).max(100).default(DEFAULT_DATA_START_ROW),
  collection: collectionSchema,
});

/** Input for a new template. Optional parts take their defaults. */
export interface SchemaInput {
  readonly name: string;
  readonly fields: readonly {
    readonly column: string;
    readonly attribute: {
      readonly field: string;
      readonly type: AttributeType;
      readonly description?: string;
      readonly required?: boolean;
    };
  }[];
  readonly indexes?: readonly { readonly field: string; readonly kind: IndexKind; readonly reason?: string }[];
  readonly duplicateKey?: readonly string[];
  readonly duplicateStrategy?: DuplicateStrategy;
  readonly dataStartRow?: number;
  readonly collection: string;
}

/** Fields an edit may change. Identity, usage and timestamps are managed by the catalog. */
export type SchemaPatch = Partial<SchemaInput>;

type ParsedSchemaInput = z.output<typeof schemaInputSchema>;

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path} ${issue.message}` : issue.message;
  });
}

/** Cross-field rules that zod cannot express per property. */
function invariantIssues(input: ParsedSchemaInput): string[] {
  const issues: string[] = [];

  const seenColumns = new Set<string>();
  const seenFields = new Set<string>();
  for (const mapping of input.fields) {
    const column = mapping.column.toLowerCase();
    if (seenColumns.has(column)) issues.push(`duplicate column label '${mapping.column}'`);
    seenColumns.add(column);

    if (seenFields.has(mapping.attribute.field)) issues.push(`duplicate field name '${mapping.attribute.field}'`);
    seenFields.add(mapping.attribute.field);
  }

  for (const field of input.duplicateKey) {
    if (!seenFields.has(field)) issues.push(`duplicate key references unknown field '${field}'`);
  }
  for (const index of input.indexes) {
    if (!seenFields.has(index.field)) issues.push(`index references unknown field '${index.field}'`);
  }

  return issues;
}

function parseInput(input: unknown): ParsedSchemaInput {
  const result = schemaInputSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidSchemaError(formatIssues(result.error));
  }
  const issues = invariantIssues(result.data);
  if (issues.length > 0) {
    throw new InvalidSchemaError(issues);
  }
  return result.data;
}

/** Validate input and build a fresh template. Throws `InvalidSchemaError` listing every problem. */
export function createSchemaDefinition(input: SchemaInput, id: string, now: number): SchemaDefinition {
  const parsed = parseInput(input);
  return {
    id,
    ...parsed,
    usageCount: 0,
    lastUsedAt: null,
    createdAt: now,
    updatedAt: now,
  };
}

/** Apply an edit, re-validating the whole result. */
export function applySchemaPatch(schema: SchemaDefinition, patch: SchemaPatch, now: number): SchemaDefinition {
  const merged: SchemaInput = {
    name: patch.name ?? schema.name,
    fields: patch.fields ?? schema.fields,
    indexes: patch.indexes ?? schema.indexes,
    duplicateKey: patch.duplicateKey ?? schema.duplicateKey,
    duplicateStrategy: patch.duplicateStrategy ?? schema.duplicateStrategy,
    dataStartRow: patch.dataStartRow ?? schema.dataStartRow,
    collection: patch.collection ?? schema.collection,
  };
  const parsed = parseInput(merged);
  return { ...schema, ...parsed, updatedAt: now };
}

export function recordSchemaUsage(schema: SchemaDefinition, now: number): SchemaDefinition {
  return { ...schema, usageCount: schema.usageCount + 1, lastUsedAt: now, updatedAt: now };
}

export function fieldNames(schema: Pick<SchemaDefinition, 'fields'>): string[] {
  return schema.fields.map((mapping) => mapping.attribute.field);
}

export function requiredFields(schema: Pick<SchemaDefinition, 'fields'>): string[] {
  return schema.fields.filter((mapping) => mapping.attribute.required).map((mapping) => mapping.attribute.field);
}

/** Check the column labels of a file before they are sent for normalization. */
export function validateColumnLabels(labels: readonly string[]): void {
  const issues: string[] = [];
  if (labels.length === 0) issues.push('at least one column label is required');
  if (labels.length > MAX_COLUMNS) issues.push(`too many columns (max ${String(MAX_COLUMNS)})`);

  const seen = new Set<string>();
  labels.forEach((label, i) => {
    const trimmed = label.trim();
    if (trimmed === '') {
      issues.push(`column ${String(i + 1)} has an empty label`);
      return;
    }
    if (trimmed.length > 255) issues.push(`column ${String(i + 1)} label is longer than 255 characters`);
    const key = trimmed.toLowerCase();
    if (seen.has(key)) issues.push(`duplicate column label '${trimmed}'`);
    seen.add(key);
  });

  if (issues.length > 0) throw new InvalidSchemaError(issues);
}

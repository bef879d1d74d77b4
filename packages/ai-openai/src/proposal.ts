import { z } from 'zod';
import { AIProcessingError, ATTRIBUTE_TYPES } from '@tabingest/core';
import type { FieldMapping, IndexDefinition, SchemaProposal } from '@tabingest/core';

const attributeType = z.string().transform((value, ctx) => {
  const type = ATTRIBUTE_TYPES.find((candidate) => candidate.toLowerCase() === value.trim().toLowerCase());
  if (!type) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown data type '${value}'` });
    return z.NEVER;
  }
  return type;
});

/** Shape the model is asked to answer with. */
export const aiResponseSchema = z.object({
  normalized_attributes: z.record(
    z.object({
      field_name: z.string().trim().min(1),
      data_type: attributeType,
      description: z.string().default(''),
      is_required: z.boolean().default(false),
    }),
  ),
  suggested_indexes: z.array(
    z.object({
      field_names: z.union([z.string(), z.array(z.string())]).transform((names) => (typeof names === 'string' ? [names] : names)),
      index_type: z.enum(['unique', 'ascending', 'descending', 'text']),
      reason: z.string().default(''),
    }),
  ),
  duplicate_detection_columns: z.array(z.string()),
  collection_name: z.string(),
});

export type AIResponse = z.output<typeof aiResponseSchema>;

/** A valid field name: letters, digits and underscores, not starting with a digit. */
export function sanitizeFieldName(name: string): string {
  const cleaned = name
    .trim()
    .replace(/[^A-Za-z0-9_]+/g, '_')
    .replace(/^_+|_+$/g, '');
  if (cleaned === '') return 'field';
  return (/^[0-9]/.test(cleaned) ? `f_${cleaned}` : cleaned).slice(0, 255);
}

export function sanitizeCollectionName(name: string): string {
  return name
    .trim()
    .replace(/[^A-Za-z0-9_-]+/g, '_')
    .replace(/^_+|_+$/g, '')
    .slice(0, 64);
}

function uniqueName(name: string, used: Set<string>): string {
  let candidate = name;
  for (let n = 2; used.has(candidate); n++) candidate = `${name}_${String(n)}`;
  used.add(candidate);
  return candidate;
}

/**
 * Turn a validated AI response into a proposal for the given labels.
 *
 * Fields follow label order; labels the response does not cover are left out.
 * Index and duplicate-key entries may name either a column label or a field;
 * entries that resolve to no proposed field are dropped, and so are indexes
 * over more than one field.
 */
export function toProposal(labels: readonly string[], response: AIResponse): SchemaProposal {
  const byLabel = new Map(Object.entries(response.normalized_attributes).map(([label, attribute]) => [label.trim(), attribute]));
  const used = new Set<string>();
  const fields: FieldMapping[] = [];
  const aliases = new Map<string, string>();

  for (const label of labels) {
    const attribute = byLabel.get(label.trim());
    if (!attribute) continue;
    const field = uniqueName(sanitizeFieldName(attribute.field_name), used);
    fields.push({
      column: label,
      attribute: { field, type: attribute.data_type, description: attribute.description, required: attribute.is_required },
    });
    aliases.set(label.trim(), field);
    if (!aliases.has(attribute.field_name)) aliases.set(attribute.field_name, field);
  }

  if (fields.length === 0) {
    throw new AIProcessingError('The AI response maps none of the columns');
  }

  const resolve = (name: string): string | undefined => aliases.get(name.trim()) ?? (used.has(name) ? name : undefined);

  const duplicateKey = [
    ...new Set(response.duplicate_detection_columns.map(resolve).filter((field): field is string => field !== undefined)),
  ];

  const indexes: IndexDefinition[] = [];
  for (const suggestion of response.suggested_indexes) {
    const [name, ...rest] = suggestion.field_names;
    const field = name === undefined || rest.length > 0 ? undefined : resolve(name);
    if (field === undefined) continue;
    if (indexes.some((index) => index.field === field && index.kind === suggestion.index_type)) continue;
    indexes.push({ field, kind: suggestion.index_type, reason: suggestion.reason });
  }

  const collection = sanitizeCollectionName(response.collection_name);
  if (collection === '') {
    throw new AIProcessingError('The AI response has no usable collection name');
  }

  return { fields, indexes, duplicateKey, collection };
}

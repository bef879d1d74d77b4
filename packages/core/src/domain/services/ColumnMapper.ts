import type { FieldMapping, SchemaDefinition } from '../model/Schema.js';
import type { RawRow } from '../ports/RowStream.js';
import type { Document, FieldValue } from '../model/Document.js';
import type { RowIssue } from '../model/DataQualityIssue.js';
import { describeCell, isEmptyCell } from '../model/CellValue.js';
import { DataConversionError, IngestionError, SchemaMismatchError } from '../errors.js';
import { coerceCell } from './TypeCoercion.js';
import { DEFAULT_FUZZY_THRESHOLD, editDistance, similarity } from './similarity.js';

export type MatchKind = 'exact' | 'fuzzy';

/** A file column bound to a schema field. */
export interface MappedColumn {
  /** Label as it appears in the file. */
  readonly label: string;
  readonly field: string;
  /** Label the schema was authored with. */
  readonly schemaColumn: string;
  readonly match: MatchKind;
  readonly score: number;
}

/** How a file's labels line up with a schema. */
export interface ColumnMapping {
  /** In schema field order. */
  readonly mapped: readonly MappedColumn[];
  /** File labels that no field claimed, in file order. */
  readonly unmappedLabels: readonly string[];
  /** Schema fields with no label, in schema order. */
  readonly missingFields: readonly string[];
  /** The subset of `missingFields` that are required. */
  readonly missingRequired: readonly string[];
}

interface Candidate {
  readonly position: number;
  readonly score: number;
  readonly distance: number;
}

function isBetter(candidate: Candidate, best: Candidate | undefined): boolean {
  if (!best) return true;
  if (candidate.score !== best.score) return candidate.score > best.score;
  if (candidate.distance !== best.distance) return candidate.distance < best.distance;
  return candidate.position < best.position;
}

/**
 * Match file labels to schema fields.
 *
 * An exact pass (labels equal after trimming, first occurrence wins) runs for
 * every field before the fuzzy pass, which scores each still-free label against
 * both the field's authored column and its field name. Ties go to the smaller
 * edit distance, then to the earlier file position, so the outcome is
 * independent of anything but the inputs.
 */
export function resolveColumnMapping(
  labels: readonly string[],
  schema: Pick<SchemaDefinition, 'fields'>,
  threshold: number = DEFAULT_FUZZY_THRESHOLD,
): ColumnMapping {
  const taken = new Set<number>();
  const assigned = new Map<string, MappedColumn>();
  const trimmed = labels.map((label) => label.trim());

  for (const mapping of schema.fields) {
    const column = mapping.column.trim();
    const position = trimmed.findIndex((label, i) => !taken.has(i) && label === column);
    const label = labels[position];
    if (label === undefined) continue;

    taken.add(position);
    assigned.set(mapping.attribute.field, {
      label,
      field: mapping.attribute.field,
      schemaColumn: mapping.column,
      match: 'exact',
      score: 1,
    });
  }

  for (const mapping of schema.fields) {
    if (assigned.has(mapping.attribute.field)) continue;

    let best: Candidate | undefined;
    labels.forEach((label, position) => {
      if (taken.has(position)) return;
      const score = Math.max(similarity(label, mapping.column), similarity(label, mapping.attribute.field));
      if (score < threshold) return;
      const distance = Math.min(editDistance(label, mapping.column), editDistance(label, mapping.attribute.field));
      const candidate = { position, score, distance };
      if (isBetter(candidate, best)) best = candidate;
    });

    const label = best ? labels[best.position] : undefined;
    if (!best || label === undefined) continue;

    taken.add(best.position);
    assigned.set(mapping.attribute.field, {
      label,
      field: mapping.attribute.field,
      schemaColumn: mapping.column,
      match: 'fuzzy',
      score: best.score,
    });
  }

  const mapped: MappedColumn[] = [];
  const missingFields: string[] = [];
  const missingRequired: string[] = [];
  for (const mapping of schema.fields) {
    const column = assigned.get(mapping.attribute.field);
    if (column) {
      mapped.push(column);
    } else {
      missingFields.push(mapping.attribute.field);
      if (mapping.attribute.required) missingRequired.push(mapping.attribute.field);
    }
  }

  return {
    mapped,
    unmappedLabels: labels.filter((_, i) => !taken.has(i)),
    missingFields,
    missingRequired,
  };
}

/** Result of normalizing one raw row. */
export interface NormalizedRow {
  readonly rowNumber: number;
  readonly document: Document;
  readonly issues: readonly RowIssue[];
  /** Set when a fatal issue blocks the row. */
  readonly failure: IngestionError | null;
}

/**
 * Domain service that turns raw rows into documents for one schema and one file.
 *
 * Create one per batch: fuzzy-match notices are reported on the first row
 * normalized and not repeated.
 */
export class ColumnMapper {
  private readonly attributes: ReadonlyMap<string, FieldMapping>;
  private readonly missingOptional: readonly FieldMapping[];
  private fuzzyReported = false;

  constructor(
    schema: Pick<SchemaDefinition, 'fields'>,
    readonly mapping: ColumnMapping,
  ) {
    this.attributes = new Map(schema.fields.map((m) => [m.attribute.field, m]));
    const missing = new Set(mapping.missingFields);
    this.missingOptional = schema.fields.filter((m) => missing.has(m.attribute.field) && !m.attribute.required);
  }

  /** Resolve the mapping and reject it when required fields are missing. */
  static forLabels(labels: readonly string[], schema: Pick<SchemaDefinition, 'fields'>, threshold?: number): ColumnMapper {
    const mapping = resolveColumnMapping(labels, schema, threshold);
    if (mapping.missingRequired.length > 0) {
      throw new SchemaMismatchError(mapping.missingRequired);
    }
    return new ColumnMapper(schema, mapping);
  }

  normalize(row: RawRow): NormalizedRow {
    const document: Record<string, FieldValue> = {};
    const issues: RowIssue[] = [];
    let failure: IngestionError | null = null;

    if (!this.fuzzyReported) {
      this.fuzzyReported = true;
      for (const column of this.mapping.mapped) {
        if (column.match !== 'fuzzy') continue;
        issues.push({
          rowNumber: row.rowNumber,
          column: column.label,
          field: column.field,
          kind: 'fuzzy_match',
          severity: 'info',
          rawValue: null,
          suggestedFix: `Rename column '${column.label}' to '${column.schemaColumn}'`,
        });
      }
    }

    for (const missing of this.missingOptional) {
      issues.push({
        rowNumber: row.rowNumber,
        column: missing.column,
        field: missing.attribute.field,
        kind: 'missing_column',
        severity: 'warning',
        rawValue: null,
        suggestedFix: `Add a '${missing.column}' column to the file`,
      });
    }

    for (const column of this.mapping.mapped) {
      const definition = this.attributes.get(column.field);
      if (!definition) continue;
      const { attribute } = definition;
      const cell = row.cells[column.label];
      const location = { rowNumber: row.rowNumber, column: column.label, field: column.field };

      if (isEmptyCell(cell) || cell === undefined) {
        if (attribute.required) {
          issues.push({
            ...location,
            kind: 'missing_value',
            severity: 'fatal',
            rawValue: null,
            suggestedFix: `Provide a value for required field '${column.field}'`,
          });
          failure ??= new IngestionError(
            'MISSING_REQUIRED_VALUE',
            `Row ${String(row.rowNumber)}: required column '${column.label}' is empty`,
            location,
          );
        }
        continue;
      }

      const result = coerceCell(cell, attribute.type);
      if (result.ok) {
        document[column.field] = result.value;
        continue;
      }

      const error = new DataConversionError(location, describeCell(cell), attribute.type);
      issues.push({
        ...location,
        kind: 'conversion_failed',
        severity: attribute.required ? 'fatal' : 'error',
        rawValue: error.rawValue,
        suggestedFix: `Enter a valid ${attribute.type} value`,
      });
      if (attribute.required) failure ??= error;
    }

    return { rowNumber: row.rowNumber, document, issues, failure };
  }
}

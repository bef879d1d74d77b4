import { z } from 'zod';
import type { DataQualityIssue } from '@tabingest/core';
import type { QualityIssueCreationRow, QualityIssueRow } from '../models/QualityIssueModel.js';

const kind = z.enum(['missing_column', 'conversion_failed', 'missing_value', 'fuzzy_match']);
const severity = z.enum(['info', 'warning', 'error', 'fatal']);

export function toRow(issue: DataQualityIssue): QualityIssueCreationRow {
  return {
    batchId: issue.batchId,
    rowNumber: issue.rowNumber,
    column: issue.column,
    field: issue.field,
    kind: issue.kind,
    severity: issue.severity,
    rawValue: issue.rawValue,
    suggestedFix: issue.suggestedFix,
  };
}

export function toDomain(row: QualityIssueRow): DataQualityIssue {
  return {
    batchId: row.batchId,
    rowNumber: row.rowNumber,
    column: row.column,
    field: row.field,
    kind: kind.parse(row.kind),
    severity: severity.parse(row.severity),
    rawValue: row.rawValue,
    suggestedFix: row.suggestedFix,
  };
}

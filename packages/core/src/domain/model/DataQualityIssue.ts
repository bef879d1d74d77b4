export type IssueKind = 'missing_column' | 'conversion_failed' | 'missing_value' | 'fuzzy_match';

export type IssueSeverity = 'info' | 'warning' | 'error' | 'fatal';

/** A problem found while normalizing one row. Only `fatal` issues block the row. */
export interface DataQualityIssue {
  readonly batchId: string;
  readonly rowNumber: number;
  /** Original column label, or the schema's label when the column is missing. */
  readonly column: string;
  readonly field: string | null;
  readonly kind: IssueKind;
  readonly severity: IssueSeverity;
  readonly rawValue: string | null;
  readonly suggestedFix: string | null;
}

/** Issue as produced by the mapper, before it is attached to a batch. */
export type RowIssue = Omit<DataQualityIssue, 'batchId'>;

export function isFatal(issue: Pick<DataQualityIssue, 'severity'>): boolean {
  return issue.severity === 'fatal';
}

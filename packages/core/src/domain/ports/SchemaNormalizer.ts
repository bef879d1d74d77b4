import type { FieldMapping, IndexDefinition } from '../model/Schema.js';

/** Draft schema proposed by the AI service for a set of column labels. */
export interface SchemaProposal {
  readonly fields: readonly FieldMapping[];
  readonly indexes: readonly IndexDefinition[];
  readonly duplicateKey: readonly string[];
  readonly collection: string;
}

/**
 * Port for the AI normalization service.
 *
 * Implementations raise `AIProcessingError` for any failure, including a
 * response that does not describe a usable schema. Callers decide whether to retry.
 */
export interface SchemaNormalizer {
  propose(labels: readonly string[]): Promise<SchemaProposal>;
}

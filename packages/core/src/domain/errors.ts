import type { ErrorSummary } from './model/ImportBatch.js';

/** Where in the input an error was raised. All parts are optional. */
export interface ErrorLocation {
  readonly rowNumber?: number;
  readonly column?: string;
  readonly field?: string;
}

/**
 * Base class of every error the ingestion pipeline raises on purpose.
 *
 * `message` is always fit for end users. The underlying exception, if any,
 * is kept in `cause` and only ever reaches the logs.
 */
export class IngestionError extends Error {
  readonly code: string;
  readonly rowNumber?: number;
  readonly column?: string;
  readonly field?: string;

  constructor(code: string, message: string, location: ErrorLocation = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'IngestionError';
    this.code = code;
    this.rowNumber = location.rowNumber;
    this.column = location.column;
    this.field = location.field;
  }

  toSummary(): ErrorSummary {
    return {
      code: this.code,
      message: this.message,
      ...(this.rowNumber !== undefined ? { rowNumber: this.rowNumber } : {}),
      ...(this.column !== undefined ? { column: this.column } : {}),
      ...(this.field !== undefined ? { field: this.field } : {}),
    };
  }
}

/** Required schema fields have no column in the file. Raised before any row is read. */
export class SchemaMismatchError extends IngestionError {
  readonly missingFields: readonly string[];

  constructor(missingFields: readonly string[]) {
    super('SCHEMA_MISMATCH', `Required field(s) not found in file: ${missingFields.join(', ')}`, {
      field: missingFields[0],
    });
    this.name = 'SchemaMismatchError';
    this.missingFields = missingFields;
  }
}

/** The AI normalizer failed or returned something unusable. Retryable. */
export class AIProcessingError extends IngestionError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('AI_PROCESSING_FAILED', message, {}, options);
    this.name = 'AIProcessingError';
  }
}

export class DataConversionError extends IngestionError {
  readonly rawValue: string | null;
  readonly expectedType: string;

  constructor(location: ErrorLocation, rawValue: string | null, expectedType: string) {
    super(
      'CONVERSION_FAILED',
      `Value ${rawValue === null ? '(empty)' : JSON.stringify(rawValue)} in column '${location.column ?? '?'}' is not a valid ${expectedType}`,
      location,
    );
    this.name = 'DataConversionError';
    this.rawValue = rawValue;
    this.expectedType = expectedType;
  }
}

export class DuplicateResolutionError extends IngestionError {
  constructor(code: string, message: string, location: ErrorLocation = {}, options?: { cause?: unknown }) {
    super(code, message, location, options);
    this.name = 'DuplicateResolutionError';
  }
}

/** The document or metadata store cannot be reached. Fatal to the running batch. */
export class StoreUnavailableError extends IngestionError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('STORE_UNAVAILABLE', message, {}, options);
    this.name = 'StoreUnavailableError';
  }
}

export class RollbackError extends IngestionError {
  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(code, message, {}, options);
    this.name = 'RollbackError';
  }
}

/** A schema template failed validation. `issues` lists every problem found. */
export class InvalidSchemaError extends IngestionError {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super('INVALID_SCHEMA', `Invalid schema: ${issues.join('; ')}`);
    this.name = 'InvalidSchemaError';
    this.issues = issues;
  }
}

export class NotFoundError extends IngestionError {
  constructor(entity: 'schema' | 'batch', id: string) {
    super('NOT_FOUND', `Unknown ${entity} '${id}'`);
    this.name = 'NotFoundError';
  }
}

/**
 * Thrown by document-store adapters when an insert collides with a unique index.
 * The duplicate resolver turns it back into its duplicate path.
 */
export class UniqueConstraintViolation extends Error {
  readonly collection: string;

  constructor(collection: string, message = `Unique constraint violated in '${collection}'`, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'UniqueConstraintViolation';
    this.collection = collection;
  }
}

/** Message of any thrown value, for logs. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

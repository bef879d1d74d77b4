// Main entry point
export { IngestionEngine, DEFAULT_HISTORY_LIMIT } from './IngestionEngine.js';
export type { IngestionEngineConfig } from './IngestionEngine.js';

// Configuration
export { loadSettings, loadDotenv, parseEnv, ConfigurationError, DEFAULT_SETTINGS } from './config.js';
export type { IngestionSettings, Env } from './config.js';

// Domain model
export type { CellValue, CellKind } from './domain/model/CellValue.js';
export {
  toCellValue,
  textCell,
  numberCell,
  dateCell,
  booleanCell,
  EMPTY_CELL,
  isEmptyCell,
  describeCell,
} from './domain/model/CellValue.js';
export type { Document, DocumentSnapshot, FieldValue, SnapshotValue, StoredDocument } from './domain/model/Document.js';
export { pickKey, matchesKey, sameFieldValue } from './domain/model/Document.js';
export type {
  SchemaDefinition,
  SchemaInput,
  SchemaPatch,
  AttributeDefinition,
  AttributeType,
  FieldMapping,
  IndexDefinition,
  IndexKind,
  DuplicateStrategy,
} from './domain/model/Schema.js';
export {
  createSchemaDefinition,
  applySchemaPatch,
  validateColumnLabels,
  fieldNames,
  requiredFields,
  schemaInputSchema,
  ATTRIBUTE_TYPES,
  DEFAULT_DATA_START_ROW,
  MAX_COLUMNS,
} from './domain/model/Schema.js';
export type {
  ImportBatch,
  BatchCounts,
  BatchSource,
  ErrorSummary,
  RollbackAttempt,
  RowOutcome,
} from './domain/model/ImportBatch.js';
export { EMPTY_COUNTS, committedCount } from './domain/model/ImportBatch.js';
export { BatchStatus, canTransition, isFinished } from './domain/model/BatchStatus.js';
export type { AuditLogEntry, AuditOperation, ForwardOperation, CompensatingOperation } from './domain/model/AuditLogEntry.js';
export type { DataQualityIssue, IssueKind, IssueSeverity } from './domain/model/DataQualityIssue.js';

// Errors
export {
  IngestionError,
  SchemaMismatchError,
  AIProcessingError,
  DataConversionError,
  DuplicateResolutionError,
  StoreUnavailableError,
  RollbackError,
  InvalidSchemaError,
  NotFoundError,
  UniqueConstraintViolation,
  errorMessage,
} from './domain/errors.js';
export type { ErrorLocation } from './domain/errors.js';

// Domain services
export { similarity, editDistance, normalizeLabel, DEFAULT_FUZZY_THRESHOLD } from './domain/services/similarity.js';
export { coerceCell, parseDateText, DATE_FORMATS } from './domain/services/TypeCoercion.js';
export type { CoercionResult } from './domain/services/TypeCoercion.js';
export { ColumnMapper, resolveColumnMapping } from './domain/services/ColumnMapper.js';
export type { ColumnMapping, MappedColumn, MatchKind, NormalizedRow } from './domain/services/ColumnMapper.js';
export { DuplicateResolver } from './domain/services/DuplicateResolver.js';
export type { Resolution, ResolutionPlan, ResolutionTarget } from './domain/services/DuplicateResolver.js';
export { AuditLedger } from './domain/services/AuditLedger.js';
export type { RollbackReport, RollbackEligibility } from './domain/services/AuditLedger.js';

// Use case types
export type { ImportRequest } from './application/usecases/RunBatch.js';
export type { ProposeSchemaOptions } from './application/usecases/ProposeSchema.js';
export type { MappingPreview } from './application/usecases/PreviewMapping.js';
export type { SchemaMatch } from './application/SchemaCatalog.js';
export { EventBus } from './application/EventBus.js';
export { WorkerPool } from './application/WorkerPool.js';

// Ports (for custom implementations)
export type { DataSource, SourceMetadata } from './domain/ports/DataSource.js';
export type { RowStream, RawRow } from './domain/ports/RowStream.js';
export type { DocumentStore } from './domain/ports/DocumentStore.js';
export type { MetadataStore } from './domain/ports/MetadataStore.js';
export type { SchemaNormalizer, SchemaProposal } from './domain/ports/SchemaNormalizer.js';

// Domain events
export type {
  DomainEvent,
  EventType,
  EventPayload,
  BatchCreatedEvent,
  BatchStartedEvent,
  RowCommittedEvent,
  RowErroredEvent,
  BatchProgressEvent,
  BatchCompletedEvent,
  BatchFailedEvent,
  BatchRolledBackEvent,
  RollbackPartialEvent,
  SchemaCreatedEvent,
} from './domain/events/DomainEvents.js';

// Infrastructure
export { InMemoryDocumentStore } from './infrastructure/stores/InMemoryDocumentStore.js';
export { InMemoryMetadataStore } from './infrastructure/stores/InMemoryMetadataStore.js';
export { BufferSource } from './infrastructure/sources/BufferSource.js';
export { FilePathSource } from './infrastructure/sources/FilePathSource.js';
export type { FilePathSourceOptions } from './infrastructure/sources/FilePathSource.js';
export { StreamSource } from './infrastructure/sources/StreamSource.js';
export type { StreamSourceOptions } from './infrastructure/sources/StreamSource.js';
export { hashSource } from './infrastructure/sources/hashSource.js';
export { detectMimeType } from './infrastructure/detectMimeType.js';
export { createLogger, createSilentLogger } from './infrastructure/logging/createLogger.js';
export type { LoggerOptions } from './infrastructure/logging/createLogger.js';

import type { BatchCounts, ErrorSummary, RowOutcome } from '../model/ImportBatch.js';

/** Emitted once the batch is persisted, before any row is read. */
export interface BatchCreatedEvent {
  readonly type: 'batch:created';
  readonly batchId: string;
  readonly schemaId: string;
  readonly source: string;
  readonly timestamp: number;
}

/** Emitted when the first row is pulled from the stream. */
export interface BatchStartedEvent {
  readonly type: 'batch:started';
  readonly batchId: string;
  readonly timestamp: number;
}

export interface RowCommittedEvent {
  readonly type: 'row:committed';
  readonly batchId: string;
  readonly rowNumber: number;
  readonly outcome: Exclude<RowOutcome, 'errored'>;
  readonly documentId: string;
  readonly timestamp: number;
}

export interface RowErroredEvent {
  readonly type: 'row:errored';
  readonly batchId: string;
  readonly rowNumber: number;
  readonly error: ErrorSummary;
  readonly timestamp: number;
}

/** Emitted after every processing chunk with the running counts. */
export interface BatchProgressEvent {
  readonly type: 'batch:progress';
  readonly batchId: string;
  readonly counts: BatchCounts;
  readonly timestamp: number;
}

export interface BatchCompletedEvent {
  readonly type: 'batch:completed';
  readonly batchId: string;
  readonly counts: BatchCounts;
  readonly elapsedMs: number;
  readonly timestamp: number;
}

/** Emitted on a fatal error or cancellation. */
export interface BatchFailedEvent {
  readonly type: 'batch:failed';
  readonly batchId: string;
  readonly error: ErrorSummary;
  readonly counts: BatchCounts;
  readonly timestamp: number;
}

export interface BatchRolledBackEvent {
  readonly type: 'batch:rolled-back';
  readonly batchId: string;
  readonly restored: number;
  readonly timestamp: number;
}

/** Emitted when a rollback left some compensations undone. The batch stays `COMPLETED`. */
export interface RollbackPartialEvent {
  readonly type: 'rollback:partial';
  readonly batchId: string;
  readonly restored: number;
  readonly failed: number;
  readonly errors: readonly ErrorSummary[];
  readonly timestamp: number;
}

export interface SchemaCreatedEvent {
  readonly type: 'schema:created';
  readonly schemaId: string;
  readonly name: string;
  readonly collection: string;
  readonly timestamp: number;
}

/** Union of all domain events emitted by the ingestion engine. */
export type DomainEvent =
  | BatchCreatedEvent
  | BatchStartedEvent
  | RowCommittedEvent
  | RowErroredEvent
  | BatchProgressEvent
  | BatchCompletedEvent
  | BatchFailedEvent
  | BatchRolledBackEvent
  | RollbackPartialEvent
  | SchemaCreatedEvent;

/** String literal union of all event type discriminators. */
export type EventType = DomainEvent['type'];

/** Extract the payload type for a specific event type. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;

/**
 * Finite state machine for the lifecycle of an import batch.
 *
 * Valid transitions:
 * - `CREATED` → `RUNNING` | `FAILED`
 * - `RUNNING` → `COMPLETED` | `FAILED`
 * - `COMPLETED` → `ROLLED_BACK`
 * - `FAILED`, `ROLLED_BACK` → (terminal)
 *
 * `CREATED` → `FAILED` covers fatal mapping failures detected before the first row is read.
 */
export const BatchStatus = {
  CREATED: 'CREATED',
  RUNNING: 'RUNNING',
  COMPLETED: 'COMPLETED',
  FAILED: 'FAILED',
  ROLLED_BACK: 'ROLLED_BACK',
} as const;

export type BatchStatus = (typeof BatchStatus)[keyof typeof BatchStatus];

const VALID_TRANSITIONS: Record<BatchStatus, readonly BatchStatus[]> = {
  [BatchStatus.CREATED]: [BatchStatus.RUNNING, BatchStatus.FAILED],
  [BatchStatus.RUNNING]: [BatchStatus.COMPLETED, BatchStatus.FAILED],
  [BatchStatus.COMPLETED]: [BatchStatus.ROLLED_BACK],
  [BatchStatus.FAILED]: [],
  [BatchStatus.ROLLED_BACK]: [],
};

/** Check whether a state transition is valid according to the batch lifecycle FSM. */
export function canTransition(from: BatchStatus, to: BatchStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

/** `true` once no further row processing can happen for the batch. */
export function isFinished(status: BatchStatus): boolean {
  return status === BatchStatus.COMPLETED || status === BatchStatus.FAILED || status === BatchStatus.ROLLED_BACK;
}

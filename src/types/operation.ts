import type { RecordStatus } from '../core/status/lattice.js'
import type { RecordId } from './record.js'

/**
 * Kind of operation recorded in the change log
 * - init: project creation
 * - retrieve: records created from search results
 * - stage: a processing stage run
 * - manual-override: a manual reopening of an absorbing status
 * - undo: whole-store rollback to an earlier point
 * - undo-record: rollback of one record's last transition
 * - merge: reconciliation of two diverging branches
 */
export type OperationKind =
  | 'init'
  | 'retrieve'
  | 'stage'
  | 'manual-override'
  | 'undo'
  | 'undo-record'
  | 'merge'

/**
 * One record status move made by an operation
 */
export interface TransitionEntry {
  recordId: RecordId
  /** Null when the operation created the record */
  from: RecordStatus | null
  to: RecordStatus
  justification?: string
}

/**
 * One record an operation failed to process
 */
export interface FailureEntry {
  recordId: RecordId
  /** Error code, e.g. `ENDPOINT_FAILURE`, `ENDPOINT_TIMEOUT`, `ILLEGAL_TRANSITION` */
  code: string
  reason: string
  /** Endpoint that failed, when known */
  endpoint?: string
}

/**
 * Metadata describing one completed operation.
 * Append-only: never edited once committed.
 */
export interface OperationRecord {
  /** Unique operation id */
  id: string
  kind: OperationKind
  /** Stage name or maintenance action, e.g. `pdf_prep`, `undo` */
  name: string
  actor: string
  /** ISO-8601 */
  timestamp: string
  /** Records affected per transition type, keyed `from->to` */
  counts: Record<string, number>
  transitions: TransitionEntry[]
  failures: FailureEntry[]
  /** Operation-specific details (merge parents, undo target, ...) */
  details?: Record<string, unknown>
}

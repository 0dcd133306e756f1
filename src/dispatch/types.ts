/**
 * Operation dispatcher type definitions
 * @module dispatch/types
 */

import type { RecordStatus } from '../core/status/lattice.js'
import type { ProcessingStage, StageOutputStatus } from '../core/status/stages.js'
import type { ProjectConfig } from '../types/config.js'
import type { Logger } from '../types/logger.js'
import type { OperationKind } from '../types/operation.js'
import type {
  CriterionDecision,
  FieldValue,
  RecordId,
  RetrievedRecord,
  ReviewRecord,
} from '../types/record.js'

/**
 * Context shared by every step of one operation
 */
export interface OperationContext {
  config: ProjectConfig
  /** Who runs the operation (author initials or an automation name) */
  actor: string
  /** Time source, injectable for reproducible histories */
  clock: () => Date
  logger: Logger
  /** Cancels the whole operation */
  signal?: AbortSignal
  /** Correlation id attached to log entries */
  correlationId: string
}

/**
 * Context handed to an endpoint for one invocation
 */
export interface EndpointContext {
  operation: OperationContext
  /** Options declared for the endpoint in the stage settings */
  options: Record<string, unknown>
  /** Aborted when the invocation times out or the operation is cancelled */
  signal: AbortSignal
  logger: Logger
}

/**
 * Endpoint edits to a record. The status defaults to the stage's first
 * output when omitted.
 */
export interface EndpointUpdate<S extends ProcessingStage = ProcessingStage> {
  type: 'update'
  status?: StageOutputStatus<S>
  metadata?: Record<string, FieldValue>
  removeFields?: string[]
  screeningCriteria?: Record<string, CriterionDecision>
  /** Justification written to the provenance notes */
  note?: string
}

/**
 * The endpoint had nothing to do for this record
 */
export interface EndpointNoChange {
  type: 'no-change'
}

/**
 * The endpoint could not process this record
 */
export interface EndpointFailure {
  type: 'failure'
  reason: string
}

/**
 * The record duplicates another record (deduplication only)
 */
export interface EndpointDuplicate {
  type: 'duplicate'
  survivorId: RecordId
  note?: string
}

export type EndpointOutcome<S extends ProcessingStage = ProcessingStage> =
  | EndpointUpdate<S>
  | EndpointNoChange
  | EndpointFailure
  | EndpointDuplicate

/**
 * Pluggable worker for one processing stage.
 * Endpoints receive copies of records and never touch the store.
 */
export interface StageEndpoint<S extends ProcessingStage = ProcessingStage> {
  readonly id: string
  readonly stage: S
  processRecord(record: ReviewRecord, context: EndpointContext): Promise<EndpointOutcome<S>>
}

/**
 * Pluggable source of newly retrieved records
 */
export interface SearchEndpoint {
  readonly id: string
  readonly stage: 'retrieve'
  retrieve(context: EndpointContext): Promise<RetrievedRecord[]>
}

export type Endpoint = StageEndpoint | SearchEndpoint

/**
 * Per-record result of a stage run
 */
export interface RecordOutcome {
  recordId: RecordId
  /** Null for records created by retrieval */
  from: RecordStatus | null
  to?: RecordStatus
  /** Survivor, for records collapsed during deduplication */
  collapsedInto?: RecordId
  changedFields?: string[]
}

/**
 * Per-record failure of a stage run
 */
export interface RecordFailure {
  recordId: RecordId
  code: string
  reason: string
  endpoint?: string
}

/**
 * Report of one dispatched operation. Lists are ordered by record id.
 */
export interface OperationReport {
  operationId: string
  kind: OperationKind
  /** Stage or operation name */
  name: string
  advanced: RecordOutcome[]
  unchanged: RecordId[]
  failed: RecordFailure[]
  outcome: 'success' | 'partial-success'
  /** Absent when nothing changed */
  commitId?: string
}

/**
 * Manual override of one record
 */
export interface ManualOverrideRequest {
  recordId: RecordId
  targetStatus: RecordStatus
  justification: string
  metadata?: Record<string, FieldValue>
  removeFields?: string[]
  screeningCriteria?: Record<string, CriterionDecision>
}

/**
 * Options for a single stage run
 */
export interface RunStageOptions {
  /** Restrict the run to these records */
  recordIds?: readonly RecordId[]
  /** Override the configured endpoint list */
  endpoints?: readonly string[]
}

/**
 * Transition engine type definitions
 * @module core/transition/types
 */

import type { CriterionDecision, FieldValue, RecordId } from '../../types/record.js'
import type { RecordStatus, TransitionKind } from '../status/lattice.js'

/**
 * Changes applied together with a status move
 */
export interface RecordUpdate {
  /** Fields to set */
  metadata?: Record<string, FieldValue>
  /** Fields to remove */
  removeFields?: string[]
  /** Screening decisions to set */
  screeningCriteria?: Record<string, CriterionDecision>
  /** Origin tags to add (e.g. from collapsed duplicates) */
  addOrigin?: string[]
}

/**
 * Request to move one record
 */
export interface TransitionRequest {
  recordId: RecordId
  targetStatus: RecordStatus
  actor: string
  justification: string
  update?: RecordUpdate
  /** Endpoint that proposed the move (defaults to the actor) */
  source?: string
}

/**
 * A transition applied to the store
 */
export interface AppliedTransition {
  recordId: RecordId
  from: RecordStatus
  to: RecordStatus
  kind: TransitionKind
  /** Record fields whose value changed, `status` included */
  changedFields: string[]
  justification: string
}

/**
 * A transition the engine refused
 */
export interface RejectedTransition {
  recordId: RecordId
  code: string
  reason: string
  source?: string
}

/**
 * Outcome of a batch; entries keep the order of the requests
 */
export interface BatchResult {
  applied: AppliedTransition[]
  failed: RejectedTransition[]
}

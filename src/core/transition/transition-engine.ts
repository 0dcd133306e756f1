/**
 * Validates and applies record status transitions
 * @module core/transition/transition-engine
 */

import type { FieldValue, ProvenanceNote, ReviewRecord } from '../../types/record.js'
import { cloneRecord } from '../../types/record.js'
import type { Logger } from '../../types/logger.js'
import type { RecordStore } from '../store/record-store.js'
import type { RecordStatus, TransitionKind } from '../status/lattice.js'
import { edgeKind, isReachable } from '../status/lattice.js'
import { isLedgerError, requireNonEmptyString } from '../../utils/errors.js'
import { RecordValidationError } from '../store/store-error.js'
import { IllegalTransitionError } from './transition-error.js'
import type {
  AppliedTransition,
  BatchResult,
  RecordUpdate,
  TransitionRequest,
} from './types.js'

/**
 * Per-operation settings of the engine
 */
export interface TransitionEngineOptions {
  /** Operation the transitions belong to, stamped into provenance notes */
  operationId: string
  /** Time source for provenance notes */
  clock?: () => Date
  logger?: Logger
}

function sameValue(a: unknown, b: unknown): boolean {
  return JSON.stringify(a) === JSON.stringify(b)
}

function explainRejection(from: RecordStatus, to: RecordStatus, kind: TransitionKind): string {
  const edge = edgeKind(from, to)
  if (edge === 'manual') {
    return `'${from}' is absorbing; reopening it requires a manual override`
  }
  if (edge === 'automatic') {
    return 'manual overrides only reopen absorbing statuses'
  }
  if (from === to) {
    return 'record already has this status'
  }
  if (isReachable(to, from)) {
    return 'moving backward is only possible through undo'
  }
  if (isReachable(from, to)) {
    return kind === 'automatic' ? 'stages cannot be skipped' : 'overrides cannot skip stages'
  }
  return 'statuses are not connected in the lattice'
}

/**
 * TransitionEngine moves records along the status lattice, one record at a
 * time. Each transition updates status, metadata, screening criteria and
 * provenance notes together: the new record is built and validated before
 * it replaces the stored one.
 *
 * @example
 * ```typescript
 * const engine = new TransitionEngine(store, { operationId: 'op-1' })
 * engine.proposeTransition('r1', 'md_imported', 'alice', 'loaded from crossref.bib')
 * ```
 */
export class TransitionEngine {
  private readonly clock: () => Date

  constructor(
    private readonly store: RecordStore,
    private readonly options: TransitionEngineOptions,
  ) {
    this.clock = options.clock ?? (() => new Date())
  }

  /**
   * Moves a record to a direct automatic successor of its status
   *
   * @throws {IllegalTransitionError} If the target is not a direct successor
   * @throws {RecordNotFoundError} If the record does not exist
   * @throws {RecordValidationError} If the resulting record is invalid
   */
  proposeTransition(
    recordId: string,
    targetStatus: RecordStatus,
    actor: string,
    justification: string,
    update?: RecordUpdate,
  ): AppliedTransition {
    return this.apply({ recordId, targetStatus, actor, justification, update }, 'automatic')
  }

  /**
   * Reopens an absorbing status along a manual edge
   *
   * @throws {IllegalTransitionError} If no manual edge leads to the target
   */
  manualOverride(
    recordId: string,
    targetStatus: RecordStatus,
    actor: string,
    justification: string,
    update?: RecordUpdate,
  ): AppliedTransition {
    return this.apply({ recordId, targetStatus, actor, justification, update }, 'manual')
  }

  /**
   * Applies a list of requests independently. A rejected request leaves its
   * record untouched and does not affect the others.
   */
  applyBatch(requests: TransitionRequest[], kind: TransitionKind = 'automatic'): BatchResult {
    const result: BatchResult = { applied: [], failed: [] }

    for (const request of requests) {
      try {
        result.applied.push(this.apply(request, kind))
      } catch (error) {
        if (!isLedgerError(error)) {
          throw error
        }
        this.options.logger?.warn('Transition rejected', {
          recordId: request.recordId,
          targetStatus: request.targetStatus,
          code: error.code,
        })
        result.failed.push({
          recordId: request.recordId,
          code: error.code,
          reason: error.message,
          source: request.source,
        })
      }
    }

    return result
  }

  /**
   * Adds a newly retrieved record at `md_retrieved`
   *
   * @throws {RecordValidationError} If the id is taken or the record is malformed
   */
  createRecord(
    input: { id: string; origin: string[]; metadata: Record<string, FieldValue> },
    actor: string,
    justification: string,
    source?: string,
  ): ReviewRecord {
    requireNonEmptyString(actor, 'actor')
    if (this.store.has(input.id)) {
      throw new RecordValidationError(input.id, 'id', 'a record with this id already exists')
    }

    const note = this.note(source ?? actor, justification)
    const provenanceNotes: Record<string, ProvenanceNote> = { status: note, origin: { ...note } }
    for (const field of Object.keys(input.metadata)) {
      provenanceNotes[field] = { ...note }
    }

    const record: ReviewRecord = {
      id: input.id,
      status: 'md_retrieved',
      origin: [...input.origin],
      metadata: { ...input.metadata },
      provenanceNotes,
    }
    this.store.upsert(record)
    return cloneRecord(record)
  }

  /**
   * Updates fields and origin without moving the status
   */
  amend(recordId: string, actor: string, justification: string, update: RecordUpdate): string[] {
    requireNonEmptyString(actor, 'actor')
    const current = this.store.require(recordId)
    const { next, changedFields } = this.buildNext(current, update, actor, justification)
    this.store.upsert(next)
    return changedFields
  }

  private apply(request: TransitionRequest, kind: TransitionKind): AppliedTransition {
    requireNonEmptyString(request.actor, 'actor')
    const current = this.store.require(request.recordId)

    if (this.store.isCollapsed(current.id)) {
      throw new IllegalTransitionError(
        current.id,
        current.status,
        request.targetStatus,
        `record was collapsed into '${this.store.resolveId(current.id)}'`,
      )
    }

    if (edgeKind(current.status, request.targetStatus) !== kind) {
      throw new IllegalTransitionError(
        current.id,
        current.status,
        request.targetStatus,
        explainRejection(current.status, request.targetStatus, kind),
      )
    }

    const source = request.source ?? request.actor
    const { next, changedFields } = this.buildNext(
      current,
      request.update ?? {},
      source,
      request.justification,
    )
    next.status = request.targetStatus
    next.provenanceNotes.status = this.note(source, request.justification)

    this.store.upsert(next)

    return {
      recordId: current.id,
      from: current.status,
      to: request.targetStatus,
      kind,
      changedFields: ['status', ...changedFields],
      justification: request.justification,
    }
  }

  private buildNext(
    current: ReviewRecord,
    update: RecordUpdate,
    source: string,
    justification: string,
  ): { next: ReviewRecord; changedFields: string[] } {
    const next = cloneRecord(current)
    const changedFields: string[] = []

    for (const [field, value] of Object.entries(update.metadata ?? {})) {
      if (field in next.metadata && sameValue(next.metadata[field], value)) continue
      next.metadata[field] = Array.isArray(value) ? [...value] : value
      next.provenanceNotes[field] = this.note(source, justification)
      changedFields.push(field)
    }

    for (const field of update.removeFields ?? []) {
      if (!(field in next.metadata)) continue
      delete next.metadata[field]
      next.provenanceNotes[field] = this.note(source, justification)
      changedFields.push(field)
    }

    if (update.screeningCriteria && Object.keys(update.screeningCriteria).length > 0) {
      const criteria = { ...(next.screeningCriteria ?? {}), ...update.screeningCriteria }
      if (!sameValue(criteria, next.screeningCriteria)) {
        next.screeningCriteria = criteria
        next.provenanceNotes.screeningCriteria = this.note(source, justification)
        changedFields.push('screeningCriteria')
      }
    }

    const added = (update.addOrigin ?? []).filter((tag) => !next.origin.includes(tag))
    if (added.length > 0) {
      next.origin = [...next.origin, ...new Set(added)]
      next.provenanceNotes.origin = this.note(source, justification)
      changedFields.push('origin')
    }

    return { next, changedFields }
  }

  private note(source: string, justification: string): ProvenanceNote {
    return {
      source,
      note: justification,
      setAt: this.clock().toISOString(),
      operationId: this.options.operationId,
    }
  }
}

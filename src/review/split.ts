/**
 * Partitioning of stage candidates for parallel manual review
 * @module review/split
 */

import { stageInput, type ProcessingStage } from '../core/status/stages.js'
import type { RecordStore } from '../core/store/record-store.js'
import type { RecordId } from '../types/record.js'
import { InvalidParameterError, requirePositiveInteger } from '../utils/errors.js'

export interface SplitOptions {
  stage: ProcessingStage
  /** Reviewer names; one part each */
  reviewers?: readonly string[]
  /** Number of unnamed parts, used when no reviewers are given */
  parts?: number
  /** Records to leave out, e.g. those blocked by an unresolved merge */
  exclude?: (recordId: RecordId) => boolean
}

export interface ReviewAssignment {
  reviewer: string
  recordIds: RecordId[]
}

/**
 * Deals the stage's candidates round-robin, in id order, so the same store
 * always yields the same partition.
 *
 * @example
 * ```typescript
 * splitForManualReview(store, { stage: 'screen', reviewers: ['alice', 'bob'] })
 * // [{ reviewer: 'alice', recordIds: ['r1', 'r3'] }, { reviewer: 'bob', recordIds: ['r2'] }]
 * ```
 */
export function splitForManualReview(store: RecordStore, options: SplitOptions): ReviewAssignment[] {
  const reviewers =
    options.reviewers && options.reviewers.length > 0
      ? [...options.reviewers]
      : Array.from({ length: requirePositiveInteger(options.parts ?? 2, 'parts') }, (_, index) => `part-${index + 1}`)

  if (new Set(reviewers).size !== reviewers.length) {
    throw new InvalidParameterError('reviewers', reviewers, 'must be unique')
  }

  const assignments: ReviewAssignment[] = reviewers.map((reviewer) => ({ reviewer, recordIds: [] }))
  let next = 0
  for (const record of store.iterate({ status: stageInput(options.stage) })) {
    if (options.exclude?.(record.id)) continue
    assignments[next % assignments.length].recordIds.push(record.id)
    next++
  }
  return assignments
}

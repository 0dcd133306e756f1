/**
 * Scalar conflict policies
 * @module merge/policies
 */

import type { ScalarConflictPolicy } from '../types/config.js'
import type { ProvenanceNote } from '../types/record.js'

export type MergeSide = 'ours' | 'theirs'

/**
 * Both sides of a field edited differently since the merge base
 */
export interface ScalarConflict {
  ours: unknown
  theirs: unknown
  oursNote?: ProvenanceNote
  theirsNote?: ProvenanceNote
}

/**
 * Picks the side to keep, or null when the conflict needs a human
 */
export type ScalarPolicyFunction = (conflict: ScalarConflict) => MergeSide | null

function noteTime(note: ProvenanceNote | undefined): number | null {
  if (!note) return null
  const time = Date.parse(note.setAt)
  return Number.isNaN(time) ? null : time
}

/**
 * Keeps the value whose provenance note was set later. Ties and values
 * without a usable timestamp stay conflicts.
 *
 * @example
 * ```typescript
 * laterTimestampWins({
 *   ours: 'Coordination',
 *   theirs: 'Co-ordination',
 *   oursNote: { source: 'alice', note: 'typo', setAt: '2024-03-01T10:00:00.000Z', operationId: 'op-1' },
 *   theirsNote: { source: 'bob', note: 'typo', setAt: '2024-03-02T10:00:00.000Z', operationId: 'op-2' },
 * }) // 'theirs'
 * ```
 */
export const laterTimestampWins: ScalarPolicyFunction = (conflict) => {
  const ours = noteTime(conflict.oursNote)
  const theirs = noteTime(conflict.theirsNote)
  if (ours === null || theirs === null || ours === theirs) return null
  return ours > theirs ? 'ours' : 'theirs'
}

export const preferOurs: ScalarPolicyFunction = () => 'ours'

export const preferTheirs: ScalarPolicyFunction = () => 'theirs'

export const failOnConflict: ScalarPolicyFunction = () => null

const POLICIES: Record<ScalarConflictPolicy, ScalarPolicyFunction> = {
  'later-timestamp-wins': laterTimestampWins,
  ours: preferOurs,
  theirs: preferTheirs,
  fail: failOnConflict,
}

/**
 * Retrieve the implementation of a configured policy
 */
export function getScalarPolicy(policy: ScalarConflictPolicy): ScalarPolicyFunction {
  return POLICIES[policy]
}

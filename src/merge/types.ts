/**
 * Merge type definitions
 * @module merge/types
 */

import type { ScalarConflictPolicy } from '../types/config.js'
import type { Logger } from '../types/logger.js'
import type { RecordId, Snapshot } from '../types/record.js'

/**
 * One incompatible edit found during a three-way merge
 */
export interface MergeConflict {
  recordId: RecordId
  /** `status`, `metadata.<field>`, `screeningCriteria.<name>` or `collapsedInto` */
  path: string
  ours: unknown
  theirs: unknown
}

/**
 * Human decision for one conflict
 */
export interface ConflictResolution {
  recordId: RecordId
  path: string
  take: 'ours' | 'theirs'
}

/**
 * Result of merging three snapshots
 */
export interface SnapshotMergeResult {
  /** Merged content; conflicting paths keep the local value */
  snapshot: Snapshot
  conflicts: MergeConflict[]
  /** Paths auto-resolved by the scalar conflict policy */
  autoResolved: Array<{ recordId: RecordId; path: string; take: 'ours' | 'theirs' }>
}

/**
 * A merge waiting for conflict resolution
 */
export interface PendingMerge {
  ours: string
  theirs: string
  base: string | null
  /** Point the merge was started from, as given by the caller */
  source: string
  oursSnapshot: Snapshot
  theirsSnapshot: Snapshot
  result: SnapshotMergeResult
}

export type MergeStatus = 'up-to-date' | 'fast-forward' | 'merged'

export interface MergeOutcome {
  status: MergeStatus
  /** Head after the merge */
  commitId: string
  autoResolved: SnapshotMergeResult['autoResolved']
}

export interface MergeResolverOptions {
  policy: ScalarConflictPolicy
  /** Criteria declared in the configuration, for rebuilding the store */
  criteria?: readonly string[]
  logger?: Logger
}

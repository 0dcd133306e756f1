/**
 * Merge error classes
 * @module merge/merge-error
 */

import { LedgerError } from '../utils/errors.js'
import type { MergeConflict } from './types.js'

/**
 * Error thrown when divergent histories edit the same record incompatibly.
 * The merge stays pending and the listed records are blocked until resolved.
 */
export class MergeConflictError extends LedgerError {
  public readonly conflicts: MergeConflict[]

  constructor(conflicts: MergeConflict[], context?: Record<string, unknown>) {
    const ids = [...new Set(conflicts.map((conflict) => conflict.recordId))]
    super(
      `Merge conflict on ${ids.length} record(s): ${ids.join(', ')}`,
      'MERGE_CONFLICT',
      { conflicts, ...context },
    )
    this.name = 'MergeConflictError'
    this.conflicts = conflicts
  }

  /**
   * Ids of the conflicting records
   */
  get recordIds(): string[] {
    return [...new Set(this.conflicts.map((conflict) => conflict.recordId))].sort()
  }
}

/**
 * Error thrown when a merge is started while another awaits resolution,
 * or when resolution is requested with nothing pending
 */
export class MergeStateError extends LedgerError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'MERGE_STATE_ERROR', context)
    this.name = 'MergeStateError'
  }
}

/**
 * Error thrown when resolutions do not cover the pending conflicts
 */
export class UnresolvedConflictError extends LedgerError {
  constructor(missing: Array<{ recordId: string; path: string }>) {
    super(
      `${missing.length} conflict(s) left unresolved`,
      'UNRESOLVED_CONFLICT',
      { missing },
    )
    this.name = 'UnresolvedConflictError'
  }
}

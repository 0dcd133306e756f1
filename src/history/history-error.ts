/**
 * Change log error classes
 * @module history/history-error
 */

import { LedgerError, errorMessage } from '../utils/errors.js'

/**
 * Error thrown when stored content does not match its hash.
 * Fatal: the store must not be operated on until repaired.
 */
export class CorruptionDetectedError extends LedgerError {
  /** Kind of object that failed verification */
  public readonly objectType: 'commit' | 'snapshot'

  /** Identifier or hash the object was stored under */
  public readonly objectId: string

  constructor(
    objectType: 'commit' | 'snapshot',
    objectId: string,
    reason: string,
    context?: Record<string, unknown>,
  ) {
    super(`Corrupt ${objectType} '${objectId}': ${reason}`, 'CORRUPTION_DETECTED', {
      objectType,
      objectId,
      reason,
      ...context,
    })
    this.name = 'CorruptionDetectedError'
    this.objectType = objectType
    this.objectId = objectId
  }
}

/**
 * Error thrown when a history point cannot be resolved
 */
export class UnknownPointError extends LedgerError {
  public readonly point: string

  constructor(point: string, reason?: string) {
    super(
      reason ? `Unknown history point '${point}': ${reason}` : `Unknown history point '${point}'`,
      'UNKNOWN_POINT',
      { point, reason },
    )
    this.name = 'UnknownPointError'
    this.point = point
  }
}

/**
 * Error thrown when a ref update would discard history
 */
export class NonFastForwardError extends LedgerError {
  constructor(ref: string, current: string, proposed: string) {
    super(
      `Ref '${ref}' cannot move from '${current}' to '${proposed}' without losing history`,
      'NON_FAST_FORWARD',
      { ref, current, proposed },
    )
    this.name = 'NonFastForwardError'
  }
}

/**
 * Error thrown when the branch moved while an operation worked on a staged
 * copy of the store. The staged work is discarded; nothing is committed.
 */
export class StaleHeadError extends LedgerError {
  constructor(ref: string, head: string, stagedFrom: string) {
    super(
      `Ref '${ref}' moved to '${head}' while the operation ran; its snapshot is no longer the one staged from`,
      'STALE_HEAD',
      { ref, head, stagedFrom },
    )
    this.name = 'StaleHeadError'
  }
}

/**
 * Error reported when a commit listener fails after the commit was stored.
 * The commit stands; only the listener's side effect is missing.
 */
export class CommitListenerError extends LedgerError {
  public readonly commitId: string

  constructor(commitId: string, cause: unknown) {
    super(
      `Commit listener failed for '${commitId}': ${errorMessage(cause)}`,
      'COMMIT_LISTENER_FAILED',
      { commitId },
    )
    this.name = 'CommitListenerError'
    this.commitId = commitId
    this.cause = cause
  }
}

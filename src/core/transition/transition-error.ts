/**
 * Transition error classes
 * @module core/transition/transition-error
 */

import { LedgerError } from '../../utils/errors.js'
import type { RecordStatus } from '../status/lattice.js'

/**
 * Error thrown when a move outside the status lattice is attempted.
 * Never retried automatically.
 */
export class IllegalTransitionError extends LedgerError {
  public readonly recordId: string
  public readonly from: RecordStatus
  public readonly to: RecordStatus

  constructor(recordId: string, from: RecordStatus, to: RecordStatus, reason?: string) {
    const message = reason
      ? `Illegal transition of '${recordId}' from '${from}' to '${to}': ${reason}`
      : `Illegal transition of '${recordId}' from '${from}' to '${to}'`

    super(message, 'ILLEGAL_TRANSITION', { recordId, from, to, reason })
    this.name = 'IllegalTransitionError'
    this.recordId = recordId
    this.from = from
    this.to = to
  }
}

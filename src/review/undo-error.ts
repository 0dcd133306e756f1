/**
 * Undo error classes
 * @module review/undo-error
 */

import { LedgerError } from '../utils/errors.js'

/**
 * Error thrown when later history depends on the change being undone.
 * Nothing is committed; pick an earlier point or undo the dependents first.
 */
export class UndoConflictError extends LedgerError {
  public readonly recordId?: string

  constructor(reason: string, context?: Record<string, unknown> & { recordId?: string }) {
    super(
      context?.recordId ? `Cannot undo record '${context.recordId}': ${reason}` : `Cannot undo: ${reason}`,
      'UNDO_CONFLICT',
      { reason, ...context },
    )
    this.name = 'UndoConflictError'
    this.recordId = context?.recordId
  }
}

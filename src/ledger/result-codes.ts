/**
 * Result codes of ledger operations
 * @module ledger/result-codes
 */

import { CorruptionDetectedError } from '../history/history-error.js'
import { MergeConflictError } from '../merge/merge-error.js'
import { UndoConflictError } from '../review/undo-error.js'

/**
 * Exit codes reported to command-line callers
 */
export const ResultCode = {
  SUCCESS: 0,
  PARTIAL_SUCCESS: 1,
  HARD_CONFLICT: 2,
  FATAL_CORRUPTION: 3,
} as const

export type ResultCode = (typeof ResultCode)[keyof typeof ResultCode]

/**
 * Code of a completed operation
 */
export function resultCodeFor(result: { outcome?: 'success' | 'partial-success' }): ResultCode {
  return result.outcome === 'partial-success' ? ResultCode.PARTIAL_SUCCESS : ResultCode.SUCCESS
}

/**
 * Code of a failed operation, or null for errors outside the taxonomy
 */
export function resultCodeForError(error: unknown): ResultCode | null {
  if (error instanceof CorruptionDetectedError) return ResultCode.FATAL_CORRUPTION
  if (error instanceof MergeConflictError || error instanceof UndoConflictError) {
    return ResultCode.HARD_CONFLICT
  }
  return null
}

/**
 * Record store error classes
 * @module core/store/store-error
 */

import { LedgerError } from '../../utils/errors.js'

/**
 * Error thrown when a record violates a store invariant
 */
export class RecordValidationError extends LedgerError {
  /** Offending record */
  public readonly recordId: string

  /** Field that failed validation */
  public readonly field: string

  constructor(recordId: string, field: string, reason: string, context?: Record<string, unknown>) {
    super(`Record '${recordId}' is invalid at '${field}': ${reason}`, 'RECORD_VALIDATION_ERROR', {
      recordId,
      field,
      reason,
      ...context,
    })
    this.name = 'RecordValidationError'
    this.recordId = recordId
    this.field = field
  }
}

/**
 * Error thrown when a record id is not in the store
 */
export class RecordNotFoundError extends LedgerError {
  public readonly recordId: string

  constructor(recordId: string) {
    super(`Record not found: ${recordId}`, 'RECORD_NOT_FOUND', { recordId })
    this.name = 'RecordNotFoundError'
    this.recordId = recordId
  }
}

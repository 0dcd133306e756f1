/**
 * Operation dispatcher error classes
 * @module dispatch/dispatch-error
 */

import { LedgerError } from '../utils/errors.js'

/**
 * Error raised when an endpoint reports or throws a failure for a record
 */
export class EndpointFailureError extends LedgerError {
  public readonly endpointId: string

  constructor(endpointId: string, reason: string, context?: Record<string, unknown>) {
    super(`Endpoint '${endpointId}' failed: ${reason}`, 'ENDPOINT_FAILURE', {
      endpointId,
      ...context,
    })
    this.name = 'EndpointFailureError'
    this.endpointId = endpointId
  }
}

/**
 * Error raised when an endpoint exceeds its time budget
 */
export class EndpointTimeoutError extends LedgerError {
  public readonly endpointId: string
  public readonly timeoutMs: number

  constructor(endpointId: string, timeoutMs: number, context?: Record<string, unknown>) {
    super(`Endpoint '${endpointId}' timed out after ${timeoutMs}ms`, 'ENDPOINT_TIMEOUT', {
      endpointId,
      timeoutMs,
      ...context,
    })
    this.name = 'EndpointTimeoutError'
    this.endpointId = endpointId
    this.timeoutMs = timeoutMs
  }
}

/**
 * Error raised when the settings name an endpoint nobody registered
 */
export class EndpointNotRegisteredError extends LedgerError {
  constructor(endpointId: string, stage: string) {
    super(`No endpoint '${endpointId}' registered for stage '${stage}'`, 'ENDPOINT_NOT_REGISTERED', {
      endpointId,
      stage,
    })
    this.name = 'EndpointNotRegisteredError'
  }
}

/**
 * Error raised when an operation is cancelled before completing.
 * Nothing of the operation is committed.
 */
export class OperationCancelledError extends LedgerError {
  constructor(operation: string, reason?: string) {
    super(
      reason ? `Operation '${operation}' was cancelled: ${reason}` : `Operation '${operation}' was cancelled`,
      'OPERATION_CANCELLED',
      { operation, reason },
    )
    this.name = 'OperationCancelledError'
  }
}

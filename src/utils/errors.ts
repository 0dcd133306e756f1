/**
 * Central error classes and validation utilities for review-ledger
 * @module utils/errors
 */

/**
 * Base error class for all review-ledger errors
 */
export class LedgerError extends Error {
  /** Error code for programmatic error handling */
  public readonly code: string

  /** Additional error context */
  public readonly context?: Record<string, unknown>

  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message)
    this.name = 'LedgerError'
    this.code = code
    this.context = context

    // Maintains proper stack trace (Node.js specific)
    if (typeof Error.captureStackTrace === 'function') {
      Error.captureStackTrace(this, this.constructor)
    }
  }
}

/**
 * Error thrown when a parameter value is invalid
 */
export class InvalidParameterError extends LedgerError {
  public readonly parameterName: string
  public readonly value: unknown
  public readonly reason: string

  constructor(
    parameterName: string,
    value: unknown,
    reason: string,
    context?: Record<string, unknown>,
  ) {
    super(`Invalid parameter '${parameterName}': ${reason}`, 'INVALID_PARAMETER', {
      parameterName,
      value,
      reason,
      ...context,
    })
    this.name = 'InvalidParameterError'
    this.parameterName = parameterName
    this.value = value
    this.reason = reason
  }
}

/**
 * Error thrown when project configuration is invalid
 */
export class ConfigurationError extends LedgerError {
  public readonly field?: string

  constructor(message: string, field?: string, context?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', { field, ...context })
    this.name = 'ConfigurationError'
    this.field = field
  }
}

/**
 * Error thrown when a builder method is called in invalid sequence
 */
export class BuilderSequenceError extends LedgerError {
  public readonly method: string

  constructor(method: string, message: string, context?: Record<string, unknown>) {
    super(`Builder sequence error in ${method}: ${message}`, 'BUILDER_SEQUENCE_ERROR', {
      method,
      ...context,
    })
    this.name = 'BuilderSequenceError'
    this.method = method
  }
}

// ==================== VALIDATION UTILITIES ====================

/**
 * Validates that a number is positive (> 0)
 */
export function requirePositive(value: number, parameterName: string): number {
  if (typeof value !== 'number' || isNaN(value)) {
    throw new InvalidParameterError(parameterName, value, 'must be a number')
  }
  if (value <= 0) {
    throw new InvalidParameterError(parameterName, value, 'must be positive (> 0)')
  }
  return value
}

/**
 * Validates that a number is a positive integer
 */
export function requirePositiveInteger(value: number, parameterName: string): number {
  requirePositive(value, parameterName)
  if (!Number.isInteger(value)) {
    throw new InvalidParameterError(parameterName, value, 'must be an integer')
  }
  return value
}

/**
 * Validates that a string is non-empty
 */
export function requireNonEmptyString(value: unknown, parameterName: string): string {
  if (typeof value !== 'string') {
    throw new InvalidParameterError(parameterName, value, 'must be a string')
  }
  if (value.trim().length === 0) {
    throw new InvalidParameterError(parameterName, value, 'must not be empty')
  }
  return value
}

/**
 * Narrows a value to a plain object (not null, not array)
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/**
 * Check if an error is a review-ledger error
 */
export function isLedgerError(error: unknown): error is LedgerError {
  return error instanceof LedgerError
}

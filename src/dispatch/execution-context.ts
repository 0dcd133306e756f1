/**
 * Operation context building
 * @module dispatch/execution-context
 */

import { v4 as uuidv4, v5 as uuidv5 } from 'uuid'
import type { ProjectConfig } from '../types/config.js'
import type { Logger } from '../types/logger.js'
import { requireNonEmptyString } from '../utils/errors.js'
import { createPrefixedLogger, createSilentLogger } from '../utils/logger.js'
import type { EndpointContext, OperationContext } from './types.js'

export interface OperationContextOptions {
  config: ProjectConfig
  actor: string
  clock?: () => Date
  logger?: Logger
  signal?: AbortSignal
  correlationId?: string
}

/**
 * Generates a unique correlation id for log tracing
 */
export function generateCorrelationId(): string {
  const timestamp = Date.now().toString(36)
  const random = Math.random().toString(36).substring(2, 10)
  return `op-${timestamp}-${random}`
}

/**
 * Generates an operation id
 */
export function generateOperationId(): string {
  return uuidv4()
}

/**
 * Namespace of record ids derived from origin tags
 */
export const RECORD_ID_NAMESPACE = '6f1c2a9e-4b7d-4e0a-9c3f-8d5b1e7a2c40'

/**
 * Id of the record created for an origin tag. The same tag always yields
 * the same id, so re-running a retrieval reproduces its records.
 */
export function generateRecordId(origin: string): string {
  return uuidv5(requireNonEmptyString(origin, 'origin'), RECORD_ID_NAMESPACE)
}

/**
 * Builds an operation context from options
 */
export function buildOperationContext(options: OperationContextOptions): OperationContext {
  return {
    config: options.config,
    actor: requireNonEmptyString(options.actor, 'actor'),
    clock: options.clock ?? (() => new Date()),
    logger: options.logger ?? createSilentLogger(),
    signal: options.signal,
    correlationId: options.correlationId ?? generateCorrelationId(),
  }
}

/**
 * Builds the context for one endpoint invocation
 */
export function buildEndpointContext(
  operation: OperationContext,
  endpointId: string,
  options: Record<string, unknown> | undefined,
  signal: AbortSignal,
): EndpointContext {
  return {
    operation,
    options: options ?? {},
    signal,
    logger: createPrefixedLogger(endpointId, operation.logger),
  }
}

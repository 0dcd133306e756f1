/**
 * Timeout wrapper for endpoint invocations
 * @module dispatch/timeout
 */

import { InvalidParameterError } from '../utils/errors.js'
import { EndpointTimeoutError, OperationCancelledError } from './dispatch-error.js'

type TimerId = ReturnType<typeof setTimeout>

export interface TimeoutOptions {
  /** Timeout duration in milliseconds */
  timeoutMs: number
  /** Endpoint name for error messages */
  endpointId: string
  /** Operation-wide cancellation */
  signal?: AbortSignal
}

/**
 * Runs `work` with a time budget. The work receives a signal aborted on
 * timeout or cancellation, so it can stop early.
 *
 * @throws {EndpointTimeoutError} If the budget is exceeded
 * @throws {OperationCancelledError} If the outer signal aborts first
 *
 * @example
 * ```typescript
 * const outcome = await withTimeout(
 *   (signal) => endpoint.processRecord(record, { ...context, signal }),
 *   { timeoutMs: 5000, endpointId: endpoint.id },
 * )
 * ```
 */
export async function withTimeout<T>(
  work: (signal: AbortSignal) => Promise<T>,
  options: TimeoutOptions,
): Promise<T> {
  const { timeoutMs, endpointId, signal } = options

  if (!(timeoutMs > 0)) {
    throw new InvalidParameterError('timeoutMs', timeoutMs, 'must be a positive number')
  }
  if (signal?.aborted) {
    throw new OperationCancelledError(endpointId, 'aborted before starting')
  }

  const controller = new AbortController()

  return new Promise<T>((resolve, reject) => {
    let settled = false
    let timeoutId: TimerId | undefined

    const cleanup = () => {
      if (timeoutId !== undefined) {
        clearTimeout(timeoutId)
      }
      signal?.removeEventListener('abort', onAbort)
    }

    const settle = (action: () => void) => {
      if (settled) return
      settled = true
      cleanup()
      action()
    }

    const onAbort = () =>
      settle(() => {
        controller.abort()
        reject(new OperationCancelledError(endpointId))
      })

    const onTimeout = () =>
      settle(() => {
        controller.abort()
        reject(new EndpointTimeoutError(endpointId, timeoutMs))
      })

    timeoutId = setTimeout(onTimeout, timeoutMs)
    signal?.addEventListener('abort', onAbort)

    let running: Promise<T>
    try {
      running = work(controller.signal)
    } catch (error) {
      settle(() => reject(error))
      return
    }
    running.then(
      (value) => settle(() => resolve(value)),
      (error: unknown) => settle(() => reject(error)),
    )
  })
}

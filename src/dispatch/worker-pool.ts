/**
 * Bounded concurrency for endpoint invocations
 * @module dispatch/worker-pool
 */

import { requirePositiveInteger } from '../utils/errors.js'

/**
 * Runs async tasks with at most `size` in flight.
 *
 * @example
 * ```typescript
 * const pool = new WorkerPool(4)
 * const outcomes = await pool.map(records, (record) => endpoint.processRecord(record, context))
 * ```
 */
export class WorkerPool {
  private readonly size: number

  constructor(size: number) {
    this.size = requirePositiveInteger(size, 'size')
  }

  /**
   * Applies `task` to every item. Results keep the order of the items.
   * The first rejection stops new tasks from starting and is rethrown once
   * the running ones have settled.
   */
  async map<T, R>(items: readonly T[], task: (item: T, index: number) => Promise<R>): Promise<R[]> {
    const results = new Array<R>(items.length)
    let next = 0
    let failure: { error: unknown } | undefined

    const lane = async (): Promise<void> => {
      while (failure === undefined && next < items.length) {
        const index = next++
        try {
          results[index] = await task(items[index], index)
        } catch (error) {
          failure ??= { error }
        }
      }
    }

    const lanes = Math.min(this.size, items.length)
    await Promise.all(Array.from({ length: lanes }, () => lane()))

    if (failure !== undefined) {
      throw failure.error
    }
    return results
  }
}

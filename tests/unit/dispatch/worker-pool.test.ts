/**
 * Unit tests for WorkerPool
 */

import { describe, it, expect } from 'vitest'
import { WorkerPool } from '../../../src/dispatch/worker-pool.js'
import { InvalidParameterError } from '../../../src/utils/errors.js'

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

describe('WorkerPool', () => {
  it('keeps results in item order', async () => {
    const pool = new WorkerPool(3)

    const results = await pool.map([30, 5, 15, 1], async (ms, index) => {
      await delay(ms)
      return `${index}:${ms}`
    })

    expect(results).toEqual(['0:30', '1:5', '2:15', '3:1'])
  })

  it('never runs more tasks than its size', async () => {
    const pool = new WorkerPool(2)
    let running = 0
    let peak = 0

    await pool.map([1, 2, 3, 4, 5], async () => {
      running++
      peak = Math.max(peak, running)
      await delay(2)
      running--
    })

    expect(peak).toBe(2)
  })

  it('stops starting tasks after a failure and rethrows it', async () => {
    const pool = new WorkerPool(1)
    const started: number[] = []

    await expect(
      pool.map([1, 2, 3], async (item) => {
        started.push(item)
        if (item === 2) throw new Error('task 2 failed')
        return item
      }),
    ).rejects.toThrow('task 2 failed')
    expect(started).toEqual([1, 2])
  })

  it('handles an empty list', async () => {
    expect(await new WorkerPool(4).map([], async () => 1)).toEqual([])
  })

  it('requires a positive integer size', () => {
    expect(() => new WorkerPool(0)).toThrow(InvalidParameterError)
    expect(() => new WorkerPool(1.5)).toThrow(InvalidParameterError)
  })
})

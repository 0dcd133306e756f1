/**
 * Canonical serialisation and content hashing of history objects
 * @module history/hashing
 */

import { createHash } from 'node:crypto'
import type { Snapshot } from '../types/record.js'
import type { OperationRecord } from '../types/operation.js'

/**
 * Create a stable JSON string from a JSON-compatible value
 *
 * Handles:
 * - Object key ordering (alphabetical)
 * - Circular references (error)
 * - Undefined values in objects (skipped)
 * - Date objects (converted to ISO string)
 */
export function stableStringify(value: unknown, seen: WeakSet<object> = new WeakSet()): string {
  if (value === null || value === undefined) {
    return 'null'
  }

  if (typeof value === 'boolean' || typeof value === 'number') {
    return Number.isNaN(value) ? 'null' : String(value)
  }

  if (typeof value === 'string') {
    return JSON.stringify(value)
  }

  if (value instanceof Date) {
    return JSON.stringify(value.toISOString())
  }

  if (typeof value === 'object') {
    if (seen.has(value)) {
      throw new Error('Circular reference detected in history object')
    }

    seen.add(value)

    try {
      if (Array.isArray(value)) {
        const items: unknown[] = value
        return `[${items.map((item) => stableStringify(item, seen)).join(',')}]`
      }

      const entries = Object.entries(value)
        .filter(([, entry]) => entry !== undefined && typeof entry !== 'function')
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([key, entry]) => `${JSON.stringify(key)}:${stableStringify(entry, seen)}`)

      return `{${entries.join(',')}}`
    } finally {
      seen.delete(value)
    }
  }

  return 'null'
}

export function sha256(input: string): string {
  return createHash('sha256').update(input, 'utf8').digest('hex')
}

/**
 * Content hash of a full snapshot
 */
export function hashSnapshot(snapshot: Snapshot): string {
  return sha256(stableStringify(snapshot))
}

/**
 * Commit identifier derived from its parents, snapshot hash and operation
 */
export function hashCommit(
  parents: readonly string[],
  snapshotHash: string,
  operation: OperationRecord,
): string {
  return sha256(stableStringify({ parents, snapshotHash, operation }))
}

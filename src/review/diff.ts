/**
 * Net differences between snapshots
 * @module review/diff
 */

import { stableStringify } from '../history/hashing.js'
import type { TransitionEntry } from '../types/operation.js'
import type { RecordId, ReviewRecord, Snapshot } from '../types/record.js'

/**
 * One changed path of a record
 */
export interface FieldChange {
  /** `status`, `origin`, `metadata.<field>`, `screeningCriteria.<name>` or `collapsedInto` */
  path: string
  /** Absent for values that did not exist before */
  before?: unknown
  /** Absent for values removed */
  after?: unknown
}

/**
 * Transition logged on the history path between two points
 */
export interface LoggedTransition extends TransitionEntry {
  commitId: string
  operation: string
  actor: string
  timestamp: string
}

export interface RecordDiff {
  recordId: RecordId
  changes: FieldChange[]
  transitions: LoggedTransition[]
}

export interface SnapshotDiff {
  from: string
  to: string
  /** Records with changes or logged transitions, by id */
  records: RecordDiff[]
}

function differs(a: unknown, b: unknown): boolean {
  if (a === undefined || b === undefined) return a !== b
  return stableStringify(a) !== stableStringify(b)
}

function change(path: string, before: unknown, after: unknown): FieldChange {
  const entry: FieldChange = { path }
  if (before !== undefined) entry.before = before
  if (after !== undefined) entry.after = after
  return entry
}

function keyedChanges(
  area: string,
  before: Record<string, unknown> | undefined,
  after: Record<string, unknown> | undefined,
): FieldChange[] {
  const keys = [...new Set([...Object.keys(before ?? {}), ...Object.keys(after ?? {})])].sort()
  const changes: FieldChange[] = []
  for (const key of keys) {
    const old = before && Object.hasOwn(before, key) ? before[key] : undefined
    const now = after && Object.hasOwn(after, key) ? after[key] : undefined
    if (differs(old, now)) {
      changes.push(change(`${area}.${key}`, old, now))
    }
  }
  return changes
}

/**
 * Field and status changes of one record
 */
export function diffRecords(before: ReviewRecord | undefined, after: ReviewRecord | undefined): FieldChange[] {
  const changes: FieldChange[] = []
  if (before?.status !== after?.status) {
    changes.push(change('status', before?.status, after?.status))
  }
  if (differs(before?.origin, after?.origin)) {
    changes.push(change('origin', before?.origin, after?.origin))
  }
  changes.push(...keyedChanges('metadata', before?.metadata, after?.metadata))
  changes.push(...keyedChanges('screeningCriteria', before?.screeningCriteria, after?.screeningCriteria))
  return changes
}

/**
 * Net per-record changes from `before` to `after`, ordered by record id
 */
export function diffSnapshots(before: Snapshot, after: Snapshot): Map<RecordId, FieldChange[]> {
  const previous = new Map(before.records.map((record) => [record.id, record]))
  const next = new Map(after.records.map((record) => [record.id, record]))
  const ids = [...new Set([...previous.keys(), ...next.keys()])].sort()

  const result = new Map<RecordId, FieldChange[]>()
  for (const id of ids) {
    const changes = diffRecords(previous.get(id), next.get(id))
    const collapsedBefore = Object.hasOwn(before.duplicates, id) ? before.duplicates[id] : undefined
    const collapsedAfter = Object.hasOwn(after.duplicates, id) ? after.duplicates[id] : undefined
    if (collapsedBefore !== collapsedAfter) {
      changes.push(change('collapsedInto', collapsedBefore, collapsedAfter))
    }
    if (changes.length > 0) {
      result.set(id, changes)
    }
  }
  return result
}

/**
 * Three-way merge of record snapshots
 * @module merge/snapshot-merge
 */

import { isExclusion, isReachable, type RecordStatus } from '../core/status/lattice.js'
import { stableStringify } from '../history/hashing.js'
import type { ScalarConflictPolicy } from '../types/config.js'
import type {
  CriterionDecision,
  FieldValue,
  ProvenanceNote,
  RecordId,
  ReviewRecord,
  Snapshot,
} from '../types/record.js'
import { cloneRecord } from '../types/record.js'
import { getScalarPolicy, type MergeSide, type ScalarPolicyFunction } from './policies.js'
import type { MergeConflict, SnapshotMergeResult } from './types.js'

interface MergeState {
  policy: ScalarPolicyFunction
  conflicts: MergeConflict[]
  autoResolved: SnapshotMergeResult['autoResolved']
}

interface Merged<T> {
  value: T | undefined
  /** Side the value came from; `both` when the two sides agree */
  side: MergeSide | 'both'
}

function same(a: unknown, b: unknown): boolean {
  if (a === undefined || b === undefined) return a === b
  return stableStringify(a) === stableStringify(b)
}

function own<T>(map: Record<string, T> | undefined, key: string): T | undefined {
  return map !== undefined && Object.hasOwn(map, key) ? map[key] : undefined
}

function sortedKeys(...maps: Array<Record<string, unknown> | undefined>): string[] {
  const keys = new Set<string>()
  for (const map of maps) {
    for (const key of Object.keys(map ?? {})) keys.add(key)
  }
  return [...keys].sort()
}

function laterNote(
  a: ProvenanceNote | undefined,
  b: ProvenanceNote | undefined,
): ProvenanceNote | undefined {
  if (!a) return b
  if (!b) return a
  if (a.setAt !== b.setAt) return a.setAt > b.setAt ? a : b
  return stableStringify(a) >= stableStringify(b) ? a : b
}

/**
 * Merges one value edited on both sides of the base
 */
function mergeValue<T>(
  state: MergeState,
  recordId: RecordId,
  path: string,
  values: { base: T | undefined; ours: T | undefined; theirs: T | undefined },
  notes: { ours?: ProvenanceNote; theirs?: ProvenanceNote } = {},
): Merged<T> {
  const { base, ours, theirs } = values
  if (same(ours, theirs)) return { value: ours, side: 'both' }
  if (same(base, ours)) return { value: theirs, side: 'theirs' }
  if (same(base, theirs)) return { value: ours, side: 'ours' }

  const choice = state.policy({ ours, theirs, oursNote: notes.ours, theirsNote: notes.theirs })
  if (choice !== null) {
    state.autoResolved.push({ recordId, path, take: choice })
    return { value: choice === 'ours' ? ours : theirs, side: choice }
  }

  state.conflicts.push({ recordId, path, ours, theirs })
  return { value: ours, side: 'ours' }
}

/**
 * Status moves on both sides merge forward to the further status when the
 * pipeline leads there from the other one. Moves into an exclusion, and
 * manual reopenings, need both sides to agree.
 */
function mergeStatus(
  state: MergeState,
  recordId: RecordId,
  base: RecordStatus | undefined,
  ours: RecordStatus,
  theirs: RecordStatus,
): Merged<RecordStatus> {
  if (ours === theirs) return { value: ours, side: 'both' }
  if (base === ours) return { value: theirs, side: 'theirs' }
  if (base === theirs) return { value: ours, side: 'ours' }

  if (isReachable(ours, theirs, 'automatic') && !isExclusion(theirs)) return { value: theirs, side: 'theirs' }
  if (isReachable(theirs, ours, 'automatic') && !isExclusion(ours)) return { value: ours, side: 'ours' }

  state.conflicts.push({ recordId, path: 'status', ours, theirs })
  return { value: ours, side: 'ours' }
}

function pickNote(
  side: MergeSide | 'both',
  ours: ProvenanceNote | undefined,
  theirs: ProvenanceNote | undefined,
): ProvenanceNote | undefined {
  if (side === 'ours') return ours ?? theirs
  if (side === 'theirs') return theirs ?? ours
  return laterNote(ours, theirs)
}

function mergeOrigin(base: readonly string[], ours: readonly string[], theirs: readonly string[]): string[] {
  if (same(ours, theirs)) return [...ours]
  const kept = base.filter((tag) => ours.includes(tag) || theirs.includes(tag))
  const added = [...new Set([...ours, ...theirs])].filter((tag) => !kept.includes(tag)).sort()
  return [...kept, ...added]
}

function mergeRecord(
  state: MergeState,
  base: ReviewRecord | undefined,
  ours: ReviewRecord,
  theirs: ReviewRecord,
): ReviewRecord {
  const id = ours.id
  const noteSides = new Map<string, MergeSide | 'both'>()

  const status = mergeStatus(state, id, base?.status, ours.status, theirs.status)
  noteSides.set('status', status.side)

  const metadata: Record<string, FieldValue> = {}
  for (const field of sortedKeys(base?.metadata, ours.metadata, theirs.metadata)) {
    const merged = mergeValue(
      state,
      id,
      `metadata.${field}`,
      {
        base: own(base?.metadata, field),
        ours: own(ours.metadata, field),
        theirs: own(theirs.metadata, field),
      },
      { ours: own(ours.provenanceNotes, field), theirs: own(theirs.provenanceNotes, field) },
    )
    if (merged.value !== undefined) metadata[field] = merged.value
    noteSides.set(field, merged.side)
  }

  let screeningCriteria: Record<string, CriterionDecision> | undefined
  if (ours.screeningCriteria !== undefined || theirs.screeningCriteria !== undefined) {
    screeningCriteria = {}
    const criteriaNotes = {
      ours: own(ours.provenanceNotes, 'screeningCriteria'),
      theirs: own(theirs.provenanceNotes, 'screeningCriteria'),
    }
    for (const name of sortedKeys(base?.screeningCriteria, ours.screeningCriteria, theirs.screeningCriteria)) {
      const merged = mergeValue(
        state,
        id,
        `screeningCriteria.${name}`,
        {
          base: own(base?.screeningCriteria, name),
          ours: own(ours.screeningCriteria, name),
          theirs: own(theirs.screeningCriteria, name),
        },
        criteriaNotes,
      )
      if (merged.value !== undefined) screeningCriteria[name] = merged.value
    }
  }

  const provenanceNotes: Record<string, ProvenanceNote> = {}
  for (const key of sortedKeys(ours.provenanceNotes, theirs.provenanceNotes)) {
    const note = pickNote(
      noteSides.get(key) ?? 'both',
      own(ours.provenanceNotes, key),
      own(theirs.provenanceNotes, key),
    )
    if (note) provenanceNotes[key] = note
  }

  const record: ReviewRecord = {
    id,
    status: status.value ?? ours.status,
    origin: mergeOrigin(base?.origin ?? [], ours.origin, theirs.origin),
    metadata,
    provenanceNotes,
  }
  if (screeningCriteria !== undefined) {
    record.screeningCriteria = screeningCriteria
  }
  return record
}

function mergeDuplicates(
  state: MergeState,
  base: Snapshot,
  ours: Snapshot,
  theirs: Snapshot,
): Record<RecordId, RecordId> {
  const duplicates: Record<RecordId, RecordId> = {}
  for (const id of sortedKeys(base.duplicates, ours.duplicates, theirs.duplicates)) {
    const merged = mergeValue(state, id, 'collapsedInto', {
      base: own(base.duplicates, id),
      ours: own(ours.duplicates, id),
      theirs: own(theirs.duplicates, id),
    })
    if (merged.value !== undefined) duplicates[id] = merged.value
  }

  // Collapses made on different sides must not form a cycle
  for (const id of Object.keys(duplicates).sort()) {
    const visited = new Set<RecordId>([id])
    let next = own(duplicates, id)
    while (next !== undefined && !visited.has(next)) {
      visited.add(next)
      next = own(duplicates, next)
    }
    if (next === undefined) continue

    state.conflicts.push({
      recordId: id,
      path: 'collapsedInto',
      ours: own(ours.duplicates, id),
      theirs: own(theirs.duplicates, id),
    })
    const kept = own(ours.duplicates, id)
    if (kept === undefined) {
      delete duplicates[id]
    } else {
      duplicates[id] = kept
    }
  }

  return duplicates
}

function rootOf(duplicates: Record<RecordId, RecordId>, id: RecordId): RecordId {
  let current = id
  const visited = new Set<RecordId>()
  let next = own(duplicates, current)
  while (next !== undefined && !visited.has(next)) {
    visited.add(current)
    current = next
    next = own(duplicates, current)
  }
  return current
}

function indexRecords(snapshot: Snapshot): Map<RecordId, ReviewRecord> {
  return new Map(snapshot.records.map((record) => [record.id, record]))
}

/**
 * Merges two snapshots that diverged from a common base.
 *
 * Records changed on one side only are taken from that side. Records changed
 * on both are merged field by field; incompatible edits are returned as
 * conflicts and keep the local value in the merged snapshot.
 *
 * @example
 * ```typescript
 * const { snapshot, conflicts } = mergeSnapshots(base, ours, theirs, 'later-timestamp-wins')
 * if (conflicts.length === 0) {
 *   await changeLog.commitMerge(snapshot, operation, [oursId, theirsId])
 * }
 * ```
 */
export function mergeSnapshots(
  base: Snapshot,
  ours: Snapshot,
  theirs: Snapshot,
  policy: ScalarConflictPolicy,
): SnapshotMergeResult {
  const state: MergeState = { policy: getScalarPolicy(policy), conflicts: [], autoResolved: [] }
  const baseRecords = indexRecords(base)
  const ourRecords = indexRecords(ours)
  const theirRecords = indexRecords(theirs)

  const ids = [...new Set([...ourRecords.keys(), ...theirRecords.keys()])].sort()
  const records: ReviewRecord[] = []
  for (const id of ids) {
    const baseRecord = baseRecords.get(id)
    const ourRecord = ourRecords.get(id)
    const theirRecord = theirRecords.get(id)

    if (!ourRecord || !theirRecord) {
      const only = ourRecord ?? theirRecord
      if (only) records.push(cloneRecord(only))
      continue
    }
    if (same(ourRecord, theirRecord) || (baseRecord && same(baseRecord, theirRecord))) {
      records.push(cloneRecord(ourRecord))
      continue
    }
    if (baseRecord && same(baseRecord, ourRecord)) {
      records.push(cloneRecord(theirRecord))
      continue
    }
    records.push(mergeRecord(state, baseRecord, ourRecord, theirRecord))
  }

  const duplicates = mergeDuplicates(state, base, ours, theirs)

  // A survivor reached through collapses from both sides keeps every origin tag
  const byId = new Map(records.map((record) => [record.id, record]))
  for (const duplicateId of Object.keys(duplicates).sort()) {
    const duplicate = byId.get(duplicateId)
    const survivor = byId.get(rootOf(duplicates, duplicateId))
    if (!duplicate || !survivor || survivor === duplicate) continue
    for (const tag of duplicate.origin) {
      if (!survivor.origin.includes(tag)) survivor.origin.push(tag)
    }
  }

  return {
    snapshot: { records, duplicates },
    conflicts: state.conflicts,
    autoResolved: state.autoResolved,
  }
}

/**
 * Applies human decisions to a merge result, taking the chosen side's value
 * for each conflicting path
 */
export function applyResolutions(
  result: SnapshotMergeResult,
  theirs: Snapshot,
  resolutions: ReadonlyArray<{ recordId: RecordId; path: string; take: MergeSide }>,
): Snapshot {
  const snapshot: Snapshot = {
    records: result.snapshot.records.map(cloneRecord),
    duplicates: { ...result.snapshot.duplicates },
  }
  const records = new Map(snapshot.records.map((record) => [record.id, record]))
  const incoming = indexRecords(theirs)

  for (const resolution of resolutions) {
    if (resolution.take === 'ours') continue

    if (resolution.path === 'collapsedInto') {
      const survivor = own(theirs.duplicates, resolution.recordId)
      if (survivor === undefined) {
        delete snapshot.duplicates[resolution.recordId]
      } else {
        snapshot.duplicates[resolution.recordId] = survivor
      }
      continue
    }

    const target = records.get(resolution.recordId)
    const source = incoming.get(resolution.recordId)
    if (!target || !source) continue

    const [area, key] = splitPath(resolution.path)
    if (area === 'status') {
      target.status = source.status
      copyNote(target, source, 'status')
    } else if (area === 'metadata' && key !== undefined) {
      const value = own(source.metadata, key)
      if (value === undefined) {
        delete target.metadata[key]
      } else {
        target.metadata[key] = value
      }
      copyNote(target, source, key)
    } else if (area === 'screeningCriteria' && key !== undefined) {
      const decision = own(source.screeningCriteria, key)
      const criteria = { ...target.screeningCriteria }
      if (decision === undefined) {
        delete criteria[key]
      } else {
        criteria[key] = decision
      }
      target.screeningCriteria = criteria
      copyNote(target, source, 'screeningCriteria')
    }
  }

  return snapshot
}

function splitPath(path: string): [string, string | undefined] {
  const dot = path.indexOf('.')
  return dot === -1 ? [path, undefined] : [path.slice(0, dot), path.slice(dot + 1)]
}

function copyNote(target: ReviewRecord, source: ReviewRecord, key: string): void {
  const note = own(source.provenanceNotes, key)
  if (note) {
    target.provenanceNotes[key] = { ...note }
  }
}

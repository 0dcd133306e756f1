/**
 * Decoding of persisted history objects
 * @module history/serialization
 */

import type {
  CriterionDecision,
  FieldValue,
  ProvenanceNote,
  ReviewRecord,
  Snapshot,
} from '../types/record.js'
import type {
  FailureEntry,
  OperationKind,
  OperationRecord,
  TransitionEntry,
} from '../types/operation.js'
import { isRecordStatus, type RecordStatus } from '../core/status/lattice.js'
import { isPlainObject } from '../utils/errors.js'
import { CorruptionDetectedError } from './history-error.js'
import type { Commit } from './types.js'

const OPERATION_KINDS: readonly OperationKind[] = [
  'init',
  'retrieve',
  'stage',
  'manual-override',
  'undo',
  'undo-record',
  'merge',
]

class DecodeError extends Error {}

function fail(path: string, reason: string): never {
  throw new DecodeError(`${path}: ${reason}`)
}

function asObject(value: unknown, path: string): Record<string, unknown> {
  if (!isPlainObject(value)) fail(path, 'expected an object')
  return value
}

function asString(value: unknown, path: string): string {
  if (typeof value !== 'string') fail(path, 'expected a string')
  return value
}

function asStringArray(value: unknown, path: string): string[] {
  return asArray(value, path).map((item, index) => asString(item, `${path}[${index}]`))
}

function asFieldValue(value: unknown, path: string): FieldValue {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') return value
  if (typeof value === 'number' && Number.isFinite(value)) return value
  if (Array.isArray(value)) return asStringArray(value, path)
  return fail(path, 'unsupported field value')
}

function asStatus(value: unknown, path: string): RecordStatus {
  if (isRecordStatus(value)) return value
  return fail(path, 'not a lattice status')
}

function asArray(value: unknown, path: string): unknown[] {
  if (!Array.isArray(value)) fail(path, 'expected an array')
  return value
}

function asDecision(value: unknown, path: string): CriterionDecision {
  if (value === 'in' || value === 'out') return value
  return fail(path, `expected 'in' or 'out'`)
}

function decodeNote(value: unknown, path: string): ProvenanceNote {
  const raw = asObject(value, path)
  return {
    source: asString(raw.source, `${path}.source`),
    note: asString(raw.note, `${path}.note`),
    setAt: asString(raw.setAt, `${path}.setAt`),
    operationId: asString(raw.operationId, `${path}.operationId`),
  }
}

function decodeRecord(value: unknown, path: string): ReviewRecord {
  const raw = asObject(value, path)
  const metadata: Record<string, FieldValue> = {}
  for (const [field, fieldValue] of Object.entries(asObject(raw.metadata, `${path}.metadata`))) {
    metadata[field] = asFieldValue(fieldValue, `${path}.metadata.${field}`)
  }

  const provenanceNotes: Record<string, ProvenanceNote> = {}
  const notes = asObject(raw.provenanceNotes, `${path}.provenanceNotes`)
  for (const [field, note] of Object.entries(notes)) {
    provenanceNotes[field] = decodeNote(note, `${path}.provenanceNotes.${field}`)
  }

  const record: ReviewRecord = {
    id: asString(raw.id, `${path}.id`),
    status: asStatus(raw.status, `${path}.status`),
    origin: asStringArray(raw.origin, `${path}.origin`),
    metadata,
    provenanceNotes,
  }

  if (raw.screeningCriteria !== undefined) {
    const criteria: Record<string, CriterionDecision> = {}
    const rawCriteria = asObject(raw.screeningCriteria, `${path}.screeningCriteria`)
    for (const [name, decision] of Object.entries(rawCriteria)) {
      criteria[name] = asDecision(decision, `${path}.screeningCriteria.${name}`)
    }
    record.screeningCriteria = criteria
  }

  return record
}

function decodeSnapshotValue(value: unknown): Snapshot {
  const raw = asObject(value, 'snapshot')

  const duplicates: Record<string, string> = {}
  for (const [id, survivor] of Object.entries(asObject(raw.duplicates, 'snapshot.duplicates'))) {
    duplicates[id] = asString(survivor, `snapshot.duplicates.${id}`)
  }

  return {
    records: asArray(raw.records, 'snapshot.records').map((record, index) =>
      decodeRecord(record, `snapshot.records[${index}]`),
    ),
    duplicates,
  }
}

function decodeTransition(value: unknown, path: string): TransitionEntry {
  const raw = asObject(value, path)
  const entry: TransitionEntry = {
    recordId: asString(raw.recordId, `${path}.recordId`),
    from: raw.from === null ? null : asStatus(raw.from, `${path}.from`),
    to: asStatus(raw.to, `${path}.to`),
  }
  if (raw.justification !== undefined) {
    entry.justification = asString(raw.justification, `${path}.justification`)
  }
  return entry
}

function decodeFailure(value: unknown, path: string): FailureEntry {
  const raw = asObject(value, path)
  const entry: FailureEntry = {
    recordId: asString(raw.recordId, `${path}.recordId`),
    code: asString(raw.code, `${path}.code`),
    reason: asString(raw.reason, `${path}.reason`),
  }
  if (raw.endpoint !== undefined) {
    entry.endpoint = asString(raw.endpoint, `${path}.endpoint`)
  }
  return entry
}

function decodeOperation(value: unknown, path: string): OperationRecord {
  const raw = asObject(value, path)
  const kind =
    OPERATION_KINDS.find((candidate) => candidate === raw.kind) ??
    fail(`${path}.kind`, 'unknown operation kind')

  const counts: Record<string, number> = {}
  for (const [key, count] of Object.entries(asObject(raw.counts, `${path}.counts`))) {
    counts[key] =
      typeof count === 'number' ? count : fail(`${path}.counts.${key}`, 'expected a number')
  }

  const operation: OperationRecord = {
    id: asString(raw.id, `${path}.id`),
    kind,
    name: asString(raw.name, `${path}.name`),
    actor: asString(raw.actor, `${path}.actor`),
    timestamp: asString(raw.timestamp, `${path}.timestamp`),
    counts,
    transitions: asArray(raw.transitions, `${path}.transitions`).map((entry, index) =>
      decodeTransition(entry, `${path}.transitions[${index}]`),
    ),
    failures: asArray(raw.failures, `${path}.failures`).map((entry, index) =>
      decodeFailure(entry, `${path}.failures[${index}]`),
    ),
  }
  if (raw.details !== undefined) {
    operation.details = asObject(raw.details, `${path}.details`)
  }
  return operation
}

/**
 * Decodes a stored snapshot
 * @throws {CorruptionDetectedError} If the content is malformed
 */
export function decodeSnapshot(value: unknown, hash: string): Snapshot {
  try {
    return decodeSnapshotValue(value)
  } catch (error) {
    if (error instanceof DecodeError) {
      throw new CorruptionDetectedError('snapshot', hash, error.message)
    }
    throw error
  }
}

/**
 * Decodes a stored commit
 * @throws {CorruptionDetectedError} If the content is malformed
 */
export function decodeCommit(value: unknown, id: string): Commit {
  try {
    const raw = asObject(value, 'commit')
    return {
      id: asString(raw.id, 'commit.id'),
      parents: asStringArray(raw.parents, 'commit.parents'),
      snapshotHash: asString(raw.snapshotHash, 'commit.snapshotHash'),
      operation: decodeOperation(raw.operation, 'commit.operation'),
    }
  } catch (error) {
    if (error instanceof DecodeError) {
      throw new CorruptionDetectedError('commit', id, error.message)
    }
    throw error
  }
}

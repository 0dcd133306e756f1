/**
 * Record invariant checks applied at the store boundary
 * @module core/store/validation
 */

import type { ReviewRecord } from '../../types/record.js'
import { isRecordStatus, isScreened } from '../status/lattice.js'
import { isPlainObject } from '../../utils/errors.js'
import { RecordValidationError } from './store-error.js'

export interface RecordValidationOptions {
  /** Criteria names declared in the project configuration */
  criteria: readonly string[]
}

function isFieldValue(value: unknown): boolean {
  if (value === null) return true
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true
    case 'number':
      return Number.isFinite(value)
    default:
      return Array.isArray(value) && value.every((item) => typeof item === 'string')
  }
}

/**
 * Validates the shape and invariants of a single record
 * @throws {RecordValidationError} If any invariant is violated
 */
export function validateRecord(record: ReviewRecord, options: RecordValidationOptions): void {
  const id = typeof record.id === 'string' ? record.id : String(record.id)

  if (typeof record.id !== 'string' || record.id.trim().length === 0) {
    throw new RecordValidationError(id, 'id', 'id must be a non-empty string')
  }

  if (!isRecordStatus(record.status)) {
    throw new RecordValidationError(id, 'status', `'${String(record.status)}' is not a lattice status`)
  }

  if (!Array.isArray(record.origin)) {
    throw new RecordValidationError(id, 'origin', 'origin must be an array')
  }
  const seen = new Set<string>()
  for (const tag of record.origin) {
    if (typeof tag !== 'string' || tag.trim().length === 0) {
      throw new RecordValidationError(id, 'origin', 'origin tags must be non-empty strings')
    }
    if (seen.has(tag)) {
      throw new RecordValidationError(id, 'origin', `duplicate origin tag '${tag}'`)
    }
    seen.add(tag)
  }

  if (!isPlainObject(record.metadata)) {
    throw new RecordValidationError(id, 'metadata', 'metadata must be a plain object')
  }
  for (const [field, value] of Object.entries(record.metadata)) {
    if (!isFieldValue(value)) {
      throw new RecordValidationError(id, `metadata.${field}`, 'unsupported field value', { value })
    }
  }

  if (!isPlainObject(record.provenanceNotes)) {
    throw new RecordValidationError(id, 'provenanceNotes', 'provenanceNotes must be a plain object')
  }
  for (const [field, note] of Object.entries(record.provenanceNotes)) {
    if (
      !isPlainObject(note) ||
      typeof note.source !== 'string' ||
      typeof note.note !== 'string' ||
      typeof note.setAt !== 'string' ||
      typeof note.operationId !== 'string'
    ) {
      throw new RecordValidationError(id, `provenanceNotes.${field}`, 'malformed provenance note')
    }
  }

  if (record.screeningCriteria !== undefined) {
    if (!isScreened(record.status)) {
      throw new RecordValidationError(
        id,
        'screeningCriteria',
        `screening criteria are only allowed once screened (status '${record.status}')`,
      )
    }
    if (!isPlainObject(record.screeningCriteria)) {
      throw new RecordValidationError(id, 'screeningCriteria', 'must be a plain object')
    }
    for (const [criterion, decision] of Object.entries(record.screeningCriteria)) {
      if (!options.criteria.includes(criterion)) {
        throw new RecordValidationError(
          id,
          `screeningCriteria.${criterion}`,
          'criterion is not declared in the project configuration',
        )
      }
      if (decision !== 'in' && decision !== 'out') {
        throw new RecordValidationError(
          id,
          `screeningCriteria.${criterion}`,
          `decision must be 'in' or 'out'`,
        )
      }
    }
  }
}

/**
 * Checks that an update keeps every origin tag of the stored version
 * @throws {RecordValidationError} If a tag was dropped
 */
export function validateOriginRetained(previous: ReviewRecord, next: ReviewRecord): void {
  const retained = new Set(next.origin)
  for (const tag of previous.origin) {
    if (!retained.has(tag)) {
      throw new RecordValidationError(next.id, 'origin', `origin tag '${tag}' would be lost`)
    }
  }
}

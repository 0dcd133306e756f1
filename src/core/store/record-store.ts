/**
 * Authoritative record collection of one working copy
 * @module core/store/record-store
 */

import type { RecordId, ReviewRecord, Snapshot } from '../../types/record.js'
import { cloneRecord } from '../../types/record.js'
import type { RecordStatus } from '../status/lattice.js'
import { RecordNotFoundError, RecordValidationError } from './store-error.js'
import { validateOriginRetained, validateRecord } from './validation.js'

/**
 * Options for iterating records
 */
export interface IterateOptions {
  /** Only records with this status (or one of these statuses) */
  status?: RecordStatus | readonly RecordStatus[]
  /** Include records collapsed into a survivor (default: false) */
  includeCollapsed?: boolean
}

export interface RecordStoreOptions {
  /** Screening criteria declared in the project configuration */
  criteria?: readonly string[]
}

function byId(a: { id: string }, b: { id: string }): number {
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0
}

/**
 * RecordStore holds every record of a review, indexed by stable id.
 *
 * Records are never removed. Duplicates collapsed during deduplication stay
 * in the arena and are linked to their survivor, so origin provenance and
 * undo can reconstruct the state before the collapse.
 *
 * @example
 * ```typescript
 * const store = new RecordStore({ criteria: ['population'] })
 * store.upsert({
 *   id: 'r1',
 *   status: 'md_retrieved',
 *   origin: ['crossref.bib/0001'],
 *   metadata: { title: 'Coordination in open source' },
 *   provenanceNotes: {},
 * })
 * store.count('md_retrieved') // 1
 * ```
 */
export class RecordStore {
  private readonly records = new Map<RecordId, ReviewRecord>()
  private readonly duplicates = new Map<RecordId, RecordId>()
  private readonly criteria: readonly string[]

  constructor(options: RecordStoreOptions = {}) {
    this.criteria = options.criteria ?? []
  }

  /**
   * Builds a store from a snapshot, validating every record
   */
  static fromSnapshot(snapshot: Snapshot, options: RecordStoreOptions = {}): RecordStore {
    const store = new RecordStore(options)
    for (const record of snapshot.records) {
      store.upsert(record)
    }
    for (const [duplicateId, survivorId] of Object.entries(snapshot.duplicates)) {
      store.markDuplicate(duplicateId, survivorId)
    }
    return store
  }

  get size(): number {
    return this.records.size
  }

  get declaredCriteria(): readonly string[] {
    return this.criteria
  }

  has(id: RecordId): boolean {
    return this.records.has(id)
  }

  /**
   * Returns a copy of the record, or undefined if absent
   */
  get(id: RecordId): ReviewRecord | undefined {
    const record = this.records.get(id)
    return record ? cloneRecord(record) : undefined
  }

  /**
   * Returns a copy of the record
   * @throws {RecordNotFoundError} If the id is unknown
   */
  require(id: RecordId): ReviewRecord {
    const record = this.get(id)
    if (!record) {
      throw new RecordNotFoundError(id)
    }
    return record
  }

  /**
   * Inserts or replaces a record after checking every record invariant.
   * The stored record is untouched when validation fails.
   *
   * @throws {RecordValidationError} If the record is malformed
   */
  upsert(record: ReviewRecord): void {
    validateRecord(record, { criteria: this.criteria })

    const previous = this.records.get(record.id)
    if (previous) {
      validateOriginRetained(previous, record)
    }

    this.records.set(record.id, cloneRecord(record))
  }

  /**
   * Records in id order
   */
  *iterate(options: IterateOptions = {}): IterableIterator<ReviewRecord> {
    const statuses =
      options.status === undefined
        ? undefined
        : typeof options.status === 'string'
          ? [options.status]
          : options.status

    const ordered = [...this.records.values()].sort(byId)
    for (const record of ordered) {
      if (!options.includeCollapsed && this.duplicates.has(record.id)) continue
      if (statuses && !statuses.includes(record.status)) continue
      yield cloneRecord(record)
    }
  }

  /**
   * Number of active records, optionally with the given status
   */
  count(status?: RecordStatus): number {
    let total = 0
    for (const record of this.records.values()) {
      if (this.duplicates.has(record.id)) continue
      if (status !== undefined && record.status !== status) continue
      total++
    }
    return total
  }

  /**
   * Collapses `duplicateId` into `survivorId`.
   * The survivor must already carry every origin tag of the duplicate.
   *
   * @throws {RecordNotFoundError} If either record is absent
   * @throws {RecordValidationError} If the collapse would lose provenance or form a cycle
   */
  markDuplicate(duplicateId: RecordId, survivorId: RecordId): void {
    const duplicate = this.records.get(duplicateId)
    if (!duplicate) throw new RecordNotFoundError(duplicateId)
    if (!this.records.has(survivorId)) throw new RecordNotFoundError(survivorId)

    const root = this.resolveId(survivorId)
    if (root === duplicateId) {
      throw new RecordValidationError(duplicateId, 'duplicates', 'a record cannot be collapsed into itself')
    }
    const existing = this.duplicates.get(duplicateId)
    if (existing !== undefined && existing !== root) {
      throw new RecordValidationError(duplicateId, 'duplicates', `already collapsed into '${existing}'`)
    }

    const survivor = this.records.get(root)
    if (survivor) {
      const retained = new Set(survivor.origin)
      const missing = duplicate.origin.filter((tag) => !retained.has(tag))
      if (missing.length > 0) {
        throw new RecordValidationError(root, 'origin', 'survivor does not carry the duplicate origin', {
          missing,
        })
      }
    }

    this.duplicates.set(duplicateId, root)
  }

  /**
   * Follows collapse links to the surviving record id
   */
  resolveId(id: RecordId): RecordId {
    let current = id
    const visited = new Set<RecordId>()
    let next = this.duplicates.get(current)
    while (next !== undefined && !visited.has(next)) {
      visited.add(current)
      current = next
      next = this.duplicates.get(current)
    }
    return current
  }

  isCollapsed(id: RecordId): boolean {
    return this.duplicates.has(id)
  }

  /**
   * Ids collapsed (directly or transitively) into the given survivor
   */
  collapsedInto(survivorId: RecordId): RecordId[] {
    const result: RecordId[] = []
    for (const duplicateId of this.duplicates.keys()) {
      if (duplicateId !== survivorId && this.resolveId(duplicateId) === survivorId) {
        result.push(duplicateId)
      }
    }
    return result.sort()
  }

  /**
   * Full, ordered copy of the store content
   */
  toSnapshot(): Snapshot {
    const records = [...this.records.values()].sort(byId).map(cloneRecord)
    const duplicates: Record<RecordId, RecordId> = {}
    for (const duplicateId of [...this.duplicates.keys()].sort()) {
      duplicates[duplicateId] = this.resolveId(duplicateId)
    }
    return { records, duplicates }
  }

  clone(): RecordStore {
    return RecordStore.fromSnapshot(this.toSnapshot(), { criteria: this.criteria })
  }

  /**
   * Replaces the whole content with that of another store
   */
  replaceWith(other: RecordStore): void {
    const snapshot = other.toSnapshot()
    this.records.clear()
    this.duplicates.clear()
    for (const record of snapshot.records) {
      this.records.set(record.id, record)
    }
    for (const [duplicateId, survivorId] of Object.entries(snapshot.duplicates)) {
      this.duplicates.set(duplicateId, survivorId)
    }
  }
}

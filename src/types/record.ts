import type { RecordStatus } from '../core/status/lattice.js'

/**
 * Stable identifier of a record within one review.
 * Assigned at creation and never reused.
 */
export type RecordId = string

/**
 * Values a bibliographic field may hold once serialised.
 */
export type FieldValue = string | number | boolean | string[] | null

/**
 * Decision recorded for one screening criterion.
 */
export type CriterionDecision = 'in' | 'out'

/**
 * Note describing how a field was last set.
 */
export interface ProvenanceNote {
  /** Endpoint identifier or actor that set the field */
  source: string
  /** Free-text explanation (justification, heuristic name, ...) */
  note: string
  /** ISO-8601 timestamp of the change */
  setAt: string
  /** Operation that made the change */
  operationId: string
}

/**
 * A bibliographic entry tracked through the review pipeline.
 */
export interface ReviewRecord {
  /** Immutable identifier */
  id: RecordId

  /** Current lifecycle status */
  status: RecordStatus

  /**
   * Ordered set of provenance tags, e.g. `crossref.bib/000012`.
   * Collapsing duplicates unions the tags of every contributing record.
   */
  origin: string[]

  /** Bibliographic fields (title, author, year, journal, ...) */
  metadata: Record<string, FieldValue>

  /** Screening decisions, keyed by criterion name */
  screeningCriteria?: Record<string, CriterionDecision>

  /** Keyed by field name (`status` for the lifecycle field) */
  provenanceNotes: Record<string, ProvenanceNote>
}

/**
 * Fields a search endpoint returns for a newly harvested result.
 */
export interface RetrievedRecord {
  /** Provenance tag identifying the search result */
  origin: string
  metadata: Record<string, FieldValue>
}

/**
 * Full content of a record store at one history point.
 */
export interface Snapshot {
  /** Every record in the arena, ordered by id */
  records: ReviewRecord[]
  /** Collapsed record id -> id it was collapsed into */
  duplicates: Record<RecordId, RecordId>
}

/**
 * Creates an empty snapshot.
 */
export function emptySnapshot(): Snapshot {
  return { records: [], duplicates: {} }
}

/**
 * Deep-copies a record.
 */
export function cloneRecord(record: ReviewRecord): ReviewRecord {
  const metadata: Record<string, FieldValue> = {}
  for (const [key, value] of Object.entries(record.metadata)) {
    metadata[key] = Array.isArray(value) ? [...value] : value
  }

  const provenanceNotes: Record<string, ProvenanceNote> = {}
  for (const [key, note] of Object.entries(record.provenanceNotes)) {
    provenanceNotes[key] = { ...note }
  }

  const copy: ReviewRecord = {
    id: record.id,
    status: record.status,
    origin: [...record.origin],
    metadata,
    provenanceNotes,
  }
  if (record.screeningCriteria !== undefined) {
    copy.screeningCriteria = { ...record.screeningCriteria }
  }
  return copy
}

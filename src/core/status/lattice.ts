/**
 * Record status lattice: the fixed set of lifecycle states and the edges
 * allowed between them.
 * @module core/status/lattice
 */

/**
 * Every status a record may hold, in pipeline order.
 */
export const RECORD_STATUSES = [
  'md_retrieved',
  'md_imported',
  'md_needs_manual_preparation',
  'md_prepared',
  'md_processed',
  'rev_prescreen_excluded',
  'rev_prescreen_included',
  'pdf_needs_manual_retrieval',
  'pdf_not_available',
  'pdf_imported',
  'pdf_needs_manual_preparation',
  'pdf_prepared',
  'rev_excluded',
  'rev_included',
  'rev_synthesized',
] as const

export type RecordStatus = (typeof RECORD_STATUSES)[number]

/**
 * Kind of edge between two statuses.
 * - automatic: taken by pipeline stages through the normal transition path
 * - manual: reopens an absorbing status, only through a manual override
 */
export type TransitionKind = 'automatic' | 'manual'

const AUTOMATIC_EDGES: Record<RecordStatus, readonly RecordStatus[]> = {
  md_retrieved: ['md_imported'],
  md_imported: ['md_prepared', 'md_needs_manual_preparation'],
  md_needs_manual_preparation: [],
  md_prepared: ['md_processed'],
  md_processed: ['rev_prescreen_included', 'rev_prescreen_excluded'],
  rev_prescreen_excluded: [],
  rev_prescreen_included: ['pdf_imported', 'pdf_needs_manual_retrieval'],
  pdf_needs_manual_retrieval: [],
  pdf_not_available: [],
  pdf_imported: ['pdf_prepared', 'pdf_needs_manual_preparation'],
  pdf_needs_manual_preparation: [],
  pdf_prepared: ['rev_included', 'rev_excluded'],
  rev_excluded: [],
  rev_included: ['rev_synthesized'],
  rev_synthesized: [],
}

const MANUAL_EDGES: Record<RecordStatus, readonly RecordStatus[]> = {
  md_retrieved: [],
  md_imported: [],
  md_needs_manual_preparation: ['md_prepared'],
  md_prepared: [],
  md_processed: [],
  rev_prescreen_excluded: ['rev_prescreen_included'],
  rev_prescreen_included: [],
  pdf_needs_manual_retrieval: ['pdf_imported', 'pdf_not_available'],
  pdf_not_available: ['pdf_imported'],
  pdf_imported: [],
  pdf_needs_manual_preparation: ['pdf_prepared'],
  pdf_prepared: [],
  rev_excluded: ['rev_included'],
  rev_included: [],
  rev_synthesized: [],
}

/**
 * Statuses at which screening decisions exist
 */
export const SCREENED_STATUSES: readonly RecordStatus[] = [
  'rev_excluded',
  'rev_included',
  'rev_synthesized',
]

/**
 * Statuses that end a record's active path
 */
export const TERMINAL_STATUSES: readonly RecordStatus[] = [
  'rev_prescreen_excluded',
  'pdf_not_available',
  'rev_excluded',
  'rev_synthesized',
]

export function isRecordStatus(value: unknown): value is RecordStatus {
  return typeof value === 'string' && (RECORD_STATUSES as readonly string[]).includes(value)
}

/**
 * Direct successors of a status along edges of the given kind.
 */
export function successors(
  status: RecordStatus,
  kind: TransitionKind = 'automatic',
): readonly RecordStatus[] {
  return kind === 'automatic' ? AUTOMATIC_EDGES[status] : MANUAL_EDGES[status]
}

/**
 * Classifies the edge `from -> to`, or returns null when no edge exists.
 */
export function edgeKind(from: RecordStatus, to: RecordStatus): TransitionKind | null {
  if (AUTOMATIC_EDGES[from].includes(to)) return 'automatic'
  if (MANUAL_EDGES[from].includes(to)) return 'manual'
  return null
}

/**
 * A status with no outgoing automatic edge.
 * Absorbing statuses only move again through a manual override.
 */
export function isAbsorbing(status: RecordStatus): boolean {
  return AUTOMATIC_EDGES[status].length === 0
}

/**
 * Terminal statuses that take a record out of the review
 */
export const EXCLUSION_STATUSES: readonly RecordStatus[] = [
  'rev_prescreen_excluded',
  'pdf_not_available',
  'rev_excluded',
]

export function isExclusion(status: RecordStatus): boolean {
  return EXCLUSION_STATUSES.includes(status)
}

export function isTerminal(status: RecordStatus): boolean {
  return TERMINAL_STATUSES.includes(status)
}

export function isScreened(status: RecordStatus): boolean {
  return SCREENED_STATUSES.includes(status)
}

/**
 * Whether `to` is reachable from `from` by following edges forward, manual
 * edges included unless `kind` is `automatic`. A status reaches itself.
 */
export function isReachable(
  from: RecordStatus,
  to: RecordStatus,
  kind: TransitionKind | 'any' = 'any',
): boolean {
  if (from === to) return true

  const visited = new Set<RecordStatus>([from])
  const queue: RecordStatus[] = [from]
  while (queue.length > 0) {
    const current = queue.shift()
    if (current === undefined) break
    const edges =
      kind === 'any'
        ? [...AUTOMATIC_EDGES[current], ...MANUAL_EDGES[current]]
        : successors(current, kind)
    for (const next of edges) {
      if (next === to) return true
      if (!visited.has(next)) {
        visited.add(next)
        queue.push(next)
      }
    }
  }
  return false
}

/**
 * Key used in operation counts, e.g. `pdf_imported->pdf_prepared`
 */
export function transitionKey(from: RecordStatus | null, to: RecordStatus): string {
  return `${from ?? 'new'}->${to}`
}

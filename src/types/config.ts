import type { ProcessingStage, StageName } from '../core/status/stages.js'

/**
 * Author entry in the project settings
 */
export interface ProjectAuthor {
  name: string
  initials: string
  email?: string
}

/**
 * Descriptive project settings
 */
export interface ProjectSettings {
  title: string
  /** Review type, e.g. `literature_review`, `scoping_review` */
  reviewType: string
  authors: ProjectAuthor[]
}

/**
 * Declared screening criterion
 */
export interface ScreeningCriterion {
  explanation: string
}

/**
 * Reference to a registered endpoint, as declared in the settings
 */
export interface EndpointRef {
  /** Identifier the endpoint is registered under, e.g. `local.pdf_prep.ocr` */
  endpoint: string
  /** Endpoint-specific options handed over at invocation */
  options?: Record<string, unknown>
}

/**
 * Settings of one pipeline stage
 */
export interface StageSettings {
  /** Endpoints applied in order */
  endpoints: EndpointRef[]
  /** Overrides the dispatch concurrency for this stage */
  concurrency?: number
  /** Overrides the endpoint timeout for this stage */
  timeoutMs?: number
}

/**
 * Defaults for endpoint invocation
 */
export interface DispatchConfig {
  /** Maximum records processed concurrently */
  concurrency: number
  /** Per-record endpoint timeout in milliseconds */
  timeoutMs: number
}

/**
 * How diverging scalar edits to the same field are reconciled during merge
 * - later-timestamp-wins: keep the value whose provenance note is newer
 * - ours: keep the local value
 * - theirs: keep the incoming value
 * - fail: report a hard conflict
 */
export type ScalarConflictPolicy = 'later-timestamp-wins' | 'ours' | 'theirs' | 'fail'

export const SCALAR_CONFLICT_POLICIES: readonly ScalarConflictPolicy[] = [
  'later-timestamp-wins',
  'ours',
  'theirs',
  'fail',
]

export interface MergeConfig {
  scalarConflictPolicy: ScalarConflictPolicy
}

/**
 * Complete project configuration (the `settings.json` of a review)
 */
export interface ProjectConfig {
  project: ProjectSettings
  /** Criteria available to screening, keyed by name */
  screening: { criteria: Record<string, ScreeningCriterion> }
  /** Per-stage settings; stages without an entry have no endpoints */
  stages: Partial<Record<StageName, StageSettings>>
  dispatch: DispatchConfig
  merge: MergeConfig
}

export const DEFAULT_DISPATCH_CONFIG: DispatchConfig = {
  concurrency: 4,
  timeoutMs: 30_000,
}

export const DEFAULT_MERGE_CONFIG: MergeConfig = {
  scalarConflictPolicy: 'later-timestamp-wins',
}

/**
 * Effective dispatch settings for one stage
 */
export function resolveStageDispatch(
  config: ProjectConfig,
  stage: StageName,
): DispatchConfig {
  const settings = config.stages[stage]
  return {
    concurrency: settings?.concurrency ?? config.dispatch.concurrency,
    timeoutMs: settings?.timeoutMs ?? config.dispatch.timeoutMs,
  }
}

/**
 * Names of the screening criteria declared in the configuration
 */
export function declaredCriteria(config: ProjectConfig): string[] {
  return Object.keys(config.screening.criteria)
}

export type { ProcessingStage, StageName }

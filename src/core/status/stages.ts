/**
 * Pipeline stage definitions
 * @module core/status/stages
 */

import type { RecordStatus } from './lattice.js'

/**
 * Stage that creates records from search results
 */
export type RetrievalStage = 'retrieve'

/**
 * Stages that move existing records forward
 */
export const PROCESSING_STAGES = [
  'load',
  'prep',
  'dedupe',
  'prescreen',
  'pdf_get',
  'pdf_prep',
  'screen',
  'data',
] as const

export type ProcessingStage = (typeof PROCESSING_STAGES)[number]

export type StageName = RetrievalStage | ProcessingStage

/**
 * Input and output statuses of each processing stage.
 * The first output is the default used when an endpoint edits a record
 * without naming a status.
 */
export const STAGE_DEFINITIONS = {
  load: { input: 'md_retrieved', outputs: ['md_imported'] },
  prep: { input: 'md_imported', outputs: ['md_prepared', 'md_needs_manual_preparation'] },
  dedupe: { input: 'md_prepared', outputs: ['md_processed'] },
  prescreen: {
    input: 'md_processed',
    outputs: ['rev_prescreen_included', 'rev_prescreen_excluded'],
  },
  pdf_get: {
    input: 'rev_prescreen_included',
    outputs: ['pdf_imported', 'pdf_needs_manual_retrieval'],
  },
  pdf_prep: { input: 'pdf_imported', outputs: ['pdf_prepared', 'pdf_needs_manual_preparation'] },
  screen: { input: 'pdf_prepared', outputs: ['rev_included', 'rev_excluded'] },
  data: { input: 'rev_included', outputs: ['rev_synthesized'] },
} as const satisfies Record<
  ProcessingStage,
  { input: RecordStatus; outputs: readonly [RecordStatus, ...RecordStatus[]] }
>

/**
 * Statuses a stage may move its candidates to
 */
export type StageOutputStatus<S extends ProcessingStage> =
  (typeof STAGE_DEFINITIONS)[S]['outputs'][number]

export function isProcessingStage(value: unknown): value is ProcessingStage {
  return typeof value === 'string' && (PROCESSING_STAGES as readonly string[]).includes(value)
}

export function isStageName(value: unknown): value is StageName {
  return value === 'retrieve' || isProcessingStage(value)
}

export function stageInput(stage: ProcessingStage): RecordStatus {
  return STAGE_DEFINITIONS[stage].input
}

export function stageOutputs(stage: ProcessingStage): readonly RecordStatus[] {
  return STAGE_DEFINITIONS[stage].outputs
}

export function defaultStageOutput(stage: ProcessingStage): RecordStatus {
  return STAGE_DEFINITIONS[stage].outputs[0]
}

/**
 * Stage whose input status is `status`, if any
 */
export function stageForInput(status: RecordStatus): ProcessingStage | undefined {
  return PROCESSING_STAGES.find((stage) => STAGE_DEFINITIONS[stage].input === status)
}

export type {
  RecordId,
  FieldValue,
  CriterionDecision,
  ProvenanceNote,
  ReviewRecord,
  RetrievedRecord,
  Snapshot,
} from './record.js'
export { emptySnapshot, cloneRecord } from './record.js'

export type {
  ProjectAuthor,
  ProjectSettings,
  ScreeningCriterion,
  EndpointRef,
  StageSettings,
  DispatchConfig,
  ScalarConflictPolicy,
  MergeConfig,
  ProjectConfig,
  ProcessingStage,
  StageName,
} from './config.js'
export {
  SCALAR_CONFLICT_POLICIES,
  DEFAULT_DISPATCH_CONFIG,
  DEFAULT_MERGE_CONFIG,
  resolveStageDispatch,
  declaredCriteria,
} from './config.js'

export type { OperationKind, TransitionEntry, FailureEntry, OperationRecord } from './operation.js'
export type { Logger } from './logger.js'

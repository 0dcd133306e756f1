// Main entry point
export { ReviewLedger, type ReviewLedgerOptions, type ActorOptions } from './ledger/review-ledger.js'
export { ResultCode, resultCodeFor, resultCodeForError } from './ledger/result-codes.js'

// Types
export * from './types/index.js'

// Status lattice and stages
export {
  RECORD_STATUSES,
  SCREENED_STATUSES,
  EXCLUSION_STATUSES,
  TERMINAL_STATUSES,
  type RecordStatus,
  type TransitionKind,
  isRecordStatus,
  successors,
  edgeKind,
  isAbsorbing,
  isExclusion,
  isTerminal,
  isScreened,
  isReachable,
  transitionKey,
} from './core/status/lattice.js'
export {
  PROCESSING_STAGES,
  STAGE_DEFINITIONS,
  type StageOutputStatus,
  isProcessingStage,
  isStageName,
  stageInput,
  stageOutputs,
  defaultStageOutput,
  stageForInput,
} from './core/status/stages.js'

// Record store and transitions
export { RecordStore, type IterateOptions, type RecordStoreOptions } from './core/store/record-store.js'
export { RecordValidationError, RecordNotFoundError } from './core/store/store-error.js'
export { TransitionEngine, type TransitionEngineOptions } from './core/transition/transition-engine.js'
export { IllegalTransitionError } from './core/transition/transition-error.js'
export type {
  RecordUpdate,
  TransitionRequest,
  AppliedTransition,
  RejectedTransition,
  BatchResult,
} from './core/transition/types.js'

// History
export { ChangeLog, type LogOptions } from './history/change-log.js'
export type { Commit, HistoryAdapter, CommitListener, ChangeLogOptions, CommitOptions } from './history/types.js'
export {
  CorruptionDetectedError,
  UnknownPointError,
  NonFastForwardError,
  StaleHeadError,
  CommitListenerError,
} from './history/history-error.js'
export { stableStringify, hashSnapshot, hashCommit } from './history/hashing.js'
export {
  InMemoryHistoryAdapter,
  createInMemoryHistoryAdapter,
} from './history/adapters/memory-history-adapter.js'
export { FileHistoryAdapter, createFileHistoryAdapter } from './history/adapters/file-history-adapter.js'
export {
  createGitMirror,
  execGit,
  formatCommitReport,
  GitCommandError,
  type GitRunner,
  type GitMirrorOptions,
} from './history/git/git-mirror.js'

// Dispatch
export { OperationDispatcher, type OperationDispatcherOptions } from './dispatch/operation-dispatcher.js'
export { EndpointRegistry } from './dispatch/endpoint-registry.js'
export {
  buildOperationContext,
  generateCorrelationId,
  generateOperationId,
  generateRecordId,
  RECORD_ID_NAMESPACE,
  type OperationContextOptions,
} from './dispatch/execution-context.js'
export {
  EndpointFailureError,
  EndpointTimeoutError,
  EndpointNotRegisteredError,
  OperationCancelledError,
} from './dispatch/dispatch-error.js'
export { withTimeout, type TimeoutOptions } from './dispatch/timeout.js'
export { WorkerPool } from './dispatch/worker-pool.js'
export type {
  OperationContext,
  EndpointContext,
  EndpointUpdate,
  EndpointNoChange,
  EndpointFailure,
  EndpointDuplicate,
  EndpointOutcome,
  StageEndpoint,
  SearchEndpoint,
  Endpoint,
  RecordOutcome,
  RecordFailure,
  OperationReport,
  ManualOverrideRequest,
  RunStageOptions,
} from './dispatch/types.js'

// Merge
export { MergeResolver, type MergeActor } from './merge/merge-resolver.js'
export { mergeSnapshots, applyResolutions } from './merge/snapshot-merge.js'
export {
  getScalarPolicy,
  laterTimestampWins,
  type ScalarPolicyFunction,
  type ScalarConflict,
  type MergeSide,
} from './merge/policies.js'
export { MergeConflictError, MergeStateError, UnresolvedConflictError } from './merge/merge-error.js'
export type {
  MergeConflict,
  ConflictResolution,
  SnapshotMergeResult,
  PendingMerge,
  MergeOutcome,
  MergeStatus,
} from './merge/types.js'

// Validate / undo
export { UndoController, type UndoResult, type TraceEntry, type UndoActor } from './review/undo-controller.js'
export { UndoConflictError } from './review/undo-error.js'
export { diffSnapshots, diffRecords, type FieldChange, type RecordDiff, type SnapshotDiff } from './review/diff.js'
export { splitForManualReview, type ReviewAssignment, type SplitOptions } from './review/split.js'
export { getStatusStats, type StatusStats } from './review/status-stats.js'

// Configuration
export { validateProjectConfig } from './config/validation.js'
export { loadProjectConfig, saveProjectConfig, SETTINGS_FILE } from './config/loader.js'
export { ProjectBuilder, StageSettingsBuilder } from './config/project-builder.js'
export { addEndpointToConfig } from './config/add-endpoint.js'
export { initProject, type InitOptions } from './config/init.js'

// Errors and logging
export {
  LedgerError,
  InvalidParameterError,
  ConfigurationError,
  BuilderSequenceError,
  isLedgerError,
} from './utils/errors.js'
export {
  defaultLogger,
  createConsoleLogger,
  createSilentLogger,
  createPrefixedLogger,
  createRecordingLogger,
  withLogContext,
  type ConsoleLoggerOptions,
  type LogLevel,
  type RecordingLogger,
} from './utils/logger.js'

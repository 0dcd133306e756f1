/**
 * Entry point bundling the ledger components for one working copy
 * @module ledger/review-ledger
 */

import { addEndpointToConfig } from '../config/add-endpoint.js'
import { initProject } from '../config/init.js'
import type { ProcessingStage } from '../core/status/stages.js'
import { RecordStore } from '../core/store/record-store.js'
import { EndpointRegistry } from '../dispatch/endpoint-registry.js'
import { buildOperationContext } from '../dispatch/execution-context.js'
import { OperationDispatcher } from '../dispatch/operation-dispatcher.js'
import type {
  ManualOverrideRequest,
  OperationContext,
  OperationReport,
  RunStageOptions,
} from '../dispatch/types.js'
import { ChangeLog } from '../history/change-log.js'
import type { CommitListenerError } from '../history/history-error.js'
import type { CommitListener, HistoryAdapter } from '../history/types.js'
import { MergeResolver } from '../merge/merge-resolver.js'
import type { ConflictResolution, MergeOutcome } from '../merge/types.js'
import type { SnapshotDiff } from '../review/diff.js'
import { splitForManualReview, type ReviewAssignment } from '../review/split.js'
import { getStatusStats, type StatusStats } from '../review/status-stats.js'
import { UndoController, type TraceEntry, type UndoResult } from '../review/undo-controller.js'
import { declaredCriteria, type EndpointRef, type ProjectConfig } from '../types/config.js'
import type { Logger } from '../types/logger.js'
import type { RecordId } from '../types/record.js'
import { createPrefixedLogger, createSilentLogger } from '../utils/logger.js'

export interface ReviewLedgerOptions {
  config: ProjectConfig
  history: HistoryAdapter
  registry?: EndpointRegistry
  /** Local branch (default: `main`) */
  branch?: string
  /** Run after every commit, e.g. a git mirror */
  listeners?: CommitListener[]
  /** Receives listener failures; they are logged either way */
  onListenerError?: (error: CommitListenerError) => void
  logger?: Logger
  clock?: () => Date
}

/**
 * Per-call options of mutating operations
 */
export interface ActorOptions {
  actor: string
  signal?: AbortSignal
  correlationId?: string
}

/**
 * ReviewLedger wires a record store to its change log, dispatcher, merge
 * resolver and undo controller, and exposes the operations a command line
 * front end needs.
 *
 * @example
 * ```typescript
 * const ledger = await ReviewLedger.open({
 *   config,
 *   history: createFileHistoryAdapter('.ledger'),
 *   registry,
 * })
 * const report = await ledger.runStage('prep', { actor: 'AE' })
 * process.exitCode = resultCodeFor(report)
 * ```
 */
export class ReviewLedger {
  readonly store: RecordStore
  readonly changeLog: ChangeLog
  readonly registry: EndpointRegistry
  private projectConfig: ProjectConfig
  private readonly logger: Logger
  private readonly clock: () => Date
  private readonly dispatcher: OperationDispatcher
  private readonly merger: MergeResolver
  private readonly undoController: UndoController

  private constructor(options: ReviewLedgerOptions, changeLog: ChangeLog, store: RecordStore) {
    this.projectConfig = options.config
    this.logger = options.logger ?? createSilentLogger()
    this.clock = options.clock ?? (() => new Date())
    this.changeLog = changeLog
    this.store = store
    this.registry = options.registry ?? new EndpointRegistry()

    const criteria = declaredCriteria(options.config)
    this.merger = new MergeResolver(store, changeLog, {
      policy: options.config.merge.scalarConflictPolicy,
      criteria,
      logger: createPrefixedLogger('merge', this.logger),
    })
    this.dispatcher = new OperationDispatcher({
      store,
      changeLog,
      registry: this.registry,
      isBlocked: (recordId) => this.merger.isBlocked(recordId),
    })
    this.undoController = new UndoController(store, changeLog, {
      criteria,
      logger: createPrefixedLogger('undo', this.logger),
      isBlocked: (recordId) => this.merger.isBlocked(recordId),
      mergePending: () => this.merger.pending !== null,
    })
  }

  /**
   * Opens a working copy at its branch head, verifying the head snapshot
   *
   * @throws {CorruptionDetectedError} If the head snapshot does not match its hash
   */
  static async open(options: ReviewLedgerOptions): Promise<ReviewLedger> {
    const logger = options.logger ?? createSilentLogger()
    const changeLog = new ChangeLog(options.history, {
      branch: options.branch,
      listeners: options.listeners,
      onListenerError: options.onListenerError,
      logger: createPrefixedLogger('history', logger),
    })
    const criteria = declaredCriteria(options.config)
    const head = await changeLog.headId()
    const store =
      head === null ? new RecordStore({ criteria }) : await changeLog.checkout(head, { criteria })
    return new ReviewLedger(options, changeLog, store)
  }

  /**
   * Creates the root commit of a new review and opens it
   */
  static async init(options: ReviewLedgerOptions & { actor: string }): Promise<ReviewLedger> {
    const ledger = await ReviewLedger.open(options)
    await initProject(ledger.changeLog, options.config, { actor: options.actor, clock: options.clock })
    return ledger
  }

  get config(): ProjectConfig {
    return this.projectConfig
  }

  /**
   * Builds the context of one operation
   */
  context(options: ActorOptions): OperationContext {
    return buildOperationContext({
      config: this.projectConfig,
      actor: options.actor,
      clock: this.clock,
      logger: this.logger,
      signal: options.signal,
      correlationId: options.correlationId,
    })
  }

  async runStage(
    stage: ProcessingStage,
    options: ActorOptions & RunStageOptions,
  ): Promise<OperationReport> {
    return this.dispatcher.runStage(stage, this.context(options), {
      recordIds: options.recordIds,
      endpoints: options.endpoints,
    })
  }

  async retrieve(options: ActorOptions & { endpoints?: readonly string[] }): Promise<OperationReport> {
    return this.dispatcher.retrieve(this.context(options), { endpoints: options.endpoints })
  }

  async manualOverride(
    requests: readonly ManualOverrideRequest[],
    options: ActorOptions,
  ): Promise<OperationReport> {
    return this.dispatcher.override(requests, this.context(options))
  }

  /**
   * Changes between two history points, for review before trusting a stage
   */
  async validate(pointA: string, pointB = 'HEAD'): Promise<SnapshotDiff> {
    return this.undoController.diff(pointA, pointB)
  }

  async trace(recordId: RecordId): Promise<TraceEntry[]> {
    return this.undoController.trace(recordId)
  }

  async undo(point: string, options: ActorOptions): Promise<UndoResult> {
    return this.undoController.undo(point, { actor: options.actor, clock: this.clock })
  }

  async undoRecord(recordId: RecordId, options: ActorOptions): Promise<UndoResult> {
    return this.undoController.undoRecord(recordId, { actor: options.actor, clock: this.clock })
  }

  split(
    stage: ProcessingStage,
    options: { reviewers?: readonly string[]; parts?: number } = {},
  ): ReviewAssignment[] {
    return splitForManualReview(this.store, {
      stage,
      ...options,
      exclude: (recordId) => this.merger.isBlocked(recordId),
    })
  }

  /**
   * Copies the history of another working copy under `remotes/<name>/`
   */
  async fetch(remote: ReviewLedger | ChangeLog, name: string): Promise<string | null> {
    return this.changeLog.fetchFrom(remote instanceof ReviewLedger ? remote.changeLog : remote, name)
  }

  /**
   * @throws {MergeConflictError} If records conflict; they stay blocked until resolved
   */
  async merge(point: string, options: ActorOptions): Promise<MergeOutcome> {
    return this.merger.merge(point, { actor: options.actor, clock: this.clock })
  }

  async resolveConflicts(
    resolutions: readonly ConflictResolution[],
    options: ActorOptions,
  ): Promise<MergeOutcome> {
    return this.merger.resolveConflicts(resolutions, { actor: options.actor, clock: this.clock })
  }

  abortMerge(): void {
    this.merger.abort()
  }

  /**
   * Ids blocked by an unresolved merge
   */
  blockedRecords(): RecordId[] {
    const pending = this.merger.pending
    return pending ? [...new Set(pending.result.conflicts.map((conflict) => conflict.recordId))].sort() : []
  }

  status(): StatusStats {
    return getStatusStats(this.store)
  }

  /**
   * Checks every commit and snapshot reachable from the head
   * @returns Number of verified commits
   */
  async verify(): Promise<number> {
    return this.changeLog.verify()
  }

  /**
   * Appends an endpoint to a stage of the configuration in use
   */
  addEndpoint(stage: string, ref: EndpointRef): ProjectConfig {
    this.projectConfig = addEndpointToConfig(this.projectConfig, stage, ref)
    return this.projectConfig
  }
}

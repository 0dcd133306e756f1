/**
 * Runs pipeline stages over the record store
 * @module dispatch/operation-dispatcher
 */

import { transitionKey } from '../core/status/lattice.js'
import { defaultStageOutput, stageInput, type ProcessingStage } from '../core/status/stages.js'
import type { RecordStore } from '../core/store/record-store.js'
import { TransitionEngine } from '../core/transition/transition-engine.js'
import type { RecordUpdate } from '../core/transition/types.js'
import type { ChangeLog } from '../history/change-log.js'
import { hashSnapshot } from '../history/hashing.js'
import { resolveStageDispatch, type EndpointRef, type StageName } from '../types/config.js'
import type { OperationKind, OperationRecord, TransitionEntry } from '../types/operation.js'
import type { FieldValue, RecordId, ReviewRecord } from '../types/record.js'
import { cloneRecord } from '../types/record.js'
import { errorMessage, isLedgerError } from '../utils/errors.js'
import { withLogContext } from '../utils/logger.js'
import { EndpointFailureError, OperationCancelledError } from './dispatch-error.js'
import type { EndpointRegistry } from './endpoint-registry.js'
import { buildEndpointContext, generateOperationId, generateRecordId } from './execution-context.js'
import { withTimeout } from './timeout.js'
import type {
  EndpointOutcome,
  ManualOverrideRequest,
  OperationContext,
  OperationReport,
  RecordFailure,
  RecordOutcome,
  RunStageOptions,
  StageEndpoint,
} from './types.js'
import { WorkerPool } from './worker-pool.js'

export interface OperationDispatcherOptions {
  store: RecordStore
  changeLog: ChangeLog
  registry: EndpointRegistry
  /** Records that must not be processed, e.g. while a merge is unresolved */
  isBlocked?: (recordId: RecordId) => boolean
}

interface ResolvedEndpoint<E> {
  endpoint: E
  options?: Record<string, unknown>
}

/**
 * What the endpoint chain proposed for one record
 */
type Proposal =
  | { kind: 'update'; update: RecordUpdate; status?: ReviewRecord['status']; note?: string; sources: string[] }
  | { kind: 'no-change' }
  | { kind: 'duplicate'; survivorId: RecordId; note?: string; source: string }
  | { kind: 'failure'; code: string; reason: string; endpoint: string }

/**
 * Copy of the live store an operation works on, with the hash of the
 * content it was copied from
 */
interface Staging {
  store: RecordStore
  from: string
}

interface ReportDraft {
  advanced: RecordOutcome[]
  unchanged: RecordId[]
  failed: RecordFailure[]
  transitions: TransitionEntry[]
  details: Record<string, unknown>
}

function byRecordId<T extends { recordId: string }>(a: T, b: T): number {
  return a.recordId < b.recordId ? -1 : a.recordId > b.recordId ? 1 : 0
}

function countTransitions(transitions: readonly TransitionEntry[]): Record<string, number> {
  const counts: Record<string, number> = {}
  for (const entry of transitions) {
    const key = transitionKey(entry.from, entry.to)
    counts[key] = (counts[key] ?? 0) + 1
  }
  return counts
}

/**
 * OperationDispatcher sequences one pipeline stage: it selects candidate
 * records, calls the configured endpoints for each, applies the proposals
 * through the transition engine and commits the result.
 *
 * Work happens on a staged copy of the store. The live store is replaced
 * only after the commit succeeds, so a cancelled or failed run leaves it
 * untouched. Records an endpoint fails on keep their status and are listed
 * in the report's `failed` entries.
 *
 * @example
 * ```typescript
 * const dispatcher = new OperationDispatcher({ store, changeLog, registry })
 * const report = await dispatcher.runStage('pdf_prep', context)
 * report.outcome // 'partial-success'
 * ```
 */
export class OperationDispatcher {
  constructor(private readonly options: OperationDispatcherOptions) {}

  /**
   * Records a stage would process, in id order
   */
  candidates(stage: ProcessingStage, recordIds?: readonly RecordId[]): ReviewRecord[] {
    const restrict = recordIds ? new Set(recordIds) : undefined
    return [...this.options.store.iterate({ status: stageInput(stage) })].filter(
      (record) =>
        !(this.options.isBlocked?.(record.id) ?? false) && (restrict?.has(record.id) ?? true),
    )
  }

  /**
   * Runs a processing stage over its candidates
   *
   * @throws {EndpointNotRegisteredError} If the settings name an unknown endpoint
   * @throws {OperationCancelledError} If the context signal aborts before the commit
   */
  async runStage(
    stage: ProcessingStage,
    context: OperationContext,
    options: RunStageOptions = {},
  ): Promise<OperationReport> {
    const endpoints = this.resolveEndpoints(stage, context, options.endpoints).map((ref) => ({
      endpoint: this.options.registry.getStageEndpoint(stage, ref.endpoint),
      options: ref.options,
    }))
    this.throwIfCancelled(stage, context)

    const operationId = generateOperationId()
    const staging = this.stage()
    const staged = staging.store
    const candidates = this.candidates(stage, options.recordIds)
    const dispatch = resolveStageDispatch(context.config, stage)

    context.logger.info('Running stage', {
      stage,
      operationId,
      candidates: candidates.length,
      endpoints: endpoints.map(({ endpoint }) => endpoint.id),
      correlationId: context.correlationId,
    })

    const proposals = await new WorkerPool(dispatch.concurrency).map(candidates, (record) =>
      this.propose(stage, record, endpoints, context, dispatch.timeoutMs),
    )
    this.throwIfCancelled(stage, context)

    const engine = new TransitionEngine(staged, {
      operationId,
      clock: context.clock,
      logger: withLogContext(context.logger, { operationId }),
    })
    const draft: ReportDraft = { advanced: [], unchanged: [], failed: [], transitions: [], details: {} }
    const collapsed: Array<{ recordId: RecordId; survivorId: RecordId }> = []

    candidates.forEach((record, index) => {
      const proposal = proposals[index]
      switch (proposal.kind) {
        case 'no-change':
          draft.unchanged.push(record.id)
          return
        case 'failure':
          draft.failed.push({
            recordId: record.id,
            code: proposal.code,
            reason: proposal.reason,
            endpoint: proposal.endpoint,
          })
          return
        case 'duplicate': {
          const survivorId = this.collapse(staged, engine, record, proposal, context)
          if (typeof survivorId === 'string') {
            collapsed.push({ recordId: record.id, survivorId })
            draft.advanced.push({ recordId: record.id, from: record.status, collapsedInto: survivorId })
          } else {
            draft.failed.push(survivorId)
          }
          return
        }
        case 'update': {
          const targetStatus = proposal.status ?? defaultStageOutput(stage)
          const justification = proposal.note ?? `${stage} by ${proposal.sources.join(', ')}`
          const { applied, failed } = engine.applyBatch([
            {
              recordId: record.id,
              targetStatus,
              actor: context.actor,
              justification,
              update: proposal.update,
              source: proposal.sources.join('+'),
            },
          ])
          for (const entry of applied) {
            draft.transitions.push({ recordId: entry.recordId, from: entry.from, to: entry.to, justification })
            draft.advanced.push({
              recordId: entry.recordId,
              from: entry.from,
              to: entry.to,
              changedFields: entry.changedFields,
            })
          }
          for (const entry of failed) {
            draft.failed.push({ recordId: entry.recordId, code: entry.code, reason: entry.reason, endpoint: entry.source })
          }
        }
      }
    })

    draft.details = {
      endpoints: endpoints.map(({ endpoint }) => endpoint.id),
      ...(collapsed.length > 0 ? { collapsed } : {}),
    }
    const counts = countTransitions(draft.transitions)
    if (collapsed.length > 0) {
      counts.collapsed = collapsed.length
    }

    return this.finish(staging, 'stage', stage, operationId, counts, draft, context)
  }

  /**
   * Calls the configured search endpoints and adds one `md_retrieved` record
   * per result whose origin tag is not yet in the store
   */
  async retrieve(
    context: OperationContext,
    options: { endpoints?: readonly string[] } = {},
  ): Promise<OperationReport> {
    const endpoints = this.resolveEndpoints('retrieve', context, options.endpoints).map((ref) => ({
      endpoint: this.options.registry.getSearchEndpoint(ref.endpoint),
      options: ref.options,
    }))
    this.throwIfCancelled('retrieve', context)

    const operationId = generateOperationId()
    const staging = this.stage()
    const staged = staging.store
    const dispatch = resolveStageDispatch(context.config, 'retrieve')
    const draft: ReportDraft = { advanced: [], unchanged: [], failed: [], transitions: [], details: {} }

    const harvested = await new WorkerPool(dispatch.concurrency).map(endpoints, async ({ endpoint, options: endpointOptions }) => {
      try {
        const results = await withTimeout(
          (signal) => endpoint.retrieve(buildEndpointContext(context, endpoint.id, endpointOptions, signal)),
          { timeoutMs: dispatch.timeoutMs, endpointId: endpoint.id, signal: context.signal },
        )
        return { endpoint, results }
      } catch (error) {
        if (error instanceof OperationCancelledError) throw error
        draft.failed.push(this.describeFailure(endpoint.id, endpoint.id, error, context))
        return { endpoint, results: [] }
      }
    })
    this.throwIfCancelled('retrieve', context)

    const known = new Map<string, RecordId>()
    for (const record of staged.iterate({ includeCollapsed: true })) {
      for (const tag of record.origin) {
        known.set(tag, record.id)
      }
    }

    const engine = new TransitionEngine(staged, {
      operationId,
      clock: context.clock,
      logger: withLogContext(context.logger, { operationId }),
    })
    for (const { endpoint, results } of harvested) {
      const ordered = [...results].sort((a, b) => (a.origin < b.origin ? -1 : a.origin > b.origin ? 1 : 0))
      for (const result of ordered) {
        const existing = known.get(result.origin)
        if (existing !== undefined) {
          if (!draft.unchanged.includes(existing)) draft.unchanged.push(existing)
          continue
        }
        const justification = `retrieved by ${endpoint.id}`
        try {
          const record = engine.createRecord(
            { id: generateRecordId(result.origin), origin: [result.origin], metadata: result.metadata },
            context.actor,
            justification,
            endpoint.id,
          )
          known.set(result.origin, record.id)
          draft.transitions.push({ recordId: record.id, from: null, to: record.status, justification })
          draft.advanced.push({ recordId: record.id, from: null, to: record.status })
        } catch (error) {
          if (!isLedgerError(error)) throw error
          draft.failed.push({ recordId: result.origin, code: error.code, reason: error.message, endpoint: endpoint.id })
        }
      }
    }

    draft.details = { endpoints: endpoints.map(({ endpoint }) => endpoint.id) }
    return this.finish(staging, 'retrieve', 'retrieve', operationId, countTransitions(draft.transitions), draft, context)
  }

  /**
   * Applies manual overrides along manual edges as one `manual-override` operation
   */
  async override(
    requests: readonly ManualOverrideRequest[],
    context: OperationContext,
  ): Promise<OperationReport> {
    this.throwIfCancelled('manual-override', context)
    const operationId = generateOperationId()
    const staging = this.stage()
    const engine = new TransitionEngine(staging.store, {
      operationId,
      clock: context.clock,
      logger: withLogContext(context.logger, { operationId }),
    })
    const draft: ReportDraft = { advanced: [], unchanged: [], failed: [], transitions: [], details: {} }

    for (const request of requests) {
      if (this.options.isBlocked?.(request.recordId)) {
        draft.failed.push({
          recordId: request.recordId,
          code: 'RECORD_BLOCKED',
          reason: 'record is part of an unresolved merge',
        })
        continue
      }
      const { applied, failed } = engine.applyBatch(
        [
          {
            recordId: request.recordId,
            targetStatus: request.targetStatus,
            actor: context.actor,
            justification: request.justification,
            update: {
              metadata: request.metadata,
              removeFields: request.removeFields,
              screeningCriteria: request.screeningCriteria,
            },
          },
        ],
        'manual',
      )
      for (const entry of applied) {
        draft.transitions.push({
          recordId: entry.recordId,
          from: entry.from,
          to: entry.to,
          justification: request.justification,
        })
        draft.advanced.push({ recordId: entry.recordId, from: entry.from, to: entry.to, changedFields: entry.changedFields })
      }
      for (const entry of failed) {
        draft.failed.push({ recordId: entry.recordId, code: entry.code, reason: entry.reason })
      }
    }

    return this.finish(
      staging,
      'manual-override',
      'manual-override',
      operationId,
      countTransitions(draft.transitions),
      draft,
      context,
    )
  }

  private resolveEndpoints(
    stage: StageName,
    context: OperationContext,
    override?: readonly string[],
  ): EndpointRef[] {
    if (override) {
      return override.map((endpoint) => ({ endpoint }))
    }
    return context.config.stages[stage]?.endpoints ?? []
  }

  /**
   * Runs the endpoint chain for one record. Each endpoint sees the edits of
   * the ones before it; the first failure or duplicate verdict ends the chain.
   */
  private async propose(
    stage: ProcessingStage,
    record: ReviewRecord,
    endpoints: ReadonlyArray<ResolvedEndpoint<StageEndpoint>>,
    context: OperationContext,
    timeoutMs: number,
  ): Promise<Proposal> {
    const working = cloneRecord(record)
    const metadata: Record<string, FieldValue> = {}
    const removeFields = new Set<string>()
    let screeningCriteria: RecordUpdate['screeningCriteria']
    let status: ReviewRecord['status'] | undefined
    let note: string | undefined
    const sources: string[] = []

    for (const { endpoint, options } of endpoints) {
      let outcome: EndpointOutcome
      try {
        outcome = await withTimeout(
          (signal) =>
            endpoint.processRecord(
              cloneRecord(working),
              buildEndpointContext(context, endpoint.id, options, signal),
            ),
          { timeoutMs, endpointId: endpoint.id, signal: context.signal },
        )
      } catch (error) {
        if (error instanceof OperationCancelledError) throw error
        const failure = this.describeFailure(record.id, endpoint.id, error, context)
        return { kind: 'failure', code: failure.code, reason: failure.reason, endpoint: endpoint.id }
      }

      switch (outcome.type) {
        case 'no-change':
          continue
        case 'failure':
          context.logger.warn('Endpoint reported a failure', {
            recordId: record.id,
            endpoint: endpoint.id,
            reason: outcome.reason,
          })
          return {
            kind: 'failure',
            code: 'ENDPOINT_FAILURE',
            reason: new EndpointFailureError(endpoint.id, outcome.reason).message,
            endpoint: endpoint.id,
          }
        case 'duplicate':
          if (stage !== 'dedupe') {
            return {
              kind: 'failure',
              code: 'INVALID_OUTCOME',
              reason: `Endpoint '${endpoint.id}' reported a duplicate outside deduplication`,
              endpoint: endpoint.id,
            }
          }
          return { kind: 'duplicate', survivorId: outcome.survivorId, note: outcome.note, source: endpoint.id }
        case 'update':
          for (const [field, value] of Object.entries(outcome.metadata ?? {})) {
            metadata[field] = value
            working.metadata[field] = value
            removeFields.delete(field)
          }
          for (const field of outcome.removeFields ?? []) {
            delete metadata[field]
            delete working.metadata[field]
            removeFields.add(field)
          }
          if (outcome.screeningCriteria) {
            screeningCriteria = { ...screeningCriteria, ...outcome.screeningCriteria }
            working.screeningCriteria = { ...working.screeningCriteria, ...outcome.screeningCriteria }
          }
          status = outcome.status ?? status
          note = outcome.note ?? note
          sources.push(endpoint.id)
      }
    }

    if (sources.length === 0) {
      return { kind: 'no-change' }
    }
    return {
      kind: 'update',
      update: { metadata, removeFields: [...removeFields], screeningCriteria },
      status,
      note,
      sources,
    }
  }

  /**
   * Collapses a duplicate into its survivor after copying its origin tags over
   * @returns The survivor id, or the failure to report
   */
  private collapse(
    staged: RecordStore,
    engine: TransitionEngine,
    record: ReviewRecord,
    proposal: Extract<Proposal, { kind: 'duplicate' }>,
    context: OperationContext,
  ): RecordId | RecordFailure {
    try {
      const survivorId = staged.resolveId(proposal.survivorId)
      const justification = proposal.note ?? `duplicate '${record.id}' merged by ${proposal.source}`
      engine.amend(survivorId, context.actor, justification, { addOrigin: record.origin })
      staged.markDuplicate(record.id, survivorId)
      return survivorId
    } catch (error) {
      if (!isLedgerError(error)) throw error
      return { recordId: record.id, code: error.code, reason: error.message, endpoint: proposal.source }
    }
  }

  private describeFailure(
    recordId: RecordId,
    endpointId: string,
    error: unknown,
    context: OperationContext,
  ): RecordFailure {
    const code = isLedgerError(error) ? error.code : 'ENDPOINT_FAILURE'
    const reason = isLedgerError(error)
      ? error.message
      : new EndpointFailureError(endpointId, errorMessage(error)).message
    context.logger.warn('Endpoint call failed', { recordId, endpoint: endpointId, code, reason })
    return { recordId, code, reason, endpoint: endpointId }
  }

  private throwIfCancelled(operation: string, context: OperationContext): void {
    if (context.signal?.aborted) {
      throw new OperationCancelledError(operation, errorMessage(context.signal.reason))
    }
  }

  private stage(): Staging {
    const store = this.options.store.clone()
    return { store, from: hashSnapshot(store.toSnapshot()) }
  }

  /**
   * Commits the staged store when anything changed and builds the report
   *
   * @throws {StaleHeadError} If another operation committed since staging
   */
  private async finish(
    staging: Staging,
    kind: OperationKind,
    name: string,
    operationId: string,
    counts: Record<string, number>,
    draft: ReportDraft,
    context: OperationContext,
  ): Promise<OperationReport> {
    const report: OperationReport = {
      operationId,
      kind,
      name,
      advanced: [...draft.advanced].sort(byRecordId),
      unchanged: [...draft.unchanged].sort(),
      failed: [...draft.failed].sort(byRecordId),
      outcome: draft.failed.length > 0 ? 'partial-success' : 'success',
    }

    if (report.advanced.length > 0) {
      this.throwIfCancelled(name, context)
      const operation: OperationRecord = {
        id: operationId,
        kind,
        name,
        actor: context.actor,
        timestamp: context.clock().toISOString(),
        counts,
        transitions: [...draft.transitions].sort(byRecordId),
        failures: report.failed.map(({ recordId, code, reason, endpoint }) =>
          endpoint === undefined ? { recordId, code, reason } : { recordId, code, reason, endpoint },
        ),
        details: draft.details,
      }
      const commit = await this.options.changeLog.commit(staging.store.toSnapshot(), operation, {
        stagedFrom: staging.from,
      })
      this.options.store.replaceWith(staging.store)
      report.commitId = commit.id
    }

    context.logger.info('Operation finished', {
      operation: name,
      operationId,
      advanced: report.advanced.length,
      unchanged: report.unchanged.length,
      failed: report.failed.length,
      commitId: report.commitId,
      correlationId: context.correlationId,
    })
    return report
  }
}

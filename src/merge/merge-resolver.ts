/**
 * Reconciles divergent histories
 * @module merge/merge-resolver
 */

import { transitionKey } from '../core/status/lattice.js'
import { RecordStore } from '../core/store/record-store.js'
import type { ChangeLog } from '../history/change-log.js'
import { generateOperationId } from '../dispatch/execution-context.js'
import type { OperationRecord, TransitionEntry } from '../types/operation.js'
import type { RecordId, Snapshot } from '../types/record.js'
import { emptySnapshot } from '../types/record.js'
import { MergeConflictError, MergeStateError, UnresolvedConflictError } from './merge-error.js'
import { applyResolutions, mergeSnapshots } from './snapshot-merge.js'
import type {
  ConflictResolution,
  MergeOutcome,
  MergeResolverOptions,
  PendingMerge,
} from './types.js'

/**
 * Who performs a merge and when
 */
export interface MergeActor {
  actor: string
  clock?: () => Date
}

function transitionsBetween(before: Snapshot, after: Snapshot): TransitionEntry[] {
  const previous = new Map(before.records.map((record) => [record.id, record.status]))
  const entries: TransitionEntry[] = []
  for (const record of after.records) {
    const from = previous.get(record.id) ?? null
    if (from !== record.status) {
      entries.push({ recordId: record.id, from, to: record.status })
    }
  }
  return entries
}

/**
 * MergeResolver merges another history point into the local branch.
 *
 * Fast-forward and already-merged cases move no history. Diverged histories
 * are merged three-way from their nearest common ancestor; when records
 * conflict, the merge stays pending, those records are blocked from stage
 * runs, and {@link MergeResolver.resolveConflicts} completes it.
 *
 * @example
 * ```typescript
 * const resolver = new MergeResolver(store, changeLog, { policy: 'later-timestamp-wins' })
 * try {
 *   await resolver.merge('origin/main', { actor: 'alice' })
 * } catch (error) {
 *   if (error instanceof MergeConflictError) {
 *     await resolver.resolveConflicts(
 *       error.conflicts.map((c) => ({ recordId: c.recordId, path: c.path, take: 'theirs' })),
 *       { actor: 'alice' },
 *     )
 *   }
 * }
 * ```
 */
export class MergeResolver {
  private pendingMerge: PendingMerge | null = null
  private blocked = new Set<RecordId>()

  constructor(
    private readonly store: RecordStore,
    private readonly changeLog: ChangeLog,
    private readonly options: MergeResolverOptions,
  ) {}

  get pending(): PendingMerge | null {
    return this.pendingMerge
  }

  /**
   * Whether a record is held back by an unresolved merge
   */
  isBlocked(recordId: RecordId): boolean {
    return this.blocked.has(recordId)
  }

  /**
   * Merges `point` into the local branch
   *
   * @throws {MergeConflictError} If records conflict; the merge stays pending
   * @throws {MergeStateError} If another merge is pending
   */
  async merge(point: string, by: MergeActor): Promise<MergeOutcome> {
    if (this.pendingMerge) {
      throw new MergeStateError('A merge is waiting for conflict resolution', {
        theirs: this.pendingMerge.theirs,
      })
    }

    const ours = await this.changeLog.headId()
    const theirs = await this.changeLog.resolvePoint(point)

    if (ours !== null && (await this.changeLog.isAncestor(theirs, ours))) {
      this.options.logger?.info('Already up to date', { ours, theirs })
      return { status: 'up-to-date', commitId: ours, autoResolved: [] }
    }

    // An empty branch takes the other history as is
    if (ours === null || (await this.changeLog.isAncestor(ours, theirs))) {
      const next = await this.changeLog.checkout(theirs, { criteria: this.options.criteria })
      await this.changeLog.fastForward(theirs)
      this.store.replaceWith(next)
      this.options.logger?.info('Fast-forwarded', { from: ours, to: theirs })
      return { status: 'fast-forward', commitId: theirs, autoResolved: [] }
    }

    const base = await this.changeLog.mergeBase(ours, theirs)
    const baseSnapshot = base === null ? emptySnapshot() : await this.changeLog.loadSnapshot(base)
    const oursSnapshot = await this.changeLog.loadSnapshot(ours)
    const theirsSnapshot = await this.changeLog.loadSnapshot(theirs)

    const result = mergeSnapshots(baseSnapshot, oursSnapshot, theirsSnapshot, this.options.policy)

    if (result.conflicts.length > 0) {
      this.pendingMerge = { ours, theirs, base, source: point, oursSnapshot, theirsSnapshot, result }
      this.blocked = new Set(result.conflicts.map((conflict) => conflict.recordId))
      this.options.logger?.warn('Merge stopped on conflicts', {
        ours,
        theirs,
        conflicts: result.conflicts.length,
      })
      throw new MergeConflictError(result.conflicts, { ours, theirs })
    }

    const commitId = await this.complete(
      { ours, theirs, base, source: point, oursSnapshot, theirsSnapshot, result },
      result.snapshot,
      [],
      by,
    )
    return { status: 'merged', commitId, autoResolved: result.autoResolved }
  }

  /**
   * Completes the pending merge with one decision per conflict
   *
   * When the local branch moved on since the merge stopped, the merge is
   * redone against the new head first; conflicts it adds need decisions too.
   *
   * @throws {MergeStateError} If no merge is pending, or the branch no longer contains its start
   * @throws {UnresolvedConflictError} If a conflict has no decision
   */
  async resolveConflicts(
    resolutions: readonly ConflictResolution[],
    by: MergeActor,
  ): Promise<MergeOutcome> {
    if (!this.pendingMerge) {
      throw new MergeStateError('No merge is waiting for conflict resolution')
    }
    const pending = await this.rebase(this.pendingMerge)

    const decided = new Set(resolutions.map((resolution) => `${resolution.recordId}\u0000${resolution.path}`))
    const missing = pending.result.conflicts
      .filter((conflict) => !decided.has(`${conflict.recordId}\u0000${conflict.path}`))
      .map(({ recordId, path }) => ({ recordId, path }))
    if (missing.length > 0) {
      throw new UnresolvedConflictError(missing)
    }

    const snapshot = applyResolutions(pending.result, pending.theirsSnapshot, resolutions)
    const commitId = await this.complete(pending, snapshot, resolutions, by)
    return { status: 'merged', commitId, autoResolved: pending.result.autoResolved }
  }

  /**
   * Drops the pending merge and unblocks its records
   */
  abort(): void {
    this.pendingMerge = null
    this.blocked = new Set()
  }

  /**
   * Re-merges a pending merge whose local side is behind the current head
   */
  private async rebase(pending: PendingMerge): Promise<PendingMerge> {
    const head = await this.changeLog.headId()
    if (head === pending.ours) return pending
    if (head === null || !(await this.changeLog.isAncestor(pending.ours, head))) {
      throw new MergeStateError('The local branch no longer contains the start of the pending merge', {
        ours: pending.ours,
        head,
      })
    }

    const baseSnapshot = pending.base === null ? emptySnapshot() : await this.changeLog.loadSnapshot(pending.base)
    const oursSnapshot = await this.changeLog.loadSnapshot(head)
    const result = mergeSnapshots(baseSnapshot, oursSnapshot, pending.theirsSnapshot, this.options.policy)
    const rebased: PendingMerge = { ...pending, ours: head, oursSnapshot, result }

    this.pendingMerge = rebased
    this.blocked = new Set(result.conflicts.map((conflict) => conflict.recordId))
    this.options.logger?.info('Pending merge moved to the new head', {
      from: pending.ours,
      to: head,
      conflicts: result.conflicts.length,
    })
    return rebased
  }

  private async complete(
    pending: PendingMerge,
    merged: Snapshot,
    resolutions: readonly ConflictResolution[],
    by: MergeActor,
  ): Promise<string> {
    const next = RecordStore.fromSnapshot(merged, { criteria: this.options.criteria })
    const snapshot = next.toSnapshot()
    const transitions = transitionsBetween(pending.oursSnapshot, snapshot)

    const counts: Record<string, number> = {}
    for (const entry of transitions) {
      const key = transitionKey(entry.from, entry.to)
      counts[key] = (counts[key] ?? 0) + 1
    }

    const operation: OperationRecord = {
      id: generateOperationId(),
      kind: 'merge',
      name: `merge ${pending.source}`,
      actor: by.actor,
      timestamp: (by.clock ?? (() => new Date()))().toISOString(),
      counts,
      transitions,
      failures: [],
      details: {
        parents: [pending.ours, pending.theirs],
        base: pending.base,
        source: pending.source,
        autoResolved: pending.result.autoResolved,
        resolutions: resolutions.map(({ recordId, path, take }) => ({ recordId, path, take })),
      },
    }

    const commit = await this.changeLog.commitMerge(snapshot, operation, [pending.ours, pending.theirs])
    this.store.replaceWith(next)
    this.abort()
    this.options.logger?.info('Merged', {
      commit: commit.id,
      parents: commit.parents,
      transitions: transitions.length,
    })
    return commit.id
  }
}

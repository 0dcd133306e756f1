/**
 * Validation and rollback against history points
 * @module review/undo-controller
 */

import { transitionKey } from '../core/status/lattice.js'
import { RecordStore } from '../core/store/record-store.js'
import { generateOperationId } from '../dispatch/execution-context.js'
import type { ChangeLog } from '../history/change-log.js'
import { hashSnapshot, stableStringify } from '../history/hashing.js'
import type { Commit } from '../history/types.js'
import type { Logger } from '../types/logger.js'
import type { OperationKind, OperationRecord, TransitionEntry } from '../types/operation.js'
import type { RecordId, ReviewRecord, Snapshot } from '../types/record.js'
import { diffSnapshots, type LoggedTransition, type RecordDiff, type SnapshotDiff } from './diff.js'
import { UndoConflictError } from './undo-error.js'

export interface UndoControllerOptions {
  criteria?: readonly string[]
  logger?: Logger
  /** Records held back by an unresolved merge */
  isBlocked?: (recordId: RecordId) => boolean
  /** Whether a merge is waiting for conflict resolution */
  mergePending?: () => boolean
}

/**
 * Who performs a rollback and when
 */
export interface UndoActor {
  actor: string
  clock?: () => Date
}

export interface UndoResult {
  /** New commit, or null when the store already matched the target */
  commitId: string | null
  /** Commit whose content was restored */
  restoredFrom: string
  transitions: TransitionEntry[]
}

/**
 * Entry of a record's history
 */
export interface TraceEntry {
  commitId: string
  kind: OperationKind
  operation: string
  actor: string
  timestamp: string
  transition: TransitionEntry
}

function statusMoves(before: Snapshot, after: Snapshot): TransitionEntry[] {
  const previous = new Map(before.records.map((record) => [record.id, record.status]))
  return after.records
    .filter((record) => previous.get(record.id) !== record.status)
    .map((record) => ({ recordId: record.id, from: previous.get(record.id) ?? null, to: record.status }))
}

function countMoves(transitions: readonly TransitionEntry[]): Record<string, number> {
  const counts: Record<string, number> = {}
  for (const entry of transitions) {
    const key = transitionKey(entry.from, entry.to)
    counts[key] = (counts[key] ?? 0) + 1
  }
  return counts
}

function findRecord(snapshot: Snapshot, recordId: RecordId): ReviewRecord | undefined {
  return snapshot.records.find((record) => record.id === recordId)
}

function collapsedInto(snapshot: Snapshot, survivorId: RecordId): RecordId[] {
  return Object.entries(snapshot.duplicates)
    .filter(([, survivor]) => survivor === survivorId)
    .map(([duplicateId]) => duplicateId)
}

/**
 * UndoController answers "what changed" between history points and rolls
 * changes back. Rollbacks never rewrite history: each one is a new commit.
 *
 * @example
 * ```typescript
 * const controller = new UndoController(store, changeLog)
 * const review = await controller.diff('HEAD~1', 'HEAD')
 * await controller.undo('HEAD~1', { actor: 'alice' })
 * ```
 */
export class UndoController {
  constructor(
    private readonly store: RecordStore,
    private readonly changeLog: ChangeLog,
    private readonly options: UndoControllerOptions = {},
  ) {}

  /**
   * Per-record net changes between two points, with the transitions logged
   * on the way from `pointA` to `pointB` in chronological order
   */
  async diff(pointA: string, pointB: string): Promise<SnapshotDiff> {
    const from = await this.changeLog.resolvePoint(pointA)
    const to = await this.changeLog.resolvePoint(pointB)
    const changes = diffSnapshots(await this.changeLog.loadSnapshot(from), await this.changeLog.loadSnapshot(to))

    const excluded = new Set((await this.changeLog.log({ from })).map((commit) => commit.id))
    const path = (await this.changeLog.log({ from: to }))
      .filter((commit) => !excluded.has(commit.id))
      .reverse()

    const transitions = new Map<RecordId, LoggedTransition[]>()
    for (const commit of path) {
      for (const entry of commit.operation.transitions) {
        const logged: LoggedTransition = {
          ...entry,
          commitId: commit.id,
          operation: commit.operation.name,
          actor: commit.operation.actor,
          timestamp: commit.operation.timestamp,
        }
        transitions.set(entry.recordId, [...(transitions.get(entry.recordId) ?? []), logged])
      }
    }

    const ids = [...new Set([...changes.keys(), ...transitions.keys()])].sort()
    const records: RecordDiff[] = ids.map((recordId) => ({
      recordId,
      changes: changes.get(recordId) ?? [],
      transitions: transitions.get(recordId) ?? [],
    }))
    return { from, to, records }
  }

  /**
   * Logged transitions of one record, oldest first
   */
  async trace(recordId: RecordId): Promise<TraceEntry[]> {
    const commits = (await this.changeLog.log()).reverse()
    const entries: TraceEntry[] = []
    for (const commit of commits) {
      for (const transition of commit.operation.transitions) {
        if (transition.recordId !== recordId) continue
        entries.push({
          commitId: commit.id,
          kind: commit.operation.kind,
          operation: commit.operation.name,
          actor: commit.operation.actor,
          timestamp: commit.operation.timestamp,
          transition,
        })
      }
    }
    return entries
  }

  /**
   * Restores the snapshot of an ancestor point as a new commit
   *
   * @throws {UndoConflictError} If the point is not an ancestor of HEAD or a merge is pending
   */
  async undo(toPoint: string, by: UndoActor): Promise<UndoResult> {
    if (this.options.mergePending?.()) {
      throw new UndoConflictError('a merge is waiting for conflict resolution', { point: toPoint })
    }
    const head = await this.changeLog.resolvePoint('HEAD')
    const target = await this.changeLog.resolvePoint(toPoint)
    if (!(await this.changeLog.isAncestor(target, head))) {
      throw new UndoConflictError(`'${toPoint}' is not an ancestor of HEAD`, { target, head })
    }

    const current = await this.changeLog.loadSnapshot(head)
    const restored = await this.changeLog.loadSnapshot(target)
    const currentHash = hashSnapshot(current)
    if (currentHash === hashSnapshot(restored)) {
      return { commitId: null, restoredFrom: target, transitions: [] }
    }

    const next = RecordStore.fromSnapshot(restored, { criteria: this.options.criteria })
    const transitions = statusMoves(current, restored)
    const commit = await this.changeLog.commit(
      next.toSnapshot(),
      this.operation('undo', `undo to ${toPoint}`, by, transitions, { target, point: toPoint }),
      { stagedFrom: currentHash },
    )
    this.store.replaceWith(next)
    this.options.logger?.info('Restored history point', { target, commit: commit.id })
    return { commitId: commit.id, restoredFrom: target, transitions }
  }

  /**
   * Reverts the last logged transition of one record
   *
   * @throws {UndoConflictError} If later history depends on the transition
   */
  async undoRecord(recordId: RecordId, by: UndoActor): Promise<UndoResult> {
    const staged = this.store.clone()
    const stagedFrom = hashSnapshot(staged.toSnapshot())
    const current = staged.require(recordId)
    if (this.options.isBlocked?.(recordId)) {
      throw new UndoConflictError('record is part of an unresolved merge', { recordId })
    }
    if (staged.isCollapsed(recordId)) {
      throw new UndoConflictError(`record was collapsed into '${staged.resolveId(recordId)}'`, {
        recordId,
      })
    }

    const commit = await this.lastTransitionCommit(recordId)
    const parentId = commit.parents[0]
    const after = await this.changeLog.loadSnapshot(commit.id)
    const before = parentId === undefined ? undefined : await this.changeLog.loadSnapshot(parentId)
    const previous = before === undefined ? undefined : findRecord(before, recordId)

    if (before === undefined || previous === undefined) {
      throw new UndoConflictError('the transition created the record', { recordId, commit: commit.id })
    }
    if (stableStringify(findRecord(after, recordId)) !== stableStringify(current)) {
      throw new UndoConflictError('the record changed after the transition', {
        recordId,
        commit: commit.id,
      })
    }
    const dependents = staged
      .collapsedInto(recordId)
      .filter((id) => !collapsedInto(before, recordId).includes(id))
    if (dependents.length > 0) {
      throw new UndoConflictError('records were collapsed into it since', { recordId, dependents })
    }
    const lost = current.origin.filter((tag) => !previous.origin.includes(tag))
    if (lost.length > 0) {
      throw new UndoConflictError('origin added by the transition would be lost', { recordId, lost })
    }

    staged.upsert(previous)
    const transitions: TransitionEntry[] = [
      {
        recordId,
        from: current.status,
        to: previous.status,
        justification: `undo of ${commit.operation.name} (${commit.id.slice(0, 12)})`,
      },
    ]
    const undone = await this.changeLog.commit(
      staged.toSnapshot(),
      this.operation('undo-record', `undo ${recordId}`, by, transitions, {
        revertedCommit: commit.id,
        revertedOperation: commit.operation.id,
      }),
      { stagedFrom },
    )
    this.store.replaceWith(staged)
    this.options.logger?.info('Reverted record transition', { recordId, commit: undone.id })
    return { commitId: undone.id, restoredFrom: parentId ?? commit.id, transitions }
  }

  /**
   * Newest first-parent commit whose operation moved the record
   */
  private async lastTransitionCommit(recordId: RecordId): Promise<Commit> {
    for (const commit of await this.changeLog.log({ firstParent: true })) {
      if (commit.operation.transitions.some((entry) => entry.recordId === recordId)) {
        return commit
      }
    }
    throw new UndoConflictError('no logged transition to revert', { recordId })
  }

  private operation(
    kind: OperationKind,
    name: string,
    by: UndoActor,
    transitions: TransitionEntry[],
    details: Record<string, unknown>,
  ): OperationRecord {
    return {
      id: generateOperationId(),
      kind,
      name,
      actor: by.actor,
      timestamp: (by.clock ?? (() => new Date()))().toISOString(),
      counts: countMoves(transitions),
      transitions,
      failures: [],
      details,
    }
  }
}

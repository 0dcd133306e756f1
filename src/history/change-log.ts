/**
 * Append-only history of snapshots and operations
 * @module history/change-log
 */

import { RecordStore, type RecordStoreOptions } from '../core/store/record-store.js'
import type { Logger } from '../types/logger.js'
import type { OperationRecord } from '../types/operation.js'
import type { Snapshot } from '../types/record.js'
import { InvalidParameterError } from '../utils/errors.js'
import { hashCommit, hashSnapshot } from './hashing.js'
import {
  CommitListenerError,
  CorruptionDetectedError,
  NonFastForwardError,
  StaleHeadError,
  UnknownPointError,
} from './history-error.js'
import type { ChangeLogOptions, Commit, CommitListener, CommitOptions, HistoryAdapter } from './types.js'

const FULL_ID = /^[0-9a-f]{64}$/
const ID_PREFIX = /^[0-9a-f]{4,63}$/
const RELATIVE_POINT = /^(.+)~(\d+)$/

/**
 * Options for walking the log
 */
export interface LogOptions {
  /** Starting point (default: `HEAD`) */
  from?: string
  /** Follow only first parents (default: false) */
  firstParent?: boolean
  /** Maximum number of commits */
  limit?: number
}

/**
 * ChangeLog records every operation as a commit binding a full snapshot.
 *
 * Commits form a DAG addressed by content hash. The local branch only
 * moves forward: a commit is always a child of the current head, and a
 * ref update that would drop commits is rejected.
 *
 * @example
 * ```typescript
 * const log = new ChangeLog(createInMemoryHistoryAdapter())
 * const commit = await log.commit(store.toSnapshot(), operation)
 * const previous = await log.checkout('HEAD~1')
 * ```
 */
export class ChangeLog {
  readonly branch: string
  private readonly listeners: CommitListener[]
  private readonly logger?: Logger
  private readonly onListenerError?: (error: CommitListenerError) => void
  private pending: Promise<unknown> = Promise.resolve()

  constructor(
    private readonly adapter: HistoryAdapter,
    options: ChangeLogOptions = {},
  ) {
    this.branch = options.branch ?? 'main'
    this.listeners = [...(options.listeners ?? [])]
    this.logger = options.logger
    this.onListenerError = options.onListenerError
  }

  /** Ref holding the local branch head */
  get headRef(): string {
    return `heads/${this.branch}`
  }

  /**
   * Registers a listener run after each commit
   */
  onCommit(listener: CommitListener): void {
    this.listeners.push(listener)
  }

  async headId(): Promise<string | null> {
    return this.adapter.readRef(this.headRef)
  }

  async head(): Promise<Commit | null> {
    const id = await this.headId()
    return id === null ? null : this.readCommit(id)
  }

  /**
   * Appends a commit on top of the current head
   *
   * @returns The stored commit
   * @throws {StaleHeadError} If `stagedFrom` is given and the head moved away from it
   */
  async commit(snapshot: Snapshot, operation: OperationRecord, options: CommitOptions = {}): Promise<Commit> {
    return this.exclusive(async () => {
      const head = await this.head()
      if (head !== null && options.stagedFrom !== undefined && head.snapshotHash !== options.stagedFrom) {
        throw new StaleHeadError(this.headRef, head.id, options.stagedFrom)
      }
      return this.store(snapshot, operation, head === null ? [] : [head.id])
    })
  }

  /**
   * Appends a merge commit. The first parent must be the current head.
   *
   * @throws {NonFastForwardError} If the head moved since the merge started
   */
  async commitMerge(
    snapshot: Snapshot,
    operation: OperationRecord,
    parents: readonly [string, string],
  ): Promise<Commit> {
    return this.exclusive(async () => {
      const head = await this.headId()
      if (head !== parents[0]) {
        throw new NonFastForwardError(this.headRef, head ?? '(none)', parents[0])
      }
      return this.store(snapshot, operation, [...parents])
    })
  }

  /**
   * Moves the local branch to `commitId` when the head is one of its ancestors
   * @throws {NonFastForwardError} If history would be lost
   */
  async fastForward(commitId: string): Promise<void> {
    await this.exclusive(async () => {
      const head = await this.headId()
      if (head !== null && !(await this.isAncestor(head, commitId))) {
        throw new NonFastForwardError(this.headRef, head, commitId)
      }
      await this.readCommit(commitId)
      await this.adapter.writeRef(this.headRef, commitId)
    })
  }

  /**
   * Reads a commit and checks that its id matches its content
   *
   * @throws {UnknownPointError} If the commit is absent
   * @throws {CorruptionDetectedError} If the content does not hash to the id
   */
  async readCommit(id: string): Promise<Commit> {
    const commit = await this.adapter.readCommit(id)
    if (!commit) {
      throw new UnknownPointError(id, 'no such commit')
    }
    const expected = hashCommit(commit.parents, commit.snapshotHash, commit.operation)
    if (commit.id !== id || expected !== id) {
      throw new CorruptionDetectedError('commit', id, 'content does not match its id', {
        computed: expected,
      })
    }
    return commit
  }

  /**
   * Loads and verifies the snapshot bound to a commit
   *
   * @throws {CorruptionDetectedError} If the snapshot is missing or altered
   */
  async loadSnapshot(commitId: string): Promise<Snapshot> {
    const commit = await this.readCommit(commitId)
    const snapshot = await this.adapter.readSnapshot(commit.snapshotHash)
    if (!snapshot) {
      throw new CorruptionDetectedError('snapshot', commit.snapshotHash, 'missing', { commitId })
    }
    const computed = hashSnapshot(snapshot)
    if (computed !== commit.snapshotHash) {
      throw new CorruptionDetectedError('snapshot', commit.snapshotHash, 'content does not match its hash', {
        commitId,
        computed,
      })
    }
    return snapshot
  }

  /**
   * Rebuilds a record store from any history point
   */
  async checkout(point: string, options: RecordStoreOptions = {}): Promise<RecordStore> {
    const id = await this.resolvePoint(point)
    return RecordStore.fromSnapshot(await this.loadSnapshot(id), options)
  }

  /**
   * Resolves a history point to a commit id.
   *
   * Accepts `HEAD`, branch names (`main`, `heads/main`), remote branches
   * (`origin/main`, `remotes/origin/main`), full ids, unique id prefixes
   * and any of these followed by `~n` for the n-th first-parent ancestor.
   *
   * @throws {UnknownPointError} If the point does not name a commit
   */
  async resolvePoint(point: string): Promise<string> {
    const relative = RELATIVE_POINT.exec(point)
    if (relative) {
      const [, base, steps] = relative
      let id = await this.resolvePoint(base)
      for (let step = 0; step < Number(steps); step++) {
        const commit = await this.readCommit(id)
        const parent = commit.parents[0]
        if (parent === undefined) {
          throw new UnknownPointError(point, 'walks past the root commit')
        }
        id = parent
      }
      return id
    }

    if (point === 'HEAD') {
      const head = await this.headId()
      if (head === null) throw new UnknownPointError(point, 'the log is empty')
      return head
    }

    for (const ref of [point, `heads/${point}`, `remotes/${point}`]) {
      const target = await this.adapter.readRef(ref).catch((error: unknown) => {
        if (error instanceof InvalidParameterError) return null
        throw error
      })
      if (target !== null) return target
    }

    if (FULL_ID.test(point)) {
      await this.readCommit(point)
      return point
    }

    if (ID_PREFIX.test(point)) {
      const matches = (await this.adapter.listCommitIds()).filter((id) => id.startsWith(point))
      if (matches.length > 1) throw new UnknownPointError(point, 'ambiguous id prefix')
      const [match] = matches
      if (match !== undefined) return match
    }

    throw new UnknownPointError(point)
  }

  /**
   * Commits reachable from a point, newest first
   */
  async log(options: LogOptions = {}): Promise<Commit[]> {
    const headId = await this.headId()
    if (options.from === undefined && headId === null) return []
    const start = await this.resolvePoint(options.from ?? 'HEAD')
    const limit = options.limit ?? Number.POSITIVE_INFINITY

    const result: Commit[] = []
    const seen = new Set<string>()
    const queue = [start]
    while (queue.length > 0 && result.length < limit) {
      const id = queue.shift()
      if (id === undefined || seen.has(id)) continue
      seen.add(id)
      const commit = await this.readCommit(id)
      result.push(commit)
      queue.push(...(options.firstParent ? commit.parents.slice(0, 1) : commit.parents))
    }
    return result
  }

  /**
   * Whether `ancestor` is reachable from `descendant` (a commit is its own ancestor)
   */
  async isAncestor(ancestor: string, descendant: string): Promise<boolean> {
    return (await this.ancestors(descendant)).has(ancestor)
  }

  /**
   * Nearest common ancestor of two commits, or null for unrelated histories
   */
  async mergeBase(a: string, b: string): Promise<string | null> {
    const ofA = await this.ancestors(a)
    const seen = new Set<string>()
    const queue = [b]
    while (queue.length > 0) {
      const id = queue.shift()
      if (id === undefined || seen.has(id)) continue
      seen.add(id)
      if (ofA.has(id)) return id
      queue.push(...(await this.readCommit(id)).parents)
    }
    return null
  }

  /**
   * Copies the commits of another log's branch and records them under
   * `remotes/<remoteName>/<branch>`.
   *
   * @returns The fetched head, or null when the remote log is empty
   */
  async fetchFrom(remote: ChangeLog, remoteName: string): Promise<string | null> {
    if (!/^[A-Za-z0-9_-]+$/.test(remoteName)) {
      throw new InvalidParameterError('remoteName', remoteName, 'must be a simple name')
    }
    const remoteHead = await remote.headId()
    if (remoteHead === null) return null

    const queue = [remoteHead]
    const seen = new Set<string>()
    let copied = 0
    while (queue.length > 0) {
      const id = queue.shift()
      if (id === undefined || seen.has(id)) continue
      seen.add(id)
      if ((await this.adapter.readCommit(id)) !== null) continue

      const commit = await remote.readCommit(id)
      const snapshot = await remote.loadSnapshot(id)
      await this.adapter.writeSnapshot(commit.snapshotHash, snapshot)
      await this.adapter.writeCommit(commit)
      copied++
      queue.push(...commit.parents)
    }

    await this.adapter.writeRef(`remotes/${remoteName}/${remote.branch}`, remoteHead)
    this.logger?.info('Fetched remote history', { remote: remoteName, head: remoteHead, copied })
    return remoteHead
  }

  /**
   * Verifies every commit and snapshot reachable from the head
   * @throws {CorruptionDetectedError} On the first inconsistency
   */
  async verify(): Promise<number> {
    const commits = await this.log()
    for (const commit of commits) {
      await this.loadSnapshot(commit.id)
    }
    return commits.length
  }

  private async ancestors(id: string): Promise<Set<string>> {
    const seen = new Set<string>()
    const queue = [id]
    while (queue.length > 0) {
      const current = queue.shift()
      if (current === undefined || seen.has(current)) continue
      seen.add(current)
      queue.push(...(await this.readCommit(current)).parents)
    }
    return seen
  }

  private async store(
    snapshot: Snapshot,
    operation: OperationRecord,
    parents: string[],
  ): Promise<Commit> {
    const snapshotHash = hashSnapshot(snapshot)
    const commit: Commit = {
      id: hashCommit(parents, snapshotHash, operation),
      parents,
      snapshotHash,
      operation,
    }

    await this.adapter.writeSnapshot(snapshotHash, snapshot)
    await this.adapter.writeCommit(commit)
    await this.adapter.writeRef(this.headRef, commit.id)

    this.logger?.debug('Committed operation', {
      commit: commit.id,
      kind: operation.kind,
      name: operation.name,
    })

    for (const listener of this.listeners) {
      try {
        await listener(commit, snapshot)
      } catch (error) {
        const failure = new CommitListenerError(commit.id, error)
        this.logger?.error('Commit listener failed', { commit: commit.id, error: failure.message })
        this.onListenerError?.(failure)
      }
    }
    return commit
  }

  /**
   * Runs ref-moving work one at a time
   */
  private exclusive<T>(work: () => Promise<T>): Promise<T> {
    const run = this.pending.then(work, work)
    this.pending = run.catch((error: unknown) => {
      this.logger?.debug('History write failed', { error: String(error) })
    })
    return run
  }
}

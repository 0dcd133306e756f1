/**
 * Change log type definitions
 * @module history/types
 */

import type { Logger } from '../types/logger.js'
import type { CommitListenerError } from './history-error.js'
import type { OperationRecord } from '../types/operation.js'
import type { Snapshot } from '../types/record.js'

/**
 * A node of the history DAG.
 * Normal commits have one parent, merges two, the root none.
 */
export interface Commit {
  /** Content hash of parents, snapshot hash and operation */
  id: string
  parents: string[]
  /** Content hash of the bound snapshot */
  snapshotHash: string
  operation: OperationRecord
}

/**
 * Persistence backend for commits, snapshots and refs.
 *
 * Objects are content-addressed and immutable. Refs are named pointers
 * (`heads/main`, `remotes/origin/main`) moved by the change log.
 */
export interface HistoryAdapter {
  /**
   * Stores a snapshot under its content hash
   * @param hash - Hash computed by the change log
   * @param snapshot - The snapshot to store
   */
  writeSnapshot(hash: string, snapshot: Snapshot): Promise<void>

  /**
   * Reads a snapshot
   * @returns The snapshot, or null if absent
   */
  readSnapshot(hash: string): Promise<Snapshot | null>

  /**
   * Stores a commit under its id
   */
  writeCommit(commit: Commit): Promise<void>

  /**
   * Reads a commit
   * @returns The commit, or null if absent
   */
  readCommit(id: string): Promise<Commit | null>

  /**
   * Lists every stored commit id
   */
  listCommitIds(): Promise<string[]>

  /**
   * Reads a ref
   * @returns The commit id the ref points to, or null if unset
   */
  readRef(name: string): Promise<string | null>

  /**
   * Points a ref at a commit
   */
  writeRef(name: string, commitId: string): Promise<void>

  /**
   * Lists refs and their targets
   */
  listRefs(): Promise<Record<string, string>>
}

/**
 * Called after a commit is stored and the branch moved
 */
export type CommitListener = (commit: Commit, snapshot: Snapshot) => Promise<void> | void

/**
 * Options for creating a change log
 */
export interface ChangeLogOptions {
  /** Local branch name (default: `main`) */
  branch?: string
  /** Listeners run after every commit, in order */
  listeners?: CommitListener[]
  /**
   * Receives listener failures. The commit has already moved the branch
   * when a listener runs, so failures are reported here, not thrown.
   */
  onListenerError?: (error: CommitListenerError) => void
  logger?: Logger
}

/**
 * Options of a single commit
 */
export interface CommitOptions {
  /**
   * Hash of the snapshot the committed work was staged from. When the head
   * no longer holds it, the commit is refused.
   */
  stagedFrom?: string
}

/**
 * In-memory history adapter
 * @module history/adapters/memory-history-adapter
 */

import type { Snapshot } from '../../types/record.js'
import { decodeCommit, decodeSnapshot } from '../serialization.js'
import type { Commit, HistoryAdapter } from '../types.js'

/**
 * History adapter keeping serialised objects in maps.
 * Used by tests and short-lived working copies.
 */
export class InMemoryHistoryAdapter implements HistoryAdapter {
  private readonly snapshots = new Map<string, string>()
  private readonly commits = new Map<string, string>()
  private readonly refs = new Map<string, string>()

  async writeSnapshot(hash: string, snapshot: Snapshot): Promise<void> {
    if (!this.snapshots.has(hash)) {
      this.snapshots.set(hash, JSON.stringify(snapshot))
    }
  }

  async readSnapshot(hash: string): Promise<Snapshot | null> {
    const raw = this.snapshots.get(hash)
    return raw === undefined ? null : decodeSnapshot(JSON.parse(raw), hash)
  }

  async writeCommit(commit: Commit): Promise<void> {
    if (!this.commits.has(commit.id)) {
      this.commits.set(commit.id, JSON.stringify(commit))
    }
  }

  async readCommit(id: string): Promise<Commit | null> {
    const raw = this.commits.get(id)
    return raw === undefined ? null : decodeCommit(JSON.parse(raw), id)
  }

  async listCommitIds(): Promise<string[]> {
    return [...this.commits.keys()].sort()
  }

  async readRef(name: string): Promise<string | null> {
    return this.refs.get(name) ?? null
  }

  async writeRef(name: string, commitId: string): Promise<void> {
    this.refs.set(name, commitId)
  }

  async listRefs(): Promise<Record<string, string>> {
    return Object.fromEntries([...this.refs.entries()].sort(([a], [b]) => a.localeCompare(b)))
  }

  /**
   * Number of stored commits
   */
  size(): number {
    return this.commits.size
  }
}

/**
 * Creates a new in-memory history adapter
 */
export function createInMemoryHistoryAdapter(): InMemoryHistoryAdapter {
  return new InMemoryHistoryAdapter()
}

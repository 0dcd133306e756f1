/**
 * Unit tests for ChangeLog
 */

import { describe, it, expect, beforeEach, vi } from 'vitest'
import { RecordStore } from '../../../src/core/store/record-store.js'
import { ChangeLog } from '../../../src/history/change-log.js'
import { createInMemoryHistoryAdapter } from '../../../src/history/adapters/memory-history-adapter.js'
import { hashSnapshot } from '../../../src/history/hashing.js'
import { NonFastForwardError, StaleHeadError, UnknownPointError } from '../../../src/history/history-error.js'
import type { Snapshot } from '../../../src/types/record.js'
import { InvalidParameterError } from '../../../src/utils/errors.js'
import { makeOperation, makeRecord } from '../../fixtures/ledger.js'

function snapshotOf(...ids: string[]): Snapshot {
  const store = new RecordStore()
  for (const id of ids) {
    store.upsert(makeRecord(id))
  }
  return store.toSnapshot()
}

describe('ChangeLog', () => {
  let log: ChangeLog

  beforeEach(() => {
    log = new ChangeLog(createInMemoryHistoryAdapter())
  })

  describe('commit', () => {
    it('starts the branch with a root commit', async () => {
      const commit = await log.commit(snapshotOf('r1'), makeOperation('init', { kind: 'init' }))

      expect(commit.parents).toEqual([])
      expect(await log.headId()).toBe(commit.id)
      expect(log.headRef).toBe('heads/main')
    })

    it('chains commits on the head', async () => {
      const first = await log.commit(snapshotOf(), makeOperation('init', { kind: 'init' }))
      const second = await log.commit(snapshotOf('r1'), makeOperation('retrieve', { kind: 'retrieve' }))

      expect(second.parents).toEqual([first.id])
      expect((await log.head())?.id).toBe(second.id)
    })

    it('serialises concurrent commits', async () => {
      const [a, b] = await Promise.all([
        log.commit(snapshotOf('r1'), makeOperation('one')),
        log.commit(snapshotOf('r2'), makeOperation('two')),
      ])

      expect(b.parents).toEqual([a.id])
    })

    it('refuses work staged from a snapshot the head no longer holds', async () => {
      const root = await log.commit(snapshotOf(), makeOperation('init', { kind: 'init' }))
      const stagedFrom = hashSnapshot(snapshotOf())
      const first = await log.commit(snapshotOf('r1'), makeOperation('one'), { stagedFrom })

      await expect(log.commit(snapshotOf('r2'), makeOperation('two'), { stagedFrom })).rejects.toThrow(StaleHeadError)
      expect(first.parents).toEqual([root.id])
      expect(await log.headId()).toBe(first.id)
    })

    it('keeps the commit when a listener fails', async () => {
      const reported: string[] = []
      log = new ChangeLog(createInMemoryHistoryAdapter(), {
        listeners: [
          async () => {
            throw new Error('disk full')
          },
        ],
        onListenerError: (error) => reported.push(error.message),
      })
      const after = vi.fn()
      log.onCommit(after)

      const commit = await log.commit(snapshotOf('r1'), makeOperation('init'))

      expect(await log.headId()).toBe(commit.id)
      expect(reported).toEqual([`Commit listener failed for '${commit.id}': disk full`])
      expect(after).toHaveBeenCalledTimes(1)
    })

    it('runs listeners with the commit and its snapshot', async () => {
      const listener = vi.fn()
      log.onCommit(listener)
      const snapshot = snapshotOf('r1')

      const commit = await log.commit(snapshot, makeOperation('init'))

      expect(listener).toHaveBeenCalledWith(commit, snapshot)
    })
  })

  describe('resolvePoint', () => {
    let ids: string[]

    beforeEach(async () => {
      ids = []
      for (const name of ['init', 'load', 'prep']) {
        ids.push((await log.commit(snapshotOf(name), makeOperation(name))).id)
      }
    })

    it('resolves HEAD and branch names', async () => {
      expect(await log.resolvePoint('HEAD')).toBe(ids[2])
      expect(await log.resolvePoint('main')).toBe(ids[2])
      expect(await log.resolvePoint('heads/main')).toBe(ids[2])
    })

    it('walks first parents with ~n', async () => {
      expect(await log.resolvePoint('HEAD~1')).toBe(ids[1])
      expect(await log.resolvePoint('main~2')).toBe(ids[0])
    })

    it('refuses to walk past the root', async () => {
      await expect(log.resolvePoint('HEAD~3')).rejects.toThrow('walks past the root commit')
    })

    it('resolves full ids and unique prefixes', async () => {
      expect(await log.resolvePoint(ids[0])).toBe(ids[0])
      expect(await log.resolvePoint(ids[1].slice(0, 12))).toBe(ids[1])
    })

    it('rejects unknown points', async () => {
      await expect(log.resolvePoint('no-such-branch')).rejects.toThrow(UnknownPointError)
      await expect(log.resolvePoint('0'.repeat(64))).rejects.toThrow(UnknownPointError)
    })

    it('rejects HEAD on an empty log', async () => {
      const empty = new ChangeLog(createInMemoryHistoryAdapter())

      await expect(empty.resolvePoint('HEAD')).rejects.toThrow('the log is empty')
    })
  })

  describe('log and checkout', () => {
    it('lists commits newest first', async () => {
      await log.commit(snapshotOf(), makeOperation('init'))
      await log.commit(snapshotOf('r1'), makeOperation('retrieve'))
      await log.commit(snapshotOf('r1', 'r2'), makeOperation('retrieve-again'))

      const names = (await log.log()).map((commit) => commit.operation.name)

      expect(names).toEqual(['retrieve-again', 'retrieve', 'init'])
      expect(await log.log({ limit: 1 })).toHaveLength(1)
    })

    it('returns an empty list for an empty log', async () => {
      expect(await log.log()).toEqual([])
    })

    it('rebuilds the store of an earlier point', async () => {
      await log.commit(snapshotOf('r1'), makeOperation('one'))
      await log.commit(snapshotOf('r1', 'r2'), makeOperation('two'))

      const store = await log.checkout('HEAD~1')

      expect(store.has('r1')).toBe(true)
      expect(store.has('r2')).toBe(false)
    })

    it('verifies every reachable commit', async () => {
      await log.commit(snapshotOf('r1'), makeOperation('one'))
      await log.commit(snapshotOf('r2'), makeOperation('two'))

      expect(await log.verify()).toBe(2)
    })
  })

  describe('diverging histories', () => {
    let remote: ChangeLog
    let rootId: string

    beforeEach(async () => {
      rootId = (await log.commit(snapshotOf(), makeOperation('init'))).id
      remote = new ChangeLog(createInMemoryHistoryAdapter())
      await remote.fetchFrom(log, 'origin')
      await remote.fastForward(await remote.resolvePoint('origin/main'))
    })

    it('clones a history by fetching and fast-forwarding', async () => {
      expect(await remote.headId()).toBe(rootId)
      expect(await remote.resolvePoint('remotes/origin/main')).toBe(rootId)
    })

    it('finds the merge base of diverged branches', async () => {
      const ours = await log.commit(snapshotOf('r1'), makeOperation('ours'))
      const theirs = await remote.commit(snapshotOf('r2'), makeOperation('theirs'))
      await log.fetchFrom(remote, 'bob')

      const fetched = await log.resolvePoint('bob/main')

      expect(fetched).toBe(theirs.id)
      expect(await log.mergeBase(ours.id, fetched)).toBe(rootId)
      expect(await log.isAncestor(rootId, fetched)).toBe(true)
      expect(await log.isAncestor(ours.id, fetched)).toBe(false)
    })

    it('records merge commits with both parents', async () => {
      const ours = await log.commit(snapshotOf('r1'), makeOperation('ours'))
      const theirs = await remote.commit(snapshotOf('r2'), makeOperation('theirs'))
      await log.fetchFrom(remote, 'bob')

      const merge = await log.commitMerge(snapshotOf('r1', 'r2'), makeOperation('merge', { kind: 'merge' }), [
        ours.id,
        theirs.id,
      ])

      expect(merge.parents).toEqual([ours.id, theirs.id])
      expect((await log.log()).map((commit) => commit.operation.name)).toEqual(['merge', 'ours', 'theirs', 'init'])
      expect((await log.log({ firstParent: true })).map((commit) => commit.operation.name)).toEqual([
        'merge',
        'ours',
        'init',
      ])
    })

    it('rejects a merge commit whose first parent is not the head', async () => {
      const theirs = await remote.commit(snapshotOf('r2'), makeOperation('theirs'))
      await log.fetchFrom(remote, 'bob')

      await expect(
        log.commitMerge(snapshotOf('r2'), makeOperation('merge'), [theirs.id, rootId]),
      ).rejects.toThrow(NonFastForwardError)
    })

    it('refuses to fast-forward onto a diverged commit', async () => {
      await log.commit(snapshotOf('r1'), makeOperation('ours'))
      const theirs = await remote.commit(snapshotOf('r2'), makeOperation('theirs'))
      await log.fetchFrom(remote, 'bob')

      await expect(log.fastForward(theirs.id)).rejects.toThrow(NonFastForwardError)
    })

    it('rejects remote names with separators', async () => {
      await expect(log.fetchFrom(remote, 'a/b')).rejects.toThrow(InvalidParameterError)
    })
  })
})

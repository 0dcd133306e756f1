/**
 * Unit tests for the file-system history adapter
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { RecordStore } from '../../../src/core/store/record-store.js'
import { ChangeLog } from '../../../src/history/change-log.js'
import { createFileHistoryAdapter } from '../../../src/history/adapters/file-history-adapter.js'
import { CorruptionDetectedError } from '../../../src/history/history-error.js'
import { InvalidParameterError } from '../../../src/utils/errors.js'
import { makeOperation, makeRecord } from '../../fixtures/ledger.js'

describe('FileHistoryAdapter', () => {
  let root: string

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'review-ledger-'))
  })

  afterEach(async () => {
    await rm(root, { recursive: true, force: true })
  })

  async function commitOne(): Promise<{ log: ChangeLog; commitId: string; snapshotHash: string }> {
    const store = new RecordStore()
    store.upsert(makeRecord('r1', 'md_imported'))
    const log = new ChangeLog(createFileHistoryAdapter(root))
    const commit = await log.commit(store.toSnapshot(), makeOperation('load'))
    return { log, commitId: commit.id, snapshotHash: commit.snapshotHash }
  }

  it('persists commits, snapshots and refs across instances', async () => {
    const { commitId } = await commitOne()

    const reopened = new ChangeLog(createFileHistoryAdapter(root))
    const store = await reopened.checkout('HEAD')

    expect(await reopened.headId()).toBe(commitId)
    expect(store.require('r1').status).toBe('md_imported')
    expect(await createFileHistoryAdapter(root).listRefs()).toEqual({ 'heads/main': commitId })
    expect(await createFileHistoryAdapter(root).listCommitIds()).toEqual([commitId])
  })

  it('returns null for missing objects and refs', async () => {
    const adapter = createFileHistoryAdapter(root)

    expect(await adapter.readCommit('a'.repeat(64))).toBeNull()
    expect(await adapter.readRef('heads/main')).toBeNull()
    expect(await adapter.listCommitIds()).toEqual([])
  })

  it('detects an edited snapshot', async () => {
    const { log, commitId, snapshotHash } = await commitOne()
    const path = join(root, 'objects', 'snapshots', `${snapshotHash}.json`)
    const content = await readFile(path, 'utf8')
    await writeFile(path, content.replace('Title of r1', 'Edited title'), 'utf8')

    await expect(log.loadSnapshot(commitId)).rejects.toThrow(CorruptionDetectedError)
    await expect(log.loadSnapshot(commitId)).rejects.toThrow('content does not match its hash')
  })

  it('detects a commit that is not valid JSON', async () => {
    const { log, commitId } = await commitOne()
    await writeFile(join(root, 'objects', 'commits', `${commitId}.json`), '{"id":', 'utf8')

    await expect(log.readCommit(commitId)).rejects.toThrow(/invalid JSON/)
  })

  it('detects a commit with a malformed operation', async () => {
    const { log, commitId } = await commitOne()
    const path = join(root, 'objects', 'commits', `${commitId}.json`)
    const content = await readFile(path, 'utf8')
    await writeFile(path, content.replace('"kind": "stage"', '"kind": "rebase"'), 'utf8')

    await expect(log.readCommit(commitId)).rejects.toThrow('commit.operation.kind: unknown operation kind')
  })

  it('detects a commit whose content no longer matches its id', async () => {
    const { log, commitId } = await commitOne()
    const path = join(root, 'objects', 'commits', `${commitId}.json`)
    const content = await readFile(path, 'utf8')
    await writeFile(path, content.replace('"actor": "alice"', '"actor": "mallory"'), 'utf8')

    await expect(log.verify()).rejects.toThrow('content does not match its id')
  })

  it('rejects ref names that leave the refs directory', async () => {
    const adapter = createFileHistoryAdapter(root)

    await expect(adapter.writeRef('heads/../../escape', 'a'.repeat(64))).rejects.toThrow(InvalidParameterError)
    await expect(adapter.readRef('/absolute')).rejects.toThrow(InvalidParameterError)
  })
})

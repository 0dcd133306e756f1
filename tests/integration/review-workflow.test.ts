/**
 * Integration tests: a review carried through the pipeline by two
 * collaborators working on separate copies of the history
 */

import { describe, it, expect, beforeEach } from 'vitest'
import { EndpointRegistry } from '../../src/dispatch/endpoint-registry.js'
import { createInMemoryHistoryAdapter } from '../../src/history/adapters/memory-history-adapter.js'
import { ResultCode, resultCodeFor, resultCodeForError } from '../../src/ledger/result-codes.js'
import { ReviewLedger } from '../../src/ledger/review-ledger.js'
import { MergeConflictError } from '../../src/merge/merge-error.js'
import { UndoConflictError } from '../../src/review/undo-error.js'
import type { ProjectConfig } from '../../src/types/config.js'
import type { ReviewRecord, Snapshot } from '../../src/types/record.js'
import { makeConfig, searchEndpoint, stageEndpoint, tickingClock } from '../fixtures/ledger.js'

const RESULTS = [
  { origin: 'crossref.bib/0001', metadata: { title: 'Coordination in open source', year: 2019 } },
  { origin: 'crossref.bib/0002', metadata: { title: 'Forking dynamics', year: 2021 } },
  { origin: 'dblp.bib/0003', metadata: { title: 'Coordination in Open Source', year: 2019 } },
]

function titleKey(record: ReviewRecord): string {
  return String(record.metadata.title).toLowerCase()
}

/**
 * Snapshot content without provenance notes, which carry operation ids and times
 */
function content(snapshot: Snapshot) {
  return {
    records: snapshot.records.map(({ id, status, origin, metadata }) => ({ id, status, origin, metadata })),
    duplicates: snapshot.duplicates,
  }
}

function findByTitle(ledger: ReviewLedger, title: string): ReviewRecord {
  const record = [...ledger.store.iterate()].find((candidate) => candidate.metadata.title === title)
  if (!record) throw new Error(`no record titled '${title}'`)
  return record
}

describe('Review workflow', () => {
  let config: ProjectConfig
  let alice: ReviewLedger
  let bob: ReviewLedger

  function registryFor(owner: () => ReviewLedger, excludes: (record: ReviewRecord) => boolean): EndpointRegistry {
    return new EndpointRegistry()
      .register(searchEndpoint('search', RESULTS))
      .register(stageEndpoint('loader', 'load', () => ({ type: 'update' })))
      .register(
        stageEndpoint('normalise', 'prep', (record) => ({
          type: 'update',
          metadata: { title: String(record.metadata.title).trim() },
        })),
      )
      .register(
        stageEndpoint('matcher', 'dedupe', (record) => {
          const twin = [...owner().store.iterate()]
            .filter((other) => other.id !== record.id && titleKey(other) === titleKey(record))
            .find((other) => other.origin[0] < record.origin[0])
          return twin ? { type: 'duplicate', survivorId: twin.id } : { type: 'update' }
        }),
      )
      .register(
        stageEndpoint('prescreener', 'prescreen', (record) =>
          excludes(record) ? { type: 'update', status: 'rev_prescreen_excluded' } : { type: 'update' },
        ),
      )
  }

  beforeEach(async () => {
    config = makeConfig({
      retrieve: { endpoints: [{ endpoint: 'search' }] },
      load: { endpoints: [{ endpoint: 'loader' }] },
      prep: { endpoints: [{ endpoint: 'normalise' }] },
      dedupe: { endpoints: [{ endpoint: 'matcher' }] },
      prescreen: { endpoints: [{ endpoint: 'prescreener' }] },
    })

    alice = await ReviewLedger.init({
      config,
      history: createInMemoryHistoryAdapter(),
      registry: registryFor(() => alice, () => false),
      clock: tickingClock(),
      actor: 'AE',
    })
    bob = await ReviewLedger.open({
      config,
      history: createInMemoryHistoryAdapter(),
      registry: registryFor(() => bob, (record) => record.metadata.title === 'Forking dynamics'),
      clock: tickingClock('2024-03-05T09:00:00.000Z'),
    })

    await alice.retrieve({ actor: 'AE' })
    for (const stage of ['load', 'prep', 'dedupe'] as const) {
      const report = await alice.runStage(stage, { actor: 'AE' })
      expect(resultCodeFor(report)).toBe(ResultCode.SUCCESS)
    }
  })

  it('collapses duplicates found during deduplication', () => {
    const survivor = findByTitle(alice, 'Coordination in open source')

    expect(alice.status()).toMatchObject({
      total: 2,
      byStatus: { md_processed: 2 },
      collapsed: 1,
      pendingByStage: { prescreen: 2 },
    })
    expect(survivor.origin).toEqual(['crossref.bib/0001', 'dblp.bib/0003'])
  })

  it('clones the history into a second working copy', async () => {
    await bob.fetch(alice, 'origin')
    const outcome = await bob.merge('origin/main', { actor: 'BE' })

    expect(outcome.status).toBe('fast-forward')
    expect(await bob.changeLog.headId()).toBe(await alice.changeLog.headId())
    expect(bob.status()).toEqual(alice.status())
  })

  it('merges prescreening done on both copies once the conflict is resolved', async () => {
    await bob.fetch(alice, 'origin')
    await bob.merge('origin/main', { actor: 'BE' })

    await alice.runStage('prescreen', { actor: 'AE' })
    await bob.runStage('prescreen', { actor: 'BE' })
    await alice.fetch(bob, 'bob')

    const error = await alice.merge('bob/main', { actor: 'AE' }).catch((caught: unknown) => caught)
    const forking = findByTitle(alice, 'Forking dynamics')

    expect(error).toBeInstanceOf(MergeConflictError)
    expect(resultCodeForError(error)).toBe(ResultCode.HARD_CONFLICT)
    expect(alice.blockedRecords()).toEqual([forking.id])
    await expect(alice.undo('HEAD~1', { actor: 'AE' })).rejects.toThrow(UndoConflictError)
    await expect(alice.undoRecord(forking.id, { actor: 'AE' })).rejects.toThrow(
      `Cannot undo record '${forking.id}': record is part of an unresolved merge`,
    )
    expect(alice.split('pdf_get', { parts: 1 })).toEqual([
      { reviewer: 'part-1', recordIds: [findByTitle(alice, 'Coordination in open source').id] },
    ])

    const outcome = await alice.resolveConflicts([{ recordId: forking.id, path: 'status', take: 'theirs' }], {
      actor: 'AE',
    })

    expect(outcome.status).toBe('merged')
    expect(alice.blockedRecords()).toEqual([])
    expect(alice.status().byStatus).toEqual({ rev_prescreen_included: 1, rev_prescreen_excluded: 1 })
    expect(await alice.verify()).toBe(8)

    const trace = await alice.trace(forking.id)
    expect(trace.map((entry) => [entry.kind, entry.transition.to])).toEqual([
      ['retrieve', 'md_retrieved'],
      ['stage', 'md_imported'],
      ['stage', 'md_prepared'],
      ['stage', 'md_processed'],
      ['stage', 'rev_prescreen_excluded'],
      ['stage', 'rev_prescreen_included'],
      ['merge', 'rev_prescreen_excluded'],
    ])
  })

  it('rolls back a stage and runs it again', async () => {
    await alice.runStage('prescreen', { actor: 'AE' })
    const prescreened = alice.store.toSnapshot()

    const review = await alice.validate('HEAD~1')
    const undone = await alice.undo('HEAD~1', { actor: 'AE' })

    expect(review.records.map((record) => record.changes[0])).toEqual([
      { path: 'status', before: 'md_processed', after: 'rev_prescreen_included' },
      { path: 'status', before: 'md_processed', after: 'rev_prescreen_included' },
    ])
    expect(undone.transitions).toHaveLength(2)
    expect(alice.status().byStatus).toEqual({ md_processed: 2 })

    const again = await alice.runStage('prescreen', { actor: 'AE' })
    expect(again.advanced).toHaveLength(2)
    expect(content(alice.store.toSnapshot())).toEqual(content(prescreened))
  })

  it('reproduces the same records when retrieval is undone and run again', async () => {
    const processed = alice.store.toSnapshot()

    await alice.undo('HEAD~4', { actor: 'AE' })
    expect(alice.status().total).toBe(0)
    await alice.retrieve({ actor: 'AE' })
    for (const stage of ['load', 'prep', 'dedupe'] as const) {
      await alice.runStage(stage, { actor: 'AE' })
    }

    expect(content(alice.store.toSnapshot())).toEqual(content(processed))
  })
})

/**
 * Unit tests for TransitionEngine
 */

import { describe, it, expect, beforeEach } from 'vitest'
import { RecordStore } from '../../../src/core/store/record-store.js'
import { RecordValidationError } from '../../../src/core/store/store-error.js'
import { TransitionEngine } from '../../../src/core/transition/transition-engine.js'
import { IllegalTransitionError } from '../../../src/core/transition/transition-error.js'
import { InvalidParameterError } from '../../../src/utils/errors.js'
import { T0, fixedClock, makeRecord } from '../../fixtures/ledger.js'

describe('TransitionEngine', () => {
  let store: RecordStore
  let engine: TransitionEngine

  beforeEach(() => {
    store = new RecordStore({ criteria: ['population'] })
    engine = new TransitionEngine(store, { operationId: 'op-1', clock: fixedClock() })
  })

  describe('proposeTransition', () => {
    it('moves a record to a direct successor and notes the change', () => {
      store.upsert(makeRecord('r1'))

      const applied = engine.proposeTransition('r1', 'md_imported', 'alice', 'loaded from search.bib')

      expect(applied).toEqual({
        recordId: 'r1',
        from: 'md_retrieved',
        to: 'md_imported',
        kind: 'automatic',
        changedFields: ['status'],
        justification: 'loaded from search.bib',
      })
      const record = store.require('r1')
      expect(record.status).toBe('md_imported')
      expect(record.provenanceNotes.status).toEqual({
        source: 'alice',
        note: 'loaded from search.bib',
        setAt: T0,
        operationId: 'op-1',
      })
    })

    it('applies field edits together with the status', () => {
      store.upsert(makeRecord('r1', 'md_imported'))

      const applied = engine.proposeTransition('r1', 'md_prepared', 'alice', 'prepared', {
        metadata: { title: 'Coordination in open source', year: 2021 },
        removeFields: ['missing_field'],
      })

      expect(applied.changedFields).toEqual(['status', 'title', 'year'])
      expect(store.require('r1').metadata).toEqual({ title: 'Coordination in open source', year: 2021 })
      expect(store.require('r1').provenanceNotes.year?.note).toBe('prepared')
    })

    it('rejects skipping a stage', () => {
      store.upsert(makeRecord('r1'))

      expect(() => engine.proposeTransition('r1', 'md_prepared', 'alice', 'skip')).toThrow(
        "Illegal transition of 'r1' from 'md_retrieved' to 'md_prepared': stages cannot be skipped",
      )
      expect(store.require('r1').status).toBe('md_retrieved')
    })

    it('rejects moving backward', () => {
      store.upsert(makeRecord('r1', 'md_imported'))

      expect(() => engine.proposeTransition('r1', 'md_retrieved', 'alice', 'back')).toThrow(
        'moving backward is only possible through undo',
      )
    })

    it('rejects reopening an absorbing status', () => {
      store.upsert(makeRecord('r1', 'rev_excluded'))

      expect(() => engine.proposeTransition('r1', 'rev_included', 'alice', 'reopen')).toThrow(
        "'rev_excluded' is absorbing; reopening it requires a manual override",
      )
    })

    it('rejects the current status as target', () => {
      store.upsert(makeRecord('r1', 'md_imported'))

      expect(() => engine.proposeTransition('r1', 'md_imported', 'alice', 'again')).toThrow(
        'record already has this status',
      )
    })

    it('keeps the record when the result is invalid', () => {
      store.upsert(makeRecord('r1', 'pdf_prepared'))

      expect(() =>
        engine.proposeTransition('r1', 'rev_included', 'alice', 'screened', {
          screeningCriteria: { method: 'in' },
        }),
      ).toThrow(RecordValidationError)
      expect(store.require('r1').status).toBe('pdf_prepared')
    })

    it('refuses collapsed records', () => {
      store.upsert(makeRecord('a', 'md_prepared', { origin: ['s/1', 's/2'] }))
      store.upsert(makeRecord('b', 'md_prepared', { origin: ['s/2'] }))
      store.markDuplicate('b', 'a')

      expect(() => engine.proposeTransition('b', 'md_processed', 'alice', 'dedupe')).toThrow(
        "record was collapsed into 'a'",
      )
    })

    it('requires an actor', () => {
      store.upsert(makeRecord('r1'))

      expect(() => engine.proposeTransition('r1', 'md_imported', ' ', 'load')).toThrow(InvalidParameterError)
    })
  })

  describe('manualOverride', () => {
    it('reopens an absorbing status with screening decisions', () => {
      store.upsert(makeRecord('r1', 'rev_excluded', { screeningCriteria: { population: 'out' } }))

      const applied = engine.manualOverride('r1', 'rev_included', 'alice', 'criterion misread', {
        screeningCriteria: { population: 'in' },
      })

      expect(applied.kind).toBe('manual')
      expect(applied.changedFields).toEqual(['status', 'screeningCriteria'])
      expect(store.require('r1').screeningCriteria).toEqual({ population: 'in' })
    })

    it('does not take automatic edges', () => {
      store.upsert(makeRecord('r1'))

      expect(() => engine.manualOverride('r1', 'md_imported', 'alice', 'load')).toThrow(
        'manual overrides only reopen absorbing statuses',
      )
    })

    it('cannot skip stages', () => {
      store.upsert(makeRecord('r1', 'rev_excluded'))

      expect(() => engine.manualOverride('r1', 'rev_synthesized', 'alice', 'skip')).toThrow(
        'overrides cannot skip stages',
      )
    })
  })

  describe('applyBatch', () => {
    it('applies valid requests and reports the others', () => {
      store.upsert(makeRecord('r1'))
      store.upsert(makeRecord('r2'))
      store.upsert(makeRecord('r3'))

      const result = engine.applyBatch([
        { recordId: 'r1', targetStatus: 'md_imported', actor: 'alice', justification: 'load' },
        { recordId: 'r2', targetStatus: 'md_prepared', actor: 'alice', justification: 'load', source: 'loader' },
        { recordId: 'r3', targetStatus: 'md_imported', actor: 'alice', justification: 'load' },
      ])

      expect(result.applied.map((entry) => entry.recordId)).toEqual(['r1', 'r3'])
      expect(result.failed).toHaveLength(1)
      expect(result.failed[0]).toMatchObject({ recordId: 'r2', code: 'ILLEGAL_TRANSITION', source: 'loader' })
      expect(store.require('r2').status).toBe('md_retrieved')
    })

    it('reports unknown records', () => {
      const result = engine.applyBatch([
        { recordId: 'nope', targetStatus: 'md_imported', actor: 'alice', justification: 'load' },
      ])

      expect(result.failed[0]?.code).toBe('RECORD_NOT_FOUND')
    })
  })

  describe('createRecord', () => {
    it('adds a record at md_retrieved with provenance for each field', () => {
      const record = engine.createRecord(
        { id: 'new-1', origin: ['crossref.bib/0001'], metadata: { title: 'Forking', year: 2019 } },
        'alice',
        'retrieved by crossref',
        'crossref',
      )

      expect(record.status).toBe('md_retrieved')
      expect(Object.keys(record.provenanceNotes).sort()).toEqual(['origin', 'status', 'title', 'year'])
      expect(record.provenanceNotes.title?.source).toBe('crossref')
      expect(store.has('new-1')).toBe(true)
    })

    it('rejects a taken id', () => {
      store.upsert(makeRecord('r1'))

      expect(() => engine.createRecord({ id: 'r1', origin: ['x/1'], metadata: {} }, 'alice', 'again')).toThrow(
        'a record with this id already exists',
      )
    })
  })

  describe('amend', () => {
    it('adds origin tags without moving the status', () => {
      store.upsert(makeRecord('r1', 'md_prepared', { origin: ['s/1'] }))

      const changed = engine.amend('r1', 'alice', 'duplicate merged', { addOrigin: ['s/1', 's/9'] })

      expect(changed).toEqual(['origin'])
      expect(store.require('r1')).toMatchObject({ status: 'md_prepared', origin: ['s/1', 's/9'] })
    })
  })

  it('raises IllegalTransitionError with both statuses', () => {
    store.upsert(makeRecord('r1'))

    try {
      engine.proposeTransition('r1', 'rev_included', 'alice', 'jump')
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(IllegalTransitionError)
      if (error instanceof IllegalTransitionError) {
        expect(error.from).toBe('md_retrieved')
        expect(error.to).toBe('rev_included')
        expect(error.code).toBe('ILLEGAL_TRANSITION')
      }
    }
  })
})

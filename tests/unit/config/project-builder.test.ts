/**
 * Unit tests for ProjectBuilder
 */

import { describe, it, expect } from 'vitest'
import { ProjectBuilder } from '../../../src/config/project-builder.js'
import { BuilderSequenceError, InvalidParameterError } from '../../../src/utils/errors.js'

describe('ProjectBuilder', () => {
  it('builds a validated configuration', () => {
    const config = new ProjectBuilder()
      .title('Coordination in open source')
      .reviewType('scoping_review')
      .author({ name: 'Ada Example', initials: 'AE' })
      .criterion('population', 'Open source communities')
      .stage('prep')
      .endpoint('normalise')
      .endpoint('check', { strict: true })
      .done()
      .stage('pdf_prep')
      .timeout(60_000)
      .concurrency(1)
      .done()
      .dispatch({ concurrency: 8 })
      .mergePolicy('theirs')
      .build()

    expect(config).toEqual({
      project: {
        title: 'Coordination in open source',
        reviewType: 'scoping_review',
        authors: [{ name: 'Ada Example', initials: 'AE' }],
      },
      screening: { criteria: { population: { explanation: 'Open source communities' } } },
      stages: {
        prep: { endpoints: [{ endpoint: 'normalise' }, { endpoint: 'check', options: { strict: true } }] },
        pdf_prep: { endpoints: [], concurrency: 1, timeoutMs: 60_000 },
      },
      dispatch: { concurrency: 8, timeoutMs: 30_000 },
      merge: { scalarConflictPolicy: 'theirs' },
    })
  })

  it('resumes a stage already started', () => {
    const builder = new ProjectBuilder().title('T').author({ name: 'Ada Example', initials: 'AE' })
    builder.stage('prep').endpoint('a')
    builder.stage('prep').endpoint('b')

    expect(builder.build().stages.prep?.endpoints).toEqual([{ endpoint: 'a' }, { endpoint: 'b' }])
  })

  it('requires a title and an author', () => {
    expect(() => new ProjectBuilder().author({ name: 'Ada Example', initials: 'AE' }).build()).toThrow(
      'Builder sequence error in build: title() must be called before build()',
    )
    expect(() => new ProjectBuilder().title('T').build()).toThrow(BuilderSequenceError)
  })

  it('rejects invalid stage settings immediately', () => {
    const stage = new ProjectBuilder().stage('prep')

    expect(() => stage.timeout(0)).toThrow(InvalidParameterError)
    expect(() => stage.endpoint('')).toThrow(InvalidParameterError)
  })
})

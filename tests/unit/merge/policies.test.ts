/**
 * Unit tests for scalar conflict policies
 */

import { describe, it, expect } from 'vitest'
import {
  failOnConflict,
  getScalarPolicy,
  laterTimestampWins,
  preferOurs,
  preferTheirs,
} from '../../../src/merge/policies.js'
import { note } from '../../fixtures/ledger.js'

describe('laterTimestampWins', () => {
  it('keeps the side set later', () => {
    expect(
      laterTimestampWins({
        ours: 'A',
        theirs: 'B',
        oursNote: note('alice', '2024-03-01T10:00:00.000Z'),
        theirsNote: note('bob', '2024-03-02T10:00:00.000Z'),
      }),
    ).toBe('theirs')
    expect(
      laterTimestampWins({
        ours: 'A',
        theirs: 'B',
        oursNote: note('alice', '2024-03-03T10:00:00.000Z'),
        theirsNote: note('bob', '2024-03-02T10:00:00.000Z'),
      }),
    ).toBe('ours')
  })

  it('leaves ties for a human', () => {
    expect(
      laterTimestampWins({ ours: 'A', theirs: 'B', oursNote: note('alice'), theirsNote: note('bob') }),
    ).toBeNull()
  })

  it('leaves values without a usable timestamp for a human', () => {
    expect(laterTimestampWins({ ours: 'A', theirs: 'B', theirsNote: note('bob') })).toBeNull()
    expect(
      laterTimestampWins({ ours: 'A', theirs: 'B', oursNote: note('alice', 'yesterday'), theirsNote: note('bob') }),
    ).toBeNull()
  })
})

describe('getScalarPolicy', () => {
  it('maps each configured name to its implementation', () => {
    expect(getScalarPolicy('later-timestamp-wins')).toBe(laterTimestampWins)
    expect(getScalarPolicy('ours')).toBe(preferOurs)
    expect(getScalarPolicy('theirs')).toBe(preferTheirs)
    expect(getScalarPolicy('fail')).toBe(failOnConflict)
  })

  it('fixed policies ignore timestamps', () => {
    const conflict = { ours: 1, theirs: 2 }

    expect(preferOurs(conflict)).toBe('ours')
    expect(preferTheirs(conflict)).toBe('theirs')
    expect(failOnConflict(conflict)).toBeNull()
  })
})

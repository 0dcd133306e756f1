/**
 * Unit tests for EndpointRegistry
 */

import { describe, it, expect, beforeEach } from 'vitest'
import { EndpointNotRegisteredError } from '../../../src/dispatch/dispatch-error.js'
import { EndpointRegistry } from '../../../src/dispatch/endpoint-registry.js'
import { InvalidParameterError } from '../../../src/utils/errors.js'
import { searchEndpoint, stageEndpoint } from '../../fixtures/ledger.js'

describe('EndpointRegistry', () => {
  let registry: EndpointRegistry

  beforeEach(() => {
    registry = new EndpointRegistry()
      .register(searchEndpoint('crossref', []))
      .register(stageEndpoint('ocr', 'pdf_prep', () => ({ type: 'no-change' })))
      .register(stageEndpoint('title_case', 'prep', () => ({ type: 'no-change' })))
  })

  it('looks up endpoints by stage and id', () => {
    expect(registry.getStageEndpoint('pdf_prep', 'ocr').id).toBe('ocr')
    expect(registry.getSearchEndpoint('crossref').stage).toBe('retrieve')
  })

  it('refuses endpoints of another stage', () => {
    expect(() => registry.getStageEndpoint('prep', 'ocr')).toThrow(
      "No endpoint 'ocr' registered for stage 'prep'",
    )
    expect(() => registry.getSearchEndpoint('ocr')).toThrow(EndpointNotRegisteredError)
  })

  it('rejects a second endpoint with the same id', () => {
    expect(() => registry.register(searchEndpoint('crossref', []))).toThrow(InvalidParameterError)
  })

  it('lists ids per stage in registration order', () => {
    registry.register(searchEndpoint('dblp', []))

    expect(registry.idsFor('retrieve')).toEqual(['crossref', 'dblp'])
    expect(registry.idsFor('screen')).toEqual([])
  })

  it('unregisters endpoints', () => {
    expect(registry.unregister('ocr')).toBe(true)
    expect(registry.has('ocr')).toBe(false)
    expect(registry.unregister('ocr')).toBe(false)
  })
})

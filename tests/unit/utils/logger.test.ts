/**
 * Unit tests for logger helpers
 */

import { describe, it, expect, vi, afterEach } from 'vitest'
import {
  createConsoleLogger,
  createPrefixedLogger,
  createRecordingLogger,
  createSilentLogger,
  defaultLogger,
  withLogContext,
} from '../../../src/utils/logger.js'

const COMMIT = 'a'.repeat(12) + 'b'.repeat(52)

describe('logger helpers', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('prefixes messages with the component name', () => {
    const base = createRecordingLogger()
    const logger = createPrefixedLogger('merge', base)

    logger.info('Merged', { commit: 'abc' })
    logger.warn('Merge stopped on conflicts')

    expect(base.entries).toEqual([
      { level: 'info', message: '[merge] Merged', context: { commit: 'abc' } },
      { level: 'warn', message: '[merge] Merge stopped on conflicts', context: undefined },
    ])
  })

  it('writes to the console by level', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})

    defaultLogger.warn('Endpoint call failed', { recordId: 'r1' })

    expect(warn).toHaveBeenCalledWith('[WARN] Endpoint call failed', { recordId: 'r1' })
  })

  it('shortens commit ids in the console output', () => {
    const info = vi.spyOn(console, 'log').mockImplementation(() => {})

    defaultLogger.info('Merged', { commit: COMMIT, parents: [COMMIT, 'main'] })
    defaultLogger.info('Fetched remote history')

    expect(info).toHaveBeenNthCalledWith(1, '[INFO] Merged', {
      commit: 'aaaaaaaaaaaa',
      parents: ['aaaaaaaaaaaa', 'main'],
    })
    expect(info).toHaveBeenNthCalledWith(2, '[INFO] Fetched remote history')
  })

  it('skips entries below the configured level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})
    const error = vi.spyOn(console, 'error').mockImplementation(() => {})
    const logger = createConsoleLogger({ level: 'warn' })

    logger.debug('Committed operation')
    logger.info('Running stage')
    logger.error('Commit listener failed', { commit: 'c1' })

    expect(log).not.toHaveBeenCalled()
    expect(error).toHaveBeenCalledWith('[ERROR] Commit listener failed', { commit: 'c1' })
  })

  it('adds bound fields to every entry', () => {
    const base = createRecordingLogger()
    const logger = withLogContext(base, { operationId: 'op-1' })

    logger.warn('Transition rejected', { recordId: 'r1' })
    logger.info('Applied', { operationId: 'op-2' })

    expect(base.entries).toEqual([
      { level: 'warn', message: 'Transition rejected', context: { operationId: 'op-1', recordId: 'r1' } },
      { level: 'info', message: 'Applied', context: { operationId: 'op-2' } },
    ])
  })

  it('drops everything when silent', () => {
    const log = vi.spyOn(console, 'log')

    createSilentLogger().info('ignored')

    expect(log).not.toHaveBeenCalled()
  })
})

/**
 * Tests for logger.ts
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { createLogger, isVerboseEnv, silentLogger } from '../../src/lib/logger.js'

function captureStderr() {
  return vi.spyOn(console, 'error').mockImplementation(() => {})
}

describe('logger', () => {
  let stderr: ReturnType<typeof captureStderr>

  beforeEach(() => {
    stderr = captureStderr()
  })

  afterEach(() => {
    stderr.mockRestore()
  })

  it('should prefix every line', () => {
    const logger = createLogger({ verbose: false })

    logger.info('planning')
    logger.warn('drift found')
    logger.error('apply failed')

    expect(stderr.mock.calls).toEqual([
      ['[keel] planning'],
      ['[keel] WARN: drift found'],
      ['[keel] ERROR: apply failed']
    ])
  })

  it('should print debug lines only when verbose', () => {
    createLogger({ verbose: false }).debug('hidden')
    createLogger({ verbose: true }).debug('shown')

    expect(stderr.mock.calls).toEqual([['[keel] shown']])
  })

  it('should keep errors when silent', () => {
    const logger = createLogger({ silent: true, verbose: true })

    logger.debug('a')
    logger.info('b')
    logger.warn('c')
    logger.error('d')

    expect(stderr.mock.calls).toEqual([['[keel] ERROR: d']])
  })

  it('should accept a custom prefix', () => {
    createLogger({ prefix: '[site]' }).info('hello')

    expect(stderr).toHaveBeenCalledWith('[site] hello')
  })

  it('should read verbosity from the environment', () => {
    expect(isVerboseEnv({ KEEL_VERBOSE: '1' })).toBe(true)
    expect(isVerboseEnv({ KEEL_VERBOSE: 'true' })).toBe(true)
    expect(isVerboseEnv({ KEEL_VERBOSE: 'yes' })).toBe(false)
    expect(isVerboseEnv({})).toBe(false)
  })

  it('should drop everything with the silent logger', () => {
    silentLogger.error('nothing')

    expect(stderr).not.toHaveBeenCalled()
  })
})

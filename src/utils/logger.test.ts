import { describe, it, expect, afterEach, vi } from 'vitest'
import { logger, setLogLevel, getLogLevel } from './logger.js'

describe('logger', () => {
  afterEach(() => {
    setLogLevel('info')
    vi.restoreAllMocks()
  })

  it('suppresses messages below the current level', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {})
    setLogLevel('warn')
    logger.info('not shown')
    logger.debug('not shown either')
    expect(spy).not.toHaveBeenCalled()
    logger.warn('shown')
    expect(spy).toHaveBeenCalledTimes(1)
  })

  it('writes level and message to stderr', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {})
    logger.error('boom', { code: 1 })
    const [line, data] = spy.mock.calls[0]
    expect(line).toMatch(/^\[.+\] ERROR: boom$/)
    expect(data).toEqual({ code: 1 })
  })

  it('scopes child loggers by component', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {})
    logger.child('memory').child('store').info('hello')
    expect(spy.mock.calls[0][0]).toMatch(/INFO \(memory\.store\): hello$/)
  })

  it('reports the current level', () => {
    setLogLevel('debug')
    expect(getLogLevel()).toBe('debug')
  })
})

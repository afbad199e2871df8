import { describe, it, expect, vi, afterEach } from 'vitest'
import { createLogger, isLogLevel } from './logger'

describe('logger', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('prefixes messages with the tag', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => {})
    createLogger('Advisor').info('asked', 3)
    expect(info).toHaveBeenCalledWith('[Advisor]', 'asked', 3)
  })

  it('drops messages below the minimum level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {})
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const log = createLogger('Store', 'warn')
    log.debug('hidden')
    log.warn('shown')
    expect(debug).not.toHaveBeenCalled()
    expect(warn).toHaveBeenCalledWith('[Store]', 'shown')
  })

  it('recognizes level names', () => {
    expect(isLogLevel('error')).toBe(true)
    expect(isLogLevel('verbose')).toBe(false)
    expect(isLogLevel('toString')).toBe(false)
  })
})

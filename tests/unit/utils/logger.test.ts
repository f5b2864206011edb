import { describe, it, expect, vi, afterEach } from 'vitest'
import {
  defaultLogger,
  createSilentLogger,
  createPrefixedLogger,
} from '../../../src/utils/logger.js'
import type { Logger } from '../../../src/utils/logger.js'

function createMockLogger(): Logger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }
}

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  describe('defaultLogger', () => {
    it('writes to the console with a level prefix', () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => {})
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})

      defaultLogger.info('merged', { providers: 3 })
      defaultLogger.warn('dropped')

      expect(log).toHaveBeenCalledWith('[INFO] merged', { providers: 3 })
      expect(warn).toHaveBeenCalledWith('[WARN] dropped', '')
    })
  })

  describe('createSilentLogger', () => {
    it('writes nothing', () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => {})
      const error = vi.spyOn(console, 'error').mockImplementation(() => {})
      const logger = createSilentLogger()

      logger.debug('a')
      logger.error('b')

      expect(log).not.toHaveBeenCalled()
      expect(error).not.toHaveBeenCalled()
    })
  })

  describe('createPrefixedLogger', () => {
    it('prefixes every level', () => {
      const base = createMockLogger()
      const logger = createPrefixedLogger('reconciler', base)

      logger.debug('one')
      logger.info('two', { n: 2 })
      logger.warn('three')
      logger.error('four')

      expect(base.debug).toHaveBeenCalledWith('[reconciler] one', undefined)
      expect(base.info).toHaveBeenCalledWith('[reconciler] two', { n: 2 })
      expect(base.warn).toHaveBeenCalledWith('[reconciler] three', undefined)
      expect(base.error).toHaveBeenCalledWith('[reconciler] four', undefined)
    })
  })
})

import { describe, it, expect, vi } from 'vitest'
import { Reconciler } from '../../../src/core/reconciler.js'
import { NoMetadataAvailableError } from '../../../src/merge/merge-error.js'
import { ConfigurationError } from '../../../src/utils/errors.js'
import { DEFAULT_RECONCILER_CONFIG } from '../../../src/types/config.js'
import type { Logger } from '../../../src/utils/logger.js'
import { bohemianQuery, createQueenPayloads, createQueenRecords } from '../../fixtures/records.js'

function createMockLogger() {
  return {
    debug: vi.fn<Parameters<Logger['debug']>, void>(),
    info: vi.fn<Parameters<Logger['info']>, void>(),
    warn: vi.fn<Parameters<Logger['warn']>, void>(),
    error: vi.fn<Parameters<Logger['error']>, void>(),
  }
}

describe('Reconciler', () => {
  it('uses the default configuration', () => {
    expect(new Reconciler().getConfig()).toEqual(DEFAULT_RECONCILER_CONFIG)
  })

  it('rejects an invalid configuration', () => {
    const config = {
      ...DEFAULT_RECONCILER_CONFIG,
      normalizer: { yearRange: { min: 2000, max: 1900 }, splitYouTubeTitles: false },
    }
    expect(() => new Reconciler({ config })).toThrow(ConfigurationError)
  })

  it('keeps its own copy of the configuration', () => {
    const config = {
      merge: { ...DEFAULT_RECONCILER_CONFIG.merge },
      normalizer: { yearRange: { min: 1900, max: 2100 }, splitYouTubeTitles: false },
    }
    const reconciler = new Reconciler({ config })

    config.normalizer.splitYouTubeTitles = true
    config.normalizer.yearRange.min = 1980

    expect(reconciler.getConfig()).toEqual(DEFAULT_RECONCILER_CONFIG)
    const { records } = reconciler.normalize(createQueenPayloads(), bohemianQuery)
    expect(records[0].fields.year).toBe(1975)
    expect(records[2].fields.artist).toBe('Queen Official')
  })

  describe('normalize', () => {
    it('logs each dropped payload', () => {
      const logger = createMockLogger()
      const reconciler = new Reconciler({ logger })

      const { records, rejected } = reconciler.normalize(
        [...createQueenPayloads(), { title: 'untagged' }, { provider: 'Napster' }],
        bohemianQuery
      )

      expect(records).toHaveLength(3)
      expect(rejected).toHaveLength(2)
      expect(logger.warn.mock.calls).toEqual([
        [
          '[reconciler] Dropped payload: Invalid source record: missing provider tag',
          { code: 'INVALID_SOURCE_RECORD', providerTag: undefined },
        ],
        [
          "[reconciler] Dropped payload: Invalid source record from 'Napster': unknown provider",
          { code: 'INVALID_SOURCE_RECORD', providerTag: 'Napster' },
        ],
      ])
      expect(logger.debug).toHaveBeenCalledWith('[reconciler] Normalized payloads', {
        accepted: ['MusicBrainz', 'Discogs', 'YouTube'],
        rejected: 2,
      })
    })

    it('applies the normalizer options', () => {
      const reconciler = new Reconciler({
        config: {
          ...DEFAULT_RECONCILER_CONFIG,
          normalizer: { yearRange: { min: 1900, max: 2100 }, splitYouTubeTitles: true },
        },
      })
      const { records } = reconciler.normalize(createQueenPayloads(), bohemianQuery)

      expect(records[2].fields.artist).toBe('Queen')
      expect(records[2].fields.title).toBe('Bohemian Rhapsody (Official Video)')
    })
  })

  describe('merge', () => {
    it('logs and rethrows when nothing can be merged', () => {
      const logger = createMockLogger()
      const reconciler = new Reconciler({ logger })

      expect(() => reconciler.merge([])).toThrow(NoMetadataAvailableError)
      expect(logger.warn).toHaveBeenCalledWith(
        '[reconciler] No metadata available: no source records were supplied',
        { recordCount: 0 }
      )
    })

    it('logs a debug line for a successful merge', () => {
      const logger = createMockLogger()
      new Reconciler({ logger }).merge(createQueenRecords())

      expect(logger.debug).toHaveBeenCalledWith('[reconciler] Merged records', {
        providers: ['MusicBrainz', 'Discogs', 'YouTube'],
        mergeConfidence: 1,
        emptyFields: 3,
      })
    })
  })

  describe('override', () => {
    it('logs each rejected pin', () => {
      const logger = createMockLogger()
      const reconciler = new Reconciler({ logger })
      const records = createQueenRecords()
      const merged = reconciler.merge(records)

      const { rejected } = reconciler.override(merged, records, { genre: 'Discogs' })

      expect(rejected).toHaveLength(1)
      expect(logger.warn).toHaveBeenCalledWith(
        "[reconciler] Cannot pin 'genre' to Discogs: Discogs has no value for this field",
        { field: 'genre', provider: 'Discogs' }
      )
    })
  })

  describe('reset', () => {
    it('restores automatic selection', () => {
      const reconciler = new Reconciler()
      const records = createQueenRecords()
      const merged = reconciler.merge(records)
      const { metadata } = reconciler.override(merged, records, { artist: 'YouTube' })

      expect(reconciler.reset(metadata, records, ['artist'])).toEqual(merged)
    })
  })

  describe('reconcile', () => {
    it('returns the merge with its records and fingerprint', () => {
      const reconciler = new Reconciler()
      const result = reconciler.reconcile(
        [...createQueenPayloads(), { title: 'untagged' }],
        bohemianQuery
      )

      expect(result.records.map((record) => record.provider)).toEqual([
        'MusicBrainz',
        'Discogs',
        'YouTube',
      ])
      expect(result.rejected.map((error) => error.reason)).toEqual(['missing provider tag'])
      expect(result.metadata.fields.title.value).toBe('Bohemian Rhapsody')
      expect(result.fingerprint).toMatch(/^[0-9a-f-]{36}$/)
    })

    it('throws when every payload is dropped', () => {
      expect(() => new Reconciler().reconcile([{ title: 'untagged' }], bohemianQuery)).toThrow(
        NoMetadataAvailableError
      )
    })
  })
})

import { describe, it, expect } from 'vitest'
import { applyOverrides, resetOverrides } from '../../../src/merge/override-applier.js'
import { mergeRecords } from '../../../src/merge/merge-engine.js'
import {
  MergeValidationError,
  OverrideNotApplicableError,
} from '../../../src/merge/merge-error.js'
import { InvalidParameterError } from '../../../src/utils/errors.js'
import type { FieldPins } from '../../../src/types/merge.js'
import { createQueenRecords, createRecord } from '../../fixtures/records.js'

describe('OverrideApplier', () => {
  const records = createQueenRecords()
  const merged = mergeRecords(records)

  describe('applyOverrides', () => {
    it('replaces only the pinned field', () => {
      const { metadata, rejected } = applyOverrides(merged, records, { year: 'YouTube' })

      expect(rejected).toEqual([])
      expect(metadata.fields.year).toMatchObject({
        value: 2008,
        provider: 'YouTube',
        score: 0.591428571,
        overridden: true,
        corroborated: true,
      })
      expect(metadata.fields.title).toEqual(merged.fields.title)
      expect(metadata.fields.album).toEqual(merged.fields.album)
    })

    it('recomputes the merge confidence and stats', () => {
      const { metadata } = applyOverrides(merged, records, { year: 'YouTube' })

      expect(metadata.mergeConfidence).toBe(0.897857143)
      expect(metadata.stats.overriddenFields).toBe(1)
      expect(metadata.stats.fieldsFromEachProvider).toEqual({
        MusicBrainz: 3,
        Discogs: 0,
        YouTube: 1,
      })
    })

    it('reports a pin whose provider has no value and keeps the prior selection', () => {
      const partial = [
        ...records.slice(0, 2),
        createRecord('YouTube', { title: 'Queen - Bohemian Rhapsody (Official Video)' }, 0.6),
      ]
      const partialMerge = mergeRecords(partial)
      const { metadata, rejected } = applyOverrides(partialMerge, partial, { album: 'YouTube' })

      expect(rejected).toHaveLength(1)
      expect(rejected[0]).toBeInstanceOf(OverrideNotApplicableError)
      expect(rejected[0].message).toBe(
        "Cannot pin 'album' to YouTube: YouTube has no value for this field"
      )
      expect(metadata.fields.album).toEqual(partialMerge.fields.album)
      expect(metadata.fields.album.provider).toBe('MusicBrainz')
    })

    it('applies valid pins alongside rejected ones', () => {
      const { metadata, rejected } = applyOverrides(merged, records, {
        title: 'Discogs',
        genre: 'Spotify',
      })

      expect(metadata.fields.title.provider).toBe('Discogs')
      expect(rejected.map((error) => error.field)).toEqual(['genre'])
    })

    it('is idempotent', () => {
      const pins: FieldPins = { year: 'YouTube', artist: 'YouTube' }
      const once = applyOverrides(merged, records, pins).metadata
      const twice = applyOverrides(once, records, pins).metadata

      expect(twice).toEqual(once)
    })

    it('leaves the input merge untouched', () => {
      const before = JSON.stringify(merged)
      applyOverrides(merged, records, { year: 'YouTube' })
      expect(JSON.stringify(merged)).toBe(before)
    })

    it('shares no objects with the input merge', () => {
      const { metadata } = applyOverrides(merged, records, { year: 'YouTube', genre: 'Discogs' })

      expect(metadata.fields.title).toEqual(merged.fields.title)
      expect(metadata.fields.title).not.toBe(merged.fields.title)
      expect(metadata.fields.genre).not.toBe(merged.fields.genre)

      metadata.fields.title.candidates[0].agreesWith.push('Genius')
      metadata.fields.artist.candidates.pop()

      expect(merged.fields.title.candidates[0].agreesWith).toEqual(['Discogs'])
      expect(merged.fields.artist.candidates).toHaveLength(3)
    })

    it('rejects records that do not match the merge', () => {
      expect(() => applyOverrides(merged, records.slice(0, 2), { year: 'Discogs' })).toThrow(
        MergeValidationError
      )
    })

    it('rejects unknown fields and providers', () => {
      const badField: FieldPins = JSON.parse('{"label":"Discogs"}')
      const badProvider: FieldPins = JSON.parse('{"year":"Napster"}')

      expect(() => applyOverrides(merged, records, badField)).toThrow(InvalidParameterError)
      expect(() => applyOverrides(merged, records, badProvider)).toThrow(
        "Invalid parameter 'pins': 'Napster' is not a known provider"
      )
    })
  })

  describe('resetOverrides', () => {
    it('restores the automatic selection for the named fields only', () => {
      const { metadata } = applyOverrides(merged, records, { year: 'YouTube', title: 'Discogs' })
      const reset = resetOverrides(metadata, records, ['year'])

      expect(reset.fields.year).toEqual(merged.fields.year)
      expect(reset.fields.title.provider).toBe('Discogs')
      expect(reset.fields.title.overridden).toBe(true)
    })

    it('copies the fields it does not reset', () => {
      const { metadata } = applyOverrides(merged, records, { title: 'Discogs' })
      const reset = resetOverrides(metadata, records, ['year'])

      expect(reset.fields.title).toEqual(metadata.fields.title)
      expect(reset.fields.title).not.toBe(metadata.fields.title)
      expect(reset.fields.title.candidates).not.toBe(metadata.fields.title.candidates)
    })

    it('gives back the automatic merge when every pin is reset', () => {
      const { metadata } = applyOverrides(merged, records, { year: 'YouTube', title: 'Discogs' })
      expect(resetOverrides(metadata, records, ['year', 'title'])).toEqual(merged)
    })
  })
})

import { describe, it, expect } from 'vitest'
import {
  CONFIDENCE_RULES,
  MUSICBRAINZ_UNSCORED_CONFIDENCE,
  YOUTUBE_CONFIDENCE_CAP,
  computeConfidence,
  matchesQuery,
  clampUnit,
} from '../../../src/sources/confidence-rules.js'
import type { ProviderPayload } from '../../../src/types/record.js'
import type { TrackFields } from '../../../src/types/track.js'
import { createTrackFields } from '../../../src/types/track.js'
import { bohemianQuery } from '../../fixtures/records.js'

const matching = createTrackFields({ title: 'Bohemian Rhapsody', artist: 'Queen' })
const mismatched = createTrackFields({ title: 'Bohemian Rhapsody (Live)', artist: 'Queen' })

function input(payload: ProviderPayload, fields: TrackFields = matching) {
  return { payload, fields, query: bohemianQuery }
}

describe('Confidence Rules', () => {
  describe('matchesQuery', () => {
    it('compares title and artist after folding', () => {
      expect(matchesQuery(createTrackFields({ title: 'BOHEMIAN  rhapsody', artist: 'queen' }), bohemianQuery)).toBe(true)
      expect(matchesQuery(mismatched, bohemianQuery)).toBe(false)
    })

    it('requires both fields', () => {
      expect(matchesQuery(createTrackFields({ title: 'Bohemian Rhapsody' }), bohemianQuery)).toBe(false)
    })
  })

  describe('MusicBrainz', () => {
    it('scales the search score', () => {
      expect(CONFIDENCE_RULES.MusicBrainz(input({ score: 87 }))).toBe(0.87)
      expect(CONFIDENCE_RULES.MusicBrainz(input({ score: 100 }))).toBe(1)
    })

    it('clamps out-of-range scores', () => {
      expect(CONFIDENCE_RULES.MusicBrainz(input({ score: 140 }))).toBe(1)
      expect(CONFIDENCE_RULES.MusicBrainz(input({ score: -3 }))).toBe(0)
    })

    it('falls back when no score is given', () => {
      expect(CONFIDENCE_RULES.MusicBrainz(input({}))).toBe(MUSICBRAINZ_UNSCORED_CONFIDENCE)
      expect(CONFIDENCE_RULES.MusicBrainz(input({ score: null }))).toBe(0.9)
    })
  })

  describe('Discogs and Spotify', () => {
    it('rate exact matches higher', () => {
      expect(CONFIDENCE_RULES.Discogs(input({}))).toBe(0.9)
      expect(CONFIDENCE_RULES.Discogs(input({}, mismatched))).toBe(0.7)
      expect(CONFIDENCE_RULES.Spotify(input({}))).toBe(0.85)
      expect(CONFIDENCE_RULES.Spotify(input({}, mismatched))).toBe(0.65)
    })
  })

  describe('LastFm and Genius', () => {
    it('use fixed confidences', () => {
      expect(CONFIDENCE_RULES.LastFm(input({}, mismatched))).toBe(0.75)
      expect(CONFIDENCE_RULES.Genius(input({}, mismatched))).toBe(0.7)
    })
  })

  describe('YouTube', () => {
    it('uses token overlap with the video title', () => {
      expect(CONFIDENCE_RULES.YouTube(input({ title: 'Bohemian Rhapsody Cover' }))).toBe(0.5)
    })

    it(`never exceeds ${YOUTUBE_CONFIDENCE_CAP}`, () => {
      expect(CONFIDENCE_RULES.YouTube(input({ title: 'Queen Bohemian Rhapsody' }))).toBe(0.6)
    })

    it('is 0 without a video title', () => {
      expect(CONFIDENCE_RULES.YouTube(input({}))).toBe(0)
    })
  })

  describe('computeConfidence', () => {
    it('applies the provider rule', () => {
      expect(computeConfidence('Genius', input({}))).toBe(0.7)
    })
  })

  describe('clampUnit', () => {
    it('clamps to [0, 1] and maps NaN to 0', () => {
      expect(clampUnit(1.2)).toBe(1)
      expect(clampUnit(-0.1)).toBe(0)
      expect(clampUnit(0.42)).toBe(0.42)
      expect(clampUnit(Number.NaN)).toBe(0)
    })
  })
})

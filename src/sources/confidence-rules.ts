/**
 * Provider-specific confidence rules.
 *
 * Each provider maps to a rule computing how likely its result is the song
 * the user asked for. Rules are plain data so they can be inspected and
 * tested one by one.
 *
 * @module sources/confidence-rules
 */

import type { Provider } from '../types/provider.js'
import type { ProviderPayload, TrackQuery } from '../types/record.js'
import type { TrackFields } from '../types/track.js'
import { foldedEquals, tokenOverlap } from '../core/comparators.js'
import { cleanText } from '../core/normalizers/values.js'

/**
 * Inputs available to a confidence rule
 */
export interface ConfidenceInput {
  payload: ProviderPayload
  fields: TrackFields
  query: TrackQuery
}

export type ConfidenceRule = (input: ConfidenceInput) => number

/** MusicBrainz confidence when the payload carries no search score */
export const MUSICBRAINZ_UNSCORED_CONFIDENCE = 0.9

/** YouTube video titles are unstructured; never rank them above this */
export const YOUTUBE_CONFIDENCE_CAP = 0.6

/**
 * True when the record's title and artist fold to the query's
 */
export function matchesQuery(fields: TrackFields, query: TrackQuery): boolean {
  return (
    foldedEquals(fields.title, query.title) &&
    foldedEquals(fields.artist, query.artist)
  )
}

function exactMatchRule(matched: number, unmatched: number): ConfidenceRule {
  return ({ fields, query }) => (matchesQuery(fields, query) ? matched : unmatched)
}

function fixedRule(confidence: number): ConfidenceRule {
  return () => confidence
}

/**
 * Confidence rule for every provider
 */
export const CONFIDENCE_RULES: Readonly<Record<Provider, ConfidenceRule>> = {
  MusicBrainz: ({ payload }) => {
    const score = payload.score
    if (typeof score !== 'number' || !Number.isFinite(score)) {
      return MUSICBRAINZ_UNSCORED_CONFIDENCE
    }
    return clampUnit(score / 100)
  },
  Discogs: exactMatchRule(0.9, 0.7),
  Spotify: exactMatchRule(0.85, 0.65),
  LastFm: fixedRule(0.75),
  Genius: fixedRule(0.7),
  YouTube: ({ payload, query }) => {
    const similarity = tokenOverlap(
      `${query.artist} ${query.title}`,
      cleanText(payload.title)
    )
    return Math.min(similarity, YOUTUBE_CONFIDENCE_CAP)
  },
}

/**
 * Computes a record's confidence with its provider's rule, clamped to [0, 1]
 */
export function computeConfidence(provider: Provider, input: ConfidenceInput): number {
  return clampUnit(CONFIDENCE_RULES[provider](input))
}

/**
 * Clamps a number to [0, 1]; NaN becomes 0
 */
export function clampUnit(value: number): number {
  if (Number.isNaN(value)) return 0
  return Math.min(1, Math.max(0, value))
}

/**
 * Turns raw provider payloads into scored, immutable source records
 * @module sources/normalizer
 */

import type { Provider } from '../types/provider.js'
import { resolveProvider } from '../types/provider.js'
import type { ProviderPayload, SourceRecord, TrackQuery } from '../types/record.js'
import type { TrackFields } from '../types/track.js'
import { UNIVERSAL_FIELDS, createTrackFields, hasValue } from '../types/track.js'
import type { NormalizerOptions } from '../types/config.js'
import { DEFAULT_NORMALIZER_OPTIONS } from '../types/config.js'
import {
  cleanDuration,
  cleanGenre,
  cleanText,
  cleanUrl,
  extractYear,
} from '../core/normalizers/values.js'
import { InvalidParameterError, requireInRange } from '../utils/errors.js'
import { computeConfidence } from './confidence-rules.js'
import { InvalidSourceRecordError } from './source-error.js'

/**
 * Outcome of normalizing a batch of payloads
 */
export interface NormalizeResult {
  /** One record per accepted payload, in input order */
  records: SourceRecord[]
  /** Payloads that were dropped, with the reason */
  rejected: InvalidSourceRecordError[]
}

/**
 * Share of the universal fields holding a value.
 * The denominator is always the full field set, so providers that support
 * fewer fields are comparable with those that support more.
 */
export function computeCompleteness(fields: Partial<TrackFields>): number {
  const filled = UNIVERSAL_FIELDS.filter((field) => hasValue(fields[field])).length
  return filled / UNIVERSAL_FIELDS.length
}

/**
 * Creates a frozen source record. Completeness is derived from the fields.
 *
 * @throws {InvalidParameterError} If confidence is outside [0, 1]
 *
 * @example
 * ```typescript
 * const record = createSourceRecord('Discogs', { title: 'Bohemian Rhapsody', artist: 'Queen' }, 0.9)
 * record.completeness // 2 / 7
 * ```
 */
export function createSourceRecord(
  provider: Provider,
  fields: Partial<TrackFields>,
  confidence: number
): SourceRecord {
  requireInRange(confidence, 0, 1, 'confidence')
  const trackFields = createTrackFields(fields)
  return Object.freeze({
    provider,
    fields: Object.freeze(trackFields),
    confidence,
    completeness: computeCompleteness(trackFields),
  })
}

function isPayloadObject(value: unknown): value is ProviderPayload {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function requireQuery(query: TrackQuery): TrackQuery {
  if (typeof query?.title !== 'string' || typeof query?.artist !== 'string') {
    throw new InvalidParameterError('query', query, 'must have a title and an artist')
  }
  return query
}

/**
 * Splits "Artist - Title" at the first separator
 */
function splitVideoTitle(videoTitle: string): { artist: string; title: string } | null {
  const separator = videoTitle.indexOf(' - ')
  if (separator <= 0) return null
  const artist = cleanText(videoTitle.slice(0, separator))
  const title = cleanText(videoTitle.slice(separator + 3))
  return artist && title ? { artist, title } : null
}

/**
 * Reads the universal fields out of a payload
 */
export function extractFields(
  provider: Provider,
  payload: ProviderPayload,
  options: NormalizerOptions = DEFAULT_NORMALIZER_OPTIONS
): TrackFields {
  let title = cleanText(payload.title)
  let artist = cleanText(payload.artist)

  if (provider === 'YouTube') {
    artist = artist ?? cleanText(payload.channel)
    if (options.splitYouTubeTitles && title) {
      const parts = splitVideoTitle(title)
      if (parts) {
        artist = parts.artist
        title = parts.title
      }
    }
  }

  const rawYear = payload.year ?? payload.releaseDate

  return createTrackFields({
    title,
    artist,
    album: cleanText(payload.album),
    year: extractYear(rawYear, options.yearRange),
    genre: cleanGenre(payload.genre ?? payload.tags),
    duration: cleanDuration(payload.duration, payload.durationMs),
    coverArtUrl: cleanUrl(payload.coverArtUrl),
  })
}

/**
 * Normalizes one provider payload into a source record.
 *
 * @param payload - Raw provider result; must carry a provider tag
 * @param query - The search the payload answers
 * @param options - Field cleaning options
 * @throws {InvalidSourceRecordError} If the payload is not an object or its
 *   provider tag is missing or unknown
 *
 * @example
 * ```typescript
 * const record = normalizeSource(
 *   { provider: 'MusicBrainz', score: 100, title: 'Bohemian Rhapsody', artist: 'Queen' },
 *   { title: 'Bohemian Rhapsody', artist: 'Queen' }
 * )
 * record.confidence // 1
 * ```
 */
export function normalizeSource(
  payload: unknown,
  query: TrackQuery,
  options: NormalizerOptions = DEFAULT_NORMALIZER_OPTIONS
): SourceRecord {
  requireQuery(query)

  if (!isPayloadObject(payload)) {
    throw new InvalidSourceRecordError('payload is not an object')
  }

  const tag = payload.provider
  if (typeof tag !== 'string' || tag.trim() === '') {
    throw new InvalidSourceRecordError('missing provider tag')
  }

  const provider = resolveProvider(tag)
  if (!provider) {
    throw new InvalidSourceRecordError('unknown provider', tag)
  }

  const fields = extractFields(provider, payload, options)
  const confidence = computeConfidence(provider, { payload, fields, query })
  return createSourceRecord(provider, fields, confidence)
}

/**
 * Normalizes every payload, dropping the invalid ones.
 *
 * A dropped payload does not stop the batch: it is reported in `rejected`
 * and the remaining payloads are still normalized. A second payload for a
 * provider already seen is dropped as well.
 *
 * @example
 * ```typescript
 * const { records, rejected } = normalizeSources(
 *   [{ provider: 'Genius', title: 'Bohemian Rhapsody' }, { title: 'untagged' }],
 *   { title: 'Bohemian Rhapsody', artist: 'Queen' }
 * )
 * records.length // 1
 * rejected[0].reason // 'missing provider tag'
 * ```
 */
export function normalizeSources(
  payloads: readonly unknown[],
  query: TrackQuery,
  options: NormalizerOptions = DEFAULT_NORMALIZER_OPTIONS
): NormalizeResult {
  const records: SourceRecord[] = []
  const rejected: InvalidSourceRecordError[] = []
  const seen = new Set<Provider>()

  for (const [index, payload] of payloads.entries()) {
    let record: SourceRecord
    try {
      record = normalizeSource(payload, query, options)
    } catch (error) {
      if (error instanceof InvalidSourceRecordError) {
        rejected.push(error)
        continue
      }
      throw error
    }

    if (seen.has(record.provider)) {
      rejected.push(
        new InvalidSourceRecordError('duplicate payload for provider', record.provider, {
          index,
        })
      )
      continue
    }

    seen.add(record.provider)
    records.push(record)
  }

  return { records, rejected }
}

/**
 * Read-only views of a merge for tagging and display layers
 * @module merge/summary
 */

import type { FieldName, TrackFieldTypes, TrackFields } from '../types/track.js'
import { UNIVERSAL_FIELDS, hasValue } from '../types/track.js'
import type { Provider } from '../types/provider.js'
import type { FieldDecision, MergedMetadata, TrackMetadata } from '../types/merge.js'
import type { SourceRecord } from '../types/record.js'
import type { ScoringWeights } from '../types/config.js'
import { DEFAULT_SCORING_WEIGHTS } from '../types/config.js'
import { rankRecords } from '../scoring/scorer.js'

/**
 * Selected values only, for writing tags
 *
 * @example
 * ```typescript
 * toTrackMetadata(merged)
 * // { title: 'Bohemian Rhapsody', artist: 'Queen', album: 'A Night at the Opera', year: 1975, ... }
 * ```
 */
export function toTrackMetadata(merged: MergedMetadata): TrackMetadata {
  const { fields } = merged
  return {
    title: fields.title.value,
    artist: fields.artist.value,
    album: fields.album.value,
    year: fields.year.value,
    genre: fields.genre.value,
    duration: fields.duration.value,
    coverArtUrl: fields.coverArtUrl.value,
  }
}

/**
 * One line of a field-by-field display
 */
export interface FieldSummary {
  field: FieldName
  value: TrackFieldTypes[FieldName] | null
  provider: Provider | null
  score: number | null
  corroborated: boolean
  overridden: boolean
  /** Candidates other than the selected one */
  alternates: Array<{ provider: Provider; value: TrackFieldTypes[FieldName]; score: number }>
}

/**
 * Field-by-field summary in universal field order, listing the alternates
 * a user could pin instead
 */
export function summarizeMerge(merged: MergedMetadata): FieldSummary[] {
  return UNIVERSAL_FIELDS.map((field) => {
    const decision: FieldDecision = merged.fields[field]
    return {
      field,
      value: decision.value,
      provider: decision.provider,
      score: decision.score,
      corroborated: decision.corroborated,
      overridden: decision.overridden,
      alternates: decision.candidates
        .filter((candidate) => candidate.provider !== decision.provider)
        .map(({ provider, value, score }) => ({ provider, value, score })),
    }
  })
}

/**
 * Plain-text rendering of {@link summarizeMerge}, one line per field
 *
 * @example
 * ```typescript
 * formatSummary(merged)
 * // title: Bohemian Rhapsody [MusicBrainz 0.95, corroborated] (+2 alternates)
 * // year: - [no candidates]
 * ```
 */
export function formatSummary(merged: MergedMetadata): string {
  return summarizeMerge(merged)
    .map((line) => {
      if (line.provider === null) {
        return `${line.field}: - [no candidates]`
      }
      const flags = [
        `${line.provider} ${(line.score ?? 0).toFixed(2)}`,
        ...(line.corroborated ? ['corroborated'] : []),
        ...(line.overridden ? ['pinned'] : []),
      ]
      const alternates =
        line.alternates.length > 0
          ? ` (+${line.alternates.length} alternate${line.alternates.length === 1 ? '' : 's'})`
          : ''
      return `${line.field}: ${String(line.value)} [${flags.join(', ')}]${alternates}`
    })
    .join('\n')
}

/**
 * One provider's record as shown before the user picks sources
 */
export interface SourceSummary {
  /** Position by overall score, starting at 1 */
  rank: number
  provider: Provider
  confidence: number
  completeness: number
  score: number
  /** Fields this provider has a value for, in universal field order */
  filledFields: FieldName[]
  fields: TrackFields
}

/**
 * Per-provider summary of the records, best scored first
 */
export function summarizeSources(
  records: readonly SourceRecord[],
  weights: ScoringWeights = DEFAULT_SCORING_WEIGHTS
): SourceSummary[] {
  return rankRecords(records, weights).map(({ record, score }, index) => ({
    rank: index + 1,
    provider: record.provider,
    confidence: record.confidence,
    completeness: record.completeness,
    score,
    filledFields: UNIVERSAL_FIELDS.filter((field) => hasValue(record.fields[field])),
    fields: { ...record.fields },
  }))
}

/**
 * Plain-text rendering of {@link summarizeSources}, one line per provider
 *
 * @example
 * ```typescript
 * formatSources(records)
 * // 1. MusicBrainz [confidence 1.00, completeness 0.71, score 0.91] title, artist, album, year, duration
 * // 2. YouTube [confidence 0.60, completeness 0.43, score 0.55] title, artist, duration
 * ```
 */
export function formatSources(
  records: readonly SourceRecord[],
  weights: ScoringWeights = DEFAULT_SCORING_WEIGHTS
): string {
  const sources = summarizeSources(records, weights)
  if (sources.length === 0) return 'No sources'

  return sources
    .map((source) => {
      const scores = [
        `confidence ${source.confidence.toFixed(2)}`,
        `completeness ${source.completeness.toFixed(2)}`,
        `score ${source.score.toFixed(2)}`,
      ].join(', ')
      const filled = source.filledFields.length > 0 ? source.filledFields.join(', ') : 'no values'
      return `${source.rank}. ${source.provider} [${scores}] ${filled}`
    })
    .join('\n')
}

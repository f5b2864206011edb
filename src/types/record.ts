/**
 * Provider payloads and the normalized records built from them
 * @module types/record
 */

import type { Provider } from './provider.js'
import type { TrackFields } from './track.js'

/**
 * What the user searched for. Confidence rules compare provider results
 * against it.
 */
export interface TrackQuery {
  title: string
  artist: string
  album?: string
}

/**
 * A raw provider result as handed over by a provider client.
 *
 * Clients fill in whatever their API returned; the normalizer cleans the
 * values and ignores anything it does not recognise. Only `provider` is
 * required, and a payload without it is rejected.
 */
export interface ProviderPayload {
  /** Provider tag, e.g. 'MusicBrainz' or 'Last.fm' */
  provider?: string | null

  title?: string | null
  artist?: string | null
  album?: string | null

  /** Release year, or a date string starting with the year */
  year?: number | string | null
  releaseDate?: string | null

  /** A single genre, or provider tags (first three are kept) */
  genre?: string | string[] | null
  tags?: string[] | null

  /** Track length in seconds */
  duration?: number | null
  /** Track length in milliseconds (MusicBrainz, Spotify) */
  durationMs?: number | null

  coverArtUrl?: string | null

  /** MusicBrainz search score in [0, 100] */
  score?: number | null

  /** YouTube channel name, used as the artist when `artist` is absent */
  channel?: string | null
}

/**
 * One provider's normalized description of a candidate song.
 * Frozen on creation; never mutated.
 */
export interface SourceRecord {
  readonly provider: Provider
  readonly fields: TrackFields
  /** Provider-specific likelihood that this record matches the query, in [0, 1] */
  readonly confidence: number
  /** Filled universal fields divided by 7, in [0, 1] */
  readonly completeness: number
}

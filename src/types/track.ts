/**
 * The universal field set every provider is evaluated against
 * @module types/track
 */

/**
 * Value types of the universal fields.
 * `year` is a calendar year, `duration` a whole number of seconds.
 */
export interface TrackFieldTypes {
  title: string
  artist: string
  album: string
  year: number
  genre: string
  duration: number
  coverArtUrl: string
}

export type FieldName = keyof TrackFieldTypes

/**
 * Universal fields in their fixed order.
 * Completeness is always measured against all of them.
 */
export const UNIVERSAL_FIELDS: readonly FieldName[] = [
  'title',
  'artist',
  'album',
  'year',
  'genre',
  'duration',
  'coverArtUrl',
]

/**
 * Fields compared as folded text during corroboration
 */
export const TEXT_FIELDS: readonly FieldName[] = [
  'title',
  'artist',
  'album',
  'genre',
  'coverArtUrl',
]

/**
 * A value, or null, for every universal field
 */
export type TrackFields = {
  [K in FieldName]: TrackFieldTypes[K] | null
}

export type FieldValue = TrackFields[FieldName]

const FIELD_NAMES = new Set<string>(UNIVERSAL_FIELDS)

export function isFieldName(value: unknown): value is FieldName {
  return typeof value === 'string' && FIELD_NAMES.has(value)
}

/**
 * True when a field holds a value. Null, undefined and blank strings are
 * all empty, wherever a field is read.
 */
export function hasValue<T>(value: T | null | undefined): value is T {
  if (value === undefined || value === null) return false
  return typeof value !== 'string' || value.trim() !== ''
}

function present<T>(value: T | null | undefined): T | null {
  return hasValue(value) ? value : null
}

/**
 * Builds a {@link TrackFields} with every field null, then applies `values`.
 * Blank strings are stored as null.
 */
export function createTrackFields(
  values: Partial<TrackFields> = {}
): TrackFields {
  return {
    title: present(values.title),
    artist: present(values.artist),
    album: present(values.album),
    year: present(values.year),
    genre: present(values.genre),
    duration: present(values.duration),
    coverArtUrl: present(values.coverArtUrl),
  }
}

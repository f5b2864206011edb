/**
 * Cleaning of raw provider values into universal field values.
 * Each function returns null when the input holds nothing usable.
 * @module core/normalizers/values
 */

import { normalizeWhitespace } from './text.js'

/**
 * Trims and collapses whitespace; empty strings become null.
 *
 * @example
 * ```typescript
 * cleanText('  Bohemian   Rhapsody ') // 'Bohemian Rhapsody'
 * cleanText('   ') // null
 * ```
 */
export function cleanText(value: unknown): string | null {
  if (typeof value !== 'string') return null
  const cleaned = normalizeWhitespace(value)
  return cleaned ? cleaned : null
}

/**
 * Reads a year from a number or a date string beginning with the year.
 *
 * @param value - A year (1975) or date ('1975-10-31', '1975/10', '1975')
 * @param range - Inclusive range of plausible years
 * @returns The year, or null when absent, unparseable or out of range
 *
 * @example
 * ```typescript
 * extractYear('1975-10-31', { min: 1900, max: 2100 }) // 1975
 * extractYear(1875, { min: 1900, max: 2100 }) // null
 * extractYear('unknown', { min: 1900, max: 2100 }) // null
 * ```
 */
export function extractYear(
  value: unknown,
  range: { min: number; max: number }
): number | null {
  let year: number | null = null

  if (typeof value === 'number' && Number.isInteger(value)) {
    year = value
  } else if (typeof value === 'string') {
    const match = /^\s*(\d{4})(?:$|[-/.\s])/.exec(value)
    if (match) {
      year = Number(match[1])
    }
  }

  if (year === null || year < range.min || year > range.max) {
    return null
  }
  return year
}

/**
 * Picks a duration in whole seconds from either a seconds or a
 * milliseconds value. Seconds win when both are present.
 *
 * @example
 * ```typescript
 * cleanDuration(354, undefined) // 354
 * cleanDuration(undefined, 354_320) // 354
 * cleanDuration(0, undefined) // null
 * ```
 */
export function cleanDuration(seconds: unknown, milliseconds: unknown): number | null {
  if (typeof seconds === 'number' && Number.isFinite(seconds)) {
    const rounded = Math.round(seconds)
    return rounded > 0 ? rounded : null
  }
  if (typeof milliseconds === 'number' && Number.isFinite(milliseconds)) {
    const rounded = Math.round(milliseconds / 1000)
    return rounded > 0 ? rounded : null
  }
  return null
}

/**
 * Maximum number of tags kept when a genre is given as a tag list
 */
export const MAX_GENRE_TAGS = 3

/**
 * Reads a genre from a single string or a list of tags. A list keeps its
 * first three non-empty tags joined by ", ".
 *
 * @example
 * ```typescript
 * cleanGenre(' Rock ') // 'Rock'
 * cleanGenre(['rock', 'classic rock', '', 'queen', '70s']) // 'rock, classic rock, queen'
 * cleanGenre([]) // null
 * ```
 */
export function cleanGenre(value: unknown): string | null {
  if (Array.isArray(value)) {
    const tags = value
      .map((tag) => cleanText(tag))
      .filter((tag): tag is string => tag !== null)
      .slice(0, MAX_GENRE_TAGS)
    return tags.length > 0 ? tags.join(', ') : null
  }
  return cleanText(value)
}

/**
 * Accepts only absolute http(s) URLs.
 *
 * @example
 * ```typescript
 * cleanUrl(' https://img.example.com/cover.jpg ') // 'https://img.example.com/cover.jpg'
 * cleanUrl('ftp://example.com/cover.jpg') // null
 * cleanUrl('not a url') // null
 * ```
 */
export function cleanUrl(value: unknown): string | null {
  const text = cleanText(value)
  if (text === null) return null
  try {
    const url = new URL(text)
    return url.protocol === 'http:' || url.protocol === 'https:' ? text : null
  } catch {
    return null
  }
}

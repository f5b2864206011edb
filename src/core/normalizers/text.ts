/**
 * Text normalizers used for matching and corroboration.
 * All of them return null for null/undefined input.
 * @module core/normalizers/text
 */

/**
 * Collapses runs of whitespace into a single space and trims the ends.
 *
 * @example
 * ```typescript
 * normalizeWhitespace('  A Night   at\nthe Opera ') // 'A Night at the Opera'
 * ```
 */
export function normalizeWhitespace(
  value: string | null | undefined
): string | null {
  if (value == null) return null
  return value.trim().replace(/\s+/g, ' ')
}

/**
 * Decomposes the string (NFKD) and drops combining marks.
 *
 * @example
 * ```typescript
 * stripDiacritics('Beyoncé') // 'Beyonce'
 * stripDiacritics('Motörhead') // 'Motorhead'
 * ```
 */
export function stripDiacritics(value: string | null | undefined): string | null {
  if (value == null) return null
  return value.normalize('NFKD').replace(/\p{M}/gu, '')
}

const APOSTROPHES = /[‘’‚‛′‵ʻʼʽʾʿˊˋ`]/g
const DOUBLE_QUOTES = /[“”„‟″]/g
const DASHES = /[‐‑‒–—―−]/g

/**
 * Maps apostrophe, quote and dash variants onto their ASCII forms and reads
 * `&` as `and`.
 *
 * @example
 * ```typescript
 * unifyPunctuation('Don’t Stop') // "Don't Stop"
 * unifyPunctuation('Simon & Garfunkel') // 'Simon  and  Garfunkel'
 * ```
 */
export function unifyPunctuation(value: string | null | undefined): string | null {
  if (value == null) return null
  return value
    .replace(APOSTROPHES, "'")
    .replace(DOUBLE_QUOTES, '"')
    .replace(DASHES, '-')
    .replace(/&/g, ' and ')
}

/**
 * Folds text for comparison: diacritics stripped, punctuation variants
 * unified, lower case, whitespace collapsed.
 *
 * @example
 * ```typescript
 * foldText('  Beyoncé &  JAY-Z ') // 'beyonce and jay-z'
 * foldText('Don’t Stop Me Now') // "don't stop me now"
 * ```
 */
export function foldText(value: string | null | undefined): string | null {
  if (value == null) return null
  const unified = unifyPunctuation(stripDiacritics(value)) ?? ''
  return (normalizeWhitespace(unified) ?? '').toLowerCase()
}

/**
 * Splits folded text into word tokens (letters and digits only).
 *
 * @example
 * ```typescript
 * tokenize('Queen - Bohemian Rhapsody (Official Video)')
 * // ['queen', 'bohemian', 'rhapsody', 'official', 'video']
 * ```
 */
export function tokenize(value: string | null | undefined): string[] {
  const folded = foldText(value)
  if (!folded) return []
  return folded.split(/[^\p{L}\p{N}]+/u).filter((token) => token.length > 0)
}

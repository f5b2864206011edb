/**
 * Value comparisons used by confidence rules and corroboration
 * @module core/comparators
 */

import { foldText, tokenize } from './normalizers/text.js'

/**
 * Token overlap (Jaccard index) between two strings after folding.
 * Returns a similarity score between 0 (no shared words) and 1 (same words).
 *
 * @example
 * ```typescript
 * tokenOverlap('Queen Bohemian Rhapsody', 'Queen - Bohemian Rhapsody (Official Video)') // 0.6
 * tokenOverlap('Queen', 'Queen') // 1
 * tokenOverlap('', 'Queen') // 0
 * ```
 */
export function tokenOverlap(a: string | null | undefined, b: string | null | undefined): number {
  const left = new Set(tokenize(a))
  const right = new Set(tokenize(b))
  if (left.size === 0 || right.size === 0) return 0

  let shared = 0
  for (const token of left) {
    if (right.has(token)) shared++
  }
  const union = left.size + right.size - shared
  return shared / union
}

/**
 * True when both strings fold to the same non-empty text.
 *
 * @example
 * ```typescript
 * foldedEquals('Motörhead', 'MOTORHEAD') // true
 * foldedEquals('Queen', 'Queen Official') // false
 * ```
 */
export function foldedEquals(
  a: string | null | undefined,
  b: string | null | undefined
): boolean {
  const left = foldText(a)
  const right = foldText(b)
  if (!left || !right) return false
  return left === right
}

/**
 * True when two numbers differ by at most `tolerance`
 */
export function numbersWithin(a: number, b: number, tolerance: number): boolean {
  return Math.abs(a - b) <= tolerance
}

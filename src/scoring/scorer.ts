/**
 * Overall record scores
 * @module scoring/scorer
 */

import type { SourceRecord } from '../types/record.js'
import type { ScoringWeights } from '../types/config.js'
import { DEFAULT_SCORING_WEIGHTS } from '../types/config.js'
import { compareProviders } from '../types/provider.js'

/**
 * Decimal places kept in every score, so that scores that are equal on
 * paper also compare equal in floating point
 */
export const SCORE_DECIMALS = 9

const SCORE_FACTOR = 10 ** SCORE_DECIMALS

/**
 * Rounds a score to {@link SCORE_DECIMALS} places
 */
export function roundScore(value: number): number {
  return Math.round(value * SCORE_FACTOR) / SCORE_FACTOR
}

/**
 * Combines a record's confidence and completeness into one ranking value.
 *
 * Confidence carries most of the weight: a complete but wrong match is worse
 * than a sparse correct one.
 *
 * @example
 * ```typescript
 * overallScore({ provider: 'LastFm', confidence: 0.75, completeness: 3 / 7, fields })
 * // 0.7 * 0.75 + 0.3 * 3/7 = 0.653571429
 * ```
 */
export function overallScore(
  record: Pick<SourceRecord, 'confidence' | 'completeness'>,
  weights: ScoringWeights = DEFAULT_SCORING_WEIGHTS
): number {
  const score =
    weights.confidence * record.confidence +
    weights.completeness * record.completeness
  return roundScore(Math.min(1, Math.max(0, score)))
}

/**
 * A record paired with its overall score
 */
export interface RankedRecord {
  record: SourceRecord
  score: number
}

/**
 * Sorts records by overall score, best first; equal scores fall back to
 * provider priority.
 */
export function rankRecords(
  records: readonly SourceRecord[],
  weights: ScoringWeights = DEFAULT_SCORING_WEIGHTS
): RankedRecord[] {
  return records
    .map((record) => ({ record, score: overallScore(record, weights) }))
    .sort(
      (a, b) =>
        b.score - a.score || compareProviders(a.record.provider, b.record.provider)
    )
}

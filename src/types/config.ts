/**
 * Reconciler configuration
 * @module types/config
 */

/**
 * Weights combining confidence and completeness into an overall score.
 * Must be non-negative and sum to 1 so scores stay within [0, 1].
 */
export interface ScoringWeights {
  confidence: number
  completeness: number
}

/**
 * How close two values must be to count as agreement
 */
export interface CorroborationOptions {
  /** Maximum difference in years (default: 1, covers reissue dates) */
  yearTolerance: number
  /** Maximum difference in seconds (default: 0, exact) */
  durationTolerance: number
}

/**
 * Scoring and corroboration settings used by the merge engine
 */
export interface MergeConfig {
  weights: ScoringWeights
  /** Added to every agreeing candidate's score, capped at 1 (default: 0.1) */
  corroborationBonus: number
  corroboration: CorroborationOptions
}

/**
 * Settings used when turning payloads into source records
 */
export interface NormalizerOptions {
  /** Years outside this range are discarded */
  yearRange: { min: number; max: number }
  /** Split YouTube video titles of the form "Artist - Title" */
  splitYouTubeTitles: boolean
}

export interface ReconcilerConfig {
  merge: MergeConfig
  normalizer: NormalizerOptions
}

export const DEFAULT_SCORING_WEIGHTS: ScoringWeights = {
  confidence: 0.7,
  completeness: 0.3,
}

export const DEFAULT_MERGE_CONFIG: MergeConfig = {
  weights: DEFAULT_SCORING_WEIGHTS,
  corroborationBonus: 0.1,
  corroboration: {
    yearTolerance: 1,
    durationTolerance: 0,
  },
}

export const DEFAULT_NORMALIZER_OPTIONS: NormalizerOptions = {
  yearRange: { min: 1900, max: 2100 },
  splitYouTubeTitles: false,
}

export const DEFAULT_RECONCILER_CONFIG: ReconcilerConfig = {
  merge: DEFAULT_MERGE_CONFIG,
  normalizer: DEFAULT_NORMALIZER_OPTIONS,
}

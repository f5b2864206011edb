import type { MergeConfig, NormalizerOptions, ReconcilerConfig } from '../types/config.js'
import { DEFAULT_MERGE_CONFIG, DEFAULT_NORMALIZER_OPTIONS } from '../types/config.js'
import type { Logger } from '../utils/logger.js'
import { Reconciler, copyReconcilerConfig } from '../core/reconciler.js'
import { validateReconcilerConfig } from '../merge/validation.js'

/**
 * Fluent builder for configuring and creating a Reconciler instance.
 *
 * Every setting starts from its default, so `TrackReconciler.create().build()`
 * gives the standard 0.7/0.3 weighting with a 0.1 corroboration bonus.
 *
 * @example
 * ```typescript
 * const reconciler = TrackReconciler.create()
 *   .weights(0.6, 0.4)
 *   .corroborationBonus(0.15)
 *   .yearTolerance(0)
 *   .splitYouTubeTitles()
 *   .logger(defaultLogger)
 *   .build()
 * ```
 */
export class ReconcilerBuilder {
  private mergeConfiguration: MergeConfig = {
    weights: { ...DEFAULT_MERGE_CONFIG.weights },
    corroborationBonus: DEFAULT_MERGE_CONFIG.corroborationBonus,
    corroboration: { ...DEFAULT_MERGE_CONFIG.corroboration },
  }
  private normalizerOptions: NormalizerOptions = {
    yearRange: { ...DEFAULT_NORMALIZER_OPTIONS.yearRange },
    splitYouTubeTitles: DEFAULT_NORMALIZER_OPTIONS.splitYouTubeTitles,
  }
  private loggerInstance?: Logger

  /**
   * Set how confidence and completeness combine into a record's score.
   *
   * @param confidence - Weight of the provider's match confidence
   * @param completeness - Weight of the fraction of filled fields
   * @returns This builder for chaining
   */
  weights(confidence: number, completeness: number): this {
    this.mergeConfiguration.weights = { confidence, completeness }
    return this
  }

  /**
   * Set the score added to candidates that another provider agrees with.
   */
  corroborationBonus(bonus: number): this {
    this.mergeConfiguration.corroborationBonus = bonus
    return this
  }

  /**
   * Set how many years apart two years may be and still agree.
   */
  yearTolerance(years: number): this {
    this.mergeConfiguration.corroboration.yearTolerance = years
    return this
  }

  /**
   * Set how many seconds apart two durations may be and still agree.
   */
  durationTolerance(seconds: number): this {
    this.mergeConfiguration.corroboration.durationTolerance = seconds
    return this
  }

  /**
   * Set the range of plausible release years; others are discarded.
   */
  yearRange(min: number, max: number): this {
    this.normalizerOptions.yearRange = { min, max }
    return this
  }

  /**
   * Split YouTube video titles of the form "Artist - Title".
   */
  splitYouTubeTitles(enabled = true): this {
    this.normalizerOptions.splitYouTubeTitles = enabled
    return this
  }

  /**
   * Set the logger that receives dropped payloads and rejected pins.
   */
  logger(logger: Logger): this {
    this.loggerInstance = logger
    return this
  }

  /**
   * Get the configuration assembled so far.
   */
  getConfig(): ReconcilerConfig {
    return copyReconcilerConfig({
      merge: this.mergeConfiguration,
      normalizer: this.normalizerOptions,
    })
  }

  /**
   * Build the configured Reconciler instance.
   *
   * @returns A new Reconciler
   * @throws {ConfigurationError} If any setting is out of range
   */
  build(): Reconciler {
    const config = this.getConfig()
    validateReconcilerConfig(config)
    return new Reconciler({ config, logger: this.loggerInstance })
  }
}

/**
 * Main entry point.
 *
 * @example
 * ```typescript
 * import { TrackReconciler } from 'track-reconciler'
 *
 * const reconciler = TrackReconciler.create().build()
 * const { metadata } = reconciler.reconcile(payloads, {
 *   title: 'Bohemian Rhapsody',
 *   artist: 'Queen',
 * })
 * ```
 */
export const TrackReconciler = {
  /**
   * Create a new reconciler builder.
   */
  create(): ReconcilerBuilder {
    return new ReconcilerBuilder()
  },

  /**
   * Create a builder seeded with an existing configuration.
   *
   * @throws {ConfigurationError} If the configuration is invalid
   */
  fromConfig(config: ReconcilerConfig): ReconcilerBuilder {
    validateReconcilerConfig(config)
    const { weights, corroborationBonus, corroboration } = config.merge
    return new ReconcilerBuilder()
      .weights(weights.confidence, weights.completeness)
      .corroborationBonus(corroborationBonus)
      .yearTolerance(corroboration.yearTolerance)
      .durationTolerance(corroboration.durationTolerance)
      .yearRange(config.normalizer.yearRange.min, config.normalizer.yearRange.max)
      .splitYouTubeTitles(config.normalizer.splitYouTubeTitles)
  },
}

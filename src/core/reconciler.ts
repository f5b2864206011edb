/**
 * Reconciler - normalizes provider payloads and merges them, logging the
 * per-record and per-field problems it absorbs
 * @module core/reconciler
 */

import type { ReconcilerConfig } from '../types/config.js'
import { DEFAULT_RECONCILER_CONFIG } from '../types/config.js'
import type { SourceRecord, TrackQuery } from '../types/record.js'
import type { FieldName } from '../types/track.js'
import type { FieldPins, MergedMetadata } from '../types/merge.js'
import type { Logger } from '../utils/logger.js'
import { createPrefixedLogger, createSilentLogger } from '../utils/logger.js'
import { normalizeSources } from '../sources/normalizer.js'
import type { NormalizeResult } from '../sources/normalizer.js'
import type { InvalidSourceRecordError } from '../sources/source-error.js'
import { MergeEngine } from '../merge/merge-engine.js'
import type { OverrideResult } from '../merge/override-applier.js'
import { NoMetadataAvailableError } from '../merge/merge-error.js'
import { fingerprintRecords } from '../merge/fingerprint.js'
import { validateReconcilerConfig } from '../merge/validation.js'

/**
 * Options for creating a Reconciler
 */
export interface ReconcilerOptions {
  config?: ReconcilerConfig
  /** Defaults to a silent logger */
  logger?: Logger
}

/**
 * Result of a full normalize-and-merge pass
 */
export interface ReconcileResult {
  metadata: MergedMetadata
  /** The records the merge was built from; pass them to `override` */
  records: SourceRecord[]
  /** Payloads dropped during normalization */
  rejected: InvalidSourceRecordError[]
  /** Stable identifier of `records`, usable as a cache key */
  fingerprint: string
}

/**
 * Deep copy of a configuration, so later changes to the source object have
 * no effect
 */
export function copyReconcilerConfig(config: ReconcilerConfig): ReconcilerConfig {
  return {
    merge: {
      weights: { ...config.merge.weights },
      corroborationBonus: config.merge.corroborationBonus,
      corroboration: { ...config.merge.corroboration },
    },
    normalizer: {
      yearRange: { ...config.normalizer.yearRange },
      splitYouTubeTitles: config.normalizer.splitYouTubeTitles,
    },
  }
}

/**
 * Reconciler
 *
 * @example
 * ```typescript
 * const reconciler = TrackReconciler.create().logger(defaultLogger).build()
 *
 * const { metadata, records } = reconciler.reconcile(payloads, {
 *   title: 'Bohemian Rhapsody',
 *   artist: 'Queen',
 * })
 *
 * const { metadata: revised } = reconciler.override(metadata, records, { year: 'Discogs' })
 * ```
 */
export class Reconciler {
  private readonly config: ReconcilerConfig
  private readonly engine: MergeEngine
  private readonly logger: Logger

  constructor(options: ReconcilerOptions = {}) {
    const config = options.config ?? DEFAULT_RECONCILER_CONFIG
    validateReconcilerConfig(config)
    this.config = copyReconcilerConfig(config)
    this.engine = new MergeEngine(this.config.merge)
    this.logger = createPrefixedLogger('reconciler', options.logger ?? createSilentLogger())
  }

  /**
   * Normalizes provider payloads into source records, logging each dropped
   * payload as a warning
   */
  normalize(payloads: readonly unknown[], query: TrackQuery): NormalizeResult {
    const result = normalizeSources(payloads, query, this.config.normalizer)

    for (const error of result.rejected) {
      this.logger.warn(`Dropped payload: ${error.message}`, {
        code: error.code,
        providerTag: error.providerTag,
      })
    }
    this.logger.debug('Normalized payloads', {
      accepted: result.records.map((record) => record.provider),
      rejected: result.rejected.length,
    })

    return result
  }

  /**
   * Merges source records
   *
   * @throws {NoMetadataAvailableError} If no record holds any value
   * @throws {MergeValidationError} If records break the input contract
   */
  merge(records: readonly SourceRecord[]): MergedMetadata {
    try {
      const merged = this.engine.merge(records)
      this.logger.debug('Merged records', {
        providers: merged.providers,
        mergeConfidence: merged.mergeConfidence,
        emptyFields: merged.stats.emptyFields,
      })
      return merged
    } catch (error) {
      if (error instanceof NoMetadataAvailableError) {
        this.logger.warn(error.message, { recordCount: error.recordCount })
      }
      throw error
    }
  }

  /**
   * Normalizes payloads and merges the surviving records
   *
   * @throws {NoMetadataAvailableError} If no usable record survives
   */
  reconcile(payloads: readonly unknown[], query: TrackQuery): ReconcileResult {
    const { records, rejected } = this.normalize(payloads, query)
    const metadata = this.merge(records)
    return {
      metadata,
      records,
      rejected,
      fingerprint: fingerprintRecords(records),
    }
  }

  /**
   * Pins fields to providers, logging each pin that could not be applied
   */
  override(
    merged: MergedMetadata,
    records: readonly SourceRecord[],
    pins: FieldPins
  ): OverrideResult {
    const result = this.engine.override(merged, records, pins)
    for (const error of result.rejected) {
      this.logger.warn(error.message, { field: error.field, provider: error.provider })
    }
    return result
  }

  /**
   * Restores automatic selection for the named fields
   */
  reset(
    merged: MergedMetadata,
    records: readonly SourceRecord[],
    fields: readonly FieldName[]
  ): MergedMetadata {
    return this.engine.reset(merged, records, fields)
  }

  getConfig(): ReconcilerConfig {
    return copyReconcilerConfig(this.config)
  }
}

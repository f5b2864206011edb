/**
 * Field-level merge of source records into one provenance-tagged record
 * @module merge/merge-engine
 */

import type { MergeConfig } from '../types/config.js'
import { DEFAULT_MERGE_CONFIG } from '../types/config.js'
import type { SourceRecord } from '../types/record.js'
import type { FieldName } from '../types/track.js'
import type { FieldPins, MergedMetadata } from '../types/merge.js'
import { decideField } from './field-selection.js'
import { assembleMergedMetadata, buildFieldDecisions } from './merge-stats.js'
import {
  requireUsableRecords,
  validateMergeConfig,
  validateSourceRecords,
} from './validation.js'
import { applyOverrides, resetOverrides } from './override-applier.js'
import type { OverrideResult } from './override-applier.js'

/**
 * Fills in a partial merge configuration from the defaults
 */
export function resolveMergeConfig(config: Partial<MergeConfig> = {}): MergeConfig {
  return {
    weights: { ...DEFAULT_MERGE_CONFIG.weights, ...config.weights },
    corroborationBonus: config.corroborationBonus ?? DEFAULT_MERGE_CONFIG.corroborationBonus,
    corroboration: {
      ...DEFAULT_MERGE_CONFIG.corroboration,
      ...config.corroboration,
    },
  }
}

/**
 * Merges source records into a single {@link MergedMetadata}.
 *
 * Each field is decided on its own. Record order has no effect on the
 * result.
 *
 * @throws {MergeValidationError} If records break the input contract
 * @throws {NoMetadataAvailableError} If no record holds any value
 */
export function mergeRecords(
  records: readonly SourceRecord[],
  config: MergeConfig = DEFAULT_MERGE_CONFIG
): MergedMetadata {
  validateSourceRecords(records)
  requireUsableRecords(records)

  const fields = buildFieldDecisions(<K extends FieldName>(field: K) =>
    decideField(field, records, config)
  )
  return assembleMergedMetadata(
    fields,
    records.map((record) => record.provider)
  )
}

/**
 * MergeEngine - merges provider records with a fixed scoring configuration
 *
 * @example
 * ```typescript
 * const engine = new MergeEngine({ corroborationBonus: 0.1 })
 *
 * const merged = engine.merge([musicBrainzRecord, discogsRecord, youTubeRecord])
 * merged.fields.year.value // 1975
 * merged.fields.year.provider // 'MusicBrainz'
 *
 * const { metadata, rejected } = engine.override(merged, records, { album: 'Discogs' })
 * ```
 */
export class MergeEngine {
  private readonly config: MergeConfig

  /**
   * @param config - Partial configuration, completed from the defaults
   * @throws {ConfigurationError} If the configuration is invalid
   */
  constructor(config: Partial<MergeConfig> = {}) {
    this.config = resolveMergeConfig(config)
    validateMergeConfig(this.config)
  }

  /**
   * @see mergeRecords
   */
  merge(records: readonly SourceRecord[]): MergedMetadata {
    return mergeRecords(records, this.config)
  }

  /**
   * Pins fields to providers; see {@link applyOverrides}
   */
  override(
    merged: MergedMetadata,
    records: readonly SourceRecord[],
    pins: FieldPins
  ): OverrideResult {
    return applyOverrides(merged, records, pins, this.config)
  }

  /**
   * Restores automatic selection for fields; see {@link resetOverrides}
   */
  reset(
    merged: MergedMetadata,
    records: readonly SourceRecord[],
    fields: readonly FieldName[]
  ): MergedMetadata {
    return resetOverrides(merged, records, fields, this.config)
  }

  getConfig(): MergeConfig {
    return {
      weights: { ...this.config.weights },
      corroborationBonus: this.config.corroborationBonus,
      corroboration: { ...this.config.corroboration },
    }
  }
}

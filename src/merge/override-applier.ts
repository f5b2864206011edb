/**
 * User-directed field pins on top of an automatic merge
 * @module merge/override-applier
 */

import type { MergeConfig } from '../types/config.js'
import { DEFAULT_MERGE_CONFIG } from '../types/config.js'
import type { SourceRecord } from '../types/record.js'
import type { FieldName } from '../types/track.js'
import type { Provider } from '../types/provider.js'
import type { FieldDecision, FieldPins, MergedMetadata } from '../types/merge.js'
import { collectCandidates, copyDecision, decideField } from './field-selection.js'
import { assembleMergedMetadata, buildFieldDecisions } from './merge-stats.js'
import { OverrideNotApplicableError } from './merge-error.js'
import {
  requireSameProviders,
  validatePins,
  validateSourceRecords,
} from './validation.js'

/**
 * Outcome of applying pins
 */
export interface OverrideResult {
  /** The revised merge; the input merge is left untouched */
  metadata: MergedMetadata
  /** Pins that could not be applied; their fields kept the prior selection */
  rejected: OverrideNotApplicableError[]
}

/**
 * Decision for `field` with `provider`'s value forced in, or an error when
 * that provider has no value for the field
 */
function pinField<K extends FieldName>(
  field: K,
  provider: Provider,
  records: readonly SourceRecord[],
  config: MergeConfig
): FieldDecision<K> | OverrideNotApplicableError {
  const candidates = collectCandidates(field, records, config)
  const pinned = candidates.find((candidate) => candidate.provider === provider)
  if (!pinned) {
    return new OverrideNotApplicableError(field, provider)
  }

  return {
    field,
    value: pinned.value,
    provider: pinned.provider,
    score: pinned.score,
    corroborated: candidates.some((candidate) => candidate.corroborated),
    overridden: true,
    candidates,
  }
}

/**
 * Re-applies the merge with fields pinned to chosen providers.
 *
 * Only pinned fields change. Each takes the pinned provider's literal value;
 * its corroboration flag and alternates are recomputed from the same
 * candidate pool as an automatic merge. A pin whose provider has no value
 * for the field is reported in `rejected` and that field keeps its prior
 * selection. Applying the same pins again gives the same result. The
 * returned merge shares no objects with `merged`.
 *
 * @param merged - A previous result for these records
 * @param records - The records `merged` was built from
 * @param pins - Provider to force, per field
 * @param config - The configuration `merged` was built with
 * @throws {MergeValidationError} If the records do not match `merged`
 * @throws {InvalidParameterError} If a pin names an unknown field or provider
 *
 * @example
 * ```typescript
 * const { metadata, rejected } = applyOverrides(merged, records, {
 *   title: 'Discogs',
 *   album: 'YouTube',
 * })
 * metadata.fields.title.provider // 'Discogs'
 * rejected[0]?.code // 'OVERRIDE_NOT_APPLICABLE' when YouTube had no album
 * ```
 */
export function applyOverrides(
  merged: MergedMetadata,
  records: readonly SourceRecord[],
  pins: FieldPins,
  config: MergeConfig = DEFAULT_MERGE_CONFIG
): OverrideResult {
  validateSourceRecords(records)
  requireSameProviders(merged, records)
  validatePins(pins)

  const rejected: OverrideNotApplicableError[] = []

  const fields = buildFieldDecisions(<K extends FieldName>(field: K) => {
    const prior: FieldDecision<K> = merged.fields[field]
    const provider = pins[field]
    if (provider === undefined) {
      return copyDecision(prior)
    }

    const decision = pinField(field, provider, records, config)
    if (decision instanceof OverrideNotApplicableError) {
      rejected.push(decision)
      return copyDecision(prior)
    }
    return decision
  })

  return {
    metadata: assembleMergedMetadata(fields, merged.providers),
    rejected,
  }
}

/**
 * Drops pins from the named fields, restoring their automatic selection.
 * Other fields, pinned or not, are left as they are.
 *
 * @throws {MergeValidationError} If the records do not match `merged`
 */
export function resetOverrides(
  merged: MergedMetadata,
  records: readonly SourceRecord[],
  fieldsToReset: readonly FieldName[],
  config: MergeConfig = DEFAULT_MERGE_CONFIG
): MergedMetadata {
  validateSourceRecords(records)
  requireSameProviders(merged, records)

  const fields = buildFieldDecisions(<K extends FieldName>(field: K) => {
    const prior: FieldDecision<K> = merged.fields[field]
    return fieldsToReset.includes(field) ? decideField(field, records, config) : copyDecision(prior)
  })

  return assembleMergedMetadata(fields, merged.providers)
}

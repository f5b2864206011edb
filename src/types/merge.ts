/**
 * Merge output types
 * @module types/merge
 */

import type { Provider } from './provider.js'
import type { FieldName, TrackFieldTypes, TrackFields } from './track.js'

/**
 * One provider's non-null value for a field, with the score used to rank it
 */
export interface FieldCandidate<K extends FieldName = FieldName> {
  provider: Provider
  value: TrackFieldTypes[K]
  /** Overall score of the provider's record */
  baseScore: number
  /** Base score plus corroboration bonus, capped at 1 */
  score: number
  /** Whether at least one other provider agrees with this value */
  corroborated: boolean
  /** Providers whose value agrees with this one, in priority order */
  agreesWith: Provider[]
}

/**
 * The merge decision for a single field
 */
export interface FieldDecision<K extends FieldName = FieldName> {
  field: K
  /** Selected value, always the literal value of `provider`'s record */
  value: TrackFieldTypes[K] | null
  /** Winning provider, null when no provider had a value */
  provider: Provider | null
  /** Effective score of the winning candidate */
  score: number | null
  /** True when two or more providers agree on a value for this field */
  corroborated: boolean
  /** True when the selection came from a pin rather than scoring */
  overridden: boolean
  /** Every non-null candidate, best first */
  candidates: FieldCandidate<K>[]
}

export type FieldDecisions = {
  [K in FieldName]: FieldDecision<K>
}

/**
 * Counts describing a merge
 */
export interface MergeStats {
  /** Fields won by each contributing provider */
  fieldsFromEachProvider: Partial<Record<Provider, number>>
  /** Fields with at least one candidate */
  filledFields: number
  /** Fields without any candidate */
  emptyFields: number
  corroboratedFields: number
  overriddenFields: number
}

/**
 * The unified, provenance-tagged record for one query
 */
export interface MergedMetadata {
  fields: FieldDecisions
  /** Mean effective score of winning candidates over filled fields */
  mergeConfidence: number
  /** Providers whose records took part, in priority order */
  providers: Provider[]
  stats: MergeStats
}

/**
 * Explicit provider choices, at most one per field
 */
export type FieldPins = Partial<Record<FieldName, Provider>>

/**
 * Plain selected values, as read by a tagging layer
 */
export type TrackMetadata = TrackFields

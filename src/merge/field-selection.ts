/**
 * Candidate scoring and automatic selection for a single field
 * @module merge/field-selection
 */

import type { MergeConfig } from '../types/config.js'
import { DEFAULT_MERGE_CONFIG } from '../types/config.js'
import type { SourceRecord } from '../types/record.js'
import type { FieldName, TrackFieldTypes } from '../types/track.js'
import { hasValue } from '../types/track.js'
import type { FieldCandidate, FieldDecision } from '../types/merge.js'
import { compareProviders } from '../types/provider.js'
import { overallScore, roundScore } from '../scoring/scorer.js'
import { detectCorroboration } from './corroboration.js'
import type { ProvidedValue } from './corroboration.js'

/**
 * A record's value for one field
 */
export function fieldValue<K extends FieldName>(
  record: SourceRecord,
  field: K
): TrackFieldTypes[K] | null {
  return record.fields[field]
}

/**
 * Orders candidates best first: effective score, then provider priority
 */
export function compareCandidates(a: FieldCandidate, b: FieldCandidate): number {
  return b.score - a.score || compareProviders(a.provider, b.provider)
}

/**
 * Collects and scores every value of `field`, best first. Null, missing
 * and blank values are not candidates.
 *
 * Each candidate starts from its record's overall score; candidates that
 * agree with at least one other provider get the corroboration bonus,
 * capped at 1.
 */
export function collectCandidates<K extends FieldName>(
  field: K,
  records: readonly SourceRecord[],
  config: MergeConfig = DEFAULT_MERGE_CONFIG
): FieldCandidate<K>[] {
  const provided: Array<ProvidedValue<K> & { record: SourceRecord }> = []
  for (const record of records) {
    const value = fieldValue(record, field)
    if (hasValue(value)) {
      provided.push({ provider: record.provider, value, record })
    }
  }

  const { agreements } = detectCorroboration(field, provided, config.corroboration)

  return provided
    .map(({ provider, value, record }) => {
      const agreesWith = agreements.get(provider) ?? []
      const baseScore = overallScore(record, config.weights)
      const bonus = agreesWith.length > 0 ? config.corroborationBonus : 0
      return {
        provider,
        value,
        baseScore,
        score: roundScore(Math.min(1, baseScore + bonus)),
        corroborated: agreesWith.length > 0,
        agreesWith,
      }
    })
    .sort(compareCandidates)
}

/**
 * Decision for a field with no candidate
 */
export function emptyDecision<K extends FieldName>(field: K): FieldDecision<K> {
  return {
    field,
    value: null,
    provider: null,
    score: null,
    corroborated: false,
    overridden: false,
    candidates: [],
  }
}

/**
 * Copy of a decision that shares no objects or arrays with the original
 */
export function copyDecision<K extends FieldName>(decision: FieldDecision<K>): FieldDecision<K> {
  return {
    ...decision,
    candidates: decision.candidates.map((candidate) => ({
      ...candidate,
      agreesWith: [...candidate.agreesWith],
    })),
  }
}

/**
 * Automatic decision for one field: the best candidate wins
 */
export function decideField<K extends FieldName>(
  field: K,
  records: readonly SourceRecord[],
  config: MergeConfig = DEFAULT_MERGE_CONFIG
): FieldDecision<K> {
  const candidates = collectCandidates(field, records, config)
  if (candidates.length === 0) {
    return emptyDecision(field)
  }

  const [winner] = candidates
  return {
    field,
    value: winner.value,
    provider: winner.provider,
    score: winner.score,
    corroborated: candidates.some((candidate) => candidate.corroborated),
    overridden: false,
    candidates,
  }
}

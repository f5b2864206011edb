/**
 * Assembly of merged metadata from per-field decisions
 * @module merge/merge-stats
 */

import type { FieldDecision, FieldDecisions, MergedMetadata, MergeStats } from '../types/merge.js'
import type { Provider } from '../types/provider.js'
import { compareProviders } from '../types/provider.js'
import { UNIVERSAL_FIELDS } from '../types/track.js'
import { roundScore } from '../scoring/scorer.js'

function decisionList(fields: FieldDecisions): FieldDecision[] {
  return UNIVERSAL_FIELDS.map((field) => fields[field])
}

/**
 * Mean effective score of the winning candidates. Fields without a
 * candidate are left out rather than counted as zero; with no filled field
 * at all the result is 0.
 */
export function calculateMergeConfidence(fields: FieldDecisions): number {
  const scores = decisionList(fields)
    .map((decision) => decision.score)
    .filter((score): score is number => score !== null)

  if (scores.length === 0) return 0
  const total = scores.reduce((sum, score) => sum + score, 0)
  return roundScore(total / scores.length)
}

export function calculateStats(fields: FieldDecisions, providers: readonly Provider[]): MergeStats {
  const fieldsFromEachProvider: Partial<Record<Provider, number>> = {}
  for (const provider of providers) {
    fieldsFromEachProvider[provider] = 0
  }

  let filledFields = 0
  let corroboratedFields = 0
  let overriddenFields = 0

  for (const decision of decisionList(fields)) {
    if (decision.provider !== null) {
      filledFields++
      fieldsFromEachProvider[decision.provider] =
        (fieldsFromEachProvider[decision.provider] ?? 0) + 1
    }
    if (decision.corroborated) corroboratedFields++
    if (decision.overridden) overriddenFields++
  }

  return {
    fieldsFromEachProvider,
    filledFields,
    emptyFields: UNIVERSAL_FIELDS.length - filledFields,
    corroboratedFields,
    overriddenFields,
  }
}

/**
 * Wraps field decisions into a {@link MergedMetadata}
 */
export function assembleMergedMetadata(
  fields: FieldDecisions,
  providers: readonly Provider[]
): MergedMetadata {
  const ordered = [...providers].sort(compareProviders)
  return {
    fields,
    mergeConfidence: calculateMergeConfidence(fields),
    providers: ordered,
    stats: calculateStats(fields, ordered),
  }
}

/**
 * Builds a {@link FieldDecisions} by asking `decide` for every universal field
 */
export function buildFieldDecisions(
  decide: <K extends keyof FieldDecisions>(field: K) => FieldDecision<K>
): FieldDecisions {
  return {
    title: decide('title'),
    artist: decide('artist'),
    album: decide('album'),
    year: decide('year'),
    genre: decide('genre'),
    duration: decide('duration'),
    coverArtUrl: decide('coverArtUrl'),
  }
}

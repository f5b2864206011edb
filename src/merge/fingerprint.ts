/**
 * Stable fingerprints of merge input, for callers that cache merge results
 * @module merge/fingerprint
 */

import { v5 as uuidv5 } from 'uuid'
import type { SourceRecord } from '../types/record.js'
import { compareProviders } from '../types/provider.js'
import { UNIVERSAL_FIELDS } from '../types/track.js'

/**
 * Namespace for record-set fingerprints
 */
export const FINGERPRINT_NAMESPACE = '3b8f6a52-91c4-4d0e-8f27-6c1e5a9d4b70'

/**
 * JSON with object keys sorted, so equal values always serialize the same.
 * Undefined properties are skipped.
 */
export function stableStringify(value: unknown): string {
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value) ?? 'null'
  }

  if (Array.isArray(value)) {
    return `[${value.map((item) => stableStringify(item)).join(',')}]`
  }

  const entries = Object.entries(value)
    .filter(([, item]) => item !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([key, item]) => `${JSON.stringify(key)}:${stableStringify(item)}`)

  return `{${entries.join(',')}}`
}

/**
 * Deterministic identifier for a record set. Record order does not matter;
 * any change to a provider, value, confidence or completeness gives a
 * different fingerprint.
 *
 * @example
 * ```typescript
 * fingerprintRecords([a, b]) === fingerprintRecords([b, a]) // true
 * ```
 */
export function fingerprintRecords(records: readonly SourceRecord[]): string {
  const canonical = [...records]
    .sort((a, b) => compareProviders(a.provider, b.provider))
    .map((record) => ({
      provider: record.provider,
      confidence: record.confidence,
      completeness: record.completeness,
      fields: UNIVERSAL_FIELDS.map((field) => record.fields[field]),
    }))

  return uuidv5(stableStringify(canonical), FINGERPRINT_NAMESPACE)
}

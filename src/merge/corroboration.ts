/**
 * Agreement between providers on a field's value
 * @module merge/corroboration
 */

import type { Provider } from '../types/provider.js'
import { compareProviders } from '../types/provider.js'
import type { FieldName, TrackFieldTypes } from '../types/track.js'
import type { CorroborationOptions } from '../types/config.js'
import { DEFAULT_MERGE_CONFIG } from '../types/config.js'
import { foldedEquals, numbersWithin } from '../core/comparators.js'

/**
 * A provider's non-null value for one field
 */
export interface ProvidedValue<K extends FieldName = FieldName> {
  provider: Provider
  value: TrackFieldTypes[K]
}

/**
 * Who agrees with whom on a field
 */
export interface CorroborationResult {
  /** True when at least two distinct providers agree */
  corroborated: boolean
  /** For every provider, the other providers agreeing with it (priority order) */
  agreements: Map<Provider, Provider[]>
}

/**
 * Whether two values of a field agree.
 *
 * Text is compared after folding (case, diacritics, punctuation variants,
 * whitespace). Years agree within `yearTolerance`, durations within
 * `durationTolerance` seconds.
 *
 * @example
 * ```typescript
 * valuesAgree('artist', 'Beyoncé', 'BEYONCE', options) // true
 * valuesAgree('year', 1975, 1976, options) // true with the default tolerance of 1
 * valuesAgree('year', 1975, 2008, options) // false
 * ```
 */
export function valuesAgree<K extends FieldName>(
  field: K,
  a: TrackFieldTypes[K],
  b: TrackFieldTypes[K],
  options: CorroborationOptions = DEFAULT_MERGE_CONFIG.corroboration
): boolean {
  if (typeof a === 'number' && typeof b === 'number') {
    if (field === 'year') return numbersWithin(a, b, options.yearTolerance)
    if (field === 'duration') return numbersWithin(a, b, options.durationTolerance)
    return a === b
  }
  if (typeof a === 'string' && typeof b === 'string') {
    return foldedEquals(a, b)
  }
  return false
}

/**
 * Finds agreement among the providers that supplied a value for `field`.
 * Every pair is compared, so with a year tolerance of 1 the values 1975,
 * 1976 and 1977 all count as corroborated.
 */
export function detectCorroboration<K extends FieldName>(
  field: K,
  values: readonly ProvidedValue<K>[],
  options: CorroborationOptions = DEFAULT_MERGE_CONFIG.corroboration
): CorroborationResult {
  const agreements = new Map<Provider, Provider[]>()
  for (const entry of values) {
    agreements.set(entry.provider, [])
  }

  for (let i = 0; i < values.length; i++) {
    for (let j = i + 1; j < values.length; j++) {
      const left = values[i]
      const right = values[j]
      if (left.provider === right.provider) continue
      if (valuesAgree(field, left.value, right.value, options)) {
        agreements.get(left.provider)?.push(right.provider)
        agreements.get(right.provider)?.push(left.provider)
      }
    }
  }

  let corroborated = false
  for (const agreeing of agreements.values()) {
    agreeing.sort(compareProviders)
    if (agreeing.length > 0) corroborated = true
  }

  return { corroborated, agreements }
}

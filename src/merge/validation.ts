/**
 * Validation of merge configuration and merge input
 * @module merge/validation
 */

import type { MergeConfig, NormalizerOptions, ReconcilerConfig } from '../types/config.js'
import type { SourceRecord } from '../types/record.js'
import type { Provider } from '../types/provider.js'
import type { MergedMetadata, FieldPins } from '../types/merge.js'
import { isProvider } from '../types/provider.js'
import { UNIVERSAL_FIELDS, hasValue, isFieldName } from '../types/track.js'
import { ConfigurationError, InvalidParameterError } from '../utils/errors.js'
import { MergeValidationError, NoMetadataAvailableError } from './merge-error.js'

const WEIGHT_SUM_TOLERANCE = 1e-9

function requireUnitInterval(value: number, field: string): void {
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0 || value > 1) {
    throw new ConfigurationError(`${field} must be a number between 0 and 1, got ${value}`, field)
  }
}

function requireTolerance(value: number, field: string): void {
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
    throw new ConfigurationError(`${field} must be a non-negative number, got ${value}`, field)
  }
}

/**
 * Validates scoring weights, corroboration bonus and tolerances
 *
 * @throws {ConfigurationError} If any setting is out of range
 */
export function validateMergeConfig(config: MergeConfig): void {
  requireUnitInterval(config.weights.confidence, 'weights.confidence')
  requireUnitInterval(config.weights.completeness, 'weights.completeness')

  const sum = config.weights.confidence + config.weights.completeness
  if (Math.abs(sum - 1) > WEIGHT_SUM_TOLERANCE) {
    throw new ConfigurationError(
      `weights must sum to 1, got ${config.weights.confidence} + ${config.weights.completeness}`,
      'weights'
    )
  }

  requireUnitInterval(config.corroborationBonus, 'corroborationBonus')
  requireTolerance(config.corroboration.yearTolerance, 'corroboration.yearTolerance')
  requireTolerance(config.corroboration.durationTolerance, 'corroboration.durationTolerance')
}

/**
 * Validates field cleaning options
 *
 * @throws {ConfigurationError} If the year range is empty or not made of integers
 */
export function validateNormalizerOptions(options: NormalizerOptions): void {
  const { min, max } = options.yearRange
  if (!Number.isInteger(min) || !Number.isInteger(max)) {
    throw new ConfigurationError('yearRange bounds must be integers', 'yearRange')
  }
  if (min > max) {
    throw new ConfigurationError(
      `yearRange.min (${min}) must not exceed yearRange.max (${max})`,
      'yearRange'
    )
  }
}

export function validateReconcilerConfig(config: ReconcilerConfig): void {
  validateMergeConfig(config.merge)
  validateNormalizerOptions(config.normalizer)
}

/**
 * Validates merge input records.
 *
 * @throws {MergeValidationError} If a record has an unknown provider, a score
 *   outside [0, 1], or shares its provider with another record
 */
export function validateSourceRecords(records: readonly SourceRecord[]): void {
  if (!Array.isArray(records)) {
    throw new MergeValidationError('records', 'must be an array')
  }

  const seen = new Set<Provider>()

  records.forEach((record, index) => {
    if (!record || typeof record !== 'object') {
      throw new MergeValidationError(`records[${index}]`, 'must be an object')
    }
    if (!isProvider(record.provider)) {
      throw new MergeValidationError(`records[${index}].provider`, 'must be a known provider', {
        provider: record.provider,
      })
    }
    if (seen.has(record.provider)) {
      throw new MergeValidationError(
        `records[${index}].provider`,
        `duplicate record for ${record.provider}; providers must be unique per merge`
      )
    }
    seen.add(record.provider)

    for (const score of ['confidence', 'completeness'] as const) {
      const value = record[score]
      if (typeof value !== 'number' || !Number.isFinite(value) || value < 0 || value > 1) {
        throw new MergeValidationError(`records[${index}].${score}`, 'must be between 0 and 1', {
          value,
        })
      }
    }

    if (!record.fields || typeof record.fields !== 'object') {
      throw new MergeValidationError(`records[${index}].fields`, 'must be an object')
    }
  })
}

/**
 * True when the record holds at least one value
 */
export function hasAnyValue(record: SourceRecord): boolean {
  return UNIVERSAL_FIELDS.some((field) => hasValue(record.fields[field]))
}

/**
 * @throws {NoMetadataAvailableError} If no record holds any value
 */
export function requireUsableRecords(records: readonly SourceRecord[]): void {
  if (!records.some(hasAnyValue)) {
    throw new NoMetadataAvailableError(records.length)
  }
}

/**
 * Checks that a merged result was built from these records
 *
 * @throws {MergeValidationError} If the provider sets differ
 */
export function requireSameProviders(
  merged: MergedMetadata,
  records: readonly SourceRecord[]
): void {
  const expected = [...merged.providers].sort().join(',')
  const actual = records
    .map((record) => record.provider)
    .sort()
    .join(',')
  if (expected !== actual) {
    throw new MergeValidationError(
      'records',
      'must be the records the merged metadata was built from',
      { expected: merged.providers, actual: records.map((record) => record.provider) }
    )
  }
}

/**
 * Validates a pin set supplied at runtime
 *
 * @throws {InvalidParameterError} If a key is not a universal field or a
 *   value is not a known provider
 */
export function validatePins(pins: FieldPins): void {
  for (const [field, provider] of Object.entries(pins)) {
    if (!isFieldName(field)) {
      throw new InvalidParameterError('pins', field, `'${field}' is not a universal field`)
    }
    if (provider !== undefined && !isProvider(provider)) {
      throw new InvalidParameterError('pins', provider, `'${String(provider)}' is not a known provider`)
    }
  }
}

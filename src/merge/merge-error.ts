/**
 * Merge-specific error classes
 * @module merge/merge-error
 */

import type { Provider } from '../types/provider.js'
import type { FieldName } from '../types/track.js'
import { ReconcilerError } from '../utils/errors.js'

/**
 * Thrown when there is nothing to merge: every provider fetch failed,
 * returned nothing, or returned records without a single value.
 *
 * Fatal to an automatic merge. The caller decides whether to retry the
 * fetch stage or fall back to manual entry.
 */
export class NoMetadataAvailableError extends ReconcilerError {
  /** Number of records that were supplied */
  public readonly recordCount: number

  constructor(recordCount: number, context?: Record<string, unknown>) {
    super(
      recordCount === 0
        ? 'No metadata available: no source records were supplied'
        : `No metadata available: none of the ${recordCount} source records holds a value`,
      'NO_METADATA_AVAILABLE',
      { recordCount, ...context }
    )
    this.name = 'NoMetadataAvailableError'
    this.recordCount = recordCount
  }
}

/**
 * A pin named a provider that has no value for the pinned field.
 * The field keeps its previous selection.
 */
export class OverrideNotApplicableError extends ReconcilerError {
  public readonly field: FieldName
  public readonly provider: Provider

  constructor(field: FieldName, provider: Provider, context?: Record<string, unknown>) {
    super(
      `Cannot pin '${field}' to ${provider}: ${provider} has no value for this field`,
      'OVERRIDE_NOT_APPLICABLE',
      { field, provider, ...context }
    )
    this.name = 'OverrideNotApplicableError'
    this.field = field
    this.provider = provider
  }
}

/**
 * Thrown when merge input breaks its contract, e.g. two records from the
 * same provider or a confidence outside [0, 1]
 */
export class MergeValidationError extends ReconcilerError {
  public readonly field: string
  public readonly reason: string

  constructor(field: string, reason: string, context?: Record<string, unknown>) {
    super(
      `Merge validation failed for '${field}': ${reason}`,
      'MERGE_VALIDATION_ERROR',
      { field, reason, ...context }
    )
    this.name = 'MergeValidationError'
    this.field = field
    this.reason = reason
  }
}

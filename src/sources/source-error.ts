/**
 * Errors raised while normalizing provider payloads
 * @module sources/source-error
 */

import { ReconcilerError } from '../utils/errors.js'

/**
 * A payload could not be turned into a source record, e.g. because its
 * provider tag is missing. Batch normalization drops such payloads and
 * reports the error instead of throwing it.
 */
export class InvalidSourceRecordError extends ReconcilerError {
  /** The provider tag as found on the payload, if any */
  public readonly providerTag?: string
  public readonly reason: string

  constructor(reason: string, providerTag?: string, context?: Record<string, unknown>) {
    super(
      providerTag === undefined
        ? `Invalid source record: ${reason}`
        : `Invalid source record from '${providerTag}': ${reason}`,
      'INVALID_SOURCE_RECORD',
      { providerTag, reason, ...context }
    )
    this.name = 'InvalidSourceRecordError'
    this.providerTag = providerTag
    this.reason = reason
  }
}

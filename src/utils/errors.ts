/**
 * Base error classes and parameter validation helpers
 * @module utils/errors
 */

/**
 * Base error class for all reconciler errors
 */
export class ReconcilerError extends Error {
  /** Error code for programmatic error handling */
  public readonly code: string

  /** Additional error context */
  public readonly context?: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context?: Record<string, unknown>
  ) {
    super(message)
    this.name = 'ReconcilerError'
    this.code = code
    this.context = context

    if (typeof Error.captureStackTrace === 'function') {
      Error.captureStackTrace(this, this.constructor)
    }
  }
}

/**
 * Error thrown when a parameter value is invalid
 */
export class InvalidParameterError extends ReconcilerError {
  public readonly parameterName: string
  public readonly value: unknown
  public readonly reason: string

  constructor(
    parameterName: string,
    value: unknown,
    reason: string,
    context?: Record<string, unknown>
  ) {
    super(
      `Invalid parameter '${parameterName}': ${reason}`,
      'INVALID_PARAMETER',
      { parameterName, value, reason, ...context }
    )
    this.name = 'InvalidParameterError'
    this.parameterName = parameterName
    this.value = value
    this.reason = reason
  }
}

/**
 * Error thrown when configuration is invalid
 */
export class ConfigurationError extends ReconcilerError {
  public readonly field?: string

  constructor(message: string, field?: string, context?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', { field, ...context })
    this.name = 'ConfigurationError'
    this.field = field
  }
}

/**
 * Validates that a value is a finite number
 */
export function requireFinite(value: number, parameterName: string): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new InvalidParameterError(parameterName, value, 'must be a finite number')
  }
  return value
}

/**
 * Validates that a number is within a range (inclusive)
 */
export function requireInRange(
  value: number,
  min: number,
  max: number,
  parameterName: string
): number {
  requireFinite(value, parameterName)
  if (value < min || value > max) {
    throw new InvalidParameterError(
      parameterName,
      value,
      `must be between ${min} and ${max}`
    )
  }
  return value
}

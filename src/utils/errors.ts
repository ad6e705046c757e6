/**
 * Central error classes and validation utilities for stable-pairing
 * @module utils/errors
 */

/**
 * Base error class for all stable-pairing errors
 */
export class StablePairingError extends Error {
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
    this.name = 'StablePairingError'
    this.code = code
    this.context = context

    // Maintains proper stack trace (Node.js specific)
    if (typeof Error.captureStackTrace === 'function') {
      Error.captureStackTrace(this, this.constructor)
    }
  }
}

/**
 * Error thrown when a required parameter is missing
 */
export class MissingParameterError extends StablePairingError {
  public readonly parameterName: string

  constructor(parameterName: string, context?: Record<string, unknown>) {
    super(
      `Missing required parameter: '${parameterName}'`,
      'MISSING_PARAMETER',
      { parameterName, ...context }
    )
    this.name = 'MissingParameterError'
    this.parameterName = parameterName
  }
}

/**
 * Error thrown when a parameter value is invalid
 */
export class InvalidParameterError extends StablePairingError {
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
 * Error thrown when a builder method is called in invalid sequence
 */
export class BuilderSequenceError extends StablePairingError {
  public readonly method: string

  constructor(method: string, message: string, context?: Record<string, unknown>) {
    super(
      `Builder sequence error in ${method}: ${message}`,
      'BUILDER_SEQUENCE_ERROR',
      { method, ...context }
    )
    this.name = 'BuilderSequenceError'
    this.method = method
  }
}

// ==================== VALIDATION UTILITIES ====================

/**
 * Validates that a value is an agent name (a string or a finite number)
 */
export function requireAgentName(
  value: unknown,
  parameterName: string
): string | number {
  if (typeof value === 'string') {
    return value
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value
  }
  if (value === null || value === undefined) {
    throw new MissingParameterError(parameterName)
  }
  throw new InvalidParameterError(
    parameterName,
    value,
    'must be a string or a finite number'
  )
}

/**
 * Validates that a value is an array
 */
export function requireArray<T>(
  value: readonly T[],
  parameterName: string
): readonly T[] {
  if (!Array.isArray(value)) {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must be an array'
    )
  }
  return value
}

/**
 * Check if an error is a stable-pairing error
 */
export function isStablePairingError(error: unknown): error is StablePairingError {
  return error instanceof StablePairingError
}

/**
 * Custom Error Classes
 */

/**
 * Base error for everything raised by the transit model.
 */
export abstract class TransitModelError extends Error {
  abstract readonly code: string
  public override readonly cause?: Error

  constructor(message: string, cause?: Error) {
    super(message)
    this.name = 'TransitModelError'
    this.cause = cause

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }
}

/**
 * Referential integrity error.
 * Thrown when a "many" element references an id missing from the "one" collection.
 */
export class ReferentialIntegrityError extends TransitModelError {
  readonly code = 'E_REFERENTIAL_INTEGRITY'

  constructor(
    public readonly relationName: string,
    public readonly id: string,
  ) {
    super(`Error indexing ${relationName}: id=${id} not found`)
    this.name = 'ReferentialIntegrityError'
  }
}

/**
 * Duplicate identifier error.
 * Thrown when a collection receives two objects with the same id.
 */
export class DuplicateIdentifierError extends TransitModelError {
  readonly code = 'E_DUPLICATE_ID'

  constructor(
    public readonly collectionName: string,
    public readonly id: string,
  ) {
    super(`Duplicate identifier in ${collectionName}: ${id}`)
    this.name = 'DuplicateIdentifierError'
  }
}

/**
 * Handle scope error.
 * Thrown when a handle issued by one collection is used against another.
 */
export class HandleScopeError extends TransitModelError {
  readonly code = 'E_HANDLE_SCOPE'

  constructor(
    public readonly expected: string,
    public readonly actual: string,
  ) {
    super(`Handle scope mismatch: expected a handle of ${expected}, got one of ${actual}`)
    this.name = 'HandleScopeError'
  }
}

/**
 * Handle range error.
 * Thrown when a handle of the right collection points past its last object.
 */
export class HandleRangeError extends TransitModelError {
  readonly code = 'E_HANDLE_RANGE'

  constructor(
    public readonly collection: string,
    public readonly index: number,
    public readonly size: number,
  ) {
    super(`Handle out of range for ${collection}: index ${index}, size ${size}`)
    this.name = 'HandleRangeError'
  }
}

/**
 * Configuration error.
 * Thrown when environment configuration does not validate.
 */
export class ConfigError extends TransitModelError {
  readonly code = 'E_CONFIG'

  constructor(
    message: string,
    public readonly variable?: string,
  ) {
    super(message)
    this.name = 'ConfigError'
  }
}

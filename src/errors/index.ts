/**
 * polydal Error Handling Module
 *
 * Provides a standardized error hierarchy for the whole data layer.
 * All errors extend from PolydalError which provides:
 * - Error codes for programmatic handling
 * - Serialization support for the service layer
 * - Cause chaining for debugging
 * - Type guards for error checking
 *
 * Error Hierarchy:
 * - PolydalError (base class)
 *   - FilterParseError, ConnectionStringError (malformed input)
 *   - ValidationError (record failed a field rule on write)
 *     - RequiredFieldError, InvalidTypeError, RecordValidationError
 *   - NotFoundError (collection, record or field does not exist)
 *     - CollectionNotFoundError, RecordNotFoundError, FieldNotFoundError
 *   - SchemaDriftError (desired and actual schemas differ)
 *   - CapabilityUnsupportedError (search/aggregation not offered by a backend)
 *     - UnknownBackendError
 *   - BackendError (storage engine failures, wrapped)
 *     - BackendUnavailableError, RecordExistsError, CollectionExistsError
 *   - SchemaDefinitionError, ConfigurationError, TimeoutError
 *
 * Nothing in this package retries; retry policy belongs to callers or adapters.
 *
 * @module errors
 */

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Error codes for polydal operations.
 * These codes are stable and can be used for programmatic error handling.
 */
export enum ErrorCode {
  // General errors
  UNKNOWN = 'UNKNOWN',
  INTERNAL = 'INTERNAL',
  TIMEOUT = 'TIMEOUT',

  // Parse errors
  FILTER_PARSE_ERROR = 'FILTER_PARSE_ERROR',
  INVALID_CONNECTION_STRING = 'INVALID_CONNECTION_STRING',

  // Validation errors
  VALIDATION_FAILED = 'VALIDATION_FAILED',
  INVALID_TYPE = 'INVALID_TYPE',
  REQUIRED_FIELD = 'REQUIRED_FIELD',
  RECORD_VALIDATION_FAILED = 'RECORD_VALIDATION_FAILED',

  // Not found errors
  NOT_FOUND = 'NOT_FOUND',
  COLLECTION_NOT_FOUND = 'COLLECTION_NOT_FOUND',
  RECORD_NOT_FOUND = 'RECORD_NOT_FOUND',
  FIELD_NOT_FOUND = 'FIELD_NOT_FOUND',

  // Schema errors
  SCHEMA_DRIFT = 'SCHEMA_DRIFT',
  INVALID_SCHEMA = 'INVALID_SCHEMA',

  // Capability errors
  CAPABILITY_UNSUPPORTED = 'CAPABILITY_UNSUPPORTED',
  UNKNOWN_BACKEND = 'UNKNOWN_BACKEND',

  // Backend errors
  BACKEND_ERROR = 'BACKEND_ERROR',
  BACKEND_UNAVAILABLE = 'BACKEND_UNAVAILABLE',
  ALREADY_EXISTS = 'ALREADY_EXISTS',

  // Configuration errors
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
}

// =============================================================================
// Serialized Error Format
// =============================================================================

/**
 * Serializable error format for status and API responses
 */
export interface SerializedError {
  /** Error class name */
  name: string
  /** Error code for programmatic handling */
  code: ErrorCode
  /** Human-readable error message */
  message: string
  /** Stack trace (included outside production) */
  stack?: string | undefined
  /** Additional context data */
  context?: Record<string, unknown> | undefined
  /** Serialized cause (if error chaining) */
  cause?: SerializedError | undefined
}

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Base error class for all polydal errors.
 *
 * @example
 * ```typescript
 * throw new PolydalError('Operation failed', ErrorCode.INTERNAL, {
 *   operation: 'insert',
 *   collection: 'users'
 * })
 * ```
 */
export class PolydalError extends Error {
  override readonly name: string = 'PolydalError'
  readonly code: ErrorCode
  readonly context: Record<string, unknown>
  override readonly cause?: Error | undefined

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message)
    this.code = code
    this.context = context ?? {}
    this.cause = cause
    Object.setPrototypeOf(this, new.target.prototype)
  }

  /**
   * Serialize error for transmission
   */
  toJSON(): SerializedError {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      stack: process.env.NODE_ENV !== 'production' ? this.stack : undefined,
      context: Object.keys(this.context).length > 0 ? this.context : undefined,
      cause: this.cause instanceof PolydalError ? this.cause.toJSON() : undefined,
    }
  }

  /**
   * Create error from serialized format
   */
  static fromJSON(data: SerializedError): PolydalError {
    const cause = data.cause ? PolydalError.fromJSON(data.cause) : undefined
    const error = new PolydalError(data.message, data.code, data.context, cause)
    if (data.stack) {
      error.stack = data.stack
    }
    return error
  }

  /**
   * Check if error matches a specific code
   */
  is(code: ErrorCode): boolean {
    return this.code === code
  }

  /**
   * Check if error is in a category (e.g., all NOT_FOUND variants)
   */
  isCategory(category: string): boolean {
    return this.code.includes(category)
  }
}

// =============================================================================
// Parse Errors
// =============================================================================

/**
 * Thrown when a filter expression or structured filter input is malformed.
 */
export class FilterParseError extends PolydalError {
  override readonly name = 'FilterParseError'
  readonly token: string
  readonly position: number | undefined

  constructor(message: string, token: string, position?: number, cause?: Error) {
    super(message, ErrorCode.FILTER_PARSE_ERROR, { token, position }, cause)
    this.token = token
    this.position = position
    Object.setPrototypeOf(this, FilterParseError.prototype)
  }
}

/**
 * Thrown when a connection descriptor cannot be parsed.
 */
export class ConnectionStringError extends PolydalError {
  override readonly name = 'ConnectionStringError'

  constructor(message: string, connectionString: string, cause?: Error) {
    super(message, ErrorCode.INVALID_CONNECTION_STRING, { connectionString }, cause)
    Object.setPrototypeOf(this, ConnectionStringError.prototype)
  }
}

// =============================================================================
// Validation Errors
// =============================================================================

/**
 * Context carried by validation errors
 */
export interface ValidationContext {
  collection?: string | undefined
  field?: string | undefined
  expectedType?: string | undefined
  actualType?: string | undefined
  value?: unknown
}

/**
 * Error thrown when a value fails a field's validator, formatter or type rule.
 */
export class ValidationError extends PolydalError {
  override readonly name: string = 'ValidationError'
  readonly field: string | undefined
  readonly collection: string | undefined

  constructor(
    message: string,
    context?: ValidationContext,
    cause?: Error,
    code: ErrorCode = ErrorCode.VALIDATION_FAILED
  ) {
    super(message, code, { ...context }, cause)
    this.field = context?.field
    this.collection = context?.collection
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

/**
 * A required field was missing and had no default.
 */
export class RequiredFieldError extends ValidationError {
  override readonly name = 'RequiredFieldError'

  constructor(field: string, collection?: string) {
    super(`field "${field}" is required`, { field, collection }, undefined, ErrorCode.REQUIRED_FIELD)
    Object.setPrototypeOf(this, RequiredFieldError.prototype)
  }
}

/**
 * A value could not be converted to the field's canonical type.
 */
export class InvalidTypeError extends ValidationError {
  override readonly name = 'InvalidTypeError'
  readonly expectedType: string
  readonly actualType: string

  constructor(expectedType: string, value: unknown, field?: string) {
    const actualType = describeType(value)
    super(
      field
        ? `field "${field}": cannot convert ${actualType} to ${expectedType}`
        : `cannot convert ${actualType} to ${expectedType}`,
      { field, expectedType, actualType, value },
      undefined,
      ErrorCode.INVALID_TYPE
    )
    this.expectedType = expectedType
    this.actualType = actualType
    Object.setPrototypeOf(this, InvalidTypeError.prototype)
  }
}

/**
 * One record failed validation. Carries every field failure of that record;
 * the record is rejected whole.
 */
export class RecordValidationError extends ValidationError {
  override readonly name = 'RecordValidationError'
  readonly errors: ValidationError[]
  readonly recordId: unknown

  constructor(collection: string, recordId: unknown, errors: ValidationError[]) {
    const detail = errors.map(e => e.message).join('; ')
    super(
      `record ${String(recordId ?? '(new)')} in collection "${collection}" is invalid: ${detail}`,
      { collection },
      errors[0],
      ErrorCode.RECORD_VALIDATION_FAILED
    )
    this.errors = errors
    this.recordId = recordId
    Object.setPrototypeOf(this, RecordValidationError.prototype)
  }
}

// =============================================================================
// Not Found Errors
// =============================================================================

/**
 * Error thrown when a requested resource is not found.
 */
export class NotFoundError extends PolydalError {
  override readonly name: string = 'NotFoundError'

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.NOT_FOUND,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message, code, context, cause)
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

/**
 * The named collection does not exist on the backend. Migrate treats this
 * as "create it".
 */
export class CollectionNotFoundError extends NotFoundError {
  override readonly name = 'CollectionNotFoundError'
  readonly collection: string

  constructor(collection: string, cause?: Error) {
    super(`Collection not found: ${collection}`, ErrorCode.COLLECTION_NOT_FOUND, { collection }, cause)
    this.collection = collection
    Object.setPrototypeOf(this, CollectionNotFoundError.prototype)
  }
}

/**
 * The record id does not exist in the collection.
 */
export class RecordNotFoundError extends NotFoundError {
  override readonly name = 'RecordNotFoundError'
  readonly collection: string
  readonly recordId: unknown

  constructor(collection: string, recordId: unknown, cause?: Error) {
    super(
      `Record not found: ${collection}/${String(recordId)}`,
      ErrorCode.RECORD_NOT_FOUND,
      { collection, recordId },
      cause
    )
    this.collection = collection
    this.recordId = recordId
    Object.setPrototypeOf(this, RecordNotFoundError.prototype)
  }
}

/**
 * The field is not declared on the collection.
 */
export class FieldNotFoundError extends NotFoundError {
  override readonly name = 'FieldNotFoundError'
  readonly field: string

  constructor(field: string, collection?: string) {
    super(
      collection ? `Unknown field "${field}" in collection "${collection}"` : `Unknown field "${field}"`,
      ErrorCode.FIELD_NOT_FOUND,
      { field, collection }
    )
    this.field = field
    Object.setPrototypeOf(this, FieldNotFoundError.prototype)
  }
}

// =============================================================================
// Schema Errors
// =============================================================================

/**
 * Minimal shape of a schema delta, kept here to avoid a dependency on the
 * schema module.
 */
export interface DriftEntry {
  name: string
  toString(): string
}

/**
 * The backend's actual schema differs from the desired one. Every delta is
 * reported at once.
 */
export class SchemaDriftError extends PolydalError {
  override readonly name = 'SchemaDriftError'
  readonly collection: string
  readonly deltas: DriftEntry[]

  constructor(collection: string, deltas: DriftEntry[]) {
    const lines = deltas.map(d => `- ${d.toString()}`)
    super(
      [`Actual schema for collection '${collection}' differs from desired schema`, ...lines].join('\n'),
      ErrorCode.SCHEMA_DRIFT,
      { collection, fields: deltas.map(d => d.name) }
    )
    this.collection = collection
    this.deltas = deltas
    Object.setPrototypeOf(this, SchemaDriftError.prototype)
  }
}

/**
 * A collection or field definition is itself invalid.
 */
export class SchemaDefinitionError extends PolydalError {
  override readonly name = 'SchemaDefinitionError'

  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.INVALID_SCHEMA, context)
    Object.setPrototypeOf(this, SchemaDefinitionError.prototype)
  }
}

// =============================================================================
// Capability Errors
// =============================================================================

/**
 * The backend does not offer the requested capability (search, aggregation).
 * Distinct from a query that was attempted and failed.
 */
export class CapabilityUnsupportedError extends PolydalError {
  override readonly name: string = 'CapabilityUnsupportedError'
  readonly capability: string

  constructor(
    capability: string,
    backend: string,
    message?: string,
    code: ErrorCode = ErrorCode.CAPABILITY_UNSUPPORTED
  ) {
    super(message ?? `Backend "${backend}" does not support ${capability}`, code, { capability, backend })
    this.capability = capability
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

/**
 * No backend implementation is registered for a connection scheme.
 */
export class UnknownBackendError extends CapabilityUnsupportedError {
  override readonly name = 'UnknownBackendError'

  constructor(scheme: string) {
    super('backend', scheme, `Unknown backend type "${scheme}"`, ErrorCode.UNKNOWN_BACKEND)
    Object.setPrototypeOf(this, UnknownBackendError.prototype)
  }
}

// =============================================================================
// Backend Errors
// =============================================================================

/**
 * Failure reported by the underlying storage engine.
 */
export class BackendError extends PolydalError {
  override readonly name: string = 'BackendError'

  constructor(
    message: string,
    context?: Record<string, unknown>,
    cause?: Error,
    code: ErrorCode = ErrorCode.BACKEND_ERROR
  ) {
    super(message, code, context, cause)
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

/**
 * The backend is suspended or disconnected.
 */
export class BackendUnavailableError extends BackendError {
  override readonly name = 'BackendUnavailableError'

  constructor(backend: string, operation?: string) {
    super(
      operation ? `Backend "${backend}" is unavailable (${operation})` : `Backend "${backend}" is unavailable`,
      { backend, operation },
      undefined,
      ErrorCode.BACKEND_UNAVAILABLE
    )
    Object.setPrototypeOf(this, BackendUnavailableError.prototype)
  }
}

/**
 * Insert of an id that already exists.
 */
export class RecordExistsError extends BackendError {
  override readonly name = 'RecordExistsError'

  constructor(collection: string, recordId: unknown) {
    super(
      `Record ${collection}/${String(recordId)} already exists`,
      { collection, recordId },
      undefined,
      ErrorCode.ALREADY_EXISTS
    )
    Object.setPrototypeOf(this, RecordExistsError.prototype)
  }
}

/**
 * Creation of a collection that already exists.
 */
export class CollectionExistsError extends BackendError {
  override readonly name = 'CollectionExistsError'

  constructor(collection: string) {
    super(`Collection ${collection} already exists`, { collection }, undefined, ErrorCode.ALREADY_EXISTS)
    Object.setPrototypeOf(this, CollectionExistsError.prototype)
  }
}

// =============================================================================
// Configuration and Timeout Errors
// =============================================================================

/**
 * Error thrown when configuration is invalid.
 */
export class ConfigurationError extends PolydalError {
  override readonly name = 'ConfigurationError'

  constructor(message: string, context?: { key?: string; value?: unknown }) {
    super(message, ErrorCode.CONFIGURATION_ERROR, context)
    Object.setPrototypeOf(this, ConfigurationError.prototype)
  }
}

/**
 * Error thrown when an operation exceeds its caller-supplied deadline.
 */
export class TimeoutError extends PolydalError {
  override readonly name = 'TimeoutError'

  constructor(operation: string, timeoutMs: number) {
    super(`Operation "${operation}" timed out after ${timeoutMs}ms`, ErrorCode.TIMEOUT, { operation, timeoutMs })
    Object.setPrototypeOf(this, TimeoutError.prototype)
  }
}

// =============================================================================
// Type Guards and Helpers
// =============================================================================

export function isPolydalError(error: unknown): error is PolydalError {
  return error instanceof PolydalError
}

export function isNotFoundError(error: unknown): error is NotFoundError {
  return error instanceof NotFoundError
}

export function isCollectionNotFoundError(error: unknown): error is CollectionNotFoundError {
  return error instanceof CollectionNotFoundError
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError
}

/**
 * Normalize an unknown thrown value into an Error
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) return value
  return new Error(String(value))
}

/**
 * Pass polydal errors through unchanged; wrap anything else from an adapter
 * call in a BackendError with the original attached as the cause.
 */
export function wrapBackendError(error: unknown, context?: Record<string, unknown>): PolydalError {
  if (error instanceof PolydalError) return error
  const cause = toError(error)
  return new BackendError(cause.message, context, cause)
}

function describeType(value: unknown): string {
  if (value === null) return 'null'
  if (Array.isArray(value)) return 'array'
  if (value instanceof Date) return 'date'
  if (value instanceof Uint8Array) return 'bytes'
  return typeof value
}

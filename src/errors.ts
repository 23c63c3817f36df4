/**
 * @fileoverview Unified Error Hierarchy for lfs-cas
 *
 * All errors extend from LfsCasError, which provides:
 * - Error codes for programmatic handling
 * - Cause chaining for error context
 * - Consistent serialization
 *
 * @module errors
 *
 * @example
 * ```typescript
 * import { LfsCasError, StorageError } from 'lfs-cas'
 *
 * try {
 *   await store.get(oid)
 * } catch (error) {
 *   if (error instanceof StorageError && error.code === 'NOT_FOUND') {
 *     console.log(`Missing object ${error.oid}`)
 *   }
 * }
 * ```
 */

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Error codes for LfsCasError base class.
 */
export type LfsCasErrorCode =
  | 'UNKNOWN'
  | 'INVALID_ARGUMENT'
  | 'NOT_FOUND'
  | 'INTERNAL'
  | 'TIMEOUT'
  | 'UNAVAILABLE'

/**
 * Base error class for all lfs-cas errors.
 *
 * @description
 * Every error raised by this package carries a `code`, keeps the prototype
 * chain intact for `instanceof` checks, and serializes through `toJSON()`.
 *
 * @example
 * ```typescript
 * try {
 *   await riskyOperation()
 * } catch (cause) {
 *   throw new LfsCasError('Wrapper error', 'INTERNAL', { cause })
 * }
 * ```
 */
export class LfsCasError extends Error {
  /**
   * Error code for programmatic handling.
   */
  readonly code: string

  /**
   * The underlying cause of this error, if any.
   */
  override readonly cause?: unknown

  /**
   * @param message - Human-readable error message
   * @param code - Error code for programmatic handling
   * @param options - Additional options including cause
   */
  constructor(
    message: string,
    code: LfsCasErrorCode | string = 'UNKNOWN',
    options?: { cause?: unknown }
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined)
    this.name = 'LfsCasError'
    this.code = code
    this.cause = options?.cause

    // Maintains proper stack trace for where the error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  /**
   * Serializes the error to a plain object.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
    }
  }

  /**
   * Wraps another error as the cause of a new INTERNAL error.
   */
  static wrap(cause: unknown, message?: string): LfsCasError {
    const msg = message || (cause instanceof Error ? cause.message : String(cause))
    return new LfsCasError(msg, 'INTERNAL', { cause })
  }
}

// =============================================================================
// Storage Errors
// =============================================================================

/**
 * Error codes for storage operations.
 */
export type StorageErrorCode =
  | 'NOT_FOUND'
  | 'HASH_COLLISION'
  | 'CONTENT_MISMATCH'
  | 'READ_ONLY'
  | 'INVALID_ARGUMENT'
  | 'READ_ERROR'
  | 'WRITE_ERROR'

/**
 * Error thrown by the blobstore and content store.
 *
 * @example
 * ```typescript
 * try {
 *   await store.put(oid, size, bytes)
 * } catch (error) {
 *   if (error instanceof StorageError) {
 *     switch (error.code) {
 *       case 'HASH_COLLISION':
 *         console.log(`${error.oid} was first stored with a different size`)
 *         break
 *       case 'READ_ONLY':
 *         console.log(`Refused write of ${error.key}`)
 *         break
 *     }
 *   }
 * }
 * ```
 */
export class StorageError extends LfsCasError {
  declare readonly code: StorageErrorCode

  /**
   * The content hash involved, if applicable.
   */
  readonly oid?: string

  /**
   * The blobstore key involved, if applicable.
   */
  readonly key?: string

  /**
   * The storage operation that failed.
   */
  readonly operation?: string

  constructor(
    message: string,
    code: StorageErrorCode = 'WRITE_ERROR',
    options?: {
      oid?: string
      key?: string
      operation?: string
      cause?: unknown
    }
  ) {
    super(message, code, options)
    this.name = 'StorageError'
    this.oid = options?.oid
    this.key = options?.key
    this.operation = options?.operation
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      oid: this.oid,
      key: this.key,
      operation: this.operation,
    }
  }

  /**
   * Creates a NOT_FOUND error for a content hash.
   */
  static notFound(oid: string): StorageError {
    return new StorageError(`Object not found: ${oid}`, 'NOT_FOUND', { oid, operation: 'get' })
  }

  /**
   * Creates a HASH_COLLISION error: the oid is already stored with another size.
   */
  static hashCollision(oid: string, storedSize: number, suppliedSize: number): StorageError {
    return new StorageError(
      `Hash collision or corruption for ${oid}: stored size ${storedSize}, supplied size ${suppliedSize}`,
      'HASH_COLLISION',
      { oid, operation: 'put' }
    )
  }

  /**
   * Creates a CONTENT_MISMATCH error: the bytes do not match the declared oid or size.
   */
  static contentMismatch(oid: string, reason: string): StorageError {
    return new StorageError(`Content does not match ${oid}: ${reason}`, 'CONTENT_MISMATCH', {
      oid,
      operation: 'put',
    })
  }

  /**
   * Creates a READ_ONLY error for a refused write.
   */
  static readOnly(key: string): StorageError {
    return new StorageError(`Storage is read-only: ReadOnlyPut(${JSON.stringify(key)})`, 'READ_ONLY', {
      key,
      operation: 'put',
    })
  }
}

// =============================================================================
// Protocol Errors
// =============================================================================

/**
 * Error codes for LFS protocol handling.
 */
export type ProtocolErrorCode =
  | 'INVALID_REQUEST'
  | 'UNKNOWN_REPOSITORY'
  | 'PAYLOAD_TOO_LARGE'

/**
 * Error thrown while validating or routing an LFS request.
 */
export class ProtocolError extends LfsCasError {
  declare readonly code: ProtocolErrorCode

  constructor(message: string, code: ProtocolErrorCode = 'INVALID_REQUEST', options?: { cause?: unknown }) {
    super(message, code, options)
    this.name = 'ProtocolError'
  }

  static unknownRepository(repository: string): ProtocolError {
    return new ProtocolError(`Repository does not exist: ${repository}`, 'UNKNOWN_REPOSITORY')
  }

  static payloadTooLarge(size: number, limit: number): ProtocolError {
    return new ProtocolError(`Object size ${size} exceeds the maximum upload size of ${limit}`, 'PAYLOAD_TOO_LARGE')
  }

  static bodyTooLarge(declaredSize: number): ProtocolError {
    return new ProtocolError(`Request body exceeds the declared size of ${declaredSize} bytes`, 'PAYLOAD_TOO_LARGE')
  }
}

// =============================================================================
// Transfer Errors
// =============================================================================

/**
 * Error codes for client-side transfers.
 */
export type TransferErrorCode =
  | 'TIMEOUT'
  | 'HTTP_ERROR'
  | 'NETWORK_ERROR'
  | 'INTEGRITY'

/**
 * Error thrown by the LFS client when a batch, upload or download call fails.
 *
 * @description
 * `retryable` is set for timeouts, network failures and 5xx responses.
 * Uploads are safe to retry with the same oid since the store deduplicates.
 */
export class TransferError extends LfsCasError {
  declare readonly code: TransferErrorCode

  /**
   * HTTP status of the failed response, if one was received.
   */
  readonly status?: number

  /**
   * Whether repeating the request may succeed.
   */
  readonly retryable: boolean

  constructor(
    message: string,
    code: TransferErrorCode = 'HTTP_ERROR',
    options?: { status?: number; retryable?: boolean; cause?: unknown }
  ) {
    super(message, code, options)
    this.name = 'TransferError'
    this.status = options?.status
    this.retryable = options?.retryable ?? false
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      status: this.status,
      retryable: this.retryable,
    }
  }

  static timeout(url: string, timeoutMs: number, cause?: unknown): TransferError {
    return new TransferError(`Transfer to ${url} timed out after ${timeoutMs}ms`, 'TIMEOUT', {
      retryable: true,
      cause,
    })
  }

  static httpStatus(method: string, url: string, status: number, body: string): TransferError {
    const detail = body ? `: ${body}` : ''
    return new TransferError(`${method} ${url} failed with status ${status}${detail}`, 'HTTP_ERROR', {
      status,
      retryable: status >= 500,
    })
  }
}

// =============================================================================
// Configuration Errors
// =============================================================================

/**
 * Error thrown when configuration values are missing or malformed.
 */
export class ConfigError extends LfsCasError {
  /**
   * The configuration key that failed validation.
   */
  readonly field: string

  constructor(field: string, message: string) {
    super(`Invalid configuration for ${field}: ${message}`, 'INVALID_ARGUMENT')
    this.name = 'ConfigError'
    this.field = field
  }
}

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Checks if an error is an LfsCasError.
 */
export function isLfsCasError(error: unknown): error is LfsCasError {
  return error instanceof LfsCasError
}

/**
 * Checks if an error is a StorageError.
 */
export function isStorageError(error: unknown): error is StorageError {
  return error instanceof StorageError
}

/**
 * Checks if an error is a ProtocolError.
 */
export function isProtocolError(error: unknown): error is ProtocolError {
  return error instanceof ProtocolError
}

/**
 * Checks if an error is a TransferError.
 */
export function isTransferError(error: unknown): error is TransferError {
  return error instanceof TransferError
}

/**
 * Checks if an error has a specific code.
 */
export function hasErrorCode<T extends string>(error: unknown, code: T): error is LfsCasError & { code: T } {
  return error instanceof LfsCasError && error.code === code
}

/**
 * @fileoverview Object identifier and size validation
 *
 * LFS objects are identified by the SHA-256 of their content, written as
 * 64 lowercase hexadecimal characters, and carry their exact byte length.
 *
 * @module utils/oid
 *
 * @example
 * ```typescript
 * import { isValidOid, assertValidOid, parseSize } from './utils/oid'
 *
 * if (isValidOid(oid)) {
 *   // 64-char lowercase hex
 * }
 *
 * assertValidOid(oid)             // Throws StorageError('INVALID_ARGUMENT')
 * const size = parseSize('2048')  // 2048, or undefined when malformed
 * ```
 */

import { StorageError } from '../errors'

// ============================================================================
// Constants
// ============================================================================

/**
 * Regular expression for an LFS object id (SHA-256, 64 lowercase hex characters).
 *
 * @example
 * ```typescript
 * OID_PATTERN.test('e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855') // true
 * OID_PATTERN.test('E3B0C442...') // false (uppercase)
 * ```
 */
export const OID_PATTERN = /^[0-9a-f]{64}$/

/**
 * The oid of the empty byte sequence.
 */
export const EMPTY_OID = 'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855'

// ============================================================================
// Validation Functions
// ============================================================================

/**
 * Validate an LFS object id.
 */
export function isValidOid(oid: unknown): oid is string {
  return typeof oid === 'string' && OID_PATTERN.test(oid)
}

/**
 * Validate an object size: a non-negative safe integer.
 */
export function isValidSize(size: unknown): size is number {
  return typeof size === 'number' && Number.isSafeInteger(size) && size >= 0
}

/**
 * Explain why a value is not a valid oid.
 *
 * @returns An error message, or undefined when the oid is valid
 */
export function describeInvalidOid(oid: unknown): string | undefined {
  if (typeof oid !== 'string') {
    return `oid must be a string, got ${typeof oid}`
  }
  if (OID_PATTERN.test(oid)) {
    return undefined
  }
  if (oid.length === 64 && /^[0-9a-fA-F]+$/.test(oid)) {
    return 'oid must be lowercase hexadecimal characters (got uppercase)'
  }
  return `oid must be 64 lowercase hexadecimal characters, got ${JSON.stringify(oid)}`
}

/**
 * Assert that a value is a valid oid.
 *
 * @throws {StorageError} With code INVALID_ARGUMENT when invalid
 */
export function assertValidOid(oid: unknown): asserts oid is string {
  const problem = describeInvalidOid(oid)
  if (problem !== undefined) {
    throw new StorageError(`Invalid oid: ${problem}`, 'INVALID_ARGUMENT')
  }
}

/**
 * Assert that a value is a valid object size.
 *
 * @throws {StorageError} With code INVALID_ARGUMENT when invalid
 */
export function assertValidSize(size: unknown): asserts size is number {
  if (!isValidSize(size)) {
    throw new StorageError(`Invalid size: ${String(size)}`, 'INVALID_ARGUMENT')
  }
}

/**
 * Parse a decimal size taken from a URL path segment.
 *
 * @returns The size, or undefined if the text is not a canonical non-negative integer
 */
export function parseSize(text: string): number | undefined {
  if (!/^(0|[1-9][0-9]*)$/.test(text)) return undefined
  const size = Number(text)
  return Number.isSafeInteger(size) ? size : undefined
}

/**
 * @fileoverview SHA-256 hashing for content addressing
 *
 * @module utils/hash
 *
 * @example
 * ```typescript
 * import { sha256Hex } from './utils/hash'
 *
 * const oid = sha256Hex(new TextEncoder().encode('hello'))
 * // '2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824'
 * ```
 */

import { createHash } from 'node:crypto'

/**
 * Compute the lowercase hex SHA-256 of a byte sequence.
 */
export function sha256Hex(data: Uint8Array | string): string {
  return createHash('sha256').update(data).digest('hex')
}

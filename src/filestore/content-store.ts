/**
 * @fileoverview Content-addressed store.
 *
 * Maps SHA-256 object ids to stored bytes on top of a {@link Blobstore}.
 * Each object occupies two keys:
 *
 * - `content.sha256.<oid>` - the raw bytes
 * - `content_metadata.sha256.<oid>` - `{ oid, size, storedAt }` as JSON
 *
 * The metadata record is written last and is what marks an object as
 * stored. Bytes left behind by an interrupted write, without metadata, do
 * not count and are rewritten by the next put.
 *
 * @module filestore/content-store
 */

import type { Blobstore } from '../blobstore/types'
import { StorageError } from '../errors'
import { KeyedMutex } from '../utils/async-mutex'
import { sha256Hex } from '../utils/hash'
import { noopLogger, type Logger } from '../utils/logger'
import { assertValidOid, assertValidSize } from '../utils/oid'

// ============================================================================
// Types
// ============================================================================

/**
 * Metadata recorded for every stored object.
 */
export interface ContentMetadata {
  oid: string
  size: number
  /** ISO-8601 time of the first successful put */
  storedAt: string
}

/**
 * Outcome of {@link ContentStore.put}.
 */
export interface PutResult {
  oid: string
  size: number
  /** false when the object was already stored and nothing was written */
  created: boolean
}

/**
 * Lifecycle of an object as seen by the store.
 *
 * `unknown` → `uploading` (first put holds the object's lock) → `stored`.
 * Once stored, later puts return immediately and never re-enter `uploading`.
 */
export type ObjectState = 'unknown' | 'uploading' | 'stored'

export interface ContentStoreStats {
  /** Objects physically written */
  puts: number
  /** Puts answered from existing metadata without a write */
  dedupedPuts: number
  /** Successful reads */
  gets: number
}

export interface ContentStoreOptions {
  /** Refuse every put before touching storage */
  readOnly?: boolean
  logger?: Logger
}

// ============================================================================
// Keys
// ============================================================================

/**
 * Blobstore key holding an object's bytes.
 */
export function contentKey(oid: string): string {
  return `content.sha256.${oid}`
}

/**
 * Blobstore key holding an object's metadata.
 */
export function metadataKey(oid: string): string {
  return `content_metadata.sha256.${oid}`
}

const encoder = new TextEncoder()
const decoder = new TextDecoder()

function decodeMetadata(oid: string, bytes: Uint8Array): ContentMetadata {
  let parsed: unknown
  try {
    parsed = JSON.parse(decoder.decode(bytes))
  } catch (error) {
    throw new StorageError(`Metadata for ${oid} is not valid JSON`, 'READ_ERROR', {
      oid,
      key: metadataKey(oid),
      operation: 'getMetadata',
      cause: error,
    })
  }

  if (
    typeof parsed === 'object' &&
    parsed !== null &&
    'oid' in parsed &&
    'size' in parsed &&
    'storedAt' in parsed &&
    parsed.oid === oid &&
    typeof parsed.size === 'number' &&
    typeof parsed.storedAt === 'string'
  ) {
    return { oid, size: parsed.size, storedAt: parsed.storedAt }
  }

  throw new StorageError(`Metadata for ${oid} is malformed`, 'READ_ERROR', {
    oid,
    key: metadataKey(oid),
    operation: 'getMetadata',
  })
}

// ============================================================================
// ContentStore
// ============================================================================

/**
 * Content-addressed, deduplicating store of opaque blobs.
 *
 * @description
 * Puts of the same oid are serialized on a per-oid lock, so concurrent
 * submissions of identical content produce exactly one physical write and
 * every caller sees success. Reads take no lock.
 *
 * @example
 * ```typescript
 * const store = new ContentStore(new MemoryBlobstore())
 * const bytes = new TextEncoder().encode('hello')
 * const oid = sha256Hex(bytes)
 *
 * await store.put(oid, bytes.length, bytes) // { created: true }
 * await store.put(oid, bytes.length, bytes) // { created: false }
 * await store.get(oid)                      // bytes
 * ```
 */
export class ContentStore {
  private locks = new KeyedMutex()
  private readonly readOnly: boolean
  private logger: Logger
  private stats: ContentStoreStats = { puts: 0, dedupedPuts: 0, gets: 0 }

  constructor(
    private readonly blobstore: Blobstore,
    options: ContentStoreOptions = {}
  ) {
    this.readOnly = options.readOnly ?? false
    this.logger = options.logger ?? noopLogger
  }

  /**
   * Store bytes under their oid.
   *
   * @throws {StorageError} INVALID_ARGUMENT for a malformed oid or size
   * @throws {StorageError} READ_ONLY when the store refuses writes
   * @throws {StorageError} HASH_COLLISION when the oid is stored with a different size
   * @throws {StorageError} CONTENT_MISMATCH when the bytes do not hash to the oid or have another length
   */
  async put(oid: string, size: number, bytes: Uint8Array): Promise<PutResult> {
    assertValidOid(oid)
    assertValidSize(size)
    if (this.readOnly) {
      throw StorageError.readOnly(contentKey(oid))
    }

    return this.locks.withLock(oid, async () => {
      const existing = await this.getMetadata(oid)
      if (existing) {
        if (existing.size !== size) {
          throw StorageError.hashCollision(oid, existing.size, size)
        }
        this.stats.dedupedPuts++
        this.logger.debug('Object already stored', { oid, size })
        return { oid, size, created: false }
      }

      if (bytes.byteLength !== size) {
        throw StorageError.contentMismatch(oid, `expected ${size} bytes, got ${bytes.byteLength}`)
      }
      const actual = sha256Hex(bytes)
      if (actual !== oid) {
        throw StorageError.contentMismatch(oid, `content hashes to ${actual}`)
      }

      const metadata: ContentMetadata = { oid, size, storedAt: new Date().toISOString() }
      await this.blobstore.put(contentKey(oid), bytes)
      await this.blobstore.put(metadataKey(oid), encoder.encode(JSON.stringify(metadata)))

      this.stats.puts++
      this.logger.debug('Object stored', { oid, size })
      return { oid, size, created: true }
    })
  }

  /**
   * Fetch the bytes stored under an oid.
   *
   * @throws {StorageError} NOT_FOUND when the oid is not stored
   * @throws {StorageError} READ_ERROR when the stored bytes disagree with their metadata
   */
  async get(oid: string): Promise<Uint8Array> {
    assertValidOid(oid)
    const metadata = await this.getMetadata(oid)
    if (!metadata) {
      throw StorageError.notFound(oid)
    }

    const bytes = await this.blobstore.get(contentKey(oid))
    if (!bytes) {
      throw new StorageError(`Content for ${oid} is missing although its metadata exists`, 'READ_ERROR', {
        oid,
        key: contentKey(oid),
        operation: 'get',
      })
    }
    if (bytes.byteLength !== metadata.size) {
      throw new StorageError(
        `Content for ${oid} has ${bytes.byteLength} bytes, metadata records ${metadata.size}`,
        'READ_ERROR',
        { oid, key: contentKey(oid), operation: 'get' }
      )
    }

    this.stats.gets++
    return bytes
  }

  /**
   * Check whether an oid is stored, without reading its bytes.
   */
  async has(oid: string): Promise<boolean> {
    assertValidOid(oid)
    return this.blobstore.isPresent(metadataKey(oid))
  }

  /**
   * Read an object's metadata.
   *
   * @returns The metadata, or null when the oid is not stored
   */
  async getMetadata(oid: string): Promise<ContentMetadata | null> {
    assertValidOid(oid)
    const bytes = await this.blobstore.get(metadataKey(oid))
    return bytes ? decodeMetadata(oid, bytes) : null
  }

  /**
   * Current lifecycle state of an oid.
   */
  async state(oid: string): Promise<ObjectState> {
    if (await this.has(oid)) return 'stored'
    return this.locks.isLocked(oid) ? 'uploading' : 'unknown'
  }

  getStats(): ContentStoreStats {
    return { ...this.stats }
  }
}

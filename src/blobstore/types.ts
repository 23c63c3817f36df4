/**
 * @fileoverview Blobstore Interface
 *
 * A blobstore is the key-value persistence layer underneath the content
 * store: opaque keys map to opaque byte values. Implementations:
 *
 * - `MemoryBlobstore` - Map-backed, for tests and ephemeral servers
 * - `FileBlobstore` - One file per key under a root directory
 *
 * Decorators layered over any implementation:
 *
 * - `ReadOnlyBlobstore` - Refuses every put
 * - `PrefixBlobstore` - Namespaces keys (one namespace per repository)
 * - `CachingBlobstore` - LRU cache in front of get
 *
 * @module blobstore/types
 */

/**
 * Key-value store for opaque byte blobs.
 */
export interface Blobstore {
  /**
   * Fetch the value stored under a key.
   *
   * @returns The stored bytes, or null if the key is absent
   */
  get(key: string): Promise<Uint8Array | null>

  /**
   * Store a value under a key, replacing any previous value.
   */
  put(key: string, value: Uint8Array): Promise<void>

  /**
   * Check whether a key is present without transferring its value.
   */
  isPresent(key: string): Promise<boolean>
}

/**
 * Counters kept by blobstores that track their own traffic.
 */
export interface BlobstoreStats {
  /** Physical writes performed */
  puts: number
  /** Reads served */
  gets: number
  /** Keys currently stored */
  keys: number
}

/**
 * @fileoverview Blobstore module exports.
 *
 * @module blobstore
 */

export type { Blobstore, BlobstoreStats } from './types'
export { MemoryBlobstore } from './memory'
export { FileBlobstore, type FileBlobstoreOptions } from './file'
export { ReadOnlyBlobstore } from './readonly'
export { PrefixBlobstore, repositoryPrefix } from './prefix'
export { CachingBlobstore } from './cache'
export { LRUCache, type CacheOptions, type CacheStats, type EvictionReason } from './lru-cache'
export { createBlobstore } from './factory'

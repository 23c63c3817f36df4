/**
 * @fileoverview Read-through caching blobstore decorator.
 *
 * @module blobstore/cache
 */

import { copyBytes } from '../utils/bytes'
import { LRUCache, type CacheOptions, type CacheStats } from './lru-cache'
import type { Blobstore } from './types'

/**
 * Blobstore that keeps recently used values in an in-process LRU cache.
 *
 * @description
 * `get` is served from the cache when possible and populates it on a miss.
 * `put` writes through to the inner store first and caches the value only
 * after the write succeeds, so a refused write (for instance by a read-only
 * store below) never leaves a phantom entry. `isPresent` consults the cache
 * before the inner store.
 */
export class CachingBlobstore implements Blobstore {
  private cache: LRUCache

  constructor(
    private readonly inner: Blobstore,
    options: Pick<CacheOptions, 'maxCount' | 'maxBytes'> = {}
  ) {
    this.cache = new LRUCache(options)
  }

  async get(key: string): Promise<Uint8Array | null> {
    const cached = this.cache.get(key)
    if (cached) return copyBytes(cached)

    const value = await this.inner.get(key)
    if (value) {
      this.cache.set(key, copyBytes(value))
    }
    return value
  }

  async put(key: string, value: Uint8Array): Promise<void> {
    await this.inner.put(key, value)
    this.cache.set(key, copyBytes(value))
  }

  async isPresent(key: string): Promise<boolean> {
    if (this.cache.has(key)) return true
    return this.inner.isPresent(key)
  }

  getStats(): CacheStats {
    return this.cache.getStats()
  }
}

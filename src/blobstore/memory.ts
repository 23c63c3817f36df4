/**
 * @fileoverview In-memory blobstore.
 *
 * @module blobstore/memory
 */

import { copyBytes } from '../utils/bytes'
import type { Blobstore, BlobstoreStats } from './types'

/**
 * Map-backed blobstore.
 *
 * @description
 * Values are copied on the way in and on the way out, so callers can never
 * mutate stored bytes. `getStats().puts` counts physical writes, which is
 * what deduplication tests assert on.
 */
export class MemoryBlobstore implements Blobstore {
  private blobs = new Map<string, Uint8Array>()
  private putCount = 0
  private getCount = 0

  async get(key: string): Promise<Uint8Array | null> {
    this.getCount++
    const value = this.blobs.get(key)
    return value ? copyBytes(value) : null
  }

  async put(key: string, value: Uint8Array): Promise<void> {
    this.putCount++
    this.blobs.set(key, copyBytes(value))
  }

  async isPresent(key: string): Promise<boolean> {
    return this.blobs.has(key)
  }

  /**
   * All stored keys, in insertion order.
   */
  keys(): string[] {
    return Array.from(this.blobs.keys())
  }

  getStats(): BlobstoreStats {
    return {
      puts: this.putCount,
      gets: this.getCount,
      keys: this.blobs.size,
    }
  }
}

/**
 * LRU cache for hot blobs, bounded by entry count and total bytes.
 *
 * Recency is the insertion order of the backing Map: a hit re-inserts its
 * key, so the first key is always the least recently used.
 */

export interface CacheOptions {
  /** Maximum number of entries (default unbounded) */
  maxCount?: number
  /** Maximum total value size in bytes (default unbounded) */
  maxBytes?: number
  onEvict?: (key: string, reason: EvictionReason) => void
}

export type EvictionReason = 'lru' | 'manual' | 'clear'

export interface CacheStats {
  hits: number
  misses: number
  count: number
  bytes: number
  evictions: number
  /** Percentage of lookups that hit, rounded (0-100) */
  hitRate: number
}

export class LRUCache {
  private entries = new Map<string, Uint8Array>()
  private totalBytes = 0
  private hits = 0
  private misses = 0
  private evictions = 0

  private readonly maxCount: number
  private readonly maxBytes: number
  private readonly onEvict?: (key: string, reason: EvictionReason) => void

  constructor(options: CacheOptions = {}) {
    this.maxCount = options.maxCount ?? Infinity
    this.maxBytes = options.maxBytes ?? Infinity
    this.onEvict = options.onEvict
  }

  get(key: string): Uint8Array | undefined {
    const value = this.entries.get(key)
    if (value === undefined) {
      this.misses++
      return undefined
    }
    this.entries.delete(key)
    this.entries.set(key, value)
    this.hits++
    return value
  }

  /**
   * @returns false when the value can never fit and was not cached
   */
  set(key: string, value: Uint8Array): boolean {
    if (value.byteLength > this.maxBytes || this.maxCount < 1) {
      return false
    }

    this.remove(key)
    while (
      this.entries.size > 0 &&
      (this.entries.size >= this.maxCount || this.totalBytes + value.byteLength > this.maxBytes)
    ) {
      this.evictOldest()
    }

    this.entries.set(key, value)
    this.totalBytes += value.byteLength
    return true
  }

  /** Does not touch recency. */
  has(key: string): boolean {
    return this.entries.has(key)
  }

  delete(key: string): boolean {
    if (!this.remove(key)) return false
    this.onEvict?.(key, 'manual')
    return true
  }

  clear(): void {
    const keys = [...this.entries.keys()]
    this.entries.clear()
    this.totalBytes = 0
    if (this.onEvict) {
      for (const key of keys) this.onEvict(key, 'clear')
    }
  }

  getStats(): CacheStats {
    const lookups = this.hits + this.misses
    return {
      hits: this.hits,
      misses: this.misses,
      count: this.entries.size,
      bytes: this.totalBytes,
      evictions: this.evictions,
      hitRate: lookups === 0 ? 0 : Math.round((this.hits / lookups) * 100),
    }
  }

  /**
   * Keys from most to least recently used.
   */
  keys(): string[] {
    return [...this.entries.keys()].reverse()
  }

  get size(): number {
    return this.entries.size
  }

  get bytes(): number {
    return this.totalBytes
  }

  private remove(key: string): boolean {
    const value = this.entries.get(key)
    if (value === undefined) return false
    this.entries.delete(key)
    this.totalBytes -= value.byteLength
    return true
  }

  private evictOldest(): void {
    const oldest = this.entries.keys().next()
    if (oldest.done) return
    this.remove(oldest.value)
    this.evictions++
    this.onEvict?.(oldest.value, 'lru')
  }
}

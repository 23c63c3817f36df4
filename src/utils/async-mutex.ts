/**
 * @fileoverview Async mutual exclusion.
 *
 * {@link AsyncMutex} serializes async critical sections in FIFO order.
 * {@link KeyedMutex} hands out one mutex per key, so writers of one content
 * hash queue behind each other while other hashes proceed.
 *
 * Neither is reentrant: acquiring a lock you already hold deadlocks.
 *
 * @module utils/async-mutex
 *
 * @example
 * ```typescript
 * const locks = new KeyedMutex()
 * await locks.withLock(oid, () => writeObject(oid))
 * ```
 */

/**
 * Releases a held lock. Calling it more than once has no effect.
 */
export type ReleaseFn = () => void

export class AsyncMutex {
  private locked = false
  private waiters: Array<(release: ReleaseFn) => void> = []

  /**
   * Wait for the lock. Pair every acquire with a release in a `finally`.
   */
  acquire(): Promise<ReleaseFn> {
    if (!this.locked) {
      this.locked = true
      return Promise.resolve(this.releaser())
    }
    return new Promise<ReleaseFn>((resolve) => {
      this.waiters.push(resolve)
    })
  }

  // Ownership passes straight to the next waiter; the lock only opens
  // when the queue is empty.
  private releaser(): ReleaseFn {
    let released = false
    return () => {
      if (released) return
      released = true

      const next = this.waiters.shift()
      if (next) {
        const handoff = this.releaser()
        queueMicrotask(() => next(handoff))
      } else {
        this.locked = false
      }
    }
  }

  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire()
    try {
      return await fn()
    } finally {
      release()
    }
  }

  isLocked(): boolean {
    return this.locked
  }

  getWaiterCount(): number {
    return this.waiters.length
  }
}

interface KeyedEntry {
  mutex: AsyncMutex
  /** Holder plus waiters */
  refs: number
}

/**
 * Lock table keyed by string. An entry lives only while its key has a
 * holder or waiters.
 */
export class KeyedMutex {
  private entries = new Map<string, KeyedEntry>()

  async acquire(key: string): Promise<ReleaseFn> {
    const entry = this.entries.get(key) ?? { mutex: new AsyncMutex(), refs: 0 }
    this.entries.set(key, entry)
    entry.refs++

    const release = await entry.mutex.acquire()
    let released = false
    return () => {
      if (released) return
      released = true

      release()
      entry.refs--
      if (entry.refs === 0 && this.entries.get(key) === entry) {
        this.entries.delete(key)
      }
    }
  }

  async withLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire(key)
    try {
      return await fn()
    } finally {
      release()
    }
  }

  isLocked(key: string): boolean {
    return this.entries.has(key)
  }

  get size(): number {
    return this.entries.size
  }
}

/**
 * @fileoverview Key-prefixing blobstore decorator.
 *
 * @module blobstore/prefix
 */

import type { Blobstore } from './types'

/**
 * Blobstore that namespaces every key with a fixed prefix.
 *
 * @description
 * Several repositories share one physical store; each sees only its own keys.
 *
 * @example
 * ```typescript
 * const repoStore = new PrefixBlobstore(shared, repositoryPrefix('website'))
 * await repoStore.put('content.sha256.abc', bytes) // stored as 'repo.website.content.sha256.abc'
 * ```
 */
export class PrefixBlobstore implements Blobstore {
  constructor(
    private readonly inner: Blobstore,
    readonly prefix: string
  ) {}

  get(key: string): Promise<Uint8Array | null> {
    return this.inner.get(this.prefix + key)
  }

  put(key: string, value: Uint8Array): Promise<void> {
    return this.inner.put(this.prefix + key, value)
  }

  isPresent(key: string): Promise<boolean> {
    return this.inner.isPresent(this.prefix + key)
  }
}

/**
 * Key prefix used for a repository's namespace.
 */
export function repositoryPrefix(repository: string): string {
  return `repo.${repository}.`
}

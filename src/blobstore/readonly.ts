/**
 * @fileoverview Read-only blobstore decorator.
 *
 * @module blobstore/readonly
 */

import { StorageError } from '../errors'
import type { Blobstore } from './types'

/**
 * Blobstore that refuses writes.
 *
 * @description
 * Reads pass through to the inner store unchanged. Every `put` rejects with a
 * `READ_ONLY` {@link StorageError} naming the key (`ReadOnlyPut("<key>")`)
 * before the inner store is touched.
 */
export class ReadOnlyBlobstore implements Blobstore {
  constructor(private readonly inner: Blobstore) {}

  get(key: string): Promise<Uint8Array | null> {
    return this.inner.get(key)
  }

  async put(key: string, _value: Uint8Array): Promise<void> {
    throw StorageError.readOnly(key)
  }

  isPresent(key: string): Promise<boolean> {
    return this.inner.isPresent(key)
  }
}

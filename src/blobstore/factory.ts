/**
 * @fileoverview Blobstore construction from configuration.
 *
 * @module blobstore/factory
 */

import type { StorageConfig } from '../config'
import { ConfigError } from '../errors'
import { CachingBlobstore } from './cache'
import { FileBlobstore } from './file'
import { MemoryBlobstore } from './memory'
import { ReadOnlyBlobstore } from './readonly'
import type { Blobstore } from './types'

/**
 * Build the shared blobstore described by a storage configuration.
 *
 * @description
 * Layers, innermost first: the backend (`memory` or `file`), the LRU read
 * cache when `cacheMaxBytes > 0`, then the read-only guard when `readOnly`
 * is set. The guard sits outermost so a refused write reaches nothing below.
 *
 * @throws {ConfigError} When the file backend has no path
 */
export function createBlobstore(config: StorageConfig): Blobstore {
  let store: Blobstore
  if (config.kind === 'file') {
    if (!config.path) {
      throw new ConfigError('storage.path', "required when storage kind is 'file'")
    }
    store = new FileBlobstore(config.path, { compress: config.compress })
  } else {
    store = new MemoryBlobstore()
  }

  if (config.cacheMaxBytes > 0) {
    store = new CachingBlobstore(store, { maxBytes: config.cacheMaxBytes })
  }

  if (config.readOnly) {
    store = new ReadOnlyBlobstore(store)
  }

  return store
}

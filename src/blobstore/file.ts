/**
 * @fileoverview Filesystem blobstore.
 *
 * Stores one file per key under a root directory, fanned out over 256
 * subdirectories the same way loose objects are laid out:
 *
 * ```
 * <root>/
 *   3a/content.sha256.3a34c8dc...
 *   9f/content_metadata.sha256.3a34c8dc...
 * ```
 *
 * The fan-out directory is the first byte of the SHA-256 of the key, so
 * keys that share a prefix still spread evenly.
 *
 * @module blobstore/file
 */

import * as fs from 'fs/promises'
import * as path from 'path'
import { randomUUID } from 'node:crypto'
import pako from 'pako'
import { StorageError } from '../errors'
import { sha256Hex } from '../utils/hash'
import type { Blobstore } from './types'

/**
 * Options for {@link FileBlobstore}.
 */
export interface FileBlobstoreOptions {
  /** Deflate values on disk (default: false) */
  compress?: boolean
}

/**
 * Blobstore backed by a directory on the local filesystem.
 *
 * @description
 * Writes go to a temporary file in the target directory and are renamed into
 * place, so a reader never observes a partially written value.
 *
 * @example
 * ```typescript
 * const store = new FileBlobstore('/var/lib/lfs-cas', { compress: true })
 * await store.put('content.sha256.abc…', bytes)
 * ```
 */
export class FileBlobstore implements Blobstore {
  readonly root: string
  private compress: boolean

  constructor(root: string, options: FileBlobstoreOptions = {}) {
    this.root = path.resolve(root)
    this.compress = options.compress ?? false
  }

  /**
   * Absolute path of the file holding a key.
   */
  pathFor(key: string): string {
    return path.join(this.root, sha256Hex(key).slice(0, 2), encodeURIComponent(key))
  }

  async get(key: string): Promise<Uint8Array | null> {
    const filePath = this.pathFor(key)
    let data: Buffer
    try {
      data = await fs.readFile(filePath)
    } catch (error) {
      if (isNotFound(error)) return null
      throw new StorageError(`Failed to read ${key}`, 'READ_ERROR', { key, operation: 'get', cause: error })
    }

    const bytes = new Uint8Array(data.buffer, data.byteOffset, data.byteLength)
    if (!this.compress) return bytes
    try {
      return pako.inflate(bytes)
    } catch (error) {
      throw new StorageError(`Stored value for ${key} is not valid deflate data`, 'READ_ERROR', {
        key,
        operation: 'get',
        cause: error,
      })
    }
  }

  async put(key: string, value: Uint8Array): Promise<void> {
    const filePath = this.pathFor(key)
    const dir = path.dirname(filePath)
    const tmpPath = path.join(dir, `.tmp-${randomUUID()}`)
    const data = this.compress ? pako.deflate(value) : value

    try {
      await fs.mkdir(dir, { recursive: true })
    } catch (error) {
      throw new StorageError(`Failed to write ${key}`, 'WRITE_ERROR', { key, operation: 'put', cause: error })
    }

    try {
      await fs.writeFile(tmpPath, data)
      await fs.rename(tmpPath, filePath)
    } catch (error) {
      await fs.rm(tmpPath, { force: true })
      throw new StorageError(`Failed to write ${key}`, 'WRITE_ERROR', { key, operation: 'put', cause: error })
    }
  }

  async isPresent(key: string): Promise<boolean> {
    try {
      await fs.access(this.pathFor(key))
      return true
    } catch (error) {
      if (isNotFound(error)) return false
      throw new StorageError(`Failed to stat ${key}`, 'READ_ERROR', { key, operation: 'isPresent', cause: error })
    }
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

import { describe, it, expect, afterEach } from 'vitest'
import * as fs from 'fs/promises'
import * as os from 'os'
import * as path from 'path'
import { CachingBlobstore } from '../../src/blobstore/cache'
import { createBlobstore } from '../../src/blobstore/factory'
import { FileBlobstore } from '../../src/blobstore/file'
import { MemoryBlobstore } from '../../src/blobstore/memory'
import { ReadOnlyBlobstore } from '../../src/blobstore/readonly'
import type { StorageConfig } from '../../src/config'
import { ConfigError } from '../../src/errors'

function storage(overrides: Partial<StorageConfig> = {}): StorageConfig {
  return { kind: 'memory', compress: false, readOnly: false, cacheMaxBytes: 0, ...overrides }
}

describe('createBlobstore', () => {
  const dirs: string[] = []

  afterEach(async () => {
    for (const dir of dirs.splice(0)) {
      await fs.rm(dir, { recursive: true, force: true })
    }
  })

  it('should build a memory store by default', () => {
    expect(createBlobstore(storage())).toBeInstanceOf(MemoryBlobstore)
  })

  it('should build a file store rooted at the configured path', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'lfs-cas-factory-'))
    dirs.push(dir)

    const store = createBlobstore(storage({ kind: 'file', path: dir }))

    expect(store).toBeInstanceOf(FileBlobstore)
    expect(store instanceof FileBlobstore && store.root).toBe(path.resolve(dir))
  })

  it('should reject a file store without a path', () => {
    expect(() => createBlobstore(storage({ kind: 'file' }))).toThrow(ConfigError)
  })

  it('should add a read cache when a budget is set', () => {
    expect(createBlobstore(storage({ cacheMaxBytes: 1024 }))).toBeInstanceOf(CachingBlobstore)
  })

  it('should put the read-only guard outermost', async () => {
    const store = createBlobstore(storage({ readOnly: true, cacheMaxBytes: 1024 }))

    expect(store).toBeInstanceOf(ReadOnlyBlobstore)
    await expect(store.put('k', new Uint8Array([1]))).rejects.toMatchObject({ code: 'READ_ONLY' })
    expect(await store.isPresent('k')).toBe(false)
  })
})

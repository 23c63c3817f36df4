import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import * as fs from 'fs/promises'
import * as os from 'os'
import * as path from 'path'
import pako from 'pako'
import { FileBlobstore } from '../../src/blobstore/file'
import { sha256Hex } from '../../src/utils/hash'

const encoder = new TextEncoder()
const decoder = new TextDecoder()

describe('FileBlobstore', () => {
  let root: string

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'lfs-cas-file-'))
  })

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true })
  })

  it('should fan keys out by the first byte of their hash', () => {
    const store = new FileBlobstore(root)
    const key = 'repo.website.content.sha256.abc'

    expect(store.pathFor(key)).toBe(path.join(root, sha256Hex(key).slice(0, 2), key))
  })

  it('should escape path separators in keys', () => {
    const store = new FileBlobstore(root)
    expect(path.basename(store.pathFor('a/b'))).toBe('a%2Fb')
  })

  it('should round-trip values through the filesystem', async () => {
    const store = new FileBlobstore(root)
    await store.put('key', encoder.encode('hello world'))

    const value = await store.get('key')
    expect(value && decoder.decode(value)).toBe('hello world')
    expect(await store.isPresent('key')).toBe(true)

    const onDisk = await fs.readFile(store.pathFor('key'), 'utf8')
    expect(onDisk).toBe('hello world')
  })

  it('should report missing keys as null and absent', async () => {
    const store = new FileBlobstore(root)
    expect(await store.get('nope')).toBeNull()
    expect(await store.isPresent('nope')).toBe(false)
  })

  it('should replace an existing value and leave no temporary files', async () => {
    const store = new FileBlobstore(root)
    await store.put('key', encoder.encode('one'))
    await store.put('key', encoder.encode('two'))

    const value = await store.get('key')
    expect(value && decoder.decode(value)).toBe('two')
    const files = await fs.readdir(path.dirname(store.pathFor('key')))
    expect(files).toEqual([encodeURIComponent('key')])
  })

  it('should deflate values when compression is on', async () => {
    const store = new FileBlobstore(root, { compress: true })
    const content = encoder.encode('A\n'.repeat(1024))
    await store.put('big', content)

    const raw = new Uint8Array(await fs.readFile(store.pathFor('big')))
    expect(raw.byteLength).toBeLessThan(content.byteLength)
    expect(decoder.decode(pako.inflate(raw))).toBe('A\n'.repeat(1024))

    const value = await store.get('big')
    expect(value && decoder.decode(value)).toBe('A\n'.repeat(1024))
  })

  it('should fail with READ_ERROR when a compressed value is corrupt', async () => {
    const store = new FileBlobstore(root, { compress: true })
    const filePath = store.pathFor('bad')
    await fs.mkdir(path.dirname(filePath), { recursive: true })
    await fs.writeFile(filePath, 'not deflate')

    await expect(store.get('bad')).rejects.toMatchObject({ code: 'READ_ERROR', key: 'bad' })
  })

  it('should fail with WRITE_ERROR when the root is not writable as a directory', async () => {
    const blocker = path.join(root, 'blocker')
    await fs.writeFile(blocker, 'x')
    const store = new FileBlobstore(blocker)

    await expect(store.put('key', encoder.encode('v'))).rejects.toMatchObject({
      code: 'WRITE_ERROR',
      message: 'Failed to write key',
    })
  })
})

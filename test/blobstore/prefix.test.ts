import { describe, it, expect } from 'vitest'
import { MemoryBlobstore } from '../../src/blobstore/memory'
import { PrefixBlobstore, repositoryPrefix } from '../../src/blobstore/prefix'

const encoder = new TextEncoder()

describe('PrefixBlobstore', () => {
  it('should build repository prefixes', () => {
    expect(repositoryPrefix('website')).toBe('repo.website.')
  })

  it('should namespace keys in the shared store', async () => {
    const shared = new MemoryBlobstore()
    const store = new PrefixBlobstore(shared, repositoryPrefix('website'))

    await store.put('content.sha256.abc', encoder.encode('x'))

    expect(shared.keys()).toEqual(['repo.website.content.sha256.abc'])
    expect(await store.isPresent('content.sha256.abc')).toBe(true)
  })

  it('should keep repositories apart', async () => {
    const shared = new MemoryBlobstore()
    const a = new PrefixBlobstore(shared, repositoryPrefix('a'))
    const b = new PrefixBlobstore(shared, repositoryPrefix('b'))

    await a.put('k', encoder.encode('from a'))

    expect(await b.get('k')).toBeNull()
    expect(await b.isPresent('k')).toBe(false)
    const value = await a.get('k')
    expect(value && new TextDecoder().decode(value)).toBe('from a')
  })
})

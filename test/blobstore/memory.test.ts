import { describe, it, expect, beforeEach } from 'vitest'
import { MemoryBlobstore } from '../../src/blobstore/memory'

const encoder = new TextEncoder()
const decoder = new TextDecoder()

describe('MemoryBlobstore', () => {
  let store: MemoryBlobstore

  beforeEach(() => {
    store = new MemoryBlobstore()
  })

  it('should round-trip values', async () => {
    await store.put('k', encoder.encode('value'))
    const value = await store.get('k')
    expect(value && decoder.decode(value)).toBe('value')
  })

  it('should return null and false for missing keys', async () => {
    expect(await store.get('missing')).toBeNull()
    expect(await store.isPresent('missing')).toBe(false)
  })

  it('should isolate stored bytes from caller mutation', async () => {
    const input = encoder.encode('abc')
    await store.put('k', input)
    input[0] = 0

    const first = await store.get('k')
    expect(first && decoder.decode(first)).toBe('abc')

    first?.fill(0)
    const second = await store.get('k')
    expect(second && decoder.decode(second)).toBe('abc')
  })

  it('should count puts, gets and keys', async () => {
    await store.put('a', encoder.encode('1'))
    await store.put('a', encoder.encode('2'))
    await store.put('b', encoder.encode('3'))
    await store.get('a')
    await store.get('zzz')

    expect(store.getStats()).toEqual({ puts: 3, gets: 2, keys: 2 })
    expect(store.keys()).toEqual(['a', 'b'])
  })
})

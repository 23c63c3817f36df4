import { describe, it, expect } from 'vitest'
import { concatBytes, copyBytes, toArrayBuffer } from '../../src/utils/bytes'

describe('byte helpers', () => {
  it('toArrayBuffer should copy only the viewed range', () => {
    const backing = new Uint8Array([1, 2, 3, 4, 5])
    const view = backing.subarray(1, 4)

    const buffer = toArrayBuffer(view)

    expect(buffer.byteLength).toBe(3)
    expect(Array.from(new Uint8Array(buffer))).toEqual([2, 3, 4])
  })

  it('copyBytes should detach the copy from the source', () => {
    const source = new Uint8Array([9, 9])
    const copy = copyBytes(source)
    source[0] = 0

    expect(Array.from(copy)).toEqual([9, 9])
  })

  it('concatBytes should join chunks in order', () => {
    const joined = concatBytes([new Uint8Array([1, 2]), new Uint8Array(0), new Uint8Array([3])])

    expect(Array.from(joined)).toEqual([1, 2, 3])
    expect(concatBytes([]).byteLength).toBe(0)
  })
})

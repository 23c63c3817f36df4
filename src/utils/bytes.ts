/**
 * @fileoverview Byte buffer helpers
 *
 * @module utils/bytes
 */

/**
 * Copy bytes into a standalone ArrayBuffer, as accepted by response and request bodies.
 */
export function toArrayBuffer(bytes: Uint8Array): ArrayBuffer {
  const buffer = new ArrayBuffer(bytes.byteLength)
  new Uint8Array(buffer).set(bytes)
  return buffer
}

/**
 * Copy a byte view so later writes to the source do not leak into the copy.
 */
export function copyBytes(bytes: Uint8Array): Uint8Array {
  return new Uint8Array(toArrayBuffer(bytes))
}

/**
 * Join chunks into one contiguous buffer.
 */
export function concatBytes(chunks: Uint8Array[]): Uint8Array {
  const out = new Uint8Array(chunks.reduce((total, chunk) => total + chunk.byteLength, 0))
  let offset = 0
  for (const chunk of chunks) {
    out.set(chunk, offset)
    offset += chunk.byteLength
  }
  return out
}

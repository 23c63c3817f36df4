/**
 * @fileoverview Git LFS pointer files.
 *
 * A pointer file stands in for a large blob inside a repository:
 *
 * ```
 * version https://git-lfs.github.com/spec/v1
 * oid sha256:<64 hex chars>
 * size <bytes>
 * ```
 *
 * @module filestore/pointer
 */

import { sha256Hex } from '../utils/hash'

export const LFS_POINTER_VERSION = 'https://git-lfs.github.com/spec/v1'

/** Pointer files are small; anything larger is real content. */
export const MAX_POINTER_SIZE = 1024

export interface LfsPointer {
  oid: string
  size: number
}

const decoder = new TextDecoder()
const encoder = new TextEncoder()

/**
 * Generate a Git LFS pointer file from OID and size.
 */
export function generatePointer(oid: string, size: number): Uint8Array {
  return encoder.encode(`version ${LFS_POINTER_VERSION}\noid sha256:${oid}\nsize ${size}\n`)
}

/**
 * Generate the pointer file describing a blob.
 */
export function pointerFor(bytes: Uint8Array): { pointer: LfsPointer; file: Uint8Array } {
  const pointer = { oid: sha256Hex(bytes), size: bytes.byteLength }
  return { pointer, file: generatePointer(pointer.oid, pointer.size) }
}

/**
 * Parse a Git LFS pointer file.
 *
 * @returns The parsed pointer, or null if the data is not a valid pointer
 */
export function parsePointer(data: Uint8Array): LfsPointer | null {
  if (data.byteLength > MAX_POINTER_SIZE) return null

  const lines = decoder.decode(data).split('\n')
  if (lines[0] !== `version ${LFS_POINTER_VERSION}`) {
    return null
  }

  let oid: string | undefined
  let size: number | undefined
  for (const line of lines.slice(1)) {
    const oidMatch = /^oid sha256:([0-9a-f]{64})$/.exec(line)
    if (oidMatch) {
      oid = oidMatch[1]
      continue
    }
    const sizeMatch = /^size (0|[1-9][0-9]*)$/.exec(line)
    if (sizeMatch) {
      size = Number(sizeMatch[1])
    }
  }

  if (oid === undefined || size === undefined || !Number.isSafeInteger(size)) {
    return null
  }
  return { oid, size }
}

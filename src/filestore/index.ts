/**
 * @fileoverview Filestore module exports.
 *
 * @module filestore
 */

export {
  ContentStore,
  contentKey,
  metadataKey,
  type ContentMetadata,
  type ContentStoreOptions,
  type ContentStoreStats,
  type ObjectState,
  type PutResult,
} from './content-store'
export {
  generatePointer,
  parsePointer,
  pointerFor,
  LFS_POINTER_VERSION,
  MAX_POINTER_SIZE,
  type LfsPointer,
} from './pointer'

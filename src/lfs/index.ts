/**
 * @fileoverview Git LFS protocol module exports.
 *
 * @module lfs
 */

export * from './protocol'
export { BatchEndpoint, type BatchEndpointOptions } from './batch'
export { UriBuilder } from './uri-builder'

/**
 * @fileoverview lfs-cas - Content-addressed Git LFS server
 *
 * A Git LFS server that stores objects by SHA-256 in a pluggable
 * key-value blobstore, deduplicates uploads and can run read-only.
 *
 * **Architecture Overview**:
 * - **Blobstore**: key-value backends (memory, file) and wrappers
 *   (read-only, prefix, LRU read cache)
 * - **Filestore**: content-addressed put/get with integrity checks
 * - **LFS**: batch API types, validation and negotiation
 * - **Server**: Hono routes, request log, Node listener
 * - **Client**: batch/upload/download over fetch with retries
 *
 * @module lfs-cas
 *
 * @example
 * ```typescript
 * import { loadConfig, startServer, LfsClient } from 'lfs-cas'
 *
 * const server = await startServer(loadConfig(process.env, { port: 0 }))
 * const client = new LfsClient({ baseUrl: server.url, repository: 'repo' })
 * const { oid, size } = await client.upload(new TextEncoder().encode('hello'))
 * await server.close()
 * ```
 */

export * from './errors'
export * from './config'
export * from './blobstore'
export * from './filestore'
export * from './lfs'
export * from './server'
export * from './client'
export { createLogger, noopLogger, parseLogLevel, LogLevel, type Logger, type LogEntry, type LoggerOptions } from './utils/logger'
export { AsyncMutex, KeyedMutex } from './utils/async-mutex'
export { sha256Hex } from './utils/hash'
export { isValidOid, isValidSize, parseSize, EMPTY_OID, OID_PATTERN } from './utils/oid'
export { runCLI, type CLIOptions, type CLIResult } from './cli'

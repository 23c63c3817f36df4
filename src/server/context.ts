/**
 * @fileoverview Server context: configured repositories and shared services.
 *
 * @module server/context
 */

import { createBlobstore } from '../blobstore/factory'
import { PrefixBlobstore, repositoryPrefix } from '../blobstore/prefix'
import type { Blobstore } from '../blobstore/types'
import type { ServerConfig } from '../config'
import { ProtocolError } from '../errors'
import { ContentStore } from '../filestore/content-store'
import { BatchEndpoint } from '../lfs/batch'
import { UriBuilder } from '../lfs/uri-builder'
import { createLogger, type Logger } from '../utils/logger'
import { DEFAULT_REQUEST_LOG_ENTRIES, RequestLog } from './request-log'

/**
 * Per-repository services.
 */
export interface RepositoryContext {
  name: string
  store: ContentStore
  batch: BatchEndpoint
  uris: UriBuilder
}

/**
 * Everything request handlers need.
 */
export interface ServerContext {
  readonly config: ServerConfig
  readonly logger: Logger
  readonly requestLog: RequestLog
  /** The shared blobstore all repositories are namespaced into */
  readonly blobstore: Blobstore
  /**
   * Look up a configured repository.
   *
   * @throws {ProtocolError} UNKNOWN_REPOSITORY
   */
  repository(name: string): RepositoryContext
  repositoryNames(): string[]
}

export interface ServerContextOptions {
  /** Use this blobstore instead of building one from `config.storage` */
  blobstore?: Blobstore
  logger?: Logger
  requestLog?: RequestLog
}

/**
 * Build the server context for a configuration.
 *
 * @example
 * ```typescript
 * const ctx = createServerContext(loadConfig(process.env))
 * const { store } = ctx.repository('repo')
 * ```
 */
export function createServerContext(config: ServerConfig, options: ServerContextOptions = {}): ServerContext {
  const logger = options.logger ?? createLogger({ component: 'lfs-server', minLevel: config.logLevel })
  const blobstore = options.blobstore ?? createBlobstore(config.storage)
  const requestLog = options.requestLog ?? new RequestLog({
    filePath: config.requestLogPath,
    maxEntries: DEFAULT_REQUEST_LOG_ENTRIES,
  })

  const repositories = new Map<string, RepositoryContext>()
  for (const name of config.repositories) {
    const repoLogger = logger.child({ repository: name })
    const store = new ContentStore(new PrefixBlobstore(blobstore, repositoryPrefix(name)), {
      readOnly: config.storage.readOnly,
      logger: repoLogger,
    })
    const uris = new UriBuilder(config.selfUrl, name)
    const batch = new BatchEndpoint(store, uris, {
      maxUploadSize: config.maxUploadSize,
      logger: repoLogger,
    })
    repositories.set(name, { name, store, batch, uris })
  }

  return {
    config,
    logger,
    requestLog,
    blobstore,
    repository(name: string): RepositoryContext {
      const repo = repositories.get(name)
      if (!repo) {
        throw ProtocolError.unknownRepository(name)
      }
      return repo
    },
    repositoryNames(): string[] {
      return Array.from(repositories.keys())
    },
  }
}

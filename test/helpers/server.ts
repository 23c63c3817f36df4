/**
 * In-process server harness: a Hono app over a memory blobstore with a
 * captured logger. Requests go through `app.request`, no socket is opened.
 */

import type { Hono } from 'hono'
import { MemoryBlobstore } from '../../src/blobstore/memory'
import type { Blobstore } from '../../src/blobstore/types'
import { loadConfig, type ConfigOverrides, type ServerConfig } from '../../src/config'
import { createApp, type LfsEnv } from '../../src/server/app'
import { createServerContext, type ServerContext } from '../../src/server/context'
import { createLogger, LogLevel, type LogEntry } from '../../src/utils/logger'

export const SELF_URL = 'http://lfs.test'

export interface TestServer {
  app: Hono<LfsEnv>
  ctx: ServerContext
  config: ServerConfig
  blobstore: Blobstore
  logs: LogEntry[]
}

export function createTestServer(
  overrides: ConfigOverrides = {},
  blobstore: Blobstore = new MemoryBlobstore()
): TestServer {
  const logs: LogEntry[] = []
  const config = loadConfig({}, { selfUrl: SELF_URL, logLevel: LogLevel.DEBUG, ...overrides })
  const logger = createLogger({ component: 'lfs-server', minLevel: config.logLevel, handler: (e) => logs.push(e) })
  const ctx = createServerContext(config, { blobstore, logger })
  return { app: createApp(ctx), ctx, config, blobstore, logs }
}

/**
 * The path and query of an absolute href, for `app.request`.
 */
export function pathOf(href: string): string {
  const url = new URL(href)
  return url.pathname + url.search
}

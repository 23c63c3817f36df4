/**
 * @fileoverview Node HTTP listener for the LFS app.
 *
 * @module server/serve
 */

import { serve, type ServerType } from '@hono/node-server'
import type { ServerConfig } from '../config'
import { createApp } from './app'
import { createServerContext, type ServerContext, type ServerContextOptions } from './context'

/**
 * A running server.
 */
export interface RunningServer {
  /** Address the listener is bound to, e.g. `http://127.0.0.1:8080` */
  url: string
  port: number
  context: ServerContext
  close(): Promise<void>
}

/**
 * Start listening on `config.host:config.port`.
 *
 * Port 0 binds an ephemeral port; the bound port is reported on the result.
 */
export async function startServer(config: ServerConfig, options: ServerContextOptions = {}): Promise<RunningServer> {
  const context = createServerContext(config, options)
  const app = createApp(context)

  let server: ServerType | undefined
  const port = await new Promise<number>((resolve, reject) => {
    server = serve({ fetch: app.fetch, port: config.port, hostname: config.host }, (info) => {
      resolve(info.port)
    })
    server.once('error', reject)
  })

  context.logger.info('Listening', {
    host: config.host,
    port,
    repositories: context.repositoryNames(),
    readOnly: config.storage.readOnly,
  })

  return {
    url: `http://${config.host}:${port}`,
    port,
    context,
    close(): Promise<void> {
      return new Promise((resolve, reject) => {
        if (!server) {
          resolve()
          return
        }
        server.close((error?: Error) => {
          if (error) reject(error)
          else resolve()
        })
      })
    },
  }
}

/**
 * @fileoverview `lfs-cas serve`: run the LFS server until interrupted.
 *
 * Flags override the matching `LFS_CAS_*` environment variables.
 *
 * @module cli/commands/serve
 */

import { loadConfig, type ConfigOverrides } from '../../config'
import { startServer } from '../../server/serve'
import { parseLogLevel } from '../../utils/logger'
import type { CommandContext } from '../index'
import { booleanOption, integerOption, stringOption } from '../options'

/**
 * Translate `serve` flags into configuration overrides.
 */
export function serveOverrides(options: Record<string, unknown>): ConfigOverrides {
  const overrides: ConfigOverrides = {}
  const storage: NonNullable<ConfigOverrides['storage']> = {}

  const host = stringOption(options, 'host')
  if (host !== undefined) overrides.host = host
  const port = integerOption(options, 'port')
  if (port !== undefined) overrides.port = port
  const selfUrl = stringOption(options, 'selfUrl')
  if (selfUrl !== undefined) overrides.selfUrl = selfUrl
  const repositories = stringOption(options, 'repositories')
  if (repositories !== undefined) {
    overrides.repositories = repositories
      .split(',')
      .map((name) => name.trim())
      .filter((name) => name.length > 0)
  }
  const maxUploadSize = integerOption(options, 'maxUploadSize')
  if (maxUploadSize !== undefined) overrides.maxUploadSize = maxUploadSize
  const requestLog = stringOption(options, 'requestLog')
  if (requestLog !== undefined) overrides.requestLogPath = requestLog
  const logLevel = stringOption(options, 'logLevel')
  if (logLevel !== undefined) {
    const level = parseLogLevel(logLevel)
    if (!level) throw new Error(`Unknown log level: ${logLevel}`)
    overrides.logLevel = level
  }

  const kind = stringOption(options, 'storage')
  if (kind !== undefined) {
    if (kind !== 'memory' && kind !== 'file') {
      throw new Error(`--storage expects 'memory' or 'file', got ${kind}`)
    }
    storage.kind = kind
  }
  const storagePath = stringOption(options, 'storagePath')
  if (storagePath !== undefined) storage.path = storagePath
  if (booleanOption(options, 'compress')) storage.compress = true
  if (booleanOption(options, 'readonlyStorage')) storage.readOnly = true
  const cacheMaxBytes = integerOption(options, 'cacheMaxBytes')
  if (cacheMaxBytes !== undefined) storage.cacheMaxBytes = cacheMaxBytes

  if (Object.keys(storage).length > 0) overrides.storage = storage
  return overrides
}

export async function serveCommand(ctx: CommandContext): Promise<void> {
  const config = loadConfig(ctx.env, serveOverrides(ctx.options))
  const server = await startServer(config)
  ctx.stdout(`Listening on ${server.url}`)

  const shutdown = (signal: string): void => {
    server.context.logger.info('Shutting down', { signal })
    server.close().catch((error: unknown) => {
      ctx.stderr(`Error: ${error instanceof Error ? error.message : String(error)}`)
    })
  }
  process.once('SIGINT', shutdown)
  process.once('SIGTERM', shutdown)
}

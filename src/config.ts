/**
 * @fileoverview Server configuration.
 *
 * Configuration is assembled from three layers, later layers winning:
 * built-in defaults, `LFS_CAS_*` environment variables, and explicit
 * overrides (typically parsed CLI flags).
 *
 * @module config
 *
 * @example
 * ```typescript
 * const config = loadConfig(process.env, { port: 9000, storage: { readOnly: true } })
 * ```
 */

import { ConfigError } from './errors'
import { LogLevel, parseLogLevel } from './utils/logger'

// ============================================================================
// Environment Interface
// ============================================================================

/**
 * Environment variables read by {@link loadConfig}.
 */
export interface Env {
  LFS_CAS_HOST?: string
  LFS_CAS_PORT?: string
  /** Base URL written into batch action hrefs */
  LFS_CAS_SELF_URL?: string
  /** Comma-separated repository names */
  LFS_CAS_REPOSITORIES?: string
  LFS_CAS_MAX_UPLOAD_SIZE?: string
  /** 'memory' or 'file' */
  LFS_CAS_STORAGE?: string
  LFS_CAS_STORAGE_PATH?: string
  LFS_CAS_STORAGE_COMPRESS?: string
  LFS_CAS_READONLY_STORAGE?: string
  LFS_CAS_CACHE_MAX_BYTES?: string
  LFS_CAS_REQUEST_LOG?: string
  LFS_CAS_LOG_LEVEL?: string
}

// ============================================================================
// Configuration Types
// ============================================================================

export type StorageKind = 'memory' | 'file'

/**
 * Blobstore configuration.
 */
export interface StorageConfig {
  kind: StorageKind
  /** Root directory for the file backend */
  path?: string
  /** Deflate values written by the file backend */
  compress: boolean
  /** Refuse every write */
  readOnly: boolean
  /** LRU read cache budget; 0 disables the cache */
  cacheMaxBytes: number
}

/**
 * Complete server configuration.
 */
export interface ServerConfig {
  host: string
  port: number
  selfUrl: string
  repositories: string[]
  /** Largest object accepted for upload; undefined means unlimited */
  maxUploadSize?: number
  storage: StorageConfig
  /** JSON-lines file mirroring the request log */
  requestLogPath?: string
  logLevel: LogLevel
}

/**
 * Overrides accepted by {@link loadConfig}.
 */
export type ConfigOverrides = Partial<Omit<ServerConfig, 'storage'>> & {
  storage?: Partial<StorageConfig>
}

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_HOST = '127.0.0.1'
export const DEFAULT_PORT = 8080
export const DEFAULT_REPOSITORY = 'repo'

const REPOSITORY_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/

// ============================================================================
// Parsing helpers
// ============================================================================

function parseInteger(field: string, value: string, min: number): number {
  const trimmed = value.trim()
  if (!/^-?\d+$/.test(trimmed)) {
    throw new ConfigError(field, `expected an integer, got ${JSON.stringify(value)}`)
  }
  const parsed = Number(trimmed)
  if (!Number.isSafeInteger(parsed) || parsed < min) {
    throw new ConfigError(field, `must be an integer >= ${min}, got ${value}`)
  }
  return parsed
}

function parseBoolean(field: string, value: string): boolean {
  switch (value.trim().toLowerCase()) {
    case '1':
    case 'true':
    case 'yes':
    case 'on':
      return true
    case '0':
    case 'false':
    case 'no':
    case 'off':
    case '':
      return false
    default:
      throw new ConfigError(field, `expected a boolean, got ${JSON.stringify(value)}`)
  }
}

function parseStorageKind(value: string): StorageKind {
  const kind = value.trim().toLowerCase()
  if (kind === 'memory' || kind === 'file') return kind
  throw new ConfigError('storage.kind', `expected 'memory' or 'file', got ${JSON.stringify(value)}`)
}

function parseRepositories(value: string): string[] {
  return value
    .split(',')
    .map((name) => name.trim())
    .filter((name) => name.length > 0)
}

// ============================================================================
// Loader
// ============================================================================

/**
 * Build a validated {@link ServerConfig}.
 *
 * @param env - Environment variables (defaults to an empty set, not process.env)
 * @param overrides - Values taking precedence over the environment
 * @throws {ConfigError} When a value is malformed or the combination is invalid
 */
export function loadConfig(env: Env = {}, overrides: ConfigOverrides = {}): ServerConfig {
  const host = overrides.host ?? env.LFS_CAS_HOST ?? DEFAULT_HOST
  const port = overrides.port ?? (env.LFS_CAS_PORT !== undefined ? parseInteger('port', env.LFS_CAS_PORT, 0) : DEFAULT_PORT)
  const selfUrl = overrides.selfUrl ?? env.LFS_CAS_SELF_URL ?? `http://${host}:${port}`

  const repositories =
    overrides.repositories ??
    (env.LFS_CAS_REPOSITORIES !== undefined ? parseRepositories(env.LFS_CAS_REPOSITORIES) : [DEFAULT_REPOSITORY])

  const maxUploadSize =
    overrides.maxUploadSize ??
    (env.LFS_CAS_MAX_UPLOAD_SIZE !== undefined ? parseInteger('maxUploadSize', env.LFS_CAS_MAX_UPLOAD_SIZE, 0) : undefined)

  const storageOverrides = overrides.storage ?? {}
  const storage: StorageConfig = {
    kind: storageOverrides.kind ?? (env.LFS_CAS_STORAGE !== undefined ? parseStorageKind(env.LFS_CAS_STORAGE) : 'memory'),
    path: storageOverrides.path ?? env.LFS_CAS_STORAGE_PATH,
    compress:
      storageOverrides.compress ??
      (env.LFS_CAS_STORAGE_COMPRESS !== undefined ? parseBoolean('storage.compress', env.LFS_CAS_STORAGE_COMPRESS) : false),
    readOnly:
      storageOverrides.readOnly ??
      (env.LFS_CAS_READONLY_STORAGE !== undefined ? parseBoolean('storage.readOnly', env.LFS_CAS_READONLY_STORAGE) : false),
    cacheMaxBytes:
      storageOverrides.cacheMaxBytes ??
      (env.LFS_CAS_CACHE_MAX_BYTES !== undefined ? parseInteger('storage.cacheMaxBytes', env.LFS_CAS_CACHE_MAX_BYTES, 0) : 0),
  }

  let logLevel = overrides.logLevel ?? LogLevel.INFO
  if (overrides.logLevel === undefined && env.LFS_CAS_LOG_LEVEL !== undefined) {
    const parsed = parseLogLevel(env.LFS_CAS_LOG_LEVEL)
    if (!parsed) {
      throw new ConfigError('logLevel', `unknown level ${JSON.stringify(env.LFS_CAS_LOG_LEVEL)}`)
    }
    logLevel = parsed
  }

  const config: ServerConfig = {
    host,
    port,
    selfUrl: selfUrl.replace(/\/+$/, ''),
    repositories,
    maxUploadSize,
    storage,
    requestLogPath: overrides.requestLogPath ?? env.LFS_CAS_REQUEST_LOG,
    logLevel,
  }

  validateConfig(config)
  return config
}

/**
 * Check cross-field constraints of a configuration.
 *
 * @throws {ConfigError}
 */
export function validateConfig(config: ServerConfig): void {
  if (!Number.isInteger(config.port) || config.port < 0 || config.port > 65535) {
    throw new ConfigError('port', `must be between 0 and 65535, got ${config.port}`)
  }
  try {
    const url = new URL(config.selfUrl)
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      throw new ConfigError('selfUrl', `unsupported scheme ${url.protocol}`)
    }
  } catch (error) {
    if (error instanceof ConfigError) throw error
    throw new ConfigError('selfUrl', `not a valid URL: ${JSON.stringify(config.selfUrl)}`)
  }
  if (config.repositories.length === 0) {
    throw new ConfigError('repositories', 'at least one repository is required')
  }
  for (const name of config.repositories) {
    if (!REPOSITORY_NAME_PATTERN.test(name)) {
      throw new ConfigError('repositories', `invalid repository name ${JSON.stringify(name)}`)
    }
  }
  if (new Set(config.repositories).size !== config.repositories.length) {
    throw new ConfigError('repositories', 'repository names must be unique')
  }
  if (config.maxUploadSize !== undefined && (!Number.isSafeInteger(config.maxUploadSize) || config.maxUploadSize < 0)) {
    throw new ConfigError('maxUploadSize', `must be a non-negative integer, got ${config.maxUploadSize}`)
  }
  if (config.storage.kind === 'file' && !config.storage.path) {
    throw new ConfigError('storage.path', "required when storage kind is 'file'")
  }
  if (!Number.isSafeInteger(config.storage.cacheMaxBytes) || config.storage.cacheMaxBytes < 0) {
    throw new ConfigError('storage.cacheMaxBytes', `must be a non-negative integer, got ${config.storage.cacheMaxBytes}`)
  }
}

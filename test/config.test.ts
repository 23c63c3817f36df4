import { describe, it, expect } from 'vitest'
import { loadConfig, validateConfig } from '../src/config'
import { ConfigError } from '../src/errors'
import { LogLevel } from '../src/utils/logger'

describe('loadConfig', () => {
  it('should fall back to defaults', () => {
    expect(loadConfig()).toEqual({
      host: '127.0.0.1',
      port: 8080,
      selfUrl: 'http://127.0.0.1:8080',
      repositories: ['repo'],
      maxUploadSize: undefined,
      storage: { kind: 'memory', path: undefined, compress: false, readOnly: false, cacheMaxBytes: 0 },
      requestLogPath: undefined,
      logLevel: LogLevel.INFO,
    })
  })

  it('should read LFS_CAS_* variables', () => {
    const config = loadConfig({
      LFS_CAS_HOST: '0.0.0.0',
      LFS_CAS_PORT: '9000',
      LFS_CAS_SELF_URL: 'https://lfs.example.com/',
      LFS_CAS_REPOSITORIES: 'website, mobile,,',
      LFS_CAS_MAX_UPLOAD_SIZE: '1048576',
      LFS_CAS_STORAGE: 'FILE',
      LFS_CAS_STORAGE_PATH: '/var/lib/lfs-cas',
      LFS_CAS_STORAGE_COMPRESS: 'yes',
      LFS_CAS_READONLY_STORAGE: 'true',
      LFS_CAS_CACHE_MAX_BYTES: '4096',
      LFS_CAS_REQUEST_LOG: '/var/log/lfs-cas/requests.jsonl',
      LFS_CAS_LOG_LEVEL: 'debug',
    })

    expect(config).toEqual({
      host: '0.0.0.0',
      port: 9000,
      selfUrl: 'https://lfs.example.com',
      repositories: ['website', 'mobile'],
      maxUploadSize: 1048576,
      storage: { kind: 'file', path: '/var/lib/lfs-cas', compress: true, readOnly: true, cacheMaxBytes: 4096 },
      requestLogPath: '/var/log/lfs-cas/requests.jsonl',
      logLevel: LogLevel.DEBUG,
    })
  })

  it('should derive the self URL from host and port', () => {
    expect(loadConfig({ LFS_CAS_PORT: '9090' }).selfUrl).toBe('http://127.0.0.1:9090')
  })

  it('should let overrides win over the environment', () => {
    const config = loadConfig(
      { LFS_CAS_PORT: '9000', LFS_CAS_READONLY_STORAGE: 'false' },
      { port: 7000, storage: { readOnly: true } }
    )

    expect(config.port).toBe(7000)
    expect(config.storage.readOnly).toBe(true)
    expect(config.storage.kind).toBe('memory')
  })

  it('should treat an empty boolean as false', () => {
    expect(loadConfig({ LFS_CAS_READONLY_STORAGE: '' }).storage.readOnly).toBe(false)
  })

  describe('invalid values', () => {
    it('should reject non-numeric and out-of-range numbers', () => {
      expect(() => loadConfig({ LFS_CAS_PORT: 'eighty' })).toThrow(
        'Invalid configuration for port: expected an integer, got "eighty"'
      )
      expect(() => loadConfig({ LFS_CAS_PORT: '70000' })).toThrow(
        'Invalid configuration for port: must be between 0 and 65535, got 70000'
      )
      expect(() => loadConfig({ LFS_CAS_MAX_UPLOAD_SIZE: '-1' })).toThrow(
        'Invalid configuration for maxUploadSize: must be an integer >= 0, got -1'
      )
    })

    it('should reject unknown booleans, storage kinds and log levels', () => {
      expect(() => loadConfig({ LFS_CAS_READONLY_STORAGE: 'maybe' })).toThrow(ConfigError)
      expect(() => loadConfig({ LFS_CAS_STORAGE: 's3' })).toThrow(
        "Invalid configuration for storage.kind: expected 'memory' or 'file', got \"s3\""
      )
      expect(() => loadConfig({ LFS_CAS_LOG_LEVEL: 'loud' })).toThrow(
        'Invalid configuration for logLevel: unknown level "loud"'
      )
    })

    it('should require a path for file storage', () => {
      expect(() => loadConfig({ LFS_CAS_STORAGE: 'file' })).toThrow(
        "Invalid configuration for storage.path: required when storage kind is 'file'"
      )
    })

    it('should validate repository names', () => {
      expect(() => loadConfig({}, { repositories: [] })).toThrow('at least one repository is required')
      expect(() => loadConfig({}, { repositories: ['../etc'] })).toThrow('invalid repository name "../etc"')
      expect(() => loadConfig({}, { repositories: ['a', 'a'] })).toThrow('repository names must be unique')
    })

    it('should validate the self URL', () => {
      expect(() => loadConfig({ LFS_CAS_SELF_URL: 'not a url' })).toThrow(
        'Invalid configuration for selfUrl: not a valid URL: "not a url"'
      )
      expect(() => loadConfig({ LFS_CAS_SELF_URL: 'ftp://lfs.example.com' })).toThrow(
        'Invalid configuration for selfUrl: unsupported scheme ftp:'
      )
    })

    it('should carry the offending field', () => {
      try {
        loadConfig({ LFS_CAS_CACHE_MAX_BYTES: 'lots' })
        expect.unreachable()
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigError)
        expect(error).toMatchObject({ field: 'storage.cacheMaxBytes', code: 'INVALID_ARGUMENT' })
      }
    })
  })

  it('validateConfig should accept a loaded configuration', () => {
    expect(() => validateConfig(loadConfig())).not.toThrow()
  })
})

/**
 * @fileoverview Git LFS client for the batch API and basic transfers.
 *
 * @module client/lfs-client
 *
 * @example
 * ```typescript
 * const client = new LfsClient({ baseUrl: 'http://127.0.0.1:8080', repository: 'repo' })
 * const { oid, size } = await client.upload(bytes)
 * const copy = await client.download(oid, size)
 * ```
 */

import { isTransferError, TransferError } from '../errors'
import {
  LFS_MEDIA_TYPE,
  parseBatchResponse,
  type LfsAction,
  type LfsBatchRequestObject,
  type LfsBatchResponse,
  type LfsBatchResponseObject,
  type LfsOperation,
} from '../lfs/protocol'
import { toArrayBuffer } from '../utils/bytes'
import { sha256Hex } from '../utils/hash'
import { noopLogger, type Logger } from '../utils/logger'

// ============================================================================
// Types
// ============================================================================

/**
 * The subset of `fetch` the client calls.
 */
export type FetchFn = (url: string, init: RequestInit) => Promise<Response>

export interface LfsClientOptions {
  /** Server root, e.g. `http://127.0.0.1:8080` */
  baseUrl: string
  repository: string
  /** Per-request timeout (default: 30000) */
  timeoutMs?: number
  /** Extra attempts after a retryable failure (default: 2) */
  retries?: number
  /** Delay before the first retry, doubled on each further one (default: 200) */
  retryDelayMs?: number
  fetch?: FetchFn
  logger?: Logger
}

export interface UploadResult {
  oid: string
  size: number
  /** False when the server already had the object */
  transferred: boolean
}

const DEFAULT_TIMEOUT_MS = 30000
const DEFAULT_RETRIES = 2
const DEFAULT_RETRY_DELAY_MS = 200

function isTimeout(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'name' in error && error.name === 'TimeoutError'
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

// ============================================================================
// Client
// ============================================================================

/**
 * Client for one repository on an LFS server.
 *
 * @description
 * Every HTTP call runs under `AbortSignal.timeout`. Timeouts, network
 * failures and 5xx responses are retried with exponential backoff; 4xx
 * responses fail immediately. Uploads are safe to repeat since the server
 * deduplicates by oid.
 */
export class LfsClient {
  private readonly baseUrl: string
  private readonly repository: string
  private readonly timeoutMs: number
  private readonly retries: number
  private readonly retryDelayMs: number
  private readonly fetchFn: FetchFn
  private readonly logger: Logger

  constructor(options: LfsClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '')
    this.repository = options.repository
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS
    this.retries = options.retries ?? DEFAULT_RETRIES
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS
    this.fetchFn = options.fetch ?? ((url, init) => fetch(url, init))
    this.logger = options.logger ?? noopLogger
  }

  /**
   * URL of the repository's batch endpoint.
   */
  get batchUrl(): string {
    return `${this.baseUrl}/${encodeURIComponent(this.repository)}/objects/batch`
  }

  /**
   * POST a batch request.
   */
  async batch(operation: LfsOperation, objects: LfsBatchRequestObject[]): Promise<LfsBatchResponse> {
    const body = JSON.stringify({ operation, transfers: ['basic'], objects })
    const response = await this.request('POST', this.batchUrl, {
      headers: { Accept: LFS_MEDIA_TYPE, 'Content-Type': LFS_MEDIA_TYPE },
      body,
    })
    return parseBatchResponse(await response.json())
  }

  /**
   * Upload content unless the server already has it.
   */
  async upload(bytes: Uint8Array): Promise<UploadResult> {
    const oid = sha256Hex(bytes)
    const size = bytes.byteLength
    const object = this.single(await this.batch('upload', [{ oid, size }]), oid)

    const action = object.actions?.upload
    if (!action) {
      this.logger.debug('Server already has object', { oid, size })
      return { oid, size, transferred: false }
    }

    await this.request('PUT', action.href, {
      headers: { ...action.header, 'Content-Type': 'application/octet-stream' },
      body: toArrayBuffer(bytes),
    })
    this.logger.debug('Uploaded object', { oid, size })
    return { oid, size, transferred: true }
  }

  /**
   * Download content and check it against its oid and size.
   *
   * @throws {TransferError} INTEGRITY when the received bytes do not hash to `oid`
   */
  async download(oid: string, size: number): Promise<Uint8Array> {
    const object = this.single(await this.batch('download', [{ oid, size }]), oid)
    const action: LfsAction | undefined = object.actions?.download
    if (!action) {
      throw new TransferError(`Server offered no download action for ${oid}`, 'HTTP_ERROR')
    }

    const response = await this.request('GET', action.href, { headers: { ...action.header } })
    const bytes = new Uint8Array(await response.arrayBuffer())

    if (bytes.byteLength !== size) {
      throw new TransferError(
        `Downloaded ${bytes.byteLength} bytes for ${oid}, expected ${size}`,
        'INTEGRITY'
      )
    }
    const actual = sha256Hex(bytes)
    if (actual !== oid) {
      throw new TransferError(`Downloaded content hashes to ${actual}, expected ${oid}`, 'INTEGRITY')
    }
    return bytes
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private single(response: LfsBatchResponse, oid: string): LfsBatchResponseObject {
    const object = response.objects.find((o) => o.oid === oid)
    if (!object) {
      throw new TransferError(`Batch response did not mention ${oid}`, 'HTTP_ERROR')
    }
    if (object.error) {
      throw new TransferError(`Server rejected ${oid}: ${object.error.message}`, 'HTTP_ERROR', {
        status: object.error.code,
      })
    }
    return object
  }

  private async request(
    method: string,
    url: string,
    init: { headers: Record<string, string>; body?: string | ArrayBuffer }
  ): Promise<Response> {
    let wait = this.retryDelayMs
    for (let attempt = 0; ; attempt++) {
      try {
        return await this.attempt(method, url, init)
      } catch (error) {
        if (!isTransferError(error) || !error.retryable || attempt >= this.retries) {
          throw error
        }
        this.logger.warn('Retrying transfer', { method, url, attempt: attempt + 1, reason: error.message })
        await delay(wait)
        wait *= 2
      }
    }
  }

  private async attempt(
    method: string,
    url: string,
    init: { headers: Record<string, string>; body?: string | ArrayBuffer }
  ): Promise<Response> {
    let response: Response
    try {
      response = await this.fetchFn(url, {
        method,
        headers: init.headers,
        body: init.body,
        signal: AbortSignal.timeout(this.timeoutMs),
      })
    } catch (error) {
      if (isTimeout(error)) {
        throw TransferError.timeout(url, this.timeoutMs, error)
      }
      throw new TransferError(
        `${method} ${url} failed: ${error instanceof Error ? error.message : String(error)}`,
        'NETWORK_ERROR',
        { retryable: true, cause: error }
      )
    }

    if (!response.ok) {
      throw TransferError.httpStatus(method, url, response.status, await readErrorMessage(response))
    }
    return response
  }
}

/**
 * Pull the `message` out of an error body, falling back to the raw text.
 */
async function readErrorMessage(response: Response): Promise<string> {
  const text = await response.text()
  try {
    const parsed: unknown = JSON.parse(text)
    if (typeof parsed === 'object' && parsed !== null && 'message' in parsed && typeof parsed.message === 'string') {
      return parsed.message
    }
    return text
  } catch {
    return text
  }
}

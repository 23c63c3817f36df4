/**
 * @fileoverview LFS HTTP routes.
 *
 * ```
 * GET  /health_check                  liveness probe
 * POST /:repo/objects/batch           batch negotiation
 * PUT  /:repo/upload/:oid/:size       object upload
 * GET  /:repo/download/:oid           object download
 * ```
 *
 * @module server/app
 */

import { randomUUID } from 'node:crypto'
import { Hono, type Context } from 'hono'
import { isProtocolError, isStorageError, LfsCasError, ProtocolError, StorageError } from '../errors'
import { LFS_MEDIA_TYPE, parseBatchRequest } from '../lfs/protocol'
import { concatBytes, toArrayBuffer } from '../utils/bytes'
import { describeInvalidOid, parseSize } from '../utils/oid'
import type { ServerContext } from './context'

// ============================================================================
// Types
// ============================================================================

/**
 * Hono environment for the LFS app.
 */
export type LfsEnv = {
  Variables: {
    requestId: string
  }
}

export type LfsContext = Context<LfsEnv>

/** Body returned by the health check */
export const HEALTH_CHECK_BODY = 'I_AM_ALIVE'

// ============================================================================
// Error mapping
// ============================================================================

type ErrorStatus = 400 | 403 | 404 | 409 | 413 | 422 | 500

/**
 * HTTP status for an error raised while handling a request.
 */
export function statusForError(error: unknown): ErrorStatus {
  if (isStorageError(error)) {
    switch (error.code) {
      case 'NOT_FOUND':
        return 404
      case 'HASH_COLLISION':
        return 409
      case 'CONTENT_MISMATCH':
      case 'INVALID_ARGUMENT':
        return 400
      case 'READ_ONLY':
        return 403
      default:
        return 500
    }
  }
  if (isProtocolError(error)) {
    switch (error.code) {
      case 'UNKNOWN_REPOSITORY':
        return 400
      case 'PAYLOAD_TOO_LARGE':
        return 413
      default:
        return 422
    }
  }
  return 500
}

function errorResponse(c: LfsContext, error: unknown): Response {
  const message = error instanceof LfsCasError ? error.message : 'Internal server error'
  return c.body(JSON.stringify({ message, request_id: c.get('requestId') }), statusForError(error), {
    'Content-Type': LFS_MEDIA_TYPE,
  })
}

// ============================================================================
// Route Handlers
// ============================================================================

/**
 * Batch API: negotiate which objects need transferring.
 */
export async function handleBatch(c: LfsContext, ctx: ServerContext): Promise<Response> {
  const { batch } = ctx.repository(c.req.param('repo') ?? '')

  let body: unknown
  try {
    body = await c.req.json()
  } catch (error) {
    throw new ProtocolError('Request body is not valid JSON', 'INVALID_REQUEST', { cause: error })
  }

  const response = await batch.handle(parseBatchRequest(body))
  return c.body(JSON.stringify(response), 200, { 'Content-Type': LFS_MEDIA_TYPE })
}

/**
 * Upload: store the request body under its oid.
 */
export async function handleUpload(c: LfsContext, ctx: ServerContext): Promise<Response> {
  const { store } = ctx.repository(c.req.param('repo') ?? '')

  const oid = c.req.param('oid') ?? ''
  const problem = describeInvalidOid(oid)
  if (problem !== undefined) {
    throw new StorageError(`Invalid OID: ${problem}`, 'INVALID_ARGUMENT')
  }
  const sizeParam = c.req.param('size') ?? ''
  const size = parseSize(sizeParam)
  if (size === undefined) {
    throw new StorageError(`Invalid size: ${JSON.stringify(sizeParam)}`, 'INVALID_ARGUMENT', { oid })
  }
  const limit = ctx.config.maxUploadSize
  if (limit !== undefined && size > limit) {
    throw ProtocolError.payloadTooLarge(size, limit)
  }

  const bytes = await readUploadBody(c, size)
  const result = await store.put(oid, size, bytes)
  return c.json(result, 200)
}

/**
 * Download: stream back the bytes stored under an oid.
 */
export async function handleDownload(c: LfsContext, ctx: ServerContext): Promise<Response> {
  const { store } = ctx.repository(c.req.param('repo') ?? '')

  const oid = c.req.param('oid') ?? ''
  const problem = describeInvalidOid(oid)
  if (problem !== undefined) {
    throw new StorageError(`Invalid OID: ${problem}`, 'INVALID_ARGUMENT')
  }

  const bytes = await store.get(oid)
  return c.body(toArrayBuffer(bytes), 200, {
    'Content-Type': 'application/octet-stream',
    'Content-Length': String(bytes.byteLength),
    'X-LFS-OID': oid,
  })
}

/**
 * Read the request body, refusing it as soon as it grows past `size` bytes.
 */
async function readUploadBody(c: LfsContext, size: number): Promise<Uint8Array> {
  const contentLength = c.req.header('Content-Length')
  if (contentLength !== undefined && Number(contentLength) > size) {
    throw ProtocolError.bodyTooLarge(size)
  }

  const body = c.req.raw.body
  if (!body) return new Uint8Array(0)

  const reader = body.getReader()
  const chunks: Uint8Array[] = []
  let received = 0
  for (;;) {
    const { done, value } = await reader.read()
    if (done) break
    if (!(value instanceof Uint8Array)) {
      await reader.cancel()
      throw new ProtocolError('Request body is not a byte stream')
    }
    received += value.byteLength
    if (received > size) {
      await reader.cancel()
      throw ProtocolError.bodyTooLarge(size)
    }
    chunks.push(value)
  }
  return concatBytes(chunks)
}

function repositoryFromPath(path: string, ctx: ServerContext): string | undefined {
  const first = path.split('/')[1] ?? ''
  return ctx.repositoryNames().includes(first) ? first : undefined
}

// ============================================================================
// App Setup
// ============================================================================

/**
 * Build the Hono application serving a server context.
 *
 * @example
 * ```typescript
 * const ctx = createServerContext(loadConfig())
 * const app = createApp(ctx)
 * const res = await app.request('/health_check')
 * ```
 */
export function createApp(ctx: ServerContext): Hono<LfsEnv> {
  const app = new Hono<LfsEnv>()

  // Request id, timing, request log and access log line
  app.use('*', async (c, next) => {
    const requestId = randomUUID()
    const started = performance.now()
    c.set('requestId', requestId)
    c.header('X-Request-Id', requestId)

    await next()

    const path = new URL(c.req.url).pathname
    const status = c.res.status
    const durationMs = Math.round((performance.now() - started) * 1000) / 1000
    const repository = repositoryFromPath(path, ctx)
    await ctx.requestLog.append({
      requestId,
      method: c.req.method,
      path,
      status,
      durationMs,
      ...(repository !== undefined && { repository }),
    })
    ctx.logger.info(`${c.req.method} ${path} ${status}`, { requestId, durationMs })
  })

  app.get('/health_check', (c) => c.text(HEALTH_CHECK_BODY))

  app.post('/:repo/objects/batch', (c) => handleBatch(c, ctx))
  app.put('/:repo/upload/:oid/:size', (c) => handleUpload(c, ctx))
  app.get('/:repo/download/:oid', (c) => handleDownload(c, ctx))

  app.notFound((c) =>
    c.body(JSON.stringify({ message: 'Not Found', request_id: c.get('requestId') }), 404, {
      'Content-Type': LFS_MEDIA_TYPE,
    })
  )

  app.onError((error, c) => {
    const status = statusForError(error)
    if (status >= 500) {
      ctx.logger.error('Request failed', error, { requestId: c.get('requestId') })
    } else {
      ctx.logger.debug('Request rejected', { requestId: c.get('requestId'), status, message: error.message })
    }
    return errorResponse(c, error)
  })

  return app
}

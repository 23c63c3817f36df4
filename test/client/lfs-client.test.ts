import { describe, it, expect, beforeEach } from 'vitest'
import { LfsClient, type FetchFn } from '../../src/client/lfs-client'
import { TransferError } from '../../src/errors'
import { A_LINES, A_LINES_OID, B_BLOCK, HELLO, HELLO_OID } from '../helpers/fixtures'
import { createTestServer, SELF_URL, type TestServer } from '../helpers/server'

// ============================================================================
// Helpers
// ============================================================================

function appFetch(server: TestServer): FetchFn {
  return async (url, init) => server.app.request(url, init)
}

function clientFor(fetch: FetchFn, options: { retries?: number; timeoutMs?: number } = {}): LfsClient {
  return new LfsClient({ baseUrl: SELF_URL, repository: 'repo', retryDelayMs: 0, fetch, ...options })
}

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/vnd.git-lfs+json' },
  })
}

function downloadBatch(oid: string, size: number): unknown {
  return {
    transfer: 'basic',
    objects: [{ oid, size, actions: { download: { href: `${SELF_URL}/repo/download/${oid}` } } }],
  }
}

// ============================================================================
// Tests
// ============================================================================

describe('LfsClient', () => {
  describe('against the server app', () => {
    let server: TestServer
    let client: LfsClient

    beforeEach(() => {
      server = createTestServer()
      client = clientFor(appFetch(server))
    })

    it('should upload new content once and skip it afterwards', async () => {
      expect(await client.upload(A_LINES)).toEqual({ oid: A_LINES_OID, size: 2048, transferred: true })
      expect(await client.upload(A_LINES)).toEqual({ oid: A_LINES_OID, size: 2048, transferred: false })

      expect(server.ctx.requestLog.count({ method: 'POST' })).toBe(2)
      expect(server.ctx.requestLog.count({ method: 'PUT' })).toBe(1)
    })

    it('should download and verify uploaded content', async () => {
      await client.upload(HELLO)

      const bytes = await client.download(HELLO_OID, 5)

      expect(new TextDecoder().decode(bytes)).toBe('hello')
    })

    it('should surface a missing object as a non-retryable 404', async () => {
      const attempt = client.download(HELLO_OID, 5)

      await expect(attempt).rejects.toBeInstanceOf(TransferError)
      await expect(client.download(HELLO_OID, 5)).rejects.toMatchObject({
        code: 'HTTP_ERROR',
        status: 404,
        retryable: false,
        message: `GET ${SELF_URL}/repo/download/${HELLO_OID} failed with status 404: Object not found: ${HELLO_OID}`,
      })
      expect(server.ctx.requestLog.count({ method: 'GET' })).toBe(2)
    })

    it('should surface a refused upload on read-only storage', async () => {
      server = createTestServer({ storage: { readOnly: true } })
      client = clientFor(appFetch(server))

      await expect(client.upload(HELLO)).rejects.toMatchObject({
        status: 403,
        message: `PUT ${SELF_URL}/repo/upload/${HELLO_OID}/5 failed with status 403: Storage is read-only: ReadOnlyPut("content.sha256.${HELLO_OID}")`,
      })
    })

    it('should surface a per-object batch error', async () => {
      server = createTestServer({ maxUploadSize: 1024 })
      client = clientFor(appFetch(server))

      await expect(client.upload(A_LINES)).rejects.toMatchObject({
        code: 'HTTP_ERROR',
        status: 413,
        message: `Server rejected ${A_LINES_OID}: Object size 2048 exceeds the maximum upload size of 1024`,
      })
      expect(server.ctx.requestLog.count({ method: 'PUT' })).toBe(0)
    })
  })

  describe('integrity', () => {
    it('should reject bytes that do not hash to the oid', async () => {
      const fetch: FetchFn = async (url) =>
        url.endsWith('/objects/batch') ? json(downloadBatch(HELLO_OID, 5)) : new Response('HELLO')

      await expect(clientFor(fetch).download(HELLO_OID, 5)).rejects.toMatchObject({
        code: 'INTEGRITY',
        message: `Downloaded content hashes to 3733cd977ff8eb18b987357e22ced99f46097f31ecb239e878ae63760e83e4d5, expected ${HELLO_OID}`,
      })
    })

    it('should reject a body of the wrong length', async () => {
      const fetch: FetchFn = async (url) =>
        url.endsWith('/objects/batch') ? json(downloadBatch(HELLO_OID, 5)) : new Response(B_BLOCK)

      await expect(clientFor(fetch).download(HELLO_OID, 5)).rejects.toMatchObject({
        code: 'INTEGRITY',
        message: `Downloaded 100 bytes for ${HELLO_OID}, expected 5`,
      })
    })
  })

  describe('retries', () => {
    it('should retry 5xx responses and then succeed', async () => {
      let calls = 0
      const fetch: FetchFn = async () => {
        calls++
        return calls === 1 ? json({ message: 'busy' }, 503) : json({ objects: [{ oid: HELLO_OID, size: 5 }] })
      }

      const response = await clientFor(fetch, { retries: 2 }).batch('upload', [{ oid: HELLO_OID, size: 5 }])

      expect(calls).toBe(2)
      expect(response.objects).toEqual([{ oid: HELLO_OID, size: 5 }])
    })

    it('should give up after the configured retries', async () => {
      let calls = 0
      const fetch: FetchFn = async () => {
        calls++
        return json({ message: 'busy' }, 503)
      }

      await expect(clientFor(fetch, { retries: 2 }).batch('upload', [{ oid: HELLO_OID, size: 5 }])).rejects.toMatchObject({
        status: 503,
        retryable: true,
      })
      expect(calls).toBe(3)
    })

    it('should not retry 4xx responses', async () => {
      let calls = 0
      const fetch: FetchFn = async () => {
        calls++
        return json({ message: 'bad' }, 422)
      }

      await expect(clientFor(fetch, { retries: 3 }).batch('upload', [{ oid: HELLO_OID, size: 5 }])).rejects.toMatchObject({
        status: 422,
        retryable: false,
        message: `POST ${SELF_URL}/repo/objects/batch failed with status 422: bad`,
      })
      expect(calls).toBe(1)
    })

    it('should turn a stalled request into a retryable TIMEOUT', async () => {
      let calls = 0
      const fetch: FetchFn = (_url, init) => {
        calls++
        return new Promise<Response>((_resolve, reject) => {
          init.signal?.addEventListener('abort', () => reject(init.signal?.reason))
        })
      }

      await expect(
        clientFor(fetch, { retries: 1, timeoutMs: 20 }).batch('download', [{ oid: HELLO_OID, size: 5 }])
      ).rejects.toMatchObject({
        code: 'TIMEOUT',
        retryable: true,
        message: `Transfer to ${SELF_URL}/repo/objects/batch timed out after 20ms`,
      })
      expect(calls).toBe(2)
    })

    it('should treat a rejected fetch as a retryable network error', async () => {
      const fetch: FetchFn = async () => {
        throw new TypeError('fetch failed')
      }

      await expect(clientFor(fetch, { retries: 0 }).batch('upload', [{ oid: HELLO_OID, size: 5 }])).rejects.toMatchObject({
        code: 'NETWORK_ERROR',
        retryable: true,
        message: `POST ${SELF_URL}/repo/objects/batch failed: fetch failed`,
      })
    })
  })
})

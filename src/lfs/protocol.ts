/**
 * @fileoverview Git LFS batch API wire types and request validation.
 *
 * @module lfs/protocol
 */

import { ProtocolError } from '../errors'
import { describeInvalidOid, isValidSize } from '../utils/oid'

// ============================================================================
// Types
// ============================================================================

export type LfsOperation = 'download' | 'upload'

/** Media type of batch requests and responses */
export const LFS_MEDIA_TYPE = 'application/vnd.git-lfs+json'

/** Lifetime advertised for action hrefs, in seconds */
export const ACTION_EXPIRES_IN = 3600

export interface LfsBatchRequestObject {
  oid: string
  size: number
}

export interface LfsBatchRequest {
  operation: LfsOperation
  objects: LfsBatchRequestObject[]
  transfers?: string[]
  ref?: { name: string }
}

export interface LfsAction {
  href: string
  header?: Record<string, string>
  expires_in?: number
}

export interface LfsBatchResponseObject {
  oid: string
  size: number
  authenticated?: boolean
  actions?: {
    download?: LfsAction
    upload?: LfsAction
    verify?: LfsAction
  }
  error?: { code: number; message: string }
}

export interface LfsBatchResponse {
  transfer?: string
  objects: LfsBatchResponseObject[]
}

// ============================================================================
// Validation
// ============================================================================

/**
 * Validate an untrusted batch request body.
 *
 * @throws {ProtocolError} INVALID_REQUEST describing the first problem found
 */
export function parseBatchRequest(body: unknown): LfsBatchRequest {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    throw new ProtocolError('Request body must be a JSON object')
  }

  const operation = 'operation' in body ? body.operation : undefined
  if (operation !== 'download' && operation !== 'upload') {
    throw new ProtocolError(`Invalid operation: ${JSON.stringify(operation ?? null)}`)
  }

  const objects: unknown = 'objects' in body ? body.objects : undefined
  if (!Array.isArray(objects) || objects.length === 0) {
    throw new ProtocolError('Objects array is required and must not be empty')
  }
  const entries: unknown[] = objects

  const parsed: LfsBatchRequestObject[] = []
  for (const [index, entry] of entries.entries()) {
    if (typeof entry !== 'object' || entry === null) {
      throw new ProtocolError(`Invalid object at index ${index}`)
    }
    const oid: unknown = 'oid' in entry ? entry.oid : undefined
    const problem = describeInvalidOid(oid)
    if (problem !== undefined || typeof oid !== 'string') {
      throw new ProtocolError(`Invalid oid at index ${index}: ${problem ?? 'missing'}`)
    }
    const size: unknown = 'size' in entry ? entry.size : undefined
    if (!isValidSize(size)) {
      throw new ProtocolError(`Invalid size at index ${index}: ${JSON.stringify(size ?? null)}`)
    }
    parsed.push({ oid, size })
  }

  const request: LfsBatchRequest = { operation, objects: parsed }

  const transfers: unknown = 'transfers' in body ? body.transfers : undefined
  if (transfers !== undefined) {
    const names: unknown[] = Array.isArray(transfers) ? transfers : []
    if (!Array.isArray(transfers) || !names.every((t): t is string => typeof t === 'string')) {
      throw new ProtocolError('Transfers must be an array of strings')
    }
    const supported = names.filter((t): t is string => typeof t === 'string')
    if (!supported.includes('basic')) {
      throw new ProtocolError(`Unsupported transfers: ${supported.join(', ')} (only 'basic' is available)`)
    }
    request.transfers = supported
  }

  const ref = 'ref' in body ? body.ref : undefined
  if (typeof ref === 'object' && ref !== null && 'name' in ref && typeof ref.name === 'string') {
    request.ref = { name: ref.name }
  }

  return request
}

function parseAction(value: unknown): LfsAction | undefined {
  if (typeof value !== 'object' || value === null) return undefined
  const href: unknown = 'href' in value ? value.href : undefined
  if (typeof href !== 'string') return undefined
  const action: LfsAction = { href }
  const expiresIn: unknown = 'expires_in' in value ? value.expires_in : undefined
  if (typeof expiresIn === 'number') action.expires_in = expiresIn
  const header: unknown = 'header' in value ? value.header : undefined
  if (typeof header === 'object' && header !== null) {
    const headers: Record<string, string> = {}
    for (const [name, v] of Object.entries(header)) {
      if (typeof v === 'string') headers[name] = v
    }
    action.header = headers
  }
  return action
}

/**
 * Validate a batch response received from a server.
 *
 * Unknown fields are dropped; actions without an `href` are ignored.
 *
 * @throws {ProtocolError} INVALID_REQUEST when the shape is unusable
 */
export function parseBatchResponse(body: unknown): LfsBatchResponse {
  if (typeof body !== 'object' || body === null) {
    throw new ProtocolError('Batch response must be a JSON object')
  }
  const objects: unknown = 'objects' in body ? body.objects : undefined
  if (!Array.isArray(objects)) {
    throw new ProtocolError('Batch response is missing the objects array')
  }
  const entries: unknown[] = objects

  const parsed = entries.map((entry, index): LfsBatchResponseObject => {
    if (typeof entry !== 'object' || entry === null) {
      throw new ProtocolError(`Invalid response object at index ${index}`)
    }
    const oid: unknown = 'oid' in entry ? entry.oid : undefined
    const size: unknown = 'size' in entry ? entry.size : undefined
    if (typeof oid !== 'string' || !isValidSize(size)) {
      throw new ProtocolError(`Invalid response object at index ${index}`)
    }
    const result: LfsBatchResponseObject = { oid, size }

    const authenticated: unknown = 'authenticated' in entry ? entry.authenticated : undefined
    if (typeof authenticated === 'boolean') result.authenticated = authenticated

    const actions: unknown = 'actions' in entry ? entry.actions : undefined
    if (typeof actions === 'object' && actions !== null) {
      const upload = parseAction('upload' in actions ? actions.upload : undefined)
      const download = parseAction('download' in actions ? actions.download : undefined)
      const verify = parseAction('verify' in actions ? actions.verify : undefined)
      result.actions = {
        ...(upload && { upload }),
        ...(download && { download }),
        ...(verify && { verify }),
      }
    }

    const error: unknown = 'error' in entry ? entry.error : undefined
    if (typeof error === 'object' && error !== null) {
      const code: unknown = 'code' in error ? error.code : undefined
      const message: unknown = 'message' in error ? error.message : undefined
      result.error = {
        code: typeof code === 'number' ? code : 0,
        message: typeof message === 'string' ? message : 'Unknown error',
      }
    }
    return result
  })

  const transfer: unknown = 'transfer' in body ? body.transfer : undefined
  return {
    ...(typeof transfer === 'string' && { transfer }),
    objects: parsed,
  }
}

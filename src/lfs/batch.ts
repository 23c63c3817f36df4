/**
 * @fileoverview LFS batch negotiation.
 *
 * Decides, per requested object, whether the client has to upload it or
 * may download it, by consulting the content store.
 *
 * @module lfs/batch
 */

import type { ContentStore } from '../filestore/content-store'
import { noopLogger, type Logger } from '../utils/logger'
import {
  ACTION_EXPIRES_IN,
  type LfsBatchRequest,
  type LfsBatchRequestObject,
  type LfsBatchResponse,
  type LfsBatchResponseObject,
} from './protocol'
import type { UriBuilder } from './uri-builder'

export interface BatchEndpointOptions {
  /** Largest object accepted for upload; undefined means unlimited */
  maxUploadSize?: number
  logger?: Logger
}

/**
 * Batch API handler for one repository.
 *
 * @description
 * Objects are handled independently and concurrently; the response lists
 * them in request order.
 *
 * - `upload`: an object already stored with the requested size gets no
 *   actions (nothing to transfer); one stored with another size gets a 409
 *   error; an object over the upload limit gets a 413 error; anything else
 *   gets an `upload` action.
 * - `download`: every object gets a `download` action. Existence is not
 *   checked here; a missing object fails with 404 when it is fetched.
 */
export class BatchEndpoint {
  private logger: Logger
  private maxUploadSize?: number

  constructor(
    private readonly store: ContentStore,
    private readonly uris: UriBuilder,
    options: BatchEndpointOptions = {}
  ) {
    this.maxUploadSize = options.maxUploadSize
    this.logger = options.logger ?? noopLogger
  }

  async handle(request: LfsBatchRequest): Promise<LfsBatchResponse> {
    const objects = await Promise.all(
      request.objects.map((obj) =>
        request.operation === 'upload' ? this.uploadAction(obj) : this.downloadAction(obj)
      )
    )

    this.logger.debug('Batch negotiated', {
      operation: request.operation,
      objects: objects.length,
      transfers: objects.filter((o) => o.actions !== undefined).length,
    })

    return { transfer: 'basic', objects }
  }

  private async uploadAction(obj: LfsBatchRequestObject): Promise<LfsBatchResponseObject> {
    const stored = await this.store.getMetadata(obj.oid)
    if (stored) {
      if (stored.size === obj.size) {
        return { oid: obj.oid, size: obj.size }
      }
      return {
        oid: obj.oid,
        size: obj.size,
        error: {
          code: 409,
          message: `Hash collision or corruption for ${obj.oid}: stored size ${stored.size}, supplied size ${obj.size}`,
        },
      }
    }

    if (this.maxUploadSize !== undefined && obj.size > this.maxUploadSize) {
      return {
        oid: obj.oid,
        size: obj.size,
        error: {
          code: 413,
          message: `Object size ${obj.size} exceeds the maximum upload size of ${this.maxUploadSize}`,
        },
      }
    }

    return {
      oid: obj.oid,
      size: obj.size,
      authenticated: true,
      actions: {
        upload: {
          href: this.uris.uploadUri(obj.oid, obj.size),
          expires_in: ACTION_EXPIRES_IN,
        },
      },
    }
  }

  private async downloadAction(obj: LfsBatchRequestObject): Promise<LfsBatchResponseObject> {
    return {
      oid: obj.oid,
      size: obj.size,
      authenticated: true,
      actions: {
        download: {
          href: this.uris.downloadUri(obj.oid),
          expires_in: ACTION_EXPIRES_IN,
        },
      },
    }
  }
}

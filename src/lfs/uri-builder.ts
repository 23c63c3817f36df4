/**
 * @fileoverview Transfer URL construction.
 *
 * @module lfs/uri-builder
 */

/**
 * Builds the hrefs handed to clients in batch actions.
 *
 * @description
 * Paths are appended to the server's own base URL, keeping any path prefix
 * it carries (`https://host/lfs` → `https://host/lfs/<repo>/upload/...`).
 *
 * @example
 * ```typescript
 * const uris = new UriBuilder('http://127.0.0.1:8080', 'repo')
 * uris.uploadUri(oid, 2048)  // 'http://127.0.0.1:8080/repo/upload/<oid>/2048'
 * uris.downloadUri(oid)      // 'http://127.0.0.1:8080/repo/download/<oid>'
 * ```
 */
export class UriBuilder {
  private readonly base: string

  constructor(
    selfUrl: string,
    readonly repository: string
  ) {
    this.base = selfUrl.replace(/\/+$/, '')
  }

  uploadUri(oid: string, size: number): string {
    return `${this.base}/${encodeURIComponent(this.repository)}/upload/${oid}/${size}`
  }

  downloadUri(oid: string): string {
    return `${this.base}/${encodeURIComponent(this.repository)}/download/${oid}`
  }
}

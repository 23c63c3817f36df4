/**
 * @fileoverview Append-only log of completed HTTP requests.
 *
 * One entry per request, in completion order. Tests assert on it ("one batch
 * call, zero upload calls"); operators can mirror it to a JSON-lines file.
 *
 * @module server/request-log
 */

import * as fs from 'fs/promises'
import * as path from 'path'
import { AsyncMutex } from '../utils/async-mutex'

export interface RequestLogEntry {
  /** 1-based, monotonically increasing across clear() */
  seq: number
  /** ISO-8601 completion time */
  timestamp: string
  requestId: string
  method: string
  path: string
  status: number
  durationMs: number
  repository?: string
}

export type NewRequestLogEntry = Omit<RequestLogEntry, 'seq' | 'timestamp'>

/**
 * Criteria for {@link RequestLog.count} and {@link RequestLog.find}; all given fields must match.
 */
export interface RequestLogFilter {
  method?: string
  status?: number
  repository?: string
  /** Matched against the request path */
  path?: RegExp
}

/** In-memory capacity used by the server unless configured otherwise */
export const DEFAULT_REQUEST_LOG_ENTRIES = 10_000

export interface RequestLogOptions {
  /** Also append every entry as one JSON line to this file */
  filePath?: string
  /** Keep only the newest entries in memory (default unbounded); the file sink keeps everything */
  maxEntries?: number
}

/**
 * In-memory request log with an optional file sink.
 *
 * @description
 * Appends are serialized by a single writer lock, so sequence numbers
 * and file lines come out in the same order.
 */
export class RequestLog {
  private log: RequestLogEntry[] = []
  private nextSeq = 1
  private mutex = new AsyncMutex()
  private readonly filePath?: string
  private readonly maxEntries: number

  constructor(options: RequestLogOptions = {}) {
    this.filePath = options.filePath
    this.maxEntries = options.maxEntries ?? Infinity
  }

  async append(entry: NewRequestLogEntry): Promise<RequestLogEntry> {
    return this.mutex.withLock(async () => {
      const recorded: RequestLogEntry = {
        seq: this.nextSeq,
        timestamp: new Date().toISOString(),
        ...entry,
      }
      if (this.filePath) {
        await fs.mkdir(path.dirname(this.filePath), { recursive: true })
        await fs.appendFile(this.filePath, JSON.stringify(recorded) + '\n', 'utf8')
      }
      this.log.push(recorded)
      if (this.log.length > this.maxEntries) {
        this.log.splice(0, this.log.length - this.maxEntries)
      }
      this.nextSeq++
      return recorded
    })
  }

  /** Most entries kept in memory */
  get capacity(): number {
    return this.maxEntries
  }

  entries(): RequestLogEntry[] {
    return this.log.slice()
  }

  find(filter: RequestLogFilter = {}): RequestLogEntry[] {
    return this.log.filter(
      (entry) =>
        (filter.method === undefined || entry.method === filter.method) &&
        (filter.status === undefined || entry.status === filter.status) &&
        (filter.repository === undefined || entry.repository === filter.repository) &&
        (filter.path === undefined || filter.path.test(entry.path))
    )
  }

  count(filter: RequestLogFilter = {}): number {
    return this.find(filter).length
  }

  /**
   * Forget in-memory entries. The file sink, if any, is left as is.
   */
  clear(): void {
    this.log = []
  }
}

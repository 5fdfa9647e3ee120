import * as http from 'node:http'
import * as https from 'node:https'
import type { z } from 'zod'
import {
  decode,
  sessionListSchema,
  sessionSchema,
  statementSchema,
} from './schemas'
import type { LivySession, LivySessionSummary, LivyStatement } from './schemas'
import type { CreateSessionRequest, CreateStatementRequest } from './types'
import { LivyApiError, ProtocolDecodeError } from './types'

/** Produces the per-request headers (typically Authorization from the TokenCache). */
export type HeaderProvider = () => Promise<Readonly<Record<string, string>>>

// ─── HTTP Helper ──────────────────────────────────────────────────────────────

interface RequestOptions {
  readonly method: string
  readonly url: string
  readonly body?: unknown
  readonly signal?: AbortSignal
  readonly headers: HeaderProvider
  readonly timeoutMs?: number
}

async function request(opts: RequestOptions): Promise<unknown> {
  const extraHeaders = await opts.headers()

  return new Promise<unknown>((resolve, reject) => {
    if (opts.signal?.aborted) {
      reject(new Error('Request aborted'))
      return
    }

    const url = new URL(opts.url)
    const isHttps = url.protocol === 'https:'
    const bodyJson = opts.body !== undefined ? JSON.stringify(opts.body) : undefined

    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      Accept: 'application/json',
      ...extraHeaders,
    }

    if (bodyJson !== undefined) {
      headers['Content-Length'] = Buffer.byteLength(bodyJson).toString()
    }

    const reqOptions: http.RequestOptions = {
      hostname: url.hostname,
      port: url.port || (isHttps ? 443 : 80),
      path: url.pathname + url.search,
      method: opts.method,
      headers,
    }

    const transport = isHttps ? https : http

    const onAbort = (): void => {
      req.destroy(new Error('Request aborted'))
    }

    const req = transport.request(reqOptions, (res) => {
      const chunks: Buffer[] = []

      res.on('data', (chunk: Buffer) => chunks.push(chunk))
      res.on('end', () => {
        opts.signal?.removeEventListener('abort', onAbort)
        const rawBody = Buffer.concat(chunks).toString('utf8')
        const statusCode = res.statusCode ?? 0

        if (statusCode < 200 || statusCode >= 300) {
          reject(new LivyApiError(statusCode, rawBody))
          return
        }

        // 204 No Content or empty body
        if (!rawBody.trim()) {
          resolve(undefined)
          return
        }

        try {
          resolve(JSON.parse(rawBody))
        } catch (err) {
          reject(
            new ProtocolDecodeError(
              `Failed to parse response JSON from ${opts.method} ${url.pathname}: ${rawBody.substring(0, 200)}`,
              { cause: err }
            )
          )
        }
      })
    })

    req.on('error', (err) => {
      opts.signal?.removeEventListener('abort', onAbort)
      reject(err)
    })

    if (opts.timeoutMs !== undefined) {
      req.setTimeout(opts.timeoutMs, () => {
        req.destroy(new Error(`Request timed out after ${opts.timeoutMs} ms`))
      })
    }

    opts.signal?.addEventListener('abort', onAbort, { once: true })

    if (bodyJson !== undefined) {
      req.write(bodyJson)
    }

    req.end()
  })
}

// ─── Livy API ─────────────────────────────────────────────────────────────────

/** The subset of the Livy REST surface the driver consumes. */
export interface LivyApi {
  readonly baseUrl: string
  listSessions(signal?: AbortSignal): Promise<readonly LivySessionSummary[]>
  createSession(req: CreateSessionRequest, signal?: AbortSignal): Promise<LivySession>
  getSession(id: string, signal?: AbortSignal): Promise<LivySession>
  deleteSession(id: string, signal?: AbortSignal): Promise<void>
  createStatement(
    sessionId: string,
    req: CreateStatementRequest,
    signal?: AbortSignal
  ): Promise<LivyStatement>
  getStatement(sessionId: string, statementId: number, signal?: AbortSignal): Promise<LivyStatement>
  cancelStatement(sessionId: string, statementId: number, signal?: AbortSignal): Promise<void>
}

// ─── Livy Client ──────────────────────────────────────────────────────────────

export interface LivyClientConfig {
  readonly baseUrl: string
  readonly headers: HeaderProvider
  readonly requestTimeoutMs?: number
}

export class LivyClient implements LivyApi {
  readonly baseUrl: string
  private readonly headers: HeaderProvider
  private readonly requestTimeoutMs: number | undefined

  constructor(config: LivyClientConfig) {
    // Normalise: strip trailing slash
    this.baseUrl = config.baseUrl.replace(/\/+$/, '')
    this.headers = config.headers
    this.requestTimeoutMs = config.requestTimeoutMs
  }

  private opts(
    method: string,
    path: string,
    body?: unknown,
    signal?: AbortSignal
  ): RequestOptions {
    return {
      method,
      url: `${this.baseUrl}${path}`,
      body,
      signal,
      headers: this.headers,
      timeoutMs: this.requestTimeoutMs,
    }
  }

  private async fetch<S extends z.ZodTypeAny>(
    schema: S,
    what: string,
    opts: RequestOptions
  ): Promise<z.output<S>> {
    return decode(schema, await request(opts), what)
  }

  // ─── Sessions ───────────────────────────────────────────────────────────────

  async listSessions(signal?: AbortSignal): Promise<readonly LivySessionSummary[]> {
    const res = await this.fetch(
      sessionListSchema,
      'session list',
      this.opts('GET', '/sessions', undefined, signal)
    )
    return res.items
  }

  async createSession(config: CreateSessionRequest, signal?: AbortSignal): Promise<LivySession> {
    return this.fetch(sessionSchema, 'create session', this.opts('POST', '/sessions', config, signal))
  }

  async getSession(id: string, signal?: AbortSignal): Promise<LivySession> {
    return this.fetch(
      sessionSchema,
      'session',
      this.opts('GET', `/sessions/${encodeURIComponent(id)}`, undefined, signal)
    )
  }

  async deleteSession(id: string, signal?: AbortSignal): Promise<void> {
    await request(this.opts('DELETE', `/sessions/${encodeURIComponent(id)}`, undefined, signal))
  }

  // ─── Statements ─────────────────────────────────────────────────────────────

  async createStatement(
    sessionId: string,
    req: CreateStatementRequest,
    signal?: AbortSignal
  ): Promise<LivyStatement> {
    return this.fetch(
      statementSchema,
      'submit statement',
      this.opts('POST', `/sessions/${encodeURIComponent(sessionId)}/statements`, req, signal)
    )
  }

  async getStatement(
    sessionId: string,
    statementId: number,
    signal?: AbortSignal
  ): Promise<LivyStatement> {
    return this.fetch(
      statementSchema,
      'statement',
      this.opts(
        'GET',
        `/sessions/${encodeURIComponent(sessionId)}/statements/${statementId}`,
        undefined,
        signal
      )
    )
  }

  async cancelStatement(
    sessionId: string,
    statementId: number,
    signal?: AbortSignal
  ): Promise<void> {
    await request(
      this.opts(
        'POST',
        `/sessions/${encodeURIComponent(sessionId)}/statements/${statementId}/cancel`,
        {},
        signal
      )
    )
  }
}

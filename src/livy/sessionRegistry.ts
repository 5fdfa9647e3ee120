import { Mutex } from 'async-mutex'
import type { LivyCredentials } from '../config'
import { Logger } from '../logging'
import { TokenCache } from './auth'
import type { AuthHeaders } from './auth'
import { LivyClient } from './client'
import type { LivyApi } from './client'
import { LivyConnection } from './connection'
import type { Sleep } from './poll'
import { SessionClient } from './sessionClient'
import { StatementExecutor } from './statementExecutor'
import type { SessionProvider } from './statementExecutor'
import type { CreateSessionRequest, LivyTimings } from './types'
import { DEFAULT_TIMINGS } from './types'

const logger = new Logger('registry')

// ─── Shortcuts ────────────────────────────────────────────────────────────────

export interface ShortcutRequest {
  readonly token: string
  readonly workspaceId: string
  readonly lakehouseId: string
  readonly configPath: string
}

/** Links external data into the lakehouse once, right after a session is first acquired. */
export interface ShortcutProvisioner {
  createShortcuts(request: ShortcutRequest): Promise<void>
}

// ─── Session Registry ─────────────────────────────────────────────────────────

export interface SessionRegistryOptions {
  readonly credentials: LivyCredentials
  readonly timings?: Partial<LivyTimings>
  readonly tokenCache?: TokenCache
  /** Override the HTTP channel; defaults to a LivyClient on the lakehouse endpoint. */
  readonly client?: LivyApi
  readonly shortcuts?: ShortcutProvisioner
  readonly sleep?: Sleep
  readonly now?: () => number
}

/**
 * Owns the one Livy session shared by every connection built from it.
 * Construct one per process and pass it to whoever needs a connection.
 */
export class SessionRegistry implements SessionProvider {
  readonly credentials: LivyCredentials
  readonly tokenCache: TokenCache
  readonly client: LivyApi
  readonly executor: StatementExecutor

  private readonly timings: LivyTimings
  private readonly shortcuts: ShortcutProvisioner | undefined
  private readonly sleep: Sleep | undefined
  private readonly now: (() => number) | undefined
  private readonly mutex = new Mutex()
  private session: SessionClient | null = null

  constructor(opts: SessionRegistryOptions) {
    this.credentials = opts.credentials
    this.timings = { ...DEFAULT_TIMINGS, ...opts.timings }
    this.tokenCache = opts.tokenCache ?? new TokenCache()
    this.shortcuts = opts.shortcuts
    this.sleep = opts.sleep
    this.now = opts.now
    this.client =
      opts.client ??
      new LivyClient({
        baseUrl: opts.credentials.lakehouseEndpoint,
        headers: () => this.headers(),
        requestTimeoutMs: this.timings.requestTimeoutMs,
      })
    this.executor = new StatementExecutor({
      client: this.client,
      session: this,
      statementPollIntervalMs: this.timings.statementPollIntervalMs,
      executeRetries: this.timings.executeRetries,
      executeRetryWaitMs: this.timings.executeRetryWaitMs,
      pollTimeoutMs: this.timings.pollTimeoutMs,
      sleep: this.sleep,
      now: this.now,
    })
  }

  get endpoint(): string {
    return this.client.baseUrl
  }

  get sessionId(): string | null {
    return this.session?.sessionId ?? null
  }

  headers(): Promise<AuthHeaders> {
    return this.tokenCache.getHeaders(this.credentials)
  }

  // ─── Connect / Disconnect ───────────────────────────────────────────────────

  /** Reuse the shared session when it is still usable, otherwise start a new one. */
  async connect(signal?: AbortSignal): Promise<LivyConnection> {
    await this.mutex.runExclusive(() => this.acquire(signal))
    return new LivyConnection(this)
  }

  /** Tear down the shared session unless the credentials ask to keep it. Never throws. */
  async disconnect(): Promise<void> {
    await this.mutex.runExclusive(async () => {
      const session = this.session
      if (session === null) return

      if (this.credentials.keepSession) {
        logger.debug(`Keeping Livy session ${session.sessionId ?? '(none)'} alive`)
        return
      }

      try {
        if ((await session.isValid()) && (await session.delete())) {
          session.needsNewSession = true
        }
      } catch (err) {
        logger.error(`Unable to check Livy session before teardown: ${String(err)}`)
      }
    })
  }

  async ensureSession(signal?: AbortSignal): Promise<string> {
    return this.mutex.runExclusive(async () => {
      const session = this.session
      if (session !== null && !session.needsNewSession && session.sessionId !== null) {
        return session.sessionId
      }
      return this.acquire(signal)
    })
  }

  // ─── Private Helpers ────────────────────────────────────────────────────────

  private sessionRequest(): CreateSessionRequest {
    return {
      kind: 'sql',
      conf: this.credentials.sessionParameters,
      name: this.credentials.sessionName,
    }
  }

  /** Caller holds the mutex. */
  private async acquire(signal?: AbortSignal): Promise<string> {
    const request = this.sessionRequest()

    if (this.session === null) {
      const session = new SessionClient({
        client: this.client,
        sessionName: this.credentials.sessionName,
        sessionPollIntervalMs: this.timings.sessionPollIntervalMs,
        pollTimeoutMs: this.timings.pollTimeoutMs,
        sleep: this.sleep,
        now: this.now,
      })
      const id = await session.getOrCreate(request, signal)
      this.session = session
      await this.provisionShortcuts()
      return id
    }

    const session = this.session
    if (!(await session.isValid(signal))) {
      logger.info(`Livy session ${session.sessionId ?? '(none)'} is no longer usable, replacing it`)
      await session.delete()
      return session.create(request, signal)
    }

    if (session.needsNewSession) {
      return session.create(request, signal)
    }

    logger.debug(`Reusing session: ${session.sessionId ?? '(none)'}`)
    return session.sessionId ?? session.create(request, signal)
  }

  private async provisionShortcuts(): Promise<void> {
    const configPath = this.credentials.shortcutsJsonPath
    if (!configPath) return

    const { workspaceId, lakehouseId } = this.credentials
    if (this.shortcuts === undefined || !workspaceId || !lakehouseId) {
      logger.warn(
        `Shortcuts file ${configPath} configured but no provisioner, workspaceId or lakehouseId available; skipping`
      )
      return
    }

    try {
      const token = await this.tokenCache.getToken(this.credentials)
      await this.shortcuts.createShortcuts({
        token: token.token,
        workspaceId,
        lakehouseId,
        configPath,
      })
      logger.info(`Shortcuts from ${configPath} provisioned`)
    } catch (err) {
      logger.error(`Shortcut provisioning from ${configPath} failed: ${String(err)}`)
    }
  }
}

import { Logger } from '../logging'
import type { LivyApi } from './client'
import { delay, PollDeadline, throwIfAborted } from './poll'
import type { Sleep } from './poll'
import type { LivySession } from './schemas'
import type { CreateSessionRequest } from './types'
import {
  ConnectionError,
  DEFAULT_TIMINGS,
  INVALID_SESSION_STATES,
  LivyApiError,
  ProtocolDecodeError,
  STARTING_SESSION_STATES,
} from './types'

const logger = new Logger('session')

// ─── Helpers ──────────────────────────────────────────────────────────────────

/**
 * Fabric reports a coarse top-level `state` and the underlying Livy state in
 * `livyInfo.currentState`; the latter wins once the session has left startup.
 */
export function effectiveState(session: LivySession): string {
  if (STARTING_SESSION_STATES.has(session.state)) return session.state
  return session.livyInfo?.currentState ?? session.state
}

type WaitOutcome = { readonly ready: true } | { readonly ready: false; readonly state: string }

// ─── Session Client ───────────────────────────────────────────────────────────

export interface SessionClientOptions {
  readonly client: LivyApi
  readonly sessionName?: string
  readonly sessionPollIntervalMs?: number
  readonly pollTimeoutMs?: number
  readonly sleep?: Sleep
  readonly now?: () => number
}

/** Lifecycle of one remote Livy session: find-or-create, validity, teardown. */
export class SessionClient {
  private readonly client: LivyApi
  private readonly sessionName: string | undefined
  private readonly pollIntervalMs: number
  private readonly pollTimeoutMs: number | undefined
  private readonly sleep: Sleep
  private readonly now: () => number

  private _sessionId: string | null = null

  /** Set until a session has been created or adopted, and again after teardown. */
  needsNewSession = true

  constructor(opts: SessionClientOptions) {
    this.client = opts.client
    this.sessionName = opts.sessionName || undefined
    this.pollIntervalMs = opts.sessionPollIntervalMs ?? DEFAULT_TIMINGS.sessionPollIntervalMs
    this.pollTimeoutMs = opts.pollTimeoutMs
    this.sleep = opts.sleep ?? delay
    this.now = opts.now ?? Date.now
  }

  get sessionId(): string | null {
    return this._sessionId
  }

  // ─── Discovery ──────────────────────────────────────────────────────────────

  /**
   * Adopt the first live session carrying the configured name, waiting for it
   * to become idle. Returns null when no name is configured or nothing matches.
   */
  async findExistingByName(signal?: AbortSignal): Promise<string | null> {
    if (this.sessionName === undefined) return null

    logger.debug(`Looking for an existing Livy session named "${this.sessionName}"`)
    const sessions = await this.client.listSessions(signal)

    for (const candidate of sessions) {
      if (candidate.name !== this.sessionName) continue
      if (candidate.livyState && INVALID_SESSION_STATES.has(candidate.livyState)) {
        logger.debug(`Skipping session ${candidate.id} (${candidate.livyState})`)
        continue
      }

      const outcome = await this.waitUntilIdle(candidate.id, signal)
      if (outcome.ready) {
        logger.info(`Reusing existing Livy session ${candidate.id}`)
        this._sessionId = candidate.id
        this.needsNewSession = false
        return candidate.id
      }
      logger.debug(`Session ${candidate.id} became ${outcome.state} while waiting, skipping`)
    }

    return null
  }

  // ─── Creation ───────────────────────────────────────────────────────────────

  /** POST a new session and poll until it is idle. */
  async create(request: CreateSessionRequest, signal?: AbortSignal): Promise<string> {
    logger.info('Creating Livy session (this may take a few minutes)')

    let session: LivySession
    try {
      session = await this.client.createSession(request, signal)
    } catch (err) {
      if (err instanceof ProtocolDecodeError) throw err
      const detail = err instanceof LivyApiError
        ? `HTTP ${err.statusCode} – ${err.body.substring(0, 200)}`
        : String(err)
      logger.error(`Failed to create session: ${detail}`)
      throw new ConnectionError('Invalid response from Livy server', { cause: err })
    }

    logger.debug(`Initiated Livy session ${session.id} (state: ${session.state})`)

    const outcome = await this.waitUntilIdle(session.id, signal)
    if (!outcome.ready) {
      logger.error(`Livy session ${session.id} failed with state: ${outcome.state}`)
      throw new ConnectionError(`failed to connect: Livy session ${session.id} is ${outcome.state}`)
    }

    this._sessionId = session.id
    this.needsNewSession = false
    logger.info(`Livy session ${session.id} created successfully`)
    return session.id
  }

  async getOrCreate(request: CreateSessionRequest, signal?: AbortSignal): Promise<string> {
    const existing = await this.findExistingByName(signal)
    return existing ?? this.create(request, signal)
  }

  // ─── Health & Teardown ──────────────────────────────────────────────────────

  /** A session may be reused so long as it is not dead, killed or shutting down. */
  async isValid(signal?: AbortSignal): Promise<boolean> {
    if (this._sessionId === null) return false

    let session: LivySession
    try {
      session = await this.client.getSession(this._sessionId, signal)
    } catch (err) {
      if (err instanceof LivyApiError && err.statusCode === 404) return false
      throw err
    }
    return !INVALID_SESSION_STATES.has(effectiveState(session))
  }

  /** Best-effort DELETE; failures are logged, never thrown. Resolves true once the remote accepted it. */
  async delete(): Promise<boolean> {
    const id = this._sessionId
    if (id === null) return false

    logger.debug(`Closing the Livy session: ${id}`)
    try {
      await this.client.deleteSession(id)
      logger.debug(`Closed the Livy session: ${id}`)
      return true
    } catch (err) {
      logger.error(`Unable to close the Livy session ${id}, error: ${String(err)}`)
      return false
    }
  }

  // ─── Private Helpers ────────────────────────────────────────────────────────

  private async waitUntilIdle(id: string, signal?: AbortSignal): Promise<WaitOutcome> {
    const deadline = new PollDeadline(`Livy session ${id} to become idle`, this.pollTimeoutMs, this.now)

    for (;;) {
      throwIfAborted(signal)
      const session = await this.client.getSession(id, signal)
      const state = effectiveState(session)

      if (state === 'idle') return { ready: true }
      if (INVALID_SESSION_STATES.has(state) || state === 'error') {
        return { ready: false, state }
      }

      logger.debug(`Polling session ${id} (state: ${state})`)
      deadline.check()
      await this.sleep(this.pollIntervalMs, signal)
    }
  }
}

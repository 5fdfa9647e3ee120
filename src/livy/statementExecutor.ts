import { Mutex } from 'async-mutex'
import { Logger } from '../logging'
import type { LivyApi } from './client'
import { delay, PollDeadline, throwIfAborted } from './poll'
import type { Sleep } from './poll'
import { decode, resultPayloadSchema } from './schemas'
import type { LivyStatement } from './schemas'
import type { StatementLanguage, StatementResult } from './types'
import {
  DEFAULT_TIMINGS,
  PollTimeoutError,
  ProtocolDecodeError,
  QueryExecutionError,
  RetriesExhaustedError,
} from './types'

const logger = new Logger('statement')

/** Evaluated-error fragments that mark a statement failure as worth rerunning. */
export const EXECUTE_RETRY_PATTERNS: readonly string[] = [
  'Request failed: HTTP/1.1 403 Forbidden ClientRequestId',
]

// ─── Retry Conditions ─────────────────────────────────────────────────────────

export function isTransientSubmitFailure(statement: LivyStatement): boolean {
  return statement.state === 'error'
}

export function isTransientExecuteFailure(
  statement: LivyStatement,
  patterns: readonly string[] = EXECUTE_RETRY_PATTERNS
): boolean {
  const output = statement.output
  if (!output || output.status !== 'error') return false
  const evalue = output.evalue ?? ''
  return patterns.some((pattern) => evalue.includes(pattern))
}

/** Linear backoff: attempt 1 waits one unit, attempt 2 two units, … */
export function retryWaitMs(attempt: number, unitMs: number): number {
  return attempt * unitMs
}

// ─── Session Provider ─────────────────────────────────────────────────────────

/** Yields a live session id, reconnecting first when the session was flagged for replacement. */
export interface SessionProvider {
  ensureSession(signal?: AbortSignal): Promise<string>
}

// ─── Statement Executor ───────────────────────────────────────────────────────

export interface StatementExecutorOptions {
  readonly client: LivyApi
  readonly session: SessionProvider
  readonly statementPollIntervalMs?: number
  readonly executeRetries?: number
  readonly executeRetryWaitMs?: number
  readonly pollTimeoutMs?: number
  readonly retryPatterns?: readonly string[]
  readonly sleep?: Sleep
  readonly now?: () => number
}

/**
 * Submits code to the shared session and waits for its result. Calls are
 * serialized: the remote runs one statement at a time per session.
 */
export class StatementExecutor {
  private readonly client: LivyApi
  private readonly session: SessionProvider
  private readonly pollIntervalMs: number
  private readonly maxRetries: number
  private readonly retryUnitMs: number
  private readonly pollTimeoutMs: number | undefined
  private readonly retryPatterns: readonly string[]
  private readonly sleep: Sleep
  private readonly now: () => number
  private readonly mutex = new Mutex()

  constructor(opts: StatementExecutorOptions) {
    this.client = opts.client
    this.session = opts.session
    this.pollIntervalMs = opts.statementPollIntervalMs ?? DEFAULT_TIMINGS.statementPollIntervalMs
    this.maxRetries = opts.executeRetries ?? DEFAULT_TIMINGS.executeRetries
    this.retryUnitMs = opts.executeRetryWaitMs ?? DEFAULT_TIMINGS.executeRetryWaitMs
    this.pollTimeoutMs = opts.pollTimeoutMs
    this.retryPatterns = opts.retryPatterns ?? EXECUTE_RETRY_PATTERNS
    this.sleep = opts.sleep ?? delay
    this.now = opts.now ?? Date.now
  }

  async execute(
    code: string,
    language: StatementLanguage,
    signal?: AbortSignal
  ): Promise<StatementResult> {
    return this.mutex.runExclusive(async () => {
      logger.info('Start to execute Livy code')

      let retries = 0
      for (;;) {
        const statement = await this.submitAndWait(code, language, signal)
        logger.info('Got result with available state')

        if (isTransientExecuteFailure(statement, this.retryPatterns) && retries < this.maxRetries) {
          retries++
          logger.debug(`Result is available but facing error: ${statement.output?.evalue ?? ''}`)
          logger.info(`Start retries ${retries}`)
          await this.sleep(retryWaitMs(retries, this.retryUnitMs), signal)
          continue
        }

        return toResult(statement)
      }
    })
  }

  // ─── Submit ─────────────────────────────────────────────────────────────────

  private async submitAndWait(
    code: string,
    language: StatementLanguage,
    signal?: AbortSignal
  ): Promise<LivyStatement> {
    const sessionId = await this.session.ensureSession(signal)
    const submitted = await this.submit(sessionId, code, language, signal)
    return this.waitForResult(sessionId, submitted.id, signal)
  }

  private async submit(
    sessionId: string,
    code: string,
    language: StatementLanguage,
    signal?: AbortSignal
  ): Promise<LivyStatement> {
    logger.info('Submitting Livy code')
    logger.debug(`Submitted (${language}) to session ${sessionId}: ${code}`)

    let retries = 0
    for (;;) {
      const res = await this.client.createStatement(sessionId, { code, kind: language }, signal)
      if (!isTransientSubmitFailure(res)) return res

      if (retries >= this.maxRetries) {
        throw new RetriesExhaustedError(`Submitting statement to session ${sessionId}`, retries + 1)
      }
      retries++
      logger.debug(`Submit code error: statement ${res.id} is in state ${res.state}`)
      logger.info(`Start retries ${retries}`)
      await this.sleep(retryWaitMs(retries, this.retryUnitMs), signal)
    }
  }

  // ─── Poll ───────────────────────────────────────────────────────────────────

  private async waitForResult(
    sessionId: string,
    statementId: number,
    signal?: AbortSignal
  ): Promise<LivyStatement> {
    logger.info(`Get Livy result: ${statementId}`)
    const deadline = new PollDeadline(`statement ${statementId}`, this.pollTimeoutMs, this.now)

    try {
      for (;;) {
        throwIfAborted(signal)
        const res = await this.client.getStatement(sessionId, statementId, signal)

        if (res.state === 'available') return res
        if (res.state === 'error' || res.state === 'cancelled') {
          throw new QueryExecutionError(
            res.output?.evalue ?? `statement ${statementId} ended in state ${res.state}`,
            res.output?.ename ?? null
          )
        }

        logger.info(`Got response with state ${res.state}`)
        deadline.check()
        await this.sleep(this.pollIntervalMs, signal)
      }
    } catch (err) {
      if (err instanceof PollTimeoutError || signal?.aborted) {
        await this.cancelQuietly(sessionId, statementId)
      }
      throw err
    }
  }

  private async cancelQuietly(sessionId: string, statementId: number): Promise<void> {
    try {
      await this.client.cancelStatement(sessionId, statementId)
      logger.info(`Statement ${statementId} cancelled`)
    } catch (err) {
      logger.warn(`Failed to cancel statement ${statementId}: ${String(err)}`)
    }
  }
}

// ─── Result Extraction ────────────────────────────────────────────────────────

export function toResult(statement: LivyStatement): StatementResult {
  const output = statement.output
  if (!output) {
    throw new ProtocolDecodeError(`Statement ${statement.id} is available but has no output`)
  }

  switch (output.status) {
    case 'ok': {
      const payload = output.data?.['application/json']
      if (payload === undefined || payload === null || isEmptyObject(payload)) {
        return { rows: [], fields: [] }
      }
      const values = decode(resultPayloadSchema, payload, 'statement result')
      return { rows: values.data, fields: values.schema.fields }
    }
    case 'error':
      throw new QueryExecutionError(output.evalue ?? '', output.ename ?? null)
    default:
      throw new ProtocolDecodeError(
        `Unexpected output status "${output.status}" for statement ${statement.id}`
      )
  }
}

function isEmptyObject(value: unknown): boolean {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && Object.keys(value).length === 0
}

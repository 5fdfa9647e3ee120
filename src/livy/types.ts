/**
 * Shared types, state sets and errors for the Livy session driver.
 */

// ─── Enums ────────────────────────────────────────────────────────────────────

export type SessionKind = 'spark' | 'pyspark' | 'sparkr' | 'sql'

/** Kinds a statement may be submitted as. */
export type StatementLanguage = 'sql' | 'pyspark'

export type SessionState =
  | 'not_started'
  | 'starting'
  | 'idle'
  | 'busy'
  | 'shutting_down'
  | 'error'
  | 'dead'
  | 'killed'
  | 'success'

export type AuthenticationMethod = 'cli' | 'serviceprincipal'

/** Sessions in these states can never be reused. */
export const INVALID_SESSION_STATES: ReadonlySet<string> = new Set<SessionState>([
  'dead',
  'shutting_down',
  'killed',
])

/** Still booting: keep polling. */
export const STARTING_SESSION_STATES: ReadonlySet<string> = new Set<SessionState>([
  'starting',
  'not_started',
])

// ─── Request Payloads ─────────────────────────────────────────────────────────

export interface CreateSessionRequest {
  readonly kind: SessionKind
  readonly conf?: Readonly<Record<string, string>>
  readonly name?: string
}

export interface CreateStatementRequest {
  readonly code: string
  readonly kind: StatementLanguage
}

// ─── Results ──────────────────────────────────────────────────────────────────

export type Row = readonly unknown[] | Readonly<Record<string, unknown>>

export type FieldType = string | Readonly<Record<string, unknown>>

export interface SchemaField {
  readonly name: string
  readonly type: FieldType
  readonly nullable: boolean
}

export interface StatementResult {
  readonly rows: readonly Row[]
  readonly fields: readonly SchemaField[]
}

// ─── Timings ──────────────────────────────────────────────────────────────────

export interface LivyTimings {
  readonly sessionPollIntervalMs: number
  readonly statementPollIntervalMs: number
  readonly executeRetries: number
  readonly executeRetryWaitMs: number
  /** Upper bound for any single poll loop; unbounded when undefined. */
  readonly pollTimeoutMs?: number
  readonly requestTimeoutMs?: number
}

export const DEFAULT_TIMINGS: LivyTimings = {
  sessionPollIntervalMs: 45_000,
  statementPollIntervalMs: 5_000,
  executeRetries: 5,
  executeRetryWaitMs: 10_000,
}

// ─── Errors ───────────────────────────────────────────────────────────────────

export class LivyError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'LivyError'
  }
}

export class LivyApiError extends LivyError {
  readonly statusCode: number
  readonly body: string

  constructor(statusCode: number, body: string, message?: string) {
    super(message ?? `Livy API error: HTTP ${statusCode}`)
    this.name = 'LivyApiError'
    this.statusCode = statusCode
    this.body = body
  }
}

/** Session could not be created or died while starting. */
export class ConnectionError extends LivyError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'ConnectionError'
  }
}

export class ProtocolDecodeError extends LivyError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'ProtocolDecodeError'
  }
}

export class AuthenticationError extends LivyError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'AuthenticationError'
  }
}

/** The remote evaluated the statement and reported an error. */
export class QueryExecutionError extends LivyError {
  readonly evalue: string
  readonly ename: string | null

  constructor(evalue: string, ename: string | null = null) {
    super(`Error while executing query: ${evalue}`)
    this.name = 'QueryExecutionError'
    this.evalue = evalue
    this.ename = ename
  }
}

export class RetriesExhaustedError extends LivyError {
  readonly attempts: number

  constructor(what: string, attempts: number) {
    super(`${what} still failing after ${attempts} attempts`)
    this.name = 'RetriesExhaustedError'
    this.attempts = attempts
  }
}

export class PollTimeoutError extends LivyError {
  readonly timeoutMs: number

  constructor(what: string, timeoutMs: number) {
    super(`Timed out after ${timeoutMs} ms waiting for ${what}`)
    this.name = 'PollTimeoutError'
    this.timeoutMs = timeoutMs
  }
}

export class ParameterBindingError extends LivyError {
  constructor(message: string) {
    super(message)
    this.name = 'ParameterBindingError'
  }
}

export class ConfigurationError extends LivyError {
  readonly issues: readonly string[]

  constructor(issues: readonly string[]) {
    super(`Invalid Livy configuration:\n  ${issues.join('\n  ')}`)
    this.name = 'ConfigurationError'
    this.issues = issues
  }
}

import { Logger } from '../logging'
import type { AuthHeaders } from './auth'
import { ResultCursor } from './cursor'
import type { ColumnDescription, Cursor, StatementRunner } from './cursor'
import type { Row, StatementLanguage } from './types'

const logger = new Logger('connection')

/** Source text marking a dbt Python model, which must run as PySpark. */
export const PYTHON_MODEL_MARKER = 'def model(dbt, session):'

// ─── Connection ───────────────────────────────────────────────────────────────

/** What a connection needs from the registry that owns the session. */
export interface ConnectionSource {
  readonly executor: StatementRunner
  readonly endpoint: string
  readonly sessionId: string | null
  headers(): Promise<AuthHeaders>
}

export class LivyConnection {
  private readonly _cursor: ResultCursor

  constructor(private readonly source: ConnectionSource) {
    this._cursor = new ResultCursor(source.executor)
  }

  get sessionId(): string | null {
    return this.source.sessionId
  }

  get connectUrl(): string {
    return this.source.endpoint
  }

  getHeaders(): Promise<AuthHeaders> {
    return this.source.headers()
  }

  cursor(): ResultCursor {
    return this._cursor
  }

  close(): void {
    logger.debug('Connection.close()')
    this._cursor.close()
  }
}

// ─── Bindings ─────────────────────────────────────────────────────────────────

/**
 * Turn a bound value into literal source text the remote can evaluate:
 * numbers become float literals (`1` → `1.0`), dates and everything else
 * become quoted strings.
 */
export function fixBinding(value: unknown): string {
  if (typeof value === 'number' || typeof value === 'bigint' || typeof value === 'boolean') {
    return formatFloat(Number(value))
  }
  if (value instanceof Date) {
    return `'${formatTimestamp(value)}'`
  }
  if (value === null || value === undefined) {
    return "''"
  }
  return `'${String(value)}'`
}

export function formatFloat(value: number): string {
  const text = String(value)
  return Number.isInteger(value) && !text.includes('e') ? `${text}.0` : text
}

/** `YYYY-MM-DD HH:MM:SS.mmm` in UTC. */
export function formatTimestamp(date: Date): string {
  const pad = (n: number, w = 2): string => String(n).padStart(w, '0')
  return (
    `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} ` +
    `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}` +
    `.${pad(date.getUTCMilliseconds(), 3)}`
  )
}

export function resolveLanguage(code: string, language: string): StatementLanguage {
  if (code.includes(PYTHON_MODEL_MARKER)) return 'pyspark'
  return language === 'pyspark' ? 'pyspark' : 'sql'
}

// ─── Connection Facade ────────────────────────────────────────────────────────

/**
 * Adapter handed to the query layer: exposes the connection and its cursor
 * through one object with the usual driver method names.
 */
export class ConnectionFacade {
  private current: Cursor | null = null

  constructor(private readonly handle: LivyConnection) {}

  cursor(): this {
    this.current = this.handle.cursor()
    return this
  }

  cancel(): void {
    logger.debug('NotImplemented: cancel')
  }

  close(): void {
    this.handle.close()
  }

  rollback(): void {
    logger.debug('NotImplemented: rollback')
  }

  async execute(sql: string, language: string, bindings?: readonly unknown[]): Promise<void> {
    const kind = resolveLanguage(sql, language)
    let code = sql
    if (code.trim().endsWith(';')) {
      code = code.trim().slice(0, -1)
    }

    const cursor = this.activeCursor()
    if (bindings === undefined) {
      await cursor.execute(code, kind)
    } else {
      await cursor.execute(code, kind, ...bindings.map(fixBinding))
    }
  }

  fetchAll(): Row[] | null {
    return this.activeCursor().fetchAll()
  }

  fetchOne(): Row | null {
    return this.activeCursor().fetchOne()
  }

  get description(): readonly ColumnDescription[] {
    return this.activeCursor().description
  }

  private activeCursor(): Cursor {
    if (this.current === null) this.current = this.handle.cursor()
    return this.current
  }
}

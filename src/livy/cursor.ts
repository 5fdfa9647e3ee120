import { Logger } from '../logging'
import { interpolateParameters, prepareCode } from './code'
import type { FieldType, Row, SchemaField, StatementLanguage, StatementResult } from './types'

const logger = new Logger('cursor')

// ─── Cursor Contract ──────────────────────────────────────────────────────────

/** `[name, type, display_size, internal_size, precision, scale, nullable]` */
export type ColumnDescription = readonly [
  name: string,
  type: FieldType,
  displaySize: null,
  internalSize: null,
  precision: null,
  scale: null,
  nullable: boolean,
]

/** The capability set a database-driver cursor is expected to offer. */
export interface Cursor {
  execute(code: string, language?: StatementLanguage, ...parameters: readonly unknown[]): Promise<void>
  fetchAll(): Row[] | null
  fetchOne(): Row | null
  readonly description: readonly ColumnDescription[]
  close(): void
}

export interface StatementRunner {
  execute(code: string, language: StatementLanguage, signal?: AbortSignal): Promise<StatementResult>
}

export function describeFields(fields: readonly SchemaField[] | null): ColumnDescription[] {
  if (fields === null) return []
  return fields.map((field) => [field.name, field.type, null, null, null, null, field.nullable] as const)
}

// ─── Result Cursor ────────────────────────────────────────────────────────────

/** Buffers the rows of the most recent execute() and hands them out in server order. */
export class ResultCursor implements Cursor {
  private rows: Row[] | null = null
  private fields: readonly SchemaField[] | null = null

  constructor(private readonly runner: StatementRunner) {}

  /**
   * Run SQL or PySpark code. Parameters are spliced into `%s` placeholders as
   * plain text; this is not safe against injection and is meant for trusted,
   * already-rendered values only.
   */
  async execute(
    code: string,
    language: StatementLanguage = 'sql',
    ...parameters: readonly unknown[]
  ): Promise<void> {
    let source = code
    if (parameters.length > 0) {
      logger.warn('Interpolating parameters into statement text; values are not escaped')
      source = interpolateParameters(code, parameters)
    }

    try {
      const result = await this.runner.execute(prepareCode(source, language), language)
      this.rows = [...result.rows]
      this.fields = result.fields
    } catch (err) {
      this.rows = null
      this.fields = null
      throw err
    }
  }

  fetchAll(): Row[] | null {
    return this.rows === null ? null : [...this.rows]
  }

  fetchOne(): Row | null {
    return this.rows?.shift() ?? null
  }

  get description(): ColumnDescription[] {
    return describeFields(this.fields)
  }

  close(): void {
    this.rows = null
  }
}

import { ResultCursor, describeFields } from '../livy/cursor'
import type { StatementRunner } from '../livy/cursor'
import type { StatementResult } from '../livy/types'
import { ParameterBindingError, QueryExecutionError } from '../livy/types'

function makeCursor(...results: (StatementResult | Error)[]) {
  const queue = [...results]
  const execute = jest.fn(async (): Promise<StatementResult> => {
    const next = queue.shift()
    if (next === undefined) throw new Error('no result scripted')
    if (next instanceof Error) throw next
    return next
  })
  const runner: StatementRunner = { execute }
  return { cursor: new ResultCursor(runner), execute }
}

const RESULT: StatementResult = {
  rows: [[1, 'a'], [2, 'b'], [3, 'c']],
  fields: [
    { name: 'id', type: 'integer', nullable: false },
    { name: 'label', type: 'string', nullable: true },
  ],
}

// ─── Fetching ─────────────────────────────────────────────────────────────────

describe('ResultCursor fetching', () => {
  it('returns nothing before any execute', () => {
    const { cursor } = makeCursor()
    expect(cursor.fetchAll()).toBeNull()
    expect(cursor.fetchOne()).toBeNull()
    expect(cursor.description).toEqual([])
  })

  it('fetchOne yields every row in server order, then null', async () => {
    const { cursor } = makeCursor(RESULT)
    await cursor.execute('select * from t')

    expect([cursor.fetchOne(), cursor.fetchOne(), cursor.fetchOne(), cursor.fetchOne()]).toEqual([
      [1, 'a'],
      [2, 'b'],
      [3, 'c'],
      null,
    ])
  })

  it('fetchAll returns the remaining rows without consuming them', async () => {
    const { cursor } = makeCursor(RESULT)
    await cursor.execute('select * from t')
    cursor.fetchOne()

    expect(cursor.fetchAll()).toEqual([[2, 'b'], [3, 'c']])
    expect(cursor.fetchAll()).toEqual([[2, 'b'], [3, 'c']])
  })

  it('replaces the buffer wholesale on the next execute', async () => {
    const { cursor } = makeCursor(RESULT, { rows: [['x']], fields: [{ name: 'x', type: 'string', nullable: true }] })
    await cursor.execute('select * from t')
    await cursor.execute('select x from u')

    expect(cursor.fetchAll()).toEqual([['x']])
    expect(cursor.description).toEqual([['x', 'string', null, null, null, null, true]])
  })

  it('clears rows and schema when execute fails', async () => {
    const { cursor } = makeCursor(RESULT, new QueryExecutionError('boom'))
    await cursor.execute('select * from t')

    await expect(cursor.execute('select broken')).rejects.toBeInstanceOf(QueryExecutionError)
    expect(cursor.fetchAll()).toBeNull()
    expect(cursor.description).toEqual([])
  })

  it('close discards rows and can be called twice', async () => {
    const { cursor } = makeCursor(RESULT)
    await cursor.execute('select * from t')

    cursor.close()
    cursor.close()
    expect(cursor.fetchOne()).toBeNull()
    expect(cursor.fetchAll()).toBeNull()
  })
})

// ─── Description ──────────────────────────────────────────────────────────────

describe('description', () => {
  it('produces one 7-tuple per field', () => {
    expect(describeFields([{ name: 'a', type: 'int', nullable: true }])).toEqual([
      ['a', 'int', null, null, null, null, true],
    ])
  })

  it('passes nested types through untouched', () => {
    const type = { type: 'array', elementType: 'string', containsNull: true }
    expect(describeFields([{ name: 'tags', type, nullable: false }])).toEqual([
      ['tags', type, null, null, null, null, false],
    ])
  })

  it('is empty without a schema', () => {
    expect(describeFields(null)).toEqual([])
  })
})

// ─── Code Preparation ─────────────────────────────────────────────────────────

describe('ResultCursor.execute code preparation', () => {
  it('strips block comments from SQL', async () => {
    const { cursor, execute } = makeCursor(RESULT)
    await cursor.execute('/* header */\nselect 1 /* inline */ from t', 'sql')

    expect(execute).toHaveBeenCalledWith('select 1\nfrom t', 'sql')
  })

  it('dedents PySpark code', async () => {
    const { cursor, execute } = makeCursor(RESULT)
    await cursor.execute('    df = spark.table("t")\n    if df:\n        df.show()\n', 'pyspark')

    expect(execute).toHaveBeenCalledWith('df = spark.table("t")\nif df:\n    df.show()\n', 'pyspark')
  })

  it('interpolates %s parameters as literal text', async () => {
    const { cursor, execute } = makeCursor(RESULT)
    await cursor.execute('select * from t where a = %s and b = %s', 'sql', 1, "'x'")

    expect(execute).toHaveBeenCalledWith("select * from t where a = 1 and b = 'x'", 'sql')
  })

  it('refuses mismatched parameters without contacting the session', async () => {
    const { cursor, execute } = makeCursor(RESULT)

    await expect(cursor.execute('select %s, %s', 'sql', 1)).rejects.toBeInstanceOf(ParameterBindingError)
    await expect(cursor.execute('select %s', 'sql', 1, 2)).rejects.toBeInstanceOf(ParameterBindingError)
    expect(execute).not.toHaveBeenCalled()
  })
})

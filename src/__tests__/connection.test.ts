import {
  ConnectionFacade,
  LivyConnection,
  fixBinding,
  formatFloat,
  formatTimestamp,
  resolveLanguage,
} from '../livy/connection'
import type { ConnectionSource } from '../livy/connection'
import { interpolateParameters } from '../livy/code'
import type { StatementLanguage, StatementResult } from '../livy/types'

const RESULT: StatementResult = {
  rows: [['2024-03-05', 3]],
  fields: [
    { name: 'day', type: 'date', nullable: true },
    { name: 'orders', type: 'long', nullable: false },
  ],
}

function makeFacade() {
  const execute = jest.fn(async (_code: string, _language: StatementLanguage) => RESULT)
  const source: ConnectionSource = {
    executor: { execute },
    endpoint: 'https://livy.test/api',
    sessionId: 's1',
    headers: async () => ({ 'Content-Type': 'application/json', Authorization: 'Bearer test-token' }),
  }
  const connection = new LivyConnection(source)
  return { facade: new ConnectionFacade(connection), connection, execute }
}

// ─── Bindings ─────────────────────────────────────────────────────────────────

describe('fixBinding', () => {
  it('renders numeric values as float literals', () => {
    expect(fixBinding(3)).toBe('3.0')
    expect(fixBinding(-7)).toBe('-7.0')
    expect(fixBinding(2.5)).toBe('2.5')
    expect(fixBinding(10n)).toBe('10.0')
    expect(fixBinding(true)).toBe('1.0')
    expect(fixBinding(false)).toBe('0.0')
  })

  it('interpolates an integer binding as a float literal', () => {
    expect(interpolateParameters('select %s', [fixBinding(1)])).toBe('select 1.0')
  })

  it('quotes dates as UTC timestamps', () => {
    expect(fixBinding(new Date(Date.UTC(2024, 2, 5, 7, 8, 9, 12)))).toBe("'2024-03-05 07:08:09.012'")
  })

  it('renders missing values as an empty string literal', () => {
    expect(fixBinding(null)).toBe("''")
    expect(fixBinding(undefined)).toBe("''")
  })

  it('quotes everything else', () => {
    expect(fixBinding('abc')).toBe("'abc'")
  })
})

describe('formatFloat', () => {
  it('leaves exponent notation alone', () => {
    expect(formatFloat(1e21)).toBe('1e+21')
    expect(formatFloat(1.5e-7)).toBe('1.5e-7')
  })

  it('keeps non-finite values as they print', () => {
    expect(formatFloat(Number.NaN)).toBe('NaN')
    expect(formatFloat(Number.POSITIVE_INFINITY)).toBe('Infinity')
  })
})

describe('formatTimestamp', () => {
  it('zero-pads every component', () => {
    expect(formatTimestamp(new Date(Date.UTC(2023, 0, 1, 0, 0, 0, 5)))).toBe('2023-01-01 00:00:00.005')
  })
})

describe('resolveLanguage', () => {
  it('detects Python models from their source', () => {
    expect(resolveLanguage('def model(dbt, session):\n    return df', 'sql')).toBe('pyspark')
  })

  it('falls back to sql for unknown languages', () => {
    expect(resolveLanguage('select 1', 'scala')).toBe('sql')
    expect(resolveLanguage('df.show()', 'pyspark')).toBe('pyspark')
  })
})

// ─── LivyConnection ───────────────────────────────────────────────────────────

describe('LivyConnection', () => {
  it('exposes session details from its registry', async () => {
    const { connection } = makeFacade()

    expect(connection.sessionId).toBe('s1')
    expect(connection.connectUrl).toBe('https://livy.test/api')
    await expect(connection.getHeaders()).resolves.toEqual({
      'Content-Type': 'application/json',
      Authorization: 'Bearer test-token',
    })
  })

  it('hands out the same cursor every time', () => {
    const { connection } = makeFacade()
    expect(connection.cursor()).toBe(connection.cursor())
  })
})

// ─── ConnectionFacade ─────────────────────────────────────────────────────────

describe('ConnectionFacade', () => {
  it('returns itself as the cursor', () => {
    const { facade } = makeFacade()
    expect(facade.cursor()).toBe(facade)
  })

  it('strips a trailing semicolon and binds dates', async () => {
    const { facade, execute } = makeFacade()

    await facade.cursor().execute('select * from orders where placed_at > %s;  ', 'sql', [
      new Date(Date.UTC(2024, 2, 5, 7, 8, 9, 12)),
    ])

    expect(execute).toHaveBeenCalledWith(
      "select * from orders where placed_at > '2024-03-05 07:08:09.012'",
      'sql'
    )
  })

  it('binds integers as float literals', async () => {
    const { facade, execute } = makeFacade()

    await facade.execute('select * from orders where qty > %s', 'sql', [1])

    expect(execute).toHaveBeenCalledWith('select * from orders where qty > 1.0', 'sql')
  })

  it('routes Python models to PySpark', async () => {
    const { facade, execute } = makeFacade()
    const model = 'def model(dbt, session):\n    return spark.range(1)\n'

    await facade.execute(model, 'python')

    expect(execute).toHaveBeenCalledWith(model, 'pyspark')
  })

  it('exposes rows and description after execute', async () => {
    const { facade } = makeFacade()
    await facade.execute('select day, orders from daily', 'sql')

    expect(facade.description).toEqual([
      ['day', 'date', null, null, null, null, true],
      ['orders', 'long', null, null, null, null, false],
    ])
    expect(facade.fetchOne()).toEqual(['2024-03-05', 3])
    expect(facade.fetchOne()).toBeNull()
  })

  it('treats cancel and rollback as no-ops', () => {
    const { facade } = makeFacade()
    expect(() => facade.cancel()).not.toThrow()
    expect(() => facade.rollback()).not.toThrow()
  })

  it('close discards the buffered rows', async () => {
    const { facade } = makeFacade()
    await facade.execute('select 1', 'sql')

    facade.close()
    expect(facade.fetchAll()).toBeNull()
  })
})

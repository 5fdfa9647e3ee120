import type { StatementLanguage } from './types'
import { ParameterBindingError } from './types'

// ─── SQL ──────────────────────────────────────────────────────────────────────

/** Replace every `/* ... *\/` block comment (and the whitespace around it) with a newline. */
export function stripBlockComments(sql: string): string {
  return sql.replace(/\s*\/\*[\s\S]*?\*\/\s*/g, '\n').trim()
}

// ─── Python ───────────────────────────────────────────────────────────────────

/**
 * Remove whitespace common to the start of every non-blank line. Lines made
 * only of whitespace are emptied and do not count towards the margin.
 */
export function dedent(text: string): string {
  const lines = text.split('\n').map((line) => (line.trim() === '' ? '' : line))

  let margin: string | undefined
  for (const line of lines) {
    if (line === '') continue
    const indent = /^[ \t]*/.exec(line)?.[0] ?? ''
    if (margin === undefined) {
      margin = indent
      continue
    }
    let shared = 0
    while (shared < margin.length && shared < indent.length && margin[shared] === indent[shared]) {
      shared++
    }
    margin = margin.slice(0, shared)
  }

  if (!margin) return lines.join('\n')
  const width = margin.length
  return lines.map((line) => (line === '' ? line : line.slice(width))).join('\n')
}

export function prepareCode(code: string, language: StatementLanguage): string {
  return language === 'pyspark' ? dedent(code) : stripBlockComments(code)
}

// ─── Parameters ───────────────────────────────────────────────────────────────

/**
 * Substitute `%s` placeholders with the literal text of each parameter, in
 * order; `%%` yields a single `%`. Values are NOT escaped, so the result is
 * only as safe as the parameters themselves.
 */
export function interpolateParameters(code: string, parameters: readonly unknown[]): string {
  let next = 0
  const result = code.replace(/%%|%s/g, (token) => {
    if (token === '%%') return '%'
    if (next >= parameters.length) {
      throw new ParameterBindingError(
        `Not enough parameters: statement has more than ${parameters.length} placeholder(s)`
      )
    }
    return String(parameters[next++])
  })

  if (next < parameters.length) {
    throw new ParameterBindingError(
      `Too many parameters: ${parameters.length} given, ${next} placeholder(s) in statement`
    )
  }
  return result
}

import { z } from 'zod'
import { ProtocolDecodeError } from './types'

// ─── Response Schemas ─────────────────────────────────────────────────────────

// Fabric issues GUIDs; plain Livy servers issue integers.
const sessionIdSchema = z.union([z.string().min(1), z.number()]).transform((id) => String(id))

export const sessionSchema = z.object({
  id: sessionIdSchema,
  name: z.string().nullish(),
  state: z.string(),
  livyInfo: z
    .object({
      currentState: z.string().nullish(),
    })
    .nullish(),
})

export const sessionListSchema = z.object({
  items: z.array(
    z.object({
      id: sessionIdSchema,
      name: z.string().nullish(),
      livyState: z.string().nullish(),
    })
  ),
})

export const statementOutputSchema = z.object({
  status: z.string(),
  execution_count: z.number().nullish(),
  data: z.record(z.unknown()).nullish(),
  ename: z.string().nullish(),
  evalue: z.string().nullish(),
  traceback: z.array(z.string()).nullish(),
})

export const statementSchema = z.object({
  id: z.number().int(),
  state: z.string(),
  output: statementOutputSchema.nullish(),
})

export const schemaFieldSchema = z.object({
  name: z.string(),
  type: z.union([z.string(), z.record(z.unknown())]),
  nullable: z.boolean().default(true),
})

/** Body of `output.data['application/json']` for a SQL statement. */
export const resultPayloadSchema = z.object({
  data: z.array(z.union([z.array(z.unknown()), z.record(z.unknown())])).default([]),
  schema: z
    .object({
      fields: z.array(schemaFieldSchema),
    })
    .default({ fields: [] }),
})

export type LivySession = z.infer<typeof sessionSchema>
export type LivySessionSummary = z.infer<typeof sessionListSchema>['items'][number]
export type LivyStatement = z.infer<typeof statementSchema>
export type StatementOutput = z.infer<typeof statementOutputSchema>

// ─── Decoding ─────────────────────────────────────────────────────────────────

/** Validate `value` against `schema`, raising ProtocolDecodeError on mismatch. */
export function decode<S extends z.ZodTypeAny>(schema: S, value: unknown, what: string): z.output<S> {
  const result = schema.safeParse(value)
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ')
    throw new ProtocolDecodeError(`Unexpected ${what} response: ${detail}`, {
      cause: result.error,
    })
  }
  return result.data
}

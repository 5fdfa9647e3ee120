import { z } from 'zod'
import { isLogLevel } from './logging'
import type { LogLevel } from './logging'
import type { AuthCredentials } from './livy/auth'
import type { AuthenticationMethod, LivyTimings } from './livy/types'
import { ConfigurationError, DEFAULT_TIMINGS } from './livy/types'

export const DEFAULT_FABRIC_ENDPOINT = 'https://api.fabric.microsoft.com/v1'
export const DEFAULT_LIVY_API_VERSION = '2023-12-01'

const ENV_PREFIX = 'FABRIC_LIVY_'

// ─── Credentials ──────────────────────────────────────────────────────────────

export interface LivyCredentials extends AuthCredentials {
  readonly lakehouseEndpoint: string
  readonly workspaceId?: string
  readonly lakehouseId?: string
  readonly sessionName?: string
  readonly sessionParameters: Readonly<Record<string, string>>
  readonly keepSession: boolean
  readonly shortcutsJsonPath?: string
}

const optionalText = z.string().min(1).optional()

const credentialsSchema = z
  .object({
    endpoint: z.string().url().default(DEFAULT_FABRIC_ENDPOINT),
    lakehouseEndpoint: z.string().url().optional(),
    workspaceId: optionalText,
    lakehouseId: optionalText,
    livyApiVersion: z.string().min(1).default(DEFAULT_LIVY_API_VERSION),
    authentication: z
      .string()
      .default('cli')
      .transform((value): AuthenticationMethod =>
        value.toLowerCase() === 'cli' ? 'cli' : 'serviceprincipal'
      ),
    tenantId: optionalText,
    clientId: optionalText,
    clientSecret: optionalText,
    sessionName: optionalText,
    sessionParameters: z.record(z.string()).default({}),
    keepSession: z.boolean().default(false),
    shortcutsJsonPath: optionalText,
  })
  .superRefine((value, ctx) => {
    if (!value.lakehouseEndpoint && (!value.workspaceId || !value.lakehouseId)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['lakehouseEndpoint'],
        message: 'either lakehouseEndpoint or both workspaceId and lakehouseId are required',
      })
    }
    if (value.authentication === 'serviceprincipal') {
      for (const key of ['tenantId', 'clientId', 'clientSecret'] as const) {
        if (!value[key]) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [key],
            message: 'required for service principal authentication',
          })
        }
      }
    }
  })

export function buildLakehouseEndpoint(
  endpoint: string,
  workspaceId: string,
  lakehouseId: string,
  apiVersion: string = DEFAULT_LIVY_API_VERSION
): string {
  return `${endpoint.replace(/\/+$/, '')}/workspaces/${workspaceId}/lakehouses/${lakehouseId}/livyapi/versions/${apiVersion}`
}

export function parseCredentials(input: unknown): LivyCredentials {
  const value = parseOrThrow(credentialsSchema, input)
  const lakehouseEndpoint =
    value.lakehouseEndpoint ??
    buildLakehouseEndpoint(value.endpoint, value.workspaceId ?? '', value.lakehouseId ?? '', value.livyApiVersion)

  return {
    lakehouseEndpoint,
    authentication: value.authentication,
    tenantId: value.tenantId,
    clientId: value.clientId,
    clientSecret: value.clientSecret,
    workspaceId: value.workspaceId,
    lakehouseId: value.lakehouseId,
    sessionName: value.sessionName,
    sessionParameters: value.sessionParameters,
    keepSession: value.keepSession,
    shortcutsJsonPath: value.shortcutsJsonPath,
  }
}

// ─── Timings ──────────────────────────────────────────────────────────────────

const durationMs = z.coerce.number().int().positive()

const timingsSchema = z.object({
  sessionPollIntervalMs: durationMs.default(DEFAULT_TIMINGS.sessionPollIntervalMs),
  statementPollIntervalMs: durationMs.default(DEFAULT_TIMINGS.statementPollIntervalMs),
  executeRetries: z.coerce.number().int().min(0).default(DEFAULT_TIMINGS.executeRetries),
  executeRetryWaitMs: durationMs.default(DEFAULT_TIMINGS.executeRetryWaitMs),
  pollTimeoutMs: durationMs.optional(),
  requestTimeoutMs: durationMs.optional(),
})

export function parseTimings(input: unknown = {}): LivyTimings {
  return parseOrThrow(timingsSchema, input)
}

// ─── Environment ──────────────────────────────────────────────────────────────

export interface LivyConfig {
  readonly credentials: LivyCredentials
  readonly timings: LivyTimings
  readonly logLevel: LogLevel
}

type Env = Readonly<Record<string, string | undefined>>

/** Read `FABRIC_LIVY_*` variables, e.g. `FABRIC_LIVY_WORKSPACE_ID`. */
export function loadConfig(env: Env = process.env): LivyConfig {
  const read = (name: string): string | undefined => {
    const value = env[`${ENV_PREFIX}${name}`]?.trim()
    return value ? value : undefined
  }

  const logLevel = read('LOG_LEVEL')?.toLowerCase() ?? 'info'
  if (!isLogLevel(logLevel)) {
    throw new ConfigurationError([`${ENV_PREFIX}LOG_LEVEL: unknown level "${logLevel}"`])
  }

  const credentials = parseCredentials({
    endpoint: read('ENDPOINT'),
    lakehouseEndpoint: read('LAKEHOUSE_ENDPOINT'),
    workspaceId: read('WORKSPACE_ID'),
    lakehouseId: read('LAKEHOUSE_ID'),
    livyApiVersion: read('API_VERSION'),
    authentication: read('AUTHENTICATION'),
    tenantId: read('TENANT_ID'),
    clientId: read('CLIENT_ID'),
    clientSecret: read('CLIENT_SECRET'),
    sessionName: read('SESSION_NAME'),
    sessionParameters: parseJsonVariable(`${ENV_PREFIX}SESSION_PARAMETERS`, read('SESSION_PARAMETERS')),
    keepSession: parseBooleanVariable(read('KEEP_SESSION')),
    shortcutsJsonPath: read('SHORTCUTS_JSON_PATH'),
  })

  const timings = parseTimings({
    sessionPollIntervalMs: read('SESSION_POLL_INTERVAL_MS'),
    statementPollIntervalMs: read('STATEMENT_POLL_INTERVAL_MS'),
    executeRetries: read('EXECUTE_RETRIES'),
    executeRetryWaitMs: read('EXECUTE_RETRY_WAIT_MS'),
    pollTimeoutMs: read('POLL_TIMEOUT_MS'),
    requestTimeoutMs: read('REQUEST_TIMEOUT_MS'),
  })

  return { credentials, timings, logLevel }
}

// ─── Helpers ──────────────────────────────────────────────────────────────────

function parseOrThrow<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input)
  if (!result.success) {
    throw new ConfigurationError(
      result.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
    )
  }
  return result.data
}

function parseBooleanVariable(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined
  return ['1', 'true', 'yes', 'on'].includes(value.toLowerCase())
}

function parseJsonVariable(name: string, value: string | undefined): unknown {
  if (value === undefined) return undefined
  try {
    return JSON.parse(value)
  } catch {
    throw new ConfigurationError([`${name}: not valid JSON`])
  }
}

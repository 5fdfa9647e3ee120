import { loadConfig } from './config'
import type { LivyConfig } from './config'
import { configureLogging } from './logging'
import { SessionRegistry } from './livy/sessionRegistry'
import type { SessionRegistryOptions } from './livy/sessionRegistry'

export * from './config'
export * from './logging'
export * from './livy/types'
export type { LivySession, LivySessionSummary, LivyStatement, StatementOutput } from './livy/schemas'
export { LivyClient } from './livy/client'
export type { HeaderProvider, LivyApi, LivyClientConfig } from './livy/client'
export {
  FABRIC_CREDENTIAL_SCOPE,
  TOKEN_REFRESH_MARGIN_MS,
  TokenCache,
  createTokenCredential,
  isTokenRefreshNecessary,
} from './livy/auth'
export type { AuthCredentials, AuthHeaders, CredentialFactory, TokenCacheOptions } from './livy/auth'
export { SessionClient } from './livy/sessionClient'
export type { SessionClientOptions } from './livy/sessionClient'
export {
  EXECUTE_RETRY_PATTERNS,
  StatementExecutor,
  isTransientExecuteFailure,
  isTransientSubmitFailure,
} from './livy/statementExecutor'
export type { SessionProvider, StatementExecutorOptions } from './livy/statementExecutor'
export { ResultCursor, describeFields } from './livy/cursor'
export type { ColumnDescription, Cursor, StatementRunner } from './livy/cursor'
export { SessionRegistry } from './livy/sessionRegistry'
export type { SessionRegistryOptions, ShortcutProvisioner, ShortcutRequest } from './livy/sessionRegistry'
export {
  ConnectionFacade,
  LivyConnection,
  PYTHON_MODEL_MARKER,
  fixBinding,
  formatFloat,
  formatTimestamp,
  resolveLanguage,
} from './livy/connection'
export { dedent, interpolateParameters, stripBlockComments } from './livy/code'

// ─── Bootstrap ────────────────────────────────────────────────────────────────

/**
 * Build a registry from `FABRIC_LIVY_*` environment variables (or an already
 * loaded config), applying the configured log level.
 */
export function createSessionRegistry(
  config: LivyConfig = loadConfig(),
  extra: Omit<SessionRegistryOptions, 'credentials' | 'timings'> = {}
): SessionRegistry {
  configureLogging({ level: config.logLevel })
  return new SessionRegistry({
    ...extra,
    credentials: config.credentials,
    timings: config.timings,
  })
}

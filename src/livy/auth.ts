import { AzureCliCredential, ClientSecretCredential } from '@azure/identity'
import type { AccessToken, TokenCredential } from '@azure/identity'
import { Mutex } from 'async-mutex'
import { Logger } from '../logging'
import type { AuthenticationMethod } from './types'
import { AuthenticationError } from './types'

const logger = new Logger('auth')

export const FABRIC_CREDENTIAL_SCOPE = 'https://analysis.windows.net/powerbi/api/.default'

/** Tokens closer than this to expiry are never handed out. */
export const TOKEN_REFRESH_MARGIN_MS = 5 * 60 * 1000

// ─── Credentials ──────────────────────────────────────────────────────────────

export interface AuthCredentials {
  readonly authentication: AuthenticationMethod
  readonly tenantId?: string
  readonly clientId?: string
  readonly clientSecret?: string
}

export type AuthHeaders = {
  readonly Authorization: string
  readonly 'Content-Type': string
}

export type CredentialFactory = (credentials: AuthCredentials) => TokenCredential

export function createTokenCredential(credentials: AuthCredentials): TokenCredential {
  switch (credentials.authentication) {
    case 'cli':
      logger.debug('Using CLI auth')
      return new AzureCliCredential()
    case 'serviceprincipal':
    default: {
      const { tenantId, clientId, clientSecret } = credentials
      if (!tenantId || !clientId || !clientSecret) {
        throw new AuthenticationError(
          'Service principal authentication requires tenantId, clientId and clientSecret'
        )
      }
      logger.debug('Using SPN auth')
      return new ClientSecretCredential(tenantId, clientId, clientSecret)
    }
  }
}

export function isTokenRefreshNecessary(token: AccessToken | null, now: number): boolean {
  if (token === null) return true
  return token.expiresOnTimestamp - now <= TOKEN_REFRESH_MARGIN_MS
}

// ─── Token Cache ──────────────────────────────────────────────────────────────

export interface TokenCacheOptions {
  readonly credentialFactory?: CredentialFactory
  readonly now?: () => number
}

/**
 * Holds one bearer token and refreshes it before it gets within
 * {@link TOKEN_REFRESH_MARGIN_MS} of expiry. Concurrent callers share a single
 * refresh.
 */
export class TokenCache {
  private token: AccessToken | null = null
  private readonly mutex = new Mutex()
  private readonly credentialFactory: CredentialFactory
  private readonly now: () => number

  constructor(opts: TokenCacheOptions = {}) {
    this.credentialFactory = opts.credentialFactory ?? createTokenCredential
    this.now = opts.now ?? Date.now
  }

  async getToken(credentials: AuthCredentials): Promise<AccessToken> {
    return this.mutex.runExclusive(async () => {
      if (this.token !== null && !isTokenRefreshNecessary(this.token, this.now())) {
        return this.token
      }

      if (this.token !== null) {
        const minutesLeft = Math.floor((this.token.expiresOnTimestamp - this.now()) / 60_000)
        logger.debug(`Token refresh necessary, ${minutesLeft} minute(s) left`)
      }

      const fresh = await this.credentialFactory(credentials).getToken(FABRIC_CREDENTIAL_SCOPE)
      if (fresh === null) {
        throw new AuthenticationError(
          `No access token returned for ${credentials.authentication} authentication`
        )
      }
      logger.info(`Fetched access token (${credentials.authentication})`)
      this.token = fresh
      return fresh
    })
  }

  async getHeaders(credentials: AuthCredentials): Promise<AuthHeaders> {
    const token = await this.getToken(credentials)
    return {
      'Content-Type': 'application/json',
      Authorization: `Bearer ${token.token}`,
    }
  }
}

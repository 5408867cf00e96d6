import { AuthError, InvalidApiKeyError, InvalidCredentialsError } from '../../core/errors.ts'
import type { Transport } from '../../core/transport.ts'
import type { TAuthAttachment, TAuthenticator, TSeedProvider } from '../../core/types.ts'
import { validateRequiredStrings } from '../../core/utils.ts'
import { obfuscateApiKey } from './api-key-obfuscation.ts'

export const SESSION_ID_COOKIE = 'JSESSIONID'
export const SESSION_CODE_COOKIE = 'ZS_SESSION_CODE'
export const SESSION_CODE_HEADER = 'ZS_CUSTOM_CODE'

export type TPortalCredentials = {
  /** Email of the API admin. */
  username: string
  password: string
}

export type TPortalSessionAuthenticatorOptions = {
  seedProvider: TSeedProvider
}

/**
 * Opens an admin portal session. The login carries an API key obfuscated from the portal seed
 * and the current timestamp; the portal answers with a session id cookie and a session code
 * cookie, and the session code is echoed in a custom header on every later request.
 */
export class PortalSessionAuthenticator implements TAuthenticator<TPortalCredentials> {
  private readonly seedProvider: TSeedProvider

  constructor(options: TPortalSessionAuthenticatorOptions) {
    this.seedProvider = options.seedProvider
  }

  async authenticate(
    credentials: TPortalCredentials,
    transport: Transport,
    signal?: AbortSignal,
  ): Promise<TAuthAttachment> {
    validateRequiredStrings(credentials, ['username', 'password'])

    const seed: string = await this.seedProvider.getSeed(signal)
    const { timestamp, key } = obfuscateApiKey(seed)

    const response = await transport.request('POST', '/authenticatedSession', {
      headers: { accept: 'application/json' },
      body: {
        apiKey: key,
        username: credentials.username,
        password: credentials.password,
        timestamp,
      },
      raiseOnError: false,
      signal,
    })

    if (response.status >= 500) {
      throw new AuthError(`Portal login failed with HTTP ${response.status}`)
    }

    const sessionId = response.cookies[SESSION_ID_COOKIE]
    if (!sessionId) throw new InvalidCredentialsError()

    const sessionCode = response.cookies[SESSION_CODE_COOKIE]
    if (!sessionCode) throw new InvalidApiKeyError()

    if (!response.ok) {
      throw new AuthError(`Portal login failed with HTTP ${response.status}`)
    }

    return {
      headers: { [SESSION_CODE_HEADER]: sessionCode },
      cookies: { [SESSION_ID_COOKIE]: sessionId, [SESSION_CODE_COOKIE]: sessionCode },
    }
  }
}

import { AuthError } from '../../core/errors.ts'
import type { Transport } from '../../core/transport.ts'
import type { TAuthAttachment, TAuthenticator } from '../../core/types.ts'
import { validateRequiredStrings } from '../../core/utils.ts'
import { readErrorDetail, readLoginBody } from './response-body.ts'

export type TClientCredentials = {
  /** OAuth2 client ID. */
  clientId: string
  /** OAuth2 client secret. */
  clientSecret: string
}

/**
 * OAuth2 client credentials sign-in. The returned token type and access token are sent as
 * `Authorization: <token_type> <access_token>` on every later request.
 */
export class ClientCredentialsAuthenticator implements TAuthenticator<TClientCredentials> {
  async authenticate(
    credentials: TClientCredentials,
    transport: Transport,
    signal?: AbortSignal,
  ): Promise<TAuthAttachment> {
    validateRequiredStrings(credentials, ['clientId', 'clientSecret'])

    const response = await transport.request('POST', '/signin', {
      headers: { accept: 'application/json' },
      form: { client_id: credentials.clientId, client_secret: credentials.clientSecret },
      raiseOnError: false,
      signal,
    })
    const body = readLoginBody(response)

    if (!response.ok) {
      const detail = readErrorDetail(body)
      if (response.status === 401) {
        throw new AuthError(`Invalid client credentials${detail}`)
      }
      if (response.status === 400) {
        throw new AuthError(`Invalid sign-in request${detail}`)
      }
      throw new AuthError(`Sign-in failed (${response.status})${detail}`)
    }

    const { token_type: tokenType, access_token: accessToken } = body
    if (typeof accessToken !== 'string' || !accessToken) {
      throw new AuthError('Sign-in response missing access_token', 'missing-token')
    }
    if (typeof tokenType !== 'string' || !tokenType) {
      throw new AuthError('Sign-in response missing token_type', 'missing-token')
    }

    return { headers: { Authorization: `${tokenType} ${accessToken}` }, cookies: {} }
  }
}

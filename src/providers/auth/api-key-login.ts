import { AuthError } from '../../core/errors.ts'
import type { Transport } from '../../core/transport.ts'
import type { TAuthAttachment, TAuthenticator } from '../../core/types.ts'
import { validateRequiredStrings } from '../../core/utils.ts'
import { readErrorDetail, readLoginBody } from './response-body.ts'

export type TApiKeyCredentials = {
  /** Client id issued by the Client Connector portal. */
  apiKey: string
  /** Secret key issued together with the client id. */
  secretKey: string
}

/** Exchanges an API key and secret for a JWT that travels in the `auth-token` header. */
export class ApiKeyLoginAuthenticator implements TAuthenticator<TApiKeyCredentials> {
  async authenticate(
    credentials: TApiKeyCredentials,
    transport: Transport,
    signal?: AbortSignal,
  ): Promise<TAuthAttachment> {
    validateRequiredStrings(credentials, ['apiKey', 'secretKey'])

    const response = await transport.request('POST', '/auth/v1/login', {
      headers: { accept: '*/*' },
      body: { apiKey: credentials.apiKey, secretKey: credentials.secretKey },
      raiseOnError: false,
      signal,
    })
    const body = readLoginBody(response)

    if (!response.ok) {
      throw new AuthError(`Login failed with HTTP ${response.status}${readErrorDetail(body)}`)
    }

    const jwtToken = body.jwtToken
    if (typeof jwtToken !== 'string' || !jwtToken) {
      throw new AuthError('Login response missing jwtToken', 'missing-token')
    }

    return { headers: { 'auth-token': jwtToken }, cookies: {} }
  }
}

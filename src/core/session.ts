import { AuthError } from './errors.ts'
import type { Transport } from './transport.ts'
import type {
  TAuthAttachment,
  TAuthenticator,
  THttpMethod,
  TRawResponse,
  TRequestOptions,
} from './types.ts'
import { settled } from './utils.ts'

export type TSessionOptions<TCredentials> = {
  transport: Transport
  authenticator: TAuthenticator<TCredentials>
}

/**
 * Per-tenant authentication state shared by every request of one client.
 *
 * The auth attachment is frozen and replaced as a whole on each successful authentication,
 * so a request always carries either the previous or the new attachment, never a mix.
 * Authentications are serialised, and requests issued while one is pending wait for it.
 */
export class Session<TCredentials> {
  private readonly transport: Transport
  private readonly authenticator: TAuthenticator<TCredentials>

  private attachment: TAuthAttachment | null = null
  private pendingAuthentication: Promise<void> | null = null

  constructor(options: TSessionOptions<TCredentials>) {
    this.transport = options.transport
    this.authenticator = options.authenticator
  }

  get isAuthenticated(): boolean {
    return this.attachment !== null
  }

  async authenticate(credentials: TCredentials, signal?: AbortSignal): Promise<void> {
    const previous: Promise<void> = this.pendingAuthentication ?? Promise.resolve()
    const run = async (): Promise<void> => {
      try {
        const attachment = await this.authenticator.authenticate(
          credentials,
          this.transport,
          signal,
        )
        this.attachment = Object.freeze({
          headers: Object.freeze({ ...attachment.headers }),
          cookies: Object.freeze({ ...attachment.cookies }),
        })
      } catch (error) {
        this.attachment = null
        throw error
      }
    }

    const current: Promise<void> = previous.then(run, run)
    this.pendingAuthentication = current
    try {
      await current
    } finally {
      if (this.pendingAuthentication === current) this.pendingAuthentication = null
    }
  }

  /** Returns a copy of `options` carrying the current auth headers and cookies. */
  attach(options: TRequestOptions = {}): TRequestOptions {
    const attachment = this.attachment
    if (!attachment) {
      throw new AuthError(
        'Session is not authenticated. Call authenticate() first.',
        'not-authenticated',
      )
    }
    return {
      ...options,
      headers: { ...options.headers, ...attachment.headers },
      cookies: { ...options.cookies, ...attachment.cookies },
    }
  }

  async request(
    httpMethod: THttpMethod,
    path: string,
    options: TRequestOptions = {},
  ): Promise<TRawResponse> {
    // A failed authentication is reported to its own caller; attach() fails fast afterwards.
    if (this.pendingAuthentication) await settled(this.pendingAuthentication)
    return await this.transport.request(httpMethod, path, this.attach(options))
  }

  async requestJson(
    httpMethod: THttpMethod,
    path: string,
    options: TRequestOptions = {},
  ): Promise<unknown> {
    const response = await this.request(httpMethod, path, options)
    return response.json()
  }
}

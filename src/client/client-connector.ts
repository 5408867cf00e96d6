import { Paginator } from '../core/pagination.ts'
import { Session } from '../core/session.ts'
import { Transport } from '../core/transport.ts'
import { validateNonNegativeNumber } from '../core/utils.ts'
import { DevicesApi, type TDevicesApi } from '../domains/devices/devices.api.ts'
import {
  ApiKeyLoginAuthenticator,
  type TApiKeyCredentials,
} from '../providers/auth/api-key-login.ts'
import { resolveApiBase, resolveCredentials, type TClientBaseOptions } from './client-options.ts'

export type TClientConnectorClientOptions = TClientBaseOptions & {
  credentials?: TApiKeyCredentials
  /** Pause between device list pages. @default 500 */
  pageDelayMs?: number
}

/**
 * Client Connector (endpoint agent) management API.
 *
 * @example
 * ```typescript
 * const client = new ClientConnectorClient({
 *   cloud: 'zscaler.net',
 *   credentials: { apiKey: 'key', secretKey: 'secret' },
 * })
 *
 * await client.authenticate()
 * const devices = await client.devices.listDevices({ osType: 3 })
 * ```
 */
export class ClientConnectorClient {
  public readonly devices: TDevicesApi

  private session: Session<TApiKeyCredentials>
  private credentials?: TApiKeyCredentials

  constructor(options: TClientConnectorClientOptions) {
    validateNonNegativeNumber('pageDelayMs', options.pageDelayMs)
    const transport = new Transport({
      baseUrl: resolveApiBase('client-connector', options),
      timeoutInMilliseconds: options.timeoutInMilliseconds,
      fetchImplementation: options.fetchImplementation,
    })
    this.session = new Session({ transport, authenticator: new ApiKeyLoginAuthenticator() })
    this.credentials = options.credentials

    this.devices = new DevicesApi({
      session: this.session,
      paginator: new Paginator({ requester: this.session }),
      pageDelayMs: options.pageDelayMs,
    })
  }

  get isAuthenticated(): boolean {
    return this.session.isAuthenticated
  }

  /** Logs in and replaces the session token. Falls back to the constructor credentials. */
  public async authenticate(credentials?: TApiKeyCredentials, signal?: AbortSignal): Promise<void> {
    const resolved = resolveCredentials(credentials, this.credentials)
    await this.session.authenticate(resolved, signal)
  }
}

import { ConfigurationError } from '../core/errors.ts'
import { Paginator } from '../core/pagination.ts'
import { Session } from '../core/session.ts'
import { Transport } from '../core/transport.ts'
import type { TTotalPagesBound } from '../core/types.ts'
import { validatePositiveNumber } from '../core/utils.ts'
import {
  ApplicationsApi,
  type TApplicationsApi,
} from '../domains/private-access/applications.api.ts'
import {
  CertificatesApi,
  type TCertificatesApi,
} from '../domains/private-access/certificates.api.ts'
import { ConnectorsApi, type TConnectorsApi } from '../domains/private-access/connectors.api.ts'
import type { TPrivateAccessApiOptions } from '../domains/private-access/customer-scope.ts'
import { IdentityApi, type TIdentityApi } from '../domains/private-access/identity.api.ts'
import { PoliciesApi, type TPoliciesApi } from '../domains/private-access/policies.api.ts'
import { ServersApi, type TServersApi } from '../domains/private-access/servers.api.ts'
import {
  ClientCredentialsAuthenticator,
  type TClientCredentials,
} from '../providers/auth/client-credentials.ts'
import { DEFAULT_PRIVATE_ACCESS_CLOUD } from '../providers/endpoint/cloud-endpoint.ts'
import type { TResourceId } from '../types/api.ts'
import { resolveApiBase, resolveCredentials, type TClientBaseOptions } from './client-options.ts'

export type TPrivateAccessClientOptions = TClientBaseOptions & {
  /** Tenant identifier embedded in every configuration path. */
  customerId: TResourceId
  credentials?: TClientCredentials
  /** `pagesize` sent with listings. @default 500 */
  pageSize?: number
  /** Whether the reported `totalPages` is itself fetched. @default 'inclusive' */
  totalPagesBound?: TTotalPagesBound
}

/**
 * Private access configuration API. Defaults to the production cloud when neither `cloud` nor
 * `baseUrl` is given.
 */
export class PrivateAccessClient {
  public readonly applications: TApplicationsApi
  public readonly connectors: TConnectorsApi
  public readonly servers: TServersApi
  public readonly certificates: TCertificatesApi
  public readonly identity: TIdentityApi
  public readonly policies: TPoliciesApi

  private session: Session<TClientCredentials>
  private credentials?: TClientCredentials

  constructor(options: TPrivateAccessClientOptions) {
    if (options.customerId === '' || options.customerId === undefined) {
      throw new ConfigurationError('customerId is required')
    }
    validatePositiveNumber('pageSize', options.pageSize)

    const transport = new Transport({
      baseUrl: resolveApiBase('private-access', options, DEFAULT_PRIVATE_ACCESS_CLOUD),
      timeoutInMilliseconds: options.timeoutInMilliseconds,
      fetchImplementation: options.fetchImplementation,
    })
    this.session = new Session({ transport, authenticator: new ClientCredentialsAuthenticator() })
    this.credentials = options.credentials

    const apiOptions: TPrivateAccessApiOptions = {
      session: this.session,
      paginator: new Paginator({ requester: this.session }),
      customerId: options.customerId,
      pageSize: options.pageSize,
      totalPagesBound: options.totalPagesBound,
    }
    this.applications = new ApplicationsApi(apiOptions)
    this.connectors = new ConnectorsApi(apiOptions)
    this.servers = new ServersApi(apiOptions)
    this.certificates = new CertificatesApi(apiOptions)
    this.identity = new IdentityApi(apiOptions)
    this.policies = new PoliciesApi(apiOptions)
  }

  get isAuthenticated(): boolean {
    return this.session.isAuthenticated
  }

  /** Signs in and replaces the bearer token. Falls back to the constructor credentials. */
  public async authenticate(credentials?: TClientCredentials, signal?: AbortSignal): Promise<void> {
    const resolved = resolveCredentials(credentials, this.credentials)
    await this.session.authenticate(resolved, signal)
  }
}

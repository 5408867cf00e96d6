import { ConfigurationError } from '../core/errors.ts'
import { logger } from '../core/logger.ts'
import { Session } from '../core/session.ts'
import { Transport } from '../core/transport.ts'
import type { TSeedProvider } from '../core/types.ts'
import { AdministrationApi, type TAdministrationApi } from '../domains/portal/administration.api.ts'
import { DlpApi, type TDlpApi } from '../domains/portal/dlp.api.ts'
import { PacFilesApi, type TPacFilesApi } from '../domains/portal/pac-files.api.ts'
import { RulesApi, type TRulesApi } from '../domains/portal/rules.api.ts'
import { SettingsApi, type TSettingsApi } from '../domains/portal/settings.api.ts'
import {
  PortalSessionAuthenticator,
  type TPortalCredentials,
} from '../providers/auth/portal-session.ts'
import { PortalPageSeedProvider, StaticSeedProvider } from '../providers/auth/seed-provider.ts'
import { CloudEndpoint } from '../providers/endpoint/cloud-endpoint.ts'
import { resolveApiBase, resolveCredentials, type TClientBaseOptions } from './client-options.ts'

const UNSUPPORTED_ENDPOINTS_WARNING =
  'These API endpoints are unsupported and the vendor can change them at will and without notice.'

export type TAdminPortalClientOptions = TClientBaseOptions & {
  credentials?: TPortalCredentials
  /** Known API key seed. Skips reading it from the portal page. */
  seed?: string
  seedProvider?: TSeedProvider
}

/**
 * Admin portal API as used by the portal's own web app. These endpoints are unsupported by the
 * vendor and may change without notice.
 */
export class AdminPortalClient {
  public readonly dlp: TDlpApi
  public readonly pacFiles: TPacFilesApi
  public readonly settings: TSettingsApi
  public readonly administration: TAdministrationApi
  public readonly rules: TRulesApi

  private session: Session<TPortalCredentials>
  private credentials?: TPortalCredentials

  constructor(options: TAdminPortalClientOptions) {
    logger.warn(UNSUPPORTED_ENDPOINTS_WARNING)

    const transport = new Transport({
      baseUrl: resolveApiBase('admin-portal', options),
      timeoutInMilliseconds: options.timeoutInMilliseconds,
      fetchImplementation: options.fetchImplementation,
    })
    this.session = new Session({
      transport,
      authenticator: new PortalSessionAuthenticator({
        seedProvider: AdminPortalClient.resolveSeedProvider(options),
      }),
    })
    this.credentials = options.credentials

    this.dlp = new DlpApi({ session: this.session })
    this.pacFiles = new PacFilesApi({ session: this.session })
    this.settings = new SettingsApi({ session: this.session })
    this.administration = new AdministrationApi({ session: this.session })
    this.rules = new RulesApi({ session: this.session })
  }

  private static resolveSeedProvider(options: TAdminPortalClientOptions): TSeedProvider {
    if (options.seedProvider) return options.seedProvider
    if (options.seed !== undefined) return new StaticSeedProvider(options.seed)
    if (options.cloud === undefined) {
      throw new ConfigurationError('seed or seedProvider is required when cloud is not set')
    }
    const endpoint = new CloudEndpoint({ surface: 'admin-portal', cloud: options.cloud })
    return new PortalPageSeedProvider({
      portalUrl: endpoint.getPortalBase(),
      timeoutInMilliseconds: options.timeoutInMilliseconds,
      fetchImplementation: options.fetchImplementation,
    })
  }

  get isAuthenticated(): boolean {
    return this.session.isAuthenticated
  }

  /** Opens a portal session. Falls back to the constructor credentials. */
  public async authenticate(credentials?: TPortalCredentials, signal?: AbortSignal): Promise<void> {
    const resolved = resolveCredentials(credentials, this.credentials)
    await this.session.authenticate(resolved, signal)
  }
}

import { ConfigurationError } from '../../core/errors.ts'
import type { TEndpointProvider } from '../../core/types.ts'

export type TProductSurface = 'client-connector' | 'admin-portal' | 'private-access'

export const DEFAULT_PRIVATE_ACCESS_CLOUD = 'private.zscaler.com'

const API_BASE_BY_SURFACE: Record<TProductSurface, (cloud: string) => string> = {
  'client-connector': (cloud) => `https://api-mobile.${cloud}/papi`,
  'admin-portal': (cloud) => `https://admin.${cloud}/zsapi/v1`,
  'private-access': (cloud) => `https://config.${cloud}`,
}

type TCloudEndpointOptions = {
  surface: TProductSurface
  /** Cloud domain the tenant lives in, e.g. zscaler.net or zscalertwo.net */
  cloud: string
}

/** Derives the API base URL of one product surface from the tenant's cloud domain. */
export class CloudEndpoint implements TEndpointProvider {
  private apiBaseUrl: string
  private portalBaseUrl: string

  constructor(options: TCloudEndpointOptions) {
    const cloud =
      typeof options.cloud === 'string'
        ? options.cloud.trim().replace(/^https?:\/\//, '').replace(/\/+$/, '')
        : ''
    if (!cloud || !/^[a-z0-9.-]+$/i.test(cloud)) {
      throw new ConfigurationError(`Invalid cloud: "${options.cloud}"`)
    }

    this.apiBaseUrl = API_BASE_BY_SURFACE[options.surface](cloud)
    this.portalBaseUrl = `https://admin.${cloud}`
  }

  getApiBase(): string {
    return this.apiBaseUrl
  }

  /** Origin of the admin portal web app in the same cloud. */
  getPortalBase(): string {
    return this.portalBaseUrl
  }
}

import { AuthError, ConfigurationError } from '../../core/errors.ts'
import { Transport } from '../../core/transport.ts'
import type { TSeedProvider } from '../../core/types.ts'
import { validateUrl } from '../../core/utils.ts'

const DEFAULT_SEED_PATTERN = /\b(?:apiKeySeed|seed)\b["']?\s*[:=]\s*["']([A-Za-z0-9]{12,})["']/

/** Serves a seed known up front, normally the tenant API key shown in the admin portal. */
export class StaticSeedProvider implements TSeedProvider {
  private readonly seed: string

  constructor(seed: string) {
    if (!seed || typeof seed !== 'string') {
      throw new ConfigurationError('seed must be a non-empty string')
    }
    this.seed = seed
  }

  async getSeed(): Promise<string> {
    return this.seed
  }
}

export type TPortalPageSeedProviderOptions = {
  /** Admin portal origin, e.g. https://admin.zscaler.net */
  portalUrl: string
  /** First capture group must hold the seed. */
  seedPattern?: RegExp
  timeoutInMilliseconds?: number
  fetchImplementation?: typeof fetch
}

/** Reads the seed off the admin portal landing page. */
export class PortalPageSeedProvider implements TSeedProvider {
  private readonly transport: Transport
  private readonly seedPattern: RegExp

  constructor(options: TPortalPageSeedProviderOptions) {
    validateUrl('portalUrl', options.portalUrl)
    this.transport = new Transport({
      baseUrl: options.portalUrl,
      timeoutInMilliseconds: options.timeoutInMilliseconds,
      fetchImplementation: options.fetchImplementation,
    })
    this.seedPattern = options.seedPattern ?? DEFAULT_SEED_PATTERN
  }

  async getSeed(signal?: AbortSignal): Promise<string> {
    const response = await this.transport.request('GET', '/', { signal })
    const seed = this.seedPattern.exec(response.text())?.[1]
    if (!seed) {
      throw new AuthError('No API key seed found on the admin portal page', 'invalid-api-key')
    }
    return seed
  }
}

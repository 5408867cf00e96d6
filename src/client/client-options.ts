import { ConfigurationError } from '../core/errors.ts'
import { validatePositiveNumber, validateUrl } from '../core/utils.ts'
import { CloudEndpoint, type TProductSurface } from '../providers/endpoint/cloud-endpoint.ts'

export type TClientBaseOptions = {
  /** Cloud domain of the tenant, e.g. zscaler.net. Ignored when `baseUrl` is set. */
  cloud?: string
  /** Full API base URL, for proxies and test doubles. */
  baseUrl?: string
  /** Per-request timeout. @default 30000 */
  timeoutInMilliseconds?: number
  fetchImplementation?: typeof fetch
}

export function resolveApiBase(
  surface: TProductSurface,
  options: TClientBaseOptions,
  defaultCloud?: string,
): string {
  validatePositiveNumber('timeoutInMilliseconds', options.timeoutInMilliseconds)
  if (options.baseUrl !== undefined) {
    validateUrl('baseUrl', options.baseUrl)
    return options.baseUrl
  }
  const cloud = options.cloud ?? defaultCloud
  if (cloud === undefined) {
    throw new ConfigurationError('Either cloud or baseUrl must be provided')
  }
  return new CloudEndpoint({ surface, cloud }).getApiBase()
}

export function resolveCredentials<TCredentials>(
  given: TCredentials | undefined,
  fallback: TCredentials | undefined,
): TCredentials {
  const credentials = given ?? fallback
  if (credentials === undefined) {
    throw new ConfigurationError(
      'No credentials available. Pass them to authenticate() or to the client constructor.',
    )
  }
  return credentials
}

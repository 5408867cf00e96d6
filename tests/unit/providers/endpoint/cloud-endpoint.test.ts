import { describe, expect, it } from 'vitest'
import { ConfigurationError } from '../../../../src/core/errors.ts'
import { CloudEndpoint } from '../../../../src/providers/endpoint/cloud-endpoint.ts'

describe('CloudEndpoint', () => {
  it.each([
    ['client-connector', 'https://api-mobile.zscalertwo.net/papi'],
    ['admin-portal', 'https://admin.zscalertwo.net/zsapi/v1'],
    ['private-access', 'https://config.zscalertwo.net'],
  ] as const)('builds the %s base URL', (surface, expected) => {
    expect(new CloudEndpoint({ surface, cloud: 'zscalertwo.net' }).getApiBase()).toBe(expected)
  })

  it('tolerates a scheme and trailing slash on the cloud', () => {
    const endpoint = new CloudEndpoint({ surface: 'admin-portal', cloud: ' https://zscaler.net/ ' })

    expect(endpoint.getApiBase()).toBe('https://admin.zscaler.net/zsapi/v1')
    expect(endpoint.getPortalBase()).toBe('https://admin.zscaler.net')
  })

  it('rejects a cloud with a path or spaces', () => {
    expect(
      () => new CloudEndpoint({ surface: 'client-connector', cloud: 'zscaler.net/x' }),
    ).toThrow(new ConfigurationError('Invalid cloud: "zscaler.net/x"'))
    expect(() => new CloudEndpoint({ surface: 'client-connector', cloud: '' })).toThrow(
      ConfigurationError,
    )
  })
})

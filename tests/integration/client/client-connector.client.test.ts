import { getEventListeners } from 'node:events'
import { describe, expect, it } from 'vitest'
import { ClientConnectorClient } from '../../../src/client/client-connector.ts'
import { AuthError, ConfigurationError } from '../../../src/core/errors.ts'
import { createFetchMock, makeDevices, TEST_CONFIG } from '../../helpers/index.ts'

function setup() {
  const fetchMock = createFetchMock()
  const client = new ClientConnectorClient({
    baseUrl: TEST_CONFIG.baseUrl,
    credentials: { apiKey: TEST_CONFIG.apiKey, secretKey: TEST_CONFIG.secretKey },
    pageDelayMs: 0,
    fetchImplementation: fetchMock.fetchImplementation,
  })
  return { fetchMock, client }
}

describe('ClientConnectorClient', () => {
  describe('constructor', () => {
    it('requires a cloud or a base URL', () => {
      expect(() => new ClientConnectorClient({})).toThrow(ConfigurationError)
    })

    it('rejects a negative page delay', () => {
      expect(
        () => new ClientConnectorClient({ baseUrl: TEST_CONFIG.baseUrl, pageDelayMs: -1 }),
      ).toThrow('pageDelayMs must be a non-negative number')
    })

    it('derives the API host from the cloud', async () => {
      const fetchMock = createFetchMock()
      const client = new ClientConnectorClient({
        cloud: TEST_CONFIG.cloud,
        fetchImplementation: fetchMock.fetchImplementation,
      })
      fetchMock.pushJson({ jwtToken: 'jwt-1' })

      await client.authenticate({ apiKey: TEST_CONFIG.apiKey, secretKey: TEST_CONFIG.secretKey })

      expect(fetchMock.call(0).url.toString()).toBe(
        'https://api-mobile.cloud.test.com/papi/auth/v1/login',
      )
    })
  })

  it('authenticates with the constructor credentials and lists every device page', async () => {
    const { fetchMock, client } = setup()
    const [first, second] = makeDevices(2)
    fetchMock.pushJson({ jwtToken: 'jwt-1' })
    fetchMock.pushJson([first, second])
    fetchMock.pushJson([])

    await client.authenticate()
    const devices = await client.devices.listDevices({ osType: 3 })

    expect(client.isAuthenticated).toBe(true)
    expect(devices).toEqual([first, second])
    expect(fetchMock.jsonBody(0)).toEqual({ apiKey: 'test-api-key', secretKey: 'test-secret' })

    const firstPage = fetchMock.call(1)
    expect(firstPage.url.pathname).toBe('/papi/public/v1/getDevices')
    expect(firstPage.url.searchParams.toString()).toBe('pageSize=500&osType=3&page=1')
    expect(firstPage.headers.get('auth-token')).toBe('jwt-1')
    expect(fetchMock.call(2).url.searchParams.get('page')).toBe('2')
  })

  it('leaves no abort listener on the caller signal after a long listing', async () => {
    const { fetchMock, client } = setup()
    const controller = new AbortController()
    fetchMock.pushJson({ jwtToken: 'jwt-1' })
    for (const device of makeDevices(12)) fetchMock.pushJson([device])
    fetchMock.pushJson([])

    await client.authenticate(undefined, controller.signal)
    const devices = await client.devices.listDevices({}, controller.signal)

    expect(devices).toHaveLength(12)
    expect(fetchMock.calls).toHaveLength(14)
    expect(getEventListeners(controller.signal, 'abort')).toHaveLength(0)
  })

  it('refuses requests before authentication without touching the network', async () => {
    const { fetchMock, client } = setup()

    const error = await client.devices.getOtp('udid-1').catch((e: unknown) => e)

    expect(error).toBeInstanceOf(AuthError)
    expect(error).toHaveProperty('reason', 'not-authenticated')
    expect(fetchMock.fetchImplementation).not.toHaveBeenCalled()
  })

  it('fails authenticate() when no credentials were given anywhere', async () => {
    const client = new ClientConnectorClient({ baseUrl: TEST_CONFIG.baseUrl })

    await expect(client.authenticate()).rejects.toThrow(ConfigurationError)
  })
})

import { describe, expect, it } from 'vitest'
import { DevicesApi } from '../../../src/domains/devices/devices.api.ts'
import { createRequesterMock, makeDevices, makeRawResponse } from '../../helpers/index.ts'

function setup() {
  const mock = createRequesterMock()
  const api = new DevicesApi({ session: mock.requester, paginator: mock.paginator, pageDelayMs: 0 })
  return { ...mock, api }
}

describe('DevicesApi', () => {
  it('listDevices pages through the device list with the given filter', async () => {
    const { api, requestJson } = setup()
    const [first, second, third] = makeDevices(3)
    requestJson
      .mockResolvedValueOnce([first, second])
      .mockResolvedValueOnce([third])
      .mockResolvedValueOnce([])

    const devices = await api.listDevices({ username: 'user@test.com', osType: 3 })

    expect(devices).toEqual([first, second, third])
    expect(requestJson).toHaveBeenCalledTimes(3)
    expect(requestJson).toHaveBeenNthCalledWith(1, 'GET', '/public/v1/getDevices', {
      queryString: { pageSize: 500, username: 'user@test.com', osType: 3, page: 1 },
    })
    expect(requestJson).toHaveBeenNthCalledWith(3, 'GET', '/public/v1/getDevices', {
      queryString: { pageSize: 500, username: 'user@test.com', osType: 3, page: 3 },
    })
  })

  it('getOtp looks the password up by UDID', async () => {
    const { api, requestJson } = setup()
    requestJson.mockResolvedValueOnce({ otp: '482910' })

    await expect(api.getOtp('udid-1')).resolves.toEqual({ otp: '482910' })
    expect(requestJson).toHaveBeenCalledWith('GET', '/public/v1/getOtp', {
      queryString: { udid: 'udid-1' },
    })
  })

  it('listPasswords adds the company id', async () => {
    const { api, requestJson } = setup()
    requestJson.mockResolvedValueOnce({ logoutPass: 'x' })

    await api.listPasswords(42, 'udid-1')

    expect(requestJson).toHaveBeenCalledWith('GET', '/public/v1/getOtp', {
      queryString: { companyId: 42, udid: 'udid-1' },
    })
  })

  it('removeDevices defaults the OS type to 0', async () => {
    const { api, requestJson } = setup()
    requestJson.mockResolvedValueOnce({ devicesRemoved: 2 })

    await expect(api.removeDevices({ companyId: 42, udids: ['u1', 'u2'] })).resolves.toEqual({
      devicesRemoved: 2,
    })
    expect(requestJson).toHaveBeenCalledWith('POST', '/public/v1/removeDevices', {
      body: { companyId: 42, udids: ['u1', 'u2'], osType: 0 },
    })
  })

  it('forceRemoveDevices sends empty defaults', async () => {
    const { api, requestJson } = setup()
    requestJson.mockResolvedValueOnce({ devicesRemoved: 0 })

    await api.forceRemoveDevices()

    expect(requestJson).toHaveBeenCalledWith('POST', '/public/v1/forceRemoveDevices', {
      body: { udids: [], osType: 0 },
    })
  })

  it('downloadServiceStatus returns the raw response', async () => {
    const { api, request } = setup()
    const raw = makeRawResponse(200, 'udid,status\nu1,ok\n')
    request.mockResolvedValueOnce(raw)

    await expect(api.downloadServiceStatus(42)).resolves.toBe(raw)
    expect(request).toHaveBeenCalledWith('GET', '/public/v1/downloadServiceStatus', {
      queryString: { companyId: 42 },
    })
  })
})

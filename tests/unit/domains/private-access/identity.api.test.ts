import { describe, expect, it } from 'vitest'
import { IdentityApi } from '../../../../src/domains/private-access/identity.api.ts'
import { createRequesterMock, makeListingPage } from '../../../helpers/index.ts'

function setup() {
  const mock = createRequesterMock()
  const api = new IdentityApi({
    session: mock.requester,
    paginator: mock.paginator,
    customerId: 1234,
  })
  return { ...mock, api }
}

describe('IdentityApi', () => {
  it('listIdps returns a single page without looping', async () => {
    const { api, requestJson } = setup()
    requestJson.mockResolvedValueOnce(makeListingPage([{ id: 'idp-1' }], 1))

    await expect(api.listIdps()).resolves.toEqual([{ id: 'idp-1' }])
    expect(requestJson).toHaveBeenCalledTimes(1)
    expect(requestJson).toHaveBeenCalledWith('GET', '/mgmtconfig/v2/admin/customers/1234/idp', {
      queryString: { pagesize: 500 },
    })
  })

  it('listScimAttributes returns one listing page for the IdP', async () => {
    const { api, requestJson } = setup()
    const page = makeListingPage([{ id: 'attr-1' }])
    requestJson.mockResolvedValueOnce(page)

    await expect(api.listScimAttributes(77, { pageSize: 10 })).resolves.toEqual(page)
    expect(requestJson).toHaveBeenCalledWith(
      'GET',
      '/mgmtconfig/v1/admin/customers/1234/idp/77/scimattribute',
      { queryString: { pagesize: 10 } },
    )
  })

  it('listScimGroups loops when several pages are reported', async () => {
    const { api, requestJson } = setup()
    requestJson
      .mockResolvedValueOnce(makeListingPage([{ id: 'probe' }], 2))
      .mockResolvedValueOnce(makeListingPage([{ id: 'g0' }], 2))
      .mockResolvedValueOnce(makeListingPage([{ id: 'g1' }], 2))
      .mockResolvedValueOnce(makeListingPage([], 2))

    await expect(api.listScimGroups(77, { search: 'eng' })).resolves.toEqual([
      { id: 'g0' },
      { id: 'g1' },
    ])
    expect(requestJson).toHaveBeenNthCalledWith(
      2,
      'GET',
      '/userconfig/v1/customers/1234/scimgroup/idpId/77',
      { queryString: { pagesize: 500, search: 'eng', page: 0 } },
    )
  })

  it('listSamlAttributes uses the v2 path', async () => {
    const { api, requestJson } = setup()
    requestJson.mockResolvedValueOnce({})

    await expect(api.listSamlAttributes()).resolves.toEqual([])
    expect(requestJson).toHaveBeenCalledWith(
      'GET',
      '/mgmtconfig/v2/admin/customers/1234/samlAttribute',
      { queryString: { pagesize: 500 } },
    )
  })
})

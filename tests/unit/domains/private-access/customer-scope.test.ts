import { describe, expect, expectTypeOf, it } from 'vitest'
import type { TApplicationsApi } from '../../../../src/domains/private-access/applications.api.ts'
import { CustomerScope } from '../../../../src/domains/private-access/customer-scope.ts'
import type { TIdentityApi } from '../../../../src/domains/private-access/identity.api.ts'
import type { TPoliciesApi } from '../../../../src/domains/private-access/policies.api.ts'
import type { TServersApi } from '../../../../src/domains/private-access/servers.api.ts'

type TQueryOf<TMethod extends (...args: never[]) => unknown> = NonNullable<Parameters<TMethod>[0]>

describe('CustomerScope', () => {
  const scope = new CustomerScope({ customerId: 1234 })

  it('builds management and user config paths for the tenant', () => {
    expect(scope.mgmt(1, '/server')).toBe('/mgmtconfig/v1/admin/customers/1234/server')
    expect(scope.mgmt(2, '/idp')).toBe('/mgmtconfig/v2/admin/customers/1234/idp')
    expect(scope.user('/scimgroup')).toBe('/userconfig/v1/customers/1234/scimgroup')
  })

  it('escapes the customer id', () => {
    expect(new CustomerScope({ customerId: 'a b' }).user('')).toBe('/userconfig/v1/customers/a%20b')
  })

  it('carries page size and bound into the listing dialects', () => {
    const configured = new CustomerScope({
      customerId: 1,
      pageSize: 100,
      totalPagesBound: 'exclusive',
    })

    expect(configured.totalPages()).toEqual({
      kind: 'total-pages',
      pageSize: 100,
      bound: 'exclusive',
    })
    expect(configured.sized({ pageSize: 20 })).toEqual({
      kind: 'sized',
      pageSize: 20,
      bound: 'exclusive',
    })
  })

  it('defaults the single-page query size to 500', () => {
    expect(scope.singlePage()).toEqual({ pagesize: 500, page: undefined, search: undefined })
    expect(scope.singlePage({ page: 2, pageSize: 20, search: 'db' })).toEqual({
      pagesize: 20,
      page: 2,
      search: 'db',
    })
  })

  it('takes no page cursor on paginated listings', () => {
    expectTypeOf<TQueryOf<TApplicationsApi['listSegmentGroups']>>().not.toHaveProperty('page')
    expectTypeOf<TQueryOf<TIdentityApi['listIdps']>>().not.toHaveProperty('page')
    expectTypeOf<TQueryOf<TPoliciesApi['listPostureProfiles']>>().not.toHaveProperty('page')
    expectTypeOf<TQueryOf<TPoliciesApi['listPrivilegedConsoles']>>().not.toHaveProperty('page')
    expectTypeOf<NonNullable<Parameters<TIdentityApi['listScimGroups']>[1]>>().not.toHaveProperty(
      'page',
    )
    expectTypeOf<TQueryOf<TServersApi['listServers']>>().toHaveProperty('page')
  })
})

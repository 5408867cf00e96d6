import { requestObject } from '../../core/json.ts'
import type { Paginator } from '../../core/pagination.ts'
import type { TJsonObject, TListQuery, TPagedListQuery, TRequester } from '../../core/types.ts'
import { resourcePath, type TResourceId } from '../../types/api.ts'
import { CustomerScope, type TPrivateAccessApiOptions } from './customer-scope.ts'

export interface TIdentityApi {
  listIdps(query?: TPagedListQuery, signal?: AbortSignal): Promise<TJsonObject[]>
  listScimAttributes(
    idpId: TResourceId,
    query?: TListQuery,
    signal?: AbortSignal,
  ): Promise<TJsonObject>
  listScimGroups(
    idpId: TResourceId,
    query?: TPagedListQuery,
    signal?: AbortSignal,
  ): Promise<TJsonObject[]>
  listSamlAttributes(signal?: AbortSignal): Promise<TJsonObject[]>
}

/** Identity providers and the SCIM / SAML attributes they publish. */
export class IdentityApi implements TIdentityApi {
  private session: TRequester
  private paginator: Paginator
  private scope: CustomerScope

  constructor(options: TPrivateAccessApiOptions) {
    this.session = options.session
    this.paginator = options.paginator
    this.scope = new CustomerScope(options)
  }

  public async listIdps(
    query: TPagedListQuery = {},
    signal?: AbortSignal,
  ): Promise<TJsonObject[]> {
    return await this.paginator.listAll(this.scope.mgmt(2, '/idp'), this.scope.sized(query), {
      queryString: { search: query.search },
      signal,
    })
  }

  public async listScimAttributes(
    idpId: TResourceId,
    query: TListQuery = {},
    signal?: AbortSignal,
  ): Promise<TJsonObject> {
    const path = `${resourcePath(this.scope.mgmt(1, '/idp'), idpId)}/scimattribute`
    return await requestObject(this.session, 'GET', path, {
      queryString: this.scope.singlePage(query),
      signal,
    })
  }

  public async listScimGroups(
    idpId: TResourceId,
    query: TPagedListQuery = {},
    signal?: AbortSignal,
  ): Promise<TJsonObject[]> {
    const path = resourcePath(this.scope.user('/scimgroup/idpId'), idpId)
    return await this.paginator.listAll(path, this.scope.sized(query), {
      queryString: { search: query.search },
      signal,
    })
  }

  public async listSamlAttributes(signal?: AbortSignal): Promise<TJsonObject[]> {
    return await this.paginator.listAll(
      this.scope.mgmt(2, '/samlAttribute'),
      this.scope.totalPages(),
      { signal },
    )
  }
}

import { requestObject } from '../../core/json.ts'
import type { Paginator } from '../../core/pagination.ts'
import type { TJsonObject, TListQuery, TRawResponse, TRequester } from '../../core/types.ts'
import { resourcePath, type TResourceId } from '../../types/api.ts'
import { CustomerScope, type TPrivateAccessApiOptions } from './customer-scope.ts'
import type { TProvisioningAssociationType } from './types.ts'

export interface TConnectorsApi {
  listConnectors(signal?: AbortSignal): Promise<TJsonObject[]>
  getConnector(id: TResourceId, signal?: AbortSignal): Promise<TJsonObject>
  bulkDeleteConnectors(ids: TResourceId[], signal?: AbortSignal): Promise<TRawResponse>
  listConnectorGroups(signal?: AbortSignal): Promise<TJsonObject[]>
  getConnectorGroup(id: TResourceId, signal?: AbortSignal): Promise<TJsonObject>
  listCloudConnectorGroups(query?: TListQuery, signal?: AbortSignal): Promise<TJsonObject>
  getCloudConnectorGroup(id: TResourceId, signal?: AbortSignal): Promise<TJsonObject>
  listProvisioningKeys(
    associationType?: TProvisioningAssociationType,
    signal?: AbortSignal,
  ): Promise<TJsonObject[]>
}

/** App connectors, connector groups and their provisioning keys. */
export class ConnectorsApi implements TConnectorsApi {
  private session: TRequester
  private paginator: Paginator
  private scope: CustomerScope

  constructor(options: TPrivateAccessApiOptions) {
    this.session = options.session
    this.paginator = options.paginator
    this.scope = new CustomerScope(options)
  }

  public async listConnectors(signal?: AbortSignal): Promise<TJsonObject[]> {
    return await this.paginator.listAll(
      this.scope.mgmt(1, '/connector'),
      this.scope.totalPages(),
      { signal },
    )
  }

  public async getConnector(id: TResourceId, signal?: AbortSignal): Promise<TJsonObject> {
    const path = resourcePath(this.scope.mgmt(1, '/connector'), id)
    return await requestObject(this.session, 'GET', path, { signal })
  }

  public async bulkDeleteConnectors(
    ids: TResourceId[],
    signal?: AbortSignal,
  ): Promise<TRawResponse> {
    return await this.session.request('POST', this.scope.mgmt(1, '/connector/bulkDelete'), {
      body: { ids },
      signal,
    })
  }

  public async listConnectorGroups(signal?: AbortSignal): Promise<TJsonObject[]> {
    return await this.paginator.listAll(
      this.scope.mgmt(1, '/appConnectorGroup'),
      this.scope.totalPages(),
      { signal },
    )
  }

  public async getConnectorGroup(id: TResourceId, signal?: AbortSignal): Promise<TJsonObject> {
    const path = resourcePath(this.scope.mgmt(1, '/appConnectorGroup'), id)
    return await requestObject(this.session, 'GET', path, { signal })
  }

  /** One listing page as returned by the API (`totalPages`, `list`). */
  public async listCloudConnectorGroups(
    query: TListQuery = {},
    signal?: AbortSignal,
  ): Promise<TJsonObject> {
    return await requestObject(this.session, 'GET', this.scope.mgmt(1, '/cloudConnectorGroup'), {
      queryString: this.scope.singlePage(query),
      signal,
    })
  }

  public async getCloudConnectorGroup(id: TResourceId, signal?: AbortSignal): Promise<TJsonObject> {
    const path = resourcePath(this.scope.mgmt(1, '/cloudConnectorGroup'), id)
    return await requestObject(this.session, 'GET', path, { signal })
  }

  public async listProvisioningKeys(
    associationType: TProvisioningAssociationType = 'CONNECTOR_GRP',
    signal?: AbortSignal,
  ): Promise<TJsonObject[]> {
    const path = this.scope.mgmt(1, `/associationType/${associationType}/provisioningKey`)
    return await this.paginator.listAll(path, this.scope.totalPages(), { signal })
  }
}

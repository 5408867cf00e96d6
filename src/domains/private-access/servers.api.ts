import { requestObject } from '../../core/json.ts'
import type { Paginator } from '../../core/pagination.ts'
import type { TJsonObject, TListQuery, TRequester } from '../../core/types.ts'
import { resourcePath, type TResourceId } from '../../types/api.ts'
import { CustomerScope, type TPrivateAccessApiOptions } from './customer-scope.ts'
import type { TServerGroupInput } from './types.ts'

export interface TServersApi {
  listServers(query?: TListQuery, signal?: AbortSignal): Promise<TJsonObject>
  getServer(id: TResourceId, signal?: AbortSignal): Promise<TJsonObject>
  listServerGroups(signal?: AbortSignal): Promise<TJsonObject[]>
  getServerGroup(id: TResourceId, signal?: AbortSignal): Promise<TJsonObject>
  addServerGroup(input: TServerGroupInput, signal?: AbortSignal): Promise<TJsonObject>
}

export class ServersApi implements TServersApi {
  private session: TRequester
  private paginator: Paginator
  private scope: CustomerScope

  constructor(options: TPrivateAccessApiOptions) {
    this.session = options.session
    this.paginator = options.paginator
    this.scope = new CustomerScope(options)
  }

  /** One listing page of application servers. */
  public async listServers(query: TListQuery = {}, signal?: AbortSignal): Promise<TJsonObject> {
    return await requestObject(this.session, 'GET', this.scope.mgmt(1, '/server'), {
      queryString: this.scope.singlePage(query),
      signal,
    })
  }

  public async getServer(id: TResourceId, signal?: AbortSignal): Promise<TJsonObject> {
    const path = resourcePath(this.scope.mgmt(1, '/server'), id)
    return await requestObject(this.session, 'GET', path, { signal })
  }

  public async listServerGroups(signal?: AbortSignal): Promise<TJsonObject[]> {
    return await this.paginator.listAll(
      this.scope.mgmt(1, '/serverGroup'),
      this.scope.totalPages(),
      { signal },
    )
  }

  public async getServerGroup(id: TResourceId, signal?: AbortSignal): Promise<TJsonObject> {
    const path = resourcePath(this.scope.mgmt(1, '/serverGroup'), id)
    return await requestObject(this.session, 'GET', path, { signal })
  }

  /** Creates an enabled group with dynamic server discovery. */
  public async addServerGroup(
    input: TServerGroupInput,
    signal?: AbortSignal,
  ): Promise<TJsonObject> {
    return await requestObject(this.session, 'POST', this.scope.mgmt(1, '/serverGroup'), {
      body: {
        enabled: true,
        dynamicDiscovery: true,
        name: input.name,
        description: input.description,
        servers: [],
        appConnectorGroups: input.appConnectorGroups,
      },
      signal,
    })
  }
}

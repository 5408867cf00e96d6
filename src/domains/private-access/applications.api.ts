import { expectJsonObjectArray, requestObject } from '../../core/json.ts'
import type { Paginator } from '../../core/pagination.ts'
import type {
  TJsonObject,
  TPagedListQuery,
  TRawResponse,
  TRequester,
} from '../../core/types.ts'
import { resourcePath, type TResourceId } from '../../types/api.ts'
import { CustomerScope, type TPrivateAccessApiOptions } from './customer-scope.ts'
import type { TApplicationSegmentInput, TSegmentGroupInput } from './types.ts'

export interface TApplicationsApi {
  listSegments(signal?: AbortSignal): Promise<TJsonObject[]>
  getSegment(id: TResourceId, signal?: AbortSignal): Promise<TJsonObject>
  addSegment(input: TApplicationSegmentInput, signal?: AbortSignal): Promise<TJsonObject>
  updateSegment(id: TResourceId, payload: TJsonObject, signal?: AbortSignal): Promise<TRawResponse>
  deleteSegment(id: TResourceId, signal?: AbortSignal): Promise<TRawResponse>
  listSegmentGroups(query?: TPagedListQuery, signal?: AbortSignal): Promise<TJsonObject[]>
  getSegmentGroup(id: TResourceId, signal?: AbortSignal): Promise<TJsonObject>
  addSegmentGroup(input: TSegmentGroupInput, signal?: AbortSignal): Promise<TJsonObject>
  listSraConsoles(signal?: AbortSignal): Promise<TJsonObject[]>
}

/** Application segments and segment groups. */
export class ApplicationsApi implements TApplicationsApi {
  private session: TRequester
  private paginator: Paginator
  private scope: CustomerScope

  constructor(options: TPrivateAccessApiOptions) {
    this.session = options.session
    this.paginator = options.paginator
    this.scope = new CustomerScope(options)
  }

  public async listSegments(signal?: AbortSignal): Promise<TJsonObject[]> {
    return await this.paginator.listAll(
      this.scope.mgmt(1, '/application'),
      this.scope.totalPages(),
      { signal },
    )
  }

  public async getSegment(id: TResourceId, signal?: AbortSignal): Promise<TJsonObject> {
    const path = resourcePath(this.scope.mgmt(1, '/application'), id)
    return await requestObject(this.session, 'GET', path, { signal })
  }

  public async addSegment(
    input: TApplicationSegmentInput,
    signal?: AbortSignal,
  ): Promise<TJsonObject> {
    const body: TJsonObject = {
      name: input.name,
      description: input.description ?? '',
      enabled: input.enabled ?? true,
      healthCheckType: input.healthCheckType ?? 'DEFAULT',
      healthReporting: input.healthReporting,
      icmpAccessType: input.icmpAccessType ?? 'NONE',
      ipAnchored: input.ipAnchored ?? false,
      doubleEncrypt: input.doubleEncrypt ?? false,
      bypassType: input.bypassType ?? 'NEVER',
      isCnameEnabled: input.isCnameEnabled ?? true,
      clientlessApps: input.clientlessApps ?? [],
      inspectionApps: input.inspectionApps ?? [],
      sraApps: input.sraApps ?? [],
      commonAppsDto: input.commonAppsDto ?? [],
      selectConnectorCloseToApp: input.selectConnectorCloseToApp ?? false,
      passiveHealthEnabled: input.passiveHealthEnabled ?? true,
      tcpPortRanges: input.tcpPortRanges ?? [],
      tcpPortRange: input.tcpPortRange ?? {},
      udpPortRange: input.udpPortRange ?? {},
      udpPortRanges: input.udpPortRanges ?? [],
      domainNames: input.domainNames,
      segmentGroupId: input.segmentGroupId,
      segmentGroupName: input.segmentGroupName ?? '',
      serverGroups: input.serverGroups,
    }
    return await requestObject(this.session, 'POST', this.scope.mgmt(1, '/application'), {
      body,
      signal,
    })
  }

  public async updateSegment(
    id: TResourceId,
    payload: TJsonObject,
    signal?: AbortSignal,
  ): Promise<TRawResponse> {
    const path = resourcePath(this.scope.mgmt(1, '/application'), id)
    return await this.session.request('PUT', path, { body: payload, signal })
  }

  public async deleteSegment(id: TResourceId, signal?: AbortSignal): Promise<TRawResponse> {
    const path = resourcePath(this.scope.mgmt(1, '/application'), id)
    return await this.session.request('DELETE', path, { signal })
  }

  public async listSegmentGroups(
    query: TPagedListQuery = {},
    signal?: AbortSignal,
  ): Promise<TJsonObject[]> {
    return await this.paginator.listAll(
      this.scope.mgmt(1, '/segmentGroup'),
      this.scope.sized(query),
      { queryString: { search: query.search }, signal },
    )
  }

  public async getSegmentGroup(id: TResourceId, signal?: AbortSignal): Promise<TJsonObject> {
    const path = resourcePath(this.scope.mgmt(1, '/segmentGroup'), id)
    return await requestObject(this.session, 'GET', path, { signal })
  }

  public async addSegmentGroup(
    input: TSegmentGroupInput,
    signal?: AbortSignal,
  ): Promise<TJsonObject> {
    return await requestObject(this.session, 'POST', this.scope.mgmt(1, '/segmentGroup'), {
      body: { name: input.name, description: input.description, enabled: input.enabled ?? true },
      signal,
    })
  }

  /** Privileged remote access apps gathered from every application segment, in segment order. */
  public async listSraConsoles(signal?: AbortSignal): Promise<TJsonObject[]> {
    const segments = await this.listSegments(signal)
    const consoles: TJsonObject[] = []
    for (const segment of segments) {
      if (segment.sraApps === undefined || segment.sraApps === null) continue
      consoles.push(...expectJsonObjectArray(segment.sraApps, 'application segment sraApps'))
    }
    return consoles
  }
}

import { requestObject, requestObjectArray } from '../../core/json.ts'
import type {
  THttpMethod,
  TJsonObject,
  TRawResponse,
  TRequester,
  TRequestOptions,
} from '../../core/types.ts'
import { resourcePath, type TResourceId } from '../../types/api.ts'

export type TAdministrationApiOptions = {
  session: TRequester
}

/** Groups, departments, admin roles and users, API keys and EUSA acceptance. */
export interface TAdministrationApi {
  addUserGroup(name: string, signal?: AbortSignal): Promise<TJsonObject>
  deleteGroup(id: TResourceId, signal?: AbortSignal): Promise<TRawResponse>
  deleteDepartment(id: TResourceId, signal?: AbortSignal): Promise<TRawResponse>
  createAdminRole(payload: TJsonObject, signal?: AbortSignal): Promise<TRawResponse>
  deleteAdminRole(id: TResourceId, signal?: AbortSignal): Promise<TRawResponse>
  createAdminUser(payload: TJsonObject, signal?: AbortSignal): Promise<TRawResponse>
  updateAdminUser(
    id: TResourceId,
    payload: TJsonObject,
    signal?: AbortSignal,
  ): Promise<TRawResponse>
  deleteAdminUser(id: TResourceId, signal?: AbortSignal): Promise<TRawResponse>
  listApiKeys(signal?: AbortSignal): Promise<TJsonObject[]>
  createApiKey(signal?: AbortSignal): Promise<TRawResponse>
  updateApiKey(id: TResourceId, payload: TJsonObject, signal?: AbortSignal): Promise<TRawResponse>
  deleteApiKey(id: TResourceId, signal?: AbortSignal): Promise<TRawResponse>
  getLatestEusaStatus(signal?: AbortSignal): Promise<TRawResponse>
  createEusaStatus(payload: TJsonObject, signal?: AbortSignal): Promise<TRawResponse>
}

export class AdministrationApi implements TAdministrationApi {
  private session: TRequester

  constructor(options: TAdministrationApiOptions) {
    this.session = options.session
  }

  /** Status is left to the caller. */
  private async send(
    httpMethod: THttpMethod,
    path: string,
    options: TRequestOptions,
  ): Promise<TRawResponse> {
    return await this.session.request(httpMethod, path, { ...options, raiseOnError: false })
  }

  public async addUserGroup(name: string, signal?: AbortSignal): Promise<TJsonObject> {
    return await requestObject(this.session, 'POST', '/groups', { body: { name }, signal })
  }

  public async deleteGroup(id: TResourceId, signal?: AbortSignal): Promise<TRawResponse> {
    return await this.send('DELETE', resourcePath('/groups', id), { signal })
  }

  public async deleteDepartment(id: TResourceId, signal?: AbortSignal): Promise<TRawResponse> {
    return await this.send('DELETE', resourcePath('/departments', id), { signal })
  }

  public async createAdminRole(payload: TJsonObject, signal?: AbortSignal): Promise<TRawResponse> {
    return await this.send('POST', '/adminRoles', { body: payload, signal })
  }

  /** Fails while users are still assigned to the role. */
  public async deleteAdminRole(id: TResourceId, signal?: AbortSignal): Promise<TRawResponse> {
    return await this.send('DELETE', resourcePath('/adminRoles', id), { signal })
  }

  public async createAdminUser(payload: TJsonObject, signal?: AbortSignal): Promise<TRawResponse> {
    return await this.send('POST', '/adminUsers', { body: payload, signal })
  }

  public async updateAdminUser(
    id: TResourceId,
    payload: TJsonObject,
    signal?: AbortSignal,
  ): Promise<TRawResponse> {
    return await this.send('PUT', resourcePath('/adminUsers', id), { body: payload, signal })
  }

  public async deleteAdminUser(id: TResourceId, signal?: AbortSignal): Promise<TRawResponse> {
    return await this.send('DELETE', resourcePath('/adminUsers', id), { signal })
  }

  public async listApiKeys(signal?: AbortSignal): Promise<TJsonObject[]> {
    return await requestObjectArray(this.session, 'GET', '/apiKeys', { signal })
  }

  public async createApiKey(signal?: AbortSignal): Promise<TRawResponse> {
    return await this.send('POST', '/apiKeys/generate', { signal })
  }

  public async updateApiKey(
    id: TResourceId,
    payload: TJsonObject,
    signal?: AbortSignal,
  ): Promise<TRawResponse> {
    return await this.send('PUT', resourcePath('/apiKeys', id), { body: payload, signal })
  }

  public async deleteApiKey(id: TResourceId, signal?: AbortSignal): Promise<TRawResponse> {
    return await this.send('DELETE', resourcePath('/apiKeys', id), { signal })
  }

  public async getLatestEusaStatus(signal?: AbortSignal): Promise<TRawResponse> {
    return await this.send('GET', '/eusaStatus/latest', { signal })
  }

  public async createEusaStatus(payload: TJsonObject, signal?: AbortSignal): Promise<TRawResponse> {
    return await this.send('POST', '/eusaStatus', { body: payload, signal })
  }
}

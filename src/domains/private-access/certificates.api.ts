import { requestObject } from '../../core/json.ts'
import type { Paginator } from '../../core/pagination.ts'
import type { TJsonObject, TListQuery, TRequester } from '../../core/types.ts'
import { CustomerScope, type TPrivateAccessApiOptions } from './customer-scope.ts'

export interface TCertificatesApi {
  listBrowserAccessCertificates(signal?: AbortSignal): Promise<TJsonObject[]>
  listEnrollmentCertificates(signal?: AbortSignal): Promise<TJsonObject[]>
  listIssuedCertificates(signal?: AbortSignal): Promise<TJsonObject[]>
  listVisibleVersionProfiles(signal?: AbortSignal): Promise<TJsonObject[]>
  getCustomerVersionProfiles(query?: TListQuery, signal?: AbortSignal): Promise<TJsonObject>
}

/** Certificates and the connector software version profiles visible to the tenant. */
export class CertificatesApi implements TCertificatesApi {
  private session: TRequester
  private paginator: Paginator
  private scope: CustomerScope

  constructor(options: TPrivateAccessApiOptions) {
    this.session = options.session
    this.paginator = options.paginator
    this.scope = new CustomerScope(options)
  }

  private async listAll(path: string, signal?: AbortSignal): Promise<TJsonObject[]> {
    return await this.paginator.listAll(path, this.scope.totalPages(), { signal })
  }

  public async listBrowserAccessCertificates(signal?: AbortSignal): Promise<TJsonObject[]> {
    return await this.listAll(this.scope.mgmt(2, '/clientlessCertificate/issued'), signal)
  }

  public async listEnrollmentCertificates(signal?: AbortSignal): Promise<TJsonObject[]> {
    return await this.listAll(this.scope.mgmt(2, '/enrollmentCert'), signal)
  }

  public async listIssuedCertificates(signal?: AbortSignal): Promise<TJsonObject[]> {
    return await this.listAll(this.scope.mgmt(2, '/certificate/issued'), signal)
  }

  public async listVisibleVersionProfiles(signal?: AbortSignal): Promise<TJsonObject[]> {
    return await this.listAll(this.scope.mgmt(1, '/visible/versionProfiles'), signal)
  }

  /** One listing page of version profiles. */
  public async getCustomerVersionProfiles(
    query: TListQuery = {},
    signal?: AbortSignal,
  ): Promise<TJsonObject> {
    const path = this.scope.mgmt(1, '/visible/versionProfiles')
    return await requestObject(this.session, 'GET', path, {
      queryString: this.scope.singlePage(query),
      signal,
    })
  }
}

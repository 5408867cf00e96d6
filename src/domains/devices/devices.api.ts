import { requestObject } from '../../core/json.ts'
import type { Paginator } from '../../core/pagination.ts'
import type { TJsonObject, TRawResponse, TRequester } from '../../core/types.ts'
import type {
  TForceRemoveDevicesRequest,
  TListDevicesFilter,
  TRemoveDevicesRequest,
} from './types.ts'

export type TDevicesApiOptions = {
  session: TRequester
  paginator: Paginator
  /** Pause between device list pages. */
  pageDelayMs?: number
}

/** Enrolled-device endpoints of the Client Connector API. */
export interface TDevicesApi {
  listDevices(filter?: TListDevicesFilter, signal?: AbortSignal): Promise<TJsonObject[]>
  getOtp(udid: string, signal?: AbortSignal): Promise<TJsonObject>
  listPasswords(companyId: number, udid: string, signal?: AbortSignal): Promise<TJsonObject>
  removeDevices(request: TRemoveDevicesRequest, signal?: AbortSignal): Promise<TJsonObject>
  forceRemoveDevices(
    request?: TForceRemoveDevicesRequest,
    signal?: AbortSignal,
  ): Promise<TJsonObject>
  downloadServiceStatus(companyId: number, signal?: AbortSignal): Promise<TRawResponse>
}

export class DevicesApi implements TDevicesApi {
  private session: TRequester
  private paginator: Paginator
  private pageDelayMs?: number

  constructor(options: TDevicesApiOptions) {
    this.session = options.session
    this.paginator = options.paginator
    this.pageDelayMs = options.pageDelayMs
  }

  /** Every enrolled device of the organisation, optionally narrowed to one user or OS. */
  public async listDevices(
    filter: TListDevicesFilter = {},
    signal?: AbortSignal,
  ): Promise<TJsonObject[]> {
    return await this.paginator.listAll(
      '/public/v1/getDevices',
      { kind: 'empty-page', pageDelayMs: this.pageDelayMs },
      { queryString: { username: filter.username, osType: filter.osType }, signal },
    )
  }

  /** One-time password tied to a device UDID. */
  public async getOtp(udid: string, signal?: AbortSignal): Promise<TJsonObject> {
    return await requestObject(this.session, 'GET', '/public/v1/getOtp', {
      queryString: { udid },
      signal,
    })
  }

  public async listPasswords(
    companyId: number,
    udid: string,
    signal?: AbortSignal,
  ): Promise<TJsonObject> {
    return await requestObject(this.session, 'GET', '/public/v1/getOtp', {
      queryString: { companyId, udid },
      signal,
    })
  }

  /** Marks devices for removal (Device Removal Pending). */
  public async removeDevices(
    request: TRemoveDevicesRequest,
    signal?: AbortSignal,
  ): Promise<TJsonObject> {
    return await requestObject(this.session, 'POST', '/public/v1/removeDevices', {
      body: { companyId: request.companyId, udids: request.udids, osType: request.osType ?? 0 },
      signal,
    })
  }

  /**
   * Moves devices straight to Removed and invalidates the users' sessions.
   */
  public async forceRemoveDevices(
    request: TForceRemoveDevicesRequest = {},
    signal?: AbortSignal,
  ): Promise<TJsonObject> {
    return await requestObject(this.session, 'POST', '/public/v1/forceRemoveDevices', {
      body: { udids: request.udids ?? [], osType: request.osType ?? 0 },
      signal,
    })
  }

  /** Service status export; the body is a file, so the raw response is returned. */
  public async downloadServiceStatus(
    companyId: number,
    signal?: AbortSignal,
  ): Promise<TRawResponse> {
    return await this.session.request('GET', '/public/v1/downloadServiceStatus', {
      queryString: { companyId },
      signal,
    })
  }
}

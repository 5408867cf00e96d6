import { requestObject, requestObjectArray } from '../../core/json.ts'
import type { TJsonObject, TRawResponse, TRequester } from '../../core/types.ts'

export type TSettingsApiOptions = {
  session: TRequester
}

/** Tenant-wide policy and administration settings. */
export interface TSettingsApi {
  getMalwarePolicy(signal?: AbortSignal): Promise<TJsonObject>
  getVirusSpywareSettings(signal?: AbortSignal): Promise<TJsonObject>
  getAdvancedUrlFilteringSettings(signal?: AbortSignal): Promise<TJsonObject>
  getCyberRiskScore(signal?: AbortSignal): Promise<TJsonObject>
  getSamlSettings(signal?: AbortSignal): Promise<TJsonObject>
  getAdvancedSettings(signal?: AbortSignal): Promise<TJsonObject>
  getAuthSettings(signal?: AbortSignal): Promise<TJsonObject>
  getSamlAdminSettings(signal?: AbortSignal): Promise<TJsonObject>
  getEndUserNotifications(signal?: AbortSignal): Promise<TJsonObject>
  getAdminPasswordExpiry(signal?: AbortSignal): Promise<TJsonObject>
  listSubscriptions(signal?: AbortSignal): Promise<TJsonObject[]>
  listIdpConfigs(signal?: AbortSignal): Promise<TJsonObject[]>
  listIcapServers(signal?: AbortSignal): Promise<TJsonObject[]>
  updateAuthSettings(payload: TJsonObject, signal?: AbortSignal): Promise<TRawResponse>
  updateAdvancedThreatSettings(payload: TJsonObject, signal?: AbortSignal): Promise<TRawResponse>
}

export class SettingsApi implements TSettingsApi {
  private session: TRequester

  constructor(options: TSettingsApiOptions) {
    this.session = options.session
  }

  private async getObject(path: string, signal?: AbortSignal): Promise<TJsonObject> {
    return await requestObject(this.session, 'GET', path, { signal })
  }

  private async getSequence(path: string, signal?: AbortSignal): Promise<TJsonObject[]> {
    return await requestObjectArray(this.session, 'GET', path, { signal })
  }

  /** Policy > Malware Protection > Malware Policy */
  public async getMalwarePolicy(signal?: AbortSignal): Promise<TJsonObject> {
    return await this.getObject('/malwarePolicy', signal)
  }

  public async getVirusSpywareSettings(signal?: AbortSignal): Promise<TJsonObject> {
    return await this.getObject('/virusSpywareSettings', signal)
  }

  /** Policy > URL & Cloud App Control > Advanced Policy Settings */
  public async getAdvancedUrlFilteringSettings(signal?: AbortSignal): Promise<TJsonObject> {
    return await this.getObject('/advancedUrlFilterAndCloudAppSettings', signal)
  }

  public async getCyberRiskScore(signal?: AbortSignal): Promise<TJsonObject> {
    return await this.getObject('/cyberRiskScore', signal)
  }

  public async getSamlSettings(signal?: AbortSignal): Promise<TJsonObject> {
    return await this.getObject('/samlSettings', signal)
  }

  public async getAdvancedSettings(signal?: AbortSignal): Promise<TJsonObject> {
    return await this.getObject('/advancedSettings', signal)
  }

  public async getAuthSettings(signal?: AbortSignal): Promise<TJsonObject> {
    return await this.getObject('/authSettings', signal)
  }

  public async getSamlAdminSettings(signal?: AbortSignal): Promise<TJsonObject> {
    return await this.getObject('/samlAdminSettings', signal)
  }

  public async getEndUserNotifications(signal?: AbortSignal): Promise<TJsonObject> {
    return await this.getObject('/eun', signal)
  }

  public async getAdminPasswordExpiry(signal?: AbortSignal): Promise<TJsonObject> {
    return await this.getObject('/passwordExpiry/settings', signal)
  }

  /** Administration > Company Profile > Subscriptions */
  public async listSubscriptions(signal?: AbortSignal): Promise<TJsonObject[]> {
    return await this.getSequence('/subscriptions', signal)
  }

  public async listIdpConfigs(signal?: AbortSignal): Promise<TJsonObject[]> {
    return await this.getSequence('/idpConfig', signal)
  }

  public async listIcapServers(signal?: AbortSignal): Promise<TJsonObject[]> {
    return await this.getSequence('/icapServers', signal)
  }

  public async updateAuthSettings(
    payload: TJsonObject,
    signal?: AbortSignal,
  ): Promise<TRawResponse> {
    return await this.session.request('PUT', '/authSettings', {
      body: payload,
      raiseOnError: false,
      signal,
    })
  }

  public async updateAdvancedThreatSettings(
    payload: TJsonObject,
    signal?: AbortSignal,
  ): Promise<TRawResponse> {
    return await this.session.request('PUT', '/advancedThreatSettings', {
      body: payload,
      raiseOnError: false,
      signal,
    })
  }
}

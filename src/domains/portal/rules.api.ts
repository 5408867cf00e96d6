import { requestObjectArray } from '../../core/json.ts'
import type { TJsonObject, TRawResponse, TRequester } from '../../core/types.ts'
import { resourcePath, type TResourceId } from '../../types/api.ts'

export type TRulesApiOptions = {
  session: TRequester
}

export interface TRulesApi {
  listWebApplicationRules(signal?: AbortSignal): Promise<TJsonObject[]>
  listFileTypeRules(signal?: AbortSignal): Promise<TRawResponse>
  deleteFileTypeRule(id: TResourceId, signal?: AbortSignal): Promise<TRawResponse>
  listFirewallDnsRules(signal?: AbortSignal): Promise<TRawResponse>
  deleteFirewallDnsRule(id: TResourceId, signal?: AbortSignal): Promise<TRawResponse>
  listFirewallIpsRules(signal?: AbortSignal): Promise<TRawResponse>
  deleteFirewallIpsRule(id: TResourceId, signal?: AbortSignal): Promise<TRawResponse>
}

export class RulesApi implements TRulesApi {
  private session: TRequester

  constructor(options: TRulesApiOptions) {
    this.session = options.session
  }

  /** Cloud app control policies. */
  public async listWebApplicationRules(signal?: AbortSignal): Promise<TJsonObject[]> {
    return await requestObjectArray(this.session, 'GET', '/webApplicationRules', { signal })
  }

  public async listFileTypeRules(signal?: AbortSignal): Promise<TRawResponse> {
    return await this.session.request('GET', '/fileTypeRules', { raiseOnError: false, signal })
  }

  public async deleteFileTypeRule(id: TResourceId, signal?: AbortSignal): Promise<TRawResponse> {
    return await this.session.request('DELETE', resourcePath('/fileTypeRules', id), {
      raiseOnError: false,
      signal,
    })
  }

  public async listFirewallDnsRules(signal?: AbortSignal): Promise<TRawResponse> {
    return await this.session.request('GET', '/firewallDnsRules', { raiseOnError: false, signal })
  }

  public async deleteFirewallDnsRule(
    id: TResourceId,
    signal?: AbortSignal,
  ): Promise<TRawResponse> {
    return await this.session.request('DELETE', resourcePath('/firewallDnsRules', id), {
      raiseOnError: false,
      signal,
    })
  }

  public async listFirewallIpsRules(signal?: AbortSignal): Promise<TRawResponse> {
    return await this.session.request('GET', '/firewallIpsRules', { raiseOnError: false, signal })
  }

  public async deleteFirewallIpsRule(
    id: TResourceId,
    signal?: AbortSignal,
  ): Promise<TRawResponse> {
    return await this.session.request('DELETE', resourcePath('/firewallIpsRules', id), {
      raiseOnError: false,
      signal,
    })
  }
}

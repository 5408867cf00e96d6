import { requestObject } from '../../core/json.ts'
import type { Paginator } from '../../core/pagination.ts'
import type { TJsonObject, TPagedListQuery, TRequester } from '../../core/types.ts'
import { resourcePath } from '../../types/api.ts'
import { CustomerScope, type TPrivateAccessApiOptions } from './customer-scope.ts'
import type { TPolicyRuleInput, TPolicyType } from './types.ts'

export interface TPoliciesApi {
  listRules(policyType?: TPolicyType, signal?: AbortSignal): Promise<TJsonObject[]>
  getPolicySet(policyType?: TPolicyType, signal?: AbortSignal): Promise<TJsonObject>
  addRule(input: TPolicyRuleInput, signal?: AbortSignal): Promise<TJsonObject>
  listPostureProfiles(query?: TPagedListQuery, signal?: AbortSignal): Promise<TJsonObject[]>
  listPrivilegedConsoles(query?: TPagedListQuery, signal?: AbortSignal): Promise<TJsonObject[]>
}

export class PoliciesApi implements TPoliciesApi {
  private session: TRequester
  private paginator: Paginator
  private scope: CustomerScope

  constructor(options: TPrivateAccessApiOptions) {
    this.session = options.session
    this.paginator = options.paginator
    this.scope = new CustomerScope(options)
  }

  public async listRules(
    policyType: TPolicyType = 'ACCESS_POLICY',
    signal?: AbortSignal,
  ): Promise<TJsonObject[]> {
    const path = this.scope.mgmt(1, `/policySet/rules/policyType/${policyType}`)
    return await this.paginator.listAll(path, this.scope.totalPages(), { signal })
  }

  public async getPolicySet(
    policyType: TPolicyType = 'ACCESS_POLICY',
    signal?: AbortSignal,
  ): Promise<TJsonObject> {
    const path = this.scope.mgmt(1, `/policySet/policyType/${policyType}`)
    return await requestObject(this.session, 'GET', path, { signal })
  }

  /**
   * Adds a rule to a policy set. The application operands and the attribute operands form two
   * conditions that must both hold.
   */
  public async addRule(input: TPolicyRuleInput, signal?: AbortSignal): Promise<TJsonObject> {
    const path = `${resourcePath(this.scope.mgmt(1, '/policySet'), input.policySetId)}/rule`
    return await requestObject(this.session, 'POST', path, {
      body: {
        conditions: [
          { operands: input.appOperands },
          { operands: input.operands, operator: input.operator },
        ],
        operator: 'AND',
        name: input.name,
        description: input.description ?? 'Description',
        action: input.action,
        customMsg: input.customMsg ?? null,
      },
      signal,
    })
  }

  public async listPostureProfiles(
    query: TPagedListQuery = {},
    signal?: AbortSignal,
  ): Promise<TJsonObject[]> {
    return await this.paginator.listAll(this.scope.mgmt(2, '/posture'), this.scope.sized(query), {
      queryString: { search: query.search },
      signal,
    })
  }

  public async listPrivilegedConsoles(
    query: TPagedListQuery = {},
    signal?: AbortSignal,
  ): Promise<TJsonObject[]> {
    return await this.paginator.listAll(
      this.scope.mgmt(2, '/privilegedConsoles'),
      this.scope.sized(query),
      { queryString: { search: query.search }, signal },
    )
  }
}

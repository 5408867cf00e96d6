import type { TJsonObject, TRawResponse, TRequester } from '../../core/types.ts'
import { resourcePath, type TResourceId } from '../../types/api.ts'
import type { TDlpEngineFields, TDlpEngineInput } from './types.ts'

export type TDlpApiOptions = {
  session: TRequester
}

export interface TDlpApi {
  addEngine(input: TDlpEngineInput, signal?: AbortSignal): Promise<TRawResponse>
  updateEngine(id: TResourceId, payload: TJsonObject, signal?: AbortSignal): Promise<TRawResponse>
}

function buildEnginePayload(fields: TDlpEngineFields): TJsonObject {
  const payload: TJsonObject = {
    EngineExpression: fields.engineExpression,
    CustomDlpEngine: fields.customDlpEngine ?? true,
  }
  if (fields.predefinedEngineName) {
    payload.PredefinedEngineName = fields.predefinedEngineName
  } else {
    payload.Name = fields.name
  }
  if (fields.description) payload.Description = fields.description
  return payload
}

/** DLP engine endpoints. Responses are returned raw for the caller to inspect. */
export class DlpApi implements TDlpApi {
  private session: TRequester

  constructor(options: TDlpApiOptions) {
    this.session = options.session
  }

  public async addEngine(input: TDlpEngineInput, signal?: AbortSignal): Promise<TRawResponse> {
    const body: TJsonObject = 'payload' in input ? input.payload : buildEnginePayload(input)
    return await this.session.request('POST', '/dlpEngines', {
      body,
      raiseOnError: false,
      signal,
    })
  }

  public async updateEngine(
    id: TResourceId,
    payload: TJsonObject,
    signal?: AbortSignal,
  ): Promise<TRawResponse> {
    return await this.session.request('PUT', resourcePath('/dlpEngines', id), {
      body: payload,
      raiseOnError: false,
      signal,
    })
  }
}

import { requestObject, requestObjectArray } from '../../core/json.ts'
import type { TJsonObject, TRequester } from '../../core/types.ts'
import type { TPacFileInput } from './types.ts'

export type TPacFilesApiOptions = {
  session: TRequester
}

export interface TPacFilesApi {
  list(signal?: AbortSignal): Promise<TJsonObject[]>
  add(input: TPacFileInput, signal?: AbortSignal): Promise<TJsonObject>
}

export class PacFilesApi implements TPacFilesApi {
  private session: TRequester

  constructor(options: TPacFilesApiOptions) {
    this.session = options.session
  }

  public async list(signal?: AbortSignal): Promise<TJsonObject[]> {
    return await requestObjectArray(this.session, 'GET', '/pacFiles', { signal })
  }

  /** Uploads a PAC file that has already passed verification. */
  public async add(input: TPacFileInput, signal?: AbortSignal): Promise<TJsonObject> {
    return await requestObject(this.session, 'POST', '/pacFiles', {
      body: {
        name: input.name,
        editable: input.editable ?? true,
        pacContent: input.pacContent,
        pacUrlObfuscated: input.pacUrlObfuscated ?? true,
        domain: input.domain,
        description: input.description,
        pacVerificationStatus: 'VERIFY_NOERR',
      },
      signal,
    })
  }
}

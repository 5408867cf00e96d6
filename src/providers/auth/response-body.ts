import { isJsonObject } from '../../core/json.ts'
import type { TJsonObject, TRawResponse } from '../../core/types.ts'

/** Login responses are judged by their fields; a body that is not a JSON object has none. */
export function readLoginBody(response: TRawResponse): TJsonObject {
  let body: unknown
  try {
    body = response.json()
  } catch {
    return {}
  }
  return isJsonObject(body) ? body : {}
}

export function readErrorDetail(body: TJsonObject): string {
  const detail = body.error_description ?? body.error ?? body.message
  return typeof detail === 'string' && detail ? `: ${detail}` : ''
}

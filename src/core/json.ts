import { APIError } from './errors.ts'
import type { THttpMethod, TJsonObject, TRequester, TRequestOptions } from './types.ts'

export function isJsonObject(value: unknown): value is TJsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function expectJsonObject(value: unknown, context: string): TJsonObject {
  if (!isJsonObject(value)) {
    throw new APIError(`Expected a JSON object from ${context}`)
  }
  return value
}

export function expectJsonObjectArray(value: unknown, context: string): TJsonObject[] {
  if (!Array.isArray(value) || !value.every(isJsonObject)) {
    throw new APIError(`Expected a JSON array of objects from ${context}`)
  }
  return value
}

/** Sends a request whose body must decode to a JSON object. */
export async function requestObject(
  requester: TRequester,
  httpMethod: THttpMethod,
  path: string,
  options: TRequestOptions = {},
): Promise<TJsonObject> {
  const body = await requester.requestJson(httpMethod, path, options)
  return expectJsonObject(body, `${httpMethod} ${path}`)
}

/** Sends a request whose body must decode to a JSON array of objects. */
export async function requestObjectArray(
  requester: TRequester,
  httpMethod: THttpMethod,
  path: string,
  options: TRequestOptions = {},
): Promise<TJsonObject[]> {
  const body = await requester.requestJson(httpMethod, path, options)
  return expectJsonObjectArray(body, `${httpMethod} ${path}`)
}

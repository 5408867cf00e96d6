import type { Transport } from './transport.ts'

export type TEndpointProvider = {
  /** Returns the API base URL such as https://api-mobile.zscaler.net/papi */
  getApiBase(): string
}

export type THttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE'

export type TQueryValue = string | number | boolean | undefined

export type TQueryString = Record<string, TQueryValue>

export type TRequestOptions = {
  queryString?: TQueryString
  /** JSON request body */
  body?: unknown
  /** URL-encoded request body; takes precedence over `body` */
  form?: Record<string, string>
  headers?: Record<string, string>
  cookies?: Record<string, string>
  signal?: AbortSignal
  timeoutInMilliseconds?: number
  /** Throw APIError on a non-2xx status. @default true */
  raiseOnError?: boolean
}

export type TJsonObject = { [key: string]: unknown }

export type TRawResponse = {
  readonly status: number
  readonly ok: boolean
  readonly headers: Headers
  readonly cookies: Readonly<Record<string, string>>
  readonly content: Buffer
  text(): string
  /** Decoded body, or null when the body is empty. */
  json(): unknown
}

/** Headers and cookies a session adds to every outgoing request. */
export type TAuthAttachment = Readonly<{
  headers: Readonly<Record<string, string>>
  cookies: Readonly<Record<string, string>>
}>

export type TAuthenticator<TCredentials> = {
  /** Logs in against the surface and returns what every later request must carry. */
  authenticate(
    credentials: TCredentials,
    transport: Transport,
    signal?: AbortSignal,
  ): Promise<TAuthAttachment>
}

export type TSeedProvider = {
  /** Returns the seed string the portal API key is obfuscated from. */
  getSeed(signal?: AbortSignal): Promise<string>
}

export type TTotalPagesBound = 'inclusive' | 'exclusive'

export type TListingDialect =
  | { kind: 'empty-page'; pageSize?: number; startPage?: number; pageDelayMs?: number }
  | { kind: 'total-pages'; pageSize?: number; bound?: TTotalPagesBound }
  | { kind: 'sized'; pageSize?: number; bound?: TTotalPagesBound }

export type TListQuery = {
  pageSize?: number
  page?: number
  search?: string
}

/** Query of a listing the paginator walks; the paginator owns the page cursor. */
export type TPagedListQuery = Omit<TListQuery, 'page'>

/** The part of a session that endpoint methods and the paginator send requests through. */
export type TRequester = {
  request(httpMethod: THttpMethod, path: string, options?: TRequestOptions): Promise<TRawResponse>
  requestJson(httpMethod: THttpMethod, path: string, options?: TRequestOptions): Promise<unknown>
}

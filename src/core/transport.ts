import { parseSetCookies, serializeCookies } from './cookies.ts'
import { AbortOperationError, APIError, TimeoutError } from './errors.ts'
import { USER_AGENT } from './sdk-info.ts'
import type { THttpMethod, TRawResponse, TRequestOptions } from './types.ts'
import { createTimeoutSignal, normalizeBaseUrl, resolveFetch } from './utils.ts'

const DEFAULT_TIMEOUT_IN_MILLISECONDS = 30_000

export type TTransportOptions = {
  baseUrl: string
  timeoutInMilliseconds?: number
  fetchImplementation?: typeof fetch | undefined
}

class RawResponse implements TRawResponse {
  readonly ok: boolean

  constructor(
    readonly status: number,
    readonly headers: Headers,
    readonly cookies: Readonly<Record<string, string>>,
    readonly content: Buffer,
    private readonly description: string,
  ) {
    this.ok = status >= 200 && status <= 299
  }

  text(): string {
    return this.content.toString('utf8')
  }

  json(): unknown {
    const text = this.text()
    if (text.trim() === '') return null
    try {
      return JSON.parse(text)
    } catch (error) {
      throw new APIError(`Invalid JSON in response to ${this.description}`, {
        status: this.status,
        cause: error,
      })
    }
  }
}

function extractErrorDetail(response: TRawResponse): string {
  try {
    const body = response.json()
    if (
      typeof body === 'object' &&
      body !== null &&
      'message' in body &&
      typeof body.message === 'string'
    ) {
      return `: ${body.message}`
    }
  } catch {
    // not JSON
  }
  return ''
}

/**
 * Sends one HTTP request per call against a fixed base URL. Never retries; every failure
 * surfaces on the first attempt.
 */
export class Transport {
  private baseUrl: string
  private timeoutInMilliseconds: number
  private fetchImplementation: typeof fetch
  private userAgent: string = USER_AGENT

  constructor(options: TTransportOptions) {
    this.baseUrl = normalizeBaseUrl(options.baseUrl)
    this.timeoutInMilliseconds = options.timeoutInMilliseconds ?? DEFAULT_TIMEOUT_IN_MILLISECONDS
    this.fetchImplementation = resolveFetch(options.fetchImplementation)
  }

  getBaseUrl(): string {
    return this.baseUrl
  }

  async request(
    httpMethod: THttpMethod,
    path: string,
    requestOptions: TRequestOptions = {},
  ): Promise<TRawResponse> {
    const urlObject: URL = new URL(this.baseUrl + path)

    if (requestOptions.queryString) {
      for (const [queryKey, queryValue] of Object.entries(requestOptions.queryString)) {
        if (queryValue !== undefined) urlObject.searchParams.set(queryKey, String(queryValue))
      }
    }

    const description = `${httpMethod} ${path}`
    const timeoutInMilliseconds: number =
      requestOptions.timeoutInMilliseconds ?? this.timeoutInMilliseconds
    const { signal, timeoutSignal, cleanup } = createTimeoutSignal(
      timeoutInMilliseconds,
      requestOptions.signal,
    )

    const headers: Record<string, string> = { 'user-agent': this.userAgent }
    let body: string | URLSearchParams | undefined
    if (requestOptions.form) {
      headers['content-type'] = 'application/x-www-form-urlencoded'
      body = new URLSearchParams(requestOptions.form)
    } else if (requestOptions.body !== undefined) {
      headers['content-type'] = 'application/json'
      body = JSON.stringify(requestOptions.body)
    }
    Object.assign(headers, requestOptions.headers ?? {})
    if (requestOptions.cookies && Object.keys(requestOptions.cookies).length > 0) {
      headers.cookie = serializeCookies(requestOptions.cookies)
    }

    try {
      let httpResponse: Response
      let content: Buffer
      try {
        httpResponse = await this.fetchImplementation(urlObject, {
          method: httpMethod,
          headers,
          body,
          signal,
        })
        content = Buffer.from(await httpResponse.arrayBuffer())
      } catch (caughtError) {
        if (requestOptions.signal?.aborted) throw new AbortOperationError()
        if (timeoutSignal.aborted) {
          throw new TimeoutError(`${description} timed out after ${timeoutInMilliseconds}ms`)
        }
        throw new APIError(
          `Network error for ${description}: ${caughtError instanceof Error ? caughtError.message : String(caughtError)}`,
          { method: httpMethod, path, cause: caughtError },
        )
      }

      const response = new RawResponse(
        httpResponse.status,
        httpResponse.headers,
        parseSetCookies(httpResponse.headers.getSetCookie()),
        content,
        description,
      )

      if (!response.ok && requestOptions.raiseOnError !== false) {
        throw new APIError(
          `HTTP ${response.status} for ${description}${extractErrorDetail(response)}`,
          { status: response.status, method: httpMethod, path },
        )
      }

      return response
    } finally {
      cleanup()
    }
  }
}

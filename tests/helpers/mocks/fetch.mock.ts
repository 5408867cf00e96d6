import { vi } from 'vitest'

type FetchArgs = Parameters<typeof fetch>
type FetchInput = FetchArgs[0]

export type TFetchMockReply = {
  /** JSON-encoded unless `text` is given. */
  body?: unknown
  text?: string
  status?: number
  headers?: Record<string, string>
  /** Sent as one Set-Cookie header each. */
  setCookies?: string[]
}

export type TFetchMockItem =
  | Response
  | Error
  | TFetchMockReply
  | ((input: FetchInput, init?: RequestInit) => Response | Promise<Response>)

export type TRecordedCall = {
  url: URL
  method: string
  headers: Headers
  body?: string
}

const toUrl = (input: FetchInput): URL =>
  input instanceof URL ? input : new URL(typeof input === 'string' ? input : input.url)

const toBodyText = (body: RequestInit['body']): string | undefined => {
  if (body === undefined || body === null) return undefined
  if (typeof body === 'string') return body
  if (body instanceof URLSearchParams) return body.toString()
  throw new Error('Unsupported request body in fetch mock')
}

export function buildResponse(reply: TFetchMockReply): Response {
  const status = reply.status ?? 200
  const headers = new Headers(reply.headers)
  for (const cookie of reply.setCookies ?? []) headers.append('set-cookie', cookie)

  let payload: string | null = null
  if (reply.text !== undefined) {
    payload = reply.text
  } else if (reply.body !== undefined) {
    payload = JSON.stringify(reply.body)
    if (!headers.has('content-type')) headers.set('content-type', 'application/json')
  }
  return new Response(status === 204 ? null : payload, { status, headers })
}

/**
 * Queue-based fetch stand-in. Each call takes the next queued item; an Error rejects the call
 * the way a network failure would.
 */
export function createFetchMock() {
  const calls: TRecordedCall[] = []
  const queue: TFetchMockItem[] = []

  const fetchImplementation = vi.fn<typeof fetch>(async (input, init) => {
    const url = toUrl(input)
    calls.push({
      url,
      method: init?.method ?? 'GET',
      headers: new Headers(init?.headers),
      body: toBodyText(init?.body),
    })
    const next = queue.shift()
    if (!next) throw new Error(`No mock queued for fetch: ${url.toString()}`)
    if (typeof next === 'function') return await Promise.resolve(next(input, init))
    if (next instanceof Response) return next
    if (next instanceof Error) throw next
    return buildResponse(next)
  })

  return {
    fetchImplementation,
    calls,
    queue,
    push: (...items: TFetchMockItem[]) => queue.push(...items),
    pushJson: (body: unknown, init?: Omit<TFetchMockReply, 'body' | 'text'>) =>
      queue.push({ body, ...init }),
    /** Returns the recorded call at `index`, failing the test when there is none. */
    call: (index: number): TRecordedCall => {
      const recorded = calls[index]
      if (!recorded) throw new Error(`fetch was called ${calls.length} times, not ${index + 1}`)
      return recorded
    },
    /** Parsed JSON body of the call at `index`. */
    jsonBody: (index: number): unknown => {
      const body = calls[index]?.body
      return body === undefined ? undefined : JSON.parse(body)
    },
  }
}

export type TFetchMock = ReturnType<typeof createFetchMock>

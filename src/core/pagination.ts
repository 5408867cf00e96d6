import { APIError } from './errors.ts'
import { expectJsonObject, expectJsonObjectArray, isJsonObject } from './json.ts'
import { logger } from './logger.ts'
import { sleep, throwIfAborted } from './timing.ts'
import type {
  TJsonObject,
  TListingDialect,
  TQueryString,
  TRequester,
  TTotalPagesBound,
} from './types.ts'

export const DEFAULT_PAGE_SIZE = 500
export const DEFAULT_START_PAGE = 1
export const DEFAULT_PAGE_DELAY_MS = 500
export const DEFAULT_TOTAL_PAGES_BOUND: TTotalPagesBound = 'inclusive'

export type TEmptyPageLoopOptions<TItem> = {
  startPage: number
  /** Pause between consecutive fetches. */
  pageDelayMs: number
  /** Ends the loop; the page it matches is not collected. Defaults to "the page is empty". */
  isTerminalPage?: (items: TItem[]) => boolean
  signal?: AbortSignal
}

/** Fetches page numbers upward from `startPage` until the terminal (empty) page arrives. */
export async function collectUntilEmptyPage<TItem>(
  fetchPage: (pageNumber: number) => Promise<TItem[]>,
  options: TEmptyPageLoopOptions<TItem>,
): Promise<TItem[]> {
  const isTerminalPage = options.isTerminalPage ?? ((items: TItem[]) => items.length === 0)
  const collected: TItem[] = []

  for (let pageNumber = options.startPage; ; pageNumber++) {
    throwIfAborted(options.signal)
    const items: TItem[] = await fetchPage(pageNumber)
    if (isTerminalPage(items)) return collected
    collected.push(...items)
    await sleep(options.pageDelayMs, options.signal)
  }
}

export type TListingPage<TItem> = {
  totalPages: number
  items: TItem[]
}

export type TTotalPagesLoopOptions = {
  bound: TTotalPagesBound
  /** Whether the reported total calls for the index loop; otherwise the probe's items are kept. */
  shouldIterate: (totalPages: number) => boolean
  signal?: AbortSignal
}

/**
 * Probes once (no page index) to learn the reported total, then fetches every page index from 0
 * up to the total. `bound` decides whether the total itself is fetched. A `null` page means the
 * response had no listing at all.
 */
export async function collectByTotalPages<TItem>(
  fetchPage: (pageIndex?: number) => Promise<TListingPage<TItem> | null>,
  options: TTotalPagesLoopOptions,
): Promise<TItem[]> {
  throwIfAborted(options.signal)
  const probe = await fetchPage()
  if (!probe) return []
  if (!options.shouldIterate(probe.totalPages)) return probe.items

  const lastIndex: number = options.bound === 'inclusive' ? probe.totalPages : probe.totalPages - 1
  const collected: TItem[] = []
  for (let pageIndex = 0; pageIndex <= lastIndex; pageIndex++) {
    throwIfAborted(options.signal)
    const page = await fetchPage(pageIndex)
    if (page) collected.push(...page.items)
  }
  return collected
}

/** `null`, `[]` and `{}` all end an empty-page listing. */
function isEmptyPageBody(body: unknown): boolean {
  if (body === null) return true
  if (Array.isArray(body)) return body.length === 0
  return isJsonObject(body) && Object.keys(body).length === 0
}

function parseTotalPages(value: unknown, context: string): number {
  if (value === undefined || value === null) return 1
  const totalPages: number =
    typeof value === 'number'
      ? value
      : typeof value === 'string'
        ? Number(value.trim())
        : Number.NaN
  if (!Number.isInteger(totalPages) || totalPages < 0) {
    throw new APIError(`Invalid totalPages ${JSON.stringify(value)} from ${context}`)
  }
  return totalPages
}

function readListingPage(body: unknown, context: string): TListingPage<TJsonObject> | null {
  const envelope = expectJsonObject(body, context)
  if (!('list' in envelope)) return null
  return {
    totalPages: parseTotalPages(envelope.totalPages, context),
    items: expectJsonObjectArray(envelope.list, context),
  }
}

export type TPaginatorOptions = {
  requester: TRequester
}

export type TListAllOptions = {
  queryString?: TQueryString
  signal?: AbortSignal
}

/**
 * Turns a listing endpoint into a single call returning every record, in page order.
 * All-or-nothing: an error on any page rejects the whole call and nothing is retried.
 */
export class Paginator {
  private readonly requester: TRequester

  constructor(options: TPaginatorOptions) {
    this.requester = options.requester
  }

  async listAll(
    path: string,
    dialect: TListingDialect,
    options: TListAllOptions = {},
  ): Promise<TJsonObject[]> {
    const { queryString, signal } = options
    const pageSize: number = dialect.pageSize ?? DEFAULT_PAGE_SIZE

    if (dialect.kind === 'empty-page') {
      return await collectUntilEmptyPage(
        async (pageNumber) => {
          const context = `GET ${path} page ${pageNumber}`
          const body = await this.requester.requestJson('GET', path, {
            queryString: { pageSize, ...queryString, page: pageNumber },
            signal,
          })
          const items = isEmptyPageBody(body) ? [] : expectJsonObjectArray(body, context)
          logger.debug(`${context}: ${items.length} records`)
          return items
        },
        {
          startPage: dialect.startPage ?? DEFAULT_START_PAGE,
          pageDelayMs: dialect.pageDelayMs ?? DEFAULT_PAGE_DELAY_MS,
          signal,
        },
      )
    }

    return await collectByTotalPages(
      async (pageIndex) => {
        const context = pageIndex === undefined ? `GET ${path}` : `GET ${path} page ${pageIndex}`
        const body = await this.requester.requestJson('GET', path, {
          queryString: { pagesize: pageSize, ...queryString, page: pageIndex },
          signal,
        })
        const page = readListingPage(body, context)
        logger.debug(`${context}: ${page ? `${page.items.length} records` : 'no listing'}`)
        return page
      },
      {
        bound: dialect.bound ?? DEFAULT_TOTAL_PAGES_BOUND,
        shouldIterate:
          dialect.kind === 'sized' ? (totalPages) => totalPages > 1 : () => true,
        signal,
      },
    )
  }
}

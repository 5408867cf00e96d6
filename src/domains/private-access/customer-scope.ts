import { DEFAULT_PAGE_SIZE, type Paginator } from '../../core/pagination.ts'
import type {
  TListingDialect,
  TListQuery,
  TPagedListQuery,
  TQueryString,
  TRequester,
  TTotalPagesBound,
} from '../../core/types.ts'
import type { TResourceId } from '../../types/api.ts'

export type TPrivateAccessApiOptions = {
  session: TRequester
  paginator: Paginator
  customerId: TResourceId
  /** `pagesize` sent with every listing. @default 500 */
  pageSize?: number
  totalPagesBound?: TTotalPagesBound
}

/** Builds the tenant-scoped paths and listing parameters shared by every Private Access API. */
export class CustomerScope {
  private readonly customerId: string
  private readonly pageSize?: number
  private readonly totalPagesBound?: TTotalPagesBound

  constructor(
    options: Pick<TPrivateAccessApiOptions, 'customerId' | 'pageSize' | 'totalPagesBound'>,
  ) {
    this.customerId = encodeURIComponent(String(options.customerId))
    this.pageSize = options.pageSize
    this.totalPagesBound = options.totalPagesBound
  }

  /** e.g. `/mgmtconfig/v1/admin/customers/{customerId}/server` */
  mgmt(version: 1 | 2, suffix: string): string {
    return `/mgmtconfig/v${version}/admin/customers/${this.customerId}${suffix}`
  }

  user(suffix: string): string {
    return `/userconfig/v1/customers/${this.customerId}${suffix}`
  }

  totalPages(): TListingDialect {
    return { kind: 'total-pages', pageSize: this.pageSize, bound: this.totalPagesBound }
  }

  /** The caller's page size wins over the client default. */
  sized(query: TPagedListQuery = {}): TListingDialect {
    return {
      kind: 'sized',
      pageSize: query.pageSize ?? this.pageSize,
      bound: this.totalPagesBound,
    }
  }

  /** Query for a single, unlooped listing request. */
  singlePage(query: TListQuery = {}): TQueryString {
    return {
      pagesize: query.pageSize ?? this.pageSize ?? DEFAULT_PAGE_SIZE,
      page: query.page,
      search: query.search,
    }
  }
}

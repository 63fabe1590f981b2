import { log } from '@shared/logger'
import type { Page } from '@shared/types'
import type { GraphQLTransport, RateLimitInfo } from './GitHubGraphQLClient'

/**
 * Turns the `data` of one response into a typed page. Implementations throw
 * QueryDecodeError when the items do not match the query's shape, and return
 * a page with `hasNextPage: false` when page info is absent.
 */
export type PageDecoder<T> = (data: unknown) => Page<T>

/**
 * A single pass over a cursor-paginated query.
 *
 * State is explicit: the cursor for the next request, the items of the current
 * page, and whether the remote has run out of pages. Pages are fetched only
 * when every item of the previous page has been handed out, and strictly in
 * cursor order. Once exhausted (or closed early via `return`) the query stays
 * exhausted; a second pass needs a new query.
 */
export class PagedQuery<T> implements AsyncIterableIterator<T> {
  private cursor: string | null = null
  private exhausted = false
  private items: T[] = []
  private position = 0
  private pagesFetched = 0

  constructor(
    private readonly transport: GraphQLTransport,
    private readonly document: string,
    private readonly variables: Record<string, unknown>,
    private readonly decodePage: PageDecoder<T>
  ) {}

  [Symbol.asyncIterator](): AsyncIterableIterator<T> {
    return this
  }

  async next(): Promise<IteratorResult<T>> {
    while (this.position >= this.items.length) {
      if (this.exhausted) {
        return { done: true, value: undefined }
      }
      await this.fetchNextPage()
    }

    const value = this.items[this.position]
    this.position += 1
    return { done: false, value }
  }

  async return(): Promise<IteratorResult<T>> {
    this.close()
    return { done: true, value: undefined }
  }

  private close(): void {
    this.exhausted = true
    this.items = []
    this.position = 0
  }

  private async fetchNextPage(): Promise<void> {
    let page: Page<T>
    let rateLimit: RateLimitInfo | null
    try {
      this.pagesFetched += 1
      const response = await this.transport.query(this.document, {
        ...this.variables,
        cursor: this.cursor
      })
      rateLimit = response.rateLimit
      page = this.decodePage(response.data)
    } catch (error) {
      this.close()
      throw error
    }

    this.items = page.items
    this.position = 0

    if (!page.hasNextPage) {
      this.exhausted = true
    } else if (page.endCursor === null) {
      log.warn('[PagedQuery] Page reports more results but no end cursor; stopping')
      this.exhausted = true
    } else {
      this.cursor = page.endCursor
    }

    log.debug(
      `[PagedQuery] Page ${this.pagesFetched}: ${page.items.length} item(s), hasNextPage=${page.hasNextPage}` +
        (rateLimit ? `, rate limit ${rateLimit.remaining}/${rateLimit.limit}` : '')
    )
  }
}

/**
 * Issues cursor-paginated GraphQL queries. The query document must declare a
 * `$cursor: String` variable and pass it as the connection's `after` argument.
 */
export class PagedQueryClient {
  constructor(private readonly transport: GraphQLTransport) {}

  executePaged<T>(
    document: string,
    variables: Record<string, unknown>,
    decodePage: PageDecoder<T>
  ): PagedQuery<T> {
    return new PagedQuery(this.transport, document, variables, decodePage)
  }
}

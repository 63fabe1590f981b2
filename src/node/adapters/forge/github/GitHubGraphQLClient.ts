import { log } from '@shared/logger'
import { Agent, type Dispatcher, request } from 'undici'
import { z } from 'zod'
import { RemoteQueryError } from '../../../shared/errors'
import { DEFAULT_REQUEST_TIMEOUT_MS, USER_AGENT } from '../../../shared/constants'

export type RateLimitInfo = {
  limit: number
  remaining: number
  /** Unix epoch seconds */
  reset: number
  used: number
}

/**
 * Response from a GraphQL request. `data` is left undecoded; callers validate
 * it against the schema of the query they sent.
 */
export type GraphQLResponse = {
  data: unknown
  rateLimit: RateLimitInfo | null
}

/**
 * Anything that can execute a GraphQL document. The paged client depends on
 * this rather than on the HTTP client so it can be driven by in-memory pages.
 */
export interface GraphQLTransport {
  query(document: string, variables: Record<string, unknown>): Promise<GraphQLResponse>
}

export type GitHubGraphQLClientOptions = {
  token: string
  endpoint: string
  timeoutMs?: number
}

/**
 * Shared HTTP agent with timeout configuration for GitHub API requests.
 */
export const githubAgent = new Agent({
  connectTimeout: 10_000,
  headersTimeout: 30_000,
  bodyTimeout: 30_000
})

const envelopeSchema = z.object({
  data: z.unknown().optional(),
  errors: z.array(z.object({ message: z.string() }).passthrough()).optional()
})

/**
 * GitHub GraphQL API client with rate limit tracking.
 *
 * Failures are never retried: a non-200 status or a GraphQL `errors` list
 * becomes a RemoteQueryError carrying the raw payload.
 */
export class GitHubGraphQLClient implements GraphQLTransport {
  constructor(
    private readonly options: GitHubGraphQLClientOptions,
    private readonly dispatcher: Dispatcher = githubAgent
  ) {}

  async query(document: string, variables: Record<string, unknown> = {}): Promise<GraphQLResponse> {
    const {
      body,
      statusCode,
      headers: responseHeaders
    } = await request(this.options.endpoint, {
      method: 'POST',
      dispatcher: this.dispatcher,
      signal: AbortSignal.timeout(this.options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS),
      headers: {
        Authorization: `Bearer ${this.options.token}`,
        'User-Agent': USER_AGENT,
        'Content-Type': 'application/json'
      },
      body: JSON.stringify({ query: document, variables })
    })

    const rateLimit = this.parseRateLimitHeaders(responseHeaders)
    const text = await body.text()

    if (statusCode === 401) {
      throw new RemoteQueryError(
        'GitHub authentication failed. The token is invalid or has expired.',
        statusCode,
        text
      )
    }

    if (statusCode !== 200) {
      throw new RemoteQueryError(
        `GitHub GraphQL API failed with status ${statusCode}: ${text}`,
        statusCode,
        text
      )
    }

    let raw: unknown
    try {
      raw = JSON.parse(text)
    } catch (error) {
      throw new RemoteQueryError('GitHub GraphQL API returned a non-JSON body', statusCode, text, error)
    }

    const envelope = envelopeSchema.safeParse(raw)
    if (!envelope.success) {
      throw new RemoteQueryError('GitHub GraphQL API returned a malformed body', statusCode, raw)
    }

    const { data, errors } = envelope.data
    if (errors && errors.length > 0) {
      const errorMessages = errors.map((e) => e.message).join(', ')
      throw new RemoteQueryError(`GitHub GraphQL errors: ${errorMessages}`, statusCode, errors)
    }

    return {
      data: data ?? null,
      rateLimit
    }
  }

  /**
   * Parses rate limit information from response headers.
   */
  private parseRateLimitHeaders(
    headers: Record<string, string | string[] | undefined>
  ): RateLimitInfo | null {
    const limit = this.parseHeaderNumber(headers['x-ratelimit-limit'])
    const remaining = this.parseHeaderNumber(headers['x-ratelimit-remaining'])
    const reset = this.parseHeaderNumber(headers['x-ratelimit-reset'])
    const used = this.parseHeaderNumber(headers['x-ratelimit-used'])

    if (limit === null || remaining === null || reset === null || used === null) {
      return null
    }

    if (remaining < 100) {
      log.warn(
        `[GitHubGraphQL] Rate limit low: ${remaining}/${limit} remaining, resets at ${new Date(reset * 1000).toISOString()}`
      )
    }

    return { limit, remaining, reset, used }
  }

  private parseHeaderNumber(value: string | string[] | undefined): number | null {
    if (value === undefined) return null
    const str = Array.isArray(value) ? value[0] : value
    if (str === undefined) return null
    const num = parseInt(str, 10)
    return isNaN(num) ? null : num
  }
}

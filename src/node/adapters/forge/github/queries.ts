import {
  emptyPage,
  type AssociatedPullRequest,
  type Page,
  type PullRequest,
  type RemoteBranch
} from '@shared/types'
import { z } from 'zod'
import { QueryDecodeError } from '../../../shared/errors'

/**
 * Merged pull requests, most recently created first.
 *
 * The ordering is what lets the recency cutoff stop the scan at the first
 * pull request outside the window.
 */
export const MERGED_PULL_REQUESTS_QUERY = `
query MergedPullRequests($owner: String!, $repo: String!, $first: Int!, $cursor: String) {
  repository(owner: $owner, name: $repo) {
    pullRequests(
      states: MERGED
      first: $first
      after: $cursor
      orderBy: {field: CREATED_AT, direction: DESC}
    ) {
      pageInfo {
        hasNextPage
        endCursor
      }
      nodes {
        number
        title
        createdAt
        closedAt
        updatedAt
        headRefName
        headRepositoryOwner {
          login
        }
      }
    }
  }
}
`

/**
 * Branches of the repository with (up to `$associated`) merged pull requests
 * opened from each of them.
 */
export const BRANCHES_WITH_MERGED_PULL_REQUESTS_QUERY = `
query BranchesWithMergedPullRequests(
  $owner: String!
  $repo: String!
  $first: Int!
  $associated: Int!
  $cursor: String
) {
  repository(owner: $owner, name: $repo) {
    refs(refPrefix: "refs/heads/", first: $first, after: $cursor) {
      pageInfo {
        hasNextPage
        endCursor
      }
      nodes {
        name
        target {
          oid
        }
        associatedPullRequests(states: MERGED, first: $associated) {
          totalCount
          nodes {
            number
            title
            closedAt
            baseRefName
            repository {
              name
              owner {
                login
              }
            }
          }
        }
      }
    }
  }
}
`

const timestampSchema = z
  .string()
  .datetime({ offset: true })
  .transform((value) => new Date(value))

const pageInfoSchema = z.object({
  hasNextPage: z.boolean(),
  endCursor: z.string().nullable()
})

const pullRequestNodeSchema = z.object({
  number: z.number().int(),
  title: z.string(),
  createdAt: timestampSchema,
  closedAt: timestampSchema,
  updatedAt: timestampSchema,
  headRefName: z.string(),
  headRepositoryOwner: z.object({ login: z.string() }).nullable()
})

const mergedPullRequestsSchema = z.object({
  repository: z
    .object({
      pullRequests: z
        .object({
          pageInfo: pageInfoSchema.nullish(),
          nodes: z.array(pullRequestNodeSchema)
        })
        .nullish()
    })
    .nullable()
})

const associatedPullRequestNodeSchema = z.object({
  number: z.number().int(),
  title: z.string(),
  closedAt: timestampSchema,
  baseRefName: z.string(),
  repository: z.object({
    name: z.string(),
    owner: z.object({ login: z.string() })
  })
})

const branchNodeSchema = z.object({
  name: z.string(),
  target: z.object({ oid: z.string() }).nullable(),
  associatedPullRequests: z.object({
    totalCount: z.number().int(),
    nodes: z.array(associatedPullRequestNodeSchema)
  })
})

const branchesSchema = z.object({
  repository: z
    .object({
      refs: z
        .object({
          pageInfo: pageInfoSchema.nullish(),
          nodes: z.array(branchNodeSchema)
        })
        .nullish()
    })
    .nullable()
})

type Connection<N> = {
  pageInfo?: z.infer<typeof pageInfoSchema> | null
  nodes: N[]
}

function parse<S extends z.ZodTypeAny>(schema: S, data: unknown, path: string): z.infer<S> {
  const result = schema.safeParse(data)
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path,
      message: issue.message
    }))
    const summary = issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')
    throw new QueryDecodeError(`Unexpected response shape at ${path}: ${summary}`, path, issues)
  }
  return result.data
}

/**
 * Builds a page from a decoded connection. A missing connection or missing
 * page info ends the stream rather than failing it.
 */
function toPage<N, T>(connection: Connection<N> | null | undefined, map: (node: N) => T): Page<T> {
  if (!connection) {
    return emptyPage()
  }
  const items = connection.nodes.map(map)
  if (!connection.pageInfo) {
    return { items, endCursor: null, hasNextPage: false }
  }
  return {
    items,
    endCursor: connection.pageInfo.endCursor,
    hasNextPage: connection.pageInfo.hasNextPage
  }
}

export function decodeMergedPullRequestPage(data: unknown): Page<PullRequest> {
  const decoded = parse(mergedPullRequestsSchema, data, 'repository.pullRequests')
  return toPage(decoded.repository?.pullRequests, (node): PullRequest => ({
    number: node.number,
    title: node.title,
    createdAt: node.createdAt,
    closedAt: node.closedAt,
    updatedAt: node.updatedAt,
    headRefName: node.headRefName,
    headRepositoryOwnerLogin: node.headRepositoryOwner?.login ?? null
  }))
}

export function decodeBranchPage(data: unknown): Page<RemoteBranch> {
  const decoded = parse(branchesSchema, data, 'repository.refs')
  return toPage(decoded.repository?.refs, (node): RemoteBranch => ({
    name: node.name,
    targetCommitId: node.target?.oid ?? '',
    associatedMergedPullRequests: node.associatedPullRequests.nodes.map(
      (pr): AssociatedPullRequest => ({
        number: pr.number,
        title: pr.title,
        closedAt: pr.closedAt,
        baseRefName: pr.baseRefName,
        repositoryName: pr.repository.name,
        repositoryOwnerLogin: pr.repository.owner.login
      })
    )
  }))
}

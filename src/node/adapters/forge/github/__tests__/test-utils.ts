/**
 * Test utilities for the GitHub forge layer
 */

import { vi } from 'vitest'
import type { GraphQLResponse, GraphQLTransport } from '../GitHubGraphQLClient'

export type RecordedQuery = {
  document: string
  variables: Record<string, unknown>
}

/**
 * In-memory transport that answers each request with the next of `pages`.
 * Records the variables of every request so tests can check the cursors.
 */
export function createPagedTransport(pages: unknown[]) {
  const calls: RecordedQuery[] = []
  let index = 0
  const query = vi.fn(
    async (document: string, variables: Record<string, unknown>): Promise<GraphQLResponse> => {
      calls.push({ document, variables })
      if (index >= pages.length) {
        throw new Error(`Unexpected request #${index + 1}`)
      }
      const data = pages[index]
      index += 1
      return { data, rateLimit: null }
    }
  )
  const transport: GraphQLTransport = { query }
  return { transport, calls, query }
}

export type PullRequestNodeInput = {
  number: number
  headRefName: string
  closedAt: string
  createdAt?: string
  title?: string
  owner?: string | null
}

export function pullRequestNode(input: PullRequestNodeInput) {
  return {
    number: input.number,
    title: input.title ?? `PR ${input.number}`,
    createdAt: input.createdAt ?? input.closedAt,
    closedAt: input.closedAt,
    updatedAt: input.closedAt,
    headRefName: input.headRefName,
    headRepositoryOwner: input.owner === null ? null : { login: input.owner ?? 'octo' }
  }
}

export function pullRequestPage(
  nodes: unknown[],
  pageInfo: { hasNextPage: boolean; endCursor: string | null } | null
) {
  return {
    repository: {
      pullRequests: pageInfo ? { pageInfo, nodes } : { nodes }
    }
  }
}

export type BranchNodeInput = {
  name: string
  oid?: string
  merged?: Array<{ number: number; title?: string; closedAt?: string }>
}

export function branchNode(input: BranchNodeInput) {
  const merged = input.merged ?? []
  return {
    name: input.name,
    target: { oid: input.oid ?? `${input.name}-oid` },
    associatedPullRequests: {
      totalCount: merged.length,
      nodes: merged.map((pr) => ({
        number: pr.number,
        title: pr.title ?? `PR ${pr.number}`,
        closedAt: pr.closedAt ?? '2026-01-10T12:00:00Z',
        baseRefName: 'main',
        repository: { name: 'widgets', owner: { login: 'acme' } }
      }))
    }
  }
}

export function branchPage(
  nodes: unknown[],
  pageInfo: { hasNextPage: boolean; endCursor: string | null } | null
) {
  return {
    repository: {
      refs: pageInfo ? { pageInfo, nodes } : { nodes }
    }
  }
}

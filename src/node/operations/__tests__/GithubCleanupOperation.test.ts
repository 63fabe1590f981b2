import { afterEach, describe, expect, it, vi } from 'vitest'
import type { GithubRunConfiguration } from '@shared/types'
import { PagedQueryClient } from '../../adapters/forge/github/PagedQueryClient'
import { branchNode, branchPage, createPagedTransport } from '../../adapters/forge/github/__tests__/test-utils'
import { MergedBranchLocator } from '../../services/MergedBranchLocator'
import { DeletionError } from '../../shared/errors'
import type { BranchDeleter } from '../DeletionDriver'
import { GithubCleanupOperation } from '../GithubCleanupOperation'

function createConfig(overrides: Partial<GithubRunConfiguration> = {}): GithubRunConfiguration {
  return {
    workflow: 'github',
    repo: { owner: 'acme', name: 'widgets' },
    githubUrl: 'https://api.github.com/graphql',
    githubRestUrl: 'https://api.github.com',
    githubToken: 'test-secret',
    author: 'octo',
    dryRun: false,
    limit: 0,
    requestTimeoutMs: 1000,
    logLevel: 'error',
    ...overrides
  }
}

function setup(pages: unknown[], overrides: Partial<GithubRunConfiguration> = {}) {
  const harness = createPagedTransport(pages)
  const deleter = { kind: 'remote', delete: vi.fn(async (_name: string) => undefined) } satisfies BranchDeleter
  const operation = new GithubCleanupOperation(createConfig(overrides), {
    locator: new MergedBranchLocator(new PagedQueryClient(harness.transport)),
    deleter
  })
  return { ...harness, deleter, operation }
}

const twoPages = [
  branchPage(
    [
      branchNode({ name: 'main' }),
      branchNode({ name: 'feature-a', merged: [{ number: 1 }] }),
      branchNode({ name: 'feature-b', merged: [{ number: 2 }] })
    ],
    { hasNextPage: true, endCursor: 'c1' }
  ),
  branchPage(
    [branchNode({ name: 'wip' }), branchNode({ name: 'feature-c', merged: [{ number: 3 }] })],
    { hasNextPage: false, endCursor: null }
  )
]

describe('GithubCleanupOperation', () => {
  it('should delete every branch with a merged pull request', async () => {
    const { operation, deleter } = setup(twoPages)

    const result = await operation.run()

    expect(deleter.delete.mock.calls.map(([name]) => name)).toEqual(['feature-a', 'feature-b', 'feature-c'])
    expect(result).toEqual({
      stats: { total: 5, stale: 3, deleted: 3, failed: 0 },
      stale: ['feature-a', 'feature-b', 'feature-c'],
      deleted: ['feature-a', 'feature-b', 'feature-c'],
      failed: []
    })
  })

  it('should not delete anything in dry run', async () => {
    const { operation, deleter } = setup(twoPages, { dryRun: true })

    const result = await operation.run()

    expect(deleter.delete).not.toHaveBeenCalled()
    expect(result.stale).toEqual(['feature-a', 'feature-b', 'feature-c'])
    expect(result.stats).toEqual({ total: 5, stale: 3, deleted: 0, failed: 0 })
  })

  it('should keep going after a failed deletion', async () => {
    const { operation, deleter } = setup(twoPages)
    deleter.delete.mockRejectedValueOnce(new DeletionError('GitHub API failed with status 422: gone', 'feature-a', 422))

    const result = await operation.run()

    expect(deleter.delete).toHaveBeenCalledTimes(3)
    expect(result.deleted).toEqual(['feature-b', 'feature-c'])
    expect(result.failed).toEqual([{ name: 'feature-a', reason: 'GitHub API failed with status 422: gone' }])
    expect(result.stats).toEqual({ total: 5, stale: 3, deleted: 2, failed: 1 })
  })

  it('should stop after limit stale branches without fetching more pages', async () => {
    const { operation, deleter, query } = setup(twoPages, { limit: 2 })

    const result = await operation.run()

    expect(deleter.delete).toHaveBeenCalledTimes(2)
    expect(result.stale).toEqual(['feature-a', 'feature-b'])
    expect(result.stats).toEqual({ total: 3, stale: 2, deleted: 2, failed: 0 })
    expect(query).toHaveBeenCalledTimes(1)
  })

  it('should propagate remote query failures', async () => {
    const { operation, deleter } = setup([{ repository: { refs: { nodes: [{ name: 1 }] } } }])

    await expect(operation.run()).rejects.toThrow('Unexpected response shape at repository.refs')
    expect(deleter.delete).not.toHaveBeenCalled()
  })

  describe('logging', () => {
    afterEach(() => {
      vi.restoreAllMocks()
    })

    async function runAndCaptureInfo(dryRun: boolean): Promise<string[]> {
      const info = vi.spyOn(console, 'info').mockImplementation(() => undefined)
      const { operation } = setup(
        [
          branchPage([branchNode({ name: 'main' }), branchNode({ name: 'feature-a', merged: [{ number: 1 }] })], {
            hasNextPage: false,
            endCursor: null
          })
        ],
        { dryRun }
      )

      await operation.run()
      const lines = info.mock.calls.map((call) => String(call[1]))
      info.mockRestore()
      return lines
    }

    it('should log each stale branch with its pull requests before deleting it', async () => {
      expect(await runAndCaptureInfo(false)).toEqual([
        '[github] Scanning branches of acme/widgets',
        'feature-a: merged via #1 "PR 1" into main (closed 2026-01-10T12:00:00.000Z)',
        'Deleted remote branch feature-a',
        '[github] total=2 stale=1 deleted=1 failed=0'
      ])
    })

    it('should log the same report in dry run', async () => {
      const real = await runAndCaptureInfo(false)
      const dryRun = await runAndCaptureInfo(true)

      expect(dryRun).toEqual([
        '[github] Scanning branches of acme/widgets',
        'feature-a: merged via #1 "PR 1" into main (closed 2026-01-10T12:00:00.000Z)',
        '[dry-run] Would delete remote branch feature-a',
        '[github] total=2 stale=1 deleted=0 failed=0'
      ])
      expect(dryRun.slice(0, 2)).toEqual(real.slice(0, 2))
    })
  })
})

import { describe, expect, it } from 'vitest'
import type { LocalBranch, PullRequest } from '@shared/types'
import { createLocalStats } from '../../domain/RunStats'
import { LocalBranchMatcher } from '../LocalBranchMatcher'
import { FakeGitAdapter, pullRequest } from './test-utils'

describe('LocalBranchMatcher', () => {
  describe('classify', () => {
    const matcher = new LocalBranchMatcher(new FakeGitAdapter(), '/repo', 'origin')

    it('should match upstreams on the configured remote', () => {
      expect(matcher.classify('refs/remotes/origin/feature')).toBe('matched')
    })

    it('should skip other remotes and local upstreams', () => {
      expect(matcher.classify('refs/remotes/fork/feature')).toBe('skipped')
      expect(matcher.classify('refs/remotes/origin-mirror/feature')).toBe('skipped')
      expect(matcher.classify('refs/heads/main')).toBe('skipped')
    })
  })

  describe('collectEligible', () => {
    it('should put every branch in exactly one of matched, skipped or error', async () => {
      const git = new FakeGitAdapter(undefined, [
        { name: 'main', upstream: ['origin', 'main'] },
        { name: 'feature-x', upstream: ['origin', 'feature-x'] },
        { name: 'from-fork', upstream: ['fork', 'from-fork'] },
        { name: 'stacked', upstream: ['.', 'main'] },
        { name: 'scratch' }
      ])
      const stats = createLocalStats()

      const eligible = await new LocalBranchMatcher(git, '/repo', 'origin').collectEligible(stats)

      expect([...eligible.keys()]).toEqual(['main', 'feature-x'])
      expect(eligible.get('feature-x')).toEqual({
        fullRefName: 'refs/heads/feature-x',
        shortName: 'feature-x',
        upstreamRefName: 'refs/remotes/origin/feature-x'
      })
      expect(stats).toMatchObject({ total: 5, matched: 2, skipped: 2, error: 1 })
      expect(stats.matched + stats.skipped + stats.error).toBe(stats.total)
    })

    it('should key branches by local name even when the upstream name differs', async () => {
      const git = new FakeGitAdapter(undefined, [{ name: 'local-name', upstream: ['origin', 'remote-name'] }])

      const eligible = await new LocalBranchMatcher(git, '/repo', 'origin').collectEligible(createLocalStats())

      expect([...eligible.keys()]).toEqual(['local-name'])
    })

    it('should propagate failures other than upstream resolution', async () => {
      const git = new FakeGitAdapter(undefined, [{ name: 'feature-x', upstream: ['origin', 'feature-x'] }])
      git.resolveUpstream = async () => {
        throw new Error('disk on fire')
      }

      await expect(
        new LocalBranchMatcher(git, '/repo', 'origin').collectEligible(createLocalStats())
      ).rejects.toThrow('disk on fire')
    })
  })

  describe('intersect', () => {
    function branch(name: string): LocalBranch {
      return { fullRefName: `refs/heads/${name}`, shortName: name, upstreamRefName: `refs/remotes/origin/${name}` }
    }

    it('should return names present on both sides, in local order', () => {
      const branches = new Map([
        ['b', branch('b')],
        ['a', branch('a')],
        ['local-only', branch('local-only')]
      ])
      const pullRequests = new Map<string, PullRequest>([
        ['a', pullRequest({ headRefName: 'a', number: 1 })],
        ['remote-only', pullRequest({ headRefName: 'remote-only', number: 2 })],
        ['b', pullRequest({ headRefName: 'b', number: 3 })]
      ])

      const stale = LocalBranchMatcher.intersect(branches, pullRequests)

      expect(stale.map((s) => [s.branch.shortName, s.pullRequest.number])).toEqual([
        ['b', 3],
        ['a', 1]
      ])
    })

    it('should return nothing when either side is empty', () => {
      expect(LocalBranchMatcher.intersect(new Map(), new Map([['a', pullRequest({ headRefName: 'a' })]]))).toEqual([])
      expect(LocalBranchMatcher.intersect(new Map([['a', branch('a')]]), new Map())).toEqual([])
    })
  })
})

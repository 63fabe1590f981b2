/**
 * Behaviour shared by both adapters, run against real repositories.
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { BranchResolutionError, DeletionError } from '../../../shared/errors'
import type { GitAdapter } from '../interface'
import { IsomorphicGitAdapter } from '../IsomorphicGitAdapter'
import { SimpleGitAdapter } from '../SimpleGitAdapter'
import {
  addRemote,
  cleanupTestRepo,
  createBranch,
  createTestRepo,
  refExists,
  setUpstream
} from './test-utils'

const adapters: Array<[string, () => GitAdapter]> = [
  ['IsomorphicGitAdapter', () => new IsomorphicGitAdapter()],
  ['SimpleGitAdapter', () => new SimpleGitAdapter()]
]

describe.each(adapters)('%s', (_name, createAdapter) => {
  let repoPath: string
  let adapter: GitAdapter

  beforeEach(async () => {
    repoPath = await createTestRepo()
    adapter = createAdapter()
  })

  afterEach(async () => {
    await cleanupTestRepo(repoPath)
  })

  describe('listRemotes', () => {
    it('should return configured remotes', async () => {
      addRemote(repoPath, 'origin')

      const remotes = await adapter.listRemotes(repoPath)

      expect(remotes).toEqual([{ name: 'origin', url: 'https://example.invalid/acme/widgets.git' }])
    })

    it('should return an empty list without remotes', async () => {
      expect(await adapter.listRemotes(repoPath)).toEqual([])
    })
  })

  describe('listBranchRefs', () => {
    it('should list local branches as full refs', async () => {
      createBranch(repoPath, 'feature-x')
      createBranch(repoPath, 'team/feature-y')
      addRemote(repoPath, 'origin')
      setUpstream(repoPath, 'feature-x', 'origin')

      const refs = await adapter.listBranchRefs(repoPath)

      expect([...refs].sort()).toEqual([
        'refs/heads/feature-x',
        'refs/heads/main',
        'refs/heads/team/feature-y'
      ])
    })
  })

  describe('resolveUpstream', () => {
    beforeEach(() => {
      addRemote(repoPath, 'origin')
      addRemote(repoPath, 'fork')
    })

    it('should resolve a branch tracking the remote', async () => {
      createBranch(repoPath, 'feature-x')
      setUpstream(repoPath, 'feature-x', 'origin')

      expect(await adapter.resolveUpstream(repoPath, 'refs/heads/feature-x')).toBe(
        'refs/remotes/origin/feature-x'
      )
    })

    it('should resolve a branch tracking a differently named branch', async () => {
      createBranch(repoPath, 'local-name')
      setUpstream(repoPath, 'local-name', 'fork', 'remote-name')

      expect(await adapter.resolveUpstream(repoPath, 'refs/heads/local-name')).toBe(
        'refs/remotes/fork/remote-name'
      )
    })

    it('should resolve a branch tracking a local branch', async () => {
      createBranch(repoPath, 'stacked')
      setUpstream(repoPath, 'stacked', '.', 'main')

      expect(await adapter.resolveUpstream(repoPath, 'refs/heads/stacked')).toBe('refs/heads/main')
    })

    it('should throw BranchResolutionError without an upstream', async () => {
      createBranch(repoPath, 'untracked')

      await expect(adapter.resolveUpstream(repoPath, 'refs/heads/untracked')).rejects.toBeInstanceOf(
        BranchResolutionError
      )
    })
  })

  describe('currentBranch', () => {
    it('should return the checked out branch', async () => {
      createBranch(repoPath, 'feature-x', true)

      expect(await adapter.currentBranch(repoPath)).toBe('feature-x')
    })
  })

  describe('deleteRef', () => {
    it('should delete an existing branch', async () => {
      createBranch(repoPath, 'feature-x')

      await adapter.deleteRef(repoPath, 'refs/heads/feature-x')

      expect(refExists(repoPath, 'refs/heads/feature-x')).toBe(false)
      expect(refExists(repoPath, 'refs/heads/main')).toBe(true)
    })

    it('should throw DeletionError for a missing branch', async () => {
      await expect(adapter.deleteRef(repoPath, 'refs/heads/missing')).rejects.toBeInstanceOf(DeletionError)
    })
  })
})

/**
 * Isomorphic-Git Adapter
 *
 * Git adapter implementation using isomorphic-git library. Reads refs and
 * config straight from the .git directory, so no git binary is needed.
 */

import fs from 'fs'
import git from 'isomorphic-git'
import { BranchResolutionError, DeletionError, getErrorMessage } from '../../shared/errors'
import type { GitAdapter } from './interface'
import type { Remote } from './types'
import { toBranchRef, toShortName, upstreamFromConfig } from './utils'

export class IsomorphicGitAdapter implements GitAdapter {
  readonly name = 'isomorphic-git'

  async listRemotes(dir: string): Promise<Remote[]> {
    const remotes = await git.listRemotes({ fs, dir })
    return remotes.map((r) => ({
      name: r.remote,
      url: r.url
    }))
  }

  async listBranchRefs(dir: string): Promise<string[]> {
    const branches = await git.listBranches({ fs, dir })
    return branches.filter((branch) => branch !== 'HEAD').map(toBranchRef)
  }

  async resolveUpstream(dir: string, branchRef: string): Promise<string> {
    const shortName = toShortName(branchRef)

    let remote: string | undefined
    let merge: string | undefined
    try {
      remote = await this.getConfigString(dir, `branch.${shortName}.remote`)
      merge = await this.getConfigString(dir, `branch.${shortName}.merge`)
    } catch (error) {
      throw new BranchResolutionError(
        `Failed to read upstream config for ${shortName}: ${getErrorMessage(error)}`,
        branchRef,
        error
      )
    }

    return upstreamFromConfig(branchRef, remote, merge)
  }

  async currentBranch(dir: string): Promise<string | null> {
    const branch = await git.currentBranch({ fs, dir, fullname: false })
    return branch ?? null
  }

  async deleteRef(dir: string, ref: string): Promise<void> {
    try {
      // deleteRef silently ignores missing refs
      await git.resolveRef({ fs, dir, ref, depth: 1 })
    } catch (error) {
      throw new DeletionError(`Reference ${ref} does not exist`, ref, undefined, error)
    }

    try {
      await git.deleteRef({ fs, dir, ref })
    } catch (error) {
      throw new DeletionError(`Failed to delete ${ref}: ${getErrorMessage(error)}`, ref, undefined, error)
    }
  }

  private async getConfigString(dir: string, path: string): Promise<string | undefined> {
    const value: unknown = await git.getConfig({ fs, dir, path })
    return typeof value === 'string' ? value : undefined
  }
}

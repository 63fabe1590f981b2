/**
 * Simple-Git Adapter
 *
 * Git adapter implementation using simple-git library. Uses the native Git CLI
 * under the hood, so upstream resolution follows the repository's real fetch
 * refspecs instead of the default `refs/remotes/<remote>/<branch>` mapping.
 */

import simpleGit, { type SimpleGit } from 'simple-git'
import { BranchResolutionError, DeletionError, getErrorMessage } from '../../shared/errors'
import type { GitAdapter } from './interface'
import type { Remote } from './types'
import { toShortName } from './utils'

export class SimpleGitAdapter implements GitAdapter {
  readonly name = 'simple-git'

  private createGit(dir: string): SimpleGit {
    return simpleGit(dir)
  }

  async listRemotes(dir: string): Promise<Remote[]> {
    const git = this.createGit(dir)
    const remotes = await git.getRemotes(true)
    return remotes.map((r) => ({
      name: r.name,
      url: r.refs.fetch || r.refs.push || ''
    }))
  }

  async listBranchRefs(dir: string): Promise<string[]> {
    const git = this.createGit(dir)
    const output = await git.raw(['for-each-ref', '--format=%(refname)', 'refs/heads/'])
    return this.splitLines(output)
  }

  async resolveUpstream(dir: string, branchRef: string): Promise<string> {
    const git = this.createGit(dir)

    let output: string
    try {
      output = await git.raw(['for-each-ref', '--format=%(upstream)', branchRef])
    } catch (error) {
      throw new BranchResolutionError(
        `Failed to read upstream for ${toShortName(branchRef)}: ${getErrorMessage(error)}`,
        branchRef,
        error
      )
    }

    const upstream = output.trim()
    if (!upstream) {
      throw new BranchResolutionError(`No upstream configured for ${toShortName(branchRef)}`, branchRef)
    }
    if (!upstream.startsWith('refs/')) {
      throw new BranchResolutionError(
        `Unrecognized upstream '${upstream}' for ${toShortName(branchRef)}`,
        branchRef
      )
    }
    return upstream
  }

  async currentBranch(dir: string): Promise<string | null> {
    const git = this.createGit(dir)
    const branch = (await git.revparse(['--abbrev-ref', 'HEAD'])).trim()
    return branch === 'HEAD' || branch === '' ? null : branch
  }

  async deleteRef(dir: string, ref: string): Promise<void> {
    const git = this.createGit(dir)

    try {
      await git.raw(['show-ref', '--verify', ref])
    } catch (error) {
      throw new DeletionError(`Reference ${ref} does not exist`, ref, undefined, error)
    }

    try {
      await git.raw(['update-ref', '-d', ref])
    } catch (error) {
      throw new DeletionError(`Failed to delete ${ref}: ${getErrorMessage(error)}`, ref, undefined, error)
    }
  }

  private splitLines(output: string): string[] {
    return output
      .split('\n')
      .map((line) => line.trim())
      .filter(Boolean)
  }
}

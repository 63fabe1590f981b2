/**
 * Git Adapter Interface
 *
 * The repository handle the local workflow depends on. Implemented by
 * isomorphic-git (pure JS, default) and simple-git (shells out to the git CLI).
 */

import type { Remote } from './types'

/**
 * All methods take the repository's working directory as their first argument.
 */
export interface GitAdapter {
  /**
   * Get the adapter name for logging/debugging
   */
  readonly name: string

  /**
   * List all remotes configured in the repository
   */
  listRemotes(dir: string): Promise<Remote[]>

  /**
   * List local branches as full reference names (`refs/heads/<name>`)
   */
  listBranchRefs(dir: string): Promise<string[]>

  /**
   * Resolve the upstream tracking reference of a local branch.
   *
   * @param branchRef - Full reference name, e.g. `refs/heads/feature-x`
   * @returns Full upstream reference, e.g. `refs/remotes/origin/feature-x`
   * @throws BranchResolutionError when no upstream is configured or the
   *   configuration cannot be interpreted
   */
  resolveUpstream(dir: string, branchRef: string): Promise<string>

  /**
   * Short name of the checked out branch, or null when HEAD is detached
   */
  currentBranch(dir: string): Promise<string | null>

  /**
   * Delete a reference by its full name. Throws if the reference does not exist.
   */
  deleteRef(dir: string, ref: string): Promise<void>
}

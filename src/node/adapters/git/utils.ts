/**
 * Git Adapter Utilities
 *
 * Reference-name helpers shared by the adapter implementations.
 */

import { HEADS_PREFIX } from '../../shared/constants'
import { BranchResolutionError } from '../../shared/errors'

export function toShortName(branchRef: string): string {
  return branchRef.startsWith(HEADS_PREFIX) ? branchRef.slice(HEADS_PREFIX.length) : branchRef
}

export function toBranchRef(shortName: string): string {
  return shortName.startsWith(HEADS_PREFIX) ? shortName : `${HEADS_PREFIX}${shortName}`
}

/**
 * Maps `branch.<name>.remote` / `branch.<name>.merge` config values to the
 * remote-tracking reference git would report as the branch's upstream.
 *
 * A remote of `.` means the branch tracks another local branch, so the merge
 * ref is returned as is.
 */
export function upstreamFromConfig(
  branchRef: string,
  remote: string | undefined,
  merge: string | undefined
): string {
  if (!remote || !merge) {
    throw new BranchResolutionError(`No upstream configured for ${toShortName(branchRef)}`, branchRef)
  }

  if (!merge.startsWith(HEADS_PREFIX)) {
    throw new BranchResolutionError(
      `Unrecognized upstream merge ref '${merge}' for ${toShortName(branchRef)}`,
      branchRef
    )
  }

  if (remote === '.') {
    return merge
  }

  return `refs/remotes/${remote}/${merge.slice(HEADS_PREFIX.length)}`
}

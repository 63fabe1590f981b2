import { log } from '@shared/logger'
import type { RemoteBranch } from '@shared/types'
import type { PagedQueryClient } from '../adapters/forge/github/PagedQueryClient'
import {
  BRANCHES_WITH_MERGED_PULL_REQUESTS_QUERY,
  decodeBranchPage
} from '../adapters/forge/github/queries'
import { ASSOCIATED_PR_LIMIT, PAGE_SIZE } from '../shared/constants'

export type LocateBranchesOptions = {
  /** Called for every branch the remote returns, stale or not. */
  onExamined?: (branch: RemoteBranch) => void
}

/**
 * Finds remote branches that have at least one merged pull request.
 *
 * There is no recency cutoff here: a branch is stale as soon as a merged pull
 * request exists for it, however old.
 */
export class MergedBranchLocator {
  constructor(private readonly client: PagedQueryClient) {}

  async *locate(
    owner: string,
    repo: string,
    options: LocateBranchesOptions = {}
  ): AsyncGenerator<RemoteBranch, void, undefined> {
    const branches = this.client.executePaged(
      BRANCHES_WITH_MERGED_PULL_REQUESTS_QUERY,
      { owner, repo, first: PAGE_SIZE, associated: ASSOCIATED_PR_LIMIT },
      decodeBranchPage
    )

    for await (const branch of branches) {
      options.onExamined?.(branch)
      if (branch.associatedMergedPullRequests.length === 0) {
        log.debug(`[MergedBranchLocator] ${branch.name}: no merged pull requests`)
        continue
      }
      yield branch
    }
  }
}

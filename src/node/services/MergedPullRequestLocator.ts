import { log } from '@shared/logger'
import type { PullRequest } from '@shared/types'
import type { PagedQueryClient } from '../adapters/forge/github/PagedQueryClient'
import {
  decodeMergedPullRequestPage,
  MERGED_PULL_REQUESTS_QUERY
} from '../adapters/forge/github/queries'
import { MS_PER_DAY, PAGE_SIZE } from '../shared/constants'

/**
 * Finds merged pull requests, newest first, within a recency window.
 *
 * The remote returns pull requests in descending creation order, so the first
 * one closed before the cutoff ends the scan: no further pages are requested.
 * This keeps the cost proportional to recent activity rather than to the full
 * history. The author filter only skips items; it never ends the scan.
 */
export class MergedPullRequestLocator {
  constructor(
    private readonly client: PagedQueryClient,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * @param maxDays - Recency window in days; 0 scans the whole history
   * @param author - Owner login of the head repository; null yields every author
   */
  async *locate(
    owner: string,
    repo: string,
    maxDays: number,
    author: string | null
  ): AsyncGenerator<PullRequest, void, undefined> {
    const cutoff = maxDays > 0 ? new Date(this.now().getTime() - maxDays * MS_PER_DAY) : null
    const expectedAuthor = author ? author.toLowerCase() : null

    const pullRequests = this.client.executePaged(
      MERGED_PULL_REQUESTS_QUERY,
      { owner, repo, first: PAGE_SIZE },
      decodeMergedPullRequestPage
    )

    for await (const pr of pullRequests) {
      if (cutoff && pr.closedAt.getTime() < cutoff.getTime()) {
        log.debug(
          `[MergedPullRequestLocator] #${pr.number} closed ${pr.closedAt.toISOString()}, before cutoff ${cutoff.toISOString()}; stopping`
        )
        return
      }

      if (expectedAuthor && pr.headRepositoryOwnerLogin?.toLowerCase() !== expectedAuthor) {
        continue
      }

      yield pr
    }
  }
}

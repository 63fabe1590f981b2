import { log } from '@shared/logger'
import type { LocalBranch, PullRequest } from '@shared/types'
import type { GitAdapter } from '../adapters/git'
import { toShortName } from '../adapters/git'
import type { LocalRunStats } from '../domain/RunStats'
import { BranchResolutionError } from '../shared/errors'

export type BranchClassification = 'matched' | 'skipped'

/**
 * A local branch paired with the merged pull request opened from a branch of
 * the same name.
 */
export type StaleLocalBranch = {
  branch: LocalBranch
  pullRequest: PullRequest
}

/**
 * Correlates local branches with merged pull requests by branch name.
 *
 * Only branches tracking a branch on the configured remote take part. Each
 * examined branch lands in exactly one of matched, skipped or error.
 */
export class LocalBranchMatcher {
  private readonly remotePrefix: string

  constructor(
    private readonly git: GitAdapter,
    private readonly dir: string,
    remote: string
  ) {
    this.remotePrefix = `refs/remotes/${remote}/`
  }

  classify(upstreamRefName: string): BranchClassification {
    return upstreamRefName.startsWith(this.remotePrefix) ? 'matched' : 'skipped'
  }

  /**
   * Lists local branches and keeps those whose upstream lives on the
   * configured remote, keyed by short name.
   *
   * Branches without a resolvable upstream are counted as `error` and left
   * out; any other failure propagates.
   */
  async collectEligible(stats: LocalRunStats): Promise<Map<string, LocalBranch>> {
    const eligible = new Map<string, LocalBranch>()
    const refs = await this.git.listBranchRefs(this.dir)

    for (const fullRefName of refs) {
      stats.total += 1
      const shortName = toShortName(fullRefName)

      let upstreamRefName: string
      try {
        upstreamRefName = await this.git.resolveUpstream(this.dir, fullRefName)
      } catch (error) {
        if (!(error instanceof BranchResolutionError)) throw error
        stats.error += 1
        log.warn(`[LocalBranchMatcher] ${shortName}: ${error.message}`)
        continue
      }

      if (this.classify(upstreamRefName) === 'skipped') {
        stats.skipped += 1
        log.debug(`[LocalBranchMatcher] ${shortName}: tracks ${upstreamRefName}, skipping`)
        continue
      }

      stats.matched += 1
      eligible.set(shortName, { fullRefName, shortName, upstreamRefName })
    }

    return eligible
  }

  /**
   * Names present in both maps, in local branch order. A pull request without
   * a local branch, or a local branch without a pull request, never appears.
   */
  static intersect(
    branches: ReadonlyMap<string, LocalBranch>,
    pullRequests: ReadonlyMap<string, PullRequest>
  ): StaleLocalBranch[] {
    const stale: StaleLocalBranch[] = []
    for (const [name, branch] of branches) {
      const pullRequest = pullRequests.get(name)
      if (pullRequest) {
        stale.push({ branch, pullRequest })
      }
    }
    return stale
  }
}

/**
 * LocalCleanupOperation - deletes local branches whose name matches the head
 * branch of a recently merged pull request.
 *
 * Flow:
 * 1. Check the configured remote exists (fatal otherwise)
 * 2. Collect merged pull requests by head branch name (newest first, cutoff
 *    bounded, author filtered, optionally capped by `limit`)
 * 3. Collect local branches tracking the configured remote
 * 4. Delete the branches present in both
 */

import { log } from '@shared/logger'
import type { LocalRunConfiguration, PullRequest } from '@shared/types'
import { GitHubGraphQLClient } from '../adapters/forge/github/GitHubGraphQLClient'
import { PagedQueryClient } from '../adapters/forge/github/PagedQueryClient'
import { createGitAdapter, type GitAdapter } from '../adapters/git'
import { createLocalStats, formatStats, type LocalRunStats } from '../domain/RunStats'
import { LocalBranchMatcher } from '../services/LocalBranchMatcher'
import { MergedPullRequestLocator } from '../services/MergedPullRequestLocator'
import { ConfigurationError } from '../shared/errors'
import {
  type BranchDeleter,
  DeletionDriver,
  LocalBranchDeleter,
  recordOutcome,
  type SweepResult
} from './DeletionDriver'

export type LocalCleanupDependencies = {
  git: GitAdapter
  locator: MergedPullRequestLocator
  deleter: BranchDeleter
}

export class LocalCleanupOperation {
  constructor(
    private readonly config: LocalRunConfiguration,
    private readonly deps: LocalCleanupDependencies
  ) {}

  /**
   * Wires the operation to the GitHub GraphQL endpoint and the configured
   * git adapter.
   */
  static create(config: LocalRunConfiguration): LocalCleanupOperation {
    const git = createGitAdapter({ type: config.gitAdapter, verbose: config.logLevel === 'debug' })
    const transport = new GitHubGraphQLClient({
      token: config.githubToken,
      endpoint: config.githubUrl,
      timeoutMs: config.requestTimeoutMs
    })
    return new LocalCleanupOperation(config, {
      git,
      locator: new MergedPullRequestLocator(new PagedQueryClient(transport)),
      deleter: new LocalBranchDeleter(git, config.path)
    })
  }

  async run(): Promise<SweepResult<LocalRunStats>> {
    const { path, remote, dryRun } = this.config
    const result: SweepResult<LocalRunStats> = {
      stats: createLocalStats(),
      stale: [],
      deleted: [],
      failed: []
    }
    const { stats } = result

    await this.assertRemoteExists()

    const pullRequests = await this.collectPullRequests(stats)

    const matcher = new LocalBranchMatcher(this.deps.git, path, remote)
    const branches = await matcher.collectEligible(stats)
    const staleBranches = LocalBranchMatcher.intersect(branches, pullRequests)

    const driver = new DeletionDriver(this.deps.deleter, dryRun)
    for (const { branch, pullRequest } of staleBranches) {
      stats.stale += 1
      result.stale.push(branch.shortName)
      log.info(
        `${branch.shortName}: closed ${pullRequest.closedAt.toISOString()} #${pullRequest.number} ${pullRequest.title}`
      )
      recordOutcome(result, await driver.delete(branch.shortName))
    }

    log.info(`[local] ${formatStats(stats)}`)
    return result
  }

  private async assertRemoteExists(): Promise<void> {
    const { path, remote } = this.config
    const remotes = await this.deps.git.listRemotes(path)
    if (!remotes.some((r) => r.name === remote)) {
      const known = remotes.map((r) => r.name).join(', ') || 'none'
      throw new ConfigurationError(
        `Remote '${remote}' is not configured in ${path} (known remotes: ${known})`,
        'remote'
      )
    }
  }

  /**
   * Maps head branch name to the most recently created merged pull request
   * opened from it.
   */
  private async collectPullRequests(stats: LocalRunStats): Promise<Map<string, PullRequest>> {
    const { repo, maxDays, author, limit } = this.config
    const byHeadRef = new Map<string, PullRequest>()

    log.info(
      `[local] Fetching pull requests merged into ${repo.owner}/${repo.name}` +
        (maxDays > 0 ? ` in the last ${maxDays} day(s)` : '') +
        (author ? ` from ${author}` : '')
    )

    for await (const pr of this.deps.locator.locate(repo.owner, repo.name, maxDays, author)) {
      stats.mergedPrs += 1
      if (!byHeadRef.has(pr.headRefName)) {
        byHeadRef.set(pr.headRefName, pr)
      }
      if (limit > 0 && stats.mergedPrs >= limit) {
        log.info(`[local] Reached limit of ${limit} pull request(s)`)
        break
      }
    }

    return byHeadRef
  }
}

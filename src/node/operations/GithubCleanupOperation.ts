/**
 * GithubCleanupOperation - deletes branches on the hosting service that have
 * a merged pull request.
 */

import { log } from '@shared/logger'
import type { AssociatedPullRequest, GithubRunConfiguration } from '@shared/types'
import { GitHubAdapter } from '../adapters/forge/github/GitHubAdapter'
import { GitHubGraphQLClient } from '../adapters/forge/github/GitHubGraphQLClient'
import { PagedQueryClient } from '../adapters/forge/github/PagedQueryClient'
import { createGithubStats, formatStats, type GithubRunStats } from '../domain/RunStats'
import { MergedBranchLocator } from '../services/MergedBranchLocator'
import {
  type BranchDeleter,
  DeletionDriver,
  recordOutcome,
  RemoteBranchDeleter,
  type SweepResult
} from './DeletionDriver'

export type GithubCleanupDependencies = {
  locator: MergedBranchLocator
  deleter: BranchDeleter
}

function describePullRequests(prs: AssociatedPullRequest[]): string {
  return prs
    .map((pr) => `#${pr.number} "${pr.title}" into ${pr.baseRefName} (closed ${pr.closedAt.toISOString()})`)
    .join(', ')
}

export class GithubCleanupOperation {
  constructor(
    private readonly config: GithubRunConfiguration,
    private readonly deps: GithubCleanupDependencies
  ) {}

  /**
   * Wires the operation to the real GitHub GraphQL and REST endpoints.
   */
  static create(config: GithubRunConfiguration): GithubCleanupOperation {
    const transport = new GitHubGraphQLClient({
      token: config.githubToken,
      endpoint: config.githubUrl,
      timeoutMs: config.requestTimeoutMs
    })
    const forge = new GitHubAdapter(
      { token: config.githubToken, restUrl: config.githubRestUrl, timeoutMs: config.requestTimeoutMs },
      config.repo
    )
    return new GithubCleanupOperation(config, {
      locator: new MergedBranchLocator(new PagedQueryClient(transport)),
      deleter: new RemoteBranchDeleter(forge)
    })
  }

  async run(): Promise<SweepResult<GithubRunStats>> {
    const { repo, dryRun, limit } = this.config
    const result: SweepResult<GithubRunStats> = {
      stats: createGithubStats(),
      stale: [],
      deleted: [],
      failed: []
    }
    const { stats } = result
    const driver = new DeletionDriver(this.deps.deleter, dryRun)

    log.info(`[github] Scanning branches of ${repo.owner}/${repo.name}`)

    const branches = this.deps.locator.locate(repo.owner, repo.name, {
      onExamined: () => {
        stats.total += 1
      }
    })

    for await (const branch of branches) {
      stats.stale += 1
      result.stale.push(branch.name)
      log.info(`${branch.name}: merged via ${describePullRequests(branch.associatedMergedPullRequests)}`)

      recordOutcome(result, await driver.delete(branch.name))

      if (limit > 0 && stats.stale >= limit) {
        log.info(`[github] Reached limit of ${limit} branch(es)`)
        break
      }
    }

    log.info(`[github] ${formatStats(stats)}`)
    return result
  }
}

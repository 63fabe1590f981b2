/**
 * DeletionDriver - performs, or under dry-run only reports, branch deletions.
 *
 * Every deletion is independent: a failure is logged and returned as a
 * `failed` outcome so the caller can move on to the next branch.
 */

import { log } from '@shared/logger'
import type { GitAdapter } from '../adapters/git'
import { toBranchRef } from '../adapters/git'
import type { GitHubAdapter } from '../adapters/forge/github/GitHubAdapter'
import { DeletionError, getErrorMessage } from '../shared/errors'

export type DeletionOutcome =
  | { name: string; status: 'deleted' }
  | { name: string; status: 'dry-run' }
  | { name: string; status: 'failed'; reason: string }

/**
 * The destructive half of a deletion. Implementations throw on failure.
 */
export interface BranchDeleter {
  /** 'remote' or 'local', used in log lines */
  readonly kind: string
  delete(name: string): Promise<void>
}

/**
 * Deletes `refs/heads/<name>` on the hosting service.
 */
export class RemoteBranchDeleter implements BranchDeleter {
  readonly kind = 'remote'

  constructor(private readonly forge: Pick<GitHubAdapter, 'deleteRemoteBranch'>) {}

  async delete(name: string): Promise<void> {
    await this.forge.deleteRemoteBranch(name)
  }
}

/**
 * Deletes `refs/heads/<name>` in a local repository. Refuses to delete the
 * branch that is checked out.
 */
export class LocalBranchDeleter implements BranchDeleter {
  readonly kind = 'local'

  constructor(
    private readonly git: GitAdapter,
    private readonly dir: string
  ) {}

  async delete(name: string): Promise<void> {
    const current = await this.git.currentBranch(this.dir)
    if (current === name) {
      throw new DeletionError(`${name} is checked out`, toBranchRef(name))
    }
    await this.git.deleteRef(this.dir, toBranchRef(name))
  }
}

export class DeletionDriver {
  constructor(
    private readonly deleter: BranchDeleter,
    private readonly dryRun: boolean
  ) {}

  async delete(name: string): Promise<DeletionOutcome> {
    if (this.dryRun) {
      log.info(`[dry-run] Would delete ${this.deleter.kind} branch ${name}`)
      return { name, status: 'dry-run' }
    }

    try {
      await this.deleter.delete(name)
    } catch (error) {
      const reason = getErrorMessage(error)
      log.error(`Failed to delete ${this.deleter.kind} branch ${name}: ${reason}`)
      return { name, status: 'failed', reason }
    }

    log.info(`Deleted ${this.deleter.kind} branch ${name}`)
    return { name, status: 'deleted' }
  }
}

export type DeletionFailure = {
  name: string
  reason: string
}

/**
 * Outcome of one workflow run. Dry-run deletions appear in `stale` only.
 */
export type SweepResult<S> = {
  stats: S
  stale: string[]
  deleted: string[]
  failed: DeletionFailure[]
}

export function recordOutcome<S extends { deleted: number; failed: number }>(
  result: SweepResult<S>,
  outcome: DeletionOutcome
): void {
  switch (outcome.status) {
    case 'deleted':
      result.stats.deleted += 1
      result.deleted.push(outcome.name)
      break
    case 'failed':
      result.stats.failed += 1
      result.failed.push({ name: outcome.name, reason: outcome.reason })
      break
    case 'dry-run':
      break
  }
}

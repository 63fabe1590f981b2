/**
 * RunStats - per-workflow counters, accumulated during a single run and read
 * once for the summary line.
 */

export type GithubRunStats = {
  /** Remote branches examined */
  total: number
  /** Branches with at least one merged pull request */
  stale: number
  deleted: number
  /** Deletions that failed (non-204, network error) */
  failed: number
}

export type LocalRunStats = {
  /** Merged pull requests collected into the head-ref map */
  mergedPrs: number
  /** Local branches examined */
  total: number
  /** Upstream on the configured remote */
  matched: number
  /** Upstream on another remote or a local branch */
  skipped: number
  /** Upstream unset or unparseable */
  error: number
  /** Matched branches with a merged pull request of the same name */
  stale: number
  deleted: number
  failed: number
}

export function createGithubStats(): GithubRunStats {
  return { total: 0, stale: 0, deleted: 0, failed: 0 }
}

export function createLocalStats(): LocalRunStats {
  return {
    mergedPrs: 0,
    total: 0,
    matched: 0,
    skipped: 0,
    error: 0,
    stale: 0,
    deleted: 0,
    failed: 0
  }
}

function toLabel(key: string): string {
  return key.replace(/[A-Z]/g, (letter) => `-${letter.toLowerCase()}`)
}

/**
 * Renders stats as `name=count` pairs in declaration order,
 * e.g. `merged-prs=3 total=2 matched=1`.
 */
export function formatStats(stats: GithubRunStats | LocalRunStats): string {
  return Object.entries(stats)
    .map(([key, value]) => `${toLabel(key)}=${value}`)
    .join(' ')
}

/**
 * Backend constants shared by the forge adapters and the workflows.
 */

export const DEFAULT_GITHUB_GRAPHQL_URL = 'https://api.github.com/graphql'

export const DEFAULT_REMOTE = 'origin'

/**
 * Default recency window for the local workflow. 0 disables the cutoff.
 */
export const DEFAULT_MAX_DAYS = 30

/** Per-request timeout for GitHub API calls */
export const DEFAULT_REQUEST_TIMEOUT_MS = 15_000

/**
 * Items requested per page. GitHub caps connections at 100.
 */
export const PAGE_SIZE = 100

/**
 * Merged pull requests fetched per remote branch. Only existence matters,
 * so a handful is enough to describe the branch in the log.
 */
export const ASSOCIATED_PR_LIMIT = 5

export const HEADS_PREFIX = 'refs/heads/'

export const USER_AGENT = 'squash-sweep'

export const MS_PER_DAY = 24 * 60 * 60 * 1000

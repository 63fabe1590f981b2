/**
 * Owner/name pair addressing a repository on the hosting service.
 */
export type RepositoryCoordinates = {
  owner: string
  name: string
}

/**
 * A merged pull request as reported by the hosting service.
 */
export type PullRequest = {
  number: number
  title: string
  createdAt: Date
  closedAt: Date
  updatedAt: Date

  /**
   * The branch the pull request was opened from. This is the key used to
   * correlate pull requests with local branches.
   */
  headRefName: string

  /**
   * Login of the account owning the repository the head branch lives in.
   * Null when the fork has since been deleted.
   */
  headRepositoryOwnerLogin: string | null
}

/**
 * Merged pull request attached to a remote branch. Only the fields needed to
 * describe why a branch is stale are fetched.
 */
export type AssociatedPullRequest = {
  number: number
  title: string
  closedAt: Date
  baseRefName: string
  repositoryName: string
  repositoryOwnerLogin: string
}

/**
 * A branch on the hosting service together with its merged pull requests.
 * The branch is stale iff `associatedMergedPullRequests` is non-empty.
 */
export type RemoteBranch = {
  name: string
  targetCommitId: string
  associatedMergedPullRequests: AssociatedPullRequest[]
}

/**
 * One page of a cursor-paginated connection.
 */
export type Page<T> = {
  items: T[]
  endCursor: string | null
  hasNextPage: boolean
}

export function emptyPage<T>(): Page<T> {
  return { items: [], endCursor: null, hasNextPage: false }
}

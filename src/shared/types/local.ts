/**
 * A local branch that passed the upstream eligibility check.
 */
export type LocalBranch = {
  /** e.g. `refs/heads/feature-x` */
  fullRefName: string
  /** `fullRefName` without the `refs/heads/` prefix */
  shortName: string
  /** e.g. `refs/remotes/origin/feature-x` */
  upstreamRefName: string
}

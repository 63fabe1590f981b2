/**
 * Git Adapter Module
 *
 * Usage:
 * ```typescript
 * import { createGitAdapter } from '../adapters/git'
 *
 * const git = createGitAdapter({ type: 'simple-git' })
 * const upstream = await git.resolveUpstream(repoPath, 'refs/heads/feature-x')
 * ```
 */

export { createGitAdapter, isGitAdapterType } from './factory'
export type { GitAdapterConfig } from './factory'

export type { GitAdapter } from './interface'
export type { GitAdapterType, Remote } from './types'

// Adapter implementations (for testing)
export { IsomorphicGitAdapter } from './IsomorphicGitAdapter'
export { SimpleGitAdapter } from './SimpleGitAdapter'

export { toBranchRef, toShortName, upstreamFromConfig } from './utils'

/**
 * Git Adapter Factory
 *
 * Creates the repository handle selected by the run configuration.
 */

import { log } from '@shared/logger'
import type { GitAdapter } from './interface'
import { IsomorphicGitAdapter } from './IsomorphicGitAdapter'
import { SimpleGitAdapter } from './SimpleGitAdapter'
import type { GitAdapterType } from './types'

/**
 * Configuration for adapter creation
 */
export interface GitAdapterConfig {
  /**
   * Which adapter to use. Defaults to isomorphic-git.
   */
  type?: GitAdapterType

  /**
   * Whether to log adapter creation
   */
  verbose?: boolean
}

/**
 * Create a Git adapter instance
 */
export function createGitAdapter(config: GitAdapterConfig = {}): GitAdapter {
  const adapterType = config.type ?? 'isomorphic-git'

  if (config.verbose) {
    log.debug(`[GitAdapter] Creating adapter: ${adapterType}`)
  }

  switch (adapterType) {
    case 'simple-git':
      return new SimpleGitAdapter()

    case 'isomorphic-git':
      return new IsomorphicGitAdapter()
  }
}

export function isGitAdapterType(value: string): value is GitAdapterType {
  return value === 'isomorphic-git' || value === 'simple-git'
}

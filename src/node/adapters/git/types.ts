/**
 * Git Adapter Types
 *
 * Type definitions for the repository operations the local workflow needs,
 * independent of the underlying Git implementation.
 */

/**
 * Git remote information
 */
export type Remote = {
  name: string
  url: string
}

/**
 * Supported Git adapter types
 */
export type { GitAdapterType } from '@shared/types'

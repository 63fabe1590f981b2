import type { LogLevel } from '../logger'
import type { RepositoryCoordinates } from './forge'

export type GitAdapterType = 'isomorphic-git' | 'simple-git'

/**
 * Settings shared by both workflows. Resolved once at startup and never
 * mutated afterwards.
 */
export type BaseRunConfiguration = Readonly<{
  repo: Readonly<RepositoryCoordinates>
  githubUrl: string
  githubRestUrl: string
  githubToken: string
  /** Null disables the author filter. */
  author: string | null
  dryRun: boolean
  /** 0 means unlimited. */
  limit: number
  requestTimeoutMs: number
  logLevel: LogLevel
}>

export type GithubRunConfiguration = BaseRunConfiguration &
  Readonly<{
    workflow: 'github'
  }>

export type LocalRunConfiguration = BaseRunConfiguration &
  Readonly<{
    workflow: 'local'
    remote: string
    path: string
    /** 0 means the full pull request history is scanned. */
    maxDays: number
    gitAdapter: GitAdapterType
  }>

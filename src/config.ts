import { isLogLevel, log, type LogLevel } from '@shared/logger'
import type {
  BaseRunConfiguration,
  GitAdapterType,
  GithubRunConfiguration,
  LocalRunConfiguration,
  RepositoryCoordinates
} from '@shared/types'
import dotenv from 'dotenv'
import os from 'os'
import path from 'path'
import { isGitAdapterType } from './node/adapters/git'
import {
  DEFAULT_GITHUB_GRAPHQL_URL,
  DEFAULT_MAX_DAYS,
  DEFAULT_REMOTE,
  DEFAULT_REQUEST_TIMEOUT_MS
} from './node/shared/constants'
import { ConfigurationError, getErrorMessage } from './node/shared/errors'

export type Environment = Readonly<Record<string, string | undefined>>

/**
 * Options shared by both subcommands, as parsed by commander.
 * Numeric options arrive as strings and are validated here.
 */
export type CommonCommandOptions = {
  githubUrl?: string
  githubToken?: string
  repo: string
  author?: string
  dryRun?: boolean
  limit?: string
  verbose?: boolean
}

export type GithubCommandOptions = CommonCommandOptions

export type LocalCommandOptions = CommonCommandOptions & {
  owner: string
  remote?: string
  path?: string
  maxDays?: string
}

/**
 * Loads `.env` from the working directory into `process.env` and returns it.
 */
export function loadEnvironment(): Environment {
  dotenv.config()
  return process.env
}

/**
 * Looks up the login of whoever runs the process. Only called when no
 * `--author` is given.
 */
export type UserLookup = () => string

/**
 * `USER`, `LOGNAME` or `USERNAME` from the environment, else the OS account.
 * Returns an empty string when the account has no passwd entry.
 */
export function currentUserName(env: Environment): string {
  const fromEnv = env.USER || env.LOGNAME || env.USERNAME
  if (fromEnv) return fromEnv
  try {
    return os.userInfo().username
  } catch (error) {
    log.debug(`Could not look up the current OS user: ${getErrorMessage(error)}`)
    return ''
  }
}

/**
 * REST base for the given GraphQL endpoint:
 * `https://api.github.com/graphql` -> `https://api.github.com`,
 * `https://ghe.example.com/api/graphql` -> `https://ghe.example.com/api/v3`.
 */
export function deriveRestUrl(graphqlUrl: string): string {
  const trimmed = graphqlUrl.replace(/\/+$/, '')
  if (trimmed.endsWith('/api/graphql')) {
    return `${trimmed.slice(0, -'/graphql'.length)}/v3`
  }
  if (trimmed.endsWith('/graphql')) {
    return trimmed.slice(0, -'/graphql'.length)
  }
  return trimmed
}

function parseCount(value: string | undefined, field: string, fallback: number): number {
  if (value === undefined || value === '') return fallback
  if (!/^\d+$/.test(value.trim())) {
    const label = field === field.toUpperCase() ? field : `--${field}`
    throw new ConfigurationError(`${label} must be a non-negative integer, got '${value}'`, field)
  }
  return parseInt(value, 10)
}

function resolveAuthor(author: string | undefined, currentUser: UserLookup): string | null {
  if (author === undefined) return currentUser() || null
  return author.trim() || null
}

/**
 * Accepts `owner/name`, or a bare `name` owned by `fallbackOwner`.
 */
export function parseRepository(value: string, fallbackOwner: string | null): RepositoryCoordinates {
  const parts = value.trim().split('/')
  if (parts.length === 2 && parts[0] && parts[1]) {
    return { owner: parts[0], name: parts[1] }
  }
  if (parts.length === 1 && parts[0] && fallbackOwner) {
    return { owner: fallbackOwner, name: parts[0] }
  }
  throw new ConfigurationError(`--repo must be 'owner/name' or a repository name, got '${value}'`, 'repo')
}

function resolveLogLevel(options: CommonCommandOptions, env: Environment): LogLevel {
  if (options.verbose) return 'debug'
  const fromEnv = env.LOG_LEVEL?.toLowerCase()
  return fromEnv && isLogLevel(fromEnv) ? fromEnv : 'info'
}

function resolveGitAdapter(env: Environment): GitAdapterType {
  const fromEnv = env.GIT_ADAPTER?.toLowerCase()
  if (!fromEnv) return 'isomorphic-git'
  if (!isGitAdapterType(fromEnv)) {
    throw new ConfigurationError(
      `GIT_ADAPTER must be 'isomorphic-git' or 'simple-git', got '${env.GIT_ADAPTER}'`,
      'GIT_ADAPTER'
    )
  }
  return fromEnv
}

function resolveBase(
  options: CommonCommandOptions,
  env: Environment,
  repo: RepositoryCoordinates,
  author: string | null
): BaseRunConfiguration {
  const githubToken = options.githubToken || env.GITHUB_TOKEN
  if (!githubToken) {
    throw new ConfigurationError('A GitHub token is required (--github-token or GITHUB_TOKEN)', 'github-token')
  }
  const githubUrl = options.githubUrl || env.GITHUB_URL || DEFAULT_GITHUB_GRAPHQL_URL

  return {
    repo,
    githubUrl,
    githubRestUrl: deriveRestUrl(githubUrl),
    githubToken,
    author,
    dryRun: options.dryRun ?? false,
    limit: parseCount(options.limit, 'limit', 0),
    requestTimeoutMs: parseCount(env.GITHUB_TIMEOUT_MS, 'GITHUB_TIMEOUT_MS', DEFAULT_REQUEST_TIMEOUT_MS),
    logLevel: resolveLogLevel(options, env)
  }
}

export function resolveGithubConfig(
  options: GithubCommandOptions,
  env: Environment,
  currentUser: UserLookup
): GithubRunConfiguration {
  const author = resolveAuthor(options.author, currentUser)
  const repo = parseRepository(options.repo, author)
  return Object.freeze({
    ...resolveBase(options, env, repo, author),
    workflow: 'github' as const
  })
}

export function resolveLocalConfig(
  options: LocalCommandOptions,
  env: Environment,
  currentUser: UserLookup,
  cwd: string
): LocalRunConfiguration {
  const author = resolveAuthor(options.author, currentUser)
  const owner = options.owner.trim()
  const name = options.repo.trim()
  if (!owner) throw new ConfigurationError('--owner must not be empty', 'owner')
  if (!name) throw new ConfigurationError('--repo must not be empty', 'repo')

  return Object.freeze({
    ...resolveBase(options, env, { owner, name }, author),
    workflow: 'local' as const,
    remote: options.remote || DEFAULT_REMOTE,
    path: path.resolve(cwd, options.path ?? '.'),
    maxDays: parseCount(options.maxDays, 'max-days', DEFAULT_MAX_DAYS),
    gitAdapter: resolveGitAdapter(env)
  })
}

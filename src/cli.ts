import { setLogLevel } from '@shared/logger'
import type { GithubRunConfiguration, LocalRunConfiguration } from '@shared/types'
import { Command } from 'commander'
import {
  currentUserName,
  type Environment,
  type GithubCommandOptions,
  type LocalCommandOptions,
  resolveGithubConfig,
  resolveLocalConfig,
  type UserLookup
} from './config'
import { GithubCleanupOperation } from './node/operations/GithubCleanupOperation'
import { LocalCleanupOperation } from './node/operations/LocalCleanupOperation'
import { DEFAULT_GITHUB_GRAPHQL_URL, DEFAULT_MAX_DAYS, DEFAULT_REMOTE } from './node/shared/constants'

export type CommandHandlers = {
  github: (config: GithubRunConfiguration) => Promise<unknown>
  local: (config: LocalRunConfiguration) => Promise<unknown>
}

export type ProgramContext = {
  env: Environment
  currentUser?: UserLookup
  cwd?: string
  handlers?: CommandHandlers
}

const defaultHandlers: CommandHandlers = {
  github: (config) => GithubCleanupOperation.create(config).run(),
  local: (config) => LocalCleanupOperation.create(config).run()
}

function addSharedOptions(command: Command): Command {
  return command
    .option('--github-url <url>', `GitHub GraphQL endpoint (env: GITHUB_URL, default: ${DEFAULT_GITHUB_GRAPHQL_URL})`)
    .option('--github-token <token>', 'GitHub token (env: GITHUB_TOKEN)')
    .option('--author <login>', 'Only consider work from this account (default: current OS user)')
    .option('--dry-run', 'Report what would be deleted without deleting anything')
    .option('--limit <count>', 'Stop after this many results, 0 for unlimited', '0')
    .option('--verbose', 'Enable debug logging')
}

/**
 * Builds the `squash-sweep` program. Environment, user and handlers are
 * injected so that configuration resolution happens exactly once, here.
 */
export function buildProgram(context: ProgramContext): Command {
  const handlers = context.handlers ?? defaultHandlers
  const currentUser = context.currentUser ?? (() => currentUserName(context.env))
  const cwd = context.cwd ?? process.cwd()

  const program = new Command('squash-sweep')
    .description('Delete branches whose pull requests were merged, including squash merges')
    .showHelpAfterError()

  addSharedOptions(
    program
      .command('github')
      .description('Delete branches on GitHub that have a merged pull request')
      .requiredOption('--repo <owner/name>', 'Repository to sweep')
  ).action(async (_options: unknown, command: Command) => {
    const config = resolveGithubConfig(command.opts<GithubCommandOptions>(), context.env, currentUser)
    setLogLevel(config.logLevel)
    await handlers.github(config)
  })

  addSharedOptions(
    program
      .command('local')
      .description('Delete local branches whose upstream was merged through a pull request')
      .requiredOption('--owner <login>', 'Owner of the GitHub repository')
      .requiredOption('--repo <name>', 'Name of the GitHub repository')
      .option('--remote <name>', 'Remote the branches must track', DEFAULT_REMOTE)
      .option('--path <dir>', 'Path of the local repository', '.')
      .option('--max-days <days>', 'Only consider pull requests closed this recently, 0 for all', String(DEFAULT_MAX_DAYS))
  ).action(async (_options: unknown, command: Command) => {
    const config = resolveLocalConfig(command.opts<LocalCommandOptions>(), context.env, currentUser, cwd)
    setLogLevel(config.logLevel)
    await handlers.local(config)
  })

  return program
}

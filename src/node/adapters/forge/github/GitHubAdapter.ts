import type { RepositoryCoordinates } from '@shared/types'
import { type Dispatcher, request } from 'undici'
import { DEFAULT_REQUEST_TIMEOUT_MS, USER_AGENT } from '../../../shared/constants'
import { DeletionError } from '../../../shared/errors'
import { githubAgent } from './GitHubGraphQLClient'

export type GitHubAdapterOptions = {
  token: string
  /** REST base, e.g. `https://api.github.com` or `https://ghe.example.com/api/v3` */
  restUrl: string
  timeoutMs?: number
}

/**
 * REST side of the GitHub forge: the operations GraphQL does not cover.
 */
export class GitHubAdapter {
  constructor(
    private readonly options: GitHubAdapterOptions,
    private readonly repo: RepositoryCoordinates,
    private readonly dispatcher: Dispatcher = githubAgent
  ) {}

  /**
   * Deletes a branch from the remote repository.
   *
   * Uses GitHub API: DELETE /repos/{owner}/{repo}/git/refs/heads/{branch}
   * Docs: https://docs.github.com/en/rest/git/refs?apiVersion=2022-11-28#delete-a-reference
   *
   * Only 204 counts as success. Anything else, including 422 for a branch
   * that is already gone, throws a DeletionError carrying the response body.
   */
  async deleteRemoteBranch(branchName: string): Promise<void> {
    const url = `${this.options.restUrl}/repos/${this.repo.owner}/${this.repo.name}/git/refs/heads/${encodeURIComponent(branchName)}`

    const { body, statusCode } = await request(url, {
      method: 'DELETE',
      dispatcher: this.dispatcher,
      signal: AbortSignal.timeout(this.options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS),
      headers: {
        Authorization: `Bearer ${this.options.token}`,
        'User-Agent': USER_AGENT,
        Accept: 'application/vnd.github+json',
        'X-GitHub-Api-Version': '2022-11-28'
      }
    })

    const text = await body.text()
    if (statusCode === 204) {
      return
    }

    throw new DeletionError(
      `GitHub API failed with status ${statusCode}: ${text}`,
      branchName,
      statusCode
    )
  }
}

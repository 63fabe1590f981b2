/**
 * Custom error classes for the sweep workflows.
 *
 * Fatal errors (configuration, remote query, decode) propagate to the CLI
 * entry point. Per-branch errors (upstream resolution, deletion) are caught
 * by the workflow, logged, and tallied.
 */

/**
 * Base error class for all application errors.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown
  ) {
    super(message)
    this.name = 'AppError'
  }
}

/**
 * Error thrown when the run cannot start: missing token, malformed option,
 * remote absent from the repository.
 */
export class ConfigurationError extends AppError {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message)
    this.name = 'ConfigurationError'
  }
}

/**
 * Error thrown when the GraphQL endpoint answers with a non-success status or
 * an `errors` list. `payload` holds the raw body or error list.
 */
export class RemoteQueryError extends AppError {
  constructor(
    message: string,
    public readonly statusCode?: number,
    public readonly payload?: unknown,
    cause?: unknown
  ) {
    super(message, cause)
    this.name = 'RemoteQueryError'
  }
}

export type DecodeIssue = {
  path: Array<string | number>
  message: string
}

/**
 * Error thrown when a response does not have the shape the query asked for.
 */
export class QueryDecodeError extends AppError {
  constructor(
    message: string,
    public readonly path: string,
    public readonly issues: DecodeIssue[]
  ) {
    super(message)
    this.name = 'QueryDecodeError'
  }
}

/**
 * Error thrown when a local branch has no usable upstream tracking reference.
 */
export class BranchResolutionError extends AppError {
  constructor(
    message: string,
    public readonly branchRef: string,
    cause?: unknown
  ) {
    super(message, cause)
    this.name = 'BranchResolutionError'
  }
}

/**
 * Error thrown when deleting a remote branch or local reference fails.
 */
export class DeletionError extends AppError {
  constructor(
    message: string,
    public readonly target: string,
    public readonly statusCode?: number,
    cause?: unknown
  ) {
    super(message, cause)
    this.name = 'DeletionError'
  }
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

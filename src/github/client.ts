import { Octokit } from '@octokit/core';
import { GraphqlResponseError } from '@octokit/graphql';
import { logger } from '../utils/logger.js';

export type FetchLike = typeof globalThis.fetch;

export interface GitHubClientOptions {
  token: string;
  apiUrl: string;
  /** Replaces the HTTP transport; tests pass an in-process fake. */
  fetch?: FetchLike;
}

export type GitHubClient = Octokit;

export type GraphqlVariables = NonNullable<Parameters<GitHubClient['graphql']>[1]>;

export class GitHubApiError extends Error {
  constructor(message: string, public readonly status?: number) {
    super(message);
    this.name = 'GitHubApiError';
  }
}

export function createGitHubClient(options: GitHubClientOptions): GitHubClient {
  return new Octokit({
    auth: options.token,
    baseUrl: options.apiUrl.replace(/\/+$/, ''),
    userAgent: 'pullcraft',
    request: options.fetch ? { fetch: options.fetch } : undefined,
  });
}

/** Convert Octokit failures into a GitHubApiError carrying GitHub's own message. */
export function toGitHubApiError(err: unknown): GitHubApiError {
  if (err instanceof GitHubApiError) return err;
  if (err instanceof GraphqlResponseError) {
    return new GitHubApiError(err.errors?.map(e => e.message).join('\n') || err.message);
  }
  if (err instanceof Error && 'status' in err && typeof err.status === 'number') {
    // RequestError from @octokit/request: an HTTP-level failure
    if (err.status === 401) {
      return new GitHubApiError(
        `${err.message}\nCheck the token in GITHUB_TOKEN or github.token in your config.`,
        err.status,
      );
    }
    return new GitHubApiError(err.message, err.status);
  }
  return new GitHubApiError(err instanceof Error ? err.message : String(err));
}

/** Run a GraphQL document, logging it at debug level. */
export async function graphql<T>(
  client: GitHubClient,
  query: string,
  variables: GraphqlVariables,
): Promise<T> {
  logger.debug(`graphql: ${query.replace(/\s+/g, ' ').trim().slice(0, 120)}`);
  try {
    return await client.graphql<T>(query, variables);
  } catch (err) {
    throw toGitHubApiError(err);
  }
}

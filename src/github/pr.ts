/**
 * Pull request creation through the GraphQL `createPullRequest` mutation.
 */

import { GitHubApiError, graphql, type GitHubClient } from './client.js';
import { logger } from '../utils/logger.js';

export interface CreatePullRequestInput {
  repositoryId: string;
  title: string;
  body: string;
  baseRefName: string;
  /** Bare branch name, or `owner:branch` when the head lives in another repository */
  headRefName: string;
  draft?: boolean;
}

export interface CreatedPullRequest {
  url: string;
  number: number;
}

const CREATE_PULL_REQUEST = `
mutation CreatePullRequest($input: CreatePullRequestInput!) {
  createPullRequest(input: $input) {
    pullRequest {
      url
      number
    }
  }
}`;

interface CreatePullRequestResponse {
  createPullRequest: {
    pullRequest: CreatedPullRequest | null;
  } | null;
}

export async function createPullRequest(
  client: GitHubClient,
  input: CreatePullRequestInput,
): Promise<CreatedPullRequest> {
  const response = await graphql<CreatePullRequestResponse>(client, CREATE_PULL_REQUEST, {
    input: { ...input, draft: input.draft ?? false },
  });

  const pullRequest = response.createPullRequest?.pullRequest;
  if (!pullRequest) {
    throw new GitHubApiError('GitHub did not return the created pull request');
  }

  logger.info(`Created PR: ${pullRequest.url}`);
  return pullRequest;
}

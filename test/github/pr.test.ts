import { describe, it, expect, beforeEach } from 'vitest';
import { createGitHubClient, GitHubApiError } from '../../src/github/client.js';
import { createPullRequest, type CreatePullRequestInput } from '../../src/github/pr.js';
import { createFakeGitHub, type FakeGitHub } from '../helpers/fake-github.js';

describe('createPullRequest', () => {
  let fake: FakeGitHub;

  const input: CreatePullRequestInput = {
    repositoryId: 'REPOID',
    title: 'my title',
    body: 'my body',
    baseRefName: 'master',
    headRefName: 'MYSELF:feature',
  };

  function client() {
    return createGitHubClient({ token: 'test-token', apiUrl: 'https://api.github.com', fetch: fake.fetch });
  }

  beforeEach(() => {
    fake = createFakeGitHub();
  });

  it('sends the mutation and returns the new pull request', async () => {
    fake.stubCreatedPullRequest('https://github.com/OWNER/REPO/pull/12', 12);

    const pr = await createPullRequest(client(), input);

    expect(pr).toEqual({ url: 'https://github.com/OWNER/REPO/pull/12', number: 12 });
    expect(fake.requests[0].method).toBe('POST');
    expect(fake.requests[0].query).toContain('createPullRequest(input: $input)');
    expect(fake.mutationInput(0)).toEqual({ ...input, draft: false });
  });

  it('passes validation errors through unchanged', async () => {
    fake.stubResponse(200, {
      data: { createPullRequest: null },
      errors: [{ type: 'UNPROCESSABLE', message: 'No commits between master and feature' }],
    });

    await expect(createPullRequest(client(), input))
      .rejects.toThrow(new GitHubApiError('No commits between master and feature'));
  });

  it('fails when GitHub returns no pull request', async () => {
    fake.stubResponse(200, { data: { createPullRequest: { pullRequest: null } } });

    await expect(createPullRequest(client(), { ...input, draft: true }))
      .rejects.toThrow('GitHub did not return the created pull request');
    expect(fake.mutationInput(0).draft).toBe(true);
  });
});

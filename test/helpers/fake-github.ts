import type { FetchLike } from '../../src/github/client.js';

export interface RecordedRequest {
  url: string;
  method: string;
  query: string;
  variables: Record<string, unknown>;
}

interface StubbedResponse {
  status: number;
  body: unknown;
}

export interface RepoPayloadOptions {
  id?: string;
  defaultBranch?: string;
  viewerPermission?: string;
  parent?: Record<string, unknown>;
}

/** Repository JSON the way GitHub's GraphQL API returns it. */
export function repoPayload(owner: string, name: string, options: RepoPayloadOptions = {}): Record<string, unknown> {
  const payload: Record<string, unknown> = {
    id: options.id ?? 'REPOID',
    name,
    owner: { login: owner },
    isPrivate: false,
    viewerPermission: options.viewerPermission ?? 'WRITE',
    defaultBranchRef: {
      name: options.defaultBranch ?? 'master',
      target: { oid: 'deadbeef' },
    },
  };
  if (options.parent) payload.parent = options.parent;
  return payload;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * In-process stand-in for the GitHub API: serves queued JSON responses in
 * order and records every request body it receives.
 */
export function createFakeGitHub() {
  const responses: StubbedResponse[] = [];
  const requests: RecordedRequest[] = [];

  const fetch: FetchLike = async (input, init) => {
    const url = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;
    const parsed: unknown = typeof init?.body === 'string' ? JSON.parse(init.body) : {};
    const body = isRecord(parsed) ? parsed : {};
    requests.push({
      url,
      method: init?.method ?? 'GET',
      query: typeof body.query === 'string' ? body.query : '',
      variables: isRecord(body.variables) ? body.variables : {},
    });

    const next = responses.shift();
    if (!next) {
      throw new Error(`No stubbed response left for ${url}`);
    }
    return new Response(JSON.stringify(next.body), {
      status: next.status,
      headers: { 'content-type': 'application/json; charset=utf-8' },
    });
  };

  return {
    fetch,
    requests,
    stubResponse(status: number, body: unknown): void {
      responses.push({ status, body });
    },
    /** A single-remote network lookup answered with OWNER/REPO style data. */
    stubRepoResponse(owner: string, name: string, options: RepoPayloadOptions = {}): void {
      responses.push({ status: 200, body: { data: { repo_000: repoPayload(owner, name, options) } } });
    },
    stubCreatedPullRequest(url: string, number: number): void {
      responses.push({
        status: 200,
        body: { data: { createPullRequest: { pullRequest: { url, number } } } },
      });
    },
    /** Input object sent with the createPullRequest mutation at `index`. */
    mutationInput(index: number): Record<string, unknown> {
      const input = requests[index]?.variables.input;
      if (!isRecord(input)) {
        throw new Error(`Request ${index} carried no mutation input`);
      }
      return input;
    },
  };
}

export type FakeGitHub = ReturnType<typeof createFakeGitHub>;

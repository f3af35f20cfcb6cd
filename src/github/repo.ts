import { GraphqlResponseError } from '@octokit/graphql';
import type { RepoRef } from './ghrepo.js';
import { GitHubApiError, toGitHubApiError, type GitHubClient, type GraphqlVariables } from './client.js';
import { logger } from '../utils/logger.js';

export type ViewerPermission = 'ADMIN' | 'MAINTAIN' | 'WRITE' | 'TRIAGE' | 'READ';

const VIEWER_PERMISSIONS: readonly ViewerPermission[] = ['ADMIN', 'MAINTAIN', 'WRITE', 'TRIAGE', 'READ'];
const PUSH_PERMISSIONS: readonly ViewerPermission[] = ['ADMIN', 'MAINTAIN', 'WRITE'];

export interface BranchRef {
  name: string;
  target: { oid: string };
}

export interface RepositoryInfo {
  id: string;
  name: string;
  owner: { login: string };
  isPrivate: boolean;
  viewerPermission: ViewerPermission | null;
  /** null for an empty repository with no commits yet */
  defaultBranchRef: BranchRef | null;
  /** Present iff the repository is a fork. */
  parent: RepositoryInfo | null;
}

/** Cap on remotes resolved in one run; the query grows with each. */
export const MAX_REMOTES_FOR_LOOKUP = 5;

export function isFork(repo: RepositoryInfo): boolean {
  return repo.parent !== null;
}

export function viewerCanPush(repo: RepositoryInfo): boolean {
  return repo.viewerPermission !== null && PUSH_PERMISSIONS.includes(repo.viewerPermission);
}

export function repoRef(repo: RepositoryInfo): RepoRef {
  return { owner: repo.owner.login, name: repo.name };
}

const REPOSITORY_FRAGMENT = `
fragment repo on Repository {
  id
  name
  owner { login }
  isPrivate
  viewerPermission
  defaultBranchRef {
    name
    target { oid }
  }
}`;

export interface RepoNetworkRequest {
  query: string;
  variables: Record<string, string>;
  /** GraphQL alias → caller's key */
  aliases: Map<string, string>;
}

/**
 * Build one query that looks up every repository in `lookups`. Keys are
 * arbitrary (remote names in practice) and may not be valid GraphQL
 * identifiers, so each gets a positional alias that maps back to it.
 */
export function buildRepoNetworkQuery(lookups: ReadonlyMap<string, RepoRef>): RepoNetworkRequest {
  const definitions: string[] = [];
  const selections: string[] = [];
  const variables: Record<string, string> = {};
  const aliases = new Map<string, string>();

  let index = 0;
  for (const [key, ref] of lookups) {
    const suffix = String(index).padStart(3, '0');
    const alias = `repo_${suffix}`;
    definitions.push(`$owner_${suffix}: String!`, `$name_${suffix}: String!`);
    selections.push(
      `  ${alias}: repository(owner: $owner_${suffix}, name: $name_${suffix}) {\n` +
      '    ...repo\n' +
      '    parent { ...repo }\n' +
      '  }',
    );
    variables[`owner_${suffix}`] = ref.owner;
    variables[`name_${suffix}`] = ref.name;
    aliases.set(alias, key);
    index++;
  }

  const query = `${REPOSITORY_FRAGMENT}\n\nquery RepositoryNetwork(${definitions.join(', ')}) {\n${selections.join('\n')}\n}`;
  return { query, variables, aliases };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isViewerPermission(value: unknown): value is ViewerPermission {
  return typeof value === 'string' && VIEWER_PERMISSIONS.some(p => p === value);
}

function decodeBranchRef(value: unknown): BranchRef | null {
  if (!isRecord(value)) return null;
  const target = value.target;
  if (typeof value.name !== 'string' || !isRecord(target) || typeof target.oid !== 'string') {
    return null;
  }
  return { name: value.name, target: { oid: target.oid } };
}

/** Decode one `repository` selection; null when GitHub returned none. */
export function decodeRepository(value: unknown): RepositoryInfo | null {
  if (value === null || value === undefined) return null;
  if (!isRecord(value)) {
    throw new GitHubApiError('Unexpected repository payload from GitHub');
  }

  const { id, name, owner, isPrivate, viewerPermission } = value;
  if (typeof id !== 'string' || typeof name !== 'string' || !isRecord(owner) || typeof owner.login !== 'string') {
    throw new GitHubApiError('Unexpected repository payload from GitHub: missing id, name or owner');
  }

  return {
    id,
    name,
    owner: { login: owner.login },
    isPrivate: isPrivate === true,
    viewerPermission: isViewerPermission(viewerPermission) ? viewerPermission : null,
    defaultBranchRef: decodeBranchRef(value.defaultBranchRef),
    parent: decodeRepository(value.parent),
  };
}

/**
 * Fetch repository metadata for every entry of `lookups` in a single round
 * trip. Repositories GitHub reports as NOT_FOUND come back as null; any other
 * failure throws.
 */
export async function fetchRepoNetwork(
  client: GitHubClient,
  lookups: ReadonlyMap<string, RepoRef>,
): Promise<Map<string, RepositoryInfo | null>> {
  const network = new Map<string, RepositoryInfo | null>();
  if (lookups.size === 0) return network;

  const request = buildRepoNetworkQuery(lookups);
  logger.debug(`Looking up ${lookups.size} repositories`);

  let data: unknown;
  try {
    const variables: GraphqlVariables = request.variables;
    data = await client.graphql<Record<string, unknown>>(request.query, variables);
  } catch (err) {
    if (err instanceof GraphqlResponseError && err.errors?.every(e => e.type === 'NOT_FOUND')) {
      data = err.data;
      logger.debug(`Some repositories were not found: ${err.errors.map(e => e.message).join('; ')}`);
    } else {
      throw toGitHubApiError(err);
    }
  }

  const payload = isRecord(data) ? data : {};
  for (const [alias, key] of request.aliases) {
    network.set(key, decodeRepository(payload[alias]));
  }
  return network;
}

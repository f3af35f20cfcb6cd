import type { Remote } from '../git/remotes.js';
import { fullName, isSameRepo, type RepoRef } from '../github/ghrepo.js';
import {
  MAX_REMOTES_FOR_LOOKUP,
  repoRef,
  viewerCanPush,
  type RepositoryInfo,
} from '../github/repo.js';
import { logger } from '../utils/logger.js';
import { errorMessage } from '../utils/text.js';

export class RepositoryResolutionError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'RepositoryResolutionError';
  }
}

export class AmbiguousRemoteError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AmbiguousRemoteError';
  }
}

export const DEFAULT_REMOTE_PRIORITY: readonly string[] = ['upstream', 'github', 'origin'];

export interface RemoteOrderOptions {
  /** Remote to rank ahead of everything else; it must exist */
  defaultRemote?: string;
  /** Remote the current branch tracks; ranked after the priority list */
  trackingRemote?: string | null;
  priority?: readonly string[];
}

/**
 * Order remotes for base selection: the configured default first, then the
 * priority list, then the branch's tracking remote, then everything else by
 * name. With several remotes and none of them ranked there is no principled
 * pick, so that is an error.
 */
export function orderRemotes(remotes: readonly Remote[], options: RemoteOrderOptions = {}): Remote[] {
  if (remotes.length === 0) {
    throw new AmbiguousRemoteError('No git remotes point at GitHub');
  }

  const { defaultRemote, trackingRemote } = options;
  if (defaultRemote && !remotes.some(r => r.name === defaultRemote)) {
    const names = remotes.map(r => r.name).join(', ');
    throw new AmbiguousRemoteError(`Unknown remote "${defaultRemote}"; GitHub remotes are: ${names}`);
  }

  const priority = options.priority ?? DEFAULT_REMOTE_PRIORITY;
  const tracked = priority.length;
  const unranked = tracked + 1;
  const rank = (remote: Remote): number => {
    if (defaultRemote && remote.name === defaultRemote) return -1;
    const index = priority.indexOf(remote.name);
    if (index !== -1) return index;
    return trackingRemote && remote.name === trackingRemote ? tracked : unranked;
  };

  const ordered = [...remotes].sort((a, b) => {
    const diff = rank(a) - rank(b);
    if (diff !== 0) return diff;
    return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
  });

  if (ordered.length > 1 && rank(ordered[0]) === unranked) {
    const names = ordered.map(r => r.name).join(', ');
    throw new AmbiguousRemoteError(
      `Cannot tell which remote to use among ${names}; set remotes.default in the config or pass --remote`,
    );
  }

  return ordered;
}

export interface NetworkEntry {
  readonly remote: Remote;
  readonly repo: RepositoryInfo | null;
}

/** What the repository decision looks at, in remote order. */
export interface NetworkSnapshot {
  readonly entries: readonly NetworkEntry[];
  readonly trackingRemote: string | null;
}

export interface RepositoryChoice {
  base: RepositoryInfo;
  head: RepositoryInfo;
  headRemote: Remote;
}

interface ResolvedEntry {
  remote: Remote;
  repo: RepositoryInfo;
}

/**
 * Pick base and head repositories.
 *
 * The base is the first remote's repository, or its parent when that
 * repository is a fork, so contributions go upstream. The head is where the
 * branch can be pushed: the tracking remote when the viewer may push there,
 * otherwise the first pushable remote. When the viewer can push to the base
 * itself, head and base coincide and the pull request stays in one repository.
 */
export function chooseRepositories(snapshot: NetworkSnapshot): RepositoryChoice {
  const resolved: ResolvedEntry[] = [];
  for (const entry of snapshot.entries) {
    if (entry.repo) resolved.push({ remote: entry.remote, repo: entry.repo });
  }

  if (resolved.length === 0) {
    const described = snapshot.entries.map(e => `${e.remote.name} (${fullName(e.remote.repo)})`).join(', ');
    throw new RepositoryResolutionError(`Could not find any repository for remotes: ${described}`);
  }

  const first = resolved[0].repo;
  const base = first.parent ?? first;

  const tracked = resolved.find(e => e.remote.name === snapshot.trackingRemote && viewerCanPush(e.repo));
  const head = tracked ?? resolved.find(e => viewerCanPush(e.repo));
  if (!head) {
    const names = resolved.map(e => fullName(repoRef(e.repo))).join(', ');
    throw new RepositoryResolutionError(`None of the repositories have push access: ${names}`);
  }

  return { base, head: head.repo, headRemote: head.remote };
}

/** Base reference and (possibly owner-qualified) head reference for a choice. */
export function refNames(
  choice: RepositoryChoice,
  branch: string,
  baseBranch?: string,
): { baseRefName: string; headRefName: string } {
  const baseRefName = baseBranch ?? choice.base.defaultBranchRef?.name;
  if (!baseRefName) {
    throw new RepositoryResolutionError(
      `${fullName(repoRef(choice.base))} has no default branch; pass --base`,
    );
  }
  const headRefName = isSameRepo(repoRef(choice.base), repoRef(choice.head))
    ? branch
    : `${choice.head.owner.login}:${branch}`;
  return { baseRefName, headRefName };
}

export interface PRTarget {
  baseRepositoryID: string;
  baseRepo: RepositoryInfo;
  headRepo: RepositoryInfo;
  headRemote: Remote;
  baseRefName: string;
  headRefName: string;
  /** Local branch name, unqualified */
  headBranch: string;
  isCrossRepository: boolean;
}

export type NetworkFetcher = (
  lookups: ReadonlyMap<string, RepoRef>,
) => Promise<Map<string, RepositoryInfo | null>>;

export interface ResolveTargetOptions extends RemoteOrderOptions {
  branch: string;
  remotes: readonly Remote[];
  /** Explicit base branch; otherwise the base repository's default branch */
  baseBranch?: string;
}

export async function resolvePrTarget(
  options: ResolveTargetOptions,
  fetchNetwork: NetworkFetcher,
): Promise<PRTarget> {
  const ordered = orderRemotes(options.remotes, options);
  if (ordered.length > MAX_REMOTES_FOR_LOOKUP) {
    logger.debug(`Only looking up the first ${MAX_REMOTES_FOR_LOOKUP} of ${ordered.length} remotes`);
  }
  const candidates = ordered.slice(0, MAX_REMOTES_FOR_LOOKUP);

  const lookups = new Map<string, RepoRef>(candidates.map(r => [r.name, r.repo]));
  let network: Map<string, RepositoryInfo | null>;
  try {
    network = await fetchNetwork(lookups);
  } catch (err) {
    throw new RepositoryResolutionError(`Could not fetch repository metadata: ${errorMessage(err)}`, { cause: err });
  }

  const choice = chooseRepositories({
    entries: candidates.map(remote => ({ remote, repo: network.get(remote.name) ?? null })),
    trackingRemote: options.trackingRemote ?? null,
  });
  const { baseRefName, headRefName } = refNames(choice, options.branch, options.baseBranch);
  const isCrossRepository = !isSameRepo(repoRef(choice.base), repoRef(choice.head));

  if (!isCrossRepository && options.branch === baseRefName) {
    throw new RepositoryResolutionError(`Must be on a branch named differently than "${baseRefName}"`);
  }

  logger.debug(
    `Resolved ${headRefName} -> ${fullName(repoRef(choice.base))}:${baseRefName} via remote ${choice.headRemote.name}`,
  );

  return {
    baseRepositoryID: choice.base.id,
    baseRepo: choice.base,
    headRepo: choice.head,
    headRemote: choice.headRemote,
    baseRefName,
    headRefName,
    headBranch: options.branch,
    isCrossRepository,
  };
}

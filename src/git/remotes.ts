import { exec } from '../utils/process.js';
import type { RepoRef } from '../github/ghrepo.js';
import { GitError } from './errors.js';

export interface Remote {
  name: string;
  repo: RepoRef;
  fetchUrl: string;
}

function stripGitSuffix(path: string): string {
  return path.replace(/\/+$/, '').replace(/\.git$/, '');
}

function refFromPath(path: string): RepoRef | null {
  const parts = stripGitSuffix(path.replace(/^\/+/, '')).split('/');
  if (parts.length !== 2 || !parts[0] || !parts[1]) return null;
  return { owner: parts[0], name: parts[1] };
}

/**
 * Extract OWNER/REPO from a remote URL pointing at `host`. Handles
 * https, ssh:// and git:// URLs as well as the scp-like `git@host:owner/repo`.
 */
export function parseRemoteUrl(url: string, host: string): RepoRef | null {
  const wanted = host.toLowerCase();

  const scpLike = /^(?:[^@/]+@)?([^:/]+):(?!\/)(.+)$/.exec(url);
  if (scpLike && !/^[a-z][a-z0-9+.-]*:\/\//i.test(url)) {
    if (scpLike[1].toLowerCase() !== wanted) return null;
    return refFromPath(scpLike[2]);
  }

  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return null;
  }
  if (!['https:', 'http:', 'ssh:', 'git:', 'git+ssh:'].includes(parsed.protocol)) return null;
  // www.github.com is an alias the web UI hands out
  const hostname = parsed.hostname.toLowerCase().replace(/^www\./, '');
  if (hostname !== wanted) return null;
  return refFromPath(parsed.pathname);
}

/** Parse `git remote -v` output, keeping fetch URLs on `host`. */
export function parseRemotes(output: string, host: string): Remote[] {
  const remotes: Remote[] = [];
  const seen = new Set<string>();

  for (const line of output.split('\n')) {
    const match = /^(\S+)\s+(\S+)\s+\((fetch|push)\)$/.exec(line.trim());
    if (!match || match[3] !== 'fetch') continue;

    const [, name, url] = match;
    if (seen.has(name)) continue;
    const repo = parseRemoteUrl(url, host);
    if (!repo) continue;

    seen.add(name);
    remotes.push({ name, repo, fetchUrl: url });
  }

  return remotes;
}

export async function listRemotes(host: string, cwd?: string): Promise<Remote[]> {
  const result = await exec('git', ['remote', '-v'], { cwd });
  if (result.exitCode !== 0) {
    throw new GitError(`Failed to list git remotes: ${result.stderr.trim()}`, result.stderr);
  }
  return parseRemotes(result.stdout, host);
}

/** The remote `branch` is configured to track, if any. */
export async function trackingRemote(branch: string, cwd?: string): Promise<string | null> {
  const result = await exec('git', ['config', '--get', `branch.${branch}.remote`], { cwd });
  if (result.exitCode !== 0) return null;
  const name = result.stdout.trim();
  return name || null;
}

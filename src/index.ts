// Types
export type { RepoRef } from './github/ghrepo.js';
export type { Remote } from './git/remotes.js';
export type { RepositoryInfo, ViewerPermission, BranchRef, RepoNetworkRequest } from './github/repo.js';
export type { CreatePullRequestInput, CreatedPullRequest } from './github/pr.js';
export type {
  PRTarget,
  NetworkSnapshot,
  NetworkEntry,
  RepositoryChoice,
  NetworkFetcher,
  ResolveTargetOptions,
} from './resolve/target.js';
export type { PullcraftConfig, PullcraftConfigFile } from './config/schema.js';
export type { GitHubClient, GitHubClientOptions } from './github/client.js';

// Errors
export { GitError } from './git/errors.js';
export { GitHubApiError } from './github/client.js';
export { RepositoryResolutionError, AmbiguousRemoteError } from './resolve/target.js';
export { BrowserError } from './browser/open.js';
export { ConfigurationError } from './config/config.js';

// Resolution
export { resolvePrTarget, chooseRepositories, orderRemotes, refNames, DEFAULT_REMOTE_PRIORITY } from './resolve/target.js';

// GitHub
export { createGitHubClient } from './github/client.js';
export { fetchRepoNetwork, buildRepoNetworkQuery, isFork, viewerCanPush, MAX_REMOTES_FOR_LOOKUP } from './github/repo.js';
export { createPullRequest } from './github/pr.js';
export { fullName, isSameRepo, parseFullName } from './github/ghrepo.js';

// Git
export { currentBranch, pushBranch, lastCommitMessage } from './git/branch.js';
export { listRemotes, parseRemotes, parseRemoteUrl, trackingRemote } from './git/remotes.js';
export { uncommittedChangeCount } from './git/status.js';

// Browser
export { compareUrl, displayUrl, openInBrowser } from './browser/open.js';

// Config
export { loadConfig, resetConfigCache, getGlobalConfigDir, validateConfigFile } from './config/config.js';
export { DEFAULT_CONFIG } from './config/defaults.js';

// CLI
export { run, createProgram } from './cli/program.js';
export { createPr } from './cli/commands/pr.js';
export { logger, setLogLevel, setLogSink } from './utils/logger.js';

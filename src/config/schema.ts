import type { LogLevel } from '../utils/logger.js';

export interface GitHubConfig {
  /** Web host, used to recognise remotes and build compare URLs */
  host: string;
  /** REST/GraphQL API root */
  apiUrl: string;
  /** Overridden by GITHUB_TOKEN or GH_TOKEN */
  token?: string;
}

export interface RemotesConfig {
  /** Remote ranked first when choosing the base repository */
  default?: string;
  /** Remote names in preference order; unlisted remotes rank last */
  priority: string[];
}

export interface PullcraftConfig {
  github: GitHubConfig;
  remotes: RemotesConfig;
  /** Command used to open URLs; falls back to $BROWSER, then the platform opener */
  browser?: string;
  logLevel: LogLevel;
}

/** Shape of a config file on disk: every field optional. */
export interface PullcraftConfigFile {
  github?: Partial<GitHubConfig>;
  remotes?: Partial<RemotesConfig>;
  browser?: string;
  logLevel?: LogLevel;
}

import type { PullcraftConfig } from '../config/schema.js';
import { loadConfig, ConfigurationError } from '../config/config.js';
import { createGitHubClient, type GitHubClient } from '../github/client.js';
import { exec } from '../utils/process.js';
import { setLogLevel } from '../utils/logger.js';

export interface AppContext {
  config: PullcraftConfig;
  /** Working directory git commands run in */
  cwd: string;
  /** API client; throws ConfigurationError when no token is configured */
  github(): GitHubClient;
}

async function findRepoRoot(cwd: string): Promise<string | undefined> {
  const result = await exec('git', ['rev-parse', '--show-toplevel'], { cwd });
  return result.exitCode === 0 ? result.stdout.trim() : undefined;
}

let cachedContext: AppContext | null = null;
let verbose = false;

/** --verbose: debug logging regardless of the configured level */
export function setVerbose(enabled: boolean): void {
  verbose = enabled;
}

export async function getContext(): Promise<AppContext> {
  if (cachedContext) return cachedContext;

  const cwd = process.cwd();
  const config = await loadConfig({ repoRoot: await findRepoRoot(cwd) });
  setLogLevel(verbose ? 'debug' : config.logLevel);

  let client: GitHubClient | null = null;
  cachedContext = {
    config,
    cwd,
    github() {
      if (client) return client;
      const { token, apiUrl } = config.github;
      if (!token) {
        throw new ConfigurationError(
          'No GitHub token found. Set GITHUB_TOKEN or github.token in ~/.pullcraft/config.json',
        );
      }
      client = createGitHubClient({ token, apiUrl });
      return client;
    },
  };
  return cachedContext;
}

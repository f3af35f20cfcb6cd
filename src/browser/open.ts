import { exec } from '../utils/process.js';
import type { RepoRef } from '../github/ghrepo.js';

export class BrowserError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BrowserError';
  }
}

export function compareUrl(host: string, base: RepoRef, baseRefName: string, headRefName: string): string {
  return `https://${host}/${base.owner}/${base.name}/compare/${baseRefName}...${headRefName}?expand=1`;
}

/** URL as shown to the user: no scheme, no query string. */
export function displayUrl(url: string): string {
  return url.replace(/^[a-z][a-z0-9+.-]*:\/\//i, '').replace(/[?#].*$/, '');
}

/** Command and arguments that open `url`, with the URL always last. */
export function browserCommand(
  url: string,
  browser?: string,
  platform: NodeJS.Platform = process.platform,
): { command: string; args: string[] } {
  if (browser) {
    const [command, ...args] = browser.trim().split(/\s+/);
    return { command, args: [...args, url] };
  }
  switch (platform) {
    case 'darwin':
      return { command: 'open', args: [url] };
    case 'win32':
      return { command: 'cmd', args: ['/c', 'start', '', url] };
    default:
      return { command: 'xdg-open', args: [url] };
  }
}

export async function openInBrowser(url: string, browser?: string): Promise<void> {
  const { command, args } = browserCommand(url, browser || process.env.BROWSER);
  const result = await exec(command, args);
  if (result.exitCode !== 0) {
    throw new BrowserError(`Failed to open ${url} with ${command}: ${result.stderr.trim()}`);
  }
}

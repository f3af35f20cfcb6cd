import { exec } from '../utils/process.js';
import { logger } from '../utils/logger.js';
import { GitError } from './errors.js';

export interface CommitMessage {
  subject: string;
  body: string;
}

export async function currentBranch(cwd?: string): Promise<string> {
  const result = await exec('git', ['symbolic-ref', '--quiet', '--short', 'HEAD'], { cwd });
  const branch = result.stdout.trim();
  if (result.exitCode !== 0 || !branch) {
    throw new GitError('Could not determine the current branch (detached HEAD?)', result.stderr);
  }
  return branch;
}

/**
 * Publish HEAD as `branch` on `remote` and record it as the upstream.
 */
export async function pushBranch(remote: string, branch: string, cwd?: string): Promise<void> {
  const result = await exec('git', ['push', '--set-upstream', remote, `HEAD:${branch}`], { cwd });
  if (result.exitCode !== 0) {
    throw new GitError(`Failed to push ${branch} to ${remote}: ${result.stderr.trim()}`, result.stderr);
  }
  logger.debug(`Pushed HEAD to ${remote}/${branch}`);
}

export async function lastCommitMessage(cwd?: string): Promise<CommitMessage> {
  const result = await exec('git', ['log', '-1', '--format=%s%n%n%b'], { cwd });
  if (result.exitCode !== 0) {
    throw new GitError(`Failed to read the last commit: ${result.stderr.trim()}`, result.stderr);
  }
  const [subject, ...rest] = result.stdout.split('\n');
  return { subject: subject.trim(), body: rest.join('\n').trim() };
}

import { exec } from '../utils/process.js';
import { GitError } from './errors.js';

/** Count of entries `git status --porcelain` reports: staged, unstaged and untracked. */
export async function uncommittedChangeCount(cwd?: string): Promise<number> {
  const result = await exec('git', ['status', '--porcelain'], { cwd });
  if (result.exitCode !== 0) {
    throw new GitError(`Failed to read git status: ${result.stderr.trim()}`, result.stderr);
  }
  return result.stdout.split('\n').filter(line => line.trim() !== '').length;
}

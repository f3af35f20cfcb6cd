import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { logger } from './logger.js';

const execFileAsync = promisify(execFile);

export interface ExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface ExecOptions {
  cwd?: string;
  timeout?: number;
  env?: Record<string, string>;
}

interface ExecFailure {
  stdout?: string;
  stderr?: string;
  code?: number | string;
  message?: string;
}

function isExecFailure(err: unknown): err is ExecFailure {
  return typeof err === 'object' && err !== null;
}

/**
 * Run a command to completion. A non-zero exit is reported through
 * `exitCode` rather than thrown; callers decide what a failure means.
 */
export async function exec(command: string, args: string[], options?: ExecOptions): Promise<ExecResult> {
  logger.debug(`exec: ${command} ${args.join(' ')}`);
  try {
    const result = await execFileAsync(command, args, {
      cwd: options?.cwd,
      timeout: options?.timeout,
      env: options?.env ? { ...process.env, ...options.env } : undefined,
      maxBuffer: 10 * 1024 * 1024,
    });
    return { stdout: result.stdout, stderr: result.stderr, exitCode: 0 };
  } catch (err: unknown) {
    if (!isExecFailure(err)) {
      return { stdout: '', stderr: String(err), exitCode: 1 };
    }
    // Spawn failures (ENOENT and friends) carry a string code and no output
    const spawnFailed = typeof err.code === 'string';
    return {
      stdout: err.stdout ?? '',
      stderr: err.stderr || (spawnFailed ? err.message ?? '' : ''),
      exitCode: typeof err.code === 'number' ? err.code : 1,
    };
  }
}

/**
 * Source control queries
 *
 * Two things are asked of git: which files under DistFiles are not
 * tracked, and which branch the build runs on (for the report header).
 */

import { execFileSync } from 'node:child_process';
import { GitCommandError, GitNotAvailableError } from '../diagnostics/errors.js';

/**
 * Runs git with the given arguments in a directory and returns stdout
 */
export type GitRunner = (args: string[], cwd: string) => string;

/**
 * Execute a git command and return stdout
 * @throws GitCommandError if the command fails
 * @throws GitNotAvailableError if git is not installed
 */
export const execGit: GitRunner = (args, cwd) => {
  const command = `git ${args.join(' ')}`;
  try {
    return execFileSync('git', args, {
      cwd,
      encoding: 'utf-8',
      stdio: ['ignore', 'pipe', 'pipe'],
    });
  } catch (error: unknown) {
    // Check if git is not found
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new GitNotAvailableError();
    }

    let stderr: string | undefined;
    let status: number | undefined;
    if (typeof error === 'object' && error !== null) {
      if ('stderr' in error) {
        const raw = error.stderr;
        stderr = typeof raw === 'string' ? raw : Buffer.isBuffer(raw) ? raw.toString('utf-8') : undefined;
      }
      if ('status' in error && typeof error.status === 'number') {
        status = error.status;
      }
    }
    throw new GitCommandError(command, stderr, status);
  }
};

/**
 * Outcome of the untracked-files query
 */
export type UntrackedQuery =
  | { ok: true; files: string[] }
  | { ok: false; reason: string };

/**
 * List files under a directory that git does not track (ignored files excluded)
 *
 * Paths come back relative to `dir`, with backslash separators to match
 * the configured patterns. Failures are returned, not thrown.
 */
export function listUntrackedFiles(dir: string, run: GitRunner = execGit): UntrackedQuery {
  try {
    const output = run(['ls-files', '--other', '--exclude-standard'], dir);
    const files = output
      .split(/\r?\n/)
      .filter((line) => line.length > 0)
      .map((line) => line.replace(/\//g, '\\'));
    return { ok: true, files };
  } catch (err) {
    return { ok: false, reason: err instanceof Error ? err.message : String(err) };
  }
}

/**
 * Get the current branch name
 *
 * @returns Branch name, or undefined on detached HEAD or error
 */
export function getCurrentBranch(repoPath: string, run: GitRunner = execGit): string | undefined {
  try {
    const branch = run(['rev-parse', '--abbrev-ref', 'HEAD'], repoPath).trim();
    return branch && branch !== 'HEAD' ? branch : undefined;
  } catch {
    return undefined;
  }
}

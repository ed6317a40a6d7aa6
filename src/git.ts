import { execFileSync } from 'node:child_process';
import type { ExecSyncError } from '@/types';
import { GIT_LOG_PRETTY_FORMAT, GIT_MAX_BUFFER } from '@/utils/constants';
import { normalizeRemoteUrl } from '@/utils/string';
import { endGroup, info, startGroup } from '@actions/core';
import which from 'which';

/**
 * Type guard for errors thrown by `execFileSync` after the child process exited unsuccessfully.
 */
function isExecSyncError(error: unknown): error is ExecSyncError {
  return error instanceof Error && 'status' in error && 'stderr' in error;
}

/**
 * Runs git with the given arguments and returns its standard output.
 *
 * @param {string[]} args - Arguments passed to git.
 * @param {string} cwd - Directory of the repository.
 * @returns {string} The captured standard output.
 * @throws {Error} If git is not found in PATH or exits with a non-zero status.
 */
function runGit(args: string[], cwd: string): string {
  const command = `git ${args.join(' ')}`;

  try {
    const gitPath = which.sync('git');

    return execFileSync(gitPath, args, {
      cwd,
      encoding: 'utf8',
      maxBuffer: GIT_MAX_BUFFER,
      stdio: ['ignore', 'pipe', 'pipe'], // stdin, stdout, stderr
    });
  } catch (error) {
    let errorMessage: string;
    if (isExecSyncError(error)) {
      errorMessage = `Failed to run "${command}": ${String(error.stderr).trim() || error.message.trim()} (status: ${error.status})`;
    } else if (error instanceof Error) {
      errorMessage = `Failed to run "${command}": ${error.message.trim()}`;
    } else {
      errorMessage = String(error).trim();
    }

    throw new Error(errorMessage, { cause: error });
  }
}

/**
 * Reads the commit history of the repository, one line per commit, newest first.
 *
 * Each line has the form `<YYYY-MM-DD> <(refs) ><subject>`, produced by the
 * `--pretty="%cs %d %s"` format.
 *
 * @param {string} cwd - Directory of the repository.
 * @returns {string} The raw log output.
 * @throws {Error} If git is missing or the log cannot be read.
 */
export function getGitLog(cwd: string): string {
  console.time('Elapsed time reading git log');
  startGroup('Reading git log');

  try {
    const output = runGit(['log', `--pretty=${GIT_LOG_PRETTY_FORMAT}`], cwd);
    const lineCount = output.split('\n').filter((line) => line.trim() !== '').length;
    info(`Read ${lineCount} commit${lineCount !== 1 ? 's' : ''}.`);

    return output;
  } finally {
    console.timeEnd('Elapsed time reading git log');
    endGroup();
  }
}

/**
 * Resolves the browsable base URL of a git remote, used to build comparison and release links.
 *
 * @param {string} remoteName - Name of the remote (e.g. `origin`).
 * @param {string} cwd - Directory of the repository.
 * @returns {string} The normalized remote URL without `.git` suffix or trailing whitespace.
 * @throws {Error} If git is missing or the remote does not exist.
 */
export function getRemoteUrl(remoteName: string, cwd: string): string {
  startGroup(`Resolving URL of remote "${remoteName}"`);

  try {
    const remoteUrl = normalizeRemoteUrl(runGit(['remote', 'get-url', remoteName], cwd));
    info(`Remote URL: ${remoteUrl}`);

    return remoteUrl;
  } finally {
    endGroup();
  }
}

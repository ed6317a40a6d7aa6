import { execFileSync } from 'node:child_process';
import { getGitLog, getRemoteUrl } from '@/git';
import { endGroup, info, startGroup } from '@actions/core';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import which from 'which';

vi.mock('node:child_process', async () => {
  const actual = await vi.importActual('node:child_process');
  return {
    ...actual,
    execFileSync: vi.fn(),
  };
});

vi.mock('which', () => ({
  default: {
    sync: vi.fn(),
  },
}));

/**
 * Creates an error shaped like the one execFileSync throws for a non-zero exit status.
 */
function createExecError(status: number, stderr: string): Error {
  return Object.assign(new Error(`Command failed with status ${status}`), {
    status,
    signal: null,
    stdout: '',
    stderr,
  });
}

describe('git', () => {
  const execOptions = {
    cwd: '/workspace/repo',
    encoding: 'utf8',
    maxBuffer: 64 * 1024 * 1024,
    stdio: ['ignore', 'pipe', 'pipe'],
  };

  beforeEach(() => {
    vi.mocked(which.sync).mockReturnValue('/usr/bin/git');
  });

  describe('getGitLog()', () => {
    it('should read the log with the changelog format', () => {
      const output = '2024-01-02  fix: second\n2024-01-01  (tag: v1.0.0) feat: first\n';
      vi.mocked(execFileSync).mockReturnValue(output);

      expect(getGitLog('/workspace/repo')).toBe(output);
      expect(execFileSync).toHaveBeenCalledWith('/usr/bin/git', ['log', '--pretty=%cs %d %s'], execOptions);
      expect(startGroup).toHaveBeenCalledWith('Reading git log');
      expect(info).toHaveBeenCalledWith('Read 2 commits.');
      expect(endGroup).toHaveBeenCalled();
    });

    it('should use the singular form for one commit', () => {
      vi.mocked(execFileSync).mockReturnValue('2024-01-01  feat: first\n');

      getGitLog('/workspace/repo');

      expect(info).toHaveBeenCalledWith('Read 1 commit.');
    });

    it('should fail with the git error output when git exits unsuccessfully', () => {
      const execError = createExecError(128, "fatal: your current branch 'main' does not have any commits yet\n");
      vi.mocked(execFileSync).mockImplementation(() => {
        throw execError;
      });

      expect(() => getGitLog('/workspace/repo')).toThrow(
        new Error(
          `Failed to run "git log --pretty=%cs %d %s": fatal: your current branch 'main' does not have any commits yet (status: 128)`,
        ),
      );
      expect(endGroup).toHaveBeenCalled();
    });

    it('should keep the original error as cause', () => {
      const execError = createExecError(128, 'fatal: not a git repository\n');
      vi.mocked(execFileSync).mockImplementation(() => {
        throw execError;
      });

      try {
        getGitLog('/workspace/repo');
        expect.unreachable('getGitLog should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(Error);
        expect(error instanceof Error ? error.cause : undefined).toBe(execError);
      }
    });

    it('should fail when git is not installed', () => {
      vi.mocked(which.sync).mockImplementation(() => {
        throw new Error('not found: git');
      });

      expect(() => getGitLog('/workspace/repo')).toThrow(
        new Error('Failed to run "git log --pretty=%cs %d %s": not found: git'),
      );
      expect(execFileSync).not.toHaveBeenCalled();
    });

    it('should report non-Error values as they are', () => {
      vi.mocked(execFileSync).mockImplementation(() => {
        throw ' unexpected ';
      });

      expect(() => getGitLog('/workspace/repo')).toThrow(new Error('unexpected'));
    });
  });

  describe('getRemoteUrl()', () => {
    it('should return the normalized remote URL', () => {
      vi.mocked(execFileSync).mockReturnValue('git@github.com:acme/widgets.git\n');

      expect(getRemoteUrl('origin', '/workspace/repo')).toBe('https://github.com/acme/widgets');
      expect(execFileSync).toHaveBeenCalledWith('/usr/bin/git', ['remote', 'get-url', 'origin'], execOptions);
      expect(startGroup).toHaveBeenCalledWith('Resolving URL of remote "origin"');
      expect(info).toHaveBeenCalledWith('Remote URL: https://github.com/acme/widgets');
    });

    it('should fail when the remote does not exist', () => {
      vi.mocked(execFileSync).mockImplementation(() => {
        throw createExecError(2, "error: No such remote 'upstream'\n");
      });

      expect(() => getRemoteUrl('upstream', '/workspace/repo')).toThrow(
        new Error(`Failed to run "git remote get-url upstream": error: No such remote 'upstream' (status: 2)`),
      );
      expect(endGroup).toHaveBeenCalled();
    });

    it('should fall back to the error message when stderr is empty', () => {
      vi.mocked(execFileSync).mockImplementation(() => {
        throw createExecError(1, '');
      });

      expect(() => getRemoteUrl('origin', '/workspace/repo')).toThrow(
        new Error('Failed to run "git remote get-url origin": Command failed with status 1 (status: 1)'),
      );
    });
  });
});

import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { writeChangelogFile } from '@/utils/file';
import { info } from '@actions/core';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

describe('utils/file', () => {
  let tmpDir: string;

  beforeEach(() => {
    // Create a temporary directory before each test
    tmpDir = mkdtempSync(join(tmpdir(), 'changelog-file-test-'));
  });

  afterEach(() => {
    // Remove temporary directory
    rmSync(tmpDir, { recursive: true, force: true });
  });

  describe('writeChangelogFile()', () => {
    it('should write the changelog relative to the directory with a trailing newline', () => {
      const filePath = writeChangelogFile('CHANGELOG.md', tmpDir, '# Changelog');

      expect(filePath).toBe(join(tmpDir, 'CHANGELOG.md'));
      expect(readFileSync(filePath, 'utf8')).toBe('# Changelog\n');
      expect(info).toHaveBeenCalledWith(`Wrote changelog to ${filePath}`);
    });

    it('should use absolute paths as they are', () => {
      const absolutePath = join(tmpDir, 'HISTORY.md');

      expect(writeChangelogFile(absolutePath, '/somewhere/else', '# Changelog')).toBe(absolutePath);
      expect(readFileSync(absolutePath, 'utf8')).toBe('# Changelog\n');
    });

    it('should replace previous content', () => {
      const filePath = join(tmpDir, 'CHANGELOG.md');
      writeFileSync(filePath, '# Old changelog\n\n* Stale entry\n');

      writeChangelogFile('CHANGELOG.md', tmpDir, '# Changelog');

      expect(readFileSync(filePath, 'utf8')).toBe('# Changelog\n');
    });

    it('should throw when the target directory does not exist', () => {
      expect(() => writeChangelogFile('missing/CHANGELOG.md', tmpDir, '# Changelog')).toThrow(/ENOENT/);
    });
  });
});

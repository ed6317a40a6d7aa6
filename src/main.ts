import { resolve } from 'node:path';
import { renderChangelog } from '@/changelog';
import { getConfig } from '@/config';
import { getGitLog, getRemoteUrl } from '@/git';
import { parseGitLog } from '@/parser';
import type { Config, VersionSequence } from '@/types';
import { UNRELEASED_VERSION } from '@/utils/constants';
import { writeChangelogFile } from '@/utils/file';
import { groupCommitsByVersion } from '@/version-grouper';
import { endGroup, info, setFailed, setOutput, startGroup } from '@actions/core';

/**
 * Generates the changelog document from raw log output and the repository base URL.
 *
 * This is a pure transformation: the same inputs always produce the same document.
 *
 * @param {string} gitLog - Output of `git log --pretty="%cs %d %s"`, newest commit first.
 * @param {string} remoteUrl - Base URL of the repository.
 * @returns {{ changelog: string; versions: VersionSequence }} The markdown document and the sealed buckets it was rendered from.
 */
export function generateChangelog(gitLog: string, remoteUrl: string): { changelog: string; versions: VersionSequence } {
  const versions = groupCommitsByVersion(parseGitLog(gitLog));

  return { changelog: renderChangelog(versions, remoteUrl), versions };
}

/**
 * Writes the changelog, or logs it when running in dry-run mode.
 *
 * @returns {string} The absolute path of the written file, or an empty string on a dry run.
 */
function publishChangelog(config: Config, workingDirectory: string, changelog: string): string {
  if (config.dryRun) {
    startGroup('Changelog (dry run)');
    info(changelog);
    endGroup();

    return '';
  }

  return writeChangelogFile(config.outputFile, workingDirectory, changelog);
}

/**
 * Sets action outputs describing the generated changelog.
 *
 * - `changelog-path`: Absolute path of the written file (empty on a dry run)
 * - `released-versions`: Released version labels, newest first
 * - `latest-version`: The newest released version, or an empty string when nothing was released
 *
 * @param {string} changelogPath - Absolute path of the written file.
 * @param {VersionSequence} versions - The sealed buckets, oldest version first.
 */
function setActionOutputs(changelogPath: string, versions: VersionSequence): void {
  const releasedVersions = versions
    .filter((bucket) => bucket.version !== UNRELEASED_VERSION)
    .map((bucket) => bucket.version)
    .reverse();
  const latestVersion = releasedVersions[0] ?? '';

  startGroup('Action Outputs');
  info(`Changelog path: ${changelogPath}`);
  info(`Released versions: ${JSON.stringify(releasedVersions)}`);
  info(`Latest version: ${latestVersion}`);
  endGroup();

  setOutput('changelog-path', changelogPath);
  setOutput('released-versions', releasedVersions);
  setOutput('latest-version', latestVersion);
}

/**
 * Executes the changelog generation.
 *
 * 1. Reads and validates the configuration
 * 2. Resolves the remote URL and reads the git log; either failing aborts the run before
 *    anything is written
 * 3. Parses the log, groups commits by version and renders the document
 * 4. Writes the document (or logs it on a dry run) and sets the action outputs
 *
 * Any error is reported through setFailed, which marks the process as failed.
 */
export function run(): void {
  try {
    const config = getConfig();
    const workingDirectory = resolve(config.workingDirectory);

    const remoteUrl = getRemoteUrl(config.remoteName, workingDirectory);
    const gitLog = getGitLog(workingDirectory);

    const { changelog, versions } = generateChangelog(gitLog, remoteUrl);
    const changelogPath = publishChangelog(config, workingDirectory, changelog);

    setActionOutputs(changelogPath, versions);
  } catch (error) {
    if (error instanceof Error) {
      setFailed(error.message);
    } else {
      setFailed(String(error));
    }
  }
}

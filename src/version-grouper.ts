import { extractVersionTag } from '@/parser';
import type { ChangelogScope, LogLine, VersionBucket, VersionEntries, VersionSequence } from '@/types';
import {
  CHANGELOG_SECTIONS,
  INITIAL_RELEASE_MESSAGE,
  INITIAL_RELEASE_SCOPE,
  INITIAL_RELEASE_VERSIONS,
  UNRELEASED_VERSION,
} from '@/utils/constants';
import { debug, endGroup, info, startGroup } from '@actions/core';

/**
 * Type guard for the commit types that feed a changelog section.
 */
export function isChangelogScope(scope: string): scope is ChangelogScope {
  return CHANGELOG_SECTIONS.some((section) => section.scope === scope);
}

/**
 * Accumulates the changelog entries of the version currently being filled.
 *
 * Lines must be recorded oldest first. Calling {@link VersionBucketBuilder.seal} produces a frozen
 * {@link VersionBucket} and starts a new, empty bucket. The most recent date is kept across seals:
 * a bucket that receives no dated line inherits the date of the last commit seen.
 */
export class VersionBucketBuilder {
  private date = '';
  private entries = new Map<ChangelogScope, string[]>();

  /**
   * Records one log line: its date becomes the bucket date and its message is appended under its
   * scope. Messages of types that have no changelog section are discarded.
   */
  public record(line: LogLine): void {
    if (line.date) {
      this.date = line.date;
    }

    if (line.scope !== null && isChangelogScope(line.scope)) {
      this.add(line.scope, line.message);
    }
  }

  /**
   * Whether any changelog section has at least one message.
   */
  public hasEntries(): boolean {
    return Array.from(this.entries.values()).some((messages) => messages.length > 0);
  }

  /**
   * Closes the current bucket under the given version label.
   *
   * A first release (`v1.0.0` or `1.0.0`) without entries is seeded with a single
   * "initial release" entry so that it always shows up in the changelog.
   *
   * @param {string} version - The version tag, or the unreleased sentinel.
   * @returns {VersionBucket} An immutable snapshot of the bucket.
   */
  public seal(version: string): VersionBucket {
    if (INITIAL_RELEASE_VERSIONS.includes(version) && !this.hasEntries()) {
      this.add(INITIAL_RELEASE_SCOPE, INITIAL_RELEASE_MESSAGE);
    }

    const entries: VersionEntries = Object.freeze(
      Object.fromEntries(
        Array.from(this.entries, ([scope, messages]): [ChangelogScope, readonly string[]] => [
          scope,
          Object.freeze([...messages]),
        ]),
      ),
    );
    this.entries = new Map();

    return Object.freeze({ version, date: this.date, entries });
  }

  private add(scope: ChangelogScope, message: string): void {
    const messages = this.entries.get(scope);
    if (messages) {
      messages.push(message);
    } else {
      this.entries.set(scope, [message]);
    }
  }
}

/**
 * Partitions parsed log lines into version buckets.
 *
 * The log source emits the newest commit first, so the lines are walked in reverse. Every line is
 * recorded into the current bucket; a line whose refs carry a version tag then seals the bucket
 * under that tag. Whatever remains after the last tag is sealed under the unreleased sentinel, even
 * when it is empty, so the returned sequence always ends with the unreleased bucket.
 *
 * If the same version label is sealed twice, the later bucket replaces the earlier one in place.
 *
 * @param {readonly LogLine[]} lines - Parsed log lines, newest first.
 * @returns {VersionSequence} The sealed buckets, oldest version first.
 */
export function groupCommitsByVersion(lines: readonly LogLine[]): VersionSequence {
  startGroup('Grouping commits by version');

  try {
    const builder = new VersionBucketBuilder();
    const buckets = new Map<string, VersionBucket>();

    for (let index = lines.length - 1; index >= 0; index--) {
      const line = lines[index];
      builder.record(line);

      const version = line.refs === null ? null : extractVersionTag(line.refs);
      if (version !== null) {
        buckets.set(version, builder.seal(version));
      }
    }

    buckets.set(UNRELEASED_VERSION, builder.seal(UNRELEASED_VERSION));

    const versions = Array.from(buckets.values());
    for (const bucket of versions) {
      const counts = CHANGELOG_SECTIONS.map(({ scope }) => `${scope}=${bucket.entries[scope]?.length ?? 0}`);
      debug(`${bucket.version} (${bucket.date || 'no date'}): ${counts.join(', ')}`);
    }

    const releaseCount = versions.length - 1;
    info(`Found ${releaseCount} released version${releaseCount !== 1 ? 's' : ''} in ${lines.length} commits.`);

    return versions;
  } finally {
    endGroup();
  }
}

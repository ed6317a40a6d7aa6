import type { VersionBucket, VersionSequence } from '@/types';
import {
  CHANGELOG_HEADING,
  CHANGELOG_SECTIONS,
  COMPARE_HEADING_TEMPLATE,
  RELEASE_HEADING_TEMPLATE,
  UNRELEASED_TITLE,
  UNRELEASED_VERSION,
} from '@/utils/constants';
import { capitalizeFirstCharacter, renderTemplate } from '@/utils/string';

/**
 * Formats a commit message as a markdown list item, upper-casing its first character.
 *
 * @param {string} message - The commit message without its type prefix.
 * @returns {string} The bullet line (e.g. `* Add login button`).
 */
export function formatChangelogBullet(message: string): string {
  return `* ${capitalizeFirstCharacter(message)}`;
}

/**
 * Whether a bucket has at least one message in a changelog section. Buckets without any are
 * left out of the changelog.
 */
export function hasVisibleEntries(bucket: VersionBucket): boolean {
  return CHANGELOG_SECTIONS.some(({ scope }) => (bucket.entries[scope]?.length ?? 0) > 0);
}

/**
 * Creates the level-2 heading for a version bucket.
 *
 * With a previous version the heading links to the comparison between both versions, otherwise
 * to the release page of the version itself. The unreleased sentinel is titled "Unreleased" but
 * keeps its raw value in the link.
 *
 * @param {VersionBucket} bucket - The bucket to create the heading for.
 * @param {VersionBucket | null} previous - The bucket preceding it in the version sequence.
 * @param {string} remoteUrl - Base URL of the repository.
 * @returns {string} The markdown heading.
 *
 * @example
 * ```typescript
 * createVersionHeading(v110, v100, 'https://example.com/acme/widgets')
 * // → '## [v1.1.0](https://example.com/acme/widgets/compare/v1.0.0...v1.1.0) - 2024-03-01'
 * ```
 */
export function createVersionHeading(bucket: VersionBucket, previous: VersionBucket | null, remoteUrl: string): string {
  const variables = {
    title: bucket.version === UNRELEASED_VERSION ? UNRELEASED_TITLE : bucket.version,
    url: remoteUrl,
    version: bucket.version,
    date: bucket.date,
  };

  if (previous === null) {
    return renderTemplate(RELEASE_HEADING_TEMPLATE, variables);
  }

  return renderTemplate(COMPARE_HEADING_TEMPLATE, { ...variables, previous: previous.version });
}

/**
 * Creates the lines of one changelog section: heading, blank line, one bullet per message with
 * the most recent message first, and a closing blank line. Empty sections produce no lines.
 */
function createSection(title: string, messages: readonly string[]): string[] {
  if (messages.length === 0) {
    return [];
  }

  return [`### ${title}`, '', ...[...messages].reverse().map(formatChangelogBullet), ''];
}

/**
 * Renders the changelog document for a version sequence.
 *
 * Versions are rendered newest first. Each visible version gets a heading followed by its
 * "Added", "Changed" and "Fixed" sections, in that order. The result has no trailing whitespace.
 *
 * @param {VersionSequence} versions - Sealed buckets, oldest version first.
 * @param {string} remoteUrl - Base URL of the repository used for comparison and release links.
 * @returns {string} The markdown document.
 */
export function renderChangelog(versions: VersionSequence, remoteUrl: string): string {
  const lines: string[] = [CHANGELOG_HEADING, ''];

  for (let index = versions.length - 1; index >= 0; index--) {
    const bucket = versions[index];
    if (!hasVisibleEntries(bucket)) {
      continue;
    }

    // The previous version is the preceding bucket in the sequence, even when that one is hidden
    const previous = index > 0 ? versions[index - 1] : null;
    lines.push(createVersionHeading(bucket, previous, remoteUrl), '');

    for (const { scope, title } of CHANGELOG_SECTIONS) {
      lines.push(...createSection(title, bucket.entries[scope] ?? []));
    }
  }

  return lines.join('\n').trimEnd();
}

import type { ChangelogSection } from '@/types';

/**
 * Regular expression that matches version tags in the format of semantic versioning.
 * This regex validates version strings like "1.2.3" or "v1.2.3" and includes capture groups.
 * Group 1: Major version number
 * Group 2: Minor version number
 * Group 3: Patch version number
 */
export const VERSION_TAG_REGEX = /^v?(\d+)\.(\d+)\.(\d+)$/;

/**
 * Matches one line of `git log --pretty="%cs %d %s"` output.
 *
 * `%d` expands to ` (refs)` with a leading space, or to nothing, so the date is followed by
 * two spaces in practice. Ref names may contain balanced parentheses (e.g. a `wip(2)` branch);
 * the refs group stops at the first unbalanced `) `, so parentheses in the subject stay there.
 */
export const GIT_LOG_LINE_REGEX =
  /^(?<date>\d{4}-\d{2}-\d{2}) +(?:\((?<refs>(?:[^()]|\([^()]*\))*)\) )?(?<subject>.*)$/;

/**
 * Matches each `tag: <name>` decoration within the refs annotation.
 */
export const REF_TAG_REGEX = /(?:^|, )tag: ([^,]+)/g;

/**
 * Pattern for the `<type>: <message>` prefix of a commit subject. The colon must be followed by a
 * space so that colons inside free text are never taken for a type prefix.
 */
export const COMMIT_SUBJECT_HEADER_REGEX = /^(\w+): (.*)$/;

/**
 * Commit type keywords recognized by the subject grammar.
 */
export const CONVENTIONAL_COMMIT_TYPES: readonly string[] = [
  'feat',
  'fix',
  'refactor',
  'perf',
  'docs',
  'style',
  'test',
  'build',
  'ci',
  'chore',
  'revert',
];

/**
 * Changelog sections in rendering order. Commit types missing here are parsed but never rendered.
 */
export const CHANGELOG_SECTIONS = [
  { scope: 'feat', title: 'Added' },
  { scope: 'refactor', title: 'Changed' },
  { scope: 'fix', title: 'Fixed' },
] as const satisfies readonly ChangelogSection[];

/**
 * Internal label of the bucket holding commits after the most recent release. It is used as-is
 * in comparison links while the heading shows {@link UNRELEASED_TITLE}.
 */
export const UNRELEASED_VERSION = 'unreleased';
export const UNRELEASED_TITLE = 'Unreleased';

/**
 * A first release without any changelog-worthy commits still gets one entry.
 */
export const INITIAL_RELEASE_VERSIONS: readonly string[] = ['v1.0.0', '1.0.0'];
export const INITIAL_RELEASE_SCOPE = 'feat';
export const INITIAL_RELEASE_MESSAGE = 'initial release';

export const CHANGELOG_HEADING = '# Changelog';
export const COMPARE_HEADING_TEMPLATE = '## [{{title}}]({{url}}/compare/{{previous}}...{{version}}) - {{date}}';
export const RELEASE_HEADING_TEMPLATE = '## [{{title}}]({{url}}/releases/tag/{{version}}) - {{date}}';

export const GIT_LOG_PRETTY_FORMAT = '%cs %d %s';

/**
 * Upper bound for the captured stdout of a git invocation. Long histories easily exceed the
 * 1 MiB default of execFileSync.
 */
export const GIT_MAX_BUFFER = 64 * 1024 * 1024;

export const DEFAULT_CHANGELOG_FILENAME = 'CHANGELOG.md';
export const DEFAULT_REMOTE_NAME = 'origin';

/**
 * Valid git remote names for the `remote-name` input.
 */
export const REMOTE_NAME_REGEX = /^[A-Za-z0-9._-]+$/;

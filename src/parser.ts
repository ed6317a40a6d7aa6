import type { LogLine } from '@/types';
import {
  COMMIT_SUBJECT_HEADER_REGEX,
  CONVENTIONAL_COMMIT_TYPES,
  GIT_LOG_LINE_REGEX,
  REF_TAG_REGEX,
  VERSION_TAG_REGEX,
} from '@/utils/constants';
import { debug } from '@actions/core';
import { CommitParser } from 'conventional-commits-parser';

/**
 * Commit subject parser restricted to the `<type>: <message>` header form.
 *
 * Unlike the full Conventional Commits header grammar, no `(scope)` or `!` marker is accepted
 * between the type and the colon: a subject such as `feat(api): x` is kept whole as the message.
 */
const subjectParser = new CommitParser({
  headerPattern: COMMIT_SUBJECT_HEADER_REGEX,
  headerCorrespondence: ['type', 'subject'],
});

/**
 * Splits a commit subject into its type prefix and message.
 *
 * @param {string} subject - The commit subject line.
 * @returns The recognized type (or null) and the remaining message. When no recognized type
 *          prefix is present, the message is the whole subject.
 *
 * @example
 * ```typescript
 * parseCommitSubject('feat: add login button')
 * // → { scope: 'feat', message: 'add login button' }
 *
 * parseCommitSubject('Merge branch "release"')
 * // → { scope: null, message: 'Merge branch "release"' }
 * ```
 */
export function parseCommitSubject(subject: string): Pick<LogLine, 'scope' | 'message'> {
  if (subject.trim() === '') {
    return { scope: null, message: subject };
  }

  const parsed = subjectParser.parse(subject);

  if (!parsed.type || parsed.subject === null || !CONVENTIONAL_COMMIT_TYPES.includes(parsed.type)) {
    return { scope: null, message: subject };
  }

  return { scope: parsed.type, message: parsed.subject };
}

/**
 * Finds the first version tag within a refs annotation.
 *
 * Every `tag: <name>` decoration is inspected; the first name in the form `v#.#.#` or `#.#.#`
 * wins. Branch names and non-version tags are ignored.
 *
 * @param {string} refs - Decorations without the surrounding parentheses (e.g. `HEAD -> main, tag: v1.2.0`).
 * @returns {string | null} The version tag, or null when the commit is not a version boundary.
 */
export function extractVersionTag(refs: string): string | null {
  for (const [, tagName] of refs.matchAll(REF_TAG_REGEX)) {
    const tag = tagName.trim();
    if (VERSION_TAG_REGEX.test(tag)) {
      return tag;
    }
  }

  return null;
}

/**
 * Parses a single line of `git log --pretty="%cs %d %s"` output.
 *
 * @param {string} line - The raw log line.
 * @returns {LogLine | null} The parsed line, or null when the line does not follow the log format
 *                           (for example the empty line after the final newline).
 */
export function parseLogLine(line: string): LogLine | null {
  const match = GIT_LOG_LINE_REGEX.exec(line);
  if (!match?.groups) {
    return null;
  }

  const { date, refs, subject } = match.groups;

  return {
    date,
    refs: refs ?? null,
    ...parseCommitSubject(subject),
  };
}

/**
 * Parses the complete output of the log source.
 *
 * Lines that do not follow the log format are skipped. The order of the output is kept, which
 * for `git log` means newest commit first.
 *
 * @param {string} output - The raw `git log` output.
 * @returns {LogLine[]} The parsed lines.
 */
export function parseGitLog(output: string): LogLine[] {
  const logLines: LogLine[] = [];
  let skipped = 0;

  for (const line of output.split(/\r?\n/)) {
    const logLine = parseLogLine(line);
    if (logLine === null) {
      // Blank lines come from the trailing newline and are not worth reporting
      if (line.trim() !== '') {
        skipped++;
      }
      continue;
    }

    logLines.push(logLine);
  }

  if (skipped > 0) {
    debug(`Skipped ${skipped} unparseable log line${skipped !== 1 ? 's' : ''}`);
  }

  return logLines;
}

/**
 * Git log and changelog related types
 */

/**
 * Commit types that produce a visible changelog section.
 */
export type ChangelogScope = 'feat' | 'refactor' | 'fix';

/**
 * A changelog section heading paired with the commit type that feeds it.
 */
export interface ChangelogSection {
  /** The commit type whose messages are listed under this section */
  scope: ChangelogScope;
  /** The level-3 heading text (e.g. "Added") */
  title: string;
}

/**
 * A single line of `git log --pretty="%cs %d %s"` output after parsing.
 */
export interface LogLine {
  /**
   * Committer date in `YYYY-MM-DD` format.
   */
  date: string;

  /**
   * Raw ref decorations without the surrounding parentheses
   * (e.g. `HEAD -> main, tag: v1.2.0, origin/main`), or null when the commit has none.
   */
  refs: string | null;

  /**
   * The conventional commit type prefix (e.g. `feat`), or null when the subject
   * does not start with a recognized `<type>: ` prefix.
   */
  scope: string | null;

  /**
   * The subject with the type prefix removed, or the whole subject when no prefix matched.
   */
  message: string;
}

/**
 * The changelog entries of a bucket, keyed by scope. Messages are kept in
 * chronological order (oldest first).
 */
export type VersionEntries = Readonly<Partial<Record<ChangelogScope, readonly string[]>>>;

/**
 * The sealed set of changelog entries associated with one released version, or with
 * the commits following the most recent release.
 */
export interface VersionBucket {
  /** The tag that closed the bucket (e.g. `v1.2.0`), or the unreleased sentinel */
  readonly version: string;
  /** Date of the most recent commit observed while the bucket was filled */
  readonly date: string;
  readonly entries: VersionEntries;
}

/**
 * Sealed buckets in discovery order, oldest version first.
 */
export type VersionSequence = readonly VersionBucket[];

/**
 * Configuration related types
 */

/**
 * Configuration interface used for defining the changelog generator's input configuration.
 */
export interface Config {
  /**
   * Directory of the git repository to read history from. Relative paths are resolved
   * against the current working directory of the process.
   */
  workingDirectory: string;

  /**
   * Path of the changelog file to write, relative to the working directory.
   * Any previous content of the file is replaced.
   */
  outputFile: string;

  /**
   * Name of the git remote whose URL is used to build comparison and release links.
   */
  remoteName: string;

  /**
   * When true, the rendered changelog is logged instead of written to disk.
   */
  dryRun: boolean;
}

import { writeFileSync } from 'node:fs';
import { isAbsolute, resolve } from 'node:path';
import { info } from '@actions/core';

/**
 * Writes the rendered changelog, replacing any previous content of the file.
 *
 * The document is terminated with a single newline.
 *
 * @param {string} outputFile - Target path, absolute or relative to `directory`.
 * @param {string} directory - Base directory for relative target paths.
 * @param {string} changelog - The rendered markdown document.
 * @returns {string} The absolute path of the written file.
 */
export function writeChangelogFile(outputFile: string, directory: string, changelog: string): string {
  const filePath = isAbsolute(outputFile) ? outputFile : resolve(directory, outputFile);

  writeFileSync(filePath, `${changelog}\n`, 'utf8');
  info(`Wrote changelog to ${filePath}`);

  return filePath;
}

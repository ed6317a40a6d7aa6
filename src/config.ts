import type { Config } from '@/types';
import { REMOTE_NAME_REGEX } from '@/utils/constants';
import { createConfigFromInputs } from '@/utils/metadata';
import { endGroup, info, startGroup } from '@actions/core';

// Keep configInstance private to this module
let configInstance: Config | null = null;

/**
 * Clears the cached config instance during testing.
 *
 * Resets the singleton so that the next config initialization starts fresh with new
 * stubbed inputs. Only takes effect when NODE_ENV is set to 'test'.
 */
export function clearConfigForTesting(): void {
  if (process.env.NODE_ENV === 'test') {
    configInstance = null;
  }
}

/**
 * Lazy-initialized configuration object. Inputs are read on first use, so importing this
 * module has no side effects.
 */
function initializeConfig(): Config {
  if (configInstance) {
    return configInstance;
  }

  try {
    startGroup('Initializing Config');

    configInstance = createConfigFromInputs();

    // Validate output file
    if (/[\\/]$/.test(configInstance.outputFile)) {
      throw new TypeError(`Output file must be a file path, not a directory. Got: '${configInstance.outputFile}'`);
    }

    // Validate remote name
    if (!REMOTE_NAME_REGEX.test(configInstance.remoteName)) {
      throw new TypeError(
        `Remote name may only contain letters, digits, '.', '_' and '-'. Got: '${configInstance.remoteName}'`,
      );
    }

    info(`Working Directory: ${configInstance.workingDirectory}`);
    info(`Output File: ${configInstance.outputFile}`);
    info(`Remote Name: ${configInstance.remoteName}`);
    info(`Dry Run: ${configInstance.dryRun}`);

    return configInstance;
  } catch (error) {
    // An invalid config is not cached
    configInstance = null;
    throw error;
  } finally {
    endGroup();
  }
}

// Create a getter for the config that initializes on first use
export function getConfig(): Config {
  return initializeConfig();
}

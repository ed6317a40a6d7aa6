import type { ActionInputMetadata, Config } from '@/types';
import { DEFAULT_CHANGELOG_FILENAME, DEFAULT_REMOTE_NAME } from '@/utils/constants';
import { getBooleanInput, getInput } from '@actions/core';

/**
 * Factory functions to reduce duplication in ACTION_INPUTS metadata definitions.
 */
const optionalString = (configKey: keyof Config, defaultValue: string): ActionInputMetadata => ({
  configKey,
  required: false,
  type: 'string',
  defaultValue,
});

const optionalBoolean = (configKey: keyof Config, defaultValue: boolean): ActionInputMetadata => ({
  configKey,
  required: false,
  type: 'boolean',
  defaultValue: String(defaultValue),
});

/**
 * Complete mapping of all inputs to their metadata.
 * This is the single source of truth for input configuration. Inputs are read from the
 * `INPUT_<NAME>` environment variables, so the defaults apply both inside a workflow and
 * when running the tool locally.
 */
export const ACTION_INPUTS: Record<string, ActionInputMetadata> = {
  'working-directory': optionalString('workingDirectory', '.'),
  'output-file': optionalString('outputFile', DEFAULT_CHANGELOG_FILENAME),
  'remote-name': optionalString('remoteName', DEFAULT_REMOTE_NAME),
  'dry-run': optionalBoolean('dryRun', false),
} as const;

/**
 * Creates a config object by reading inputs using the @actions/core API and converting them
 * according to the metadata definitions.
 */
export function createConfigFromInputs(): Config {
  const config = {} as Config;

  for (const [inputName, metadata] of Object.entries(ACTION_INPUTS)) {
    const { configKey, required, type, defaultValue } = metadata;

    try {
      const useDefault = defaultValue !== undefined && getInput(inputName, { required }).trim() === '';
      let value: unknown;

      if (type === 'boolean') {
        // Use getBooleanInput for boolean types for proper parsing
        value = useDefault ? defaultValue === 'true' : getBooleanInput(inputName, { required });
      } else {
        value = useDefault ? defaultValue : getInput(inputName, { required });
      }

      Object.assign(config, { [configKey]: value });
    } catch (error) {
      throw new Error(
        `Failed to process input '${inputName}': ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  return config;
}

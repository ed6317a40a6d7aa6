import type { Config } from '@/types/config.types';

/**
 * Metadata definition for action inputs that enables dynamic configuration mapping.
 *
 * This interface is the translation layer between the `INPUT_*` values read through
 * `@actions/core` and our internal Config type. It provides the metadata needed to:
 * - Parse input values according to their expected types
 * - Map input names to the corresponding config property names
 * - Fall back to a default when the input is not supplied
 *
 * @see {@link ../utils/metadata.ts} for usage
 */
export interface ActionInputMetadata {
  /**
   * The config property name this input maps to.
   */
  configKey: keyof Config;

  /**
   * Whether this input must be supplied. Required inputs have no default.
   */
  required: boolean;

  /**
   * The expected data type of the input.
   * - 'string': Direct string value
   * - 'boolean': Parsed using getBooleanInput for proper true/false handling
   */
  type: 'string' | 'boolean';

  /**
   * Raw value used when the input is empty or missing.
   */
  defaultValue?: string;
}

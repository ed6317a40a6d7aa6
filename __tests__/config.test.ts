import { clearConfigForTesting, getConfig } from '@/config';
import { booleanInputs, getInputEnvName, stubInputEnv } from '@/tests/helpers/inputs';
import { endGroup, getBooleanInput, getInput, info, startGroup } from '@actions/core';
import { beforeEach, describe, expect, it, vi } from 'vitest';

// This suite tests the real config module instead of the global mock
vi.unmock('@/config');

describe('config', () => {
  beforeEach(() => {
    // The config is cached. To ensure each test starts with a clean slate, we explicitly clear it.
    clearConfigForTesting();
  });

  describe('input parsing', () => {
    it('should read all inputs', () => {
      stubInputEnv();

      expect(getConfig()).toEqual({
        workingDirectory: '/workspace/repo',
        outputFile: 'docs/CHANGELOG.md',
        remoteName: 'upstream',
        dryRun: false,
      });
      expect(getInput).toHaveBeenCalled();
      expect(getBooleanInput).toHaveBeenCalledWith('dry-run', { required: false });
    });

    it('should fall back to defaults when no inputs are set', () => {
      expect(getConfig()).toEqual({
        workingDirectory: '.',
        outputFile: 'CHANGELOG.md',
        remoteName: 'origin',
        dryRun: false,
      });
    });

    const stringDefaults = [
      ['working-directory', 'workingDirectory', '.'],
      ['output-file', 'outputFile', 'CHANGELOG.md'],
      ['remote-name', 'remoteName', 'origin'],
    ] as const;

    for (const [input, configKey, defaultValue] of stringDefaults) {
      it(`should fall back to the default when "${input}" is blank`, () => {
        stubInputEnv({ [input]: '   ' });

        expect(getConfig()[configKey]).toBe(defaultValue);
      });
    }

    it('should parse dry-run as a YAML boolean', () => {
      stubInputEnv({ 'dry-run': 'TRUE' });

      expect(getConfig().dryRun).toBe(true);
    });

    for (const input of booleanInputs) {
      it(`should throw error when input "${input}" has an invalid boolean value`, () => {
        stubInputEnv({ [input]: 'invalid-boolean' });

        expect(() => getConfig()).toThrow(
          new Error(
            `Failed to process input '${input}': Input does not meet YAML 1.2 "Core Schema" specification: ${input}\nSupport boolean input list: \`true | True | TRUE | false | False | FALSE\``,
          ),
        );
      });
    }
  });

  describe('validation', () => {
    it('should throw error when output-file is a directory', () => {
      stubInputEnv({ 'output-file': 'docs/' });

      expect(() => getConfig()).toThrow(
        new TypeError("Output file must be a file path, not a directory. Got: 'docs/'"),
      );
    });

    it('should throw error when remote-name is not a valid remote name', () => {
      stubInputEnv({ 'remote-name': 'my remote' });

      expect(() => getConfig()).toThrow(
        new TypeError("Remote name may only contain letters, digits, '.', '_' and '-'. Got: 'my remote'"),
      );
    });

    it('should not cache an invalid config', () => {
      stubInputEnv({ 'remote-name': 'my remote' });
      expect(() => getConfig()).toThrow(TypeError);

      vi.stubEnv(getInputEnvName('remote-name'), 'origin');
      expect(getConfig().remoteName).toBe('origin');
    });
  });

  describe('initialization', () => {
    it('should log the configuration inside a group', () => {
      stubInputEnv({ 'dry-run': 'true' });
      getConfig();

      expect(startGroup).toHaveBeenCalledWith('Initializing Config');
      expect(vi.mocked(info).mock.calls).toEqual([
        ['Working Directory: /workspace/repo'],
        ['Output File: docs/CHANGELOG.md'],
        ['Remote Name: upstream'],
        ['Dry Run: true'],
      ]);
      expect(endGroup).toHaveBeenCalledOnce();
    });

    it('should initialize only once', () => {
      stubInputEnv();
      const first = getConfig();
      const second = getConfig();

      expect(second).toBe(first);
      expect(startGroup).toHaveBeenCalledOnce();
    });
  });
});

import type { Config } from '@/types';

/**
 * Configuration interface with added utility methods
 */
interface ConfigWithMethods extends Config {
  set: (overrides: Partial<Config>) => void;
  resetDefaults: () => void;
}

/**
 * Default configuration object.
 */
const defaultConfig: Config = {
  workingDirectory: '/workspace',
  outputFile: 'CHANGELOG.md',
  remoteName: 'origin',
  dryRun: false,
};

/**
 * Valid configuration keys.
 */
const validConfigKeys = Object.keys(defaultConfig);

// Store the actual configuration data
let currentConfig: Config = { ...defaultConfig };

/**
 * Config proxy handler.
 */
const configProxyHandler: ProxyHandler<ConfigWithMethods> = {
  set(_target: ConfigWithMethods, key: string, value: unknown): boolean {
    if (!validConfigKeys.includes(key)) {
      throw new Error(`Invalid config key: ${key}`);
    }

    if (typeof Reflect.get(defaultConfig, key) !== typeof value) {
      throw new TypeError(`Invalid value type for config key: ${key}`);
    }

    currentConfig = { ...currentConfig, [key]: value };
    return true;
  },

  get(_target: ConfigWithMethods, prop: string | symbol): unknown {
    if (typeof prop === 'string') {
      if (prop === 'set') {
        return (overrides: Partial<Config> = {}) => {
          currentConfig = { ...currentConfig, ...overrides };
        };
      }
      if (prop === 'resetDefaults') {
        return () => {
          currentConfig = { ...defaultConfig };
        };
      }

      return Reflect.get(currentConfig, prop);
    }
    return undefined;
  },
};

/**
 * Returns the current configuration.
 */
export function getConfig(): Config {
  return currentConfig;
}

/**
 * Create and export the config object directly with the proxy
 */
export const config: ConfigWithMethods = new Proxy({} as ConfigWithMethods, configProxyHandler);

/**
 * CLI configuration - loading and merging the configuration file.
 */

import { readFileSync, existsSync } from 'node:fs';
import { resolve, join } from 'node:path';
import { homedir } from 'node:os';
import type { CliConfig } from '../types.js';
import { DEFAULT_CLI_CONFIG } from '../types.js';

export const CONFIG_FILENAME = '.nestplate.json';

/** Looks for the configuration file in the directory hierarchy */
function findConfigFile(startDir: string): string | null {
  let currentDir = startDir;

  while (true) {
    const configPath = join(currentDir, CONFIG_FILENAME);
    if (existsSync(configPath)) {
      return configPath;
    }

    const parentDir = resolve(currentDir, '..');
    if (parentDir === currentDir) {
      break;
    }
    currentDir = parentDir;
  }

  // Fall back to the home directory
  const homeConfig = join(homedir(), CONFIG_FILENAME);
  if (existsSync(homeConfig)) {
    return homeConfig;
  }

  return null;
}

/** Parses the JSON configuration */
function parseConfig(content: string, filePath: string): Partial<CliConfig> {
  try {
    const parsed = JSON.parse(content) as unknown;
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new Error('Configuration must be an object');
    }
    return parsed as Partial<CliConfig>;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid configuration in ${filePath}: ${message}`);
  }
}

/** Merges a configuration over the defaults */
export function mergeConfig(base: CliConfig, override: Partial<CliConfig>): CliConfig {
  return {
    templates: {
      ...base.templates,
      ...override.templates
    },
    render: {
      ...base.render,
      ...override.render
    },
    output: {
      ...base.output,
      ...override.output
    }
  };
}

/** Cache of the loaded configuration */
let cachedConfig: CliConfig | null = null;
let cachedConfigPath: string | null = null;

/**
 * Loads the CLI configuration.
 *
 * Priority:
 * 1. Explicit path
 * 2. Configuration file in the working directory or one of its parents
 * 3. Configuration file in the home directory
 * 4. Defaults
 */
export function loadConfig(explicitPath?: string): CliConfig {
  const pathToLoad = explicitPath ? resolve(explicitPath) : findConfigFile(process.cwd());

  if (cachedConfig && cachedConfigPath === pathToLoad) {
    return cachedConfig;
  }

  if (!pathToLoad) {
    cachedConfig = mergeConfig(DEFAULT_CLI_CONFIG, {});
    cachedConfigPath = null;
    return cachedConfig;
  }

  if (!existsSync(pathToLoad)) {
    if (explicitPath) {
      throw new Error(`Configuration file not found: ${pathToLoad}`);
    }
    cachedConfig = mergeConfig(DEFAULT_CLI_CONFIG, {});
    cachedConfigPath = null;
    return cachedConfig;
  }

  const content = readFileSync(pathToLoad, 'utf-8');
  const parsed = parseConfig(content, pathToLoad);
  cachedConfig = mergeConfig(DEFAULT_CLI_CONFIG, parsed);
  cachedConfigPath = pathToLoad;

  return cachedConfig;
}

/** Resets the configuration cache (for tests) */
export function resetConfigCache(): void {
  cachedConfig = null;
  cachedConfigPath = null;
}

/** Path of the loaded configuration */
export function getConfigPath(): string | null {
  return cachedConfigPath;
}

/**
 * Configuration loading for `.markwright/config.yaml`.
 */
import * as path from 'node:path';
import { ConfigSchema, type Config, type LanguageProfileConfig } from './schema.js';
import { fileExists } from '../../utils/file-system.js';
import { loadYamlWithSchema } from '../../utils/yaml.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';
import type { LanguageProfile } from '../languages/types.js';

export const CONFIG_DIR = '.markwright';
const DEFAULT_CONFIG_PATH = `${CONFIG_DIR}/config.yaml`;

/**
 * Default configuration values.
 * Used when no config file exists.
 */
export function getDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

/**
 * Load configuration from a file.
 * Falls back to defaults if the file doesn't exist.
 */
export async function loadConfig(projectRoot: string, configPath?: string): Promise<Config> {
  const fullPath = path.resolve(projectRoot, configPath ?? DEFAULT_CONFIG_PATH);

  if (!(await fileExists(fullPath))) {
    return getDefaultConfig();
  }

  try {
    return await loadYamlWithSchema(fullPath, ConfigSchema);
  } catch (error) {
    if (error instanceof Error) {
      throw new ConfigError(
        ErrorCodes.CONFIG_LOAD_ERROR,
        `Failed to load config from ${fullPath}: ${error.message}`,
        { path: fullPath, originalError: error.message }
      );
    }
    throw error;
  }
}

/**
 * Merge partial config with defaults.
 */
export function mergeConfig(partial: unknown): Config {
  return ConfigSchema.parse(partial ?? {});
}

/**
 * Get the expected config file path for a project.
 */
export function getConfigPath(projectRoot: string): string {
  return path.resolve(projectRoot, DEFAULT_CONFIG_PATH);
}

export async function configExists(projectRoot: string): Promise<boolean> {
  return fileExists(getConfigPath(projectRoot));
}

/**
 * Convert configured language entries to registry profiles.
 */
export function toLanguageProfiles(languages: ReadonlyArray<LanguageProfileConfig>): LanguageProfile[] {
  return languages.map((language) => ({
    id: language.id,
    extensions: language.extensions,
    lineComment: language.line_comment,
    blockComment: language.block_comment,
  }));
}

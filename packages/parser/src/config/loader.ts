/**
 * Config module for .pyscope.yml parsing.
 *
 * Owns loading and validation. Sensible defaults when no config file exists.
 */

import * as fs from 'fs';
import * as path from 'path';
import { parse as parseYaml } from 'yaml';
import { ConfigError, getErrorMessage } from '../errors/index.js';
import { defaultConfig, pyscopeConfigSchema, type PyscopeConfig } from './schema.js';

export const CONFIG_FILENAME = '.pyscope.yml';

/**
 * Resolve the config file path from a root directory.
 */
export function resolveConfigPath(rootDir: string): string {
  return path.join(rootDir, CONFIG_FILENAME);
}

/**
 * Load and validate .pyscope.yml from rootDir.
 * Returns defaults when no config file exists or it is empty.
 *
 * @throws ConfigError when the file is not YAML or fails validation
 */
export function loadConfig(rootDir: string): PyscopeConfig {
  const configPath = resolveConfigPath(rootDir);

  if (!fs.existsSync(configPath)) {
    return defaultConfig;
  }

  let parsed: unknown;
  try {
    const raw = fs.readFileSync(configPath, 'utf-8');
    parsed = parseYaml(raw);
  } catch (error) {
    throw new ConfigError(`Failed to read ${CONFIG_FILENAME}: ${getErrorMessage(error)}`, {
      path: configPath,
    });
  }

  if (parsed === null || parsed === undefined) {
    return defaultConfig;
  }

  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new ConfigError(`${CONFIG_FILENAME} must contain a mapping at the top level`, {
      path: configPath,
    });
  }

  const result = pyscopeConfigSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues.map(
      issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
    );
    throw new ConfigError(`Invalid ${CONFIG_FILENAME}:\n  ${issues.join('\n  ')}`, {
      path: configPath,
      issues,
    });
  }

  return result.data;
}

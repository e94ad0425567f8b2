// packages/core/src/config/loader.ts

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import type { RunbookConfig } from '../types/config.js';
import { CONFIG_FILENAME } from '../utils/constants.js';
import { ConfigError, errorMessage } from '../utils/errors.js';
import { DEFAULT_CONFIG } from './defaults.js';
import { validateConfig } from './schema.js';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Load config with precedence: overrides > .runbook.yml > defaults.
 *
 * 1. Start with hardcoded defaults
 * 2. Merge .runbook.yml from projectDir on top
 * 3. Merge programmatic overrides on top (undefined values are ignored)
 * 4. Validate the final result
 */
export function loadConfig(options?: {
  projectDir?: string;
  overrides?: Partial<RunbookConfig>;
  skipFile?: boolean;
}): RunbookConfig {
  const projectDir = options?.projectDir ?? process.cwd();
  let merged: Record<string, unknown> = { ...DEFAULT_CONFIG };

  const configPath = join(projectDir, CONFIG_FILENAME);
  if (!options?.skipFile && existsSync(configPath)) {
    let fileConfig: unknown;
    try {
      fileConfig = parseYaml(readFileSync(configPath, 'utf-8'));
    } catch (err) {
      throw new ConfigError(`Failed to parse ${CONFIG_FILENAME}: ${errorMessage(err)}`);
    }
    if (isPlainObject(fileConfig)) {
      merged = { ...merged, ...fileConfig };
    } else if (fileConfig !== null && fileConfig !== undefined) {
      throw new ConfigError(`${CONFIG_FILENAME} must contain a mapping`);
    }
  }

  if (options?.overrides) {
    for (const [key, value] of Object.entries(options.overrides)) {
      if (value !== undefined) merged[key] = value;
    }
  }

  return validateConfig(merged);
}

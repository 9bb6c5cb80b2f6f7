/**
 * Configuration file loading utilities
 */

import fs from 'fs/promises';
import path from 'path';
import { ConfigError } from '../errors.js';
import type { LoadConfigResult, TableConfig } from './types.js';
import { normalizeConfig } from './normalizer.js';
import { assertConfigValid } from './validator.js';
import { DEFAULT_CONFIG_FILENAME } from './defaults.js';

// ─────────────────────────────────────────────────────────────────────────────
// File System Utilities
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Search upward through directories for a file.
 */
async function findUp(filename: string, cwd: string): Promise<string | null> {
  let currentDir = cwd;
  const maxDepth = 10;

  for (let depth = 0; depth < maxDepth; depth++) {
    const filePath = path.join(currentDir, filename);
    try {
      await fs.access(filePath);
      return filePath;
    } catch {
      // keep climbing
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }

  return null;
}

// ─────────────────────────────────────────────────────────────────────────────
// Config Loading
// ─────────────────────────────────────────────────────────────────────────────

async function readConfigFile(resolvedPath: string): Promise<unknown> {
  let fileContents: string;

  try {
    fileContents = await fs.readFile(resolvedPath, 'utf-8');
  } catch (error) {
    const err = error as NodeJS.ErrnoException;
    if (err.code === 'ENOENT') {
      throw new ConfigError(`Config file not found at ${resolvedPath}.`);
    }
    throw new ConfigError(`Unable to read config file at ${resolvedPath}: ${err.message}`);
  }

  try {
    return JSON.parse(fileContents) as unknown;
  } catch (error) {
    throw new ConfigError(`Config file at ${resolvedPath} contains invalid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
}

/**
 * Load the config file. An explicit path must exist; without one the default
 * file name is searched upward from `cwd` and defaults apply when none is found.
 */
export async function loadConfigWithMeta(
  configPath?: string,
  options?: { cwd?: string }
): Promise<LoadConfigResult> {
  const cwd = options?.cwd ?? process.cwd();
  const resolvedPath = configPath
    ? path.resolve(cwd, configPath)
    : await findUp(DEFAULT_CONFIG_FILENAME, cwd);

  if (!resolvedPath) {
    const config = normalizeConfig({});
    assertConfigValid(config);
    return { config, configPath: null, projectRoot: cwd };
  }

  const raw = await readConfigFile(resolvedPath);
  const config = normalizeConfig(raw);
  assertConfigValid(config, raw);

  return {
    config,
    configPath: resolvedPath,
    projectRoot: path.dirname(resolvedPath),
  };
}

/**
 * Load config file (simplified API).
 */
export async function loadConfig(configPath?: string, options?: { cwd?: string }): Promise<TableConfig> {
  const result = await loadConfigWithMeta(configPath, options);
  return result.config;
}

export function resolveProjectPath(projectRoot: string, value: string): string {
  return path.isAbsolute(value) ? value : path.resolve(projectRoot, value);
}

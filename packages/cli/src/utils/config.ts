import path from 'path';
import chalk from 'chalk';
import { loadConfigWithMeta, type LoadConfigResult } from '@lingotable/core';

/**
 * Load the project config and say where it came from when it is not in the cwd.
 */
export async function loadProjectConfig(
  configPath: string | undefined,
  options: { quiet?: boolean } = {}
): Promise<LoadConfigResult> {
  const cwd = process.cwd();
  const result = await loadConfigWithMeta(configPath, { cwd });

  if (!options.quiet && result.configPath && result.projectRoot !== cwd) {
    console.log(chalk.gray(`Config found at ${path.relative(cwd, result.configPath)}`));
    console.log(chalk.gray(`Using project root: ${result.projectRoot}\n`));
  }

  return result;
}

/** Resolve a command line path against the cwd. */
export function resolveCliPath(value: string): string {
  return path.resolve(process.cwd(), value);
}

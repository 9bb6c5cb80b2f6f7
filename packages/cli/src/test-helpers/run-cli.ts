import { vi } from 'vitest';
import chalk from 'chalk';
import { createProgram } from '../program.js';

export interface CliRun {
  stdout: string[];
  stderr: string[];
  exitCode: number | undefined;
}

/**
 * Runs the CLI in process with `cwd` as the working directory and captures
 * console output. Colors are disabled so assertions see plain text.
 */
export async function runCli(args: string[], cwd: string): Promise<CliRun> {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const previousLevel = chalk.level;
  chalk.level = 0;

  const cwdSpy = vi.spyOn(process, 'cwd').mockReturnValue(cwd);
  const logSpy = vi.spyOn(console, 'log').mockImplementation((...parts: unknown[]) => {
    stdout.push(parts.map(String).join(' '));
  });
  const errorSpy = vi.spyOn(console, 'error').mockImplementation((...parts: unknown[]) => {
    stderr.push(parts.map(String).join(' '));
  });

  process.exitCode = undefined;
  try {
    const program = createProgram().exitOverride();
    await program.parseAsync(args, { from: 'user' });
    const exitCode = typeof process.exitCode === 'number' ? process.exitCode : undefined;
    return { stdout, stderr, exitCode };
  } finally {
    process.exitCode = undefined;
    chalk.level = previousLevel;
    cwdSpy.mockRestore();
    logSpy.mockRestore();
    errorSpy.mockRestore();
  }
}

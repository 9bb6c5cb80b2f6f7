import chalk from 'chalk';
import { ConfigError, FormatError, TableFormatError } from '@lingotable/core';
import { EXIT_CODES } from './exit-codes.js';

export class CliError extends Error {
  constructor(message: string, public exitCode: number = EXIT_CODES.ERROR) {
    super(message);
    this.name = 'CliError';
  }
}

type MaybePromise<T> = T | Promise<T>;

/**
 * Expected failures from the core, with the exit code each one maps to.
 * Anything else is unexpected and printed with its stack.
 */
export function toCliError(error: unknown): CliError | undefined {
  if (error instanceof CliError) {
    return error;
  }
  if (error instanceof FormatError) {
    return new CliError(`CSV error: ${error.message}`, EXIT_CODES.FORMAT_ERROR);
  }
  if (error instanceof TableFormatError) {
    return new CliError(error.message, EXIT_CODES.TABLE_NOT_FOUND);
  }
  if (error instanceof ConfigError) {
    return new CliError(error.message, EXIT_CODES.ERROR);
  }
  return undefined;
}

export function withErrorHandling<A extends unknown[], R>(
  action: (...args: A) => MaybePromise<R>
): (...args: A) => Promise<R | undefined> {
  return async (...args: A): Promise<R | undefined> => {
    try {
      return await action(...args);
    } catch (error) {
      const cliError = toCliError(error);
      if (cliError) {
        console.error(chalk.red(cliError.message));
        process.exitCode = cliError.exitCode;
        return undefined;
      }

      const message = error instanceof Error ? error.message : String(error);
      console.error(chalk.red(`Unexpected error: ${message}`));
      if (error instanceof Error && error.stack) {
        console.error(chalk.gray(error.stack));
      }
      process.exitCode = EXIT_CODES.ERROR;
      return undefined;
    }
  };
}

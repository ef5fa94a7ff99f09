import chalk from 'chalk';
import { ConfigValidationError, SyncError } from '@metasync/core';
import { exitCodeForError } from './exit-codes.js';

export class CliError extends Error {
  constructor(message: string, public exitCode = 1) {
    super(message);
    this.name = 'CliError';
  }
}

type MaybePromise<T> = T | Promise<T>;

/**
 * Convert an error the core raised on purpose into a CliError carrying the
 * matching exit code. Anything else comes back as is.
 */
export function toCliError(error: unknown): unknown {
  if (error instanceof CliError) {
    return error;
  }
  if (error instanceof SyncError || error instanceof ConfigValidationError) {
    return new CliError(error.message, exitCodeForError(error));
  }
  return error;
}

export function withErrorHandling<A extends unknown[], R>(
  action: (...args: A) => MaybePromise<R>
): (...args: A) => Promise<Awaited<R> | undefined> {
  return async (...args: A): Promise<Awaited<R> | undefined> => {
    try {
      return await action(...args);
    } catch (caught) {
      const error = toCliError(caught);
      if (error instanceof CliError) {
        console.error(chalk.red(error.message));
        process.exitCode = error.exitCode;
        return undefined;
      }

      const message = error instanceof Error ? error.message : String(error);
      console.error(chalk.red(`Unexpected error: ${message}`));
      if (error instanceof Error && error.stack) {
        console.error(chalk.gray(error.stack));
      }
      process.exitCode = 1;
      return undefined;
    }
  };
}

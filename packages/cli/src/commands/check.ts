import chalk from 'chalk';
import type { Command } from 'commander';
import { withErrorHandling } from '../utils/errors.js';
import { CHECK_EXIT_CODES } from '../utils/exit-codes.js';
import { addPackageOptions, countDrift, runSync, type SyncCommandOptions } from './sync.js';

/**
 * Drift gate for CI: runs every pass in memory and fails when a sync would
 * rewrite any file.
 */
export async function runCheck(options: SyncCommandOptions): Promise<number> {
  const result = await runSync(options, 'check');
  const drift = countDrift(result);

  if (!options.json) {
    if (drift) {
      console.log(chalk.red(`Metadata drift found in ${drift} file(s). Run "metasync sync" to update them.`));
    } else {
      console.log(chalk.green('Manifest and catalogs are in sync.'));
    }
  }

  return drift ? CHECK_EXIT_CODES.DRIFT : 0;
}

export function registerCheck(program: Command) {
  addPackageOptions(
    program.command('check').description('Exit with a non-zero code when addon.xml and its catalogs disagree')
  ).action(
    withErrorHandling(async (options: SyncCommandOptions) => {
      const exitCode = await runCheck(options);
      if (exitCode) {
        process.exitCode = exitCode;
      }
    })
  );
}

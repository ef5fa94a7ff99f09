/**
 * CLI presentation layer for file diffs.
 * Core diff building logic is in packages/core/src/diff-utils.ts.
 */

import chalk from 'chalk';
import type { FileChange } from '@metasync/core';

export function printFileDiffs(changes: readonly FileChange[]) {
  if (!changes.length) {
    console.log(chalk.gray('No diffs to display.'));
    return;
  }

  console.log(chalk.blue('\nUnified diffs:'));
  changes.forEach((entry) => {
    const label = entry.languageCode ? `${entry.languageCode} (${entry.relativePath})` : entry.relativePath;
    console.log(chalk.yellow(`\n--- ${label} +${entry.added} -${entry.removed}`));
    console.log(entry.diff.trimEnd());
  });
}

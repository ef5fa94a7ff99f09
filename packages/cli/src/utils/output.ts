import path from 'path';
import chalk from 'chalk';
import type { ActionableItem, FileChange, SyncSummary } from '@metasync/core';
import { printFileDiffs } from './diff-utils.js';

export interface PrintOptions {
  verbose?: boolean;
  diff?: boolean;
}

export function displayPath(filePath: string, cwd = process.cwd()): string {
  return path.relative(cwd, filePath) || '.';
}

export function printActionableItems(items: readonly ActionableItem[], verbose = false) {
  for (const item of items) {
    if (item.severity === 'error') {
      console.log(chalk.red(`✖ ${item.message}`));
    } else if (item.severity === 'warn') {
      console.log(chalk.yellow(`⚠ ${item.message}`));
    } else if (verbose) {
      console.log(chalk.gray(`  ${item.message}`));
    }
  }
}

function describeChange(change: FileChange, write: boolean): string {
  const file = displayPath(change.path);
  return write ? `${file} changed... writing` : `${file} would change (+${change.added} -${change.removed})`;
}

export function printSummary(summary: SyncSummary, options: PrintOptions = {}) {
  printActionableItems(summary.actionableItems, options.verbose);

  if (!summary.changes.length) {
    console.log(chalk.gray(`No changes made to ${displayPath(summary.root)}`));
    return;
  }

  if (summary.backup) {
    console.log(chalk.blue(`📦 ${summary.backup.summary}`));
  }

  for (const change of summary.changes) {
    const line = describeChange(change, summary.write);
    console.log(summary.write ? chalk.green(line) : chalk.yellow(line));
  }

  if (options.diff) {
    printFileDiffs(summary.changes);
  }
}

/**
 * Summary without the regenerated line arrays, for `--json`.
 */
export function toJsonReport(summary: SyncSummary) {
  return {
    ...summary,
    changes: summary.changes.map(({ lines: _lines, ...change }) => change),
  };
}

import { Command } from 'commander';
import chalk from 'chalk';
import inquirer from 'inquirer';
import path from 'path';
import { DEFAULT_BACKUP_DIR, listBackups, restoreBackup } from '@metasync/core';
import { CliError, withErrorHandling } from '../utils/errors.js';

interface BackupCommandOptions {
  path?: string;
  backupDir?: string;
  yes?: boolean;
}

export async function runBackupList(options: BackupCommandOptions): Promise<void> {
  const root = path.resolve(process.cwd(), options.path ?? '.');
  const backups = await listBackups(root, { backupDir: options.backupDir });

  if (backups.length === 0) {
    console.log(chalk.yellow('No backups found.'));
    console.log(chalk.gray('Backups are created when syncing with --backup'));
    return;
  }

  console.log(chalk.blue(`Found ${backups.length} backup(s):\n`));
  for (const backup of backups) {
    const formattedDate = new Date(backup.createdAt).toLocaleString();
    console.log(`  ${chalk.cyan(backup.timestamp)}  ${formattedDate}  (${backup.fileCount} files)`);
  }
  console.log(chalk.gray(`\nRestore a backup with: metasync backup-restore <timestamp>`));
}

export async function runBackupRestore(timestamp: string, options: BackupCommandOptions): Promise<string[]> {
  const root = path.resolve(process.cwd(), options.path ?? '.');
  const backups = await listBackups(root, { backupDir: options.backupDir });

  if (backups.length === 0) {
    throw new CliError('No backups found.');
  }

  const targetBackup = timestamp === 'latest' ? backups[0] : backups.find((b) => b.timestamp === timestamp);
  if (!targetBackup) {
    const suggestion = backups
      .slice(0, 5)
      .map((b) => b.timestamp)
      .join(', ');
    throw new CliError(`Backup not found: ${timestamp}. Available backups: ${suggestion}`);
  }

  if (!options.yes) {
    const { confirmed } = await inquirer.prompt<{ confirmed: boolean }>([
      {
        type: 'confirm',
        name: 'confirmed',
        message: `Restore ${targetBackup.fileCount} files from backup ${targetBackup.timestamp}? This overwrites the current files.`,
        default: false,
      },
    ]);
    if (!confirmed) {
      console.log(chalk.yellow('Restore cancelled.'));
      return [];
    }
  }

  const result = await restoreBackup(targetBackup.path, root);
  console.log(chalk.green(`\n✅ ${result.summary}`));
  for (const file of result.restored) {
    console.log(chalk.gray(`   Restored: ${file}`));
  }
  return result.restored;
}

/**
 * Registers backup-related commands (backup-list, backup-restore)
 */
export function registerBackup(program: Command): void {
  program
    .command('backup-list')
    .description('List backups taken by sync --backup')
    .option('-p, --path <dir>', 'Package directory', '.')
    .option('--backup-dir <path>', `Custom backup directory (default: ${DEFAULT_BACKUP_DIR})`)
    .action(withErrorHandling((options: BackupCommandOptions) => runBackupList(options)));

  program
    .command('backup-restore')
    .description('Restore manifest and catalog files from a previous backup')
    .argument('<timestamp>', 'Backup timestamp (from backup-list) or "latest" for most recent')
    .option('-p, --path <dir>', 'Package directory', '.')
    .option('--backup-dir <path>', `Custom backup directory (default: ${DEFAULT_BACKUP_DIR})`)
    .option('-y, --yes', 'Skip the confirmation prompt', false)
    .action(
      withErrorHandling(async (timestamp: string, options: BackupCommandOptions) => {
        await runBackupRestore(timestamp, options);
      })
    );
}

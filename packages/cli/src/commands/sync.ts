import { Command } from 'commander';
import chalk from 'chalk';
import { promises as fs } from 'fs';
import path from 'path';
import {
  MetadataSyncer,
  MissingAnchorError,
  MissingPreconditionError,
  isMergePriority,
  listPackageDirectories,
  loadAddonPackage,
  loadConfigWithMeta,
  type MergePriority,
  type MetasyncConfig,
  type SyncDirection,
  type SyncSummary,
} from '@metasync/core';
import { CliError, withErrorHandling } from '../utils/errors.js';
import { exitCodeForError, getExitCodeDescription } from '../utils/exit-codes.js';
import { displayPath, printSummary, toJsonReport } from '../utils/output.js';

export interface SyncCommandOptions {
  poToXml?: boolean;
  xmlToPo?: boolean;
  path?: string;
  multipleAddons?: boolean;
  priority?: string;
  dryRun?: boolean;
  diff?: boolean;
  backup?: boolean;
  verbose?: boolean;
  json?: boolean;
  config?: string;
}

export interface PackageFailure {
  root: string;
  message: string;
  exitCode: number;
}

export interface SyncRunResult {
  summaries: SyncSummary[];
  failures: PackageFailure[];
}

export type SyncMode = 'sync' | 'check';

/**
 * One direction flag selects that direction alone; neither or both select
 * the configured direction (`both` unless the config file says otherwise).
 */
export function resolveDirection(options: SyncCommandOptions, fallback: SyncDirection): SyncDirection {
  if (options.poToXml && !options.xmlToPo) {
    return 'catalogs-to-manifest';
  }
  if (options.xmlToPo && !options.poToXml) {
    return 'manifest-to-catalogs';
  }
  if (options.poToXml && options.xmlToPo) {
    return 'both';
  }
  return fallback;
}

export function resolvePriority(value: string | undefined, fallback: MergePriority): MergePriority {
  if (value === undefined) {
    return fallback;
  }
  if (!isMergePriority(value)) {
    throw new CliError(`Invalid --priority "${value}"; expected "catalog" or "manifest".`);
  }
  return value;
}

async function resolveRoot(target: string | undefined): Promise<string> {
  const root = path.resolve(process.cwd(), target ?? '.');
  const stats = await fs.stat(root).catch(() => null);
  if (!stats?.isDirectory()) {
    throw new CliError(`Path ${target ?? '.'} is not a directory.`);
  }
  return root;
}

async function syncPackage(
  root: string,
  config: MetasyncConfig,
  options: SyncCommandOptions,
  mode: SyncMode
): Promise<SyncSummary> {
  const pkg = await loadAddonPackage(root, {
    manifestFile: config.manifestFile,
    catalogGlobs: config.catalogGlobs,
    exclude: config.exclude,
  });

  const syncer = new MetadataSyncer({ referenceLanguage: config.referenceLanguage, priority: config.priority });
  const backupEnabled = Boolean(options.backup || config.backup.enabled);

  return syncer.run(pkg, {
    direction: resolveDirection(options, config.direction),
    priority: resolvePriority(options.priority, config.priority),
    write: mode === 'sync' && !options.dryRun,
    backup: backupEnabled ? { backupDir: config.backup.dir, maxBackups: config.backup.maxBackups } : false,
  });
}

/**
 * Sync (or check) one package, or every package below `--path` with
 * `--multiple-addons`. In multi-package mode a package that cannot be
 * synced is reported and skipped; otherwise its error propagates.
 */
export async function runSync(options: SyncCommandOptions, mode: SyncMode = 'sync'): Promise<SyncRunResult> {
  const root = await resolveRoot(options.path);
  const { config, configPath } = await loadConfigWithMeta(
    options.config ? path.resolve(process.cwd(), options.config) : undefined,
    { cwd: root }
  );
  const quiet = Boolean(options.json);

  if (configPath && !quiet) {
    console.log(chalk.gray(`Using config ${displayPath(configPath)}`));
  }

  const packageRoots = options.multipleAddons ? await listPackageDirectories(root) : [root];
  const result: SyncRunResult = { summaries: [], failures: [] };

  for (const packageRoot of packageRoots) {
    if (!quiet) {
      console.log(chalk.blue(`Running metadata ${mode} on ${displayPath(packageRoot)}`));
    }

    try {
      const summary = await syncPackage(packageRoot, config, options, mode);
      result.summaries.push(summary);
      if (!quiet) {
        printSummary(summary, { verbose: options.verbose, diff: options.diff });
      }
    } catch (error) {
      if (
        !options.multipleAddons ||
        !(error instanceof MissingPreconditionError || error instanceof MissingAnchorError)
      ) {
        throw error;
      }
      const exitCode = exitCodeForError(error);
      result.failures.push({ root: packageRoot, message: error.message, exitCode });
      if (!quiet) {
        console.log(
          chalk.red(`${getExitCodeDescription(exitCode)}: ${error.message}; skipping ${displayPath(packageRoot)}`)
        );
      }
    }
  }

  if (quiet) {
    console.log(
      JSON.stringify({ summaries: result.summaries.map(toJsonReport), failures: result.failures }, null, 2)
    );
  }

  return result;
}

export function countDrift(result: SyncRunResult): number {
  return result.summaries.reduce((total, summary) => total + summary.changes.length, 0);
}

export function addPackageOptions(command: Command): Command {
  return command
    .option('-ptx, --po-to-xml', 'Sync catalog (.po) values into the manifest', false)
    .option('-xtp, --xml-to-po', 'Sync manifest values into the catalogs (.po)', false)
    .option('-p, --path <dir>', 'Package directory (or parent directory with --multiple-addons)', '.')
    .option('-m, --multiple-addons', 'Treat every subdirectory of --path as a package', false)
    .option('--priority <side>', 'Side that wins in the manifest to catalogs pass (catalog or manifest)')
    .option('--diff', 'Display unified diffs for files that change', false)
    .option('--verbose', 'Print the values found in every source', false)
    .option('--json', 'Print raw JSON results', false)
    .option('-c, --config <path>', 'Path to metasync config file');
}

export function registerSync(program: Command) {
  addPackageOptions(
    program
      .command('sync', { isDefault: true })
      .description('Sync summary, description, disclaimer and lifecycle state between addon.xml and its catalogs')
  )
    .option('--dry-run', 'Show what would change without writing files', false)
    .option('--backup', 'Back up files before rewriting them', false)
    .action(
      withErrorHandling(async (options: SyncCommandOptions) => {
        const result = await runSync(options, 'sync');
        if (!options.json && options.multipleAddons && result.failures.length) {
          console.log(chalk.yellow(`Skipped ${result.failures.length} package(s).`));
        }
      })
    );
}

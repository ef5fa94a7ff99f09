/**
 * Backup utility for manifest and catalog files.
 * Copies every file about to be rewritten into a timestamped directory so a
 * sync can be undone.
 */

import fs from 'fs/promises';
import path from 'path';
import { DEFAULT_MAX_BACKUPS } from './config/defaults.js';

export interface BackupOptions {
  /** Directory where backups are stored. Defaults to .metasync-backup */
  backupDir?: string;
  /** Maximum number of backup sets to retain. Defaults to 5 */
  maxBackups?: number;
}

export interface BackupResult {
  timestamp: string;
  /** Full path to the backup directory for this run */
  backupPath: string;
  /** Backed-up files, relative to the package root */
  files: string[];
  summary: string;
}

export interface BackupListing {
  timestamp: string;
  path: string;
  fileCount: number;
  createdAt: string;
}

interface BackupIndex {
  version: number;
  timestamp: string;
  createdAt: string;
  files: Array<{
    originalPath: string;
    backupPath: string;
    size: number;
  }>;
  command?: string;
}

export const DEFAULT_BACKUP_DIR = '.metasync-backup';
const INDEX_VERSION = 1;
const INDEX_FILENAME = 'index.json';

function isBackupIndex(value: unknown): value is BackupIndex {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return (
    'timestamp' in value &&
    typeof value.timestamp === 'string' &&
    'createdAt' in value &&
    typeof value.createdAt === 'string' &&
    'files' in value &&
    Array.isArray(value.files)
  );
}

async function readBackupIndex(backupPath: string): Promise<BackupIndex> {
  const raw = await fs.readFile(path.join(backupPath, INDEX_FILENAME), 'utf8');
  const parsed: unknown = JSON.parse(raw);
  if (!isBackupIndex(parsed)) {
    throw new Error(`Backup index at ${backupPath} is not valid`);
  }
  return parsed;
}

/**
 * Copies the given files (absolute paths under `root`) into a new backup set.
 * Returns null when there is nothing to back up.
 */
export async function createBackup(
  files: readonly string[],
  root: string,
  options: BackupOptions = {},
  command?: string
): Promise<BackupResult | null> {
  if (files.length === 0) {
    return null;
  }

  const backupBaseDir = path.resolve(root, options.backupDir ?? DEFAULT_BACKUP_DIR);
  const maxBackups = options.maxBackups ?? DEFAULT_MAX_BACKUPS;

  const now = new Date();
  const timestamp = formatTimestamp(now);
  const backupPath = path.join(backupBaseDir, timestamp);
  await fs.mkdir(backupPath, { recursive: true });

  const index: BackupIndex = {
    version: INDEX_VERSION,
    timestamp,
    createdAt: now.toISOString(),
    files: [],
    command,
  };

  for (const sourcePath of files) {
    const relativePath = path.relative(root, sourcePath);
    const destPath = path.join(backupPath, relativePath);
    await fs.mkdir(path.dirname(destPath), { recursive: true });
    await fs.copyFile(sourcePath, destPath);

    const stats = await fs.stat(sourcePath);
    index.files.push({
      originalPath: relativePath,
      backupPath: path.relative(backupPath, destPath),
      size: stats.size,
    });
  }

  await fs.writeFile(path.join(backupPath, INDEX_FILENAME), JSON.stringify(index, null, 2));
  await pruneOldBackups(backupBaseDir, maxBackups);

  const relativeFiles = index.files.map((file) => file.originalPath);
  return {
    timestamp,
    backupPath,
    files: relativeFiles,
    summary: `Backed up ${relativeFiles.length} file(s) to ${path.relative(root, backupPath)}`,
  };
}

/**
 * Lists all available backups, newest first.
 */
export async function listBackups(root: string, options: BackupOptions = {}): Promise<BackupListing[]> {
  const backupBaseDir = path.resolve(root, options.backupDir ?? DEFAULT_BACKUP_DIR);

  const entries = await fs.readdir(backupBaseDir, { withFileTypes: true }).catch(() => null);
  if (!entries) {
    return [];
  }

  const backups: BackupListing[] = [];
  for (const entry of entries) {
    if (!entry.isDirectory()) continue;

    const backupPath = path.join(backupBaseDir, entry.name);
    try {
      const index = await readBackupIndex(backupPath);
      backups.push({
        timestamp: index.timestamp,
        path: backupPath,
        fileCount: index.files.length,
        createdAt: index.createdAt,
      });
    } catch {
      // not a backup set
      continue;
    }
  }

  return backups.sort((a, b) => b.timestamp.localeCompare(a.timestamp));
}

/**
 * Copies every file of a backup set back to its original location.
 */
export async function restoreBackup(
  backupPath: string,
  root: string
): Promise<{ restored: string[]; summary: string }> {
  const index = await readBackupIndex(backupPath);
  const restored: string[] = [];

  for (const file of index.files) {
    const sourcePath = path.join(backupPath, file.backupPath);
    const destPath = path.resolve(root, file.originalPath);
    await fs.mkdir(path.dirname(destPath), { recursive: true });
    await fs.copyFile(sourcePath, destPath);
    restored.push(file.originalPath);
  }

  return {
    restored,
    summary: `Restored ${restored.length} file(s) from backup ${index.timestamp}`,
  };
}

async function pruneOldBackups(backupBaseDir: string, maxBackups: number): Promise<void> {
  const entries = await fs.readdir(backupBaseDir, { withFileTypes: true });
  const backupDirs = entries
    .filter((e) => e.isDirectory())
    .map((e) => e.name)
    .sort()
    .reverse();

  for (const dir of backupDirs.slice(maxBackups)) {
    await fs.rm(path.join(backupBaseDir, dir), { recursive: true, force: true });
  }
}

/**
 * YYYYMMDD-HHmmss
 */
function formatTimestamp(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  const hours = String(date.getHours()).padStart(2, '0');
  const minutes = String(date.getMinutes()).padStart(2, '0');
  const seconds = String(date.getSeconds()).padStart(2, '0');
  return `${year}${month}${day}-${hours}${minutes}${seconds}`;
}

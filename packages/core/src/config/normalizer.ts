/**
 * Configuration normalization utilities
 *
 * These functions take raw/unknown input and return properly typed values,
 * applying defaults where necessary.
 */

import type { MergePriority } from '../merge.js';
import type { BackupConfig, MetasyncConfig, RawMetasyncConfig, SyncDirection } from './types.js';
import {
  DEFAULT_CATALOG_GLOBS,
  DEFAULT_DIRECTION,
  DEFAULT_EXCLUDE,
  DEFAULT_MANIFEST_FILE,
  DEFAULT_MAX_BACKUPS,
  DEFAULT_PRIORITY,
  DEFAULT_REFERENCE_LANGUAGE,
} from './defaults.js';
import { DEFAULT_BACKUP_DIR } from '../backup.js';

export const isMergePriority = (value: unknown): value is MergePriority =>
  value === 'catalog' || value === 'manifest';

export const isSyncDirection = (value: unknown): value is SyncDirection =>
  value === 'manifest-to-catalogs' || value === 'catalogs-to-manifest' || value === 'both';

export function ensureStringArray(value: unknown): string[] {
  if (Array.isArray(value)) {
    return value.filter((item): item is string => typeof item === 'string' && item.trim().length > 0);
  }

  if (typeof value === 'string' && value.trim().length > 0) {
    return value
      .split(',')
      .map((token) => token.trim())
      .filter(Boolean);
  }

  return [];
}

export function ensureArray(value: unknown, fallback: string[]): string[] {
  const list = ensureStringArray(value);
  return list.length ? list : [...fallback];
}

function ensureString(value: unknown, fallback: string): string {
  return typeof value === 'string' ? value.trim() : fallback;
}

export function normalizePositiveInteger(value: unknown, fallback: number): number {
  if (typeof value === 'number' && Number.isInteger(value) && value > 0) {
    return value;
  }
  if (typeof value === 'string' && /^\d+$/.test(value.trim())) {
    const parsed = Number.parseInt(value, 10);
    return parsed > 0 ? parsed : fallback;
  }
  return fallback;
}

export function normalizeBackupConfig(value: unknown): BackupConfig {
  if (typeof value === 'boolean') {
    return { enabled: value, dir: DEFAULT_BACKUP_DIR, maxBackups: DEFAULT_MAX_BACKUPS };
  }
  if (typeof value !== 'object' || value === null) {
    return { enabled: false, dir: DEFAULT_BACKUP_DIR, maxBackups: DEFAULT_MAX_BACKUPS };
  }
  return {
    enabled: 'enabled' in value ? value.enabled === true : false,
    dir: 'dir' in value ? ensureString(value.dir, DEFAULT_BACKUP_DIR) : DEFAULT_BACKUP_DIR,
    maxBackups: 'maxBackups' in value ? normalizePositiveInteger(value.maxBackups, DEFAULT_MAX_BACKUPS) : DEFAULT_MAX_BACKUPS,
  };
}

/**
 * Fill in defaults. Unknown enum values fall back to the default here;
 * `validateConfig` reports them from the raw input.
 */
export function normalizeConfig(raw: RawMetasyncConfig): MetasyncConfig {
  const priority = raw.priority ?? DEFAULT_PRIORITY;
  const direction = raw.direction ?? DEFAULT_DIRECTION;

  return {
    manifestFile: ensureString(raw.manifestFile, DEFAULT_MANIFEST_FILE),
    catalogGlobs: ensureArray(raw.catalogGlobs, DEFAULT_CATALOG_GLOBS),
    exclude: raw.exclude === undefined ? [...DEFAULT_EXCLUDE] : ensureStringArray(raw.exclude),
    referenceLanguage: ensureString(raw.referenceLanguage, DEFAULT_REFERENCE_LANGUAGE),
    priority: isMergePriority(priority) ? priority : DEFAULT_PRIORITY,
    direction: isSyncDirection(direction) ? direction : DEFAULT_DIRECTION,
    backup: normalizeBackupConfig(raw.backup),
  };
}

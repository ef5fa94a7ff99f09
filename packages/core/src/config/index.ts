/**
 * Configuration module for metasync
 *
 * This module handles loading, validating, and normalizing configuration files.
 */

export type {
  SyncDirection,
  BackupConfig,
  MetasyncConfig,
  LoadConfigResult,
  RawMetasyncConfig,
} from './types.js';

export {
  DEFAULT_CONFIG_FILENAME,
  DEFAULT_MANIFEST_FILE,
  DEFAULT_CATALOG_GLOBS,
  DEFAULT_EXCLUDE,
  DEFAULT_REFERENCE_LANGUAGE,
  DEFAULT_PRIORITY,
  DEFAULT_DIRECTION,
  DEFAULT_MAX_BACKUPS,
} from './defaults.js';

export {
  isMergePriority,
  isSyncDirection,
  ensureStringArray,
  ensureArray,
  normalizePositiveInteger,
  normalizeBackupConfig,
  normalizeConfig,
} from './normalizer.js';

export {
  ConfigValidationError,
  isLanguageCode,
  validateConfig,
  assertConfigValid,
} from './validator.js';
export type { ConfigValidationIssue } from './validator.js';

export { loadConfigWithMeta } from './loader.js';

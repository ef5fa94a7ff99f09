/**
 * Configuration type definitions for metasync
 */

import type { MergePriority } from '../merge.js';

export type SyncDirection = 'manifest-to-catalogs' | 'catalogs-to-manifest' | 'both';

export interface BackupConfig {
  enabled?: boolean;
  /** Directory (relative to each package root) holding backup sets */
  dir?: string;
  maxBackups?: number;
}

export interface MetasyncConfig {
  /**
   * Manifest filename, relative to the package root (default: 'addon.xml')
   */
  manifestFile: string;
  /**
   * Glob patterns locating catalogs, relative to the package root
   */
  catalogGlobs: string[];
  /**
   * Glob patterns never searched for catalogs
   */
  exclude: string[];
  /**
   * Language every catalog falls back to (default: 'en_GB')
   */
  referenceLanguage: string;
  /**
   * Which side wins in a manifest -> catalogs pass (default: 'catalog')
   */
  priority: MergePriority;
  /**
   * Direction used when the command line names none (default: 'both')
   */
  direction: SyncDirection;
  backup: BackupConfig;
}

export interface LoadConfigResult {
  config: MetasyncConfig;
  /** Resolved config path, or null when running on defaults */
  configPath: string | null;
  found: boolean;
}

export type RawMetasyncConfig = {
  [K in keyof MetasyncConfig]?: unknown;
};

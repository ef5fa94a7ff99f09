/**
 * Default configuration values for metasync
 */

import type { MergePriority } from '../merge.js';
import type { SyncDirection } from './types.js';

export const DEFAULT_CONFIG_FILENAME = 'metasync.config.json';

export const DEFAULT_MANIFEST_FILE = 'addon.xml';

export const DEFAULT_CATALOG_GLOBS = ['**/resource.language.*/*.po'];

export const DEFAULT_EXCLUDE = ['**/node_modules/**', '**/.git/**'];

export const DEFAULT_REFERENCE_LANGUAGE = 'en_GB';

export const DEFAULT_PRIORITY: MergePriority = 'catalog';

export const DEFAULT_DIRECTION: SyncDirection = 'both';

export const DEFAULT_MAX_BACKUPS = 5;

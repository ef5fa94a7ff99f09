import type { MetasyncConfig, RawMetasyncConfig } from './types.js';
import { isMergePriority, isSyncDirection } from './normalizer.js';

export interface ConfigValidationIssue {
  field: string;
  message: string;
}

export class ConfigValidationError extends Error {
  constructor(public readonly issues: ConfigValidationIssue[]) {
    super(
      `Invalid metasync configuration:\n${issues.map((issue) => `• ${issue.field}: ${issue.message}`).join('\n')}`
    );
    this.name = 'ConfigValidationError';
  }
}

function containsControlCharacters(value: string): boolean {
  for (let index = 0; index < value.length; index += 1) {
    const code = value.charCodeAt(index);
    if (code < 0x20 || code === 0x7f) {
      return true;
    }
  }
  return false;
}

const LANGUAGE_CODE_PATTERN = /^[a-z]{2,3}(?:_[A-Z]{2}[A-Za-z0-9]*)?(?:@[A-Za-z0-9]+)?$/;
const MAX_PATH_LIKE_LENGTH = 320;
const MAX_GLOB_LENGTH = 512;

export function isLanguageCode(value: string): boolean {
  return LANGUAGE_CODE_PATTERN.test(value);
}

function validatePathLike(field: string, value: string, issues: ConfigValidationIssue[]) {
  if (!value.trim()) {
    issues.push({ field, message: 'must not be empty' });
    return;
  }
  if (value.length > MAX_PATH_LIKE_LENGTH) {
    issues.push({ field, message: `must be shorter than ${MAX_PATH_LIKE_LENGTH} characters` });
    return;
  }
  if (containsControlCharacters(value)) {
    issues.push({ field, message: 'contains control characters' });
  }
}

function validateStringList(field: string, values: string[], issues: ConfigValidationIssue[]) {
  values.forEach((entry, index) => {
    const targetField = `${field}[${index}]`;
    if (entry.length > MAX_GLOB_LENGTH) {
      issues.push({ field: targetField, message: `must be shorter than ${MAX_GLOB_LENGTH} characters` });
      return;
    }
    if (containsControlCharacters(entry)) {
      issues.push({ field: targetField, message: 'contains control characters' });
    }
  });
}

export function validateConfig(config: MetasyncConfig, raw: RawMetasyncConfig = {}): ConfigValidationIssue[] {
  const issues: ConfigValidationIssue[] = [];

  validatePathLike('manifestFile', config.manifestFile, issues);
  if (config.manifestFile.includes('/') || config.manifestFile.includes('\\')) {
    issues.push({ field: 'manifestFile', message: 'must be a file name inside the package root' });
  }

  if (!isLanguageCode(config.referenceLanguage)) {
    issues.push({
      field: 'referenceLanguage',
      message: 'must be a language code such as "en_GB" or "fr"',
    });
  }

  if (raw.priority !== undefined && !isMergePriority(raw.priority)) {
    issues.push({ field: 'priority', message: 'must be "catalog" or "manifest"' });
  }
  if (raw.direction !== undefined && !isSyncDirection(raw.direction)) {
    issues.push({
      field: 'direction',
      message: 'must be "manifest-to-catalogs", "catalogs-to-manifest" or "both"',
    });
  }

  if (!config.catalogGlobs.length) {
    issues.push({ field: 'catalogGlobs', message: 'must list at least one pattern' });
  }
  validateStringList('catalogGlobs', config.catalogGlobs, issues);
  validateStringList('exclude', config.exclude, issues);

  if (config.backup.dir !== undefined) {
    validatePathLike('backup.dir', config.backup.dir, issues);
  }

  return issues;
}

export function assertConfigValid(config: MetasyncConfig, raw: RawMetasyncConfig = {}): void {
  const issues = validateConfig(config, raw);
  if (!issues.length) {
    return;
  }
  throw new ConfigValidationError(issues);
}

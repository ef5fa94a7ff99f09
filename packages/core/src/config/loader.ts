/**
 * Configuration file loading utilities
 */

import fs from 'fs/promises';
import path from 'path';
import type { LoadConfigResult, RawMetasyncConfig } from './types.js';
import { normalizeConfig } from './normalizer.js';
import { assertConfigValid } from './validator.js';
import { DEFAULT_CONFIG_FILENAME } from './defaults.js';

// ─────────────────────────────────────────────────────────────────────────────
// File System Utilities
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Search upward through directories for a file.
 */
async function findUp(filename: string, cwd: string): Promise<string | null> {
  let currentDir = cwd;
  const maxDepth = 10; // Prevent infinite loops

  for (let depth = 0; depth < maxDepth; depth++) {
    const filePath = path.join(currentDir, filename);
    try {
      await fs.access(filePath);
      return filePath;
    } catch {
      // continue
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }

  return null;
}

// ─────────────────────────────────────────────────────────────────────────────
// Config Loading
// ─────────────────────────────────────────────────────────────────────────────

async function readConfigFile(resolvedPath: string): Promise<RawMetasyncConfig> {
  let fileContents: string;

  try {
    fileContents = await fs.readFile(resolvedPath, 'utf-8');
  } catch (error: unknown) {
    if (error && typeof error === 'object' && 'code' in error && error.code === 'ENOENT') {
      throw new Error(`Config file not found at ${resolvedPath}.`);
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Unable to read config file at ${resolvedPath}: ${message}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fileContents);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Config file at ${resolvedPath} contains invalid JSON: ${message}`);
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error(`Config file at ${resolvedPath} must contain a JSON object.`);
  }
  return parsed;
}

/**
 * Load the config file. An explicitly named file must exist; the default
 * file is searched for upward from `cwd` and defaults apply when none is
 * found.
 */
export async function loadConfigWithMeta(
  configPath?: string,
  options?: { cwd?: string }
): Promise<LoadConfigResult> {
  const cwd = options?.cwd ?? process.cwd();

  let resolvedPath: string | null;
  if (configPath) {
    resolvedPath = path.resolve(cwd, configPath);
  } else {
    resolvedPath = await findUp(DEFAULT_CONFIG_FILENAME, cwd);
  }

  const raw: RawMetasyncConfig = resolvedPath ? await readConfigFile(resolvedPath) : {};
  const config = normalizeConfig(raw);
  assertConfigValid(config, raw);

  return {
    config,
    configPath: resolvedPath,
    found: resolvedPath !== null,
  };
}

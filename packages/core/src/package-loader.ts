import fs from 'fs/promises';
import path from 'path';
import fg from 'fast-glob';
import {
  createCatalogDocument,
  createManifestDocument,
  type AddonPackage,
  type CatalogDocument,
} from './documents.js';
import { MissingPreconditionError } from './errors.js';
import { languageCodeFromPath } from './language.js';
import { DEFAULT_CATALOG_GLOBS, DEFAULT_EXCLUDE, DEFAULT_MANIFEST_FILE } from './config/defaults.js';

export interface PackageLoadOptions {
  manifestFile?: string;
  catalogGlobs?: string[];
  exclude?: string[];
}

async function readText(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, 'utf8');
  } catch (error: unknown) {
    if (error && typeof error === 'object' && 'code' in error && (error.code === 'ENOENT' || error.code === 'EISDIR')) {
      return null;
    }
    throw error;
  }
}

export async function findCatalogFiles(root: string, options: PackageLoadOptions = {}): Promise<string[]> {
  const files = await fg(options.catalogGlobs ?? DEFAULT_CATALOG_GLOBS, {
    cwd: root,
    absolute: true,
    onlyFiles: true,
    ignore: options.exclude ?? DEFAULT_EXCLUDE,
  });
  return files.sort();
}

/**
 * Read the manifest and every catalog of the package rooted at `root`.
 * Catalogs whose directory carries no language code are ignored.
 */
export async function loadAddonPackage(root: string, options: PackageLoadOptions = {}): Promise<AddonPackage> {
  const manifestPath = path.join(root, options.manifestFile ?? DEFAULT_MANIFEST_FILE);
  const manifestContent = await readText(manifestPath);
  if (manifestContent === null) {
    throw new MissingPreconditionError(
      'missing-manifest',
      `No ${path.basename(manifestPath)} file found in ${root}`,
      root
    );
  }

  const catalogs: CatalogDocument[] = [];
  for (const filePath of await findCatalogFiles(root, options)) {
    const languageCode = languageCodeFromPath(path.relative(root, filePath));
    if (!languageCode) {
      continue;
    }
    const content = await fs.readFile(filePath, 'utf8');
    catalogs.push(createCatalogDocument(filePath, content, languageCode));
  }

  return {
    root,
    manifest: createManifestDocument(manifestPath, manifestContent),
    catalogs,
  };
}

/**
 * Write a document's line sequence through a temp file and rename, so a
 * failed write never leaves a half-written file behind.
 */
export async function writeDocument(filePath: string, lines: readonly string[]): Promise<void> {
  const tempPath = `${filePath}.${process.pid}.${Date.now()}.tmp`;
  await fs.writeFile(tempPath, lines.join(''), 'utf8');
  try {
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}

/**
 * Immediate subdirectories of `root`, each treated as one package.
 */
export async function listPackageDirectories(root: string): Promise<string[]> {
  const entries = await fs.readdir(root, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isDirectory() && !entry.name.startsWith('.') && entry.name !== 'node_modules')
    .map((entry) => path.join(root, entry.name))
    .sort();
}

/**
 * In-memory representations of the manifest and the catalogs.
 *
 * Line sequences keep each line's terminator, so joining them reproduces the
 * file byte for byte. Documents are never patched in place; regenerators
 * hand back a new document.
 */

export interface TextDocument {
  readonly path: string;
  readonly content: string;
  readonly lines: readonly string[];
}

export type ManifestDocument = TextDocument;

export interface CatalogDocument extends TextDocument {
  readonly languageCode: string;
}

export interface AddonPackage {
  /** Directory holding the manifest */
  root: string;
  manifest: ManifestDocument;
  catalogs: CatalogDocument[];
}

export function splitLines(content: string): string[] {
  if (!content) {
    return [];
  }
  const lines = content.match(/[^\n]*\n|[^\n]+$/g);
  return lines ?? [];
}

export function createManifestDocument(filePath: string, content: string): ManifestDocument {
  return { path: filePath, content, lines: splitLines(content) };
}

export function createCatalogDocument(
  filePath: string,
  content: string,
  languageCode: string
): CatalogDocument {
  return { path: filePath, content, lines: splitLines(content), languageCode };
}

export function withLines<T extends TextDocument>(document: T, lines: readonly string[]): T {
  return { ...document, lines: [...lines], content: lines.join('') };
}

export function sameLines(a: readonly string[], b: readonly string[]): boolean {
  if (a.length !== b.length) {
    return false;
  }
  return a.every((line, index) => line === b[index]);
}

export function isBlankLine(line: string): boolean {
  return line.trim().length === 0;
}

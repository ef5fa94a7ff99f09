import { sameLines, withLines, type ManifestDocument } from './documents.js';
import { MissingAnchorError } from './errors.js';
import { FIELD_DEFINITIONS, FIELD_ORDER, type FieldKind } from './fields.js';
import { isSingleLineElement } from './manifest-extractor.js';
import type { MetadataItem } from './merge.js';

const METADATA_EXTENSION = /<extension\s+point=["']xbmc\.addon\.metadata["']\s*>/;
const EXTENSION_CLOSE = '</extension>';

export interface ManifestRegenerateOptions {
  whitespace: string;
  lifecycleType?: string;
}

export interface ManifestRegenerateResult {
  document: ManifestDocument;
  changed: boolean;
  insertIndex: number;
}

export function findMetadataExtensionLine(lines: readonly string[]): number {
  return lines.findIndex((line) => METADATA_EXTENSION.test(line));
}

/**
 * Line index at which generated metadata lines are spliced in: just before
 * the closing tag of the metadata extension, or right after its opening
 * tag when it never closes.
 */
export function findManifestInsertIndex(lines: readonly string[], filePath = 'manifest'): number {
  const opening = findMetadataExtensionLine(lines);
  if (opening === -1) {
    throw new MissingAnchorError(filePath);
  }

  for (let index = opening + 1; index < lines.length; index += 1) {
    if (lines[index].includes(EXTENSION_CLOSE)) {
      return index;
    }
  }
  return opening + 1;
}

export function isManagedManifestLine(line: string, kinds: readonly FieldKind[]): boolean {
  return kinds.some((kind) => isSingleLineElement(line, kind));
}

export function stripManifestFields(lines: readonly string[], kinds: readonly FieldKind[]): string[] {
  return lines.filter((line) => !isManagedManifestLine(line, kinds));
}

export function renderManifestLines(
  kind: FieldKind,
  items: readonly MetadataItem[],
  whitespace: string,
  lifecycleType?: string
): string[] {
  const element = FIELD_DEFINITIONS[kind].element;

  if (kind === 'lifecyclestate') {
    const typeAttribute = lifecycleType !== undefined ? ` type="${lifecycleType}"` : '';
    return items
      .filter((item) => item.text.length > 0)
      .map(
        (item) =>
          `${whitespace}<${element}${typeAttribute} lang="${item.languageCode}">${item.text}</${element}>\n`
      );
  }

  return items.map(
    (item) => `${whitespace}<${element} lang="${item.languageCode}">${item.text}</${element}>\n`
  );
}

/**
 * Replace every managed line of the given fields with freshly rendered ones.
 * `fields` holds the final, escaped and sorted values per field; fields
 * absent from it are neither stripped nor rendered.
 */
export function regenerateManifest(
  document: ManifestDocument,
  fields: Partial<Record<FieldKind, readonly MetadataItem[]>>,
  options: ManifestRegenerateOptions
): ManifestRegenerateResult {
  const kinds = FIELD_ORDER.filter((kind) => fields[kind] !== undefined);
  const stripped = stripManifestFields(document.lines, kinds);
  const insertIndex = findManifestInsertIndex(stripped, document.path);

  const rendered = kinds.flatMap((kind) =>
    renderManifestLines(kind, fields[kind] ?? [], options.whitespace, options.lifecycleType)
  );

  const lines = [...stripped.slice(0, insertIndex), ...rendered, ...stripped.slice(insertIndex)];
  const changed = !sameLines(lines, document.lines);

  return {
    document: changed ? withLines(document, lines) : document,
    changed,
    insertIndex,
  };
}

import type { CatalogDocument } from './documents.js';
import { contextLine, type FieldKind } from './fields.js';
import { isReferenceLanguage, REFERENCE_LANGUAGE } from './language.js';
import type { MetadataItem } from './merge.js';

export interface CatalogFieldReport {
  items: MetadataItem[];
  /** Whether the reference-language catalog defines the field */
  hasReference: boolean;
}

const ESCAPED_QUOTE_MARKER = '\u0000dq\u0000';

/**
 * Collapse captured string-literal fragments into one logical value:
 * join continuation lines, drop line breaks and the literal delimiters,
 * keep escaped quotes escaped.
 */
export function cleanCatalogString(raw: string): string {
  return raw
    .replace(/"\r?\n"/g, '')
    .replace(/\r?\n/g, '')
    .split('\\"')
    .join(ESCAPED_QUOTE_MARKER)
    .replace(/"/g, '')
    .split(ESCAPED_QUOTE_MARKER)
    .join('\\"');
}

/**
 * Raw text of a catalog entry for the field. The reference catalog yields
 * the source string (`msgid`), every other catalog its translation
 * (`msgstr`).
 */
export function readCatalogEntry(
  catalog: CatalogDocument,
  kind: FieldKind,
  reference = REFERENCE_LANGUAGE
): string | undefined {
  const target = contextLine(kind);
  const start = catalog.lines.findIndex((line) => line.startsWith(target));
  if (start === -1) {
    return undefined;
  }

  const keyword = isReferenceLanguage(catalog.languageCode, reference) ? 'msgid ' : 'msgstr ';
  let captured = '';
  let capturing = false;

  for (const line of catalog.lines.slice(start + 1)) {
    if (!capturing) {
      if (!line.trim()) {
        break;
      }
      if (line.startsWith(keyword)) {
        capturing = true;
        captured += line.slice(keyword.length);
      }
      continue;
    }

    if (!line.startsWith('"')) {
      break;
    }
    captured += line;
  }

  const text = cleanCatalogString(captured);
  return text ? text : undefined;
}

export function extractCatalogFieldWithReport(
  catalogs: readonly CatalogDocument[],
  kind: FieldKind,
  reference = REFERENCE_LANGUAGE
): CatalogFieldReport {
  const items: MetadataItem[] = [];
  let hasReference = false;

  for (const catalog of catalogs) {
    const text = readCatalogEntry(catalog, kind, reference);
    if (text === undefined) {
      continue;
    }
    if (isReferenceLanguage(catalog.languageCode, reference)) {
      hasReference = true;
    }
    items.push({ languageCode: catalog.languageCode, text });
  }

  return { items, hasReference };
}

export function extractCatalogField(
  catalogs: readonly CatalogDocument[],
  kind: FieldKind,
  reference = REFERENCE_LANGUAGE
): MetadataItem[] {
  return extractCatalogFieldWithReport(catalogs, kind, reference).items;
}

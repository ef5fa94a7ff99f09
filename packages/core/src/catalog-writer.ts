import { isBlankLine, sameLines, withLines, type CatalogDocument } from './documents.js';
import { contextLine, FIELD_DEFINITIONS, type FieldKind } from './fields.js';
import { REFERENCE_LANGUAGE } from './language.js';
import { findItem, type MetadataItem } from './merge.js';

export interface CatalogBlock {
  kind: FieldKind;
  languageCode: string;
  /** Context, source, translation and blank separator, each newline-terminated */
  lines: string[];
}

export interface CatalogRegenerateResult {
  document: CatalogDocument;
  changed: boolean;
  /** No insertion anchor was found; the catalog was left as it was */
  skipped: boolean;
}

/**
 * One block per language. Every block carries the reference text as its
 * source string; nothing is rendered when the reference value is missing.
 */
export function renderCatalogBlocks(
  kind: FieldKind,
  items: readonly MetadataItem[],
  reference = REFERENCE_LANGUAGE
): CatalogBlock[] {
  const source = findItem(items, reference);
  if (!source) {
    return [];
  }

  return items.map((item) => ({
    kind,
    languageCode: item.languageCode,
    lines: [
      `${contextLine(kind)}\n`,
      `msgid "${source.text}"\n`,
      `msgstr "${item.languageCode === reference ? '' : item.text}"\n`,
      '\n',
    ],
  }));
}

export function groupBlocksByLanguage(blocks: readonly CatalogBlock[]): Map<string, CatalogBlock[]> {
  const grouped = new Map<string, CatalogBlock[]>();
  for (const block of blocks) {
    const list = grouped.get(block.languageCode) ?? [];
    list.push(block);
    grouped.set(block.languageCode, list);
  }
  return grouped;
}

/**
 * Blocks to write into the catalog of one language: its own block for each
 * rendered field, or the reference block (untranslated) where it has none.
 */
export function blocksForCatalog(
  grouped: ReadonlyMap<string, readonly CatalogBlock[]>,
  languageCode: string,
  reference = REFERENCE_LANGUAGE
): CatalogBlock[] {
  const referenceBlocks = grouped.get(reference) ?? [];
  const own = grouped.get(languageCode) ?? [];
  return referenceBlocks.map((fallback) => own.find((block) => block.kind === fallback.kind) ?? fallback);
}

type StripState = 'outside' | 'context' | 'source' | 'translation';

/**
 * Remove every entry of the given fields. An entry runs from its context
 * line through its translation and continuation lines, plus one trailing
 * blank line; everything else is kept verbatim.
 */
export function stripCatalogEntries(lines: readonly string[], kinds: readonly FieldKind[]): string[] {
  const targets = kinds.map(contextLine);
  const isTarget = (line: string) => targets.some((target) => line.startsWith(target));
  const kept: string[] = [];
  let state: StripState = 'outside';

  for (const line of lines) {
    if (state === 'outside') {
      if (isTarget(line)) {
        state = 'context';
      } else {
        kept.push(line);
      }
      continue;
    }

    if (state === 'context' || state === 'source') {
      if (isBlankLine(line)) {
        // malformed entry; it ends here
        state = 'outside';
      } else if (state === 'context' && line.startsWith('msgid ')) {
        state = 'source';
      } else if (state === 'source' && line.startsWith('msgstr ')) {
        state = 'translation';
      }
      continue;
    }

    if (isBlankLine(line)) {
      state = 'outside';
      continue;
    }
    if (line.startsWith('"')) {
      continue;
    }

    if (isTarget(line)) {
      state = 'context';
      continue;
    }
    state = 'outside';
    kept.push(line);
  }

  return kept;
}

/**
 * Insertion point: right after the first `msgstr ""` entry (normally the
 * header) and its continuation lines, past the blank line that closes it.
 * Returns -1 when the catalog has no such entry.
 */
export function findCatalogInsertIndex(lines: readonly string[]): number {
  const header = lines.findIndex((line) => /^msgstr ""\s*$/.test(line));
  if (header === -1) {
    return -1;
  }

  let index = header + 1;
  while (index < lines.length && lines[index].startsWith('"')) {
    index += 1;
  }

  if (index < lines.length && isBlankLine(lines[index])) {
    return index + 1;
  }
  return index;
}

export function formatCatalogBlocks(blocks: readonly CatalogBlock[]): string[] {
  return [...blocks]
    .sort((a, b) => FIELD_DEFINITIONS[a.kind].order - FIELD_DEFINITIONS[b.kind].order)
    .flatMap((block) => block.lines);
}

function terminate(line: string): string {
  return line.endsWith('\n') ? line : `${line}\n`;
}

export function finalizeCatalogLines(lines: readonly string[]): string[] {
  const result = [...lines];
  while (result.length && isBlankLine(result[result.length - 1])) {
    result.pop();
  }
  if (result.length) {
    result[result.length - 1] = terminate(result[result.length - 1]);
  }
  return result;
}

/**
 * Replace the managed entries of a catalog with the given blocks. Fields
 * without a block are left exactly where and as they are.
 */
export function regenerateCatalog(
  document: CatalogDocument,
  blocks: readonly CatalogBlock[]
): CatalogRegenerateResult {
  if (!blocks.length) {
    return { document, changed: false, skipped: false };
  }

  const kinds = [...new Set(blocks.map((block) => block.kind))];
  const stripped = stripCatalogEntries(document.lines, kinds);
  const insertIndex = findCatalogInsertIndex(stripped);
  if (insertIndex < 0) {
    return { document, changed: false, skipped: true };
  }

  const before = stripped.slice(0, insertIndex);
  if (before.length && !isBlankLine(before[before.length - 1])) {
    before[before.length - 1] = terminate(before[before.length - 1]);
    before.push('\n');
  }

  const lines = finalizeCatalogLines([...before, ...formatCatalogBlocks(blocks), ...stripped.slice(insertIndex)]);
  const changed = !sameLines(lines, document.lines);

  return {
    document: changed ? withLines(document, lines) : document,
    changed,
    skipped: false,
  };
}

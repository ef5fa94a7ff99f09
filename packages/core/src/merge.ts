import { compareLanguageCodes, REFERENCE_LANGUAGE } from './language.js';

/** One language's value of a field */
export interface MetadataItem {
  languageCode: string;
  text: string;
}

/**
 * Which side wins when both the manifest and the catalogs define a value
 * for the same language.
 */
export type MergePriority = 'catalog' | 'manifest';

export const DEFAULT_MERGE_PRIORITY: MergePriority = 'catalog';

/**
 * Left-biased union keyed by language code: every primary item in order,
 * then the secondary items whose language the primary side lacks.
 */
export function mergeItems(primary: readonly MetadataItem[], secondary: readonly MetadataItem[]): MetadataItem[] {
  const merged = [...primary];
  const seen = new Set(primary.map((item) => item.languageCode));

  for (const item of secondary) {
    if (seen.has(item.languageCode)) {
      continue;
    }
    seen.add(item.languageCode);
    merged.push(item);
  }

  return merged;
}

export function mergeField(
  manifestItems: readonly MetadataItem[],
  catalogItems: readonly MetadataItem[],
  priority: MergePriority
): MetadataItem[] {
  return priority === 'manifest'
    ? mergeItems(manifestItems, catalogItems)
    : mergeItems(catalogItems, manifestItems);
}

export function sortItems(items: readonly MetadataItem[], reference = REFERENCE_LANGUAGE): MetadataItem[] {
  return [...items].sort((a, b) => compareLanguageCodes(a.languageCode, b.languageCode, reference));
}

export function findItem(items: readonly MetadataItem[], languageCode: string): MetadataItem | undefined {
  return items.find((item) => item.languageCode === languageCode);
}

import type { ManifestDocument } from './documents.js';
import { FIELD_DEFINITIONS, type FieldKind } from './fields.js';
import type { MetadataItem } from './merge.js';

export interface ManifestFieldEntry {
  whitespace: string;
  languageCode: string;
  body: string;
  /** Zero-based line number */
  line: number;
  /** Only set on lifecycle-state entries that carry one */
  type?: string;
}

const ATTRIBUTE_VALUE = `["']([^"']*)["']`;
const LANG_ATTRIBUTE = new RegExp(`\\blang=${ATTRIBUTE_VALUE}`);
const TYPE_ATTRIBUTE = new RegExp(`\\btype=${ATTRIBUTE_VALUE}`);

/**
 * Attribute names tolerated inside an opening tag. Anything else means the
 * line is not one of ours.
 */
const ALLOWED_ATTRIBUTES: Record<FieldKind, readonly string[]> = {
  summary: ['lang'],
  description: ['lang'],
  disclaimer: ['lang'],
  lifecyclestate: ['lang', 'type'],
};

const METADATA_WHITESPACE = new RegExp(
  '^([ \\t]*)<(?:news|assets|platform|license|source|forum|reuselanguageinvoker)>' +
    '[^<]*(?:</(?:news|assets|platform|license|source|forum|reuselanguageinvoker)>)?\\s*$'
);

const WHITESPACE_SOURCE_ORDER: readonly FieldKind[] = ['description', 'disclaimer', 'summary', 'lifecyclestate'];

const elementPatterns = new Map<FieldKind, RegExp>();

function elementPattern(kind: FieldKind): RegExp {
  let pattern = elementPatterns.get(kind);
  if (!pattern) {
    const element = FIELD_DEFINITIONS[kind].element;
    pattern = new RegExp(`^([ \\t]*)<${element}((?:\\s+[A-Za-z]+=["'][^"']*["'])+)\\s*>([^<]+?)</${element}>`);
    elementPatterns.set(kind, pattern);
  }
  return pattern;
}

function openingTagPattern(kind: FieldKind): RegExp {
  return new RegExp(`<${FIELD_DEFINITIONS[kind].element}\\s[^>]*\\blang=`);
}

/**
 * True for any element of the kind that carries `lang` and closes on the
 * same line, whatever its body, attributes or trailing content. These lines
 * are replaced on regeneration.
 */
export function isSingleLineElement(line: string, kind: FieldKind): boolean {
  return openingTagPattern(kind).test(line) && line.includes(`</${FIELD_DEFINITIONS[kind].element}>`);
}

function attributeNames(attributes: string): string[] {
  return Array.from(attributes.matchAll(/([A-Za-z]+)=/g), (match) => match[1]);
}

/**
 * Match a single manifest line against the element of a field kind.
 * Only complete one-line elements with a `lang` attribute qualify.
 */
export function matchManifestLine(line: string, kind: FieldKind): Omit<ManifestFieldEntry, 'line'> | null {
  const match = elementPattern(kind).exec(line);
  if (!match) {
    return null;
  }

  const [, whitespace, attributes, body] = match;
  const names = attributeNames(attributes);
  const allowed = ALLOWED_ATTRIBUTES[kind];
  if (!names.every((name) => allowed.includes(name))) {
    return null;
  }

  const lang = LANG_ATTRIBUTE.exec(attributes);
  if (!lang || !lang[1]) {
    return null;
  }

  const entry: Omit<ManifestFieldEntry, 'line'> = { whitespace, languageCode: lang[1], body };
  const type = TYPE_ATTRIBUTE.exec(attributes);
  if (kind === 'lifecyclestate' && type) {
    entry.type = type[1];
  }
  return entry;
}

/**
 * All single-line elements of a field kind, in document order.
 */
export function extractManifestField(document: ManifestDocument, kind: FieldKind): ManifestFieldEntry[] {
  const entries: ManifestFieldEntry[] = [];
  document.lines.forEach((line, index) => {
    const entry = matchManifestLine(line, kind);
    if (entry) {
      entries.push({ ...entry, line: index });
    }
  });
  return entries;
}

export function toMetadataItems(entries: readonly ManifestFieldEntry[]): MetadataItem[] {
  return entries.map((entry) => ({ languageCode: entry.languageCode, text: entry.body }));
}

const LIFECYCLE_LINE = /^[ \t]*<lifecyclestate[\s>]/;

export function hasLifecycleState(document: ManifestDocument): boolean {
  return document.lines.some((line) => LIFECYCLE_LINE.test(line));
}

/**
 * Package-wide lifecycle type; the first element carrying one wins.
 */
export function extractLifecycleType(document: ManifestDocument): string | undefined {
  for (const line of document.lines) {
    if (!LIFECYCLE_LINE.test(line)) {
      continue;
    }
    const openingTag = /<lifecyclestate([^>]*)>/.exec(line);
    const type = openingTag ? TYPE_ATTRIBUTE.exec(openingTag[1]) : null;
    if (type) {
      return type[1];
    }
  }
  return undefined;
}

/**
 * Line numbers of elements whose opening tag is present but whose body does
 * not close on the same line. These are left untouched by the regenerator.
 */
export function findMultilineElements(document: ManifestDocument, kind: FieldKind): number[] {
  const opening = openingTagPattern(kind);
  const closing = `</${FIELD_DEFINITIONS[kind].element}>`;
  const lines: number[] = [];

  document.lines.forEach((line, index) => {
    if (opening.test(line) && !line.includes(closing)) {
      lines.push(index);
    }
  });

  return lines;
}

/**
 * Indentation for generated manifest lines, copied from the first existing
 * metadata line so new lines line up with the old ones.
 */
export function resolveWhitespace(
  document: ManifestDocument,
  entries: Partial<Record<FieldKind, readonly ManifestFieldEntry[]>>,
  anchorLine?: string
): string {
  for (const kind of WHITESPACE_SOURCE_ORDER) {
    const first = entries[kind]?.[0];
    if (first) {
      return first.whitespace;
    }
  }

  for (const line of document.lines) {
    const match = METADATA_WHITESPACE.exec(line);
    if (match) {
      return match[1];
    }
  }

  const anchorIndent = anchorLine ? /^[ \t]*/.exec(anchorLine)?.[0] ?? '' : '';
  return `${anchorIndent}    `;
}

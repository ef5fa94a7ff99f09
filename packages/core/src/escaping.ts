/**
 * Conversions between the manifest's inline-markup escaping and the
 * catalog's string-literal escaping.
 */

const QUOTE_ENTITY = /&quot;/g;
const BACKSLASH_QUOTE = /\\"/g;
const BARE_AMPERSAND = /&(?![A-Za-z][A-Za-z0-9]*;|#[0-9]+;|#[xX][0-9A-Fa-f]+;)/g;

/**
 * Manifest text to catalog text. Only the quote entity is rewritten; the
 * catalog keeps every other entity as it is.
 */
export function toCatalogText(text: string): string {
  return text.replace(QUOTE_ENTITY, '\\"');
}

/**
 * Catalog (or raw) text to manifest text. Existing entities are left alone,
 * so text that is already escaped comes back unchanged.
 */
export function toManifestText(text: string): string {
  return text
    .replace(BACKSLASH_QUOTE, '"')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(BARE_AMPERSAND, '&amp;');
}

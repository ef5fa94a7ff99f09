export const REFERENCE_LANGUAGE = 'en_GB';

const CATALOG_DIRECTORY_PATTERN = /resource\.language\.([a-z]{2,3}(?:_[A-Za-z]{2})?(?:@[^\s/\\]+)?)/;

/**
 * Resolve the language code encoded in a catalog path
 * (`resource.language.de_de/strings.po` -> `de_DE`).
 * Returns an empty string when the path carries no code.
 */
export function languageCodeFromPath(filePath: string): string {
  const match = CATALOG_DIRECTORY_PATTERN.exec(filePath);
  if (!match) {
    return '';
  }
  return normalizeLanguageCode(match[1]);
}

/**
 * Upper-case the first two letters of the region; anything after them
 * (such as an `@variant` suffix) is kept as written.
 */
export function normalizeLanguageCode(code: string): string {
  const separator = code.indexOf('_');
  if (separator === -1) {
    return code;
  }
  const language = code.slice(0, separator);
  const region = code.slice(separator + 1);
  return `${language}_${region.slice(0, 2).toUpperCase()}${region.slice(2)}`;
}

export function isReferenceLanguage(code: string, reference = REFERENCE_LANGUAGE): boolean {
  return normalizeLanguageCode(code) === normalizeLanguageCode(reference);
}

/** Reference language first, then code-point order */
export function compareLanguageCodes(a: string, b: string, reference = REFERENCE_LANGUAGE): number {
  const aIsReference = a === reference;
  const bIsReference = b === reference;
  if (aIsReference !== bIsReference) {
    return aIsReference ? -1 : 1;
  }
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}

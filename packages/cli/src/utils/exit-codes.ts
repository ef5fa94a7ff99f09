/**
 * Exit Code Reference for the metasync CLI
 *
 * | Code | Meaning                                              |
 * |------|------------------------------------------------------|
 * | 0    | Success (also multi-package runs that skipped some)  |
 * | 1    | Unexpected error, invalid options or configuration   |
 * | 2    | No manifest in the package root                      |
 * | 3    | No catalogs found                                    |
 * | 4    | No reference-language catalog                        |
 * | 5    | Manifest has no metadata extension                   |
 * | 10   | `check` found files that a sync would change         |
 *
 * ## Usage in CI/CD
 *
 * ```bash
 * npx metasync check -p plugin.video.example
 * if [ $? -eq 10 ]; then
 *   echo "addon.xml and the catalogs are out of sync"
 * fi
 * ```
 */

import { MissingAnchorError, MissingPreconditionError, type MissingPreconditionReason } from '@metasync/core';

export const GENERAL_EXIT_CODES = {
  SUCCESS: 0,
  /** General error (catch-all for exceptions) */
  ERROR: 1,
} as const;

export const PRECONDITION_EXIT_CODES = {
  MISSING_MANIFEST: 2,
  MISSING_CATALOGS: 3,
  MISSING_REFERENCE_CATALOG: 4,
  MISSING_ANCHOR: 5,
} as const;

export const CHECK_EXIT_CODES = {
  /** At least one file would change */
  DRIFT: 10,
} as const;

const REASON_EXIT_CODES: Record<MissingPreconditionReason, number> = {
  'missing-manifest': PRECONDITION_EXIT_CODES.MISSING_MANIFEST,
  'missing-catalogs': PRECONDITION_EXIT_CODES.MISSING_CATALOGS,
  'missing-reference-catalog': PRECONDITION_EXIT_CODES.MISSING_REFERENCE_CATALOG,
};

export const EXIT_CODE_DESCRIPTIONS: Record<number, string> = {
  [GENERAL_EXIT_CODES.SUCCESS]: 'Success',
  [GENERAL_EXIT_CODES.ERROR]: 'General error',
  [PRECONDITION_EXIT_CODES.MISSING_MANIFEST]: 'Manifest not found',
  [PRECONDITION_EXIT_CODES.MISSING_CATALOGS]: 'No catalogs found',
  [PRECONDITION_EXIT_CODES.MISSING_REFERENCE_CATALOG]: 'Reference-language catalog not found',
  [PRECONDITION_EXIT_CODES.MISSING_ANCHOR]: 'Manifest has no metadata extension',
  [CHECK_EXIT_CODES.DRIFT]: 'Metadata drift detected',
};

export function getExitCodeDescription(code: number): string {
  return EXIT_CODE_DESCRIPTIONS[code] ?? `Unknown exit code: ${code}`;
}

/**
 * Exit code for an error raised by the core while syncing a package.
 */
export function exitCodeForError(error: unknown): number {
  if (error instanceof MissingPreconditionError) {
    return REASON_EXIT_CODES[error.reason];
  }
  if (error instanceof MissingAnchorError) {
    return PRECONDITION_EXIT_CODES.MISSING_ANCHOR;
  }
  return GENERAL_EXIT_CODES.ERROR;
}

export class SyncError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SyncError';
  }
}

export type MissingPreconditionReason =
  | 'missing-manifest'
  | 'missing-catalogs'
  | 'missing-reference-catalog';

/**
 * A package cannot be synced at all: its manifest, its catalogs or its
 * reference-language catalog are missing.
 */
export class MissingPreconditionError extends SyncError {
  constructor(
    public readonly reason: MissingPreconditionReason,
    message: string,
    public readonly root?: string
  ) {
    super(message);
    this.name = 'MissingPreconditionError';
  }
}

/**
 * The manifest has no metadata extension block, so it is not a package
 * manifest this tool understands.
 */
export class MissingAnchorError extends SyncError {
  constructor(public readonly filePath: string) {
    super(`No metadata extension found in ${filePath}; is this an add-on manifest?`);
    this.name = 'MissingAnchorError';
  }
}

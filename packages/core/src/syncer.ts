import type { ActionableItem } from './actionable.js';
import { createBackup, type BackupOptions, type BackupResult } from './backup.js';
import { extractCatalogFieldWithReport } from './catalog-extractor.js';
import {
  blocksForCatalog,
  groupBlocksByLanguage,
  regenerateCatalog,
  renderCatalogBlocks,
  type CatalogBlock,
} from './catalog-writer.js';
import type { SyncDirection } from './config/types.js';
import { createFileDiff, type FileDiffEntry } from './diff-utils.js';
import type { AddonPackage, CatalogDocument } from './documents.js';
import { MissingPreconditionError } from './errors.js';
import { toCatalogText, toManifestText } from './escaping.js';
import { ALWAYS_SYNCED_FIELDS, FIELD_DEFINITIONS, FIELD_ORDER, type FieldKind } from './fields.js';
import { isReferenceLanguage, REFERENCE_LANGUAGE } from './language.js';
import {
  extractLifecycleType,
  extractManifestField,
  findMultilineElements,
  hasLifecycleState,
  resolveWhitespace,
  toMetadataItems,
  type ManifestFieldEntry,
} from './manifest-extractor.js';
import { findMetadataExtensionLine, regenerateManifest } from './manifest-writer.js';
import { DEFAULT_MERGE_PRIORITY, mergeField, sortItems, type MergePriority, type MetadataItem } from './merge.js';
import { writeDocument } from './package-loader.js';

export interface SyncerOptions {
  referenceLanguage?: string;
  priority?: MergePriority;
}

export interface SyncRunOptions {
  direction?: SyncDirection;
  /** Overrides the syncer's default for the manifest -> catalogs pass */
  priority?: MergePriority;
  write?: boolean;
  /** Back up every file before rewriting it */
  backup?: boolean | BackupOptions;
}

export interface FileChange extends FileDiffEntry {
  target: 'manifest' | 'catalog';
  languageCode?: string;
  lines: readonly string[];
}

export interface PassResult {
  package: AddonPackage;
  /** Paths of the documents this pass rewrote in memory */
  changed: string[];
  actionableItems: ActionableItem[];
  /** Catalogs left alone because no insertion point was found */
  skippedCatalogs: string[];
}

export interface SyncSummary {
  root: string;
  direction: SyncDirection;
  priority: MergePriority;
  changes: FileChange[];
  actionableItems: ActionableItem[];
  skippedCatalogs: string[];
  write: boolean;
  written: string[];
  backup?: BackupResult;
}

interface FieldSources {
  manifestEntries: ManifestFieldEntry[];
  manifestItems: MetadataItem[];
  catalogItems: MetadataItem[];
}

/**
 * Keeps the localized metadata of a package's manifest and its catalogs in
 * agreement.
 */
export class MetadataSyncer {
  private readonly referenceLanguage: string;
  private readonly defaultPriority: MergePriority;

  constructor(options: SyncerOptions = {}) {
    this.referenceLanguage = options.referenceLanguage ?? REFERENCE_LANGUAGE;
    this.defaultPriority = options.priority ?? DEFAULT_MERGE_PRIORITY;
  }

  public checkPreconditions(pkg: AddonPackage): void {
    if (!pkg.catalogs.length) {
      throw new MissingPreconditionError('missing-catalogs', `No catalog files found in ${pkg.root}`, pkg.root);
    }
    if (!pkg.catalogs.some((catalog) => isReferenceLanguage(catalog.languageCode, this.referenceLanguage))) {
      throw new MissingPreconditionError(
        'missing-reference-catalog',
        `No ${this.referenceLanguage} catalog found in ${pkg.root}`,
        pkg.root
      );
    }
  }

  /**
   * Fields handled for this package. Lifecycle state only takes part when
   * the manifest declares one.
   */
  public activeFields(pkg: AddonPackage): FieldKind[] {
    return hasLifecycleState(pkg.manifest) ? [...FIELD_ORDER] : [...ALWAYS_SYNCED_FIELDS];
  }

  public catalogsToManifest(pkg: AddonPackage): PassResult {
    const actionableItems: ActionableItem[] = [];
    const kinds = this.activeFields(pkg);
    const entries: Partial<Record<FieldKind, ManifestFieldEntry[]>> = {};
    const fields: Partial<Record<FieldKind, MetadataItem[]>> = {};

    for (const kind of kinds) {
      const sources = this.collectSources(pkg, kind, actionableItems);
      entries[kind] = sources.manifestEntries;
      const merged = mergeField(sources.manifestItems, sources.catalogItems, 'catalog');
      fields[kind] = sortItems(
        merged.map((item) => ({ ...item, text: toManifestText(item.text) })),
        this.referenceLanguage
      );
    }

    const anchor = findMetadataExtensionLine(pkg.manifest.lines);
    const whitespace = resolveWhitespace(pkg.manifest, entries, anchor === -1 ? undefined : pkg.manifest.lines[anchor]);
    const result = regenerateManifest(pkg.manifest, fields, {
      whitespace,
      lifecycleType: extractLifecycleType(pkg.manifest),
    });

    return {
      package: { ...pkg, manifest: result.document },
      changed: result.changed ? [pkg.manifest.path] : [],
      actionableItems,
      skippedCatalogs: [],
    };
  }

  public manifestToCatalogs(pkg: AddonPackage, priority: MergePriority = this.defaultPriority): PassResult {
    const actionableItems: ActionableItem[] = [];
    const blocks: CatalogBlock[] = [];

    for (const kind of this.activeFields(pkg)) {
      const sources = this.collectSources(pkg, kind, actionableItems);
      const merged = mergeField(sources.manifestItems, sources.catalogItems, priority).map((item) => ({
        ...item,
        text: toCatalogText(item.text),
      }));
      const rendered = renderCatalogBlocks(kind, merged, this.referenceLanguage);
      if (!rendered.length && merged.length) {
        actionableItems.push({
          kind: 'field-not-rendered',
          severity: 'warn',
          field: kind,
          message: `Unable to generate catalog entries for ${FIELD_DEFINITIONS[kind].context}... missing ${this.referenceLanguage}`,
        });
      }
      blocks.push(...rendered);
    }

    const grouped = groupBlocksByLanguage(blocks);
    const changed: string[] = [];
    const skippedCatalogs: string[] = [];
    const catalogs: CatalogDocument[] = pkg.catalogs.map((catalog) => {
      const result = regenerateCatalog(
        catalog,
        blocksForCatalog(grouped, catalog.languageCode, this.referenceLanguage)
      );
      if (result.skipped) {
        skippedCatalogs.push(catalog.path);
        actionableItems.push({
          kind: 'catalog-anchor-missing',
          severity: 'warn',
          locale: catalog.languageCode,
          filePath: catalog.path,
          message: `Skipped inserting lines into ${catalog.languageCode} catalog; no empty msgstr entry to insert after`,
        });
      }
      if (result.changed) {
        changed.push(catalog.path);
      }
      return result.document;
    });

    return {
      package: { ...pkg, catalogs },
      changed,
      actionableItems,
      skippedCatalogs,
    };
  }

  /**
   * Run the passes selected by `direction` in memory, then write what changed.
   * With `both`, catalog values reach the manifest first and the updated
   * manifest is then pushed to every catalog.
   */
  public async run(pkg: AddonPackage, options: SyncRunOptions = {}): Promise<SyncSummary> {
    this.checkPreconditions(pkg);

    const direction = options.direction ?? 'both';
    const priority = options.priority ?? this.defaultPriority;
    const passes: PassResult[] = [];
    let current = pkg;

    if (direction !== 'manifest-to-catalogs') {
      const pass = this.catalogsToManifest(current);
      passes.push(pass);
      current = pass.package;
    }
    if (direction !== 'catalogs-to-manifest') {
      const pass = this.manifestToCatalogs(current, priority);
      passes.push(pass);
      current = pass.package;
    }

    const changes = collectChanges(pkg, current);
    const summary: SyncSummary = {
      root: pkg.root,
      direction,
      priority,
      changes,
      actionableItems: passes.flatMap((pass) => pass.actionableItems),
      skippedCatalogs: [...new Set(passes.flatMap((pass) => pass.skippedCatalogs))],
      write: Boolean(options.write),
      written: [],
    };

    if (!options.write || !changes.length) {
      return summary;
    }

    if (options.backup) {
      const backupOptions = typeof options.backup === 'object' ? options.backup : {};
      const backup = await createBackup(
        changes.map((change) => change.path),
        pkg.root,
        backupOptions,
        `sync ${direction}`
      );
      if (backup) {
        summary.backup = backup;
      }
    }

    for (const change of changes) {
      await writeDocument(change.path, change.lines);
      summary.written.push(change.path);
    }

    return summary;
  }

  private collectSources(pkg: AddonPackage, kind: FieldKind, actionableItems: ActionableItem[]): FieldSources {
    const manifestEntries = extractManifestField(pkg.manifest, kind);
    const manifestItems = toMetadataItems(manifestEntries);
    const catalogReport = extractCatalogFieldWithReport(pkg.catalogs, kind, this.referenceLanguage);
    const context = FIELD_DEFINITIONS[kind].context;

    actionableItems.push(
      {
        kind: 'manifest-values',
        severity: 'info',
        field: kind,
        filePath: pkg.manifest.path,
        message: `${context} from the manifest: ${formatLanguages(manifestItems)}`,
        details: { items: manifestItems },
      },
      {
        kind: 'catalog-values',
        severity: 'info',
        field: kind,
        message: `${context} from catalogs: ${formatLanguages(catalogReport.items)}`,
        details: { items: catalogReport.items },
      }
    );

    if (!catalogReport.hasReference) {
      actionableItems.push({
        kind: 'missing-reference-field',
        severity: 'warn',
        field: kind,
        locale: this.referenceLanguage,
        message: `The ${this.referenceLanguage} catalog has no "${context}" entry`,
      });
    }

    for (const line of findMultilineElements(pkg.manifest, kind)) {
      actionableItems.push({
        kind: 'multiline-element',
        severity: 'warn',
        field: kind,
        filePath: pkg.manifest.path,
        line: line + 1,
        message: `<${FIELD_DEFINITIONS[kind].element}> on line ${line + 1} spans several lines and was left untouched`,
      });
    }

    return { manifestEntries, manifestItems, catalogItems: catalogReport.items };
  }
}

function formatLanguages(items: readonly MetadataItem[]): string {
  return items.length ? items.map((item) => item.languageCode).join(', ') : 'none';
}

function collectChanges(original: AddonPackage, updated: AddonPackage): FileChange[] {
  const changes: FileChange[] = [];

  const manifestDiff = createFileDiff(
    original.manifest.path,
    original.manifest.content,
    updated.manifest.content,
    original.root
  );
  if (manifestDiff) {
    changes.push({ ...manifestDiff, target: 'manifest', lines: updated.manifest.lines });
  }

  updated.catalogs.forEach((catalog, index) => {
    const before = original.catalogs[index];
    const diff = createFileDiff(catalog.path, before.content, catalog.content, original.root);
    if (diff) {
      changes.push({ ...diff, target: 'catalog', languageCode: catalog.languageCode, lines: catalog.lines });
    }
  });

  return changes;
}

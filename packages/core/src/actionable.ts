import type { FieldKind } from './fields.js';

export type ActionableSeverity = 'info' | 'warn' | 'error';

export type ActionableKind =
  | 'manifest-values'
  | 'catalog-values'
  | 'missing-reference-field'
  | 'field-not-rendered'
  | 'multiline-element'
  | 'catalog-anchor-missing';

/**
 * A diagnostic produced during a sync pass. Nothing is printed by the core;
 * callers decide how (and whether) to show these.
 */
export interface ActionableItem {
  kind: ActionableKind;
  severity: ActionableSeverity;
  message: string;
  field?: FieldKind;
  locale?: string;
  filePath?: string;
  line?: number;
  details?: Record<string, unknown>;
}

/**
 * Managed metadata fields and their representation in both file formats.
 */

export type FieldKind = 'summary' | 'description' | 'disclaimer' | 'lifecyclestate';

export interface FieldDefinition {
  kind: FieldKind;
  /** `msgctxt` value identifying the entry in a catalog */
  context: string;
  /** Element name in the manifest */
  element: string;
  /** Position in generated output (manifest lines and catalog blocks) */
  order: number;
}

export const FIELD_DEFINITIONS: Record<FieldKind, FieldDefinition> = {
  summary: { kind: 'summary', context: 'Addon Summary', element: 'summary', order: 0 },
  description: { kind: 'description', context: 'Addon Description', element: 'description', order: 1 },
  disclaimer: { kind: 'disclaimer', context: 'Addon Disclaimer', element: 'disclaimer', order: 2 },
  lifecyclestate: {
    kind: 'lifecyclestate',
    context: 'Addon LifecycleState',
    element: 'lifecyclestate',
    order: 3,
  },
};

export const FIELD_ORDER: readonly FieldKind[] = ['summary', 'description', 'disclaimer', 'lifecyclestate'];

/** Fields that are synced whether or not the manifest already has them */
export const ALWAYS_SYNCED_FIELDS: readonly FieldKind[] = ['summary', 'description', 'disclaimer'];

export function contextLine(kind: FieldKind): string {
  return `msgctxt "${FIELD_DEFINITIONS[kind].context}"`;
}

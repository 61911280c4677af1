export const HIERARCHY_KINDS = ['categories', 'locations'] as const;

export type HierarchyKind = (typeof HIERARCHY_KINDS)[number];

/** The source's code for "this node has no parent". */
export const NO_PARENT_CODE = '0';

/** Level given to nodes without a usable depth hint, so they sort last. */
export const UNKNOWN_LEVEL = 999999;

export type SourceRecord = Record<string, unknown>;

export interface HierarchyNode {
  code: string;
  parentCode: string;
  name: string;
  level: number | null;
  targetId: number | null;
}

export interface SourceColumns {
  code: string;
  parentCode: string;
  name: string;
  level: string;
}

export interface SourceValidation {
  selfReferences: number;
  orphans: number;
  cycles: number;
  duplicateCodes: number;
}

export interface SchemaCapabilities {
  keyField: string | null;
  parentStagingField: string | null;
  levelField: string | null;
}

export interface RunReport {
  kind: HierarchyKind;
  total: number;
  created: number;
  updated: number;
  errors: number;
  parentLinksApplied: number;
  orphansInRun: number;
  parentErrors: number;
  rootsAnchored: number;
  selfReferencesSkipped: number;
  cycleEdgesSkipped: number;
  unresolvedChildren: number;
  source: SourceValidation;
}

export function isHierarchyKind(value: string): value is HierarchyKind {
  const kinds: readonly string[] = HIERARCHY_KINDS;
  return kinds.includes(value);
}

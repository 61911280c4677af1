import { hasNoParent, isSelfReference } from './node.js';
import type { HierarchyNode, SourceValidation } from './types.js';

/**
 * Counts self-references, orphans, cycles and duplicated codes in a source
 * batch. Read-only: the result is reported before the first write and never
 * stops the run.
 *
 * Each code is walked at most once. A walk keeps the codes of the current
 * trail; meeting one of them again is one cycle, meeting a code resolved by
 * an earlier walk ends the walk without counting.
 */
export function validateSourceHierarchy(nodes: HierarchyNode[]): SourceValidation {
  const codes = new Set(nodes.map((node) => node.code));
  const parentOf = new Map<string, string>();
  const seen = new Set<string>();
  let selfReferences = 0;
  let orphans = 0;
  let duplicateCodes = 0;

  for (const node of nodes) {
    if (seen.has(node.code)) {
      duplicateCodes += 1;
    }
    seen.add(node.code);
    parentOf.set(node.code, node.parentCode);

    if (isSelfReference(node)) {
      selfReferences += 1;
    } else if (!hasNoParent(node.parentCode) && !codes.has(node.parentCode)) {
      orphans += 1;
    }
  }

  let cycles = 0;
  const resolved = new Set<string>();

  for (const start of parentOf.keys()) {
    if (resolved.has(start)) {
      continue;
    }

    const trail = new Set<string>();
    let current: string | undefined = start;

    while (current !== undefined && parentOf.has(current)) {
      if (resolved.has(current)) {
        break;
      }
      if (trail.has(current)) {
        cycles += 1;
        break;
      }
      trail.add(current);

      const next: string = parentOf.get(current) ?? '';
      if (hasNoParent(next) || next === current) {
        break;
      }
      current = next;
    }

    for (const code of trail) {
      resolved.add(code);
    }
  }

  return { selfReferences, orphans, cycles, duplicateCodes };
}

export function hasAnomalies(validation: SourceValidation): boolean {
  return (
    validation.selfReferences > 0 ||
    validation.orphans > 0 ||
    validation.cycles > 0 ||
    validation.duplicateCodes > 0
  );
}

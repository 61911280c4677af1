import { UNKNOWN_LEVEL, type HierarchyNode } from './types.js';

export function compareCodes(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}

export function effectiveLevel(node: HierarchyNode): number {
  return node.level ?? UNKNOWN_LEVEL;
}

/**
 * Shallower declared levels first, then code. Only lowers the number of
 * parents Phase B has to look up in the store; correctness never depends on it.
 */
export function orderByLevel(nodes: HierarchyNode[]): HierarchyNode[] {
  return [...nodes].sort(
    (a, b) => effectiveLevel(a) - effectiveLevel(b) || compareCodes(a.code, b.code)
  );
}

import { describeError } from '../errors.js';
import { updateRecord } from '../target/store.js';
import { findTargetIdByCode, type SyncContext } from './context.js';
import { hasNoParent } from './node.js';
import type { HierarchyNode } from './types.js';

export type ParentLinkOutcome =
  | 'applied'
  | 'root'
  | 'self-reference'
  | 'unresolved-child'
  | 'orphan'
  | 'cycle';

/**
 * Parent id from Phase A, else from the store for parents outside the batch.
 * A parent that failed Phase A stays unresolved even if an older record of it
 * exists, since that record still carries its previous parent link.
 */
export async function resolveParentId(context: SyncContext, parentCode: string): Promise<number | null> {
  const known = context.idByCode.get(parentCode);
  if (known !== undefined) {
    return known;
  }
  if (context.failedCodes.has(parentCode)) {
    return null;
  }

  const found = await findTargetIdByCode(context, parentCode);
  if (found !== null) {
    context.idByCode.set(parentCode, found);
  }
  return found;
}

/**
 * True when linking `code` under `parentCode` would close a loop through the
 * links already written in this run.
 */
export function closesCycle(
  appliedParents: ReadonlyMap<string, string>,
  code: string,
  parentCode: string
): boolean {
  const visited = new Set<string>();
  let current: string | undefined = parentCode;

  while (current !== undefined && !visited.has(current)) {
    if (current === code) {
      return true;
    }
    visited.add(current);
    current = appliedParents.get(current);
  }
  return false;
}

export async function reconcileParent(
  context: SyncContext,
  node: HierarchyNode
): Promise<ParentLinkOutcome> {
  if (node.targetId === null) {
    return 'unresolved-child';
  }
  if (hasNoParent(node.parentCode)) {
    return 'root';
  }
  if (node.parentCode === node.code) {
    return 'self-reference';
  }

  const parentId = await resolveParentId(context, node.parentCode);
  if (parentId === null) {
    return 'orphan';
  }
  if (closesCycle(context.appliedParents, node.code, node.parentCode)) {
    return 'cycle';
  }

  await updateRecord(context.store, context.profile.model, node.targetId, {
    [context.profile.parentField]: parentId
  });
  context.appliedParents.set(node.code, node.parentCode);
  return 'applied';
}

/**
 * Phase B. Moves each node from the default anchor to its real parent with a
 * single update. Must only start once Phase A has finished for the batch.
 */
export async function runParentReconciliation(
  context: SyncContext,
  nodes: HierarchyNode[]
): Promise<void> {
  const { report, logger } = context;

  for (const node of nodes) {
    try {
      const outcome = await reconcileParent(context, node);
      switch (outcome) {
        case 'applied':
          report.parentLinksApplied += 1;
          break;
        case 'root':
          report.rootsAnchored += 1;
          break;
        case 'self-reference':
          report.selfReferencesSkipped += 1;
          logger.warn(`${report.kind} ${node.code}: references itself as parent, left at anchor`);
          break;
        case 'unresolved-child':
          report.unresolvedChildren += 1;
          break;
        case 'orphan':
          report.orphansInRun += 1;
          logger.warn(`${report.kind} ${node.code}: parent ${node.parentCode} not found, left at anchor`);
          break;
        case 'cycle':
          report.cycleEdgesSkipped += 1;
          logger.warn(
            `${report.kind} ${node.code}: link to ${node.parentCode} would close a cycle, left at anchor`
          );
          break;
      }
    } catch (error) {
      report.parentErrors += 1;
      logger.error(
        `${report.kind} ${node.code}: linking parent ${node.parentCode} failed: ${describeError(error)}`
      );
    }
  }
}

import { describeError } from '../errors.js';
import { updateRecord, type FieldValues } from '../target/store.js';
import { findTargetIdByCode, type SyncContext } from './context.js';
import type { HierarchyNode } from './types.js';

export type UpsertAction = 'created' | 'updated';

/** Target values for Phase A: self-describing fields, parent pinned to the anchor. */
export function buildBaseValues(
  context: Pick<SyncContext, 'profile' | 'capabilities' | 'anchorId'>,
  node: HierarchyNode
): FieldValues {
  const { profile, capabilities } = context;
  const values: FieldValues = {
    name: profile.formatLabel(node),
    ...profile.extraValues(node)
  };

  if (capabilities.keyField) {
    values[capabilities.keyField] = node.code;
  }
  if (capabilities.parentStagingField) {
    values[capabilities.parentStagingField] = node.parentCode;
  }
  if (capabilities.levelField) {
    values[capabilities.levelField] = node.level ?? 0;
  }
  values[profile.parentField] = context.anchorId;

  return values;
}

export function identityField(context: Pick<SyncContext, 'profile' | 'capabilities'>): string | null {
  return context.capabilities.keyField ?? context.profile.fallbackIdentityField;
}

export async function upsertBaseNode(
  context: SyncContext,
  node: HierarchyNode
): Promise<{ action: UpsertAction; id: number }> {
  const { profile, store } = context;
  const values = buildBaseValues(context, node);
  const existingId = await findTargetIdByCode(context, node.code);

  if (existingId !== null) {
    const identity = identityField(context);
    const changes: FieldValues = { ...values };
    if (identity) {
      delete changes[identity];
    }
    await updateRecord(store, profile.model, existingId, changes);
    return { action: 'updated', id: existingId };
  }

  const id = await store.create(profile.model, values);
  return { action: 'created', id };
}

/**
 * Phase A. Creates or updates every node under the default anchor and maps
 * its code to the target id. A failing node is counted, left out of the map
 * and marked failed so Phase B never links a child under it; the loop goes on.
 */
export async function runBaseUpsert(context: SyncContext, nodes: HierarchyNode[]): Promise<void> {
  const { report, logger } = context;

  for (const node of nodes) {
    try {
      const { action, id } = await upsertBaseNode(context, node);
      node.targetId = id;
      context.idByCode.set(node.code, id);
      if (action === 'created') {
        report.created += 1;
      } else {
        report.updated += 1;
      }
    } catch (error) {
      context.failedCodes.add(node.code);
      report.errors += 1;
      logger.error(`${report.kind} ${node.code}: upsert failed: ${describeError(error)}`);
    }
  }
}

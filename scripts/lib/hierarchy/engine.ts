import { consoleLogger, type SyncLogger } from '../logger.js';
import type { TargetStore } from '../target/store.js';
import { runBaseUpsert } from './base_upsert.js';
import { resolveSchemaCapabilities } from './capabilities.js';
import { createRunReport, type SyncContext } from './context.js';
import { orderByLevel } from './leveling.js';
import { buildHierarchyNodes } from './node.js';
import { runParentReconciliation } from './parent_reconcile.js';
import type { HierarchyProfile } from './profiles.js';
import { formatSourceValidation } from './report.js';
import type { RunReport, SourceRecord } from './types.js';
import { hasAnomalies, validateSourceHierarchy } from './validate.js';

export interface HierarchySyncOptions {
  requireKeyField?: boolean;
  logger?: SyncLogger;
}

/**
 * Runs one batch to completion: validate, probe the schema, resolve the
 * anchor, level, Phase A, Phase B. Only a missing anchor, a failed schema
 * probe or a required key field that does not exist abort the run; node
 * failures end up in the report.
 */
export async function runHierarchySync(
  profile: HierarchyProfile,
  records: SourceRecord[],
  store: TargetStore,
  options: HierarchySyncOptions = {}
): Promise<RunReport> {
  const logger = options.logger ?? consoleLogger;
  const { nodes, rejected } = buildHierarchyNodes(records, profile.columns, profile.defaultName);

  for (const entry of rejected) {
    logger.error(`${profile.kind}: rejected source row: ${entry.reason}`);
  }

  const validation = validateSourceHierarchy(nodes);
  if (hasAnomalies(validation)) {
    logger.warn(formatSourceValidation(profile.kind, validation));
  }

  const capabilities = await resolveSchemaCapabilities(store, profile.model, {
    requireKeyField: options.requireKeyField ?? false,
    logger
  });
  const anchorId = await profile.resolveAnchor(store);

  const report = createRunReport(profile, records.length, validation);
  report.errors += rejected.length;

  const context: SyncContext = {
    profile,
    store,
    capabilities,
    anchorId,
    idByCode: new Map(),
    failedCodes: new Set(),
    appliedParents: new Map(),
    report,
    logger
  };

  const ordered = orderByLevel(nodes);
  await runBaseUpsert(context, ordered);
  await runParentReconciliation(context, ordered);

  return report;
}

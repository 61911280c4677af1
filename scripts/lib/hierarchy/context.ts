import type { SyncLogger } from '../logger.js';
import type { Domain, TargetStore } from '../target/store.js';
import { hasNoParent } from './node.js';
import type { HierarchyProfile } from './profiles.js';
import type { RunReport, SchemaCapabilities, SourceValidation } from './types.js';

/**
 * State owned by one run and dropped when it ends. Phase A fills `idByCode`
 * and `failedCodes`; Phase B reads both, adds store lookups to `idByCode` and
 * records the parent links it writes in `appliedParents` (child code -> parent
 * code). A code in `failedCodes` never resolves as a parent in this run.
 */
export interface SyncContext {
  profile: HierarchyProfile;
  store: TargetStore;
  capabilities: SchemaCapabilities;
  anchorId: number;
  idByCode: Map<string, number>;
  failedCodes: Set<string>;
  appliedParents: Map<string, string>;
  report: RunReport;
  logger: SyncLogger;
}

export function createRunReport(
  profile: HierarchyProfile,
  total: number,
  source: SourceValidation
): RunReport {
  return {
    kind: profile.kind,
    total,
    created: 0,
    updated: 0,
    errors: 0,
    parentLinksApplied: 0,
    orphansInRun: 0,
    parentErrors: 0,
    rootsAnchored: 0,
    selfReferencesSkipped: 0,
    cycleEdgesSkipped: 0,
    unresolvedChildren: 0,
    source
  };
}

export function lookupDomain(context: Pick<SyncContext, 'profile' | 'capabilities'>, code: string): Domain {
  const { keyField } = context.capabilities;
  return keyField ? [[keyField, '=', code]] : context.profile.fallbackDomain(code);
}

export async function findTargetIdByCode(
  context: Pick<SyncContext, 'profile' | 'capabilities' | 'store'>,
  code: string
): Promise<number | null> {
  if (hasNoParent(code)) {
    return null;
  }

  const found = await context.store.search(
    context.profile.model,
    lookupDomain(context, code),
    ['id'],
    1
  );
  return found.length > 0 ? found[0].id : null;
}

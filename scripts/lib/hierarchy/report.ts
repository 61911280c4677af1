import type { RunReport, SourceValidation } from './types.js';

export function formatSourceValidation(kind: string, validation: SourceValidation): string {
  return `${kind} source: self_references=${validation.selfReferences} orphans=${validation.orphans} cycles=${validation.cycles} duplicate_codes=${validation.duplicateCodes}`;
}

export function formatRunReport(report: RunReport): string[] {
  return [
    `${report.kind} sync: total=${report.total} created=${report.created} updated=${report.updated} errors=${report.errors}`,
    `${report.kind} parents: applied=${report.parentLinksApplied} roots=${report.rootsAnchored} orphans_in_run=${report.orphansInRun} self_references=${report.selfReferencesSkipped} cycle_edges=${report.cycleEdgesSkipped} unresolved_children=${report.unresolvedChildren} errors=${report.parentErrors}`,
    formatSourceValidation(report.kind, report.source)
  ];
}

export function hasFailures(report: RunReport): boolean {
  return report.errors > 0 || report.parentErrors > 0;
}

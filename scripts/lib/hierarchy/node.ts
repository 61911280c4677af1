import { EmptyCodeError } from '../errors.js';
import {
  NO_PARENT_CODE,
  type HierarchyNode,
  type SourceColumns,
  type SourceRecord
} from './types.js';

export interface RejectedRecord {
  record: SourceRecord;
  reason: string;
}

export interface BuiltNodes {
  nodes: HierarchyNode[];
  rejected: RejectedRecord[];
}

export function sourceText(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }
  if (typeof value === 'string') {
    return value.trim();
  }
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value).trim();
  }
  return '';
}

export function parseLevel(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? Math.trunc(value) : null;
  }
  if (typeof value === 'string' && /^\s*[-+]?\d+\s*$/.test(value)) {
    return Number.parseInt(value, 10);
  }
  return null;
}

export function hasNoParent(parentCode: string): boolean {
  return parentCode === '' || parentCode === NO_PARENT_CODE;
}

export function isSelfReference(node: Pick<HierarchyNode, 'code' | 'parentCode'>): boolean {
  return !hasNoParent(node.parentCode) && node.parentCode === node.code;
}

export function toHierarchyNode(
  record: SourceRecord,
  columns: SourceColumns,
  defaultName: (code: string) => string
): HierarchyNode {
  const code = sourceText(record[columns.code]);
  if (!code) {
    throw new EmptyCodeError(columns.code);
  }

  const name = sourceText(record[columns.name]);

  return {
    code,
    parentCode: sourceText(record[columns.parentCode]),
    name: name || defaultName(code),
    level: parseLevel(record[columns.level]),
    targetId: null
  };
}

export function buildHierarchyNodes(
  records: SourceRecord[],
  columns: SourceColumns,
  defaultName: (code: string) => string
): BuiltNodes {
  const nodes: HierarchyNode[] = [];
  const rejected: RejectedRecord[] = [];

  for (const record of records) {
    try {
      nodes.push(toHierarchyNode(record, columns, defaultName));
    } catch (error) {
      if (!(error instanceof EmptyCodeError)) {
        throw error;
      }
      rejected.push({ record, reason: error.message });
    }
  }

  return { nodes, rejected };
}

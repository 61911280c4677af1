import fs from 'fs-extra';
import path from 'node:path';

import { SourceQueryError } from '../errors.js';
import type { HierarchyProfile } from '../hierarchy/profiles.js';
import type { SourceRecord } from '../hierarchy/types.js';
import { listJsonFiles, readJsonFile, repoPath, toPosixRelative } from '../io.js';
import type { SankhyaClient } from './sankhya_client.js';

export interface SourceReader {
  readRecords(profile: HierarchyProfile): Promise<SourceRecord[]>;
}

function isRecord(value: unknown): value is SourceRecord {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

export function sqlPath(profile: HierarchyProfile): string {
  return repoPath('sql', profile.sqlFile);
}

export async function loadSql(filePath: string): Promise<string> {
  if (!(await fs.pathExists(filePath))) {
    throw new SourceQueryError(`SQL file not found: ${toPosixRelative(filePath)}`);
  }
  const sql = (await fs.readFile(filePath, 'utf8')).trim();
  if (!sql) {
    throw new SourceQueryError(`SQL file is empty: ${toPosixRelative(filePath)}`);
  }
  return sql;
}

export class SankhyaSourceReader implements SourceReader {
  constructor(private readonly client: SankhyaClient) {}

  async readRecords(profile: HierarchyProfile): Promise<SourceRecord[]> {
    const sql = await loadSql(sqlPath(profile));
    return this.client.executeQuery(sql);
  }
}

/** Accepts either a bare array of rows or `{ "records": [...] }`. */
export function recordsFromSnapshot(data: unknown, source: string): SourceRecord[] {
  const rows = isRecord(data) ? data.records : data;
  if (!Array.isArray(rows)) {
    throw new SourceQueryError(`${source}: expected an array of records or { "records": [...] }`);
  }
  return rows.filter(isRecord);
}

/**
 * Reads every JSON snapshot below `<rootDir>/<kind>/`, files in sorted order,
 * rows in file order.
 */
export class FileSourceReader implements SourceReader {
  constructor(private readonly rootDir: string) {}

  async readRecords(profile: HierarchyProfile): Promise<SourceRecord[]> {
    const kindDir = path.resolve(this.rootDir, profile.kind);
    const files = await listJsonFiles(kindDir);
    if (files.length === 0) {
      throw new SourceQueryError(`No JSON snapshots found under ${toPosixRelative(kindDir)}`);
    }

    const records: SourceRecord[] = [];
    for (const file of files) {
      const absolutePath = path.join(kindDir, file);
      const data = await readJsonFile(absolutePath);
      records.push(...recordsFromSnapshot(data, toPosixRelative(absolutePath)));
    }
    return records;
  }
}

import { TargetRpcError } from '../errors.js';

export type FieldValue = string | number | boolean | null | number[];

export type FieldValues = Record<string, FieldValue>;

export type DomainOperator = '=' | '!=' | '=like' | 'like' | 'in';

export type DomainTerm = [field: string, operator: DomainOperator, value: FieldValue];

/** Terms are implicitly AND-ed. */
export type Domain = DomainTerm[];

export type TargetRecord = { id: number } & Record<string, unknown>;

export interface FieldInfo {
  type?: string;
  string?: string;
}

export type FieldCatalog = Record<string, FieldInfo>;

/**
 * Everything the sync engine needs from the target system. One call is one
 * immediately committed operation; there is no batching and no transaction.
 */
export interface TargetStore {
  search(model: string, domain: Domain, fields: string[], limit: number): Promise<TargetRecord[]>;
  create(model: string, values: FieldValues): Promise<number>;
  update(model: string, id: number, values: FieldValues): Promise<boolean>;
  fieldsGet(model: string): Promise<FieldCatalog>;
}

/** Reads the id out of a many2one value (`[id, display_name]` or `false`). */
export function many2oneId(value: unknown): number | null {
  if (Array.isArray(value) && typeof value[0] === 'number') {
    return value[0];
  }
  if (typeof value === 'number') {
    return value;
  }
  return null;
}

/** `update` that treats a `false` answer from the store as a failed write. */
export async function updateRecord(
  store: TargetStore,
  model: string,
  id: number,
  values: FieldValues
): Promise<void> {
  const written = await store.update(model, id, values);
  if (!written) {
    throw new TargetRpcError(`${model}.write`, `write returned false for record ${id}`);
  }
}

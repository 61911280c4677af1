import { MissingKeyFieldError } from '../errors.js';
import type { SyncLogger } from '../logger.js';
import type { FieldCatalog, TargetStore } from '../target/store.js';
import type { SchemaCapabilities } from './types.js';

export const KEY_FIELD_CANDIDATES = ['x_sankhya_id', 'x_codigo_sankhya', 'x_studio_sankhya_id'] as const;
export const PARENT_STAGING_FIELD_CANDIDATES = [
  'x_parent_sankhya_id',
  'x_codigo_pai_sankhya',
  'x_studio_parent_sankhya_id'
] as const;
export const LEVEL_FIELD_CANDIDATES = ['x_grau', 'x_studio_grau'] as const;

const CODE_FIELD_TYPES = ['char', 'integer'] as const;
const LEVEL_FIELD_TYPES = ['integer', 'float', 'char'] as const;

export function firstAvailableField(
  catalog: FieldCatalog,
  candidates: readonly string[],
  types: readonly string[]
): string | null {
  for (const name of candidates) {
    const type = catalog[name]?.type;
    if (type !== undefined && types.includes(type)) {
      return name;
    }
  }
  return null;
}

export function capabilitiesFromCatalog(catalog: FieldCatalog): SchemaCapabilities {
  return {
    keyField: firstAvailableField(catalog, KEY_FIELD_CANDIDATES, CODE_FIELD_TYPES),
    parentStagingField: firstAvailableField(
      catalog,
      PARENT_STAGING_FIELD_CANDIDATES,
      CODE_FIELD_TYPES
    ),
    levelField: firstAvailableField(catalog, LEVEL_FIELD_CANDIDATES, LEVEL_FIELD_TYPES)
  };
}

export interface CapabilityOptions {
  requireKeyField: boolean;
  logger: SyncLogger;
}

/** Probes the model's fields once; the result is shared by both phases. */
export async function resolveSchemaCapabilities(
  store: TargetStore,
  model: string,
  options: CapabilityOptions
): Promise<SchemaCapabilities> {
  const catalog = await store.fieldsGet(model);
  const capabilities = capabilitiesFromCatalog(catalog);

  if (!capabilities.keyField) {
    if (options.requireKeyField) {
      throw new MissingKeyFieldError(model, KEY_FIELD_CANDIDATES);
    }
    options.logger.warn(
      `${model}: no external code field found, matching existing records by fallback key`
    );
  }

  return capabilities;
}

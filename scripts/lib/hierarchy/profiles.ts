import { AnchorNotFoundError } from '../errors.js';
import { many2oneId, type Domain, type FieldValues, type TargetStore } from '../target/store.js';
import type { HierarchyKind, HierarchyNode, SourceColumns } from './types.js';

/**
 * What differs between the hierarchies the engine syncs: where the rows come
 * from, how a node becomes target values, how a record is found without an
 * external code field and which record anchors new nodes.
 */
export interface HierarchyProfile {
  kind: HierarchyKind;
  model: string;
  parentField: string;
  sqlFile: string;
  columns: SourceColumns;
  defaultName(code: string): string;
  formatLabel(node: HierarchyNode): string;
  extraValues(node: HierarchyNode): FieldValues;
  fallbackDomain(code: string): Domain;
  /** Field written from the code that must not change on update when no key field exists. */
  fallbackIdentityField: string | null;
  resolveAnchor(store: TargetStore): Promise<number>;
}

export interface ProfileOptions {
  categoryAnchorName: string;
}

export function categoryLabel(code: string, name: string): string {
  return `[${code}] ${name}`;
}

export function createCategoryProfile(options: ProfileOptions): HierarchyProfile {
  return {
    kind: 'categories',
    model: 'product.category',
    parentField: 'parent_id',
    sqlFile: 'categories.sql',
    columns: {
      code: 'CODGRUPOPROD',
      parentCode: 'CODGRUPAI',
      name: 'DESCRGRUPOPROD',
      level: 'GRAU'
    },
    defaultName: (code) => `Category ${code}`,
    formatLabel: (node) => categoryLabel(node.code, node.name),
    extraValues: () => ({}),
    fallbackDomain: (code) => [['name', '=like', `[${code}]%`]],
    fallbackIdentityField: null,
    async resolveAnchor(store) {
      const found = await store.search(
        'product.category',
        [
          ['name', '=', options.categoryAnchorName],
          ['parent_id', '=', false]
        ],
        ['id', 'name'],
        1
      );
      if (found.length === 0) {
        throw new AnchorNotFoundError(
          'product.category',
          `no root category named '${options.categoryAnchorName}'`
        );
      }
      return found[0].id;
    }
  };
}

export function createLocationProfile(): HierarchyProfile {
  return {
    kind: 'locations',
    model: 'stock.location',
    parentField: 'location_id',
    sqlFile: 'locations.sql',
    columns: {
      code: 'CODLOCAL',
      parentCode: 'CODLOCALPAI',
      name: 'DESCRLOCAL',
      level: 'GRAU'
    },
    defaultName: (code) => `Location ${code}`,
    formatLabel: (node) => node.name,
    extraValues: (node) => ({
      barcode: node.code,
      usage: 'internal',
      active: true
    }),
    fallbackDomain: (code) => [['barcode', '=', code]],
    fallbackIdentityField: 'barcode',
    async resolveAnchor(store) {
      const warehouses = await store.search(
        'stock.warehouse',
        [],
        ['id', 'name', 'lot_stock_id'],
        1
      );
      const stockLocationId = warehouses.length > 0 ? many2oneId(warehouses[0].lot_stock_id) : null;
      if (stockLocationId === null) {
        throw new AnchorNotFoundError('stock.warehouse', 'no warehouse with a stock location');
      }
      return stockLocationId;
    }
  };
}

export function createProfile(kind: HierarchyKind, options: ProfileOptions): HierarchyProfile {
  return kind === 'categories' ? createCategoryProfile(options) : createLocationProfile();
}

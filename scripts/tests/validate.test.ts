import assert from 'node:assert/strict';
import test from 'node:test';

import type { HierarchyNode } from '../lib/hierarchy/types.js';
import { hasAnomalies, validateSourceHierarchy } from '../lib/hierarchy/validate.js';

function node(code: string, parentCode: string): HierarchyNode {
  return { code, parentCode, name: code, level: null, targetId: null };
}

test('clean tree has no anomalies', () => {
  const result = validateSourceHierarchy([node('A', '0'), node('B', 'A'), node('C', 'B')]);

  assert.deepEqual(result, { selfReferences: 0, orphans: 0, cycles: 0, duplicateCodes: 0 });
  assert.equal(hasAnomalies(result), false);
});

test('self-reference is counted and is not an orphan or a cycle', () => {
  const result = validateSourceHierarchy([node('A', 'A'), node('B', '')]);

  assert.deepEqual(result, { selfReferences: 1, orphans: 0, cycles: 0, duplicateCodes: 0 });
});

test('parent absent from the batch is an orphan', () => {
  const result = validateSourceHierarchy([node('A', 'Z'), node('B', 'A')]);

  assert.equal(result.orphans, 1);
  assert.equal(result.cycles, 0);
});

test('two-node cycle is counted once', () => {
  const result = validateSourceHierarchy([node('A', 'B'), node('B', 'A')]);

  assert.equal(result.cycles, 1);
  assert.equal(result.orphans, 0);
  assert.equal(hasAnomalies(result), true);
});

test('tail leading into a cycle is not counted again', () => {
  const result = validateSourceHierarchy([
    node('A', 'B'),
    node('B', 'C'),
    node('C', 'A'),
    node('D', 'A'),
    node('E', 'D')
  ]);

  assert.equal(result.cycles, 1);
});

test('separate cycles are each counted', () => {
  const result = validateSourceHierarchy([
    node('A', 'B'),
    node('B', 'A'),
    node('X', 'Y'),
    node('Y', 'Z'),
    node('Z', 'X'),
    node('R', '0')
  ]);

  assert.equal(result.cycles, 2);
});

test('duplicate codes are counted beyond the first occurrence', () => {
  const result = validateSourceHierarchy([node('A', '0'), node('A', '0'), node('A', '0')]);

  assert.equal(result.duplicateCodes, 2);
});

test('validation does not mutate nodes', () => {
  const nodes = [node('A', 'B'), node('B', 'A')];
  const before = JSON.stringify(nodes);

  validateSourceHierarchy(nodes);

  assert.equal(JSON.stringify(nodes), before);
});

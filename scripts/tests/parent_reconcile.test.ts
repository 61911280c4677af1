import assert from 'node:assert/strict';
import test from 'node:test';

import { runBaseUpsert } from '../lib/hierarchy/base_upsert.js';
import { closesCycle, runParentReconciliation } from '../lib/hierarchy/parent_reconcile.js';
import {
  categoryProfile,
  categoryStore,
  createTestContext,
  hierarchyNode
} from './sync_fixtures.js';

test('closesCycle follows links written earlier in the run', () => {
  const applied = new Map([
    ['B', 'C'],
    ['C', 'A']
  ]);

  assert.equal(closesCycle(applied, 'A', 'B'), true);
  assert.equal(closesCycle(applied, 'D', 'B'), false);
  assert.equal(closesCycle(new Map(), 'A', 'B'), false);
});

test('links every node under its parent', async () => {
  const fixture = categoryStore();
  const context = createTestContext(fixture, categoryProfile());
  const nodes = [hierarchyNode('A', '0'), hierarchyNode('B', 'A'), hierarchyNode('C', 'B')];

  await runBaseUpsert(context, nodes);
  await runParentReconciliation(context, nodes);

  const [a, b, c] = nodes.map((node) => node.targetId ?? -1);
  assert.equal(fixture.store.get('product.category', a)?.parent_id, fixture.anchorId);
  assert.equal(fixture.store.get('product.category', b)?.parent_id, a);
  assert.equal(fixture.store.get('product.category', c)?.parent_id, b);
  assert.equal(context.report.parentLinksApplied, 2);
  assert.equal(context.report.rootsAnchored, 1);
});

test('parent found only in the store is looked up once and memoized', async () => {
  const fixture = categoryStore();
  const existingParent = fixture.store.seed('product.category', {
    name: '[P] Pre-existing',
    parent_id: fixture.anchorId
  });
  const context = createTestContext(fixture, categoryProfile());
  const nodes = [hierarchyNode('A', 'P'), hierarchyNode('B', 'P')];

  await runBaseUpsert(context, nodes);
  const searchesBefore = fixture.store.calls.filter((call) => call.op === 'search').length;
  await runParentReconciliation(context, nodes);
  const searchesAfter = fixture.store.calls.filter((call) => call.op === 'search').length;

  assert.equal(searchesAfter - searchesBefore, 1);
  assert.equal(context.idByCode.get('P'), existingParent);
  assert.equal(context.report.parentLinksApplied, 2);
  assert.equal(context.report.orphansInRun, 0);
});

test('unknown parent stays at the anchor and is counted as an orphan', async () => {
  const fixture = categoryStore();
  const context = createTestContext(fixture, categoryProfile());
  const nodes = [hierarchyNode('A', 'Z')];

  await runBaseUpsert(context, nodes);
  await runParentReconciliation(context, nodes);

  assert.equal(context.report.orphansInRun, 1);
  assert.equal(context.report.parentLinksApplied, 0);
  assert.equal(fixture.store.all('product.category').length, 2);
  assert.equal(fixture.store.get('product.category', nodes[0].targetId ?? -1)?.parent_id, fixture.anchorId);
  assert.deepEqual(context.logger.messages('warn'), ['categories A: parent Z not found, left at anchor']);
});

test('self-reference is never written', async () => {
  const fixture = categoryStore();
  const context = createTestContext(fixture, categoryProfile());
  const nodes = [hierarchyNode('A', 'A')];

  await runBaseUpsert(context, nodes);
  const writesBefore = fixture.store.writes().length;
  await runParentReconciliation(context, nodes);

  assert.equal(fixture.store.writes().length, writesBefore);
  assert.equal(context.report.selfReferencesSkipped, 1);
  assert.equal(fixture.store.get('product.category', nodes[0].targetId ?? -1)?.parent_id, fixture.anchorId);
});

test('the edge closing a cycle is skipped without a write', async () => {
  const fixture = categoryStore();
  const context = createTestContext(fixture, categoryProfile());
  const nodes = [hierarchyNode('A', 'B'), hierarchyNode('B', 'A')];

  await runBaseUpsert(context, nodes);
  const writesBefore = fixture.store.writes().length;
  await runParentReconciliation(context, nodes);

  const [a, b] = nodes.map((node) => node.targetId ?? -1);
  assert.equal(fixture.store.writes().length - writesBefore, 1);
  assert.equal(fixture.store.get('product.category', a)?.parent_id, b);
  assert.equal(fixture.store.get('product.category', b)?.parent_id, fixture.anchorId);
  assert.equal(context.report.parentLinksApplied, 1);
  assert.equal(context.report.cycleEdgesSkipped, 1);
  assert.equal(context.report.parentErrors, 0);
});

test('a node that failed in phase A is skipped and its children become orphans', async () => {
  const fixture = categoryStore();
  fixture.store.failWhen((call) =>
    call.op === 'create' && call.values.name === '[B] Group B' ? 'remote validation failed' : null
  );
  const context = createTestContext(fixture, categoryProfile());
  const nodes = [hierarchyNode('A', '0'), hierarchyNode('B', 'A'), hierarchyNode('C', 'B')];

  await runBaseUpsert(context, nodes);
  await runParentReconciliation(context, nodes);

  assert.equal(context.report.unresolvedChildren, 1);
  assert.equal(context.report.orphansInRun, 1);
  assert.equal(context.report.parentLinksApplied, 0);
  assert.equal(fixture.store.get('product.category', nodes[2].targetId ?? -1)?.parent_id, fixture.anchorId);
});

test('a failing link write is counted and the batch goes on', async () => {
  const fixture = categoryStore();
  const context = createTestContext(fixture, categoryProfile());
  const nodes = [hierarchyNode('A', '0'), hierarchyNode('B', 'A'), hierarchyNode('C', 'A')];

  await runBaseUpsert(context, nodes);
  const idB = context.idByCode.get('B');
  fixture.store.failWhen((call) => (call.op === 'update' && call.id === idB ? 'timeout' : null));
  await runParentReconciliation(context, nodes);

  assert.equal(context.report.parentErrors, 1);
  assert.equal(context.report.parentLinksApplied, 1);
  assert.deepEqual(context.logger.messages('error'), ['categories B: linking parent A failed: timeout']);
});

test('a parent that failed phase A is not linked through its older record', async () => {
  const fixture = categoryStore();
  const oldA = fixture.store.seed('product.category', { name: '[A] Group A', parent_id: fixture.anchorId });
  const oldB = fixture.store.seed('product.category', { name: '[B] Group B', parent_id: oldA });
  fixture.store.failWhen((call) => (call.op === 'update' && call.id === oldA ? 'record locked' : null));
  const context = createTestContext(fixture, categoryProfile());
  const nodes = [hierarchyNode('A', '0'), hierarchyNode('B', 'A')];

  await runBaseUpsert(context, nodes);
  const searchesBefore = fixture.store.calls.filter((call) => call.op === 'search').length;
  await runParentReconciliation(context, nodes);

  assert.equal(fixture.store.calls.filter((call) => call.op === 'search').length, searchesBefore);
  assert.equal(context.report.unresolvedChildren, 1);
  assert.equal(context.report.orphansInRun, 1);
  assert.equal(context.report.parentLinksApplied, 0);
  assert.equal(fixture.store.get('product.category', oldB)?.parent_id, fixture.anchorId);
});

test('a link write the store answers with false is a parent error', async () => {
  const fixture = categoryStore();
  const context = createTestContext(fixture, categoryProfile());
  const nodes = [hierarchyNode('A', '0'), hierarchyNode('B', 'A')];

  await runBaseUpsert(context, nodes);
  const idB = context.idByCode.get('B');
  fixture.store.refuseWhen((call) => call.op === 'update' && call.id === idB);
  await runParentReconciliation(context, nodes);

  assert.equal(context.report.parentLinksApplied, 0);
  assert.equal(context.report.parentErrors, 1);
  assert.equal(context.appliedParents.has('B'), false);
  assert.deepEqual(context.logger.messages('error'), [
    `categories B: linking parent A failed: product.category.write failed: write returned false for record ${idB}`
  ]);
});

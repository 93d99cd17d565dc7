import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { SqliteHierarchyStore, toSnapshotDate } from '../sqlite_storage.js';
import { StorageError } from '../../core/errors.js';
import { LabelParser, type LabeledNode } from '../../labels/label_parser.js';
import { annotateMetrics } from '../../hierarchy/metrics.js';
import { annotateRelationships } from '../../hierarchy/relationships.js';
import { placeRoot, placeUnder } from '../../hierarchy/placement.js';
import { makeContainer, makeLeaf } from '../../hierarchy/__tests__/helpers.js';

function sampleTree(): LabeledNode[] {
  const root = placeRoot(makeContainer({ groupId: 1, iid: 1, internalId: 10 }));
  const a = placeUnder(makeContainer({ groupId: 1, iid: 2, internalId: 20, parentInternalId: 10 }), root);
  const b = placeUnder(makeContainer({ groupId: 1, iid: 3, internalId: 30, parentInternalId: 10, state: 'closed' }), root);
  const leaf = placeUnder(
    { ...makeLeaf({ projectId: 5, iid: 1, internalId: 50, state: 'closed' }), labels: ['priority::high', 'area::web'] },
    a,
  );
  const final = annotateMetrics(annotateRelationships([root, a, b, leaf]), new Date('2024-03-10T00:00:00Z'));
  return new LabelParser().parseNodes(final);
}

describe('SqliteHierarchyStore', () => {
  let dir: string;
  let dbPath: string;
  let store: SqliteHierarchyStore;

  beforeEach(async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    dir = mkdtempSync(join(tmpdir(), 'hierarchy-store-'));
    dbPath = join(dir, 'nested', 'hierarchy.db');
    store = new SqliteHierarchyStore(dbPath, { lockRetries: 0 });
    await store.initialize();
  });

  afterEach(async () => {
    await store.close();
    rmSync(dir, { recursive: true, force: true });
  });

  it('creates the snapshot table', () => {
    const tables = store.executeQuery("SELECT name FROM sqlite_master WHERE type = 'table'");

    expect(tables).toEqual([{ name: 'work_item_hierarchy' }]);
    expect(store.isInitialized()).toBe(true);
  });

  it('stores every field of a node', async () => {
    const result = await store.upsertBatch(sampleTree(), '2024-03-01');

    expect(result).toEqual({ inserted: 4, replaced: 0 });
    expect(store.getItem('issue:5#1')).toMatchObject({
      type: 'leaf',
      project_id: 5,
      group_id: null,
      parent_id: 'epic:1#2',
      parent_type: 'container',
      root_id: 'epic:1#1',
      depth: 2,
      hierarchy_path: 'epic:1#1/epic:1#2/issue:5#1',
      is_leaf: 1,
      state: 'closed',
      labels_raw: '["priority::high","area::web"]',
      label_priority: 'high',
      label_custom_1: 'area:web',
      label_custom_2: null,
      data_version: 1,
      is_latest: 1,
      snapshot_date: '2024-03-01',
    });
    expect(store.getItem('epic:1#2')).toMatchObject({ completion_pct: 100, child_count: 1, group_id: 1 });
  });

  it('replaces rows when the same snapshot is written twice', async () => {
    await store.upsertBatch(sampleTree(), '2024-03-01');

    const again = await store.upsertBatch(sampleTree(), '2024-03-01');

    expect(again).toEqual({ inserted: 0, replaced: 4 });
    expect(store.executeQuery('SELECT COUNT(*) AS n FROM work_item_hierarchy')).toEqual([{ n: 4 }]);
    expect(store.getItem('epic:1#1')?.data_version).toBe(1);
  });

  it('versions a new snapshot and demotes the previous one', async () => {
    await store.upsertBatch(sampleTree(), '2024-03-01');
    await store.upsertBatch(sampleTree(), '2024-03-02');

    const rows = store.executeQuery(
      'SELECT snapshot_date, data_version, is_latest FROM work_item_hierarchy WHERE id = ? ORDER BY snapshot_date',
      ['epic:1#1'],
    );
    expect(rows).toEqual([
      { snapshot_date: '2024-03-01', data_version: 1, is_latest: 0 },
      { snapshot_date: '2024-03-02', data_version: 2, is_latest: 1 },
    ]);
    expect(store.getLatestSnapshotDate()).toBe('2024-03-02');
    expect(store.getLatestSnapshotDate('epic:9#9')).toBeNull();
  });

  it('keeps the newest snapshot latest when an older one is written later', async () => {
    await store.upsertBatch(sampleTree(), '2024-03-05');
    await store.upsertBatch(sampleTree(), '2024-03-01');

    expect(store.getItem('epic:1#1')?.snapshot_date).toBe('2024-03-05');
    expect(store.getItem('epic:1#1', false)?.snapshot_date).toBe('2024-03-05');
  });

  it('reports progress per node', async () => {
    const progress: Array<[number, number]> = [];

    await store.upsertBatch(sampleTree(), '2024-03-01', (written, total) => progress.push([written, total]));

    expect(progress).toEqual([
      [1, 4],
      [2, 4],
      [3, 4],
      [4, 4],
    ]);
  });

  it('rejects a malformed snapshot date', async () => {
    await expect(store.upsertBatch(sampleTree(), '03/01/2024')).rejects.toBeInstanceOf(StorageError);
  });

  it('lists children by sibling position and roots by creation', async () => {
    await store.upsertBatch(sampleTree(), '2024-03-01');

    expect(store.getChildren('epic:1#1').map((row) => row.id)).toEqual(['epic:1#2', 'epic:1#3']);
    expect(store.getRootItems().map((row) => row.id)).toEqual(['epic:1#1']);
  });

  it('summarises the latest snapshot', async () => {
    await store.upsertBatch(sampleTree(), '2024-03-01');
    await store.upsertBatch(sampleTree(), '2024-03-02');

    expect(store.getStats()).toEqual({
      totalItems: 4,
      containerCount: 3,
      leafItemCount: 1,
      openCount: 2,
      closedCount: 2,
      maxDepth: 2,
      avgDepth: 1,
      leafCount: 2,
      rootCount: 1,
      firstSnapshot: '2024-03-02',
      lastSnapshot: '2024-03-02',
    });
    expect(store.getStats('epic:9#9')).toMatchObject({ totalItems: 0, maxDepth: null, rootCount: 0 });
  });

  it('removes only old non-latest snapshots', async () => {
    await store.upsertBatch(sampleTree(), '2024-01-01');
    await store.upsertBatch(sampleTree(), '2024-03-01');

    const removed = store.cleanupOldSnapshots(30, new Date('2024-03-10T00:00:00Z'));

    expect(removed).toBe(4);
    expect(store.executeQuery('SELECT DISTINCT snapshot_date FROM work_item_hierarchy')).toEqual([
      { snapshot_date: '2024-03-01' },
    ]);
  });

  it('exports the latest rows parents first', async () => {
    await store.upsertBatch(sampleTree(), '2024-03-01');

    expect(store.exportRows('epic:1#1').map((row) => row.id)).toEqual(['epic:1#1', 'epic:1#2', 'issue:5#1', 'epic:1#3']);
    expect(store.exportRows('epic:9#9')).toEqual([]);
  });

  it('refuses statements that write', () => {
    expect(() => store.executeQuery('DELETE FROM work_item_hierarchy')).toThrow(StorageError);
  });

  it('wraps SQL errors as StorageError', () => {
    expect(() => store.executeQuery('SELECT nope FROM missing_table')).toThrow(StorageError);
  });

  it('lets only one writer hold the database', async () => {
    const second = new SqliteHierarchyStore(dbPath, { lockRetries: 0 });
    const reader = new SqliteHierarchyStore(dbPath, { exclusive: false });

    await expect(second.initialize()).rejects.toBeInstanceOf(StorageError);
    await reader.initialize();
    expect(reader.getStats().totalItems).toBe(0);
    await reader.close();
  });

  it('requires initialize before use', () => {
    const fresh = new SqliteHierarchyStore(join(dir, 'other.db'));

    expect(() => fresh.getRootItems()).toThrow('store not initialized');
  });
});

describe('toSnapshotDate', () => {
  it('formats the UTC calendar date', () => {
    expect(toSnapshotDate(new Date('2024-03-10T23:30:00Z'))).toBe('2024-03-10');
  });
});

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { assembleHierarchy } from '../pipeline.js';
import { buildFromRoot } from '../traversal_engine.js';
import { buildFromScope } from '../batch_graph_builder.js';
import type { BuildResult } from '../types.js';
import { placeRoot, placeUnder } from '../placement.js';
import { FakeSource, byId, makeContainer, makeLeaf } from './helpers.js';

const NOW = new Date('2024-03-10T12:00:00Z');
const ROOT = { scopeId: 1, iid: 1 };

const R = makeContainer({ groupId: 1, iid: 1, internalId: 10 });
const A = makeContainer({ groupId: 1, iid: 2, internalId: 20, parentInternalId: 10 });
const B = makeContainer({ groupId: 1, iid: 3, internalId: 30, parentInternalId: 10 });

describe('assembleHierarchy', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  it('annotates a two-child tree end to end', async () => {
    const source = new FakeSource([R, A, B]).addLeaves(A, [makeLeaf({ projectId: 5, iid: 1, internalId: 50, state: 'closed' })]);

    const { nodes, report } = assembleHierarchy(await buildFromRoot(source, ROOT), NOW);

    expect(byId(nodes, 'epic:1#1')).toMatchObject({ childCount: 2, descendantCount: 3, completionPct: 0 });
    expect(byId(nodes, 'epic:1#2').completionPct).toBe(100);
    expect(byId(nodes, 'epic:1#3')).toMatchObject({ completionPct: null, isLeaf: true });
    expect(report).toMatchObject({
      strategy: 'traversal',
      rootId: 'epic:1#1',
      totalNodes: 4,
      containerCount: 3,
      leafItemCount: 1,
      maxDepth: 2,
      cycleCount: 0,
      depthExceededCount: 0,
    });
  });

  it('keeps a three-level tree within maxDepth 1 and reports the truncation', async () => {
    const C = makeContainer({ groupId: 1, iid: 4, internalId: 40, parentInternalId: 20 });
    const source = new FakeSource([R, A, B, C]);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    const { nodes, report } = assembleHierarchy(await buildFromRoot(source, ROOT, { maxDepth: 1, includeClosed: true }), NOW);

    expect(nodes.map((node) => node.depth)).toEqual([0, 1, 1]);
    expect(report.depthExceededCount).toBe(2);
    expect(report.maxDepth).toBe(1);
    expect(warn).toHaveBeenCalledWith('Max depth 1 reached, not expanding container', { nodeId: 'epic:1#2' });
  });

  it('keeps depth, path and root consistent for every node', async () => {
    const C = makeContainer({ groupId: 2, iid: 1, internalId: 40, parentInternalId: 30 });
    const source = new FakeSource([R, A, B, C]).addLeaves(C, [makeLeaf({ projectId: 7, iid: 3, internalId: 70 })]);

    const { nodes } = assembleHierarchy(await buildFromScope(source, source.containers, ROOT, { maxDepth: 20, includeClosed: true }), NOW);

    for (const node of nodes) {
      const segments = node.hierarchyPath.split('/');
      expect(segments).toHaveLength(node.depth + 1);
      expect(segments[0]).toBe(node.rootId);
      expect(segments[segments.length - 1]).toBe(node.id);
      expect(node.rootId).toBe('epic:1#1');
      if (node.parentId !== null) {
        expect(byId(nodes, node.parentId).depth).toBe(node.depth - 1);
      }
    }
  });

  it('carries build counts and adds missing-parent conditions to the report', () => {
    const root = placeRoot(R);
    const stray = { ...placeUnder(A, root), parentId: 'epic:1#404' };
    const build: BuildResult = {
      strategy: 'batch',
      rootId: root.id,
      nodes: [root, stray],
      conditions: [{ kind: 'orphaned_scope', orphanedIds: ['epic:9#9'] }],
      orphanedCount: 1,
      truncatedCount: 2,
      duplicateCount: 3,
    };

    const { report } = assembleHierarchy(build, NOW);

    expect(report).toMatchObject({ orphanedCount: 1, truncatedCount: 2, duplicateCount: 3, missingParentCount: 1 });
    expect(report.conditions).toEqual([
      { kind: 'orphaned_scope', orphanedIds: ['epic:9#9'] },
      { kind: 'missing_parent', nodeId: 'epic:1#2', parentId: 'epic:1#404' },
    ]);
  });
});

import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest';
import { HierarchyExtractor } from '../extractor.js';
import { RootNotFoundError, SourceAuthError } from '../../core/errors.js';
import { GitLabSource } from '../../source/gitlab_source.js';
import type { FetchedNode, NodeLocator } from '../../hierarchy/types.js';
import { FakeSource, byId, makeContainer, makeLeaf } from '../../hierarchy/__tests__/helpers.js';
import type { LabeledNode } from '../../labels/label_parser.js';
import type { HierarchySink, UpsertProgress, UpsertResult } from '../../storage/types.js';
import { TimeoutError } from '../../utils/async.js';

class RecordingSink implements HierarchySink {
  readonly batches: Array<{ nodes: readonly LabeledNode[]; snapshotDate: string }> = [];

  async upsertBatch(
    nodes: readonly LabeledNode[],
    snapshotDate: string,
    onProgress?: UpsertProgress,
  ): Promise<UpsertResult> {
    this.batches.push({ nodes, snapshotDate });
    nodes.forEach((_, index) => onProgress?.(index + 1, nodes.length));
    return { inserted: nodes.length, replaced: 0 };
  }
}

const NOW = new Date('2024-03-10T12:00:00Z');

function sampleSource(): FakeSource {
  const root = makeContainer({ groupId: 1, iid: 1, internalId: 10 });
  const a = makeContainer({ groupId: 1, iid: 2, internalId: 20, parentInternalId: 10 });
  const b = makeContainer({ groupId: 1, iid: 3, internalId: 30, parentInternalId: 10, state: 'closed' });
  const stray = makeContainer({ groupId: 2, iid: 1, internalId: 90, parentInternalId: 999 });
  const leaf: FetchedNode = {
    ...makeLeaf({ projectId: 5, iid: 1, internalId: 50, state: 'closed' }),
    labels: ['priority::high', 'team-core', 'area::web'],
  };
  return new FakeSource([root, a, b, stray]).addLeaves(a, [leaf]);
}

describe('HierarchyExtractor', () => {
  let source: FakeSource;
  let sink: RecordingSink;
  let extractor: HierarchyExtractor;

  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    source = sampleSource();
    sink = new RecordingSink();
    extractor = new HierarchyExtractor({ source, sink, clock: () => NOW });
  });

  it('extracts, annotates and stores the tree below a root', async () => {
    const summary = await extractor.extract({ groupId: 1, epicIid: 1 });

    expect(summary).toMatchObject({
      strategy: 'traversal',
      rootId: 'epic:1#1',
      snapshotDate: '2024-03-10',
      totalItems: 4,
      containerCount: 3,
      leafItemCount: 1,
      openCount: 2,
      closedCount: 2,
      maxDepth: 2,
      avgDepth: 1,
      leafCount: 2,
      orphanedCount: 0,
      conditions: [],
      customLabelCategories: ['area'],
      inserted: 4,
      replaced: 0,
    });
    expect(summary.elapsedMs).toBeGreaterThanOrEqual(0);
    expect(sink.batches).toHaveLength(1);
    expect(sink.batches[0]?.snapshotDate).toBe('2024-03-10');
  });

  it('hands labelled, annotated nodes to the sink', async () => {
    await extractor.extract({ groupId: 1, epicIid: 1 });

    const nodes = sink.batches[0]?.nodes ?? [];
    expect(byId(nodes, 'issue:5#1').labelColumns).toEqual({
      priority: 'high',
      type: null,
      status: null,
      team: 'core',
      component: null,
      custom: ['area:web'],
    });
    expect(byId(nodes, 'epic:1#2')).toMatchObject({ completionPct: 100, childCount: 1, depth: 1 });
  });

  it('checks configured label patterns before the built-in ones', async () => {
    extractor = new HierarchyExtractor({
      source,
      sink,
      clock: () => NOW,
      labelPatterns: [{ prefix: 'area', column: 'component' }],
    });

    const summary = await extractor.extract({ groupId: 1, epicIid: 1 });

    const leaf = byId(sink.batches[0]?.nodes ?? [], 'issue:5#1');
    expect(leaf.labelColumns.component).toBe('web');
    expect(leaf.labelColumns.custom).toEqual([]);
    expect(summary.customLabelCategories).toEqual([]);
  });

  it('honours snapshot date, includeClosed and the progress callback', async () => {
    const progress: number[] = [];

    const summary = await extractor.extract({
      groupId: 1,
      epicIid: 1,
      snapshotDate: '2024-02-29',
      includeClosed: false,
      onProgress: (written) => progress.push(written),
    });

    expect(summary.snapshotDate).toBe('2024-02-29');
    expect(summary.totalItems).toBe(3);
    expect(summary.leafItemCount).toBe(0);
    expect(progress).toEqual([1, 2, 3]);
  });

  it('builds from a group scope and adds the root group to it', async () => {
    const summary = await extractor.extractFromGroups({ groupIds: [2], rootGroupId: 1, rootEpicIid: 1 });

    expect(source.calls[0]).toBe('scope 2,1');
    expect(summary).toMatchObject({ strategy: 'batch', totalItems: 4, orphanedCount: 1 });
    expect(summary.conditions).toEqual([{ kind: 'orphaned_scope', orphanedIds: ['epic:2#1'] }]);
  });

  it('does not repeat a root group that is already listed', async () => {
    await extractor.extractFromGroups({ groupIds: [1, 2], rootGroupId: 1, rootEpicIid: 1 });

    expect(source.calls[0]).toBe('scope 1,2');
  });

  it('propagates a missing root without writing anything', async () => {
    await expect(extractor.extract({ groupId: 1, epicIid: 99 })).rejects.toBeInstanceOf(RootNotFoundError);
    expect(sink.batches).toEqual([]);
  });

  it('gives up on a build that outlives its deadline', async () => {
    const stalled = new FakeSource();
    stalled.getRoot = (_locator: NodeLocator) => new Promise<FetchedNode>(() => {});
    extractor = new HierarchyExtractor({ source: stalled, sink, clock: () => NOW });

    await expect(extractor.extract({ groupId: 1, epicIid: 1, buildTimeoutMs: 10 })).rejects.toBeInstanceOf(
      TimeoutError,
    );
    expect(sink.batches).toEqual([]);
  });

  describe('with a source that refuses the token', () => {
    let fetchImpl: Mock<typeof fetch>;

    beforeEach(() => {
      fetchImpl = vi.fn<typeof fetch>(async () => new Response('{"message":"401 Unauthorized"}', { status: 401 }));
      const rejecting = new GitLabSource({
        baseUrl: 'https://gitlab.example.com',
        token: 'test-token',
        fetchImpl,
        sleepImpl: async () => {},
      });
      extractor = new HierarchyExtractor({ source: rejecting, sink, clock: () => NOW });
    });

    it('fails a root extraction before building', async () => {
      await expect(extractor.extract({ groupId: 1, epicIid: 1 })).rejects.toBeInstanceOf(SourceAuthError);
      expect(fetchImpl).toHaveBeenCalledTimes(1);
      expect(fetchImpl.mock.calls[0]?.[0]).toBe('https://gitlab.example.com/api/v4/user');
      expect(sink.batches).toEqual([]);
    });

    it('fails a group extraction instead of reporting a missing root', async () => {
      await expect(
        extractor.extractFromGroups({ groupIds: [1, 2], rootGroupId: 1, rootEpicIid: 1 }),
      ).rejects.toThrow('Authentication against https://gitlab.example.com/api/v4 failed: token rejected; check GITLAB_TOKEN');
      expect(fetchImpl).toHaveBeenCalledTimes(1);
      expect(sink.batches).toEqual([]);
    });
  });
});

/**
 * @fileoverview Batch graph builder
 *
 * Assembles the hierarchy from a scope-wide container fetch, resolving
 * parent/child edges purely from each container's `parentInternalId`. Used
 * when the source's server-side "children of X" filter cannot be trusted.
 *
 * Produces the same (id, parentId, depth, hierarchyPath) set as the traversal
 * engine for the same acyclic data; only edge discovery differs.
 *
 * @packageDocumentation
 */

import { RootNotFoundError } from '../core/errors.js';
import type { HierarchySource } from '../source/types.js';
import { logInfo } from '../telemetry/logger.js';
import {
  assertBuildOptions,
  attachLeafItems,
  createArena,
  placeContainerTree,
  seedArena,
  type ChildrenOf,
  type HasChildren,
  type LeafItemsOf,
} from './placement.js';
import {
  DEFAULT_BUILD_OPTIONS,
  formatLocator,
  type BuildResult,
  type BuildOptions,
  type FetchedNode,
  type NodeLocator,
} from './types.js';

// ============================================================================
// SCOPE INDEX
// ============================================================================

export interface ScopeIndex {
  /** Unique containers in fetch order. */
  readonly containers: readonly FetchedNode[];
  /** parentInternalId -> children, in fetch order. */
  readonly childrenByParent: ReadonlyMap<number, readonly FetchedNode[]>;
  readonly duplicateCount: number;
}

export function indexScope(fetched: readonly FetchedNode[]): ScopeIndex {
  const seen = new Set<string>();
  const containers: FetchedNode[] = [];
  const childrenByParent = new Map<number, FetchedNode[]>();
  let duplicateCount = 0;

  for (const node of fetched) {
    if (node.type !== 'container') continue;
    if (seen.has(node.id)) {
      duplicateCount += 1;
      continue;
    }
    seen.add(node.id);
    containers.push(node);
    if (node.parentInternalId === null) continue;
    const siblings = childrenByParent.get(node.parentInternalId);
    if (siblings) {
      siblings.push(node);
    } else {
      childrenByParent.set(node.parentInternalId, [node]);
    }
  }

  return { containers, childrenByParent, duplicateCount };
}

export function findRoot(index: ScopeIndex, locator: NodeLocator): FetchedNode | null {
  return index.containers.find((node) => node.scopeId === locator.scopeId && node.iid === locator.iid) ?? null;
}

/**
 * Ids of every container structurally reachable from `root`, ignoring depth.
 */
export function reachableIds(index: ScopeIndex, root: FetchedNode): Set<string> {
  const reached = new Set<string>([root.id]);
  const queue: FetchedNode[] = [root];
  for (let head = 0; head < queue.length; head += 1) {
    const children = index.childrenByParent.get(queue[head].internalId) ?? [];
    for (const child of children) {
      if (reached.has(child.id)) continue;
      reached.add(child.id);
      queue.push(child);
    }
  }
  return reached;
}

// ============================================================================
// BUILD
// ============================================================================

/**
 * Build the tree below `rootLocator` from an already-fetched container set.
 * Leaf items are still fetched per container from `source`.
 *
 * @throws RootNotFoundError when no fetched container matches `rootLocator`,
 * which means the requested scope was too narrow.
 */
export async function buildFromScope(
  source: HierarchySource,
  allContainers: readonly FetchedNode[],
  rootLocator: NodeLocator,
  options: BuildOptions = DEFAULT_BUILD_OPTIONS,
): Promise<BuildResult> {
  assertBuildOptions(options);
  const index = indexScope(allContainers);
  const root = findRoot(index, rootLocator);
  if (!root) {
    throw new RootNotFoundError(
      formatLocator(rootLocator),
      `not among the ${index.containers.length} container(s) fetched for the scope`,
    );
  }
  logInfo(`Building hierarchy in memory from ${index.containers.length} container(s)`, {
    rootId: root.id,
    duplicates: index.duplicateCount,
  });

  const arena = createArena();
  const placedRoot = seedArena(arena, root);

  const childrenOf: ChildrenOf = async (container) => index.childrenByParent.get(container.internalId) ?? [];
  const leafItemsOf: LeafItemsOf = (container) =>
    source.getLeafItems({ scopeId: container.scopeId, iid: container.iid });

  const hasChildren: HasChildren = (container) => index.childrenByParent.has(container.internalId);
  await placeContainerTree(arena, placedRoot, childrenOf, options.maxDepth, hasChildren);
  const placedContainers = arena.nodes.length;

  const reached = reachableIds(index, root);
  const orphanedIds = index.containers.filter((node) => !reached.has(node.id)).map((node) => node.id);
  const truncatedCount = reached.size - placedContainers;
  if (orphanedIds.length > 0) {
    arena.conditions.push({ kind: 'orphaned_scope', orphanedIds });
    logInfo(`${orphanedIds.length} container(s) in scope are unreachable from the root`, {
      rootId: root.id,
    });
  }

  await attachLeafItems(arena, leafItemsOf, options);

  logInfo(`Found ${placedContainers} container(s) and ${arena.nodes.length - placedContainers} leaf item(s)`, {
    rootId: root.id,
    orphaned: orphanedIds.length,
    truncated: truncatedCount,
  });

  return {
    strategy: 'batch',
    rootId: root.id,
    nodes: arena.nodes,
    conditions: arena.conditions,
    orphanedCount: orphanedIds.length,
    truncatedCount,
    duplicateCount: index.duplicateCount,
  };
}

/**
 * Fetch every container in `scopeIds` and build from it.
 */
export async function buildFromSourceScope(
  source: HierarchySource,
  scopeIds: readonly number[],
  rootLocator: NodeLocator,
  options: BuildOptions = DEFAULT_BUILD_OPTIONS,
): Promise<BuildResult> {
  const containers = await source.getAllContainersInScope(scopeIds);
  return buildFromScope(source, containers, rootLocator, options);
}

/**
 * @fileoverview Shared placement routine for both construction strategies
 *
 * The traversal engine and the batch graph builder differ only in how they
 * discover a container's children. Everything else lives here: the visited
 * check, depth truncation, hierarchy-path assignment and leaf attachment.
 *
 * The descent uses an explicit stack of frames rather than recursion. Each
 * frame holds a placed container and the children discovered for it, so a
 * child is placed and expanded before its next sibling is looked at, which
 * gives the same depth-first order a recursive walk would.
 *
 * @packageDocumentation
 */

import { ConfigurationError } from '../core/errors.js';
import { logDebug, logWarning } from '../telemetry/logger.js';
import { getErrorMessage } from '../utils/errors.js';
import type {
  BuildCondition,
  BuildOptions,
  FetchedNode,
  PlacedNode,
} from './types.js';

// ============================================================================
// TYPES
// ============================================================================

/** How a strategy discovers the direct child containers of a container. */
export type ChildrenOf = (container: PlacedNode) => Promise<readonly FetchedNode[]>;

/**
 * Whether a container has any child containers, for strategies that hold the
 * whole edge set up front. A childless container at maxDepth is not reported
 * as depth_exceeded.
 */
export type HasChildren = (container: PlacedNode) => boolean;

/** How a strategy fetches the leaf items owned by a container. */
export type LeafItemsOf = (container: PlacedNode) => Promise<readonly FetchedNode[]>;

/**
 * Single-owner node store for one build: the placed nodes in assembly order
 * plus an id index that doubles as the visited set.
 */
export interface PlacementArena {
  readonly nodes: PlacedNode[];
  readonly indexById: Map<string, number>;
  readonly conditions: BuildCondition[];
}

interface Frame {
  readonly parent: PlacedNode;
  readonly pending: readonly FetchedNode[];
  cursor: number;
}

// ============================================================================
// ARENA
// ============================================================================

export function createArena(): PlacementArena {
  return { nodes: [], indexById: new Map(), conditions: [] };
}

export function hasVisited(arena: PlacementArena, id: string): boolean {
  return arena.indexById.has(id);
}

function append(arena: PlacementArena, node: PlacedNode): PlacedNode {
  arena.indexById.set(node.id, arena.nodes.length);
  arena.nodes.push(node);
  return node;
}

// ============================================================================
// PLACEMENT
// ============================================================================

export function placeRoot(root: FetchedNode): PlacedNode {
  return {
    ...root,
    parentId: null,
    parentType: null,
    rootId: root.id,
    depth: 0,
    hierarchyPath: root.id,
  };
}

export function placeUnder(node: FetchedNode, parent: PlacedNode): PlacedNode {
  return {
    ...node,
    parentId: parent.id,
    parentType: parent.type,
    rootId: parent.rootId,
    depth: parent.depth + 1,
    hierarchyPath: `${parent.hierarchyPath}/${node.id}`,
  };
}

/**
 * Place the root as the first node of an empty arena.
 */
export function seedArena(arena: PlacementArena, root: FetchedNode): PlacedNode {
  if (arena.nodes.length > 0) {
    throw new Error('seedArena requires an empty arena');
  }
  return append(arena, placeRoot(root));
}

/**
 * Place `node` under `parent` unless its id was already placed, in which case
 * a cycle_detected condition is recorded and null returned.
 */
export function tryPlace(arena: PlacementArena, node: FetchedNode, parent: PlacedNode): PlacedNode | null {
  if (hasVisited(arena, node.id)) {
    arena.conditions.push({ kind: 'cycle_detected', nodeId: node.id, parentId: parent.id });
    logWarning('Cycle detected: node already placed, skipping', { nodeId: node.id, parentId: parent.id });
    return null;
  }
  return append(arena, placeUnder(node, parent));
}

export function assertBuildOptions(options: BuildOptions): void {
  if (!Number.isInteger(options.maxDepth) || options.maxDepth < 0) {
    throw new ConfigurationError('maxDepth', `expected a non-negative integer, got ${options.maxDepth}`);
  }
}

async function expand(
  arena: PlacementArena,
  container: PlacedNode,
  childrenOf: ChildrenOf,
  maxDepth: number,
  hasChildren: HasChildren | undefined,
): Promise<Frame | null> {
  if (container.depth >= maxDepth) {
    if (hasChildren && !hasChildren(container)) return null;
    arena.conditions.push({ kind: 'depth_exceeded', nodeId: container.id, depth: container.depth, maxDepth });
    logWarning(`Max depth ${maxDepth} reached, not expanding container`, { nodeId: container.id });
    return null;
  }
  try {
    const pending = await childrenOf(container);
    logDebug(`Found ${pending.length} child container(s) at depth ${container.depth + 1}`, { nodeId: container.id });
    return { parent: container, pending, cursor: 0 };
  } catch (error) {
    const message = getErrorMessage(error);
    arena.conditions.push({ kind: 'transient_fetch', nodeId: container.id, operation: 'children', message });
    logWarning('Could not fetch child containers, treating as childless', { nodeId: container.id, error: message });
    return null;
  }
}

/**
 * Place every container reachable from `root` within `maxDepth`.
 */
export async function placeContainerTree(
  arena: PlacementArena,
  root: PlacedNode,
  childrenOf: ChildrenOf,
  maxDepth: number,
  hasChildren?: HasChildren,
): Promise<void> {
  const stack: Frame[] = [];
  const first = await expand(arena, root, childrenOf, maxDepth, hasChildren);
  if (first) stack.push(first);

  while (stack.length > 0) {
    const top = stack[stack.length - 1];
    if (top.cursor >= top.pending.length) {
      stack.pop();
      continue;
    }
    const child = top.pending[top.cursor];
    top.cursor += 1;

    const placed = tryPlace(arena, child, top.parent);
    if (!placed) continue;

    const frame = await expand(arena, placed, childrenOf, maxDepth, hasChildren);
    if (frame) stack.push(frame);
  }
}

/**
 * Attach leaf items one level below every container placed so far.
 * Containers at maxDepth get none, so leaf items never exceed it either.
 */
export async function attachLeafItems(
  arena: PlacementArena,
  leafItemsOf: LeafItemsOf,
  options: BuildOptions,
): Promise<void> {
  const containers = arena.nodes.filter((node) => node.type === 'container');

  for (const container of containers) {
    if (container.depth >= options.maxDepth) continue;

    let items: readonly FetchedNode[];
    try {
      items = await leafItemsOf(container);
    } catch (error) {
      const message = getErrorMessage(error);
      arena.conditions.push({ kind: 'transient_fetch', nodeId: container.id, operation: 'leaf_items', message });
      logWarning('Could not fetch leaf items, treating as childless', { nodeId: container.id, error: message });
      continue;
    }
    logDebug(`Found ${items.length} leaf item(s)`, { nodeId: container.id });

    for (const item of items) {
      if (!options.includeClosed && item.state === 'closed') continue;
      tryPlace(arena, item, container);
    }
  }
}

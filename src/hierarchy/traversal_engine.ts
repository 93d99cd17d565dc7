/**
 * @fileoverview Traversal engine
 *
 * Builds one tree from a declared root by asking the source for each
 * container's children, one level at a time. Suited to small or targeted
 * pulls; for scope-wide pulls where the source's parent filter cannot be
 * trusted, see batch_graph_builder.ts.
 *
 * @packageDocumentation
 */

import { RootNotFoundError, SourceAuthError, isRootNotFoundError } from '../core/errors.js';
import type { HierarchySource } from '../source/types.js';
import { logInfo } from '../telemetry/logger.js';
import { getErrorMessage, toError } from '../utils/errors.js';
import {
  assertBuildOptions,
  attachLeafItems,
  createArena,
  placeContainerTree,
  seedArena,
  type ChildrenOf,
  type LeafItemsOf,
} from './placement.js';
import {
  DEFAULT_BUILD_OPTIONS,
  formatLocator,
  type BuildOptions,
  type BuildResult,
  type FetchedNode,
  type NodeLocator,
} from './types.js';

async function fetchRoot(source: HierarchySource, locator: NodeLocator): Promise<FetchedNode> {
  try {
    return await source.getRoot(locator);
  } catch (error) {
    if (isRootNotFoundError(error) || error instanceof SourceAuthError) throw error;
    throw new RootNotFoundError(formatLocator(locator), getErrorMessage(error), toError(error));
  }
}

/**
 * Build the full tree below `rootLocator`.
 *
 * @throws RootNotFoundError when the root itself cannot be fetched. Every
 * other failure is absorbed into the result's conditions.
 */
export async function buildFromRoot(
  source: HierarchySource,
  rootLocator: NodeLocator,
  options: BuildOptions = DEFAULT_BUILD_OPTIONS,
): Promise<BuildResult> {
  assertBuildOptions(options);
  logInfo(`Building hierarchy from root ${formatLocator(rootLocator)}`, {
    maxDepth: options.maxDepth,
    includeClosed: options.includeClosed,
  });

  const root = await fetchRoot(source, rootLocator);
  const arena = createArena();
  const placedRoot = seedArena(arena, root);

  const childrenOf: ChildrenOf = (container) =>
    source.getChildren({ scopeId: container.scopeId, iid: container.iid, internalId: container.internalId });
  const leafItemsOf: LeafItemsOf = (container) =>
    source.getLeafItems({ scopeId: container.scopeId, iid: container.iid });

  await placeContainerTree(arena, placedRoot, childrenOf, options.maxDepth);
  const containerCount = arena.nodes.length;
  await attachLeafItems(arena, leafItemsOf, options);

  logInfo(`Found ${containerCount} container(s) and ${arena.nodes.length - containerCount} leaf item(s)`, {
    rootId: placedRoot.id,
  });

  return {
    strategy: 'traversal',
    rootId: placedRoot.id,
    nodes: arena.nodes,
    conditions: arena.conditions,
    orphanedCount: 0,
    truncatedCount: 0,
    duplicateCount: 0,
  };
}

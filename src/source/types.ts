import type { ContainerRef, FetchedNode, NodeLocator } from '../hierarchy/types.js';

/**
 * Read-only access to a tracking service, as consumed by the builders.
 *
 * Implementations own retry, backoff and request pacing. Calls are awaited
 * one at a time; a builder never has two requests in flight.
 */
export interface HierarchySource {
  /** Rejects with SourceAuthError when the credentials are refused. Checked once before a build. */
  verifyAuth?(): Promise<unknown>;

  /** Rejects with RootNotFoundError when the container cannot be fetched. */
  getRoot(locator: NodeLocator): Promise<FetchedNode>;

  /** Direct child containers only. A rejection makes the builders treat the container as childless. */
  getChildren(container: ContainerRef): Promise<FetchedNode[]>;

  /** Leaf items attached to a container. A rejection is absorbed the same way. */
  getLeafItems(container: NodeLocator): Promise<FetchedNode[]>;

  /** Every container in the given scopes, with no parent filtering. */
  getAllContainersInScope(scopeIds: readonly number[]): Promise<FetchedNode[]>;
}

import { RootNotFoundError } from '../../core/errors.js';
import type { HierarchySource } from '../../source/types.js';
import type { ContainerRef, FetchedNode, NodeLocator, NodeState, PlacedNode } from '../types.js';

interface ContainerSpec {
  groupId: number;
  iid: number;
  internalId: number;
  parentInternalId?: number | null;
  state?: NodeState;
  createdAt?: string;
  closedAt?: string | null;
  dueDate?: string | null;
}

interface LeafSpec {
  projectId: number;
  iid: number;
  internalId: number;
  state?: NodeState;
  createdAt?: string;
  closedAt?: string | null;
  dueDate?: string | null;
}

export function makeContainer(fields: ContainerSpec): FetchedNode {
  return {
    id: `epic:${fields.groupId}#${fields.iid}`,
    internalId: fields.internalId,
    type: 'container',
    scopeId: fields.groupId,
    iid: fields.iid,
    parentInternalId: fields.parentInternalId ?? null,
    title: `Epic ${fields.iid}`,
    state: fields.state ?? 'opened',
    createdAt: fields.createdAt ?? '2024-01-01T00:00:00Z',
    updatedAt: '2024-01-02T00:00:00Z',
    closedAt: fields.closedAt ?? null,
    dueDate: fields.dueDate ?? null,
    labels: [],
    details: {},
  };
}

export function makeLeaf(fields: LeafSpec): FetchedNode {
  return {
    id: `issue:${fields.projectId}#${fields.iid}`,
    internalId: fields.internalId,
    type: 'leaf',
    scopeId: fields.projectId,
    iid: fields.iid,
    parentInternalId: null,
    title: `Issue ${fields.iid}`,
    state: fields.state ?? 'opened',
    createdAt: fields.createdAt ?? '2024-01-01T00:00:00Z',
    updatedAt: '2024-01-02T00:00:00Z',
    closedAt: fields.closedAt ?? null,
    dueDate: fields.dueDate ?? null,
    labels: [],
    details: {},
  };
}

function key(locator: NodeLocator): string {
  return `${locator.scopeId}#${locator.iid}`;
}

/**
 * In-process stand-in for a tracking service. Children are answered from
 * `parentInternalId`, exactly like a correct server-side filter would.
 */
export class FakeSource implements HierarchySource {
  readonly calls: string[] = [];
  readonly failChildrenFor = new Set<number>();
  readonly failLeavesFor = new Set<string>();
  /** Overrides the child answer for a parent internal id. */
  readonly childOverrides = new Map<number, FetchedNode[]>();
  private readonly leaves = new Map<string, FetchedNode[]>();

  constructor(readonly containers: FetchedNode[] = []) {}

  addLeaves(container: FetchedNode, items: FetchedNode[]): this {
    this.leaves.set(key(container), items);
    return this;
  }

  async getRoot(locator: NodeLocator): Promise<FetchedNode> {
    this.calls.push(`root ${key(locator)}`);
    const found = this.containers.find((node) => key(node) === key(locator));
    if (!found) throw new RootNotFoundError(key(locator), 'no such container');
    return found;
  }

  async getChildren(container: ContainerRef): Promise<FetchedNode[]> {
    this.calls.push(`children ${container.internalId}`);
    if (this.failChildrenFor.has(container.internalId)) {
      throw new Error('connection reset');
    }
    const override = this.childOverrides.get(container.internalId);
    if (override) return override;
    return this.containers.filter((node) => node.parentInternalId === container.internalId);
  }

  async getLeafItems(container: NodeLocator): Promise<FetchedNode[]> {
    this.calls.push(`leaves ${key(container)}`);
    if (this.failLeavesFor.has(key(container))) {
      throw new Error('gateway timeout');
    }
    return this.leaves.get(key(container)) ?? [];
  }

  async getAllContainersInScope(scopeIds: readonly number[]): Promise<FetchedNode[]> {
    this.calls.push(`scope ${scopeIds.join(',')}`);
    return this.containers.filter((node) => scopeIds.includes(node.scopeId));
  }
}

export function byId<T extends { id: string }>(nodes: readonly T[], id: string): T {
  const found = nodes.find((node) => node.id === id);
  if (!found) throw new Error(`node ${id} not in result`);
  return found;
}

export function shape(nodes: readonly PlacedNode[]): string[] {
  return nodes.map((node) => `${node.id}|${node.parentId ?? '-'}|${node.depth}|${node.hierarchyPath}`).sort();
}

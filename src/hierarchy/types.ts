/**
 * @fileoverview Node model for hierarchy assembly
 *
 * A work item passes through four phases, each with its own immutable type:
 *
 *   FetchedNode   - as returned by the source
 *   PlacedNode    - plus hierarchy fields, set once during assembly
 *   AnnotatedNode - plus relationship fields, set once after assembly
 *   FinalNode     - plus metric fields, ready for the sink
 *
 * Every phase is a pure transformation into the next type.
 *
 * @packageDocumentation
 */

// ============================================================================
// PRIMITIVES
// ============================================================================

export type NodeType = 'container' | 'leaf';

export type NodeState = 'opened' | 'closed';

/**
 * Addresses a node inside its scope: a group for containers, a project for
 * leaf items, plus the scope-local number.
 */
export interface NodeLocator {
  readonly scopeId: number;
  readonly iid: number;
}

/** A container locator that also carries the source's internal identity. */
export interface ContainerRef extends NodeLocator {
  readonly internalId: number;
}

/**
 * Descriptive attributes the source may supply. None of them participate in
 * assembly; they are carried through to the sink.
 */
export interface NodeDetails {
  readonly description?: string | null;
  readonly webUrl?: string | null;
  readonly authorUsername?: string | null;
  readonly authorName?: string | null;
  readonly assigneeUsername?: string | null;
  readonly assigneeName?: string | null;
  readonly milestoneTitle?: string | null;
  readonly milestoneId?: number | null;
  readonly startDate?: string | null;
  readonly endDate?: string | null;
  readonly issueType?: string | null;
  readonly confidential?: boolean;
  readonly discussionLocked?: boolean;
  readonly weight?: number | null;
  readonly timeEstimate?: number | null;
  readonly timeSpent?: number | null;
  readonly severity?: string | null;
  readonly upvotes?: number;
  readonly downvotes?: number;
  readonly userNotesCount?: number;
  readonly mergeRequestsCount?: number;
  readonly hasTasks?: boolean;
  readonly tasksCompleted?: number | null;
}

// ============================================================================
// PHASE TYPES
// ============================================================================

export interface FetchedNode extends NodeLocator {
  /** Externally stable id, e.g. `epic:42#7`. Unique within one build. */
  readonly id: string;
  /** Source-assigned identity; only used to resolve parent linkage. */
  readonly internalId: number;
  readonly type: NodeType;
  /** Containers only. */
  readonly parentInternalId: number | null;
  readonly title: string;
  readonly state: NodeState;
  readonly createdAt: string;
  readonly updatedAt: string;
  readonly closedAt: string | null;
  readonly dueDate: string | null;
  readonly labels: readonly string[];
  readonly details: NodeDetails;
}

export interface Placement {
  readonly parentId: string | null;
  readonly parentType: NodeType | null;
  readonly rootId: string;
  readonly depth: number;
  readonly hierarchyPath: string;
}

export interface Relationships {
  readonly childCount: number;
  readonly descendantCount: number;
  readonly isLeaf: boolean;
  readonly siblingPosition: number;
}

export interface Metrics {
  readonly daysOpen: number | null;
  readonly daysToClose: number | null;
  readonly isOverdue: boolean;
  readonly daysOverdue: number | null;
  readonly completionPct: number | null;
}

export type PlacedNode = FetchedNode & Placement;
export type AnnotatedNode = PlacedNode & Relationships;
export type FinalNode = AnnotatedNode & Metrics;

// ============================================================================
// BUILD CONDITIONS
// ============================================================================

/**
 * Everything a build absorbs instead of failing. Conditions surface only
 * through logs and the build report.
 */
export type BuildCondition =
  | { readonly kind: 'cycle_detected'; readonly nodeId: string; readonly parentId: string }
  | { readonly kind: 'depth_exceeded'; readonly nodeId: string; readonly depth: number; readonly maxDepth: number }
  | {
      readonly kind: 'transient_fetch';
      readonly nodeId: string;
      readonly operation: 'children' | 'leaf_items';
      readonly message: string;
    }
  | { readonly kind: 'orphaned_scope'; readonly orphanedIds: readonly string[] }
  | { readonly kind: 'missing_parent'; readonly nodeId: string; readonly parentId: string };

export type BuildConditionKind = BuildCondition['kind'];

export interface BuildOptions {
  /** Deepest level that may appear in the output; the root is depth 0. */
  readonly maxDepth: number;
  /** When false, closed leaf items are dropped. Containers are never filtered. */
  readonly includeClosed: boolean;
}

export const DEFAULT_BUILD_OPTIONS: BuildOptions = {
  maxDepth: 20,
  includeClosed: true,
};

export type BuildStrategy = 'traversal' | 'batch';

export interface BuildResult {
  readonly strategy: BuildStrategy;
  readonly rootId: string;
  /** Placed nodes in assembly order: containers first, then leaf items. */
  readonly nodes: readonly PlacedNode[];
  readonly conditions: readonly BuildCondition[];
  /** Scope containers unreachable from the root (batch strategy only). */
  readonly orphanedCount: number;
  /** Reachable containers cut off by maxDepth (batch strategy only). */
  readonly truncatedCount: number;
  /** Scope containers dropped because their id was already fetched. */
  readonly duplicateCount: number;
}

// ============================================================================
// HELPERS
// ============================================================================

export function formatLocator(locator: NodeLocator): string {
  return `${locator.scopeId}#${locator.iid}`;
}

export function isContainer(node: { readonly type: NodeType }): boolean {
  return node.type === 'container';
}

export function countConditions(
  conditions: readonly BuildCondition[],
  kind: BuildConditionKind,
): number {
  return conditions.filter((condition) => condition.kind === kind).length;
}

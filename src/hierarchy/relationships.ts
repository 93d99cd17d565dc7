/**
 * @fileoverview Relationship calculator
 *
 * One full pass over a finished build: child counts, leaf flags, descendant
 * counts and sibling positions. Must run after assembly completes, since
 * every count depends on the whole node set.
 */

import { logWarning } from '../telemetry/logger.js';
import type { AnnotatedNode, BuildCondition, PlacedNode } from './types.js';

export interface RelationshipPass {
  readonly nodes: AnnotatedNode[];
  /** One missing_parent condition per node whose parent is absent. */
  readonly conditions: BuildCondition[];
}

/**
 * Parent id -> child ids, in the order the children appear in `nodes`.
 * Nodes whose parent is not part of `nodes` are left out.
 */
export function indexChildren(nodes: readonly PlacedNode[]): Map<string, string[]> {
  const present = new Set(nodes.map((node) => node.id));
  const children = new Map<string, string[]>();
  for (const node of nodes) {
    if (node.parentId === null || !present.has(node.parentId)) continue;
    const siblings = children.get(node.parentId);
    if (siblings) {
      siblings.push(node.id);
    } else {
      children.set(node.parentId, [node.id]);
    }
  }
  return children;
}

/**
 * Descendant count per id. Nodes are folded deepest-first so each child's
 * total is final before it is added to its parent.
 */
function countDescendants(nodes: readonly PlacedNode[], children: Map<string, string[]>): Map<string, number> {
  const totals = new Map<string, number>();
  const deepestFirst = [...nodes].sort((a, b) => b.depth - a.depth);
  for (const node of deepestFirst) {
    const kids = children.get(node.id) ?? [];
    let total = kids.length;
    for (const kid of kids) {
      total += totals.get(kid) ?? 0;
    }
    totals.set(node.id, total);
  }
  return totals;
}

export function annotateRelationshipsWithReport(nodes: readonly PlacedNode[]): RelationshipPass {
  const children = indexChildren(nodes);
  const descendants = countDescendants(nodes, children);
  const conditions: BuildCondition[] = [];
  const positions = new Map<string, number>();
  for (const ids of children.values()) {
    ids.forEach((id, index) => positions.set(id, index + 1));
  }

  const annotated = nodes.map((node): AnnotatedNode => {
    const kids = children.get(node.id) ?? [];
    let siblingPosition = 1;
    if (node.parentId !== null) {
      const position = positions.get(node.id);
      if (position !== undefined) {
        siblingPosition = position;
      } else {
        conditions.push({ kind: 'missing_parent', nodeId: node.id, parentId: node.parentId });
        logWarning('Parent not present in node set, counting node as parentless', {
          nodeId: node.id,
          parentId: node.parentId,
        });
      }
    }
    return {
      ...node,
      childCount: kids.length,
      descendantCount: descendants.get(node.id) ?? 0,
      isLeaf: kids.length === 0,
      siblingPosition,
    };
  });

  return { nodes: annotated, conditions };
}

export function annotateRelationships(nodes: readonly PlacedNode[]): AnnotatedNode[] {
  return annotateRelationshipsWithReport(nodes).nodes;
}

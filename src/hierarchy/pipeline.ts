/**
 * @fileoverview Post-assembly passes
 *
 * Turns a BuildResult into final nodes plus a report. The relationship pass
 * must run before the metrics pass: completion needs child counts.
 */

import { annotateMetrics } from './metrics.js';
import { annotateRelationshipsWithReport } from './relationships.js';
import {
  countConditions,
  type BuildCondition,
  type BuildResult,
  type BuildStrategy,
  type FinalNode,
} from './types.js';

export interface BuildReport {
  readonly strategy: BuildStrategy;
  readonly rootId: string;
  readonly totalNodes: number;
  readonly containerCount: number;
  readonly leafItemCount: number;
  readonly maxDepth: number;
  readonly orphanedCount: number;
  readonly truncatedCount: number;
  readonly duplicateCount: number;
  readonly cycleCount: number;
  readonly depthExceededCount: number;
  readonly transientFailureCount: number;
  readonly missingParentCount: number;
  readonly conditions: readonly BuildCondition[];
}

export interface AssembledHierarchy {
  readonly nodes: FinalNode[];
  readonly report: BuildReport;
}

export function assembleHierarchy(build: BuildResult, now: Date = new Date()): AssembledHierarchy {
  const relationships = annotateRelationshipsWithReport(build.nodes);
  const nodes = annotateMetrics(relationships.nodes, now);
  const conditions = [...build.conditions, ...relationships.conditions];

  const containerCount = nodes.filter((node) => node.type === 'container').length;
  const report: BuildReport = {
    strategy: build.strategy,
    rootId: build.rootId,
    totalNodes: nodes.length,
    containerCount,
    leafItemCount: nodes.length - containerCount,
    maxDepth: nodes.reduce((deepest, node) => Math.max(deepest, node.depth), 0),
    orphanedCount: build.orphanedCount,
    truncatedCount: build.truncatedCount,
    duplicateCount: build.duplicateCount,
    cycleCount: countConditions(conditions, 'cycle_detected'),
    depthExceededCount: countConditions(conditions, 'depth_exceeded'),
    transientFailureCount: countConditions(conditions, 'transient_fetch'),
    missingParentCount: countConditions(conditions, 'missing_parent'),
    conditions,
  };

  return { nodes, report };
}

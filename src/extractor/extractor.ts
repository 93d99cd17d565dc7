/**
 * @fileoverview Extraction orchestrator
 *
 * Wires one extraction end to end:
 *
 *   source -> build strategy -> relationships/metrics -> labels -> sink
 *
 * `extract` walks the tree level by level; `extractFromGroups` fetches every
 * container of the listed groups first and resolves edges in memory.
 */

import {
  assembleHierarchy,
  buildFromRoot,
  buildFromSourceScope,
  type BuildCondition,
  type BuildOptions,
  type BuildReport,
  type BuildResult,
  type BuildStrategy,
  type FinalNode,
} from '../hierarchy/index.js';
import { DEFAULT_LABEL_PATTERNS, LabelParser, type LabelPattern } from '../labels/label_parser.js';
import type { HierarchySource } from '../source/types.js';
import { toSnapshotDate } from '../storage/sqlite_storage.js';
import type { HierarchySink, UpsertProgress } from '../storage/types.js';
import { logInfo } from '../telemetry/logger.js';
import { withTimeout } from '../utils/async.js';

export interface HierarchyExtractorOptions {
  source: HierarchySource;
  sink: HierarchySink;
  /** Checked before the built-in patterns. */
  labelPatterns?: readonly LabelPattern[];
  /** Reference time for metrics and the default snapshot date. */
  clock?: () => Date;
}

export interface ExtractRunOptions {
  maxDepth?: number;
  includeClosed?: boolean;
  /** `YYYY-MM-DD`; defaults to today in UTC. */
  snapshotDate?: string;
  onProgress?: UpsertProgress;
  /** Deadline for the build phase; 0 or absent disables it. */
  buildTimeoutMs?: number;
}

export interface ExtractOptions extends ExtractRunOptions {
  groupId: number;
  epicIid: number;
}

export interface ExtractFromGroupsOptions extends ExtractRunOptions {
  groupIds: readonly number[];
  rootGroupId: number;
  rootEpicIid: number;
}

export interface ExtractionSummary {
  strategy: BuildStrategy;
  rootId: string;
  snapshotDate: string;
  totalItems: number;
  containerCount: number;
  leafItemCount: number;
  openCount: number;
  closedCount: number;
  maxDepth: number;
  avgDepth: number;
  /** Nodes without children, of either type. */
  leafCount: number;
  orphanedCount: number;
  truncatedCount: number;
  duplicateCount: number;
  conditions: readonly BuildCondition[];
  customLabelCategories: string[];
  inserted: number;
  replaced: number;
  elapsedMs: number;
}

const DEFAULT_MAX_DEPTH = 20;

export class HierarchyExtractor {
  private readonly source: HierarchySource;
  private readonly sink: HierarchySink;
  private readonly labelPatterns: readonly LabelPattern[];
  private readonly clock: () => Date;

  constructor(options: HierarchyExtractorOptions) {
    this.source = options.source;
    this.sink = options.sink;
    this.labelPatterns = [...(options.labelPatterns ?? []), ...DEFAULT_LABEL_PATTERNS];
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Extract the tree below one root epic by asking the source for each level.
   *
   * @throws SourceAuthError when the source refuses the credentials
   * @throws RootNotFoundError when the root epic cannot be fetched
   * @throws TimeoutError when the build outlives `buildTimeoutMs`
   */
  async extract(options: ExtractOptions): Promise<ExtractionSummary> {
    const locator = { scopeId: options.groupId, iid: options.epicIid };
    logInfo(`Extracting hierarchy below epic ${options.groupId}#${options.epicIid}`);
    return this.run(options, (buildOptions) => buildFromRoot(this.source, locator, buildOptions));
  }

  /**
   * Extract by fetching every epic of `groupIds` up front. The root's group
   * joins the scope when it is not listed.
   */
  async extractFromGroups(options: ExtractFromGroupsOptions): Promise<ExtractionSummary> {
    const scope = options.groupIds.includes(options.rootGroupId)
      ? [...options.groupIds]
      : [...options.groupIds, options.rootGroupId];
    const locator = { scopeId: options.rootGroupId, iid: options.rootEpicIid };
    logInfo(`Extracting hierarchy below epic ${options.rootGroupId}#${options.rootEpicIid} from groups`, {
      groups: scope,
    });
    return this.run(options, (buildOptions) => buildFromSourceScope(this.source, scope, locator, buildOptions));
  }

  private async run(
    options: ExtractRunOptions,
    build: (buildOptions: BuildOptions) => Promise<BuildResult>,
  ): Promise<ExtractionSummary> {
    const startedAt = Date.now();
    const now = this.clock();
    const snapshotDate = options.snapshotDate ?? toSnapshotDate(now);
    const buildOptions: BuildOptions = {
      maxDepth: options.maxDepth ?? DEFAULT_MAX_DEPTH,
      includeClosed: options.includeClosed ?? true,
    };

    if (this.source.verifyAuth) {
      await this.source.verifyAuth();
    }
    const result = await withTimeout(build(buildOptions), options.buildTimeoutMs, {
      context: 'building hierarchy',
      errorCode: 'BUILD_TIMEOUT',
    });
    const { nodes, report } = assembleHierarchy(result, now);

    const parser = new LabelParser(this.labelPatterns);
    const labeled = parser.parseNodes(nodes);

    logInfo(`Storing ${labeled.length} item(s) for snapshot ${snapshotDate}`);
    const written = await this.sink.upsertBatch(labeled, snapshotDate, options.onProgress);

    const summary = summarize(nodes, report, {
      snapshotDate,
      customLabelCategories: parser.getDiscoveredCategories(),
      inserted: written.inserted,
      replaced: written.replaced,
      elapsedMs: Date.now() - startedAt,
    });
    logSummary(summary);
    return summary;
  }
}

function summarize(
  nodes: readonly FinalNode[],
  report: BuildReport,
  extra: Pick<ExtractionSummary, 'snapshotDate' | 'customLabelCategories' | 'inserted' | 'replaced' | 'elapsedMs'>,
): ExtractionSummary {
  const openCount = nodes.filter((node) => node.state === 'opened').length;
  const depthTotal = nodes.reduce((total, node) => total + node.depth, 0);
  return {
    strategy: report.strategy,
    rootId: report.rootId,
    totalItems: report.totalNodes,
    containerCount: report.containerCount,
    leafItemCount: report.leafItemCount,
    openCount,
    closedCount: nodes.length - openCount,
    maxDepth: report.maxDepth,
    avgDepth: nodes.length > 0 ? depthTotal / nodes.length : 0,
    leafCount: nodes.filter((node) => node.isLeaf).length,
    orphanedCount: report.orphanedCount,
    truncatedCount: report.truncatedCount,
    duplicateCount: report.duplicateCount,
    conditions: report.conditions,
    ...extra,
  };
}

function logSummary(summary: ExtractionSummary): void {
  logInfo('Extraction complete', {
    rootId: summary.rootId,
    snapshotDate: summary.snapshotDate,
    totalItems: summary.totalItems,
    containers: summary.containerCount,
    leafItems: summary.leafItemCount,
    open: summary.openCount,
    closed: summary.closedCount,
    maxDepth: summary.maxDepth,
    avgDepth: Number(summary.avgDepth.toFixed(1)),
    conditions: summary.conditions.length,
    elapsedMs: summary.elapsedMs,
  });
}

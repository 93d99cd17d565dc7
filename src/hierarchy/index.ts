/**
 * @fileoverview Hierarchy assembly core
 *
 * Two construction strategies over one shared placement routine, followed by
 * the relationship and metrics passes:
 *
 * - `buildFromRoot` asks the source for each level (traversal engine)
 * - `buildFromScope` resolves edges from a scope-wide fetch (batch builder)
 * - `assembleHierarchy` annotates either result for the sink
 */

export * from './types.js';
export {
  buildFromRoot,
} from './traversal_engine.js';
export {
  buildFromScope,
  buildFromSourceScope,
  indexScope,
  findRoot,
  reachableIds,
  type ScopeIndex,
} from './batch_graph_builder.js';
export {
  createArena,
  seedArena,
  tryPlace,
  placeRoot,
  placeUnder,
  placeContainerTree,
  attachLeafItems,
  type ChildrenOf,
  type LeafItemsOf,
  type PlacementArena,
} from './placement.js';
export {
  annotateRelationships,
  annotateRelationshipsWithReport,
  indexChildren,
  type RelationshipPass,
} from './relationships.js';
export {
  annotateMetrics,
  computeMetrics,
  parseTimestamp,
  parseCalendarDate,
  wholeDaysBetween,
  DAY_MS,
  COMPLETION_PRECISION,
} from './metrics.js';
export {
  assembleHierarchy,
  type AssembledHierarchy,
  type BuildReport,
} from './pipeline.js';

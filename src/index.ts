/**
 * @fileoverview workitem-hierarchy public API
 *
 * Extracts a GitLab epic tree (epics, child epics and their issues) into a
 * flat, annotated node list and stores it as a dated snapshot in SQLite.
 *
 * @example
 * ```typescript
 * import { GitLabSource, HierarchyExtractor, SqliteHierarchyStore } from 'workitem-hierarchy';
 *
 * const store = new SqliteHierarchyStore('data/hierarchy.db');
 * await store.initialize();
 * const extractor = new HierarchyExtractor({
 *   source: new GitLabSource({ baseUrl: 'https://gitlab.example.com', token }),
 *   sink: store,
 * });
 * const summary = await extractor.extract({ groupId: 42, epicIid: 7 });
 * await store.close();
 * ```
 *
 * @packageDocumentation
 */

// Hierarchy assembly
export * from './hierarchy/index.js';

// Tracking-service access
export type { HierarchySource } from './source/types.js';
export {
  GitLabSource,
  epicToNode,
  issueToNode,
  normalizeState,
  parseRetryAfter,
  type GitLabSourceOptions,
  type GroupInfo,
  type ProjectInfo,
} from './source/gitlab_source.js';

// Labels
export {
  LabelParser,
  LABEL_COLUMNS,
  DEFAULT_LABEL_PATTERNS,
  CUSTOM_SLOT_COUNT,
  emptyLabels,
  type LabelColumn,
  type LabelPattern,
  type LabeledNode,
  type ParsedLabels,
} from './labels/label_parser.js';

// Storage
export { SqliteHierarchyStore, toSnapshotDate, type SqliteStoreOptions } from './storage/sqlite_storage.js';
export { HIERARCHY_TABLE, HIERARCHY_COLUMNS, nodeToRow, type HierarchyRow } from './storage/schema.js';
export { formatRows, rowsToCsv, rowsToJson, type ExportFormat } from './storage/export.js';
export type { HierarchySink, HierarchyStats, UpsertProgress, UpsertResult } from './storage/types.js';

// Orchestration
export {
  HierarchyExtractor,
  type ExtractFromGroupsOptions,
  type ExtractOptions,
  type ExtractRunOptions,
  type ExtractionSummary,
  type HierarchyExtractorOptions,
} from './extractor/extractor.js';

// Configuration
export {
  loadConfig,
  mergeConfig,
  configFromEnv,
  requireToken,
  DEFAULT_CONFIG,
  CONFIG_FILE_NAME,
  type HierarchyConfig,
  type ConfigLayer,
  type LoadConfigOptions,
} from './config/index.js';

// Errors
export * from './core/errors.js';
export { TimeoutError } from './utils/async.js';

// Logging
export { setLogLevel, getLogLevel, type LogLevel } from './telemetry/logger.js';

export const VERSION = '1.0.0';

import type { LabeledNode } from '../labels/label_parser.js';

export interface UpsertResult {
  /** Rows written for a snapshot date not stored before. */
  inserted: number;
  /** Rows that replaced an existing row for the same snapshot date. */
  replaced: number;
}

export type UpsertProgress = (written: number, total: number) => void;

/**
 * Persists finished builds. Idempotent per (id, snapshotDate): writing the
 * same snapshot twice leaves one row per id.
 */
export interface HierarchySink {
  upsertBatch(nodes: readonly LabeledNode[], snapshotDate: string, onProgress?: UpsertProgress): Promise<UpsertResult>;
}

export interface HierarchyStats {
  totalItems: number;
  containerCount: number;
  leafItemCount: number;
  openCount: number;
  closedCount: number;
  maxDepth: number | null;
  avgDepth: number | null;
  leafCount: number;
  rootCount: number;
  firstSnapshot: string | null;
  lastSnapshot: string | null;
}

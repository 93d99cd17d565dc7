/**
 * @fileoverview SQLite snapshot store for assembled hierarchies
 *
 * Every extraction writes one snapshot per node, keyed by (id, snapshot
 * date). Older snapshots stay queryable until `cleanupOldSnapshots` removes
 * them; `is_latest` always points at the newest one.
 *
 * A writer holds an exclusive lock file beside the database for as long as
 * the store is open. Read-only consumers (stats, export, query) open
 * without it.
 *
 * @packageDocumentation
 */

import Database from 'better-sqlite3';
import * as fs from 'fs/promises';
import * as path from 'path';
import lockfile from 'proper-lockfile';
import { StorageError, type StorageOperation } from '../core/errors.js';
import type { LabeledNode } from '../labels/label_parser.js';
import { logDebug, logInfo, logWarning } from '../telemetry/logger.js';
import { getErrorMessage, toError } from '../utils/errors.js';
import {
  HIERARCHY_TABLE,
  INDEXES_SQL,
  INSERT_SQL,
  SCHEMA_SQL,
  nodeToRow,
  type HierarchyRow,
  type SqlValue,
} from './schema.js';
import type { HierarchySink, HierarchyStats, UpsertProgress, UpsertResult } from './types.js';

// ============================================================================
// CONSTANTS
// ============================================================================

const LOCK_STALE_TIMEOUT_MS = 15 * 60_000;
const LOCK_UPDATE_INTERVAL_MS = 60_000;
const LOCK_MAX_RETRIES = 12;

const SNAPSHOT_DATE = /^\d{4}-\d{2}-\d{2}$/;
const DAY_MS = 24 * 60 * 60 * 1000;

export interface SqliteStoreOptions {
  /** Hold the writer lock while open. Defaults to true. */
  exclusive?: boolean;
  /** Attempts to take the lock before giving up. */
  lockRetries?: number;
}

/** `YYYY-MM-DD` of `date` in UTC. */
export function toSnapshotDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function isBusy(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'SQLITE_BUSY';
}

function storageFailure(operation: StorageOperation, error: unknown): StorageError {
  if (error instanceof StorageError) return error;
  return new StorageError(operation, isBusy(error), getErrorMessage(error), toError(error));
}

// ============================================================================
// STORE
// ============================================================================

export class SqliteHierarchyStore implements HierarchySink {
  private db: Database.Database | null = null;
  private readonly dbPath: string;
  private readonly lockPath: string;
  private readonly exclusive: boolean;
  private readonly lockRetries: number;
  private releaseLock: (() => Promise<void>) | null = null;
  private initialized = false;

  constructor(dbPath: string, options: SqliteStoreOptions = {}) {
    this.dbPath = dbPath;
    this.lockPath = `${dbPath}.lock`;
    this.exclusive = options.exclusive ?? true;
    this.lockRetries = options.lockRetries ?? LOCK_MAX_RETRIES;
  }

  /**
   * Open the database, taking the writer lock first when exclusive, and
   * create the table and indexes if missing.
   */
  async initialize(): Promise<void> {
    if (this.initialized) return;
    logInfo('Opening hierarchy database', { path: this.dbPath, exclusive: this.exclusive });

    try {
      await fs.mkdir(path.dirname(this.dbPath), { recursive: true });
      await fs.writeFile(this.dbPath, '', { flag: 'a' });
    } catch (error) {
      throw storageFailure('open', error);
    }

    if (this.exclusive) {
      try {
        this.releaseLock = await lockfile.lock(this.dbPath, {
          lockfilePath: this.lockPath,
          stale: LOCK_STALE_TIMEOUT_MS,
          update: LOCK_UPDATE_INTERVAL_MS,
          onCompromised: (err) => {
            logWarning('Database lock compromised; closing store', {
              path: this.lockPath,
              error: getErrorMessage(err),
            });
            this.closeDb();
          },
          retries: {
            retries: this.lockRetries,
            factor: 1.5,
            minTimeout: 200,
            maxTimeout: 10_000,
          },
        });
      } catch (error) {
        throw new StorageError('open', true, `database is locked by another writer: ${getErrorMessage(error)}`, toError(error));
      }
    }

    try {
      this.db = new Database(this.dbPath);
      this.db.pragma('journal_mode = WAL');
      this.db.pragma('synchronous = NORMAL');
      this.db.pragma('busy_timeout = 5000');
      this.db.exec(SCHEMA_SQL);
      for (const statement of INDEXES_SQL) {
        this.db.exec(statement);
      }
      this.initialized = true;
    } catch (error) {
      this.closeDb();
      await this.unlock();
      throw storageFailure('migrate', error);
    }
  }

  async close(): Promise<void> {
    this.closeDb();
    await this.unlock();
    this.initialized = false;
  }

  isInitialized(): boolean {
    return this.initialized;
  }

  private closeDb(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  private async unlock(): Promise<void> {
    if (!this.releaseLock) return;
    const release = this.releaseLock;
    this.releaseLock = null;
    try {
      await release();
    } catch (error) {
      logWarning('Failed to release database lock', { path: this.lockPath, error: getErrorMessage(error) });
    }
  }

  private ensureDb(): Database.Database {
    if (!this.db) {
      throw new StorageError('open', false, 'store not initialized; call initialize() first');
    }
    return this.db;
  }

  // --------------------------------------------------------------------------
  // WRITE
  // --------------------------------------------------------------------------

  /**
   * Write one snapshot of every node in a single transaction.
   *
   * For each id: a row for the same snapshot date is replaced in place and
   * keeps its data_version; otherwise data_version is the previous maximum
   * plus one. The row becomes latest unless a newer snapshot already exists.
   */
  async upsertBatch(
    nodes: readonly LabeledNode[],
    snapshotDate: string,
    onProgress?: UpsertProgress,
  ): Promise<UpsertResult> {
    if (!SNAPSHOT_DATE.test(snapshotDate)) {
      throw new StorageError('write', false, `snapshot date must be YYYY-MM-DD, got "${snapshotDate}"`);
    }
    const db = this.ensureDb();
    if (nodes.length === 0) return { inserted: 0, replaced: 0 };

    const existing = db.prepare<[string, string], { data_version: number }>(
      `SELECT data_version FROM ${HIERARCHY_TABLE} WHERE id = ? AND snapshot_date = ?`,
    );
    const history = db.prepare<[string, string], { max_version: number | null; max_date: string | null }>(
      `SELECT MAX(data_version) AS max_version, MAX(snapshot_date) AS max_date
       FROM ${HIERARCHY_TABLE} WHERE id = ? AND snapshot_date <> ?`,
    );
    const demote = db.prepare<[string, string]>(
      `UPDATE ${HIERARCHY_TABLE} SET is_latest = 0 WHERE id = ? AND snapshot_date <> ? AND is_latest = 1`,
    );
    const insert = db.prepare<HierarchyRow>(INSERT_SQL);

    const writeAll = db.transaction((batch: readonly LabeledNode[]): UpsertResult => {
      const result: UpsertResult = { inserted: 0, replaced: 0 };
      batch.forEach((node, index) => {
        const same = existing.get(node.id, snapshotDate);
        const previous = history.get(node.id, snapshotDate);
        const maxDate = previous?.max_date ?? null;
        const isLatest = maxDate === null || snapshotDate > maxDate;
        const version = same ? same.data_version : (previous?.max_version ?? 0) + 1;

        if (isLatest) demote.run(node.id, snapshotDate);
        insert.run(nodeToRow(node, snapshotDate, version, isLatest));

        if (same) {
          result.replaced += 1;
        } else {
          result.inserted += 1;
        }
        onProgress?.(index + 1, batch.length);
      });
      return result;
    });

    try {
      const result = writeAll(nodes);
      logInfo(`Stored ${nodes.length} item(s) for snapshot ${snapshotDate}`, {
        inserted: result.inserted,
        replaced: result.replaced,
      });
      return result;
    } catch (error) {
      throw storageFailure('write', error);
    }
  }

  /**
   * Delete non-latest snapshots older than `keepDays` before `now`.
   * Returns the number of rows removed.
   */
  cleanupOldSnapshots(keepDays: number, now: Date = new Date()): number {
    if (!Number.isInteger(keepDays) || keepDays < 0) {
      throw new StorageError('delete', false, `keepDays must be a non-negative integer, got ${keepDays}`);
    }
    const db = this.ensureDb();
    const cutoff = toSnapshotDate(new Date(now.getTime() - keepDays * DAY_MS));
    try {
      const { changes } = db
        .prepare<[string]>(`DELETE FROM ${HIERARCHY_TABLE} WHERE snapshot_date < ? AND is_latest = 0`)
        .run(cutoff);
      logInfo(`Cleaned up ${changes} old snapshot row(s)`, { keepDays, cutoff });
      return changes;
    } catch (error) {
      throw storageFailure('delete', error);
    }
  }

  // --------------------------------------------------------------------------
  // READ
  // --------------------------------------------------------------------------

  getItem(id: string, latestOnly = true): HierarchyRow | null {
    const db = this.ensureDb();
    const sql = latestOnly
      ? `SELECT * FROM ${HIERARCHY_TABLE} WHERE id = ? AND is_latest = 1`
      : `SELECT * FROM ${HIERARCHY_TABLE} WHERE id = ? ORDER BY snapshot_date DESC LIMIT 1`;
    return db.prepare<[string], HierarchyRow>(sql).get(id) ?? null;
  }

  getChildren(parentId: string, latestOnly = true): HierarchyRow[] {
    const db = this.ensureDb();
    const sql = latestOnly
      ? `SELECT * FROM ${HIERARCHY_TABLE} WHERE parent_id = ? AND is_latest = 1 ORDER BY sibling_position, iid`
      : `SELECT * FROM ${HIERARCHY_TABLE} WHERE parent_id = ? ORDER BY snapshot_date DESC, sibling_position, iid`;
    return db.prepare<[string], HierarchyRow>(sql).all(parentId);
  }

  getRootItems(latestOnly = true): HierarchyRow[] {
    const db = this.ensureDb();
    const sql = latestOnly
      ? `SELECT * FROM ${HIERARCHY_TABLE} WHERE depth = 0 AND is_latest = 1 ORDER BY created_at DESC`
      : `SELECT * FROM ${HIERARCHY_TABLE} WHERE depth = 0 ORDER BY snapshot_date DESC, created_at DESC`;
    return db.prepare<[], HierarchyRow>(sql).all();
  }

  getLatestSnapshotDate(rootId?: string): string | null {
    const db = this.ensureDb();
    const row = rootId
      ? db
          .prepare<[string], { max_date: string | null }>(
            `SELECT MAX(snapshot_date) AS max_date FROM ${HIERARCHY_TABLE} WHERE root_id = ?`,
          )
          .get(rootId)
      : db.prepare<[], { max_date: string | null }>(`SELECT MAX(snapshot_date) AS max_date FROM ${HIERARCHY_TABLE}`).get();
    return row?.max_date ?? null;
  }

  getStats(rootId?: string): HierarchyStats {
    const db = this.ensureDb();
    const where = rootId ? 'WHERE is_latest = 1 AND root_id = ?' : 'WHERE is_latest = 1';
    const params: string[] = rootId ? [rootId] : [];
    const row = db
      .prepare<string[], {
        total_items: number;
        container_count: number;
        leaf_item_count: number;
        open_count: number;
        closed_count: number;
        max_depth: number | null;
        avg_depth: number | null;
        leaf_count: number;
        root_count: number;
        first_snapshot: string | null;
        last_snapshot: string | null;
      }>(
        `SELECT
           COUNT(*) AS total_items,
           COALESCE(SUM(CASE WHEN type = 'container' THEN 1 ELSE 0 END), 0) AS container_count,
           COALESCE(SUM(CASE WHEN type = 'leaf' THEN 1 ELSE 0 END), 0) AS leaf_item_count,
           COALESCE(SUM(CASE WHEN state = 'opened' THEN 1 ELSE 0 END), 0) AS open_count,
           COALESCE(SUM(CASE WHEN state = 'closed' THEN 1 ELSE 0 END), 0) AS closed_count,
           MAX(depth) AS max_depth,
           AVG(depth) AS avg_depth,
           COALESCE(SUM(is_leaf), 0) AS leaf_count,
           COUNT(DISTINCT root_id) AS root_count,
           MIN(snapshot_date) AS first_snapshot,
           MAX(snapshot_date) AS last_snapshot
         FROM ${HIERARCHY_TABLE} ${where}`,
      )
      .get(...params);

    return {
      totalItems: row?.total_items ?? 0,
      containerCount: row?.container_count ?? 0,
      leafItemCount: row?.leaf_item_count ?? 0,
      openCount: row?.open_count ?? 0,
      closedCount: row?.closed_count ?? 0,
      maxDepth: row?.max_depth ?? null,
      avgDepth: row?.avg_depth ?? null,
      leafCount: row?.leaf_count ?? 0,
      rootCount: row?.root_count ?? 0,
      firstSnapshot: row?.first_snapshot ?? null,
      lastSnapshot: row?.last_snapshot ?? null,
    };
  }

  /** Latest rows, parents before children, optionally limited to one root. */
  exportRows(rootId?: string): HierarchyRow[] {
    const db = this.ensureDb();
    if (rootId) {
      return db
        .prepare<[string], HierarchyRow>(
          `SELECT * FROM ${HIERARCHY_TABLE} WHERE is_latest = 1 AND root_id = ? ORDER BY root_id, hierarchy_path`,
        )
        .all(rootId);
    }
    return db
      .prepare<[], HierarchyRow>(`SELECT * FROM ${HIERARCHY_TABLE} WHERE is_latest = 1 ORDER BY root_id, hierarchy_path`)
      .all();
  }

  /**
   * Run an ad-hoc SELECT. Statements that would modify the database are
   * rejected before they run.
   */
  executeQuery(sql: string, params: readonly SqlValue[] = []): Array<Record<string, unknown>> {
    const db = this.ensureDb();
    try {
      const statement = db.prepare<SqlValue[], Record<string, unknown>>(sql);
      if (!statement.readonly || !statement.reader) {
        throw new StorageError('query', false, 'only read-only SELECT statements are allowed');
      }
      logDebug('Executing ad-hoc query', { sql });
      return statement.all(...params);
    } catch (error) {
      throw storageFailure('query', error);
    }
  }
}

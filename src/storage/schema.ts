/**
 * @fileoverview Snapshot table layout
 *
 * One row per (node id, snapshot date). `is_latest` marks the newest
 * snapshot of each id; `data_version` counts snapshots per id.
 */

import type { LabeledNode } from '../labels/label_parser.js';

export const HIERARCHY_TABLE = 'work_item_hierarchy';

export const HIERARCHY_COLUMNS = [
  // identity
  'id',
  'snapshot_date',
  'type',
  'iid',
  'internal_id',
  'group_id',
  'project_id',
  // hierarchy
  'parent_id',
  'parent_type',
  'parent_internal_id',
  'root_id',
  'depth',
  'hierarchy_path',
  'is_leaf',
  'child_count',
  'descendant_count',
  'sibling_position',
  // attributes
  'title',
  'description',
  'state',
  'web_url',
  'author_username',
  'author_name',
  'assignee_username',
  'assignee_name',
  'milestone_title',
  'milestone_id',
  'start_date',
  'end_date',
  'issue_type',
  'confidential',
  'discussion_locked',
  'weight',
  'time_estimate',
  'time_spent',
  'severity',
  // labels
  'labels_raw',
  'label_priority',
  'label_type',
  'label_status',
  'label_team',
  'label_component',
  'label_custom_1',
  'label_custom_2',
  'label_custom_3',
  // dates
  'created_at',
  'updated_at',
  'closed_at',
  'due_date',
  // metrics
  'days_open',
  'days_to_close',
  'is_overdue',
  'days_overdue',
  'completion_pct',
  'upvotes',
  'downvotes',
  'user_notes_count',
  'merge_requests_count',
  'has_tasks',
  'tasks_completed',
  // versioning
  'data_version',
  'is_latest',
] as const;

export type HierarchyColumn = (typeof HIERARCHY_COLUMNS)[number];

/** Columns stored as TEXT. Everything else is INTEGER except completion_pct. */
const TEXT_COLUMNS: ReadonlySet<HierarchyColumn> = new Set<HierarchyColumn>([
  'id',
  'snapshot_date',
  'type',
  'parent_id',
  'parent_type',
  'root_id',
  'hierarchy_path',
  'title',
  'description',
  'state',
  'web_url',
  'author_username',
  'author_name',
  'assignee_username',
  'assignee_name',
  'milestone_title',
  'start_date',
  'end_date',
  'issue_type',
  'severity',
  'labels_raw',
  'label_priority',
  'label_type',
  'label_status',
  'label_team',
  'label_component',
  'label_custom_1',
  'label_custom_2',
  'label_custom_3',
  'created_at',
  'updated_at',
  'closed_at',
  'due_date',
]);

const NOT_NULL: ReadonlySet<HierarchyColumn> = new Set<HierarchyColumn>([
  'id',
  'snapshot_date',
  'type',
  'iid',
  'root_id',
  'depth',
  'hierarchy_path',
  'title',
  'state',
  'created_at',
  'updated_at',
  'data_version',
  'is_latest',
]);

function columnType(column: HierarchyColumn): string {
  if (TEXT_COLUMNS.has(column)) return 'TEXT';
  if (column === 'completion_pct') return 'REAL';
  return 'INTEGER';
}

export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS ${HIERARCHY_TABLE} (
${HIERARCHY_COLUMNS.map((column) => `  ${column} ${columnType(column)}${NOT_NULL.has(column) ? ' NOT NULL' : ''}`).join(',\n')},
  PRIMARY KEY (id, snapshot_date)
);
`;

export const INDEXES_SQL: readonly string[] = [
  `CREATE INDEX IF NOT EXISTS idx_hierarchy_type ON ${HIERARCHY_TABLE}(type)`,
  `CREATE INDEX IF NOT EXISTS idx_hierarchy_state ON ${HIERARCHY_TABLE}(state)`,
  `CREATE INDEX IF NOT EXISTS idx_hierarchy_root ON ${HIERARCHY_TABLE}(root_id)`,
  `CREATE INDEX IF NOT EXISTS idx_hierarchy_parent ON ${HIERARCHY_TABLE}(parent_id)`,
  `CREATE INDEX IF NOT EXISTS idx_hierarchy_depth ON ${HIERARCHY_TABLE}(depth)`,
  `CREATE INDEX IF NOT EXISTS idx_hierarchy_snapshot ON ${HIERARCHY_TABLE}(snapshot_date)`,
  `CREATE INDEX IF NOT EXISTS idx_hierarchy_latest ON ${HIERARCHY_TABLE}(is_latest)`,
  `CREATE INDEX IF NOT EXISTS idx_hierarchy_assignee ON ${HIERARCHY_TABLE}(assignee_username)`,
  `CREATE INDEX IF NOT EXISTS idx_hierarchy_query ON ${HIERARCHY_TABLE}(root_id, depth, state, is_latest)`,
];

export const INSERT_SQL = `
INSERT OR REPLACE INTO ${HIERARCHY_TABLE} (${HIERARCHY_COLUMNS.join(', ')})
VALUES (${HIERARCHY_COLUMNS.map((column) => `@${column}`).join(', ')})
`;

export type SqlValue = string | number | bigint | Buffer | null;

export interface HierarchyRow {
  id: string;
  snapshot_date: string;
  type: string;
  iid: number;
  internal_id: number;
  group_id: number | null;
  project_id: number | null;
  parent_id: string | null;
  parent_type: string | null;
  parent_internal_id: number | null;
  root_id: string;
  depth: number;
  hierarchy_path: string;
  is_leaf: number;
  child_count: number;
  descendant_count: number;
  sibling_position: number;
  title: string;
  description: string | null;
  state: string;
  web_url: string | null;
  author_username: string | null;
  author_name: string | null;
  assignee_username: string | null;
  assignee_name: string | null;
  milestone_title: string | null;
  milestone_id: number | null;
  start_date: string | null;
  end_date: string | null;
  issue_type: string | null;
  confidential: number;
  discussion_locked: number;
  weight: number | null;
  time_estimate: number | null;
  time_spent: number | null;
  severity: string | null;
  labels_raw: string;
  label_priority: string | null;
  label_type: string | null;
  label_status: string | null;
  label_team: string | null;
  label_component: string | null;
  label_custom_1: string | null;
  label_custom_2: string | null;
  label_custom_3: string | null;
  created_at: string;
  updated_at: string;
  closed_at: string | null;
  due_date: string | null;
  days_open: number | null;
  days_to_close: number | null;
  is_overdue: number;
  days_overdue: number | null;
  completion_pct: number | null;
  upvotes: number;
  downvotes: number;
  user_notes_count: number;
  merge_requests_count: number;
  has_tasks: number;
  tasks_completed: number | null;
  data_version: number;
  is_latest: number;
}

function flag(value: boolean | undefined): number {
  return value ? 1 : 0;
}

export function nodeToRow(node: LabeledNode, snapshotDate: string, dataVersion: number, isLatest: boolean): HierarchyRow {
  const { details, labelColumns } = node;
  return {
    id: node.id,
    snapshot_date: snapshotDate,
    type: node.type,
    iid: node.iid,
    internal_id: node.internalId,
    group_id: node.type === 'container' ? node.scopeId : null,
    project_id: node.type === 'leaf' ? node.scopeId : null,
    parent_id: node.parentId,
    parent_type: node.parentType,
    parent_internal_id: node.parentInternalId,
    root_id: node.rootId,
    depth: node.depth,
    hierarchy_path: node.hierarchyPath,
    is_leaf: flag(node.isLeaf),
    child_count: node.childCount,
    descendant_count: node.descendantCount,
    sibling_position: node.siblingPosition,
    title: node.title,
    description: details.description ?? null,
    state: node.state,
    web_url: details.webUrl ?? null,
    author_username: details.authorUsername ?? null,
    author_name: details.authorName ?? null,
    assignee_username: details.assigneeUsername ?? null,
    assignee_name: details.assigneeName ?? null,
    milestone_title: details.milestoneTitle ?? null,
    milestone_id: details.milestoneId ?? null,
    start_date: details.startDate ?? null,
    end_date: details.endDate ?? null,
    issue_type: details.issueType ?? null,
    confidential: flag(details.confidential),
    discussion_locked: flag(details.discussionLocked),
    weight: details.weight ?? null,
    time_estimate: details.timeEstimate ?? null,
    time_spent: details.timeSpent ?? null,
    severity: details.severity ?? null,
    labels_raw: JSON.stringify(node.labels),
    label_priority: labelColumns.priority,
    label_type: labelColumns.type,
    label_status: labelColumns.status,
    label_team: labelColumns.team,
    label_component: labelColumns.component,
    label_custom_1: labelColumns.custom[0] ?? null,
    label_custom_2: labelColumns.custom[1] ?? null,
    label_custom_3: labelColumns.custom[2] ?? null,
    created_at: node.createdAt,
    updated_at: node.updatedAt,
    closed_at: node.closedAt,
    due_date: node.dueDate,
    days_open: node.daysOpen,
    days_to_close: node.daysToClose,
    is_overdue: flag(node.isOverdue),
    days_overdue: node.daysOverdue,
    completion_pct: node.completionPct,
    upvotes: details.upvotes ?? 0,
    downvotes: details.downvotes ?? 0,
    user_notes_count: details.userNotesCount ?? 0,
    merge_requests_count: details.mergeRequestsCount ?? 0,
    has_tasks: flag(details.hasTasks),
    tasks_completed: details.tasksCompleted ?? null,
    data_version: dataVersion,
    is_latest: flag(isLatest),
  };
}

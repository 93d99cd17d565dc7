/**
 * @fileoverview Zod validators for GitLab REST API v4 payloads
 *
 * Only the fields the extractor reads are declared; everything else in a
 * response is stripped. Optional fields default the way GitLab omits them
 * on older instances.
 *
 * @packageDocumentation
 */

import { z } from 'zod';

// ============================================================================
// SHARED
// ============================================================================

const NullableString = z.string().nullable().optional();
const NullableInt = z.number().int().nullable().optional();

export const UserSchema = z.object({
  id: z.number().int(),
  username: z.string(),
  name: z.string().optional(),
});

export const MilestoneSchema = z.object({
  id: z.number().int(),
  title: z.string(),
});

// ============================================================================
// WORK ITEMS
// ============================================================================

/** Group epic, as returned by `/groups/:id/epics` and `/groups/:id/epics/:iid`. */
export const EpicSchema = z.object({
  id: z.number().int(),
  iid: z.number().int(),
  group_id: z.number().int().optional(),
  parent_id: NullableInt,
  title: z.string(),
  description: NullableString,
  state: z.string(),
  web_url: NullableString,
  author: UserSchema.nullable().optional(),
  start_date: NullableString,
  end_date: NullableString,
  due_date: NullableString,
  created_at: z.string(),
  updated_at: z.string(),
  closed_at: NullableString,
  labels: z.array(z.string()).default([]),
  upvotes: z.number().int().optional(),
  downvotes: z.number().int().optional(),
});

/** Issue, as returned by `/groups/:id/epics/:iid/issues`. */
export const IssueSchema = z.object({
  id: z.number().int(),
  iid: z.number().int(),
  project_id: z.number().int(),
  title: z.string(),
  description: NullableString,
  state: z.string(),
  web_url: NullableString,
  author: UserSchema.nullable().optional(),
  assignee: UserSchema.nullable().optional(),
  milestone: MilestoneSchema.nullable().optional(),
  issue_type: NullableString,
  confidential: z.boolean().optional(),
  discussion_locked: z.boolean().nullable().optional(),
  weight: NullableInt,
  time_stats: z
    .object({
      time_estimate: z.number().int().optional(),
      total_time_spent: z.number().int().optional(),
    })
    .optional(),
  severity: NullableString,
  created_at: z.string(),
  updated_at: z.string(),
  closed_at: NullableString,
  due_date: NullableString,
  labels: z.array(z.string()).default([]),
  upvotes: z.number().int().optional(),
  downvotes: z.number().int().optional(),
  user_notes_count: z.number().int().optional(),
  merge_requests_count: z.number().int().optional(),
  has_tasks: z.boolean().optional(),
  task_completion_status: z
    .object({
      count: z.number().int(),
      completed_count: z.number().int(),
    })
    .nullable()
    .optional(),
});

export const EpicListSchema = z.array(EpicSchema);
export const IssueListSchema = z.array(IssueSchema);

// ============================================================================
// NAMESPACES
// ============================================================================

export const GroupSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  path: z.string(),
  full_path: z.string(),
  web_url: z.string(),
});

export const ProjectSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  path: z.string(),
  path_with_namespace: z.string(),
  web_url: z.string(),
});

export type GitLabUser = z.infer<typeof UserSchema>;
export type GitLabEpic = z.infer<typeof EpicSchema>;
export type GitLabIssue = z.infer<typeof IssueSchema>;
export type GitLabGroup = z.infer<typeof GroupSchema>;
export type GitLabProject = z.infer<typeof ProjectSchema>;

/**
 * @fileoverview GitLab REST API v4 source
 *
 * Epics are containers, issues are leaf items. Every request goes through
 * one retrying, paced `request` path:
 *
 * - `PRIVATE-TOKEN` auth header
 * - per-request timeout via AbortSignal
 * - retry of 429, 5xx and network failures with exponential backoff
 *   (a `Retry-After` header wins over the computed delay)
 * - a fixed delay after every request
 *
 * List endpoints are followed through `x-next-page` until exhausted.
 *
 * @packageDocumentation
 */

import type { z } from 'zod';
import { RootNotFoundError, SourceAuthError, SourceRequestError, TransientFetchError } from '../core/errors.js';
import {
  formatLocator,
  type ContainerRef,
  type FetchedNode,
  type NodeLocator,
  type NodeState,
} from '../hierarchy/types.js';
import { logDebug, logInfo, logWarning } from '../telemetry/logger.js';
import { sleep } from '../utils/async.js';
import { getErrorMessage, toError } from '../utils/errors.js';
import {
  EpicListSchema,
  EpicSchema,
  GroupSchema,
  IssueListSchema,
  ProjectSchema,
  UserSchema,
  type GitLabEpic,
  type GitLabIssue,
  type GitLabUser,
} from './gitlab_schema.js';
import type { HierarchySource } from './types.js';

// ============================================================================
// OPTIONS
// ============================================================================

export interface GitLabSourceOptions {
  /** Instance URL, e.g. `https://gitlab.com`. */
  baseUrl: string;
  token: string;
  timeoutMs?: number;
  maxRetries?: number;
  /** Pause after every request. */
  rateLimitDelayMs?: number;
  /** First retry delay; doubles per attempt. */
  retryBaseDelayMs?: number;
  fetchImpl?: typeof fetch;
  sleepImpl?: (ms: number) => Promise<void>;
  /** Once aborted, every further request fails at once without retrying. */
  signal?: AbortSignal;
}

export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_RATE_LIMIT_DELAY_MS = 500;
export const DEFAULT_RETRY_BASE_DELAY_MS = 1_000;
export const PAGE_SIZE = 100;

export interface GroupInfo {
  id: number;
  name: string;
  path: string;
  fullPath: string;
  webUrl: string;
}

export interface ProjectInfo {
  id: number;
  name: string;
  path: string;
  pathWithNamespace: string;
  webUrl: string;
}

type QueryParams = Record<string, string | number>;

interface RawResponse {
  readonly url: string;
  readonly body: unknown;
  readonly headers: Headers;
}

// ============================================================================
// MAPPING
// ============================================================================

export function normalizeState(state: string): NodeState {
  return state === 'closed' ? 'closed' : 'opened';
}

export function epicToNode(epic: GitLabEpic, fallbackGroupId: number): FetchedNode {
  const groupId = epic.group_id ?? fallbackGroupId;
  return {
    id: `epic:${groupId}#${epic.iid}`,
    internalId: epic.id,
    type: 'container',
    scopeId: groupId,
    iid: epic.iid,
    parentInternalId: epic.parent_id ?? null,
    title: epic.title,
    state: normalizeState(epic.state),
    createdAt: epic.created_at,
    updatedAt: epic.updated_at,
    closedAt: epic.closed_at ?? null,
    dueDate: epic.due_date ?? null,
    labels: epic.labels,
    details: {
      description: epic.description ?? null,
      webUrl: epic.web_url ?? null,
      authorUsername: epic.author?.username ?? null,
      authorName: epic.author?.name ?? null,
      startDate: epic.start_date ?? null,
      endDate: epic.end_date ?? null,
      upvotes: epic.upvotes ?? 0,
      downvotes: epic.downvotes ?? 0,
    },
  };
}

export function issueToNode(issue: GitLabIssue): FetchedNode {
  return {
    id: `issue:${issue.project_id}#${issue.iid}`,
    internalId: issue.id,
    type: 'leaf',
    scopeId: issue.project_id,
    iid: issue.iid,
    parentInternalId: null,
    title: issue.title,
    state: normalizeState(issue.state),
    createdAt: issue.created_at,
    updatedAt: issue.updated_at,
    closedAt: issue.closed_at ?? null,
    dueDate: issue.due_date ?? null,
    labels: issue.labels,
    details: {
      description: issue.description ?? null,
      webUrl: issue.web_url ?? null,
      authorUsername: issue.author?.username ?? null,
      authorName: issue.author?.name ?? null,
      assigneeUsername: issue.assignee?.username ?? null,
      assigneeName: issue.assignee?.name ?? null,
      milestoneTitle: issue.milestone?.title ?? null,
      milestoneId: issue.milestone?.id ?? null,
      issueType: issue.issue_type ?? 'issue',
      confidential: issue.confidential ?? false,
      discussionLocked: issue.discussion_locked ?? false,
      weight: issue.weight ?? null,
      timeEstimate: issue.time_stats?.time_estimate ?? 0,
      timeSpent: issue.time_stats?.total_time_spent ?? 0,
      severity: issue.severity ?? null,
      upvotes: issue.upvotes ?? 0,
      downvotes: issue.downvotes ?? 0,
      userNotesCount: issue.user_notes_count ?? 0,
      mergeRequestsCount: issue.merge_requests_count ?? 0,
      hasTasks: issue.has_tasks ?? false,
      tasksCompleted: issue.task_completion_status?.completed_count ?? null,
    },
  };
}

/** Seconds or an HTTP date, as allowed for `Retry-After`. */
export function parseRetryAfter(value: string | null, now: number = Date.now()): number | null {
  if (value === null || value.trim() === '') return null;
  const seconds = Number(value);
  if (Number.isFinite(seconds)) return Math.max(0, seconds * 1000);
  const date = Date.parse(value);
  if (Number.isNaN(date)) return null;
  return Math.max(0, date - now);
}

// ============================================================================
// SOURCE
// ============================================================================

export class GitLabSource implements HierarchySource {
  private readonly apiBase: string;
  private readonly token: string;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly rateLimitDelayMs: number;
  private readonly retryBaseDelayMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly sleepImpl: (ms: number) => Promise<void>;
  private readonly signal: AbortSignal | undefined;

  constructor(options: GitLabSourceOptions) {
    this.apiBase = `${options.baseUrl.replace(/\/+$/, '')}/api/v4`;
    this.token = options.token;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.rateLimitDelayMs = options.rateLimitDelayMs ?? DEFAULT_RATE_LIMIT_DELAY_MS;
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? DEFAULT_RETRY_BASE_DELAY_MS;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.sleepImpl = options.sleepImpl ?? sleep;
    this.signal = options.signal;
  }

  /**
   * Confirm the token is accepted. Call once before a build.
   *
   * @throws SourceAuthError on 401/403
   */
  async verifyAuth(): Promise<GitLabUser> {
    logInfo('Connecting to GitLab', { url: this.apiBase });
    try {
      const { url, body } = await this.request('/user');
      const user = this.parse(UserSchema, body, url);
      logInfo('GitLab authentication successful', { username: user.username });
      return user;
    } catch (error) {
      if (error instanceof SourceRequestError && (error.status === 401 || error.status === 403)) {
        throw new SourceAuthError(this.apiBase, 'token rejected; check GITLAB_TOKEN');
      }
      throw error;
    }
  }

  async getRoot(locator: NodeLocator): Promise<FetchedNode> {
    logDebug(`Fetching epic ${formatLocator(locator)}`);
    try {
      const { url, body } = await this.request(`/groups/${locator.scopeId}/epics/${locator.iid}`);
      return epicToNode(this.parse(EpicSchema, body, url), locator.scopeId);
    } catch (error) {
      if (error instanceof SourceRequestError && error.status === 404) {
        throw new RootNotFoundError(formatLocator(locator), `epic ${locator.iid} not found in group ${locator.scopeId}`, error);
      }
      if (error instanceof SourceRequestError && error.status === 401) {
        throw new SourceAuthError(this.apiBase, 'token rejected; check GITLAB_TOKEN');
      }
      throw error;
    }
  }

  async getChildren(container: ContainerRef): Promise<FetchedNode[]> {
    try {
      const epics = await this.getAll(`/groups/${container.scopeId}/epics`, { parent_id: container.internalId }, EpicListSchema);
      return epics.map((epic) => epicToNode(epic, container.scopeId));
    } catch (error) {
      throw new TransientFetchError('children', formatLocator(container), getErrorMessage(error), toError(error));
    }
  }

  async getLeafItems(container: NodeLocator): Promise<FetchedNode[]> {
    try {
      const issues = await this.getAll(`/groups/${container.scopeId}/epics/${container.iid}/issues`, {}, IssueListSchema);
      return issues.map(issueToNode);
    } catch (error) {
      throw new TransientFetchError('leaf_items', formatLocator(container), getErrorMessage(error), toError(error));
    }
  }

  /**
   * Every epic in each group, unfiltered. A group that cannot be read is
   * logged and contributes nothing.
   */
  async getAllContainersInScope(scopeIds: readonly number[]): Promise<FetchedNode[]> {
    logInfo(`Fetching epics from ${scopeIds.length} group(s)`);
    const all: FetchedNode[] = [];
    for (const groupId of scopeIds) {
      try {
        const epics = await this.getAll(`/groups/${groupId}/epics`, {}, EpicListSchema);
        logInfo(`Fetched ${epics.length} epic(s) from group ${groupId}`);
        all.push(...epics.map((epic) => epicToNode(epic, groupId)));
      } catch (error) {
        logWarning('Could not fetch group epics', { groupId, error: getErrorMessage(error) });
      }
    }
    logInfo(`Fetched ${all.length} epic(s) in total`);
    return all;
  }

  async getGroupInfo(groupId: number): Promise<GroupInfo | null> {
    try {
      const { url, body } = await this.request(`/groups/${groupId}`);
      const group = this.parse(GroupSchema, body, url);
      return { id: group.id, name: group.name, path: group.path, fullPath: group.full_path, webUrl: group.web_url };
    } catch (error) {
      logWarning('Could not fetch group', { groupId, error: getErrorMessage(error) });
      return null;
    }
  }

  async getProjectInfo(projectId: number): Promise<ProjectInfo | null> {
    try {
      const { url, body } = await this.request(`/projects/${projectId}`);
      const project = this.parse(ProjectSchema, body, url);
      return {
        id: project.id,
        name: project.name,
        path: project.path,
        pathWithNamespace: project.path_with_namespace,
        webUrl: project.web_url,
      };
    } catch (error) {
      logWarning('Could not fetch project', { projectId, error: getErrorMessage(error) });
      return null;
    }
  }

  // --------------------------------------------------------------------------
  // HTTP
  // --------------------------------------------------------------------------

  private buildUrl(path: string, query: QueryParams): string {
    const url = new URL(`${this.apiBase}${path}`);
    for (const [key, value] of Object.entries(query)) {
      url.searchParams.set(key, String(value));
    }
    return url.toString();
  }

  private parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown, url: string): T {
    const result = schema.safeParse(body);
    if (!result.success) {
      const issue = result.error.issues[0];
      const where = issue && issue.path.length > 0 ? issue.path.join('.') : 'response';
      throw new SourceRequestError(url, null, false, `unexpected payload at ${where}: ${issue?.message ?? 'invalid'}`);
    }
    return result.data;
  }

  private async getAll<T>(
    path: string,
    query: QueryParams,
    schema: z.ZodType<T[], z.ZodTypeDef, unknown>,
  ): Promise<T[]> {
    const items: T[] = [];
    let page = '1';
    while (page !== '') {
      const { url, body, headers } = await this.request(path, { ...query, per_page: PAGE_SIZE, page });
      items.push(...this.parse(schema, body, url));
      page = headers.get('x-next-page')?.trim() ?? '';
    }
    return items;
  }

  private async request(path: string, query: QueryParams = {}): Promise<RawResponse> {
    const url = this.buildUrl(path, query);
    for (let attempt = 0; ; attempt += 1) {
      if (this.signal?.aborted) {
        throw new SourceRequestError(url, null, false, 'aborted');
      }
      let failure: SourceRequestError;
      let retryAfter: string | null = null;
      try {
        const timeout = AbortSignal.timeout(this.timeoutMs);
        const response = await this.fetchImpl(url, {
          headers: { 'PRIVATE-TOKEN': this.token, Accept: 'application/json' },
          signal: this.signal ? AbortSignal.any([this.signal, timeout]) : timeout,
        });
        if (response.ok) {
          const body: unknown = await response.json();
          await this.sleepImpl(this.rateLimitDelayMs);
          return { url, body, headers: response.headers };
        }
        const retryable = response.status === 429 || response.status >= 500;
        failure = new SourceRequestError(url, response.status, retryable, response.statusText || 'request failed');
        retryAfter = response.headers.get('retry-after');
      } catch (error) {
        if (this.signal?.aborted) {
          throw new SourceRequestError(url, null, false, 'aborted');
        }
        failure = new SourceRequestError(url, null, true, getErrorMessage(error));
      }
      await this.sleepImpl(this.rateLimitDelayMs);

      if (!failure.retryable || attempt >= this.maxRetries) throw failure;
      const delayMs = parseRetryAfter(retryAfter) ?? this.retryBaseDelayMs * 2 ** attempt;
      logWarning('GitLab request failed, retrying', {
        url,
        status: failure.status,
        attempt: attempt + 1,
        delayMs,
      });
      await this.sleepImpl(delayMs);
    }
  }
}

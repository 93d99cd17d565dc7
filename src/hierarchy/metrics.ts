/**
 * @fileoverview Metrics calculator
 *
 * Temporal and progress fields per node. Independent of tree shape except
 * for completion, which looks one level down.
 *
 * Day arithmetic is whole days, floored. Overdue checks compare calendar
 * dates in UTC.
 */

import type { AnnotatedNode, FinalNode, Metrics } from './types.js';

export const DAY_MS = 24 * 60 * 60 * 1000;

/** Decimal places kept on completionPct. */
export const COMPLETION_PRECISION = 2;

const CALENDAR_DATE = /^(\d{4})-(\d{2})-(\d{2})/;

export function parseTimestamp(value: string | null | undefined): number | null {
  if (!value) return null;
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? null : ms;
}

/** `YYYY-MM-DD` (or the date part of an ISO timestamp) as UTC midnight. */
export function parseCalendarDate(value: string | null | undefined): number | null {
  if (!value) return null;
  const match = CALENDAR_DATE.exec(value);
  if (!match) return null;
  const ms = Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3]));
  return Number.isNaN(ms) ? null : ms;
}

export function utcCalendarDay(now: Date): number {
  return Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate());
}

export function wholeDaysBetween(fromMs: number, toMs: number): number {
  return Math.floor((toMs - fromMs) / DAY_MS);
}

function roundTo(value: number, places: number): number {
  const factor = 10 ** places;
  return Math.round(value * factor) / factor;
}

/** parentId -> number of direct children in state `closed`. */
function countClosedChildren(nodes: readonly AnnotatedNode[]): Map<string, number> {
  const closed = new Map<string, number>();
  for (const node of nodes) {
    if (node.parentId === null || node.state !== 'closed') continue;
    closed.set(node.parentId, (closed.get(node.parentId) ?? 0) + 1);
  }
  return closed;
}

export function computeMetrics(node: AnnotatedNode, now: Date, closedChildren: number): Metrics {
  const created = parseTimestamp(node.createdAt);
  const closed = parseTimestamp(node.closedAt);
  const due = parseCalendarDate(node.dueDate);
  const isOpen = node.state === 'opened';

  const daysOpen = isOpen && created !== null ? wholeDaysBetween(created, now.getTime()) : null;
  const daysToClose = created !== null && closed !== null ? wholeDaysBetween(created, closed) : null;

  const today = utcCalendarDay(now);
  const isOverdue = isOpen && due !== null && due < today;
  const daysOverdue = isOverdue && due !== null ? wholeDaysBetween(due, today) : null;

  const completionPct =
    node.type === 'container' && node.childCount > 0
      ? roundTo((100 * closedChildren) / node.childCount, COMPLETION_PRECISION)
      : null;

  return { daysOpen, daysToClose, isOverdue, daysOverdue, completionPct };
}

export function annotateMetrics(nodes: readonly AnnotatedNode[], now: Date = new Date()): FinalNode[] {
  const closedByParent = countClosedChildren(nodes);
  return nodes.map((node) => ({
    ...node,
    ...computeMetrics(node, now, closedByParent.get(node.id) ?? 0),
  }));
}

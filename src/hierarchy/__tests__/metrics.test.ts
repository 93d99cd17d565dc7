import { describe, it, expect } from 'vitest';
import { annotateMetrics, parseCalendarDate, parseTimestamp, wholeDaysBetween, DAY_MS } from '../metrics.js';
import { annotateRelationships } from '../relationships.js';
import { placeRoot, placeUnder } from '../placement.js';
import { byId, makeContainer, makeLeaf } from './helpers.js';

const NOW = new Date('2024-03-10T12:00:00Z');

function annotate(...leaves: Parameters<typeof makeLeaf>[0][]) {
  const root = placeRoot(makeContainer({ groupId: 1, iid: 1, internalId: 10, createdAt: '2024-03-01T18:00:00Z' }));
  const placed = [root, ...leaves.map((fields) => placeUnder(makeLeaf(fields), root))];
  return annotateMetrics(annotateRelationships(placed), NOW);
}

describe('annotateMetrics', () => {
  it('flags an open item due yesterday as one day overdue', () => {
    const nodes = annotate({ projectId: 2, iid: 1, internalId: 21, dueDate: '2024-03-09' });

    expect(byId(nodes, 'issue:2#1')).toMatchObject({ isOverdue: true, daysOverdue: 1 });
  });

  it('does not flag an item due today', () => {
    const nodes = annotate({ projectId: 2, iid: 1, internalId: 21, dueDate: '2024-03-10' });

    expect(byId(nodes, 'issue:2#1')).toMatchObject({ isOverdue: false, daysOverdue: null });
  });

  it('does not flag a closed item past its due date', () => {
    const nodes = annotate({
      projectId: 2,
      iid: 1,
      internalId: 21,
      state: 'closed',
      dueDate: '2024-02-01',
      closedAt: '2024-02-05T00:00:00Z',
    });

    expect(byId(nodes, 'issue:2#1')).toMatchObject({ isOverdue: false, daysOverdue: null });
  });

  it('counts whole days open for open items only', () => {
    const nodes = annotate({ projectId: 2, iid: 1, internalId: 21, state: 'closed', closedAt: '2024-02-01T00:00:00Z' });

    // 8.75 days since 2024-03-01T18:00Z, floored.
    expect(byId(nodes, 'epic:1#1').daysOpen).toBe(8);
    expect(byId(nodes, 'issue:2#1').daysOpen).toBeNull();
  });

  it('counts whole days to close when both timestamps are present', () => {
    const nodes = annotate(
      { projectId: 2, iid: 1, internalId: 21, state: 'closed', createdAt: '2024-01-01T00:00:00Z', closedAt: '2024-01-31T23:00:00Z' },
      { projectId: 2, iid: 2, internalId: 22 },
    );

    expect(byId(nodes, 'issue:2#1').daysToClose).toBe(30);
    expect(byId(nodes, 'issue:2#2').daysToClose).toBeNull();
  });

  it('computes completion from closed direct children, rounded to two places', () => {
    const nodes = annotate(
      { projectId: 2, iid: 1, internalId: 21, state: 'closed' },
      { projectId: 2, iid: 2, internalId: 22 },
      { projectId: 2, iid: 3, internalId: 23 },
    );

    expect(byId(nodes, 'epic:1#1').completionPct).toBe(33.33);
    expect(byId(nodes, 'issue:2#1').completionPct).toBeNull();
  });

  it('reports 100 when every child is closed and null for a childless container', () => {
    const done = annotate({ projectId: 2, iid: 1, internalId: 21, state: 'closed' });
    const empty = annotate();

    expect(byId(done, 'epic:1#1').completionPct).toBe(100);
    expect(byId(empty, 'epic:1#1').completionPct).toBeNull();
  });

  it('treats unparseable timestamps as absent', () => {
    const nodes = annotate({ projectId: 2, iid: 1, internalId: 21, createdAt: 'not-a-date', dueDate: 'soon' });

    expect(byId(nodes, 'issue:2#1')).toMatchObject({ daysOpen: null, isOverdue: false, daysOverdue: null });
  });
});

describe('date helpers', () => {
  it('parses calendar dates as UTC midnight', () => {
    expect(parseCalendarDate('2024-03-09')).toBe(Date.UTC(2024, 2, 9));
    expect(parseCalendarDate('2024-03-09T23:59:59Z')).toBe(Date.UTC(2024, 2, 9));
    expect(parseCalendarDate(null)).toBeNull();
  });

  it('parses ISO timestamps and rejects garbage', () => {
    expect(parseTimestamp('2024-03-09T00:00:00Z')).toBe(Date.UTC(2024, 2, 9));
    expect(parseTimestamp('yesterday')).toBeNull();
    expect(parseTimestamp('')).toBeNull();
  });

  it('floors partial days', () => {
    expect(wholeDaysBetween(0, DAY_MS * 2 - 1)).toBe(1);
    expect(wholeDaysBetween(0, DAY_MS * 2)).toBe(2);
  });
});

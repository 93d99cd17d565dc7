import { describe, it, expect, vi } from 'vitest';
import { formatRows, isExportFormat, rowsToCsv } from '../export.js';
import { HIERARCHY_COLUMNS, nodeToRow, type HierarchyRow } from '../schema.js';
import { LabelParser } from '../../labels/label_parser.js';
import { annotateMetrics } from '../../hierarchy/metrics.js';
import { annotateRelationships } from '../../hierarchy/relationships.js';
import { placeRoot } from '../../hierarchy/placement.js';
import { makeContainer } from '../../hierarchy/__tests__/helpers.js';

function rootRow(title: string): HierarchyRow {
  vi.spyOn(console, 'error').mockImplementation(() => {});
  const root = placeRoot({ ...makeContainer({ groupId: 1, iid: 1, internalId: 10 }), title });
  const [node] = new LabelParser().parseNodes(
    annotateMetrics(annotateRelationships([root]), new Date('2024-03-10T00:00:00Z')),
  );
  if (!node) throw new Error('expected one node');
  return nodeToRow(node, '2024-03-01', 1, true);
}

describe('rowsToCsv', () => {
  it('writes a header in table column order', () => {
    const [header] = rowsToCsv([]).split('\n');

    expect(header).toBe(HIERARCHY_COLUMNS.join(','));
  });

  it('quotes cells with commas or quotes and leaves nulls empty', () => {
    const lines = rowsToCsv([rootRow('Ship "v2", then rest')]).split('\n');

    expect(lines).toHaveLength(3);
    expect(lines[1]?.startsWith('epic:1#1,2024-03-01,container,1,10,1,,,,,epic:1#1,0,epic:1#1,1,0,0,1,')).toBe(true);
    expect(lines[1]).toContain(',"Ship ""v2"", then rest",,opened,');
    expect(lines[2]).toBe('');
  });
});

describe('formatRows', () => {
  it('writes JSON arrays of row objects', () => {
    const parsed: Array<Record<string, unknown>> = JSON.parse(formatRows([rootRow('Plain')], 'json'));

    expect(parsed).toHaveLength(1);
    expect(parsed[0]).toMatchObject({ id: 'epic:1#1', title: 'Plain', is_latest: 1 });
  });
});

describe('isExportFormat', () => {
  it('accepts csv and json only', () => {
    expect(isExportFormat('csv')).toBe(true);
    expect(isExportFormat('json')).toBe(true);
    expect(isExportFormat('xlsx')).toBe(false);
  });
});

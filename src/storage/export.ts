import { HIERARCHY_COLUMNS, type HierarchyRow } from './schema.js';

export type ExportFormat = 'csv' | 'json';

export const EXPORT_FORMATS: readonly ExportFormat[] = ['csv', 'json'];

export function isExportFormat(value: string): value is ExportFormat {
  return value === 'csv' || value === 'json';
}

const csvEscape = (value: string): string => {
  // RFC 4180: quote when the cell holds a comma, quote or line break.
  if (!/[\n\r,"]/.test(value)) return value;
  return `"${value.replace(/"/g, '""')}"`;
};

const toCell = (value: string | number | null): string => (value === null ? '' : String(value));

/** Header line plus one line per row, in table column order. */
export function rowsToCsv(rows: readonly HierarchyRow[]): string {
  const lines = [HIERARCHY_COLUMNS.map(csvEscape).join(',')];
  for (const row of rows) {
    lines.push(HIERARCHY_COLUMNS.map((column) => csvEscape(toCell(row[column]))).join(','));
  }
  return `${lines.join('\n')}\n`;
}

export function rowsToJson(rows: readonly HierarchyRow[]): string {
  return `${JSON.stringify(rows, null, 2)}\n`;
}

export function formatRows(rows: readonly HierarchyRow[], format: ExportFormat): string {
  return format === 'csv' ? rowsToCsv(rows) : rowsToJson(rows);
}

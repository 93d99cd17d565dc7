import { parseArgs } from 'node:util';
import { createError } from '../errors.js';
import { printTable } from '../progress.js';
import { COMMON_OPTIONS, loadCommandConfig, openStore, type CommandContext } from './shared.js';

function cellText(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

/**
 * Run a read-only SQL statement against the snapshot store. Positional
 * `?` placeholders take `--param` values in order.
 */
export async function queryCommand(context: CommandContext): Promise<void> {
  const { values, positionals } = parseArgs({
    args: context.args,
    options: {
      ...COMMON_OPTIONS,
      sql: { type: 'string' },
      param: { type: 'string', multiple: true },
      json: { type: 'boolean', default: false },
    },
    allowPositionals: true,
  });

  const sql = values.sql ?? positionals.join(' ');
  if (sql.trim() === '') {
    throw createError('INVALID_ARGUMENT', 'a SQL statement is required. Usage: workitem-hierarchy query "<sql>"');
  }

  const config = await loadCommandConfig(context, values);
  const store = await openStore(context, config, false);
  try {
    const rows = store.executeQuery(sql, values.param ?? []);
    if (values.json) {
      console.log(JSON.stringify(rows, null, 2));
      return;
    }
    if (rows.length === 0) {
      console.log('No results');
      return;
    }
    const headers = Object.keys(rows[0] ?? {});
    printTable(
      headers,
      rows.map((row) => headers.map((header) => cellText(row[header]))),
    );
    console.log(`\n(${rows.length} row(s))`);
  } finally {
    await store.close();
  }
}

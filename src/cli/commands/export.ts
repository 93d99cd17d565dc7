import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { parseArgs } from 'node:util';
import { EXPORT_FORMATS, formatRows, isExportFormat } from '../../storage/export.js';
import { createError } from '../errors.js';
import { COMMON_OPTIONS, loadCommandConfig, openStore, type CommandContext } from './shared.js';

/**
 * Writes the latest snapshot to `--output`, or to stdout when no file is
 * given.
 */
export async function exportCommand(context: CommandContext): Promise<void> {
  const { values } = parseArgs({
    args: context.args,
    options: {
      ...COMMON_OPTIONS,
      format: { type: 'string', short: 'f', default: 'csv' },
      output: { type: 'string', short: 'o' },
      root: { type: 'string', short: 'r' },
    },
    allowPositionals: false,
  });

  const format = values.format;
  if (!isExportFormat(format)) {
    throw createError('INVALID_ARGUMENT', `--format must be one of ${EXPORT_FORMATS.join(', ')}, got "${format}"`);
  }

  const config = await loadCommandConfig(context, values);
  const store = await openStore(context, config, false);
  try {
    const rows = store.exportRows(values.root);
    if (rows.length === 0) {
      throw createError('NO_DATA', values.root ? `no rows stored for root ${values.root}` : 'no rows stored');
    }

    const content = formatRows(rows, format);
    if (!values.output) {
      process.stdout.write(content);
      return;
    }
    const target = path.resolve(context.cwd, values.output);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, content, 'utf8');
    console.error(`Exported ${rows.length} row(s) to ${target} (${format.toUpperCase()})`);
  } finally {
    await store.close();
  }
}

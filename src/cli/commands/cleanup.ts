import { parseArgs } from 'node:util';
import { createError } from '../errors.js';
import { COMMON_OPTIONS, loadCommandConfig, openStore, parseIntOption, type CommandContext } from './shared.js';

export async function cleanupCommand(context: CommandContext): Promise<void> {
  const { values } = parseArgs({
    args: context.args,
    options: {
      ...COMMON_OPTIONS,
      'keep-days': { type: 'string' },
    },
    allowPositionals: false,
  });

  const keepDays = parseIntOption(values['keep-days'], '--keep-days');
  if (keepDays !== undefined && keepDays < 0) {
    throw createError('INVALID_ARGUMENT', `--keep-days must not be negative, got ${keepDays}`);
  }

  const config = await loadCommandConfig(context, values, keepDays === undefined ? {} : { database: { keepDays } });
  const store = await openStore(context, config, true);
  try {
    const removed = store.cleanupOldSnapshots(config.database.keepDays);
    console.log(`Removed ${removed} old snapshot row(s); kept the last ${config.database.keepDays} day(s).`);
  } finally {
    await store.close();
  }
}

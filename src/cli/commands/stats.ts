import { parseArgs } from 'node:util';
import type { HierarchyStats } from '../../storage/types.js';
import { printKeyValue } from '../progress.js';
import { COMMON_OPTIONS, loadCommandConfig, openStore, type CommandContext } from './shared.js';

export async function statsCommand(context: CommandContext): Promise<void> {
  const { values } = parseArgs({
    args: context.args,
    options: {
      ...COMMON_OPTIONS,
      root: { type: 'string', short: 'r' },
      json: { type: 'boolean', default: false },
    },
    allowPositionals: false,
  });

  const config = await loadCommandConfig(context, values);
  const store = await openStore(context, config, false);
  try {
    const stats = store.getStats(values.root);
    if (values.json) {
      console.log(JSON.stringify(values.root ? { rootId: values.root, ...stats } : stats, null, 2));
      return;
    }
    printStats(stats, values.root);
  } finally {
    await store.close();
  }
}

function printStats(stats: HierarchyStats, rootId: string | undefined): void {
  console.log('Hierarchy Statistics');
  console.log('====================\n');
  if (rootId) {
    printKeyValue([{ key: 'Root', value: rootId }]);
    console.log();
  }
  printKeyValue([
    { key: 'Total Items', value: stats.totalItems },
    { key: 'Epics', value: stats.containerCount },
    { key: 'Issues', value: stats.leafItemCount },
    { key: 'Open', value: stats.openCount },
    { key: 'Closed', value: stats.closedCount },
    { key: 'Max Depth', value: stats.maxDepth },
    { key: 'Avg Depth', value: stats.avgDepth === null ? null : stats.avgDepth.toFixed(1) },
    { key: 'Leaf Nodes', value: stats.leafCount },
    { key: 'Roots', value: stats.rootCount },
    { key: 'First Snapshot', value: stats.firstSnapshot },
    { key: 'Last Snapshot', value: stats.lastSnapshot },
  ]);
}

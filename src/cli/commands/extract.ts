import { parseArgs } from 'node:util';
import { requireToken } from '../../config/index.js';
import { HierarchyExtractor, type ExtractionSummary } from '../../extractor/extractor.js';
import { createError } from '../errors.js';
import { createProgressBar, formatDuration, printKeyValue, type ProgressBarHandle } from '../progress.js';
import {
  COMMON_OPTIONS,
  createSource,
  loadCommandConfig,
  openStore,
  parseIdList,
  parseIntOption,
  requireIntOption,
  type CommandContext,
} from './shared.js';

const SNAPSHOT_DATE = /^\d{4}-\d{2}-\d{2}$/;

export async function extractCommand(context: CommandContext): Promise<void> {
  const { values } = parseArgs({
    args: context.args,
    options: {
      ...COMMON_OPTIONS,
      group: { type: 'string', short: 'g' },
      epic: { type: 'string', short: 'e' },
      scope: { type: 'string' },
      'gitlab-url': { type: 'string' },
      'max-depth': { type: 'string' },
      'exclude-closed': { type: 'boolean', default: false },
      'snapshot-date': { type: 'string' },
      timeout: { type: 'string' },
      progress: { type: 'boolean', default: false },
      json: { type: 'boolean', default: false },
    },
    allowPositionals: false,
  });

  const groupId = requireIntOption(values.group, '--group');
  const epicIid = requireIntOption(values.epic, '--epic');
  const scope = values.scope === undefined ? undefined : parseIdList(values.scope, '--scope');
  const maxDepth = parseIntOption(values['max-depth'], '--max-depth');
  const buildTimeoutMs = parseIntOption(values.timeout, '--timeout');
  const snapshotDate = values['snapshot-date'];
  if (snapshotDate !== undefined && !SNAPSHOT_DATE.test(snapshotDate)) {
    throw createError('INVALID_ARGUMENT', `--snapshot-date must be YYYY-MM-DD, got "${snapshotDate}"`);
  }

  const config = await loadCommandConfig(context, values, {
    ...(values['gitlab-url'] ? { gitlab: { url: values['gitlab-url'] } } : {}),
    extraction: {
      ...(maxDepth !== undefined ? { maxDepth } : {}),
      ...(values['exclude-closed'] ? { includeClosed: false } : {}),
      ...(buildTimeoutMs !== undefined ? { buildTimeoutMs } : {}),
    },
  });
  const token = requireToken(config);
  // Aborted when the command ends, so a build abandoned by --timeout stops issuing requests.
  const abort = new AbortController();
  const source = createSource(context, config, token, abort.signal);

  const store = await openStore(context, config, true);
  const progress = values.progress ? lazyProgressBar() : null;
  try {
    const extractor = new HierarchyExtractor({ source, sink: store, labelPatterns: config.labels.patterns });
    const run = {
      maxDepth: config.extraction.maxDepth,
      includeClosed: config.extraction.includeClosed,
      buildTimeoutMs: config.extraction.buildTimeoutMs,
      snapshotDate,
      onProgress: progress ? (written: number, total: number) => progress.update(written, total) : undefined,
    };

    const summary = scope
      ? await extractor.extractFromGroups({ ...run, groupIds: scope, rootGroupId: groupId, rootEpicIid: epicIid })
      : await extractor.extract({ ...run, groupId, epicIid });

    if (values.json) {
      console.log(JSON.stringify(summary, null, 2));
    } else {
      printSummary(summary);
    }
  } finally {
    abort.abort();
    progress?.stop();
    await store.close();
  }
}

/** The bar appears with the first stored item, once the total is known. */
function lazyProgressBar(): { update(written: number, total: number): void; stop(): void } {
  let bar: ProgressBarHandle | null = null;
  return {
    update(written, total) {
      bar ??= createProgressBar({ total });
      bar.update(written);
    },
    stop() {
      bar?.stop();
    },
  };
}

function percent(part: number, total: number): string {
  return total === 0 ? '0.0%' : `${((part / total) * 100).toFixed(1)}%`;
}

function printSummary(summary: ExtractionSummary): void {
  console.log('Extraction Summary');
  console.log('==================\n');
  printKeyValue([
    { key: 'Root', value: summary.rootId },
    { key: 'Strategy', value: summary.strategy },
    { key: 'Snapshot', value: summary.snapshotDate },
    { key: 'Total Items', value: summary.totalItems },
    { key: 'Epics', value: summary.containerCount },
    { key: 'Issues', value: summary.leafItemCount },
    { key: 'Open', value: `${summary.openCount} (${percent(summary.openCount, summary.totalItems)})` },
    { key: 'Closed', value: `${summary.closedCount} (${percent(summary.closedCount, summary.totalItems)})` },
    { key: 'Max Depth', value: summary.maxDepth },
    { key: 'Avg Depth', value: summary.avgDepth.toFixed(1) },
    { key: 'Leaf Nodes', value: summary.leafCount },
    { key: 'Orphaned', value: summary.orphanedCount },
    { key: 'Conditions', value: summary.conditions.length },
    { key: 'Elapsed', value: formatDuration(summary.elapsedMs) },
  ]);
}

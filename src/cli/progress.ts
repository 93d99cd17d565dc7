/**
 * @fileoverview Progress and tabular output for CLI commands
 *
 * Progress bars draw on stderr so stdout stays clean for export and --json
 * output.
 */

import cliProgress from 'cli-progress';

export interface ProgressBarHandle {
  update(current: number): void;
  setTotal(total: number): void;
  stop(): void;
}

export interface ProgressBarOptions {
  total: number;
  /** Unit shown after the counter, e.g. `items`. */
  unit?: string;
  etaBuffer?: number;
}

export function createProgressBar(options: ProgressBarOptions): ProgressBarHandle {
  const { total, unit = 'items', etaBuffer = 10 } = options;

  const bar = new cliProgress.SingleBar(
    {
      format: `{bar} {percentage}% | {value}/{total} ${unit} | ETA: {eta_formatted}`,
      barCompleteChar: '=',
      barIncompleteChar: '-',
      hideCursor: true,
      clearOnComplete: false,
      stopOnComplete: true,
      etaBuffer,
    },
    cliProgress.Presets.shades_classic,
  );

  bar.start(total, 0);

  return {
    update(current: number): void {
      bar.update(current);
    },

    setTotal(newTotal: number): void {
      bar.setTotal(newTotal);
    },

    stop(): void {
      bar.stop();
    },
  };
}

/**
 * Format milliseconds into a human-readable duration
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  if (ms < 60_000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60_000);
  const seconds = Math.round((ms % 60_000) / 1000);
  return `${minutes}m ${seconds}s`;
}

/**
 * Display a simple table in the terminal
 */
export function printTable(headers: string[], rows: string[][]): void {
  const widths = headers.map((h, i) => {
    const maxRowWidth = Math.max(0, ...rows.map((row) => (row[i] ?? '').length));
    return Math.max(h.length, maxRowWidth);
  });

  const headerLine = headers.map((h, i) => h.padEnd(widths[i])).join(' | ');
  const separator = widths.map((w) => '-'.repeat(w)).join('-+-');

  console.log(headerLine);
  console.log(separator);

  for (const row of rows) {
    const line = row.map((cell, i) => (cell ?? '').padEnd(widths[i])).join(' | ');
    console.log(line);
  }
}

/**
 * Print a key-value list
 */
export function printKeyValue(items: Array<{ key: string; value: string | number | boolean | null }>): void {
  const maxKeyLength = Math.max(...items.map((item) => item.key.length));

  for (const item of items) {
    const value = item.value === null ? 'N/A' : String(item.value);
    console.log(`  ${item.key.padEnd(maxKeyLength)}: ${value}`);
  }
}

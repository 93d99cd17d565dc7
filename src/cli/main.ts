/**
 * @fileoverview Command dispatch for the workitem-hierarchy CLI
 *
 * Commands:
 *   workitem-hierarchy extract   - Extract a hierarchy and store a snapshot
 *   workitem-hierarchy stats     - Show statistics for the latest snapshot
 *   workitem-hierarchy cleanup   - Remove old snapshots
 *   workitem-hierarchy export    - Export the latest snapshot as CSV or JSON
 *   workitem-hierarchy query     - Run a read-only SQL query
 *   workitem-hierarchy help      - Show help
 *
 * @packageDocumentation
 */

import type { HierarchyConfig } from '../config/index.js';
import { VERSION } from '../index.js';
import type { HierarchySource } from '../source/types.js';
import { cleanupCommand } from './commands/cleanup.js';
import { exportCommand } from './commands/export.js';
import { extractCommand } from './commands/extract.js';
import { queryCommand } from './commands/query.js';
import type { CommandContext } from './commands/shared.js';
import { statsCommand } from './commands/stats.js';
import { createError, formatError, getExitCode } from './errors.js';
import { showHelp } from './help.js';

type Command = 'extract' | 'stats' | 'cleanup' | 'export' | 'query';

const COMMANDS: Record<Command, (context: CommandContext) => Promise<void>> = {
  extract: extractCommand,
  stats: statsCommand,
  cleanup: cleanupCommand,
  export: exportCommand,
  query: queryCommand,
};

function isCommand(value: string): value is Command {
  return Object.prototype.hasOwnProperty.call(COMMANDS, value);
}

export interface RunCliOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  createSource?: (config: HierarchyConfig) => HierarchySource;
}

/**
 * Run one command line (without the node and script arguments).
 * Resolves to the process exit code; errors are printed, never thrown.
 */
export async function runCli(argv: string[], options: RunCliOptions = {}): Promise<number> {
  const [command, ...args] = argv;

  if (command === undefined || command === 'help' || command === '--help' || command === '-h') {
    showHelp(command === 'help' ? args[0] : undefined);
    return 0;
  }
  if (command === '--version' || command === '-v') {
    console.log(`workitem-hierarchy ${VERSION}`);
    return 0;
  }
  if (!isCommand(command)) {
    const error = createError('INVALID_ARGUMENT', `Unknown command: ${command}`);
    console.error(formatError(error));
    return getExitCode(error);
  }
  if (args.includes('--help') || args.includes('-h')) {
    showHelp(command);
    return 0;
  }

  try {
    await COMMANDS[command]({
      args,
      cwd: options.cwd ?? process.cwd(),
      env: options.env ?? process.env,
      createSource: options.createSource,
    });
    return 0;
  } catch (error) {
    console.error(formatError(error));
    return getExitCode(error);
  }
}

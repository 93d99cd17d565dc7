import * as path from 'node:path';
import { loadConfig, type ConfigLayer, type HierarchyConfig } from '../../config/index.js';
import { GitLabSource } from '../../source/gitlab_source.js';
import type { HierarchySource } from '../../source/types.js';
import { SqliteHierarchyStore } from '../../storage/sqlite_storage.js';
import { setLogLevel } from '../../telemetry/logger.js';
import { createError } from '../errors.js';

export interface CommandContext {
  /** Arguments after the command name. */
  args: string[];
  cwd: string;
  env: NodeJS.ProcessEnv;
  /** Replaces the GitLab client; tests pass an in-process source. */
  createSource?: (config: HierarchyConfig) => HierarchySource;
}

/** Options every command accepts. */
export const COMMON_OPTIONS = {
  config: { type: 'string', short: 'c' },
  db: { type: 'string' },
  verbose: { type: 'boolean', default: false },
} as const;

export interface CommonValues {
  config?: string;
  db?: string;
  verbose?: boolean;
}

/**
 * Load configuration with the command line as the top layer, and apply its
 * log level.
 */
export async function loadCommandConfig(
  context: CommandContext,
  values: CommonValues,
  overrides: ConfigLayer = {},
): Promise<HierarchyConfig> {
  const layer: ConfigLayer = { ...overrides };
  if (values.db) layer.database = { ...layer.database, path: values.db };
  if (values.verbose) layer.logLevel = 'debug';

  const config = await loadConfig({
    configPath: values.config,
    cwd: context.cwd,
    env: context.env,
    overrides: layer,
  });
  setLogLevel(config.logLevel);
  return config;
}

export function resolveDbPath(context: CommandContext, config: HierarchyConfig): string {
  return path.resolve(context.cwd, config.database.path);
}

/**
 * Open the snapshot store. Only writers take the database lock.
 */
export async function openStore(
  context: CommandContext,
  config: HierarchyConfig,
  exclusive: boolean,
): Promise<SqliteHierarchyStore> {
  const store = new SqliteHierarchyStore(resolveDbPath(context, config), { exclusive });
  await store.initialize();
  return store;
}

export function createSource(
  context: CommandContext,
  config: HierarchyConfig,
  token: string,
  signal?: AbortSignal,
): HierarchySource {
  if (context.createSource) return context.createSource(config);
  return new GitLabSource({
    signal,
    baseUrl: config.gitlab.url,
    token,
    timeoutMs: config.gitlab.timeoutMs,
    maxRetries: config.gitlab.maxRetries,
    rateLimitDelayMs: config.gitlab.rateLimitDelayMs,
  });
}

export function parseIntOption(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isInteger(parsed)) {
    throw createError('INVALID_ARGUMENT', `${flag} must be an integer, got "${value}"`);
  }
  return parsed;
}

export function requireIntOption(value: string | undefined, flag: string): number {
  const parsed = parseIntOption(value, flag);
  if (parsed === undefined) {
    throw createError('INVALID_ARGUMENT', `${flag} is required`);
  }
  return parsed;
}

/** `"1, 2,3"` to `[1, 2, 3]`. */
export function parseIdList(value: string, flag: string): number[] {
  const ids = value
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .map((part) => requireIntOption(part, flag));
  if (ids.length === 0) {
    throw createError('INVALID_ARGUMENT', `${flag} needs at least one id`);
  }
  return ids;
}

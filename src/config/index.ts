/**
 * @fileoverview Extractor configuration
 *
 * Layers, lowest precedence first:
 *
 * 1. built-in defaults
 * 2. `hierarchy.config.yaml` in the working directory, or an explicit file
 * 3. environment (`GITLAB_URL`, `GITLAB_TOKEN`, `HIERARCHY_DB`,
 *    `HIERARCHY_LOG_LEVEL`, `HIERARCHY_RATE_LIMIT_MS`)
 * 4. explicit overrides, usually from CLI flags
 *
 * The merged result is validated once; any violation is a ConfigurationError
 * naming the offending key.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import YAML from 'yaml';
import { z } from 'zod';
import { ConfigurationError } from '../core/errors.js';
import { LABEL_COLUMNS } from '../labels/label_parser.js';
import { LOG_LEVELS, logDebug } from '../telemetry/logger.js';
import { getErrorMessage } from '../utils/errors.js';

export const CONFIG_FILE_NAME = 'hierarchy.config.yaml';

// ============================================================================
// SCHEMA
// ============================================================================

const GitLabSectionSchema = z
  .object({
    url: z.string().url(),
    token: z.string().min(1).optional(),
    timeoutMs: z.number().int().positive(),
    maxRetries: z.number().int().min(0),
    rateLimitDelayMs: z.number().int().min(0),
  })
  .strict();

const ExtractionSectionSchema = z
  .object({
    maxDepth: z.number().int().min(0),
    includeClosed: z.boolean(),
    /** 0 disables the deadline. */
    buildTimeoutMs: z.number().int().min(0),
  })
  .strict();

const DatabaseSectionSchema = z
  .object({
    path: z.string().min(1),
    keepDays: z.number().int().min(0),
  })
  .strict();

const LabelsSectionSchema = z
  .object({
    /** Extra prefixes on top of the defaults. */
    patterns: z.array(z.object({ prefix: z.string().min(1), column: z.enum(LABEL_COLUMNS) }).strict()),
  })
  .strict();

export const HierarchyConfigSchema = z
  .object({
    gitlab: GitLabSectionSchema,
    extraction: ExtractionSectionSchema,
    database: DatabaseSectionSchema,
    labels: LabelsSectionSchema,
    logLevel: z.enum(LOG_LEVELS),
  })
  .strict();

/** What a config file may contain: any subset of the full shape. */
const ConfigFileSchema = z
  .object({
    gitlab: GitLabSectionSchema.partial().optional(),
    extraction: ExtractionSectionSchema.partial().optional(),
    database: DatabaseSectionSchema.partial().optional(),
    labels: LabelsSectionSchema.partial().optional(),
    logLevel: z.enum(LOG_LEVELS).optional(),
  })
  .strict();

export type HierarchyConfig = z.infer<typeof HierarchyConfigSchema>;
export type ConfigLayer = z.infer<typeof ConfigFileSchema>;

export const DEFAULT_CONFIG: HierarchyConfig = {
  gitlab: {
    url: 'https://gitlab.com',
    timeoutMs: 30_000,
    maxRetries: 3,
    rateLimitDelayMs: 500,
  },
  extraction: {
    maxDepth: 20,
    includeClosed: true,
    buildTimeoutMs: 0,
  },
  database: {
    path: 'data/hierarchy.db',
    keepDays: 90,
  },
  labels: {
    patterns: [],
  },
  logLevel: 'info',
};

// ============================================================================
// LAYERS
// ============================================================================

function firstIssue(error: z.ZodError): { key: string; message: string } {
  const issue = error.issues[0];
  if (!issue) return { key: 'config', message: 'invalid value' };
  return { key: issue.path.length > 0 ? issue.path.join('.') : 'config', message: issue.message };
}

async function readConfigFile(filePath: string): Promise<ConfigLayer> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    throw new ConfigurationError('configPath', `cannot read ${filePath}: ${getErrorMessage(error)}`, filePath);
  }

  let parsed: unknown;
  try {
    parsed = YAML.parse(raw);
  } catch (error) {
    throw new ConfigurationError('configPath', `invalid YAML: ${getErrorMessage(error)}`, filePath);
  }
  if (parsed === null || parsed === undefined) return {};

  const result = ConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    const { key, message } = firstIssue(result.error);
    throw new ConfigurationError(key, message, filePath);
  }
  return result.data;
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

function parseEnvInt(env: NodeJS.ProcessEnv, name: string, key: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new ConfigurationError(key, `${name} must be an integer, got "${raw}"`, 'env');
  }
  return value;
}

/** The environment's contribution; unset variables contribute nothing. */
export function configFromEnv(env: NodeJS.ProcessEnv): ConfigLayer {
  const layer: ConfigLayer = {};
  const gitlab: NonNullable<ConfigLayer['gitlab']> = {};
  if (env.GITLAB_URL) gitlab.url = env.GITLAB_URL;
  if (env.GITLAB_TOKEN) gitlab.token = env.GITLAB_TOKEN;
  const rateLimit = parseEnvInt(env, 'HIERARCHY_RATE_LIMIT_MS', 'gitlab.rateLimitDelayMs');
  if (rateLimit !== undefined) gitlab.rateLimitDelayMs = rateLimit;
  if (Object.keys(gitlab).length > 0) layer.gitlab = gitlab;

  if (env.HIERARCHY_DB) layer.database = { path: env.HIERARCHY_DB };

  const level = env.HIERARCHY_LOG_LEVEL;
  if (level) {
    const parsed = z.enum(LOG_LEVELS).safeParse(level);
    if (!parsed.success) {
      throw new ConfigurationError('logLevel', `HIERARCHY_LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}`, 'env');
    }
    layer.logLevel = parsed.data;
  }
  return layer;
}

/** Section-wise merge; later layers win key by key. */
export function mergeConfig(base: HierarchyConfig, ...layers: ConfigLayer[]): HierarchyConfig {
  return layers.reduce<HierarchyConfig>(
    (merged, layer) => ({
      gitlab: { ...merged.gitlab, ...layer.gitlab },
      extraction: { ...merged.extraction, ...layer.extraction },
      database: { ...merged.database, ...layer.database },
      labels: { ...merged.labels, ...layer.labels },
      logLevel: layer.logLevel ?? merged.logLevel,
    }),
    base,
  );
}

// ============================================================================
// LOADING
// ============================================================================

export interface LoadConfigOptions {
  /** Explicit file; must exist. Without it, CONFIG_FILE_NAME in cwd is used if present. */
  configPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: ConfigLayer;
}

export async function loadConfig(options: LoadConfigOptions = {}): Promise<HierarchyConfig> {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;

  let fileLayer: ConfigLayer = {};
  if (options.configPath) {
    fileLayer = await readConfigFile(path.resolve(cwd, options.configPath));
  } else {
    const candidate = path.join(cwd, CONFIG_FILE_NAME);
    if (await fileExists(candidate)) {
      fileLayer = await readConfigFile(candidate);
      logDebug('Loaded configuration file', { path: candidate });
    }
  }

  const merged = mergeConfig(DEFAULT_CONFIG, fileLayer, configFromEnv(env), options.overrides ?? {});
  const result = HierarchyConfigSchema.safeParse(merged);
  if (!result.success) {
    const { key, message } = firstIssue(result.error);
    throw new ConfigurationError(key, message);
  }
  return result.data;
}

/**
 * The token is optional for read-only commands; extraction calls this.
 *
 * @throws ConfigurationError when no token is configured
 */
export function requireToken(config: HierarchyConfig): string {
  if (!config.gitlab.token) {
    throw new ConfigurationError('gitlab.token', 'a GitLab token is required; set GITLAB_TOKEN or gitlab.token');
  }
  return config.gitlab.token;
}

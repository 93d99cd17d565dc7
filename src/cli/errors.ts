/**
 * @fileoverview CLI error handling with helpful suggestions
 */

import {
  ConfigurationError,
  RootNotFoundError,
  SourceAuthError,
  SourceRequestError,
  StorageError,
  isHierarchyError,
} from '../core/errors.js';
import { TimeoutError } from '../utils/async.js';

export class CliError extends Error {
  constructor(
    message: string,
    public readonly code: CliErrorCode,
    public readonly suggestion?: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'CliError';
  }
}

export type CliErrorCode =
  | 'INVALID_ARGUMENT'
  | 'CONFIG_INVALID'
  | 'AUTH_FAILED'
  | 'ROOT_NOT_FOUND'
  | 'SOURCE_UNAVAILABLE'
  | 'STORAGE_ERROR'
  | 'TIMEOUT'
  | 'NO_DATA'
  | 'UNEXPECTED';

export const ERROR_SUGGESTIONS: Record<CliErrorCode, string> = {
  INVALID_ARGUMENT: 'Run `workitem-hierarchy help <command>` for usage information.',
  CONFIG_INVALID: 'Check hierarchy.config.yaml and the GITLAB_* / HIERARCHY_* environment variables.',
  AUTH_FAILED: 'Check that GITLAB_TOKEN is valid and has the read_api scope.',
  ROOT_NOT_FOUND: 'Check the group id and epic iid; with --scope, make sure the root epic\'s group is reachable.',
  SOURCE_UNAVAILABLE: 'GitLab did not answer; try again later or raise gitlab.maxRetries.',
  STORAGE_ERROR: 'Check the database path, and that no other extraction is writing to it.',
  TIMEOUT: 'The build did not finish in time. Raise --timeout or narrow the extraction with --max-depth.',
  NO_DATA: 'Run `workitem-hierarchy extract` first to store a snapshot.',
  UNEXPECTED: 'Re-run with --verbose for more detail.',
};

/** Exit status per error code; usage errors follow the shell convention. */
const EXIT_CODES: Record<CliErrorCode, number> = {
  INVALID_ARGUMENT: 2,
  CONFIG_INVALID: 2,
  AUTH_FAILED: 1,
  ROOT_NOT_FOUND: 1,
  SOURCE_UNAVAILABLE: 1,
  STORAGE_ERROR: 1,
  TIMEOUT: 1,
  NO_DATA: 1,
  UNEXPECTED: 1,
};

export function createError(
  code: CliErrorCode,
  message: string,
  details?: Record<string, unknown>,
): CliError {
  return new CliError(message, code, ERROR_SUGGESTIONS[code], details);
}

function isParseArgsError(error: Error): boolean {
  return 'code' in error && typeof error.code === 'string' && error.code.startsWith('ERR_PARSE_ARGS');
}

/**
 * Map anything a command throws onto a CliError.
 */
export function classifyError(error: unknown): CliError {
  if (error instanceof CliError) return error;
  if (error instanceof ConfigurationError) {
    return createError('CONFIG_INVALID', error.message, { key: error.key });
  }
  if (error instanceof SourceAuthError) {
    return createError('AUTH_FAILED', error.message);
  }
  if (error instanceof RootNotFoundError) {
    return createError('ROOT_NOT_FOUND', error.message, { root: error.rootRef });
  }
  if (error instanceof SourceRequestError) {
    return createError('SOURCE_UNAVAILABLE', error.message, { url: error.url, status: error.status });
  }
  if (error instanceof StorageError) {
    return createError('STORAGE_ERROR', error.message, { operation: error.operation });
  }
  if (error instanceof TimeoutError) {
    return createError('TIMEOUT', error.message, { timeoutMs: error.timeoutMs });
  }
  if (isHierarchyError(error)) {
    return createError('UNEXPECTED', error.message, { code: error.code });
  }
  if (error instanceof Error) {
    if (isParseArgsError(error)) return createError('INVALID_ARGUMENT', error.message);
    return createError('UNEXPECTED', error.message);
  }
  return createError('UNEXPECTED', String(error));
}

export function formatError(error: unknown): string {
  const cliError = classifyError(error);
  const headline = `Error [${cliError.code}]: ${cliError.message}`;
  return cliError.suggestion ? `${headline}\n\nSuggestion: ${cliError.suggestion}` : headline;
}

export function getExitCode(error: unknown): number {
  return EXIT_CODES[classifyError(error).code];
}

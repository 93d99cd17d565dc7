/**
 * @fileoverview Hierarchy extractor error hierarchy
 *
 * Only `RootNotFoundError` escapes a build. Per-subtree failures are turned
 * into `TransientFetchError` values and recorded as build conditions.
 */

// ============================================================================
// ERROR JSON TYPE
// ============================================================================

export interface ErrorJSON {
  code: string;
  message: string;
  retryable: boolean;
  timestamp: number;
  stack?: string;
  details?: Record<string, unknown>;
}

// ============================================================================
// BASE ERROR
// ============================================================================

export abstract class HierarchyError extends Error {
  abstract readonly code: string;
  abstract readonly retryable: boolean;
  readonly timestamp = Date.now();

  toJSON(): ErrorJSON {
    return {
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}

// ============================================================================
// BUILD ERRORS
// ============================================================================

export class RootNotFoundError extends HierarchyError {
  readonly code = 'ROOT_NOT_FOUND';
  readonly retryable = false;

  constructor(
    readonly rootRef: string,
    message: string,
    readonly cause?: Error,
  ) {
    super(`Root ${rootRef} not found: ${message}`);
    this.name = 'RootNotFoundError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        rootRef: this.rootRef,
        cause: this.cause?.message,
      },
    };
  }
}

export type FetchOperation = 'children' | 'leaf_items';

export class TransientFetchError extends HierarchyError {
  readonly code = 'TRANSIENT_FETCH';
  readonly retryable = true;

  constructor(
    readonly operation: FetchOperation,
    readonly nodeRef: string,
    message: string,
    readonly cause?: Error,
  ) {
    super(`Fetching ${operation} of ${nodeRef} failed: ${message}`);
    this.name = 'TransientFetchError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        operation: this.operation,
        nodeRef: this.nodeRef,
        cause: this.cause?.message,
      },
    };
  }
}

// ============================================================================
// SOURCE ERRORS
// ============================================================================

export class SourceRequestError extends HierarchyError {
  readonly code = 'SOURCE_REQUEST';

  constructor(
    readonly url: string,
    readonly status: number | null,
    readonly retryable: boolean,
    message: string,
  ) {
    super(status === null ? `Request to ${url} failed: ${message}` : `Request to ${url} failed with ${status}: ${message}`);
    this.name = 'SourceRequestError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        url: this.url,
        status: this.status,
      },
    };
  }
}

export class SourceAuthError extends HierarchyError {
  readonly code = 'SOURCE_AUTH';
  readonly retryable = false;

  constructor(readonly baseUrl: string, message: string) {
    super(`Authentication against ${baseUrl} failed: ${message}`);
    this.name = 'SourceAuthError';
  }
}

// ============================================================================
// STORAGE ERRORS
// ============================================================================

export type StorageOperation = 'open' | 'write' | 'read' | 'delete' | 'query' | 'migrate';

export class StorageError extends HierarchyError {
  readonly code = 'STORAGE_ERROR';

  constructor(
    readonly operation: StorageOperation,
    readonly retryable: boolean,
    message: string,
    readonly cause?: Error,
  ) {
    super(`Storage ${operation} failed: ${message}`);
    this.name = 'StorageError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        operation: this.operation,
        cause: this.cause?.message,
      },
    };
  }
}

// ============================================================================
// CONFIGURATION ERRORS
// ============================================================================

export class ConfigurationError extends HierarchyError {
  readonly code = 'CONFIG_ERROR';
  readonly retryable = false;

  constructor(
    readonly key: string,
    message: string,
    readonly source?: string,
  ) {
    super(`Invalid configuration for ${key}: ${message}`);
    this.name = 'ConfigurationError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        key: this.key,
        source: this.source,
      },
    };
  }
}

// ============================================================================
// GUARDS
// ============================================================================

export function isHierarchyError(error: unknown): error is HierarchyError {
  return error instanceof HierarchyError;
}

export function isRootNotFoundError(error: unknown): error is RootNotFoundError {
  return error instanceof RootNotFoundError;
}

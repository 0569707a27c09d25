/**
 * Error types shared by the fetch, store and sync layers
 */

// ============================================================================
// Custom Error Classes
// ============================================================================

/**
 * Raised by the fetch client once its retry budget is spent, or immediately
 * for a non-retryable HTTP status.
 */
export class FetchError extends Error {
  code = "FETCH_FAILED" as const;
  label: string;
  url: string;
  attempts: number;
  /** Last HTTP status, `null` when the last attempt failed in transport */
  status: number | null;

  constructor(
    message: string,
    details: {
      label: string;
      url: string;
      attempts: number;
      status: number | null;
      cause?: unknown;
    }
  ) {
    super(message, { cause: details.cause });
    this.name = "FetchError";
    this.label = details.label;
    this.url = details.url;
    this.attempts = details.attempts;
    this.status = details.status;
  }
}

/** HTTP statuses worth another attempt; anything else fails at once */
export const TRANSIENT_HTTP_STATUSES: ReadonlySet<number> = new Set([
  429, 500, 502, 503, 504,
]);

export class SyncError extends Error {
  code = "SYNC_FAILED" as const;
  operation: string;
  range?: { start: string; end: string };

  constructor(
    message: string,
    details: {
      operation: string;
      range?: { start: string; end: string };
      cause?: unknown;
    }
  ) {
    super(message, { cause: details.cause });
    this.name = "SyncError";
    this.operation = details.operation;
    this.range = details.range;
  }
}

export class StoreError extends Error {
  code = "STORE_FAILED" as const;
  table: string;

  constructor(message: string, table: string, cause?: unknown) {
    super(message, { cause });
    this.name = "StoreError";
    this.table = table;
  }
}

export class ConfigError extends Error {
  code = "CONFIG_INVALID" as const;
  issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

// ============================================================================
// Helpers
// ============================================================================

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * A sync failure is transient when it bottoms out in a transport failure or
 * a retryable HTTP status. Persistence, validation and other 4xx failures
 * are not.
 */
export function isTransientSyncFailure(error: unknown): boolean {
  if (!(error instanceof SyncError) || !(error.cause instanceof FetchError)) {
    return false;
  }
  const { status } = error.cause;
  return status === null || TRANSIENT_HTTP_STATUSES.has(status);
}

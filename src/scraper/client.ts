import { setTimeout as sleep } from "node:timers/promises";

import {
  FetchError,
  TRANSIENT_HTTP_STATUSES,
  errorMessage,
} from "../errors.js";
import { httpLogger } from "../logger.js";

// ============================================================================
// Types
// ============================================================================

export const DEFAULT_RETRY_STATUSES: ReadonlySet<number> =
  TRANSIENT_HTTP_STATUSES;

export interface GetJsonOptions {
  params?: Record<string, string>;
  timeoutMs?: number;
  /** Extra attempts after the first one */
  retries?: number;
  backoffSeconds?: number;
  retryStatuses?: Iterable<number>;
  /** Endpoint name used in logs and errors; defaults to the URL */
  label?: string;
}

export interface HttpClientDeps {
  fetch: typeof fetch;
  sleep: (ms: number) => Promise<unknown>;
  random: () => number;
}

type AttemptOutcome =
  | { kind: "ok"; data: unknown }
  | { kind: "http"; status: number; retryAfter: string | null }
  | { kind: "transport"; error: unknown };

// ============================================================================
// Backoff
// ============================================================================

/**
 * Seconds to wait before the next attempt.
 *
 * A numeric `Retry-After` hint wins over backoff. Otherwise the delay is
 * `backoff * 2^attempt` plus up to `backoff` of jitter, with `attempt`
 * counted from zero.
 */
export function computeRetryDelay(
  attempt: number,
  backoffSeconds: number,
  retryAfter: string | null,
  random: () => number = Math.random
): number {
  if (retryAfter !== null && retryAfter.trim() !== "") {
    const hint = Number(retryAfter.trim());
    if (Number.isFinite(hint)) {
      return Math.max(0, hint);
    }
  }
  return backoffSeconds * 2 ** attempt + random() * backoffSeconds;
}

export function buildUrl(url: string, params?: Record<string, string>): string {
  if (params === undefined || Object.keys(params).length === 0) {
    return url;
  }
  const target = new URL(url);
  for (const [key, value] of Object.entries(params)) {
    target.searchParams.set(key, value);
  }
  return target.toString();
}

// ============================================================================
// HTTP Client
// ============================================================================

export class HttpClient {
  private deps: HttpClientDeps;

  constructor(deps: Partial<HttpClientDeps> = {}) {
    this.deps = {
      fetch: deps.fetch ?? ((input, init) => fetch(input, init)),
      sleep: deps.sleep ?? ((ms) => sleep(ms)),
      random: deps.random ?? Math.random,
    };
  }

  /**
   * GET a JSON document, retrying transport failures and retryable statuses.
   *
   * @throws FetchError on a non-retryable status or once `retries + 1`
   * attempts have failed
   */
  async getJson(url: string, options: GetJsonOptions = {}): Promise<unknown> {
    const timeoutMs = options.timeoutMs ?? 10_000;
    const retries = options.retries ?? 2;
    const backoffSeconds = options.backoffSeconds ?? 0.5;
    const retryStatuses = new Set(
      options.retryStatuses ?? DEFAULT_RETRY_STATUSES
    );
    const label = options.label ?? url;
    const target = buildUrl(url, options.params);
    const maxAttempts = retries + 1;

    for (let attempt = 0; ; attempt++) {
      const outcome = await this.attempt(target, timeoutMs, label);
      if (outcome.kind === "ok") {
        return outcome.data;
      }

      const status = outcome.kind === "http" ? outcome.status : null;
      const retryable =
        outcome.kind === "transport" || retryStatuses.has(outcome.status);

      if (!retryable || attempt + 1 >= maxAttempts) {
        httpLogger.error(
          { label, attempts: attempt + 1, status },
          "Request failed"
        );
        const reason =
          outcome.kind === "http"
            ? `HTTP ${String(outcome.status)}`
            : errorMessage(outcome.error);
        throw new FetchError(
          `${label} request failed after ${String(attempt + 1)} attempt(s): ${reason}`,
          {
            label,
            url: target,
            attempts: attempt + 1,
            status,
            cause: outcome.kind === "transport" ? outcome.error : undefined,
          }
        );
      }

      const delaySeconds = computeRetryDelay(
        attempt,
        backoffSeconds,
        outcome.kind === "http" ? outcome.retryAfter : null,
        this.deps.random
      );
      httpLogger.warn(
        {
          label,
          status,
          error:
            outcome.kind === "transport"
              ? errorMessage(outcome.error)
              : undefined,
          attempt: attempt + 1,
          maxAttempts,
          delaySeconds: Number(delaySeconds.toFixed(2)),
        },
        "Request failed, retrying"
      );
      await this.deps.sleep(delaySeconds * 1000);
    }
  }

  private async attempt(
    target: string,
    timeoutMs: number,
    label: string
  ): Promise<AttemptOutcome> {
    const startTime = performance.now();
    try {
      const response = await this.deps.fetch(target, {
        headers: { Accept: "application/json" },
        signal: AbortSignal.timeout(timeoutMs),
      });
      const body = await response.text();
      const duration = Math.round(performance.now() - startTime);

      httpLogger.debug(
        { label, status: response.status, duration: `${String(duration)}ms` },
        "Received response"
      );

      if (!response.ok) {
        return {
          kind: "http",
          status: response.status,
          retryAfter: response.headers.get("Retry-After"),
        };
      }

      // An unparsable body is treated like a dropped connection
      const data: unknown = JSON.parse(body);
      return { kind: "ok", data };
    } catch (error) {
      return { kind: "transport", error };
    }
  }
}

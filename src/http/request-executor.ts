// ---------------------------------------------------------------------------
// RequestExecutor – issues one Alma API request through the quota governor.
//
// Retry policy per failure class:
//   transport failure  -> NetworkError,        retried maxNetworkRetries times
//   HTTP 429           -> governor throttle,   retried maxRateLimitRetries times
//   other HTTP 4xx     -> RemoteRejectedError, never retried
//   HTTP 5xx           -> RemoteServerError,   retried maxServerRetries times
// ---------------------------------------------------------------------------

import type { Logger } from "pino";

import type { ApiRequest, ApiResponse, ExecutorConfig } from "../core/types.js";
import {
  NetworkError,
  RemoteRejectedError,
  RemoteServerError,
} from "../core/errors.js";
import type { QuotaGovernor } from "../orchestrator/quota-governor.js";
import { withRetry } from "../orchestrator/retry.js";
import { createRequestLogger } from "../logging/logger.js";
import { extractErrorMessage } from "../utils/error-body.js";

const MIME_TYPES = {
  xml: "application/xml",
  json: "application/json",
} as const;

interface RetryBudget {
  network: number;
  server: number;
  rateLimit: number;
}

export class RequestExecutor {
  private readonly config: ExecutorConfig;
  private readonly governor: QuotaGovernor;
  private readonly logger: Logger;

  constructor(config: ExecutorConfig, governor: QuotaGovernor, logger: Logger) {
    this.config = config;
    this.governor = governor;
    this.logger = logger.child({ component: "RequestExecutor" });
  }

  // ── Public API ──────────────────────────────────────────────────────────

  /**
   * Send `request`, retrying transient failures.  Resolves only for 2xx/3xx
   * responses; every other outcome is thrown as a typed error.
   */
  async execute(request: ApiRequest): Promise<ApiResponse> {
    const url = this.buildUrl(request);
    const used: RetryBudget = { network: 0, server: 0, rateLimit: 0 };
    const { maxNetworkRetries, maxServerRetries, maxRateLimitRetries } = this.config;
    const log = createRequestLogger(this.logger, request);
    const start = Date.now();

    const response = await withRetry(() => this.attempt(request, url, log), {
      maxRetries: maxNetworkRetries + maxServerRetries + maxRateLimitRetries,
      delayMs: this.config.retryDelayMs,
      shouldRetry: (error) => {
        if (error instanceof NetworkError) {
          return used.network++ < maxNetworkRetries;
        }
        if (error instanceof RemoteServerError) {
          return used.server++ < maxServerRetries;
        }
        if (error instanceof RemoteRejectedError && error.status === 429) {
          return used.rateLimit++ < maxRateLimitRetries;
        }
        return false;
      },
      // The governor already holds a rate-limited caller in its throttle.
      delayFor: (error) =>
        error instanceof RemoteRejectedError && error.status === 429
          ? 0
          : this.config.retryDelayMs,
      onRetry: (error, attempt, delayMs) => {
        log.warn(
          {
            attempt: attempt + 1,
            delayMs,
            reason: error instanceof Error ? error.message : String(error),
          },
          "Retrying request",
        );
      },
    });

    log.debug(
      { status: response.status, durationMs: Date.now() - start },
      "Request completed",
    );
    return response;
  }

  // ── Private ─────────────────────────────────────────────────────────────

  private async attempt(request: ApiRequest, url: string, log: Logger): Promise<ApiResponse> {
    await this.governor.acquire();

    const headers: Record<string, string> = {
      Authorization: `apikey ${request.credential.apiKey}`,
      Accept: MIME_TYPES[request.format],
    };
    if (request.body !== undefined) {
      headers["Content-Type"] = MIME_TYPES[request.format];
    }

    log.debug("Dispatching request");

    let response: Response;
    let payload: string;
    try {
      response = await fetch(url, {
        method: request.method,
        headers,
        body: request.body,
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });
      payload = await response.text();
    } catch (error: unknown) {
      throw toNetworkError(error, url);
    }

    const remainingCalls = await this.governor.recordResponse(response.headers);
    const contentType = response.headers.get("content-type") ?? "";
    const { status } = response;

    if (status === 429) {
      await this.governor.recordRateLimited();
      throw new RemoteRejectedError(status, payload, extractErrorMessage(payload, contentType));
    }
    if (status >= 500) {
      throw new RemoteServerError(status, payload);
    }
    if (status >= 400) {
      throw new RemoteRejectedError(status, payload, extractErrorMessage(payload, contentType));
    }

    return { status, payload, contentType, quota: { remainingCalls } };
  }

  private buildUrl(request: ApiRequest): string {
    const query =
      request.query && Object.keys(request.query).length > 0
        ? new URLSearchParams(request.query).toString()
        : "";
    if (/^https?:\/\//i.test(request.path)) {
      if (query === "") return request.path;
      return `${request.path}${request.path.includes("?") ? "&" : "?"}${query}`;
    }
    const base = this.config.baseUrl.replace(/\/+$/, "");
    const path = request.path.startsWith("/") ? request.path : `/${request.path}`;
    return query === "" ? `${base}${path}` : `${base}${path}?${query}`;
  }
}

/**
 * Wrap anything thrown by `fetch` (TypeError on connection failure,
 * TimeoutError / AbortError from the signal) as a {@link NetworkError}.
 */
function toNetworkError(error: unknown, url: string): NetworkError {
  if (
    error instanceof Error &&
    (error.name === "TimeoutError" || error.name === "AbortError")
  ) {
    return new NetworkError(`Request to ${url} timed out`, url, { cause: error });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new NetworkError(`Network error calling ${url}: ${message}`, url, {
    cause: error,
  });
}

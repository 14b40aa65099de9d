// ---------------------------------------------------------------------------
// Retry logic with a fixed delay between attempts.
// ---------------------------------------------------------------------------

import {
  ConfigurationError,
  CredentialNotFoundError,
  NetworkError,
  QuotaHaltedError,
  RemoteRejectedError,
  RemoteServerError,
} from "../core/errors.js";

// ── Types ──────────────────────────────────────────────────────────────────

export interface RetryOptions {
  /** Maximum number of retries (0 means no retries, just the initial call). */
  maxRetries: number;
  /** Delay in milliseconds before each retry. */
  delayMs: number;
  /**
   * Predicate that decides whether a given error is retryable.  `attempt` is
   * the zero-based index of the attempt that just failed.
   *
   * When omitted the default policy is used:
   * - Retry: `NetworkError`, `RemoteServerError`
   * - Do NOT retry: `RemoteRejectedError`, `QuotaHaltedError`,
   *   `CredentialNotFoundError`, `ConfigurationError`
   */
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  /** Per-error override of `delayMs`. */
  delayFor?: (error: unknown, attempt: number) => number;
  /** Called before sleeping ahead of a retry. */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

// ── Default retry predicate ────────────────────────────────────────────────

/**
 * Default predicate: only retry transient errors (transport / 5xx).
 */
function defaultShouldRetry(error: unknown): boolean {
  if (error instanceof NetworkError) return true;
  if (error instanceof RemoteServerError) return true;

  // Permanent failures -- do not retry.
  if (error instanceof RemoteRejectedError) return false;
  if (error instanceof QuotaHaltedError) return false;
  if (error instanceof CredentialNotFoundError) return false;
  if (error instanceof ConfigurationError) return false;

  // Unknown errors -- default to retryable so we don't silently drop.
  return true;
}

// ── Delay helper ───────────────────────────────────────────────────────────

/** Returns a promise that resolves after `ms` milliseconds. */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// ── Public API ─────────────────────────────────────────────────────────────

/**
 * Execute `fn` with retry semantics.
 *
 * On failure `shouldRetry` is consulted.  If `true`, the function sleeps
 * for `delayMs` (or whatever `delayFor` returns) before retrying, up to
 * `maxRetries` times.
 *
 * If all attempts are exhausted, the last error is thrown.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const {
    maxRetries,
    delayMs,
    shouldRetry = defaultShouldRetry,
    delayFor,
    onRetry,
  } = options;

  let lastError: unknown;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error: unknown) {
      lastError = error;

      // If not retryable or we've exhausted attempts, bail out.
      if (!shouldRetry(error, attempt) || attempt >= maxRetries) {
        throw error;
      }

      const delay = delayFor ? delayFor(error, attempt) : delayMs;
      onRetry?.(error, attempt, delay);
      await sleep(delay);
    }
  }

  // Should be unreachable, but satisfy the compiler.
  throw lastError;
}

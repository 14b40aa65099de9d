// ---------------------------------------------------------------------------
// Process-wide quota governor with three states: ready, throttled, halted.
// ---------------------------------------------------------------------------

import pLimit from "p-limit";
import type { Logger } from "pino";

import type { GovernorConfig, GovernorState, QuotaSnapshot } from "../core/types.js";
import { QuotaHaltedError } from "../core/errors.js";
import { sleep } from "./retry.js";

/** Response header carrying the remaining daily API calls. */
export const QUOTA_HEADER = "x-exl-api-remaining";

/** Exit status used when the process stops on quota exhaustion. */
export const QUOTA_EXHAUSTED_EXIT_CODE = 75;

export type HaltHandler = (error: QuotaHaltedError) => void;

/**
 * Gates every outbound Alma call.
 *
 * - `ready`     -- calls are admitted.
 * - `throttled` -- at least one caller found the rate window full and is
 *                  sleeping `throttleDelayMs` before re-checking.
 * - `halted`    -- remaining calls fell under `quotaFloor`; terminal.
 *
 * Counters are only touched inside a single-slot p-limit queue.  A throttled
 * caller leaves the queue before it sleeps, so other callers keep flowing.
 */
export class QuotaGovernor {
  private readonly lock = pLimit(1);
  private readonly config: GovernorConfig;
  private readonly logger: Logger;
  private readonly onHalt: HaltHandler | undefined;

  /** Dispatch times (ms) inside the trailing window, oldest first. */
  private readonly dispatches: number[] = [];
  private remainingCalls: number | null = null;
  private blockedUntil = 0;
  private throttledCallers = 0;
  private halted = false;

  constructor(config: GovernorConfig, logger: Logger, onHalt?: HaltHandler) {
    this.config = config;
    this.logger = logger.child({ component: "QuotaGovernor" });
    this.onHalt = onHalt;
  }

  // ── Gate ─────────────────────────────────────────────────────────────────

  /**
   * Wait until a call may be dispatched.  Throws {@link QuotaHaltedError}
   * before dispatch once the quota floor has been breached.
   */
  async acquire(): Promise<void> {
    let throttled = false;

    for (;;) {
      const wasThrottled = throttled;
      const admission = await this.lock(() => this.tryAdmit(wasThrottled));
      if (admission.admitted) return;

      if (!throttled) {
        throttled = true;
        this.logger.warn(
          {
            callsInWindow: admission.callsInWindow,
            reason: admission.reason,
            delayMs: this.config.throttleDelayMs,
          },
          "Throttle engaged",
        );
      }
      await sleep(this.config.throttleDelayMs);
    }
  }

  // ── Feedback ─────────────────────────────────────────────────────────────

  /**
   * Take the remaining-calls figure reported by the API.  The remote value
   * replaces the local estimate.
   */
  async recordResponse(headers: Headers): Promise<number | null> {
    const reported = parseRemaining(headers.get(QUOTA_HEADER));
    if (reported === null) return null;

    await this.lock(() => {
      this.remainingCalls = reported;
      if (reported < this.config.quotaFloor && !this.halted) {
        this.logger.error(
          { remainingCalls: reported, floor: this.config.quotaFloor },
          "Quota floor breached, next call will halt",
        );
      }
    });
    return reported;
  }

  /** The API answered 429: hold all dispatch for one throttle delay. */
  async recordRateLimited(): Promise<void> {
    await this.lock(() => {
      this.blockedUntil = Date.now() + this.config.throttleDelayMs;
    });
    this.logger.warn(
      { delayMs: this.config.throttleDelayMs },
      "Remote rate limit reported",
    );
  }

  // ── Queries ──────────────────────────────────────────────────────────────

  get state(): GovernorState {
    if (this.halted || this.belowFloor()) return "halted";
    return this.throttledCallers > 0 ? "throttled" : "ready";
  }

  snapshot(): QuotaSnapshot {
    const now = Date.now();
    return {
      state: this.state,
      remainingCalls: this.remainingCalls,
      callsInWindow: this.dispatches.filter(
        (t) => now - t < this.config.windowMs,
      ).length,
      throttledCallers: this.throttledCallers,
    };
  }

  // ── Private ──────────────────────────────────────────────────────────────

  /** Runs inside the lock; a refusal carries the state it was based on. */
  private tryAdmit(wasThrottled: boolean): Admission {
    if (this.halted || this.belowFloor()) {
      if (wasThrottled) this.throttledCallers--;
      throw this.halt();
    }

    const now = Date.now();
    while (
      this.dispatches.length > 0 &&
      now - this.dispatches[0] >= this.config.windowMs
    ) {
      this.dispatches.shift();
    }

    const callsInWindow = this.dispatches.length;
    if (now < this.blockedUntil || callsInWindow >= this.config.maxCallsPerWindow) {
      if (!wasThrottled) this.throttledCallers++;
      return {
        admitted: false,
        callsInWindow,
        reason: now < this.blockedUntil ? "rate-limited" : "window-full",
      };
    }

    if (wasThrottled) this.throttledCallers--;
    this.dispatches.push(now);
    if (this.remainingCalls !== null) {
      this.remainingCalls = Math.max(0, this.remainingCalls - 1);
    }
    return { admitted: true };
  }

  private belowFloor(): boolean {
    return (
      this.remainingCalls !== null &&
      this.remainingCalls < this.config.quotaFloor
    );
  }

  private halt(): QuotaHaltedError {
    const error = new QuotaHaltedError(this.remainingCalls, this.config.quotaFloor);
    if (!this.halted) {
      this.halted = true;
      this.logger.fatal(
        { remainingCalls: this.remainingCalls, floor: this.config.quotaFloor },
        "Quota halted",
      );
      this.onHalt?.(error);
    }
    return error;
  }
}

type Admission =
  | { admitted: true }
  | { admitted: false; callsInWindow: number; reason: "rate-limited" | "window-full" };

function parseRemaining(raw: string | null): number | null {
  if (raw === null || raw.trim() === "") return null;
  const value = Number(raw);
  return Number.isFinite(value) ? value : null;
}

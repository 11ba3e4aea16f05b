/**
 * Rate limit tracker for GitHub GraphQL API.
 *
 * GitHub GraphQL uses a point-based rate limit (5000 points/hour). The
 * client injects a `rateLimit` selection into every query and feeds the
 * result back here, so a long bulk run slows down before GitHub starts
 * rejecting requests.
 */

import type { RateLimitInfo } from "../types.js";

export interface RateLimiterOptions {
  /** Remaining points at which a warning is logged (default: 100) */
  warningThreshold?: number;
  /** Remaining points at which requests wait for the reset (default: 50) */
  blockThreshold?: number;
  /** Longest single wait for a reset (default: 60s) */
  maxWaitMs?: number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  warn?: (message: string) => void;
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export class RateLimiter {
  private remaining: number = 5000;
  private resetAt: Date = new Date();
  private readonly warningThreshold: number;
  private readonly blockThreshold: number;
  private readonly maxWaitMs: number;
  private readonly sleepFn: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly warn: (message: string) => void;

  constructor(options: RateLimiterOptions = {}) {
    this.warningThreshold = options.warningThreshold ?? 100;
    this.blockThreshold = options.blockThreshold ?? 50;
    this.maxWaitMs = options.maxWaitMs ?? 60_000;
    this.sleepFn = options.sleep ?? sleep;
    this.warn = options.warn ?? ((message) => console.error(message));
  }

  /**
   * Update rate limit state from a GraphQL response's rateLimit field.
   */
  update(rateLimitInfo: RateLimitInfo): void {
    this.remaining = rateLimitInfo.remaining;
    this.resetAt = new Date(rateLimitInfo.resetAt);
  }

  /**
   * Check rate limit before making a request.
   * Waits (bounded) when the budget is critically low.
   */
  async checkBeforeRequest(signal?: AbortSignal): Promise<void> {
    if (this.remaining > this.warningThreshold) {
      return;
    }

    const msUntilReset = this.resetAt.getTime() - Date.now();

    if (this.remaining <= this.blockThreshold) {
      if (msUntilReset > 0) {
        const waitMs = Math.min(msUntilReset, this.maxWaitMs);
        this.warn(
          `[ghx] Rate limit critically low (${this.remaining} remaining). ` +
            `Waiting ${Math.ceil(waitMs / 1000)}s until reset at ${this.resetAt.toISOString()}`,
        );
        await this.sleepFn(waitMs, signal);
      }
      return;
    }

    this.warn(
      `[ghx] Rate limit approaching threshold (${this.remaining} remaining). ` +
        `Resets at ${this.resetAt.toISOString()}`,
    );
  }

  getStatus(): {
    remaining: number;
    resetAt: Date;
    isLow: boolean;
    isCritical: boolean;
  } {
    return {
      remaining: this.remaining,
      resetAt: this.resetAt,
      isLow: this.remaining <= this.warningThreshold,
      isCritical: this.remaining <= this.blockThreshold,
    };
  }
}

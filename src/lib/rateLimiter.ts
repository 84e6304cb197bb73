/**
 * Guildforge — src/lib/rateLimiter.ts
 * WHAT: Process-wide FIFO limiter for Discord REST calls.
 * FLOWS:
 *   - schedule(fn): wait for a slot in the sliding window, then run fn
 *   - acquire(): wait for a slot without running anything
 * DOCS:
 *   - Discord rate limits: https://discord.com/developers/docs/topics/rate-limits
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { env } from "./env.js";
import { logger } from "./logger.js";

export interface RequestLimiterOptions {
  /** Calls allowed per window */
  capacity: number;
  windowMs: number;
  /** Clock override for tests */
  now?: () => number;
}

/**
 * Sliding-window limiter. Waiters are granted strictly in arrival order; a
 * newcomer never overtakes a queued caller even when a slot is free the moment
 * it arrives, because every acquire() queues first and then drains.
 *
 * @example
 * const role = await apiLimiter.schedule(() => guild.roles.create(spec));
 */
export class RequestLimiter {
  private readonly capacity: number;
  private readonly windowMs: number;
  private readonly now: () => number;
  // Grant timestamps still inside the window, oldest first
  private readonly grants: number[] = [];
  private readonly waiters: Array<() => void> = [];
  private timer: NodeJS.Timeout | null = null;

  constructor(options: RequestLimiterOptions) {
    if (options.capacity < 1) {
      throw new Error("RequestLimiter capacity must be >= 1");
    }
    if (options.windowMs <= 0) {
      throw new Error("RequestLimiter windowMs must be a positive number");
    }
    this.capacity = options.capacity;
    this.windowMs = options.windowMs;
    this.now = options.now ?? Date.now;
  }

  acquire(): Promise<void> {
    return new Promise<void>((resolve) => {
      this.waiters.push(resolve);
      this.drain();
    });
  }

  async schedule<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    return fn();
  }

  /** Callers waiting for a slot */
  get pending(): number {
    return this.waiters.length;
  }

  /** Slots used in the current window */
  get inFlight(): number {
    this.prune(this.now());
    return this.grants.length;
  }

  private prune(at: number): void {
    while (this.grants.length > 0 && at - this.grants[0] >= this.windowMs) {
      this.grants.shift();
    }
  }

  private drain(): void {
    const at = this.now();
    this.prune(at);

    while (this.waiters.length > 0 && this.grants.length < this.capacity) {
      const next = this.waiters.shift();
      if (!next) break;
      this.grants.push(at);
      next();
    }

    if (this.waiters.length > 0 && this.timer === null) {
      const waitMs = Math.max(0, this.grants[0] + this.windowMs - at);
      logger.debug(
        { evt: "api_limiter_wait", waitMs, queued: this.waiters.length },
        "[rateLimiter] budget exhausted, queueing"
      );
      this.timer = setTimeout(() => {
        this.timer = null;
        this.drain();
      }, waitMs);
      // A queued call keeps its own promise alive; the timer alone should not
      // hold the process open.
      this.timer.unref();
    }
  }
}

/**
 * The one budget every caller shares: orchestration steps, tier reconciliation,
 * panel publishing and progress edits.
 */
export const apiLimiter = new RequestLimiter({
  capacity: env.API_LIMITER_CAPACITY,
  windowMs: env.API_LIMITER_WINDOW_MS,
});

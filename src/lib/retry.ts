/**
 * Guildforge — src/lib/retry.ts
 * WHAT: Retry with capped exponential backoff for remote calls.
 * FLOWS:
 *  - withRetry(fn, options) → retries fn on TransientRemoteError, rethrows anything else
 * USAGE:
 *  import { withRetry } from "./retry.js";
 *  const role = await withRetry(() => client.createRole(spec), { label: "createRole" });
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "./logger.js";
import { classifyRemoteError, isTransient, type GuildforgeError } from "./errors.js";

/**
 * Options for retry behavior.
 *
 * Defaults (4 attempts, 500ms initial, 2x backoff, 15s cap) mean a rate-limited
 * call waits roughly 0.5s, 1s, 2s before the final attempt. A server-supplied
 * retry-after always wins when it is longer.
 */
export interface RetryOptions {
  /** Maximum number of attempts (default: 4) */
  maxAttempts?: number;
  /** Initial delay in ms before first retry (default: 500) */
  initialDelayMs?: number;
  /** Maximum delay in ms (default: 15000) */
  maxDelayMs?: number;
  /** Multiplier for exponential backoff (default: 2) */
  backoffMultiplier?: number;
  /** Custom function to determine if error is retryable */
  shouldRetry?: (err: GuildforgeError, attempt: number) => boolean;
  /** Label for logging, and the operation name for classification */
  label?: string;
  /** Injected in tests to avoid real waits */
  sleep?: (ms: number) => Promise<void>;
  /** Jitter source in [0, 1). Tests pin it for exact delays. */
  random?: () => number;
}

/**
 * Retry an async operation with exponential backoff.
 *
 * Raw errors are classified first, so callers always see a GuildforgeError:
 * the last TransientRemoteError when attempts run out, or the first permanent one.
 *
 * @example
 * ```ts
 * const channel = await withRetry(
 *   () => client.createChannel(spec),
 *   { maxAttempts: 3, label: "createChannel" }
 * );
 * ```
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const {
    maxAttempts = 4,
    initialDelayMs = 500,
    maxDelayMs = 15_000,
    backoffMultiplier = 2,
    shouldRetry = (err) => isTransient(err),
    label = "operation",
    sleep = defaultSleep,
    random = Math.random,
  } = options;

  if (maxAttempts < 1) {
    throw new Error(`withRetry: maxAttempts must be >= 1, got ${maxAttempts}`);
  }

  let delayMs = initialDelayMs;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      const classified = classifyRemoteError(err, label);

      if (attempt >= maxAttempts || !shouldRetry(classified, attempt)) {
        if (isTransient(classified)) {
          logger.warn(
            {
              evt: "retry_exhausted",
              label,
              attempt,
              maxAttempts,
              errorKind: classified.kind,
              errorMessage: classified.message,
            },
            `[retry] ${label} failed after ${attempt} attempts`
          );
        }
        throw classified;
      }

      // Jitter spreads retries from concurrent callers (0.5x to 1.5x of base delay).
      const jitteredDelayMs = Math.min(Math.floor(delayMs * (0.5 + random())), maxDelayMs);
      const retryAfterMs = isTransient(classified) ? (classified.retryAfterMs ?? 0) : 0;
      const waitMs = Math.max(retryAfterMs, jitteredDelayMs);

      logger.debug(
        {
          evt: "retry_attempt",
          label,
          attempt,
          maxAttempts,
          delayMs: waitMs,
          retryAfterMs: retryAfterMs || undefined,
          errorKind: classified.kind,
        },
        `[retry] ${label} attempt ${attempt} failed, retrying in ${waitMs}ms`
      );

      await sleep(waitMs);

      delayMs = Math.min(delayMs * backoffMultiplier, maxDelayMs);
    }
  }
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

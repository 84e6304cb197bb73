/**
 * Guildforge -- tests/lib/retry.test.ts
 * WHAT: Tests for withRetry backoff and classification.
 * WHY: Every remote call in a run goes through withRetry; the delays and the
 *      transient/permanent split decide how long a run sits on a rate limit.
 *
 * NOTE: sleep and random are injected, so delays are asserted exactly and no
 * test waits on a real timer.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi } from "vitest";

// ===== Mock Setup =====

const mockLogger = vi.hoisted(() => ({
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
}));

vi.mock("../../src/lib/logger.js", () => ({
  logger: mockLogger,
}));

import { withRetry } from "../../src/lib/retry.js";
import { PermanentRemoteError, TransientRemoteError } from "../../src/lib/errors.js";
import { createDiscordAPIError, createNetworkError } from "../utils/discordMocks.js";

// ===== Test Helpers =====

function createFailingThenSucceeding<T>(
  failCount: number,
  successValue: T,
  errorFactory: () => Error = () => createNetworkError("ECONNRESET")
): { fn: () => Promise<T>; callCount: () => number } {
  let calls = 0;
  return {
    fn: async () => {
      calls++;
      if (calls <= failCount) {
        throw errorFactory();
      }
      return successValue;
    },
    callCount: () => calls,
  };
}

function recordingSleep(): { sleep: (ms: number) => Promise<void>; delays: number[] } {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms) => {
      delays.push(ms);
    },
  };
}

// ===== withRetry Tests =====

describe("withRetry", () => {
  it("returns immediately on success", async () => {
    const { sleep, delays } = recordingSleep();
    const result = await withRetry(async () => "ok", { sleep });
    expect(result).toBe("ok");
    expect(delays).toEqual([]);
  });

  it("retries transient failures with doubling delays", async () => {
    const { sleep, delays } = recordingSleep();
    const op = createFailingThenSucceeding(2, 42);

    const result = await withRetry(op.fn, { sleep, random: () => 0.5, label: "listRoles" });

    expect(result).toBe(42);
    expect(op.callCount()).toBe(3);
    // random 0.5 → jitter factor exactly 1.0
    expect(delays).toEqual([500, 1000]);
  });

  it("caps the delay at maxDelayMs", async () => {
    const { sleep, delays } = recordingSleep();
    const op = createFailingThenSucceeding(3, "done");

    await withRetry(op.fn, { sleep, random: () => 0.5, initialDelayMs: 400, maxDelayMs: 1000 });

    expect(delays).toEqual([400, 800, 1000]);
  });

  it("waits at least the server retry-after", async () => {
    const { sleep, delays } = recordingSleep();
    const op = createFailingThenSucceeding(1, "done", () =>
      createDiscordAPIError(0, "You are being rate limited.", 429, { retry_after: 3 })
    );

    await withRetry(op.fn, { sleep, random: () => 0.5 });

    expect(delays).toEqual([3000]);
  });

  it("throws the last transient error once attempts run out", async () => {
    const { sleep, delays } = recordingSleep();
    const op = createFailingThenSucceeding(10, "never");

    const err = await withRetry(op.fn, { sleep, random: () => 0.5, maxAttempts: 3, label: "createRole" }).catch(
      (e: unknown) => e
    );

    expect(err).toBeInstanceOf(TransientRemoteError);
    expect(op.callCount()).toBe(3);
    expect(delays).toEqual([500, 1000]);
    expect(mockLogger.warn).toHaveBeenCalledWith(
      expect.objectContaining({ evt: "retry_exhausted", label: "createRole", attempt: 3 }),
      "[retry] createRole failed after 3 attempts"
    );
  });

  it("does not retry permanent failures", async () => {
    const { sleep, delays } = recordingSleep();
    const op = createFailingThenSucceeding(1, "never", () =>
      createDiscordAPIError(50013, "Missing Permissions", 403)
    );

    const err = await withRetry(op.fn, { sleep, label: "createChannel" }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(PermanentRemoteError);
    expect(op.callCount()).toBe(1);
    expect(delays).toEqual([]);
  });

  it("uses the label as the classified operation", async () => {
    const err = await withRetry(
      async () => {
        throw createDiscordAPIError(50013, "Missing Permissions", 403);
      },
      { label: "reorderRoles" }
    ).catch((e: unknown) => e);

    expect(err instanceof PermanentRemoteError && err.operation).toBe("reorderRoles");
  });

  it("honours a custom shouldRetry", async () => {
    const { sleep } = recordingSleep();
    const op = createFailingThenSucceeding(5, "never");
    const shouldRetry = vi.fn((_err: unknown, attempt: number) => attempt < 2);

    await expect(withRetry(op.fn, { sleep, shouldRetry })).rejects.toBeInstanceOf(TransientRemoteError);
    expect(op.callCount()).toBe(2);
    expect(shouldRetry).toHaveBeenCalledTimes(2);
  });

  it("rejects maxAttempts below 1", async () => {
    await expect(withRetry(async () => 1, { maxAttempts: 0 })).rejects.toThrow(
      "withRetry: maxAttempts must be >= 1, got 0"
    );
  });
});

/**
 * Guildforge -- tests/lib/env.test.ts
 * WHAT: Environment parsing defaults, trimming and fail-fast exit.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi, afterEach } from "vitest";

async function loadEnv() {
  vi.resetModules();
  return (await import("../../src/lib/env.js")).env;
}

describe("lib/env", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("applies defaults for unset tunables", async () => {
    const env = await loadEnv();

    expect(env.DB_PATH).toBe(":memory:");
    expect(env.OVERHAUL_BACKOFF_BASE_MS).toBe(500);
    expect(env.API_LIMITER_CAPACITY).toBe(5);
    expect(env.PANEL_PAGE_SIZE).toBe(25);
  });

  it("trims and coerces numeric values", async () => {
    vi.stubEnv("OVERHAUL_MAX_ATTEMPTS", " 6 ");
    vi.stubEnv("CONFIRMATION_TTL_MS", "30000");

    const env = await loadEnv();

    expect(env.OVERHAUL_MAX_ATTEMPTS).toBe(6);
    expect(env.CONFIRMATION_TTL_MS).toBe(30_000);
  });

  it("exits with every issue listed when a value is out of range", async () => {
    vi.stubEnv("PANEL_PAGE_SIZE", "40");
    vi.stubEnv("OVERHAUL_MAX_ATTEMPTS", "0");
    const errors: string[] = [];
    vi.spyOn(console, "error").mockImplementation((line: string) => {
      errors.push(line);
    });
    vi.spyOn(process, "exit").mockImplementation((code) => {
      throw new Error(`exit ${String(code)}`);
    });

    await expect(loadEnv()).rejects.toThrow("exit 1");
    expect(errors).toHaveLength(1);
    expect(errors[0]).toContain("- OVERHAUL_MAX_ATTEMPTS:");
    expect(errors[0]).toContain("- PANEL_PAGE_SIZE:");
  });
});

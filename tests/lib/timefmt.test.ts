/**
 * Guildforge — tests/lib/timefmt.test.ts
 * WHAT: Unit tests for elapsed-time and UTC day formatting.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect } from "vitest";
import { formatElapsed, utcDay } from "../../src/lib/timefmt.js";

describe("formatElapsed", () => {
  it("shows seconds under a minute", () => {
    expect(formatElapsed(0)).toBe("0s");
    expect(formatElapsed(4_200)).toBe("4s");
  });

  it("pads seconds once minutes appear", () => {
    expect(formatElapsed(65_000)).toBe("1m 05s");
  });

  it("pads minutes and seconds once hours appear", () => {
    expect(formatElapsed(3_723_000)).toBe("1h 02m 03s");
  });

  it("clamps negative durations to zero", () => {
    expect(formatElapsed(-500)).toBe("0s");
  });
});

describe("utcDay", () => {
  it("returns the UTC calendar date", () => {
    expect(utcDay(Date.UTC(2026, 9, 18, 23, 59, 59))).toBe("2026-10-18");
    expect(utcDay(Date.UTC(2026, 9, 19, 0, 0, 0))).toBe("2026-10-19");
  });
});

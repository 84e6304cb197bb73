/**
 * Guildforge — src/lib/timefmt.ts
 * WHAT: Small time formatting helpers for the status artifact and the XP ledger.
 * DOCS:
 *  - ISO 8601: https://developer.mozilla.org/en-US/docs/Web/JavaScript/Reference/Global_Objects/Date/toISOString
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

/**
 * Elapsed wall-clock time as shown on the progress message.
 * EXAMPLES:
 *  - 4_200 → "4s"
 *  - 65_000 → "1m 05s"
 *  - 3_723_000 → "1h 02m 03s"
 */
export function formatElapsed(ms: number): string {
  const totalSeconds = Math.max(0, Math.floor(ms / 1000));
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  const pad = (n: number) => String(n).padStart(2, "0");

  if (hours > 0) return `${hours}h ${pad(minutes)}m ${pad(seconds)}s`;
  if (minutes > 0) return `${minutes}m ${pad(seconds)}s`;
  return `${seconds}s`;
}

/** UTC calendar day ("2026-10-18") used to key the daily XP cap. */
export function utcDay(epochMs: number): string {
  return new Date(epochMs).toISOString().slice(0, 10);
}

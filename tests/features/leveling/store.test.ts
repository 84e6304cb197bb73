/**
 * Guildforge -- tests/features/leveling/store.test.ts
 * WHAT: LevelStore persistence against a real in-memory database.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { DEFAULT_LEVELS_CONFIG, LevelStore, type LevelProfile } from "../../../src/features/leveling/store.js";
import { countRows, createTestDb, type TestDbContext } from "../../utils/dbFixtures.js";

function profile(userId: string, xp: number, updatedAt: number): LevelProfile {
  return { guildId: "g1", userId, xp, currentTier: 0, lastAwardAt: null, updatedAt };
}

describe("LevelStore", () => {
  let ctx: TestDbContext;
  let store: LevelStore;

  beforeEach(() => {
    ctx = createTestDb();
    store = new LevelStore(ctx.db, { cacheTtlMs: 60_000 });
  });

  afterEach(() => {
    ctx.cleanup();
  });

  describe("profiles", () => {
    it("returns null for an unknown member", () => {
      expect(store.getProfile("g1", "u1")).toBeNull();
    });

    it("upserts by guild and user", () => {
      store.saveProfile(profile("u1", 10, 1));
      store.saveProfile({ ...profile("u1", 40, 2), currentTier: 1, lastAwardAt: 2 });

      expect(store.getProfile("g1", "u1")).toEqual({
        guildId: "g1",
        userId: "u1",
        xp: 40,
        currentTier: 1,
        lastAwardAt: 2,
        updatedAt: 2,
      });
      expect(countRows(ctx.db, "level_profiles")).toBe(1);
    });

    it("orders the leaderboard by xp, then by who got there first", () => {
      store.saveProfile(profile("u1", 50, 1));
      store.saveProfile(profile("u2", 300, 5));
      store.saveProfile(profile("u3", 300, 2));
      store.saveProfile({ ...profile("u4", 999, 1), guildId: "g2" });

      expect(store.leaderboard("g1", 10).map((p) => p.userId)).toEqual(["u3", "u2", "u1"]);
      expect(store.leaderboard("g1", 1).map((p) => p.userId)).toEqual(["u3"]);
    });

    it("deletes a profile together with its ledger rows", () => {
      store.saveProfile(profile("u1", 10, 1));
      store.addDailyXp("g1", "u1", "2024-01-01", 10);

      expect(store.deleteProfile("g1", "u1")).toBe(true);
      expect(store.getProfile("g1", "u1")).toBeNull();
      expect(countRows(ctx.db, "levels_ledger")).toBe(0);
      expect(store.deleteProfile("g1", "u1")).toBe(false);
    });

    it("resets a whole guild and leaves other guilds alone", () => {
      store.saveProfile(profile("u1", 10, 1));
      store.saveProfile(profile("u2", 20, 1));
      store.saveProfile({ ...profile("u1", 30, 1), guildId: "g2" });
      store.addDailyXp("g1", "u1", "2024-01-01", 10);
      store.addDailyXp("g2", "u1", "2024-01-01", 30);

      expect(store.deleteGuildProfiles("g1")).toBe(2);
      expect(store.leaderboard("g1", 10)).toEqual([]);
      expect(store.getProfile("g2", "u1")?.xp).toBe(30);
      expect(store.getDailyXp("g2", "u1", "2024-01-01")).toBe(30);
      expect(countRows(ctx.db, "levels_ledger")).toBe(1);
    });
  });

  describe("tiers and rewards", () => {
    it("replaces the whole tier set", () => {
      store.replaceTiers("g1", [
        { tier: 1, threshold: 0, roleName: "Bronze", capabilities: [] },
        { tier: 2, threshold: 100, roleName: "Silver", capabilities: ["embed"] },
      ]);
      expect(store.getTiers("g1")).toHaveLength(2);

      store.replaceTiers("g1", [{ tier: 1, threshold: 10, roleName: "Only", capabilities: [] }]);

      expect(store.getTiers("g1")).toEqual([{ tier: 1, threshold: 10, roleName: "Only", capabilities: [] }]);
    });

    it("upserts a reward per tier", () => {
      store.setRoleReward("g1", 2, "r2");
      store.setRoleReward("g1", 1, "r1");
      store.setRoleReward("g1", 2, "r9");

      expect(store.getRoleRewards("g1")).toEqual([
        { tier: 1, roleId: "r1" },
        { tier: 2, roleId: "r9" },
      ]);
    });

    it("removes a reward, optionally only for a given role", () => {
      store.setRoleReward("g1", 1, "r1");
      store.setRoleReward("g1", 2, "r2");

      expect(store.removeRoleReward("g1", 2, "r-other")).toBe(false);
      expect(store.removeRoleReward("g1", 2, "r2")).toBe(true);
      expect(store.removeRoleReward("g1", 1)).toBe(true);
      expect(store.removeRoleReward("g1", 1)).toBe(false);
      expect(store.getRoleRewards("g1")).toEqual([]);
    });

    it("serves rewards from cache until invalidated", () => {
      expect(store.getRoleRewards("g1")).toEqual([]);
      ctx.db.prepare(`INSERT INTO level_role_rewards (guild_id, tier, role_id) VALUES ('g1', 1, 'r1')`).run();

      expect(store.getRoleRewards("g1")).toEqual([]);
      store.invalidate("g1");
      expect(store.getRoleRewards("g1")).toEqual([{ tier: 1, roleId: "r1" }]);
    });
  });

  describe("config", () => {
    it("falls back to defaults without a row", () => {
      expect(store.getConfig("g1")).toEqual(DEFAULT_LEVELS_CONFIG);
      expect(countRows(ctx.db, "levels_config")).toBe(0);
    });

    it("round-trips a saved config", () => {
      const config = {
        ...DEFAULT_LEVELS_CONFIG,
        enabled: false,
        announce: false,
        dailyCap: 200,
        ignoredChannelIds: ["c1", "c2"],
      };
      store.saveConfig("g1", config);

      expect(store.getConfig("g1")).toEqual(config);
      expect(countRows(ctx.db, "levels_config")).toBe(1);
    });
  });

  describe("daily ledger", () => {
    it("accumulates per day", () => {
      store.addDailyXp("g1", "u1", "2024-01-01", 15);
      store.addDailyXp("g1", "u1", "2024-01-01", 20);
      store.addDailyXp("g1", "u1", "2024-01-02", 5);

      expect(store.getDailyXp("g1", "u1", "2024-01-01")).toBe(35);
      expect(store.getDailyXp("g1", "u1", "2024-01-02")).toBe(5);
      expect(store.getDailyXp("g1", "u2", "2024-01-01")).toBe(0);
    });

    it("sums a rolling window from a start day, highest first", () => {
      store.addDailyXp("g1", "u1", "2024-01-01", 500);
      store.addDailyXp("g1", "u1", "2024-01-07", 10);
      store.addDailyXp("g1", "u1", "2024-01-08", 15);
      store.addDailyXp("g1", "u2", "2024-01-08", 40);
      store.addDailyXp("g1", "u3", "2024-01-07", 25);
      store.addDailyXp("g2", "u9", "2024-01-08", 999);

      expect(store.totalsSince("g1", "2024-01-02", 10)).toEqual([
        { userId: "u2", xp: 40 },
        { userId: "u1", xp: 25 },
        { userId: "u3", xp: 25 },
      ]);
      expect(store.totalsSince("g1", "2024-01-02", 1)).toEqual([{ userId: "u2", xp: 40 }]);
    });
  });
});

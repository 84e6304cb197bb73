/**
 * Guildforge -- tests/features/leveling/levelEngine.test.ts
 * WHAT: XP grants, message award gates, tier-role reconciliation and config.
 * WHY: XP must never be lost to a role failure, and a member must never be
 *      left without a tier role because a removal ran before a failed add.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { LevelEngine, type LevelEngineOptions } from "../../../src/features/leveling/levelEngine.js";
import { ReconciliationError, ValidationError } from "../../../src/lib/errors.js";
import { createDiscordAPIError } from "../../utils/discordMocks.js";
import { createHarness, type Harness } from "../../utils/overhaulHarness.js";

describe("LevelEngine", () => {
  let h: Harness;
  let clock: number;
  let engine: LevelEngine;

  function build(overrides: Partial<LevelEngineOptions> = {}): LevelEngine {
    return new LevelEngine({
      store: h.levelStore,
      resolveClient: () => h.client,
      retry: h.retry,
      random: () => 0,
      now: () => clock,
      ...overrides,
    });
  }

  beforeEach(() => {
    h = createHarness();
    clock = 1_000_000;
    engine = build();
    engine.replaceTiers("guild-1", [
      { threshold: 0, roleName: "Bronze" },
      { threshold: 100, roleName: "Silver" },
      { threshold: 250, roleName: "Gold" },
    ]);
    engine.setRoleReward("guild-1", 1, "role-bronze");
    engine.setRoleReward("guild-1", 2, "role-silver");
    engine.setRoleReward("guild-1", 3, "role-gold");
  });

  afterEach(() => {
    h.cleanup();
  });

  function heldRoles(userId: string): string[] {
    return [...(h.client.memberRoles.get(userId) ?? [])].sort();
  }

  // ===== grantXp =====

  describe("grantXp", () => {
    it("starts a new member in the base tier and grants its reward without a crossing", async () => {
      const result = await engine.grantXp("guild-1", "u1", 10);

      expect(result.previousTier).toBe(1);
      expect(result.tierChanged).toBe(false);
      expect(result.announce).toBe(false);
      expect(result.profile).toMatchObject({ xp: 10, currentTier: 1, lastAwardAt: null, updatedAt: 1_000_000 });
      expect(result.reconciliation).toEqual({ added: ["role-bronze"], removed: [], errors: [] });
      expect(heldRoles("u1")).toEqual(["role-bronze"]);
    });

    it("adds the new tier role before removing the old one", async () => {
      await engine.grantXp("guild-1", "u1", 10);
      const before = h.client.mutations.length;

      const result = await engine.grantXp("guild-1", "u1", 100);

      expect(result.profile.currentTier).toBe(2);
      expect(h.client.mutations.slice(before)).toEqual([
        { op: "addMemberRole", args: ["u1", "role-silver", "Tier reward"] },
        { op: "removeMemberRole", args: ["u1", "role-bronze", "Tier reward superseded"] },
      ]);
      expect(heldRoles("u1")).toEqual(["role-silver"]);
    });

    it("keeps the tier below the next threshold and crosses at it", async () => {
      engine.replaceTiers("guild-2", [
        { threshold: 0, roleName: "Bronze" },
        { threshold: 500, roleName: "Silver" },
        { threshold: 1000, roleName: "Gold" },
      ]);
      engine.setRoleReward("guild-2", 1, "r-bronze");
      engine.setRoleReward("guild-2", 2, "r-silver");
      engine.setRoleReward("guild-2", 3, "r-gold");

      const below = await engine.grantXp("guild-2", "u1", 120);
      expect([below.previousTier, below.profile.currentTier, below.tierChanged]).toEqual([1, 1, false]);

      const fresh = await engine.grantXp("guild-2", "u2", 500);
      expect([fresh.previousTier, fresh.profile.currentTier, fresh.tierChanged]).toEqual([1, 2, true]);
      expect(fresh.reconciliation.added).toEqual(["r-silver"]);
      expect(heldRoles("u2")).toEqual(["r-silver"]);
    });

    it("flags a crossing for announcement only when the guild wants it", async () => {
      await engine.grantXp("guild-1", "u1", 10);
      const loud = await engine.grantXp("guild-1", "u1", 100);
      expect(loud.announce).toBe(true);

      engine.setLevelsConfig("guild-1", { announce: false });
      const quiet = await engine.grantXp("guild-1", "u1", 200);
      expect(quiet.tierChanged).toBe(true);
      expect(quiet.announce).toBe(false);
    });

    it("keeps the old tier role when the new tier has no reward", async () => {
      await engine.grantXp("guild-1", "u1", 10);
      engine.removeRoleReward("guild-1", 2);
      const before = h.client.mutations.length;

      const result = await engine.grantXp("guild-1", "u1", 100);

      expect(result.profile.currentTier).toBe(2);
      expect(result.reconciliation).toEqual({ added: [], removed: [], errors: [] });
      expect(h.client.mutations).toHaveLength(before);
      expect(heldRoles("u1")).toEqual(["role-bronze"]);
    });

    it("makes no role calls when the tier does not change", async () => {
      await engine.grantXp("guild-1", "u1", 10);
      const before = h.client.calls.length;

      const result = await engine.grantXp("guild-1", "u1", 20);

      expect(result.tierChanged).toBe(false);
      expect(result.profile.xp).toBe(30);
      expect(h.client.calls).toHaveLength(before);
    });

    it("keeps the XP and the old role when the add fails", async () => {
      await engine.grantXp("guild-1", "u1", 10);
      h.client.failNext("addMemberRole", createDiscordAPIError(50013, "Missing Permissions", 403));

      const result = await engine.grantXp("guild-1", "u1", 100);

      expect(result.reconciliation.added).toEqual([]);
      expect(result.reconciliation.removed).toEqual([]);
      expect(result.reconciliation.errors).toHaveLength(1);
      const failure = result.reconciliation.errors[0];
      expect(failure).toBeInstanceOf(ReconciliationError);
      expect([failure.userId, failure.roleId, failure.action]).toEqual(["u1", "role-silver", "add"]);
      expect(failure.message).toBe("Could not add role role-silver: Missing Permissions");

      expect(h.client.callsTo("removeMemberRole")).toHaveLength(0);
      expect(engine.getProfile("guild-1", "u1")).toMatchObject({ xp: 110, currentTier: 2 });
      expect(heldRoles("u1")).toEqual(["role-bronze"]);
    });

    it("reports a failed removal after a successful add", async () => {
      await engine.grantXp("guild-1", "u1", 10);
      h.client.failNext("removeMemberRole", createDiscordAPIError(10011, "Unknown Role", 404));

      const result = await engine.grantXp("guild-1", "u1", 100);

      expect(result.reconciliation.added).toEqual(["role-silver"]);
      expect(result.reconciliation.errors.map((e) => [e.action, e.roleId])).toEqual([["remove", "role-bronze"]]);
    });

    it("retries a transient role failure", async () => {
      h.client.failNext("addMemberRole", createDiscordAPIError(0, "Service Unavailable", 503));

      const result = await engine.grantXp("guild-1", "u1", 10);

      expect(result.reconciliation.added).toEqual(["role-bronze"]);
      expect(h.sleeps).toEqual([500]);
    });

    it("never strips a protected role", async () => {
      engine = build({ isProtectedRole: (_guildId, roleId) => roleId === "role-bronze" });
      await engine.grantXp("guild-1", "u1", 10);

      const result = await engine.grantXp("guild-1", "u1", 100);

      expect(result.reconciliation.removed).toEqual([]);
      expect(heldRoles("u1")).toEqual(["role-bronze", "role-silver"]);
    });

    it("ignores non-positive amounts and floors fractions", async () => {
      const none = await engine.grantXp("guild-1", "u1", 0);
      expect(none.profile.xp).toBe(0);
      expect(none.profile.currentTier).toBe(1);
      expect(engine.getProfile("guild-1", "u1")).toBeNull();

      const some = await engine.grantXp("guild-1", "u1", 2.9);
      expect(some.profile.xp).toBe(2);
    });

    it("serialises concurrent grants for one member", async () => {
      await Promise.all([engine.grantXp("guild-1", "u1", 60), engine.grantXp("guild-1", "u1", 60)]);

      expect(engine.getProfile("guild-1", "u1")).toMatchObject({ xp: 120, currentTier: 2 });
      expect(heldRoles("u1")).toEqual(["role-silver"]);
    });
  });

  // ===== awardMessageXp =====

  describe("awardMessageXp", () => {
    it("awards xpMin when random returns 0 and stamps the award time", async () => {
      const outcome = await engine.awardMessageXp("guild-1", "u1", "chan-1");

      expect(outcome.awarded).toBe(true);
      expect(outcome.awarded && outcome.amount).toBe(15);
      expect(engine.getProfile("guild-1", "u1")?.lastAwardAt).toBe(1_000_000);
    });

    it("awards xpMax when random is just below 1", async () => {
      engine = build({ random: () => 0.999 });
      const outcome = await engine.awardMessageXp("guild-1", "u1", "chan-1");
      expect(outcome.awarded && outcome.amount).toBe(25);
    });

    it("applies the cooldown", async () => {
      await engine.awardMessageXp("guild-1", "u1", "chan-1");

      clock += 59_999;
      expect(await engine.awardMessageXp("guild-1", "u1", "chan-1")).toEqual({ awarded: false, reason: "cooldown" });

      clock += 1;
      expect((await engine.awardMessageXp("guild-1", "u1", "chan-1")).awarded).toBe(true);
    });

    it("lets only one of two simultaneous messages through", async () => {
      const [a, b] = await Promise.all([
        engine.awardMessageXp("guild-1", "u1", "chan-1"),
        engine.awardMessageXp("guild-1", "u1", "chan-1"),
      ]);

      expect([a.awarded, b.awarded]).toEqual([true, false]);
      expect(engine.getProfile("guild-1", "u1")?.xp).toBe(15);
    });

    it("skips when disabled or in an ignored channel", async () => {
      engine.setLevelsConfig("guild-1", { ignoredChannelIds: ["chan-quiet"] });
      expect(await engine.awardMessageXp("guild-1", "u1", "chan-quiet")).toEqual({
        awarded: false,
        reason: "ignored_channel",
      });

      engine.setLevelsConfig("guild-1", { enabled: false });
      expect(await engine.awardMessageXp("guild-1", "u1", "chan-1")).toEqual({ awarded: false, reason: "disabled" });
      expect(engine.getProfile("guild-1", "u1")).toBeNull();
    });

    it("trims the last award to the daily cap and resets at UTC midnight", async () => {
      engine.setLevelsConfig("guild-1", { dailyCap: 20 });

      const first = await engine.awardMessageXp("guild-1", "u1", "chan-1");
      clock += 60_000;
      const second = await engine.awardMessageXp("guild-1", "u1", "chan-1");
      clock += 60_000;
      const third = await engine.awardMessageXp("guild-1", "u1", "chan-1");

      expect(first.awarded && first.amount).toBe(15);
      expect(second.awarded && second.amount).toBe(5);
      expect(third).toEqual({ awarded: false, reason: "daily_cap" });

      clock += 86_400_000;
      const nextDay = await engine.awardMessageXp("guild-1", "u1", "chan-1");
      expect(nextDay.awarded && nextDay.amount).toBe(15);
      expect(engine.getProfile("guild-1", "u1")?.xp).toBe(35);
    });
  });

  // ===== resync =====

  describe("resync", () => {
    it("leaves the member holding exactly the current tier's reward", async () => {
      h.levelStore.saveProfile({
        guildId: "guild-1",
        userId: "u1",
        xp: 150,
        currentTier: 2,
        lastAwardAt: null,
        updatedAt: 1,
      });
      h.client.giveRole("u1", "role-bronze");
      h.client.giveRole("u1", "role-gold");
      h.client.giveRole("u1", "role-unrelated");

      const outcome = await engine.resync("guild-1", "u1");

      expect(outcome).toEqual({ added: ["role-silver"], removed: ["role-bronze", "role-gold"], errors: [] });
      expect(heldRoles("u1")).toEqual(["role-silver", "role-unrelated"]);
      expect(engine.getProfile("guild-1", "u1")?.xp).toBe(150);
    });

    it("strips every reward from a member without a profile", async () => {
      h.client.giveRole("u1", "role-bronze");

      const outcome = await engine.resync("guild-1", "u1");

      expect(outcome).toEqual({ added: [], removed: ["role-bronze"], errors: [] });
    });

    it("reports a failed member lookup without changing roles", async () => {
      h.client.failNext("getMemberRoleIds", createDiscordAPIError(10007, "Unknown Member", 404));

      const outcome = await engine.resync("guild-1", "u1");

      expect(outcome.errors).toHaveLength(1);
      expect(outcome.added).toEqual([]);
      expect(h.client.mutations).toEqual([]);
    });
  });

  // ===== Queries and admin =====

  describe("leaderboard", () => {
    it("ranks by xp, earlier arrival first on ties", async () => {
      await engine.grantXp("guild-1", "u1", 300);
      clock += 1_000;
      await engine.grantXp("guild-1", "u2", 50);
      await engine.grantXp("guild-1", "u3", 300);

      expect(engine.leaderboard("guild-1")).toEqual([
        { rank: 1, userId: "u1", xp: 300, tier: 3 },
        { rank: 2, userId: "u3", xp: 300, tier: 3 },
        { rank: 3, userId: "u2", xp: 50, tier: 1 },
      ]);
      expect(engine.leaderboard("guild-1", 1)).toHaveLength(1);
    });
  });

  describe("weeklyLeaderboard", () => {
    it("sums the last seven UTC days, today included", () => {
      // 1_000_000 ms is 1970-01-01; put "now" on 1970-01-10
      const now = 9 * 86_400_000 + 1_000;
      h.levelStore.addDailyXp("guild-1", "u1", "1970-01-03", 500);
      h.levelStore.addDailyXp("guild-1", "u1", "1970-01-04", 10);
      h.levelStore.addDailyXp("guild-1", "u2", "1970-01-10", 30);

      expect(engine.weeklyLeaderboard("guild-1", 10, now)).toEqual([
        { rank: 1, userId: "u2", xp: 30 },
        { rank: 2, userId: "u1", xp: 10 },
      ]);
    });
  });

  describe("resetGuild", () => {
    it("drops every profile in the guild", async () => {
      await engine.grantXp("guild-1", "u1", 10);
      await engine.grantXp("guild-1", "u2", 10);

      expect(engine.resetGuild("guild-1")).toBe(2);
      expect(engine.leaderboard("guild-1")).toEqual([]);
      expect(engine.resetGuild("guild-1")).toBe(0);
    });
  });

  describe("role rewards", () => {
    it("removes a mapping without touching members", async () => {
      await engine.grantXp("guild-1", "u1", 10);
      const before = h.client.mutations.length;

      expect(engine.removeRoleReward("guild-1", 1, "role-bronze")).toBe(true);

      expect(engine.getRoleRewards("guild-1").map((r) => r.tier)).toEqual([2, 3]);
      expect(h.client.mutations).toHaveLength(before);
      expect(heldRoles("u1")).toEqual(["role-bronze"]);
    });
  });

  describe("resetUser", () => {
    it("drops the profile and its ledger", async () => {
      await engine.awardMessageXp("guild-1", "u1", "chan-1");

      expect(await engine.resetUser("guild-1", "u1")).toBe(true);
      expect(engine.getProfile("guild-1", "u1")).toBeNull();
      expect(h.levelStore.getDailyXp("guild-1", "u1", "1970-01-01")).toBe(0);
      expect(await engine.resetUser("guild-1", "u1")).toBe(false);
    });
  });

  describe("configuration", () => {
    it("merges a patch over the current config", () => {
      expect(engine.setLevelsConfig("guild-1", { xpMin: 5, xpMax: 10 })).toEqual({
        enabled: true,
        announce: true,
        xpMin: 5,
        xpMax: 10,
        cooldownSeconds: 60,
        dailyCap: 0,
        ignoredChannelIds: [],
      });
      expect(engine.getLevelsConfig("guild-1").xpMax).toBe(10);
    });

    it("rejects an inverted XP range", () => {
      try {
        engine.setLevelsConfig("guild-1", { xpMin: 30 });
        expect.unreachable();
      } catch (err) {
        expect(err instanceof ValidationError && err.issues).toEqual([
          { path: "xpMin", message: "xpMin must not exceed xpMax" },
        ]);
      }
    });

    it("rejects a cooldown below the floor", () => {
      expect(() => engine.setLevelsConfig("guild-1", { cooldownSeconds: 1 })).toThrow(ValidationError);
      expect(engine.getLevelsConfig("guild-1").cooldownSeconds).toBe(60);
    });

    it("rejects a reward for tier 0", () => {
      expect(() => engine.setRoleReward("guild-1", 0, "role-x")).toThrow(ValidationError);
    });

    it("keeps the old tiers when a replacement is invalid", () => {
      expect(() => engine.replaceTiers("guild-1", [{ threshold: -5, roleName: "Bad" }])).toThrow(ValidationError);
      expect(engine.getTiers("guild-1").map((t) => t.roleName)).toEqual(["Bronze", "Silver", "Gold"]);
    });
  });
});

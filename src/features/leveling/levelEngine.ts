// SPDX-License-Identifier: LicenseRef-ANW-1.0
/**
 * Guildforge — src/features/leveling/levelEngine.ts
 * WHAT: XP grants, tier derivation and tier-role reconciliation.
 * FLOWS:
 *  - grantXp → per-profile queue → write xp/tier → (tier up) add new role → remove old role
 *  - awardMessageXp → enabled/ignored/cooldown/daily cap gates → grant a random amount
 *  - resync → member ends up holding exactly the reward role of their current tier
 *  - weeklyLeaderboard → rolling 7-day totals from the daily ledger
 * DOCS:
 *  - GuildMemberRoleManager: https://discord.js.org/#/docs/discord.js/main/class/GuildMemberRoleManager
 */

import { z } from "zod";
import { logger } from "../../lib/logger.js";
import { KeyedLock } from "../../lib/keyedLock.js";
import { withRetry, type RetryOptions } from "../../lib/retry.js";
import {
  ReconciliationError,
  ValidationError,
  classifyRemoteError,
  errorContext,
} from "../../lib/errors.js";
import { utcDay } from "../../lib/timefmt.js";
import type { GuildClientResolver } from "../../remote/types.js";
import type { LevelProfile, LevelStore, LevelsConfig, RoleReward } from "./store.js";
import { tierForXp, toTierDefinitions, type TierDefinition, type TierInput } from "./tiers.js";

/** Lower bound for the per-message cooldown regardless of config */
export const MIN_COOLDOWN_SECONDS = 5;

const DAY_MS = 86_400_000;
/** Today plus the six days before it */
const WEEK_DAYS = 7;

export interface ReconciliationOutcome {
  added: string[];
  removed: string[];
  errors: ReconciliationError[];
}

export interface GrantResult {
  profile: LevelProfile;
  previousTier: number;
  tierChanged: boolean;
  /** Tier went up and the guild has level-up announcements on */
  announce: boolean;
  reconciliation: ReconciliationOutcome;
}

export type AwardOutcome =
  | { awarded: true; amount: number; grant: GrantResult }
  | { awarded: false; reason: "disabled" | "ignored_channel" | "cooldown" | "daily_cap" };

export interface LeaderboardEntry {
  rank: number;
  userId: string;
  xp: number;
  tier: number;
}

export interface WeeklyEntry {
  rank: number;
  userId: string;
  xp: number;
}

export const levelsConfigSchema = z
  .object({
    enabled: z.boolean(),
    announce: z.boolean(),
    xpMin: z.number().int().min(1),
    xpMax: z.number().int().min(1),
    cooldownSeconds: z.number().int().min(MIN_COOLDOWN_SECONDS),
    dailyCap: z.number().int().min(0),
    ignoredChannelIds: z.array(z.string().min(1)),
  })
  .refine((cfg) => cfg.xpMin <= cfg.xpMax, { message: "xpMin must not exceed xpMax", path: ["xpMin"] });

export interface LevelEngineOptions {
  store: LevelStore;
  resolveClient: GuildClientResolver;
  lock?: KeyedLock;
  /** Uniform in [0, 1) */
  random?: () => number;
  now?: () => number;
  retry?: RetryOptions;
  /** Reward roles that must never be stripped, e.g. staff roles reused as rewards */
  isProtectedRole?: (guildId: string, roleId: string) => boolean;
}

function emptyOutcome(): ReconciliationOutcome {
  return { added: [], removed: [], errors: [] };
}

export class LevelEngine {
  private readonly store: LevelStore;
  private readonly resolveClient: GuildClientResolver;
  private readonly lock: KeyedLock;
  private readonly random: () => number;
  private readonly now: () => number;
  private readonly retry: RetryOptions;
  private readonly isProtectedRole: (guildId: string, roleId: string) => boolean;

  constructor(options: LevelEngineOptions) {
    this.store = options.store;
    this.resolveClient = options.resolveClient;
    this.lock = options.lock ?? new KeyedLock();
    this.random = options.random ?? Math.random;
    this.now = options.now ?? Date.now;
    this.retry = options.retry ?? {};
    this.isProtectedRole = options.isProtectedRole ?? (() => false);
  }

  /**
   * Add XP to a member. Grants for the same member never interleave.
   * The XP write is committed before any role call, and role failures are
   * returned in `reconciliation.errors` rather than thrown.
   */
  async grantXp(guildId: string, userId: string, amount: number): Promise<GrantResult> {
    const whole = Math.floor(amount);
    if (!Number.isFinite(whole) || whole <= 0) {
      const profile = this.store.getProfile(guildId, userId) ?? this.blankProfile(guildId, userId);
      return {
        profile,
        previousTier: profile.currentTier,
        tierChanged: false,
        announce: false,
        reconciliation: emptyOutcome(),
      };
    }
    return this.lock.runExclusive(this.profileKey(guildId, userId), () => this.applyGrant(guildId, userId, whole, false));
  }

  /**
   * Message-driven XP. Gates run in order: enabled, ignored channel, cooldown,
   * daily cap. Cooldown and cap are read inside the member's queue so two
   * messages in the same instant cannot both pass.
   */
  async awardMessageXp(guildId: string, userId: string, channelId: string, now = this.now()): Promise<AwardOutcome> {
    const config = this.store.getConfig(guildId);
    if (!config.enabled) return { awarded: false, reason: "disabled" };
    if (config.ignoredChannelIds.includes(channelId)) return { awarded: false, reason: "ignored_channel" };

    return this.lock.runExclusive(this.profileKey(guildId, userId), async (): Promise<AwardOutcome> => {
      const profile = this.store.getProfile(guildId, userId);
      const cooldownMs = Math.max(MIN_COOLDOWN_SECONDS, config.cooldownSeconds) * 1000;
      if (profile?.lastAwardAt != null && now - profile.lastAwardAt < cooldownMs) {
        return { awarded: false, reason: "cooldown" };
      }

      let amount = config.xpMin + Math.floor(this.random() * (config.xpMax - config.xpMin + 1));
      const day = utcDay(now);
      if (config.dailyCap > 0) {
        const remaining = config.dailyCap - this.store.getDailyXp(guildId, userId, day);
        if (remaining <= 0) return { awarded: false, reason: "daily_cap" };
        amount = Math.min(amount, remaining);
      }

      const grant = await this.applyGrant(guildId, userId, amount, true, now);
      this.store.addDailyXp(guildId, userId, day, amount);
      return { awarded: true, amount, grant };
    });
  }

  /**
   * Explicit reconciliation: hold the current tier's reward role and none of the
   * other (unprotected) reward roles. Never touches XP. A member without a
   * profile holds no reward role.
   */
  async resync(guildId: string, userId: string): Promise<ReconciliationOutcome> {
    return this.lock.runExclusive(this.profileKey(guildId, userId), async () => {
      const profile = this.store.getProfile(guildId, userId);
      const rewards = this.store.getRoleRewards(guildId);
      const target = profile ? rewards.find((r) => r.tier === profile.currentTier)?.roleId : undefined;
      const outcome = emptyOutcome();
      const client = this.resolveClient(guildId);

      let held: string[];
      try {
        held = await withRetry(() => client.getMemberRoleIds(userId), { ...this.retry, label: "getMemberRoleIds" });
      } catch (err) {
        outcome.errors.push(this.reconciliationFailure(guildId, userId, target ?? "", "add", err));
        return outcome;
      }

      if (target && !held.includes(target)) {
        await this.changeRole(guildId, userId, target, "add", outcome);
      }
      const stale = new Set(rewards.map((r) => r.roleId).filter((id) => id !== target));
      for (const roleId of held) {
        if (stale.has(roleId) && !this.isProtectedRole(guildId, roleId)) {
          await this.changeRole(guildId, userId, roleId, "remove", outcome);
        }
      }

      logger.info(
        { evt: "level_resync", guildId, userId, tier: profile?.currentTier ?? null, added: outcome.added, removed: outcome.removed },
        "Tier roles resynced"
      );
      return outcome;
    });
  }

  /** Validated wholesale replacement. Existing profiles keep their cached tier until their next grant. */
  replaceTiers(guildId: string, tiers: readonly TierInput[]): TierDefinition[] {
    const defs = toTierDefinitions(tiers);
    this.store.replaceTiers(guildId, defs);
    logger.info({ evt: "level_tiers_replaced", guildId, count: defs.length }, "Tier definitions replaced");
    return defs;
  }

  getTiers(guildId: string): TierDefinition[] {
    return this.store.getTiers(guildId);
  }

  /** Upsert only. Members are not reconciled against the new mapping. */
  setRoleReward(guildId: string, tier: number, roleId: string): void {
    if (!Number.isInteger(tier) || tier < 1) {
      throw new ValidationError([{ path: "tier", message: "Tier must be an integer >= 1" }]);
    }
    this.store.setRoleReward(guildId, tier, roleId);
  }

  /** Members already holding the role keep it until their next crossing or a resync. */
  removeRoleReward(guildId: string, tier: number, roleId?: string): boolean {
    const removed = this.store.removeRoleReward(guildId, tier, roleId);
    logger.info({ evt: "level_reward_removed", guildId, tier, roleId, removed }, "Tier reward removed");
    return removed;
  }

  getRoleRewards(guildId: string): RoleReward[] {
    return this.store.getRoleRewards(guildId);
  }

  getProfile(guildId: string, userId: string): LevelProfile | null {
    return this.store.getProfile(guildId, userId);
  }

  leaderboard(guildId: string, limit = 10): LeaderboardEntry[] {
    return this.store.leaderboard(guildId, Math.max(1, Math.floor(limit))).map((p, i) => ({
      rank: i + 1,
      userId: p.userId,
      xp: p.xp,
      tier: p.currentTier,
    }));
  }

  /** XP earned over the last seven UTC days, today included */
  weeklyLeaderboard(guildId: string, limit = 10, now = this.now()): WeeklyEntry[] {
    const since = utcDay(now - (WEEK_DAYS - 1) * DAY_MS);
    return this.store.totalsSince(guildId, since, Math.max(1, Math.floor(limit))).map((t, i) => ({
      rank: i + 1,
      userId: t.userId,
      xp: t.xp,
    }));
  }

  /** Guild-wide reset of XP and ledger. Granted roles stay, as with resetUser. */
  resetGuild(guildId: string): number {
    const removed = this.store.deleteGuildProfiles(guildId);
    logger.info({ evt: "level_guild_reset", guildId, removed }, "Level data reset for guild");
    return removed;
  }

  /** Drops XP and ledger rows. Roles already granted stay; run resync to strip them. */
  async resetUser(guildId: string, userId: string): Promise<boolean> {
    return this.lock.runExclusive(this.profileKey(guildId, userId), async () => {
      const removed = this.store.deleteProfile(guildId, userId);
      logger.info({ evt: "level_user_reset", guildId, userId, removed }, "Level profile reset");
      return removed;
    });
  }

  getLevelsConfig(guildId: string): LevelsConfig {
    return this.store.getConfig(guildId);
  }

  setLevelsConfig(guildId: string, patch: Partial<LevelsConfig>): LevelsConfig {
    const parsed = levelsConfigSchema.safeParse({ ...this.store.getConfig(guildId), ...patch });
    if (!parsed.success) {
      throw new ValidationError(
        parsed.error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message }))
      );
    }
    this.store.saveConfig(guildId, parsed.data);
    return parsed.data;
  }

  // ===== internals =====

  private profileKey(guildId: string, userId: string): string {
    return `${guildId}:${userId}`;
  }

  private blankProfile(guildId: string, userId: string): LevelProfile {
    return {
      guildId,
      userId,
      xp: 0,
      currentTier: tierForXp(this.store.getTiers(guildId), 0),
      lastAwardAt: null,
      updatedAt: this.now(),
    };
  }

  /** Caller holds the member's queue slot. */
  private async applyGrant(
    guildId: string,
    userId: string,
    amount: number,
    stampLastAward: boolean,
    now = this.now()
  ): Promise<GrantResult> {
    const stored = this.store.getProfile(guildId, userId);
    const existing = stored ?? this.blankProfile(guildId, userId);
    const previousTier = existing.currentTier;
    const xp = existing.xp + amount;
    const profile: LevelProfile = {
      ...existing,
      xp,
      currentTier: tierForXp(this.store.getTiers(guildId), xp),
      lastAwardAt: stampLastAward ? now : existing.lastAwardAt,
      updatedAt: now,
    };
    this.store.saveProfile(profile);

    const tierChanged = profile.currentTier !== previousTier;
    const tierUp = profile.currentTier > previousTier;
    const reconciliation = emptyOutcome();

    if (tierUp) {
      logger.info(
        { evt: "level_up", guildId, userId, previousTier, tier: profile.currentTier, xp },
        `Member reached tier ${profile.currentTier}`
      );
      await this.reconcileTierUp(guildId, userId, previousTier, profile.currentTier, reconciliation);
    } else if (!stored) {
      // First grant: the member starts in the base tier and gets its reward, no crossing
      await this.grantCurrentReward(guildId, userId, profile.currentTier, reconciliation);
    }

    const announce = tierUp && this.store.getConfig(guildId).announce;
    return { profile, previousTier, tierChanged, announce, reconciliation };
  }

  /**
   * Add before remove, so a failure leaves the member with too many roles rather
   * than none. When the add fails the old role stays.
   */
  private async reconcileTierUp(
    guildId: string,
    userId: string,
    previousTier: number,
    tier: number,
    outcome: ReconciliationOutcome
  ): Promise<void> {
    const rewards = this.store.getRoleRewards(guildId);
    const newRole = rewards.find((r) => r.tier === tier)?.roleId;
    const oldRole = rewards.find((r) => r.tier === previousTier)?.roleId;

    // No reward at the new tier: keep whatever the member holds
    if (!newRole) return;
    const added = await this.changeRole(guildId, userId, newRole, "add", outcome);
    if (!added) return;

    if (oldRole && oldRole !== newRole && !this.isProtectedRole(guildId, oldRole)) {
      await this.changeRole(guildId, userId, oldRole, "remove", outcome);
    }
  }

  private async grantCurrentReward(
    guildId: string,
    userId: string,
    tier: number,
    outcome: ReconciliationOutcome
  ): Promise<void> {
    const roleId = this.store.getRoleRewards(guildId).find((r) => r.tier === tier)?.roleId;
    if (roleId) await this.changeRole(guildId, userId, roleId, "add", outcome);
  }

  private async changeRole(
    guildId: string,
    userId: string,
    roleId: string,
    action: "add" | "remove",
    outcome: ReconciliationOutcome
  ): Promise<boolean> {
    const client = this.resolveClient(guildId);
    const reason = action === "add" ? "Tier reward" : "Tier reward superseded";
    const operation = action === "add" ? "addMemberRole" : "removeMemberRole";
    try {
      await withRetry(
        () =>
          action === "add"
            ? client.addMemberRole(userId, roleId, reason)
            : client.removeMemberRole(userId, roleId, reason),
        { ...this.retry, label: operation }
      );
      (action === "add" ? outcome.added : outcome.removed).push(roleId);
      return true;
    } catch (err) {
      outcome.errors.push(this.reconciliationFailure(guildId, userId, roleId, action, err));
      return false;
    }
  }

  private reconciliationFailure(
    guildId: string,
    userId: string,
    roleId: string,
    action: "add" | "remove",
    err: unknown
  ): ReconciliationError {
    const classified = classifyRemoteError(err, action === "add" ? "addMemberRole" : "removeMemberRole");
    const failure = new ReconciliationError(
      userId,
      roleId,
      action,
      `Could not ${action} role ${roleId}: ${classified.message}`,
      classified
    );
    logger.warn(
      { evt: "level_reconcile_failed", guildId, ...errorContext(failure), cause: classified.message },
      `[leveling] Tier role ${action} failed`
    );
    return failure;
  }
}

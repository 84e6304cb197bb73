/**
 * Guildforge — src/features/leveling/store.ts
 * WHAT: SQLite persistence for level profiles, tier definitions, tier→role rewards,
 *       per-guild leveling config and the daily XP ledger.
 * FLOWS:
 *  - profiles: getProfile / saveProfile (row upsert) / deleteProfile / deleteGuildProfiles / leaderboard
 *  - tiers: getTiers (cached) / replaceTiers (one transaction)
 *  - rewards: getRoleRewards (cached) / setRoleReward (upsert) / removeRoleReward
 *  - config: getConfig (cached, defaults when absent) / saveConfig
 *  - ledger: getDailyXp / addDailyXp / totalsSince (rolling leaderboard)
 * DOCS:
 *  - SQLite UPSERT: https://sqlite.org/lang_UPSERT.html
 *  - better-sqlite3 transactions: https://github.com/WiseLibs/better-sqlite3/blob/master/docs/api.md#transactionfunction---function
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type Database from "better-sqlite3";
import { env } from "../../lib/env.js";
import { LRUCache } from "../../lib/lruCache.js";
import type { TierDefinition } from "./tiers.js";

export interface LevelProfile {
  guildId: string;
  userId: string;
  /** Only grows through grantXp */
  xp: number;
  /** Cached tierForXp(xp) at last write */
  currentTier: number;
  lastAwardAt: number | null;
  updatedAt: number;
}

export interface RoleReward {
  tier: number;
  roleId: string;
}

export interface LevelsConfig {
  enabled: boolean;
  /** Callers post a level-up message when set */
  announce: boolean;
  xpMin: number;
  xpMax: number;
  cooldownSeconds: number;
  /** 0 = uncapped */
  dailyCap: number;
  ignoredChannelIds: string[];
}

export const DEFAULT_LEVELS_CONFIG: LevelsConfig = {
  enabled: true,
  announce: true,
  xpMin: 15,
  xpMax: 25,
  cooldownSeconds: 60,
  dailyCap: 0,
  ignoredChannelIds: [],
};

interface ProfileRow {
  guild_id: string;
  user_id: string;
  xp: number;
  current_tier: number;
  last_award_at: number | null;
  updated_at: number;
}

interface TierRow {
  tier: number;
  threshold: number;
  role_name: string;
  capabilities_json: string;
}

interface ConfigRow {
  enabled: number;
  announce: number;
  xp_min: number;
  xp_max: number;
  cooldown_seconds: number;
  daily_cap: number;
  ignored_channels_json: string;
}

function toProfile(row: ProfileRow): LevelProfile {
  return {
    guildId: row.guild_id,
    userId: row.user_id,
    xp: row.xp,
    currentTier: row.current_tier,
    lastAwardAt: row.last_award_at,
    updatedAt: row.updated_at,
  };
}

function parseStringArray(json: string): string[] {
  const value: unknown = JSON.parse(json);
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === "string") : [];
}

export interface LedgerTotal {
  userId: string;
  xp: number;
}

export interface LevelStoreOptions {
  cacheTtlMs?: number;
}

export class LevelStore {
  private readonly tiersCache: LRUCache<string, TierDefinition[]>;
  private readonly rewardsCache: LRUCache<string, RoleReward[]>;
  private readonly configCache: LRUCache<string, LevelsConfig>;

  constructor(
    private readonly db: Database.Database,
    options: LevelStoreOptions = {}
  ) {
    const ttlMs = options.cacheTtlMs ?? env.STORE_CACHE_TTL_MS;
    this.tiersCache = new LRUCache({ maxSize: 1000, ttlMs });
    this.rewardsCache = new LRUCache({ maxSize: 1000, ttlMs });
    this.configCache = new LRUCache({ maxSize: 1000, ttlMs });
  }

  // ===== Profiles =====

  getProfile(guildId: string, userId: string): LevelProfile | null {
    const row = this.db
      .prepare<[string, string], ProfileRow>(
        `SELECT guild_id, user_id, xp, current_tier, last_award_at, updated_at
         FROM level_profiles WHERE guild_id = ? AND user_id = ?`
      )
      .get(guildId, userId);
    return row ? toProfile(row) : null;
  }

  saveProfile(profile: LevelProfile): void {
    this.db
      .prepare(
        `INSERT INTO level_profiles (guild_id, user_id, xp, current_tier, last_award_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?)
         ON CONFLICT(guild_id, user_id) DO UPDATE SET
           xp = excluded.xp,
           current_tier = excluded.current_tier,
           last_award_at = excluded.last_award_at,
           updated_at = excluded.updated_at`
      )
      .run(
        profile.guildId,
        profile.userId,
        profile.xp,
        profile.currentTier,
        profile.lastAwardAt,
        profile.updatedAt
      );
  }

  /** Removes the profile and its ledger rows. Returns false if there was no profile. */
  deleteProfile(guildId: string, userId: string): boolean {
    const remove = this.db.transaction(() => {
      this.db.prepare(`DELETE FROM levels_ledger WHERE guild_id = ? AND user_id = ?`).run(guildId, userId);
      return this.db
        .prepare(`DELETE FROM level_profiles WHERE guild_id = ? AND user_id = ?`)
        .run(guildId, userId).changes;
    });
    return remove() > 0;
  }

  /** Guild-wide reset of profiles and ledger. Returns the number of profiles dropped. */
  deleteGuildProfiles(guildId: string): number {
    const remove = this.db.transaction(() => {
      this.db.prepare(`DELETE FROM levels_ledger WHERE guild_id = ?`).run(guildId);
      return this.db.prepare(`DELETE FROM level_profiles WHERE guild_id = ?`).run(guildId).changes;
    });
    return remove();
  }

  /** Highest XP first; ties broken by who got there first */
  leaderboard(guildId: string, limit: number): LevelProfile[] {
    return this.db
      .prepare<[string, number], ProfileRow>(
        `SELECT guild_id, user_id, xp, current_tier, last_award_at, updated_at
         FROM level_profiles WHERE guild_id = ?
         ORDER BY xp DESC, updated_at ASC, user_id ASC
         LIMIT ?`
      )
      .all(guildId, limit)
      .map(toProfile);
  }

  // ===== Tiers =====

  getTiers(guildId: string): TierDefinition[] {
    return this.tiersCache.getOrLoad(guildId, () =>
      this.db
        .prepare<[string], TierRow>(
          `SELECT tier, threshold, role_name, capabilities_json
           FROM level_tiers WHERE guild_id = ? ORDER BY tier ASC`
        )
        .all(guildId)
        .map((row) => ({
          tier: row.tier,
          threshold: row.threshold,
          roleName: row.role_name,
          capabilities: parseStringArray(row.capabilities_json),
        }))
    );
  }

  /** Wholesale replacement; readers never see a half-written set. */
  replaceTiers(guildId: string, tiers: TierDefinition[]): void {
    const replace = this.db.transaction((defs: TierDefinition[]) => {
      this.db.prepare(`DELETE FROM level_tiers WHERE guild_id = ?`).run(guildId);
      const insert = this.db.prepare(
        `INSERT INTO level_tiers (guild_id, tier, threshold, role_name, capabilities_json)
         VALUES (?, ?, ?, ?, ?)`
      );
      for (const def of defs) {
        insert.run(guildId, def.tier, def.threshold, def.roleName, JSON.stringify(def.capabilities));
      }
    });
    replace(tiers);
    this.tiersCache.delete(guildId);
  }

  // ===== Rewards =====

  getRoleRewards(guildId: string): RoleReward[] {
    return this.rewardsCache.getOrLoad(guildId, () =>
      this.db
        .prepare<[string], { tier: number; role_id: string }>(
          `SELECT tier, role_id FROM level_role_rewards WHERE guild_id = ? ORDER BY tier ASC`
        )
        .all(guildId)
        .map((row) => ({ tier: row.tier, roleId: row.role_id }))
    );
  }

  setRoleReward(guildId: string, tier: number, roleId: string): void {
    this.db
      .prepare(
        `INSERT INTO level_role_rewards (guild_id, tier, role_id)
         VALUES (?, ?, ?)
         ON CONFLICT(guild_id, tier) DO UPDATE SET role_id = excluded.role_id`
      )
      .run(guildId, tier, roleId);
    this.rewardsCache.delete(guildId);
  }

  /** With a roleId, only removes the mapping when it still points at that role. */
  removeRoleReward(guildId: string, tier: number, roleId?: string): boolean {
    const changes =
      roleId === undefined
        ? this.db.prepare(`DELETE FROM level_role_rewards WHERE guild_id = ? AND tier = ?`).run(guildId, tier).changes
        : this.db
            .prepare(`DELETE FROM level_role_rewards WHERE guild_id = ? AND tier = ? AND role_id = ?`)
            .run(guildId, tier, roleId).changes;
    this.rewardsCache.delete(guildId);
    return changes > 0;
  }

  // ===== Config =====

  getConfig(guildId: string): LevelsConfig {
    return this.configCache.getOrLoad(guildId, () => {
      const row = this.db
        .prepare<[string], ConfigRow>(
          `SELECT enabled, announce, xp_min, xp_max, cooldown_seconds, daily_cap, ignored_channels_json
           FROM levels_config WHERE guild_id = ?`
        )
        .get(guildId);
      if (!row) return { ...DEFAULT_LEVELS_CONFIG, ignoredChannelIds: [] };
      return {
        enabled: row.enabled === 1,
        announce: row.announce === 1,
        xpMin: row.xp_min,
        xpMax: row.xp_max,
        cooldownSeconds: row.cooldown_seconds,
        dailyCap: row.daily_cap,
        ignoredChannelIds: parseStringArray(row.ignored_channels_json),
      };
    });
  }

  saveConfig(guildId: string, config: LevelsConfig): void {
    this.db
      .prepare(
        `INSERT INTO levels_config (guild_id, enabled, announce, xp_min, xp_max, cooldown_seconds, daily_cap, ignored_channels_json)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT(guild_id) DO UPDATE SET
           enabled = excluded.enabled,
           announce = excluded.announce,
           xp_min = excluded.xp_min,
           xp_max = excluded.xp_max,
           cooldown_seconds = excluded.cooldown_seconds,
           daily_cap = excluded.daily_cap,
           ignored_channels_json = excluded.ignored_channels_json`
      )
      .run(
        guildId,
        config.enabled ? 1 : 0,
        config.announce ? 1 : 0,
        config.xpMin,
        config.xpMax,
        config.cooldownSeconds,
        config.dailyCap,
        JSON.stringify(config.ignoredChannelIds)
      );
    this.configCache.delete(guildId);
  }

  // ===== Daily ledger =====

  getDailyXp(guildId: string, userId: string, day: string): number {
    const row = this.db
      .prepare<[string, string, string], { xp: number }>(
        `SELECT xp FROM levels_ledger WHERE guild_id = ? AND user_id = ? AND day = ?`
      )
      .get(guildId, userId, day);
    return row?.xp ?? 0;
  }

  addDailyXp(guildId: string, userId: string, day: string, amount: number): void {
    this.db
      .prepare(
        `INSERT INTO levels_ledger (guild_id, user_id, day, xp)
         VALUES (?, ?, ?, ?)
         ON CONFLICT(guild_id, user_id, day) DO UPDATE SET xp = xp + excluded.xp`
      )
      .run(guildId, userId, day, amount);
  }

  /** Ledger XP per member from `sinceDay` (inclusive, YYYY-MM-DD) onward, highest first */
  totalsSince(guildId: string, sinceDay: string, limit: number): LedgerTotal[] {
    return this.db
      .prepare<[string, string, number], { user_id: string; total: number }>(
        `SELECT user_id, SUM(xp) AS total
         FROM levels_ledger WHERE guild_id = ? AND day >= ?
         GROUP BY user_id
         ORDER BY total DESC, user_id ASC
         LIMIT ?`
      )
      .all(guildId, sinceDay, limit)
      .map((row) => ({ userId: row.user_id, xp: row.total }));
  }

  /** Drop cached tiers, rewards and config for a guild */
  invalidate(guildId: string): void {
    this.tiersCache.delete(guildId);
    this.rewardsCache.delete(guildId);
    this.configCache.delete(guildId);
  }
}

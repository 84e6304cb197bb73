/**
 * Guildforge — src/db/ensure.ts
 * WHAT: Idempotent schema creation and additive self-heal for every store table.
 * FLOWS:
 *  - ensureSchema(db) → CREATE TABLE IF NOT EXISTS ... → add columns older files lack
 * DOCS:
 *  - SQLite UPSERT: https://sqlite.org/lang_UPSERT.html
 *  - SQLite PRAGMA table_info: https://sqlite.org/pragma.html#pragma_table_info
 *
 * NOTE: Small, synchronous queries only. No awaits; better-sqlite3 is sync.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import type Database from "better-sqlite3";
import { logger } from "../lib/logger.js";

function ensureLevelTables(db: Database.Database): void {
  // xp only grows through grantXp; current_tier is derived and cached here.
  db.exec(`
    CREATE TABLE IF NOT EXISTS level_profiles (
      guild_id TEXT NOT NULL,
      user_id TEXT NOT NULL,
      xp INTEGER NOT NULL DEFAULT 0 CHECK (xp >= 0),
      current_tier INTEGER NOT NULL DEFAULT 0,
      last_award_at INTEGER,
      updated_at INTEGER NOT NULL,
      PRIMARY KEY (guild_id, user_id)
    );
    CREATE INDEX IF NOT EXISTS idx_level_profiles_rank ON level_profiles(guild_id, xp DESC);

    CREATE TABLE IF NOT EXISTS level_tiers (
      guild_id TEXT NOT NULL,
      tier INTEGER NOT NULL CHECK (tier >= 1),
      threshold INTEGER NOT NULL CHECK (threshold >= 0),
      role_name TEXT NOT NULL,
      capabilities_json TEXT NOT NULL DEFAULT '[]',
      PRIMARY KEY (guild_id, tier)
    );

    CREATE TABLE IF NOT EXISTS level_role_rewards (
      guild_id TEXT NOT NULL,
      tier INTEGER NOT NULL,
      role_id TEXT NOT NULL,
      PRIMARY KEY (guild_id, tier)
    );

    CREATE TABLE IF NOT EXISTS levels_config (
      guild_id TEXT PRIMARY KEY,
      enabled INTEGER NOT NULL DEFAULT 1,
      xp_min INTEGER NOT NULL DEFAULT 15,
      xp_max INTEGER NOT NULL DEFAULT 25,
      cooldown_seconds INTEGER NOT NULL DEFAULT 60,
      ignored_channels_json TEXT NOT NULL DEFAULT '[]'
    );

    CREATE TABLE IF NOT EXISTS levels_ledger (
      guild_id TEXT NOT NULL,
      user_id TEXT NOT NULL,
      day TEXT NOT NULL,
      xp INTEGER NOT NULL DEFAULT 0,
      PRIMARY KEY (guild_id, user_id, day)
    );
  `);
}

function ensureReactionRoleTables(db: Database.Database): void {
  // order_index is kept dense (0..n-1) per guild by the store, not by a constraint:
  // a UNIQUE index would trip mid-renormalisation inside the transaction.
  db.exec(`
    CREATE TABLE IF NOT EXISTS reaction_role_entries (
      guild_id TEXT NOT NULL,
      role_id TEXT NOT NULL,
      group_key TEXT NOT NULL,
      enabled INTEGER NOT NULL DEFAULT 1,
      order_index INTEGER NOT NULL,
      label TEXT,
      emoji TEXT,
      PRIMARY KEY (guild_id, role_id)
    );

    CREATE TABLE IF NOT EXISTS panels (
      panel_key TEXT NOT NULL,
      guild_id TEXT NOT NULL,
      channel_id TEXT NOT NULL,
      message_id TEXT NOT NULL,
      content_hash TEXT,
      updated_at INTEGER NOT NULL,
      PRIMARY KEY (panel_key, guild_id)
    );
  `);
}

function ensureOverhaulTables(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS overhaul_state (
      guild_id TEXT NOT NULL,
      kind TEXT NOT NULL CHECK (kind IN ('role', 'category', 'channel', 'message')),
      name TEXT NOT NULL,
      remote_id TEXT NOT NULL,
      updated_at INTEGER NOT NULL,
      PRIMARY KEY (guild_id, kind, name)
    );

    CREATE TABLE IF NOT EXISTS overhaul_snapshots (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      guild_id TEXT NOT NULL,
      created_at INTEGER NOT NULL,
      payload_json TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_overhaul_snapshots_guild ON overhaul_snapshots(guild_id, created_at);
  `);
}

/**
 * Inspect a table and add a column if absent. Lets an older database file pick up
 * new columns without a migration tool.
 */
export function addColumnIfMissing(
  db: Database.Database,
  table: string,
  column: string,
  definition: string
): boolean {
  const cols: unknown[] = db.prepare(`PRAGMA table_info(${table})`).all();
  const exists = cols.some(
    (c) => typeof c === "object" && c !== null && "name" in c && c.name === column
  );
  if (exists) return false;
  db.prepare(`ALTER TABLE ${table} ADD COLUMN ${column} ${definition}`).run();
  logger.info({ evt: "db_column_added", table, column }, "[ensure] added missing column");
  return true;
}

/** Create every table the stores use. Safe to call on every start. */
export function ensureSchema(db: Database.Database): void {
  ensureLevelTables(db);
  ensureReactionRoleTables(db);
  ensureOverhaulTables(db);
  // daily_cap arrived after the first levels_config shape
  addColumnIfMissing(db, "levels_config", "daily_cap", "INTEGER NOT NULL DEFAULT 0");
  addColumnIfMissing(db, "levels_config", "announce", "INTEGER NOT NULL DEFAULT 1");
}

/**
 * Guildforge — tests/db/ensure.test.ts
 * WHAT: Schema creation and additive column self-heal against a real in-memory database.
 * WHY: Every store assumes these tables; an older file must pick up new columns.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, afterEach } from "vitest";
import Database from "better-sqlite3";
import { addColumnIfMissing, ensureSchema } from "../../src/db/ensure.js";
import { createTestDb, type TestDbContext } from "../utils/dbFixtures.js";

function tableNames(db: Database.Database): string[] {
  return db
    .prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name")
    .all()
    .map((r) => r.name);
}

function columnNames(db: Database.Database, table: string): string[] {
  return db
    .prepare<[], { name: string }>(`PRAGMA table_info(${table})`)
    .all()
    .map((r) => r.name);
}

describe("ensureSchema", () => {
  let ctx: TestDbContext | undefined;

  afterEach(() => {
    ctx?.cleanup();
    ctx = undefined;
  });

  it("creates every store table", () => {
    ctx = createTestDb();
    expect(tableNames(ctx.db)).toEqual([
      "level_profiles",
      "level_role_rewards",
      "level_tiers",
      "levels_config",
      "levels_ledger",
      "overhaul_snapshots",
      "overhaul_state",
      "panels",
      "reaction_role_entries",
    ]);
  });

  it("adds the later levels_config columns", () => {
    ctx = createTestDb();
    expect(columnNames(ctx.db, "levels_config")).toEqual(expect.arrayContaining(["daily_cap", "announce"]));
  });

  it("is safe to run twice", () => {
    ctx = createTestDb();
    const db = ctx.db;
    expect(() => ensureSchema(db)).not.toThrow();
    expect(columnNames(db, "levels_config").filter((c) => c === "daily_cap")).toHaveLength(1);
  });

  it("rejects unknown overhaul_state kinds", () => {
    ctx = createTestDb();
    const insert = ctx.db.prepare(
      "INSERT INTO overhaul_state (guild_id, kind, name, remote_id, updated_at) VALUES (?, ?, ?, ?, ?)"
    );
    expect(() => insert.run("g1", "emoji", "x", "1", 0)).toThrow(/CHECK constraint failed/);
  });
});

describe("addColumnIfMissing", () => {
  it("adds a column once and reports whether it did", () => {
    const db = new Database(":memory:");
    db.exec("CREATE TABLE t (id INTEGER PRIMARY KEY)");

    expect(addColumnIfMissing(db, "t", "extra", "TEXT")).toBe(true);
    expect(addColumnIfMissing(db, "t", "extra", "TEXT")).toBe(false);
    expect(columnNames(db, "t")).toEqual(["id", "extra"]);
    db.close();
  });
});

/**
 * Guildforge — src/features/reactionRoles/store.ts
 * WHAT: Self-assignable role entries and the published panel record per guild.
 * FLOWS:
 *  - ReactionRoleStore: list / upsert / remove / setEnabled / relabel / reorder
 *  - PanelStore: get / save / delete, one row per (panel key, guild)
 *
 * Every entry mutation rewrites order_index as 0..n-1 inside the same transaction,
 * so the ordering stays dense and unique per guild.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type Database from "better-sqlite3";
import { env } from "../../lib/env.js";
import { LRUCache } from "../../lib/lruCache.js";

export const REACTION_PANEL_KEY = "reaction-roles";

export interface ReactionRoleEntry {
  guildId: string;
  roleId: string;
  groupKey: string;
  enabled: boolean;
  /** Dense 0..n-1 within the guild */
  orderIndex: number;
  label: string | null;
  emoji: string | null;
}

export interface EntryInput {
  roleId: string;
  groupKey: string;
  label?: string | null;
  emoji?: string | null;
  enabled?: boolean;
}

interface EntryRow {
  guild_id: string;
  role_id: string;
  group_key: string;
  enabled: number;
  order_index: number;
  label: string | null;
  emoji: string | null;
}

function toEntry(row: EntryRow): ReactionRoleEntry {
  return {
    guildId: row.guild_id,
    roleId: row.role_id,
    groupKey: row.group_key,
    enabled: row.enabled === 1,
    orderIndex: row.order_index,
    label: row.label,
    emoji: row.emoji,
  };
}

export class ReactionRoleStore {
  private readonly cache: LRUCache<string, ReactionRoleEntry[]>;

  constructor(
    private readonly db: Database.Database,
    options: { cacheTtlMs?: number } = {}
  ) {
    this.cache = new LRUCache({ maxSize: 1000, ttlMs: options.cacheTtlMs ?? env.STORE_CACHE_TTL_MS });
  }

  list(guildId: string): ReactionRoleEntry[] {
    return this.cache.getOrLoad(guildId, () => this.readAll(guildId));
  }

  get(guildId: string, roleId: string): ReactionRoleEntry | null {
    return this.list(guildId).find((e) => e.roleId === roleId) ?? null;
  }

  /** New entries go to the end; existing ones keep their slot. */
  upsert(guildId: string, input: EntryInput): ReactionRoleEntry {
    this.mutate(guildId, (rows) => {
      const existing = rows.find((r) => r.role_id === input.roleId);
      if (existing) {
        existing.group_key = input.groupKey;
        if (input.label !== undefined) existing.label = input.label;
        if (input.emoji !== undefined) existing.emoji = input.emoji;
        if (input.enabled !== undefined) existing.enabled = input.enabled ? 1 : 0;
        return rows;
      }
      return [
        ...rows,
        {
          guild_id: guildId,
          role_id: input.roleId,
          group_key: input.groupKey,
          enabled: input.enabled === false ? 0 : 1,
          order_index: rows.length,
          label: input.label ?? null,
          emoji: input.emoji ?? null,
        },
      ];
    });
    const entry = this.get(guildId, input.roleId);
    if (!entry) throw new Error(`Reaction role ${input.roleId} vanished after upsert`);
    return entry;
  }

  remove(guildId: string, roleId: string): boolean {
    let removed = false;
    this.mutate(guildId, (rows) => {
      const kept = rows.filter((r) => r.role_id !== roleId);
      removed = kept.length !== rows.length;
      return kept;
    });
    return removed;
  }

  setEnabled(guildId: string, roleId: string, enabled: boolean): boolean {
    return this.update(guildId, roleId, (row) => {
      row.enabled = enabled ? 1 : 0;
    });
  }

  relabel(guildId: string, roleId: string, label: string | null, emoji?: string | null): boolean {
    return this.update(guildId, roleId, (row) => {
      row.label = label;
      if (emoji !== undefined) row.emoji = emoji;
    });
  }

  /** Move an entry to `toIndex` (clamped); everything else shifts. */
  reorder(guildId: string, roleId: string, toIndex: number): boolean {
    let found = false;
    this.mutate(guildId, (rows) => {
      const from = rows.findIndex((r) => r.role_id === roleId);
      if (from < 0) return rows;
      found = true;
      const next = [...rows];
      const [moved] = next.splice(from, 1);
      const target = Math.min(Math.max(0, Math.floor(toIndex)), next.length);
      next.splice(target, 0, moved);
      return next;
    });
    return found;
  }

  invalidate(guildId: string): void {
    this.cache.delete(guildId);
  }

  private readAll(guildId: string): ReactionRoleEntry[] {
    return this.readRows(guildId).map(toEntry);
  }

  private readRows(guildId: string): EntryRow[] {
    return this.db
      .prepare<[string], EntryRow>(
        `SELECT guild_id, role_id, group_key, enabled, order_index, label, emoji
         FROM reaction_role_entries WHERE guild_id = ?
         ORDER BY order_index ASC, role_id ASC`
      )
      .all(guildId);
  }

  private update(guildId: string, roleId: string, change: (row: EntryRow) => void): boolean {
    let found = false;
    this.mutate(guildId, (rows) => {
      const row = rows.find((r) => r.role_id === roleId);
      if (row) {
        change(row);
        found = true;
      }
      return rows;
    });
    return found;
  }

  /** Read, transform, rewrite the guild's rows with dense order_index. One transaction. */
  private mutate(guildId: string, transform: (rows: EntryRow[]) => EntryRow[]): void {
    const run = this.db.transaction(() => {
      const rows = transform(this.readRows(guildId));
      this.db.prepare(`DELETE FROM reaction_role_entries WHERE guild_id = ?`).run(guildId);
      const insert = this.db.prepare(
        `INSERT INTO reaction_role_entries (guild_id, role_id, group_key, enabled, order_index, label, emoji)
         VALUES (?, ?, ?, ?, ?, ?, ?)`
      );
      rows.forEach((row, index) => {
        insert.run(guildId, row.role_id, row.group_key, row.enabled, index, row.label, row.emoji);
      });
    });
    run();
    this.cache.delete(guildId);
  }
}

// ===== Panel records =====

export interface PanelRecord {
  panelKey: string;
  guildId: string;
  channelId: string;
  messageId: string;
  /** Digest of the last payload sent; null when unknown */
  contentHash: string | null;
  updatedAt: number;
}

interface PanelRow {
  panel_key: string;
  guild_id: string;
  channel_id: string;
  message_id: string;
  content_hash: string | null;
  updated_at: number;
}

export class PanelStore {
  constructor(private readonly db: Database.Database) {}

  get(guildId: string, panelKey = REACTION_PANEL_KEY): PanelRecord | null {
    const row = this.db
      .prepare<[string, string], PanelRow>(
        `SELECT panel_key, guild_id, channel_id, message_id, content_hash, updated_at
         FROM panels WHERE panel_key = ? AND guild_id = ?`
      )
      .get(panelKey, guildId);
    if (!row) return null;
    return {
      panelKey: row.panel_key,
      guildId: row.guild_id,
      channelId: row.channel_id,
      messageId: row.message_id,
      contentHash: row.content_hash,
      updatedAt: row.updated_at,
    };
  }

  save(record: PanelRecord): void {
    this.db
      .prepare(
        `INSERT INTO panels (panel_key, guild_id, channel_id, message_id, content_hash, updated_at)
         VALUES (?, ?, ?, ?, ?, ?)
         ON CONFLICT(panel_key, guild_id) DO UPDATE SET
           channel_id = excluded.channel_id,
           message_id = excluded.message_id,
           content_hash = excluded.content_hash,
           updated_at = excluded.updated_at`
      )
      .run(record.panelKey, record.guildId, record.channelId, record.messageId, record.contentHash, record.updatedAt);
  }

  delete(guildId: string, panelKey = REACTION_PANEL_KEY): boolean {
    return (
      this.db.prepare(`DELETE FROM panels WHERE panel_key = ? AND guild_id = ?`).run(panelKey, guildId).changes > 0
    );
  }
}

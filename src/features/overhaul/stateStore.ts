/**
 * Guildforge — src/features/overhaul/stateStore.ts
 * WHAT: Persists the remote ids an overhaul produced, plus pre-run snapshots.
 * FLOWS:
 *  - executor: step succeeded → recordAll(knownState)
 *  - repair: load(guildId) when the caller has no knownState of its own
 *  - start: backupRequired → saveSnapshot(listing)
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type Database from "better-sqlite3";
import type { RemoteChannel, RemoteRole } from "../../remote/types.js";
import { emptyKnownState, type KnownState, type KnownStateKind } from "./types.js";

const KIND_FIELDS = {
  role: "roles",
  category: "categories",
  channel: "channels",
  message: "messages",
} as const satisfies Record<KnownStateKind, keyof KnownState>;

const KINDS: KnownStateKind[] = ["role", "category", "channel", "message"];

export interface RemoteSnapshot {
  id: number;
  guildId: string;
  createdAt: number;
  roles: RemoteRole[];
  channels: RemoteChannel[];
}

function isKind(value: string): value is KnownStateKind {
  return Object.hasOwn(KIND_FIELDS, value);
}

export class OverhaulStateStore {
  constructor(
    private readonly db: Database.Database,
    private readonly now: () => number = Date.now
  ) {}

  load(guildId: string): KnownState {
    const state = emptyKnownState();
    const rows = this.db
      .prepare<[string], { kind: string; name: string; remote_id: string }>(
        `SELECT kind, name, remote_id FROM overhaul_state WHERE guild_id = ? ORDER BY kind, name`
      )
      .all(guildId);
    for (const row of rows) {
      if (isKind(row.kind)) state[KIND_FIELDS[row.kind]][row.name] = row.remote_id;
    }
    return state;
  }

  record(guildId: string, kind: KnownStateKind, name: string, remoteId: string): void {
    this.db
      .prepare(
        `INSERT INTO overhaul_state (guild_id, kind, name, remote_id, updated_at)
         VALUES (?, ?, ?, ?, ?)
         ON CONFLICT(guild_id, kind, name) DO UPDATE SET
           remote_id = excluded.remote_id,
           updated_at = excluded.updated_at`
      )
      .run(guildId, kind, name, remoteId, this.now());
  }

  /** Upsert every id in one transaction */
  recordAll(guildId: string, state: KnownState): void {
    const write = this.db.transaction(() => {
      for (const kind of KINDS) {
        for (const [name, remoteId] of Object.entries(state[KIND_FIELDS[kind]])) {
          this.record(guildId, kind, name, remoteId);
        }
      }
    });
    write();
  }

  clear(guildId: string): number {
    return this.db.prepare(`DELETE FROM overhaul_state WHERE guild_id = ?`).run(guildId).changes;
  }

  saveSnapshot(guildId: string, listing: { roles: RemoteRole[]; channels: RemoteChannel[] }): number {
    const result = this.db
      .prepare(`INSERT INTO overhaul_snapshots (guild_id, created_at, payload_json) VALUES (?, ?, ?)`)
      .run(guildId, this.now(), JSON.stringify(listing));
    return Number(result.lastInsertRowid);
  }

  latestSnapshot(guildId: string): RemoteSnapshot | null {
    const row = this.db
      .prepare<[string], { id: number; created_at: number; payload_json: string }>(
        `SELECT id, created_at, payload_json FROM overhaul_snapshots
         WHERE guild_id = ? ORDER BY created_at DESC, id DESC LIMIT 1`
      )
      .get(guildId);
    if (!row) return null;
    const payload: { roles?: RemoteRole[]; channels?: RemoteChannel[] } = JSON.parse(row.payload_json);
    return {
      id: row.id,
      guildId,
      createdAt: row.created_at,
      roles: payload.roles ?? [],
      channels: payload.channels ?? [],
    };
  }
}

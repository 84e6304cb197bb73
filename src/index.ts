/**
 * Guildforge — src/index.ts
 * WHAT: Library entry point. Wires stores, engines and the overhaul service over one database.
 * FLOWS:
 *  - createGuildforge({ db, resolveClient }) → { levels, panels, overhaul, stores }
 *  - discordResolver(client) → GuildClientResolver over a logged-in discord.js Client
 * DOCS:
 *  - discord.js Client: https://discord.js.org/#/docs/discord.js/main/class/Client
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { Client } from "discord.js";
import { getDb, type Db } from "./db/db.js";
import { ensureSchema } from "./db/ensure.js";
import { env } from "./lib/env.js";
import type { RetryOptions } from "./lib/retry.js";
import { LevelEngine } from "./features/leveling/levelEngine.js";
import { LevelStore } from "./features/leveling/store.js";
import { OverhaulService } from "./features/overhaul/index.js";
import { OverhaulStateStore } from "./features/overhaul/stateStore.js";
import { ReactionPanelManager } from "./features/reactionRoles/manager.js";
import { PanelStore, ReactionRoleStore } from "./features/reactionRoles/store.js";
import { DiscordGuildClient } from "./remote/discordClient.js";
import type { GuildClientResolver } from "./remote/types.js";

export interface GuildforgeOptions {
  resolveClient: GuildClientResolver;
  /** Defaults to the process database at DB_PATH */
  db?: Db;
  retry?: RetryOptions;
}

export interface Guildforge {
  levels: LevelEngine;
  panels: ReactionPanelManager;
  overhaul: OverhaulService;
  stores: {
    levels: LevelStore;
    reactionRoles: ReactionRoleStore;
    panels: PanelStore;
    overhaulState: OverhaulStateStore;
  };
}

export function createGuildforge(options: GuildforgeOptions): Guildforge {
  const db = options.db ?? getDb();
  ensureSchema(db);
  const retry = options.retry ?? {
    maxAttempts: env.OVERHAUL_MAX_ATTEMPTS,
    initialDelayMs: env.OVERHAUL_BACKOFF_BASE_MS,
    maxDelayMs: env.OVERHAUL_BACKOFF_MAX_MS,
  };

  const levelStore = new LevelStore(db);
  const entryStore = new ReactionRoleStore(db);
  const panelStore = new PanelStore(db);
  const stateStore = new OverhaulStateStore(db);

  const levels = new LevelEngine({ store: levelStore, resolveClient: options.resolveClient, retry });
  const panels = new ReactionPanelManager({
    entries: entryStore,
    panels: panelStore,
    resolveClient: options.resolveClient,
    pageSize: env.PANEL_PAGE_SIZE,
    retry,
  });
  const overhaul = new OverhaulService({
    resolveClient: options.resolveClient,
    levels,
    panels,
    stateStore,
    retry,
    invalidateCaches: (guildId) => {
      levelStore.invalidate(guildId);
      entryStore.invalidate(guildId);
    },
  });

  return {
    levels,
    panels,
    overhaul,
    stores: { levels: levelStore, reactionRoles: entryStore, panels: panelStore, overhaulState: stateStore },
  };
}

/** Resolver over the guild cache of a ready discord.js client. */
export function discordResolver(client: Client<true>): GuildClientResolver {
  const clients = new Map<string, DiscordGuildClient>();
  return (guildId) => {
    let resolved = clients.get(guildId);
    if (!resolved) {
      const guild = client.guilds.cache.get(guildId);
      if (!guild) throw new Error(`Guild ${guildId} is not in the client cache`);
      resolved = new DiscordGuildClient(guild);
      clients.set(guildId, resolved);
    }
    return resolved;
  };
}

export * from "./features/overhaul/configuration.js";
export * from "./features/overhaul/types.js";
export { plan, orderSteps, BASE_STEP_COUNT } from "./features/overhaul/planner.js";
export { execute, type ExecuteOptions } from "./features/overhaul/executor.js";
export { OverhaulService, type OverhaulRun, type StartRequest, type RepairOptions } from "./features/overhaul/index.js";
export { OverhaulStateStore, type RemoteSnapshot } from "./features/overhaul/stateStore.js";
export {
  ProgressReporter,
  MessageProgressSink,
  renderProgress,
  type ProgressSink,
  type ProgressTarget,
} from "./features/overhaul/progress.js";
export { LevelEngine, type GrantResult, type AwardOutcome, type LeaderboardEntry } from "./features/leveling/levelEngine.js";
export { LevelStore, type LevelProfile, type LevelsConfig, type RoleReward } from "./features/leveling/store.js";
export { tierForXp, type TierDefinition } from "./features/leveling/tiers.js";
export { ReactionPanelManager, type PublishResult } from "./features/reactionRoles/manager.js";
export { ReactionRoleStore, PanelStore, type ReactionRoleEntry, type PanelRecord } from "./features/reactionRoles/store.js";
export { buildPanelPages, renderPanel, parseSelectCustomId, CLEAR_BUTTON_ID } from "./features/reactionRoles/panel.js";
export { DiscordGuildClient } from "./remote/discordClient.js";
export * from "./remote/types.js";
export * from "./lib/errors.js";
export { withRetry, type RetryOptions } from "./lib/retry.js";
export { RequestLimiter, apiLimiter } from "./lib/rateLimiter.js";
export { KeyedLock } from "./lib/keyedLock.js";
export { openDatabase, getDb, closeDatabase, type Db } from "./db/db.js";
export { ensureSchema } from "./db/ensure.js";
export { initializeSentry } from "./lib/sentry.js";

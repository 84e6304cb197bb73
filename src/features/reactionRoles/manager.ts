// SPDX-License-Identifier: LicenseRef-ANW-1.0
/**
 * Guildforge — src/features/reactionRoles/manager.ts
 * WHAT: Self-assign role panel: entry admin, publishing, and member selections.
 * FLOWS:
 *  - publish → render → (recorded message alive) edit | (gone) find/create channel → send → record
 *  - applySelection → configured → enabled → not @everyone → not managed → not protected
 *                   → below bot → add/remove only if needed
 *  - clear → remove every enabled configured role the member holds
 * DOCS:
 *  - Role hierarchy: https://discord.com/developers/docs/topics/permissions#permission-hierarchy
 */

import type { PermissionsString } from "discord.js";
import { logger } from "../../lib/logger.js";
import { SelectionRejectedError } from "../../lib/errors.js";
import { withRetry, type RetryOptions } from "../../lib/retry.js";
import type { GuildClientResolver, RemoteGuildClient, RemoteRole } from "../../remote/types.js";
import { nameKey } from "../overhaul/configuration.js";
import { buildPanelPages, effectivePageSize, panelContentHash, renderPanel } from "./panel.js";
import {
  REACTION_PANEL_KEY,
  type EntryInput,
  type PanelRecord,
  type PanelStore,
  type ReactionRoleEntry,
  type ReactionRoleStore,
} from "./store.js";

/** Role names treated as staff even when a template did not mark them protected */
export const DEFAULT_STAFF_ROLE_NAMES = ["owner", "admin", "administrator", "moderator", "mod", "staff", "support"];

/** Any of these on a role makes it unsuitable for self-assignment */
const ELEVATED_PERMISSIONS: PermissionsString[] = [
  "Administrator",
  "ManageGuild",
  "ManageRoles",
  "ManageChannels",
  "KickMembers",
  "BanMembers",
  "ModerateMembers",
  "ManageMessages",
];

export interface PublishOptions {
  /** Channel the panel lives in when it has to be (re)created */
  channelName?: string;
  /** Send the edit even when the rendered content is unchanged */
  force?: boolean;
}

export interface PublishResult {
  action: "created" | "edited" | "unchanged";
  channelId: string;
  messageId: string;
}

export interface ReactionPanelManagerOptions {
  entries: ReactionRoleStore;
  panels: PanelStore;
  resolveClient: GuildClientResolver;
  pageSize?: number;
  retry?: RetryOptions;
  staffRoleNames?: readonly string[];
  now?: () => number;
}

export class ReactionPanelManager {
  private readonly entries: ReactionRoleStore;
  private readonly panels: PanelStore;
  private readonly resolveClient: GuildClientResolver;
  /** Options per select menu when a panel is rendered */
  readonly panelPageSize: number;
  private readonly retry: RetryOptions;
  private readonly staffNameKeys: Set<string>;
  private readonly now: () => number;
  /** Template-protected role names registered by the overhaul, per guild */
  private readonly protectedNames = new Map<string, Set<string>>();

  constructor(options: ReactionPanelManagerOptions) {
    this.entries = options.entries;
    this.panels = options.panels;
    this.resolveClient = options.resolveClient;
    this.panelPageSize = effectivePageSize(options.pageSize);
    this.retry = options.retry ?? {};
    this.staffNameKeys = new Set((options.staffRoleNames ?? DEFAULT_STAFF_ROLE_NAMES).map(nameKey));
    this.now = options.now ?? Date.now;
  }

  // ===== Entry admin =====

  listEntries(guildId: string): ReactionRoleEntry[] {
    return this.entries.list(guildId);
  }

  addEntry(guildId: string, input: EntryInput): ReactionRoleEntry {
    return this.entries.upsert(guildId, input);
  }

  removeEntry(guildId: string, roleId: string): boolean {
    return this.entries.remove(guildId, roleId);
  }

  setEntryEnabled(guildId: string, roleId: string, enabled: boolean): boolean {
    return this.entries.setEnabled(guildId, roleId, enabled);
  }

  relabelEntry(guildId: string, roleId: string, label: string | null, emoji?: string | null): boolean {
    return this.entries.relabel(guildId, roleId, label, emoji);
  }

  reorderEntry(guildId: string, roleId: string, toIndex: number): boolean {
    return this.entries.reorder(guildId, roleId, toIndex);
  }

  /** Names that applySelection must refuse in this guild, on top of the staff defaults */
  protectRoleNames(guildId: string, names: readonly string[]): void {
    const set = this.protectedNames.get(guildId) ?? new Set<string>();
    for (const name of names) set.add(nameKey(name));
    this.protectedNames.set(guildId, set);
  }

  getPanelRecord(guildId: string): PanelRecord | null {
    return this.panels.get(guildId);
  }

  // ===== Publishing =====

  async publish(guildId: string, options: PublishOptions = {}): Promise<PublishResult> {
    const channelName = options.channelName ?? "roles";
    const client = this.resolveClient(guildId);
    const roles = await this.call(() => client.listRoles(), "listRoles");
    const roleNames = new Map(roles.map((r) => [r.id, r.name]));
    const payload = renderPanel(buildPanelPages(this.entries.list(guildId), this.panelPageSize, roleNames));
    const contentHash = panelContentHash(payload);

    const record = this.panels.get(guildId);
    if (record) {
      const alive = await this.call(() => client.fetchMessage(record.channelId, record.messageId), "fetchMessage");
      if (alive) {
        if (!options.force && record.contentHash === contentHash) {
          logger.debug({ evt: "panel_unchanged", guildId, messageId: record.messageId }, "Panel already current");
          return { action: "unchanged", channelId: record.channelId, messageId: record.messageId };
        }
        await this.call(() => client.editMessage(record.channelId, record.messageId, payload), "editMessage");
        this.panels.save({ ...record, contentHash, updatedAt: this.now() });
        logger.info({ evt: "panel_edited", guildId, messageId: record.messageId }, "Reaction-role panel updated");
        return { action: "edited", channelId: record.channelId, messageId: record.messageId };
      }
      logger.info(
        { evt: "panel_missing", guildId, channelId: record.channelId, messageId: record.messageId },
        "Recorded panel message is gone; recreating"
      );
    }

    const channelId = await this.resolvePanelChannel(client, channelName, record?.channelId ?? null);
    const message = await this.call(() => client.createMessage(channelId, payload), "createMessage");
    this.panels.save({
      panelKey: REACTION_PANEL_KEY,
      guildId,
      channelId,
      messageId: message.id,
      contentHash,
      updatedAt: this.now(),
    });
    logger.info({ evt: "panel_created", guildId, channelId, messageId: message.id }, "Reaction-role panel published");
    return { action: "created", channelId, messageId: message.id };
  }

  /** Re-send the panel regardless of its recorded content hash. */
  repair(guildId: string, options: Omit<PublishOptions, "force"> = {}): Promise<PublishResult> {
    return this.publish(guildId, { ...options, force: true });
  }

  // ===== Member selections =====

  /**
   * Set one configured role on or off for a member. Validation happens before
   * any mutation; a rejected role throws SelectionRejectedError.
   * Returns the configured role ids the member holds afterwards.
   */
  async applySelection(guildId: string, userId: string, roleId: string, desiredState: boolean): Promise<string[]> {
    const client = this.resolveClient(guildId);
    const roles = await this.call(() => client.listRoles(), "listRoles");
    const botTop = await this.call(() => client.getBotHighestRolePosition(), "getBotHighestRolePosition");
    this.validate(guildId, roleId, roles, botTop);

    const held = new Set(await this.call(() => client.getMemberRoleIds(userId), "getMemberRoleIds"));
    if (desiredState && !held.has(roleId)) {
      await this.call(() => client.addMemberRole(userId, roleId, "Self-assigned role"), "addMemberRole");
      held.add(roleId);
    } else if (!desiredState && held.has(roleId)) {
      await this.call(() => client.removeMemberRole(userId, roleId, "Self-removed role"), "removeMemberRole");
      held.delete(roleId);
    }

    logger.debug({ evt: "rr_selection", guildId, userId, roleId, desiredState }, "Reaction-role selection applied");
    return this.entries
      .list(guildId)
      .filter((e) => held.has(e.roleId))
      .map((e) => e.roleId);
  }

  /**
   * Remove every enabled configured role the member holds, one call per role.
   * Roles that no longer pass validation are left alone.
   */
  async clear(guildId: string, userId: string): Promise<string[]> {
    const client = this.resolveClient(guildId);
    const roles = await this.call(() => client.listRoles(), "listRoles");
    const botTop = await this.call(() => client.getBotHighestRolePosition(), "getBotHighestRolePosition");
    const held = new Set(await this.call(() => client.getMemberRoleIds(userId), "getMemberRoleIds"));

    const removed: string[] = [];
    for (const entry of this.entries.list(guildId)) {
      if (!entry.enabled || !held.has(entry.roleId)) continue;
      try {
        this.validate(guildId, entry.roleId, roles, botTop);
      } catch (err) {
        if (err instanceof SelectionRejectedError) {
          logger.debug({ evt: "rr_clear_skip", guildId, roleId: entry.roleId, reason: err.reason }, err.message);
          continue;
        }
        throw err;
      }
      await this.call(() => client.removeMemberRole(userId, entry.roleId, "Cleared self-assigned roles"), "removeMemberRole");
      removed.push(entry.roleId);
    }

    logger.info({ evt: "rr_cleared", guildId, userId, removed: removed.length }, "Reaction roles cleared");
    return removed;
  }

  // ===== internals =====

  private validate(guildId: string, roleId: string, roles: readonly RemoteRole[], botTop: number): void {
    const reject = (reason: SelectionRejectedError["reason"], message: string): never => {
      throw new SelectionRejectedError(roleId, reason, message);
    };

    const entry = this.entries.get(guildId, roleId);
    const role = roles.find((r) => r.id === roleId);
    if (!entry || !role) return reject("not_configured", "That role is not offered here.");
    if (!entry.enabled) return reject("disabled", "That role is currently disabled.");
    if (roleId === guildId) return reject("everyone", "@everyone cannot be self-assigned.");
    if (role.managed) return reject("managed", `${role.name} is managed by an integration.`);
    if (this.isProtected(guildId, role)) return reject("protected", `${role.name} is a staff role.`);
    if (role.position >= botTop) return reject("hierarchy", `${role.name} is above my highest role.`);
  }

  private isProtected(guildId: string, role: RemoteRole): boolean {
    const key = nameKey(role.name);
    if (this.staffNameKeys.has(key)) return true;
    if (this.protectedNames.get(guildId)?.has(key)) return true;
    return role.permissions.some((p) => ELEVATED_PERMISSIONS.includes(p));
  }

  /** Reuse the previous channel, else a text channel with that name, else create one. */
  private async resolvePanelChannel(
    client: RemoteGuildClient,
    channelName: string,
    previousChannelId: string | null
  ): Promise<string> {
    const channels = await this.call(() => client.listChannels(), "listChannels");
    const text = channels.filter((c) => c.kind === "text" || c.kind === "announcement");
    const previous = previousChannelId ? text.find((c) => c.id === previousChannelId) : undefined;
    if (previous) return previous.id;

    const wanted = nameKey(channelName);
    const byName = text.find((c) => nameKey(c.name) === wanted);
    if (byName) return byName.id;

    const created = await this.call(
      () => client.createChannel({ name: channelName, kind: "text", parentId: null, overwrites: [] }),
      "createChannel"
    );
    return created.id;
  }

  private call<T>(fn: () => Promise<T>, label: string): Promise<T> {
    return withRetry(fn, { ...this.retry, label });
  }
}

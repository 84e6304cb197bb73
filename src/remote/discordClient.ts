/**
 * Guildforge — src/remote/discordClient.ts
 * WHAT: RemoteGuildClient over a discord.js Guild.
 * FLOWS: method → apiLimiter.schedule → discord.js REST → toRemote* mapping
 *        failure → classifyRemoteError → TransientRemoteError | PermanentRemoteError
 * DOCS:
 *  - GuildChannelManager: https://discord.js.org/docs/packages/discord.js/main/GuildChannelManager:Class
 *  - RoleManager#setPositions: https://discord.js.org/docs/packages/discord.js/main/RoleManager:Class
 *  - Permission overwrites: https://discord.com/developers/docs/topics/permissions#permission-overwrites
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import {
  ChannelType,
  GuildDefaultMessageNotifications,
  GuildExplicitContentFilter,
  GuildVerificationLevel,
  OverwriteType,
  type Guild,
  type GuildTextBasedChannel,
  type NonThreadGuildBasedChannel,
  type OverwriteResolvable,
  type Role,
} from "discord.js";
import { apiLimiter, type RequestLimiter } from "../lib/rateLimiter.js";
import { classifyRemoteError, isUnknownResource, PermanentRemoteError } from "../lib/errors.js";
import type {
  CategorySpec,
  ChannelSpec,
  ContentFilter,
  DefaultNotifications,
  GuildSettings,
  MessagePayload,
  PermissionOverwrite,
  RemoteChannel,
  RemoteChannelKind,
  RemoteGuildClient,
  RemoteMessage,
  RemoteRole,
  RoleSpec,
  VerificationLevel,
} from "./types.js";

const VERIFICATION_LEVELS: ReadonlyArray<[VerificationLevel, GuildVerificationLevel]> = [
  ["none", GuildVerificationLevel.None],
  ["low", GuildVerificationLevel.Low],
  ["medium", GuildVerificationLevel.Medium],
  ["high", GuildVerificationLevel.High],
  ["very_high", GuildVerificationLevel.VeryHigh],
];

const CONTENT_FILTERS: ReadonlyArray<[ContentFilter, GuildExplicitContentFilter]> = [
  ["disabled", GuildExplicitContentFilter.Disabled],
  ["members_without_roles", GuildExplicitContentFilter.MembersWithoutRoles],
  ["all_members", GuildExplicitContentFilter.AllMembers],
];

const NOTIFICATIONS: ReadonlyArray<[DefaultNotifications, GuildDefaultMessageNotifications]> = [
  ["all_messages", GuildDefaultMessageNotifications.AllMessages],
  ["only_mentions", GuildDefaultMessageNotifications.OnlyMentions],
];

function toDiscord<K, V>(table: ReadonlyArray<[K, V]>, key: K): V {
  const hit = table.find(([k]) => k === key);
  if (!hit) throw new Error(`No discord.js value for ${String(key)}`);
  return hit[1];
}

function fromDiscord<K, V>(table: ReadonlyArray<[K, V]>, value: V, fallback: K): K {
  return table.find(([, v]) => v === value)?.[0] ?? fallback;
}

const REASON = "Guildforge overhaul";

function channelKind(type: ChannelType): RemoteChannelKind {
  switch (type) {
    case ChannelType.GuildCategory:
      return "category";
    case ChannelType.GuildText:
      return "text";
    case ChannelType.GuildVoice:
      return "voice";
    case ChannelType.GuildAnnouncement:
      return "announcement";
    default:
      return "other";
  }
}

export function toRemoteRole(role: Role): RemoteRole {
  return {
    id: role.id,
    name: role.name,
    position: role.position,
    managed: role.managed,
    permissions: role.permissions.toArray(),
  };
}

export function toRemoteChannel(channel: NonThreadGuildBasedChannel): RemoteChannel {
  return {
    id: channel.id,
    name: channel.name,
    kind: channelKind(channel.type),
    parentId: channel.parentId,
    overwrites: channel.permissionOverwrites.cache.map((o) => ({
      id: o.id,
      type: o.type === OverwriteType.Role ? "role" : "member",
      allow: o.allow.toArray(),
      deny: o.deny.toArray(),
    })),
  };
}

function toOverwriteData(overwrites: PermissionOverwrite[]): OverwriteResolvable[] {
  return overwrites.map((o) => ({
    id: o.id,
    type: o.type === "role" ? OverwriteType.Role : OverwriteType.Member,
    allow: o.allow,
    deny: o.deny,
  }));
}

function unknownChannel(operation: string, channelId: string): PermanentRemoteError {
  return new PermanentRemoteError(operation, `Unknown Channel ${channelId}`, { code: 10003, status: 404 });
}

export interface DiscordGuildClientOptions {
  /** Defaults to the process-wide apiLimiter */
  limiter?: RequestLimiter;
}

export class DiscordGuildClient implements RemoteGuildClient {
  private readonly limiter: RequestLimiter;

  constructor(
    private readonly guild: Guild,
    options: DiscordGuildClientOptions = {}
  ) {
    this.limiter = options.limiter ?? apiLimiter;
  }

  get guildId(): string {
    return this.guild.id;
  }

  /** Every REST call queues on the shared budget; failures leave here classified. */
  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await this.limiter.schedule(fn);
    } catch (err) {
      throw classifyRemoteError(err, operation);
    }
  }

  private async textChannel(operation: string, channelId: string): Promise<GuildTextBasedChannel> {
    const channel = await this.guild.channels.fetch(channelId);
    if (!channel || !channel.isTextBased()) throw unknownChannel(operation, channelId);
    return channel;
  }

  getGuildSettings(): Promise<GuildSettings> {
    return this.call("getGuildSettings", async () => {
      const guild = await this.guild.fetch();
      return {
        name: guild.name,
        verificationLevel: fromDiscord(VERIFICATION_LEVELS, guild.verificationLevel, "none"),
        contentFilter: fromDiscord(CONTENT_FILTERS, guild.explicitContentFilter, "disabled"),
        defaultNotifications: fromDiscord(NOTIFICATIONS, guild.defaultMessageNotifications, "all_messages"),
      };
    });
  }

  updateGuildSettings(settings: GuildSettings): Promise<void> {
    return this.call("updateGuildSettings", async () => {
      await this.guild.edit({
        name: settings.name,
        verificationLevel: toDiscord(VERIFICATION_LEVELS, settings.verificationLevel),
        explicitContentFilter: toDiscord(CONTENT_FILTERS, settings.contentFilter),
        defaultMessageNotifications: toDiscord(NOTIFICATIONS, settings.defaultNotifications),
        reason: REASON,
      });
    });
  }

  listRoles(): Promise<RemoteRole[]> {
    return this.call("listRoles", async () => {
      const roles = await this.guild.roles.fetch();
      return roles.map(toRemoteRole);
    });
  }

  createRole(spec: RoleSpec): Promise<RemoteRole> {
    return this.call("createRole", async () => {
      const role = await this.guild.roles.create({
        name: spec.name,
        color: spec.color,
        hoist: spec.hoist,
        mentionable: spec.mentionable,
        permissions: spec.permissions,
        reason: REASON,
      });
      return toRemoteRole(role);
    });
  }

  reorderRoles(order: Array<{ id: string; position: number }>): Promise<void> {
    return this.call("reorderRoles", async () => {
      await this.guild.roles.setPositions(order.map(({ id, position }) => ({ role: id, position })));
    });
  }

  listChannels(): Promise<RemoteChannel[]> {
    return this.call("listChannels", async () => {
      const channels = await this.guild.channels.fetch();
      return [...channels.values()]
        .filter((c): c is NonThreadGuildBasedChannel => c !== null)
        .map(toRemoteChannel);
    });
  }

  createCategory(spec: CategorySpec): Promise<RemoteChannel> {
    return this.call("createCategory", async () => {
      const category = await this.guild.channels.create({
        name: spec.name,
        type: ChannelType.GuildCategory,
        permissionOverwrites: toOverwriteData(spec.overwrites),
        reason: REASON,
      });
      return toRemoteChannel(category);
    });
  }

  createChannel(spec: ChannelSpec): Promise<RemoteChannel> {
    return this.call("createChannel", async () => {
      const base = {
        name: spec.name,
        parent: spec.parentId,
        permissionOverwrites: toOverwriteData(spec.overwrites),
        reason: REASON,
      };
      switch (spec.kind) {
        case "text":
          return toRemoteChannel(
            await this.guild.channels.create({ ...base, type: ChannelType.GuildText, topic: spec.topic })
          );
        case "announcement":
          return toRemoteChannel(
            await this.guild.channels.create({ ...base, type: ChannelType.GuildAnnouncement, topic: spec.topic })
          );
        case "voice":
          return toRemoteChannel(await this.guild.channels.create({ ...base, type: ChannelType.GuildVoice }));
      }
    });
  }

  setChannelOverwrites(channelId: string, overwrites: PermissionOverwrite[]): Promise<void> {
    return this.call("setChannelOverwrites", async () => {
      const channel = await this.guild.channels.fetch(channelId);
      if (!channel || channel.isThread()) throw unknownChannel("setChannelOverwrites", channelId);
      await channel.permissionOverwrites.set(toOverwriteData(overwrites), REASON);
    });
  }

  async fetchMessage(channelId: string, messageId: string): Promise<RemoteMessage | null> {
    try {
      return await this.call("fetchMessage", async () => {
        const channel = await this.textChannel("fetchMessage", channelId);
        const message = await channel.messages.fetch(messageId);
        return { id: message.id, channelId: message.channelId };
      });
    } catch (err) {
      const classified = classifyRemoteError(err, "fetchMessage");
      if (isUnknownResource(classified)) return null;
      throw classified;
    }
  }

  createMessage(channelId: string, payload: MessagePayload): Promise<RemoteMessage> {
    return this.call("createMessage", async () => {
      const channel = await this.textChannel("createMessage", channelId);
      const message = await channel.send(payload);
      return { id: message.id, channelId: message.channelId };
    });
  }

  editMessage(channelId: string, messageId: string, payload: MessagePayload): Promise<void> {
    return this.call("editMessage", async () => {
      const channel = await this.textChannel("editMessage", channelId);
      await channel.messages.edit(messageId, payload);
    });
  }

  getMemberRoleIds(userId: string): Promise<string[]> {
    return this.call("getMemberRoleIds", async () => {
      const member = await this.guild.members.fetch(userId);
      // The @everyone role shares the guild id and is implicit on every member
      return member.roles.cache.filter((r) => r.id !== this.guild.id).map((r) => r.id);
    });
  }

  addMemberRole(userId: string, roleId: string, reason = REASON): Promise<void> {
    return this.call("addMemberRole", async () => {
      await this.guild.members.addRole({ user: userId, role: roleId, reason });
    });
  }

  removeMemberRole(userId: string, roleId: string, reason = REASON): Promise<void> {
    return this.call("removeMemberRole", async () => {
      await this.guild.members.removeRole({ user: userId, role: roleId, reason });
    });
  }

  getBotHighestRolePosition(): Promise<number> {
    return this.call("getBotHighestRolePosition", async () => {
      const me = await this.guild.members.fetchMe();
      return me.roles.highest.position;
    });
  }
}

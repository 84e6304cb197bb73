/**
 * Guildforge — src/remote/types.ts
 * WHAT: The remote-platform capability every engine component talks to.
 * FLOWS: overhaul handlers / LevelEngine / ReactionPanelManager → RemoteGuildClient → Discord REST
 *
 * Mutating calls may reject with TransientRemoteError (retryable, may carry a wait)
 * or PermanentRemoteError (never retried). Implementations translate their own
 * failures; callers only ever see the taxonomy in lib/errors.ts.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type {
  APIActionRowComponent,
  APIEmbed,
  APIComponentInMessageActionRow,
  PermissionsString,
} from "discord.js";

export type RemoteChannelKind = "category" | "text" | "voice" | "announcement" | "other";

export type VerificationLevel = "none" | "low" | "medium" | "high" | "very_high";
export type ContentFilter = "disabled" | "members_without_roles" | "all_members";
export type DefaultNotifications = "all_messages" | "only_mentions";

export interface GuildSettings {
  name: string;
  verificationLevel: VerificationLevel;
  contentFilter: ContentFilter;
  defaultNotifications: DefaultNotifications;
}

export interface RemoteRole {
  id: string;
  name: string;
  /** Higher is further up the hierarchy */
  position: number;
  /** Owned by an integration or bot; cannot be assigned by hand */
  managed: boolean;
  permissions: PermissionsString[];
}

export interface PermissionOverwrite {
  /** Role id, or the guild id for @everyone */
  id: string;
  type: "role" | "member";
  allow: PermissionsString[];
  deny: PermissionsString[];
}

export interface RemoteChannel {
  id: string;
  name: string;
  kind: RemoteChannelKind;
  parentId: string | null;
  overwrites: PermissionOverwrite[];
}

export interface RemoteMessage {
  id: string;
  channelId: string;
}

export interface MessagePayload {
  content?: string;
  embeds?: APIEmbed[];
  components?: APIActionRowComponent<APIComponentInMessageActionRow>[];
}

export interface RoleSpec {
  name: string;
  color: number;
  hoist: boolean;
  mentionable: boolean;
  permissions: PermissionsString[];
}

export interface ChannelSpec {
  name: string;
  kind: Exclude<RemoteChannelKind, "category" | "other">;
  parentId: string | null;
  topic?: string;
  overwrites: PermissionOverwrite[];
}

export interface CategorySpec {
  name: string;
  overwrites: PermissionOverwrite[];
}

export interface RemoteGuildClient {
  /** Also the id of the @everyone role */
  readonly guildId: string;

  getGuildSettings(): Promise<GuildSettings>;
  updateGuildSettings(settings: GuildSettings): Promise<void>;

  listRoles(): Promise<RemoteRole[]>;
  createRole(spec: RoleSpec): Promise<RemoteRole>;
  /** Positions are absolute; roles not listed keep theirs */
  reorderRoles(order: Array<{ id: string; position: number }>): Promise<void>;

  listChannels(): Promise<RemoteChannel[]>;
  createCategory(spec: CategorySpec): Promise<RemoteChannel>;
  createChannel(spec: ChannelSpec): Promise<RemoteChannel>;
  /** Replaces the channel's overwrites wholesale */
  setChannelOverwrites(channelId: string, overwrites: PermissionOverwrite[]): Promise<void>;

  /** Resolves null when the channel or message no longer exists */
  fetchMessage(channelId: string, messageId: string): Promise<RemoteMessage | null>;
  createMessage(channelId: string, payload: MessagePayload): Promise<RemoteMessage>;
  editMessage(channelId: string, messageId: string, payload: MessagePayload): Promise<void>;

  getMemberRoleIds(userId: string): Promise<string[]>;
  addMemberRole(userId: string, roleId: string, reason?: string): Promise<void>;
  removeMemberRole(userId: string, roleId: string, reason?: string): Promise<void>;

  getBotHighestRolePosition(): Promise<number>;
}

/** Resolves the client for a guild; engines are multi-guild. */
export type GuildClientResolver = (guildId: string) => RemoteGuildClient;

/** Calls that change remote state. Reads are free of side effects. */
export const MUTATING_OPERATIONS = [
  "updateGuildSettings",
  "createRole",
  "reorderRoles",
  "createCategory",
  "createChannel",
  "setChannelOverwrites",
  "createMessage",
  "editMessage",
  "addMemberRole",
  "removeMemberRole",
] as const satisfies ReadonlyArray<keyof RemoteGuildClient>;

export type MutatingOperation = (typeof MUTATING_OPERATIONS)[number];

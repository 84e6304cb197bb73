// SPDX-License-Identifier: LicenseRef-ANW-1.0
/**
 * Guildforge — src/features/overhaul/handlers.ts
 * WHAT: What each step kind does against the remote guild.
 * FLOWS:
 *  - runStep(step, ctx) → dispatch on payload kind → remote calls through ctx.call
 *
 * Repair mode looks every template item up in a fresh listing (known id first,
 * then normalised name) and only mutates what is missing or different. Ids of
 * everything touched or found land in ctx.knownState.
 * DOCS:
 *  - Permission overwrites: https://discord.com/developers/docs/topics/permissions#permission-overwrites
 *  - Modify guild role positions: https://discord.com/developers/docs/resources/guild#modify-guild-role-positions
 */

import type { PermissionsString } from "discord.js";
import { logger } from "../../lib/logger.js";
import type {
  PermissionOverwrite,
  RemoteChannel,
  RemoteGuildClient,
  RemoteRole,
} from "../../remote/types.js";
import type { LevelEngine } from "../leveling/levelEngine.js";
import type { ReactionPanelManager } from "../reactionRoles/manager.js";
import { EVERYONE, STAFF_ALIAS, nameKey, type ChannelTemplate } from "./configuration.js";
import type { OverhaulStateStore } from "./stateStore.js";
import {
  channelKey,
  type CategoryPlan,
  type KnownState,
  type ModulePayload,
  type PayloadOf,
  type Step,
} from "./types.js";

export interface OverhaulServices {
  levels: LevelEngine;
  panels: ReactionPanelManager;
  stateStore?: OverhaulStateStore;
  /** Drop per-guild store caches once the run has rewritten the guild */
  invalidateCaches?: (guildId: string) => void;
}

export interface StepContext {
  client: RemoteGuildClient;
  guildId: string;
  knownState: KnownState;
  repair: boolean;
  services: OverhaulServices;
  /** Names the finalize step expected but could not find */
  drift: string[];
  /** Remote call with retry and error classification */
  call<T>(label: string, fn: () => Promise<T>): Promise<T>;
}

export async function runStep(step: Step, ctx: StepContext): Promise<void> {
  const payload = step.payload;
  switch (payload.kind) {
    case "settings":
      return applySettings(payload, ctx);
    case "role-create":
      return createRoles(payload, ctx);
    case "role-order":
      return orderRoles(payload, ctx);
    case "structure-create":
      return createStructure(payload, ctx);
    case "leveling-setup":
      return setupLeveling(payload, ctx);
    case "module-setup":
      return setupModule(payload, ctx);
    case "finalize":
      return finalize(payload, ctx);
  }
}

// ===== settings =====

async function applySettings(payload: PayloadOf<"settings">, ctx: StepContext): Promise<void> {
  const wanted = payload.settings;
  if (ctx.repair) {
    const current = await ctx.call("getGuildSettings", () => ctx.client.getGuildSettings());
    if (
      current.name === wanted.name &&
      current.verificationLevel === wanted.verificationLevel &&
      current.contentFilter === wanted.contentFilter &&
      current.defaultNotifications === wanted.defaultNotifications
    ) {
      return;
    }
  }
  await ctx.call("updateGuildSettings", () => ctx.client.updateGuildSettings(wanted));
}

// ===== roles =====

function findRole(roles: readonly RemoteRole[], knownId: string | undefined, name: string): RemoteRole | undefined {
  const key = nameKey(name);
  return (knownId ? roles.find((r) => r.id === knownId) : undefined) ?? roles.find((r) => nameKey(r.name) === key);
}

async function createRoles(payload: PayloadOf<"role-create">, ctx: StepContext): Promise<void> {
  const existing = ctx.repair ? await ctx.call("listRoles", () => ctx.client.listRoles()) : [];
  for (const role of payload.roles) {
    const key = nameKey(role.name);
    const match = ctx.repair ? findRole(existing, ctx.knownState.roles[key], role.name) : undefined;
    if (match) {
      ctx.knownState.roles[key] = match.id;
      continue;
    }
    const created = await ctx.call("createRole", () =>
      ctx.client.createRole({
        name: role.name,
        color: role.color,
        hoist: role.hoist,
        mentionable: role.mentionable,
        permissions: role.permissions,
      })
    );
    ctx.knownState.roles[key] = created.id;
  }
}

/**
 * Our roles keep the set of position slots they already occupy; only the
 * assignment of roles to slots changes. Roles we do not own never move.
 */
async function orderRoles(payload: PayloadOf<"role-order">, ctx: StepContext): Promise<void> {
  const roles = await ctx.call("listRoles", () => ctx.client.listRoles());
  const ours = payload.order.map((name) => {
    const role = roles.find((r) => r.id === ctx.knownState.roles[nameKey(name)]);
    if (!role) throw new Error(`Role "${name}" is missing from the server`);
    return role;
  });

  const slots = ours.map((r) => r.position).sort((a, b) => b - a);
  if (ours.every((role, i) => role.position === slots[i])) return;

  await ctx.call("reorderRoles", () =>
    ctx.client.reorderRoles(ours.map((role, i) => ({ id: role.id, position: slots[i] })))
  );
}

// ===== overwrites =====

class OverwriteBuilder {
  private readonly entries = new Map<string, { allow: Set<PermissionsString>; deny: Set<PermissionsString> }>();

  constructor(base: readonly PermissionOverwrite[] = []) {
    for (const o of base) this.entries.set(o.id, { allow: new Set(o.allow), deny: new Set(o.deny) });
  }

  allow(ids: readonly string[], permission: PermissionsString): this {
    for (const id of ids) {
      const entry = this.entry(id);
      entry.deny.delete(permission);
      entry.allow.add(permission);
    }
    return this;
  }

  deny(ids: readonly string[], permission: PermissionsString): this {
    for (const id of ids) {
      const entry = this.entry(id);
      entry.allow.delete(permission);
      entry.deny.add(permission);
    }
    return this;
  }

  build(): PermissionOverwrite[] {
    return normalizeOverwrites(
      [...this.entries].map(([id, e]) => ({ id, type: "role" as const, allow: [...e.allow], deny: [...e.deny] }))
    );
  }

  private entry(id: string) {
    let entry = this.entries.get(id);
    if (!entry) {
      entry = { allow: new Set(), deny: new Set() };
      this.entries.set(id, entry);
    }
    return entry;
  }
}

/** Sorted, empty entries dropped; two equal sets normalise to equal arrays */
export function normalizeOverwrites(overwrites: readonly PermissionOverwrite[]): PermissionOverwrite[] {
  return overwrites
    .filter((o) => o.allow.length > 0 || o.deny.length > 0)
    .map((o) => ({ id: o.id, type: o.type, allow: [...o.allow].sort(), deny: [...o.deny].sort() }))
    .sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
}

export function sameOverwrites(a: readonly PermissionOverwrite[], b: readonly PermissionOverwrite[]): boolean {
  return JSON.stringify(normalizeOverwrites(a)) === JSON.stringify(normalizeOverwrites(b));
}

function roleIdFor(ctx: StepContext, name: string): string {
  if (nameKey(name) === nameKey(EVERYONE)) return ctx.guildId;
  const id = ctx.knownState.roles[nameKey(name)];
  if (!id) throw new Error(`Role "${name}" has no remote id; the roles step must run first`);
  return id;
}

function roleIds(ctx: StepContext, names: readonly string[], staffRoleNames: readonly string[]): string[] {
  return names.flatMap((name) =>
    nameKey(name) === STAFF_ALIAS ? staffRoleNames.map((s) => roleIdFor(ctx, s)) : [roleIdFor(ctx, name)]
  );
}

function categoryOverwrites(plan: CategoryPlan, ctx: StepContext): PermissionOverwrite[] {
  const builder = new OverwriteBuilder();
  for (const [name, visible] of Object.entries(plan.template.visibility)) {
    const ids = roleIds(ctx, [name], plan.staffRoleNames);
    if (visible) builder.allow(ids, "ViewChannel");
    else builder.deny(ids, "ViewChannel");
  }
  return builder.build();
}

/**
 * Channel overwrites start from the category's, then apply in order:
 * staffOnly, readOnly, tier gating. Later rules win on the same permission.
 */
function channelOverwrites(
  base: readonly PermissionOverwrite[],
  channel: ChannelTemplate,
  plan: Pick<CategoryPlan, "staffRoleNames" | "tierRoleNames">,
  ctx: StepContext
): PermissionOverwrite[] {
  const builder = new OverwriteBuilder(base);
  const everyone = [ctx.guildId];
  const staff = roleIds(ctx, plan.staffRoleNames, []);

  if (channel.staffOnly) {
    builder.deny(everyone, "ViewChannel").allow(staff, "ViewChannel");
  }
  if (channel.readOnly) {
    builder.deny(everyone, "SendMessages").allow(staff, "SendMessages");
  }
  if (channel.minimumTierToPost > 0) {
    const eligible = roleIds(ctx, plan.tierRoleNames.slice(channel.minimumTierToPost - 1), []);
    builder.deny(everyone, "SendMessages").allow([...eligible, ...staff], "SendMessages");
  }
  return builder.build();
}

// ===== structure =====

interface TreeSpec {
  name: string;
  overwrites: PermissionOverwrite[];
  channels: Array<{ template: ChannelTemplate; overwrites: PermissionOverwrite[] }>;
}

async function syncOverwrites(ctx: StepContext, channel: RemoteChannel, wanted: PermissionOverwrite[]): Promise<void> {
  if (sameOverwrites(channel.overwrites, wanted)) return;
  await ctx.call("setChannelOverwrites", () => ctx.client.setChannelOverwrites(channel.id, wanted));
}

/** Create (or in repair mode, find and align) one category and its channels. */
async function ensureTree(spec: TreeSpec, existing: readonly RemoteChannel[], ctx: StepContext): Promise<void> {
  const catKey = nameKey(spec.name);
  let categoryId: string;
  const knownCategory = ctx.knownState.categories[catKey];
  const category = ctx.repair
    ? (existing.find((c) => c.kind === "category" && c.id === knownCategory) ??
      existing.find((c) => c.kind === "category" && nameKey(c.name) === catKey))
    : undefined;

  if (category) {
    await syncOverwrites(ctx, category, spec.overwrites);
    categoryId = category.id;
  } else {
    const created = await ctx.call("createCategory", () =>
      ctx.client.createCategory({ name: spec.name, overwrites: spec.overwrites })
    );
    categoryId = created.id;
  }
  ctx.knownState.categories[catKey] = categoryId;

  for (const { template, overwrites } of spec.channels) {
    const key = channelKey(catKey, nameKey(template.name));
    const knownChannel = ctx.knownState.channels[key];
    const match = ctx.repair
      ? (existing.find((c) => c.id === knownChannel && c.kind === template.kind) ??
        existing.find(
          (c) => c.kind === template.kind && c.parentId === categoryId && nameKey(c.name) === nameKey(template.name)
        ))
      : undefined;

    if (match) {
      await syncOverwrites(ctx, match, overwrites);
      ctx.knownState.channels[key] = match.id;
      continue;
    }
    const created = await ctx.call("createChannel", () =>
      ctx.client.createChannel({
        name: template.name,
        kind: template.kind,
        parentId: categoryId,
        topic: template.topic,
        overwrites,
      })
    );
    ctx.knownState.channels[key] = created.id;
  }
}

async function freshChannels(ctx: StepContext): Promise<RemoteChannel[]> {
  return ctx.repair ? ctx.call("listChannels", () => ctx.client.listChannels()) : [];
}

async function createStructure(payload: PayloadOf<"structure-create">, ctx: StepContext): Promise<void> {
  const existing = await freshChannels(ctx);
  for (const plan of payload.categories) {
    const base = categoryOverwrites(plan, ctx);
    await ensureTree(
      {
        name: plan.template.name,
        overwrites: base,
        channels: plan.template.channels.map((template) => ({
          template,
          overwrites: channelOverwrites(base, template, plan, ctx),
        })),
      },
      existing,
      ctx
    );
  }
}

// ===== leveling =====

async function setupLeveling(payload: PayloadOf<"leveling-setup">, ctx: StepContext): Promise<void> {
  const levels = ctx.services.levels;
  const defs = levels.replaceTiers(ctx.guildId, payload.tiers);
  for (const def of defs) {
    levels.setRoleReward(ctx.guildId, def.tier, roleIdFor(ctx, def.roleName));
  }
}

// ===== modules =====

function findKnownChannel(ctx: StepContext, categoryName: string, channelName: string): string {
  const id = ctx.knownState.channels[channelKey(nameKey(categoryName), nameKey(channelName))];
  if (!id) throw new Error(`Channel "${categoryName}/${channelName}" has not been created`);
  return id;
}

async function setupModule(payload: ModulePayload, ctx: StepContext): Promise<void> {
  switch (payload.module) {
    case "reactionRoles": {
      const panels = ctx.services.panels;
      for (const entry of payload.section.entries) {
        panels.addEntry(ctx.guildId, {
          roleId: roleIdFor(ctx, entry.roleName),
          groupKey: entry.groupKey,
          label: entry.label,
          emoji: entry.emoji,
        });
      }
      const result = await panels.publish(ctx.guildId, { channelName: payload.section.channelName });
      ctx.knownState.messages["reaction-roles"] = result.messageId;
      return;
    }

    case "welcome": {
      const channelId = findKnownChannel(ctx, payload.categoryName, payload.section.channelName);
      const previous = ctx.knownState.messages.welcome;
      if (ctx.repair && previous) {
        const alive = await ctx.call("fetchMessage", () => ctx.client.fetchMessage(channelId, previous));
        if (alive) return;
      }
      const message = await ctx.call("createMessage", () =>
        ctx.client.createMessage(channelId, { content: payload.section.message })
      );
      ctx.knownState.messages.welcome = message.id;
      return;
    }

    case "vipLounge": {
      const { section, staffRoleNames, tierRoleNames } = payload;
      const existing = await freshChannels(ctx);
      const plan: CategoryPlan = {
        template: {
          name: section.categoryName,
          visibility: { [EVERYONE]: false, [section.roleName]: true, [STAFF_ALIAS]: true },
          channels: section.channels,
        },
        staffRoleNames,
        tierRoleNames,
      };
      const base = categoryOverwrites(plan, ctx);
      await ensureTree(
        {
          name: section.categoryName,
          overwrites: base,
          channels: section.channels.map((template) => ({
            template,
            overwrites: channelOverwrites(base, template, plan, ctx),
          })),
        },
        existing,
        ctx
      );
      return;
    }

    case "gaming": {
      const existing = await freshChannels(ctx);
      const staff = roleIds(ctx, payload.staffRoleNames, []);
      await ensureTree(
        {
          name: payload.section.categoryName,
          overwrites: [],
          channels: payload.channels.flatMap(({ roleName, channels }) =>
            channels.map((template) => ({
              template,
              overwrites: new OverwriteBuilder()
                .deny([ctx.guildId], "ViewChannel")
                .allow([roleIdFor(ctx, roleName), ...staff], "ViewChannel")
                .build(),
            }))
          ),
        },
        existing,
        ctx
      );
      return;
    }
  }
}

// ===== finalize =====

async function finalize(payload: PayloadOf<"finalize">, ctx: StepContext): Promise<void> {
  ctx.services.invalidateCaches?.(ctx.guildId);

  const channels = await ctx.call("listChannels", () => ctx.client.listChannels());
  const categoryIds = new Map<string, string>();
  for (const c of channels) {
    if (c.kind === "category") categoryIds.set(nameKey(c.name), c.id);
  }

  for (const name of payload.expectedCategories) {
    if (!categoryIds.has(nameKey(name))) ctx.drift.push(name);
  }
  for (const { category, channel } of payload.expectedChannels) {
    const parentId = categoryIds.get(nameKey(category));
    const wanted = nameKey(channel);
    const found = channels.some((c) => c.kind !== "category" && c.parentId === parentId && nameKey(c.name) === wanted);
    if (!parentId || !found) ctx.drift.push(`${category}/${channel}`);
  }

  logger.info(
    {
      evt: "overhaul_finalized",
      guildId: ctx.guildId,
      roles: Object.keys(ctx.knownState.roles).length,
      categories: Object.keys(ctx.knownState.categories).length,
      channels: Object.keys(ctx.knownState.channels).length,
      drift: ctx.drift,
    },
    ctx.drift.length === 0 ? "Overhaul structure verified" : `Overhaul finished with ${ctx.drift.length} missing item(s)`
  );
}

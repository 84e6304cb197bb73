// SPDX-License-Identifier: LicenseRef-ANW-1.0
/**
 * Guildforge — src/features/reactionRoles/panel.ts
 * WHAT: Pure layout for the self-assign role panel: pagination and the discord.js payload.
 * FLOWS:
 *  - buildPanelPages(entries) → one page per select menu, grouped by groupKey
 *  - renderPanel(pages) → embed + select rows + "Clear my roles" button
 * DOCS:
 *  - Select menus: https://discord.com/developers/docs/interactions/message-components#select-menus
 *  - Component limits (5 rows, 25 options): https://discord.com/developers/docs/interactions/message-components#action-rows
 */

import { createHash } from "node:crypto";
import {
  ActionRowBuilder,
  ButtonBuilder,
  ButtonStyle,
  EmbedBuilder,
  StringSelectMenuBuilder,
  StringSelectMenuOptionBuilder,
  parseEmoji,
} from "discord.js";
import { ValidationError } from "../../lib/errors.js";
import type { MessagePayload } from "../../remote/types.js";
import type { ReactionRoleEntry } from "./store.js";

/** Discord caps a select menu at 25 options */
export const SELECT_MAX_OPTIONS = 25;
/** Five action rows per message, one taken by the clear button */
export const PANEL_MAX_SELECT_ROWS = 4;

export const CLEAR_BUTTON_ID = "rr:clear";
const SELECT_PREFIX = "rr:select:";

export interface PanelOption {
  roleId: string;
  label: string;
  emoji: string | null;
}

export interface PanelPage {
  groupKey: string;
  /** 1-based */
  page: number;
  pageCount: number;
  title: string;
  customId: string;
  options: PanelOption[];
}

/** "games" → "Games", "pc_games" → "Pc Games" */
export function groupTitle(groupKey: string): string {
  return groupKey
    .split(/[_-]+/)
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(" ");
}

export function selectCustomId(groupKey: string, page: number): string {
  return `${SELECT_PREFIX}${groupKey}:${page}`;
}

export function parseSelectCustomId(customId: string): { groupKey: string; page: number } | null {
  const match = /^rr:select:([a-z0-9_-]{1,32}):(\d+)$/.exec(customId);
  if (!match) return null;
  return { groupKey: match[1], page: Number(match[2]) };
}

/** Page size actually used for a requested one: whole, at least 1, at most a full menu */
export function effectivePageSize(pageSize: number = SELECT_MAX_OPTIONS): number {
  return Math.min(Math.max(1, Math.floor(pageSize)), SELECT_MAX_OPTIONS);
}

/** Select menus a panel needs for the given group sizes */
export function selectMenusNeeded(groupSizes: Iterable<number>, pageSize?: number): number {
  const size = effectivePageSize(pageSize);
  let menus = 0;
  for (const count of groupSizes) menus += Math.ceil(count / size);
  return menus;
}

/**
 * Enabled entries grouped by groupKey (groups in order of first appearance,
 * entries by orderIndex), each group split into pages of `pageSize`.
 * `roleNames` supplies a fallback label for entries without one.
 */
export function buildPanelPages(
  entries: readonly ReactionRoleEntry[],
  pageSize = SELECT_MAX_OPTIONS,
  roleNames: ReadonlyMap<string, string> = new Map()
): PanelPage[] {
  const size = effectivePageSize(pageSize);
  const groups = new Map<string, PanelOption[]>();

  const ordered = entries.filter((e) => e.enabled).sort((a, b) => a.orderIndex - b.orderIndex);
  for (const entry of ordered) {
    const options = groups.get(entry.groupKey) ?? [];
    options.push({
      roleId: entry.roleId,
      label: entry.label ?? roleNames.get(entry.roleId) ?? entry.roleId,
      emoji: entry.emoji,
    });
    groups.set(entry.groupKey, options);
  }

  const pages: PanelPage[] = [];
  for (const [groupKey, options] of groups) {
    const pageCount = Math.ceil(options.length / size);
    for (let page = 1; page <= pageCount; page++) {
      const base = groupTitle(groupKey);
      pages.push({
        groupKey,
        page,
        pageCount,
        title: pageCount > 1 ? `${base} (${page}/${pageCount})` : base,
        customId: selectCustomId(groupKey, page),
        options: options.slice((page - 1) * size, page * size),
      });
    }
  }
  return pages;
}

export interface RenderPanelOptions {
  title?: string;
  description?: string;
}

export function renderPanel(pages: readonly PanelPage[], options: RenderPanelOptions = {}): MessagePayload {
  if (pages.length > PANEL_MAX_SELECT_ROWS) {
    throw new ValidationError([
      {
        path: "reactionRoles.entries",
        message: `Panel needs ${pages.length} menus; at most ${PANEL_MAX_SELECT_ROWS} fit in one message`,
      },
    ]);
  }

  const embed = new EmbedBuilder()
    .setTitle(options.title ?? "Pick your roles")
    .setDescription(
      options.description ??
        (pages.length === 0
          ? "No roles are available right now."
          : "Choose roles from the menus below. Deselect an option to drop that role.")
    )
    .setColor(0x5865f2);

  const selectRows = pages.map((page) => {
    const menu = new StringSelectMenuBuilder()
      .setCustomId(page.customId)
      .setPlaceholder(page.title)
      .setMinValues(0)
      .setMaxValues(page.options.length)
      .addOptions(
        page.options.map((option) => {
          const built = new StringSelectMenuOptionBuilder().setLabel(option.label).setValue(option.roleId);
          const emoji = option.emoji ? parseEmoji(option.emoji) : null;
          if (emoji) built.setEmoji({ id: emoji.id, name: emoji.name, animated: emoji.animated });
          return built;
        })
      );
    return new ActionRowBuilder<StringSelectMenuBuilder>().addComponents(menu).toJSON();
  });

  const clearRow = new ActionRowBuilder<ButtonBuilder>()
    .addComponents(
      new ButtonBuilder().setCustomId(CLEAR_BUTTON_ID).setLabel("Clear my roles").setStyle(ButtonStyle.Secondary)
    )
    .toJSON();

  return { embeds: [embed.toJSON()], components: [...selectRows, clearRow] };
}

/** Stable digest of a rendered payload; an unchanged panel is not re-sent. */
export function panelContentHash(payload: MessagePayload): string {
  return createHash("sha256").update(JSON.stringify(payload)).digest("hex");
}

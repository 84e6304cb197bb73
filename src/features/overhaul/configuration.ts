/**
 * Guildforge — src/features/overhaul/configuration.ts
 * WHAT: The declarative end-state of a guild, its zod schema and every cross-field invariant.
 * FLOWS:
 *  - validateConfiguration(input, checks?) → { ok, config } | { ok: false, errors } (never throws)
 *  - requireValidConfiguration(input, checks?) → config or ValidationError
 *  - parseFeatureFlags("leveling, reaction_roles") → ["leveling", "reactionRoles"]
 *  - loadDefaultConfiguration() → stock community template from config/defaultTemplate.json
 * DOCS:
 *  - zod superRefine: https://zod.dev/?id=superrefine
 *  - Guild limits: https://discord.com/developers/docs/topics/permissions#role-object
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { createHash } from "node:crypto";
import { readFileSync } from "node:fs";
import { PermissionFlagsBits, type PermissionsString } from "discord.js";
import { z } from "zod";
import { ValidationError, type ValidationIssue } from "../../lib/errors.js";
import { PANEL_MAX_SELECT_ROWS, selectMenusNeeded } from "../reactionRoles/panel.js";

// ===== Feature flags =====

/** Declaration order is also the module-setup order for the optional modules. */
export const FEATURES = ["leveling", "reactionRoles", "welcome", "vipLounge", "gaming"] as const;
export type Feature = (typeof FEATURES)[number];

export const MODULE_FEATURES = ["reactionRoles", "welcome", "vipLounge", "gaming"] as const;
export type ModuleFeature = (typeof MODULE_FEATURES)[number];

export const PLATFORM_LIMITS = {
  roles: 250,
  channels: 500,
  channelsPerCategory: 50,
} as const;

/** Visibility keys that are not role names */
export const EVERYONE = "@everyone";
export const STAFF_ALIAS = "staff";

/**
 * Comparison key for every name in the system: NFC, case-insensitive, and blind
 * to the space/hyphen difference Discord introduces when it slugs text channels.
 */
export function nameKey(name: string): string {
  return name.normalize("NFC").trim().toLowerCase().replace(/[\s-]+/g, "-");
}

// ===== Schema =====

const nameSchema = z.string().trim().min(1).max(100);

const permissionSchema = z.custom<PermissionsString>(
  (value) => typeof value === "string" && Object.hasOwn(PermissionFlagsBits, value),
  { message: "Unknown permission name" }
);

const colorSchema = z
  .union([
    z.number().int().min(0).max(0xffffff),
    z
      .string()
      .regex(/^#[0-9a-fA-F]{6}$/, "Expected #RRGGBB")
      .transform((hex) => Number.parseInt(hex.slice(1), 16)),
  ])
  .default(0);

const roleTemplateSchema = z.object({
  name: nameSchema,
  color: colorSchema,
  hoist: z.boolean().default(false),
  mentionable: z.boolean().default(false),
  protected: z.boolean().default(false),
  permissions: z.array(permissionSchema).default([]),
});

const channelTemplateSchema = z.object({
  name: nameSchema,
  kind: z.enum(["text", "voice", "announcement"]).default("text"),
  minimumTierToPost: z.number().int().min(0).default(0),
  readOnly: z.boolean().default(false),
  staffOnly: z.boolean().default(false),
  topic: z.string().max(1024).optional(),
});

const categoryTemplateSchema = z.object({
  name: nameSchema,
  visibility: z.record(z.string(), z.boolean()).default({}),
  channels: z.array(channelTemplateSchema).default([]),
});

const featureSchema = z.enum(FEATURES);

const tierTemplateSchema = z.object({
  threshold: z.number().int().min(0),
  roleName: nameSchema,
  capabilities: z.array(z.string().min(1)).default([]),
});

const baseSchema = z.object({
  identity: z.object({
    name: z.string().trim().min(2).max(100),
    verificationLevel: z.enum(["none", "low", "medium", "high", "very_high"]).default("medium"),
    contentFilter: z.enum(["disabled", "members_without_roles", "all_members"]).default("all_members"),
    defaultNotifications: z.enum(["all_messages", "only_mentions"]).default("only_mentions"),
  }),
  roleTemplates: z.array(roleTemplateSchema).min(1),
  categoryTemplates: z.array(categoryTemplateSchema).default([]),
  // Deduplicated into canonical order
  features: z.array(featureSchema).default([]).transform((list) => FEATURES.filter((f) => list.includes(f))),
  safety: z
    .object({
      preserveStaffRoles: z.boolean().default(true),
      backupRequired: z.boolean().default(false),
    })
    .default({}),
  leveling: z.object({ tiers: z.array(tierTemplateSchema).min(1) }).optional(),
  reactionRoles: z
    .object({
      channelName: nameSchema,
      entries: z
        .array(
          z.object({
            roleName: nameSchema,
            groupKey: z.string().regex(/^[a-z0-9_-]{1,32}$/, "Use 1-32 chars of a-z, 0-9, _ or -"),
            label: z.string().min(1).max(100).optional(),
            emoji: z.string().min(1).max(64).optional(),
          })
        )
        .min(1),
    })
    .optional(),
  welcome: z
    .object({
      channelName: nameSchema,
      /** Picks the category when several declare a text channel with this name */
      categoryName: nameSchema.optional(),
      message: z.string().min(1).max(2000),
    })
    .optional(),
  vipLounge: z
    .object({
      categoryName: nameSchema,
      roleName: nameSchema,
      channels: z.array(channelTemplateSchema).min(1),
    })
    .optional(),
  gaming: z
    .object({
      categoryName: nameSchema,
      games: z.array(z.object({ name: nameSchema, roleName: nameSchema })).min(1),
    })
    .optional(),
});

type BaseConfig = z.infer<typeof baseSchema>;

export type RoleTemplate = z.infer<typeof roleTemplateSchema>;
export type ChannelTemplate = z.infer<typeof channelTemplateSchema>;
export type CategoryTemplate = z.infer<typeof categoryTemplateSchema>;
export type TierTemplate = z.infer<typeof tierTemplateSchema>;

// ===== Derived views =====

export type RoleSource = "template" | "tier" | "feature";

export interface DeclaredRole {
  name: string;
  source: RoleSource;
  path: string;
  color: number;
  hoist: boolean;
  mentionable: boolean;
  protected: boolean;
  permissions: PermissionsString[];
}

/**
 * Every role the overhaul creates, in creation order: templates as declared,
 * then tier roles, then roles owned by enabled feature modules.
 */
export function declaredRoles(config: BaseConfig): DeclaredRole[] {
  const roles: DeclaredRole[] = config.roleTemplates.map((t, i) => ({
    name: t.name,
    source: "template",
    path: `roleTemplates.${i}.name`,
    color: t.color,
    hoist: t.hoist,
    mentionable: t.mentionable,
    protected: t.protected,
    permissions: t.permissions,
  }));

  if (config.features.includes("leveling") && config.leveling) {
    config.leveling.tiers.forEach((tier, i) => {
      roles.push({
        name: tier.roleName,
        source: "tier",
        path: `leveling.tiers.${i}.roleName`,
        color: 0,
        hoist: true,
        mentionable: false,
        protected: false,
        permissions: [],
      });
    });
  }

  if (config.features.includes("gaming") && config.gaming) {
    config.gaming.games.forEach((game, i) => {
      roles.push({
        name: game.roleName,
        source: "feature",
        path: `gaming.games.${i}.roleName`,
        color: 0,
        hoist: false,
        mentionable: true,
        protected: false,
        permissions: [],
      });
    });
  }

  return roles;
}

export interface DeclaredCategory {
  name: string;
  path: string;
  channels: ChannelTemplate[];
  channelPath: string;
}

/** Category templates as declared, then the categories enabled modules own */
export function declaredCategories(config: BaseConfig): DeclaredCategory[] {
  const categories: DeclaredCategory[] = config.categoryTemplates.map((c, i) => ({
    name: c.name,
    path: `categoryTemplates.${i}.name`,
    channels: c.channels,
    channelPath: `categoryTemplates.${i}.channels`,
  }));
  if (config.features.includes("vipLounge") && config.vipLounge) {
    categories.push({
      name: config.vipLounge.categoryName,
      path: "vipLounge.categoryName",
      channels: config.vipLounge.channels,
      channelPath: "vipLounge.channels",
    });
  }
  if (config.features.includes("gaming") && config.gaming) {
    categories.push({
      name: config.gaming.categoryName,
      path: "gaming.categoryName",
      channels: config.gaming.games.flatMap((g) => gameChannels(g.name)),
      channelPath: "gaming.games",
    });
  }
  return categories;
}

/** Names of the categories declaring a message-capable channel called channelName */
export function textChannelHomes(
  categories: readonly DeclaredCategory[],
  channelName: string,
  categoryName?: string
): string[] {
  const target = nameKey(channelName);
  return categories
    .filter((c) => categoryName === undefined || nameKey(c.name) === nameKey(categoryName))
    .filter((c) => c.channels.some((ch) => ch.kind !== "voice" && nameKey(ch.name) === target))
    .map((c) => c.name);
}

export function enabledModules(config: BaseConfig): ModuleFeature[] {
  return MODULE_FEATURES.filter((m) => config.features.includes(m));
}

/** Text and voice channel generated per game */
export function gameChannels(gameName: string): ChannelTemplate[] {
  const slug = nameKey(gameName);
  return [
    { name: `${slug}-chat`, kind: "text", minimumTierToPost: 0, readOnly: false, staffOnly: false },
    { name: `${slug}-voice`, kind: "voice", minimumTierToPost: 0, readOnly: false, staffOnly: false },
  ];
}

// ===== Invariants =====

/** Run-time settings some invariants depend on */
export interface ValidationChecks {
  /** Options per select menu the panel manager will use; defaults to a full menu */
  panelPageSize?: number;
}

function checkInvariants(config: BaseConfig, ctx: z.RefinementCtx, checks: ValidationChecks = {}): void {
  const issue = (path: string, message: string) =>
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: path.split("."), message });
  const enabled = (f: Feature) => config.features.includes(f);

  // Enabled features carry their section
  for (const feature of FEATURES) {
    if (enabled(feature) && !config[feature]) {
      issue(feature, `Section "${feature}" is required when the feature is enabled`);
    }
  }

  // Role names: unique across templates, tier roles and feature roles
  const roles = declaredRoles(config);
  const roleSeen = new Map<string, string>();
  for (const role of roles) {
    const key = nameKey(role.name);
    if (key === nameKey(EVERYONE) || key === STAFF_ALIAS) {
      issue(role.path, `"${role.name}" is reserved`);
      continue;
    }
    const first = roleSeen.get(key);
    if (first) {
      issue(role.path, `Duplicate role name "${role.name}" (first declared at ${first})`);
    } else {
      roleSeen.set(key, role.path);
    }
  }
  if (roles.length > PLATFORM_LIMITS.roles) {
    issue("roleTemplates", `${roles.length} roles exceed the platform limit of ${PLATFORM_LIMITS.roles}`);
  }

  // Tier thresholds strictly increase
  config.leveling?.tiers.forEach((tier, i, tiers) => {
    if (i > 0 && tier.threshold <= tiers[i - 1].threshold) {
      issue(
        `leveling.tiers.${i}.threshold`,
        `Threshold ${tier.threshold} must be greater than ${tiers[i - 1].threshold}`
      );
    }
  });

  // Categories and channels
  const categories = declaredCategories(config);

  const tierCount = enabled("leveling") ? (config.leveling?.tiers.length ?? 0) : 0;
  const categorySeen = new Set<string>();
  let channelTotal = 0;
  for (const category of categories) {
    const key = nameKey(category.name);
    if (categorySeen.has(key)) {
      issue(category.path, `Duplicate category name "${category.name}"`);
    }
    categorySeen.add(key);

    channelTotal += 1 + category.channels.length;
    if (category.channels.length > PLATFORM_LIMITS.channelsPerCategory) {
      issue(
        category.channelPath,
        `${category.channels.length} channels exceed the per-category limit of ${PLATFORM_LIMITS.channelsPerCategory}`
      );
    }

    const channelSeen = new Set<string>();
    category.channels.forEach((channel, j) => {
      const channelKey = nameKey(channel.name);
      if (channelSeen.has(channelKey)) {
        issue(`${category.channelPath}.${j}.name`, `Duplicate channel "${channel.name}" in "${category.name}"`);
      }
      channelSeen.add(channelKey);

      if (channel.minimumTierToPost > 0) {
        if (!enabled("leveling")) {
          issue(`${category.channelPath}.${j}.minimumTierToPost`, "Tier gating requires the leveling feature");
        } else if (channel.minimumTierToPost > tierCount) {
          issue(
            `${category.channelPath}.${j}.minimumTierToPost`,
            `Tier ${channel.minimumTierToPost} does not exist (${tierCount} tiers declared)`
          );
        }
      }
    });
  }
  if (channelTotal > PLATFORM_LIMITS.channels) {
    issue("categoryTemplates", `${channelTotal} channels exceed the platform limit of ${PLATFORM_LIMITS.channels}`);
  }

  // Role references resolve to declared roles
  config.categoryTemplates.forEach((category, i) => {
    for (const roleName of Object.keys(category.visibility)) {
      const key = nameKey(roleName);
      if (key !== nameKey(EVERYONE) && key !== STAFF_ALIAS && !roleSeen.has(key)) {
        issue(`categoryTemplates.${i}.visibility`, `Unknown role "${roleName}"`);
      }
    }
  });

  if (enabled("reactionRoles") && config.reactionRoles) {
    const entrySeen = new Set<string>();
    const groupSizes = new Map<string, number>();
    config.reactionRoles.entries.forEach((entry, i) => {
      const key = nameKey(entry.roleName);
      if (!roleSeen.has(key)) {
        issue(`reactionRoles.entries.${i}.roleName`, `Unknown role "${entry.roleName}"`);
      }
      if (entrySeen.has(key)) {
        issue(`reactionRoles.entries.${i}.roleName`, `Role "${entry.roleName}" is listed twice`);
      }
      entrySeen.add(key);
      groupSizes.set(entry.groupKey, (groupSizes.get(entry.groupKey) ?? 0) + 1);
    });

    const pages = selectMenusNeeded(groupSizes.values(), checks.panelPageSize);
    if (pages > PANEL_MAX_SELECT_ROWS) {
      issue("reactionRoles.entries", `Panel needs ${pages} select menus; at most ${PANEL_MAX_SELECT_ROWS} fit`);
    }
  }

  if (enabled("vipLounge") && config.vipLounge && !roleSeen.has(nameKey(config.vipLounge.roleName))) {
    issue("vipLounge.roleName", `Unknown role "${config.vipLounge.roleName}"`);
  }

  if (enabled("welcome") && config.welcome) {
    const { channelName, categoryName } = config.welcome;
    const homes = textChannelHomes(categories, channelName, categoryName);
    if (homes.length === 0) {
      const where = categoryName === undefined ? "" : ` in "${categoryName}"`;
      issue("welcome.channelName", `No text channel named "${channelName}" is declared${where}`);
    } else if (homes.length > 1) {
      issue(
        "welcome.categoryName",
        `Text channel "${channelName}" is declared in ${homes.map((h) => `"${h}"`).join(", ")}; pick one`
      );
    }
  }
}

export const overhaulConfigSchema = baseSchema.superRefine((config, ctx) => checkInvariants(config, ctx));

export type OverhaulConfig = z.infer<typeof overhaulConfigSchema>;
export type OverhaulConfigInput = z.input<typeof overhaulConfigSchema>;

// ===== Entry points =====

export type ValidationResult =
  | { ok: true; config: OverhaulConfig }
  | { ok: false; errors: ValidationIssue[] };

export function validateConfiguration(input: unknown, checks: ValidationChecks = {}): ValidationResult {
  const schema =
    checks.panelPageSize === undefined
      ? overhaulConfigSchema
      : baseSchema.superRefine((config, ctx) => checkInvariants(config, ctx, checks));
  const parsed = schema.safeParse(input);
  if (parsed.success) return { ok: true, config: parsed.data };
  return {
    ok: false,
    errors: parsed.error.issues.map((i) => ({ path: i.path.join("."), message: i.message })),
  };
}

export function requireValidConfiguration(input: unknown, checks: ValidationChecks = {}): OverhaulConfig {
  const result = validateConfiguration(input, checks);
  if (!result.ok) throw new ValidationError(result.errors);
  return result.config;
}

/**
 * Free text → closed feature set. Accepts snake_case, kebab-case and camelCase,
 * separated by commas or whitespace. Unknown names fail here, not at run time.
 */
export function parseFeatureFlags(text: string): Feature[] {
  const tokens = text.split(/[,\s]+/).filter(Boolean);
  const byKey = new Map<string, Feature>(FEATURES.map((f) => [f.toLowerCase(), f]));
  const found = new Set<Feature>();
  const issues: ValidationIssue[] = [];

  tokens.forEach((token, i) => {
    const feature = byKey.get(token.toLowerCase().replace(/[-_]/g, ""));
    if (feature) {
      found.add(feature);
    } else {
      issues.push({ path: `features.${i}`, message: `Unknown feature "${token}"` });
    }
  });

  if (issues.length > 0) throw new ValidationError(issues);
  return FEATURES.filter((f) => found.has(f));
}

const DEFAULT_TEMPLATE_URL = new URL("../../../config/defaultTemplate.json", import.meta.url);

export function loadDefaultConfiguration(): OverhaulConfig {
  const raw: unknown = JSON.parse(readFileSync(DEFAULT_TEMPLATE_URL, "utf8"));
  return requireValidConfiguration(raw);
}

/** Stable hash a confirmation token is bound to */
export function configFingerprint(config: OverhaulConfig): string {
  return createHash("sha256").update(JSON.stringify(config)).digest("hex");
}

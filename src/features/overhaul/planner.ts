/**
 * Guildforge — src/features/overhaul/planner.ts
 * WHAT: Expands a configuration into the ordered step list of one overhaul run.
 * FLOWS: plan(config) → validate → draft steps in fixed precedence → orderSteps (Kahn)
 *
 * Precedence: settings, roles, hierarchy, structure, leveling, one step per enabled
 * module (reactionRoles, welcome, vipLounge, gaming), finalize. Disabled features
 * produce no step at all, so the step count is the progress denominator.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import {
  declaredCategories,
  declaredRoles,
  enabledModules,
  gameChannels,
  requireValidConfiguration,
  textChannelHomes,
  type ModuleFeature,
  type OverhaulConfig,
  type ValidationChecks,
} from "./configuration.js";
import type { ChannelRef, ModulePayload, Step, StepKind, StepPayload } from "./types.js";

/** settings, roles, hierarchy, structure, finalize */
export const BASE_STEP_COUNT = 5;

const MODULE_LABELS: Record<ModuleFeature, string> = {
  reactionRoles: "Publishing reaction-role panel",
  welcome: "Posting welcome message",
  vipLounge: "Building VIP lounge",
  gaming: "Setting up game spaces",
};

interface StepDraft {
  id: string;
  kind: StepKind;
  label: string;
  dependsOn: string[];
  payload: StepPayload;
}

function modulePayload(config: OverhaulConfig, module: ModuleFeature, staff: string[], tiers: string[]): ModulePayload {
  // Sections are guaranteed by validation for every enabled module
  switch (module) {
    case "reactionRoles":
      if (!config.reactionRoles) break;
      return { module, section: config.reactionRoles };
    case "welcome": {
      if (!config.welcome) break;
      const { channelName, categoryName } = config.welcome;
      const [home] = textChannelHomes(declaredCategories(config), channelName, categoryName);
      if (home === undefined) break;
      return { module, section: config.welcome, categoryName: home };
    }
    case "vipLounge":
      if (!config.vipLounge) break;
      return { module, section: config.vipLounge, staffRoleNames: staff, tierRoleNames: tiers };
    case "gaming":
      if (!config.gaming) break;
      return {
        module,
        section: config.gaming,
        channels: config.gaming.games.map((g) => ({ roleName: g.roleName, channels: gameChannels(g.name) })),
        staffRoleNames: staff,
      };
  }
  throw new Error(`Module "${module}" is enabled without its section`);
}

/**
 * Topological order with declaration order as the tie-break (Kahn's algorithm).
 * Throws on unknown dependencies, duplicate ids or cycles.
 */
export function orderSteps<T extends { id: string; dependsOn: string[] }>(steps: T[]): T[] {
  const indexById = new Map<string, number>();
  steps.forEach((step, i) => {
    if (indexById.has(step.id)) throw new Error(`Duplicate step id "${step.id}"`);
    indexById.set(step.id, i);
  });

  const indegree = steps.map(() => 0);
  const dependents: number[][] = steps.map(() => []);
  steps.forEach((step, i) => {
    for (const dep of step.dependsOn) {
      const from = indexById.get(dep);
      if (from === undefined) throw new Error(`Step "${step.id}" depends on unknown step "${dep}"`);
      dependents[from].push(i);
      indegree[i]++;
    }
  });

  const ready = steps.flatMap((_, i) => (indegree[i] === 0 ? [i] : []));
  const ordered: T[] = [];
  while (ready.length > 0) {
    // Lowest declaration index first keeps the order stable
    ready.sort((a, b) => a - b);
    const next = ready.shift();
    if (next === undefined) break;
    ordered.push(steps[next]);
    for (const dependent of dependents[next]) {
      indegree[dependent]--;
      if (indegree[dependent] === 0) ready.push(dependent);
    }
  }

  if (ordered.length !== steps.length) {
    const stuck = steps.filter((s) => !ordered.includes(s)).map((s) => s.id);
    throw new Error(`Step dependency cycle among: ${stuck.join(", ")}`);
  }
  return ordered;
}

export function plan(input: unknown, checks: ValidationChecks = {}): Step[] {
  const config = requireValidConfiguration(input, checks);
  const roles = declaredRoles(config);
  const staffRoleNames = roles.filter((r) => r.protected).map((r) => r.name);
  const levelingEnabled = config.features.includes("leveling");
  const tierRoleNames = levelingEnabled ? roles.filter((r) => r.source === "tier").map((r) => r.name) : [];

  const drafts: StepDraft[] = [
    {
      id: "settings",
      kind: "settings",
      label: "Applying server settings",
      dependsOn: [],
      payload: { kind: "settings", settings: config.identity },
    },
    {
      id: "roles",
      kind: "role-create",
      label: `Creating ${roles.length} roles`,
      dependsOn: [],
      payload: { kind: "role-create", roles },
    },
    {
      id: "hierarchy",
      kind: "role-order",
      label: "Ordering role hierarchy",
      dependsOn: ["roles"],
      payload: {
        kind: "role-order",
        // Staff roles keep their current slots when they are preserved
        order: roles.filter((r) => !(config.safety.preserveStaffRoles && r.protected)).map((r) => r.name),
      },
    },
    {
      id: "structure",
      kind: "structure-create",
      label: "Creating categories and channels",
      dependsOn: ["roles"],
      payload: {
        kind: "structure-create",
        categories: config.categoryTemplates.map((template) => ({ template, staffRoleNames, tierRoleNames })),
      },
    },
  ];

  if (levelingEnabled && config.leveling) {
    drafts.push({
      id: "leveling",
      kind: "leveling-setup",
      label: "Configuring leveling tiers",
      dependsOn: ["roles"],
      payload: { kind: "leveling-setup", tiers: config.leveling.tiers },
    });
  }

  for (const module of enabledModules(config)) {
    drafts.push({
      id: `module:${module}`,
      kind: "module-setup",
      label: MODULE_LABELS[module],
      dependsOn: module === "reactionRoles" || module === "welcome" ? ["roles", "structure"] : ["roles"],
      payload: { kind: "module-setup", ...modulePayload(config, module, staffRoleNames, tierRoleNames) },
    });
  }

  const categories = declaredCategories(config);
  const expectedCategories = categories.map((c) => c.name);
  const expectedChannels = categories.flatMap((c) =>
    c.channels.map((ch): ChannelRef => ({ category: c.name, channel: ch.name }))
  );

  drafts.push({
    id: "finalize",
    kind: "finalize",
    label: "Finalizing",
    dependsOn: drafts.map((d) => d.id),
    payload: { kind: "finalize", expectedCategories, expectedChannels },
  });

  return orderSteps(drafts).map((draft): Step => ({ ...draft, status: "pending" }));
}

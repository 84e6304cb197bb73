/**
 * Guildforge — src/features/overhaul/types.ts
 * WHAT: Step, run state and run result shapes shared by planner, executor and reporter.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { GuildSettings } from "../../remote/types.js";
import type {
  CategoryTemplate,
  ChannelTemplate,
  DeclaredRole,
  OverhaulConfig,
  TierTemplate,
} from "./configuration.js";

export type StepKind =
  | "settings"
  | "role-create"
  | "role-order"
  | "structure-create"
  | "leveling-setup"
  | "module-setup"
  | "finalize";

export type StepStatus = "pending" | "running" | "succeeded" | "failed" | "skipped";

/** Category with the staff role names the "staff" visibility alias expands to */
export interface CategoryPlan {
  template: CategoryTemplate;
  staffRoleNames: string[];
  /** Tier role names in ordinal order; tier gating grants SendMessages from here */
  tierRoleNames: string[];
}

export type ModulePayload =
  | { module: "reactionRoles"; section: NonNullable<OverhaulConfig["reactionRoles"]> }
  /** categoryName is the category holding the welcome channel */
  | { module: "welcome"; section: NonNullable<OverhaulConfig["welcome"]>; categoryName: string }
  | {
      module: "vipLounge";
      section: NonNullable<OverhaulConfig["vipLounge"]>;
      staffRoleNames: string[];
      tierRoleNames: string[];
    }
  | {
      module: "gaming";
      section: NonNullable<OverhaulConfig["gaming"]>;
      channels: Array<{ roleName: string; channels: ChannelTemplate[] }>;
      staffRoleNames: string[];
    };

export interface ChannelRef {
  category: string;
  channel: string;
}

export type StepPayload =
  | { kind: "settings"; settings: GuildSettings }
  | { kind: "role-create"; roles: DeclaredRole[] }
  /** Role names, top of the hierarchy first */
  | { kind: "role-order"; order: string[] }
  | { kind: "structure-create"; categories: CategoryPlan[] }
  | { kind: "leveling-setup"; tiers: TierTemplate[] }
  | ({ kind: "module-setup" } & ModulePayload)
  | { kind: "finalize"; expectedCategories: string[]; expectedChannels: ChannelRef[] };

export interface Step {
  /** Stable: settings, roles, hierarchy, structure, leveling, module:<name>, finalize */
  id: string;
  kind: StepKind;
  label: string;
  dependsOn: string[];
  payload: StepPayload;
  status: StepStatus;
  /** Verbatim failure message once Failed */
  error?: string;
}

/** Narrow a Step to the payload of one kind */
export type PayloadOf<K extends StepKind> = Extract<StepPayload, { kind: K }>;

/**
 * Last-known remote identifiers, keyed by nameKey() of the template name.
 * Channels are keyed "<category>/<channel>". Messages: "welcome", "reaction-roles".
 */
export interface KnownState {
  roles: Record<string, string>;
  categories: Record<string, string>;
  channels: Record<string, string>;
  messages: Record<string, string>;
}

export type KnownStateKind = "role" | "category" | "channel" | "message";

export function emptyKnownState(): KnownState {
  return { roles: {}, categories: {}, channels: {}, messages: {} };
}

export function channelKey(categoryKey: string, channelNameKey: string): string {
  return `${categoryKey}/${channelNameKey}`;
}

export type RunStatus = "running" | "completed" | "failed" | "cancelled";

export interface ProgressState {
  status: RunStatus;
  /** Steps finished so far; the numerator of the percentage */
  currentStepIndex: number;
  totalSteps: number;
  stepLabel: string;
  startedAt: number;
  lastError: string | null;
  cancelled: boolean;
}

export interface FailedStep {
  id: string;
  kind: StepKind;
  /** 1-based position in the run */
  index: number;
  error: string;
}

export interface RunResult {
  status: Exclude<RunStatus, "running">;
  completedSteps: number;
  totalSteps: number;
  failedStep?: FailedStep;
  cancelled: boolean;
  knownState: KnownState;
  steps: Step[];
  /** Names finalize expected but did not find remotely */
  drift: string[];
}

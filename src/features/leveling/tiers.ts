/**
 * Guildforge — src/features/leveling/tiers.ts
 * WHAT: XP → tier derivation.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { ValidationError, type ValidationIssue } from "../../lib/errors.js";

export interface TierInput {
  threshold: number;
  roleName: string;
  capabilities?: string[];
}

export interface TierDefinition {
  /** 1-based ordinal; 0 means "no tier yet" everywhere else */
  tier: number;
  threshold: number;
  roleName: string;
  capabilities: string[];
}

/**
 * Highest tier ordinal whose threshold is <= xp, or 0. Tiers are sorted by
 * strictly increasing threshold, so the scan stops at the first miss.
 */
export function tierForXp(tiers: ReadonlyArray<{ threshold: number }>, xp: number): number {
  let tier = 0;
  for (let i = 0; i < tiers.length; i++) {
    if (tiers[i].threshold > xp) break;
    tier = i + 1;
  }
  return tier;
}

export function validateTiers(tiers: readonly TierInput[]): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  tiers.forEach((tier, i) => {
    if (!Number.isInteger(tier.threshold) || tier.threshold < 0) {
      issues.push({ path: `tiers.${i}.threshold`, message: "Threshold must be a non-negative integer" });
    }
    if (!tier.roleName.trim()) {
      issues.push({ path: `tiers.${i}.roleName`, message: "Role name is required" });
    }
    if (i > 0 && tier.threshold <= tiers[i - 1].threshold) {
      issues.push({
        path: `tiers.${i}.threshold`,
        message: `Threshold ${tier.threshold} must be greater than ${tiers[i - 1].threshold}`,
      });
    }
  });
  return issues;
}

/** Validate and assign ordinals. Throws ValidationError. */
export function toTierDefinitions(tiers: readonly TierInput[]): TierDefinition[] {
  const issues = validateTiers(tiers);
  if (issues.length > 0) throw new ValidationError(issues);
  return tiers.map((t, i) => ({
    tier: i + 1,
    threshold: t.threshold,
    roleName: t.roleName.trim(),
    capabilities: t.capabilities ?? [],
  }));
}

/**
 * Guildforge — src/lib/env.ts
 * WHAT: Environment loading/validation via dotenv + zod.
 * FLOWS: load .env → parse/validate → export typed env object
 * DOCS:
 *  - zod coercion: https://zod.dev/?id=coercion-for-primitives
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import dotenv from "dotenv";
import path from "node:path";
import { z } from "zod";

// override: false in tests so a test can set env vars before importing modules.
const isTest = process.env.NODE_ENV === "test" || !!process.env.VITEST_WORKER_ID;
dotenv.config({ path: path.join(process.cwd(), ".env"), override: !isTest });

/**
 * Raw extraction. Every variable gets trimmed; stray whitespace from copy-paste
 * is the most common .env mistake.
 */
const raw = {
  NODE_ENV: process.env.NODE_ENV?.trim(),
  DB_PATH: process.env.DB_PATH?.trim(),
  LOG_LEVEL: process.env.LOG_LEVEL?.trim(),
  SENTRY_DSN: process.env.SENTRY_DSN?.trim(),
  SENTRY_ENVIRONMENT: process.env.SENTRY_ENVIRONMENT?.trim(),
  SENTRY_TRACES_SAMPLE_RATE: process.env.SENTRY_TRACES_SAMPLE_RATE?.trim(),

  // Overhaul retry policy
  OVERHAUL_MAX_ATTEMPTS: process.env.OVERHAUL_MAX_ATTEMPTS?.trim(),
  OVERHAUL_BACKOFF_BASE_MS: process.env.OVERHAUL_BACKOFF_BASE_MS?.trim(),
  OVERHAUL_BACKOFF_MAX_MS: process.env.OVERHAUL_BACKOFF_MAX_MS?.trim(),

  // Shared API limiter budget
  API_LIMITER_CAPACITY: process.env.API_LIMITER_CAPACITY?.trim(),
  API_LIMITER_WINDOW_MS: process.env.API_LIMITER_WINDOW_MS?.trim(),

  STORE_CACHE_TTL_MS: process.env.STORE_CACHE_TTL_MS?.trim(),
  CONFIRMATION_TTL_MS: process.env.CONFIRMATION_TTL_MS?.trim(),
  PANEL_PAGE_SIZE: process.env.PANEL_PAGE_SIZE?.trim(),
};

const schema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  DB_PATH: z.string().default("data/data.db"),
  LOG_LEVEL: z.string().optional(),

  // Sentry error tracking - disabled if DSN not provided
  SENTRY_DSN: z.string().optional(),
  SENTRY_ENVIRONMENT: z.string().optional(),
  SENTRY_TRACES_SAMPLE_RATE: z.coerce.number().min(0).max(1).default(0.1),

  OVERHAUL_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(4),
  OVERHAUL_BACKOFF_BASE_MS: z.coerce.number().int().min(1).default(500),
  OVERHAUL_BACKOFF_MAX_MS: z.coerce.number().int().min(1).default(15_000),

  // Discord allows roughly 5 mutating calls per 5s per guild route; stay at that.
  API_LIMITER_CAPACITY: z.coerce.number().int().min(1).default(5),
  API_LIMITER_WINDOW_MS: z.coerce.number().int().min(1).default(5_000),

  STORE_CACHE_TTL_MS: z.coerce.number().int().min(1).default(5 * 60 * 1000),
  CONFIRMATION_TTL_MS: z.coerce.number().int().min(1).default(5 * 60 * 1000),

  // Discord caps a string select at 25 options.
  PANEL_PAGE_SIZE: z.coerce.number().int().min(1).max(25).default(25),
});

/**
 * Fail-fast validation. safeParse collects every issue at once so a broken .env
 * is fixed in one pass.
 */
const parsed = schema.safeParse(raw);
if (!parsed.success) {
  const issues = parsed.error.issues.map((i) => `- ${i.path.join(".")}: ${i.message}`).join("\n");
  console.error(`Environment validation failed:\n${issues}`);
  process.exit(1);
}

export type Env = z.infer<typeof schema>;
export const env: Env = parsed.data;

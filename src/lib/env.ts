/**
 * tidewatch — src/lib/env.ts
 * WHAT: Environment loading/validation via dotenv + zod.
 * WHY: Fail-fast on missing secrets; keep process.env access centralized.
 * FLOWS: load .env → parse/validate → export typed env object
 * DOCS:
 *  - Node ESM: https://nodejs.org/api/esm.html
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import dotenv from "dotenv";
import path from "node:path";
import { z } from "zod";

// override: false in tests so values set by tests/setup.ts win over a local .env
const isTest = process.env.NODE_ENV === "test";
dotenv.config({ path: path.join(process.cwd(), ".env"), override: !isTest });

/**
 * Raw environment extraction. Every variable gets trimmed to handle
 * stray whitespace in .env files. Validation happens in one pass below.
 */
const raw = {
  DISCORD_TOKEN: process.env.DISCORD_TOKEN?.trim(),
  CLIENT_ID: process.env.CLIENT_ID?.trim(),
  GUILD_ID: process.env.GUILD_ID?.trim(),
  NODE_ENV: process.env.NODE_ENV?.trim(),
  DB_PATH: process.env.DB_PATH?.trim(),
  SENTRY_DSN: process.env.SENTRY_DSN?.trim(),
  SENTRY_ENVIRONMENT: process.env.SENTRY_ENVIRONMENT?.trim(),
  SENTRY_TRACES_SAMPLE_RATE: process.env.SENTRY_TRACES_SAMPLE_RATE?.trim(),
  LOG_LEVEL: process.env.LOG_LEVEL?.trim(),
  OWNER_IDS: process.env.OWNER_IDS?.trim(),

  // osu! API v2 client credentials (optional - tracking is off without them)
  OSU_CLIENT_ID: process.env.OSU_CLIENT_ID?.trim(),
  OSU_CLIENT_SECRET: process.env.OSU_CLIENT_SECRET?.trim(),

  // Tenor v2 key (optional - /gif replies with a config error without it)
  TENOR_API_KEY: process.env.TENOR_API_KEY?.trim(),

  // Scheduler tuning
  MUTE_SCHEDULER_INTERVAL_MS: process.env.MUTE_SCHEDULER_INTERVAL_MS?.trim(),
  OSU_TRACKING_INTERVAL_MS: process.env.OSU_TRACKING_INTERVAL_MS?.trim(),

  FORCE_ROLE_MUTES: process.env.FORCE_ROLE_MUTES?.trim(),
};

const truthyPattern = /^(1|true|yes|on)$/i;

/**
 * Required secrets fail fast at startup rather than crashing later when first used.
 * Optional fields get defaults where one makes sense.
 */
const schema = z.object({
  DISCORD_TOKEN: z.string().min(1, "Missing DISCORD_TOKEN"),
  CLIENT_ID: z.string().min(1, "Missing CLIENT_ID"),
  GUILD_ID: z.string().optional(), // Only needed for guild-scoped command deployment
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  DB_PATH: z.string().default("data/data.db"),

  // Sentry error tracking - disabled if DSN not provided
  SENTRY_DSN: z.string().optional(),
  SENTRY_ENVIRONMENT: z.string().optional(),
  SENTRY_TRACES_SAMPLE_RATE: z.coerce.number().min(0).max(1).default(0.1),

  LOG_LEVEL: z.string().optional(),

  // Owner override (optional, comma-separated user IDs)
  OWNER_IDS: z.string().optional(),

  OSU_CLIENT_ID: z.string().optional(),
  OSU_CLIENT_SECRET: z.string().optional(),
  TENOR_API_KEY: z.string().optional(),

  MUTE_SCHEDULER_INTERVAL_MS: z.coerce.number().int().min(1000).default(30_000),
  OSU_TRACKING_INTERVAL_MS: z.coerce.number().int().min(1000).default(60_000),

  // Role mutes only unless explicitly turned off. Overwrite mutes cost one
  // request per channel and do not survive a rejoin.
  FORCE_ROLE_MUTES: z
    .string()
    .optional()
    .transform((val) => (val === undefined ? true : truthyPattern.test(val))),
});

/**
 * safeParse collects ALL issues so a broken .env is fixed in one go.
 */
const parsed = schema.safeParse(raw);
if (!parsed.success) {
  const issues = parsed.error.issues.map((i) => `- ${i.path.join(".")}: ${i.message}`).join("\n");
  console.error(`Environment validation failed:\n${issues}`);
  process.exit(1);
}
export const env = parsed.data;

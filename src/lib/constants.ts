/**
 * tidewatch — src/lib/constants.ts
 * WHAT: Centralized constants for colors, timeouts and limits.
 * WHY: Single source of truth for magic numbers.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { MessageMentionOptions } from "discord.js";

// ===== Discord Message Options =====

/**
 * Suppresses all @mentions. Use when echoing user-supplied text (reasons, definitions).
 */
export const SAFE_ALLOWED_MENTIONS: MessageMentionOptions = { parse: [] };

/** Reason text stored on mutes, warnings and cases */
export const MAX_REASON_LENGTH = 1024;

// ===== Embed colors =====

export const EMBED_COLOR_DEFAULT = 0x5865f2;
export const EMBED_COLOR_MODLOG = 0xe67e22;
export const EMBED_COLOR_WARNING = 0xf1c40f;
/** 3447003 */
export const EMBED_COLOR_ANILIST = 0x3498db;
export const EMBED_COLOR_GREEN = 0x2ecc71;
export const EMBED_COLOR_BLUE = 0x3498db;
export const EMBED_COLOR_YELLOW = 0xf1c40f;

// ===== Interaction timeouts =====

/** Yes/No confirmations and paginators stop listening after this */
export const COMPONENT_IDLE_TIMEOUT_MS = 30_000;

// ===== Mutes =====

/** The scheduler picks up mutes expiring within this window */
export const UNMUTE_LOOKAHEAD_SECONDS = 60;

/** Placeholder moderator id (0xDE1) on warnings whose moderator account was deleted */
export const DELETED_MODERATOR_ID = "3553";

// ===== Channel cleanup =====

/** Bulk delete refuses messages older than 14 days; 5 minutes of slack */
export const BULK_DELETE_MAX_AGE_MS = 14 * 86_400_000 - 5 * 60_000;
/** Larger cleanups ask for confirmation first */
export const CLEANUP_CONFIRM_THRESHOLD = 100;
export const SLOWMODE_MAX_SECONDS = 6 * 3_600;

// ===== osu! tracking =====

export const OSU_TRACKING_GUILD_LIMIT = 25;
export const OSU_RESTART_DELAY_MS = 300_000;
export const OSU_PING_INTERVAL_MS = 600_000;

// ===== Process =====

/** Grace period for Sentry to flush after an uncaught exception */
export const UNCAUGHT_EXCEPTION_EXIT_DELAY_MS = 1000;

// ===== Polls and raffles =====

export const UTILITY_MAX_ACTIVE = 4;
/** Ended polls and raffles kept per guild for /poll results and /raffle reroll */
export const UTILITY_HISTORY_LIMIT = 5;
export const UTILITY_MIN_DURATION_SECONDS = 5 * 60;
export const UTILITY_MAX_DURATION_SECONDS = 8 * 7 * 86_400;
export const POLL_MAX_OPTIONS = 10;
export const UTILITY_SCHEDULER_INTERVAL_MS = 30_000;

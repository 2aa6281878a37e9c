/**
 * tidewatch — src/commands/mute/shared.ts
 * WHAT: Argument handling shared by /mute, /unmute, /mutechannel and /unmutechannel.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { GuildMember, User } from "discord.js";
import { humanizeDuration, parseMuteTime } from "../../lib/duration.js";
import { humanizeList, truncate } from "../../lib/text.js";
import { nowUtc } from "../../lib/time.js";
import { getGuildSettings } from "../../store/guildSettingsStore.js";

export interface ResolvedMuteTime {
  durationSeconds: number | null;
  until: number | null;
  reason: string | null;
  /** " for 2 hours", or "" for indefinite mutes */
  suffix: string;
}

/**
 * Parse time_and_reason, falling back to the guild's default time.
 */
export function resolveMuteTime(guildId: string, input: string | null): ResolvedMuteTime {
  const parsed = parseMuteTime(input ?? "");
  const fallback = getGuildSettings(guildId).muteDefaultTime;
  const durationSeconds = parsed.durationSeconds ?? (fallback > 0 ? fallback : null);
  return {
    durationSeconds,
    until: durationSeconds ? nowUtc() + durationSeconds : null,
    reason: parsed.reason,
    suffix: durationSeconds ? ` for ${humanizeDuration(durationSeconds)}` : "",
  };
}

/**
 * Refusal for targeting the bot or yourself, or null when the list is fine.
 */
export function targetError(
  userIds: readonly string[],
  botId: string,
  authorId: string,
  verb: "mute" | "unmute"
): string | null {
  if (userIds.length === 0) return `Please provide at least one user to ${verb}.`;
  if (userIds.includes(botId)) return `You cannot ${verb} me.`;
  if (userIds.includes(authorId)) return `You cannot ${verb} yourself.`;
  return null;
}

/** Discord caps audit log reasons at 512 characters. */
export function auditReason(author: User, reason: string | null): string {
  const base = `Action requested by ${author.tag} (ID ${author.id}).`;
  return truncate(reason ? `${base} Reason: ${reason}` : base, 512);
}

export function memberNames(members: readonly GuildMember[]): string {
  return humanizeList(members.map((m) => m.user.tag));
}

export function hasHave(count: number): string {
  return count > 1 ? "have" : "has";
}

export function missingUsersLine(missing: readonly string[]): string {
  if (missing.length === 0) return "";
  return `\nNot in this server: ${humanizeList(missing.map((id) => `<@${id}>`))}`;
}

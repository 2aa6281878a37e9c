/**
 * tidewatch — src/features/mutes/notify.ts
 * WHAT: DMs muted members and posts unmute failures to the guild's notification channel.
 * WHY: Both are best-effort side channels; a closed DM or missing channel must not fail a mute.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { EmbedBuilder, PermissionFlagsBits, type Guild, type User } from "discord.js";
import { logger } from "../../lib/logger.js";
import { humanizeDuration } from "../../lib/duration.js";
import { EMBED_COLOR_DEFAULT, SAFE_ALLOWED_MENTIONS } from "../../lib/constants.js";
import { formatUtc, nowUtc } from "../../lib/time.js";
import { getGuildSettings } from "../../store/guildSettingsStore.js";

export type MuteNoticeType =
  | "Server mute"
  | "Server unmute"
  | "Channel mute"
  | "Channel unmute"
  | "Voice mute"
  | "Voice unmute";

export interface MuteNotice {
  type: MuteNoticeType;
  moderator: User | null;
  reason: string | null;
  /** Seconds from now; Until/Duration fields are added only when set */
  durationSeconds?: number | null;
}

export function muteNoticeEmbed(guild: Guild, notice: MuteNotice, showMod: boolean): EmbedBuilder {
  const embed = new EmbedBuilder()
    .setColor(EMBED_COLOR_DEFAULT)
    .setTitle(notice.type)
    .setDescription(notice.reason || "No reason provided.")
    .setTimestamp(Date.now());

  if (notice.durationSeconds) {
    embed.addFields(
      { name: "Until", value: formatUtc(nowUtc() + notice.durationSeconds), inline: true },
      { name: "Duration", value: humanizeDuration(notice.durationSeconds), inline: true }
    );
  }
  embed.addFields({ name: "Guild", value: guild.name, inline: false });
  if (showMod) {
    embed.addFields({ name: "Moderator", value: notice.moderator ? notice.moderator.tag : "Unknown", inline: true });
  }
  return embed;
}

/**
 * DM the member when the guild has mute DMs on. Never throws.
 */
export async function sendMuteDm(guild: Guild, user: User, notice: MuteNotice): Promise<void> {
  const settings = getGuildSettings(guild.id);
  if (!settings.muteDm) return;

  try {
    await user.send({ embeds: [muteNoticeEmbed(guild, notice, settings.muteShowMod)] });
  } catch (err) {
    logger.debug({ err, guildId: guild.id, userId: user.id }, "[mutes] Could not DM member");
  }
}

/**
 * Post to the notification channel when one is set and the bot can send there.
 * Returns whether the message went out.
 */
export async function postMuteNotification(guild: Guild, content: string): Promise<boolean> {
  const channelId = getGuildSettings(guild.id).muteNotificationChannelId;
  if (!channelId) return false;

  const channel = guild.channels.cache.get(channelId);
  const me = guild.members.me;
  if (!channel || !channel.isTextBased() || !me) return false;
  if (!channel.permissionsFor(me).has(PermissionFlagsBits.SendMessages)) return false;

  try {
    await channel.send({ content, allowedMentions: SAFE_ALLOWED_MENTIONS });
    return true;
  } catch (err) {
    logger.info({ err, guildId: guild.id, channelId, content }, "[mutes] Notification channel send failed");
    return false;
  }
}

/**
 * tidewatch — src/features/warnings/notify.ts
 * WHAT: Warning embed, DM and warn-channel post, plus the case text for a warning.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { EmbedBuilder, PermissionFlagsBits, type Guild, type User } from "discord.js";
import { logger } from "../../lib/logger.js";
import { EMBED_COLOR_WARNING, SAFE_ALLOWED_MENTIONS } from "../../lib/constants.js";
import type { GuildSettings } from "../../store/guildSettingsStore.js";

export function warningEmbed(description: string, points: number, moderator: User | null): EmbedBuilder {
  return new EmbedBuilder()
    .setColor(EMBED_COLOR_WARNING)
    .setTitle(moderator ? `Warning from ${moderator.tag}` : "Warning")
    .setDescription(description)
    .addFields({ name: "Points", value: String(points) });
}

export function warningCaseReason(description: string, points: number, userId: string, warnId: string): string {
  return `${description}\nPoints: ${points}\n\nUse /unwarn user:${userId} warn_id:${warnId} to remove this warning.`;
}

/**
 * Returns false when the DM could not be delivered.
 */
export async function sendWarningDm(guild: Guild, user: User, embed: EmbedBuilder): Promise<boolean> {
  try {
    await user.send({ content: `You have received a warning in ${guild.name}.`, embeds: [embed] });
    return true;
  } catch (err) {
    logger.debug({ err, guildId: guild.id, userId: user.id }, "[warnings] Could not DM member");
    return false;
  }
}

/**
 * Post to the configured warn channel. Returns false when there is none the bot can send in.
 */
export async function postToWarnChannel(
  guild: Guild,
  settings: GuildSettings,
  user: User,
  embed: EmbedBuilder
): Promise<boolean> {
  if (!settings.warnChannelId) return false;
  const channel = guild.channels.cache.get(settings.warnChannelId);
  const me = guild.members.me;
  if (!channel || !channel.isTextBased() || !me) return false;
  if (!channel.permissionsFor(me).has(PermissionFlagsBits.SendMessages)) return false;

  try {
    await channel.send({
      content: `<@${user.id}> has been warned.`,
      embeds: [embed],
      allowedMentions: SAFE_ALLOWED_MENTIONS,
    });
    return true;
  } catch (err) {
    logger.warn({ err, guildId: guild.id, channelId: channel.id }, "[warnings] Warn channel post failed");
    return false;
  }
}

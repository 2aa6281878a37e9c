/**
 * tidewatch — src/commands/slowmode.ts
 * WHAT: /slowmode sets or clears the channel's per-user message interval (0 to 6 hours).
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import {
  InteractionContextType,
  PermissionFlagsBits,
  SlashCommandBuilder,
  type ChatInputCommandInteraction,
} from "discord.js";
import { replyOrEdit, type CommandContext } from "../lib/cmdWrap.js";
import { SLOWMODE_MAX_SECONDS } from "../lib/constants.js";
import { humanizeDuration, parseMuteTime } from "../lib/duration.js";
import { logger } from "../lib/logger.js";
import { requireBotChannelPermission, requireGuild } from "./shared.js";

export const data = new SlashCommandBuilder()
  .setName("slowmode")
  .setDescription("Change this channel's slowmode; leave empty to disable")
  .addStringOption((o) =>
    o.setName("interval").setDescription("e.g. 30 (seconds), 5m, 1 hour; up to 6 hours").setMaxLength(100)
  )
  .setDefaultMemberPermissions(PermissionFlagsBits.ManageChannels)
  .setContexts(InteractionContextType.Guild);

/**
 * Seconds for an interval; a bare number is seconds and an empty value is 0.
 * Null when the text isn't a duration.
 */
export function parseSlowmodeInterval(text: string | null): number | null {
  const trimmed = text?.trim() ?? "";
  if (trimmed.length === 0) return 0;
  if (/^\d+$/.test(trimmed)) return Number.parseInt(trimmed, 10);
  const { durationSeconds, reason } = parseMuteTime(trimmed);
  if (durationSeconds === null || reason !== null) return null;
  return durationSeconds;
}

export async function execute(ctx: CommandContext<ChatInputCommandInteraction>): Promise<void> {
  const interaction = await requireGuild(ctx.interaction);
  if (!interaction) return;

  const raw = interaction.options.getString("interval");
  const seconds = parseSlowmodeInterval(raw);
  if (seconds === null) {
    await replyOrEdit(interaction, { content: `\`${raw}\` is not a valid interval.` });
    return;
  }
  if (seconds > SLOWMODE_MAX_SECONDS) {
    await replyOrEdit(interaction, {
      content: "This amount of time is too large for this command. (Maximum: 6 hours)",
    });
    return;
  }

  const channel = await requireBotChannelPermission(interaction, PermissionFlagsBits.ManageChannels, "Manage Channels");
  if (!channel) return;

  ctx.step("edit");
  await channel.setRateLimitPerUser(seconds, `Slowmode set by ${interaction.user.tag}`);
  logger.info(
    { guildId: interaction.guildId, channelId: channel.id, moderatorId: interaction.user.id, seconds },
    "[slowmode] Interval changed"
  );

  await replyOrEdit(
    interaction,
    {
      content: seconds > 0 ? `Slowmode interval is now ${humanizeDuration(seconds)}.` : "Slowmode has been disabled.",
    },
    { ephemeral: false }
  );
}

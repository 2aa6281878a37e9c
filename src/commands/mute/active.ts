/**
 * tidewatch — src/commands/mute/active.ts
 * WHAT: /activemutes lists server and channel mutes with the time remaining.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import {
  InteractionContextType,
  PermissionFlagsBits,
  SlashCommandBuilder,
  type ChatInputCommandInteraction,
  type Guild,
} from "discord.js";
import { replyOrEdit, type CommandContext } from "../../lib/cmdWrap.js";
import { humanizeDuration } from "../../lib/duration.js";
import { pagify } from "../../lib/text.js";
import { nowUtc } from "../../lib/time.js";
import { listGuildChannelMutes, listServerMutes, type ServerMute } from "../../store/muteStore.js";
import { paginate } from "../../ui/paginator.js";
import { requireGuild } from "../shared.js";

export const activeMutesData = new SlashCommandBuilder()
  .setName("activemutes")
  .setDescription("Show the active mutes in this server")
  .setDefaultMemberPermissions(PermissionFlagsBits.ManageRoles)
  .setContexts(InteractionContextType.Guild);

function muteLine(mute: ServerMute, now: number): string {
  if (mute.until === null) return `<@${mute.userId}>`;
  return `<@${mute.userId}> __Remaining__: ${humanizeDuration(mute.until - now)}`;
}

/**
 * The full listing, or "" when nothing is muted. Channels the guild no longer has are skipped.
 */
export function activeMutesText(guild: Guild, now: number = nowUtc()): string {
  let text = "";

  const serverMutes = listServerMutes(guild.id);
  if (serverMutes.length > 0) {
    text += "__Server Mutes__\n";
    for (const mute of serverMutes) text += `${muteLine(mute, now)}\n`;
  }

  const byChannel = new Map<string, ServerMute[]>();
  for (const mute of listGuildChannelMutes(guild.id)) {
    if (!guild.channels.cache.has(mute.channelId)) continue;
    const list = byChannel.get(mute.channelId) ?? [];
    list.push(mute);
    byChannel.set(mute.channelId, list);
  }
  for (const [channelId, mutes] of byChannel) {
    text += `__<#${channelId}> Mutes__\n`;
    for (const mute of mutes) text += `${muteLine(mute, now)}\n`;
  }

  return text;
}

export async function executeActiveMutes(ctx: CommandContext<ChatInputCommandInteraction>): Promise<void> {
  const interaction = await requireGuild(ctx.interaction);
  if (!interaction) return;

  const text = activeMutesText(interaction.guild);
  if (!text) {
    await replyOrEdit(interaction, { content: "There are no mutes on this server right now." });
    return;
  }
  await paginate(interaction, pagify(text));
}

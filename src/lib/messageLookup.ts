/**
 * tidewatch — src/lib/messageLookup.ts
 * WHAT: Finds a bot-posted message again by channel and message id.
 * WHY: Polls and raffles outlive the interaction that posted them; the scheduler only has ids.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { Guild, GuildTextBasedChannel, Message } from "discord.js";
import { discordErrorCode } from "./errors.js";

// 10003 Unknown Channel, 10008 Unknown Message, 50001 Missing Access
const GONE_CODES = new Set([10003, 10008, 50001]);

export interface HostedMessage {
  channel: GuildTextBasedChannel;
  message: Message<true>;
}

/**
 * The message and its channel, or null when either no longer exists or can't be read.
 */
export async function fetchHostedMessage(
  guild: Guild,
  channelId: string,
  messageId: string
): Promise<HostedMessage | null> {
  try {
    const channel = guild.channels.cache.get(channelId) ?? (await guild.channels.fetch(channelId));
    if (!channel || !channel.isTextBased()) return null;
    const message = await channel.messages.fetch(messageId);
    return { channel, message };
  } catch (err) {
    const code = discordErrorCode(err);
    if (code !== null && GONE_CODES.has(code)) return null;
    throw err;
  }
}

export function messageLink(guildId: string, channelId: string, messageId: string): string {
  return `https://discord.com/channels/${guildId}/${channelId}/${messageId}`;
}

/** Name shown in "brought to you by" footers */
export function botDisplayName(guild: Guild): string {
  return guild.members.me?.displayName ?? guild.client.user.username;
}

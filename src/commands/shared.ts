/**
 * tidewatch — src/commands/shared.ts
 * WHAT: Guild-only guard and member resolution shared by the moderation commands.
 * WHY: Slash commands receive users, not members; every moderation path needs cached
 *      GuildMembers for roles, voice state and hierarchy checks.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import {
  PermissionFlagsBits,
  type ChatInputCommandInteraction,
  type Guild,
  type GuildMember,
  type GuildTextBasedChannel,
} from "discord.js";
import { replyOrEdit } from "../lib/cmdWrap.js";
import {
  UTILITY_MAX_ACTIVE,
  UTILITY_MAX_DURATION_SECONDS,
  UTILITY_MIN_DURATION_SECONDS,
} from "../lib/constants.js";
import { parseMuteTime } from "../lib/duration.js";
import { discordErrorCode } from "../lib/errors.js";

export type GuildInteraction = ChatInputCommandInteraction<"cached">;

/**
 * Narrow to a cached-guild interaction. Replies and returns null anywhere else.
 */
export async function requireGuild(
  interaction: ChatInputCommandInteraction
): Promise<GuildInteraction | null> {
  if (interaction.inCachedGuild()) return interaction;
  await replyOrEdit(interaction, { content: "This command can only be used in a server." });
  return null;
}

/**
 * Fetch a member, or null when they are not in the guild.
 */
export async function fetchMember(guild: Guild, userId: string): Promise<GuildMember | null> {
  const cached = guild.members.cache.get(userId);
  if (cached) return cached;
  try {
    return await guild.members.fetch(userId);
  } catch (err) {
    const code = discordErrorCode(err);
    // 10007 Unknown Member, 10013 Unknown User
    if (code === 10007 || code === 10013) return null;
    throw err;
  }
}

/**
 * Members for a list of ids, in input order. Ids that don't resolve are returned separately.
 */
export async function fetchMembers(
  guild: Guild,
  userIds: readonly string[]
): Promise<{ members: GuildMember[]; missing: string[] }> {
  const members: GuildMember[] = [];
  const missing: string[] = [];
  for (const id of userIds) {
    const member = await fetchMember(guild, id);
    if (member) members.push(member);
    else missing.push(id);
  }
  return { members, missing };
}

/**
 * The "channel" option, when both the bot and the caller may post there.
 * Replies with the reason and returns null otherwise.
 */
export async function requirePostingChannel(
  interaction: GuildInteraction,
  feature: "polls" | "raffles"
): Promise<GuildTextBasedChannel | null> {
  const channel = interaction.options.getChannel("channel", true);
  if (!channel.isTextBased()) {
    await replyOrEdit(interaction, { content: "I'm not allowed to send messages in that location!" });
    return null;
  }

  const send = channel.isThread() ? PermissionFlagsBits.SendMessagesInThreads : PermissionFlagsBits.SendMessages;
  const mine = channel.permissionsFor(interaction.guild.members.me ?? interaction.client.user);
  if (!mine?.has([PermissionFlagsBits.ViewChannel, send])) {
    await replyOrEdit(interaction, { content: "I'm not allowed to send messages in that location!" });
    return null;
  }
  if (!mine.has(PermissionFlagsBits.EmbedLinks)) {
    await replyOrEdit(interaction, {
      content: `I need the \`Embed Links\` permission to be able to start ${feature}.`,
    });
    return null;
  }
  if (!channel.permissionsFor(interaction.member)?.has(send)) {
    await replyOrEdit(interaction, { content: "You don't have permission to send messages in that location!" });
    return null;
  }
  return channel;
}

/**
 * The channel the command ran in, when the bot holds `permission` there.
 * Replies "I need the `<label>` permission in this channel to do that." otherwise.
 */
export async function requireBotChannelPermission(
  interaction: GuildInteraction,
  permission: bigint,
  label: string
): Promise<GuildTextBasedChannel | null> {
  const channel = interaction.channel;
  const me = interaction.guild.members.me;
  if (channel && me && channel.permissionsFor(me)?.has([PermissionFlagsBits.ViewChannel, permission])) {
    return channel;
  }
  await replyOrEdit(interaction, { content: `I need the \`${label}\` permission in this channel to do that.` });
  return null;
}

const MESSAGE_ID_RE = /\d{15,20}/g;

/** The message id from an id or a message link (its last snowflake). */
export function parseMessageId(text: string | null): string | null {
  if (!text) return null;
  return [...text.matchAll(MESSAGE_ID_RE)].at(-1)?.[0] ?? null;
}

/**
 * The item with that message id, the only item when no id was given, or why there is none.
 */
export function selectByMessageId<T extends { messageId: string }>(
  items: readonly T[],
  messageId: string | null
): T | "missing" | "ambiguous" {
  if (messageId) return items.find((item) => item.messageId === messageId) ?? "missing";
  const [only] = items;
  if (items.length === 1 && only) return only;
  return "ambiguous";
}

/**
 * How long a new poll or raffle runs, or the message explaining why it can't start.
 */
export function parseRunTime(
  text: string,
  kind: "poll" | "raffle",
  activeCount: number
): { durationSeconds: number } | string {
  const { durationSeconds } = parseMuteTime(text);
  if (durationSeconds === null) return `You need to provide a valid time for the ${kind} to last.`;
  if (activeCount >= UTILITY_MAX_ACTIVE) {
    return (
      `You already have ${UTILITY_MAX_ACTIVE} ${kind}s running in the server. ` +
      "Wait for one of them to finish first before starting another one."
    );
  }
  if (durationSeconds > UTILITY_MAX_DURATION_SECONDS) return "The time can't be longer than `8 weeks`.";
  if (durationSeconds < UTILITY_MIN_DURATION_SECONDS) return `The ${kind} can't be shorter than \`5 minutes\`.`;
  return { durationSeconds };
}

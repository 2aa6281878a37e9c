/**
 * tidewatch — src/commands/mute/channel.ts
 * WHAT: /mutechannel and /unmutechannel: member overwrites in the current channel only.
 * FLOWS:
 *  - /mutechannel → channelMuteUser × N → perms cache → cmute|vmute case + DM → reply → failure list
 *  - /unmutechannel → channelUnmuteUser × N → cunmute|vunmute case + DM → reply → failure list
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import {
  InteractionContextType,
  PermissionFlagsBits,
  SlashCommandBuilder,
  type ChatInputCommandInteraction,
  type GuildMember,
  type NonThreadGuildBasedChannel,
} from "discord.js";
import { ensureDeferred, replyOrEdit, type CommandContext } from "../../lib/cmdWrap.js";
import { logger } from "../../lib/logger.js";
import { MAX_REASON_LENGTH, SAFE_ALLOWED_MENTIONS } from "../../lib/constants.js";
import { pagify, parseUserIds } from "../../lib/text.js";
import { hasOverwrites } from "../../lib/typeGuards.js";
import { setPermsCacheEntry } from "../../store/muteStore.js";
import { createCase } from "../../features/modlog/createCase.js";
import { issueMessage, type MuteIssue } from "../../features/mutes/issues.js";
import { channelMuteUser, channelUnmuteUser, settleChannel } from "../../features/mutes/manager.js";
import { sendMuteDm } from "../../features/mutes/notify.js";
import { paginate } from "../../ui/paginator.js";
import { fetchMembers, requireGuild, type GuildInteraction } from "../shared.js";
import {
  auditReason,
  hasHave,
  memberNames,
  missingUsersLine,
  resolveMuteTime,
  targetError,
} from "./shared.js";

export const muteChannelData = new SlashCommandBuilder()
  .setName("mutechannel")
  .setDescription("Mute users in this channel")
  .addStringOption((option) =>
    option.setName("users").setDescription("Mentions or IDs, separated by spaces").setRequired(true)
  )
  .addStringOption((option) =>
    option
      .setName("time_and_reason")
      .setDescription("How long and why, e.g. `spam 5 hours`. Uses the default time when omitted")
      .setMaxLength(MAX_REASON_LENGTH)
  )
  .setDefaultMemberPermissions(PermissionFlagsBits.ManageRoles)
  .setContexts(InteractionContextType.Guild);

export const unmuteChannelData = new SlashCommandBuilder()
  .setName("unmutechannel")
  .setDescription("Unmute users in this channel")
  .addStringOption((option) =>
    option.setName("users").setDescription("Mentions or IDs, separated by spaces").setRequired(true)
  )
  .addStringOption((option) =>
    option.setName("reason").setDescription("Reason for the unmute").setMaxLength(MAX_REASON_LENGTH)
  )
  .setDefaultMemberPermissions(PermissionFlagsBits.ManageRoles)
  .setContexts(InteractionContextType.Guild);

async function overwriteChannel(interaction: GuildInteraction): Promise<NonThreadGuildBasedChannel | null> {
  const channel = interaction.channel;
  if (channel && hasOverwrites(channel)) return channel;
  await replyOrEdit(interaction, { content: "Channel mutes can't be applied in threads." });
  return null;
}

/**
 * "The following users could not be muted\n<user>: <issue>" split into pages.
 */
export function failureList(header: string, failures: ReadonlyArray<[GuildMember, MuteIssue]>): string[] {
  let text = `${header}\n`;
  for (const [member, issue] of failures) {
    text += `${member.user.tag}: ${issueMessage(issue)}\n`;
  }
  return pagify(text);
}

export async function executeMuteChannel(ctx: CommandContext<ChatInputCommandInteraction>): Promise<void> {
  const interaction = await requireGuild(ctx.interaction);
  if (!interaction) return;
  const { guild, member: author } = interaction;

  const userIds = parseUserIds(interaction.options.getString("users", true));
  const refusal = targetError(userIds, interaction.client.user.id, author.id, "mute");
  if (refusal) {
    await replyOrEdit(interaction, { content: refusal });
    return;
  }
  const channel = await overwriteChannel(interaction);
  if (!channel) return;
  await ensureDeferred(interaction, { ephemeral: false });

  const time = resolveMuteTime(guild.id, interaction.options.getString("time_and_reason"));
  const audit = auditReason(author.user, time.reason);
  const isVoice = channel.isVoiceBased();
  const { members, missing } = await fetchMembers(guild, userIds);

  ctx.step("channel_mute");
  const muted: GuildMember[] = [];
  const failures: Array<[GuildMember, MuteIssue]> = [];
  for (const member of members) {
    const result = await settleChannel(channel, member, () =>
      channelMuteUser(guild, channel, author, member, time.until, audit)
    );
    if (!result.success) {
      failures.push([member, result.reason ?? "unknown_channel"]);
      continue;
    }
    muted.push(member);
    // Success can still carry the voice-move note
    if (result.reason) failures.push([member, result.reason]);
    if (result.oldOverwrites) setPermsCacheEntry(guild.id, member.id, channel.id, result.oldOverwrites);

    await createCase(guild, {
      action: isVoice ? "vmute" : "cmute",
      user: member.user,
      moderator: author.user,
      reason: time.reason,
      until: time.until,
      channelId: channel.id,
    });
    await sendMuteDm(guild, member.user, {
      type: isVoice ? "Voice mute" : "Channel mute",
      moderator: author.user,
      reason: time.reason,
      durationSeconds: time.durationSeconds,
    });
  }
  logger.info(
    { guildId: guild.id, channelId: channel.id, muted: muted.length, failed: failures.length },
    "[mutes] /mutechannel finished"
  );

  ctx.step("reply");
  const summary =
    muted.length > 0
      ? `${memberNames(muted)} ${hasHave(muted.length)} been muted in this channel${time.suffix}.`
      : "No users were muted.";
  await replyOrEdit(
    interaction,
    { content: summary + missingUsersLine(missing), allowedMentions: SAFE_ALLOWED_MENTIONS },
    { ephemeral: false }
  );
  if (failures.length > 0) {
    await paginate(interaction, failureList("The following users could not be muted", failures), {
      ephemeral: true,
    });
  }
}

export async function executeUnmuteChannel(ctx: CommandContext<ChatInputCommandInteraction>): Promise<void> {
  const interaction = await requireGuild(ctx.interaction);
  if (!interaction) return;
  const { guild, member: author } = interaction;

  const userIds = parseUserIds(interaction.options.getString("users", true));
  const refusal = targetError(userIds, interaction.client.user.id, author.id, "unmute");
  if (refusal) {
    await replyOrEdit(interaction, { content: refusal });
    return;
  }
  const channel = await overwriteChannel(interaction);
  if (!channel) return;
  await ensureDeferred(interaction, { ephemeral: false });

  const reason = interaction.options.getString("reason");
  const audit = auditReason(author.user, reason);
  const isVoice = channel.isVoiceBased();
  const { members, missing } = await fetchMembers(guild, userIds);

  ctx.step("channel_unmute");
  const unmuted: GuildMember[] = [];
  const failures: Array<[GuildMember, MuteIssue]> = [];
  for (const member of members) {
    const result = await settleChannel(channel, member, () =>
      channelUnmuteUser(guild, channel, author, member, audit)
    );
    if (!result.success) {
      failures.push([member, result.reason ?? "unknown_channel"]);
      continue;
    }
    unmuted.push(member);
    if (result.reason) failures.push([member, result.reason]);

    await createCase(guild, {
      action: isVoice ? "vunmute" : "cunmute",
      user: member.user,
      moderator: author.user,
      reason,
      channelId: channel.id,
    });
    await sendMuteDm(guild, member.user, {
      type: isVoice ? "Voice unmute" : "Channel unmute",
      moderator: author.user,
      reason,
    });
  }
  logger.info(
    { guildId: guild.id, channelId: channel.id, unmuted: unmuted.length, failed: failures.length },
    "[mutes] /unmutechannel finished"
  );

  ctx.step("reply");
  const summary =
    unmuted.length > 0 ? `${memberNames(unmuted)} unmuted in this channel.` : "No users were unmuted.";
  await replyOrEdit(
    interaction,
    { content: summary + missingUsersLine(missing), allowedMentions: SAFE_ALLOWED_MENTIONS },
    { ephemeral: false }
  );
  if (failures.length > 0) {
    await paginate(interaction, failureList("The following users could not be unmuted", failures), {
      ephemeral: true,
    });
  }
}

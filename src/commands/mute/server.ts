/**
 * tidewatch — src/commands/mute/server.ts
 * WHAT: /mute and /unmute: server-wide mutes through the mute role or per-channel overwrites.
 * FLOWS:
 *  - /mute → target checks → checkForMuteRole → muteUser × N → smute case + DM → reply → issue report
 *  - /unmute → target checks → checkForMuteRole → gate closed → unmuteUser × N → sunmute case + DM → reply
 * DOCS:
 *  - Slash command options: https://discord.js.org/#/docs/builders/main/class/SlashCommandBuilder
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import {
  InteractionContextType,
  PermissionFlagsBits,
  SlashCommandBuilder,
  type ChatInputCommandInteraction,
  type GuildMember,
} from "discord.js";
import { ensureDeferred, replyOrEdit, type CommandContext } from "../../lib/cmdWrap.js";
import { logger } from "../../lib/logger.js";
import { MAX_REASON_LENGTH, SAFE_ALLOWED_MENTIONS } from "../../lib/constants.js";
import { parseUserIds } from "../../lib/text.js";
import { createCase } from "../../features/modlog/createCase.js";
import { withGateClosed } from "../../features/mutes/gate.js";
import type { MuteResult } from "../../features/mutes/issues.js";
import { muteUser, unmuteUser } from "../../features/mutes/manager.js";
import { checkForMuteRole } from "../../features/mutes/muteRole.js";
import { sendMuteDm } from "../../features/mutes/notify.js";
import { reportIssues } from "../../features/mutes/report.js";
import { fetchMembers, requireGuild } from "../shared.js";
import {
  auditReason,
  hasHave,
  memberNames,
  missingUsersLine,
  resolveMuteTime,
  targetError,
} from "./shared.js";

export const muteData = new SlashCommandBuilder()
  .setName("mute")
  .setDescription("Mute users in this server")
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

export const unmuteData = new SlashCommandBuilder()
  .setName("unmute")
  .setDescription("Unmute users in this server")
  .addStringOption((option) =>
    option.setName("users").setDescription("Mentions or IDs, separated by spaces").setRequired(true)
  )
  .addStringOption((option) =>
    option.setName("reason").setDescription("Reason for the unmute").setMaxLength(MAX_REASON_LENGTH)
  )
  .setDefaultMemberPermissions(PermissionFlagsBits.ManageRoles)
  .setContexts(InteractionContextType.Guild);

export async function executeMute(ctx: CommandContext<ChatInputCommandInteraction>): Promise<void> {
  const interaction = await requireGuild(ctx.interaction);
  if (!interaction) return;
  const { guild, member: author } = interaction;

  const userIds = parseUserIds(interaction.options.getString("users", true));
  const refusal = targetError(userIds, interaction.client.user.id, author.id, "mute");
  if (refusal) {
    await replyOrEdit(interaction, { content: refusal });
    return;
  }

  ctx.step("mute_role");
  if (!(await checkForMuteRole(interaction, guild))) return;
  await ensureDeferred(interaction, { ephemeral: false });

  const time = resolveMuteTime(guild.id, interaction.options.getString("time_and_reason"));
  const audit = auditReason(author.user, time.reason);
  const { members, missing } = await fetchMembers(guild, userIds);

  ctx.step("mute");
  const muted: GuildMember[] = [];
  const issues: MuteResult[] = [];
  for (const member of members) {
    const result = await muteUser(guild, author, member, time.until, audit);
    if (!result.success) {
      issues.push(result);
      continue;
    }
    muted.push(member);
    // Muted in some channels but not all
    if (result.channels.length > 0) issues.push(result);

    await createCase(guild, {
      action: "smute",
      user: member.user,
      moderator: author.user,
      reason: time.reason,
      until: time.until,
    });
    await sendMuteDm(guild, member.user, {
      type: "Server mute",
      moderator: author.user,
      reason: time.reason,
      durationSeconds: time.durationSeconds,
    });
  }
  logger.info(
    { guildId: guild.id, moderatorId: author.id, muted: muted.length, issues: issues.length, until: time.until },
    "[mutes] /mute finished"
  );

  ctx.step("reply");
  const summary =
    muted.length > 0
      ? `${memberNames(muted)} ${hasHave(muted.length)} been muted in this server${time.suffix}.`
      : "No users were muted.";
  await replyOrEdit(
    interaction,
    { content: summary + missingUsersLine(missing), allowedMentions: SAFE_ALLOWED_MENTIONS },
    { ephemeral: false }
  );

  await reportIssues(interaction, issues);
}

export async function executeUnmute(ctx: CommandContext<ChatInputCommandInteraction>): Promise<void> {
  const interaction = await requireGuild(ctx.interaction);
  if (!interaction) return;
  const { guild, member: author } = interaction;

  const userIds = parseUserIds(interaction.options.getString("users", true));
  const refusal = targetError(userIds, interaction.client.user.id, author.id, "unmute");
  if (refusal) {
    await replyOrEdit(interaction, { content: refusal });
    return;
  }

  ctx.step("mute_role");
  if (!(await checkForMuteRole(interaction, guild))) return;
  await ensureDeferred(interaction, { ephemeral: false });

  const reason = interaction.options.getString("reason");
  const audit = auditReason(author.user, reason);
  const { members, missing } = await fetchMembers(guild, userIds);

  ctx.step("unmute");
  const unmuted: GuildMember[] = [];
  const issues: MuteResult[] = [];
  // Overwrite edits made here must not look like manual removals to the channelUpdate listener
  await withGateClosed(guild.id, async () => {
    for (const member of members) {
      const result = await unmuteUser(guild, author, member, audit);
      if (!result.success) {
        issues.push(result);
        continue;
      }
      unmuted.push(member);
      await createCase(guild, { action: "sunmute", user: member.user, moderator: author.user, reason });
      await sendMuteDm(guild, member.user, { type: "Server unmute", moderator: author.user, reason });
    }
  });
  logger.info(
    { guildId: guild.id, moderatorId: author.id, unmuted: unmuted.length, issues: issues.length },
    "[mutes] /unmute finished"
  );

  ctx.step("reply");
  const summary =
    unmuted.length > 0 ? `${memberNames(unmuted)} unmuted in this server.` : "No users were unmuted.";
  await replyOrEdit(
    interaction,
    { content: summary + missingUsersLine(missing), allowedMentions: SAFE_ALLOWED_MENTIONS },
    { ephemeral: false }
  );

  await reportIssues(interaction, issues);
}

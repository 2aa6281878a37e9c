/**
 * tidewatch — src/commands/warn/warn.ts
 * WHAT: /warn issues a warning worth some points and runs the threshold action.
 * WHY: Warnings accumulate; registered actions turn a points total into a mute, kick or ban.
 * FLOWS:
 *  - checks → resolve reason (registered | custom) → store → exceededAction → applyExceedAction
 *    → DM (toggleDm) → warn channel (toggleChannel) → warning case → reply
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import {
  InteractionContextType,
  PermissionFlagsBits,
  SlashCommandBuilder,
  type ChatInputCommandInteraction,
  type EmbedBuilder,
  type GuildMember,
} from "discord.js";
import { ensureDeferred, replyOrEdit, type CommandContext } from "../../lib/cmdWrap.js";
import { logger } from "../../lib/logger.js";
import { MAX_REASON_LENGTH, SAFE_ALLOWED_MENTIONS } from "../../lib/constants.js";
import { nowUtc } from "../../lib/time.js";
import { getGuildSettings } from "../../store/guildSettingsStore.js";
import { addWarning, getReason, listActions, totalPoints, type WarnReason } from "../../store/warningStore.js";
import { createCase } from "../../features/modlog/createCase.js";
import { applyExceedAction } from "../../features/warnings/actions.js";
import {
  postToWarnChannel,
  sendWarningDm,
  warningCaseReason,
  warningEmbed,
} from "../../features/warnings/notify.js";
import { exceededAction } from "../../features/warnings/thresholds.js";
import { fetchMember, requireGuild } from "../shared.js";

export const warnData = new SlashCommandBuilder()
  .setName("warn")
  .setDescription("Warn a user")
  .addUserOption((o) => o.setName("user").setDescription("User to warn").setRequired(true))
  .addStringOption((o) =>
    o
      .setName("reason")
      .setDescription("A registered reason name, or a custom reason when allowed")
      .setRequired(true)
      .setMaxLength(MAX_REASON_LENGTH)
  )
  .addIntegerOption((o) =>
    o.setName("points").setDescription("Points for a custom reason (default 1)").setMinValue(1).setMaxValue(1000)
  )
  .setDefaultMemberPermissions(PermissionFlagsBits.BanMembers)
  .setContexts(InteractionContextType.Guild);

/**
 * Why a warning may not be issued, or null when it may.
 */
export function warnRefusal(author: GuildMember, target: GuildMember, ownerId: string): string | null {
  if (target.id === author.id) return "You cannot warn yourself.";
  if (target.user.bot) return "You cannot warn other bots.";
  if (target.id === ownerId) return "You cannot warn the server owner.";
  if (author.id !== ownerId && target.roles.highest.position >= author.roles.highest.position) {
    return "The person you're trying to warn is equal or higher than you in the discord hierarchy, you cannot warn them.";
  }
  return null;
}

/**
 * Registered reason by name (its points win), a custom one when allowed, or null.
 */
export function resolveWarnReason(
  guildId: string,
  input: string,
  points: number,
  allowCustom: boolean
): WarnReason | null {
  const registered = getReason(guildId, input);
  if (registered) return registered;
  if (!allowCustom) return null;
  return { name: "custom", points, description: input };
}

export async function executeWarn(ctx: CommandContext<ChatInputCommandInteraction>): Promise<void> {
  const interaction = await requireGuild(ctx.interaction);
  if (!interaction) return;
  const { guild, member: author } = interaction;

  const user = interaction.options.getUser("user", true);
  const input = interaction.options.getString("reason", true);
  const points = interaction.options.getInteger("points") ?? 1;

  ctx.step("validate");
  const member = await fetchMember(guild, user.id);
  if (!member) {
    await replyOrEdit(interaction, { content: "That user is not in this server." });
    return;
  }
  const refusal = warnRefusal(author, member, guild.ownerId);
  if (refusal) {
    await replyOrEdit(interaction, { content: refusal });
    return;
  }

  const settings = getGuildSettings(guild.id);
  const reason = resolveWarnReason(guild.id, input, points, settings.warnAllowCustomReasons);
  if (!reason) {
    let content = "That is not a registered reason!";
    if (author.permissions.has(PermissionFlagsBits.ManageGuild)) {
      content += " Use /warnset allowcustomreasons true to enable custom reasons.";
    }
    await replyOrEdit(interaction, { content });
    return;
  }

  await ensureDeferred(interaction, { ephemeral: false });

  ctx.step("store");
  addWarning({
    id: interaction.id,
    guildId: guild.id,
    userId: member.id,
    points: reason.points,
    description: reason.description,
    moderatorId: author.id,
    createdAt: nowUtc(),
  });
  const total = totalPoints(guild.id, member.id);
  logger.info(
    { guildId: guild.id, userId: member.id, points: reason.points, total, warnId: interaction.id },
    "[warnings] Warning issued"
  );

  ctx.step("threshold");
  const action = exceededAction(listActions(guild.id), total);
  const note = action ? await applyExceedAction(guild, author, member, action) : null;

  ctx.step("notify");
  const moderator = settings.warnShowMod ? author.user : null;
  let dmFailed = false;
  if (settings.warnToggleDm) {
    dmFailed = !(await sendWarningDm(guild, user, warningEmbed(reason.description, reason.points, moderator)));
  }

  const embeds: EmbedBuilder[] = [];
  if (settings.warnToggleChannel) {
    const embed = warningEmbed(reason.description, reason.points, moderator);
    const posted = await postToWarnChannel(guild, settings, user, embed);
    // No usable warn channel: the warning goes into this channel's reply instead
    if (!posted) embeds.push(embed);
  }

  ctx.step("case");
  await createCase(guild, {
    action: "warning",
    user,
    moderator: author.user,
    reason: warningCaseReason(reason.description, reason.points, user.id, interaction.id),
  });

  ctx.step("reply");
  let content = dmFailed
    ? `A warning for ${user} has been issued, but I wasn't able to send them a warn message.`
    : `${user} has been warned.`;
  if (note) content += `\n${note}`;
  await replyOrEdit(
    interaction,
    { content, embeds, allowedMentions: SAFE_ALLOWED_MENTIONS },
    { ephemeral: false }
  );
}

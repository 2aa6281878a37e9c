/**
 * tidewatch — src/commands/reason.ts
 * WHAT: /reason amends the reason on a modlog case (latest case when no number is given).
 * FLOWS: resolve case → authorize → update row → re-render posted message
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import {
  InteractionContextType,
  PermissionFlagsBits,
  SlashCommandBuilder,
  type ChatInputCommandInteraction,
  type GuildMember,
} from "discord.js";
import { replyOrEdit, type CommandContext } from "../lib/cmdWrap.js";
import { logger } from "../lib/logger.js";
import { MAX_REASON_LENGTH } from "../lib/constants.js";
import { isOwner } from "../lib/owner.js";
import { nowUtc } from "../lib/time.js";
import { getCase, getLatestCase, updateCaseReason, type ModCase } from "../store/caseStore.js";
import { refreshCaseMessage } from "../features/modlog/createCase.js";
import { requireGuild } from "./shared.js";

export const data = new SlashCommandBuilder()
  .setName("reason")
  .setDescription("Set the reason for a modlog case")
  .addStringOption((o) =>
    o.setName("reason").setDescription("New reason").setRequired(true).setMaxLength(MAX_REASON_LENGTH)
  )
  .addIntegerOption((o) => o.setName("case").setDescription("Case number (latest if empty)").setMinValue(1))
  .setContexts(InteractionContextType.Guild);

/**
 * The case's moderator may always amend it. Anyone else needs Manage Server,
 * ownership of the guild, or the bot-owner override.
 */
export function canAmendCase(member: GuildMember, modCase: ModCase): boolean {
  if (modCase.moderatorId === member.id) return true;
  if (member.id === member.guild.ownerId) return true;
  if (isOwner(member.id)) return true;
  return member.permissions.has(PermissionFlagsBits.ManageGuild);
}

export async function execute(ctx: CommandContext<ChatInputCommandInteraction>): Promise<void> {
  const interaction = await requireGuild(ctx.interaction);
  if (!interaction) return;
  const { guild, member } = interaction;

  const caseNumber = interaction.options.getInteger("case");
  const reason = interaction.options.getString("reason", true);

  ctx.step("lookup");
  let modCase: ModCase | null;
  if (caseNumber === null) {
    modCase = getLatestCase(guild.id);
    if (!modCase) {
      await replyOrEdit(interaction, { content: "There are no modlog cases in this server." });
      return;
    }
  } else {
    modCase = getCase(guild.id, caseNumber);
    if (!modCase) {
      await replyOrEdit(interaction, { content: "That case does not exist!" });
      return;
    }
  }

  if (!canAmendCase(member, modCase)) {
    await replyOrEdit(interaction, { content: "You are not authorized to modify that case!" });
    return;
  }

  ctx.step("update");
  updateCaseReason(guild.id, modCase.caseNumber, reason, member.id, nowUtc());
  logger.info(
    { guildId: guild.id, caseNumber: modCase.caseNumber, amendedBy: member.id },
    "[modlog] Case reason updated"
  );
  await refreshCaseMessage(guild, modCase.caseNumber);

  await replyOrEdit(interaction, { content: `Reason for case #${modCase.caseNumber} has been updated.` });
}

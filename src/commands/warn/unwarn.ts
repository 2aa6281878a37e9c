/**
 * tidewatch — src/commands/warn/unwarn.ts
 * WHAT: /unwarn removes one warning and runs the drop action for the threshold it falls below.
 * FLOWS:
 *  - checks → points before → delete → points after → droppedAction → applyDropAction → unwarned case
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import {
  InteractionContextType,
  PermissionFlagsBits,
  SlashCommandBuilder,
  type ChatInputCommandInteraction,
} from "discord.js";
import { ensureDeferred, replyOrEdit, type CommandContext } from "../../lib/cmdWrap.js";
import { logger } from "../../lib/logger.js";
import { MAX_REASON_LENGTH, SAFE_ALLOWED_MENTIONS } from "../../lib/constants.js";
import { deleteWarning, getWarning, listActions, totalPoints } from "../../store/warningStore.js";
import { createCase } from "../../features/modlog/createCase.js";
import { applyDropAction } from "../../features/warnings/actions.js";
import { droppedAction } from "../../features/warnings/thresholds.js";
import { fetchMember, requireGuild } from "../shared.js";

export const unwarnData = new SlashCommandBuilder()
  .setName("unwarn")
  .setDescription("Remove a warning from a user")
  .addUserOption((o) => o.setName("user").setDescription("Warned user").setRequired(true))
  .addStringOption((o) =>
    o.setName("warn_id").setDescription("Warning ID, as shown by /warnings").setRequired(true).setMaxLength(20)
  )
  .addStringOption((o) =>
    o.setName("reason").setDescription("Why the warning is removed").setMaxLength(MAX_REASON_LENGTH)
  )
  .setDefaultMemberPermissions(PermissionFlagsBits.BanMembers)
  .setContexts(InteractionContextType.Guild);

export async function executeUnwarn(ctx: CommandContext<ChatInputCommandInteraction>): Promise<void> {
  const interaction = await requireGuild(ctx.interaction);
  if (!interaction) return;
  const { guild, member: author } = interaction;

  const user = interaction.options.getUser("user", true);
  const warnId = interaction.options.getString("warn_id", true).trim();
  const reason = interaction.options.getString("reason");

  if (user.id === author.id) {
    await replyOrEdit(interaction, { content: "You cannot remove warnings from yourself." });
    return;
  }
  if (!getWarning(guild.id, user.id, warnId)) {
    await replyOrEdit(interaction, { content: "That warning doesn't exist!" });
    return;
  }

  await ensureDeferred(interaction, { ephemeral: false });

  ctx.step("delete");
  const before = totalPoints(guild.id, user.id);
  deleteWarning(guild.id, user.id, warnId);
  const after = totalPoints(guild.id, user.id);
  logger.info({ guildId: guild.id, userId: user.id, warnId, before, after }, "[warnings] Warning removed");

  ctx.step("threshold");
  let note: string | null = null;
  const action = droppedAction(listActions(guild.id), before, after);
  if (action) {
    const member = await fetchMember(guild, user.id);
    if (member) note = await applyDropAction(guild, author, member, action);
  }

  ctx.step("case");
  await createCase(guild, { action: "unwarned", user, moderator: author.user, reason });

  let content = `Warning \`${warnId}\` removed from ${user}.`;
  if (note) content += `\n${note}`;
  await replyOrEdit(interaction, { content, allowedMentions: SAFE_ALLOWED_MENTIONS }, { ephemeral: false });
}

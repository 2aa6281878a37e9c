/**
 * tidewatch — src/commands/urban.ts
 * WHAT: /urban looks a word up on Urban Dictionary and pages through the definitions.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { SlashCommandBuilder, type ChatInputCommandInteraction, type EmbedBuilder } from "discord.js";
import { ensureDeferred, replyOrEdit, type CommandContext } from "../lib/cmdWrap.js";
import { logger } from "../lib/logger.js";
import { searchUrban } from "../features/lookup/urban.js";
import { paginate } from "../ui/paginator.js";

export const data = new SlashCommandBuilder()
  .setName("urban")
  .setDescription("Search the Urban Dictionary")
  .addStringOption((o) => o.setName("word").setDescription("Word or phrase").setRequired(true).setMaxLength(200));

const NOTHING_FOUND = "No Urban Dictionary entries were found, or there was an error in the process.";

export async function execute(ctx: CommandContext<ChatInputCommandInteraction>): Promise<void> {
  const { interaction } = ctx;
  const word = interaction.options.getString("word", true);

  await ensureDeferred(interaction, { ephemeral: false });
  ctx.step("search");
  let embeds: EmbedBuilder[];
  try {
    embeds = await searchUrban(word);
  } catch (err) {
    logger.warn({ err, word }, "[urban] Lookup failed");
    embeds = [];
  }

  if (embeds.length === 0) {
    await replyOrEdit(interaction, { content: NOTHING_FOUND });
    return;
  }
  await paginate(interaction, embeds);
}

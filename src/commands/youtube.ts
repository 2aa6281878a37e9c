/**
 * tidewatch — src/commands/youtube.ts
 * WHAT: /youtube pages through video links from a YouTube search.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { SlashCommandBuilder, type ChatInputCommandInteraction } from "discord.js";
import { ensureDeferred, replyOrEdit, type CommandContext } from "../lib/cmdWrap.js";
import { searchYoutube } from "../features/lookup/youtube.js";
import { paginate } from "../ui/paginator.js";

export const data = new SlashCommandBuilder()
  .setName("youtube")
  .setDescription("Search YouTube")
  .addStringOption((o) => o.setName("query").setDescription("Search terms").setRequired(true).setMaxLength(200));

export async function execute(ctx: CommandContext<ChatInputCommandInteraction>): Promise<void> {
  const { interaction } = ctx;
  await ensureDeferred(interaction, { ephemeral: false });

  ctx.step("search");
  const urls = await searchYoutube(interaction.options.getString("query", true));
  if (urls.length === 0) {
    await replyOrEdit(interaction, { content: "Nothing found." });
    return;
  }
  await paginate(interaction, urls);
}

/**
 * tidewatch — src/commands/gif.ts
 * WHAT: /gif search|trending: random Tenor gif. NSFW channels lift the content filter.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { SlashCommandBuilder, type ChatInputCommandInteraction } from "discord.js";
import { ensureDeferred, replyOrEdit, type CommandContext } from "../lib/cmdWrap.js";
import { featuredGif, searchGif } from "../features/lookup/tenor.js";

export const data = new SlashCommandBuilder()
  .setName("gif")
  .setDescription("Post a gif from Tenor")
  .addSubcommand((sc) =>
    sc
      .setName("search")
      .setDescription("Random gif for some keywords")
      .addStringOption((o) => o.setName("keywords").setDescription("Keywords").setRequired(true).setMaxLength(200))
  )
  .addSubcommand((sc) => sc.setName("trending").setDescription("Random trending gif"));

/** Age-restricted guild channel; false in DMs and threads of unknown parents. */
export function inNsfwChannel(interaction: ChatInputCommandInteraction): boolean {
  const channel = interaction.channel;
  if (!channel || channel.isDMBased()) return false;
  if (channel.isThread()) return channel.parent?.nsfw ?? false;
  return "nsfw" in channel && channel.nsfw;
}

export async function execute(ctx: CommandContext<ChatInputCommandInteraction>): Promise<void> {
  const { interaction } = ctx;
  const subcommand = interaction.options.getSubcommand();
  const opts = { nsfw: inNsfwChannel(interaction) };

  await ensureDeferred(interaction, { ephemeral: false });
  ctx.step(subcommand);
  const url =
    subcommand === "search"
      ? await searchGif(interaction.options.getString("keywords", true), opts)
      : await featuredGif(opts);

  if (!url) {
    await replyOrEdit(interaction, { content: "No results found." });
    return;
  }
  await replyOrEdit(interaction, { content: url });
}

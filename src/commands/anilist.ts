/**
 * tidewatch — src/commands/anilist.ts
 * WHAT: /anilist anime|manga|character|user: AniList search, one embed per result.
 * DOCS:
 *  - AniList GraphQL: https://docs.anilist.co/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { SlashCommandBuilder, type ChatInputCommandInteraction, type EmbedBuilder } from "discord.js";
import { ensureDeferred, replyOrEdit, type CommandContext } from "../lib/cmdWrap.js";
import { searchCharacters, searchMedia, searchUsers } from "../features/lookup/anilist.js";
import { paginate } from "../ui/paginator.js";

export const data = new SlashCommandBuilder()
  .setName("anilist")
  .setDescription("Search AniList")
  .addSubcommand((sc) =>
    sc
      .setName("anime")
      .setDescription("Search for an anime")
      .addStringOption((o) => o.setName("query").setDescription("Title").setRequired(true).setMaxLength(200))
  )
  .addSubcommand((sc) =>
    sc
      .setName("manga")
      .setDescription("Search for a manga")
      .addStringOption((o) => o.setName("query").setDescription("Title").setRequired(true).setMaxLength(200))
  )
  .addSubcommand((sc) =>
    sc
      .setName("character")
      .setDescription("Search for a character")
      .addStringOption((o) => o.setName("query").setDescription("Name").setRequired(true).setMaxLength(200))
  )
  .addSubcommand((sc) =>
    sc
      .setName("user")
      .setDescription("Search for an AniList user")
      .addStringOption((o) => o.setName("query").setDescription("Username").setRequired(true).setMaxLength(200))
  );

function search(subcommand: string, query: string): Promise<EmbedBuilder[]> {
  switch (subcommand) {
    case "anime":
      return searchMedia(query, "ANIME");
    case "manga":
      return searchMedia(query, "MANGA");
    case "character":
      return searchCharacters(query);
    default:
      return searchUsers(query);
  }
}

export async function execute(ctx: CommandContext<ChatInputCommandInteraction>): Promise<void> {
  const { interaction } = ctx;
  const subcommand = interaction.options.getSubcommand();
  const query = interaction.options.getString("query", true);

  await ensureDeferred(interaction, { ephemeral: false });
  ctx.step(`search_${subcommand}`);
  const embeds = await search(subcommand, query);
  if (embeds.length === 0) {
    await replyOrEdit(interaction, { content: "No results found." });
    return;
  }
  await paginate(interaction, embeds);
}

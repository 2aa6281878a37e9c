/**
 * tidewatch — src/features/raffles/embeds.ts
 * WHAT: The raffle message (embed + entry button) and its finished form.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { ActionRowBuilder, ButtonBuilder, ButtonStyle, EmbedBuilder } from "discord.js";
import { EMBED_COLOR_DEFAULT } from "../../lib/constants.js";
import { discordTimestamp } from "../../lib/time.js";
import type { Raffle } from "../../store/raffleStore.js";
import { rolesLine } from "../polls/embeds.js";

export const RAFFLE_ENTRY_ID = "raffle:enter";

function whenLine(ts: number): string {
  return `${discordTimestamp(ts, "D")} ◈ ${discordTimestamp(ts, "R")}`;
}

/** One winner as a mention, several as a numbered list */
export function winnersLine(winnerIds: readonly string[]): string {
  const [only] = winnerIds;
  if (winnerIds.length === 1 && only) return `<@${only}>`;
  if (winnerIds.length === 0) return "Nobody!";
  return winnerIds.map((id, i) => `**${i + 1}.** <@${id}>`).join("\n");
}

export function buildRaffleEmbed(raffle: Raffle, guildName: string): EmbedBuilder {
  const embed = new EmbedBuilder()
    .setColor(EMBED_COLOR_DEFAULT)
    .setAuthor({ name: `${guildName} Raffle!` })
    .setTitle(raffle.title)
    .addFields(
      { name: "Ends", value: whenLine(raffle.endTime), inline: false },
      { name: "Hosted By", value: `<@${raffle.hostId}>`, inline: false },
      { name: "Allowed Roles", value: rolesLine(raffle.roleIds), inline: true },
      { name: "Winners Pulled", value: String(raffle.winnerCount), inline: true }
    )
    .setFooter({
      text: "Click the button to enter the raffle. If interaction fails, try again later. Bot might be down.",
    });
  if (raffle.description) embed.setDescription(raffle.description);
  if (raffle.daysOnServer > 0) {
    embed.addFields({ name: "Days on Server to Enter", value: String(raffle.daysOnServer), inline: true });
  }
  return embed;
}

export function buildRaffleButton(entries: number): ActionRowBuilder<ButtonBuilder> {
  return new ActionRowBuilder<ButtonBuilder>().addComponents(
    new ButtonBuilder()
      .setCustomId(RAFFLE_ENTRY_ID)
      .setLabel(entries === 0 ? "Enter Raffle!" : `Enter Raffle! ◈ ${entries}`)
      .setEmoji("🎟️")
      .setStyle(ButtonStyle.Success)
  );
}

/**
 * Finished form: "Ended on" and the host, plus the winners when any were drawn.
 */
export function buildFinishedRaffleEmbed(
  raffle: Raffle,
  guildName: string,
  botName: string,
  endedAt: number,
  winnerIds: readonly string[]
): EmbedBuilder {
  const embed = buildRaffleEmbed(raffle, guildName)
    .setFields(
      { name: "Ended on", value: whenLine(endedAt), inline: false },
      { name: "Hosted By", value: `<@${raffle.hostId}>`, inline: false }
    )
    .setFooter({ text: `Guild raffles brought to you by ${botName}!` });
  if (winnerIds.length > 0) {
    embed.addFields({ name: "Winners", value: winnersLine(winnerIds), inline: false });
  }
  return embed;
}

/**
 * tidewatch — src/features/polls/embeds.ts
 * WHAT: The poll message (embed + vote buttons), its ended form and the results embed.
 * DOCS:
 *  - EmbedBuilder: https://discord.js.org/#/docs/builders/main/class/EmbedBuilder
 *  - ButtonBuilder: https://discord.js.org/#/docs/builders/main/class/ButtonBuilder
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { ActionRowBuilder, ButtonBuilder, ButtonStyle, EmbedBuilder } from "discord.js";
import { EMBED_COLOR_DEFAULT } from "../../lib/constants.js";
import { discordTimestamp } from "../../lib/time.js";
import type { Poll, PollOption, PollVoteType } from "../../store/pollStore.js";

/** Regional indicator A..J */
const OPTION_EMOJIS = ["🇦", "🇧", "🇨", "🇩", "🇪", "🇫", "🇬", "🇭", "🇮", "🇯"];

const VOTE_TYPE_LABEL: Record<PollVoteType, string> = {
  single: "Single Vote",
  multi: "Multi Vote",
};

const POLL_VOTE_PREFIX = "poll:vote:";

function optionEmoji(index: number): string {
  return OPTION_EMOJIS[index] ?? `${index + 1}.`;
}

export function optionLine(option: Pick<PollOption, "index" | "label">): string {
  return `${optionEmoji(option.index)} ${option.label}`;
}

export function rolesLine(roleIds: readonly string[]): string {
  if (roleIds.length === 0) return "@everyone";
  return roleIds.map((id) => `<@&${id}>`).join(" ");
}

function whenLine(ts: number): string {
  return `${discordTimestamp(ts, "D")} ◈ ${discordTimestamp(ts, "R")}`;
}

export function buildPollEmbed(poll: Poll, guildName: string): EmbedBuilder {
  return new EmbedBuilder()
    .setColor(EMBED_COLOR_DEFAULT)
    .setAuthor({ name: `${guildName} Poll!` })
    .setTitle(poll.question)
    .setDescription(poll.options.map(optionLine).join("\n"))
    .addFields(
      { name: "Ends", value: whenLine(poll.endTime), inline: false },
      { name: "Hosted By", value: `<@${poll.hostId}>`, inline: true },
      { name: "Mode", value: VOTE_TYPE_LABEL[poll.voteType], inline: true },
      { name: "Allowed Roles", value: rolesLine(poll.roleIds), inline: true }
    )
    .setFooter({
      text: "Click the buttons below to vote. If interaction fails, try again later. Bot might be down.",
    });
}

/**
 * One button per option showing its vote count. More than five options split over two rows.
 */
export function buildPollButtons(poll: Poll): ActionRowBuilder<ButtonBuilder>[] {
  const perRow = poll.options.length > 5 ? Math.ceil(poll.options.length / 2) : 5;
  const rows: ActionRowBuilder<ButtonBuilder>[] = [];
  poll.options.forEach((option, i) => {
    if (i % perRow === 0) rows.push(new ActionRowBuilder<ButtonBuilder>());
    rows[rows.length - 1]?.addComponents(
      new ButtonBuilder()
        .setCustomId(`${POLL_VOTE_PREFIX}${option.index}`)
        .setLabel(`[${option.votes.length}]`)
        .setEmoji(optionEmoji(option.index))
        .setStyle(ButtonStyle.Secondary)
    );
  });
  return rows;
}

interface CountedLine {
  votes: number;
  line: string;
}

/** "`3 ` - 🇦 Yes", counts padded to the widest */
function countedLines(poll: Poll): CountedLine[] {
  const width = Math.max(...poll.options.map((o) => String(o.votes.length).length));
  return poll.options.map((option) => ({
    votes: option.votes.length,
    line: `\`${String(option.votes.length).padEnd(width)}\` - ${optionLine(option)}`,
  }));
}

export function totalVotes(poll: Poll): number {
  return poll.options.reduce((sum, o) => sum + o.votes.length, 0);
}

export function resultsFooter(poll: Poll): string {
  const total = totalVotes(poll);
  if (poll.voteType === "single") return `A total of ${total} votes were submitted!`;
  const voters = new Set(poll.options.flatMap((o) => o.votes)).size;
  return `A total of ${total} votes were submitted by ${voters} user${voters > 1 ? "s" : ""}`;
}

/**
 * What the poll message turns into once voting closes: counts in option order, no buttons.
 */
export function buildEndedPollEmbed(poll: Poll, guildName: string, botName: string): EmbedBuilder {
  const endedAt = poll.endedAt ?? poll.endTime;
  const embed = buildPollEmbed(poll, guildName)
    .setDescription(countedLines(poll).map((c) => c.line).join("\n"))
    .setFooter({ text: `Guild polls brought to you by ${botName}!` });
  embed.spliceFields(0, 1, { name: "Ended", value: whenLine(endedAt), inline: false });
  return embed;
}

/** Options sorted by votes, most first; ties keep option order. */
export function buildPollResultsEmbed(poll: Poll, guildName: string): EmbedBuilder {
  const endedAt = poll.endedAt ?? poll.endTime;
  const sorted = [...countedLines(poll)].sort((a, b) => b.votes - a.votes);
  return new EmbedBuilder()
    .setColor(EMBED_COLOR_DEFAULT)
    .setAuthor({ name: `${guildName} Poll Results!` })
    .setTitle(poll.question)
    .setDescription(sorted.map((c) => c.line).join("\n"))
    .addFields({ name: "Ended", value: whenLine(endedAt), inline: false })
    .setFooter({ text: resultsFooter(poll) });
}

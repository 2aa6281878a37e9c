/**
 * tidewatch — src/commands/poll.ts
 * WHAT: /poll start|end|list|results
 * FLOWS:
 *  - start → channel permissions → time → active limit → options → post embed + buttons → createPoll
 *  - end → pick the active poll (by message id, or the only one) → endPoll
 *  - list → active and recent polls with links and vote counts
 *  - results → results embed of an ended poll
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import {
  ChannelType,
  EmbedBuilder,
  InteractionContextType,
  PermissionFlagsBits,
  SlashCommandBuilder,
  type ChatInputCommandInteraction,
} from "discord.js";
import { ensureDeferred, replyOrEdit, type CommandContext } from "../lib/cmdWrap.js";
import { EMBED_COLOR_DEFAULT, POLL_MAX_OPTIONS } from "../lib/constants.js";
import { logger } from "../lib/logger.js";
import { messageLink } from "../lib/messageLookup.js";
import { parseRoleIds, truncate } from "../lib/text.js";
import { discordTimestamp, nowUtc } from "../lib/time.js";
import {
  countActivePolls,
  createPoll,
  getPoll,
  listActivePolls,
  listPollHistory,
  type Poll,
  type PollVoteType,
} from "../store/pollStore.js";
import { buildPollButtons, buildPollEmbed, buildPollResultsEmbed, totalVotes } from "../features/polls/embeds.js";
import { endPoll } from "../features/polls/lifecycle.js";
import {
  parseMessageId,
  parseRunTime,
  requireGuild,
  requirePostingChannel,
  selectByMessageId,
  type GuildInteraction,
} from "./shared.js";

export const data = new SlashCommandBuilder()
  .setName("poll")
  .setDescription("Create and manage polls")
  .addSubcommand((sc) =>
    sc
      .setName("start")
      .setDescription("Start a poll")
      .addChannelOption((o) =>
        o
          .setName("channel")
          .setDescription("Where to post the poll")
          .setRequired(true)
          .addChannelTypes(
            ChannelType.GuildText,
            ChannelType.GuildAnnouncement,
            ChannelType.GuildVoice,
            ChannelType.GuildStageVoice,
            ChannelType.PublicThread,
            ChannelType.PrivateThread,
            ChannelType.AnnouncementThread
          )
      )
      .addStringOption((o) =>
        o.setName("time").setDescription("How long it runs, 5 minutes to 8 weeks (e.g. 2 days 4h)").setRequired(true)
      )
      .addStringOption((o) =>
        o.setName("question").setDescription("The question").setRequired(true).setMaxLength(256)
      )
      .addStringOption((o) =>
        o
          .setName("options")
          .setDescription(`2 to ${POLL_MAX_OPTIONS} answers separated by |`)
          .setRequired(true)
      )
      .addStringOption((o) =>
        o
          .setName("mode")
          .setDescription("One vote per member, or one per option")
          .addChoices({ name: "Single Vote", value: "single" }, { name: "Multi Vote", value: "multi" })
      )
      .addStringOption((o) => o.setName("roles").setDescription("Only these roles may vote (mentions or ids)"))
  )
  .addSubcommand((sc) =>
    sc
      .setName("end")
      .setDescription("End a poll now and post its results")
      .addStringOption((o) => o.setName("message_id").setDescription("Poll message id or link"))
  )
  .addSubcommand((sc) => sc.setName("list").setDescription("List current and recent polls"))
  .addSubcommand((sc) =>
    sc
      .setName("results")
      .setDescription("Show the results of a recent poll")
      .addStringOption((o) =>
        o.setName("message_id").setDescription("Poll message id or link").setRequired(true)
      )
  )
  .setDefaultMemberPermissions(PermissionFlagsBits.ManageGuild)
  .setContexts(InteractionContextType.Guild);

/** Answers from "a | b | c"; blanks dropped */
export function parsePollOptions(text: string): string[] {
  return text
    .split("|")
    .map((option) => option.trim())
    .filter((option) => option.length > 0)
    .map((option) => truncate(option, 80));
}

export async function execute(ctx: CommandContext<ChatInputCommandInteraction>): Promise<void> {
  const interaction = await requireGuild(ctx.interaction);
  if (!interaction) return;
  const subcommand = interaction.options.getSubcommand();
  ctx.step(subcommand);

  switch (subcommand) {
    case "start":
      await handleStart(ctx, interaction);
      return;
    case "end":
      await handleEnd(interaction);
      return;
    case "list":
      await handleList(interaction);
      return;
    case "results":
      await handleResults(interaction);
      return;
    default:
      logger.warn({ subcommand }, "[poll] Unknown subcommand");
  }
}

async function handleStart(ctx: CommandContext<ChatInputCommandInteraction>, interaction: GuildInteraction) {
  const channel = await requirePostingChannel(interaction, "polls");
  if (!channel) return;

  const guildId = interaction.guildId;
  const runTime = parseRunTime(interaction.options.getString("time", true), "poll", countActivePolls(guildId));
  if (typeof runTime === "string") {
    await replyOrEdit(interaction, { content: runTime });
    return;
  }

  const options = parsePollOptions(interaction.options.getString("options", true));
  if (options.length < 2) {
    await replyOrEdit(interaction, { content: "A poll needs at least 2 options, separated by `|`." });
    return;
  }
  if (options.length > POLL_MAX_OPTIONS) {
    await replyOrEdit(interaction, { content: `A poll can't have more than ${POLL_MAX_OPTIONS} options.` });
    return;
  }

  const roleIds = parseRoleIds(interaction.options.getString("roles") ?? "").filter((id) =>
    interaction.guild.roles.cache.has(id)
  );
  const voteType: PollVoteType = interaction.options.getString("mode") === "multi" ? "multi" : "single";

  await ensureDeferred(interaction);

  ctx.step("post");
  const draft: Poll = {
    messageId: "",
    guildId,
    channelId: channel.id,
    hostId: interaction.user.id,
    question: interaction.options.getString("question", true),
    voteType,
    roleIds,
    endTime: nowUtc() + runTime.durationSeconds,
    endedAt: null,
    options: options.map((label, index) => ({ index, label, votes: [] })),
  };
  const message = await channel.send({
    embeds: [buildPollEmbed(draft, interaction.guild.name)],
    components: buildPollButtons(draft),
  });

  ctx.step("store");
  createPoll({ ...draft, messageId: message.id, options });
  await replyOrEdit(interaction, {
    content: `Poll sent! ${messageLink(guildId, channel.id, message.id)}`,
  });
}

async function handleEnd(interaction: GuildInteraction) {
  const active = listActivePolls(interaction.guildId);
  if (active.length === 0) {
    await replyOrEdit(interaction, { content: "There are no active polls running in the server." });
    return;
  }

  const target = selectByMessageId(active, parseMessageId(interaction.options.getString("message_id")));
  if (target === "missing") {
    await replyOrEdit(interaction, { content: "I couldn't find a poll with that message ID." });
    return;
  }
  if (target === "ambiguous") {
    const lines = active.map((p) => `\`${p.messageId}\` ${p.question}`);
    await replyOrEdit(interaction, {
      content: `There are ${active.length} active polls. Give the message ID of the one to end:\n${lines.join("\n")}`,
    });
    return;
  }

  await ensureDeferred(interaction);
  const ended = await endPoll(interaction.guild, target);
  await replyOrEdit(interaction, {
    content: ended ? "Poll ended." : "I couldn't find the poll message, so the poll was removed.",
  });
}

function listLine(poll: Poll, ts: number): string {
  return [
    `${poll.question} ◈ ${messageLink(poll.guildId, poll.channelId, poll.messageId)}`,
    `${discordTimestamp(ts, "D")} ${discordTimestamp(ts, "R")} ◈ Votes: ${totalVotes(poll)}`,
  ].join("\n");
}

async function handleList(interaction: GuildInteraction) {
  const active = listActivePolls(interaction.guildId);
  const history = listPollHistory(interaction.guildId);
  if (active.length === 0 && history.length === 0) {
    await replyOrEdit(interaction, { content: "There are no current or past polls in this server." });
    return;
  }

  const embed = new EmbedBuilder()
    .setColor(EMBED_COLOR_DEFAULT)
    .setAuthor({ name: `List of polls in ${interaction.guild.name}` })
    .setFooter({ text: "Name ◈ Message Link ◈ Ends/Ended ◈ Votes" });
  if (active.length > 0) {
    embed.addFields({
      name: "Active Polls",
      value: truncate(active.map((p) => listLine(p, p.endTime)).join("\n\n"), 1024),
    });
  }
  if (history.length > 0) {
    embed.addFields({
      name: "Past Polls",
      value: truncate(history.map((p) => listLine(p, p.endedAt ?? p.endTime)).join("\n\n"), 1024),
    });
  }
  await replyOrEdit(interaction, { embeds: [embed] });
}

async function handleResults(interaction: GuildInteraction) {
  const messageId = parseMessageId(interaction.options.getString("message_id", true));
  const poll = messageId ? getPoll(messageId) : null;
  if (!poll || poll.guildId !== interaction.guildId) {
    await replyOrEdit(interaction, { content: "I couldn't find a poll with that message ID." });
    return;
  }
  if (poll.endedAt === null) {
    await replyOrEdit(interaction, { content: "That poll is still running. Its results are posted when it ends." });
    return;
  }
  await replyOrEdit(interaction, { embeds: [buildPollResultsEmbed(poll, interaction.guild.name)] });
}

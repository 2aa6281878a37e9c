/**
 * tidewatch — src/commands/raffle.ts
 * WHAT: /raffle start|end|cancel|reroll|list|mention
 * FLOWS:
 *  - start → channel permissions → time → active limit → post (pinging the mention role) → createRaffle
 *  - end | cancel → pick the active raffle → endRaffle | cancelRaffle
 *  - reroll → pick a raffle from history (latest by default) → rerollRaffle
 *  - mention → set or clear the role pinged for new raffles
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import {
  ChannelType,
  EmbedBuilder,
  InteractionContextType,
  PermissionFlagsBits,
  SlashCommandBuilder,
  type ChatInputCommandInteraction,
  type MessageMentionOptions,
  type Role,
} from "discord.js";
import { ensureDeferred, replyOrEdit, type CommandContext } from "../lib/cmdWrap.js";
import { EMBED_COLOR_DEFAULT } from "../lib/constants.js";
import { logger } from "../lib/logger.js";
import { messageLink } from "../lib/messageLookup.js";
import { parseRoleIds, truncate } from "../lib/text.js";
import { discordTimestamp, nowUtc } from "../lib/time.js";
import {
  countActiveRaffles,
  createRaffle,
  getRaffleMentionRole,
  listActiveRaffles,
  listRaffleHistory,
  setRaffleMentionRole,
  type Raffle,
} from "../store/raffleStore.js";
import { buildRaffleButton, buildRaffleEmbed } from "../features/raffles/embeds.js";
import { cancelRaffle, endRaffle, rerollRaffle, type RaffleOutcome } from "../features/raffles/lifecycle.js";
import {
  parseMessageId,
  parseRunTime,
  requireGuild,
  requirePostingChannel,
  selectByMessageId,
  type GuildInteraction,
} from "./shared.js";

const MAX_WINNERS = 50;

export const data = new SlashCommandBuilder()
  .setName("raffle")
  .setDescription("Run raffles and giveaways")
  .addSubcommand((sc) =>
    sc
      .setName("start")
      .setDescription("Start a raffle")
      .addChannelOption((o) =>
        o
          .setName("channel")
          .setDescription("Where to post the raffle")
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
        o.setName("time").setDescription("How long it runs, 5 minutes to 8 weeks (e.g. 1 week)").setRequired(true)
      )
      .addStringOption((o) =>
        o.setName("title").setDescription("What is being raffled").setRequired(true).setMaxLength(256)
      )
      .addStringOption((o) => o.setName("description").setDescription("Details shown in the embed").setMaxLength(2048))
      .addIntegerOption((o) =>
        o.setName("winners").setDescription("How many winners to draw").setMinValue(1).setMaxValue(MAX_WINNERS)
      )
      .addIntegerOption((o) =>
        o.setName("days").setDescription("Days a member must have been in the server to enter").setMinValue(0)
      )
      .addStringOption((o) => o.setName("roles").setDescription("Only these roles may enter (mentions or ids)"))
  )
  .addSubcommand((sc) =>
    sc
      .setName("end")
      .setDescription("End a raffle now and draw its winners")
      .addStringOption((o) => o.setName("message_id").setDescription("Raffle message id or link"))
  )
  .addSubcommand((sc) =>
    sc
      .setName("cancel")
      .setDescription("Cancel a raffle without drawing winners")
      .addStringOption((o) => o.setName("message_id").setDescription("Raffle message id or link"))
  )
  .addSubcommand((sc) =>
    sc
      .setName("reroll")
      .setDescription("Draw new winners for a recent raffle")
      .addStringOption((o) => o.setName("message_id").setDescription("Raffle message id or link; latest if empty"))
  )
  .addSubcommand((sc) => sc.setName("list").setDescription("List current and recent raffles"))
  .addSubcommand((sc) =>
    sc
      .setName("mention")
      .setDescription("Set the role pinged for new raffles; leave empty to stop pinging")
      .addRoleOption((o) => o.setName("role").setDescription("Role to mention"))
  )
  .setDefaultMemberPermissions(PermissionFlagsBits.ManageGuild)
  .setContexts(InteractionContextType.Guild);

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
    case "cancel":
      await handleEndOrCancel(interaction, subcommand);
      return;
    case "reroll":
      await handleReroll(interaction);
      return;
    case "list":
      await handleList(interaction);
      return;
    case "mention":
      await handleMention(interaction);
      return;
    default:
      logger.warn({ subcommand }, "[raffle] Unknown subcommand");
  }
}

function mentionPayload(role: Role): { content: string; allowedMentions: MessageMentionOptions } {
  if (role.id === role.guild.id) return { content: "@everyone", allowedMentions: { parse: ["everyone"] } };
  return { content: `<@&${role.id}>`, allowedMentions: { roles: [role.id] } };
}

async function handleStart(ctx: CommandContext<ChatInputCommandInteraction>, interaction: GuildInteraction) {
  const channel = await requirePostingChannel(interaction, "raffles");
  if (!channel) return;

  const guild = interaction.guild;
  const runTime = parseRunTime(interaction.options.getString("time", true), "raffle", countActiveRaffles(guild.id));
  if (typeof runTime === "string") {
    await replyOrEdit(interaction, { content: runTime });
    return;
  }

  await ensureDeferred(interaction);

  const draft: Raffle = {
    messageId: "",
    guildId: guild.id,
    channelId: channel.id,
    hostId: interaction.user.id,
    title: interaction.options.getString("title", true),
    description: interaction.options.getString("description"),
    winnerCount: interaction.options.getInteger("winners") ?? 1,
    daysOnServer: interaction.options.getInteger("days") ?? 0,
    roleIds: parseRoleIds(interaction.options.getString("roles") ?? "").filter((id) => guild.roles.cache.has(id)),
    endTime: nowUtc() + runTime.durationSeconds,
    endedAt: null,
    entries: [],
    winnerIds: [],
  };

  const mentionRoleId = getRaffleMentionRole(guild.id);
  const mentionRole = mentionRoleId ? guild.roles.cache.get(mentionRoleId) : undefined;

  ctx.step("post");
  const message = await channel.send({
    ...(mentionRole ? mentionPayload(mentionRole) : {}),
    embeds: [buildRaffleEmbed(draft, guild.name)],
    components: [buildRaffleButton(0)],
  });

  ctx.step("store");
  createRaffle({ ...draft, messageId: message.id });
  await replyOrEdit(interaction, { content: `Raffle sent! ${messageLink(guild.id, channel.id, message.id)}` });

  if (mentionRoleId && !mentionRole) {
    await replyOrEdit(interaction, {
      content: [
        "I was unable to get the notification role that's set.",
        "The raffle was still sent but you should set a new notification role with `/raffle mention`.",
      ].join("\n"),
    });
  }
}

async function handleEndOrCancel(interaction: GuildInteraction, action: "end" | "cancel") {
  const active = listActiveRaffles(interaction.guildId);
  if (active.length === 0) {
    await replyOrEdit(interaction, { content: "There are no active raffles running in the server." });
    return;
  }

  const target = selectByMessageId(active, parseMessageId(interaction.options.getString("message_id")));
  if (target === "missing") {
    await replyOrEdit(interaction, { content: "I couldn't find a raffle with that message ID." });
    return;
  }
  if (target === "ambiguous") {
    const lines = active.map((r) => `\`${r.messageId}\` ${r.title}`);
    await replyOrEdit(interaction, {
      content: `There are ${active.length} active raffles. Give the message ID of the one to ${action}:\n${lines.join("\n")}`,
    });
    return;
  }

  await ensureDeferred(interaction);
  if (action === "cancel") {
    const cancelled = await cancelRaffle(interaction.guild, target);
    await replyOrEdit(interaction, {
      content: cancelled ? "Raffle cancelled." : "I couldn't find the raffle message, so the raffle was removed.",
    });
    return;
  }
  const outcome = await endRaffle(interaction.guild, target);
  await replyOrEdit(interaction, { content: outcomeReply(outcome, "Raffle ended.") });
}

function outcomeReply(outcome: RaffleOutcome, done: string): string {
  if (outcome.kind === "gone") return "I couldn't find the raffle message, so the raffle was removed.";
  return done;
}

async function handleReroll(interaction: GuildInteraction) {
  const history = listRaffleHistory(interaction.guildId);
  if (history.length === 0) {
    await replyOrEdit(interaction, { content: "You haven't ran any raffles yet!" });
    return;
  }

  const messageId = parseMessageId(interaction.options.getString("message_id"));
  const target = messageId ? history.find((r) => r.messageId === messageId) : history[0];
  if (!target) {
    await replyOrEdit(interaction, { content: "I couldn't find any raffle by that message ID in my history!" });
    return;
  }

  await ensureDeferred(interaction);
  const outcome = await rerollRaffle(interaction.guild, target);
  if (outcome.kind === "gone") {
    await replyOrEdit(interaction, { content: "I couldn't find the channel the raffle was ran in!" });
    return;
  }
  await replyOrEdit(interaction, { content: outcome.kind === "drawn" ? "Raffle rerolled." : outcome.text });
}

function listLine(raffle: Raffle, ts: number, withEntries: boolean): string {
  const when = `${discordTimestamp(ts, "D")} ${discordTimestamp(ts, "R")}`;
  return [
    `${raffle.title} ◈ ${messageLink(raffle.guildId, raffle.channelId, raffle.messageId)}`,
    withEntries ? `${when} ◈ Entries: ${raffle.entries.length}` : when,
  ].join("\n");
}

async function handleList(interaction: GuildInteraction) {
  const active = listActiveRaffles(interaction.guildId);
  const history = listRaffleHistory(interaction.guildId);
  if (active.length === 0 && history.length === 0) {
    await replyOrEdit(interaction, { content: "There are no current or past raffles in this server." });
    return;
  }

  const embed = new EmbedBuilder()
    .setColor(EMBED_COLOR_DEFAULT)
    .setAuthor({ name: `List of raffles in ${interaction.guild.name}` })
    .setFooter({ text: "Name ◈ Message Link ◈ Ends/Ended ◈ Entries" });
  if (active.length > 0) {
    embed.addFields({
      name: "Active Raffles",
      value: truncate(active.map((r) => listLine(r, r.endTime, false)).join("\n\n"), 1024),
    });
  }
  if (history.length > 0) {
    embed.addFields({
      name: "Past Raffles",
      value: truncate(history.map((r) => listLine(r, r.endedAt ?? r.endTime, true)).join("\n\n"), 1024),
    });
  }
  await replyOrEdit(interaction, { embeds: [embed] });
}

async function handleMention(interaction: GuildInteraction) {
  const role = interaction.options.getRole("role");
  setRaffleMentionRole(interaction.guildId, role?.id ?? null);
  await replyOrEdit(interaction, {
    content: role
      ? `I will now mention **${role.name}** for new raffles.`
      : "I will no longer mention any role for new raffles.",
  });
}

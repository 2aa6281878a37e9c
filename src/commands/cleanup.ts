/**
 * tidewatch — src/commands/cleanup.ts
 * WHAT: /cleanup messages|user|bot|before|after bulk-deletes recent messages in this channel.
 * FLOWS:
 *  - bot permission → (over 100: confirm) → defer → [anchor message] → collectForDeletion → massPurge → count
 * Messages older than two weeks can't be bulk deleted and stop the search.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import {
  InteractionContextType,
  PermissionFlagsBits,
  SlashCommandBuilder,
  type ChatInputCommandInteraction,
  type GuildTextBasedChannel,
  type Message,
  type SlashCommandSubcommandBuilder,
} from "discord.js";
import { ensureDeferred, replyOrEdit, type CommandContext } from "../lib/cmdWrap.js";
import { CLEANUP_CONFIRM_THRESHOLD } from "../lib/constants.js";
import { discordErrorCode } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { confirm } from "../ui/confirm.js";
import { collectForDeletion, massPurge, type CollectOptions } from "../features/cleanup/purge.js";
import { parseMessageId, requireBotChannelPermission, requireGuild, type GuildInteraction } from "./shared.js";

function withNumber(sc: SlashCommandSubcommandBuilder): SlashCommandSubcommandBuilder {
  return sc.addIntegerOption((o) =>
    o.setName("number").setDescription("How many messages to delete").setRequired(true).setMinValue(1)
  );
}

function withPinned(sc: SlashCommandSubcommandBuilder): SlashCommandSubcommandBuilder {
  return sc.addBooleanOption((o) => o.setName("delete_pinned").setDescription("Also delete pinned messages"));
}

function withAnchor(sc: SlashCommandSubcommandBuilder, description: string): SlashCommandSubcommandBuilder {
  return sc.addStringOption((o) => o.setName("message_id").setDescription(description).setRequired(true));
}

export const data = new SlashCommandBuilder()
  .setName("cleanup")
  .setDescription("Delete recent messages in this channel")
  .addSubcommand((sc) => withPinned(withNumber(sc.setName("messages").setDescription("Delete the last messages"))))
  .addSubcommand((sc) =>
    withPinned(
      withNumber(
        sc
          .setName("user")
          .setDescription("Delete the last messages from one user")
          .addUserOption((o) => o.setName("user").setDescription("Whose messages").setRequired(true))
      )
    )
  )
  .addSubcommand((sc) =>
    withPinned(withNumber(sc.setName("bot").setDescription("Delete the last messages sent by bots")))
  )
  .addSubcommand((sc) =>
    withPinned(
      withNumber(
        withAnchor(sc.setName("before").setDescription("Delete messages before a message"), "Message id or link; kept")
      )
    )
  )
  .addSubcommand((sc) =>
    withPinned(
      withAnchor(sc.setName("after").setDescription("Delete every message after a message"), "Message id or link; kept")
    )
  )
  .setDefaultMemberPermissions(PermissionFlagsBits.ManageMessages)
  .setContexts(InteractionContextType.Guild);

async function fetchAnchor(channel: GuildTextBasedChannel, text: string): Promise<Message<true> | null> {
  const messageId = parseMessageId(text);
  if (!messageId) return null;
  try {
    return await channel.messages.fetch(messageId);
  } catch (err) {
    // 10008 Unknown Message
    if (discordErrorCode(err) === 10008) return null;
    throw err;
  }
}

/** Collect options for the subcommand, or null when its anchor message is missing. */
async function collectOptions(
  interaction: GuildInteraction,
  channel: GuildTextBasedChannel,
  subcommand: string
): Promise<CollectOptions | null> {
  const deletePinned = interaction.options.getBoolean("delete_pinned") ?? false;
  const number = interaction.options.getInteger("number") ?? undefined;

  switch (subcommand) {
    case "user": {
      const userId = interaction.options.getUser("user", true).id;
      return { number, deletePinned, check: (m) => m.author.id === userId };
    }
    case "bot":
      return { number, deletePinned, check: (m) => m.author.bot };
    case "before":
    case "after": {
      const anchor = await fetchAnchor(channel, interaction.options.getString("message_id", true));
      if (!anchor) return null;
      return subcommand === "before" ? { number, deletePinned, before: anchor.id } : { deletePinned, after: anchor.id };
    }
    default:
      return { number, deletePinned };
  }
}

export async function execute(ctx: CommandContext<ChatInputCommandInteraction>): Promise<void> {
  const interaction = await requireGuild(ctx.interaction);
  if (!interaction) return;
  const subcommand = interaction.options.getSubcommand();
  ctx.step(subcommand);

  const channel = await requireBotChannelPermission(interaction, PermissionFlagsBits.ManageMessages, "Manage Messages");
  if (!channel) return;

  const number = interaction.options.getInteger("number");
  if (number !== null && number > CLEANUP_CONFIRM_THRESHOLD) {
    const proceed = await confirm(
      interaction,
      `Are you sure you want to delete ${number.toLocaleString("en-US")} messages?`
    );
    if (!proceed) {
      await replyOrEdit(interaction, { content: "Cancelled." });
      return;
    }
  }

  await ensureDeferred(interaction);

  ctx.step("collect");
  const opts = await collectOptions(interaction, channel, subcommand);
  if (!opts) {
    await replyOrEdit(interaction, { content: "Message not found." });
    return;
  }
  const messages = await collectForDeletion(channel, opts);

  ctx.step("purge");
  const deleted = await massPurge(channel, messages);
  logger.info(
    { guildId: interaction.guildId, channelId: channel.id, moderatorId: interaction.user.id, subcommand, deleted },
    "[cleanup] Messages deleted"
  );

  await replyOrEdit(interaction, {
    content: deleted === 1 ? "Deleted 1 message." : `Deleted ${deleted.toLocaleString("en-US")} messages.`,
  });
}

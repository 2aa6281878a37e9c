/**
 * tidewatch — src/commands/modlog.ts
 * WHAT: /modlog: modlog channel, case type toggles, case lookup and reset.
 * FLOWS:
 *  - channel → send permission check → store | clear
 *  - cases → list toggles | flip one
 *  - resetcases → confirm (30s) → delete every case in the guild
 *  - case / casesfor → caseEmbed (paginated for casesfor)
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import {
  ChannelType,
  InteractionContextType,
  PermissionFlagsBits,
  SlashCommandBuilder,
  type ChatInputCommandInteraction,
} from "discord.js";
import { replyOrEdit, type CommandContext } from "../lib/cmdWrap.js";
import { logger } from "../lib/logger.js";
import { getGuildSettings, updateGuildSettings } from "../store/guildSettingsStore.js";
import {
  deleteAllCases,
  getCase,
  isCaseTypeEnabled,
  listCasesForUser,
  setCaseTypeEnabled,
} from "../store/caseStore.js";
import { CASE_ACTIONS, isCaseAction } from "../features/modlog/caseTypes.js";
import { caseEmbed } from "../features/modlog/embed.js";
import { confirm } from "../ui/confirm.js";
import { paginate } from "../ui/paginator.js";
import { requireGuild, type GuildInteraction } from "./shared.js";

export const data = new SlashCommandBuilder()
  .setName("modlog")
  .setDescription("Moderation log settings and cases")
  .addSubcommand((sc) =>
    sc
      .setName("channel")
      .setDescription("Set the modlog channel; leave empty to disable the modlog")
      .addChannelOption((o) =>
        o
          .setName("channel")
          .setDescription("Modlog channel")
          .addChannelTypes(ChannelType.GuildText, ChannelType.GuildAnnouncement)
      )
  )
  .addSubcommand((sc) =>
    sc
      .setName("cases")
      .setDescription("Show case types, or toggle one")
      .addStringOption((o) =>
        o
          .setName("action")
          .setDescription("Case type to toggle")
          .addChoices(...CASE_ACTIONS.map((value) => ({ name: value, value })))
      )
  )
  .addSubcommand((sc) => sc.setName("resetcases").setDescription("Delete every case in this server"))
  .addSubcommand((sc) =>
    sc
      .setName("case")
      .setDescription("Show a case")
      .addIntegerOption((o) => o.setName("number").setDescription("Case number").setRequired(true).setMinValue(1))
  )
  .addSubcommand((sc) =>
    sc
      .setName("casesfor")
      .setDescription("Show every case for a user")
      .addUserOption((o) => o.setName("user").setDescription("User").setRequired(true))
  )
  .setDefaultMemberPermissions(PermissionFlagsBits.ManageGuild)
  .setContexts(InteractionContextType.Guild);

export async function execute(ctx: CommandContext<ChatInputCommandInteraction>): Promise<void> {
  const interaction = await requireGuild(ctx.interaction);
  if (!interaction) return;
  const subcommand = interaction.options.getSubcommand();
  ctx.step(subcommand);

  switch (subcommand) {
    case "channel":
      await handleChannel(interaction);
      break;
    case "cases":
      await handleCases(interaction);
      break;
    case "resetcases":
      await handleResetCases(interaction);
      break;
    case "case":
      await handleCase(interaction);
      break;
    case "casesfor":
      await handleCasesFor(interaction);
      break;
    default:
      await replyOrEdit(interaction, { content: "Unknown subcommand." });
  }
}

async function handleChannel(interaction: GuildInteraction): Promise<void> {
  const { guild } = interaction;
  const channel = interaction.options.getChannel("channel");

  if (!channel) {
    if (!getGuildSettings(guild.id).modlogChannelId) {
      await replyOrEdit(interaction, { content: "Mod log is already disabled." });
      return;
    }
    updateGuildSettings(guild.id, { modlogChannelId: null });
    logger.info({ guildId: guild.id }, "[modlog] Modlog disabled");
    await replyOrEdit(interaction, { content: "Mod log deactivated." });
    return;
  }

  const me = guild.members.me;
  if (!me || !channel.permissionsFor(me).has(PermissionFlagsBits.SendMessages)) {
    await replyOrEdit(interaction, { content: `I do not have permissions to send messages in <#${channel.id}>!` });
    return;
  }
  updateGuildSettings(guild.id, { modlogChannelId: channel.id });
  logger.info({ guildId: guild.id, channelId: channel.id }, "[modlog] Modlog channel set");
  await replyOrEdit(interaction, { content: `Mod events will be sent to <#${channel.id}>.` });
}

export function caseTypesText(guildId: string): string {
  return CASE_ACTIONS.map(
    (action) => `${action} : ${isCaseTypeEnabled(guildId, action) ? "enabled" : "disabled"}`
  ).join("\n");
}

async function handleCases(interaction: GuildInteraction): Promise<void> {
  const guildId = interaction.guildId;
  const action = interaction.options.getString("action");

  if (!action) {
    await replyOrEdit(interaction, { content: `Current settings:\n\`\`\`\n${caseTypesText(guildId)}\n\`\`\`` });
    return;
  }
  if (!isCaseAction(action)) {
    await replyOrEdit(interaction, { content: "That action is not registered." });
    return;
  }

  const enabled = !isCaseTypeEnabled(guildId, action);
  setCaseTypeEnabled(guildId, action, enabled);
  await replyOrEdit(interaction, {
    content: `Case creation for ${action} actions is now ${enabled ? "enabled" : "disabled"}.`,
  });
}

async function handleResetCases(interaction: GuildInteraction): Promise<void> {
  const accepted = await confirm(
    interaction,
    "Are you sure you would like to reset all modlog cases in this server?"
  );
  if (!accepted) {
    await replyOrEdit(interaction, { content: "No changes have been made." });
    return;
  }
  const removed = deleteAllCases(interaction.guildId);
  logger.info({ guildId: interaction.guildId, removed }, "[modlog] Cases reset");
  await replyOrEdit(interaction, { content: "Cases have been reset." });
}

async function handleCase(interaction: GuildInteraction): Promise<void> {
  const modCase = getCase(interaction.guildId, interaction.options.getInteger("number", true));
  if (!modCase) {
    await replyOrEdit(interaction, { content: "That case does not exist for that server." });
    return;
  }
  await replyOrEdit(interaction, { embeds: [caseEmbed(modCase)] });
}

async function handleCasesFor(interaction: GuildInteraction): Promise<void> {
  const user = interaction.options.getUser("user", true);
  const cases = listCasesForUser(interaction.guildId, user.id);
  if (cases.length === 0) {
    await replyOrEdit(interaction, { content: "That user does not have any cases." });
    return;
  }
  await paginate(interaction, cases.map(caseEmbed), { ephemeral: true });
}

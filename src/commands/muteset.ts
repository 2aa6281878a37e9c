/**
 * tidewatch — src/commands/muteset.ts
 * WHAT: /muteset: per-guild mute settings (role, DMs, default time, notification channel).
 * WHY: The mute role decides between role mutes and overwrite mutes for the whole guild.
 * FLOWS:
 *  - role/makerole → store role → hint when no notification channel is set
 *  - makerole → create role → overwrites on every channel → list the channels that failed
 * DOCS:
 *  - RoleManager.create: https://discord.js.org/#/docs/discord.js/main/class/RoleManager?scrollTo=create
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import {
  ChannelType,
  InteractionContextType,
  PermissionFlagsBits,
  SlashCommandBuilder,
  type ChatInputCommandInteraction,
  type Guild,
  type Role,
} from "discord.js";
import { ensureDeferred, replyOrEdit, type CommandContext } from "../lib/cmdWrap.js";
import { logger } from "../lib/logger.js";
import { discordErrorCode } from "../lib/errors.js";
import { humanizeDuration, parseMuteTime } from "../lib/duration.js";
import { humanizeList, pagify } from "../lib/text.js";
import { hasOverwrites } from "../lib/typeGuards.js";
import { SAFE_ALLOWED_MENTIONS } from "../lib/constants.js";
import { getGuildSettings, updateGuildSettings } from "../store/guildSettingsStore.js";
import { paginate } from "../ui/paginator.js";
import { requireGuild, type GuildInteraction } from "./shared.js";

const NO_NOTIFICATION_HINT =
  "No notification channel has been setup, use `/muteset errornotification` to be updated when there's an issue in automatic unmutes.";

export const data = new SlashCommandBuilder()
  .setName("muteset")
  .setDescription("Mute settings")
  .addSubcommand((sc) =>
    sc
      .setName("senddm")
      .setDescription("Send mute notifications to users in DMs")
      .addBooleanOption((o) => o.setName("enabled").setDescription("Send DMs").setRequired(true))
  )
  .addSubcommand((sc) =>
    sc
      .setName("showmoderator")
      .setDescription("Include the moderator's name in mute DMs")
      .addBooleanOption((o) => o.setName("enabled").setDescription("Show the moderator").setRequired(true))
  )
  .addSubcommand((sc) =>
    sc
      .setName("role")
      .setDescription("Set the mute role; leave empty to mute with channel overwrites instead")
      .addRoleOption((o) => o.setName("role").setDescription("Mute role"))
  )
  .addSubcommand((sc) =>
    sc
      .setName("makerole")
      .setDescription("Create a mute role and apply it to every channel")
      .addStringOption((o) =>
        o.setName("name").setDescription("Name of the new role").setRequired(true).setMaxLength(100)
      )
  )
  .addSubcommand((sc) =>
    sc
      .setName("errornotification")
      .setDescription("Channel for automatic unmute issues; leave empty to clear")
      .addChannelOption((o) =>
        o
          .setName("channel")
          .setDescription("Notification channel")
          .addChannelTypes(ChannelType.GuildText, ChannelType.GuildAnnouncement)
      )
  )
  .addSubcommand((sc) =>
    sc
      .setName("defaulttime")
      .setDescription("Default mute length, e.g. `2 hours`; leave empty to clear")
      .addStringOption((o) => o.setName("time").setDescription("Duration").setMaxLength(100))
  )
  .addSubcommand((sc) => sc.setName("settings").setDescription("Show the mute settings"))
  .setDefaultMemberPermissions(PermissionFlagsBits.ManageChannels)
  .setContexts(InteractionContextType.Guild);

export async function execute(ctx: CommandContext<ChatInputCommandInteraction>): Promise<void> {
  const interaction = await requireGuild(ctx.interaction);
  if (!interaction) return;
  const subcommand = interaction.options.getSubcommand();
  ctx.step(subcommand);

  switch (subcommand) {
    case "senddm":
      await handleSendDm(interaction);
      break;
    case "showmoderator":
      await handleShowModerator(interaction);
      break;
    case "role":
      await handleRole(interaction);
      break;
    case "makerole":
      await handleMakeRole(interaction);
      break;
    case "errornotification":
      await handleErrorNotification(interaction);
      break;
    case "defaulttime":
      await handleDefaultTime(interaction);
      break;
    case "settings":
      await handleSettings(interaction);
      break;
    default:
      await replyOrEdit(interaction, { content: "Unknown subcommand." });
  }
}

async function handleSendDm(interaction: GuildInteraction): Promise<void> {
  const enabled = interaction.options.getBoolean("enabled", true);
  updateGuildSettings(interaction.guildId, { muteDm: enabled });
  await replyOrEdit(interaction, {
    content: enabled
      ? "I will now try to send mute notifications to users DMs."
      : "Mute notifications will no longer be sent to users DMs.",
  });
}

async function handleShowModerator(interaction: GuildInteraction): Promise<void> {
  const enabled = interaction.options.getBoolean("enabled", true);
  updateGuildSettings(interaction.guildId, { muteShowMod: enabled });
  await replyOrEdit(interaction, {
    content: enabled
      ? "I will include the name of the moderator who issued the mute when sending a DM to a user."
      : "I will not include the name of the moderator who issued the mute when sending a DM to a user.",
  });
}

async function notificationHint(interaction: GuildInteraction): Promise<void> {
  if (getGuildSettings(interaction.guildId).muteNotificationChannelId) return;
  await replyOrEdit(interaction, { content: NO_NOTIFICATION_HINT });
}

async function handleRole(interaction: GuildInteraction): Promise<void> {
  const { guild, member } = interaction;
  const role = interaction.options.getRole("role");

  if (!role) {
    // Reset so the overwrite warning is shown again on the next mute
    updateGuildSettings(guild.id, { muteRoleId: null, muteSentInstructions: false });
    await replyOrEdit(interaction, { content: "Channel overwrites will be used for mutes instead." });
    await notificationHint(interaction);
    return;
  }

  if (member.id !== guild.ownerId && role.position >= member.roles.highest.position) {
    await replyOrEdit(interaction, {
      content: "You can't set this role as it is not lower than you in the role hierarchy.",
    });
    return;
  }

  updateGuildSettings(guild.id, { muteRoleId: role.id });
  logger.info({ guildId: guild.id, roleId: role.id }, "[muteset] Mute role set");
  await replyOrEdit(interaction, { content: `Mute role set to ${role.name}`, allowedMentions: SAFE_ALLOWED_MENTIONS });
  await notificationHint(interaction);
}

/**
 * Deny the muted permissions to the role in every channel that takes overwrites.
 * Returns mentions of the channels that could not be updated.
 */
export async function applyMuteRoleOverwrites(guild: Guild, role: Role): Promise<string[]> {
  const me = guild.members.me;
  const channels = [...guild.channels.cache.filter(hasOverwrites).values()];

  const outcomes = await Promise.all(
    channels.map(async (channel): Promise<string | null> => {
      if (!me || !channel.permissionsFor(me).has(PermissionFlagsBits.ManageRoles)) return channel.toString();
      try {
        await channel.permissionOverwrites.edit(
          role,
          { SendMessages: false, AddReactions: false, Speak: false },
          { reason: "Mute role setup" }
        );
        return null;
      } catch (err) {
        if (discordErrorCode(err) !== 50013) {
          logger.warn({ err, guildId: guild.id, channelId: channel.id }, "[muteset] Overwrite failed");
        }
        return channel.toString();
      }
    })
  );
  return outcomes.filter((mention): mention is string => mention !== null);
}

async function handleMakeRole(interaction: GuildInteraction): Promise<void> {
  const { guild } = interaction;
  if (getGuildSettings(guild.id).muteRoleId) {
    await replyOrEdit(interaction, {
      content:
        "There is already a mute role setup in this server. Please remove it with `/muteset role` before trying to create a new one.",
    });
    return;
  }

  await ensureDeferred(interaction);
  const name = interaction.options.getString("name", true);

  let role: Role;
  try {
    role = await guild.roles.create({ name, permissions: [], reason: "Mute role setup" });
  } catch (err) {
    if (discordErrorCode(err) !== 50013) throw err;
    await replyOrEdit(interaction, { content: "I could not create a muted role in this server." });
    return;
  }
  // Saved before the overwrites so a failure part-way still leaves the role configured
  updateGuildSettings(guild.id, { muteRoleId: role.id });
  logger.info({ guildId: guild.id, roleId: role.id }, "[muteset] Mute role created");

  const failed = await applyMuteRoleOverwrites(guild, role);
  if (failed.length > 0) {
    await paginate(
      interaction,
      pagify(`I could not set overwrites for the following channels: ${humanizeList(failed)}`),
      { ephemeral: true }
    );
  }
  await replyOrEdit(interaction, { content: `Mute role set to ${role.name}`, allowedMentions: SAFE_ALLOWED_MENTIONS });
  await notificationHint(interaction);
}

async function handleErrorNotification(interaction: GuildInteraction): Promise<void> {
  const channel = interaction.options.getChannel("channel");
  if (!channel) {
    updateGuildSettings(interaction.guildId, { muteNotificationChannelId: null });
    await replyOrEdit(interaction, { content: "Notification channel for unmute issues has been cleared." });
    return;
  }
  updateGuildSettings(interaction.guildId, { muteNotificationChannelId: channel.id });
  await replyOrEdit(interaction, { content: `I will post unmute issues in <#${channel.id}>.` });
}

async function handleDefaultTime(interaction: GuildInteraction): Promise<void> {
  const input = interaction.options.getString("time");
  if (!input) {
    updateGuildSettings(interaction.guildId, { muteDefaultTime: 0 });
    await replyOrEdit(interaction, { content: "Default mute time removed." });
    return;
  }

  const { durationSeconds } = parseMuteTime(input);
  if (!durationSeconds) {
    await replyOrEdit(interaction, { content: "Please provide a valid time format." });
    return;
  }
  updateGuildSettings(interaction.guildId, { muteDefaultTime: durationSeconds });
  await replyOrEdit(interaction, { content: `Default mute time set to ${humanizeDuration(durationSeconds)}.` });
}

export function muteSettingsText(guild: Guild): string {
  const settings = getGuildSettings(guild.id);
  const role = settings.muteRoleId ? guild.roles.cache.get(settings.muteRoleId) : undefined;
  const channel = settings.muteNotificationChannelId
    ? guild.channels.cache.get(settings.muteNotificationChannelId)
    : undefined;

  return [
    `Mute Role: ${role ? role.toString() : "None"}`,
    `Notification Channel: ${channel ? channel.toString() : "None"}`,
    `Default Time: ${settings.muteDefaultTime > 0 ? humanizeDuration(settings.muteDefaultTime) : "None"}`,
    `Send DM: ${settings.muteDm}`,
    `Show moderator: ${settings.muteShowMod}`,
  ].join("\n");
}

async function handleSettings(interaction: GuildInteraction): Promise<void> {
  await replyOrEdit(interaction, {
    content: muteSettingsText(interaction.guild),
    allowedMentions: SAFE_ALLOWED_MENTIONS,
  });
}

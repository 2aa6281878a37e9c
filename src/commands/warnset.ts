/**
 * tidewatch — src/commands/warnset.ts
 * WHAT: /warnset: warning settings, registered reasons and threshold actions.
 * FLOWS:
 *  - toggles → guild_settings
 *  - reason add|remove|list → warn_reason
 *  - action add|remove|list → warn_action (exceed: mute|kick|ban|none, drop: unmute|none)
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
import { replyOrEdit, type CommandContext } from "../lib/cmdWrap.js";
import { logger } from "../lib/logger.js";
import { EMBED_COLOR_WARNING, SAFE_ALLOWED_MENTIONS } from "../lib/constants.js";
import { updateGuildSettings } from "../store/guildSettingsStore.js";
import {
  DROP_ACTIONS,
  EXCEED_ACTIONS,
  addAction,
  deleteAction,
  deleteReason,
  isDropAction,
  isExceedAction,
  listActions,
  listReasons,
  upsertReason,
  type WarnAction,
  type WarnReason,
} from "../store/warningStore.js";
import { paginate } from "../ui/paginator.js";
import { requireGuild, type GuildInteraction } from "./shared.js";

export const data = new SlashCommandBuilder()
  .setName("warnset")
  .setDescription("Warning settings")
  .addSubcommand((sc) =>
    sc
      .setName("allowcustomreasons")
      .setDescription("Allow reasons that aren't registered")
      .addBooleanOption((o) => o.setName("enabled").setDescription("Allow custom reasons").setRequired(true))
  )
  .addSubcommand((sc) =>
    sc
      .setName("senddm")
      .setDescription("Send warnings to users in DMs")
      .addBooleanOption((o) => o.setName("enabled").setDescription("Send DMs").setRequired(true))
  )
  .addSubcommand((sc) =>
    sc
      .setName("showmoderator")
      .setDescription("Include the moderator's name in warnings")
      .addBooleanOption((o) => o.setName("enabled").setDescription("Show the moderator").setRequired(true))
  )
  .addSubcommand((sc) =>
    sc
      .setName("warnchannel")
      .setDescription("Channel warnings are posted to; leave empty to use the command's channel")
      .addChannelOption((o) =>
        o
          .setName("channel")
          .setDescription("Warn channel")
          .addChannelTypes(ChannelType.GuildText, ChannelType.GuildVoice, ChannelType.GuildStageVoice)
      )
  )
  .addSubcommand((sc) =>
    sc
      .setName("usewarnchannel")
      .setDescription("Post warnings to the warn channel")
      .addBooleanOption((o) => o.setName("enabled").setDescription("Use the warn channel").setRequired(true))
  )
  .addSubcommandGroup((group) =>
    group
      .setName("reason")
      .setDescription("Registered warning reasons")
      .addSubcommand((sc) =>
        sc
          .setName("add")
          .setDescription("Register a reason")
          .addStringOption((o) => o.setName("name").setDescription("Reason name").setRequired(true).setMaxLength(100))
          .addIntegerOption((o) =>
            o.setName("points").setDescription("Points it is worth").setRequired(true).setMinValue(1).setMaxValue(1000)
          )
          .addStringOption((o) =>
            o.setName("description").setDescription("Shown to the warned user").setRequired(true).setMaxLength(1000)
          )
      )
      .addSubcommand((sc) =>
        sc
          .setName("remove")
          .setDescription("Remove a reason")
          .addStringOption((o) => o.setName("name").setDescription("Reason name").setRequired(true))
      )
      .addSubcommand((sc) => sc.setName("list").setDescription("List the registered reasons"))
  )
  .addSubcommandGroup((group) =>
    group
      .setName("action")
      .setDescription("Automatic actions at point thresholds")
      .addSubcommand((sc) =>
        sc
          .setName("add")
          .setDescription("Add an action")
          .addStringOption((o) => o.setName("name").setDescription("Action name").setRequired(true).setMaxLength(100))
          .addIntegerOption((o) =>
            o.setName("points").setDescription("Points threshold").setRequired(true).setMinValue(1).setMaxValue(10000)
          )
          .addStringOption((o) =>
            o
              .setName("exceed")
              .setDescription("What to do when the threshold is reached")
              .setRequired(true)
              .addChoices(...EXCEED_ACTIONS.map((value) => ({ name: value, value })))
          )
          .addStringOption((o) =>
            o
              .setName("drop")
              .setDescription("What to do when points fall below the threshold")
              .setRequired(true)
              .addChoices(...DROP_ACTIONS.map((value) => ({ name: value, value })))
          )
      )
      .addSubcommand((sc) =>
        sc
          .setName("remove")
          .setDescription("Remove an action")
          .addStringOption((o) => o.setName("name").setDescription("Action name").setRequired(true))
      )
      .addSubcommand((sc) => sc.setName("list").setDescription("List the actions"))
  )
  .setDefaultMemberPermissions(PermissionFlagsBits.ManageGuild)
  .setContexts(InteractionContextType.Guild);

export async function execute(ctx: CommandContext<ChatInputCommandInteraction>): Promise<void> {
  const interaction = await requireGuild(ctx.interaction);
  if (!interaction) return;
  const group = interaction.options.getSubcommandGroup();
  const subcommand = interaction.options.getSubcommand();
  ctx.step(group ? `${group}_${subcommand}` : subcommand);

  if (group === "reason") {
    await handleReason(interaction, subcommand);
    return;
  }
  if (group === "action") {
    await handleAction(interaction, subcommand);
    return;
  }

  const guildId = interaction.guildId;
  switch (subcommand) {
    case "allowcustomreasons": {
      const enabled = interaction.options.getBoolean("enabled", true);
      updateGuildSettings(guildId, { warnAllowCustomReasons: enabled });
      await replyOrEdit(interaction, {
        content: enabled ? "Custom reasons have been enabled." : "Custom reasons have been disabled.",
      });
      break;
    }
    case "senddm": {
      const enabled = interaction.options.getBoolean("enabled", true);
      updateGuildSettings(guildId, { warnToggleDm: enabled });
      await replyOrEdit(interaction, {
        content: enabled
          ? "I will now try to send warnings to users DMs."
          : "Warnings will no longer be sent to users DMs.",
      });
      break;
    }
    case "showmoderator": {
      const enabled = interaction.options.getBoolean("enabled", true);
      updateGuildSettings(guildId, { warnShowMod: enabled });
      await replyOrEdit(interaction, {
        content: enabled
          ? "I will include the name of the moderator who issued the warning when sending a DM to a user."
          : "I will not include the name of the moderator who issued the warning when sending a DM to a user.",
      });
      break;
    }
    case "warnchannel": {
      const channel = interaction.options.getChannel("channel");
      updateGuildSettings(guildId, { warnChannelId: channel?.id ?? null });
      await replyOrEdit(interaction, {
        content: channel
          ? `The warn channel has been set to <#${channel.id}>.`
          : "Warnings will now be sent in the channel command was used in.",
      });
      break;
    }
    case "usewarnchannel": {
      const enabled = interaction.options.getBoolean("enabled", true);
      const settings = updateGuildSettings(guildId, { warnToggleChannel: enabled });
      const channel = settings.warnChannelId ? interaction.guild.channels.cache.get(settings.warnChannelId) : undefined;
      let content = "Toggle channel has been disabled.";
      if (enabled) {
        content = channel
          ? `Warnings will now be sent to <#${channel.id}>.`
          : "Warnings will now be sent in the channel command was used in.";
      }
      await replyOrEdit(interaction, { content });
      break;
    }
    default:
      await replyOrEdit(interaction, { content: "Unknown subcommand." });
  }
}

export function reasonEmbed(reason: WarnReason): EmbedBuilder {
  return new EmbedBuilder()
    .setColor(EMBED_COLOR_WARNING)
    .setTitle(`Reason: ${reason.name}`)
    .setDescription(reason.description)
    .addFields({ name: "Points", value: String(reason.points) });
}

export function actionEmbed(action: WarnAction): EmbedBuilder {
  return new EmbedBuilder()
    .setColor(EMBED_COLOR_WARNING)
    .setTitle(`Action: ${action.name}`)
    .addFields(
      { name: "Points", value: String(action.points) },
      { name: "Exceed action", value: action.exceedAction },
      { name: "Drop action", value: action.dropAction }
    );
}

async function handleReason(interaction: GuildInteraction, subcommand: string): Promise<void> {
  const guildId = interaction.guildId;

  if (subcommand === "add") {
    const name = interaction.options.getString("name", true).trim().toLowerCase();
    if (name === "custom") {
      await replyOrEdit(interaction, { content: "*Custom* cannot be used as a reason name!" });
      return;
    }
    upsertReason(guildId, {
      name,
      points: interaction.options.getInteger("points", true),
      description: interaction.options.getString("description", true),
    });
    logger.info({ guildId, reason: name }, "[warnset] Reason registered");
    await replyOrEdit(interaction, { content: "The new reason has been registered." });
    return;
  }

  if (subcommand === "remove") {
    const name = interaction.options.getString("name", true).trim();
    const removed = deleteReason(guildId, name);
    await replyOrEdit(interaction, {
      content: removed ? `Reason ${name.toLowerCase()} removed.` : "That is not a registered reason name.",
      allowedMentions: SAFE_ALLOWED_MENTIONS,
    });
    return;
  }

  const reasons = listReasons(guildId);
  if (reasons.length === 0) {
    await replyOrEdit(interaction, { content: "There are no reasons configured!" });
    return;
  }
  await paginate(interaction, reasons.map(reasonEmbed), { ephemeral: true });
}

async function handleAction(interaction: GuildInteraction, subcommand: string): Promise<void> {
  const guildId = interaction.guildId;

  if (subcommand === "add") {
    const name = interaction.options.getString("name", true).trim();
    const exceed = interaction.options.getString("exceed", true);
    const drop = interaction.options.getString("drop", true);
    if (!isExceedAction(exceed) || !isDropAction(drop)) {
      await replyOrEdit(interaction, { content: "That action type is not supported." });
      return;
    }
    const added = addAction(guildId, {
      name,
      points: interaction.options.getInteger("points", true),
      exceedAction: exceed,
      dropAction: drop,
    });
    if (!added) {
      await replyOrEdit(interaction, { content: "Duplicate action name found!" });
      return;
    }
    logger.info({ guildId, action: name, exceed, drop }, "[warnset] Action added");
    await replyOrEdit(interaction, {
      content: `Action ${name} has been added.`,
      allowedMentions: SAFE_ALLOWED_MENTIONS,
    });
    return;
  }

  if (subcommand === "remove") {
    const name = interaction.options.getString("name", true).trim();
    const removed = deleteAction(guildId, name);
    await replyOrEdit(interaction, {
      content: removed ? `Action ${name} removed.` : `No action named ${name} exists!`,
      allowedMentions: SAFE_ALLOWED_MENTIONS,
    });
    return;
  }

  const actions = listActions(guildId);
  if (actions.length === 0) {
    await replyOrEdit(interaction, { content: "There are no actions configured!" });
    return;
  }
  await paginate(interaction, actions.map(actionEmbed), { ephemeral: true });
}

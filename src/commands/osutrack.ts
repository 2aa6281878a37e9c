/**
 * tidewatch — src/commands/osutrack.ts
 * WHAT: /osutrack add|remove|list: osu! top-play tracking per guild.
 * WHY: Config lives in osu_tracking; the tracker reloads it through refresh().
 * FLOWS:
 *  - add → parse mode + player → resolve via API → guild cap → addTracking → refresh
 *  - remove → resolve → removeTracking → refresh
 *  - list → listGuildTracking → paginated embed
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
import { replyOrEdit, ensureDeferred, type CommandContext } from "../lib/cmdWrap.js";
import { logger } from "../lib/logger.js";
import { EMBED_COLOR_DEFAULT, OSU_TRACKING_GUILD_LIMIT } from "../lib/constants.js";
import { pagify } from "../lib/text.js";
import { isOwner } from "../lib/owner.js";
import {
  addTracking,
  countGuildTracking,
  listGuildTracking,
  removeTracking,
  type TrackingEntry,
} from "../store/osuStore.js";
import type { OsuApiClient, OsuUser } from "../features/osu/api.js";
import { modeDisplayName, parseMode, type OsuMode } from "../features/osu/modes.js";
import { parsePlayer } from "../features/osu/players.js";
import { paginate } from "../ui/paginator.js";
import { requireGuild, type GuildInteraction } from "./shared.js";

export interface OsuTrackingServices {
  api: Pick<OsuApiClient, "user">;
  tracker: { refresh(): void };
}

let services: OsuTrackingServices | null = null;

/** Wired from index.ts once the client is ready; null turns the command off. */
export function configureOsuTracking(next: OsuTrackingServices | null): void {
  services = next;
}

export const data = new SlashCommandBuilder()
  .setName("osutrack")
  .setDescription("Track osu! players' top plays")
  .addSubcommand((sc) =>
    sc
      .setName("add")
      .setDescription("Post a player's new top plays in a channel")
      .addChannelOption((o) =>
        o
          .setName("channel")
          .setDescription("Where to post")
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
      .addStringOption((o) => o.setName("mode").setDescription("osu, taiko, catch or mania").setRequired(true))
      .addStringOption((o) =>
        o.setName("player").setDescription("Profile link, user id or username").setRequired(true)
      )
  )
  .addSubcommand((sc) =>
    sc
      .setName("remove")
      .setDescription("Stop tracking a player")
      .addStringOption((o) => o.setName("mode").setDescription("osu, taiko, catch or mania").setRequired(true))
      .addStringOption((o) =>
        o.setName("player").setDescription("Profile link, user id or username").setRequired(true)
      )
  )
  .addSubcommand((sc) => sc.setName("list").setDescription("Show who is tracked in this server"))
  .setDefaultMemberPermissions(PermissionFlagsBits.Administrator)
  .setContexts(InteractionContextType.Guild);

export function trackingListLines(entries: readonly TrackingEntry[]): string[] {
  return entries.map((e) => `${e.osuUserId} ◈ ${modeDisplayName(e.mode)} ◈ <#${e.channelId}>`);
}

export async function execute(ctx: CommandContext<ChatInputCommandInteraction>): Promise<void> {
  const interaction = await requireGuild(ctx.interaction);
  if (!interaction) return;
  const subcommand = interaction.options.getSubcommand();
  ctx.step(subcommand);

  if (subcommand === "list") {
    await handleList(interaction);
    return;
  }

  if (!services) {
    await replyOrEdit(interaction, { content: "osu! tracking is not configured on this bot." });
    return;
  }

  const mode = parseMode(interaction.options.getString("mode", true));
  if (!mode) {
    await replyOrEdit(interaction, { content: "Mode given is invalid." });
    return;
  }

  const input = interaction.options.getString("player", true);
  await ensureDeferred(interaction);
  ctx.step("resolve_player");
  const player = await resolvePlayer(services.api, input, mode);
  if (!player) {
    await replyOrEdit(interaction, { content: `Could not find the user ${input}.` });
    return;
  }

  if (subcommand === "add") {
    await handleAdd(interaction, services, mode, player);
  } else {
    await handleRemove(interaction, services, mode, player);
  }
}

async function resolvePlayer(
  api: OsuTrackingServices["api"],
  input: string,
  mode: OsuMode
): Promise<OsuUser | null> {
  const parsed = parsePlayer(input);
  if (!parsed) return null;
  return api.user(parsed.query, mode);
}

async function handleAdd(
  interaction: GuildInteraction,
  deps: OsuTrackingServices,
  mode: OsuMode,
  player: OsuUser
): Promise<void> {
  const channel = interaction.options.getChannel("channel", true);
  const guildId = interaction.guildId;

  if (
    !isOwner(interaction.user.id) &&
    countGuildTracking(guildId, player.id) >= OSU_TRACKING_GUILD_LIMIT
  ) {
    await replyOrEdit(interaction, {
      content: `Already tracking ${OSU_TRACKING_GUILD_LIMIT} users in this server. Please remove some before adding more.`,
    });
    return;
  }

  addTracking({ mode, osuUserId: player.id, guildId, channelId: channel.id });
  deps.tracker.refresh();
  await replyOrEdit(interaction, {
    content: `Now tracking top 100 plays for ${player.username} in <#${channel.id}>`,
  });
}

async function handleRemove(
  interaction: GuildInteraction,
  deps: OsuTrackingServices,
  mode: OsuMode,
  player: OsuUser
): Promise<void> {
  if (!removeTracking(mode, player.id, interaction.guildId)) {
    await replyOrEdit(interaction, { content: `${player.username} isn't being tracked in this server.` });
    return;
  }
  deps.tracker.refresh();
  logger.info({ guildId: interaction.guildId, mode, osuUserId: player.id }, "[osu] Tracking removed");
  await replyOrEdit(interaction, {
    content: `Stopped tracking ${player.username} in osu!${modeDisplayName(mode)}`,
  });
}

async function handleList(interaction: GuildInteraction): Promise<void> {
  const entries = listGuildTracking(interaction.guildId);
  if (entries.length === 0) {
    await replyOrEdit(interaction, { content: "Nobody is being tracked in this server." });
    return;
  }

  const players = new Set(entries.map((e) => e.osuUserId)).size;
  const pages = pagify(trackingListLines(entries).join("\n"), 4000).map((description) =>
    new EmbedBuilder()
      .setColor(EMBED_COLOR_DEFAULT)
      .setAuthor({ name: `${players} players are being tracked in this server.` })
      .setDescription(description)
  );
  await paginate(interaction, pages);
}

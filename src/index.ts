/**
 * tidewatch — src/index.ts
 * WHAT: Main process entrypoint. Boots the Discord client, routes slash commands, starts schedulers.
 * WHY: Startup, the interaction hot path and shutdown in one place.
 * FLOWS:
 *  - Ready: log identity → unmute scheduler → poll/raffle scheduler → osu! tracker (when credentials exist)
 *  - Interaction: chat input → wrapped command executor; poll vote and raffle entry buttons → wrapped handlers
 *  - Events: member role changes, channel overwrite changes, member rejoin → mute bookkeeping
 *  - SIGINT/SIGTERM: stop schedulers → destroy client → flush Sentry → close DB
 * DOCS:
 *  - discord.js v14 (interactions): https://discord.js.org/#/docs/discord.js/main/class/Interaction
 *  - Gateway intents: https://discord.com/developers/docs/topics/gateway#gateway-intents
 *  - Sentry Node SDK: https://docs.sentry.io/platforms/javascript/guides/node/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { initializeSentry, addBreadcrumb, captureException, flushSentry, setTag } from "./lib/sentry.js";
import { UNCAUGHT_EXCEPTION_EXIT_DELAY_MS } from "./lib/constants.js";
initializeSentry();

import {
  Client,
  Collection,
  Events,
  GatewayIntentBits,
  MessageFlags,
  Options,
  Partials,
  type ButtonInteraction,
  type ChatInputCommandInteraction,
} from "discord.js";
import { logger } from "./lib/logger.js";
import { env } from "./lib/env.js";
import { wrapCommand, type CommandContext } from "./lib/cmdWrap.js";
import { wrapEvent } from "./lib/eventWrap.js";
import { closeDatabase } from "./db/db.js";
import { startUnmuteScheduler, stopUnmuteScheduler } from "./scheduler/unmuteScheduler.js";
import { OsuTracker, clientChannelFetcher } from "./scheduler/osuTrackingScheduler.js";
import { startUtilityScheduler, stopUtilityScheduler } from "./scheduler/utilityScheduler.js";
import { POLL_VOTE_RE, handlePollVote } from "./features/polls/voting.js";
import { RAFFLE_ENTRY_RE, handleRaffleEntry } from "./features/raffles/entry.js";
import { OsuApiClient } from "./features/osu/api.js";
import { handleChannelUpdate, handleMemberAdd, handleMemberUpdate } from "./features/mutes/listeners.js";
import * as mute from "./commands/mute/index.js";
import * as warn from "./commands/warn/index.js";
import * as muteset from "./commands/muteset.js";
import * as warnset from "./commands/warnset.js";
import * as modlog from "./commands/modlog.js";
import * as reason from "./commands/reason.js";
import * as cleanup from "./commands/cleanup.js";
import * as slowmode from "./commands/slowmode.js";
import * as osutrack from "./commands/osutrack.js";
import * as anilist from "./commands/anilist.js";
import * as urban from "./commands/urban.js";
import * as gif from "./commands/gif.js";
import * as youtube from "./commands/youtube.js";
import * as poll from "./commands/poll.js";
import * as raffle from "./commands/raffle.js";

// ===== Global Error Handlers =====

process.on("unhandledRejection", (reason) => {
  const error = reason instanceof Error ? reason : new Error(String(reason));
  logger.error({ evt: "unhandled_rejection", err: error }, "[process] Unhandled promise rejection");
  captureException(error, { context: "unhandledRejection" });
});

process.on("uncaughtException", (error, origin) => {
  logger.error(
    { evt: "uncaught_exception", err: error, origin },
    "[process] Uncaught exception - bot may be in unstable state"
  );
  captureException(error, { context: "uncaughtException", origin });
  setTimeout(() => process.exit(1), UNCAUGHT_EXCEPTION_EXIT_DELAY_MS);
});

const client = new Client({
  intents: [
    GatewayIntentBits.Guilds,
    GatewayIntentBits.GuildMembers,
    GatewayIntentBits.GuildVoiceStates, // voice mutes move members out of the channel
  ],
  // role changes on uncached members still reach handleMemberUpdate
  partials: [Partials.GuildMember],
  makeCache: Options.cacheWithLimits({
    ...Options.DefaultMakeCacheSettings,
    MessageManager: 50,
    PresenceManager: 0,
    ReactionManager: 0,
    ReactionUserManager: 0,
    GuildStickerManager: 0,
    GuildScheduledEventManager: 0,
    StageInstanceManager: 0,
  }),
});

// ===== Command registry =====

type Executor = (interaction: ChatInputCommandInteraction) => Promise<void>;
type Handler = (ctx: CommandContext<ChatInputCommandInteraction>) => Promise<void>;

const commands = new Collection<string, Executor>();
const register = (name: string, handler: Handler) => {
  commands.set(name, wrapCommand(name, handler));
};

register(mute.muteData.name, mute.executeMute);
register(mute.unmuteData.name, mute.executeUnmute);
register(mute.muteChannelData.name, mute.executeMuteChannel);
register(mute.unmuteChannelData.name, mute.executeUnmuteChannel);
register(mute.activeMutesData.name, mute.executeActiveMutes);
register(muteset.data.name, muteset.execute);
register(warn.warnData.name, warn.executeWarn);
register(warn.warningsData.name, warn.executeWarnings);
register(warn.unwarnData.name, warn.executeUnwarn);
register(warnset.data.name, warnset.execute);
register(modlog.data.name, modlog.execute);
register(reason.data.name, reason.execute);
register(cleanup.data.name, cleanup.execute);
register(slowmode.data.name, slowmode.execute);
register(osutrack.data.name, osutrack.execute);
register(anilist.data.name, anilist.execute);
register(urban.data.name, urban.execute);
register(gif.data.name, gif.execute);
register(youtube.data.name, youtube.execute);
register(poll.data.name, poll.execute);
register(raffle.data.name, raffle.execute);

// Buttons not listed here belong to a paginator or confirm prompt's own collector
const buttonRoutes: Array<[RegExp, (interaction: ButtonInteraction) => Promise<void>]> = [
  [POLL_VOTE_RE, wrapCommand("poll_vote", handlePollVote)],
  [RAFFLE_ENTRY_RE, wrapCommand("raffle_entry", handleRaffleEntry)],
];

// ===== osu! tracking =====

let tracker: OsuTracker | null = null;

function startOsuTracking(): void {
  const { OSU_CLIENT_ID, OSU_CLIENT_SECRET } = env;
  if (!OSU_CLIENT_ID || !OSU_CLIENT_SECRET) {
    logger.info("[osu] No client credentials, tracking disabled");
    return;
  }
  const api = new OsuApiClient({ clientId: OSU_CLIENT_ID, clientSecret: OSU_CLIENT_SECRET });
  const osuTracker = new OsuTracker({ api, fetchChannel: clientChannelFetcher(client) });
  tracker = osuTracker;
  osutrack.configureOsuTracking({ api, tracker: osuTracker });
  osuTracker.start().catch((err: unknown) => {
    logger.error({ err }, "[osu] Tracker stopped unexpectedly");
    captureException(err, { context: "osuTracker" });
  });
}

// ===== Ready =====

client.once(Events.ClientReady, (readyClient) => {
  logger.info({ tag: readyClient.user.tag, id: readyClient.user.id, guilds: readyClient.guilds.cache.size }, "Bot ready");
  setTag("bot_id", readyClient.user.id);
  addBreadcrumb({ message: "Bot connected to Discord", category: "bot", level: "info" });

  startUnmuteScheduler(readyClient);
  startUtilityScheduler(readyClient);
  startOsuTracking();
});

// ===== Interactions =====

client.on(
  Events.InteractionCreate,
  wrapEvent("interactionCreate", async (interaction) => {
    if (interaction.isButton()) {
      const { customId } = interaction;
      const route = buttonRoutes.find(([re]) => re.test(customId));
      if (route) await route[1](interaction);
      return;
    }
    if (!interaction.isChatInputCommand()) return;

    const executor = commands.get(interaction.commandName);
    if (!executor) {
      addBreadcrumb({
        message: `Unknown command attempted: ${interaction.commandName}`,
        category: "command",
        level: "warning",
      });
      await interaction.reply({
        content: "This command isn't available. Commands may need to be redeployed.",
        flags: MessageFlags.Ephemeral,
      });
      return;
    }
    await executor(interaction);
  })
);

// ===== Mute bookkeeping =====

client.on(Events.GuildMemberUpdate, wrapEvent("guildMemberUpdate", handleMemberUpdate));
client.on(Events.ChannelUpdate, wrapEvent("channelUpdate", handleChannelUpdate));
client.on(Events.GuildMemberAdd, wrapEvent("guildMemberAdd", handleMemberAdd));

client.on(Events.Error, (err) => {
  logger.error({ err }, "[client] Discord client error");
  captureException(err, { context: "client" });
});

// ===== Shutdown =====

let isShuttingDown = false;

async function gracefulShutdown(signal: string): Promise<void> {
  if (isShuttingDown) {
    logger.warn({ signal }, "[shutdown] Already shutting down, ignoring");
    return;
  }
  isShuttingDown = true;
  logger.info({ signal }, "[shutdown] Graceful shutdown initiated");

  try {
    stopUnmuteScheduler();
    stopUtilityScheduler();
    tracker?.stop();
    osutrack.configureOsuTracking(null);

    client.removeAllListeners();
    await client.destroy();
    logger.debug("[shutdown] Discord client destroyed");

    await flushSentry();
    closeDatabase();

    logger.info("[shutdown] Graceful shutdown complete");
    process.exit(0);
  } catch (err) {
    logger.error({ err }, "[shutdown] Error during graceful shutdown");
    process.exit(1);
  }
}

process.on("SIGTERM", () => void gracefulShutdown("SIGTERM"));
process.on("SIGINT", () => void gracefulShutdown("SIGINT"));

client.login(env.DISCORD_TOKEN).catch((err: unknown) => {
  logger.fatal({ err }, "[startup] Discord login failed");
  process.exit(1);
});

/**
 * tidewatch — src/features/raffles/lifecycle.ts
 * WHAT: Ending, cancelling and rerolling a raffle.
 * FLOWS:
 *  - endRaffle: message gone → deleteRaffle | draw → finished embed → announcement reply → finishRaffle
 *  - cancelRaffle: finished embed without winners → cancellation reply → deleteRaffle
 *  - rerollRaffle: draw avoiding the last winners → announcement → setRaffleWinners
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { Guild, Message } from "discord.js";
import { logger } from "../../lib/logger.js";
import { botDisplayName, fetchHostedMessage, type HostedMessage } from "../../lib/messageLookup.js";
import { nowUtc } from "../../lib/time.js";
import { deleteRaffle, finishRaffle, setRaffleWinners, type Raffle } from "../../store/raffleStore.js";
import { buildFinishedRaffleEmbed } from "./embeds.js";
import { drawRaffle, type RaffleDraw } from "./winners.js";

export type RaffleOutcome = RaffleDraw | { kind: "gone" };

export interface DrawOptions {
  random?: () => number;
  now?: number;
}

function replyTo(message: Message, content: string, winnerIds: readonly string[] = []) {
  return {
    content,
    reply: { messageReference: message.id, failIfNotExists: false },
    allowedMentions: { users: [...winnerIds] },
  };
}

async function locate(guild: Guild, raffle: Raffle): Promise<HostedMessage | null> {
  const hosted = await fetchHostedMessage(guild, raffle.channelId, raffle.messageId);
  if (!hosted) {
    logger.warn({ guildId: guild.id, messageId: raffle.messageId }, "[raffles] Raffle message gone, dropping raffle");
    deleteRaffle(raffle.messageId);
  }
  return hosted;
}

/**
 * Close a raffle and draw its winners.
 */
export async function endRaffle(guild: Guild, raffle: Raffle, opts: DrawOptions = {}): Promise<RaffleOutcome> {
  const hosted = await locate(guild, raffle);
  if (!hosted) return { kind: "gone" };

  const endedAt = opts.now ?? nowUtc();
  const draw = await drawRaffle(guild, raffle, { random: opts.random, now: endedAt });
  const winnerIds = draw.kind === "drawn" ? draw.winnerIds : [];

  await hosted.message.edit({
    embeds: [buildFinishedRaffleEmbed(raffle, guild.name, botDisplayName(guild), endedAt, winnerIds)],
    components: [],
  });
  await hosted.channel.send(replyTo(hosted.message, draw.text, winnerIds));
  finishRaffle(raffle, endedAt, winnerIds);
  return draw;
}

/**
 * Stop a raffle without drawing. It is not kept in history.
 */
export async function cancelRaffle(guild: Guild, raffle: Raffle, now: number = nowUtc()): Promise<boolean> {
  const hosted = await locate(guild, raffle);
  if (!hosted) return false;

  await hosted.message.edit({
    embeds: [buildFinishedRaffleEmbed(raffle, guild.name, botDisplayName(guild), now, [])],
    components: [],
  });
  await hosted.channel.send(
    replyTo(hosted.message, `The **${raffle.title}** raffle was cancelled. No winners will be pulled!`)
  );
  deleteRaffle(raffle.messageId);
  logger.info({ guildId: guild.id, messageId: raffle.messageId }, "[raffles] Raffle cancelled");
  return true;
}

/**
 * Draw again for an ended raffle. The announcement goes to the raffle's channel even when
 * its message was deleted; the winners are only replaced when someone could be drawn.
 */
export async function rerollRaffle(guild: Guild, raffle: Raffle, opts: DrawOptions = {}): Promise<RaffleOutcome> {
  const hosted = await fetchHostedMessage(guild, raffle.channelId, raffle.messageId);
  const channel = hosted?.channel ?? guild.channels.cache.get(raffle.channelId);
  if (!channel || !channel.isTextBased()) return { kind: "gone" };

  const draw = await drawRaffle(guild, raffle, {
    reroll: true,
    previous: raffle.winnerIds,
    random: opts.random,
    now: opts.now,
  });
  const winnerIds = draw.kind === "drawn" ? draw.winnerIds : [];

  if (hosted && draw.kind === "drawn") {
    await hosted.message.edit({
      embeds: [
        buildFinishedRaffleEmbed(raffle, guild.name, botDisplayName(guild), raffle.endedAt ?? nowUtc(), winnerIds),
      ],
    });
  }
  await channel.send(
    hosted ? replyTo(hosted.message, draw.text, winnerIds) : { content: draw.text, allowedMentions: { users: winnerIds } }
  );
  if (draw.kind === "drawn") setRaffleWinners(raffle.messageId, winnerIds);
  return draw;
}

/**
 * tidewatch — src/features/polls/lifecycle.ts
 * WHAT: Closing a poll: freeze the message, post the results, move it to history.
 * FLOWS:
 *  - endPoll → message gone → deletePoll
 *  - endPoll → edit to ended embed (no buttons) → results embed as a reply → markPollEnded
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { Guild } from "discord.js";
import { logger } from "../../lib/logger.js";
import { botDisplayName, fetchHostedMessage } from "../../lib/messageLookup.js";
import { nowUtc } from "../../lib/time.js";
import { deletePoll, markPollEnded, type Poll } from "../../store/pollStore.js";
import { buildEndedPollEmbed, buildPollResultsEmbed } from "./embeds.js";

/**
 * @returns false when the poll message was gone and the poll was dropped instead
 */
export async function endPoll(guild: Guild, poll: Poll, endedAt: number = nowUtc()): Promise<boolean> {
  const hosted = await fetchHostedMessage(guild, poll.channelId, poll.messageId);
  if (!hosted) {
    logger.warn({ guildId: guild.id, messageId: poll.messageId }, "[polls] Poll message gone, dropping poll");
    deletePoll(poll.messageId);
    return false;
  }

  const ended: Poll = { ...poll, endedAt };
  await hosted.message.edit({
    embeds: [buildEndedPollEmbed(ended, guild.name, botDisplayName(guild))],
    components: [],
  });
  await hosted.channel.send({
    embeds: [buildPollResultsEmbed(ended, guild.name)],
    reply: { messageReference: poll.messageId, failIfNotExists: false },
  });
  markPollEnded(poll, endedAt);
  return true;
}

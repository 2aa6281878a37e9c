/**
 * tidewatch — src/scheduler/utilityScheduler.ts
 * WHAT: Ends polls and raffles whose time is up.
 * WHY: Both store only an end time; nothing else closes them, including after a restart.
 * FLOWS:
 *  - Every UTILITY_SCHEDULER_INTERVAL_MS → listDuePolls → endPoll; listDueRaffles → endRaffle
 *  - A cycle still running when the next tick fires makes that tick a no-op
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { Client } from "discord.js";
import { logger } from "../lib/logger.js";
import { captureException } from "../lib/sentry.js";
import { UTILITY_SCHEDULER_INTERVAL_MS } from "../lib/constants.js";
import { nowUtc } from "../lib/time.js";
import { listDuePolls } from "../store/pollStore.js";
import { listDueRaffles } from "../store/raffleStore.js";
import { endPoll } from "../features/polls/lifecycle.js";
import { endRaffle } from "../features/raffles/lifecycle.js";

let _activeInterval: NodeJS.Timeout | null = null;
let running = false;

/**
 * One pass. A failure ends only that poll or raffle's attempt; it is retried next cycle.
 */
export async function runUtilityCycle(client: Client, at: number = nowUtc()): Promise<void> {
  for (const poll of listDuePolls(at)) {
    const guild = client.guilds.cache.get(poll.guildId);
    if (!guild) continue;
    try {
      await endPoll(guild, poll);
    } catch (err) {
      logger.error({ err, guildId: poll.guildId, messageId: poll.messageId }, "[utility] Ending poll failed");
      captureException(err, { context: "endPoll", guildId: poll.guildId });
    }
  }

  for (const raffle of listDueRaffles(at)) {
    const guild = client.guilds.cache.get(raffle.guildId);
    if (!guild) continue;
    try {
      await endRaffle(guild, raffle);
    } catch (err) {
      logger.error({ err, guildId: raffle.guildId, messageId: raffle.messageId }, "[utility] Ending raffle failed");
      captureException(err, { context: "endRaffle", guildId: raffle.guildId });
    }
  }
}

export function startUtilityScheduler(client: Client): void {
  if (_activeInterval) return;

  logger.info({ intervalMs: UTILITY_SCHEDULER_INTERVAL_MS }, "[utility] scheduler starting");

  const tick = async () => {
    if (running) return;
    running = true;
    try {
      await runUtilityCycle(client);
    } catch (err) {
      logger.error({ err }, "[utility] cycle failed");
    } finally {
      running = false;
    }
  };
  void tick();

  const interval = setInterval(() => void tick(), UTILITY_SCHEDULER_INTERVAL_MS);
  interval.unref();
  _activeInterval = interval;
}

export function stopUtilityScheduler(): void {
  if (_activeInterval) {
    clearInterval(_activeInterval);
    _activeInterval = null;
  }
  logger.info("[utility] scheduler stopped");
}

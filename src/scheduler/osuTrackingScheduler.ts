/**
 * tidewatch — src/scheduler/osuTrackingScheduler.ts
 * WHAT: Polls tracked players' top 100 and posts new or changed plays.
 * WHY: osu! has no push API for best scores; the snapshot diff is the only signal.
 * FLOWS:
 *  - start() → load cache → seed snapshots (no posts) → cycle every interval
 *  - cycle → fetch best → diff against snapshot → embed → every tracked channel
 *  - osu! down twice in a row → ApiFailingError → wait → ping until it answers → start over
 *  - one player failing three cycles in a row → dropped from every guild
 *  - refresh() after /osutrack changes; stop() aborts every sleep
 * DOCS:
 *  - osu! API v2: https://osu.ppy.sh/docs/index.html
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { Client, EmbedBuilder } from "discord.js";
import { env } from "../lib/env.js";
import { logger } from "../lib/logger.js";
import { discordErrorCode } from "../lib/errors.js";
import { isAbortError, sleep as abortableSleep } from "../lib/retry.js";
import { OSU_PING_INTERVAL_MS, OSU_RESTART_DELAY_MS } from "../lib/constants.js";
import type { OsuApiClient } from "../features/osu/api.js";
import { trackingEmbed } from "../features/osu/embeds.js";
import type { OsuMode } from "../features/osu/modes.js";
import {
  diffScores,
  normalizeScores,
  sameSnapshot,
  type ScoreUpdate,
  type TrackedScore,
} from "../features/osu/scores.js";
import {
  getSnapshot,
  loadTrackingCache,
  removeChannels,
  removeUserEverywhere,
  saveSnapshot,
  type TrackingCache,
} from "../store/osuStore.js";

/**
 * Every fetch in two consecutive cycles failed; osu! itself is treated as down.
 */
export class ApiFailingError extends Error {
  constructor(readonly failures: number) {
    super(`osu! API failing: ${failures} fetches failed in consecutive cycles`);
    this.name = "ApiFailingError";
  }
}

/** The one thing the tracker needs from a channel. */
export interface TrackingTarget {
  send(options: { embeds: EmbedBuilder[] }): Promise<unknown>;
}

export interface OsuTrackerOptions {
  api: Pick<OsuApiClient, "userBestScores" | "seasonalBackgrounds">;
  /** null when the channel is gone or the bot can't post there */
  fetchChannel: (channelId: string) => Promise<TrackingTarget | null>;
  intervalMs?: number;
  /** Pause between players, to stay well under osu!'s rate limit */
  userDelayMs?: number;
  restartDelayMs?: number;
  pingIntervalMs?: number;
  sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
}

/** Consecutive failed fetches after which a player is no longer tracked */
const PLAYER_FAILURE_LIMIT = 3;

/** Discord codes meaning the channel won't take posts any more */
const DEAD_CHANNEL_CODES = new Set([10003, 50001, 50013]);

/**
 * Channel lookup through the gateway client. Unknown or inaccessible channels are null.
 */
export function clientChannelFetcher(client: Client): (channelId: string) => Promise<TrackingTarget | null> {
  return async (channelId) => {
    try {
      const channel = await client.channels.fetch(channelId);
      return channel && channel.isSendable() ? channel : null;
    } catch (err) {
      const code = discordErrorCode(err);
      if (code !== null && DEAD_CHANNEL_CODES.has(code)) return null;
      throw err;
    }
  };
}

export class OsuTracker {
  private cache: TrackingCache = new Map();
  private controller: AbortController | null = null;
  private retryAttempt = false;
  /** Consecutive failed fetches per `${mode}:${userId}`; players that loaded are absent */
  private failures = new Map<string, number>();

  private readonly intervalMs: number;
  private readonly userDelayMs: number;
  private readonly restartDelayMs: number;
  private readonly pingIntervalMs: number;
  private readonly sleep: (ms: number, signal: AbortSignal) => Promise<void>;

  constructor(private readonly opts: OsuTrackerOptions) {
    this.intervalMs = opts.intervalMs ?? env.OSU_TRACKING_INTERVAL_MS;
    this.userDelayMs = opts.userDelayMs ?? 1000;
    this.restartDelayMs = opts.restartDelayMs ?? OSU_RESTART_DELAY_MS;
    this.pingIntervalMs = opts.pingIntervalMs ?? OSU_PING_INTERVAL_MS;
    this.sleep = opts.sleep ?? abortableSleep;
  }

  get running(): boolean {
    return this.controller !== null;
  }

  /** Tracked players per mode, as last loaded from the store. */
  get trackedCount(): number {
    let count = 0;
    for (const users of this.cache.values()) count += users.size;
    return count;
  }

  /**
   * Begin tracking. Stays idle when nobody is tracked.
   * Resolves when the loop ends (stop(), or the cache ran empty).
   */
  start(): Promise<void> {
    if (this.controller) return Promise.resolve();
    this.cache = loadTrackingCache();
    if (this.trackedCount === 0) {
      logger.info("[osu] Nobody tracked, tracker idle");
      return Promise.resolve();
    }

    const controller = new AbortController();
    this.controller = controller;
    logger.info({ players: this.trackedCount }, "[osu] Tracker starting");
    return this.run(controller.signal).finally(() => {
      if (this.controller === controller) this.controller = null;
    });
  }

  /**
   * Reload the cache after a config change; wakes an idle tracker.
   */
  refresh(): void {
    this.cache = loadTrackingCache();
    if (!this.controller && this.trackedCount > 0) {
      this.start().catch((err: unknown) => {
        logger.error({ err }, "[osu] Tracker stopped unexpectedly");
      });
    }
  }

  stop(): void {
    if (!this.controller) return;
    this.controller.abort();
    this.controller = null;
    logger.info("[osu] Tracker stopped");
  }

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        await this.seed(signal);
        while (!signal.aborted) {
          await this.cycle(signal);
          if (this.trackedCount === 0) {
            logger.info("[osu] Tracking list empty, tracker idle");
            return;
          }
          await this.sleep(this.intervalMs, signal);
        }
        return;
      } catch (err) {
        if (signal.aborted || isAbortError(err)) return;
        try {
          await this.recover(err, signal);
        } catch (waitErr) {
          if (signal.aborted || isAbortError(waitErr)) return;
          throw waitErr;
        }
        this.retryAttempt = false;
        this.failures.clear();
        this.cache = loadTrackingCache();
        if (this.trackedCount === 0) return;
      }
    }
  }

  private async recover(err: unknown, signal: AbortSignal): Promise<void> {
    if (!(err instanceof ApiFailingError)) {
      logger.error({ err }, "[osu] Tracking loop failed, restarting later");
      await this.sleep(this.restartDelayMs, signal);
      return;
    }

    logger.warn({ failures: err.failures }, "[osu] osu! API is failing, pausing tracking");
    await this.sleep(this.restartDelayMs, signal);
    while (!(await this.ping())) {
      await this.sleep(this.pingIntervalMs, signal);
    }
    logger.info("[osu] osu! API answering again, resuming tracking");
  }

  private async ping(): Promise<boolean> {
    try {
      return await this.opts.api.seasonalBackgrounds();
    } catch (err) {
      logger.debug({ err }, "[osu] Ping failed");
      return false;
    }
  }

  private async fetchScores(mode: OsuMode, userId: number): Promise<TrackedScore[]> {
    return normalizeScores(await this.opts.api.userBestScores(userId, mode));
  }

  /**
   * Store a fresh snapshot for everyone without posting, so a restart doesn't replay plays.
   */
  private async seed(signal: AbortSignal): Promise<void> {
    for (const [mode, users] of this.cache) {
      for (const userId of users.keys()) {
        try {
          saveSnapshot(mode, userId, await this.fetchScores(mode, userId));
        } catch (err) {
          logger.warn({ err, mode, userId }, "[osu] Seeding snapshot failed");
        }
        await this.sleep(this.userDelayMs, signal);
      }
    }
  }

  /**
   * One pass over every tracked player. Throws ApiFailingError when every fetch failed
   * in this cycle and the previous one also had failures. A player is dropped after
   * PLAYER_FAILURE_LIMIT consecutive failed fetches of their own.
   */
  async cycle(signal: AbortSignal): Promise<void> {
    const snapshot = new Map([...this.cache].map(([mode, users]) => [mode, new Map(users)]));
    const failed: Array<[OsuMode, number]> = [];
    let attempted = 0;

    for (const [mode, users] of snapshot) {
      for (const [userId, channels] of users) {
        attempted += 1;
        let fresh: TrackedScore[];
        try {
          fresh = await this.fetchScores(mode, userId);
        } catch (err) {
          logger.warn({ err, mode, userId }, "[osu] Fetching best scores failed");
          failed.push([mode, userId]);
          continue;
        }

        const previous = getSnapshot(mode, userId);
        if (!previous) {
          saveSnapshot(mode, userId, fresh);
        } else if (!sameSnapshot(previous, fresh)) {
          const updates = diffScores(previous, fresh);
          saveSnapshot(mode, userId, fresh);
          if (updates.length > 0) await this.post(updates, channels);
        }
        await this.sleep(this.userDelayMs, signal);
      }
    }

    const counts = new Map<string, number>();
    for (const [mode, userId] of failed) {
      const key = `${mode}:${userId}`;
      counts.set(key, (this.failures.get(key) ?? 0) + 1);
    }
    this.failures = counts;

    if (failed.length === 0) {
      this.retryAttempt = false;
      return;
    }
    if (this.retryAttempt && failed.length === attempted) {
      throw new ApiFailingError(failed.length);
    }
    this.retryAttempt = true;

    const dropped = failed.filter(([mode, userId]) => (counts.get(`${mode}:${userId}`) ?? 0) >= PLAYER_FAILURE_LIMIT);
    if (dropped.length === 0) {
      logger.warn({ failed: failed.length, attempted }, "[osu] Some fetches failed, retrying next cycle");
      return;
    }
    for (const [mode, userId] of dropped) {
      removeUserEverywhere(mode, userId);
      this.failures.delete(`${mode}:${userId}`);
      logger.warn({ mode, userId }, "[osu] Dropped player after repeated failures");
    }
    this.cache = loadTrackingCache();
  }

  private async post(updates: readonly ScoreUpdate[], channelIds: readonly string[]): Promise<void> {
    const dead = new Set<string>();
    for (const update of updates) {
      const embed = trackingEmbed(update);
      for (const channelId of channelIds) {
        if (dead.has(channelId)) continue;
        const channel = await this.opts.fetchChannel(channelId);
        if (!channel) {
          dead.add(channelId);
          continue;
        }
        try {
          await channel.send({ embeds: [embed] });
        } catch (err) {
          const code = discordErrorCode(err);
          if (code !== null && DEAD_CHANNEL_CODES.has(code)) dead.add(channelId);
          else logger.warn({ err, channelId }, "[osu] Posting play failed");
        }
      }
    }

    if (dead.size > 0) {
      removeChannels([...dead]);
      this.cache = loadTrackingCache();
      logger.info({ channels: [...dead] }, "[osu] Removed channels that can't be posted to");
    }
  }
}

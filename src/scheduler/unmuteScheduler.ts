/**
 * tidewatch — src/scheduler/unmuteScheduler.ts
 * WHAT: Lifts timed mutes when they expire.
 * WHY: Timed mutes are stored with an `until`; nothing else removes them.
 * FLOWS:
 *  - Every MUTE_SCHEDULER_INTERVAL_MS → drop settled tasks → schedule anything expiring in the next minute
 *  - server-unmute-{guild}-{user}          → unmuteUser → sunmute case + DM | notification
 *  - server-unmute-channels-{guild}-{user} → gate closed → channelUnmuteUser × N → one sunmute case
 *  - channel-unmute-{channel}-{user}       → channelUnmuteUser → cunmute/vunmute case + DM | notification
 * DOCS:
 *  - setTimeout: https://nodejs.org/api/timers.html#settimeoutcallback-delay-args
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { Client, Guild, GuildMember, NonThreadGuildBasedChannel } from "discord.js";
import { env } from "../lib/env.js";
import { logger } from "../lib/logger.js";
import { discordErrorCode } from "../lib/errors.js";
import { UNMUTE_LOOKAHEAD_SECONDS } from "../lib/constants.js";
import { humanizeList } from "../lib/text.js";
import { nowUtc } from "../lib/time.js";
import { hasOverwrites } from "../lib/typeGuards.js";
import {
  deleteChannelMute,
  deleteServerMute,
  listChannelMutesExpiringBefore,
  listServerMutesExpiringBefore,
  type ChannelMute,
  type ServerMute,
} from "../store/muteStore.js";
import { createCase } from "../features/modlog/createCase.js";
import { withGateClosed } from "../features/mutes/gate.js";
import { issueMessage, parseIssues, type MuteIssue } from "../features/mutes/issues.js";
import { channelUnmuteUser, unmuteUser } from "../features/mutes/manager.js";
import { postMuteNotification, sendMuteDm } from "../features/mutes/notify.js";

const AUTO_REASON = "Automatic unmute";

interface UnmuteTask {
  timer: NodeJS.Timeout;
  settled: boolean;
}

const tasks = new Map<string, UnmuteTask>();
let _activeInterval: NodeJS.Timeout | null = null;

async function fetchMember(guild: Guild, userId: string): Promise<GuildMember | null> {
  const cached = guild.members.cache.get(userId);
  if (cached) return cached;
  try {
    return await guild.members.fetch(userId);
  } catch (err) {
    if (discordErrorCode(err) === 10007) return null;
    throw err;
  }
}

function scheduleTask(name: string, until: number, run: () => Promise<void>): void {
  if (tasks.has(name)) return;

  const delayMs = Math.max(0, (until - nowUtc()) * 1000);
  const task: UnmuteTask = {
    settled: false,
    timer: setTimeout(async () => {
      try {
        await run();
      } catch (err) {
        logger.error({ err, task: name }, "[unmute] Task failed");
      } finally {
        task.settled = true;
      }
    }, delayMs),
  };
  task.timer.unref();
  tasks.set(name, task);
  logger.debug({ task: name, delayMs }, "[unmute] Task scheduled");
}

/**
 * Lift one server mute. The record is dropped whatever the outcome so a
 * failing unmute is reported once, not every cycle.
 */
export async function autoServerUnmute(guild: Guild, mute: ServerMute): Promise<void> {
  const member = await fetchMember(guild, mute.userId);
  const me = guild.members.me;
  if (!member || !me) {
    deleteServerMute(guild.id, mute.userId);
    return;
  }

  const result = await unmuteUser(guild, me, member, AUTO_REASON);
  deleteServerMute(guild.id, mute.userId);

  if (result.success) {
    await createCase(guild, { action: "sunmute", user: member.user, moderator: me.user, reason: AUTO_REASON });
    await sendMuteDm(guild, member.user, { type: "Server unmute", moderator: me.user, reason: AUTO_REASON });
    return;
  }

  const reason = result.reason ? issueMessage(result.reason) : parseIssues(result);
  await postMuteNotification(
    guild,
    `I am unable to unmute ${member.user.tag} for the following reason:\n${reason}`
  );
}

/**
 * Lift one channel mute. Returns the issue when it failed, so a multi-channel
 * run can group them.
 */
async function unmuteInChannel(
  guild: Guild,
  channel: NonThreadGuildBasedChannel,
  member: GuildMember,
  me: GuildMember
): Promise<MuteIssue | null> {
  const result = await channelUnmuteUser(guild, channel, me, member, AUTO_REASON);
  deleteChannelMute(channel.id, member.id);
  if (result.success) return null;
  return result.reason ?? "unknown_channel";
}

function resolveChannel(guild: Guild, channelId: string): NonThreadGuildBasedChannel | null {
  const channel = guild.channels.cache.get(channelId);
  return channel && hasOverwrites(channel) ? channel : null;
}

export async function autoChannelUnmute(guild: Guild, mute: ChannelMute): Promise<void> {
  const channel = resolveChannel(guild, mute.channelId);
  const member = await fetchMember(guild, mute.userId);
  const me = guild.members.me;
  if (!channel || !member || !me) {
    deleteChannelMute(mute.channelId, mute.userId);
    return;
  }

  const issue = await unmuteInChannel(guild, channel, member, me);
  if (!issue) {
    const isVoice = channel.isVoiceBased();
    await createCase(guild, {
      action: isVoice ? "vunmute" : "cunmute",
      user: member.user,
      moderator: me.user,
      reason: AUTO_REASON,
      channelId: channel.id,
    });
    await sendMuteDm(guild, member.user, {
      type: isVoice ? "Voice unmute" : "Channel unmute",
      moderator: me.user,
      reason: AUTO_REASON,
    });
    return;
  }

  await postMuteNotification(
    guild,
    `I am unable to unmute ${member.user.tag} in <#${channel.id}> for the following reason:\n${issueMessage(issue)}`
  );
}

/**
 * Lift several channel mutes of one member at once, behind the guild's gate so the
 * overwrite edits aren't mistaken for manual removals.
 */
export async function autoMultiChannelUnmute(
  guild: Guild,
  userId: string,
  mutes: readonly ChannelMute[]
): Promise<void> {
  const member = await fetchMember(guild, userId);
  const me = guild.members.me;
  if (!member || !me) {
    for (const mute of mutes) deleteChannelMute(mute.channelId, userId);
    return;
  }

  const channels: NonThreadGuildBasedChannel[] = [];
  for (const mute of mutes) {
    const channel = resolveChannel(guild, mute.channelId);
    if (channel) channels.push(channel);
    else deleteChannelMute(mute.channelId, userId);
  }

  const outcomes = await withGateClosed(guild.id, () =>
    Promise.all(
      channels.map(async (channel) => ({ channel, issue: await unmuteInChannel(guild, channel, member, me) }))
    )
  );

  const unmuted = outcomes.filter((o) => o.issue === null).map((o) => `<#${o.channel.id}>`);
  let caseReason = AUTO_REASON;
  if (unmuted.length > 0) caseReason += `\nUnmuted in channels: ${humanizeList(unmuted)}`;

  await createCase(guild, { action: "sunmute", user: member.user, moderator: me.user, reason: caseReason });
  await sendMuteDm(guild, member.user, { type: "Server unmute", moderator: me.user, reason: AUTO_REASON });

  const grouped = new Map<MuteIssue, string[]>();
  for (const { channel, issue } of outcomes) {
    if (!issue) continue;
    const list = grouped.get(issue) ?? [];
    list.push(`<#${channel.id}>`);
    grouped.set(issue, list);
  }
  if (grouped.size === 0) return;

  let message = `${member.user.tag} could not be unmuted for the following reasons:\n`;
  for (const [issue, mentions] of grouped) {
    message += `${issueMessage(issue)} In the following channels: ${humanizeList(mentions)}\n`;
  }
  await postMuteNotification(guild, message);
}

/**
 * One pass of the loop. Synchronous: it only schedules timers.
 */
export function runUnmuteCycle(client: Client): void {
  for (const [name, task] of tasks) {
    if (task.settled) tasks.delete(name);
  }

  const horizon = nowUtc() + UNMUTE_LOOKAHEAD_SECONDS;

  for (const mute of listServerMutesExpiringBefore(horizon)) {
    const guild = client.guilds.cache.get(mute.guildId);
    if (!guild || mute.until === null) continue;
    scheduleTask(`server-unmute-${mute.guildId}-${mute.userId}`, mute.until, () =>
      autoServerUnmute(guild, mute)
    );
  }

  const byMember = new Map<string, ChannelMute[]>();
  for (const mute of listChannelMutesExpiringBefore(horizon)) {
    if (!client.guilds.cache.has(mute.guildId)) continue;
    const key = `${mute.guildId}-${mute.userId}`;
    const list = byMember.get(key) ?? [];
    list.push(mute);
    byMember.set(key, list);
  }

  for (const [key, mutes] of byMember) {
    const [first] = mutes;
    const guild = first ? client.guilds.cache.get(first.guildId) : undefined;
    if (!first || !guild) continue;

    if (mutes.length > 1) {
      const until = Math.max(...mutes.map((m) => m.until ?? 0));
      scheduleTask(`server-unmute-channels-${key}`, until, () =>
        autoMultiChannelUnmute(guild, first.userId, mutes)
      );
    } else {
      scheduleTask(`channel-unmute-${first.channelId}-${first.userId}`, first.until ?? 0, () =>
        autoChannelUnmute(guild, first)
      );
    }
  }
}

/** Names of scheduled tasks that haven't settled yet. */
export function pendingUnmuteTasks(): string[] {
  return [...tasks].filter(([, task]) => !task.settled).map(([name]) => name);
}

export function startUnmuteScheduler(client: Client): void {
  if (_activeInterval) return;

  logger.info({ intervalMs: env.MUTE_SCHEDULER_INTERVAL_MS }, "[unmute] scheduler starting");

  const tick = () => {
    try {
      runUnmuteCycle(client);
    } catch (err) {
      logger.error({ err }, "[unmute] cycle failed");
    }
  };
  tick();

  const interval = setInterval(tick, env.MUTE_SCHEDULER_INTERVAL_MS);
  interval.unref();
  _activeInterval = interval;
}

export function stopUnmuteScheduler(): void {
  if (_activeInterval) {
    clearInterval(_activeInterval);
    _activeInterval = null;
  }
  for (const task of tasks.values()) clearTimeout(task.timer);
  tasks.clear();
  logger.info("[unmute] scheduler stopped");
}

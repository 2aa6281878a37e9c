/**
 * tidewatch — src/store/muteStore.ts
 * WHAT: Persistence for server mutes, channel mutes and the overwrite perms cache.
 * WHY: Mutes must survive restarts so the scheduler can lift them and rejoins can re-apply them.
 * FLOWS:
 *  - mute: upsertServerMute / upsertChannelMute (+ setPermsCacheEntry)
 *  - unmute: deleteServerMute / deleteChannelMute (+ getPermsCacheEntry → delete)
 *  - scheduler: list*ExpiringBefore(ts)
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { db } from "../db/db.js";
import { logger } from "../lib/logger.js";

export interface ServerMute {
  guildId: string;
  userId: string;
  authorId: string | null;
  /** Unix seconds, null for indefinite */
  until: number | null;
}

export interface ChannelMute extends ServerMute {
  channelId: string;
}

/** true = allowed, false = denied, null = inherit */
export type OverwriteState = boolean | null;

export interface OldOverwrites {
  sendMessages: OverwriteState;
  addReactions: OverwriteState;
  speak: OverwriteState;
}

interface ServerMuteRow {
  guild_id: string;
  user_id: string;
  author_id: string | null;
  until: number | null;
}

interface ChannelMuteRow extends ServerMuteRow {
  channel_id: string;
}

interface PermsRow {
  channel_id: string;
  send_messages: number | null;
  add_reactions: number | null;
  speak: number | null;
}

const upsertServerStmt = db.prepare<[string, string, string | null, number | null]>(
  `INSERT INTO server_mute (guild_id, user_id, author_id, until) VALUES (?, ?, ?, ?)
   ON CONFLICT(guild_id, user_id) DO UPDATE SET author_id = excluded.author_id, until = excluded.until`
);
const getServerStmt = db.prepare<[string, string], ServerMuteRow>(
  `SELECT * FROM server_mute WHERE guild_id = ? AND user_id = ?`
);
const deleteServerStmt = db.prepare<[string, string]>(
  `DELETE FROM server_mute WHERE guild_id = ? AND user_id = ?`
);
const listServerStmt = db.prepare<[string], ServerMuteRow>(
  `SELECT * FROM server_mute WHERE guild_id = ? ORDER BY user_id`
);
const expiringServerStmt = db.prepare<[number], ServerMuteRow>(
  `SELECT * FROM server_mute WHERE until IS NOT NULL AND until < ?`
);

const upsertChannelStmt = db.prepare<[string, string, string, string | null, number | null]>(
  `INSERT INTO channel_mute (channel_id, guild_id, user_id, author_id, until) VALUES (?, ?, ?, ?, ?)
   ON CONFLICT(channel_id, user_id) DO UPDATE SET author_id = excluded.author_id, until = excluded.until`
);
const getChannelStmt = db.prepare<[string, string], ChannelMuteRow>(
  `SELECT * FROM channel_mute WHERE channel_id = ? AND user_id = ?`
);
const deleteChannelStmt = db.prepare<[string, string]>(
  `DELETE FROM channel_mute WHERE channel_id = ? AND user_id = ?`
);
const listChannelByChannelStmt = db.prepare<[string], ChannelMuteRow>(
  `SELECT * FROM channel_mute WHERE channel_id = ? ORDER BY user_id`
);
const listChannelByGuildStmt = db.prepare<[string], ChannelMuteRow>(
  `SELECT * FROM channel_mute WHERE guild_id = ? ORDER BY channel_id, user_id`
);
const expiringChannelStmt = db.prepare<[number], ChannelMuteRow>(
  `SELECT * FROM channel_mute WHERE until IS NOT NULL AND until < ?`
);

const upsertPermsStmt = db.prepare<
  [string, string, string, number | null, number | null, number | null]
>(
  `INSERT INTO mute_perms_cache (guild_id, user_id, channel_id, send_messages, add_reactions, speak)
   VALUES (?, ?, ?, ?, ?, ?)
   ON CONFLICT(guild_id, user_id, channel_id) DO UPDATE SET
     send_messages = excluded.send_messages,
     add_reactions = excluded.add_reactions,
     speak = excluded.speak`
);
const getPermsStmt = db.prepare<[string, string, string], PermsRow>(
  `SELECT channel_id, send_messages, add_reactions, speak FROM mute_perms_cache
   WHERE guild_id = ? AND user_id = ? AND channel_id = ?`
);
const deletePermsStmt = db.prepare<[string, string, string]>(
  `DELETE FROM mute_perms_cache WHERE guild_id = ? AND user_id = ? AND channel_id = ?`
);
const clearPermsStmt = db.prepare<[string, string]>(
  `DELETE FROM mute_perms_cache WHERE guild_id = ? AND user_id = ?`
);

function toServerMute(row: ServerMuteRow): ServerMute {
  return { guildId: row.guild_id, userId: row.user_id, authorId: row.author_id, until: row.until };
}

function toChannelMute(row: ChannelMuteRow): ChannelMute {
  return { ...toServerMute(row), channelId: row.channel_id };
}

function stateToSql(state: OverwriteState): number | null {
  if (state === null) return null;
  return state ? 1 : 0;
}

function stateFromSql(value: number | null): OverwriteState {
  if (value === null) return null;
  return value === 1;
}

// ===== Server mutes =====

export function upsertServerMute(mute: ServerMute): void {
  try {
    upsertServerStmt.run(mute.guildId, mute.userId, mute.authorId, mute.until);
  } catch (err) {
    logger.error({ err, guildId: mute.guildId, userId: mute.userId }, "[muteStore] upsertServerMute failed");
    throw err;
  }
}

export function getServerMute(guildId: string, userId: string): ServerMute | null {
  const row = getServerStmt.get(guildId, userId);
  return row ? toServerMute(row) : null;
}

/** @returns true when a row was removed */
export function deleteServerMute(guildId: string, userId: string): boolean {
  try {
    return deleteServerStmt.run(guildId, userId).changes > 0;
  } catch (err) {
    logger.error({ err, guildId, userId }, "[muteStore] deleteServerMute failed");
    throw err;
  }
}

export function listServerMutes(guildId: string): ServerMute[] {
  return listServerStmt.all(guildId).map(toServerMute);
}

export function listServerMutesExpiringBefore(ts: number): ServerMute[] {
  return expiringServerStmt.all(ts).map(toServerMute);
}

// ===== Channel mutes =====

export function upsertChannelMute(mute: ChannelMute): void {
  try {
    upsertChannelStmt.run(mute.channelId, mute.guildId, mute.userId, mute.authorId, mute.until);
  } catch (err) {
    logger.error(
      { err, channelId: mute.channelId, userId: mute.userId },
      "[muteStore] upsertChannelMute failed"
    );
    throw err;
  }
}

export function getChannelMute(channelId: string, userId: string): ChannelMute | null {
  const row = getChannelStmt.get(channelId, userId);
  return row ? toChannelMute(row) : null;
}

export function deleteChannelMute(channelId: string, userId: string): boolean {
  try {
    return deleteChannelStmt.run(channelId, userId).changes > 0;
  } catch (err) {
    logger.error({ err, channelId, userId }, "[muteStore] deleteChannelMute failed");
    throw err;
  }
}

export function listChannelMutes(channelId: string): ChannelMute[] {
  return listChannelByChannelStmt.all(channelId).map(toChannelMute);
}

export function listGuildChannelMutes(guildId: string): ChannelMute[] {
  return listChannelByGuildStmt.all(guildId).map(toChannelMute);
}

export function listChannelMutesExpiringBefore(ts: number): ChannelMute[] {
  return expiringChannelStmt.all(ts).map(toChannelMute);
}

// ===== Perms cache =====

export function setPermsCacheEntry(
  guildId: string,
  userId: string,
  channelId: string,
  old: OldOverwrites
): void {
  upsertPermsStmt.run(
    guildId,
    userId,
    channelId,
    stateToSql(old.sendMessages),
    stateToSql(old.addReactions),
    stateToSql(old.speak)
  );
}

/**
 * Values saved before the channel mute, or null when nothing was cached.
 */
export function getPermsCacheEntry(
  guildId: string,
  userId: string,
  channelId: string
): OldOverwrites | null {
  const row = getPermsStmt.get(guildId, userId, channelId);
  if (!row) return null;
  return {
    sendMessages: stateFromSql(row.send_messages),
    addReactions: stateFromSql(row.add_reactions),
    speak: stateFromSql(row.speak),
  };
}

export function deletePermsCacheEntry(guildId: string, userId: string, channelId: string): void {
  deletePermsStmt.run(guildId, userId, channelId);
}

export function clearPermsCache(guildId: string, userId: string): void {
  clearPermsStmt.run(guildId, userId);
}

/**
 * Replace every cached entry for a member in one transaction.
 */
export const replacePermsCache = db.transaction(
  (guildId: string, userId: string, entries: ReadonlyMap<string, OldOverwrites>) => {
    clearPermsStmt.run(guildId, userId);
    for (const [channelId, old] of entries) {
      setPermsCacheEntry(guildId, userId, channelId, old);
    }
  }
);

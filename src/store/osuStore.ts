/**
 * tidewatch — src/store/osuStore.ts
 * WHAT: osu! tracking config (mode, player → channel per guild) and score snapshots.
 * WHY: The tracker rebuilds its in-memory cache from here after every config change.
 * FLOWS:
 *  - /osutrack add|remove → addTracking / removeTracking → tracker.refresh()
 *  - tracker: loadTrackingCache → getSnapshot/saveSnapshot per player
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { db } from "../db/db.js";
import { logger } from "../lib/logger.js";
import { nowUtc } from "../lib/time.js";
import { isOsuMode, type OsuMode } from "../features/osu/modes.js";
import { snapshotSchema, type TrackedScore } from "../features/osu/scores.js";

export interface TrackingEntry {
  mode: OsuMode;
  osuUserId: number;
  guildId: string;
  channelId: string;
}

/** mode → player id → channel ids */
export type TrackingCache = Map<OsuMode, Map<number, string[]>>;

interface TrackingRow {
  mode: string;
  osu_user_id: number;
  guild_id: string;
  channel_id: string;
}

const upsertStmt = db.prepare<[string, number, string, string]>(
  `INSERT INTO osu_tracking (mode, osu_user_id, guild_id, channel_id) VALUES (?, ?, ?, ?)
   ON CONFLICT(mode, osu_user_id, guild_id) DO UPDATE SET channel_id = excluded.channel_id`
);
const removeStmt = db.prepare<[string, number, string]>(
  `DELETE FROM osu_tracking WHERE mode = ? AND osu_user_id = ? AND guild_id = ?`
);
const removeUserStmt = db.prepare<[string, number]>(
  `DELETE FROM osu_tracking WHERE mode = ? AND osu_user_id = ?`
);
const removeChannelStmt = db.prepare<[string]>(`DELETE FROM osu_tracking WHERE channel_id = ?`);
const remainingStmt = db.prepare<[string, number], { n: number }>(
  `SELECT COUNT(*) AS n FROM osu_tracking WHERE mode = ? AND osu_user_id = ?`
);
const countGuildStmt = db.prepare<[string, number], { n: number }>(
  `SELECT COUNT(DISTINCT osu_user_id) AS n FROM osu_tracking WHERE guild_id = ? AND osu_user_id != ?`
);
const listGuildStmt = db.prepare<[string], TrackingRow>(
  `SELECT * FROM osu_tracking WHERE guild_id = ? ORDER BY mode, osu_user_id`
);
const listAllStmt = db.prepare<[], TrackingRow>(
  `SELECT * FROM osu_tracking ORDER BY mode, osu_user_id, guild_id`
);

const getSnapshotStmt = db.prepare<[string, number], { scores_json: string }>(
  `SELECT scores_json FROM osu_snapshot WHERE mode = ? AND osu_user_id = ?`
);
const saveSnapshotStmt = db.prepare<[string, number, string, number]>(
  `INSERT INTO osu_snapshot (mode, osu_user_id, scores_json, updated_at) VALUES (?, ?, ?, ?)
   ON CONFLICT(mode, osu_user_id) DO UPDATE SET scores_json = excluded.scores_json, updated_at = excluded.updated_at`
);
const deleteSnapshotStmt = db.prepare<[string, number]>(
  `DELETE FROM osu_snapshot WHERE mode = ? AND osu_user_id = ?`
);
const deleteOrphanSnapshotsStmt = db.prepare<[]>(
  `DELETE FROM osu_snapshot WHERE NOT EXISTS (
     SELECT 1 FROM osu_tracking t WHERE t.mode = osu_snapshot.mode AND t.osu_user_id = osu_snapshot.osu_user_id
   )`
);

function toEntry(row: TrackingRow): TrackingEntry | null {
  if (!isOsuMode(row.mode)) {
    logger.warn({ mode: row.mode, osuUserId: row.osu_user_id }, "[osuStore] Unknown mode in tracking row");
    return null;
  }
  return { mode: row.mode, osuUserId: row.osu_user_id, guildId: row.guild_id, channelId: row.channel_id };
}

function entries(rows: TrackingRow[]): TrackingEntry[] {
  const out: TrackingEntry[] = [];
  for (const row of rows) {
    const entry = toEntry(row);
    if (entry) out.push(entry);
  }
  return out;
}

/**
 * Track a player in a channel. Replaces the guild's previous channel for that player+mode.
 */
export function addTracking(entry: TrackingEntry): void {
  try {
    upsertStmt.run(entry.mode, entry.osuUserId, entry.guildId, entry.channelId);
    logger.info({ ...entry }, "[osuStore] Tracking added");
  } catch (err) {
    logger.error({ err, ...entry }, "[osuStore] addTracking failed");
    throw err;
  }
}

const removeTx = db.transaction((mode: OsuMode, osuUserId: number, guildId: string): boolean => {
  const removed = removeStmt.run(mode, osuUserId, guildId).changes > 0;
  if (removed && (remainingStmt.get(mode, osuUserId)?.n ?? 0) === 0) {
    deleteSnapshotStmt.run(mode, osuUserId);
  }
  return removed;
});

/**
 * @returns false when the player wasn't tracked in that guild
 */
export function removeTracking(mode: OsuMode, osuUserId: number, guildId: string): boolean {
  try {
    return removeTx(mode, osuUserId, guildId);
  } catch (err) {
    logger.error({ err, mode, osuUserId, guildId }, "[osuStore] removeTracking failed");
    throw err;
  }
}

/**
 * Drop a player from every guild. Used when their scores keep failing to load.
 */
export const removeUserEverywhere = db.transaction((mode: OsuMode, osuUserId: number): void => {
  removeUserStmt.run(mode, osuUserId);
  deleteSnapshotStmt.run(mode, osuUserId);
});

/**
 * Drop channels that no longer exist, then any snapshot left without a tracker.
 */
export const removeChannels = db.transaction((channelIds: readonly string[]): void => {
  for (const channelId of channelIds) {
    removeChannelStmt.run(channelId);
  }
  deleteOrphanSnapshotsStmt.run();
});

/**
 * Distinct players tracked in a guild, not counting `excludingUserId`.
 */
export function countGuildTracking(guildId: string, excludingUserId: number): number {
  return countGuildStmt.get(guildId, excludingUserId)?.n ?? 0;
}

export function listGuildTracking(guildId: string): TrackingEntry[] {
  return entries(listGuildStmt.all(guildId));
}

export function loadTrackingCache(): TrackingCache {
  const cache: TrackingCache = new Map();
  for (const entry of entries(listAllStmt.all())) {
    let users = cache.get(entry.mode);
    if (!users) {
      users = new Map();
      cache.set(entry.mode, users);
    }
    const channels = users.get(entry.osuUserId) ?? [];
    channels.push(entry.channelId);
    users.set(entry.osuUserId, channels);
  }
  return cache;
}

/**
 * Stored top scores, or null when none are stored or the row no longer parses.
 */
export function getSnapshot(mode: OsuMode, osuUserId: number): TrackedScore[] | null {
  const row = getSnapshotStmt.get(mode, osuUserId);
  if (!row) return null;
  let raw: unknown;
  try {
    raw = JSON.parse(row.scores_json);
  } catch (err) {
    logger.warn({ err, mode, osuUserId }, "[osuStore] Snapshot is not valid JSON");
    return null;
  }
  const parsed = snapshotSchema.safeParse(raw);
  if (!parsed.success) {
    logger.warn({ mode, osuUserId, issues: parsed.error.issues.length }, "[osuStore] Snapshot failed validation");
    return null;
  }
  return parsed.data;
}

export function saveSnapshot(mode: OsuMode, osuUserId: number, scores: readonly TrackedScore[]): void {
  saveSnapshotStmt.run(mode, osuUserId, JSON.stringify(scores), nowUtc());
}

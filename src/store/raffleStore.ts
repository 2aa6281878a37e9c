/**
 * tidewatch — src/store/raffleStore.ts
 * WHAT: Raffles, their entrants and drawn winners, plus the per-guild announcement role.
 * FLOWS:
 *  - /raffle start → createRaffle
 *  - entry button → toggleRaffleEntry
 *  - scheduler | /raffle end → finishRaffle(winners) → history trimmed to UTILITY_HISTORY_LIMIT
 *  - /raffle reroll → setRaffleWinners
 *  - /raffle cancel, vanished message → deleteRaffle
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { db } from "../db/db.js";
import { logger } from "../lib/logger.js";
import { UTILITY_HISTORY_LIMIT } from "../lib/constants.js";
import { nowUtc } from "../lib/time.js";
import { decodeRoleIds, encodeRoleIds } from "./roleIds.js";

export interface Raffle {
  messageId: string;
  guildId: string;
  channelId: string;
  hostId: string;
  title: string;
  description: string | null;
  winnerCount: number;
  /** 0 means no membership age requirement */
  daysOnServer: number;
  /** Empty means everyone may enter */
  roleIds: string[];
  endTime: number;
  endedAt: number | null;
  /** In entry order */
  entries: string[];
  /** In draw order */
  winnerIds: string[];
}

export type NewRaffle = Omit<Raffle, "endedAt" | "entries" | "winnerIds">;

interface RaffleRow {
  message_id: string;
  guild_id: string;
  channel_id: string;
  host_id: string;
  title: string;
  description: string | null;
  winner_count: number;
  days_on_server: number;
  role_ids: string;
  end_time: number;
  ended_at: number | null;
}

const insertStmt = db.prepare<[string, string, string, string, string, string | null, number, number, string, number]>(
  `INSERT INTO raffle (message_id, guild_id, channel_id, host_id, title, description, winner_count, days_on_server, role_ids, end_time)
   VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
);
const getStmt = db.prepare<[string], RaffleRow>(`SELECT * FROM raffle WHERE message_id = ?`);
const entriesStmt = db.prepare<[string], { user_id: string }>(
  `SELECT user_id FROM raffle_entry WHERE message_id = ? ORDER BY rowid`
);
const winnersStmt = db.prepare<[string], { user_id: string }>(
  `SELECT user_id FROM raffle_winner WHERE message_id = ? ORDER BY position`
);
const activeStmt = db.prepare<[string], RaffleRow>(
  `SELECT * FROM raffle WHERE guild_id = ? AND ended_at IS NULL ORDER BY end_time, message_id`
);
const countActiveStmt = db.prepare<[string], { n: number }>(
  `SELECT COUNT(*) AS n FROM raffle WHERE guild_id = ? AND ended_at IS NULL`
);
const historyStmt = db.prepare<[string, number], RaffleRow>(
  `SELECT * FROM raffle WHERE guild_id = ? AND ended_at IS NOT NULL
   ORDER BY ended_at DESC, rowid DESC LIMIT ?`
);
const dueStmt = db.prepare<[number], RaffleRow>(
  `SELECT * FROM raffle WHERE ended_at IS NULL AND end_time <= ? ORDER BY end_time, message_id`
);
const hasEntryStmt = db.prepare<[string, string], { n: number }>(
  `SELECT COUNT(*) AS n FROM raffle_entry WHERE message_id = ? AND user_id = ?`
);
const addEntryStmt = db.prepare<[string, string, number]>(
  `INSERT INTO raffle_entry (message_id, user_id, entered_at) VALUES (?, ?, ?)`
);
const removeEntryStmt = db.prepare<[string, string]>(
  `DELETE FROM raffle_entry WHERE message_id = ? AND user_id = ?`
);
const countEntriesStmt = db.prepare<[string], { n: number }>(
  `SELECT COUNT(*) AS n FROM raffle_entry WHERE message_id = ?`
);
const endStmt = db.prepare<[number, string]>(
  `UPDATE raffle SET ended_at = ? WHERE message_id = ? AND ended_at IS NULL`
);
const clearWinnersStmt = db.prepare<[string]>(`DELETE FROM raffle_winner WHERE message_id = ?`);
const addWinnerStmt = db.prepare<[string, number, string]>(
  `INSERT INTO raffle_winner (message_id, position, user_id) VALUES (?, ?, ?)`
);
const pruneHistoryStmt = db.prepare<[string, string, number]>(
  `DELETE FROM raffle WHERE guild_id = ? AND ended_at IS NOT NULL AND message_id NOT IN (
     SELECT message_id FROM raffle WHERE guild_id = ? AND ended_at IS NOT NULL
     ORDER BY ended_at DESC, rowid DESC LIMIT ?
   )`
);
const deleteStmt = db.prepare<[string]>(`DELETE FROM raffle WHERE message_id = ?`);

const getMentionStmt = db.prepare<[string], { mention_role_id: string | null }>(
  `SELECT mention_role_id FROM raffle_settings WHERE guild_id = ?`
);
const setMentionStmt = db.prepare<[string, string | null]>(
  `INSERT INTO raffle_settings (guild_id, mention_role_id) VALUES (?, ?)
   ON CONFLICT(guild_id) DO UPDATE SET mention_role_id = excluded.mention_role_id`
);

function hydrate(row: RaffleRow): Raffle {
  return {
    messageId: row.message_id,
    guildId: row.guild_id,
    channelId: row.channel_id,
    hostId: row.host_id,
    title: row.title,
    description: row.description,
    winnerCount: row.winner_count,
    daysOnServer: row.days_on_server,
    roleIds: decodeRoleIds(row.role_ids, row.message_id),
    endTime: row.end_time,
    endedAt: row.ended_at,
    entries: entriesStmt.all(row.message_id).map((e) => e.user_id),
    winnerIds: winnersStmt.all(row.message_id).map((w) => w.user_id),
  };
}

export function createRaffle(raffle: NewRaffle): void {
  try {
    insertStmt.run(
      raffle.messageId,
      raffle.guildId,
      raffle.channelId,
      raffle.hostId,
      raffle.title,
      raffle.description,
      raffle.winnerCount,
      raffle.daysOnServer,
      encodeRoleIds(raffle.roleIds),
      raffle.endTime
    );
    logger.info({ messageId: raffle.messageId, guildId: raffle.guildId }, "[raffleStore] Raffle created");
  } catch (err) {
    logger.error({ err, messageId: raffle.messageId, guildId: raffle.guildId }, "[raffleStore] createRaffle failed");
    throw err;
  }
}

export function getRaffle(messageId: string): Raffle | null {
  const row = getStmt.get(messageId);
  return row ? hydrate(row) : null;
}

export function listActiveRaffles(guildId: string): Raffle[] {
  return activeStmt.all(guildId).map(hydrate);
}

export function countActiveRaffles(guildId: string): number {
  return countActiveStmt.get(guildId)?.n ?? 0;
}

/** Most recently ended first */
export function listRaffleHistory(guildId: string): Raffle[] {
  return historyStmt.all(guildId, UTILITY_HISTORY_LIMIT).map(hydrate);
}

export function listDueRaffles(at: number): Raffle[] {
  return dueStmt.all(at).map(hydrate);
}

const entryTx = db.transaction((messageId: string, userId: string): { entered: boolean; total: number } => {
  let entered: boolean;
  if ((hasEntryStmt.get(messageId, userId)?.n ?? 0) > 0) {
    removeEntryStmt.run(messageId, userId);
    entered = false;
  } else {
    addEntryStmt.run(messageId, userId, nowUtc());
    entered = true;
  }
  return { entered, total: countEntriesStmt.get(messageId)?.n ?? 0 };
});

/**
 * Enter the raffle, or leave it when already entered.
 */
export function toggleRaffleEntry(messageId: string, userId: string): { entered: boolean; total: number } {
  return entryTx(messageId, userId);
}

const replaceWinnersTx = db.transaction((messageId: string, winnerIds: readonly string[]) => {
  clearWinnersStmt.run(messageId);
  winnerIds.forEach((userId, position) => addWinnerStmt.run(messageId, position, userId));
});

const finishTx = db.transaction(
  (raffle: Raffle, endedAt: number, winnerIds: readonly string[]): boolean => {
    if (endStmt.run(endedAt, raffle.messageId).changes === 0) return false;
    replaceWinnersTx(raffle.messageId, winnerIds);
    pruneHistoryStmt.run(raffle.guildId, raffle.guildId, UTILITY_HISTORY_LIMIT);
    return true;
  }
);

/**
 * Move a raffle into history with its winners. Returns false when it had already ended.
 */
export function finishRaffle(raffle: Raffle, endedAt: number, winnerIds: readonly string[]): boolean {
  const finished = finishTx(raffle, endedAt, winnerIds);
  if (finished) {
    logger.info(
      { messageId: raffle.messageId, guildId: raffle.guildId, winners: winnerIds.length },
      "[raffleStore] Raffle finished"
    );
  }
  return finished;
}

export function setRaffleWinners(messageId: string, winnerIds: readonly string[]): void {
  replaceWinnersTx(messageId, winnerIds);
}

export function deleteRaffle(messageId: string): void {
  deleteStmt.run(messageId);
}

/** Role pinged when a raffle starts, if any */
export function getRaffleMentionRole(guildId: string): string | null {
  return getMentionStmt.get(guildId)?.mention_role_id ?? null;
}

export function setRaffleMentionRole(guildId: string, roleId: string | null): void {
  setMentionStmt.run(guildId, roleId);
}

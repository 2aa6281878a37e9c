/**
 * tidewatch — src/store/pollStore.ts
 * WHAT: Polls, their options and every vote cast on them.
 * WHY: Button clicks, the scheduler and /poll all read the same rows; the poll message only
 *      shows what is stored here.
 * FLOWS:
 *  - /poll start → createPoll
 *  - vote button → togglePollVote (single mode clears the voter's other options first)
 *  - scheduler | /poll end → markPollEnded → history trimmed to UTILITY_HISTORY_LIMIT
 * DOCS:
 *  - better-sqlite3 transactions: https://github.com/WiseLibs/better-sqlite3/blob/master/docs/api.md#transactionfunction---function
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { db } from "../db/db.js";
import { logger } from "../lib/logger.js";
import { UTILITY_HISTORY_LIMIT } from "../lib/constants.js";
import { decodeRoleIds, encodeRoleIds } from "./roleIds.js";

export type PollVoteType = "single" | "multi";

export interface PollOption {
  index: number;
  label: string;
  /** Voter ids in the order they voted */
  votes: string[];
}

export interface Poll {
  messageId: string;
  guildId: string;
  channelId: string;
  hostId: string;
  question: string;
  voteType: PollVoteType;
  /** Empty means everyone may vote */
  roleIds: string[];
  endTime: number;
  endedAt: number | null;
  options: PollOption[];
}

export interface NewPoll {
  messageId: string;
  guildId: string;
  channelId: string;
  hostId: string;
  question: string;
  voteType: PollVoteType;
  roleIds: readonly string[];
  endTime: number;
  options: readonly string[];
}

export interface VoteOutcome {
  /** false when the click took the voter's vote back */
  added: boolean;
  /** Options the voter's earlier single-mode vote was moved away from */
  movedFrom: number[];
}

interface PollRow {
  message_id: string;
  guild_id: string;
  channel_id: string;
  host_id: string;
  question: string;
  vote_type: string;
  role_ids: string;
  end_time: number;
  ended_at: number | null;
}

const insertPollStmt = db.prepare<[string, string, string, string, string, string, string, number]>(
  `INSERT INTO poll (message_id, guild_id, channel_id, host_id, question, vote_type, role_ids, end_time)
   VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
);
const insertOptionStmt = db.prepare<[string, number, string]>(
  `INSERT INTO poll_option (message_id, option_index, label) VALUES (?, ?, ?)`
);
const getPollStmt = db.prepare<[string], PollRow>(`SELECT * FROM poll WHERE message_id = ?`);
const optionsStmt = db.prepare<[string], { option_index: number; label: string }>(
  `SELECT option_index, label FROM poll_option WHERE message_id = ? ORDER BY option_index`
);
const votesStmt = db.prepare<[string], { option_index: number; user_id: string }>(
  `SELECT option_index, user_id FROM poll_vote WHERE message_id = ? ORDER BY rowid`
);
const activeStmt = db.prepare<[string], PollRow>(
  `SELECT * FROM poll WHERE guild_id = ? AND ended_at IS NULL ORDER BY end_time, message_id`
);
const countActiveStmt = db.prepare<[string], { n: number }>(
  `SELECT COUNT(*) AS n FROM poll WHERE guild_id = ? AND ended_at IS NULL`
);
const historyStmt = db.prepare<[string, number], PollRow>(
  `SELECT * FROM poll WHERE guild_id = ? AND ended_at IS NOT NULL
   ORDER BY ended_at DESC, rowid DESC LIMIT ?`
);
const dueStmt = db.prepare<[number], PollRow>(
  `SELECT * FROM poll WHERE ended_at IS NULL AND end_time <= ? ORDER BY end_time, message_id`
);
const hasVoteStmt = db.prepare<[string, number, string], { n: number }>(
  `SELECT COUNT(*) AS n FROM poll_vote WHERE message_id = ? AND option_index = ? AND user_id = ?`
);
const addVoteStmt = db.prepare<[string, number, string]>(
  `INSERT INTO poll_vote (message_id, option_index, user_id) VALUES (?, ?, ?)`
);
const removeVoteStmt = db.prepare<[string, number, string]>(
  `DELETE FROM poll_vote WHERE message_id = ? AND option_index = ? AND user_id = ?`
);
const otherVotesStmt = db.prepare<[string, string, number], { option_index: number }>(
  `SELECT option_index FROM poll_vote WHERE message_id = ? AND user_id = ? AND option_index != ?
   ORDER BY option_index`
);
const removeOtherVotesStmt = db.prepare<[string, string, number]>(
  `DELETE FROM poll_vote WHERE message_id = ? AND user_id = ? AND option_index != ?`
);
const endStmt = db.prepare<[number, string]>(
  `UPDATE poll SET ended_at = ? WHERE message_id = ? AND ended_at IS NULL`
);
const pruneHistoryStmt = db.prepare<[string, string, number]>(
  `DELETE FROM poll WHERE guild_id = ? AND ended_at IS NOT NULL AND message_id NOT IN (
     SELECT message_id FROM poll WHERE guild_id = ? AND ended_at IS NOT NULL
     ORDER BY ended_at DESC, rowid DESC LIMIT ?
   )`
);
const deleteStmt = db.prepare<[string]>(`DELETE FROM poll WHERE message_id = ?`);

function isVoteType(value: string): value is PollVoteType {
  return value === "single" || value === "multi";
}

function hydrate(row: PollRow): Poll {
  const options: PollOption[] = optionsStmt
    .all(row.message_id)
    .map((o) => ({ index: o.option_index, label: o.label, votes: [] }));
  for (const vote of votesStmt.all(row.message_id)) {
    options.find((o) => o.index === vote.option_index)?.votes.push(vote.user_id);
  }
  return {
    messageId: row.message_id,
    guildId: row.guild_id,
    channelId: row.channel_id,
    hostId: row.host_id,
    question: row.question,
    voteType: isVoteType(row.vote_type) ? row.vote_type : "single",
    roleIds: decodeRoleIds(row.role_ids, row.message_id),
    endTime: row.end_time,
    endedAt: row.ended_at,
    options,
  };
}

const createTx = db.transaction((poll: NewPoll) => {
  insertPollStmt.run(
    poll.messageId,
    poll.guildId,
    poll.channelId,
    poll.hostId,
    poll.question,
    poll.voteType,
    encodeRoleIds(poll.roleIds),
    poll.endTime
  );
  poll.options.forEach((label, index) => insertOptionStmt.run(poll.messageId, index, label));
});

export function createPoll(poll: NewPoll): void {
  try {
    createTx(poll);
    logger.info(
      { messageId: poll.messageId, guildId: poll.guildId, options: poll.options.length },
      "[pollStore] Poll created"
    );
  } catch (err) {
    logger.error({ err, messageId: poll.messageId, guildId: poll.guildId }, "[pollStore] createPoll failed");
    throw err;
  }
}

export function getPoll(messageId: string): Poll | null {
  const row = getPollStmt.get(messageId);
  return row ? hydrate(row) : null;
}

/** Soonest-ending first */
export function listActivePolls(guildId: string): Poll[] {
  return activeStmt.all(guildId).map(hydrate);
}

export function countActivePolls(guildId: string): number {
  return countActiveStmt.get(guildId)?.n ?? 0;
}

/** Most recently ended first */
export function listPollHistory(guildId: string): Poll[] {
  return historyStmt.all(guildId, UTILITY_HISTORY_LIMIT).map(hydrate);
}

/** Active polls in every guild whose end time is at or before `at` */
export function listDuePolls(at: number): Poll[] {
  return dueStmt.all(at).map(hydrate);
}

const voteTx = db.transaction(
  (messageId: string, optionIndex: number, userId: string, single: boolean): VoteOutcome => {
    const movedFrom: number[] = [];
    if (single) {
      for (const row of otherVotesStmt.all(messageId, userId, optionIndex)) movedFrom.push(row.option_index);
      removeOtherVotesStmt.run(messageId, userId, optionIndex);
    }
    if ((hasVoteStmt.get(messageId, optionIndex, userId)?.n ?? 0) > 0) {
      removeVoteStmt.run(messageId, optionIndex, userId);
      return { added: false, movedFrom };
    }
    addVoteStmt.run(messageId, optionIndex, userId);
    return { added: true, movedFrom };
  }
);

/**
 * Flip a voter's vote on one option. In single mode their votes on other options go first.
 */
export function togglePollVote(poll: Poll, optionIndex: number, userId: string): VoteOutcome {
  return voteTx(poll.messageId, optionIndex, userId, poll.voteType === "single");
}

const endTx = db.transaction((messageId: string, guildId: string, endedAt: number): boolean => {
  const ended = endStmt.run(endedAt, messageId).changes > 0;
  if (ended) pruneHistoryStmt.run(guildId, guildId, UTILITY_HISTORY_LIMIT);
  return ended;
});

/**
 * Move a poll into the guild's history. Returns false when it had already ended.
 */
export function markPollEnded(poll: Poll, endedAt: number): boolean {
  const ended = endTx(poll.messageId, poll.guildId, endedAt);
  if (ended) logger.info({ messageId: poll.messageId, guildId: poll.guildId }, "[pollStore] Poll ended");
  return ended;
}

/** Drop a poll whose message or channel is gone. */
export function deletePoll(messageId: string): void {
  deleteStmt.run(messageId);
}

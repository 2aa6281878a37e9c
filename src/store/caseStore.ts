/**
 * tidewatch — src/store/caseStore.ts
 * WHAT: Modlog cases and per-guild case type toggles.
 * WHY: Case numbers are per guild and must be allocated atomically with the insert.
 * FLOWS:
 *  - insertCase(input) → next number (max + 1) → row
 *  - updateCaseReason / setCaseMessageId after posting
 *  - isCaseTypeEnabled / setCaseTypeEnabled for /modlog cases
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { db } from "../db/db.js";
import { logger } from "../lib/logger.js";
import { CASE_TYPES, isCaseAction, type CaseAction } from "../features/modlog/caseTypes.js";

export interface ModCase {
  guildId: string;
  caseNumber: number;
  action: CaseAction;
  userId: string;
  userTag: string;
  moderatorId: string | null;
  reason: string | null;
  until: number | null;
  channelId: string | null;
  createdAt: number;
  modifiedAt: number | null;
  amendedById: string | null;
  messageId: string | null;
}

export type NewCase = Omit<ModCase, "caseNumber" | "modifiedAt" | "amendedById" | "messageId">;

interface CaseRow {
  guild_id: string;
  case_number: number;
  action_type: string;
  user_id: string;
  user_tag: string;
  moderator_id: string | null;
  reason: string | null;
  until: number | null;
  channel_id: string | null;
  created_at: number;
  modified_at: number | null;
  amended_by_id: string | null;
  message_id: string | null;
}

const nextNumberStmt = db.prepare<[string], { next: number }>(
  `SELECT COALESCE(MAX(case_number), 0) + 1 AS next FROM modlog_case WHERE guild_id = ?`
);
const insertStmt = db.prepare<
  [string, number, string, string, string, string | null, string | null, number | null, string | null, number]
>(
  `INSERT INTO modlog_case
     (guild_id, case_number, action_type, user_id, user_tag, moderator_id, reason, until, channel_id, created_at)
   VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
);
const getStmt = db.prepare<[string, number], CaseRow>(
  `SELECT * FROM modlog_case WHERE guild_id = ? AND case_number = ?`
);
const latestStmt = db.prepare<[string], CaseRow>(
  `SELECT * FROM modlog_case WHERE guild_id = ? ORDER BY case_number DESC LIMIT 1`
);
const forUserStmt = db.prepare<[string, string], CaseRow>(
  `SELECT * FROM modlog_case WHERE guild_id = ? AND user_id = ? ORDER BY case_number ASC`
);
const updateReasonStmt = db.prepare<[string, string, number, string, number]>(
  `UPDATE modlog_case SET reason = ?, amended_by_id = ?, modified_at = ?
   WHERE guild_id = ? AND case_number = ?`
);
const setMessageStmt = db.prepare<[string, string, number]>(
  `UPDATE modlog_case SET message_id = ? WHERE guild_id = ? AND case_number = ?`
);
const deleteAllStmt = db.prepare<[string]>(`DELETE FROM modlog_case WHERE guild_id = ?`);

const isDisabledStmt = db.prepare<[string, string], { one: number }>(
  `SELECT 1 AS one FROM modlog_casetype_disabled WHERE guild_id = ? AND action_type = ?`
);
const disableStmt = db.prepare<[string, string]>(
  `INSERT OR IGNORE INTO modlog_casetype_disabled (guild_id, action_type) VALUES (?, ?)`
);
const enableStmt = db.prepare<[string, string]>(
  `DELETE FROM modlog_casetype_disabled WHERE guild_id = ? AND action_type = ?`
);

function fromRow(row: CaseRow): ModCase {
  if (!isCaseAction(row.action_type)) {
    throw new Error(`Unknown case action '${row.action_type}' in case #${row.case_number}`);
  }
  return {
    guildId: row.guild_id,
    caseNumber: row.case_number,
    action: row.action_type,
    userId: row.user_id,
    userTag: row.user_tag,
    moderatorId: row.moderator_id,
    reason: row.reason,
    until: row.until,
    channelId: row.channel_id,
    createdAt: row.created_at,
    modifiedAt: row.modified_at,
    amendedById: row.amended_by_id,
    messageId: row.message_id,
  };
}

const insertTx = db.transaction((input: NewCase): ModCase => {
  const caseNumber = nextNumberStmt.get(input.guildId)?.next ?? 1;
  insertStmt.run(
    input.guildId,
    caseNumber,
    input.action,
    input.userId,
    input.userTag,
    input.moderatorId,
    input.reason,
    input.until,
    input.channelId,
    input.createdAt
  );
  return { ...input, caseNumber, modifiedAt: null, amendedById: null, messageId: null };
});

export function insertCase(input: NewCase): ModCase {
  try {
    return insertTx(input);
  } catch (err) {
    logger.error({ err, guildId: input.guildId, action: input.action }, "[caseStore] insertCase failed");
    throw err;
  }
}

export function getCase(guildId: string, caseNumber: number): ModCase | null {
  const row = getStmt.get(guildId, caseNumber);
  return row ? fromRow(row) : null;
}

export function getLatestCase(guildId: string): ModCase | null {
  const row = latestStmt.get(guildId);
  return row ? fromRow(row) : null;
}

export function listCasesForUser(guildId: string, userId: string): ModCase[] {
  return forUserStmt.all(guildId, userId).map(fromRow);
}

export function updateCaseReason(
  guildId: string,
  caseNumber: number,
  reason: string,
  amendedById: string,
  modifiedAt: number
): boolean {
  try {
    return updateReasonStmt.run(reason, amendedById, modifiedAt, guildId, caseNumber).changes > 0;
  } catch (err) {
    logger.error({ err, guildId, caseNumber }, "[caseStore] updateCaseReason failed");
    throw err;
  }
}

export function setCaseMessageId(guildId: string, caseNumber: number, messageId: string): void {
  setMessageStmt.run(messageId, guildId, caseNumber);
}

/** @returns number of cases removed */
export function deleteAllCases(guildId: string): number {
  try {
    return deleteAllStmt.run(guildId).changes;
  } catch (err) {
    logger.error({ err, guildId }, "[caseStore] deleteAllCases failed");
    throw err;
  }
}

export function isCaseTypeEnabled(guildId: string, action: CaseAction): boolean {
  if (isDisabledStmt.get(guildId, action)) return false;
  return CASE_TYPES[action].defaultEnabled;
}

export function setCaseTypeEnabled(guildId: string, action: CaseAction, enabled: boolean): void {
  if (enabled) {
    enableStmt.run(guildId, action);
  } else {
    disableStmt.run(guildId, action);
  }
}

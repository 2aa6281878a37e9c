/**
 * tidewatch — src/store/warningStore.ts
 * WHAT: Warnings, registered warn reasons and point-threshold actions.
 * WHY: Total points drive automatic actions, so warnings and thresholds live together.
 * FLOWS:
 *  - addWarning → totalPoints → listActions (points DESC) for the exceed check
 *  - deleteWarning → totalPoints before/after for the drop check
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { db } from "../db/db.js";
import { logger } from "../lib/logger.js";

export const EXCEED_ACTIONS = ["mute", "kick", "ban", "none"] as const;
export const DROP_ACTIONS = ["unmute", "none"] as const;
export type ExceedAction = (typeof EXCEED_ACTIONS)[number];
export type DropAction = (typeof DROP_ACTIONS)[number];

export function isExceedAction(value: string): value is ExceedAction {
  return EXCEED_ACTIONS.some((action) => action === value);
}

export function isDropAction(value: string): value is DropAction {
  return DROP_ACTIONS.some((action) => action === value);
}

export interface Warning {
  /** Snowflake of the interaction that issued it */
  id: string;
  guildId: string;
  userId: string;
  points: number;
  description: string;
  moderatorId: string;
  createdAt: number;
}

export interface WarnReason {
  name: string;
  points: number;
  description: string;
}

export interface WarnAction {
  name: string;
  points: number;
  exceedAction: ExceedAction;
  dropAction: DropAction;
}

interface WarningRow {
  id: string;
  guild_id: string;
  user_id: string;
  points: number;
  description: string;
  moderator_id: string;
  created_at: number;
}

interface ActionRow {
  name: string;
  points: number;
  exceed_action: string;
  drop_action: string;
}

const insertWarningStmt = db.prepare<[string, string, string, number, string, string, number]>(
  `INSERT INTO warning (id, guild_id, user_id, points, description, moderator_id, created_at)
   VALUES (?, ?, ?, ?, ?, ?, ?)`
);
const getWarningStmt = db.prepare<[string, string, string], WarningRow>(
  `SELECT * FROM warning WHERE guild_id = ? AND user_id = ? AND id = ?`
);
const deleteWarningStmt = db.prepare<[string, string, string]>(
  `DELETE FROM warning WHERE guild_id = ? AND user_id = ? AND id = ?`
);
const listWarningsStmt = db.prepare<[string, string], WarningRow>(
  `SELECT * FROM warning WHERE guild_id = ? AND user_id = ? ORDER BY created_at ASC, id ASC`
);
const totalPointsStmt = db.prepare<[string, string], { total: number }>(
  `SELECT COALESCE(SUM(points), 0) AS total FROM warning WHERE guild_id = ? AND user_id = ?`
);

const upsertReasonStmt = db.prepare<[string, string, number, string]>(
  `INSERT INTO warn_reason (guild_id, name, points, description) VALUES (?, ?, ?, ?)
   ON CONFLICT(guild_id, name) DO UPDATE SET points = excluded.points, description = excluded.description`
);
const getReasonStmt = db.prepare<[string, string], WarnReason>(
  `SELECT name, points, description FROM warn_reason WHERE guild_id = ? AND name = ?`
);
const deleteReasonStmt = db.prepare<[string, string]>(
  `DELETE FROM warn_reason WHERE guild_id = ? AND name = ?`
);
const listReasonsStmt = db.prepare<[string], WarnReason>(
  `SELECT name, points, description FROM warn_reason WHERE guild_id = ? ORDER BY name`
);

const insertActionStmt = db.prepare<[string, string, number, string, string]>(
  `INSERT INTO warn_action (guild_id, name, points, exceed_action, drop_action) VALUES (?, ?, ?, ?, ?)`
);
const getActionStmt = db.prepare<[string, string], { one: number }>(
  `SELECT 1 AS one FROM warn_action WHERE guild_id = ? AND name = ?`
);
const deleteActionStmt = db.prepare<[string, string]>(
  `DELETE FROM warn_action WHERE guild_id = ? AND name = ?`
);
const listActionsStmt = db.prepare<[string], ActionRow>(
  `SELECT name, points, exceed_action, drop_action FROM warn_action
   WHERE guild_id = ? ORDER BY points DESC, name ASC`
);

function toWarning(row: WarningRow): Warning {
  return {
    id: row.id,
    guildId: row.guild_id,
    userId: row.user_id,
    points: row.points,
    description: row.description,
    moderatorId: row.moderator_id,
    createdAt: row.created_at,
  };
}

// ===== Warnings =====

export function addWarning(warning: Warning): void {
  try {
    insertWarningStmt.run(
      warning.id,
      warning.guildId,
      warning.userId,
      warning.points,
      warning.description,
      warning.moderatorId,
      warning.createdAt
    );
  } catch (err) {
    logger.error({ err, guildId: warning.guildId, userId: warning.userId }, "[warningStore] addWarning failed");
    throw err;
  }
}

export function getWarning(guildId: string, userId: string, id: string): Warning | null {
  const row = getWarningStmt.get(guildId, userId, id);
  return row ? toWarning(row) : null;
}

export function deleteWarning(guildId: string, userId: string, id: string): boolean {
  try {
    return deleteWarningStmt.run(guildId, userId, id).changes > 0;
  } catch (err) {
    logger.error({ err, guildId, userId, id }, "[warningStore] deleteWarning failed");
    throw err;
  }
}

export function listWarnings(guildId: string, userId: string): Warning[] {
  return listWarningsStmt.all(guildId, userId).map(toWarning);
}

export function totalPoints(guildId: string, userId: string): number {
  return totalPointsStmt.get(guildId, userId)?.total ?? 0;
}

// ===== Reasons =====

export function upsertReason(guildId: string, reason: WarnReason): void {
  upsertReasonStmt.run(guildId, reason.name.toLowerCase(), reason.points, reason.description);
}

export function getReason(guildId: string, name: string): WarnReason | null {
  return getReasonStmt.get(guildId, name.toLowerCase()) ?? null;
}

export function deleteReason(guildId: string, name: string): boolean {
  return deleteReasonStmt.run(guildId, name.toLowerCase()).changes > 0;
}

export function listReasons(guildId: string): WarnReason[] {
  return listReasonsStmt.all(guildId);
}

// ===== Actions =====

/**
 * @returns false when an action with that name already exists
 */
export function addAction(guildId: string, action: WarnAction): boolean {
  if (getActionStmt.get(guildId, action.name)) return false;
  insertActionStmt.run(guildId, action.name, action.points, action.exceedAction, action.dropAction);
  return true;
}

export function deleteAction(guildId: string, name: string): boolean {
  return deleteActionStmt.run(guildId, name).changes > 0;
}

/**
 * Sorted by points, highest first. Rows with unrecognized actions are skipped.
 */
export function listActions(guildId: string): WarnAction[] {
  const actions: WarnAction[] = [];
  for (const row of listActionsStmt.all(guildId)) {
    if (!isExceedAction(row.exceed_action) || !isDropAction(row.drop_action)) {
      logger.warn({ guildId, name: row.name }, "[warningStore] Skipping action with unknown type");
      continue;
    }
    actions.push({
      name: row.name,
      points: row.points,
      exceedAction: row.exceed_action,
      dropAction: row.drop_action,
    });
  }
  return actions;
}

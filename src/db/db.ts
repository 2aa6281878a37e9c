/**
 * tidewatch — src/db/db.ts
 * WHAT: SQLite connection bootstrap and schema creation.
 * WHY: Centralizes better-sqlite3 setup, PRAGMAs and tables so stores can just import `db`.
 * FLOWS:
 *  - Open DB → set PRAGMAs → create tables/indexes → export db
 *  - closeDatabase() on shutdown (called from index.ts)
 * DOCS:
 *  - better-sqlite3 API: https://github.com/WiseLibs/better-sqlite3/blob/master/docs/api.md
 *  - SQLite PRAGMA: https://sqlite.org/pragma.html
 *
 * NOTE: better-sqlite3 is synchronous; keep statements small and quick.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import Database from "better-sqlite3";
import fs from "node:fs";
import path from "node:path";
import { env } from "../lib/env.js";
import { logger } from "../lib/logger.js";

const DB_BUSY_TIMEOUT_MS = 5000;

const dbPath = env.DB_PATH;
const inMemory = dbPath === ":memory:";
if (!inMemory) {
  fs.mkdirSync(path.dirname(dbPath), { recursive: true });
}

export const db = new Database(dbPath, { fileMustExist: false });
if (!inMemory) {
  db.pragma("journal_mode = WAL");
  db.pragma("synchronous = NORMAL");
}
db.pragma("foreign_keys = ON");
db.pragma(`busy_timeout = ${DB_BUSY_TIMEOUT_MS}`);
logger.info({ dbPath }, "[db] SQLite opened");

const schema: string[] = [
  // One row per guild; every column has the default a fresh guild gets
  `CREATE TABLE IF NOT EXISTS guild_settings (
    guild_id TEXT PRIMARY KEY,
    mute_role_id TEXT,
    mute_notification_channel_id TEXT,
    mute_default_time INTEGER NOT NULL DEFAULT 0,
    mute_dm INTEGER NOT NULL DEFAULT 0,
    mute_show_mod INTEGER NOT NULL DEFAULT 0,
    mute_sent_instructions INTEGER NOT NULL DEFAULT 0,
    warn_allow_custom_reasons INTEGER NOT NULL DEFAULT 0,
    warn_toggle_dm INTEGER NOT NULL DEFAULT 1,
    warn_show_mod INTEGER NOT NULL DEFAULT 0,
    warn_channel_id TEXT,
    warn_toggle_channel INTEGER NOT NULL DEFAULT 0,
    modlog_channel_id TEXT
  )`,

  `CREATE TABLE IF NOT EXISTS server_mute (
    guild_id TEXT NOT NULL,
    user_id TEXT NOT NULL,
    author_id TEXT,
    until INTEGER,
    PRIMARY KEY (guild_id, user_id)
  )`,

  `CREATE TABLE IF NOT EXISTS channel_mute (
    channel_id TEXT NOT NULL,
    guild_id TEXT NOT NULL,
    user_id TEXT NOT NULL,
    author_id TEXT,
    until INTEGER,
    PRIMARY KEY (channel_id, user_id)
  )`,
  `CREATE INDEX IF NOT EXISTS idx_channel_mute_guild ON channel_mute(guild_id)`,

  // Tri-state flags: 1 allow, 0 deny, NULL inherit
  `CREATE TABLE IF NOT EXISTS mute_perms_cache (
    guild_id TEXT NOT NULL,
    user_id TEXT NOT NULL,
    channel_id TEXT NOT NULL,
    send_messages INTEGER,
    add_reactions INTEGER,
    speak INTEGER,
    PRIMARY KEY (guild_id, user_id, channel_id)
  )`,

  `CREATE TABLE IF NOT EXISTS modlog_case (
    guild_id TEXT NOT NULL,
    case_number INTEGER NOT NULL,
    action_type TEXT NOT NULL,
    user_id TEXT NOT NULL,
    user_tag TEXT NOT NULL,
    moderator_id TEXT,
    reason TEXT,
    until INTEGER,
    channel_id TEXT,
    created_at INTEGER NOT NULL,
    modified_at INTEGER,
    amended_by_id TEXT,
    message_id TEXT,
    PRIMARY KEY (guild_id, case_number)
  )`,
  `CREATE INDEX IF NOT EXISTS idx_modlog_case_user ON modlog_case(guild_id, user_id)`,

  `CREATE TABLE IF NOT EXISTS modlog_casetype_disabled (
    guild_id TEXT NOT NULL,
    action_type TEXT NOT NULL,
    PRIMARY KEY (guild_id, action_type)
  )`,

  `CREATE TABLE IF NOT EXISTS warning (
    id TEXT PRIMARY KEY,
    guild_id TEXT NOT NULL,
    user_id TEXT NOT NULL,
    points INTEGER NOT NULL,
    description TEXT NOT NULL,
    moderator_id TEXT NOT NULL,
    created_at INTEGER NOT NULL
  )`,
  `CREATE INDEX IF NOT EXISTS idx_warning_user ON warning(guild_id, user_id)`,

  `CREATE TABLE IF NOT EXISTS warn_reason (
    guild_id TEXT NOT NULL,
    name TEXT NOT NULL,
    points INTEGER NOT NULL,
    description TEXT NOT NULL,
    PRIMARY KEY (guild_id, name)
  )`,

  `CREATE TABLE IF NOT EXISTS warn_action (
    guild_id TEXT NOT NULL,
    name TEXT NOT NULL,
    points INTEGER NOT NULL,
    exceed_action TEXT NOT NULL CHECK (exceed_action IN ('mute','kick','ban','none')),
    drop_action TEXT NOT NULL CHECK (drop_action IN ('unmute','none')),
    PRIMARY KEY (guild_id, name)
  )`,

  // One channel per (mode, player, guild)
  `CREATE TABLE IF NOT EXISTS osu_tracking (
    mode TEXT NOT NULL,
    osu_user_id INTEGER NOT NULL,
    guild_id TEXT NOT NULL,
    channel_id TEXT NOT NULL,
    PRIMARY KEY (mode, osu_user_id, guild_id)
  )`,

  `CREATE TABLE IF NOT EXISTS osu_snapshot (
    mode TEXT NOT NULL,
    osu_user_id INTEGER NOT NULL,
    scores_json TEXT NOT NULL,
    updated_at INTEGER NOT NULL,
    PRIMARY KEY (mode, osu_user_id)
  )`,

  // Polls and raffles are keyed by the message that carries their buttons
  `CREATE TABLE IF NOT EXISTS poll (
    message_id TEXT PRIMARY KEY,
    guild_id TEXT NOT NULL,
    channel_id TEXT NOT NULL,
    host_id TEXT NOT NULL,
    question TEXT NOT NULL,
    vote_type TEXT NOT NULL CHECK (vote_type IN ('single','multi')),
    role_ids TEXT NOT NULL DEFAULT '[]',
    end_time INTEGER NOT NULL,
    ended_at INTEGER
  )`,
  `CREATE INDEX IF NOT EXISTS idx_poll_guild ON poll(guild_id, ended_at)`,

  `CREATE TABLE IF NOT EXISTS poll_option (
    message_id TEXT NOT NULL REFERENCES poll(message_id) ON DELETE CASCADE,
    option_index INTEGER NOT NULL,
    label TEXT NOT NULL,
    PRIMARY KEY (message_id, option_index)
  )`,

  `CREATE TABLE IF NOT EXISTS poll_vote (
    message_id TEXT NOT NULL REFERENCES poll(message_id) ON DELETE CASCADE,
    option_index INTEGER NOT NULL,
    user_id TEXT NOT NULL,
    PRIMARY KEY (message_id, option_index, user_id)
  )`,

  `CREATE TABLE IF NOT EXISTS raffle (
    message_id TEXT PRIMARY KEY,
    guild_id TEXT NOT NULL,
    channel_id TEXT NOT NULL,
    host_id TEXT NOT NULL,
    title TEXT NOT NULL,
    description TEXT,
    winner_count INTEGER NOT NULL DEFAULT 1,
    days_on_server INTEGER NOT NULL DEFAULT 0,
    role_ids TEXT NOT NULL DEFAULT '[]',
    end_time INTEGER NOT NULL,
    ended_at INTEGER
  )`,
  `CREATE INDEX IF NOT EXISTS idx_raffle_guild ON raffle(guild_id, ended_at)`,

  `CREATE TABLE IF NOT EXISTS raffle_entry (
    message_id TEXT NOT NULL REFERENCES raffle(message_id) ON DELETE CASCADE,
    user_id TEXT NOT NULL,
    entered_at INTEGER NOT NULL,
    PRIMARY KEY (message_id, user_id)
  )`,

  `CREATE TABLE IF NOT EXISTS raffle_winner (
    message_id TEXT NOT NULL REFERENCES raffle(message_id) ON DELETE CASCADE,
    position INTEGER NOT NULL,
    user_id TEXT NOT NULL,
    PRIMARY KEY (message_id, position)
  )`,

  `CREATE TABLE IF NOT EXISTS raffle_settings (
    guild_id TEXT PRIMARY KEY,
    mention_role_id TEXT
  )`,
];

for (const sql of schema) {
  db.prepare(sql).run();
}

/**
 * Close the handle. Safe to call twice.
 */
export function closeDatabase(): void {
  if (!db.open) return;
  try {
    db.close();
    logger.info("[db] Database closed");
  } catch (err) {
    logger.error({ err }, "[db] Failed to close database");
  }
}

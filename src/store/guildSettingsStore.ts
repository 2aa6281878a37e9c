/**
 * tidewatch — src/store/guildSettingsStore.ts
 * WHAT: Per-guild settings for mutes, warnings and the modlog.
 * WHY: Listeners read these on every member/channel update; an LRU keeps that off SQLite.
 * FLOWS:
 *  - getGuildSettings(guildId) → cached or row → defaults for unknown guilds
 *  - updateGuildSettings(guildId, patch) → upsert → invalidate cache
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { db } from "../db/db.js";
import { logger } from "../lib/logger.js";
import { LRUCache } from "../lib/lruCache.js";

export interface GuildSettings {
  guildId: string;
  muteRoleId: string | null;
  muteNotificationChannelId: string | null;
  /** Seconds; 0 means mutes are indefinite unless a time is given */
  muteDefaultTime: number;
  muteDm: boolean;
  muteShowMod: boolean;
  muteSentInstructions: boolean;
  warnAllowCustomReasons: boolean;
  warnToggleDm: boolean;
  warnShowMod: boolean;
  warnChannelId: string | null;
  warnToggleChannel: boolean;
  modlogChannelId: string | null;
}

export type GuildSettingsPatch = Partial<Omit<GuildSettings, "guildId">>;
type SettingKey = keyof GuildSettingsPatch;

interface GuildSettingsRow {
  guild_id: string;
  mute_role_id: string | null;
  mute_notification_channel_id: string | null;
  mute_default_time: number;
  mute_dm: number;
  mute_show_mod: number;
  mute_sent_instructions: number;
  warn_allow_custom_reasons: number;
  warn_toggle_dm: number;
  warn_show_mod: number;
  warn_channel_id: string | null;
  warn_toggle_channel: number;
  modlog_channel_id: string | null;
}

const COLUMNS: Record<SettingKey, keyof GuildSettingsRow> = {
  muteRoleId: "mute_role_id",
  muteNotificationChannelId: "mute_notification_channel_id",
  muteDefaultTime: "mute_default_time",
  muteDm: "mute_dm",
  muteShowMod: "mute_show_mod",
  muteSentInstructions: "mute_sent_instructions",
  warnAllowCustomReasons: "warn_allow_custom_reasons",
  warnToggleDm: "warn_toggle_dm",
  warnShowMod: "warn_show_mod",
  warnChannelId: "warn_channel_id",
  warnToggleChannel: "warn_toggle_channel",
  modlogChannelId: "modlog_channel_id",
};

const SETTING_KEYS: readonly SettingKey[] = [
  "muteRoleId",
  "muteNotificationChannelId",
  "muteDefaultTime",
  "muteDm",
  "muteShowMod",
  "muteSentInstructions",
  "warnAllowCustomReasons",
  "warnToggleDm",
  "warnShowMod",
  "warnChannelId",
  "warnToggleChannel",
  "modlogChannelId",
];

const getStmt = db.prepare<[string], GuildSettingsRow>(
  `SELECT * FROM guild_settings WHERE guild_id = ?`
);
const ensureRowStmt = db.prepare<[string]>(
  `INSERT OR IGNORE INTO guild_settings (guild_id) VALUES (?)`
);

function prepareUpdate(column: string) {
  return db.prepare<[string | number | null, string]>(
    `UPDATE guild_settings SET ${column} = ? WHERE guild_id = ?`
  );
}
const updateStmts = new Map<SettingKey, ReturnType<typeof prepareUpdate>>();
for (const key of SETTING_KEYS) {
  updateStmts.set(key, prepareUpdate(COLUMNS[key]));
}

// 1000 guilds, 5 minute TTL
const cache = new LRUCache<string, GuildSettings>(1000, 5 * 60 * 1000);

function defaults(guildId: string): GuildSettings {
  return {
    guildId,
    muteRoleId: null,
    muteNotificationChannelId: null,
    muteDefaultTime: 0,
    muteDm: false,
    muteShowMod: false,
    muteSentInstructions: false,
    warnAllowCustomReasons: false,
    warnToggleDm: true,
    warnShowMod: false,
    warnChannelId: null,
    warnToggleChannel: false,
    modlogChannelId: null,
  };
}

function fromRow(row: GuildSettingsRow): GuildSettings {
  return {
    guildId: row.guild_id,
    muteRoleId: row.mute_role_id,
    muteNotificationChannelId: row.mute_notification_channel_id,
    muteDefaultTime: row.mute_default_time,
    muteDm: row.mute_dm === 1,
    muteShowMod: row.mute_show_mod === 1,
    muteSentInstructions: row.mute_sent_instructions === 1,
    warnAllowCustomReasons: row.warn_allow_custom_reasons === 1,
    warnToggleDm: row.warn_toggle_dm === 1,
    warnShowMod: row.warn_show_mod === 1,
    warnChannelId: row.warn_channel_id,
    warnToggleChannel: row.warn_toggle_channel === 1,
    modlogChannelId: row.modlog_channel_id,
  };
}

export function getGuildSettings(guildId: string): GuildSettings {
  const cached = cache.get(guildId);
  if (cached) return cached;

  try {
    const row = getStmt.get(guildId);
    const settings = row ? fromRow(row) : defaults(guildId);
    cache.set(guildId, settings);
    return settings;
  } catch (err) {
    logger.error({ err, guildId }, "[guildSettingsStore] Failed to read settings");
    throw err;
  }
}

function toSql(value: string | number | boolean | null): string | number | null {
  if (typeof value === "boolean") return value ? 1 : 0;
  return value;
}

const applyPatch = db.transaction((guildId: string, patch: GuildSettingsPatch) => {
  ensureRowStmt.run(guildId);
  for (const key of SETTING_KEYS) {
    const value = patch[key];
    if (value === undefined) continue;
    updateStmts.get(key)?.run(toSql(value), guildId);
  }
});

/**
 * Write only the keys present in patch. Returns the fresh settings.
 */
export function updateGuildSettings(guildId: string, patch: GuildSettingsPatch): GuildSettings {
  try {
    applyPatch(guildId, patch);
    logger.debug({ guildId, keys: Object.keys(patch) }, "[guildSettingsStore] Settings updated");
  } catch (err) {
    logger.error({ err, guildId }, "[guildSettingsStore] Failed to update settings");
    throw err;
  } finally {
    cache.delete(guildId);
  }
  return getGuildSettings(guildId);
}

/** Test hook */
export function clearGuildSettingsCache(): void {
  cache.clear();
}

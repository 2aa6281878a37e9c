/**
 * tidewatch — src/features/mutes/manager.ts
 * WHAT: Applies and lifts mutes: mute role when one is configured, member overwrites otherwise.
 * WHY: Commands, the unmute scheduler, warning thresholds and rejoin handling all need the
 *      same checks and the same persistence order.
 * FLOWS:
 *  - muteUser → admin/hierarchy checks → role path | every channel via channelMuteUser
 *  - unmuteUser → hierarchy → role path | every tracked channel via channelUnmuteUser
 *  - channel*: checks → record → overwrite edit → Discord error mapping → voice move
 * DOCS:
 *  - PermissionOverwriteManager: https://discord.js.org/#/docs/discord.js/main/class/PermissionOverwriteManager
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import {
  PermissionFlagsBits,
  PermissionsBitField,
  type Guild,
  type GuildMember,
  type NonThreadGuildBasedChannel,
} from "discord.js";
import { logger } from "../../lib/logger.js";
import { discordErrorCode } from "../../lib/errors.js";
import { isOwner } from "../../lib/owner.js";
import { hasOverwrites } from "../../lib/typeGuards.js";
import { getGuildSettings } from "../../store/guildSettingsStore.js";
import {
  clearPermsCache,
  deleteChannelMute,
  deletePermsCacheEntry,
  deleteServerMute,
  getChannelMute,
  getPermsCacheEntry,
  listGuildChannelMutes,
  replacePermsCache,
  upsertChannelMute,
  upsertServerMute,
  type OldOverwrites,
  type OverwriteState,
} from "../../store/muteStore.js";
import type { ChannelMuteResult, MuteIssue, MuteResult } from "./issues.js";

const MUTED_FLAGS = {
  sendMessages: PermissionFlagsBits.SendMessages,
  addReactions: PermissionFlagsBits.AddReactions,
  speak: PermissionFlagsBits.Speak,
} as const;

const NO_OVERWRITES: OldOverwrites = { sendMessages: null, addReactions: null, speak: null };

/**
 * Guild owner and bot owners always pass; otherwise the moderator's top role
 * must sit strictly above the target's.
 */
export function isAllowedByHierarchy(guild: Guild, mod: GuildMember, user: GuildMember): boolean {
  if (mod.id === guild.ownerId || isOwner(mod.id)) return true;
  return mod.roles.highest.position > user.roles.highest.position;
}

function readOverwrites(channel: NonThreadGuildBasedChannel, userId: string): OldOverwrites {
  const overwrite = channel.permissionOverwrites.cache.get(userId);
  const state = (flag: bigint): OverwriteState => {
    if (!overwrite) return null;
    if (overwrite.allow.has(flag)) return true;
    if (overwrite.deny.has(flag)) return false;
    return null;
  };
  return {
    sendMessages: state(MUTED_FLAGS.sendMessages),
    addReactions: state(MUTED_FLAGS.addReactions),
    speak: state(MUTED_FLAGS.speak),
  };
}

function overwriteIssue(err: unknown): MuteIssue | null {
  switch (discordErrorCode(err)) {
    case 10003:
      return "unknown_channel";
    case 10007:
    case 10009:
      return "left_guild";
    case 50001:
    case 50013:
      return "permissions_issue_channel";
    default:
      return null;
  }
}

/**
 * Unrecognised Discord errors are logged (and reported) and surface as unknown_error,
 * so one bad channel never aborts a multi-channel mute.
 */
function mapOverwriteError(
  err: unknown,
  guild: Guild,
  channel: NonThreadGuildBasedChannel,
  member: GuildMember
): MuteIssue {
  const issue = overwriteIssue(err);
  if (issue) return issue;
  logger.error(
    { err, guildId: guild.id, channelId: channel.id, userId: member.id },
    "[mutes] Overwrite edit failed"
  );
  return "unknown_error";
}

/**
 * Runs one channel (un)mute; a rejection becomes an unknown_error result for that channel
 * so callers looping over channels or members keep going.
 */
export async function settleChannel(
  channel: NonThreadGuildBasedChannel,
  member: GuildMember,
  run: () => Promise<ChannelMuteResult>
): Promise<ChannelMuteResult> {
  try {
    return await run();
  } catch (err) {
    logger.error(
      { err, guildId: channel.guildId, channelId: channel.id, userId: member.id },
      "[mutes] Channel (un)mute failed"
    );
    return { success: false, channel, reason: "unknown_error", oldOverwrites: null };
  }
}

function botCanManageChannel(guild: Guild, channel: NonThreadGuildBasedChannel): boolean {
  const me = guild.members.me;
  return Boolean(me && channel.permissionsFor(me).has(PermissionFlagsBits.ManageRoles));
}

/**
 * Re-join a connected member to the voice channel so a changed overwrite applies now.
 * Returns the note to surface when that isn't possible.
 */
async function refreshVoiceState(
  guild: Guild,
  channel: NonThreadGuildBasedChannel,
  member: GuildMember
): Promise<MuteIssue | null> {
  if (!channel.isVoiceBased() || member.voice.channelId !== channel.id) return null;

  const me = guild.members.me;
  if (!me || !channel.permissionsFor(me).has(PermissionFlagsBits.MoveMembers)) {
    return "voice_mute_permission";
  }
  try {
    await member.voice.setChannel(channel);
    return null;
  } catch (err) {
    logger.debug({ err, guildId: guild.id, channelId: channel.id, userId: member.id }, "[mutes] Voice move failed");
    return "voice_mute_permission";
  }
}

export async function channelMuteUser(
  guild: Guild,
  channel: NonThreadGuildBasedChannel,
  author: GuildMember,
  member: GuildMember,
  until: number | null,
  reason: string | null
): Promise<ChannelMuteResult> {
  const fail = (issue: MuteIssue): ChannelMuteResult => ({
    success: false,
    channel,
    reason: issue,
    oldOverwrites: null,
  });

  if (channel.permissionsFor(member).has(PermissionFlagsBits.Administrator)) return fail("is_admin");
  if (!isAllowedByHierarchy(guild, author, member)) return fail("hierarchy_problem");
  if (getChannelMute(channel.id, member.id)) return fail("already_muted");
  if (!botCanManageChannel(guild, channel)) return fail("permissions_issue_channel");

  const oldOverwrites = readOverwrites(channel, member.id);
  upsertChannelMute({ channelId: channel.id, guildId: guild.id, userId: member.id, authorId: author.id, until });

  try {
    await channel.permissionOverwrites.edit(
      member,
      { SendMessages: false, AddReactions: false, Speak: false },
      { reason: reason ?? undefined }
    );
  } catch (err) {
    deleteChannelMute(channel.id, member.id);
    return fail(mapOverwriteError(err, guild, channel, member));
  }

  const note = await refreshVoiceState(guild, channel, member);
  logger.debug({ guildId: guild.id, channelId: channel.id, userId: member.id }, "[mutes] Channel mute applied");
  return { success: true, channel, reason: note, oldOverwrites };
}

export async function channelUnmuteUser(
  guild: Guild,
  channel: NonThreadGuildBasedChannel,
  author: GuildMember,
  member: GuildMember,
  reason: string | null
): Promise<ChannelMuteResult> {
  const fail = (issue: MuteIssue): ChannelMuteResult => ({
    success: false,
    channel,
    reason: issue,
    oldOverwrites: null,
  });

  const oldOverwrites = getPermsCacheEntry(guild.id, member.id, channel.id) ?? NO_OVERWRITES;

  if (!isAllowedByHierarchy(guild, author, member)) return fail("hierarchy_problem");
  if (!deleteChannelMute(channel.id, member.id)) return fail("already_unmuted");
  if (!botCanManageChannel(guild, channel)) return fail("permissions_issue_channel");

  const current = channel.permissionOverwrites.cache.get(member.id);
  const allow = new PermissionsBitField(current?.allow ?? 0n);
  const deny = new PermissionsBitField(current?.deny ?? 0n);
  const restored: Array<[bigint, OverwriteState]> = [
    [MUTED_FLAGS.sendMessages, oldOverwrites.sendMessages],
    [MUTED_FLAGS.addReactions, oldOverwrites.addReactions],
    [MUTED_FLAGS.speak, oldOverwrites.speak],
  ];
  for (const [flag, state] of restored) {
    allow.remove(flag);
    deny.remove(flag);
    if (state === true) allow.add(flag);
    if (state === false) deny.add(flag);
  }

  try {
    if (allow.bitfield === 0n && deny.bitfield === 0n) {
      await channel.permissionOverwrites.delete(member, reason ?? undefined);
    } else {
      await channel.permissionOverwrites.edit(
        member,
        {
          SendMessages: oldOverwrites.sendMessages,
          AddReactions: oldOverwrites.addReactions,
          Speak: oldOverwrites.speak,
        },
        { reason: reason ?? undefined }
      );
    }
  } catch (err) {
    return fail(mapOverwriteError(err, guild, channel, member));
  }

  deletePermsCacheEntry(guild.id, member.id, channel.id);
  const note = await refreshVoiceState(guild, channel, member);
  logger.debug({ guildId: guild.id, channelId: channel.id, userId: member.id }, "[mutes] Channel mute lifted");
  return { success: true, channel, reason: note, oldOverwrites };
}

export async function muteUser(
  guild: Guild,
  author: GuildMember,
  member: GuildMember,
  until: number | null,
  reason: string | null
): Promise<MuteResult> {
  const result: MuteResult = { success: false, reason: null, channels: [], member };
  const fail = (issue: MuteIssue): MuteResult => ({ ...result, reason: issue });

  if (member.permissions.has(PermissionFlagsBits.Administrator)) return fail("is_admin");
  if (!isAllowedByHierarchy(guild, author, member)) return fail("hierarchy_problem");

  const { muteRoleId } = getGuildSettings(guild.id);
  if (muteRoleId) {
    const role = guild.roles.cache.get(muteRoleId);
    if (!role) return fail("role_missing");

    const authorIsOwner = author.id === guild.ownerId;
    if (!authorIsOwner && role.position >= author.roles.highest.position) {
      return fail("assigned_role_hierarchy_problem");
    }
    const me = guild.members.me;
    if (
      !me ||
      !me.permissions.has(PermissionFlagsBits.ManageRoles) ||
      role.position >= me.roles.highest.position
    ) {
      return fail("permissions_issue_role");
    }

    // Recorded first so the member-update listener sees the role change as ours
    upsertServerMute({ guildId: guild.id, userId: member.id, authorId: author.id, until });
    try {
      await member.roles.add(role, reason ?? undefined);
    } catch (err) {
      deleteServerMute(guild.id, member.id);
      if (discordErrorCode(err) === 50013) return fail("permissions_issue_role");
      throw err;
    }

    logger.info({ guildId: guild.id, userId: member.id, until }, "[mutes] Server mute applied (role)");
    return { ...result, success: true };
  }

  const channels = [...guild.channels.cache.filter(hasOverwrites).values()];
  const outcomes = await Promise.all(
    channels.map((channel) =>
      settleChannel(channel, member, () => channelMuteUser(guild, channel, author, member, until, reason))
    )
  );

  const oldValues = new Map<string, OldOverwrites>();
  for (const outcome of outcomes) {
    if (outcome.success) {
      result.success = true;
      if (outcome.oldOverwrites) oldValues.set(outcome.channel.id, outcome.oldOverwrites);
    }
    if (outcome.reason) result.channels.push([outcome.channel, outcome.reason]);
  }
  replacePermsCache(guild.id, member.id, oldValues);

  logger.info(
    { guildId: guild.id, userId: member.id, muted: oldValues.size, issues: result.channels.length },
    "[mutes] Server mute applied (overwrites)"
  );
  return result;
}

export async function unmuteUser(
  guild: Guild,
  author: GuildMember,
  member: GuildMember,
  reason: string | null
): Promise<MuteResult> {
  const result: MuteResult = { success: false, reason: null, channels: [], member };
  const fail = (issue: MuteIssue): MuteResult => ({ ...result, reason: issue });

  if (!isAllowedByHierarchy(guild, author, member)) return fail("hierarchy_problem");

  const { muteRoleId } = getGuildSettings(guild.id);
  if (muteRoleId) {
    const role = guild.roles.cache.get(muteRoleId);
    if (!role) return fail("role_missing");

    // Dropped first so the member-update listener doesn't log a manual removal
    deleteServerMute(guild.id, member.id);

    const me = guild.members.me;
    if (
      !me ||
      !me.permissions.has(PermissionFlagsBits.ManageRoles) ||
      role.position >= me.roles.highest.position
    ) {
      return fail("permissions_issue_role");
    }
    try {
      await member.roles.remove(role, reason ?? undefined);
    } catch (err) {
      if (discordErrorCode(err) === 50013) return fail("permissions_issue_role");
      throw err;
    }

    logger.info({ guildId: guild.id, userId: member.id }, "[mutes] Server mute lifted (role)");
    return { ...result, success: true };
  }

  const tracked = listGuildChannelMutes(guild.id).filter((mute) => mute.userId === member.id);
  if (tracked.length === 0) return fail("already_unmuted");

  const channels: NonThreadGuildBasedChannel[] = [];
  for (const mute of tracked) {
    const channel = guild.channels.cache.get(mute.channelId);
    if (channel && hasOverwrites(channel)) {
      channels.push(channel);
    } else {
      // Channel deleted while the member was muted in it
      deleteChannelMute(mute.channelId, member.id);
    }
  }

  const outcomes = await Promise.all(
    channels.map((channel) =>
      settleChannel(channel, member, () => channelUnmuteUser(guild, channel, author, member, reason))
    )
  );
  result.success = channels.length === 0;
  for (const outcome of outcomes) {
    if (outcome.success) result.success = true;
    if (outcome.reason) result.channels.push([outcome.channel, outcome.reason]);
  }
  clearPermsCache(guild.id, member.id);

  logger.info(
    { guildId: guild.id, userId: member.id, channels: channels.length, issues: result.channels.length },
    "[mutes] Server mute lifted (overwrites)"
  );
  return result;
}

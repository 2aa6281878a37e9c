/**
 * tidewatch — src/features/mutes/listeners.ts
 * WHAT: Keeps stored mutes in step with changes made outside the bot.
 * WHY: Moderators add/remove the mute role or edit overwrites by hand; those changes
 *      still need a case and must not leave stale rows for the scheduler.
 * FLOWS:
 *  - guildMemberUpdate → mute role removed (tracked) | added (untracked)
 *  - channelUpdate → wait for gate → tracked member lost their deny overwrite
 *  - guildMemberAdd → re-apply a stored role mute
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import {
  PermissionFlagsBits,
  type DMChannel,
  type GuildMember,
  type NonThreadGuildBasedChannel,
  type PartialGuildMember,
} from "discord.js";
import { logger } from "../../lib/logger.js";
import { getGuildSettings } from "../../store/guildSettingsStore.js";
import {
  deleteChannelMute,
  deletePermsCacheEntry,
  deleteServerMute,
  getServerMute,
  listChannelMutes,
  upsertServerMute,
} from "../../store/muteStore.js";
import { createCase } from "../modlog/createCase.js";
import { waitForGate } from "./gate.js";
import { muteUser } from "./manager.js";
import { sendMuteDm } from "./notify.js";

export async function handleMemberUpdate(
  oldMember: GuildMember | PartialGuildMember,
  newMember: GuildMember
): Promise<void> {
  const guild = newMember.guild;
  const { muteRoleId } = getGuildSettings(guild.id);
  if (!muteRoleId || !guild.roles.cache.has(muteRoleId)) return;

  // A partial old member carries no roles; assume the change happened now
  const hadRole = oldMember.partial ? null : oldMember.roles.cache.has(muteRoleId);
  const hasRole = newMember.roles.cache.has(muteRoleId);
  const tracked = getServerMute(guild.id, newMember.id);

  if (!hasRole && hadRole !== false && tracked) {
    deleteServerMute(guild.id, newMember.id);
    await createCase(guild, {
      action: "sunmute",
      user: newMember.user,
      moderator: null,
      reason: "Manually removed mute role",
    });
    await sendMuteDm(guild, newMember.user, {
      type: "Server unmute",
      moderator: null,
      reason: "Manually removed mute role",
    });
    logger.info({ guildId: guild.id, userId: newMember.id }, "[mutes] Mute role removed manually");
    return;
  }

  if (hasRole && hadRole !== true && !tracked) {
    upsertServerMute({ guildId: guild.id, userId: newMember.id, authorId: null, until: null });
    await createCase(guild, {
      action: "smute",
      user: newMember.user,
      moderator: null,
      reason: "Manually applied mute role",
    });
    await sendMuteDm(guild, newMember.user, {
      type: "Server mute",
      moderator: null,
      reason: "Manually applied mute role",
    });
    logger.info({ guildId: guild.id, userId: newMember.id }, "[mutes] Mute role applied manually");
  }
}

/**
 * True when a deny-all mute overwrite that existed before is gone or no longer denies.
 */
export function overwriteWasLifted(
  before: NonThreadGuildBasedChannel,
  after: NonThreadGuildBasedChannel,
  userId: string
): boolean {
  if (!before.permissionOverwrites.cache.has(userId)) return false;
  const current = after.permissionOverwrites.cache.get(userId);
  if (!current) return true;
  return (
    !current.deny.has(PermissionFlagsBits.SendMessages) || !current.deny.has(PermissionFlagsBits.Speak)
  );
}

export async function handleChannelUpdate(
  oldChannel: DMChannel | NonThreadGuildBasedChannel,
  newChannel: DMChannel | NonThreadGuildBasedChannel
): Promise<void> {
  if (oldChannel.isDMBased() || newChannel.isDMBased()) return;
  const guild = newChannel.guild;

  await waitForGate(guild.id);

  const mutes = listChannelMutes(newChannel.id);
  if (mutes.length === 0) return;

  const isVoice = newChannel.isVoiceBased();
  for (const mute of mutes) {
    if (!overwriteWasLifted(oldChannel, newChannel, mute.userId)) continue;

    deleteChannelMute(newChannel.id, mute.userId);
    deletePermsCacheEntry(guild.id, mute.userId, newChannel.id);

    const member = guild.members.cache.get(mute.userId) ?? null;
    const user = member?.user ?? (await guild.client.users.fetch(mute.userId));
    if (member) {
      await sendMuteDm(guild, member.user, {
        type: isVoice ? "Voice unmute" : "Channel unmute",
        moderator: null,
        reason: "Manually removed channel overwrites",
      });
    }
    await createCase(guild, {
      action: isVoice ? "vunmute" : "cunmute",
      user,
      moderator: null,
      reason: "Manually removed channel overwrites",
      channelId: newChannel.id,
    });
    logger.info(
      { guildId: guild.id, channelId: newChannel.id, userId: mute.userId },
      "[mutes] Channel overwrite removed manually"
    );
  }
}

export async function handleMemberAdd(member: GuildMember): Promise<void> {
  const guild = member.guild;
  const { muteRoleId } = getGuildSettings(guild.id);
  // Overwrite mutes are not re-applied on join; a rejoin loop would rate limit the bot
  if (!muteRoleId || !guild.roles.cache.has(muteRoleId)) return;

  const stored = getServerMute(guild.id, member.id);
  if (!stored) return;

  const me = guild.members.me;
  if (!me) return;

  const result = await muteUser(guild, me, member, stored.until, "Previously muted in this server.");
  logger.info(
    { guildId: guild.id, userId: member.id, success: result.success, reason: result.reason },
    "[mutes] Re-applied mute on rejoin"
  );
}


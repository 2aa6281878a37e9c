/**
 * tidewatch — src/features/warnings/actions.ts
 * WHAT: Carries out the moderation action a warn threshold names.
 * WHY: Actions are typed (mute/kick/ban, unmute) so they can run without a prefix-command context.
 * FLOWS:
 *  - /warn → exceededAction → applyExceedAction → muteUser | kick | ban → case
 *  - /unwarn → droppedAction → applyDropAction → unmuteUser → case
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { Guild, GuildMember } from "discord.js";
import { logger } from "../../lib/logger.js";
import { discordErrorCode } from "../../lib/errors.js";
import type { WarnAction } from "../../store/warningStore.js";
import { createCase } from "../modlog/createCase.js";
import { issueMessage, parseIssues } from "../mutes/issues.js";
import { muteUser, unmuteUser } from "../mutes/manager.js";

export const THRESHOLD_REASON = "Warning points threshold reached";
export const DROP_REASON = "Warning points dropped below threshold";

/**
 * Outcome surfaced to the moderator; null when nothing needs saying.
 */
export type ActionNote = string | null;

function permissionNote(verb: string, member: GuildMember): string {
  return `I couldn't ${verb} ${member.user.tag}: I lack the permission or they are above me.`;
}

export async function applyExceedAction(
  guild: Guild,
  moderator: GuildMember,
  member: GuildMember,
  action: WarnAction
): Promise<ActionNote> {
  logger.info(
    { guildId: guild.id, userId: member.id, action: action.name, exceed: action.exceedAction },
    "[warnings] Threshold reached"
  );

  switch (action.exceedAction) {
    case "none":
      return null;

    case "mute": {
      const result = await muteUser(guild, moderator, member, null, THRESHOLD_REASON);
      if (!result.success) {
        return result.reason ? issueMessage(result.reason) : parseIssues(result);
      }
      await createCase(guild, { action: "smute", user: member.user, moderator: moderator.user, reason: THRESHOLD_REASON });
      return null;
    }

    case "kick":
      if (!member.kickable) return permissionNote("kick", member);
      try {
        await member.kick(THRESHOLD_REASON);
      } catch (err) {
        if (discordErrorCode(err) === 50013) return permissionNote("kick", member);
        throw err;
      }
      await createCase(guild, { action: "kick", user: member.user, moderator: moderator.user, reason: THRESHOLD_REASON });
      return null;

    case "ban":
      if (!member.bannable) return permissionNote("ban", member);
      try {
        await guild.members.ban(member, { reason: THRESHOLD_REASON });
      } catch (err) {
        if (discordErrorCode(err) === 50013) return permissionNote("ban", member);
        throw err;
      }
      await createCase(guild, { action: "ban", user: member.user, moderator: moderator.user, reason: THRESHOLD_REASON });
      return null;
  }
}

export async function applyDropAction(
  guild: Guild,
  moderator: GuildMember,
  member: GuildMember,
  action: WarnAction
): Promise<ActionNote> {
  if (action.dropAction === "none") return null;

  logger.info({ guildId: guild.id, userId: member.id, action: action.name }, "[warnings] Threshold dropped");
  const result = await unmuteUser(guild, moderator, member, DROP_REASON);
  if (!result.success) {
    return result.reason ? issueMessage(result.reason) : parseIssues(result);
  }
  await createCase(guild, { action: "sunmute", user: member.user, moderator: moderator.user, reason: DROP_REASON });
  return null;
}

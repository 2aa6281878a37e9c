/**
 * tidewatch — src/features/mutes/muteRole.ts
 * WHAT: Pre-flight check run by /mute before muting without a mute role.
 * WHY: Overwrite mutes cost one API call per channel and do not survive a rejoin,
 *      so the first overwrite mute in a guild needs an explicit go-ahead.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { ChatInputCommandInteraction, Guild } from "discord.js";
import { env } from "../../lib/env.js";
import { replyOrEdit } from "../../lib/cmdWrap.js";
import { confirm } from "../../ui/confirm.js";
import { getGuildSettings, updateGuildSettings } from "../../store/guildSettingsStore.js";

const SETUP_HINT =
  "This server does not have a mute role setup. You can setup a mute role with `/muteset role` or " +
  "`/muteset makerole` if you just want a basic role created setup.\n\n";

const OVERWRITE_WARNING =
  "Channel overwrites for muting users can get expensive on Discord's API as such we recommend that " +
  "you have an admin setup a mute role instead. Channel overwrites will also not re-apply on guild join, " +
  "so a user who has been muted may leave and re-join and no longer be muted. Role mutes do not have this issue.\n\n" +
  "Are you sure you want to continue with channel overwrites? Pressing Yes will continue the mute with " +
  "overwrites and stop this message from appearing again, pressing No will end the mute attempt.";

/**
 * @returns true when the mute may go ahead
 */
export async function checkForMuteRole(
  interaction: ChatInputCommandInteraction,
  guild: Guild,
  forceRoleMutes: boolean = env.FORCE_ROLE_MUTES
): Promise<boolean> {
  const settings = getGuildSettings(guild.id);
  const role = settings.muteRoleId ? guild.roles.cache.get(settings.muteRoleId) : undefined;

  if (forceRoleMutes && !role) {
    await replyOrEdit(interaction, { content: SETUP_HINT.trim() });
    return false;
  }
  if (role || settings.muteSentInstructions) return true;

  const accepted = await confirm(interaction, SETUP_HINT + OVERWRITE_WARNING);
  if (!accepted) {
    await replyOrEdit(interaction, { content: "Okay I will not mute this user." });
    return false;
  }
  updateGuildSettings(guild.id, { muteSentInstructions: true });
  return true;
}

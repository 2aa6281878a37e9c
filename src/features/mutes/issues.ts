/**
 * tidewatch — src/features/mutes/issues.ts
 * WHAT: Mute/unmute failure catalogue and the report built from it.
 * WHY: Server mutes touch every channel; moderators need to see which channel failed and why.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { GuildMember, NonThreadGuildBasedChannel } from "discord.js";
import { humanizeList } from "../../lib/text.js";
import type { OldOverwrites } from "../../store/muteStore.js";

export const ISSUE_MESSAGES = {
  already_muted: "That user is already muted in this channel.",
  already_unmuted: "That user is not muted in this channel.",
  hierarchy_problem:
    "I cannot let you do that. You are not higher than the user in the role hierarchy.",
  assigned_role_hierarchy_problem:
    "I cannot let you do that. You are not higher than the mute role in the role hierarchy.",
  is_admin: "That user cannot be (un)muted, as they have the Administrator permission.",
  permissions_issue_role:
    "Failed to mute or unmute user. I need the Manage Roles permission and the user I'm muting must be lower than myself in the role hierarchy.",
  permissions_issue_channel: "Failed to mute or unmute user. I need the Manage Permissions permission.",
  left_guild: "The user has left the server while applying an overwrite.",
  unknown_channel: "The channel I tried to mute or unmute the user in isn't found.",
  role_missing: "The mute role no longer exists.",
  unknown_error: "Discord rejected the overwrite for an unexpected reason.",
  voice_mute_permission:
    "Because I don't have the Move Members permission, this will take into effect when the user rejoins.",
} as const;

export type MuteIssue = keyof typeof ISSUE_MESSAGES;

export function issueMessage(issue: MuteIssue): string {
  return ISSUE_MESSAGES[issue];
}

/**
 * Outcome of a mute/unmute in one channel. `reason` may be set on success
 * (voice_mute_permission is a note, not a failure).
 */
export interface ChannelMuteResult {
  success: boolean;
  channel: NonThreadGuildBasedChannel;
  reason: MuteIssue | null;
  oldOverwrites: OldOverwrites | null;
}

/**
 * Outcome of a server-wide mute/unmute for one member.
 */
export interface MuteResult {
  success: boolean;
  reason: MuteIssue | null;
  channels: Array<[NonThreadGuildBasedChannel, MuteIssue]>;
  member: GuildMember;
}

export function hasIssues(result: MuteResult): boolean {
  return result.reason !== null || result.channels.length > 0;
}

/**
 * "<member> could not be (un)muted for the following reasons:" followed by the
 * top-level reason, or one line per reason listing the affected channels.
 */
export function parseIssues(result: MuteResult): string {
  let message = `${result.member.user.tag} could not be (un)muted for the following reasons:\n`;

  if (result.reason) {
    return `${message}${issueMessage(result.reason)}\n`;
  }

  const grouped = new Map<MuteIssue, string[]>();
  for (const [channel, issue] of result.channels) {
    const mentions = grouped.get(issue) ?? [];
    mentions.push(`<#${channel.id}>`);
    grouped.set(issue, mentions);
  }
  for (const [issue, mentions] of grouped) {
    message += `- ${issueMessage(issue)} In the following channels: ${humanizeList(mentions)}\n`;
  }
  return message;
}

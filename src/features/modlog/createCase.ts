/**
 * tidewatch — src/features/modlog/createCase.ts
 * WHAT: Records a moderation action as a numbered case and posts it to the modlog channel.
 * WHY: Every mute, warning, kick and ban flows through here so numbering and posting stay uniform.
 * FLOWS:
 *  - createCase → type disabled? null → insertCase → post embed → save message id
 *  - refreshCaseMessage → edit the posted embed after /reason
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { Guild, GuildTextBasedChannel, User } from "discord.js";
import { logger } from "../../lib/logger.js";
import { nowUtc } from "../../lib/time.js";
import { SAFE_ALLOWED_MENTIONS } from "../../lib/constants.js";
import { getGuildSettings } from "../../store/guildSettingsStore.js";
import {
  getCase,
  insertCase,
  isCaseTypeEnabled,
  setCaseMessageId,
  type ModCase,
} from "../../store/caseStore.js";
import type { CaseAction } from "./caseTypes.js";
import { caseEmbed } from "./embed.js";

export interface CreateCaseInput {
  action: CaseAction;
  user: User;
  moderator: User | null;
  reason?: string | null;
  until?: number | null;
  channelId?: string | null;
  createdAt?: number;
}

async function modlogChannel(guild: Guild): Promise<GuildTextBasedChannel | null> {
  const channelId = getGuildSettings(guild.id).modlogChannelId;
  if (!channelId) return null;
  const channel = await guild.channels.fetch(channelId).catch((err: unknown) => {
    logger.warn({ err, guildId: guild.id, channelId }, "[modlog] Modlog channel fetch failed");
    return null;
  });
  if (!channel || !channel.isTextBased()) return null;
  return channel;
}

/**
 * Store a case and post it. Returns null when the case type is disabled in the guild.
 * Posting failures are logged; the stored case is still returned.
 */
export async function createCase(guild: Guild, input: CreateCaseInput): Promise<ModCase | null> {
  if (!isCaseTypeEnabled(guild.id, input.action)) {
    logger.debug({ guildId: guild.id, action: input.action }, "[modlog] Case type disabled, skipping");
    return null;
  }

  const modCase = insertCase({
    guildId: guild.id,
    action: input.action,
    userId: input.user.id,
    userTag: input.user.tag,
    moderatorId: input.moderator?.id ?? null,
    reason: input.reason ?? null,
    until: input.until ?? null,
    channelId: input.channelId ?? null,
    createdAt: input.createdAt ?? nowUtc(),
  });
  logger.info(
    { guildId: guild.id, caseNumber: modCase.caseNumber, action: modCase.action, userId: modCase.userId },
    "[modlog] Case created"
  );

  try {
    const channel = await modlogChannel(guild);
    if (channel) {
      const message = await channel.send({
        embeds: [caseEmbed(modCase)],
        allowedMentions: SAFE_ALLOWED_MENTIONS,
      });
      setCaseMessageId(guild.id, modCase.caseNumber, message.id);
      return { ...modCase, messageId: message.id };
    }
  } catch (err) {
    logger.warn({ err, guildId: guild.id, caseNumber: modCase.caseNumber }, "[modlog] Failed to post case");
  }
  return modCase;
}

/**
 * Re-render the posted message for a case, if one was posted and still exists.
 */
export async function refreshCaseMessage(guild: Guild, caseNumber: number): Promise<boolean> {
  const modCase = getCase(guild.id, caseNumber);
  if (!modCase?.messageId) return false;
  try {
    const channel = await modlogChannel(guild);
    if (!channel) return false;
    const message = await channel.messages.fetch(modCase.messageId);
    await message.edit({ embeds: [caseEmbed(modCase)], allowedMentions: SAFE_ALLOWED_MENTIONS });
    return true;
  } catch (err) {
    logger.warn({ err, guildId: guild.id, caseNumber }, "[modlog] Failed to edit case message");
    return false;
  }
}

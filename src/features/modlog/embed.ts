/**
 * tidewatch — src/features/modlog/embed.ts
 * WHAT: Renders a modlog case as an embed.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { EmbedBuilder } from "discord.js";
import { EMBED_COLOR_MODLOG } from "../../lib/constants.js";
import { formatUtc } from "../../lib/time.js";
import { truncate } from "../../lib/text.js";
import type { ModCase } from "../../store/caseStore.js";
import { caseDisplayName } from "./caseTypes.js";

export function caseEmbed(modCase: ModCase): EmbedBuilder {
  const reason = modCase.reason
    ? `**Reason:** ${modCase.reason}`
    : `**Reason:** Use \`/reason ${modCase.caseNumber} <reason>\` to add it`;

  const embed = new EmbedBuilder()
    .setColor(EMBED_COLOR_MODLOG)
    .setTitle(`Case #${modCase.caseNumber} | ${caseDisplayName(modCase.action)}`)
    .setDescription(truncate(reason, 4096))
    .setAuthor({ name: `${modCase.userTag} (${modCase.userId})` })
    .setTimestamp(modCase.createdAt * 1000)
    .addFields({
      name: "Moderator",
      value: modCase.moderatorId ? `<@${modCase.moderatorId}>` : "Unknown",
      inline: true,
    });

  if (modCase.until !== null) {
    embed.addFields({ name: "Until", value: formatUtc(modCase.until), inline: true });
  }
  if (modCase.channelId) {
    embed.addFields({ name: "Channel", value: `<#${modCase.channelId}>`, inline: true });
  }
  if (modCase.modifiedAt !== null) {
    const by = modCase.amendedById ? ` by <@${modCase.amendedById}>` : "";
    embed.addFields({ name: "Last modified", value: `${formatUtc(modCase.modifiedAt)}${by}` });
  }

  return embed;
}

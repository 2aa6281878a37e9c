/**
 * tidewatch — src/commands/warn/warnings.ts
 * WHAT: /warnings lists a user's warnings with points and issuing moderator.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import {
  InteractionContextType,
  PermissionFlagsBits,
  SlashCommandBuilder,
  type ChatInputCommandInteraction,
  type Client,
} from "discord.js";
import { replyOrEdit, type CommandContext } from "../../lib/cmdWrap.js";
import { logger } from "../../lib/logger.js";
import { DELETED_MODERATOR_ID } from "../../lib/constants.js";
import { pagify } from "../../lib/text.js";
import { listWarnings, type Warning } from "../../store/warningStore.js";
import { paginate } from "../../ui/paginator.js";
import { requireGuild } from "../shared.js";

export const warningsData = new SlashCommandBuilder()
  .setName("warnings")
  .setDescription("List the warnings for a user")
  .addUserOption((o) => o.setName("user").setDescription("User to look up").setRequired(true))
  .setDefaultMemberPermissions(PermissionFlagsBits.ModerateMembers)
  .setContexts(InteractionContextType.Guild);

export async function moderatorName(client: Client, moderatorId: string): Promise<string> {
  if (moderatorId === DELETED_MODERATOR_ID) return "Deleted Moderator";
  const cached = client.users.cache.get(moderatorId);
  if (cached) return cached.tag;
  try {
    return (await client.users.fetch(moderatorId)).tag;
  } catch (err) {
    logger.debug({ err, moderatorId }, "[warnings] Moderator lookup failed");
    return `Unknown Moderator (${moderatorId})`;
  }
}

export function warningLine(warning: Warning, moderator: string): string {
  return `${warning.points} point warning ${warning.id} issued by ${moderator} for ${warning.description}`;
}

export async function executeWarnings(ctx: CommandContext<ChatInputCommandInteraction>): Promise<void> {
  const interaction = await requireGuild(ctx.interaction);
  if (!interaction) return;

  const user = interaction.options.getUser("user", true);
  const warnings = listWarnings(interaction.guildId, user.id);
  if (warnings.length === 0) {
    await replyOrEdit(interaction, { content: "That user has no warnings!" });
    return;
  }

  const lines: string[] = [];
  for (const warning of warnings) {
    lines.push(warningLine(warning, await moderatorName(interaction.client, warning.moderatorId)));
  }
  const pages = pagify(lines.join("\n"), 1900).map((page) => `**Warnings for ${user.tag}**\n${page}`);
  await paginate(interaction, pages, { ephemeral: true });
}

/**
 * tidewatch — src/features/raffles/entry.ts
 * WHAT: The raffle entry button.
 * FLOWS:
 *  - raffle:enter → days-on-server check → role check → toggleRaffleEntry → button label count → receipt
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { ButtonInteraction } from "discord.js";
import { ensureDeferred, replyOrEdit, type CommandContext } from "../../lib/cmdWrap.js";
import { humanizeDuration } from "../../lib/duration.js";
import { logger } from "../../lib/logger.js";
import { nowUtc } from "../../lib/time.js";
import { getRaffle, toggleRaffleEntry } from "../../store/raffleStore.js";
import { buildRaffleButton, RAFFLE_ENTRY_ID } from "./embeds.js";
import { daysOnServer } from "./winners.js";

export const RAFFLE_ENTRY_RE = new RegExp(`^${RAFFLE_ENTRY_ID}$`);

export async function handleRaffleEntry(ctx: CommandContext<ButtonInteraction>): Promise<void> {
  const { interaction } = ctx;
  if (!interaction.inCachedGuild()) {
    logger.warn({ customId: interaction.customId }, "[raffles] Entry button outside a guild");
    return;
  }

  ctx.step("load");
  const raffle = getRaffle(interaction.message.id);
  if (!raffle || raffle.endedAt !== null) {
    await replyOrEdit(interaction, { content: "This raffle has ended." });
    return;
  }

  const member = interaction.member;
  const now = nowUtc();
  if (raffle.daysOnServer > 0 && daysOnServer(member, now) < raffle.daysOnServer) {
    const joined = Math.floor((member.joinedTimestamp ?? now * 1000) / 1000);
    const remaining = joined + raffle.daysOnServer * 86_400 - now;
    await replyOrEdit(interaction, {
      content: [
        `You don't meet the \`Days on Server\` requirement of **${raffle.daysOnServer}** days.`,
        `You'd have to continue being a member for **${humanizeDuration(remaining)}** to enter!`,
      ].join("\n\n"),
    });
    return;
  }
  if (raffle.roleIds.length > 0 && !member.roles.cache.hasAny(...raffle.roleIds)) {
    await replyOrEdit(interaction, {
      content: "You don't have any of the required roles to interact with this raffle!",
    });
    return;
  }

  await ensureDeferred(interaction);

  ctx.step("toggle");
  const { entered, total } = toggleRaffleEntry(raffle.messageId, interaction.user.id);
  logger.info({ messageId: raffle.messageId, userId: interaction.user.id, entered, total }, "[raffles] Entry toggled");

  try {
    await interaction.message.edit({ components: [buildRaffleButton(total)] });
  } catch (err) {
    logger.warn({ err, messageId: raffle.messageId }, "[raffles] Couldn't refresh entry count");
  }

  await replyOrEdit(interaction, {
    content: entered ? "Successfully entered the raffle!" : "Removed your entry from the raffle!",
  });
}

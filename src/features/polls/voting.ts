/**
 * tidewatch — src/features/polls/voting.ts
 * WHAT: Vote button handler for polls.
 * WHY: A click toggles the voter's vote on that option; single-vote polls move it instead.
 * FLOWS:
 *  - poll:vote:{index} → role check → togglePollVote → refresh button counts → ephemeral receipt
 * DOCS:
 *  - ButtonInteraction: https://discord.js.org/#/docs/discord.js/main/class/ButtonInteraction
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { ButtonInteraction } from "discord.js";
import { ensureDeferred, replyOrEdit, type CommandContext } from "../../lib/cmdWrap.js";
import { logger } from "../../lib/logger.js";
import { getPoll, togglePollVote, type Poll, type VoteOutcome } from "../../store/pollStore.js";
import { buildPollButtons, optionLine } from "./embeds.js";

export const POLL_VOTE_RE = /^poll:vote:(\d+)$/;

export function voteReceipt(poll: Poll, optionIndex: number, outcome: VoteOutcome): string {
  const option = poll.options.find((o) => o.index === optionIndex);
  const label = option ? optionLine(option) : String(optionIndex);
  let text = outcome.added
    ? `Successfully counted your vote for: ${label}`
    : `Removed your vote for: ${label}`;

  const previous = outcome.movedFrom.at(-1);
  const previousOption = poll.options.find((o) => o.index === previous);
  if (previousOption) {
    text += `\n\nAnd removed your previous vote for: ${optionLine(previousOption)}`;
  }
  return text;
}

export async function handlePollVote(ctx: CommandContext<ButtonInteraction>): Promise<void> {
  const { interaction } = ctx;
  const match = POLL_VOTE_RE.exec(interaction.customId);
  if (!match?.[1] || !interaction.inCachedGuild()) {
    logger.warn({ customId: interaction.customId }, "[polls] Vote button outside a poll");
    return;
  }
  const optionIndex = Number.parseInt(match[1], 10);

  ctx.step("load");
  const poll = getPoll(interaction.message.id);
  if (!poll || poll.endedAt !== null) {
    await replyOrEdit(interaction, { content: "This poll has ended." });
    return;
  }
  if (!poll.options.some((o) => o.index === optionIndex)) {
    await replyOrEdit(interaction, { content: "That option isn't part of this poll." });
    return;
  }
  if (poll.roleIds.length > 0 && !interaction.member.roles.cache.hasAny(...poll.roleIds)) {
    await replyOrEdit(interaction, {
      content: "You don't have any of the required roles to interact with this poll!",
    });
    return;
  }

  await ensureDeferred(interaction);

  ctx.step("vote");
  const outcome = togglePollVote(poll, optionIndex, interaction.user.id);
  logger.info(
    { messageId: poll.messageId, userId: interaction.user.id, optionIndex, added: outcome.added },
    "[polls] Vote toggled"
  );

  ctx.step("refresh");
  const updated = getPoll(poll.messageId) ?? poll;
  try {
    await interaction.message.edit({ components: buildPollButtons(updated) });
  } catch (err) {
    logger.warn({ err, messageId: poll.messageId }, "[polls] Couldn't refresh vote counts");
  }

  await replyOrEdit(interaction, { content: voteReceipt(poll, optionIndex, outcome) });
}

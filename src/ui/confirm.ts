/**
 * tidewatch — src/ui/confirm.ts
 * WHAT: Yes/No button prompt bound to the invoking user.
 * WHY: Resetting cases, accepting the overwrite-mute fallback and viewing issue reports
 *      all need a quick confirmation from the person who ran the command.
 * FLOWS:
 *  - confirm() → reply with buttons → awaitMessageComponent(30s, invoker only) → strip buttons
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import {
  ActionRowBuilder,
  ButtonBuilder,
  ButtonStyle,
  ComponentType,
  type ChatInputCommandInteraction,
} from "discord.js";
import { logger } from "../lib/logger.js";
import { replyOrEdit } from "../lib/cmdWrap.js";
import { COMPONENT_IDLE_TIMEOUT_MS } from "../lib/constants.js";

export function confirmRow(idPrefix: string): ActionRowBuilder<ButtonBuilder> {
  return new ActionRowBuilder<ButtonBuilder>().addComponents(
    new ButtonBuilder().setCustomId(`${idPrefix}:yes`).setLabel("Yes").setStyle(ButtonStyle.Success),
    new ButtonBuilder().setCustomId(`${idPrefix}:no`).setLabel("No").setStyle(ButtonStyle.Danger)
  );
}

/**
 * Ask a yes/no question. Resolves true only on "Yes" from the invoker;
 * "No" and the timeout both resolve false.
 */
export async function confirm(
  interaction: ChatInputCommandInteraction,
  content: string,
  opts: { ephemeral?: boolean; timeoutMs?: number } = {}
): Promise<boolean> {
  const idPrefix = `confirm:${interaction.id}`;
  const message = await replyOrEdit(
    interaction,
    { content, components: [confirmRow(idPrefix)] },
    { ephemeral: opts.ephemeral ?? true }
  );
  if (!message) return false;

  try {
    const press = await message.awaitMessageComponent({
      componentType: ComponentType.Button,
      filter: (i) => i.user.id === interaction.user.id && i.customId.startsWith(idPrefix),
      time: opts.timeoutMs ?? COMPONENT_IDLE_TIMEOUT_MS,
    });
    await press.update({ components: [] });
    return press.customId === `${idPrefix}:yes`;
  } catch (err) {
    // Timeout rejects with InteractionCollectorError; anything else is logged the same way
    logger.debug({ err, interactionId: interaction.id }, "[confirm] No answer");
    await interaction
      .editReply({ message: message.id, components: [] })
      .catch((editErr: unknown) => logger.debug({ err: editErr }, "[confirm] Could not strip buttons"));
    return false;
  }
}

/**
 * tidewatch — src/ui/paginator.ts
 * WHAT: Button paginator for lists of embeds or text pages.
 * WHY: Lookups (AniList, Urban Dictionary, YouTube) and case/warning listings return many pages.
 * FLOWS:
 *  - paginate() → single page: plain reply | several: reply + Prev/Next/Close collector
 *  - collector idles out after 30s → buttons removed
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import {
  ActionRowBuilder,
  ButtonBuilder,
  ButtonStyle,
  ComponentType,
  MessageFlags,
  type ButtonInteraction,
  type ChatInputCommandInteraction,
  type EmbedBuilder,
} from "discord.js";
import { logger } from "../lib/logger.js";
import { replyOrEdit } from "../lib/cmdWrap.js";
import { COMPONENT_IDLE_TIMEOUT_MS, SAFE_ALLOWED_MENTIONS } from "../lib/constants.js";

export type Page = string | EmbedBuilder;

function pagePayload(page: Page) {
  if (typeof page === "string") {
    return { content: page, embeds: [], allowedMentions: SAFE_ALLOWED_MENTIONS };
  }
  return { embeds: [page], allowedMentions: SAFE_ALLOWED_MENTIONS };
}

function controls(idPrefix: string): ActionRowBuilder<ButtonBuilder> {
  return new ActionRowBuilder<ButtonBuilder>().addComponents(
    new ButtonBuilder().setCustomId(`${idPrefix}:prev`).setLabel("◀").setStyle(ButtonStyle.Secondary),
    new ButtonBuilder().setCustomId(`${idPrefix}:close`).setLabel("✖").setStyle(ButtonStyle.Danger),
    new ButtonBuilder().setCustomId(`${idPrefix}:next`).setLabel("▶").setStyle(ButtonStyle.Secondary)
  );
}

/**
 * Next page index for a control id, wrapping at both ends. null for "close".
 */
export function nextPageIndex(customId: string, current: number, total: number): number | null {
  if (customId.endsWith(":prev")) return (current - 1 + total) % total;
  if (customId.endsWith(":next")) return (current + 1) % total;
  return null;
}

/**
 * Send pages. Returns once the first page is posted; the collector keeps running.
 */
export async function paginate(
  interaction: ChatInputCommandInteraction,
  pages: readonly Page[],
  opts: { ephemeral?: boolean } = {}
): Promise<void> {
  if (pages.length === 0) return;
  const ephemeral = opts.ephemeral ?? false;

  if (pages.length === 1) {
    await replyOrEdit(interaction, pagePayload(pages[0]), { ephemeral });
    return;
  }

  const idPrefix = `page:${interaction.id}`;
  const message = await replyOrEdit(
    interaction,
    { ...pagePayload(pages[0]), components: [controls(idPrefix)] },
    { ephemeral }
  );
  if (!message) return;

  let index = 0;
  const collector = message.createMessageComponentCollector({
    componentType: ComponentType.Button,
    idle: COMPONENT_IDLE_TIMEOUT_MS,
    filter: (i) => i.customId.startsWith(idPrefix),
  });

  const handle = async (press: ButtonInteraction) => {
    if (press.user.id !== interaction.user.id) {
      await press.reply({
        content: "These controls belong to whoever ran the command.",
        flags: MessageFlags.Ephemeral,
      });
      return;
    }
    const next = nextPageIndex(press.customId, index, pages.length);
    if (next === null) {
      collector.stop("closed");
      await press.update({ components: [] });
      return;
    }
    index = next;
    await press.update({ ...pagePayload(pages[index]), components: [controls(idPrefix)] });
  };

  collector.on("collect", (press) => {
    handle(press).catch((err: unknown) => {
      logger.warn({ err, interactionId: interaction.id }, "[paginator] Button handling failed");
    });
  });

  collector.on("end", (_collected, reason) => {
    if (reason === "closed") return;
    interaction
      .editReply({ message: message.id, components: [] })
      .catch((err: unknown) => logger.debug({ err }, "[paginator] Could not strip controls"));
  });
}

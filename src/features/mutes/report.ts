/**
 * tidewatch — src/features/mutes/report.ts
 * WHAT: Offers the per-member issue breakdown after a bulk mute/unmute.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { ChatInputCommandInteraction } from "discord.js";
import { pagify } from "../../lib/text.js";
import { confirm } from "../../ui/confirm.js";
import { paginate } from "../../ui/paginator.js";
import { hasIssues, parseIssues, type MuteResult } from "./issues.js";

export async function reportIssues(
  interaction: ChatInputCommandInteraction,
  results: readonly MuteResult[]
): Promise<void> {
  const withIssues = results.filter(hasIssues);
  if (withIssues.length === 0) return;

  const show = await confirm(
    interaction,
    "Some users could not be properly muted. Would you like to see who, where, and why?"
  );
  if (!show) return;

  const text = withIssues.map(parseIssues).join("\n");
  await paginate(interaction, pagify(text), { ephemeral: true });
}

/**
 * tidewatch — src/features/osu/embeds.ts
 * WHAT: Renders a new or changed top play as the embed posted to tracking channels.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { EmbedBuilder } from "discord.js";
import { EMBED_COLOR_BLUE, EMBED_COLOR_GREEN, EMBED_COLOR_YELLOW } from "../../lib/constants.js";
import { modeDisplayName } from "./modes.js";
import type { ScoreUpdate, TrackedScore } from "./scores.js";

const number = (n: number): string => n.toLocaleString("en-US", { maximumFractionDigits: 2 });
const percent = (ratio: number): string => `${(ratio * 100).toFixed(2)}%`;
const signed = (text: string, delta: number): string => (delta > 0 ? `+${text}` : text);

function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

export function trackingTitle(update: ScoreUpdate): string {
  const { score } = update;
  const position = score.index + 1;
  const name = score.user.username;
  if (update.kind === "new") return `New #${position} for ${name}`;
  const verb = score.index < update.oldIndex ? "Improved" : "Changed";
  return `${verb} #${position} from #${update.oldIndex + 1} for ${name}`;
}

/** Mania difficulty names lead with the key count ("[4K] Hard" → "Hard"). */
export function displayVersion(score: TrackedScore): string {
  return score.mode === "mania" ? score.beatmap.version.replace(/^\S*\s/, "") : score.beatmap.version;
}

export function displayStatus(status: string): string {
  if (status === "wip") return "WIP";
  return status.charAt(0).toUpperCase() + status.slice(1);
}

function comboField(score: TrackedScore): { name: string; value: string } {
  const combo = `**${number(score.maxCombo)}x**`;
  if (score.mode !== "mania") return { name: "Combo", value: combo };
  const { geki, c300 } = score.statistics;
  const ratio = c300 === 0 ? "Perfect" : String(round2(geki / c300));
  return { name: "Combo / Ratio", value: `${combo} / ${ratio}` };
}

function hits(score: TrackedScore): string {
  const s = score.statistics;
  const counts = score.mode === "mania" ? [s.geki, s.c300, s.katu, s.c100, s.c50, s.miss] : [s.c300, s.c100, s.c50, s.miss];
  return counts.map(number).join("/");
}

function mapInfo(score: TrackedScore): string {
  const { beatmap, beatmapset } = score;
  const objects = beatmap.countCircles + beatmap.countSliders + beatmap.countSpinners;
  const stats =
    score.mode === "mania"
      ? `OD: \`${beatmap.accuracy}\` | HP: \`${beatmap.drain}\``
      : `CS: \`${beatmap.cs}\` | AR: \`${beatmap.ar}\` | OD: \`${beatmap.accuracy}\` | HP: \`${beatmap.drain}\``;
  return (
    `Mapper: [${beatmapset.creator}](https://osu.ppy.sh/users/${beatmapset.creatorId}) | ` +
    `BPM: \`${beatmap.bpm ?? "?"}\` | Objects: \`${number(objects)}\`\n` +
    `Status: \`${displayStatus(beatmapset.status)}\` | ${stats}`
  );
}

export function trackingEmbed(update: ScoreUpdate): EmbedBuilder {
  const { score } = update;

  let color = EMBED_COLOR_GREEN;
  let accuracy = percent(score.accuracy);
  let pp = `**${score.pp === null ? "0" : number(round2(score.pp))}pp**`;

  if (update.kind === "changed") {
    color = score.index < update.oldIndex ? EMBED_COLOR_BLUE : EMBED_COLOR_YELLOW;
    const accDelta = score.accuracy - update.oldAccuracy;
    accuracy += ` (${signed(percent(accDelta), accDelta)})`;
    if (score.pp !== null && update.oldPp !== null) {
      const ppDelta = round2(score.pp - update.oldPp);
      pp += ` (${signed(number(ppDelta), ppDelta)})`;
    }
  }

  const mods = score.mods === "NM" ? "" : ` +${score.mods}`;

  return new EmbedBuilder()
    .setColor(color)
    .setTitle(trackingTitle(update))
    .setAuthor({
      name: `${score.beatmapset.artist} - ${score.beatmapset.title} [${displayVersion(score)}] [${score.beatmap.difficultyRating}★]`,
      url: score.beatmap.url,
      iconURL: score.user.avatarUrl,
    })
    .setImage(score.beatmapset.cover)
    .addFields(
      { name: "Grade", value: `${score.rank}${mods}`, inline: true },
      { name: "Score", value: number(score.score), inline: true },
      { name: "Accuracy", value: accuracy, inline: true },
      { name: "PP", value: pp, inline: true },
      { ...comboField(score), inline: true },
      { name: "Hits", value: hits(score), inline: true },
      { name: "Map Info", value: mapInfo(score), inline: false }
    )
    .setFooter({ text: `${score.user.username} | osu!${modeDisplayName(score.mode)} | Played` })
    .setTimestamp(new Date(score.createdAt));
}

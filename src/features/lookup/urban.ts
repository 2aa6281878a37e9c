/**
 * tidewatch — src/features/lookup/urban.ts
 * WHAT: Urban Dictionary definitions as embed pages.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { EmbedBuilder } from "discord.js";
import { z } from "zod";
import { EMBED_COLOR_DEFAULT } from "../../lib/constants.js";
import { truncate } from "../../lib/text.js";
import { fetchJson } from "./http.js";

export const URBAN_URL = "https://api.urbandictionary.com/v0/define";

const definitionSchema = z.object({
  word: z.string(),
  definition: z.string(),
  example: z.string().nullish(),
  permalink: z.string(),
  thumbs_up: z.number(),
  thumbs_down: z.number(),
});
export type UrbanDefinition = z.infer<typeof definitionSchema>;

const responseSchema = z.object({ list: z.array(definitionSchema).nullish() });

/** Urban Dictionary links terms as [term]; Discord would show the brackets. */
export function stripBrackets(text: string): string {
  return text.replace(/\[([^\]]*)\]/g, "$1");
}

export function definitionEmbed(entry: UrbanDefinition): EmbedBuilder {
  const example = entry.example ? stripBrackets(entry.example) : "N/A";
  const description = `${stripBrackets(entry.definition)}\n\n**Example:** ${example}`;
  return new EmbedBuilder()
    .setColor(EMBED_COLOR_DEFAULT)
    .setTitle(truncate(entry.word, 256))
    .setURL(entry.permalink)
    .setDescription(truncate(description, 2048))
    .setFooter({
      text: `${entry.thumbs_down} Down / ${entry.thumbs_up} Up, Powered by Urban Dictionary.`,
    });
}

export async function searchUrban(word: string): Promise<EmbedBuilder[]> {
  const url = `${URBAN_URL}?term=${encodeURIComponent(word.toLowerCase())}`;
  const body = await fetchJson(url, responseSchema, "urban");
  return (body.list ?? []).map(definitionEmbed);
}

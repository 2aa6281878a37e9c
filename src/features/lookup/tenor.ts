/**
 * tidewatch — src/features/lookup/tenor.ts
 * WHAT: Random gif from a Tenor v2 search or the featured list.
 * DOCS:
 *  - Tenor API v2: https://developers.google.com/tenor/guides/quickstart
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { z } from "zod";
import { env } from "../../lib/env.js";
import { MissingConfigError } from "../../lib/errors.js";
import { fetchJson } from "./http.js";

export const TENOR_BASE_URL = "https://tenor.googleapis.com/v2";
const RESULT_LIMIT = 20;

const resultSchema = z.object({
  id: z.string(),
  url: z.string(),
  media_formats: z.record(z.object({ url: z.string() })).nullish(),
});
const responseSchema = z.object({ results: z.array(resultSchema) });
export type TenorResult = z.infer<typeof resultSchema>;

export interface GifOptions {
  nsfw: boolean;
  /** Returns an index in [0, length); random by default */
  pick?: (length: number) => number;
  apiKey?: string;
}

function gifUrl(result: TenorResult): string {
  return result.media_formats?.gif?.url ?? result.url;
}

async function randomGif(path: string, params: Record<string, string>, opts: GifOptions): Promise<string | null> {
  const key = opts.apiKey ?? env.TENOR_API_KEY;
  if (!key) throw new MissingConfigError("TENOR_API_KEY");

  const url = new URL(`${TENOR_BASE_URL}/${path}`);
  url.searchParams.set("key", key);
  url.searchParams.set("client_key", "tidewatch");
  url.searchParams.set("limit", String(RESULT_LIMIT));
  url.searchParams.set("media_filter", "gif");
  url.searchParams.set("contentfilter", opts.nsfw ? "off" : "low");
  for (const [name, value] of Object.entries(params)) url.searchParams.set(name, value);

  const { results } = await fetchJson(url.toString(), responseSchema, `tenor ${path}`);
  if (results.length === 0) return null;

  const pick = opts.pick ?? ((length: number) => Math.floor(Math.random() * length));
  const result = results[pick(results.length)] ?? results[0];
  return gifUrl(result);
}

export function searchGif(query: string, opts: GifOptions): Promise<string | null> {
  return randomGif("search", { q: query.toLowerCase() }, opts);
}

export function featuredGif(opts: GifOptions): Promise<string | null> {
  return randomGif("featured", {}, opts);
}

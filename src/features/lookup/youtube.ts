/**
 * tidewatch — src/features/lookup/youtube.ts
 * WHAT: Video links scraped from YouTube's results page.
 * WHY: The Data API needs a key and quota; the results page embeds video ids in its JSON.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { fetchText } from "./http.js";

export const YOUTUBE_RESULTS_URL = "https://www.youtube.com/results";

const VIDEO_ID_RE = /\{"videoId":"([\w-]{11})"/g;

/**
 * Watch URLs for every video id in the page, deduplicated, in page order.
 */
export function extractVideoUrls(html: string): string[] {
  const ids = new Set<string>();
  for (const match of html.matchAll(VIDEO_ID_RE)) {
    if (match[1]) ids.add(match[1]);
  }
  return [...ids].map((id) => `https://www.youtube.com/watch?v=${id}`);
}

export async function searchYoutube(query: string): Promise<string[]> {
  const url = `${YOUTUBE_RESULTS_URL}?search_query=${encodeURIComponent(query)}`;
  const html = await fetchText(url, "youtube", {
    headers: { "User-Agent": "Mozilla/5.0 (compatible; tidewatch)" },
  });
  return extractVideoUrls(html);
}

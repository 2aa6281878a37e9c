/**
 * tidewatch — src/features/osu/players.ts
 * WHAT: Reads a player argument: profile URL, numeric id or username.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { parseMode, type OsuMode } from "./modes.js";

export interface PlayerQuery {
  /** Numeric id or username, as osu! accepts either on /users/{user} */
  query: string;
  /** Mode suffix from a profile URL, if any */
  mode: OsuMode | null;
}

const PROFILE_URL = /osu\.ppy\.sh\/(?:users|u)\/([^/?#\s]+)(?:\/([a-z]+))?/i;

function safeDecode(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

export function parsePlayer(input: string): PlayerQuery | null {
  const trimmed = input.trim();
  if (!trimmed) return null;

  const match = PROFILE_URL.exec(trimmed);
  if (match?.[1]) {
    return {
      query: safeDecode(match[1]),
      mode: match[2] ? parseMode(match[2]) : null,
    };
  }
  return { query: trimmed, mode: null };
}

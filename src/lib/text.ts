/**
 * tidewatch — src/lib/text.ts
 * WHAT: Small string helpers for command replies.
 * WHY: Discord caps messages at 2000 chars and embeds at 4096/256; replies listing
 *      many users or channels need joining and splitting.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

/**
 * "a" / "a and b" / "a, b, and c"
 */
export function humanizeList(items: readonly string[]): string {
  if (items.length === 0) return "";
  if (items.length === 1) return items[0];
  if (items.length === 2) return `${items[0]} and ${items[1]}`;
  return `${items.slice(0, -1).join(", ")}, and ${items[items.length - 1]}`;
}

/**
 * Split text into chunks of at most maxLength, breaking on newlines.
 * A single line longer than maxLength is hard-split.
 */
export function pagify(text: string, maxLength = 2000): string[] {
  const pages: string[] = [];
  let current = "";

  for (const line of text.split("\n")) {
    const pieces: string[] = [];
    for (let i = 0; i < line.length; i += maxLength) {
      pieces.push(line.slice(i, i + maxLength));
    }
    if (pieces.length === 0) pieces.push("");

    for (const piece of pieces) {
      const candidate = current.length === 0 ? piece : `${current}\n${piece}`;
      if (candidate.length > maxLength) {
        pages.push(current);
        current = piece;
      } else {
        current = candidate;
      }
    }
  }

  if (current.trim().length > 0) pages.push(current);
  return pages;
}

export function truncate(text: string, max: number): string {
  if (text.length <= max) return text;
  return `${text.slice(0, Math.max(0, max - 3))}...`;
}

const USER_ID_RE = /<@!?(\d{15,20})>|\b(\d{15,20})\b/g;

/**
 * Unique user snowflakes from mentions and bare ids, in input order.
 */
export function parseUserIds(text: string): string[] {
  const seen = new Set<string>();
  for (const match of text.matchAll(USER_ID_RE)) {
    const id = match[1] ?? match[2];
    if (id) seen.add(id);
  }
  return [...seen];
}

const ROLE_ID_RE = /<@&(\d{15,20})>|\b(\d{15,20})\b/g;

/**
 * Unique role snowflakes from role mentions and bare ids, in input order.
 */
export function parseRoleIds(text: string): string[] {
  const seen = new Set<string>();
  for (const match of text.matchAll(ROLE_ID_RE)) {
    const id = match[1] ?? match[2];
    if (id) seen.add(id);
  }
  return [...seen];
}

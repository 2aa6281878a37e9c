/**
 * tidewatch — src/lib/time.ts
 * WHAT: Unix epoch timestamp utilities.
 * WHY: Mutes, cases and warnings store INTEGER Unix seconds; tests need one place to fake "now".
 * FLOWS:
 *  - nowUtc() → current Unix seconds (INTEGER for SQLite)
 *  - formatUtc() → "YYYY-MM-DD HH:MM:SS UTC" for DMs and embeds
 *  - discordTimestamp() → <t:N:style> markdown
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

/**
 * Current Unix timestamp in seconds (not milliseconds).
 */
// Floor, not round: a rounded-up "now" makes remaining-time math go negative early.
export const nowUtc = (): number => Math.floor(Date.now() / 1000);

/**
 * Format Unix seconds as a plain UTC string.
 *
 * @example
 * formatUtc(1729468800) // "2024-10-21 00:00:00 UTC"
 */
export function formatUtc(tsSec: number): string {
  return new Date(tsSec * 1000)
    .toISOString()
    .replace("T", " ")
    .replace(/\.\d{3}Z$/, " UTC");
}

export type TimestampStyle = "t" | "T" | "d" | "D" | "f" | "F" | "R";

/**
 * Discord renders these in the reader's timezone. Embed footers don't render them.
 */
export function discordTimestamp(tsSec: number, style: TimestampStyle = "f"): string {
  return `<t:${Math.floor(tsSec)}:${style}>`;
}

/**
 * tidewatch — src/features/raffles/winners.ts
 * WHAT: Who may win a raffle and the random draw.
 * FLOWS:
 *  - eligibleWinners: entrants still in the guild → days on server → allowed roles
 *  - drawWinners: everyone when there aren't enough, else a sample (rerolls avoid the previous set)
 *  - drawAnnouncement: the channel message for each outcome
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { Guild, GuildMember } from "discord.js";
import { fetchMember } from "../../commands/shared.js";
import { nowUtc } from "../../lib/time.js";
import type { Raffle } from "../../store/raffleStore.js";
import { winnersLine } from "./embeds.js";

const REROLL_ATTEMPTS = 10;

export type RaffleDraw =
  | { kind: "no_entries"; text: string }
  | { kind: "no_valid_entries"; text: string }
  | { kind: "drawn"; text: string; winnerIds: string[] };

/** Whole days since the member joined; 0 when unknown */
export function daysOnServer(member: GuildMember, now: number = nowUtc()): number {
  if (member.joinedTimestamp === null) return 0;
  return Math.floor((now - member.joinedTimestamp / 1000) / 86_400);
}

/**
 * Whether a member meets the raffle's membership age and role requirements.
 */
export function meetsRequirements(raffle: Raffle, member: GuildMember, now: number = nowUtc()): boolean {
  if (raffle.daysOnServer > 0 && daysOnServer(member, now) < raffle.daysOnServer) return false;
  if (raffle.roleIds.length > 0 && !member.roles.cache.hasAny(...raffle.roleIds)) return false;
  return true;
}

export async function eligibleWinners(guild: Guild, raffle: Raffle, now: number = nowUtc()): Promise<string[]> {
  const eligible: string[] = [];
  for (const userId of raffle.entries) {
    const member = await fetchMember(guild, userId);
    if (member && meetsRequirements(raffle, member, now)) eligible.push(member.id);
  }
  return eligible;
}

function sample(pool: readonly string[], count: number, random: () => number): string[] {
  const copy = [...pool];
  for (let i = 0; i < count; i++) {
    const j = i + Math.floor(random() * (copy.length - i));
    const picked = copy[j];
    const current = copy[i];
    if (picked === undefined || current === undefined) break;
    copy[i] = picked;
    copy[j] = current;
  }
  return copy.slice(0, count);
}

function sameSet(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((id) => b.includes(id));
}

/**
 * Pick `count` winners from `pool`. A non-empty `previous` is avoided when another set exists.
 */
export function drawWinners(
  pool: readonly string[],
  count: number,
  previous: readonly string[] = [],
  random: () => number = Math.random
): string[] {
  if (pool.length <= count) return [...pool];
  let picked = sample(pool, count, random);
  for (let attempt = 1; attempt < REROLL_ATTEMPTS && previous.length > 0 && sameSet(picked, previous); attempt++) {
    picked = sample(pool, count, random);
  }
  return picked;
}

export function drawAnnouncement(
  raffle: Raffle,
  eligibleCount: number,
  winnerIds: readonly string[],
  reroll: boolean
): string {
  const parts: string[] = [];
  if (reroll) parts.push("Raffle has been rerolled!");
  parts.push(`The winner${winnerIds.length > 1 ? "s" : ""} for the **${raffle.title}** raffle is:`);
  parts.push(winnersLine(winnerIds));
  if (eligibleCount < raffle.winnerCount) {
    parts.push(
      `There was only **${eligibleCount}** valid entries out of the **${raffle.winnerCount}** maximum allowed. So everyone is a winner!`
    );
  }
  parts.push(":tada::tada: Congratulations! :tada::tada:");
  return parts.join("\n\n");
}

/**
 * Run the draw for a raffle. Nothing is stored here.
 */
export async function drawRaffle(
  guild: Guild,
  raffle: Raffle,
  opts: { reroll?: boolean; previous?: readonly string[]; random?: () => number; now?: number } = {}
): Promise<RaffleDraw> {
  if (raffle.entries.length === 0) {
    return {
      kind: "no_entries",
      text: `Seems like nobody entered the raffle for **${raffle.title}** so no winner could be picked.`,
    };
  }
  const eligible = await eligibleWinners(guild, raffle, opts.now);
  if (eligible.length === 0) {
    return {
      kind: "no_valid_entries",
      text: `Couldn't find any valid entries for the **${raffle.title}** raffle so no winner could be picked.`,
    };
  }
  const winnerIds = drawWinners(eligible, raffle.winnerCount, opts.previous, opts.random);
  return {
    kind: "drawn",
    winnerIds,
    text: drawAnnouncement(raffle, eligible.length, winnerIds, opts.reroll ?? false),
  };
}

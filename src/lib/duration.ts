/**
 * tidewatch — src/lib/duration.ts
 * WHAT: Free-text duration parsing ("spam 2 hours", "3d", "flooding time=1w")
 *       and the inverse humanizer ("2 days, 3 hours").
 * WHY: /mute, /mutechannel and /muteset defaulttime take one free-form
 *      time_and_reason string; the time may come first or last.
 * FLOWS: parseMuteTime(text) → { durationSeconds, reason }
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

export interface MuteTime {
  /** Total seconds, or null when no time was given (or it summed to zero) */
  durationSeconds: number | null;
  /** Text left after removing time tokens; null when empty */
  reason: string | null;
}

type Unit = "weeks" | "days" | "hours" | "minutes" | "seconds";

const UNITS: readonly Unit[] = ["weeks", "days", "hours", "minutes", "seconds"];

const UNIT_SECONDS: Record<Unit, number> = {
  weeks: 604_800,
  days: 86_400,
  hours: 3_600,
  minutes: 60,
  seconds: 1,
};

// m(?!o) keeps "5 months" from being read as five minutes
const TIME_RE =
  /((?<weeks>\d+?)\s?(weeks?|w))|((?<days>\d+?)\s?(days?|d))|((?<hours>\d+?)\s?(hours?|hrs|hr?))|((?<minutes>\d+?)\s?(minutes?|mins?|m(?!o)))|((?<seconds>\d+?)\s?(seconds?|secs?|s))/gi;

const TIME_SPLIT = /t(?:ime)?=/g;

/**
 * Parse a combined "time and reason" argument.
 *
 * Only the text after the last `time=`/`t=` marker is searched for time
 * tokens; every matched token is then removed from the whole string and
 * what's left is the reason. The marker itself stays in the reason.
 *
 * @example
 * parseMuteTime("spam 5 hours") // { durationSeconds: 18000, reason: "spam" }
 */
export function parseMuteTime(text: string): MuteTime {
  const markers = [...text.matchAll(TIME_SPLIT)];
  const lastMarker = markers.at(-1);
  const searchFrom = lastMarker?.index !== undefined ? lastMarker.index + lastMarker[0].length : 0;
  const maybeTime = text.slice(searchFrom);

  const found: Partial<Record<Unit, number>> = {};
  let reason = text;

  for (const match of maybeTime.matchAll(TIME_RE)) {
    reason = reason.replaceAll(match[0], "");
    const groups = match.groups ?? {};
    for (const unit of UNITS) {
      const value = groups[unit];
      if (value) {
        found[unit] = Number.parseInt(value, 10);
      }
    }
  }

  let total = 0;
  for (const unit of UNITS) {
    total += (found[unit] ?? 0) * UNIT_SECONDS[unit];
  }

  const trimmed = reason.replace(/\s{2,}/g, " ").trim();
  return {
    durationSeconds: total > 0 ? total : null,
    reason: trimmed.length > 0 ? trimmed : null,
  };
}

const PERIODS: Array<[singular: string, plural: string, seconds: number]> = [
  ["year", "years", 60 * 60 * 24 * 365],
  ["month", "months", 60 * 60 * 24 * 30],
  ["day", "days", 60 * 60 * 24],
  ["hour", "hours", 60 * 60],
  ["minute", "minutes", 60],
  ["second", "seconds", 1],
];

/**
 * Render seconds as "1 day, 2 hours, 5 seconds". Zero parts are skipped.
 */
export function humanizeDuration(totalSeconds: number): string {
  let remaining = Math.floor(totalSeconds);
  if (remaining < 1) return "0 seconds";

  const parts: string[] = [];
  for (const [singular, plural, size] of PERIODS) {
    if (remaining >= size) {
      const value = Math.floor(remaining / size);
      remaining -= value * size;
      parts.push(`${value} ${value === 1 ? singular : plural}`);
    }
  }
  return parts.join(", ");
}

/**
 * tidewatch — src/features/osu/modes.ts
 * WHAT: osu! game modes, their aliases and display names.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

export const OSU_MODES = ["osu", "taiko", "fruits", "mania"] as const;
export type OsuMode = (typeof OSU_MODES)[number];

const ALIASES: ReadonlyMap<string, OsuMode> = new Map<string, OsuMode>([
  ["osu", "osu"],
  ["standard", "osu"],
  ["std", "osu"],
  ["taiko", "taiko"],
  ["fruits", "fruits"],
  ["catch", "fruits"],
  ["ctb", "fruits"],
  ["mania", "mania"],
]);

const DISPLAY_NAMES: Record<OsuMode, string> = {
  osu: "Standard",
  taiko: "Taiko",
  fruits: "Catch",
  mania: "Mania",
};

/**
 * Case-insensitive alias lookup; null when the input names no mode.
 */
export function parseMode(input: string): OsuMode | null {
  return ALIASES.get(input.trim().toLowerCase()) ?? null;
}

export function isOsuMode(value: string): value is OsuMode {
  return OSU_MODES.some((mode) => mode === value);
}

export function modeDisplayName(mode: OsuMode): string {
  return DISPLAY_NAMES[mode];
}

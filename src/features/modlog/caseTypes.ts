/**
 * tidewatch — src/features/modlog/caseTypes.ts
 * WHAT: Registry of modlog case types.
 * WHY: One list drives the /modlog cases toggle, case titles and validation of stored rows.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

export const CASE_TYPES = {
  smute: { displayName: "Server Mute", defaultEnabled: true },
  sunmute: { displayName: "Server Unmute", defaultEnabled: true },
  cmute: { displayName: "Channel Mute", defaultEnabled: true },
  cunmute: { displayName: "Channel Unmute", defaultEnabled: true },
  vmute: { displayName: "Voice Mute", defaultEnabled: true },
  vunmute: { displayName: "Voice Unmute", defaultEnabled: true },
  warning: { displayName: "Warning", defaultEnabled: true },
  unwarned: { displayName: "Unwarned", defaultEnabled: true },
  kick: { displayName: "Kick", defaultEnabled: true },
  ban: { displayName: "Ban", defaultEnabled: true },
} as const;

export type CaseAction = keyof typeof CASE_TYPES;

export const CASE_ACTIONS: readonly CaseAction[] = [
  "smute",
  "sunmute",
  "cmute",
  "cunmute",
  "vmute",
  "vunmute",
  "warning",
  "unwarned",
  "kick",
  "ban",
];

export function isCaseAction(value: string): value is CaseAction {
  return CASE_ACTIONS.some((action) => action === value);
}

export function caseDisplayName(action: CaseAction): string {
  return CASE_TYPES[action].displayName;
}

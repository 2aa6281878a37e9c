/**
 * tidewatch — src/features/mutes/gate.ts
 * WHAT: Per-guild gate that channelUpdate listeners wait on while a bulk unmute runs.
 * WHY: A bulk unmute edits every channel; without the gate each edit would look like a
 *      manually removed overwrite and produce a bogus case.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

interface GateState {
  closers: number;
  waiters: Array<() => void>;
}

const gates = new Map<string, GateState>();

function state(guildId: string): GateState {
  let gate = gates.get(guildId);
  if (!gate) {
    gate = { closers: 0, waiters: [] };
    gates.set(guildId, gate);
  }
  return gate;
}

/**
 * Nested closes are counted; the gate opens when every closer has opened it.
 */
export function closeGate(guildId: string): void {
  state(guildId).closers += 1;
}

export function openGate(guildId: string): void {
  const gate = gates.get(guildId);
  if (!gate) return;
  gate.closers = Math.max(0, gate.closers - 1);
  if (gate.closers > 0) return;
  gates.delete(guildId);
  for (const resolve of gate.waiters) resolve();
}

export function isGateOpen(guildId: string): boolean {
  return (gates.get(guildId)?.closers ?? 0) === 0;
}

/**
 * Resolves immediately when open, otherwise when the last closer opens it.
 */
export function waitForGate(guildId: string): Promise<void> {
  const gate = gates.get(guildId);
  if (!gate || gate.closers === 0) return Promise.resolve();
  return new Promise((resolve) => {
    gate.waiters.push(resolve);
  });
}

/**
 * Run fn with the gate closed, reopening it however fn ends.
 */
export async function withGateClosed<T>(guildId: string, fn: () => Promise<T>): Promise<T> {
  closeGate(guildId);
  try {
    return await fn();
  } finally {
    openGate(guildId);
  }
}

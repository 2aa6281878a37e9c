/**
 * tidewatch — src/features/cleanup/purge.ts
 * WHAT: Collects recent channel messages matching a filter and deletes them in bulk.
 * WHY: Bulk delete takes at most 100 messages per call and none older than two weeks.
 * FLOWS:
 *  - collectForDeletion: page history newest → oldest until the count, the anchor or the age limit
 *  - massPurge: chunks of 100 → bulkDelete (a lone message is deleted directly)
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { GuildTextBasedChannel, Message } from "discord.js";
import { BULK_DELETE_MAX_AGE_MS } from "../../lib/constants.js";

const PAGE_SIZE = 100;

export interface CollectOptions {
  /** Stop after this many matches; unbounded when omitted */
  number?: number;
  check?: (message: Message<true>) => boolean;
  /** Start below this message id */
  before?: string;
  /** Stop at this message id (exclusive) */
  after?: string;
  deletePinned?: boolean;
  /** Current time in ms */
  now?: number;
}

export async function collectForDeletion(
  channel: GuildTextBasedChannel,
  opts: CollectOptions = {}
): Promise<Message<true>[]> {
  const cutoff = (opts.now ?? Date.now()) - BULK_DELETE_MAX_AGE_MS;
  const after = opts.after ? BigInt(opts.after) : null;
  const collected: Message<true>[] = [];
  let before = opts.before;

  for (;;) {
    const page = await channel.messages.fetch({ limit: PAGE_SIZE, ...(before ? { before } : {}) });
    for (const message of page.values()) {
      if (message.createdTimestamp < cutoff) return collected;
      if (after !== null && BigInt(message.id) <= after) return collected;
      if (message.pinned && !opts.deletePinned) continue;
      if (opts.check && !opts.check(message)) continue;
      collected.push(message);
      if (opts.number !== undefined && collected.length >= opts.number) return collected;
    }
    if (page.size < PAGE_SIZE) return collected;
    before = page.lastKey();
  }
}

/**
 * @returns how many messages Discord reported deleted
 */
export async function massPurge(channel: GuildTextBasedChannel, messages: readonly Message<true>[]): Promise<number> {
  let deleted = 0;
  for (let i = 0; i < messages.length; i += PAGE_SIZE) {
    const chunk = messages.slice(i, i + PAGE_SIZE);
    const [only] = chunk;
    if (chunk.length === 1 && only) {
      await only.delete();
      deleted += 1;
    } else {
      deleted += (await channel.bulkDelete(chunk, true)).size;
    }
  }
  return deleted;
}

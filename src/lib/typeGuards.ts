/**
 * tidewatch — src/lib/typeGuards.ts
 * WHAT: Type guards for discord.js channel shapes.
 * DOCS:
 *  - GuildChannel: https://discord.js.org/#/docs/discord.js/main/class/GuildChannel
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { GuildBasedChannel, NonThreadGuildBasedChannel } from "discord.js";

/**
 * Threads inherit overwrites from their parent and have none of their own.
 */
export function hasOverwrites(channel: GuildBasedChannel): channel is NonThreadGuildBasedChannel {
  return !channel.isThread();
}

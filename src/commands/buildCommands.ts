/**
 * tidewatch — src/commands/buildCommands.ts
 * WHAT: Every slash command definition, serialized for bulk registration.
 * FLOWS: scripts/deploy-commands.ts → buildCommands() → REST PUT
 *
 * GOTCHA: Discord caches slash commands. After adding or removing one here, run
 * `npm run deploy:cmds`. Global commands can take up to an hour to show up;
 * guild commands (GUILD_ID set) update instantly.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { RESTPostAPIChatInputApplicationCommandsJSONBody } from "discord.js";
import {
  muteData,
  unmuteData,
  muteChannelData,
  unmuteChannelData,
  activeMutesData,
} from "./mute/index.js";
import { warnData, warningsData, unwarnData } from "./warn/index.js";
import { data as mutesetData } from "./muteset.js";
import { data as warnsetData } from "./warnset.js";
import { data as modlogData } from "./modlog.js";
import { data as reasonData } from "./reason.js";
import { data as osutrackData } from "./osutrack.js";
import { data as anilistData } from "./anilist.js";
import { data as urbanData } from "./urban.js";
import { data as gifData } from "./gif.js";
import { data as youtubeData } from "./youtube.js";
import { data as pollData } from "./poll.js";
import { data as raffleData } from "./raffle.js";
import { data as cleanupData } from "./cleanup.js";
import { data as slowmodeData } from "./slowmode.js";

export function buildCommands(): RESTPostAPIChatInputApplicationCommandsJSONBody[] {
  return [
    // Mutes
    muteData.toJSON(),
    unmuteData.toJSON(),
    muteChannelData.toJSON(),
    unmuteChannelData.toJSON(),
    activeMutesData.toJSON(),
    mutesetData.toJSON(),

    // Warnings
    warnData.toJSON(),
    warningsData.toJSON(),
    unwarnData.toJSON(),
    warnsetData.toJSON(),

    // Modlog
    modlogData.toJSON(),
    reasonData.toJSON(),

    // Channel moderation
    cleanupData.toJSON(),
    slowmodeData.toJSON(),

    // osu!
    osutrackData.toJSON(),

    // Lookups
    anilistData.toJSON(),
    urbanData.toJSON(),
    gifData.toJSON(),
    youtubeData.toJSON(),

    // Polls and raffles
    pollData.toJSON(),
    raffleData.toJSON(),
  ];
}

/**
 * tidewatch — src/commands/mute/index.ts
 * WHAT: Barrel for the mute command family.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

export { muteData, executeMute, unmuteData, executeUnmute } from "./server.js";
export {
  muteChannelData,
  executeMuteChannel,
  unmuteChannelData,
  executeUnmuteChannel,
} from "./channel.js";
export { activeMutesData, executeActiveMutes } from "./active.js";

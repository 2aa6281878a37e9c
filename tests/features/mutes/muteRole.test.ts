/**
 * tidewatch — tests/features/mutes/muteRole.test.ts
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, beforeEach } from "vitest";
import { checkForMuteRole } from "../../../src/features/mutes/muteRole.js";
import { getGuildSettings, updateGuildSettings } from "../../../src/store/guildSettingsStore.js";
import { GUILD_ID, createMockGuild, createMockInteraction, createMockRole, sentContents } from "../../utils/discordMocks.js";
import { resetDb } from "../../utils/dbFixtures.js";

const ROLE_ID = "300000000000000001";

function press(customId: string) {
  return { customId, update: async () => undefined };
}

describe("checkForMuteRole", () => {
  beforeEach(resetDb);

  it("passes when the mute role exists", async () => {
    updateGuildSettings(GUILD_ID, { muteRoleId: ROLE_ID });
    const guild = createMockGuild();
    guild.roles.cache.set(ROLE_ID, createMockRole());
    const { typed } = createMockInteraction({ guild });

    await expect(checkForMuteRole(typed, guild, true)).resolves.toBe(true);
  });

  it("stops with setup instructions when role mutes are forced", async () => {
    const guild = createMockGuild();
    const { interaction, typed } = createMockInteraction({ guild });

    await expect(checkForMuteRole(typed, guild, true)).resolves.toBe(false);
    expect(sentContents(interaction)).toEqual([
      "This server does not have a mute role setup. You can setup a mute role with `/muteset role` or " +
        "`/muteset makerole` if you just want a basic role created setup.",
    ]);
  });

  it("remembers an accepted overwrite warning", async () => {
    const guild = createMockGuild();
    const { typed, message } = createMockInteraction({ guild });
    message.awaitMessageComponent.mockResolvedValue(press("confirm:700000000000000001:yes"));

    await expect(checkForMuteRole(typed, guild, false)).resolves.toBe(true);
    expect(getGuildSettings(GUILD_ID).muteSentInstructions).toBe(true);

    await expect(checkForMuteRole(typed, guild, false)).resolves.toBe(true);
    expect(message.awaitMessageComponent).toHaveBeenCalledTimes(1);
  });

  it("backs out when the warning is declined", async () => {
    const guild = createMockGuild();
    const { interaction, typed, message } = createMockInteraction({ guild });
    message.awaitMessageComponent.mockResolvedValue(press("confirm:700000000000000001:no"));

    await expect(checkForMuteRole(typed, guild, false)).resolves.toBe(false);
    expect(sentContents(interaction).at(-1)).toBe("Okay I will not mute this user.");
    expect(getGuildSettings(GUILD_ID).muteSentInstructions).toBe(false);
  });
});

/**
 * tidewatch — tests/commands/muteset.test.ts
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, beforeEach, vi } from "vitest";
import { applyMuteRoleOverwrites, muteSettingsText } from "../../src/commands/muteset.js";
import { updateGuildSettings } from "../../src/store/guildSettingsStore.js";
import {
  GUILD_ID,
  createMockChannel,
  createMockGuild,
  createMockRole,
  discordError,
} from "../utils/discordMocks.js";
import { resetDb } from "../utils/dbFixtures.js";

describe("muteSettingsText", () => {
  beforeEach(() => {
    resetDb();
  });

  it("shows the defaults", () => {
    expect(muteSettingsText(createMockGuild())).toBe(
      "Mute Role: None\nNotification Channel: None\nDefault Time: None\nSend DM: false\nShow moderator: false"
    );
  });

  it("shows configured values", () => {
    const guild = createMockGuild();
    guild.roles.cache.set("300000000000000001", createMockRole());
    updateGuildSettings(GUILD_ID, {
      muteRoleId: "300000000000000001",
      muteNotificationChannelId: "499",
      muteDefaultTime: 3600,
      muteDm: true,
    });

    expect(muteSettingsText(guild)).toBe(
      "Mute Role: <@&300000000000000001>\nNotification Channel: None\nDefault Time: 1 hour\nSend DM: true\nShow moderator: false"
    );
  });
});

describe("applyMuteRoleOverwrites", () => {
  it("denies the muted permissions and returns the channels it could not update", async () => {
    const guild = createMockGuild();
    const role = createMockRole();
    const ok = createMockChannel({ id: "400000000000000001" });
    const denied = createMockChannel({ id: "400000000000000002" });
    const locked = createMockChannel({
      id: "400000000000000003",
      permissionsFor: vi.fn().mockReturnValue({ has: vi.fn().mockReturnValue(false) }),
    });
    vi.mocked(denied.permissionOverwrites.edit).mockRejectedValue(discordError(50013));
    guild.channels.cache.set(ok.id, ok);
    guild.channels.cache.set(denied.id, denied);
    guild.channels.cache.set(locked.id, locked);

    expect(await applyMuteRoleOverwrites(guild, role)).toEqual([
      "<#400000000000000002>",
      "<#400000000000000003>",
    ]);
    expect(ok.permissionOverwrites.edit).toHaveBeenCalledWith(
      role,
      { SendMessages: false, AddReactions: false, Speak: false },
      { reason: "Mute role setup" }
    );
    expect(locked.permissionOverwrites.edit).not.toHaveBeenCalled();
  });
});

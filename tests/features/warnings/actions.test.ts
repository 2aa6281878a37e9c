/**
 * tidewatch — tests/features/warnings/actions.test.ts
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, beforeEach, vi } from "vitest";
import { Collection } from "discord.js";
import {
  applyDropAction,
  applyExceedAction,
  DROP_REASON,
  THRESHOLD_REASON,
} from "../../../src/features/warnings/actions.js";
import { updateGuildSettings } from "../../../src/store/guildSettingsStore.js";
import { getCase } from "../../../src/store/caseStore.js";
import { upsertServerMute } from "../../../src/store/muteStore.js";
import type { WarnAction } from "../../../src/store/warningStore.js";
import {
  BOT_ID,
  GUILD_ID,
  createMockGuild,
  createMockMember,
  createMockRole,
  createMockUser,
  discordError,
} from "../../utils/discordMocks.js";
import { resetDb } from "../../utils/dbFixtures.js";

const ROLE_ID = "300000000000000001";
const TARGET_ID = "200000000000000001";
const MOD_ID = "200000000000000002";

function action(exceedAction: WarnAction["exceedAction"], dropAction: WarnAction["dropAction"] = "none"): WarnAction {
  return { name: exceedAction, points: 5, exceedAction, dropAction };
}

function setup() {
  const me = {
    id: BOT_ID,
    user: createMockUser({ id: BOT_ID, bot: true }),
    permissions: { has: vi.fn().mockReturnValue(true) },
    roles: { highest: { position: 10 } },
  };
  const guild = createMockGuild({
    members: { me, cache: new Collection(), fetch: vi.fn(), ban: vi.fn().mockResolvedValue(undefined) },
  });
  guild.roles.cache.set(ROLE_ID, createMockRole({ id: ROLE_ID, position: 3 }));
  const moderator = createMockMember(guild, { id: MOD_ID, highestPosition: 5 });
  const member = createMockMember(guild, { id: TARGET_ID, highestPosition: 1 });
  return { guild, moderator, member };
}

describe("applyExceedAction", () => {
  beforeEach(() => {
    resetDb();
    updateGuildSettings(GUILD_ID, { muteRoleId: ROLE_ID });
  });

  it("does nothing for none", async () => {
    const { guild, moderator, member } = setup();
    await expect(applyExceedAction(guild, moderator, member, action("none"))).resolves.toBeNull();
    expect(getCase(GUILD_ID, 1)).toBeNull();
  });

  it("mutes and opens a case", async () => {
    const { guild, moderator, member } = setup();

    await expect(applyExceedAction(guild, moderator, member, action("mute"))).resolves.toBeNull();

    expect(member.roles.add).toHaveBeenCalledWith(guild.roles.cache.get(ROLE_ID), THRESHOLD_REASON);
    expect(getCase(GUILD_ID, 1)).toMatchObject({ action: "smute", moderatorId: MOD_ID, reason: THRESHOLD_REASON });
  });

  it("returns the mute issue when the mute fails", async () => {
    const { guild, moderator } = setup();
    const admin = createMockMember(guild, {
      id: TARGET_ID,
      highestPosition: 1,
      permissions: { has: vi.fn().mockReturnValue(true) },
    });

    await expect(applyExceedAction(guild, moderator, admin, action("mute"))).resolves.toBe(
      "That user cannot be (un)muted, as they have the Administrator permission."
    );
  });

  it("kicks when the member is kickable", async () => {
    const { guild, moderator, member } = setup();

    await applyExceedAction(guild, moderator, member, action("kick"));

    expect(member.kick).toHaveBeenCalledWith(THRESHOLD_REASON);
    expect(getCase(GUILD_ID, 1)?.action).toBe("kick");
  });

  it("explains an unkickable member", async () => {
    const { guild, moderator } = setup();
    const member = createMockMember(guild, { id: TARGET_ID, kickable: false });

    await expect(applyExceedAction(guild, moderator, member, action("kick"))).resolves.toBe(
      "I couldn't kick testuser#0001: I lack the permission or they are above me."
    );
  });

  it("maps a refused ban to the permission note", async () => {
    const { guild, moderator, member } = setup();
    vi.mocked(guild.members.ban).mockRejectedValue(discordError(50013));

    await expect(applyExceedAction(guild, moderator, member, action("ban"))).resolves.toBe(
      "I couldn't ban testuser#0001: I lack the permission or they are above me."
    );
    expect(getCase(GUILD_ID, 1)).toBeNull();
  });
});

describe("applyDropAction", () => {
  beforeEach(() => {
    resetDb();
    updateGuildSettings(GUILD_ID, { muteRoleId: ROLE_ID });
  });

  it("unmutes and opens a case", async () => {
    const { guild, moderator, member } = setup();
    upsertServerMute({ guildId: GUILD_ID, userId: TARGET_ID, authorId: MOD_ID, until: null });

    await expect(applyDropAction(guild, moderator, member, action("mute", "unmute"))).resolves.toBeNull();

    expect(member.roles.remove).toHaveBeenCalledWith(guild.roles.cache.get(ROLE_ID), DROP_REASON);
    expect(getCase(GUILD_ID, 1)).toMatchObject({ action: "sunmute", reason: DROP_REASON });
  });

  it("does nothing for none", async () => {
    const { guild, moderator, member } = setup();
    await expect(applyDropAction(guild, moderator, member, action("mute", "none"))).resolves.toBeNull();
    expect(member.roles.remove).not.toHaveBeenCalled();
  });
});

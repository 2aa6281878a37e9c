/**
 * tidewatch — tests/features/mutes/manager.test.ts
 * WHAT: Role and overwrite mute paths, their checks and Discord error mapping.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, beforeEach, vi } from "vitest";
import { Collection, PermissionFlagsBits, PermissionsBitField, type Guild, type NonThreadGuildBasedChannel } from "discord.js";
import {
  channelMuteUser,
  isAllowedByHierarchy,
  muteUser,
  unmuteUser,
} from "../../../src/features/mutes/manager.js";
import { updateGuildSettings } from "../../../src/store/guildSettingsStore.js";
import { getChannelMute, getPermsCacheEntry, getServerMute } from "../../../src/store/muteStore.js";
import {
  BOT_ID,
  GUILD_ID,
  createMockChannel,
  createMockGuild,
  createMockMember,
  createMockRole,
  createMockUser,
  discordError,
} from "../../utils/discordMocks.js";
import { resetDb } from "../../utils/dbFixtures.js";

const MOD_ID = "200000000000000002";
const TARGET_ID = "200000000000000001";
const ROLE_ID = "300000000000000001";

function botMember(canManageRoles = true) {
  return {
    id: BOT_ID,
    user: createMockUser({ id: BOT_ID, bot: true }),
    permissions: { has: vi.fn().mockReturnValue(canManageRoles) },
    roles: { highest: { position: 10 } },
  };
}

function guildWith(me = botMember()): Guild {
  return createMockGuild({ members: { me, cache: new Collection(), fetch: vi.fn() } });
}

/** Overwrite-capable channel; the bot may manage it, members are never admins there. */
function overwriteChannel(id: string, extra: Record<string, unknown> = {}): NonThreadGuildBasedChannel {
  return createMockChannel({
    id,
    permissionsFor: vi.fn().mockReturnValue({
      has: (flag: bigint) => flag === PermissionFlagsBits.ManageRoles || flag === PermissionFlagsBits.MoveMembers,
    }),
    ...extra,
  }) as unknown as NonThreadGuildBasedChannel;
}

describe("isAllowedByHierarchy", () => {
  it("needs a strictly higher top role", () => {
    const guild = guildWith();
    const target = createMockMember(guild, { id: TARGET_ID, highestPosition: 5 });

    expect(isAllowedByHierarchy(guild, createMockMember(guild, { id: MOD_ID, highestPosition: 6 }), target)).toBe(true);
    expect(isAllowedByHierarchy(guild, createMockMember(guild, { id: MOD_ID, highestPosition: 5 }), target)).toBe(false);
  });

  it("lets the guild owner and bot owners through", () => {
    const guild = guildWith();
    const target = createMockMember(guild, { id: TARGET_ID, highestPosition: 9 });

    expect(isAllowedByHierarchy(guild, createMockMember(guild, { id: "200000000000000009", highestPosition: 1 }), target)).toBe(true);
    expect(isAllowedByHierarchy(guild, createMockMember(guild, { id: "900000000000000001", highestPosition: 1 }), target)).toBe(true);
  });
});

describe("muteUser with a mute role", () => {
  beforeEach(() => {
    resetDb();
    updateGuildSettings(GUILD_ID, { muteRoleId: ROLE_ID });
  });

  function setup(rolePosition = 3) {
    const guild = guildWith();
    guild.roles.cache.set(ROLE_ID, createMockRole({ id: ROLE_ID, position: rolePosition }));
    const author = createMockMember(guild, { id: MOD_ID, highestPosition: 5 });
    const target = createMockMember(guild, { id: TARGET_ID, highestPosition: 1 });
    return { guild, author, target };
  }

  it("adds the role and records the mute", async () => {
    const { guild, author, target } = setup();

    const result = await muteUser(guild, author, target, 1_700_000_000, "spam");

    expect(result).toMatchObject({ success: true, reason: null, channels: [] });
    expect(target.roles.add).toHaveBeenCalledWith(guild.roles.cache.get(ROLE_ID), "spam");
    expect(getServerMute(GUILD_ID, TARGET_ID)).toEqual({
      guildId: GUILD_ID,
      userId: TARGET_ID,
      authorId: MOD_ID,
      until: 1_700_000_000,
    });
  });

  it("refuses administrators", async () => {
    const { guild, author } = setup();
    const admin = createMockMember(guild, {
      id: TARGET_ID,
      highestPosition: 1,
      permissions: { has: vi.fn().mockReturnValue(true) },
    });

    expect((await muteUser(guild, author, admin, null, null)).reason).toBe("is_admin");
  });

  it("refuses a role at or above the moderator's top role", async () => {
    const { guild, author, target } = setup(5);
    expect((await muteUser(guild, author, target, null, null)).reason).toBe("assigned_role_hierarchy_problem");
  });

  it("reports a deleted role", async () => {
    const { guild, author, target } = setup();
    guild.roles.cache.delete(ROLE_ID);
    expect((await muteUser(guild, author, target, null, null)).reason).toBe("role_missing");
  });

  it("drops the record when Discord refuses the role", async () => {
    const { guild, author, target } = setup();
    vi.mocked(target.roles.add).mockRejectedValue(discordError(50013));

    const result = await muteUser(guild, author, target, null, null);

    expect(result.reason).toBe("permissions_issue_role");
    expect(getServerMute(GUILD_ID, TARGET_ID)).toBeNull();
  });

  it("unmutes by removing the role", async () => {
    const { guild, author, target } = setup();
    await muteUser(guild, author, target, null, null);

    const result = await unmuteUser(guild, author, target, "appeal");

    expect(result.success).toBe(true);
    expect(target.roles.remove).toHaveBeenCalledWith(guild.roles.cache.get(ROLE_ID), "appeal");
    expect(getServerMute(GUILD_ID, TARGET_ID)).toBeNull();
  });
});

describe("muteUser with overwrites", () => {
  beforeEach(resetDb);

  it("mutes in every channel and reports the ones that failed", async () => {
    const guild = guildWith();
    const ok = overwriteChannel("400000000000000001");
    const denied = overwriteChannel("400000000000000002");
    vi.mocked(denied.permissionOverwrites.edit).mockRejectedValue(discordError(50013));
    guild.channels.cache.set(ok.id, ok);
    guild.channels.cache.set(denied.id, denied);
    const author = createMockMember(guild, { id: MOD_ID, highestPosition: 5 });
    const target = createMockMember(guild, { id: TARGET_ID, highestPosition: 1 });

    const result = await muteUser(guild, author, target, null, "spam");

    expect(result.success).toBe(true);
    expect(result.channels).toEqual([[denied, "permissions_issue_channel"]]);
    expect(ok.permissionOverwrites.edit).toHaveBeenCalledWith(
      target,
      { SendMessages: false, AddReactions: false, Speak: false },
      { reason: "spam" }
    );
    expect(getChannelMute(ok.id, TARGET_ID)?.authorId).toBe(MOD_ID);
    expect(getChannelMute(denied.id, TARGET_ID)).toBeNull();
    expect(getPermsCacheEntry(GUILD_ID, TARGET_ID, ok.id)).toEqual({
      sendMessages: null,
      addReactions: null,
      speak: null,
    });
  });

  it("keeps the perms cache for muted channels when another channel has no access", async () => {
    const guild = guildWith();
    const ok = overwriteChannel("400000000000000001");
    ok.permissionOverwrites.cache.set(TARGET_ID, {
      allow: new PermissionsBitField(PermissionFlagsBits.SendMessages),
      deny: new PermissionsBitField(0n),
    } as never);
    const hidden = overwriteChannel("400000000000000002");
    vi.mocked(hidden.permissionOverwrites.edit).mockRejectedValue(discordError(50001, 403, "Missing Access"));
    guild.channels.cache.set(ok.id, ok);
    guild.channels.cache.set(hidden.id, hidden);
    const author = createMockMember(guild, { id: MOD_ID, highestPosition: 5 });
    const target = createMockMember(guild, { id: TARGET_ID, highestPosition: 1 });

    const result = await muteUser(guild, author, target, null, null);

    expect(result.success).toBe(true);
    expect(result.channels).toEqual([[hidden, "permissions_issue_channel"]]);
    expect(getChannelMute(ok.id, TARGET_ID)?.authorId).toBe(MOD_ID);
    expect(getPermsCacheEntry(GUILD_ID, TARGET_ID, ok.id)).toEqual({
      sendMessages: true,
      addReactions: null,
      speak: null,
    });
  });

  it("reports an unrecognised Discord error per channel and finishes the rest", async () => {
    const guild = guildWith();
    const ok = overwriteChannel("400000000000000001");
    const broken = overwriteChannel("400000000000000002");
    vi.mocked(broken.permissionOverwrites.edit).mockRejectedValue(discordError(50035, 400, "Invalid Form Body"));
    guild.channels.cache.set(ok.id, ok);
    guild.channels.cache.set(broken.id, broken);
    const author = createMockMember(guild, { id: MOD_ID, highestPosition: 5 });
    const target = createMockMember(guild, { id: TARGET_ID, highestPosition: 1 });

    const result = await muteUser(guild, author, target, null, null);

    expect(result.channels).toEqual([[broken, "unknown_error"]]);
    expect(getChannelMute(broken.id, TARGET_ID)).toBeNull();
    expect(getPermsCacheEntry(GUILD_ID, TARGET_ID, ok.id)).toEqual({
      sendMessages: null,
      addReactions: null,
      speak: null,
    });
  });

  it("lifts the remaining channels when one unmute is rejected", async () => {
    const guild = guildWith();
    const ok = overwriteChannel("400000000000000001");
    const broken = overwriteChannel("400000000000000002");
    guild.channels.cache.set(ok.id, ok);
    guild.channels.cache.set(broken.id, broken);
    const author = createMockMember(guild, { id: MOD_ID, highestPosition: 5 });
    const target = createMockMember(guild, { id: TARGET_ID, highestPosition: 1 });
    await muteUser(guild, author, target, null, null);
    vi.mocked(broken.permissionOverwrites.delete).mockRejectedValue(discordError(50035, 400, "Invalid Form Body"));

    const result = await unmuteUser(guild, author, target, null);

    expect(result.success).toBe(true);
    expect(result.channels).toEqual([[broken, "unknown_error"]]);
    expect(ok.permissionOverwrites.delete).toHaveBeenCalledWith(target, undefined);
  });

  it("lifts tracked overwrites and deletes an overwrite left empty", async () => {
    const guild = guildWith();
    const channel = overwriteChannel("400000000000000001");
    guild.channels.cache.set(channel.id, channel);
    const author = createMockMember(guild, { id: MOD_ID, highestPosition: 5 });
    const target = createMockMember(guild, { id: TARGET_ID, highestPosition: 1 });
    await muteUser(guild, author, target, null, null);

    const result = await unmuteUser(guild, author, target, "done");

    expect(result).toMatchObject({ success: true, reason: null, channels: [] });
    expect(channel.permissionOverwrites.delete).toHaveBeenCalledWith(target, "done");
    expect(getChannelMute(channel.id, TARGET_ID)).toBeNull();
    expect(getPermsCacheEntry(GUILD_ID, TARGET_ID, channel.id)).toBeNull();
  });

  it("says already unmuted when nothing is tracked", async () => {
    const guild = guildWith();
    const author = createMockMember(guild, { id: MOD_ID, highestPosition: 5 });
    const target = createMockMember(guild, { id: TARGET_ID, highestPosition: 1 });

    expect((await unmuteUser(guild, author, target, null)).reason).toBe("already_unmuted");
  });
});

describe("channelMuteUser", () => {
  beforeEach(resetDb);

  it("refuses a second mute in the same channel", async () => {
    const guild = guildWith();
    const channel = overwriteChannel("400000000000000001");
    const author = createMockMember(guild, { id: MOD_ID, highestPosition: 5 });
    const target = createMockMember(guild, { id: TARGET_ID, highestPosition: 1 });

    await channelMuteUser(guild, channel, author, target, null, null);
    const again = await channelMuteUser(guild, channel, author, target, null, null);

    expect(again).toMatchObject({ success: false, reason: "already_muted" });
  });

  it("notes a voice member it could not move", async () => {
    const guild = guildWith();
    const channel = overwriteChannel("400000000000000003", {
      isVoiceBased: () => true,
      permissionsFor: vi.fn().mockReturnValue({ has: (flag: bigint) => flag === PermissionFlagsBits.ManageRoles }),
    });
    const author = createMockMember(guild, { id: MOD_ID, highestPosition: 5 });
    const target = createMockMember(guild, {
      id: TARGET_ID,
      highestPosition: 1,
      voice: { channelId: "400000000000000003", setChannel: vi.fn() },
    });

    const result = await channelMuteUser(guild, channel, author, target, null, null);

    expect(result).toMatchObject({ success: true, reason: "voice_mute_permission" });
    expect(target.voice.setChannel).not.toHaveBeenCalled();
  });

  it("moves a connected voice member so the overwrite applies", async () => {
    const guild = guildWith();
    const channel = overwriteChannel("400000000000000003", { isVoiceBased: () => true });
    const author = createMockMember(guild, { id: MOD_ID, highestPosition: 5 });
    const target = createMockMember(guild, {
      id: TARGET_ID,
      highestPosition: 1,
      voice: { channelId: "400000000000000003", setChannel: vi.fn().mockResolvedValue(undefined) },
    });

    const result = await channelMuteUser(guild, channel, author, target, null, null);

    expect(result).toMatchObject({ success: true, reason: null });
    expect(target.voice.setChannel).toHaveBeenCalledWith(channel);
  });
});

/**
 * tidewatch — tests/commands/osutrack.test.ts
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { ChannelType } from "discord.js";
import { configureOsuTracking, data, execute, trackingListLines } from "../../src/commands/osutrack.js";
import type { OsuApiClient } from "../../src/features/osu/api.js";
import { addTracking, listGuildTracking } from "../../src/store/osuStore.js";
import { GUILD_ID, createMockChannel, createMockInteraction, sentContents } from "../utils/discordMocks.js";
import { createTestCommandContext } from "../utils/contextFactory.js";
import { resetDb } from "../utils/dbFixtures.js";

function services() {
  const deps = {
    api: { user: vi.fn<OsuApiClient["user"]>() },
    tracker: { refresh: vi.fn() },
  };
  configureOsuTracking(deps);
  return deps;
}

async function run(subcommand: string, options: Record<string, string | ReturnType<typeof createMockChannel>> = {}) {
  const mock = createMockInteraction({ commandName: "osutrack", subcommand, options });
  await execute(createTestCommandContext(mock.typed));
  return mock;
}

describe("trackingListLines", () => {
  it("shows player, mode and channel", () => {
    expect(
      trackingListLines([{ mode: "mania", osuUserId: 42, guildId: GUILD_ID, channelId: "401" }])
    ).toEqual(["42 ◈ Mania ◈ <#401>"]);
  });
});

describe("/osutrack", () => {
  beforeEach(() => {
    resetDb();
  });

  afterEach(() => {
    configureOsuTracking(null);
  });

  it("refuses when tracking isn't configured", async () => {
    const { interaction } = await run("add", { mode: "osu", player: "player" });
    expect(sentContents(interaction)).toEqual(["osu! tracking is not configured on this bot."]);
  });

  it("rejects an unknown mode", async () => {
    const deps = services();
    const { interaction } = await run("add", { mode: "chess", player: "player" });

    expect(sentContents(interaction)).toEqual(["Mode given is invalid."]);
    expect(deps.api.user).not.toHaveBeenCalled();
  });

  it("adds a player and wakes the tracker", async () => {
    const deps = services();
    deps.api.user.mockResolvedValue({ id: 42, username: "player", avatar_url: "https://a.example/avatar.png" });
    const channel = createMockChannel({ id: "401" });

    const { interaction } = await run("add", { mode: "std", player: "https://osu.ppy.sh/users/42", channel });

    expect(deps.api.user).toHaveBeenCalledWith("42", "osu");
    expect(interaction.deferReply).toHaveBeenCalled();
    expect(sentContents(interaction)).toEqual(["Now tracking top 100 plays for player in <#401>"]);
    expect(listGuildTracking(GUILD_ID)).toEqual([
      { mode: "osu", osuUserId: 42, guildId: GUILD_ID, channelId: "401" },
    ]);
    expect(deps.tracker.refresh).toHaveBeenCalledTimes(1);
  });

  it("stops at 25 tracked players per server", async () => {
    const deps = services();
    for (let osuUserId = 1; osuUserId <= 25; osuUserId++) {
      addTracking({ mode: "osu", osuUserId, guildId: GUILD_ID, channelId: "401" });
    }
    deps.api.user.mockResolvedValue({ id: 99, username: "newcomer", avatar_url: "https://a.example/avatar.png" });

    const { interaction } = await run("add", { mode: "osu", player: "newcomer", channel: createMockChannel() });

    expect(sentContents(interaction)).toEqual([
      "Already tracking 25 users in this server. Please remove some before adding more.",
    ]);
    expect(listGuildTracking(GUILD_ID)).toHaveLength(25);
    expect(deps.tracker.refresh).not.toHaveBeenCalled();
  });

  it("accepts voice, stage and thread channels for posts", () => {
    const add = data.toJSON().options?.find((option) => option.name === "add");
    const channelOption = add && "options" in add ? add.options?.find((o) => o.name === "channel") : undefined;

    expect(channelOption && "channel_types" in channelOption ? channelOption.channel_types : []).toEqual([
      ChannelType.GuildText,
      ChannelType.GuildAnnouncement,
      ChannelType.GuildVoice,
      ChannelType.GuildStageVoice,
      ChannelType.PublicThread,
      ChannelType.PrivateThread,
      ChannelType.AnnouncementThread,
    ]);
  });

  it("reports players osu! doesn't know", async () => {
    const deps = services();
    deps.api.user.mockResolvedValue(null);

    const { interaction } = await run("add", { mode: "osu", player: "nobody", channel: createMockChannel() });

    expect(sentContents(interaction)).toEqual(["Could not find the user nobody."]);
    expect(listGuildTracking(GUILD_ID)).toEqual([]);
  });

  it("removes a tracked player", async () => {
    const deps = services();
    deps.api.user.mockResolvedValue({ id: 42, username: "player", avatar_url: "https://a.example/avatar.png" });
    addTracking({ mode: "taiko", osuUserId: 42, guildId: GUILD_ID, channelId: "401" });

    const { interaction } = await run("remove", { mode: "taiko", player: "player" });

    expect(sentContents(interaction)).toEqual(["Stopped tracking player in osu!Taiko"]);
    expect(listGuildTracking(GUILD_ID)).toEqual([]);
    expect(deps.tracker.refresh).toHaveBeenCalledTimes(1);
  });

  it("says when the player wasn't tracked", async () => {
    const deps = services();
    deps.api.user.mockResolvedValue({ id: 42, username: "player", avatar_url: "https://a.example/avatar.png" });

    const { interaction } = await run("remove", { mode: "osu", player: "player" });

    expect(sentContents(interaction)).toEqual(["player isn't being tracked in this server."]);
    expect(deps.tracker.refresh).not.toHaveBeenCalled();
  });

  it("lists nobody for an empty server", async () => {
    const { interaction } = await run("list");
    expect(sentContents(interaction)).toEqual(["Nobody is being tracked in this server."]);
  });

  it("lists tracked players in an embed", async () => {
    addTracking({ mode: "osu", osuUserId: 42, guildId: GUILD_ID, channelId: "401" });
    addTracking({ mode: "mania", osuUserId: 42, guildId: GUILD_ID, channelId: "402" });

    const { interaction } = await run("list");

    const embed = interaction.reply.mock.calls[0]?.[0].embeds[0].toJSON();
    expect(embed.author.name).toBe("1 players are being tracked in this server.");
    expect(embed.description.split("\n").sort()).toEqual(["42 ◈ Mania ◈ <#402>", "42 ◈ Standard ◈ <#401>"]);
  });
});

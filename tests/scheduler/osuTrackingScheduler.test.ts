/**
 * tidewatch — tests/scheduler/osuTrackingScheduler.test.ts
 * WHAT: Seeding, posting and failure handling of the osu! tracker.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, beforeEach, vi } from "vitest";
import type { OsuApiClient } from "../../src/features/osu/api.js";
import {
  ApiFailingError,
  OsuTracker,
  type TrackingTarget,
} from "../../src/scheduler/osuTrackingScheduler.js";
import { addTracking, getSnapshot, listGuildTracking, loadTrackingCache } from "../../src/store/osuStore.js";
import { GUILD_ID } from "../utils/discordMocks.js";
import { resetDb } from "../utils/dbFixtures.js";
import { makeApiScore } from "../utils/osuFixtures.js";

const OTHER_GUILD_ID = "100000000000000002";

function setup() {
  const api = {
    userBestScores: vi.fn<OsuApiClient["userBestScores"]>(),
    seasonalBackgrounds: vi.fn<OsuApiClient["seasonalBackgrounds"]>(),
  };
  const channels = new Map<string, { send: ReturnType<typeof vi.fn> }>();
  const fetchChannel = vi.fn<(channelId: string) => Promise<TrackingTarget | null>>(async (channelId) => {
    const existing = channels.get(channelId);
    if (existing) return existing;
    const channel = { send: vi.fn().mockResolvedValue(undefined) };
    channels.set(channelId, channel);
    return channel;
  });
  // every sleep ends the run loop, so start() returns right after seeding
  const tracker: OsuTracker = new OsuTracker({
    api,
    fetchChannel,
    sleep: async () => {
      tracker.stop();
    },
  });
  return { api, fetchChannel, channels, tracker };
}

const signal = () => new AbortController().signal;

describe("OsuTracker", () => {
  beforeEach(() => {
    resetDb();
  });

  it("stays idle when nobody is tracked", async () => {
    const { api, tracker } = setup();

    await tracker.start();

    expect(api.userBestScores).not.toHaveBeenCalled();
    expect(tracker.running).toBe(false);
  });

  it("seeds snapshots on start without posting", async () => {
    const { api, fetchChannel, tracker } = setup();
    addTracking({ mode: "osu", osuUserId: 42, guildId: GUILD_ID, channelId: "401" });
    api.userBestScores.mockResolvedValue([makeApiScore(1)]);

    await tracker.start();

    expect(api.userBestScores).toHaveBeenCalledWith(42, "osu");
    expect(getSnapshot("osu", 42)?.map((s) => s.beatmap.id)).toEqual([1]);
    expect(fetchChannel).not.toHaveBeenCalled();
  });

  it("posts a new top play to every tracking channel", async () => {
    const { api, channels, tracker } = setup();
    addTracking({ mode: "osu", osuUserId: 42, guildId: GUILD_ID, channelId: "401" });
    addTracking({ mode: "osu", osuUserId: 42, guildId: OTHER_GUILD_ID, channelId: "402" });
    api.userBestScores.mockResolvedValue([makeApiScore(1)]);
    await tracker.start();

    api.userBestScores.mockResolvedValue([
      makeApiScore(2, { created_at: "2024-03-02T12:00:00Z" }),
      makeApiScore(1),
    ]);
    await tracker.cycle(signal());

    expect([...channels.keys()].sort()).toEqual(["401", "402"]);
    for (const channel of channels.values()) {
      expect(channel.send).toHaveBeenCalledTimes(1);
    }
    expect(getSnapshot("osu", 42)?.map((s) => s.beatmap.id)).toEqual([2, 1]);
  });

  it("posts nothing when the top list is unchanged", async () => {
    const { api, fetchChannel, tracker } = setup();
    addTracking({ mode: "osu", osuUserId: 42, guildId: GUILD_ID, channelId: "401" });
    api.userBestScores.mockResolvedValue([makeApiScore(1)]);
    await tracker.start();

    await tracker.cycle(signal());

    expect(fetchChannel).not.toHaveBeenCalled();
  });

  it("stops tracking in channels it can no longer reach", async () => {
    const { api, fetchChannel, tracker } = setup();
    addTracking({ mode: "osu", osuUserId: 42, guildId: GUILD_ID, channelId: "401" });
    api.userBestScores.mockResolvedValue([makeApiScore(1)]);
    await tracker.start();

    fetchChannel.mockResolvedValue(null);
    api.userBestScores.mockResolvedValue([makeApiScore(2), makeApiScore(1)]);
    await tracker.cycle(signal());

    expect(listGuildTracking(GUILD_ID)).toEqual([]);
    expect(tracker.trackedCount).toBe(0);
  });

  it("treats two cycles of nothing but failures as osu! being down", async () => {
    const { api, tracker } = setup();
    addTracking({ mode: "osu", osuUserId: 42, guildId: GUILD_ID, channelId: "401" });
    api.userBestScores.mockResolvedValue([makeApiScore(1)]);
    await tracker.start();

    api.userBestScores.mockRejectedValue(new Error("socket hang up"));
    await tracker.cycle(signal());
    await expect(tracker.cycle(signal())).rejects.toBeInstanceOf(ApiFailingError);
  });

  it("drops a player whose scores fail three cycles in a row while others load", async () => {
    const { api, tracker } = setup();
    addTracking({ mode: "osu", osuUserId: 42, guildId: GUILD_ID, channelId: "401" });
    addTracking({ mode: "osu", osuUserId: 43, guildId: GUILD_ID, channelId: "401" });
    api.userBestScores.mockResolvedValue([makeApiScore(1)]);
    await tracker.start();

    api.userBestScores.mockImplementation(async (userId) => {
      if (userId === 43) throw new Error("socket hang up");
      return [makeApiScore(1)];
    });
    await tracker.cycle(signal());
    await tracker.cycle(signal());
    expect(loadTrackingCache().get("osu")?.has(43)).toBe(true);

    await tracker.cycle(signal());
    expect(loadTrackingCache().get("osu")?.has(43)).toBe(false);
    expect(loadTrackingCache().get("osu")?.has(42)).toBe(true);
    expect(getSnapshot("osu", 43)).toBeNull();
  });

  it("keeps players whose failures are spread over different cycles", async () => {
    const { api, tracker } = setup();
    for (const osuUserId of [1, 2, 3]) {
      addTracking({ mode: "osu", osuUserId, guildId: GUILD_ID, channelId: "401" });
    }
    api.userBestScores.mockResolvedValue([makeApiScore(1)]);
    await tracker.start();

    for (const failing of [1, 2, 1, 2]) {
      api.userBestScores.mockImplementation(async (userId) => {
        if (userId === failing) throw new Error("socket hang up");
        return [makeApiScore(1)];
      });
      await tracker.cycle(signal());
    }

    expect([...(loadTrackingCache().get("osu")?.keys() ?? [])].sort()).toEqual([1, 2, 3]);
  });

  it("forgets a player's failures once their scores load again", async () => {
    const { api, tracker } = setup();
    addTracking({ mode: "osu", osuUserId: 42, guildId: GUILD_ID, channelId: "401" });
    addTracking({ mode: "osu", osuUserId: 43, guildId: GUILD_ID, channelId: "401" });
    api.userBestScores.mockResolvedValue([makeApiScore(1)]);
    await tracker.start();

    const failingFor43 = async (userId: number) => {
      if (userId === 43) throw new Error("socket hang up");
      return [makeApiScore(1)];
    };
    api.userBestScores.mockImplementation(failingFor43);
    await tracker.cycle(signal());
    await tracker.cycle(signal());
    api.userBestScores.mockResolvedValue([makeApiScore(1)]);
    await tracker.cycle(signal());
    api.userBestScores.mockImplementation(failingFor43);
    await tracker.cycle(signal());
    await tracker.cycle(signal());

    expect(loadTrackingCache().get("osu")?.has(43)).toBe(true);
  });
});

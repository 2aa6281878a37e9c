/**
 * tidewatch — tests/features/raffles/winners.test.ts
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi } from "vitest";
import {
  daysOnServer,
  drawAnnouncement,
  drawRaffle,
  drawWinners,
  meetsRequirements,
} from "../../../src/features/raffles/winners.js";
import type { Raffle } from "../../../src/store/raffleStore.js";
import { createMockGuild, createMockMember, createMockRole, discordError } from "../../utils/discordMocks.js";

const NOW = 1_700_000_000;

function raffle(overrides: Partial<Raffle> = {}): Raffle {
  return {
    messageId: "500000000000000201",
    guildId: "100000000000000001",
    channelId: "400000000000000001",
    hostId: "200000000000000002",
    title: "Gift card",
    description: null,
    winnerCount: 1,
    daysOnServer: 0,
    roleIds: [],
    endTime: NOW,
    endedAt: null,
    entries: [],
    winnerIds: [],
    ...overrides,
  };
}

/** Returns the given values in turn, then 0 */
function sequence(...values: number[]): () => number {
  let i = 0;
  return () => values[i++] ?? 0;
}

describe("drawWinners", () => {
  it("hands everyone a win when there aren't more entrants than winners", () => {
    expect(drawWinners(["a", "b"], 3)).toEqual(["a", "b"]);
  });

  it("samples without repeats", () => {
    expect(drawWinners(["a", "b", "c"], 2, [], sequence(0, 0))).toEqual(["a", "b"]);
    expect(drawWinners(["a", "b", "c"], 2, [], sequence(0.99, 0))).toEqual(["c", "b"]);
  });

  it("draws again when a reroll lands on the previous winners", () => {
    expect(drawWinners(["a", "b", "c"], 2, ["b", "a"], sequence(0, 0, 0.99, 0))).toEqual(["c", "b"]);
  });
});

describe("drawAnnouncement", () => {
  it("lists several winners and notes a short pool", () => {
    expect(drawAnnouncement(raffle({ winnerCount: 3 }), 2, ["a", "b"], false)).toBe(
      [
        "The winners for the **Gift card** raffle is:",
        "**1.** <@a>\n**2.** <@b>",
        "There was only **2** valid entries out of the **3** maximum allowed. So everyone is a winner!",
        ":tada::tada: Congratulations! :tada::tada:",
      ].join("\n\n")
    );
  });

  it("heads a reroll", () => {
    expect(drawAnnouncement(raffle(), 4, ["a"], true)).toBe(
      "Raffle has been rerolled!\n\nThe winner for the **Gift card** raffle is:\n\n<@a>\n\n:tada::tada: Congratulations! :tada::tada:"
    );
  });
});

describe("meetsRequirements", () => {
  const guild = createMockGuild();
  const tenDaysAgo = (NOW - 10 * 86_400) * 1000;

  it("counts whole days since joining", () => {
    const member = createMockMember(guild, { joinedTimestamp: tenDaysAgo + 1000 });
    expect(daysOnServer(member, NOW)).toBe(9);
  });

  it("checks membership age inclusively", () => {
    const member = createMockMember(guild, { joinedTimestamp: tenDaysAgo });
    expect(meetsRequirements(raffle({ daysOnServer: 10 }), member, NOW)).toBe(true);
    expect(meetsRequirements(raffle({ daysOnServer: 11 }), member, NOW)).toBe(false);
  });

  it("needs one of the allowed roles", () => {
    const member = createMockMember(guild, { joinedTimestamp: tenDaysAgo });
    const restricted = raffle({ roleIds: ["300000000000000005", "300000000000000006"] });
    expect(meetsRequirements(restricted, member, NOW)).toBe(false);

    member.roles.cache.set("300000000000000006", createMockRole({ id: "300000000000000006" }));
    expect(meetsRequirements(restricted, member, NOW)).toBe(true);
  });
});

describe("drawRaffle", () => {
  it("reports an empty raffle", async () => {
    await expect(drawRaffle(createMockGuild(), raffle())).resolves.toEqual({
      kind: "no_entries",
      text: "Seems like nobody entered the raffle for **Gift card** so no winner could be picked.",
    });
  });

  it("skips entrants who left the server", async () => {
    const guild = createMockGuild();
    vi.mocked(guild.members.fetch).mockRejectedValue(discordError(10007, 404, "Unknown Member"));

    await expect(drawRaffle(guild, raffle({ entries: ["200000000000000011"] }), { now: NOW })).resolves.toEqual({
      kind: "no_valid_entries",
      text: "Couldn't find any valid entries for the **Gift card** raffle so no winner could be picked.",
    });
  });

  it("draws from eligible entrants only", async () => {
    const guild = createMockGuild();
    const veteran = createMockMember(guild, { id: "200000000000000011", joinedTimestamp: (NOW - 30 * 86_400) * 1000 });
    const newcomer = createMockMember(guild, { id: "200000000000000012", joinedTimestamp: (NOW - 86_400) * 1000 });
    guild.members.cache.set(veteran.id, veteran);
    guild.members.cache.set(newcomer.id, newcomer);

    const draw = await drawRaffle(
      guild,
      raffle({ entries: [newcomer.id, veteran.id], daysOnServer: 7, winnerCount: 1 }),
      { now: NOW, random: () => 0 }
    );

    expect(draw).toEqual({
      kind: "drawn",
      winnerIds: ["200000000000000011"],
      text: "The winner for the **Gift card** raffle is:\n\n<@200000000000000011>\n\n:tada::tada: Congratulations! :tada::tada:",
    });
  });
});

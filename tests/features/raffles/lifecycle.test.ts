/**
 * tidewatch — tests/features/raffles/lifecycle.test.ts
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, beforeEach, vi } from "vitest";
import type { Guild, TextChannel } from "discord.js";
import { cancelRaffle, endRaffle, rerollRaffle } from "../../../src/features/raffles/lifecycle.js";
import { createRaffle, getRaffle, toggleRaffleEntry, type Raffle } from "../../../src/store/raffleStore.js";
import {
  GUILD_ID,
  createMockChannel,
  createMockGuild,
  createMockMember,
  discordError,
} from "../../utils/discordMocks.js";
import { resetDb } from "../../utils/dbFixtures.js";

const MESSAGE_ID = "500000000000000201";
const ALICE = "200000000000000011";
const BOB = "200000000000000012";

function stored(): Raffle {
  const raffle = getRaffle(MESSAGE_ID);
  if (!raffle) throw new Error("raffle missing");
  return raffle;
}

function seed(entries: string[] = [ALICE, BOB]): Raffle {
  createRaffle({
    messageId: MESSAGE_ID,
    guildId: GUILD_ID,
    channelId: "400000000000000001",
    hostId: "200000000000000002",
    title: "Gift card",
    description: null,
    winnerCount: 1,
    daysOnServer: 0,
    roleIds: [],
    endTime: 1_000,
  });
  for (const id of entries) toggleRaffleEntry(MESSAGE_ID, id);
  return stored();
}

function setup(): { guild: Guild; channel: TextChannel; edit: ReturnType<typeof vi.fn> } {
  const guild = createMockGuild();
  const channel = createMockChannel();
  const edit = vi.fn().mockResolvedValue(undefined);
  vi.mocked(channel.messages.fetch).mockResolvedValue({ id: MESSAGE_ID, edit } as never);
  guild.channels.cache.set(channel.id, channel);
  for (const id of [ALICE, BOB]) guild.members.cache.set(id, createMockMember(guild, { id }));
  return { guild, channel, edit };
}

function sentAt(channel: TextChannel, call: number): unknown {
  return vi.mocked(channel.send).mock.calls[call]?.[0];
}

describe("endRaffle", () => {
  beforeEach(resetDb);

  it("announces the winner under the raffle and stores the result", async () => {
    const raffle = seed();
    const { guild, channel, edit } = setup();

    const outcome = await endRaffle(guild, raffle, { now: 1_500, random: () => 0 });

    expect(outcome).toMatchObject({ kind: "drawn", winnerIds: [ALICE] });
    const [edited] = edit.mock.calls[0] ?? [];
    expect(edited.components).toEqual([]);
    expect(edited.embeds[0].toJSON().fields.at(-1)).toEqual({
      name: "Winners",
      value: `<@${ALICE}>`,
      inline: false,
    });
    expect(sentAt(channel, 0)).toEqual({
      content: `The winner for the **Gift card** raffle is:\n\n<@${ALICE}>\n\n:tada::tada: Congratulations! :tada::tada:`,
      reply: { messageReference: MESSAGE_ID, failIfNotExists: false },
      allowedMentions: { users: [ALICE] },
    });
    expect(stored()).toMatchObject({ endedAt: 1_500, winnerIds: [ALICE] });
  });

  it("closes an empty raffle without winners", async () => {
    const raffle = seed([]);
    const { guild, channel } = setup();

    await expect(endRaffle(guild, raffle, { now: 1_500 })).resolves.toMatchObject({ kind: "no_entries" });

    expect(sentAt(channel, 0)).toMatchObject({
      content: "Seems like nobody entered the raffle for **Gift card** so no winner could be picked.",
    });
    expect(stored()).toMatchObject({ endedAt: 1_500, winnerIds: [] });
  });

  it("drops a raffle whose channel was deleted", async () => {
    const raffle = seed();
    const guild = createMockGuild();
    vi.mocked(guild.channels.fetch).mockRejectedValue(discordError(10003, 404, "Unknown Channel"));

    await expect(endRaffle(guild, raffle)).resolves.toEqual({ kind: "gone" });

    expect(getRaffle(MESSAGE_ID)).toBeNull();
  });
});

describe("cancelRaffle", () => {
  beforeEach(resetDb);

  it("announces the cancellation and forgets the raffle", async () => {
    const raffle = seed();
    const { guild, channel } = setup();

    await expect(cancelRaffle(guild, raffle, 1_500)).resolves.toBe(true);

    expect(sentAt(channel, 0)).toEqual({
      content: "The **Gift card** raffle was cancelled. No winners will be pulled!",
      reply: { messageReference: MESSAGE_ID, failIfNotExists: false },
      allowedMentions: { users: [] },
    });
    expect(getRaffle(MESSAGE_ID)).toBeNull();
  });
});

describe("rerollRaffle", () => {
  beforeEach(resetDb);

  it("picks someone other than the last winner", async () => {
    const { guild, channel } = setup();
    await endRaffle(guild, seed(), { now: 1_500, random: () => 0 });

    const outcome = await rerollRaffle(guild, stored(), { random: sequence(0, 0.6) });

    expect(outcome).toMatchObject({ kind: "drawn", winnerIds: [BOB] });
    expect(sentAt(channel, 1)).toMatchObject({
      content: `Raffle has been rerolled!\n\nThe winner for the **Gift card** raffle is:\n\n<@${BOB}>\n\n:tada::tada: Congratulations! :tada::tada:`,
      allowedMentions: { users: [BOB] },
    });
    expect(stored().winnerIds).toEqual([BOB]);
  });

  it("posts in the channel when the raffle message was deleted", async () => {
    const { guild, channel } = setup();
    await endRaffle(guild, seed(), { now: 1_500, random: () => 0 });
    vi.mocked(channel.messages.fetch).mockRejectedValue(discordError(10008, 404, "Unknown Message"));

    await rerollRaffle(guild, stored(), { random: sequence(0, 0.6) });

    expect(sentAt(channel, 1)).toEqual({
      content: `Raffle has been rerolled!\n\nThe winner for the **Gift card** raffle is:\n\n<@${BOB}>\n\n:tada::tada: Congratulations! :tada::tada:`,
      allowedMentions: { users: [BOB] },
    });
  });
});

function sequence(...values: number[]): () => number {
  let i = 0;
  return () => values[i++] ?? 0;
}

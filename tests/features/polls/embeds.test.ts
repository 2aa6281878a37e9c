/**
 * tidewatch — tests/features/polls/embeds.test.ts
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect } from "vitest";
import { ButtonStyle } from "discord.js";
import {
  buildEndedPollEmbed,
  buildPollButtons,
  buildPollEmbed,
  buildPollResultsEmbed,
  resultsFooter,
} from "../../../src/features/polls/embeds.js";
import type { Poll } from "../../../src/store/pollStore.js";

function poll(overrides: Partial<Poll> = {}): Poll {
  return {
    messageId: "500000000000000101",
    guildId: "100000000000000001",
    channelId: "400000000000000001",
    hostId: "200000000000000002",
    question: "Pizza tonight?",
    voteType: "single",
    roleIds: [],
    endTime: 1_700_000_000,
    endedAt: null,
    options: [
      { index: 0, label: "Yes", votes: [] },
      { index: 1, label: "No", votes: [] },
    ],
    ...overrides,
  };
}

function withVotes(counts: number[]): Poll["options"] {
  const labels = ["Yes", "No", "Maybe"];
  return counts.map((n, index) => ({
    index,
    label: labels[index] ?? `Option ${index}`,
    votes: Array.from({ length: n }, (_, v) => `2000000000000001${String(v).padStart(2, "0")}`),
  }));
}

describe("buildPollEmbed", () => {
  it("lists the options with their letters and the poll details", () => {
    const json = buildPollEmbed(poll({ roleIds: ["300000000000000005", "300000000000000006"] }), "Test Guild").toJSON();

    expect(json.author?.name).toBe("Test Guild Poll!");
    expect(json.title).toBe("Pizza tonight?");
    expect(json.description).toBe("🇦 Yes\n🇧 No");
    expect(json.fields).toEqual([
      { name: "Ends", value: "<t:1700000000:D> ◈ <t:1700000000:R>", inline: false },
      { name: "Hosted By", value: "<@200000000000000002>", inline: true },
      { name: "Mode", value: "Single Vote", inline: true },
      { name: "Allowed Roles", value: "<@&300000000000000005> <@&300000000000000006>", inline: true },
    ]);
    expect(json.footer?.text).toBe(
      "Click the buttons below to vote. If interaction fails, try again later. Bot might be down."
    );
  });

  it("shows @everyone when no roles are required", () => {
    const json = buildPollEmbed(poll({ voteType: "multi" }), "Test Guild").toJSON();
    expect(json.fields?.slice(2).map((f) => f.value)).toEqual(["Multi Vote", "@everyone"]);
  });
});

describe("buildPollButtons", () => {
  it("keeps up to five options on one row", () => {
    const rows = buildPollButtons(poll({ options: withVotes([1, 0]) }));

    expect(rows).toHaveLength(1);
    expect(rows[0]?.components[0]?.toJSON()).toMatchObject({
      custom_id: "poll:vote:0",
      label: "[1]",
      style: ButtonStyle.Secondary,
    });
  });

  it("splits six options into two rows of three", () => {
    const options = Array.from({ length: 6 }, (_, index) => ({ index, label: `Option ${index}`, votes: [] }));
    const rows = buildPollButtons(poll({ options }));

    expect(rows.map((row) => row.components.length)).toEqual([3, 3]);
    expect(rows[1]?.components[0]?.toJSON()).toMatchObject({ custom_id: "poll:vote:3", label: "[0]" });
  });
});

describe("buildEndedPollEmbed", () => {
  it("pads vote counts and swaps the end time for the close time", () => {
    const ended = poll({ options: withVotes([10, 2]), endedAt: 1_700_000_600 });
    const json = buildEndedPollEmbed(ended, "Test Guild", "tidewatch").toJSON();

    expect(json.description).toBe("`10` - 🇦 Yes\n`2 ` - 🇧 No");
    expect(json.fields?.[0]).toEqual({
      name: "Ended",
      value: "<t:1700000600:D> ◈ <t:1700000600:R>",
      inline: false,
    });
    expect(json.fields?.map((f) => f.name)).toEqual(["Ended", "Hosted By", "Mode", "Allowed Roles"]);
    expect(json.footer?.text).toBe("Guild polls brought to you by tidewatch!");
  });
});

describe("buildPollResultsEmbed", () => {
  it("orders options by votes, ties in option order", () => {
    const ended = poll({ options: withVotes([1, 3, 1]), endedAt: 1_700_000_600 });
    const json = buildPollResultsEmbed(ended, "Test Guild").toJSON();

    expect(json.author?.name).toBe("Test Guild Poll Results!");
    expect(json.description).toBe("`3` - 🇧 No\n`1` - 🇦 Yes\n`1` - 🇨 Maybe");
    expect(json.footer?.text).toBe("A total of 5 votes were submitted!");
  });
});

describe("resultsFooter", () => {
  it("counts distinct voters in multi mode", () => {
    const multi = poll({
      voteType: "multi",
      options: [
        { index: 0, label: "Yes", votes: ["a"] },
        { index: 1, label: "No", votes: ["a", "b", "c"] },
        { index: 2, label: "Maybe", votes: ["b"] },
      ],
    });
    expect(resultsFooter(multi)).toBe("A total of 5 votes were submitted by 3 users");
  });

  it("uses the singular for one voter", () => {
    const multi = poll({
      voteType: "multi",
      options: [
        { index: 0, label: "Yes", votes: ["a"] },
        { index: 1, label: "No", votes: ["a"] },
      ],
    });
    expect(resultsFooter(multi)).toBe("A total of 2 votes were submitted by 1 user");
  });
});

/**
 * tidewatch — tests/commands/poll.test.ts
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, beforeEach, vi } from "vitest";
import { PermissionFlagsBits, type Guild, type TextChannel } from "discord.js";
import { execute, parsePollOptions } from "../../src/commands/poll.js";
import { createPoll, getPoll, markPollEnded, togglePollVote, type NewPoll } from "../../src/store/pollStore.js";
import {
  GUILD_ID,
  createMockChannel,
  createMockGuild,
  createMockInteraction,
  sentContents,
  type MockOptionValue,
} from "../utils/discordMocks.js";
import { createTestCommandContext } from "../utils/contextFactory.js";
import { resetDb } from "../utils/dbFixtures.js";

const NOW = 1_700_000_000;
const LINK = "https://discord.com/channels/100000000000000001/400000000000000001/500000000000000101";

function seed(overrides: Partial<NewPoll> = {}) {
  createPoll({
    messageId: "500000000000000101",
    guildId: GUILD_ID,
    channelId: "400000000000000001",
    hostId: "200000000000000002",
    question: "Pizza tonight?",
    voteType: "single",
    roleIds: [],
    endTime: 4_000_000_000,
    options: ["Yes", "No"],
    ...overrides,
  });
}

async function run(subcommand: string, options: Record<string, MockOptionValue> = {}, guild: Guild = createMockGuild()) {
  const mock = createMockInteraction({ commandName: "poll", subcommand, options, guild });
  await execute(createTestCommandContext(mock.typed));
  return mock;
}

/** A guild whose poll message can be fetched and edited */
function hostingGuild(): { guild: Guild; channel: TextChannel } {
  const guild = createMockGuild();
  const channel = createMockChannel();
  vi.mocked(channel.messages.fetch).mockResolvedValue({
    id: "500000000000000101",
    edit: vi.fn().mockResolvedValue(undefined),
  } as never);
  guild.channels.cache.set(channel.id, channel);
  return { guild, channel };
}

describe("parsePollOptions", () => {
  it("splits on pipes and drops blanks", () => {
    expect(parsePollOptions(" Yes | No || Maybe |")).toEqual(["Yes", "No", "Maybe"]);
  });
});

describe("/poll start", () => {
  beforeEach(() => {
    resetDb();
    vi.useFakeTimers();
    vi.setSystemTime(NOW * 1000);
  });

  function startOptions(overrides: Record<string, MockOptionValue> = {}): Record<string, MockOptionValue> {
    return {
      channel: createMockChannel(),
      time: "2 days",
      question: "Pizza tonight?",
      options: "Yes | No | Maybe",
      ...overrides,
    };
  }

  it("posts the poll and stores it", async () => {
    const channel = createMockChannel();
    const options = startOptions({ channel, mode: "multi", roles: "<@&300000000000000005> 300000000000000099" });
    const guild = createMockGuild();
    guild.roles.cache.set("300000000000000005", { id: "300000000000000005" } as never);

    const { interaction } = await run("start", options, guild);

    expect(sentContents(interaction)).toEqual([
      "Poll sent! https://discord.com/channels/100000000000000001/400000000000000001/500000000000000001",
    ]);
    const poll = getPoll("500000000000000001");
    expect(poll).toMatchObject({
      question: "Pizza tonight?",
      voteType: "multi",
      roleIds: ["300000000000000005"],
      hostId: "200000000000000002",
      endTime: NOW + 172_800,
    });
    expect(poll?.options.map((o) => o.label)).toEqual(["Yes", "No", "Maybe"]);

    const [sent] = vi.mocked(channel.send).mock.calls[0] ?? [];
    expect(sent).toMatchObject({ components: [expect.anything()] });
  });

  it.each([
    ["soon", "You need to provide a valid time for the poll to last."],
    ["9 weeks", "The time can't be longer than `8 weeks`."],
    ["4m", "The poll can't be shorter than `5 minutes`."],
  ])("rejects the time %s", async (time, message) => {
    const { interaction } = await run("start", startOptions({ time }));

    expect(sentContents(interaction)).toEqual([message]);
    expect(getPoll("500000000000000001")).toBeNull();
  });

  it("stops at four running polls", async () => {
    for (let i = 1; i <= 4; i++) seed({ messageId: `50000000000000010${i}` });

    const { interaction } = await run("start", startOptions());

    expect(sentContents(interaction)).toEqual([
      "You already have 4 polls running in the server. Wait for one of them to finish first before starting another one.",
    ]);
  });

  it("needs between two and ten options", async () => {
    const few = await run("start", startOptions({ options: "Only | " }));
    expect(sentContents(few.interaction)).toEqual(["A poll needs at least 2 options, separated by `|`."]);

    const many = await run("start", startOptions({ options: "a|b|c|d|e|f|g|h|i|j|k" }));
    expect(sentContents(many.interaction)).toEqual(["A poll can't have more than 10 options."]);
  });

  it("asks for Embed Links in the target channel", async () => {
    const channel = createMockChannel({
      permissionsFor: () => ({ has: (perm: unknown) => perm !== PermissionFlagsBits.EmbedLinks }),
    });

    const { interaction } = await run("start", startOptions({ channel }));

    expect(sentContents(interaction)).toEqual(["I need the `Embed Links` permission to be able to start polls."]);
  });
});

describe("/poll end", () => {
  beforeEach(resetDb);

  it("says so when nothing is running", async () => {
    const { interaction } = await run("end");
    expect(sentContents(interaction)).toEqual(["There are no active polls running in the server."]);
  });

  it("asks which poll when several are running", async () => {
    seed({ messageId: "500000000000000101", endTime: 4_000_000_000 });
    seed({ messageId: "500000000000000102", question: "Tacos?", endTime: 4_000_000_100 });

    const { interaction } = await run("end");

    expect(sentContents(interaction)).toEqual([
      "There are 2 active polls. Give the message ID of the one to end:\n`500000000000000101` Pizza tonight?\n`500000000000000102` Tacos?",
    ]);
  });

  it("rejects an id that isn't running", async () => {
    seed();
    const { interaction } = await run("end", { message_id: "500000000000000999" });
    expect(sentContents(interaction)).toEqual(["I couldn't find a poll with that message ID."]);
  });

  it("ends the poll named by its link", async () => {
    seed();
    seed({ messageId: "500000000000000102" });
    const { guild } = hostingGuild();

    const { interaction } = await run("end", { message_id: LINK }, guild);

    expect(sentContents(interaction)).toEqual(["Poll ended."]);
    expect(getPoll("500000000000000101")?.endedAt).not.toBeNull();
    expect(getPoll("500000000000000102")?.endedAt).toBeNull();
  });
});

describe("/poll list", () => {
  beforeEach(resetDb);

  it("says so when there are no polls", async () => {
    const { interaction } = await run("list");
    expect(sentContents(interaction)).toEqual(["There are no current or past polls in this server."]);
  });

  it("shows running polls with links and vote counts", async () => {
    seed();
    const poll = getPoll("500000000000000101");
    if (!poll) throw new Error("poll missing");
    togglePollVote(poll, 0, "200000000000000003");

    const { interaction } = await run("list");

    const [payload] = interaction.reply.mock.calls[0] ?? [];
    expect(payload.embeds[0].toJSON().fields).toEqual([
      {
        name: "Active Polls",
        value: `Pizza tonight? ◈ ${LINK}\n<t:4000000000:D> <t:4000000000:R> ◈ Votes: 1`,
      },
    ]);
  });
});

describe("/poll results", () => {
  beforeEach(resetDb);

  it("waits for a running poll to end", async () => {
    seed();
    const { interaction } = await run("results", { message_id: "500000000000000101" });
    expect(sentContents(interaction)).toEqual(["That poll is still running. Its results are posted when it ends."]);
  });

  it("shows the results of an ended poll", async () => {
    seed();
    const poll = getPoll("500000000000000101");
    if (!poll) throw new Error("poll missing");
    togglePollVote(poll, 1, "200000000000000003");
    markPollEnded(poll, 1_700_000_600);

    const { interaction } = await run("results", { message_id: LINK });

    const [payload] = interaction.reply.mock.calls[0] ?? [];
    const json = payload.embeds[0].toJSON();
    expect(json.description).toBe("`1` - 🇧 No\n`0` - 🇦 Yes");
    expect(json.footer.text).toBe("A total of 1 votes were submitted!");
  });
});

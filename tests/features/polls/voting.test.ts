/**
 * tidewatch — tests/features/polls/voting.test.ts
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, beforeEach } from "vitest";
import { handlePollVote, voteReceipt } from "../../../src/features/polls/voting.js";
import { createPoll, getPoll, markPollEnded, type NewPoll } from "../../../src/store/pollStore.js";
import {
  createMockButtonInteraction,
  createMockGuild,
  createMockMember,
  createMockRole,
  sentContents,
} from "../../utils/discordMocks.js";
import { createTestCommandContext } from "../../utils/contextFactory.js";
import { resetDb } from "../../utils/dbFixtures.js";

const MESSAGE_ID = "500000000000000001";

function seed(overrides: Partial<NewPoll> = {}) {
  createPoll({
    messageId: MESSAGE_ID,
    guildId: "100000000000000001",
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

async function click(customId: string, init: Omit<Parameters<typeof createMockButtonInteraction>[0], "customId"> = {}) {
  const mock = createMockButtonInteraction({ customId, ...init });
  await handlePollVote(createTestCommandContext(mock.typed));
  return mock;
}

describe("voteReceipt", () => {
  beforeEach(resetDb);

  it("mentions the option the vote moved away from", () => {
    seed();
    const poll = getPoll(MESSAGE_ID);
    if (!poll) throw new Error("poll missing");

    expect(voteReceipt(poll, 1, { added: true, movedFrom: [0] })).toBe(
      "Successfully counted your vote for: 🇧 No\n\nAnd removed your previous vote for: 🇦 Yes"
    );
    expect(voteReceipt(poll, 0, { added: false, movedFrom: [] })).toBe("Removed your vote for: 🇦 Yes");
  });
});

describe("handlePollVote", () => {
  beforeEach(resetDb);

  it("counts a vote and refreshes the button counts", async () => {
    seed();

    const { interaction, message } = await click("poll:vote:0");

    expect(interaction.deferReply).toHaveBeenCalled();
    expect(sentContents(interaction)).toEqual(["Successfully counted your vote for: 🇦 Yes"]);
    const [payload] = message.edit.mock.calls[0] ?? [];
    expect(payload.components[0].toJSON().components.map((c: { label: string }) => c.label)).toEqual(["[1]", "[0]"]);
    expect(getPoll(MESSAGE_ID)?.options.map((o) => o.votes)).toEqual([["200000000000000003"], []]);
  });

  it("moves a single vote to the newly clicked option", async () => {
    seed();
    await click("poll:vote:0");

    const { interaction } = await click("poll:vote:1");

    expect(sentContents(interaction)).toEqual([
      "Successfully counted your vote for: 🇧 No\n\nAnd removed your previous vote for: 🇦 Yes",
    ]);
    expect(getPoll(MESSAGE_ID)?.options.map((o) => o.votes)).toEqual([[], ["200000000000000003"]]);
  });

  it("still answers when the poll message can't be edited", async () => {
    seed();
    const mock = createMockButtonInteraction({ customId: "poll:vote:1" });
    mock.message.edit.mockRejectedValue(new Error("edit failed"));

    await handlePollVote(createTestCommandContext(mock.typed));

    expect(sentContents(mock.interaction)).toEqual(["Successfully counted your vote for: 🇧 No"]);
  });

  it("turns away members without an allowed role", async () => {
    seed({ roleIds: ["300000000000000005"] });
    const guild = createMockGuild();
    const member = createMockMember(guild, { id: "200000000000000003" });

    const denied = await click("poll:vote:0", { guild, member });
    expect(sentContents(denied.interaction)).toEqual([
      "You don't have any of the required roles to interact with this poll!",
    ]);
    expect(denied.interaction.deferReply).not.toHaveBeenCalled();

    member.roles.cache.set("300000000000000005", createMockRole({ id: "300000000000000005" }));
    const allowed = await click("poll:vote:0", { guild, member });
    expect(sentContents(allowed.interaction)).toEqual(["Successfully counted your vote for: 🇦 Yes"]);
  });

  it("refuses votes once the poll has ended", async () => {
    seed();
    const poll = getPoll(MESSAGE_ID);
    if (!poll) throw new Error("poll missing");
    markPollEnded(poll, 1_000);

    const { interaction, message } = await click("poll:vote:0");

    expect(sentContents(interaction)).toEqual(["This poll has ended."]);
    expect(message.edit).not.toHaveBeenCalled();
  });

  it("rejects an option the poll doesn't have", async () => {
    seed();
    const { interaction } = await click("poll:vote:7");
    expect(sentContents(interaction)).toEqual(["That option isn't part of this poll."]);
  });
});

/**
 * tidewatch — tests/lib/cmdWrap.test.ts
 * WHAT: Reply routing and the error reply of wrapped commands.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi } from "vitest";
import { MessageFlags, type ChatInputCommandInteraction } from "discord.js";
import { ensureDeferred, replyOrEdit, wrapCommand } from "../../src/lib/cmdWrap.js";
import { MissingConfigError } from "../../src/lib/errors.js";
import { discordError } from "../utils/discordMocks.js";

function mockInteraction(state: { deferred?: boolean; replied?: boolean } = {}) {
  const interaction = {
    commandName: "test",
    user: { id: "200000000000000001" },
    guildId: "100000000000000001",
    channelId: "400000000000000001",
    deferred: state.deferred ?? false,
    replied: state.replied ?? false,
    reply: vi.fn().mockResolvedValue(undefined),
    fetchReply: vi.fn().mockResolvedValue({ id: "reply" }),
    editReply: vi.fn().mockResolvedValue({ id: "edited" }),
    followUp: vi.fn().mockResolvedValue({ id: "followup" }),
    deferReply: vi.fn().mockResolvedValue(undefined),
  };
  return { interaction, typed: interaction as unknown as ChatInputCommandInteraction };
}

describe("replyOrEdit", () => {
  it("replies ephemerally by default and returns the reply message", async () => {
    const { interaction, typed } = mockInteraction();
    const message = await replyOrEdit(typed, { content: "hi" });

    expect(interaction.reply).toHaveBeenCalledWith({ content: "hi", flags: MessageFlags.Ephemeral });
    expect(message).toEqual({ id: "reply" });
  });

  it("replies publicly on request", async () => {
    const { interaction, typed } = mockInteraction();
    await replyOrEdit(typed, { content: "hi" }, { ephemeral: false });
    expect(interaction.reply).toHaveBeenCalledWith({ content: "hi" });
  });

  it("fills a deferred reply first", async () => {
    const { interaction, typed } = mockInteraction({ deferred: true });
    await replyOrEdit(typed, { content: "done" });
    expect(interaction.editReply).toHaveBeenCalledWith({ content: "done" });
    expect(interaction.followUp).not.toHaveBeenCalled();
  });

  it("follows up once a reply exists", async () => {
    const { interaction, typed } = mockInteraction({ deferred: true, replied: true });
    await replyOrEdit(typed, { content: "more" }, { ephemeral: false });
    expect(interaction.followUp).toHaveBeenCalledWith({ content: "more" });
    expect(interaction.editReply).not.toHaveBeenCalled();
  });

  it("skips expired interactions", async () => {
    const { interaction, typed } = mockInteraction();
    interaction.reply.mockRejectedValue(discordError(10062, 404, "Unknown interaction"));
    await expect(replyOrEdit(typed, { content: "late" })).resolves.toBeUndefined();
  });

  it("rethrows other failures", async () => {
    const { interaction, typed } = mockInteraction();
    const err = discordError(50013);
    interaction.reply.mockRejectedValue(err);
    await expect(replyOrEdit(typed, { content: "x" })).rejects.toBe(err);
  });
});

describe("ensureDeferred", () => {
  it("defers once, ephemeral by default", async () => {
    const { interaction, typed } = mockInteraction();
    await ensureDeferred(typed);
    expect(interaction.deferReply).toHaveBeenCalledWith({ flags: MessageFlags.Ephemeral });
  });

  it("does nothing when already acknowledged", async () => {
    const { interaction, typed } = mockInteraction({ replied: true });
    await ensureDeferred(typed, { ephemeral: false });
    expect(interaction.deferReply).not.toHaveBeenCalled();
  });
});

describe("wrapCommand", () => {
  it("passes a context with step tracking", async () => {
    const { typed } = mockInteraction();
    const phases: string[] = [];
    const handler = wrapCommand<ChatInputCommandInteraction>("test", async (ctx) => {
      ctx.step("lookup");
      phases.push(ctx.currentPhase());
      expect(ctx.traceId).toMatch(/^[0-9A-Za-z]{11}$/);
    });

    await handler(typed);
    expect(phases).toEqual(["lookup"]);
  });

  it("turns a thrown error into an ephemeral reply with a trace id", async () => {
    const { interaction, typed } = mockInteraction();
    const handler = wrapCommand<ChatInputCommandInteraction>("test", async () => {
      throw new MissingConfigError("TENOR_API_KEY");
    });

    await expect(handler(typed)).resolves.toBeUndefined();
    expect(interaction.reply).toHaveBeenCalledTimes(1);
    const payload = interaction.reply.mock.calls[0][0];
    expect(payload.flags).toBe(MessageFlags.Ephemeral);
    expect(payload.content).toMatch(/^Configuration error: TENOR_API_KEY is not set\.\nTrace: `[0-9A-Za-z]{11}`$/);
    expect(payload.components).toEqual([]);
    expect(payload.embeds).toEqual([]);
  });
});
